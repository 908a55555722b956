/**
 * JSON Report Writer - machine-readable output
 */

import { writeFile } from 'fs/promises';

import type { CheckResult, Diagnostic, ExitStatus, RunSummary, Violation } from '../types.js';
import { sortViolations } from '../utils/severity.js';

import { displayPath } from './paths.js';
import type { FormatOptions, ReportFormatter } from './types.js';

export interface JsonViolation {
  line: number;
  column?: number;
  ruleId: string;
  message: string;
  severity: Violation['severity'];
}

export interface JsonFileResult {
  filePath: string;
  checked: boolean;
  internalError?: string;
  violations: JsonViolation[];
}

/**
 * Stable projection of a RunSummary. Timing is left out so the same input
 * always yields the same document.
 */
export interface JsonReport {
  exitStatus: ExitStatus;
  totalFiles: number;
  totalViolations: number;
  uncheckedFiles: number;
  diagnostics: Diagnostic[];
  results: JsonFileResult[];
}

export class JsonReportFormatter implements ReportFormatter {
  private basePath: string;

  constructor(options: FormatOptions = {}) {
    this.basePath = options.basePath ?? process.cwd();
  }

  toReport(summary: RunSummary): JsonReport {
    return {
      exitStatus: summary.exitStatus,
      totalFiles: summary.totalFiles,
      totalViolations: summary.totalViolations,
      uncheckedFiles: summary.uncheckedFiles,
      diagnostics: summary.diagnostics.map((diagnostic) => ({ ...diagnostic })),
      results: summary.results.map((result) => this.toFileResult(result)),
    };
  }

  format(summary: RunSummary): string {
    return JSON.stringify(this.toReport(summary), null, 2);
  }

  private toFileResult(result: CheckResult): JsonFileResult {
    const entry: JsonFileResult = {
      filePath: displayPath(result.filePath, this.basePath),
      checked: result.checked,
      violations: sortViolations(result.violations).map((violation) => {
        const projected: JsonViolation = {
          line: violation.line,
          ruleId: violation.ruleId,
          message: violation.message,
          severity: violation.severity,
        };
        if (violation.column !== undefined) {
          projected.column = violation.column;
        }
        return projected;
      }),
    };
    if (result.internalError) {
      entry.internalError = result.internalError;
    }
    return entry;
  }
}

export class JsonReportWriter {
  private formatter: JsonReportFormatter;

  constructor(options: FormatOptions = {}) {
    this.formatter = new JsonReportFormatter(options);
  }

  /**
   * Write report to JSON file
   */
  async write(summary: RunSummary, filepath: string): Promise<void> {
    await writeFile(filepath, `${this.formatter.format(summary)}\n`, 'utf-8');
  }
}
