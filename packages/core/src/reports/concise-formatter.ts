/**
 * Concise Report Formatter - one `path:line[:col]: rule message` line per
 * violation
 */

import type { RunSummary } from '../types.js';
import { sortViolations } from '../utils/severity.js';

import { displayPath } from './paths.js';
import { formatLocation, formatSummaryLine } from './text-formatter.js';
import type { FormatOptions, ReportFormatter } from './types.js';

export class ConciseReportFormatter implements ReportFormatter {
  private basePath: string;

  constructor(options: FormatOptions = {}) {
    this.basePath = options.basePath ?? process.cwd();
  }

  format(summary: RunSummary): string {
    const lines: string[] = [];

    for (const result of summary.results) {
      const path = displayPath(result.filePath, this.basePath);
      for (const violation of sortViolations(result.violations)) {
        lines.push(`${path}:${formatLocation(violation)}: ${violation.ruleId} ${violation.message}`);
      }
      if (result.internalError) {
        lines.push(`${path}: internal-error ${result.internalError}`);
      }
    }

    for (const diagnostic of summary.diagnostics) {
      lines.push(`${diagnostic.severity}: ${diagnostic.message}`);
    }

    lines.push(formatSummaryLine(summary));
    return lines.join('\n');
  }
}
