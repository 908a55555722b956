/**
 * Text Report Formatter - the default human-readable output
 */

import type { RunSummary, Violation } from '../types.js';
import { sortViolations } from '../utils/severity.js';
import { pluralize } from '../utils/text.js';

import { displayPath } from './paths.js';
import type { FormatOptions, ReportFormatter } from './types.js';

/**
 * `Checked <n> file(s): <m> violation(s)[, <k> file(s) not checked]`
 */
export function formatSummaryLine(summary: RunSummary): string {
  let line = `Checked ${pluralize(summary.totalFiles, 'file')}: ${pluralize(summary.totalViolations, 'violation')}`;
  if (summary.uncheckedFiles > 0) {
    line += `, ${pluralize(summary.uncheckedFiles, 'file')} not checked`;
  }
  return line;
}

export function formatLocation(violation: Violation): string {
  return violation.column !== undefined ? `${violation.line}:${violation.column}` : `${violation.line}`;
}

export class TextReportFormatter implements ReportFormatter {
  private basePath: string;

  constructor(options: FormatOptions = {}) {
    this.basePath = options.basePath ?? process.cwd();
  }

  format(summary: RunSummary): string {
    const lines: string[] = [];

    for (const result of summary.results) {
      if (result.violations.length === 0 && !result.internalError) {
        continue;
      }

      lines.push(displayPath(result.filePath, this.basePath));
      for (const violation of sortViolations(result.violations)) {
        lines.push(`  ${formatLocation(violation)}: ${violation.ruleId} ${violation.message}`);
      }
      if (result.internalError) {
        lines.push(`  internal error: ${result.internalError}`);
      }
      lines.push('');
    }

    if (summary.diagnostics.length > 0) {
      for (const diagnostic of summary.diagnostics) {
        lines.push(`${diagnostic.severity}: ${diagnostic.message}`);
      }
      lines.push('');
    }

    lines.push(formatSummaryLine(summary));
    return lines.join('\n');
  }
}
