/**
 * Summary punctuation - the first paragraph of a docstring should end
 * with a period
 */

import type { Violation } from '../types.js';

import { docstringLine } from './lines.js';
import type { DocstringContext, DocstringRule } from './types.js';

export class SummaryPeriodRule implements DocstringRule {
  readonly id = 'docstring-summary-period';
  readonly description = 'Docstring summary should end with a period';

  check(context: DocstringContext): Violation[] {
    const { lines } = context;

    const start = lines.findIndex((line) => line.trim().length > 0);
    if (start === -1) return [];

    let last = start;
    while (last + 1 < lines.length && lines[last + 1].trim().length > 0) {
      last++;
    }

    if (lines[last].trimEnd().endsWith('.')) return [];

    return [
      {
        filePath: context.filePath,
        line: docstringLine(context.candidate, last),
        ruleId: this.id,
        message: this.description,
        severity: 'error',
      },
    ];
  }
}
