/**
 * Docstring line length - flags every logical line over the limit
 */

import { codePointLength } from '../utils/text.js';
import type { Violation } from '../types.js';

import { docstringLine } from './lines.js';
import type { DocstringContext, DocstringRule } from './types.js';

export class LineLengthRule implements DocstringRule {
  readonly id = 'docstring-line-length';

  constructor(private readonly maxLineLength = 72) {}

  get description(): string {
    return `Docstring lines must not exceed ${this.maxLineLength} characters`;
  }

  check(context: DocstringContext): Violation[] {
    const violations: Violation[] = [];

    context.lines.forEach((line, index) => {
      // Trailing whitespace never counts; indentation does.
      const length = codePointLength(line.trimEnd());
      if (length <= this.maxLineLength) return;

      violations.push({
        filePath: context.filePath,
        line: docstringLine(context.candidate, index),
        ruleId: this.id,
        message: `Docstring line too long (${length} > ${this.maxLineLength})`,
        severity: 'error',
      });
    });

    return violations;
  }
}
