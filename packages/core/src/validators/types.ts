/**
 * Common types for docstring rules
 */

import type { DocstringCandidate, DocstringRuleId, Violation } from '../types.js';

/**
 * A candidate whose docstring text is present, split into logical lines.
 */
export interface DocstringContext {
  filePath: string;
  candidate: DocstringCandidate & { readonly rawText: string };
  lines: string[];
}

export interface DocstringRule {
  readonly id: DocstringRuleId;
  readonly description: string;
  check(context: DocstringContext): Violation[];
}

export interface ValidatorConfig {
  /** Longest allowed logical docstring line, in code points */
  maxLineLength?: number;
  /** Do not flag scopes without a docstring */
  skipMissing?: boolean;
  /** Skip `_private` scopes (dunder names are still checked) */
  skipPrivate?: boolean;
  /** Extra rules to run after the line-length rule */
  rules?: DocstringRule[];
}
