/**
 * Docstring Validator - applies docstring rules to the candidates of one
 * file
 *
 * Features:
 * - Line length measured in code points, trailing whitespace ignored
 * - One violation per offending line, in ascending line order
 * - Optional missing-docstring, summary and NumPy section rules
 */

import { CandidateContractError } from '../errors.js';
import type { DocstringCandidate, ExtraRuleId, Violation } from '../types.js';
import { sortViolations } from '../utils/severity.js';

import { LineLengthRule } from './line-length-rule.js';
import { splitDocstring } from './lines.js';
import { NumpySectionsRule } from './numpy-sections-rule.js';
import { SummaryPeriodRule } from './summary-period-rule.js';
import type { DocstringContext, DocstringRule, ValidatorConfig } from './types.js';

const SCOPE_LABELS: Record<DocstringCandidate['scopeKind'], string> = {
  module: 'module',
  class: 'class',
  function: 'function',
  async_function: 'async function',
};

export function createExtraRule(id: ExtraRuleId): DocstringRule {
  switch (id) {
    case 'docstring-summary-period':
      return new SummaryPeriodRule();
    case 'docstring-numpy-sections':
      return new NumpySectionsRule();
  }
}

export class DocstringValidator {
  private config: Required<ValidatorConfig>;
  private lineLengthRule: LineLengthRule;

  constructor(config: ValidatorConfig = {}) {
    this.config = {
      maxLineLength: config.maxLineLength ?? 72,
      skipMissing: config.skipMissing ?? true,
      skipPrivate: config.skipPrivate ?? false,
      rules: config.rules ?? [],
    };
    this.lineLengthRule = new LineLengthRule(this.config.maxLineLength);
  }

  /**
   * Validate every candidate of one file.
   *
   * @throws CandidateContractError when a candidate has no usable line range
   */
  validate(candidates: Iterable<DocstringCandidate>, filePath: string): Violation[] {
    const violations: Violation[] = [];

    for (const candidate of candidates) {
      assertCandidate(candidate);

      if (this.config.skipPrivate && isPrivate(candidate)) {
        continue;
      }

      if (candidate.rawText === null) {
        if (!this.config.skipMissing) {
          violations.push(missingDocstring(candidate, filePath));
        }
        continue;
      }

      const context: DocstringContext = {
        filePath,
        candidate: { ...candidate, rawText: candidate.rawText },
        lines: splitDocstring(candidate.rawText),
      };

      violations.push(...this.lineLengthRule.check(context));
      for (const rule of this.config.rules) {
        violations.push(...rule.check(context));
      }
    }

    return sortViolations(violations);
  }
}

function assertCandidate(candidate: DocstringCandidate): void {
  if (!Number.isInteger(candidate.startLine) || candidate.startLine < 1) {
    throw new CandidateContractError(candidate.scopeName, `invalid start line ${String(candidate.startLine)}`);
  }
  if (!Number.isInteger(candidate.endLine) || candidate.endLine < candidate.startLine) {
    throw new CandidateContractError(
      candidate.scopeName,
      `end line ${String(candidate.endLine)} precedes start line ${candidate.startLine}`
    );
  }
}

function isPrivate(candidate: DocstringCandidate): boolean {
  if (candidate.scopeKind === 'module') return false;
  const name = candidate.scopeName.slice(candidate.scopeName.lastIndexOf('.') + 1);
  const isDunder = name.startsWith('__') && name.endsWith('__');
  return name.startsWith('_') && !isDunder;
}

function missingDocstring(candidate: DocstringCandidate, filePath: string): Violation {
  const where =
    candidate.scopeKind === 'module'
      ? 'module'
      : `${SCOPE_LABELS[candidate.scopeKind]} "${candidate.scopeName}"`;

  return {
    filePath,
    line: candidate.startLine,
    ruleId: 'docstring-missing',
    message: `Missing docstring in ${where}`,
    severity: 'error',
  };
}
