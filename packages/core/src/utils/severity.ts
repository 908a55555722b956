/**
 * Violation ordering utilities
 */

import type { Violation } from '../types.js';

/**
 * Order violations within a file by line, rule id, column, then message
 */
export function compareViolations(a: Violation, b: Violation): number {
  if (a.line !== b.line) return a.line - b.line;
  if (a.ruleId !== b.ruleId) return a.ruleId < b.ruleId ? -1 : 1;
  const columnA = a.column ?? 0;
  const columnB = b.column ?? 0;
  if (columnA !== columnB) return columnA - columnB;
  if (a.message !== b.message) return a.message < b.message ? -1 : 1;
  return 0;
}

export function sortViolations(violations: readonly Violation[]): Violation[] {
  return [...violations].sort(compareViolations);
}
