import type { DocstringCandidate } from '../types.js';

export function splitDocstring(rawText: string): string[] {
  return rawText.split('\n');
}

/**
 * Source line for a logical docstring line. Escaped newlines can produce
 * more logical lines than physical ones, so the result stays within the
 * literal's extent.
 */
export function docstringLine(candidate: DocstringCandidate, index: number): number {
  return Math.min(candidate.startLine + index, Math.max(candidate.endLine, candidate.startLine));
}
