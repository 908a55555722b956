/**
 * Report formatter types
 */

import type { RunSummary } from '../types.js';

export interface FormatOptions {
  /** Paths are printed relative to this directory (defaults to process.cwd()) */
  basePath?: string;
}

export interface ReportFormatter {
  format(summary: RunSummary): string;
}
