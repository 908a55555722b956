/**
 * Report formatters and writers
 */

import type { ReportFormat } from '../types.js';

import { ConciseReportFormatter } from './concise-formatter.js';
import { JsonReportFormatter } from './json-writer.js';
import { TextReportFormatter } from './text-formatter.js';
import type { FormatOptions, ReportFormatter } from './types.js';

export function createFormatter(format: ReportFormat, options: FormatOptions = {}): ReportFormatter {
  switch (format) {
    case 'text':
      return new TextReportFormatter(options);
    case 'concise':
      return new ConciseReportFormatter(options);
    case 'json':
      return new JsonReportFormatter(options);
  }
}

export { ConciseReportFormatter } from './concise-formatter.js';
export { JsonReportFormatter, JsonReportWriter } from './json-writer.js';
export type { JsonFileResult, JsonReport, JsonViolation } from './json-writer.js';
export { TextReportFormatter, formatLocation, formatSummaryLine } from './text-formatter.js';
export { displayPath } from './paths.js';
export type { FormatOptions, ReportFormatter } from './types.js';
