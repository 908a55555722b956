/**
 * DocGate Core
 * Main exports for the docgate core library
 *
 * Includes the docstring extractor and validator, the Ruff style checker
 * and the report formatters.
 */

// Main orchestrator
export { DocGate } from './engine.js';
export type { DocGateOptions } from './engine.js';

// Types
export * from './types.js';
export * from './errors.js';

// Utilities
export * from './utils/index.js';

// Configuration
export { configFileSchema, mergeConfig, parseConfigFile, resolveConfig } from './config/loader.js';
export type { ConfigFile, ResolveConfigOptions } from './config/loader.js';

// ============================================================================
// DOCSTRING CHECKS
// ============================================================================

export { discoverFiles } from './discovery/file-finder.js';
export type { DiscoveryOptions, DiscoveryResult, UnreadablePath } from './discovery/file-finder.js';

export { extractDocstrings } from './extractor/extractor.js';
export { PythonParser } from './parser/python-parser.js';
export { parseStringLiteral, decodeEscapes } from './parser/string-literal.js';
export type { StringLiteral } from './parser/string-literal.js';

export {
  DocstringValidator,
  LineLengthRule,
  NumpySectionsRule,
  SummaryPeriodRule,
  createExtraRule,
} from './validators/index.js';
export type { DocstringContext, DocstringRule, ValidatorConfig } from './validators/index.js';

// ============================================================================
// STYLE CHECKS
// ============================================================================

export { RuffStyleChecker, execFileRunner } from './style/index.js';
export type {
  CommandOptions,
  CommandResult,
  CommandRunner,
  RuffCheckerConfig,
  StyleChecker,
} from './style/index.js';

// ============================================================================
// REPORTS
// ============================================================================

export {
  createFormatter,
  ConciseReportFormatter,
  JsonReportFormatter,
  JsonReportWriter,
  TextReportFormatter,
  displayPath,
  formatSummaryLine,
} from './reports/index.js';
export type { FormatOptions, JsonReport, ReportFormatter } from './reports/index.js';
