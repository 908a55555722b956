export { RuffStyleChecker } from './ruff-checker.js';
export type { RuffCheckerConfig, RuffDiagnostic } from './ruff-checker.js';
export { execFileRunner } from './command-runner.js';
export type { CommandOptions, CommandResult, CommandRunner, StyleChecker } from './types.js';
