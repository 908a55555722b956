/**
 * Check command implementation
 */

import chalk from 'chalk';
import ora from 'ora';

import type { CheckConfig, ExtraRuleId, ReportFormat, RunSummary } from '@docgate/core';
import {
  ConfigError,
  DocGate,
  InvocationError,
  JsonReportWriter,
  createFormatter,
  displayPath,
  pluralize,
  resolveConfig,
} from '@docgate/core';

import { EXIT_SUCCESS, EXIT_USAGE, EXIT_VIOLATIONS } from '../exit-codes.js';
import { formatDuration } from '../output/duration.js';
import { createLogger } from '../output/logger.js';
import type { LogLevel, Logger } from '../output/logger.js';
import { VERSION } from '../version.js';

export interface CheckOptions {
  maxLineLength?: number;
  /** false when --no-style-check is given */
  styleCheck: boolean;
  config?: string;
  quiet?: boolean;
  verbose?: boolean;
  requireDocstrings?: boolean;
  skipPrivate?: boolean;
  rule: ExtraRuleId[];
  fix?: boolean;
  styleTimeout?: number;
  format: ReportFormat;
  output?: string;
}

/**
 * Map command line flags onto config keys. Flags that were not given
 * leave the config file value in place.
 */
export function buildOverrides(options: CheckOptions): Partial<CheckConfig> {
  const overrides: Partial<CheckConfig> = {};

  if (options.maxLineLength !== undefined) overrides.maxLineLength = options.maxLineLength;
  if (!options.styleCheck) overrides.enableStyleCheck = false;
  if (options.requireDocstrings) overrides.skipMissingDocstrings = false;
  if (options.skipPrivate) overrides.skipPrivate = true;
  if (options.rule.length > 0) overrides.rules = [...new Set(options.rule)];
  if (options.fix) overrides.fix = true;
  if (options.styleTimeout !== undefined) overrides.styleCheckTimeoutMs = options.styleTimeout;

  return overrides;
}

export function resolveLogLevel(options: Pick<CheckOptions, 'quiet' | 'verbose'>): LogLevel {
  if (options.quiet && options.verbose) {
    throw new ConfigError('--quiet cannot be combined with --verbose');
  }
  if (options.quiet) return 'quiet';
  if (options.verbose) return 'verbose';
  return 'normal';
}

export function exitCodeFor(summary: RunSummary): number {
  return summary.exitStatus === 'success' ? EXIT_SUCCESS : EXIT_VIOLATIONS;
}

function printBanner(logger: Logger, paths: string[], config: Readonly<CheckConfig>): void {
  logger.info(chalk.bold.cyan(`docgate v${VERSION}`));
  logger.info(chalk.gray('─'.repeat(50)));
  logger.info(`Paths: ${chalk.bold(paths.join(', '))}`);
  logger.info(`Docstring line limit: ${config.maxLineLength}`);
  logger.info(`Style check: ${config.enableStyleCheck ? `ruff (line length ${config.styleLineLength})` : 'disabled'}`);
  if (config.rules.length > 0) {
    logger.info(`Extra rules: ${config.rules.join(', ')}`);
  }
  if (config.fix) {
    logger.info(chalk.yellow('Mode: fix'));
  }
  logger.info(chalk.gray('─'.repeat(50)));
}

/**
 * Run the checks and print the report. Resolves to the process exit code.
 */
export async function checkCommand(paths: string[], options: CheckOptions): Promise<number> {
  let logger: Logger;
  let config: Readonly<CheckConfig>;
  try {
    logger = createLogger(resolveLogLevel(options));
    config = await resolveConfig({ configPath: options.config, overrides: buildOverrides(options) });
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(chalk.red(`error: ${error.message}`));
      return EXIT_USAGE;
    }
    throw error;
  }

  const cwd = process.cwd();
  printBanner(logger, paths, config);

  const spinner = ora({ text: 'Discovering files...', color: 'cyan', isSilent: logger.level !== 'normal' });
  spinner.start();

  const gate = new DocGate(config, { cwd });

  gate.on('start', ({ fileCount }) => {
    logger.debug(`found ${pluralize(fileCount, 'file')}`);
  });

  gate.on('file-start', ({ filePath, current, total }) => {
    spinner.text = `Checking ${current}/${total}: ${displayPath(filePath, cwd)}`;
    logger.debug(`checking ${displayPath(filePath, cwd)}`);
  });

  gate.on('file-complete', ({ result }) => {
    const status = result.checked ? pluralize(result.violations.length, 'violation') : 'not checked';
    logger.debug(`  ${status}`);
  });

  gate.on('internal-error', ({ filePath, error }) => {
    spinner.clear();
    logger.error(`internal error while checking ${displayPath(filePath, cwd)}: ${error.message}`);
    spinner.render();
  });

  gate.on('style-check-start', ({ checker, fileCount }) => {
    spinner.text = `Running ${checker} on ${pluralize(fileCount, 'file')}...`;
    logger.debug(`running ${checker}`);
  });

  gate.on('style-check-warning', ({ diagnostic }) => {
    logger.debug(`style check skipped: ${diagnostic.message}`);
  });

  let summary: RunSummary;
  try {
    summary = await gate.run(paths);
  } catch (error) {
    if (error instanceof InvocationError) {
      spinner.stop();
      console.error(chalk.red(`error: ${error.message}`));
      return EXIT_USAGE;
    }
    spinner.fail('Error during execution');
    throw error;
  }

  if (summary.exitStatus === 'success') {
    spinner.succeed(`Checked ${pluralize(summary.totalFiles, 'file')} in ${formatDuration(summary.durationMs)}`);
  } else {
    spinner.fail(`Found problems in ${pluralize(summary.results.filter((r) => r.violations.length > 0 || !r.checked).length, 'file')}`);
  }

  const formatter = createFormatter(options.format, { basePath: cwd });
  process.stdout.write(`${formatter.format(summary)}\n`);

  if (options.output) {
    await new JsonReportWriter({ basePath: cwd }).write(summary, options.output);
    logger.info(chalk.gray(`JSON report written to ${options.output}`));
  }

  return exitCodeFor(summary);
}
