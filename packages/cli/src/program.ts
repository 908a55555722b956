/**
 * Command line definition
 */

import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';

import { EXTRA_RULE_IDS, REPORT_FORMATS } from '@docgate/core';
import type { ExtraRuleId } from '@docgate/core';

import { checkCommand } from './commands/check.js';
import type { CheckOptions } from './commands/check.js';
import { EXIT_SUCCESS, EXIT_USAGE } from './exit-codes.js';
import { VERSION } from './version.js';

export type CheckAction = (paths: string[], options: CheckOptions) => Promise<void>;

function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function collectRule(value: string, previous: ExtraRuleId[]): ExtraRuleId[] {
  const rule = EXTRA_RULE_IDS.find((id) => id === value);
  if (!rule) {
    throw new InvalidArgumentError(`Allowed choices are ${EXTRA_RULE_IDS.join(', ')}.`);
  }
  return previous.concat([rule]);
}

export function createProgram(action: CheckAction): Command {
  const program = new Command();

  program
    .name('docgate')
    .description('Quality gate for Python sources: docstring line length plus Ruff style checks')
    .version(VERSION, '--version', 'Print the version and exit')
    .argument('[paths...]', 'Files or directories to check', ['.'])
    .option('--max-line-length <n>', 'Maximum docstring line length', parsePositiveInteger)
    .option('--no-style-check', 'Skip the Ruff style pass')
    .option('--config <path>', 'YAML or JSON config file')
    .option('-q, --quiet', 'Only print the report and errors')
    .option('-v, --verbose', 'Log every file as it is checked')
    .option('--require-docstrings', 'Report modules, classes and functions without a docstring')
    .option('--skip-private', 'Skip scopes whose name starts with an underscore')
    .option('--rule <id>', 'Enable an extra docstring rule (repeatable)', collectRule, [])
    .option('--fix', 'Let Ruff apply fixes before reporting')
    .option('--style-timeout <ms>', 'Timeout for the Ruff run in milliseconds', parsePositiveInteger)
    .addOption(new Option('--format <format>', 'Report format').choices(REPORT_FORMATS).default('text'))
    .option('-o, --output <file>', 'Also write a JSON report to this file')
    .exitOverride()
    .action(action);

  return program;
}

/**
 * Parse `argv` and run the check. Resolves to the process exit code.
 */
export async function main(argv: string[] = process.argv): Promise<number> {
  let exitCode: number = EXIT_SUCCESS;
  const program = createProgram(async (paths, options) => {
    exitCode = await checkCommand(paths, options);
  });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      // Help and version exit with 0, usage errors with 2
      return error.exitCode === 0 ? EXIT_SUCCESS : EXIT_USAGE;
    }
    throw error;
  }

  return exitCode;
}
