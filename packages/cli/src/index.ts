#!/usr/bin/env node
/**
 * DocGate CLI
 * Quality gate for Python sources: docstring line length plus Ruff style checks
 */

import chalk from 'chalk';

import { EXIT_INTERRUPTED, EXIT_USAGE } from './exit-codes.js';
import { main } from './program.js';

process.on('SIGINT', () => {
  process.stderr.write(chalk.red('\nerror: interrupted\n'));
  process.exit(EXIT_INTERRUPTED);
});

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(chalk.red(`error: ${error instanceof Error ? error.message : String(error)}`));
    process.exitCode = EXIT_USAGE;
  }
);
