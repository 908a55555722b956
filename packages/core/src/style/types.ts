/**
 * Style checker types
 */

import type { Violation } from '../types.js';

/**
 * An external checker run once per invocation over every discovered file.
 * Implementations throw `StyleCheckError` when the tool cannot produce a
 * result.
 */
export interface StyleChecker {
  name: string;
  check(files: string[]): Promise<Violation[]>;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface CommandOptions {
  timeoutMs: number;
  cwd?: string;
}

/**
 * Runs a command to completion. Rejects only when the process cannot be
 * started; non-zero exits and timeouts resolve.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options: CommandOptions
) => Promise<CommandResult>;
