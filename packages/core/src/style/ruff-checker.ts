/**
 * Ruff Style Checker
 *
 * Runs `ruff check` once over every discovered file and maps its JSON
 * diagnostics onto violations.
 */

import { resolve } from 'path';

import { z } from 'zod';

import { StyleCheckError } from '../errors.js';
import type { Violation } from '../types.js';

import { execFileRunner } from './command-runner.js';
import type { CommandResult, CommandRunner, StyleChecker } from './types.js';

/**
 * One entry of `ruff check --output-format=json`. Only the fields the
 * mapping reads are declared; the rest pass through.
 */
const ruffLocationSchema = z.object({
  row: z.number().int(),
  column: z.number().int(),
});

const ruffDiagnosticSchema = z
  .object({
    code: z.string().nullable(),
    filename: z.string(),
    location: ruffLocationSchema,
    end_location: ruffLocationSchema.optional(),
    message: z.string(),
    url: z.string().nullable().optional(),
  })
  .passthrough();

const ruffOutputSchema = z.array(ruffDiagnosticSchema);

export type RuffDiagnostic = z.infer<typeof ruffDiagnosticSchema>;

export interface RuffCheckerConfig {
  /** Executable name or path */
  binary?: string;
  timeoutMs?: number;
  lineLength?: number;
  /** Passed as `--extend-select` */
  select?: string[];
  /** Passed as `--ignore` */
  ignore?: string[];
  fix?: boolean;
  cwd?: string;
  runner?: CommandRunner;
}

export class RuffStyleChecker implements StyleChecker {
  name = 'ruff';
  private config: Required<Omit<RuffCheckerConfig, 'cwd'>> & { cwd?: string };

  constructor(config: RuffCheckerConfig = {}) {
    this.config = {
      binary: config.binary ?? 'ruff',
      timeoutMs: config.timeoutMs ?? 30000,
      lineLength: config.lineLength ?? 79,
      select: config.select ?? [],
      ignore: config.ignore ?? [],
      fix: config.fix ?? false,
      cwd: config.cwd,
      runner: config.runner ?? execFileRunner,
    };
  }

  /**
   * Arguments passed to the binary for a given file list.
   */
  buildArgs(files: string[]): string[] {
    const args = ['check', '--output-format=json', `--line-length=${this.config.lineLength}`];
    if (this.config.select.length > 0) {
      args.push(`--extend-select=${this.config.select.join(',')}`);
    }
    if (this.config.ignore.length > 0) {
      args.push(`--ignore=${this.config.ignore.join(',')}`);
    }
    if (this.config.fix) {
      args.push('--fix');
    }
    return [...args, ...files];
  }

  async check(files: string[]): Promise<Violation[]> {
    if (files.length === 0) {
      return [];
    }

    let result: CommandResult;
    try {
      result = await this.config.runner(this.config.binary, this.buildArgs(files), {
        timeoutMs: this.config.timeoutMs,
        cwd: this.config.cwd,
      });
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new StyleCheckError('unavailable', `${this.config.binary} not found; style checks skipped`);
      }
      throw new StyleCheckError(
        'failed',
        `${this.config.binary} could not be run: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (result.timedOut) {
      throw new StyleCheckError(
        'timeout',
        `${this.config.binary} timed out after ${this.config.timeoutMs}ms; style checks skipped`
      );
    }

    // 0: clean, 1: diagnostics found, anything else: ruff itself failed
    if (result.exitCode > 1) {
      const detail = result.stderr.trim().split('\n')[0] ?? '';
      throw new StyleCheckError(
        'failed',
        `${this.config.binary} exited with code ${result.exitCode}${detail ? `: ${detail}` : ''}`
      );
    }

    return this.parseOutput(result.stdout);
  }

  /**
   * Parse and map JSON output. Relative file names resolve against `cwd`.
   */
  parseOutput(stdout: string): Violation[] {
    if (stdout.trim() === '') {
      return [];
    }

    let data: unknown;
    try {
      data = JSON.parse(stdout);
    } catch (error) {
      throw new StyleCheckError(
        'unparseable',
        `${this.config.binary} output is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const parsed = ruffOutputSchema.safeParse(data);
    if (!parsed.success) {
      throw new StyleCheckError(
        'unparseable',
        `${this.config.binary} output has an unexpected shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`
      );
    }

    const base = this.config.cwd ?? process.cwd();
    return parsed.data.map((diagnostic): Violation => ({
      filePath: resolve(base, diagnostic.filename),
      line: diagnostic.location.row,
      column: diagnostic.location.column,
      ruleId: diagnostic.code ?? 'syntax-error',
      message: diagnostic.message,
      severity: 'error',
    }));
  }
}
