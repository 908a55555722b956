/**
 * Main DocGate orchestrator
 */

import { readFile } from 'fs/promises';
import { resolve } from 'path';

import { discoverFiles } from './discovery/file-finder.js';
import type { UnreadablePath } from './discovery/file-finder.js';
import { CandidateContractError, InvocationError, SourceParseError, StyleCheckError } from './errors.js';
import { extractDocstrings } from './extractor/extractor.js';
import { PythonParser } from './parser/python-parser.js';
import { RuffStyleChecker } from './style/ruff-checker.js';
import type { StyleChecker } from './style/types.js';
import type {
  CheckConfig,
  CheckResult,
  Diagnostic,
  DocGateEventMap,
  DocGateEventType,
  EventCallback,
  RunSummary,
  Violation,
} from './types.js';
import { sortViolations } from './utils/severity.js';
import { createExtraRule, DocstringValidator } from './validators/index.js';

export interface DocGateOptions {
  /** Replaces the default Ruff checker */
  styleChecker?: StyleChecker;
  /** Base for relative root paths */
  cwd?: string;
}

type ListenerMap = { [K in DocGateEventType]: EventCallback<K>[] };

export class DocGate {
  private config: Readonly<CheckConfig>;
  private validator: DocstringValidator;
  private styleChecker?: StyleChecker;
  private cwd: string;
  private eventListeners: ListenerMap = {
    start: [],
    'file-start': [],
    'file-complete': [],
    'internal-error': [],
    'style-check-start': [],
    'style-check-warning': [],
    complete: [],
  };

  constructor(config: Readonly<CheckConfig>, options: DocGateOptions = {}) {
    this.config = config;
    this.cwd = options.cwd ?? process.cwd();
    this.validator = new DocstringValidator({
      maxLineLength: config.maxLineLength,
      skipMissing: config.skipMissingDocstrings,
      skipPrivate: config.skipPrivate,
      rules: config.rules.map(createExtraRule),
    });

    if (config.enableStyleCheck) {
      this.styleChecker =
        options.styleChecker ??
        new RuffStyleChecker({
          timeoutMs: config.styleCheckTimeoutMs,
          lineLength: config.styleLineLength,
          select: config.styleSelect,
          ignore: config.styleIgnore,
          fix: config.fix,
          cwd: this.cwd,
        });
    }
  }

  /**
   * Register an event listener
   */
  on<K extends DocGateEventType>(event: K, callback: EventCallback<K>): void {
    const listeners: EventCallback<K>[] = this.eventListeners[event];
    listeners.push(callback);
  }

  /**
   * Emit an event
   */
  private emit<K extends DocGateEventType>(type: K, data: DocGateEventMap[K]): void {
    const listeners: EventCallback<K>[] = this.eventListeners[type];
    for (const listener of listeners) {
      listener(data);
    }
  }

  /**
   * Check every file under `paths` and return the aggregated summary.
   *
   * @throws InvocationError when the paths contain no matching files
   */
  async run(paths: string[]): Promise<RunSummary> {
    const startTime = Date.now();

    const discovery = await discoverFiles(paths, {
      include: this.config.include,
      exclude: this.config.exclude,
      cwd: this.cwd,
    });

    if (discovery.files.length === 0 && discovery.unreadable.length === 0) {
      throw new InvocationError(
        `No files matching ${this.config.include.join(', ')} found in ${paths.join(', ')}`
      );
    }

    const files = discovery.files;
    this.emit('start', { paths, fileCount: files.length });

    const diagnostics: Diagnostic[] = [];
    let styleViolations: Violation[] = [];

    // Fixes rewrite files, so they land before the docstring pass reads them
    if (this.config.fix) {
      styleViolations = await this.runStyleCheck(files, diagnostics);
    }

    const results: CheckResult[] = discovery.unreadable.map(unreadableResult);
    for (let i = 0; i < files.length; i++) {
      const filePath = files[i];
      this.emit('file-start', { filePath, current: i + 1, total: files.length });
      const result = await this.checkFile(filePath);
      results.push(result);
      this.emit('file-complete', { result, current: i + 1, total: files.length });
    }

    if (!this.config.fix) {
      styleViolations = await this.runStyleCheck(files, diagnostics);
    }

    const merged = mergeStyleViolations(results, styleViolations);
    const summary = summarize(merged, diagnostics, Date.now() - startTime);

    this.emit('complete', { summary });
    return summary;
  }

  /**
   * Read, decode and check one file. Never throws.
   */
  async checkFile(filePath: string): Promise<CheckResult> {
    let source: string;
    try {
      const bytes = await readFile(filePath);
      source = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    } catch (error) {
      const reason =
        error instanceof TypeError
          ? 'File is not valid UTF-8'
          : `Cannot read file: ${error instanceof Error ? error.message : String(error)}`;
      return {
        filePath,
        violations: [fileError(filePath, 'input-error', reason)],
        checked: false,
      };
    }

    return this.checkSource(source, filePath);
  }

  /**
   * Extract and validate already decoded source text. Never rejects.
   */
  async checkSource(source: string, filePath: string): Promise<CheckResult> {
    try {
      const parser = await PythonParser.load();
      const violations = this.validator.validate(extractDocstrings(source, parser), filePath);
      return { filePath, violations, checked: true };
    } catch (error) {
      if (error instanceof SourceParseError) {
        return {
          filePath,
          violations: [{ ...fileError(filePath, 'parse-error', error.message), line: error.line }],
          checked: false,
        };
      }

      const internal = error instanceof Error ? error : new Error(String(error));
      this.emit('internal-error', { filePath, error: internal });
      return {
        filePath,
        violations: [],
        checked: false,
        internalError:
          internal instanceof CandidateContractError ? internal.message : `Unexpected error: ${internal.message}`,
      };
    }
  }

  private async runStyleCheck(files: string[], diagnostics: Diagnostic[]): Promise<Violation[]> {
    if (!this.styleChecker || files.length === 0) {
      return [];
    }

    this.emit('style-check-start', { checker: this.styleChecker.name, fileCount: files.length });
    try {
      return await this.styleChecker.check(files);
    } catch (error) {
      if (!(error instanceof StyleCheckError)) {
        throw error;
      }
      const diagnostic: Diagnostic = { severity: 'warning', source: 'style-check', message: error.message };
      diagnostics.push(diagnostic);
      this.emit('style-check-warning', { diagnostic });
      return [];
    }
  }
}

function fileError(filePath: string, ruleId: 'input-error' | 'parse-error', message: string): Violation {
  return { filePath, line: 1, ruleId, message, severity: 'error' };
}

function unreadableResult(entry: UnreadablePath): CheckResult {
  return {
    filePath: entry.path,
    violations: [fileError(entry.path, 'input-error', entry.reason)],
    checked: false,
  };
}

/**
 * Attach style violations to the result of the same resolved path. A
 * violation for a path outside the results gets a result of its own.
 */
function mergeStyleViolations(results: CheckResult[], styleViolations: Violation[]): CheckResult[] {
  const byPath = new Map<string, CheckResult>();
  for (const result of results) {
    byPath.set(resolve(result.filePath), { ...result, violations: [...result.violations] });
  }

  for (const violation of styleViolations) {
    const key = resolve(violation.filePath);
    const existing = byPath.get(key);
    if (existing) {
      existing.violations.push({ ...violation, filePath: existing.filePath });
    } else {
      byPath.set(key, { filePath: key, violations: [{ ...violation, filePath: key }], checked: true });
    }
  }

  return [...byPath.values()]
    .map((result) => ({ ...result, violations: sortViolations(result.violations) }))
    .sort((a, b) => (a.filePath < b.filePath ? -1 : a.filePath > b.filePath ? 1 : 0));
}

function summarize(results: CheckResult[], diagnostics: Diagnostic[], durationMs: number): RunSummary {
  const totalViolations = results.reduce((sum, result) => sum + result.violations.length, 0);
  const uncheckedFiles = results.filter((result) => !result.checked).length;

  return {
    results,
    totalFiles: results.length,
    totalViolations,
    uncheckedFiles,
    exitStatus: totalViolations > 0 || uncheckedFiles > 0 ? 'failure' : 'success',
    diagnostics,
    durationMs,
  };
}
