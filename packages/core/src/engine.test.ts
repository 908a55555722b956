import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { mergeConfig } from './config/loader.js';
import { DocGate } from './engine.js';
import { InvocationError, StyleCheckError } from './errors.js';
import type { StyleChecker } from './style/types.js';
import type { CheckConfig, DocGateEventType, Violation } from './types.js';

class FakeStyleChecker implements StyleChecker {
  name = 'fake';
  calls: string[][] = [];

  constructor(private outcome: Violation[] | StyleCheckError) {}

  async check(files: string[]): Promise<Violation[]> {
    this.calls.push(files);
    if (this.outcome instanceof StyleCheckError) {
      throw this.outcome;
    }
    return this.outcome;
  }
}

const TOO_LONG = ['def f():', '    """Summary.', '', '    ' + 'x'.repeat(69), '    """', ''].join('\n');
const CLEAN = ['def f():', '    """Summary."""', '    return 1', ''].join('\n');

describe('DocGate', () => {
  let dir: string;

  function config(overrides: Partial<CheckConfig> = {}): Readonly<CheckConfig> {
    return mergeConfig({ enableStyleCheck: false }, overrides);
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'docgate-engine-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should flag a docstring line one character over the limit', async () => {
    await writeFile(join(dir, 'long.py'), TOO_LONG, 'utf-8');

    const summary = await new DocGate(config()).run([dir]);

    expect(summary.results).toEqual([
      {
        filePath: join(dir, 'long.py'),
        violations: [
          {
            filePath: join(dir, 'long.py'),
            line: 4,
            ruleId: 'docstring-line-length',
            message: 'Docstring line too long (73 > 72)',
            severity: 'error',
          },
        ],
        checked: true,
      },
    ]);
    expect(summary.totalViolations).toBe(1);
    expect(summary.exitStatus).toBe('failure');
  });

  it('should succeed for a file without docstrings', async () => {
    await writeFile(join(dir, 'plain.py'), 'x = 1\n', 'utf-8');

    const summary = await new DocGate(config()).run([dir]);

    expect(summary.totalFiles).toBe(1);
    expect(summary.totalViolations).toBe(0);
    expect(summary.exitStatus).toBe('success');
  });

  it('should report a parse error and mark the file unchecked', async () => {
    await writeFile(join(dir, 'broken.py'), 'def broken(:\n    pass\n', 'utf-8');

    const summary = await new DocGate(config()).run([dir]);
    const [result] = summary.results;

    expect(result.checked).toBe(false);
    expect(result.violations.map((v) => v.ruleId)).toEqual(['parse-error']);
    expect(summary.uncheckedFiles).toBe(1);
    expect(summary.exitStatus).toBe('failure');
  });

  it('should report invalid UTF-8 as an input error', async () => {
    await writeFile(join(dir, 'binary.py'), Buffer.from([0x78, 0x20, 0xff, 0xfe, 0x0a]));

    const summary = await new DocGate(config()).run([dir]);

    expect(summary.results[0].violations).toEqual([
      {
        filePath: join(dir, 'binary.py'),
        line: 1,
        ruleId: 'input-error',
        message: 'File is not valid UTF-8',
        severity: 'error',
      },
    ]);
    expect(summary.results[0].checked).toBe(false);
  });

  it('should keep going past a root that does not exist', async () => {
    await writeFile(join(dir, 'clean.py'), CLEAN, 'utf-8');

    const summary = await new DocGate(config()).run([join(dir, 'clean.py'), join(dir, 'gone')]);

    expect(summary.results.map((r) => [r.filePath, r.checked])).toEqual([
      [join(dir, 'clean.py'), true],
      [join(dir, 'gone'), false],
    ]);
    expect(summary.results[1].violations[0].message).toBe('Path does not exist');
    expect(summary.exitStatus).toBe('failure');
  });

  it('should throw when no files match', async () => {
    await writeFile(join(dir, 'notes.txt'), 'nothing here\n', 'utf-8');

    await expect(new DocGate(config()).run([dir])).rejects.toThrow(InvocationError);
  });

  it('should process files in sorted order', async () => {
    await writeFile(join(dir, 'b.py'), CLEAN, 'utf-8');
    await writeFile(join(dir, 'a.py'), CLEAN, 'utf-8');

    const summary = await new DocGate(config()).run([dir]);

    expect(summary.results.map((r) => r.filePath)).toEqual([join(dir, 'a.py'), join(dir, 'b.py')]);
  });

  describe('style check', () => {
    it('should merge style violations into the matching file', async () => {
      await writeFile(join(dir, 'long.py'), TOO_LONG, 'utf-8');
      const checker = new FakeStyleChecker([
        {
          filePath: join(dir, 'long.py'),
          line: 1,
          column: 5,
          ruleId: 'E225',
          message: 'Missing whitespace around operator',
          severity: 'error',
        },
      ]);

      const summary = await new DocGate(config({ enableStyleCheck: true }), { styleChecker: checker }).run([dir]);

      expect(checker.calls).toEqual([[join(dir, 'long.py')]]);
      expect(summary.results[0].violations.map((v) => [v.line, v.ruleId])).toEqual([
        [1, 'E225'],
        [4, 'docstring-line-length'],
      ]);
      expect(summary.totalViolations).toBe(2);
    });

    it('should not call the checker when the style check is disabled', async () => {
      await writeFile(join(dir, 'clean.py'), CLEAN, 'utf-8');
      const checker = new FakeStyleChecker([]);

      await new DocGate(config(), { styleChecker: checker }).run([dir]);

      expect(checker.calls).toEqual([]);
    });

    it('should turn a checker failure into a warning diagnostic', async () => {
      await writeFile(join(dir, 'clean.py'), CLEAN, 'utf-8');
      const checker = new FakeStyleChecker(new StyleCheckError('timeout', 'ruff timed out after 10ms'));
      const gate = new DocGate(config({ enableStyleCheck: true }), { styleChecker: checker });
      const warnings: string[] = [];
      gate.on('style-check-warning', ({ diagnostic }) => warnings.push(diagnostic.message));

      const summary = await gate.run([dir]);

      expect(summary.diagnostics).toEqual([
        { severity: 'warning', source: 'style-check', message: 'ruff timed out after 10ms' },
      ]);
      expect(warnings).toEqual(['ruff timed out after 10ms']);
      expect(summary.totalViolations).toBe(0);
      expect(summary.exitStatus).toBe('success');
    });
  });

  describe('events', () => {
    async function recordEvents(overrides: Partial<CheckConfig>): Promise<DocGateEventType[]> {
      await writeFile(join(dir, 'clean.py'), CLEAN, 'utf-8');
      const gate = new DocGate(config(overrides), { styleChecker: new FakeStyleChecker([]) });
      const events: DocGateEventType[] = [];
      gate.on('start', () => events.push('start'));
      gate.on('file-start', () => events.push('file-start'));
      gate.on('file-complete', () => events.push('file-complete'));
      gate.on('style-check-start', () => events.push('style-check-start'));
      gate.on('complete', () => events.push('complete'));

      await gate.run([dir]);
      return events;
    }

    it('should run the style pass after the docstring pass', async () => {
      expect(await recordEvents({ enableStyleCheck: true })).toEqual([
        'start',
        'file-start',
        'file-complete',
        'style-check-start',
        'complete',
      ]);
    });

    it('should run the style pass first when fixing', async () => {
      expect(await recordEvents({ enableStyleCheck: true, fix: true })).toEqual([
        'start',
        'style-check-start',
        'file-start',
        'file-complete',
        'complete',
      ]);
    });
  });

  describe('listeners', () => {
    it('should call every listener registered for an event in order', async () => {
      await writeFile(join(dir, 'clean.py'), CLEAN, 'utf-8');
      const gate = new DocGate(config());
      const calls: string[] = [];
      gate.on('start', ({ fileCount }) => calls.push(`first ${fileCount}`));
      gate.on('start', ({ fileCount }) => calls.push(`second ${fileCount}`));
      gate.on('complete', ({ summary }) => calls.push(`complete ${summary.totalFiles}`));

      await gate.run([dir]);

      expect(calls).toEqual(['first 1', 'second 1', 'complete 1']);
    });
  });

  describe('checkSource', () => {
    it('should check source text without touching the filesystem', async () => {
      const gate = new DocGate(config({ maxLineLength: 10 }));

      const result = await gate.checkSource('"""A module docstring."""\n', 'inline.py');

      expect(result).toEqual({
        filePath: 'inline.py',
        violations: [
          {
            filePath: 'inline.py',
            line: 1,
            ruleId: 'docstring-line-length',
            message: 'Docstring line too long (19 > 10)',
            severity: 'error',
          },
        ],
        checked: true,
      });
    });

    it('should report the line of a syntax error', async () => {
      const gate = new DocGate(config());

      const result = await gate.checkSource('x = 1\ndef broken(:\n    pass\n', 'inline.py');

      expect(result.checked).toBe(false);
      expect(result.violations.map((v) => [v.ruleId, v.line])).toEqual([['parse-error', 2]]);
    });
  });
});
