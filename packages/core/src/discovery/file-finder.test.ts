import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { DEFAULT_CONFIG } from '../types.js';

import { discoverFiles } from './file-finder.js';

describe('discoverFiles', () => {
  let root: string;
  const options = { include: DEFAULT_CONFIG.include, exclude: DEFAULT_CONFIG.exclude };

  async function touch(relativePath: string): Promise<void> {
    const file = join(root, relativePath);
    await mkdir(join(file, '..'), { recursive: true });
    await writeFile(file, '"""Doc."""\n', 'utf-8');
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'docgate-discovery-'));
    await touch('zeta.py');
    await touch('alpha.py');
    await touch('notes.txt');
    await touch('pkg/module.py');
    await touch('venv/lib/site.py');
    await touch('pkg/__pycache__/cached.py');
    await touch('.hidden/secret.py');
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should find Python files recursively in sorted order', async () => {
    const result = await discoverFiles([root], options);

    expect(result.files).toEqual([
      join(root, 'alpha.py'),
      join(root, 'pkg', 'module.py'),
      join(root, 'zeta.py'),
    ]);
    expect(result.unreadable).toEqual([]);
  });

  it('should resolve paths relative to cwd', async () => {
    const result = await discoverFiles(['pkg'], { ...options, cwd: root });

    expect(result.files).toEqual([join(root, 'pkg', 'module.py')]);
  });

  it('should accept an explicit file that matches the include patterns', async () => {
    const result = await discoverFiles([join(root, 'alpha.py')], options);

    expect(result.files).toEqual([join(root, 'alpha.py')]);
  });

  it('should drop an explicit file that does not match', async () => {
    const result = await discoverFiles([join(root, 'notes.txt')], options);

    expect(result.files).toEqual([]);
  });

  it('should match explicit files against patterns with a directory prefix', async () => {
    const prefixed = { include: ['pkg/**/*.py'], exclude: [], cwd: root };

    expect((await discoverFiles(['pkg/module.py'], prefixed)).files).toEqual([join(root, 'pkg', 'module.py')]);
    expect((await discoverFiles(['alpha.py'], prefixed)).files).toEqual([]);
  });

  it('should de-duplicate overlapping roots', async () => {
    const result = await discoverFiles([root, join(root, 'pkg'), join(root, 'alpha.py')], options);

    expect(result.files).toHaveLength(3);
  });

  it('should apply custom exclude patterns', async () => {
    const result = await discoverFiles([root], { ...options, exclude: ['pkg/**'] });

    expect(result.files).toContain(join(root, 'venv', 'lib', 'site.py'));
    expect(result.files).not.toContain(join(root, 'pkg', 'module.py'));
  });

  it('should report roots that do not exist', async () => {
    const result = await discoverFiles([join(root, 'missing')], options);

    expect(result.files).toEqual([]);
    expect(result.unreadable).toEqual([{ path: join(root, 'missing'), reason: 'Path does not exist' }]);
  });
});
