import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { ConfigError } from '../errors.js';
import { DEFAULT_CONFIG } from '../types.js';

import { mergeConfig, parseConfigFile, resolveConfig } from './loader.js';

describe('parseConfigFile', () => {
  it('should map snake_case keys onto the config', () => {
    const config = parseConfigFile(
      ['max_line_length: 80', 'skip_missing_docstrings: false', 'exclude:', '  - "**/generated/**"'].join('\n'),
      'docgate.yml'
    );

    expect(config).toEqual({
      maxLineLength: 80,
      skipMissingDocstrings: false,
      exclude: ['**/generated/**'],
    });
  });

  it('should accept JSON', () => {
    expect(parseConfigFile('{"enable_style_check": false}', 'docgate.json')).toEqual({
      enableStyleCheck: false,
    });
  });

  it('should treat an empty file as no overrides', () => {
    expect(parseConfigFile('', 'docgate.yml')).toEqual({});
  });

  it('should reject unknown keys', () => {
    expect(() => parseConfigFile('max_line_lenght: 80', 'docgate.yml')).toThrow(ConfigError);
  });

  it('should reject invalid values with the key path', () => {
    expect(() => parseConfigFile('max_line_length: -1', 'docgate.yml')).toThrow(
      'docgate.yml: max_line_length: Number must be greater than 0'
    );
  });

  it('should map the Ruff rule selection', () => {
    expect(parseConfigFile('style_select: [E501, W]\nstyle_ignore: [D203]', 'docgate.yml')).toEqual({
      styleSelect: ['E501', 'W'],
      styleIgnore: ['D203'],
    });
  });

  it('should reject a rule selector that is not a code', () => {
    expect(() => parseConfigFile('style_select: ["--fix"]', 'docgate.yml')).toThrow(
      'docgate.yml: style_select.0: expected a rule code such as E501'
    );
  });

  it('should reject malformed YAML', () => {
    expect(() => parseConfigFile('include: [unclosed', 'docgate.yml')).toThrow(/invalid YAML/);
  });
});

describe('mergeConfig', () => {
  it('should return the defaults when nothing is overridden', () => {
    expect(mergeConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('should select line length and warning rules by default', () => {
    const config = mergeConfig();

    expect(config.styleSelect).toEqual(['E225', 'E226', 'E227', 'E228', 'E501', 'W', 'N', 'D']);
    expect(config.styleIgnore).toEqual(['D203', 'D212']);
  });

  it('should let later layers win', () => {
    const config = mergeConfig({ maxLineLength: 80, skipPrivate: true }, { maxLineLength: 100 });

    expect(config.maxLineLength).toBe(100);
    expect(config.skipPrivate).toBe(true);
  });

  it('should ignore undefined values', () => {
    expect(mergeConfig({ maxLineLength: 80 }, { maxLineLength: undefined }).maxLineLength).toBe(80);
  });

  it('should freeze the result', () => {
    expect(Object.isFrozen(mergeConfig())).toBe(true);
  });

  it('should reject a non-integer limit', () => {
    expect(() => mergeConfig({ maxLineLength: 72.5 })).toThrow(ConfigError);
  });

  it('should reject fix without the style check', () => {
    expect(() => mergeConfig({ fix: true, enableStyleCheck: false })).toThrow(
      'fix requires the style check to be enabled'
    );
  });
});

describe('resolveConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'docgate-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should layer defaults, file and overrides', async () => {
    const configPath = join(dir, 'docgate.yml');
    await writeFile(configPath, 'max_line_length: 80\nenable_style_check: false\n', 'utf-8');

    const config = await resolveConfig({ configPath, overrides: { maxLineLength: 88 } });

    expect(config.maxLineLength).toBe(88);
    expect(config.enableStyleCheck).toBe(false);
    expect(config.include).toEqual(['**/*.py']);
  });

  it('should fail on a missing config file', async () => {
    await expect(resolveConfig({ configPath: join(dir, 'missing.yml') })).rejects.toThrow(
      /cannot read config file/
    );
  });
});
