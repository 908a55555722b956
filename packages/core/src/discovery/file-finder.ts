/**
 * File discovery - resolve root paths to a sorted list of source files
 */

import { stat } from 'fs/promises';
import { isAbsolute, relative, resolve, sep } from 'path';

import { glob } from 'glob';
import { minimatch } from 'minimatch';

export interface DiscoveryOptions {
  include: string[];
  exclude: string[];
  /** Base for relative root paths (defaults to process.cwd()) */
  cwd?: string;
}

export interface UnreadablePath {
  path: string;
  reason: string;
}

export interface DiscoveryResult {
  /** Absolute paths, de-duplicated and sorted */
  files: string[];
  /** Root paths that could not be accessed */
  unreadable: UnreadablePath[];
}

/**
 * Walk directories for files matching `include` and not `exclude`.
 * Hidden files and directories are skipped during the walk. A root that
 * names a file directly is kept when its path, or a trailing part of it,
 * matches an include pattern. Inside `cwd` that path is relative to `cwd`.
 */
export async function discoverFiles(
  paths: string[],
  options: DiscoveryOptions
): Promise<DiscoveryResult> {
  const cwd = options.cwd ?? process.cwd();
  const found = new Set<string>();
  const unreadable: UnreadablePath[] = [];

  for (const path of paths) {
    const target = resolve(cwd, path);

    let isDirectory: boolean;
    try {
      isDirectory = (await stat(target)).isDirectory();
    } catch (error) {
      unreadable.push({ path: target, reason: describeStatError(error) });
      continue;
    }

    if (isDirectory) {
      const matches = await glob(options.include, {
        cwd: target,
        absolute: true,
        nodir: true,
        dot: false,
        ignore: options.exclude,
      });
      for (const match of matches) {
        found.add(resolve(match));
      }
    } else if (matchesInclude(target, cwd, options.include)) {
      found.add(target);
    }
  }

  return {
    files: [...found].sort(),
    unreadable: unreadable.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0)),
  };
}

function describeStatError(error: unknown): string {
  if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
    return 'Path does not exist';
  }
  return `Cannot access path: ${error instanceof Error ? error.message : String(error)}`;
}

function matchesInclude(file: string, cwd: string, include: string[]): boolean {
  const fromCwd = relative(cwd, file);
  const shown = fromCwd.startsWith('..') || isAbsolute(fromCwd) ? file : fromCwd;
  const segments = shown.split(sep).filter((segment) => segment.length > 0);

  for (let start = 0; start < segments.length; start++) {
    const candidate = segments.slice(start).join('/');
    if (include.some((pattern) => minimatch(candidate, pattern, { dot: true }))) {
      return true;
    }
  }
  return false;
}
