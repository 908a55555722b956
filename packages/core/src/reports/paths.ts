import { isAbsolute, relative } from 'path';

/**
 * Path as shown in reports: relative to `basePath` when the file lives
 * below it, unchanged otherwise.
 */
export function displayPath(filePath: string, basePath: string): string {
  if (!isAbsolute(filePath)) {
    return filePath;
  }
  const rel = relative(basePath, filePath);
  if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
    return filePath;
  }
  return rel;
}
