/**
 * Text measurement utilities
 */

/**
 * Length in Unicode code points, so a multi-byte character counts once.
 */
export function codePointLength(text: string): number {
  return Array.from(text).length;
}

/**
 * Normalize line endings and drop a leading byte order mark.
 */
export function normalizeSource(source: string): string {
  const withoutBom = source.charCodeAt(0) === 0xfeff ? source.slice(1) : source;
  return withoutBom.replace(/\r\n?/g, '\n');
}

export function pluralize(count: number, singular: string, plural = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}
