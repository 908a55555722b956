import { describe, it, expect } from 'vitest';

import { decodeEscapes, parseStringLiteral } from './string-literal.js';

describe('parseStringLiteral', () => {
  it('should strip triple double quotes', () => {
    expect(parseStringLiteral('"""Summary line."""')?.value).toBe('Summary line.');
  });

  it('should strip triple single quotes', () => {
    expect(parseStringLiteral("'''Summary line.'''")?.value).toBe('Summary line.');
  });

  it('should handle single-quoted literals', () => {
    const literal = parseStringLiteral("'short'");
    expect(literal?.quote).toBe("'");
    expect(literal?.value).toBe('short');
  });

  it('should keep an empty body', () => {
    expect(parseStringLiteral('""""""')?.value).toBe('');
    expect(parseStringLiteral('""')?.value).toBe('');
  });

  it('should leave raw literals undecoded', () => {
    const literal = parseStringLiteral('r"""Match \\d+ digits\\n"""');
    expect(literal?.isRaw).toBe(true);
    expect(literal?.value).toBe('Match \\d+ digits\\n');
  });

  it('should lowercase and classify prefixes', () => {
    expect(parseStringLiteral('Rb"x"')).toMatchObject({ prefix: 'rb', isRaw: true, isBytes: true });
    expect(parseStringLiteral('F"x"')).toMatchObject({ prefix: 'f', isFormat: true });
    expect(parseStringLiteral('u"x"')).toMatchObject({ prefix: 'u', isRaw: false, isBytes: false });
  });

  it('should return null for text that is not a literal', () => {
    expect(parseStringLiteral('name')).toBeNull();
    expect(parseStringLiteral('"unterminated')).toBeNull();
  });
});

describe('decodeEscapes', () => {
  it('should decode simple escapes', () => {
    expect(decodeEscapes('a\\tb\\nc\\\\d\\\'e\\"f')).toBe('a\tb\nc\\d\'e"f');
  });

  it('should join lines on a backslash-newline', () => {
    expect(decodeEscapes('first half \\\nsecond half')).toBe('first half second half');
  });

  it('should decode octal and hex escapes', () => {
    expect(decodeEscapes('\\101\\x42\\u00e9\\U0001F600')).toBe('AB\u00e9\u{1F600}');
  });

  it('should decode a short octal escape', () => {
    expect(decodeEscapes('\\0x')).toBe('\0x');
  });

  it('should count a named escape as one character', () => {
    expect(decodeEscapes('caf\\N{LATIN SMALL LETTER E WITH ACUTE}')).toBe('caf\uFFFD');
  });

  it('should keep unknown escapes verbatim', () => {
    expect(decodeEscapes('\\d+\\w')).toBe('\\d+\\w');
  });

  it('should keep a malformed hex escape verbatim', () => {
    expect(decodeEscapes('\\xZZ')).toBe('\\xZZ');
  });
});
