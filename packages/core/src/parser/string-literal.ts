/**
 * Python string literal decoding
 *
 * Turns the source text of one string token (prefix, quotes and body)
 * into the value the interpreter would see.
 */

export interface StringLiteral {
  /** Lowercased prefix letters, e.g. "", "r", "rb", "f" */
  prefix: string;
  quote: string;
  isRaw: boolean;
  isBytes: boolean;
  isFormat: boolean;
  /** Decoded content (raw literals are returned untouched) */
  value: string;
}

const SIMPLE_ESCAPES: Record<string, string> = {
  '\\': '\\',
  "'": "'",
  '"': '"',
  a: '\x07',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  v: '\v',
};

const OCTAL_DIGIT = /[0-7]/;
const HEX_DIGITS = /^[0-9a-fA-F]+$/;

/**
 * Split a string token into prefix, quote and body. Returns null when the
 * text is not a complete string literal.
 */
export function parseStringLiteral(token: string): StringLiteral | null {
  const prefixMatch = /^[A-Za-z]*/.exec(token);
  const rawPrefix = prefixMatch ? prefixMatch[0] : '';
  const rest = token.slice(rawPrefix.length);

  let quote: string;
  if (rest.startsWith('"""') || rest.startsWith("'''")) {
    quote = rest.slice(0, 3);
  } else if (rest.startsWith('"') || rest.startsWith("'")) {
    quote = rest[0];
  } else {
    return null;
  }

  if (rest.length < quote.length * 2 || !rest.endsWith(quote)) {
    return null;
  }

  const prefix = rawPrefix.toLowerCase();
  const isRaw = prefix.includes('r');
  const body = rest.slice(quote.length, rest.length - quote.length);

  return {
    prefix,
    quote,
    isRaw,
    isBytes: prefix.includes('b'),
    isFormat: prefix.includes('f'),
    value: isRaw ? body : decodeEscapes(body),
  };
}

/**
 * Decode backslash escapes of a non-raw str literal body.
 * A backslash before a newline joins the two lines.
 */
export function decodeEscapes(body: string): string {
  let out = '';
  let i = 0;

  while (i < body.length) {
    const char = body[i];
    if (char !== '\\' || i + 1 >= body.length) {
      out += char;
      i++;
      continue;
    }

    const next = body[i + 1];

    if (next === '\n') {
      i += 2;
      continue;
    }

    const simple = SIMPLE_ESCAPES[next];
    if (simple !== undefined) {
      out += simple;
      i += 2;
      continue;
    }

    if (OCTAL_DIGIT.test(next)) {
      let digits = next;
      while (digits.length < 3 && OCTAL_DIGIT.test(body[i + 1 + digits.length] ?? '')) {
        digits += body[i + 1 + digits.length];
      }
      out += String.fromCodePoint(parseInt(digits, 8));
      i += 1 + digits.length;
      continue;
    }

    const hexLength = next === 'x' ? 2 : next === 'u' ? 4 : next === 'U' ? 8 : 0;
    if (hexLength > 0) {
      const digits = body.slice(i + 2, i + 2 + hexLength);
      const codePoint = parseInt(digits, 16);
      if (digits.length === hexLength && HEX_DIGITS.test(digits) && codePoint <= 0x10ffff) {
        out += String.fromCodePoint(codePoint);
        i += 2 + hexLength;
        continue;
      }
    }

    if (next === 'N' && body[i + 2] === '{') {
      const close = body.indexOf('}', i + 3);
      if (close !== -1) {
        // Placeholder for the named character, one code point wide
        out += '\uFFFD';
        i = close + 1;
        continue;
      }
    }

    out += char + next;
    i += 2;
  }

  return out;
}
