// Integer and string literal decoding shared by both dialects

import { LexError, type SourcePosition } from './errors.js';

const START: SourcePosition = { line: 1, column: 1, offset: 0 };

const DECIMAL = /^-?[0-9][0-9_]*$/;
const HEX = /^0x[0-9A-Fa-f][0-9A-Fa-f_]*$/;

export const I64_MIN = -(1n << 63n);
export const I64_MAX = (1n << 63n) - 1n;
export const U128_MAX = (1n << 128n) - 1n;

/**
 * Parse a decimal (`-?[0-9][0-9_]*`) or hex (`0x[0-9A-Fa-f][0-9A-Fa-f_]*`)
 * literal. Underscore separators are dropped.
 */
export function parseIntegerLiteral(text: string, position: SourcePosition = START): bigint {
  if (HEX.test(text)) {
    return BigInt('0x' + text.slice(2).replace(/_/g, ''));
  }
  if (DECIMAL.test(text)) {
    return BigInt(text.replace(/_/g, ''));
  }
  throw new LexError(`Invalid integer literal '${text}'`, position, text);
}

/** Throws unless `min <= value <= max`. */
export function checkRange(
  value: bigint,
  min: bigint,
  max: bigint,
  text: string,
  position: SourcePosition = START,
): bigint {
  if (value < min || value > max) {
    throw new LexError(`Integer literal '${text}' out of range`, position, text);
  }
  return value;
}

const SIMPLE_ESCAPES: Record<string, number> = {
  t: 0x09,
  n: 0x0a,
  f: 0x0c,
  b: 0x08,
  r: 0x0d,
  "'": 0x27,
  '"': 0x22,
  '\\': 0x5c,
};

const encoder = new TextEncoder();

function isHexDigit(char: string): boolean {
  return /^[0-9A-Fa-f]$/.test(char);
}

/**
 * Decode a double-quoted string literal (quotes included) to bytes.
 *
 * Escapes: `\t \n \f \b \r \' \" \\`, `\xH` / `\xHH`, and three-digit
 * octal `\NNN`. Other characters are encoded as UTF-8.
 */
export function unescapeString(raw: string, position: SourcePosition = START): Uint8Array {
  if (raw.length < 2 || !raw.startsWith('"') || !raw.endsWith('"')) {
    throw new LexError('Malformed string literal', position, raw);
  }
  const body = raw.slice(1, -1);
  const bytes: number[] = [];
  let run = '';

  const flush = (): void => {
    if (run.length > 0) {
      bytes.push(...encoder.encode(run));
      run = '';
    }
  };
  const fail = (message: string): LexError => new LexError(message, position, raw);

  let i = 0;
  while (i < body.length) {
    const char = body[i];
    if (char !== '\\') {
      run += char;
      i++;
      continue;
    }

    flush();
    if (i + 1 >= body.length) throw fail('Unterminated escape sequence');
    const next = body[i + 1];

    if (next in SIMPLE_ESCAPES) {
      bytes.push(SIMPLE_ESCAPES[next]);
      i += 2;
    } else if (next === 'x') {
      let digits = '';
      while (digits.length < 2 && i + 2 + digits.length < body.length &&
             isHexDigit(body[i + 2 + digits.length])) {
        digits += body[i + 2 + digits.length];
      }
      if (digits.length === 0) throw fail('Expected hex digits after \\x');
      bytes.push(Number.parseInt(digits, 16));
      i += 2 + digits.length;
    } else if (/^[0-9]$/.test(next)) {
      const digits = body.slice(i + 1, i + 4);
      if (!/^[0-7]{3}$/.test(digits)) throw fail(`Invalid octal escape '\\${digits}'`);
      const value = Number.parseInt(digits, 8);
      if (value > 0xff) throw fail(`Octal escape '\\${digits}' exceeds one byte`);
      bytes.push(value);
      i += 4;
    } else {
      throw fail(`Unknown escape '\\${next}'`);
    }
  }
  flush();

  return Uint8Array.from(bytes);
}
