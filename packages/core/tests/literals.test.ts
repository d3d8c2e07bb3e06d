import { describe, it, expect } from 'vitest';
import {
  parseIntegerLiteral,
  checkRange,
  unescapeString,
  LexError,
  ParseError,
  I64_MAX,
} from '../src/index.js';

describe('parseIntegerLiteral', () => {
  it('should parse decimal literals with separators', () => {
    expect(parseIntegerLiteral('1_0')).toBe(10n);
    expect(parseIntegerLiteral('-5')).toBe(-5n);
  });

  it('should parse hex literals with separators', () => {
    expect(parseIntegerLiteral('0x1_0')).toBe(16n);
    expect(parseIntegerLiteral('0xFF')).toBe(255n);
  });

  it('should reject a hex prefix without hex digits', () => {
    expect(() => parseIntegerLiteral('0xg')).toThrow(LexError);
    expect(() => parseIntegerLiteral('0x')).toThrow(LexError);
  });

  it('should reject a leading separator', () => {
    expect(() => parseIntegerLiteral('_1')).toThrow(LexError);
  });

  it('should range-check values', () => {
    expect(checkRange(I64_MAX, -I64_MAX - 1n, I64_MAX, 'max')).toBe(I64_MAX);
    expect(() => checkRange(I64_MAX + 1n, -I64_MAX - 1n, I64_MAX, 'max+1')).toThrow(
      "Integer literal 'max+1' out of range",
    );
  });
});

describe('unescapeString', () => {
  it('should decode plain text as UTF-8', () => {
    expect(Array.from(unescapeString('"hé"'))).toEqual([0x68, 0xc3, 0xa9]);
  });

  it('should decode simple escapes', () => {
    expect(Array.from(unescapeString('"a\\tb\\n\\\\\\""'))).toEqual([97, 9, 98, 10, 92, 34]);
  });

  it('should decode hex and octal escapes', () => {
    expect(Array.from(unescapeString('"\\x41\\101"'))).toEqual([65, 65]);
    expect(Array.from(unescapeString('"\\x4g"'))).toEqual([4, 103]);
  });

  it('should reject unknown and malformed escapes', () => {
    expect(() => unescapeString('"\\q"')).toThrow(LexError);
    expect(() => unescapeString('"\\8"')).toThrow(LexError);
    expect(() => unescapeString('"\\x"')).toThrow(LexError);
    expect(() => unescapeString('"\\777"')).toThrow('exceeds one byte');
  });
});

describe('ParseError', () => {
  it('should describe the expected and found lexemes', () => {
    const error = new ParseError({ line: 1, column: 5, offset: 4 }, ["';'"], ')');
    expect(error.reason).toBe("Expected ';', found ')'");
    expect(error.message).toBe("Expected ';', found ')' at line 1, column 5");
  });

  it('should report end of input', () => {
    const error = new ParseError({ line: 2, column: 1, offset: 9 }, ['identifier', "'('"], '');
    expect(error.reason).toBe("Expected one of identifier, '(', found end of input");
  });
});
