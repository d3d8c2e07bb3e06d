import { describe, it, expect } from 'vitest';
import { defineTable, literal, pattern, tokenize, ParseError, TokenParser } from '../src/index.js';

type ListToken = 'LBRACKET' | 'RBRACKET' | 'COMMA' | 'NUM';

const table = defineTable<ListToken>(['\\s+'], [
  literal('LBRACKET', '['),
  literal('RBRACKET', ']'),
  literal('COMMA', ','),
  pattern('NUM', '[0-9]+'),
]);

// [1, 2, 3]
class ListParser extends TokenParser<ListToken> {
  constructor(source: string) {
    super(tokenize(source, table), { LBRACKET: "'['", RBRACKET: "']'", COMMA: "','", NUM: 'number', EOF: 'end of input' });
  }

  parse(): number[] {
    this.expect('LBRACKET');
    const items: number[] = [];
    if (!this.check('RBRACKET')) {
      do {
        if (!this.check('NUM')) throw this.error(['number']);
        items.push(Number(this.advance().value));
      } while (this.match('COMMA'));
    }
    if (!this.match('RBRACKET')) throw this.error(["','", "']'"]);
    this.expect('EOF');
    return items;
  }
}

function parseError(source: string): ParseError {
  try {
    new ListParser(source).parse();
  } catch (e) {
    if (e instanceof ParseError) return e;
    throw e;
  }
  throw new Error(`expected '${source}' to fail`);
}

describe('TokenParser', () => {
  it('should parse a list', () => {
    expect(new ListParser('[1, 22, 3]').parse()).toEqual([1, 22, 3]);
    expect(new ListParser('[]').parse()).toEqual([]);
  });

  it('should name the expected token with its display name', () => {
    const err = parseError('1]');
    expect(err.reason).toBe("Expected '[', found '1'");
    expect(err.position).toEqual({ line: 1, column: 1, offset: 0 });
    expect(err.message).toBe("Expected '[', found '1' at line 1, column 1");
  });

  it('should list every alternative', () => {
    const err = parseError('[1 2]');
    expect(err.reason).toBe("Expected one of ',', ']', found '2'");
    expect(err.expected).toEqual(["','", "']'"]);
    expect(err.found).toBe('2');
    expect(err.position.column).toBe(4);
  });

  it('should report end of input', () => {
    const err = parseError('[1,');
    expect(err.reason).toBe('Expected number, found end of input');
    expect(err.found).toBe('');
  });

  it('should reject trailing tokens', () => {
    expect(parseError('[1] [').reason).toBe("Expected end of input, found '['");
  });
});
