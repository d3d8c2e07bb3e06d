// Token cursor for the recursive descent parsers

import { ParseError, type SourcePosition } from './errors.js';
import { EOF, positionOf, type Token } from './lexer.js';

export type TokenNames<T extends string> = Partial<Record<T | typeof EOF, string>>;

export abstract class TokenParser<T extends string> {
  protected tokens: Token<T>[];
  protected pos: number = 0;
  private names: TokenNames<T>;

  protected constructor(tokens: Token<T>[], names: TokenNames<T> = {}) {
    this.tokens = tokens;
    this.names = names;
  }

  protected current(): Token<T> {
    return this.tokens[this.pos];
  }

  protected peek(offset: number): Token<T> {
    const pos = Math.min(this.pos + offset, this.tokens.length - 1);
    return this.tokens[pos];
  }

  protected location(): SourcePosition {
    return positionOf(this.current());
  }

  protected isAtEnd(): boolean {
    return this.current().type === EOF;
  }

  protected check(type: T | typeof EOF): boolean {
    return this.current().type === type;
  }

  protected advance(): Token<T> {
    const token = this.current();
    if (!this.isAtEnd()) this.pos++;
    return token;
  }

  protected match(type: T): boolean {
    if (this.check(type)) {
      this.advance();
      return true;
    }
    return false;
  }

  protected expect(type: T | typeof EOF): Token<T> {
    if (this.check(type)) return this.advance();
    throw this.error([this.describe(type)]);
  }

  /** Display name of a token type for diagnostics, e.g. `';'` for SEMICOLON. */
  protected describe(type: T | typeof EOF): string {
    return this.names[type] ?? type;
  }

  protected error(expected: string[], detail?: string): ParseError {
    const token = this.current();
    return new ParseError(positionOf(token), expected, token.value, detail);
  }
}
