// Table-driven lexer shared by the assembly and PIL/ASM dialects.
//
// Each dialect supplies an ordered list of token rules. At every position the
// skip patterns (whitespace, comments) are consumed first, then all rules are
// tried: the longest match wins and equal lengths go to the earlier rule.

import { LexError, type SourcePosition } from './errors.js';

export const EOF = 'EOF';

export interface Token<T extends string> {
  type: T | typeof EOF;
  value: string;
  line: number;
  column: number;
  offset: number;
}

export interface TokenRule<T extends string> {
  type: T;
  pattern: RegExp;
}

export interface LexerTable<T extends string> {
  skip: RegExp[];
  rules: TokenRule<T>[];
}

function sticky(source: string): RegExp {
  return new RegExp(source, 'y');
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** A rule matching exactly `text`. */
export function literal<T extends string>(type: T, text: string): TokenRule<T> {
  return { type, pattern: sticky(escapeRegExp(text)) };
}

/** A rule matching the regular expression `source`. */
export function pattern<T extends string>(type: T, source: string): TokenRule<T> {
  return { type, pattern: sticky(source) };
}

export function defineTable<T extends string>(
  skip: string[],
  rules: TokenRule<T>[],
): LexerTable<T> {
  return { skip: skip.map(sticky), rules };
}

export function positionOf(token: Token<string>): SourcePosition {
  return { line: token.line, column: token.column, offset: token.offset };
}

function matchLength(re: RegExp, source: string, offset: number): number {
  re.lastIndex = offset;
  const m = re.exec(source);
  return m ? m[0].length : 0;
}

export class Lexer<T extends string> {
  private source: string;
  private table: LexerTable<T>;
  private pos: number = 0;
  private line: number = 1;
  private column: number = 1;

  constructor(source: string, table: LexerTable<T>) {
    this.source = source;
    this.table = table;
  }

  tokenize(): Token<T>[] {
    const tokens: Token<T>[] = [];
    this.pos = 0;
    this.line = 1;
    this.column = 1;

    while (true) {
      this.skipTrivia();
      if (this.pos >= this.source.length) break;
      tokens.push(this.nextToken());
    }

    tokens.push({ type: EOF, value: '', ...this.position() });
    return tokens;
  }

  private skipTrivia(): void {
    let skipped = true;
    while (skipped && this.pos < this.source.length) {
      skipped = false;
      for (const re of this.table.skip) {
        const length = matchLength(re, this.source, this.pos);
        if (length > 0) {
          this.advance(length);
          skipped = true;
        }
      }
    }
  }

  private nextToken(): Token<T> {
    let best: TokenRule<T> | undefined;
    let bestLength = 0;

    for (const rule of this.table.rules) {
      const length = matchLength(rule.pattern, this.source, this.pos);
      // Strictly greater: an earlier rule keeps a tie.
      if (length > bestLength) {
        best = rule;
        bestLength = length;
      }
    }

    if (!best) {
      const rest = this.source.slice(this.pos);
      const snippet = rest.split(/[\r\n]/, 1)[0].slice(0, 20);
      throw new LexError(`Unexpected character '${rest[0]}'`, this.position(), snippet);
    }

    const token: Token<T> = {
      type: best.type,
      value: this.source.slice(this.pos, this.pos + bestLength),
      ...this.position(),
    };
    this.advance(bestLength);
    return token;
  }

  private position(): SourcePosition {
    return { line: this.line, column: this.column, offset: this.pos };
  }

  private advance(count: number): void {
    for (let i = 0; i < count; i++) {
      if (this.source[this.pos] === '\n') {
        this.line++;
        this.column = 1;
      } else {
        this.column++;
      }
      this.pos++;
    }
  }
}

export function tokenize<T extends string>(source: string, table: LexerTable<T>): Token<T>[] {
  return new Lexer(source, table).tokenize();
}
