// Error types raised by the tokenizer and the parsers

export interface SourcePosition {
  /** 1-based line number. */
  line: number;
  /** 1-based column number. */
  column: number;
  /** 0-based character offset into the source text. */
  offset: number;
}

/**
 * No token rule matched at a position, or a matched literal could not be
 * converted to its value (integer overflow, invalid escape).
 */
export class LexError extends Error {
  constructor(
    public readonly reason: string,
    public readonly position: SourcePosition,
    public readonly snippet: string,
  ) {
    super(`${reason} at line ${position.line}, column ${position.column}`);
    this.name = 'LexError';
  }
}

/**
 * The token stream did not match any grammar alternative at the current
 * parse point. `found` is the offending lexeme, empty at end of input.
 */
export class ParseError extends Error {
  public readonly reason: string;

  constructor(
    public readonly position: SourcePosition,
    public readonly expected: string[],
    public readonly found: string,
    detail?: string,
  ) {
    const reason = detail ?? describeMismatch(expected, found);
    super(`${reason} at line ${position.line}, column ${position.column}`);
    this.reason = reason;
    this.name = 'ParseError';
  }
}

function describeMismatch(expected: string[], found: string): string {
  const got = found === '' ? 'end of input' : `'${found}'`;
  if (expected.length === 0) return `Unexpected ${got}`;
  if (expected.length === 1) return `Expected ${expected[0]}, found ${got}`;
  return `Expected one of ${expected.join(', ')}, found ${got}`;
}
