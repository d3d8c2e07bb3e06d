// Expression parser shared by the PIL and ASM statement grammars
//
// Binary tiers, lowest to highest: | ^ & (<< >>) (+ -) (* / %) **. Every tier
// is left-associative, `**` included. Unary + and - apply to a single term and
// only appear as the left operand of `**`.

import {
  LexError,
  TokenParser,
  U128_MAX,
  checkRange,
  parseIntegerLiteral,
  positionOf,
  unescapeString,
} from '@polyparse/core';
import { FieldElement, GOLDILOCKS, type FieldSpec } from '../number/field-element.js';
import { TOKEN_NAMES, tokenize, type PilToken, type TokenType } from './lexer.js';
import type {
  BinaryOperator,
  Expression,
  MatchArm,
  PolynomialReference,
} from '../types/ast.js';

export interface ParseOptions {
  /** Field that number literals must fit in. Defaults to Goldilocks. */
  field?: FieldSpec;
  /** Maximum nesting of parenthesized and bracketed expressions. */
  maxDepth?: number;
}

export const DEFAULT_MAX_DEPTH = 512;

const decoder = new TextDecoder('utf-8', { fatal: true });

// Binary operator tokens and their precedence, lowest first; ** is handled apart
const BINARY_OPERATORS = new Map<string, [number, BinaryOperator]>([
  ['PIPE', [0, '|']],
  ['CARET', [1, '^']],
  ['AMPERSAND', [2, '&']],
  ['LT_LT', [3, '<<']],
  ['GT_GT', [3, '>>']],
  ['PLUS', [4, '+']],
  ['MINUS', [4, '-']],
  ['STAR', [5, '*']],
  ['SLASH', [5, '/']],
  ['PERCENT', [5, '%']],
]);

const TERM_START = [
  'identifier',
  'constant name',
  "':'",
  'number',
  'string literal',
  "'match'",
  "'('",
  "'${'",
];

export class ExpressionParser extends TokenParser<TokenType> {
  protected readonly field: FieldSpec;
  private readonly maxDepth: number;
  private depth: number = 0;

  constructor(source: string, options: ParseOptions = {}) {
    super(tokenize(source), TOKEN_NAMES);
    this.field = options.field ?? GOLDILOCKS;
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  /** Parse the whole input as one expression. */
  parseStandaloneExpression(): Expression {
    const expr = this.parseExpression();
    this.expect('EOF');
    return expr;
  }

  protected parseExpression(): Expression {
    return this.nested(() => this.parseBinary(0));
  }

  /** Run `parse` one nesting level deeper; expressions and macro bodies share the limit. */
  protected nested<R>(parse: () => R): R {
    if (this.depth >= this.maxDepth) {
      throw this.error([], `Nesting exceeds maximum depth of ${this.maxDepth}`);
    }
    this.depth++;
    try {
      return parse();
    } finally {
      this.depth--;
    }
  }

  // Precedence climbing; an operand of a tier is parsed at the next tier up,
  // which keeps every tier left-associative
  private parseBinary(minPrecedence: number): Expression {
    let left = this.parsePower();

    while (true) {
      const operator = BINARY_OPERATORS.get(this.current().type);
      if (operator === undefined || operator[0] < minPrecedence) return left;
      this.advance();
      const right = this.parseBinary(operator[0] + 1);
      left = { type: 'BinaryOperation', left, op: operator[1], right };
    }
  }

  private parsePower(): Expression {
    let left = this.parseUnary();
    while (this.match('STAR_STAR')) {
      const right = this.parseTerm();
      left = { type: 'BinaryOperation', left, op: '**', right };
    }
    return left;
  }

  private parseUnary(): Expression {
    if (this.match('MINUS')) {
      return { type: 'UnaryOperation', op: '-', operand: this.parseTerm() };
    }
    if (this.match('PLUS')) {
      return { type: 'UnaryOperation', op: '+', operand: this.parseTerm() };
    }
    return this.parseTerm();
  }

  protected parseTerm(): Expression {
    const token = this.current();

    switch (token.type) {
      case 'IDENTIFIER':
        if (this.peek(1).type === 'LPAREN') {
          this.advance();
          this.advance();
          const args = this.parseExpressionList('RPAREN');
          this.expect('RPAREN');
          return { type: 'FunctionCall', name: token.value, args };
        }
        return this.parsePolynomialReference();

      case 'CONSTANT_IDENTIFIER':
        this.advance();
        return { type: 'Constant', name: token.value };

      case 'COLON':
        this.advance();
        return { type: 'PublicReference', name: this.expect('IDENTIFIER').value };

      case 'NUMBER':
        this.advance();
        return { type: 'Number', value: this.fieldElement(token) };

      case 'STRING':
        this.advance();
        return { type: 'String', value: this.stringValue(token) };

      case 'MATCH':
        return this.parseMatch();

      case 'LPAREN':
        return this.parseParenthesized();

      case 'DOLLAR_BRACE': {
        this.advance();
        const expression = this.parseExpression();
        this.expect('RBRACE');
        return { type: 'FreeInput', expression };
      }

      default:
        throw this.error(TERM_START);
    }
  }

  protected parsePolynomialReference(): PolynomialReference {
    let name = this.expect('IDENTIFIER').value;
    let namespace: string | undefined;
    if (this.match('DOT')) {
      namespace = name;
      name = this.expect('IDENTIFIER').value;
    }

    let index: Expression | undefined;
    if (this.match('LBRACKET')) {
      index = this.parseExpression();
      this.expect('RBRACKET');
    }

    const next = this.match('QUOTE');
    const ref: PolynomialReference = { type: 'PolynomialReference', name, next };
    if (namespace !== undefined) ref.namespace = namespace;
    if (index !== undefined) ref.index = index;
    return ref;
  }

  // (e) is e itself; (e,) and (e0, e1, ...) are tuples
  private parseParenthesized(): Expression {
    this.expect('LPAREN');
    const first = this.parseExpression();

    if (!this.match('COMMA')) {
      this.expect('RPAREN');
      return first;
    }
    if (this.match('RPAREN')) {
      return { type: 'Tuple', items: [first] };
    }
    const rest = this.parseExpressionList('RPAREN');
    this.expect('RPAREN');
    return { type: 'Tuple', items: [first, ...rest] };
  }

  private parseMatch(): Expression {
    this.expect('MATCH');
    const scrutinee = this.parseExpression();
    this.expect('LBRACE');

    const arms: MatchArm[] = [];
    while (!this.check('RBRACE')) {
      arms.push(this.parseMatchArm());
      if (!this.match('COMMA')) break;
    }
    this.expect('RBRACE');

    return { type: 'MatchExpression', scrutinee, arms };
  }

  private parseMatchArm(): MatchArm {
    if (this.match('UNDERSCORE')) {
      this.expect('ARROW_FAT');
      return { value: this.parseExpression() };
    }
    const pattern = this.parseExpression();
    this.expect('ARROW_FAT');
    return { pattern, value: this.parseExpression() };
  }

  /** Comma-separated expressions, empty when the next token is `close`. */
  protected parseExpressionList(close: TokenType): Expression[] {
    const items: Expression[] = [];
    if (this.check(close)) return items;

    do {
      items.push(this.parseExpression());
    } while (this.match('COMMA'));

    return items;
  }

  protected fieldElement(token: PilToken): FieldElement {
    const position = positionOf(token);
    const value = checkRange(parseIntegerLiteral(token.value, position), 0n, U128_MAX, token.value, position);
    const element = FieldElement.tryFrom(value, this.field);
    if (element === undefined) {
      throw new LexError(
        `Integer literal '${token.value}' does not fit in the ${this.field.name} field`,
        position,
        token.value,
      );
    }
    return element;
  }

  protected stringValue(token: PilToken): string {
    const position = positionOf(token);
    const bytes = unescapeString(token.value, position);
    try {
      return decoder.decode(bytes);
    } catch (e) {
      if (!(e instanceof TypeError)) throw e;
      throw new LexError('String literal is not valid UTF-8', position, token.value);
    }
  }
}

/** Parse a single expression. */
export function parseExpression(source: string, options: ParseOptions = {}): Expression {
  return new ExpressionParser(source, options).parseStandaloneExpression();
}
