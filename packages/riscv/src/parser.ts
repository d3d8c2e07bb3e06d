/**
 * RISC-V Assembly Parser
 *
 * Parses tokens into labels, directives and instructions with their raw
 * operands. No operand checking happens here: `addi a0, "x"` parses fine and
 * is rejected by whichever stage selects instructions.
 */

import {
  TokenParser,
  EOF,
  LexError,
  I64_MIN,
  I64_MAX,
  checkRange,
  parseIntegerLiteral,
  positionOf,
  unescapeString,
} from '@polyparse/core';
import type { SourcePosition } from '@polyparse/core';
import { tokenize, registerIndex, TokenType, TOKEN_NAMES, type AsmToken } from './lexer.js';

export enum NodeType {
  LABEL = 'LABEL',
  DIRECTIVE = 'DIRECTIVE',
  INSTRUCTION = 'INSTRUCTION',
}

export enum ArgumentType {
  REGISTER = 'REGISTER',
  REG_OFFSET = 'REG_OFFSET',
  STRING_LITERAL = 'STRING_LITERAL',
  SYMBOL = 'SYMBOL',
  CONSTANT = 'CONSTANT',
  DIFFERENCE = 'DIFFERENCE',
}

export enum ConstantType {
  NUMBER = 'NUMBER',
  HI_DATA_REF = 'HI_DATA_REF',
  LO_DATA_REF = 'LO_DATA_REF',
}

export type Constant =
  | { type: ConstantType.NUMBER; value: bigint }
  | { type: ConstantType.HI_DATA_REF; symbol: string }
  | { type: ConstantType.LO_DATA_REF; symbol: string };

export interface RegisterArgument {
  type: ArgumentType.REGISTER;
  register: number;
}

// `offset(register)`, e.g. `-8(sp)` or `%lo(msg)(a0)`
export interface RegOffsetArgument {
  type: ArgumentType.REG_OFFSET;
  register: number;
  offset: Constant;
}

export interface StringLiteralArgument {
  type: ArgumentType.STRING_LITERAL;
  bytes: Uint8Array;
}

export interface SymbolArgument {
  type: ArgumentType.SYMBOL;
  name: string;
}

export interface ConstantArgument {
  type: ArgumentType.CONSTANT;
  constant: Constant;
}

// `end - start`
export interface DifferenceArgument {
  type: ArgumentType.DIFFERENCE;
  left: string;
  right: string;
}

export type Argument =
  | RegisterArgument
  | RegOffsetArgument
  | StringLiteralArgument
  | SymbolArgument
  | ConstantArgument
  | DifferenceArgument;

export interface LabelNode {
  type: NodeType.LABEL;
  name: string;
  loc: SourcePosition;
}

export interface DirectiveNode {
  type: NodeType.DIRECTIVE;
  name: string;
  args: Argument[];
  loc: SourcePosition;
}

export interface InstructionNode {
  type: NodeType.INSTRUCTION;
  name: string;
  args: Argument[];
  loc: SourcePosition;
}

export type Statement = LabelNode | DirectiveNode | InstructionNode;

export class Parser extends TokenParser<TokenType> {
  constructor(source: string) {
    super(tokenize(source), TOKEN_NAMES);
  }

  /**
   * Parse a whole file. Each line holds any number of labels followed by at
   * most one directive or instruction.
   */
  parse(): Statement[] {
    const statements: Statement[] = [];

    while (!this.isAtEnd()) {
      if (this.match(TokenType.NEWLINE)) continue;

      while (this.isLabelStart()) {
        statements.push(this.parseLabel());
      }
      if (!this.checkEndOfLine()) {
        statements.push(this.parseDirectiveOrInstruction());
      }
      if (!this.isAtEnd() && !this.match(TokenType.NEWLINE)) {
        throw this.error(["','", 'end of line']);
      }
    }

    return statements;
  }

  /** Parse at most one statement; blank or comment-only input gives undefined. */
  parseStatement(): Statement | undefined {
    this.skipNewlines();
    if (this.isAtEnd()) return undefined;

    const statement = this.isLabelStart() ? this.parseLabel() : this.parseDirectiveOrInstruction();
    this.skipNewlines();
    this.expect(EOF);
    return statement;
  }

  private parseLabel(): LabelNode {
    const token = this.advance();
    this.expect(TokenType.COLON);
    return { type: NodeType.LABEL, name: token.value, loc: positionOf(token) };
  }

  private parseDirectiveOrInstruction(): DirectiveNode | InstructionNode {
    const token = this.current();

    if (token.type === TokenType.DOT_SYMBOL) {
      this.advance();
      return {
        type: NodeType.DIRECTIVE,
        name: token.value,
        args: this.parseArguments(),
        loc: positionOf(token),
      };
    }

    if (token.type === TokenType.SYMBOL) {
      this.advance();
      return {
        type: NodeType.INSTRUCTION,
        name: token.value,
        args: this.parseArguments(),
        loc: positionOf(token),
      };
    }

    throw this.error(['label', 'directive', 'instruction']);
  }

  private parseArguments(): Argument[] {
    const args: Argument[] = [];
    if (this.checkEndOfLine()) return args;

    do {
      args.push(this.parseArgument());
    } while (this.match(TokenType.COMMA));

    return args;
  }

  private parseArgument(): Argument {
    const token = this.current();

    switch (token.type) {
      case TokenType.REGISTER:
        return { type: ArgumentType.REGISTER, register: this.parseRegister() };

      case TokenType.STRING:
        this.advance();
        return {
          type: ArgumentType.STRING_LITERAL,
          bytes: unescapeString(token.value, positionOf(token)),
        };

      case TokenType.SYMBOL:
      case TokenType.DOT_SYMBOL: {
        this.advance();
        if (this.match(TokenType.MINUS)) {
          const right = this.expectSymbol();
          return { type: ArgumentType.DIFFERENCE, left: token.value, right };
        }
        return { type: ArgumentType.SYMBOL, name: token.value };
      }

      case TokenType.NUMBER:
      case TokenType.HI:
      case TokenType.LO: {
        const constant = this.parseConstant();
        if (this.match(TokenType.LPAREN)) {
          const register = this.parseRegister();
          this.expect(TokenType.RPAREN);
          return { type: ArgumentType.REG_OFFSET, register, offset: constant };
        }
        return { type: ArgumentType.CONSTANT, constant };
      }

      default:
        throw this.error(['register', 'number', 'string literal', 'symbol', "'%hi('", "'%lo('"]);
    }
  }

  private parseRegister(): number {
    const token = this.expect(TokenType.REGISTER);
    const index = registerIndex(token.value);
    if (index === undefined) {
      throw new LexError(`Unknown register '${token.value}'`, positionOf(token), token.value);
    }
    return index;
  }

  private parseConstant(): Constant {
    const token = this.advance();

    if (token.type === TokenType.HI || token.type === TokenType.LO) {
      const symbol = this.expectSymbol();
      this.expect(TokenType.RPAREN);
      return token.type === TokenType.HI
        ? { type: ConstantType.HI_DATA_REF, symbol }
        : { type: ConstantType.LO_DATA_REF, symbol };
    }

    return { type: ConstantType.NUMBER, value: parseNumber(token) };
  }

  private expectSymbol(): string {
    if (this.check(TokenType.SYMBOL) || this.check(TokenType.DOT_SYMBOL)) {
      return this.advance().value;
    }
    throw this.error(['symbol']);
  }

  private isLabelStart(): boolean {
    return (
      (this.check(TokenType.SYMBOL) || this.check(TokenType.DOT_SYMBOL)) &&
      this.peek(1).type === TokenType.COLON
    );
  }

  private checkEndOfLine(): boolean {
    return this.check(TokenType.NEWLINE) || this.isAtEnd();
  }

  private skipNewlines(): void {
    while (this.check(TokenType.NEWLINE)) {
      this.advance();
    }
  }
}

/** Value of a NUMBER token, checked against the signed 64-bit range. */
function parseNumber(token: AsmToken): bigint {
  const position = positionOf(token);
  const value = parseIntegerLiteral(token.value, position);
  return checkRange(value, I64_MIN, I64_MAX, token.value, position);
}

/** Parse a whole assembly file. */
export function parseAssembly(source: string): Statement[] {
  return new Parser(source).parse();
}

/** Parse one optional statement, e.g. a single source line. */
export function parseAssemblyStatement(source: string): Statement | undefined {
  return new Parser(source).parseStatement();
}
