// Recursive descent parser for PIL and ASM files

import { parseIntegerLiteral, positionOf } from '@polyparse/core';
import { ExpressionParser, type ParseOptions } from './expression-parser.js';
import type {
  ArrayExpression,
  AsmFile,
  AsmStatement,
  Expression,
  FunctionDefinition,
  InstructionBodyElement,
  InstructionParams,
  MacroDefinition,
  Param,
  PilFile,
  PilStatement,
  PolynomialName,
  RegisterFlag,
  SelectedExpressions,
  SourceLocation,
} from '../types/ast.js';

// What may follow the leading expression of an expression statement
const AFTER_EXPRESSION = ["'='", "'in'", "'is'", "'{'"];

export class Parser extends ExpressionParser {
  parsePil(): PilFile {
    const statements: PilStatement[] = [];
    while (!this.isAtEnd()) {
      statements.push(this.parsePilStatement());
      this.expect('SEMICOLON');
    }
    return { type: 'PilFile', statements };
  }

  parseAsm(): AsmFile {
    const statements: AsmStatement[] = [];
    while (!this.isAtEnd()) {
      statements.push(this.parseAsmStatement());
    }
    return { type: 'AsmFile', statements };
  }

  // ============================================================
  // PIL statements
  // ============================================================

  private parsePilStatement(): PilStatement {
    const loc = this.location();

    switch (this.current().type) {
      case 'INCLUDE': {
        this.advance();
        const path = this.expect('STRING');
        return { type: 'Include', path: this.stringValue(path), loc };
      }

      case 'NAMESPACE': {
        this.advance();
        const name = this.expect('IDENTIFIER').value;
        this.expect('LPAREN');
        const degree = this.parseExpression();
        this.expect('RPAREN');
        return { type: 'Namespace', name, degree, loc };
      }

      case 'CONSTANT': {
        this.advance();
        const name = this.expect('CONSTANT_IDENTIFIER').value;
        this.expect('EQUALS');
        return { type: 'ConstantDefinition', name, value: this.parseExpression(), loc };
      }

      case 'POL':
      case 'COL':
        this.advance();
        return this.parsePolynomialStatement(loc);

      case 'PUBLIC': {
        this.advance();
        const name = this.expect('IDENTIFIER').value;
        this.expect('EQUALS');
        const polynomial = this.parsePolynomialReference();
        this.expect('LPAREN');
        const index = this.parseExpression();
        this.expect('RPAREN');
        return { type: 'PublicDeclaration', name, polynomial, index, loc };
      }

      case 'MACRO':
        return this.parseMacro(loc);

      case 'LBRACE': {
        const left = this.parseBracedList();
        if (this.match('CONNECT')) {
          return { type: 'ConnectIdentity', left, right: this.parseBracedList(), loc };
        }
        return this.finishSelectedIdentity({ expressions: left }, loc);
      }

      default:
        return this.finishExpressionStatement(this.parseExpression(), loc);
    }
  }

  // After `pol` / `col`
  private parsePolynomialStatement(loc: SourceLocation): PilStatement {
    if (this.match('CONSTANT') || this.match('FIXED')) {
      const name = this.expect('IDENTIFIER').value;
      if (this.check('LPAREN') || this.check('EQUALS')) {
        return {
          type: 'PolynomialConstantDefinition',
          name,
          definition: this.parseFunctionDefinition(),
          loc,
        };
      }
      const polynomials = this.parsePolynomialNames(this.finishPolynomialName(name));
      return { type: 'PolynomialConstantDeclaration', polynomials, loc };
    }

    if (this.match('COMMIT') || this.match('WITNESS')) {
      const first = this.finishPolynomialName(this.expect('IDENTIFIER').value);
      if (this.match('LPAREN')) {
        const params = this.parseParameterList();
        this.expect('RPAREN');
        this.expect('QUERY');
        return {
          type: 'PolynomialCommitDeclaration',
          polynomials: [first],
          definition: { type: 'Query', params, body: this.parseExpression() },
          loc,
        };
      }
      return { type: 'PolynomialCommitDeclaration', polynomials: this.parsePolynomialNames(first), loc };
    }

    if (this.check('IDENTIFIER')) {
      const name = this.advance().value;
      this.expect('EQUALS');
      return { type: 'PolynomialDefinition', name, value: this.parseExpression(), loc };
    }

    throw this.error(["'constant'", "'fixed'", "'commit'", "'witness'", 'identifier']);
  }

  private finishPolynomialName(name: string): PolynomialName {
    if (this.match('LBRACKET')) {
      const arraySize = this.parseExpression();
      this.expect('RBRACKET');
      return { name, arraySize };
    }
    return { name };
  }

  private parsePolynomialNames(first: PolynomialName): PolynomialName[] {
    const names = [first];
    while (this.match('COMMA')) {
      names.push(this.finishPolynomialName(this.expect('IDENTIFIER').value));
    }
    return names;
  }

  // (params) { body }  or  = array
  private parseFunctionDefinition(): FunctionDefinition {
    if (this.match('EQUALS')) {
      return { type: 'Array', value: this.parseArrayExpression() };
    }
    this.expect('LPAREN');
    const params = this.parseParameterList();
    this.expect('RPAREN');
    this.expect('LBRACE');
    const body = this.parseExpression();
    this.expect('RBRACE');
    return { type: 'Mapping', params, body };
  }

  private parseArrayExpression(): ArrayExpression {
    let left = this.parseArrayTerm();
    while (this.match('PLUS')) {
      left = { type: 'ArrayConcat', left, right: this.parseArrayTerm() };
    }
    return left;
  }

  private parseArrayTerm(): ArrayExpression {
    this.expect('LBRACKET');
    const items = this.parseExpressionList('RBRACKET');
    this.expect('RBRACKET');
    return { type: 'ArrayValue', items, repeated: this.match('STAR') };
  }

  private parseParameterList(): string[] {
    const params: string[] = [];
    if (!this.check('IDENTIFIER')) return params;

    do {
      params.push(this.expect('IDENTIFIER').value);
    } while (this.match('COMMA'));

    return params;
  }

  // macro name(params) { statement; ... [result] }
  private parseMacro(loc: SourceLocation): MacroDefinition {
    return this.nested(() => this.parseMacroDefinition(loc));
  }

  private parseMacroDefinition(loc: SourceLocation): MacroDefinition {
    this.expect('MACRO');
    const name = this.expect('IDENTIFIER').value;
    this.expect('LPAREN');
    const params = this.parseParameterList();
    this.expect('RPAREN');
    this.expect('LBRACE');

    const body: PilStatement[] = [];
    let result: Expression | undefined;

    while (!this.check('RBRACE')) {
      if (this.startsExpression()) {
        const statementLoc = this.location();
        const expr = this.parseExpression();
        if (this.check('RBRACE')) {
          result = expr;
          break;
        }
        body.push(this.finishExpressionStatement(expr, statementLoc));
      } else {
        body.push(this.parsePilStatement());
      }
      this.expect('SEMICOLON');
    }
    this.expect('RBRACE');

    const macro: MacroDefinition = { type: 'MacroDefinition', name, params, body, loc };
    if (result !== undefined) macro.result = result;
    return macro;
  }

  // The leading token opens an expression rather than a keyword statement or `{`
  private startsExpression(): boolean {
    switch (this.current().type) {
      case 'IDENTIFIER':
      case 'CONSTANT_IDENTIFIER':
      case 'COLON':
      case 'NUMBER':
      case 'STRING':
      case 'MATCH':
      case 'LPAREN':
      case 'DOLLAR_BRACE':
      case 'PLUS':
      case 'MINUS':
        return true;
      default:
        return false;
    }
  }

  // An identity, lookup, permutation or call that began with `expr`
  private finishExpressionStatement(expr: Expression, loc: SourceLocation): PilStatement {
    if (this.match('EQUALS')) {
      const right = this.parseExpression();
      return {
        type: 'PolynomialIdentity',
        expression: { type: 'BinaryOperation', left: expr, op: '-', right },
        loc,
      };
    }
    if (this.check('LBRACE')) {
      return this.finishSelectedIdentity({ selector: expr, expressions: this.parseBracedList() }, loc);
    }
    if (this.check('IN') || this.check('IS')) {
      return this.finishSelectedIdentity({ expressions: [expr] }, loc);
    }
    if (expr.type === 'FunctionCall') {
      return { type: 'FunctionCallStatement', name: expr.name, args: expr.args, loc };
    }
    throw this.error(AFTER_EXPRESSION);
  }

  private finishSelectedIdentity(left: SelectedExpressions, loc: SourceLocation): PilStatement {
    if (this.match('IN')) {
      return { type: 'PlookupIdentity', left, right: this.parseSelectedExpressions(), loc };
    }
    if (this.match('IS')) {
      return { type: 'PermutationIdentity', left, right: this.parseSelectedExpressions(), loc };
    }
    throw this.error(["'in'", "'is'", "'connect'"]);
  }

  // `{ list }`, `selector { list }` or a single expression
  private parseSelectedExpressions(): SelectedExpressions {
    if (this.check('LBRACE')) {
      return { expressions: this.parseBracedList() };
    }
    const expr = this.parseExpression();
    if (this.check('LBRACE')) {
      return { selector: expr, expressions: this.parseBracedList() };
    }
    return { expressions: [expr] };
  }

  private parseBracedList(): Expression[] {
    this.expect('LBRACE');
    const items = this.parseExpressionList('RBRACE');
    this.expect('RBRACE');
    return items;
  }

  // ============================================================
  // ASM statements
  // ============================================================

  private parseAsmStatement(): AsmStatement {
    const loc = this.location();
    const token = this.current();

    switch (token.type) {
      case 'DEGREE': {
        this.advance();
        const number = this.expect('NUMBER');
        this.expect('SEMICOLON');
        return { type: 'Degree', degree: parseIntegerLiteral(number.value, positionOf(number)), loc };
      }

      case 'REG': {
        this.advance();
        const name = this.expect('IDENTIFIER').value;
        let flag: RegisterFlag | undefined;
        if (this.match('LBRACKET')) {
          flag = this.parseRegisterFlag();
          this.expect('RBRACKET');
        }
        this.expect('SEMICOLON');
        return flag === undefined
          ? { type: 'RegisterDeclaration', name, loc }
          : { type: 'RegisterDeclaration', name, flag, loc };
      }

      case 'INSTR': {
        this.advance();
        const name = this.expect('IDENTIFIER').value;
        const params = this.parseInstructionParams();
        this.expect('LBRACE');
        const body = this.parseInstructionBody();
        this.expect('RBRACE');
        return { type: 'InstructionDeclaration', name, params, body, loc };
      }

      case 'PIL_BLOCK': {
        this.advance();
        const statements: PilStatement[] = [];
        while (!this.check('RBRACE')) {
          statements.push(this.parsePilStatement());
          this.expect('SEMICOLON');
        }
        this.expect('RBRACE');
        return { type: 'InlinePil', statements, loc };
      }

      case 'IDENTIFIER': {
        const next = this.peek(1).type;
        if (next === 'COLON_COLON') {
          this.advance();
          this.advance();
          return { type: 'Label', name: token.value, loc };
        }
        if (next === 'COMMA' || next === 'ASSIGN') {
          return this.parseAssignment(loc);
        }
        this.advance();
        const args = this.parseExpressionList('SEMICOLON');
        this.expect('SEMICOLON');
        return { type: 'Instruction', name: token.value, args, loc };
      }

      default:
        throw this.error(["'degree'", "'reg'", "'instr'", "'pil{'", 'identifier']);
    }
  }

  private parseRegisterFlag(): RegisterFlag {
    if (this.match('AT_PC')) return 'IsPC';
    if (this.match('ASSIGN')) return 'IsAssignment';
    throw this.error(["'@pc'", "'<='"]);
  }

  // inputs [-> outputs]
  private parseInstructionParams(): InstructionParams {
    const inputs = this.parseParams();
    if (this.match('ARROW')) {
      return { inputs, outputs: this.parseParams() };
    }
    return { inputs };
  }

  private parseParams(): Param[] {
    const params: Param[] = [];
    if (!this.check('IDENTIFIER')) return params;

    do {
      const name = this.expect('IDENTIFIER').value;
      params.push(this.match('COLON') ? { name, paramType: this.expect('IDENTIFIER').value } : { name });
    } while (this.match('COMMA'));

    return params;
  }

  private parseInstructionBody(): InstructionBodyElement[] {
    const elements: InstructionBodyElement[] = [];
    if (this.check('RBRACE')) return elements;

    do {
      elements.push(this.parseInstructionBodyElement());
    } while (this.match('COMMA'));

    return elements;
  }

  private parseInstructionBodyElement(): InstructionBodyElement {
    let left: SelectedExpressions;

    if (this.check('LBRACE')) {
      left = { expressions: this.parseBracedList() };
    } else {
      const expr = this.parseExpression();
      if (this.match('EQUALS')) {
        const right = this.parseExpression();
        return { type: 'Expression', expression: { type: 'BinaryOperation', left: expr, op: '-', right } };
      }
      if (this.check('LBRACE')) {
        left = { selector: expr, expressions: this.parseBracedList() };
      } else if (this.check('IN') || this.check('IS')) {
        left = { expressions: [expr] };
      } else {
        throw this.error(AFTER_EXPRESSION);
      }
    }

    if (this.match('IN')) {
      return { type: 'PlookupIdentity', left, kind: 'in', right: this.parseSelectedExpressions() };
    }
    if (this.match('IS')) {
      return { type: 'PlookupIdentity', left, kind: 'is', right: this.parseSelectedExpressions() };
    }
    throw this.error(["'in'", "'is'"]);
  }

  // A, B <= [op] = expr;
  private parseAssignment(loc: SourceLocation): AsmStatement {
    const lhs = [this.expect('IDENTIFIER').value];
    while (this.match('COMMA')) {
      lhs.push(this.expect('IDENTIFIER').value);
    }

    this.expect('ASSIGN');
    const using = this.check('IDENTIFIER') ? this.advance().value : undefined;
    this.expect('EQUALS');
    const rhs = this.parseExpression();
    this.expect('SEMICOLON');

    return using === undefined
      ? { type: 'Assignment', lhs, rhs, loc }
      : { type: 'Assignment', lhs, using, rhs, loc };
  }
}

/** Parse a PIL file: a sequence of `;`-terminated statements. */
export function parsePil(source: string, options: ParseOptions = {}): PilFile {
  return new Parser(source, options).parsePil();
}

/** Parse an ASM file. */
export function parseAsm(source: string, options: ParseOptions = {}): AsmFile {
  return new Parser(source, options).parseAsm();
}
