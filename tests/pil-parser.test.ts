import { describe, it, expect } from 'vitest';
import { LexError, ParseError } from '@polyparse/core';
import { parsePil } from '../src/parser/parser.js';
import { BN254, FieldElement } from '../src/number/field-element.js';
import type { BinaryOperator, Expression, PilStatement } from '../src/types/ast.js';

function num(n: bigint): Expression {
  const value = FieldElement.tryFrom(n);
  if (!value) throw new Error(`${n} is not a field element`);
  return { type: 'Number', value };
}

function ref(name: string): Expression {
  return { type: 'PolynomialReference', name, next: false };
}

function bin(left: Expression, op: BinaryOperator, right: Expression): Expression {
  return { type: 'BinaryOperation', left, op, right };
}

function single(source: string): PilStatement {
  const { statements } = parsePil(source);
  expect(statements).toHaveLength(1);
  return statements[0];
}

function parseError(source: string): ParseError {
  try {
    parsePil(source);
  } catch (e) {
    if (e instanceof ParseError) return e;
    throw e;
  }
  throw new Error(`expected '${source}' to fail`);
}

describe('parsePil', () => {
  it('should parse a commit declaration followed by an identity', () => {
    const file = parsePil('pol commit a, b;\na = b;\n');
    expect(file).toEqual({
      type: 'PilFile',
      statements: [
        {
          type: 'PolynomialCommitDeclaration',
          polynomials: [{ name: 'a' }, { name: 'b' }],
          loc: { line: 1, column: 1, offset: 0 },
        },
        {
          type: 'PolynomialIdentity',
          expression: bin(ref('a'), '-', ref('b')),
          loc: { line: 2, column: 1, offset: 17 },
        },
      ],
    });
  });

  it('should report a missing name list at the semicolon', () => {
    const error = parseError('pol commit ;');
    expect(error.position).toEqual({ line: 1, column: 12, offset: 11 });
    expect(error.found).toBe(';');
    expect(error.reason).toBe("Expected identifier, found ';'");
  });

  it('should accept empty files and comments', () => {
    expect(parsePil('')).toEqual({ type: 'PilFile', statements: [] });
    expect(parsePil('// nothing\n/* here */')).toEqual({ type: 'PilFile', statements: [] });
  });

  describe('declarations', () => {
    it('should parse includes, namespaces and constants', () => {
      expect(single('include "std/utils.pil";')).toMatchObject({ type: 'Include', path: 'std/utils.pil' });
      expect(single('namespace Main(2**10);')).toMatchObject({
        type: 'Namespace',
        name: 'Main',
        degree: bin(num(2n), '**', num(10n)),
      });
      expect(single('constant %N = 65536;')).toMatchObject({
        type: 'ConstantDefinition',
        name: '%N',
        value: num(65536n),
      });
    });

    it('should parse polynomial definitions', () => {
      expect(single('pol x = a + 1;')).toMatchObject({
        type: 'PolynomialDefinition',
        name: 'x',
        value: bin(ref('a'), '+', num(1n)),
      });
    });

    it('should parse public declarations', () => {
      expect(single('public out = Main.x(%N - 1);')).toMatchObject({
        type: 'PublicDeclaration',
        name: 'out',
        polynomial: { type: 'PolynomialReference', namespace: 'Main', name: 'x', next: false },
        index: bin({ type: 'Constant', name: '%N' }, '-', num(1n)),
      });
    });

    it('should parse constant column declarations', () => {
      expect(single('pol constant FIRST, LAST[2];')).toMatchObject({
        type: 'PolynomialConstantDeclaration',
        polynomials: [{ name: 'FIRST' }, { name: 'LAST', arraySize: num(2n) }],
      });
    });

    it('should parse mapping definitions', () => {
      expect(single('pol constant STEP(i) { i };')).toMatchObject({
        type: 'PolynomialConstantDefinition',
        name: 'STEP',
        definition: { type: 'Mapping', params: ['i'], body: ref('i') },
      });
    });

    it('should parse array definitions with repetition and concatenation', () => {
      expect(single('pol fixed BYTES = [0, 1]* + [2];')).toMatchObject({
        type: 'PolynomialConstantDefinition',
        name: 'BYTES',
        definition: {
          type: 'Array',
          value: {
            type: 'ArrayConcat',
            left: { type: 'ArrayValue', items: [num(0n), num(1n)], repeated: true },
            right: { type: 'ArrayValue', items: [num(2n)], repeated: false },
          },
        },
      });
    });

    it('should parse query columns', () => {
      expect(single('pol witness x(i) query (1, i);')).toMatchObject({
        type: 'PolynomialCommitDeclaration',
        polynomials: [{ name: 'x' }],
        definition: { type: 'Query', params: ['i'], body: { type: 'Tuple', items: [num(1n), ref('i')] } },
      });
    });

    it('should treat col like pol', () => {
      expect(single('col witness y;')).toMatchObject({
        type: 'PolynomialCommitDeclaration',
        polynomials: [{ name: 'y' }],
      });
    });
  });

  describe('identities', () => {
    it('should tell plookups from permutations only by kind', () => {
      const lookup = single('a in b;');
      const permutation = single('a is b;');
      expect(lookup.type).toBe('PlookupIdentity');
      expect(permutation.type).toBe('PermutationIdentity');
      expect({ ...lookup, type: 'PermutationIdentity' }).toEqual(permutation);
      expect(lookup).toMatchObject({ left: { expressions: [ref('a')] }, right: { expressions: [ref('b')] } });
    });

    it('should parse selected expressions', () => {
      expect(single('sel { a, b } in { c, d };')).toMatchObject({
        type: 'PlookupIdentity',
        left: { selector: ref('sel'), expressions: [ref('a'), ref('b')] },
        right: { expressions: [ref('c'), ref('d')] },
      });
      expect(single('{ a } is other { b };')).toMatchObject({
        type: 'PermutationIdentity',
        left: { expressions: [ref('a')] },
        right: { selector: ref('other'), expressions: [ref('b')] },
      });
    });

    it('should parse connect identities', () => {
      expect(single('{ a, b } connect { c, d };')).toMatchObject({
        type: 'ConnectIdentity',
        left: [ref('a'), ref('b')],
        right: [ref('c'), ref('d')],
      });
    });

    it('should parse function call statements', () => {
      expect(single('check(a, 1);')).toMatchObject({
        type: 'FunctionCallStatement',
        name: 'check',
        args: [ref('a'), num(1n)],
      });
    });

    it('should reject a bare expression', () => {
      expect(parseError('a;').reason).toBe("Expected one of '=', 'in', 'is', '{', found ';'");
    });
  });

  describe('macros', () => {
    it('should parse a macro without a result', () => {
      const macro = single('macro bool(x) { x * (1 - x) = 0; };');
      expect(macro).toMatchObject({
        type: 'MacroDefinition',
        name: 'bool',
        params: ['x'],
        body: [
          {
            type: 'PolynomialIdentity',
            expression: bin(bin(ref('x'), '*', bin(num(1n), '-', ref('x'))), '-', num(0n)),
            loc: { line: 1, column: 17 },
          },
        ],
      });
      expect(macro).not.toHaveProperty('result');
    });

    it('should parse a trailing result expression', () => {
      expect(single('macro id(x) { x };')).toMatchObject({ body: [], result: ref('x') });
      expect(single('macro f(a, b) { g(a); a + b };')).toMatchObject({
        params: ['a', 'b'],
        body: [{ type: 'FunctionCallStatement', name: 'g', args: [ref('a')] }],
        result: bin(ref('a'), '+', ref('b')),
      });
    });

    it('should accept empty parameter lists and keyword statements', () => {
      expect(single('macro m() { pol commit t; 1 };')).toMatchObject({
        params: [],
        body: [{ type: 'PolynomialCommitDeclaration', polynomials: [{ name: 't' }] }],
        result: num(1n),
      });
    });

    it('should count nested macros against the depth limit', () => {
      expect(parsePil('macro a() { macro b() { }; };', { maxDepth: 2 }).statements).toHaveLength(1);
      expect(() => parsePil('macro a() { macro b() { macro c() { }; }; };', { maxDepth: 2 })).toThrow(
        'Nesting exceeds maximum depth of 2 at line 1, column 25',
      );
    });

    it('should reject deeply nested macros with a parse error', () => {
      const deep = 'macro m() { '.repeat(20000) + '}; '.repeat(20000);
      expect(() => parsePil(deep)).toThrow(ParseError);
    });
  });

  describe('errors', () => {
    it('should require semicolons', () => {
      expect(parseError('pol commit a').reason).toBe("Expected ';', found end of input");
    });

    it('should reject literals outside the field', () => {
      expect(() => parsePil('pol x = 0xffffffff00000001;')).toThrow(LexError);
      expect(parsePil('pol x = 0xffffffff00000001;', { field: BN254 }).statements).toHaveLength(1);
    });
  });
});
