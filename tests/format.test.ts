import { describe, it, expect } from 'vitest';
import { parseExpression } from '../src/parser/expression-parser.js';
import { parseAsm, parsePil } from '../src/parser/parser.js';
import { formatAsm, formatExpression, formatPil } from '../src/display/format.js';

describe('formatExpression', () => {
  it('should parenthesize every binary operation', () => {
    expect(formatExpression(parseExpression('1 - 2 - 3'))).toBe('((1 - 2) - 3)');
    expect(formatExpression(parseExpression('a + b * c'))).toBe('(a + (b * c))');
    expect(formatExpression(parseExpression('-a ** 2'))).toBe('(-a ** 2)');
  });

  it('should wrap a unary operand on the right of a power', () => {
    expect(formatExpression({
      type: 'BinaryOperation',
      left: { type: 'PolynomialReference', name: 'a', next: false },
      op: '**',
      right: { type: 'UnaryOperation', op: '-', operand: { type: 'PolynomialReference', name: 'b', next: false } },
    })).toBe('(a ** (-b))');
  });

  it('should print terms', () => {
    expect(formatExpression(parseExpression("Main.x[i + 1]'"))).toBe("Main.x[(i + 1)]'");
    expect(formatExpression(parseExpression('match x { 0 => a, _ => b, }'))).toBe('match x { 0 => a, _ => b }');
    expect(formatExpression(parseExpression('(a,)'))).toBe('(a,)');
    expect(formatExpression(parseExpression('(a, f(), %N, :p)'))).toBe('(a, f(), %N, :p)');
    expect(formatExpression(parseExpression('${ a }'))).toBe('${ a }');
    expect(formatExpression(parseExpression('0x10'))).toBe('16');
  });

  it('should escape strings so they parse back', () => {
    const printed = formatExpression(parseExpression('"q\\x22\\n"'));
    expect(printed).toBe('"q\\x22\\n"');
    expect(parseExpression(printed)).toEqual({ type: 'String', value: 'q"\n' });
  });
});

describe('formatPil', () => {
  it('should print one statement per line', () => {
    const source = [
      'namespace Main(%N);',
      'pol commit a, b[2];',
      'pol constant L = [1]* + [0];',
      "a' = a + b[1];",
      'sel { a } in { b };',
      '{ a } connect { b };',
    ].join('\n');
    expect(formatPil(parsePil(source))).toBe([
      'namespace Main(%N);',
      'pol commit a, b[2];',
      'pol constant L = [1]* + [0];',
      "a' = (a + b[1]);",
      'sel { a } in { b };',
      '{ a } connect { b };',
      '',
    ].join('\n'));
  });

  it('should print bare selected expressions in braces', () => {
    expect(formatPil(parsePil('a is b;'))).toBe('{ a } is { b };\n');
  });

  it('should print macros over several lines', () => {
    expect(formatPil(parsePil('macro bool(x) { x * (1 - x) = 0; x };'))).toBe(
      'macro bool(x) {\n    (x * (1 - x)) = 0;\n    x\n};\n',
    );
  });

  it('should print text that parses to the same output', () => {
    const source = [
      'include "lib.pil";',
      'constant %N = 2 ** 8;',
      'pol constant STEP(i) { i % 2 };',
      'pol commit q(i) query match i { 0 => 1, _ => ${ i } };',
      'public out = q(%N - 1);',
      'macro m(a) { a = 1; };',
      'm(q);',
    ].join('\n');
    const printed = formatPil(parsePil(source));
    expect(formatPil(parsePil(printed))).toBe(printed);
  });
});

describe('formatAsm', () => {
  it('should print every statement form', () => {
    const source = [
      'degree 8;',
      'reg pc[@pc];',
      'reg A[<=];',
      'instr inc X -> Y { Y = X + 1 }',
      'A <=X= 1;',
      'A <== B;',
      'loop::',
      'jmp loop;',
      'ret;',
    ].join('\n');
    expect(formatAsm(parseAsm(source))).toBe([
      'degree 8;',
      'reg pc[@pc];',
      'reg A[<=];',
      'instr inc X -> Y { Y = (X + 1) }',
      'A <=X= 1;',
      'A <== B;',
      'loop::',
      'jmp loop;',
      'ret;',
      '',
    ].join('\n'));
  });

  it('should indent inline pil blocks', () => {
    expect(formatAsm(parseAsm('pil{ pol commit x; x = 1; }'))).toBe('pil{\n    pol commit x;\n    x = 1;\n}\n');
  });

  it('should print instruction bodies with lookups', () => {
    expect(formatAsm(parseAsm('instr ld l: label { sel { l } in { T }, X = 1 }'))).toBe(
      'instr ld l: label { sel { l } in { T }, X = 1 }\n',
    );
  });
});
