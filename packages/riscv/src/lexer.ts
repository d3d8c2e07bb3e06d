/**
 * RISC-V Assembly Lexer
 *
 * Token table for the assembly dialect. Register mnemonics overlap with the
 * symbol pattern (`s1` vs `s1ze`, `x1` vs `x10`), so the table relies on the
 * core lexer's longest-match rule and, for equal lengths, on the order below:
 * register patterns first, then fixed lexemes, then the generic classes.
 */

import { defineTable, literal, pattern, tokenize as tokenizeWith } from '@polyparse/core';
import type { Token } from '@polyparse/core';

export enum TokenType {
  REGISTER = 'REGISTER',
  NUMBER = 'NUMBER',
  STRING = 'STRING',
  // Symbols without / with a leading dot
  SYMBOL = 'SYMBOL',
  DOT_SYMBOL = 'DOT_SYMBOL',

  // Relocations
  HI = 'HI',
  LO = 'LO',

  // Punctuation
  COLON = 'COLON',
  COMMA = 'COMMA',
  LPAREN = 'LPAREN',
  RPAREN = 'RPAREN',
  MINUS = 'MINUS',
  NEWLINE = 'NEWLINE',
}

export type AsmToken = Token<TokenType>;

export const TOKEN_NAMES: Partial<Record<TokenType | 'EOF', string>> = {
  [TokenType.REGISTER]: 'register',
  [TokenType.NUMBER]: 'number',
  [TokenType.STRING]: 'string literal',
  [TokenType.SYMBOL]: 'symbol',
  [TokenType.DOT_SYMBOL]: 'directive',
  [TokenType.HI]: "'%hi('",
  [TokenType.LO]: "'%lo('",
  [TokenType.COLON]: "':'",
  [TokenType.COMMA]: "','",
  [TokenType.LPAREN]: "'('",
  [TokenType.RPAREN]: "')'",
  [TokenType.MINUS]: "'-'",
  [TokenType.NEWLINE]: 'end of line',
  EOF: 'end of input',
};

// ABI names that are not part of a numbered bank
const REGISTER_ALIASES = new Map<string, number>([
  ['zero', 0],
  ['ra', 1],
  ['sp', 2],
  ['gp', 3],
  ['tp', 4],
  ['fp', 8], // same register as s0
]);

export const ASM_TABLE = defineTable<TokenType>(
  ['[ \\t\\r\\f\\v]+', '#[^\\n\\r]*'],
  [
    pattern(TokenType.REGISTER, 'x[0-9]'),
    pattern(TokenType.REGISTER, 'x1[0-9]'),
    pattern(TokenType.REGISTER, 'x2[0-9]'),
    pattern(TokenType.REGISTER, 'x3[0-1]'),
    pattern(TokenType.REGISTER, 'a[0-7]'),
    pattern(TokenType.REGISTER, 's[0-1]'),
    pattern(TokenType.REGISTER, 's[2-9]'),
    pattern(TokenType.REGISTER, 's1[0-1]'),
    pattern(TokenType.REGISTER, 't[0-2]'),
    pattern(TokenType.REGISTER, 't[3-6]'),
    ...[...REGISTER_ALIASES.keys()].map(name => literal(TokenType.REGISTER, name)),

    literal(TokenType.NEWLINE, '\n'),
    literal(TokenType.COLON, ':'),
    literal(TokenType.COMMA, ','),
    literal(TokenType.LPAREN, '('),
    literal(TokenType.RPAREN, ')'),
    literal(TokenType.MINUS, '-'),
    literal(TokenType.HI, '%hi('),
    literal(TokenType.LO, '%lo('),

    pattern(TokenType.NUMBER, '-?[0-9][0-9_]*'),
    pattern(TokenType.NUMBER, '0x[0-9A-Fa-f][0-9A-Fa-f_]*'),
    pattern(TokenType.STRING, '"[^\\\\"\\n\\r]*(?:\\\\[tnfbrx\'"\\\\0-9][^\\\\"\\n\\r]*)*"'),
    pattern(TokenType.SYMBOL, '[a-zA-Z_@][a-zA-Z$_0-9.@]*'),
    pattern(TokenType.DOT_SYMBOL, '\\.[a-zA-Z_@.][a-zA-Z$_0-9.@]*'),
  ],
);

/**
 * Canonical index of a register mnemonic, or undefined for anything else.
 *
 * zero=0 ra=1 sp=2 gp=3 tp=4 t0-t2=5-7 s0/fp=8 s1=9 a0-a7=10-17
 * s2-s11=18-27 t3-t6=28-31, and xN=N.
 */
export function registerIndex(name: string): number | undefined {
  const alias = REGISTER_ALIASES.get(name);
  if (alias !== undefined) return alias;

  const m = /^([xast])([0-9]|[1-3][0-9])$/.exec(name);
  if (!m) return undefined;
  const n = Number.parseInt(m[2], 10);

  switch (m[1]) {
    case 'x':
      return n <= 31 ? n : undefined;
    case 'a':
      return n <= 7 ? 10 + n : undefined;
    case 's':
      if (n <= 1) return 8 + n;
      return n <= 11 ? 16 + n : undefined;
    case 't':
      if (n <= 2) return 5 + n;
      return n <= 6 ? 25 + n : undefined;
    default:
      return undefined;
  }
}

const ABI_NAMES = [
  'zero', 'ra', 'sp', 'gp', 'tp', 't0', 't1', 't2',
  's0', 's1', 'a0', 'a1', 'a2', 'a3', 'a4', 'a5',
  'a6', 'a7', 's2', 's3', 's4', 's5', 's6', 's7',
  's8', 's9', 's10', 's11', 't3', 't4', 't5', 't6',
];

/** ABI mnemonic of a register index (`s0` rather than `fp` for 8). */
export function registerName(index: number): string {
  if (!Number.isInteger(index) || index < 0 || index >= ABI_NAMES.length) {
    throw new RangeError(`Invalid register index ${index}`);
  }
  return ABI_NAMES[index];
}

export function tokenize(source: string): AsmToken[] {
  return tokenizeWith(source, ASM_TABLE);
}
