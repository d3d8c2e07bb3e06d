// Lexer for the PIL and ASM languages

import { defineTable, literal, pattern, tokenize as tokenizeWith } from '@polyparse/core';
import type { Token, TokenNames } from '@polyparse/core';

export type TokenType =
  // Keywords
  | 'INCLUDE'
  | 'NAMESPACE'
  | 'CONSTANT'
  | 'POL'
  | 'COL'
  | 'PUBLIC'
  | 'COMMIT'
  | 'WITNESS'
  | 'FIXED'
  | 'QUERY'
  | 'CONNECT'
  | 'MACRO'
  | 'IN'
  | 'IS'
  | 'MATCH'
  | 'DEGREE'
  | 'REG'
  | 'INSTR'
  | 'PIL_BLOCK'    // pil{
  // Punctuation
  | 'SEMICOLON'    // ;
  | 'COMMA'        // ,
  | 'LPAREN'       // (
  | 'RPAREN'       // )
  | 'LBRACKET'     // [
  | 'RBRACKET'     // ]
  | 'LBRACE'       // {
  | 'RBRACE'       // }
  | 'EQUALS'       // =
  | 'ARROW_FAT'    // =>
  | 'ASSIGN'       // <=
  | 'ARROW'        // ->
  | 'COLON'        // :
  | 'COLON_COLON'  // ::
  | 'DOT'          // .
  | 'QUOTE'        // '
  | 'UNDERSCORE'   // _
  | 'DOLLAR_BRACE' // ${
  | 'AT_PC'        // @pc
  // Operators
  | 'PLUS'
  | 'MINUS'
  | 'STAR'
  | 'STAR_STAR'
  | 'SLASH'
  | 'PERCENT'
  | 'LT_LT'
  | 'GT_GT'
  | 'AMPERSAND'
  | 'PIPE'
  | 'CARET'
  // Literals
  | 'STRING'
  | 'IDENTIFIER'
  | 'CONSTANT_IDENTIFIER' // %NAME
  | 'NUMBER';

export type PilToken = Token<TokenType>;

const KEYWORDS: [string, TokenType][] = [
  ['include', 'INCLUDE'],
  ['namespace', 'NAMESPACE'],
  ['constant', 'CONSTANT'],
  ['pol', 'POL'],
  ['col', 'COL'],
  ['public', 'PUBLIC'],
  ['commit', 'COMMIT'],
  ['witness', 'WITNESS'],
  ['fixed', 'FIXED'],
  ['query', 'QUERY'],
  ['connect', 'CONNECT'],
  ['macro', 'MACRO'],
  ['in', 'IN'],
  ['is', 'IS'],
  ['match', 'MATCH'],
  ['degree', 'DEGREE'],
  ['reg', 'REG'],
  ['instr', 'INSTR'],
];

const PUNCTUATION: [string, TokenType][] = [
  [';', 'SEMICOLON'],
  [',', 'COMMA'],
  ['(', 'LPAREN'],
  [')', 'RPAREN'],
  ['[', 'LBRACKET'],
  [']', 'RBRACKET'],
  ['{', 'LBRACE'],
  ['}', 'RBRACE'],
  ['=>', 'ARROW_FAT'],
  ['=', 'EQUALS'],
  ['<=', 'ASSIGN'],
  ['->', 'ARROW'],
  ['::', 'COLON_COLON'],
  [':', 'COLON'],
  ['.', 'DOT'],
  ["'", 'QUOTE'],
  ['_', 'UNDERSCORE'],
  ['${', 'DOLLAR_BRACE'],
  ['@pc', 'AT_PC'],
  ['**', 'STAR_STAR'],
  ['*', 'STAR'],
  ['+', 'PLUS'],
  ['-', 'MINUS'],
  ['/', 'SLASH'],
  ['%', 'PERCENT'],
  ['<<', 'LT_LT'],
  ['>>', 'GT_GT'],
  ['&', 'AMPERSAND'],
  ['|', 'PIPE'],
  ['^', 'CARET'],
];

export const PIL_TABLE = defineTable<TokenType>(
  ['\\s+', '//[^\\n\\r]*', '/\\*[^*]*\\*+(?:[^/*][^*]*\\*+)*/'],
  [
    ...KEYWORDS.map(([text, type]) => literal(type, text)),
    pattern('PIL_BLOCK', 'pil\\s*\\{'),
    ...PUNCTUATION.map(([text, type]) => literal(type, text)),
    pattern('STRING', '"[^"]*"'),
    pattern('IDENTIFIER', '[a-zA-Z_][a-zA-Z$_0-9@]*'),
    pattern('CONSTANT_IDENTIFIER', '%[a-zA-Z_][a-zA-Z$_0-9@]*'),
    pattern('NUMBER', '[0-9][0-9_]*'),
    pattern('NUMBER', '0x[0-9A-Fa-f][0-9A-Fa-f_]*'),
  ],
);

// Display names used in parse errors
export const TOKEN_NAMES: TokenNames<TokenType> = {
  PIL_BLOCK: "'pil{'",
  STRING: 'string literal',
  IDENTIFIER: 'identifier',
  CONSTANT_IDENTIFIER: 'constant name',
  NUMBER: 'number',
  EOF: 'end of input',
};
for (const [text, type] of [...KEYWORDS, ...PUNCTUATION]) {
  TOKEN_NAMES[type] = `'${text}'`;
}

export function tokenize(source: string): PilToken[] {
  return tokenizeWith(source, PIL_TABLE);
}
