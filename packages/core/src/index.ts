/**
 * polyparse core
 *
 * Lexing and cursor machinery shared by the assembly and PIL/ASM parsers.
 */

export * from './errors.js';
export * from './lexer.js';
export * from './literals.js';
export * from './token-parser.js';
