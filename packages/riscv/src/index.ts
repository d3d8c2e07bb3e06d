/**
 * polyparse riscv
 *
 * Tokenizer, parser and printer for RISC-V style assembly, plus extraction
 * of the data objects a program declares.
 */

export * from './lexer.js';
export * from './parser.js';
export * from './format.js';
export * from './data-objects.js';
