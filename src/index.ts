// polyparse - PIL/ASM front end
// Parsers, printers and JSON export for the constraint and machine languages

// Parsers
export { parsePil, parseAsm, Parser } from './parser/parser.js';
export {
  parseExpression,
  ExpressionParser,
  DEFAULT_MAX_DEPTH,
  type ParseOptions,
} from './parser/expression-parser.js';
export { tokenize, PIL_TABLE, type TokenType, type PilToken } from './parser/lexer.js';

// Field elements
export {
  FieldElement,
  GOLDILOCKS,
  BN254,
  fieldByName,
  type FieldSpec,
} from './number/field-element.js';

// Printers
export {
  formatExpression,
  formatPil,
  formatPilStatement,
  formatAsm,
  formatAsmStatement,
  toJSON,
} from './display/index.js';

// Errors
export { LexError, ParseError, type SourcePosition } from '@polyparse/core';

// AST
export type * from './types/ast.js';
