/**
 * Assembly printer
 *
 * Prints parsed statements back as source text. Registers are printed with
 * their ABI names; strings are re-escaped so the output parses to the same
 * statements.
 */

import { registerName } from './lexer.js';
import {
  ArgumentType,
  ConstantType,
  NodeType,
  type Argument,
  type Constant,
  type Statement,
} from './parser.js';

export function formatConstant(constant: Constant): string {
  switch (constant.type) {
    case ConstantType.NUMBER:
      return constant.value.toString();
    case ConstantType.HI_DATA_REF:
      return `%hi(${constant.symbol})`;
    case ConstantType.LO_DATA_REF:
      return `%lo(${constant.symbol})`;
  }
}

function escapeByte(byte: number): string {
  switch (byte) {
    case 0x09: return '\\t';
    case 0x0a: return '\\n';
    case 0x0d: return '\\r';
    case 0x22: return '\\"';
    case 0x5c: return '\\\\';
  }
  if (byte >= 0x20 && byte < 0x7f) return String.fromCharCode(byte);
  return '\\' + byte.toString(8).padStart(3, '0');
}

export function formatArgument(arg: Argument): string {
  switch (arg.type) {
    case ArgumentType.REGISTER:
      return registerName(arg.register);
    case ArgumentType.REG_OFFSET:
      return `${formatConstant(arg.offset)}(${registerName(arg.register)})`;
    case ArgumentType.STRING_LITERAL:
      return `"${Array.from(arg.bytes, escapeByte).join('')}"`;
    case ArgumentType.SYMBOL:
      return arg.name;
    case ArgumentType.CONSTANT:
      return formatConstant(arg.constant);
    case ArgumentType.DIFFERENCE:
      return `${arg.left} - ${arg.right}`;
  }
}

export function formatStatement(statement: Statement): string {
  if (statement.type === NodeType.LABEL) {
    return `${statement.name}:`;
  }
  const args = statement.args.map(formatArgument).join(', ');
  const head = statement.type === NodeType.INSTRUCTION ? `  ${statement.name}` : statement.name;
  return args.length > 0 ? `${head} ${args}` : head;
}

export function formatAssembly(statements: Statement[]): string {
  return statements.map(s => formatStatement(s) + '\n').join('');
}
