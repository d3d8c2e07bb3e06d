/**
 * Data object extraction
 *
 * Walks parsed assembly and collects the contents of every symbol declared
 * with `.type sym, @object`. Content directives (`.zero`, `.ascii`, `.asciz`,
 * `.word`, `.byte`) are attributed to the most recent label; `.size sym, n`
 * checks the collected length.
 */

import type { SourcePosition } from '@polyparse/core';
import {
  ArgumentType,
  ConstantType,
  NodeType,
  type Argument,
  type DirectiveNode,
  type Statement,
} from './parser.js';

export type DataValue =
  | { type: 'Direct'; bytes: Uint8Array }
  // Address of another symbol, filled in at link time
  | { type: 'Reference'; symbol: string };

export class DataObjectError extends Error {
  constructor(
    public readonly reason: string,
    public readonly position: SourcePosition,
  ) {
    super(`${reason} at line ${position.line}, column ${position.column}`);
    this.name = 'DataObjectError';
  }
}

const CONTENT_DIRECTIVES = new Set(['.zero', '.ascii', '.asciz', '.word', '.byte']);

/** Size in bytes; a reference occupies one 32-bit word. */
export function dataValueSize(value: DataValue): number {
  return value.type === 'Direct' ? value.bytes.length : 4;
}

export function extractDataObjects(statements: Statement[]): Map<string, DataValue[]> {
  const objects = new Map<string, DataValue[]>();
  let currentLabel: string | undefined;

  for (const statement of statements) {
    if (statement.type === NodeType.LABEL) {
      currentLabel = statement.name;
      continue;
    }
    if (statement.type !== NodeType.DIRECTIVE) continue;

    const { name, args } = statement;

    if (name === '.type') {
      const [symbol, kind] = args;
      if (args.length === 2 && symbol.type === ArgumentType.SYMBOL &&
          kind.type === ArgumentType.SYMBOL && kind.name === '@object') {
        if (objects.has(symbol.name)) {
          throw new DataObjectError(`Data object '${symbol.name}' declared twice`, statement.loc);
        }
        objects.set(symbol.name, []);
      }
    } else if (CONTENT_DIRECTIVES.has(name)) {
      if (currentLabel === undefined) {
        throw new DataObjectError(`Directive '${name}' outside of any label`, statement.loc);
      }
      const entry = objects.get(currentLabel);
      if (entry) entry.push(...extractDataValues(statement));
    } else if (name === '.size') {
      const [symbol, size] = args;
      if (args.length === 2 && symbol.type === ArgumentType.SYMBOL &&
          symbol.name === currentLabel && size.type === ArgumentType.CONSTANT &&
          size.constant.type === ConstantType.NUMBER) {
        checkSize(objects, symbol.name, size.constant.value, statement.loc);
      }
    }
  }

  return new Map([...objects.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

function checkSize(
  objects: Map<string, DataValue[]>,
  name: string,
  specified: bigint,
  loc: SourcePosition,
): void {
  const entry = objects.get(name);
  if (!entry) {
    if (specified !== 0n) {
      throw new DataObjectError(`Nonzero size for object without elements: ${name}`, loc);
    }
    objects.set(name, []);
    return;
  }
  const computed = entry.reduce((sum, value) => sum + dataValueSize(value), 0);
  if (BigInt(computed) !== specified) {
    throw new DataObjectError(
      `Invalid size for data object ${name}: computed: ${computed} vs. specified: ${specified}`,
      loc,
    );
  }
}

// Largest `.zero` run materialized as bytes
export const MAX_ZERO_BYTES = 1n << 24n;

function numberArgument(arg: Argument | undefined): bigint | undefined {
  if (arg?.type === ArgumentType.CONSTANT && arg.constant.type === ConstantType.NUMBER) {
    return arg.constant.value;
  }
  return undefined;
}

function extractDataValues(directive: DirectiveNode): DataValue[] {
  const { name, args, loc } = directive;
  const invalid = (): DataObjectError =>
    new DataObjectError(`Invalid arguments to ${name} directive`, loc);

  switch (name) {
    case '.zero': {
      // `.zero n` or `.zero n, fill`; only the length is used
      const count = numberArgument(args[0]);
      if (count === undefined || count < 0n || count > MAX_ZERO_BYTES || args.length > 2) throw invalid();
      return [{ type: 'Direct', bytes: new Uint8Array(Number(count)) }];
    }

    case '.ascii':
    case '.asciz': {
      const [data] = args;
      if (args.length !== 1 || data.type !== ArgumentType.STRING_LITERAL) throw invalid();
      if (name === '.ascii') return [{ type: 'Direct', bytes: Uint8Array.from(data.bytes) }];
      const bytes = new Uint8Array(data.bytes.length + 1);
      bytes.set(data.bytes);
      return [{ type: 'Direct', bytes }];
    }

    case '.word':
      return args.map((arg): DataValue => {
        if (arg.type === ArgumentType.SYMBOL) {
          return { type: 'Reference', symbol: arg.name };
        }
        const value = numberArgument(arg);
        if (value === undefined) throw invalid();
        const word = Number(BigInt.asUintN(32, value));
        return {
          type: 'Direct',
          bytes: Uint8Array.of(word & 0xff, (word >>> 8) & 0xff, (word >>> 16) & 0xff, (word >>> 24) & 0xff),
        };
      });

    case '.byte': {
      const bytes = args.map(arg => {
        const value = numberArgument(arg);
        if (value === undefined) throw invalid();
        return Number(BigInt.asUintN(8, value));
      });
      return [{ type: 'Direct', bytes: Uint8Array.from(bytes) }];
    }

    default:
      throw invalid();
  }
}
