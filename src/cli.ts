#!/usr/bin/env node
/**
 * polyparse CLI
 *
 * Usage: polyparse <file> [--dialect pil|asm|riscv] [--field goldilocks|bn254] [--json] [--data]
 */

import { readFileSync } from 'fs';
import { pathToFileURL } from 'url';
import { LexError, ParseError, type SourcePosition } from '@polyparse/core';
import {
  DataObjectError,
  extractDataObjects,
  formatAssembly,
  parseAssembly,
  type DataValue,
} from '@polyparse/riscv';
import { fieldByName, type FieldSpec } from './number/field-element.js';
import { parseAsm, parsePil } from './parser/parser.js';
import { formatAsm, formatPil } from './display/format.js';
import { toJSON } from './display/json.js';

export type Dialect = 'pil' | 'asm' | 'riscv';

interface CliOptions {
  inputFile: string;
  dialect: Dialect;
  field?: FieldSpec;
  json: boolean;
  data: boolean;
}

const DIALECTS: Dialect[] = ['pil', 'asm', 'riscv'];

const EXTENSIONS: Record<string, Dialect> = {
  '.pil': 'pil',
  '.asm': 'asm',
  '.s': 'riscv',
};

function isDialect(value: string): value is Dialect {
  return DIALECTS.some(d => d === value);
}

function dialectFromPath(path: string): Dialect | undefined {
  const match = /\.[^./\\]+$/.exec(path);
  return match ? EXTENSIONS[match[0].toLowerCase()] : undefined;
}

function parseArgs(args: string[]): CliOptions | null {
  const cliArgs = args.slice(2); // Skip node and script path

  if (cliArgs.length === 0) {
    return null;
  }

  let inputFile = '';
  let dialect: Dialect | undefined;
  let field: FieldSpec | undefined;
  let json = false;
  let data = false;

  for (let i = 0; i < cliArgs.length; i++) {
    const arg = cliArgs[i];

    if (arg === '--dialect') {
      if (i + 1 >= cliArgs.length) {
        console.error('Error: --dialect requires a value');
        return null;
      }
      const value = cliArgs[++i];
      if (!isDialect(value)) {
        console.error(`Error: Unknown dialect '${value}'`);
        return null;
      }
      dialect = value;
    } else if (arg === '--field') {
      if (i + 1 >= cliArgs.length) {
        console.error('Error: --field requires a value');
        return null;
      }
      const value = cliArgs[++i];
      field = fieldByName(value);
      if (!field) {
        console.error(`Error: Unknown field '${value}'`);
        return null;
      }
    } else if (arg === '--json') {
      json = true;
    } else if (arg === '--data') {
      data = true;
    } else if (arg === '-h' || arg === '--help') {
      return null;
    } else if (!arg.startsWith('-')) {
      inputFile = arg;
    } else {
      console.error(`Error: Unknown option '${arg}'`);
      return null;
    }
  }

  if (!inputFile) {
    console.error('Error: No input file specified');
    return null;
  }

  if (!dialect) {
    dialect = dialectFromPath(inputFile);
  }
  if (!dialect) {
    console.error(`Error: Cannot infer dialect of '${inputFile}', use --dialect`);
    return null;
  }
  if (data && dialect !== 'riscv') {
    console.error('Error: --data only applies to the riscv dialect');
    return null;
  }

  return { inputFile, dialect, field, json, data };
}

function printUsage(): void {
  console.log(`polyparse

Usage: polyparse <file> [--dialect pil|asm|riscv] [--field goldilocks|bn254] [--json] [--data]

Options:
  --dialect <name>  Input language (default: from the extension .pil, .asm or .s)
  --field <name>    Field for PIL/ASM number literals (default: goldilocks)
  --json            Print the parse tree as JSON instead of source text
  --data            Print the data objects of a riscv file instead of its statements
  -h, --help        Show this help message

Examples:
  polyparse main.pil
  polyparse machine.asm --field bn254
  polyparse program.s --json
  polyparse program.s --data`);
}

// `name: 68 69 00 &table`, references printed as &symbol
function formatDataObjects(objects: Map<string, DataValue[]>): string {
  const lines: string[] = [];
  for (const [name, values] of objects) {
    const parts = values.map(value =>
      value.type === 'Reference'
        ? `&${value.symbol}`
        : Array.from(value.bytes, b => b.toString(16).padStart(2, '0')).join(' '));
    const body = parts.filter(p => p.length > 0).join(' ');
    lines.push(body.length > 0 ? `${name}: ${body}` : `${name}:`);
  }
  return lines.map(line => line + '\n').join('');
}

function render(source: string, options: CliOptions): string {
  const parseOptions = options.field ? { field: options.field } : {};

  switch (options.dialect) {
    case 'pil': {
      const file = parsePil(source, parseOptions);
      return options.json ? toJSON(file) : formatPil(file);
    }
    case 'asm': {
      const file = parseAsm(source, parseOptions);
      return options.json ? toJSON(file) : formatAsm(file);
    }
    case 'riscv': {
      const statements = parseAssembly(source);
      if (options.data) {
        const objects = extractDataObjects(statements);
        return options.json ? toJSON(Object.fromEntries(objects)) : formatDataObjects(objects);
      }
      return options.json ? toJSON(statements) : formatAssembly(statements);
    }
  }
}

function diagnostic(e: unknown): { reason: string; position: SourcePosition } | undefined {
  if (e instanceof LexError || e instanceof ParseError || e instanceof DataObjectError) {
    return { reason: e.reason, position: e.position };
  }
  return undefined;
}

export function main(args: string[] = process.argv): number {
  const options = parseArgs(args);

  if (!options) {
    printUsage();
    return args.some(a => a === '-h' || a === '--help') ? 0 : 1;
  }

  let source: string;
  try {
    source = readFileSync(options.inputFile, 'utf-8');
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
      console.error(`Error: File not found: ${options.inputFile}`);
    } else {
      console.error(`Error: Cannot read file: ${options.inputFile}`);
    }
    return 1;
  }

  let output: string;
  try {
    output = render(source, options);
  } catch (e) {
    const found = diagnostic(e);
    if (!found) throw e;
    console.error(`${options.inputFile}:${found.position.line}:${found.position.column}: ${found.reason}`);
    return 1;
  }

  console.log(output.endsWith('\n') ? output.slice(0, -1) : output);
  return 0;
}

// Run if executed directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  process.exit(main());
}
