// Source printer for PIL and ASM trees
//
// Binary operations are printed fully parenthesized, so printed text parses
// back to the same tree.

import type {
  ArrayExpression,
  AsmFile,
  AsmStatement,
  Expression,
  FunctionDefinition,
  InstructionBodyElement,
  Param,
  PilFile,
  PilStatement,
  PolynomialName,
  SelectedExpressions,
} from '../types/ast.js';

const INDENT = '    ';

function escapeString(value: string): string {
  let out = '';
  for (const char of value) {
    const code = char.codePointAt(0) ?? 0;
    if (char === '"') out += '\\x22';
    else if (char === '\\') out += '\\\\';
    else if (char === '\n') out += '\\n';
    else if (char === '\t') out += '\\t';
    else if (char === '\r') out += '\\r';
    else if (code < 0x20 || code === 0x7f) out += '\\x' + code.toString(16).padStart(2, '0');
    else out += char;
  }
  return `"${out}"`;
}

// Operands that must be a single term: a unary operand and the right side of **
function formatTerm(expr: Expression): string {
  return expr.type === 'UnaryOperation' ? `(${formatExpression(expr)})` : formatExpression(expr);
}

function formatList(items: Expression[]): string {
  return items.map(formatExpression).join(', ');
}

export function formatExpression(expr: Expression): string {
  switch (expr.type) {
    case 'BinaryOperation': {
      const right = expr.op === '**' ? formatTerm(expr.right) : formatExpression(expr.right);
      return `(${formatExpression(expr.left)} ${expr.op} ${right})`;
    }
    case 'UnaryOperation':
      return `${expr.op}${formatTerm(expr.operand)}`;
    case 'Constant':
      return expr.name;
    case 'PolynomialReference': {
      const namespace = expr.namespace !== undefined ? `${expr.namespace}.` : '';
      const index = expr.index !== undefined ? `[${formatExpression(expr.index)}]` : '';
      return `${namespace}${expr.name}${index}${expr.next ? "'" : ''}`;
    }
    case 'PublicReference':
      return `:${expr.name}`;
    case 'Number':
      return expr.value.toString();
    case 'String':
      return escapeString(expr.value);
    case 'MatchExpression': {
      const arms = expr.arms.map(arm =>
        `${arm.pattern !== undefined ? formatExpression(arm.pattern) : '_'} => ${formatExpression(arm.value)}`);
      return arms.length > 0
        ? `match ${formatExpression(expr.scrutinee)} { ${arms.join(', ')} }`
        : `match ${formatExpression(expr.scrutinee)} { }`;
    }
    case 'Tuple':
      return expr.items.length === 1
        ? `(${formatExpression(expr.items[0])},)`
        : `(${formatList(expr.items)})`;
    case 'FunctionCall':
      return `${expr.name}(${formatList(expr.args)})`;
    case 'FreeInput':
      return `\${ ${formatExpression(expr.expression)} }`;
  }
}

// Identities are stored as `lhs - rhs` and printed as `lhs = rhs`
function formatIdentity(expr: Expression): string {
  if (expr.type === 'BinaryOperation' && expr.op === '-') {
    return `${formatExpression(expr.left)} = ${formatExpression(expr.right)}`;
  }
  return `${formatExpression(expr)} = 0`;
}

function formatSelected(selected: SelectedExpressions): string {
  const list = `{ ${formatList(selected.expressions)} }`;
  return selected.selector !== undefined ? `${formatExpression(selected.selector)} ${list}` : list;
}

function formatPolynomialName(pol: PolynomialName): string {
  return pol.arraySize !== undefined ? `${pol.name}[${formatExpression(pol.arraySize)}]` : pol.name;
}

function formatArray(value: ArrayExpression): string {
  if (value.type === 'ArrayConcat') {
    return `${formatArray(value.left)} + ${formatArray(value.right)}`;
  }
  return `[${formatList(value.items)}]${value.repeated ? '*' : ''}`;
}

function formatDefinition(definition: FunctionDefinition): string {
  switch (definition.type) {
    case 'Mapping':
      return `(${definition.params.join(', ')}) { ${formatExpression(definition.body)} }`;
    case 'Array':
      return ` = ${formatArray(definition.value)}`;
    case 'Query':
      return `(${definition.params.join(', ')}) query ${formatExpression(definition.body)}`;
  }
}

export function formatPilStatement(statement: PilStatement, indent: string = ''): string {
  switch (statement.type) {
    case 'Include':
      return `include ${escapeString(statement.path)}`;
    case 'Namespace':
      return `namespace ${statement.name}(${formatExpression(statement.degree)})`;
    case 'ConstantDefinition':
      return `constant ${statement.name} = ${formatExpression(statement.value)}`;
    case 'PolynomialDefinition':
      return `pol ${statement.name} = ${formatExpression(statement.value)}`;
    case 'PublicDeclaration':
      return `public ${statement.name} = ${formatExpression(statement.polynomial)}(${formatExpression(statement.index)})`;
    case 'PolynomialConstantDeclaration':
      return `pol constant ${statement.polynomials.map(formatPolynomialName).join(', ')}`;
    case 'PolynomialConstantDefinition':
      return `pol constant ${statement.name}${formatDefinition(statement.definition)}`;
    case 'PolynomialCommitDeclaration': {
      const names = statement.polynomials.map(formatPolynomialName).join(', ');
      return statement.definition !== undefined
        ? `pol commit ${names}${formatDefinition(statement.definition)}`
        : `pol commit ${names}`;
    }
    case 'PolynomialIdentity':
      return formatIdentity(statement.expression);
    case 'PlookupIdentity':
      return `${formatSelected(statement.left)} in ${formatSelected(statement.right)}`;
    case 'PermutationIdentity':
      return `${formatSelected(statement.left)} is ${formatSelected(statement.right)}`;
    case 'ConnectIdentity':
      return `{ ${formatList(statement.left)} } connect { ${formatList(statement.right)} }`;
    case 'MacroDefinition': {
      const inner = indent + INDENT;
      const lines = statement.body.map(s => `${inner}${formatPilStatement(s, inner)};`);
      if (statement.result !== undefined) lines.push(`${inner}${formatExpression(statement.result)}`);
      return [`macro ${statement.name}(${statement.params.join(', ')}) {`, ...lines, `${indent}}`].join('\n');
    }
    case 'FunctionCallStatement':
      return `${statement.name}(${formatList(statement.args)})`;
  }
}

export function formatPil(file: PilFile): string {
  return file.statements.map(s => `${formatPilStatement(s)};\n`).join('');
}

function formatParams(params: Param[]): string {
  return params.map(p => (p.paramType !== undefined ? `${p.name}: ${p.paramType}` : p.name)).join(', ');
}

function formatBodyElement(element: InstructionBodyElement): string {
  if (element.type === 'Expression') return formatIdentity(element.expression);
  return `${formatSelected(element.left)} ${element.kind} ${formatSelected(element.right)}`;
}

export function formatAsmStatement(statement: AsmStatement): string {
  switch (statement.type) {
    case 'Degree':
      return `degree ${statement.degree};`;
    case 'RegisterDeclaration': {
      const flag = statement.flag === 'IsPC' ? '[@pc]' : statement.flag === 'IsAssignment' ? '[<=]' : '';
      return `reg ${statement.name}${flag};`;
    }
    case 'InstructionDeclaration': {
      const { inputs, outputs } = statement.params;
      let head = `instr ${statement.name}`;
      if (inputs.length > 0) head += ` ${formatParams(inputs)}`;
      if (outputs !== undefined) head += ` -> ${formatParams(outputs)}`;
      return `${head} { ${statement.body.map(formatBodyElement).join(', ')} }`;
    }
    case 'InlinePil': {
      const lines = statement.statements.map(s => `${INDENT}${formatPilStatement(s, INDENT)};`);
      return ['pil{', ...lines, '}'].join('\n');
    }
    case 'Assignment':
      return `${statement.lhs.join(', ')} <=${statement.using ?? ''}= ${formatExpression(statement.rhs)};`;
    case 'Instruction':
      return statement.args.length > 0
        ? `${statement.name} ${formatList(statement.args)};`
        : `${statement.name};`;
    case 'Label':
      return `${statement.name}::`;
  }
}

export function formatAsm(file: AsmFile): string {
  return file.statements.map(s => `${formatAsmStatement(s)}\n`).join('');
}
