// AST node types for the PIL and ASM languages

import type { SourcePosition } from '@polyparse/core';
import type { FieldElement } from '../number/field-element.js';

export type SourceLocation = SourcePosition;

export interface StatementNode {
  loc: SourceLocation;
}

// ============================================================
// Expressions
// ============================================================

export type BinaryOperator = '+' | '-' | '*' | '/' | '%' | '**' | '<<' | '>>' | '&' | '|' | '^';

export type UnaryOperator = '+' | '-';

export type Expression =
  | BinaryOperation
  | UnaryOperation
  | ConstantReference
  | PolynomialReference
  | PublicReference
  | NumberLiteral
  | StringLiteral
  | MatchExpression
  | Tuple
  | FunctionCall
  | FreeInput;

export interface BinaryOperation {
  type: 'BinaryOperation';
  left: Expression;
  op: BinaryOperator;
  right: Expression;
}

export interface UnaryOperation {
  type: 'UnaryOperation';
  op: UnaryOperator;
  operand: Expression;
}

// %NAME, name kept with its `%`
export interface ConstantReference {
  type: 'Constant';
  name: string;
}

// [namespace.]name[[index]]['], where a trailing ' refers to the next row
export interface PolynomialReference {
  type: 'PolynomialReference';
  namespace?: string;
  name: string;
  index?: Expression;
  next: boolean;
}

// :name
export interface PublicReference {
  type: 'PublicReference';
  name: string;
}

export interface NumberLiteral {
  type: 'Number';
  value: FieldElement;
}

export interface StringLiteral {
  type: 'String';
  value: string;
}

export interface MatchExpression {
  type: 'MatchExpression';
  scrutinee: Expression;
  arms: MatchArm[];
}

// `pattern => value`; no pattern means `_`
export interface MatchArm {
  pattern?: Expression;
  value: Expression;
}

export interface Tuple {
  type: 'Tuple';
  items: Expression[];
}

export interface FunctionCall {
  type: 'FunctionCall';
  name: string;
  args: Expression[];
}

// ${ expr }: a value supplied at witness generation time
export interface FreeInput {
  type: 'FreeInput';
  expression: Expression;
}

// ============================================================
// PIL
// ============================================================

export interface PilFile {
  type: 'PilFile';
  statements: PilStatement[];
}

export type PilStatement =
  | Include
  | Namespace
  | ConstantDefinition
  | PolynomialDefinition
  | PublicDeclaration
  | PolynomialConstantDeclaration
  | PolynomialConstantDefinition
  | PolynomialCommitDeclaration
  | PolynomialIdentity
  | PlookupIdentity
  | PermutationIdentity
  | ConnectIdentity
  | MacroDefinition
  | FunctionCallStatement;

export interface Include extends StatementNode {
  type: 'Include';
  path: string;
}

export interface Namespace extends StatementNode {
  type: 'Namespace';
  name: string;
  degree: Expression;
}

export interface ConstantDefinition extends StatementNode {
  type: 'ConstantDefinition';
  name: string;
  value: Expression;
}

// pol name = expr
export interface PolynomialDefinition extends StatementNode {
  type: 'PolynomialDefinition';
  name: string;
  value: Expression;
}

// public name = pol(index)
export interface PublicDeclaration extends StatementNode {
  type: 'PublicDeclaration';
  name: string;
  polynomial: PolynomialReference;
  index: Expression;
}

export interface PolynomialName {
  name: string;
  arraySize?: Expression;
}

export interface PolynomialConstantDeclaration extends StatementNode {
  type: 'PolynomialConstantDeclaration';
  polynomials: PolynomialName[];
}

export interface PolynomialConstantDefinition extends StatementNode {
  type: 'PolynomialConstantDefinition';
  name: string;
  definition: FunctionDefinition;
}

export interface PolynomialCommitDeclaration extends StatementNode {
  type: 'PolynomialCommitDeclaration';
  polynomials: PolynomialName[];
  definition?: FunctionDefinition;
}

// `lhs = rhs`, stored as `lhs - rhs`
export interface PolynomialIdentity extends StatementNode {
  type: 'PolynomialIdentity';
  expression: Expression;
}

export interface PlookupIdentity extends StatementNode {
  type: 'PlookupIdentity';
  left: SelectedExpressions;
  right: SelectedExpressions;
}

export interface PermutationIdentity extends StatementNode {
  type: 'PermutationIdentity';
  left: SelectedExpressions;
  right: SelectedExpressions;
}

export interface ConnectIdentity extends StatementNode {
  type: 'ConnectIdentity';
  left: Expression[];
  right: Expression[];
}

export interface MacroDefinition extends StatementNode {
  type: 'MacroDefinition';
  name: string;
  params: string[];
  body: PilStatement[];
  result?: Expression;
}

export interface FunctionCallStatement extends StatementNode {
  type: 'FunctionCallStatement';
  name: string;
  args: Expression[];
}

// `selector { e0, e1 }`; a bare expression has no selector
export interface SelectedExpressions {
  selector?: Expression;
  expressions: Expression[];
}

export type FunctionDefinition = MappingDefinition | ArrayDefinition | QueryDefinition;

// (i) { body }
export interface MappingDefinition {
  type: 'Mapping';
  params: string[];
  body: Expression;
}

// = [1, 2]* + [3]
export interface ArrayDefinition {
  type: 'Array';
  value: ArrayExpression;
}

// (i) query body
export interface QueryDefinition {
  type: 'Query';
  params: string[];
  body: Expression;
}

export type ArrayExpression = ArrayValue | ArrayConcat;

// `[items]`, or `[items]*` repeated to fill the column
export interface ArrayValue {
  type: 'ArrayValue';
  items: Expression[];
  repeated: boolean;
}

export interface ArrayConcat {
  type: 'ArrayConcat';
  left: ArrayExpression;
  right: ArrayExpression;
}

// ============================================================
// ASM
// ============================================================

export interface AsmFile {
  type: 'AsmFile';
  statements: AsmStatement[];
}

export type AsmStatement =
  | Degree
  | RegisterDeclaration
  | InstructionDeclaration
  | InlinePil
  | Assignment
  | Instruction
  | Label;

export interface Degree extends StatementNode {
  type: 'Degree';
  degree: bigint;
}

// `reg pc[@pc]` is the program counter, `reg X[<=]` an assignment register
export type RegisterFlag = 'IsPC' | 'IsAssignment';

export interface RegisterDeclaration extends StatementNode {
  type: 'RegisterDeclaration';
  name: string;
  flag?: RegisterFlag;
}

export interface InstructionDeclaration extends StatementNode {
  type: 'InstructionDeclaration';
  name: string;
  params: InstructionParams;
  body: InstructionBodyElement[];
}

export interface InstructionParams {
  inputs: Param[];
  outputs?: Param[];
}

// name or name: type
export interface Param {
  name: string;
  paramType?: string;
}

export type InstructionBodyElement = BodyIdentity | BodyLookup;

// `lhs = rhs`, stored as `lhs - rhs`
export interface BodyIdentity {
  type: 'Expression';
  expression: Expression;
}

export interface BodyLookup {
  type: 'PlookupIdentity';
  left: SelectedExpressions;
  kind: 'in' | 'is';
  right: SelectedExpressions;
}

export interface InlinePil extends StatementNode {
  type: 'InlinePil';
  statements: PilStatement[];
}

// A, B <=X= expr; `using` is the optional identifier between `<=` and `=`
export interface Assignment extends StatementNode {
  type: 'Assignment';
  lhs: string[];
  using?: string;
  rhs: Expression;
}

export interface Instruction extends StatementNode {
  type: 'Instruction';
  name: string;
  args: Expression[];
}

// name::
export interface Label extends StatementNode {
  type: 'Label';
  name: string;
}
