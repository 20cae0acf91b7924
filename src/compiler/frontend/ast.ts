/**
 * Yul AST node definitions
 */

import { InternalCompilerError } from "../errors/compile_errors.js";

export interface SourceLocation {
  sourceName: string;
  start: number;
  end: number;
  line: number;
  column: number;
}

export const NO_LOCATION: SourceLocation = {
  sourceName: "<generated>",
  start: 0,
  end: 0,
  line: 0,
  column: 0,
};

export enum AstNodeKind {
  Block = "Block",
  ExpressionStatement = "ExpressionStatement",
  VariableDeclaration = "VariableDeclaration",
  Assignment = "Assignment",
  If = "If",
  Switch = "Switch",
  ForLoop = "ForLoop",
  Break = "Break",
  Continue = "Continue",
  Leave = "Leave",
  FunctionDefinition = "FunctionDefinition",
  FunctionCall = "FunctionCall",
  Identifier = "Identifier",
  Literal = "Literal",
}

export enum LiteralKind {
  Number = "Number",
  Boolean = "Boolean",
  String = "String",
}

interface NodeBase {
  location: SourceLocation;
}

export interface Identifier extends NodeBase {
  kind: AstNodeKind.Identifier;
  name: string;
}

/**
 * Numbers keep their source spelling (decimal or 0x-prefixed hex);
 * strings hold the unescaped characters, one code unit per byte.
 */
export interface Literal extends NodeBase {
  kind: AstNodeKind.Literal;
  literalKind: LiteralKind;
  value: string;
  type?: string;
}

export interface FunctionCall extends NodeBase {
  kind: AstNodeKind.FunctionCall;
  functionName: Identifier;
  arguments: Expression[];
}

export type Expression = FunctionCall | Identifier | Literal;

export interface TypedName {
  location: SourceLocation;
  name: string;
  type?: string;
}

export interface Block extends NodeBase {
  kind: AstNodeKind.Block;
  statements: Statement[];
}

export interface ExpressionStatement extends NodeBase {
  kind: AstNodeKind.ExpressionStatement;
  expression: Expression;
}

export interface VariableDeclaration extends NodeBase {
  kind: AstNodeKind.VariableDeclaration;
  variables: TypedName[];
  value?: Expression;
}

export interface Assignment extends NodeBase {
  kind: AstNodeKind.Assignment;
  variableNames: Identifier[];
  value: Expression;
}

export interface If extends NodeBase {
  kind: AstNodeKind.If;
  condition: Expression;
  body: Block;
}

export interface Case {
  location: SourceLocation;
  /** Absent for the default case. */
  value?: Literal;
  body: Block;
}

export interface Switch extends NodeBase {
  kind: AstNodeKind.Switch;
  expression: Expression;
  cases: Case[];
}

export interface ForLoop extends NodeBase {
  kind: AstNodeKind.ForLoop;
  pre: Block;
  condition: Expression;
  post: Block;
  body: Block;
}

export interface Break extends NodeBase {
  kind: AstNodeKind.Break;
}

export interface Continue extends NodeBase {
  kind: AstNodeKind.Continue;
}

export interface Leave extends NodeBase {
  kind: AstNodeKind.Leave;
}

export interface FunctionDefinition extends NodeBase {
  kind: AstNodeKind.FunctionDefinition;
  name: string;
  parameters: TypedName[];
  returnVariables: TypedName[];
  body: Block;
}

export type Statement =
  | ExpressionStatement
  | VariableDeclaration
  | Assignment
  | If
  | Switch
  | ForLoop
  | Break
  | Continue
  | Leave
  | FunctionDefinition
  | Block;

export interface DataBlob {
  name: string;
  location: SourceLocation;
  data: Uint8Array;
}

/**
 * A named unit: code plus nested objects and data blobs, in source order.
 */
export interface YulObject {
  name: string;
  location: SourceLocation;
  code: Block;
  subObjects: Array<YulObject | DataBlob>;
}

export function isYulObject(node: YulObject | DataBlob): node is YulObject {
  return "code" in node;
}

export function createIdentifier(
  name: string,
  location: SourceLocation = NO_LOCATION,
): Identifier {
  return { kind: AstNodeKind.Identifier, name, location };
}

export function createNumberLiteral(
  value: string,
  location: SourceLocation = NO_LOCATION,
): Literal {
  return {
    kind: AstNodeKind.Literal,
    literalKind: LiteralKind.Number,
    value,
    location,
  };
}

export function assertNever(value: never, context: string): never {
  throw new InternalCompilerError(`Unexpected ${context}: ${String(value)}`);
}
