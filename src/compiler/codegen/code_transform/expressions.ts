import { dupInstruction } from "../../dialect/instructions.js";
import { assertInvariant, InternalCompilerError } from "../../errors/compile_errors.js";
import {
  AstNodeKind,
  assertNever,
  type Expression,
  type FunctionCall,
  type Identifier,
  type Literal,
} from "../../frontend/ast.js";
import { valueOfLiteral } from "../../frontend/literals.js";
import { JumpType } from "../abstract_assembly.js";
import type { CodeTransform } from "./transform.js";

/** Visit an expression that must leave exactly one value. */
export function visitExpression(this: CodeTransform, expression: Expression): void {
  const height = this.assembly.getStackHeight();
  this.visitExpressionUnchecked(expression);
  this.expectDeposit(1, height);
}

export function visitExpressionUnchecked(this: CodeTransform, expression: Expression): void {
  switch (expression.kind) {
    case AstNodeKind.FunctionCall:
      return this.visitFunctionCall(expression);
    case AstNodeKind.Identifier:
      return this.visitIdentifier(expression);
    case AstNodeKind.Literal:
      return this.visitLiteral(expression);
    default:
      return assertNever(expression, "expression");
  }
}

export function visitFunctionCall(this: CodeTransform, call: FunctionCall): void {
  assertInvariant(this.scope !== null, "Function call outside of a block");
  const builtin = this.dialect.builtin(call.functionName.name);
  if (builtin) {
    builtin.generateCode(call, this.assembly, this.builtinContext, (argument) =>
      this.visitExpression(argument),
    );
    return;
  }

  this.assembly.setSourceLocation(call.location);
  const returnLabel = this.assembly.newLabelId();
  this.assembly.appendLabelReference(returnLabel);

  const symbol = this.info.scopes.lookup(this.scope, call.functionName.name);
  if (symbol?.kind !== "function") {
    throw new InternalCompilerError(`Function ${call.functionName.name} not found`);
  }
  assertInvariant(
    symbol.parameters === call.arguments.length,
    `Argument count mismatch calling ${symbol.name}`,
  );
  for (let i = call.arguments.length - 1; i >= 0; i -= 1) {
    this.visitExpression(call.arguments[i]);
  }
  this.assembly.setSourceLocation(call.location);
  this.assembly.appendJumpTo(
    this.functionEntryId(symbol),
    symbol.returns - symbol.parameters - 1,
    JumpType.IntoFunction,
  );
  this.assembly.appendLabel(returnLabel);
}

export function visitIdentifier(this: CodeTransform, identifier: Identifier): void {
  this.assembly.setSourceLocation(identifier.location);
  const variable = this.lookupVariable(identifier.name);
  const heightDiff = this.variableHeightDiff(variable, false);
  if (heightDiff > 0) {
    this.assembly.appendInstruction(dupInstruction(heightDiff));
  } else {
    // keeps the stack balanced after a stack error
    this.assembly.appendConstant(0n);
  }
  this.decreaseReference(variable);
}

export function visitLiteral(this: CodeTransform, literal: Literal): void {
  this.assembly.setSourceLocation(literal.location);
  this.assembly.appendConstant(valueOfLiteral(literal));
}
