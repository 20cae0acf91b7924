import { Instructions } from "../../dialect/instructions.js";
import {
  assertInvariant,
  InternalCompilerError,
  StackTooDeepError,
} from "../../errors/compile_errors.js";
import type { ScopeId, VariableSymbol } from "../../frontend/scope.js";
import type { CodeTransform } from "./transform.js";

const DUP_LIMIT = 16;
const SWAP_LIMIT = 17;

export function variableIn(
  this: CodeTransform,
  scope: ScopeId,
  name: string,
): VariableSymbol {
  const symbol = this.info.scopes.get(scope).identifiers.get(name);
  if (symbol?.kind !== "variable") {
    throw new InternalCompilerError(`Variable ${name} not declared in scope ${scope}`);
  }
  return symbol;
}

export function lookupVariable(this: CodeTransform, name: string): VariableSymbol {
  assertInvariant(this.scope !== null, "Variable lookup outside of a block");
  const symbol = this.info.scopes.lookup(this.scope, name);
  if (symbol?.kind !== "variable") {
    throw new InternalCompilerError(`Expected ${name} to resolve to a variable`);
  }
  return symbol;
}

/**
 * Distance from the top of the stack to the variable's slot, or 0 after
 * recording a stack error when DUP or SWAP cannot reach it.
 */
export function variableHeightDiff(
  this: CodeTransform,
  variable: VariableSymbol,
  forSwap: boolean,
): number {
  const height = this.context.variableStackHeights.get(variable);
  assertInvariant(height !== undefined, `Variable ${variable.name} has no stack slot`);
  const heightDiff = this.assembly.getStackHeight() - height;
  assertInvariant(
    heightDiff > (forSwap ? 1 : 0),
    `Negative stack difference for variable ${variable.name}`,
  );
  const limit = forSwap ? SWAP_LIMIT : DUP_LIMIT;
  if (heightDiff > limit) {
    const depth = heightDiff - limit;
    this.stackErrors.push(
      new StackTooDeepError(
        depth,
        `Variable ${variable.name} is ${depth} slot(s) too deep inside the stack.`,
        variable.name,
      ),
    );
    this.assembly.markAsInvalid();
    return 0;
  }
  return heightDiff;
}

export function decreaseReference(this: CodeTransform, variable: VariableSymbol): void {
  if (!this.allowStackOpt) return;
  const references = this.context.variableReferences.get(variable) ?? 0;
  assertInvariant(references >= 1, `Reference count of ${variable.name} underflowed`);
  this.context.variableReferences.set(variable, references - 1);
  if (references === 1) this.variablesScheduledForDeletion.add(variable);
}

export function deleteVariable(this: CodeTransform, variable: VariableSymbol): void {
  assertInvariant(this.allowStackOpt, "Variables are only freed with stack optimization");
  const height = this.context.variableStackHeights.get(variable);
  assertInvariant(height !== undefined, `Deleting unallocated variable ${variable.name}`);
  this.unusedStackSlots.add(height);
  this.context.variableStackHeights.delete(variable);
  this.context.variableReferences.delete(variable);
  this.variablesScheduledForDeletion.delete(variable);
}

/**
 * Release the scheduled variables of the current scope, then pop unused
 * slots off the top of the stack.
 */
export function freeUnusedVariables(this: CodeTransform, popUnusedSlotsAtTop = true): void {
  if (!this.allowStackOpt || this.scope === null) return;

  const deleteScheduled = (scope: ScopeId): void => {
    for (const variable of this.info.scopes.variables(scope)) {
      if (this.variablesScheduledForDeletion.has(variable)) this.deleteVariable(variable);
    }
  };

  if (!this.pinnedScopes.has(this.scope)) deleteScheduled(this.scope);

  // Parameters live in the function scope and may go until return slots exist.
  const current = this.info.scopes.get(this.scope);
  if (
    this.functionExitStackHeight === null &&
    !current.isFunctionScope &&
    current.parent !== null &&
    this.info.scopes.get(current.parent).isFunctionScope
  ) {
    deleteScheduled(current.parent);
  }

  if (!popUnusedSlotsAtTop) return;
  while (this.unusedStackSlots.has(this.assembly.getStackHeight() - 1)) {
    this.unusedStackSlots.delete(this.assembly.getStackHeight() - 1);
    this.assembly.appendInstruction(Instructions.POP);
  }
}

/** Returns the number of slots popped. */
export function appendPopUntil(this: CodeTransform, targetHeight: number): number {
  const stackDiffAfter = this.assembly.getStackHeight() - targetHeight;
  for (let i = 0; i < stackDiffAfter; i += 1) {
    this.assembly.appendInstruction(Instructions.POP);
  }
  return stackDiffAfter;
}

export function expectDeposit(this: CodeTransform, deposit: number, oldHeight: number): void {
  const actual = this.assembly.getStackHeight() - oldHeight;
  assertInvariant(
    actual === deposit,
    `Invalid stack deposit. Expected ${deposit} but got ${actual}`,
  );
}

/** Emit INVALID, force the stack to the target height and record the error. */
export function stackError(
  this: CodeTransform,
  error: StackTooDeepError,
  targetHeight: number,
): void {
  this.assembly.appendInstruction(Instructions.INVALID);
  while (this.assembly.getStackHeight() > targetHeight) {
    this.assembly.appendInstruction(Instructions.POP);
  }
  while (this.assembly.getStackHeight() < targetHeight) {
    this.assembly.appendConstant(0n);
  }
  this.stackErrors.push(error);
  this.assembly.markAsInvalid();
}
