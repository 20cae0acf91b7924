import { Instructions, swapInstruction } from "../../dialect/instructions.js";
import { assertInvariant, StackTooDeepError } from "../../errors/compile_errors.js";
import { AstWalker } from "../../frontend/ast_walker.js";
import {
  AstNodeKind,
  type FunctionDefinition,
  type Identifier,
  type Statement,
  type TypedName,
} from "../../frontend/ast.js";
import type { FunctionSymbol } from "../../frontend/scope.js";
import { JumpType, type LabelId } from "../abstract_assembly.js";
import { CodeTransform } from "./transform.js";

/** Highest stack slot index a SWAP can reach, plus one. */
const MAX_FUNCTION_FRAME = 17;

class IdentifierCollector extends AstWalker {
  readonly names = new Set<string>();

  override visitIdentifier(identifier: Identifier): void {
    this.names.add(identifier.name);
  }
}

/**
 * Return slots are allocated lazily: only a statement that may touch them
 * or leave the straight-line body forces the allocation.
 */
export function statementNeedsReturnVariableSetup(
  statement: Statement,
  returnVariables: TypedName[],
): boolean {
  if (statement.kind === AstNodeKind.FunctionDefinition) return true;
  if (
    statement.kind === AstNodeKind.ExpressionStatement ||
    statement.kind === AstNodeKind.Assignment
  ) {
    const collector = new IdentifierCollector();
    collector.visitStatement(statement);
    return returnVariables.some((variable) => collector.names.has(variable.name));
  }
  return true;
}

export function functionEntryId(this: CodeTransform, symbol: FunctionSymbol): LabelId {
  const existing = this.context.functionEntryIds.get(symbol);
  if (existing !== undefined) return existing;
  const id = this.useNamedLabelsForFunctions
    ? this.assembly.namedLabel(symbol.name)
    : this.assembly.newLabelId();
  this.context.functionEntryIds.set(symbol, id);
  return id;
}

export function visitFunctionDefinition(this: CodeTransform, fn: FunctionDefinition): void {
  assertInvariant(this.scope !== null, "Function definition outside of a block");
  const symbol = this.info.scopes.get(this.scope).identifiers.get(fn.name);
  assertInvariant(symbol?.kind === "function", `Function ${fn.name} not registered`);
  const functionScope = this.info.functionScopeOf(fn);

  // Return label at slot 0, then the arguments with the first one on top.
  let height = 1;
  for (let i = fn.parameters.length - 1; i >= 0; i -= 1) {
    const parameter = this.variableIn(functionScope, fn.parameters[i].name);
    this.context.variableStackHeights.set(parameter, height);
    height += 1;
  }

  this.assembly.setSourceLocation(fn.location);
  const stackHeightBefore = this.assembly.getStackHeight();
  this.assembly.appendLabel(this.functionEntryId(symbol));
  this.assembly.setStackHeight(height);

  const body = new CodeTransform(this.options, fn.body, this.context, {
    definition: fn,
    scope: functionScope,
  });
  if (this.allowStackOpt) {
    for (const parameter of fn.parameters) {
      const variable = this.variableIn(functionScope, parameter.name);
      if ((this.context.variableReferences.get(variable) ?? 0) === 0) {
        body.variablesScheduledForDeletion.add(variable);
      }
    }
  } else {
    body.setupReturnVariablesAndFunctionExit();
  }

  body.visitBlock(fn.body);
  if (body.returnSetupPending) body.setupReturnVariablesAndFunctionExit();
  body.appendFunctionExit();

  this.assembly.setSourceLocation(fn.location);
  this.assembly.appendJump(
    stackHeightBefore - fn.returnVariables.length,
    JumpType.OutOfFunction,
  );
  this.assembly.setStackHeight(stackHeightBefore);

  if (body.stackErrors.length > 0) {
    this.assembly.markAsInvalid();
    for (const error of body.stackErrors) {
      this.stackErrors.push(error.withFunctionName(fn.name));
    }
  }
}

/**
 * Allocate the return variables as if declared in the function scope and
 * fix the stack height every exit path jumps at.
 */
export function setupReturnVariablesAndFunctionExit(this: CodeTransform): void {
  assertInvariant(
    this.frame !== null && this.returnSetupPending,
    "Return variables already set up",
  );
  const { definition, scope } = this.frame;
  const outerScope = this.scope;
  this.scope = scope;

  let exitHeight = 1;
  for (const returnVariable of definition.returnVariables) {
    this.visitVariableDeclaration({
      kind: AstNodeKind.VariableDeclaration,
      location: returnVariable.location,
      variables: [returnVariable],
    });
    const slot = this.context.variableStackHeights.get(
      this.variableIn(scope, returnVariable.name),
    );
    assertInvariant(slot !== undefined, `Return variable ${returnVariable.name} has no slot`);
    exitHeight = Math.max(exitHeight, slot + 1);
  }

  this.functionExitStackHeight = exitHeight;
  this.functionExitLabel = this.assembly.newLabelId();
  this.returnSetupPending = false;
  this.scope = outerScope;
}

/**
 * Rearrange `<return label> <arguments...> <return values...>` into
 * `<return values...> <return label>` at the shared exit label.
 */
export function appendFunctionExit(this: CodeTransform): void {
  assertInvariant(
    this.frame !== null &&
      this.functionExitLabel !== null &&
      this.functionExitStackHeight !== null,
    "Function exit requested before setup",
  );
  const { definition, scope } = this.frame;

  this.appendPopUntil(this.functionExitStackHeight);
  this.assembly.setSourceLocation(definition.location);
  this.assembly.appendLabel(this.functionExitLabel);

  // Target position of each slot, kept parallel to the real stack.
  const layout = new Array<number>(this.assembly.getStackHeight()).fill(-1);
  layout[0] = definition.returnVariables.length;
  definition.returnVariables.forEach((returnVariable, index) => {
    const slot = this.context.variableStackHeights.get(
      this.variableIn(scope, returnVariable.name),
    );
    assertInvariant(slot !== undefined, `Return variable ${returnVariable.name} has no slot`);
    layout[slot] = index;
  });

  if (layout.length > MAX_FUNCTION_FRAME) {
    const excess = layout.length - MAX_FUNCTION_FRAME;
    this.stackError(
      new StackTooDeepError(
        excess,
        `The function ${definition.name} has ${excess} parameters or return variables too many to fit the stack size.`,
        undefined,
        definition.name,
      ),
      this.assembly.getStackHeight() - definition.parameters.length,
    );
    return;
  }

  while (layout.length > 0 && layout[layout.length - 1] !== layout.length - 1) {
    const last = layout.length - 1;
    const target = layout[last];
    if (target < 0) {
      this.assembly.appendInstruction(Instructions.POP);
      layout.pop();
    } else {
      this.assembly.appendInstruction(swapInstruction(last - target));
      layout[last] = layout[target];
      layout[target] = target;
    }
  }
  layout.forEach((target, index) => {
    assertInvariant(target === index, "Invalid stack layout at function exit");
  });
}
