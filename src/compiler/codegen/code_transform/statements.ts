import { Instructions, swapInstruction } from "../../dialect/instructions.js";
import { assertInvariant } from "../../errors/compile_errors.js";
import {
  type Assignment,
  AstNodeKind,
  assertNever,
  type Block,
  type Break,
  type Continue,
  type ExpressionStatement,
  type ForLoop,
  type Identifier,
  type If,
  type Leave,
  type SourceLocation,
  type Statement,
  type Switch,
  type VariableDeclaration,
} from "../../frontend/ast.js";
import type { LabelId } from "../abstract_assembly.js";
import type { ForLoopLabels } from "./context.js";
import { statementNeedsReturnVariableSetup } from "./functions.js";
import type { CodeTransform } from "./transform.js";

export function visitBlock(this: CodeTransform, block: Block): void {
  const outerScope = this.scope;
  this.scope = this.info.scopeOf(block);
  const blockStartHeight = this.assembly.getStackHeight();

  this.visitStatements(block.statements);

  // The outermost block of a function body hands its slots to the exit shuffle.
  const scope = this.info.scopes.get(this.scope);
  const isOutermostFunctionBodyBlock =
    scope.parent !== null && this.info.scopes.get(scope.parent).isFunctionScope;
  const performValidation = !this.allowStackOpt || !isOutermostFunctionBodyBlock;

  this.finalizeBlock(block, performValidation ? blockStartHeight : null);
  this.scope = outerScope;
}

/**
 * Function definitions are emitted inline; a run of consecutive
 * definitions is skipped over with a single jump.
 */
export function visitStatements(this: CodeTransform, statements: Statement[]): void {
  let jumpTarget: LabelId | null = null;

  for (const statement of statements) {
    this.freeUnusedVariables();
    if (
      this.returnSetupPending &&
      this.frame &&
      statementNeedsReturnVariableSetup(statement, this.frame.definition.returnVariables)
    ) {
      this.setupReturnVariablesAndFunctionExit();
    }

    const isFunctionDefinition = statement.kind === AstNodeKind.FunctionDefinition;
    if (isFunctionDefinition && jumpTarget === null) {
      this.assembly.setSourceLocation(statement.location);
      jumpTarget = this.assembly.newLabelId();
      this.assembly.appendJumpTo(jumpTarget, 0);
    } else if (!isFunctionDefinition && jumpTarget !== null) {
      this.assembly.appendLabel(jumpTarget);
      jumpTarget = null;
    }

    this.visitStatement(statement);
  }
  if (jumpTarget !== null) this.assembly.appendLabel(jumpTarget);

  this.freeUnusedVariables();
}

export function visitStatement(this: CodeTransform, statement: Statement): void {
  switch (statement.kind) {
    case AstNodeKind.Block:
      return this.visitBlock(statement);
    case AstNodeKind.ExpressionStatement:
      return this.visitExpressionStatement(statement);
    case AstNodeKind.VariableDeclaration:
      return this.visitVariableDeclaration(statement);
    case AstNodeKind.Assignment:
      return this.visitAssignment(statement);
    case AstNodeKind.If:
      return this.visitIf(statement);
    case AstNodeKind.Switch:
      return this.visitSwitch(statement);
    case AstNodeKind.ForLoop:
      return this.visitForLoop(statement);
    case AstNodeKind.Break:
      return this.visitBreak(statement);
    case AstNodeKind.Continue:
      return this.visitContinue(statement);
    case AstNodeKind.Leave:
      return this.visitLeave(statement);
    case AstNodeKind.FunctionDefinition:
      return this.visitFunctionDefinition(statement);
    default:
      return assertNever(statement, "statement");
  }
}

export function finalizeBlock(
  this: CodeTransform,
  block: Block,
  blockStartHeight: number | null,
): void {
  this.assembly.setSourceLocation(block.location);
  this.freeUnusedVariables();

  const scope = this.info.scopeOf(block);
  assertInvariant(scope === this.scope, "Finalizing a block outside of its scope");
  for (const variable of this.info.scopes.variables(scope)) {
    if (this.allowStackOpt) {
      assertInvariant(
        !this.context.variableStackHeights.has(variable),
        `Variable ${variable.name} still allocated at end of block`,
      );
    } else {
      this.assembly.appendInstruction(Instructions.POP);
    }
  }

  if (blockStartHeight !== null) {
    const deposit = this.assembly.getStackHeight() - blockStartHeight;
    assertInvariant(deposit === 0, `Invalid stack height at end of block: ${deposit}`);
  }
}

export function visitExpressionStatement(
  this: CodeTransform,
  statement: ExpressionStatement,
): void {
  this.assembly.setSourceLocation(statement.location);
  this.visitExpressionUnchecked(statement.expression);
}

export function visitVariableDeclaration(
  this: CodeTransform,
  declaration: VariableDeclaration,
): void {
  assertInvariant(this.scope !== null, "Declaration outside of a block");
  const scope = this.scope;
  const count = declaration.variables.length;
  const heightAtStart = this.assembly.getStackHeight();

  if (declaration.value) {
    this.visitExpressionUnchecked(declaration.value);
    this.expectDeposit(count, heightAtStart);
    this.freeUnusedVariables(false);
  } else {
    this.assembly.setSourceLocation(declaration.location);
    for (let i = 0; i < count; i += 1) this.assembly.appendConstant(0n);
  }

  const pinned = this.pinnedScopes.has(scope);
  let atTopOfStack = true;
  for (let index = count - 1; index >= 0; index -= 1) {
    const variable = this.variableIn(scope, declaration.variables[index].name);
    this.context.variableStackHeights.set(variable, heightAtStart + index);
    if (!this.allowStackOpt) continue;

    if ((this.context.variableReferences.get(variable) ?? 0) === 0) {
      if (atTopOfStack && !pinned) {
        this.context.variableStackHeights.delete(variable);
        this.assembly.setSourceLocation(declaration.location);
        this.assembly.appendInstruction(Instructions.POP);
      } else {
        this.variablesScheduledForDeletion.add(variable);
        atTopOfStack = false;
      }
    } else if (this.unusedStackSlots.size === 0) {
      atTopOfStack = false;
    } else {
      const slot = Math.min(...this.unusedStackSlots);
      this.unusedStackSlots.delete(slot);
      this.context.variableStackHeights.set(variable, slot);
      this.assembly.setSourceLocation(declaration.location);
      const heightDiff = this.variableHeightDiff(variable, true);
      if (heightDiff > 0) this.assembly.appendInstruction(swapInstruction(heightDiff - 1));
      this.assembly.appendInstruction(Instructions.POP);
    }
  }
}

export function visitAssignment(this: CodeTransform, assignment: Assignment): void {
  const height = this.assembly.getStackHeight();
  this.visitExpressionUnchecked(assignment.value);
  this.expectDeposit(assignment.variableNames.length, height);

  this.assembly.setSourceLocation(assignment.location);
  for (let i = assignment.variableNames.length - 1; i >= 0; i -= 1) {
    this.generateAssignment(assignment.variableNames[i]);
  }
}

/** Store the top of the stack into the variable's slot. */
export function generateAssignment(this: CodeTransform, target: Identifier): void {
  const variable = this.lookupVariable(target.name);
  const heightDiff = this.variableHeightDiff(variable, true);
  if (heightDiff > 0) this.assembly.appendInstruction(swapInstruction(heightDiff - 1));
  this.assembly.appendInstruction(Instructions.POP);
  this.decreaseReference(variable);
}

export function visitIf(this: CodeTransform, statement: If): void {
  this.visitExpression(statement.condition);
  this.assembly.setSourceLocation(statement.location);
  this.assembly.appendInstruction(Instructions.ISZERO);
  const end = this.assembly.newLabelId();
  this.assembly.appendJumpToIf(end);
  this.visitBlock(statement.body);
  this.assembly.setSourceLocation(statement.location);
  this.assembly.appendLabel(end);
}

/**
 * Compare chain on a copy of the switch value. The default body follows
 * the chain directly; case bodies come after it in source order.
 */
export function visitSwitch(this: CodeTransform, statement: Switch): void {
  this.visitExpression(statement.expression);
  const expressionHeight = this.assembly.getStackHeight();
  const caseBodies: Array<{ label: LabelId; body: Block; location: SourceLocation }> = [];
  const end = this.assembly.newLabelId();

  for (const c of statement.cases) {
    if (c.value) {
      this.visitLiteral(c.value);
      this.assembly.setSourceLocation(c.location);
      const label = this.assembly.newLabelId();
      caseBodies.push({ label, body: c.body, location: c.location });
      assertInvariant(
        this.assembly.getStackHeight() === expressionHeight + 1,
        "Case value must deposit one slot",
      );
      this.assembly.appendInstruction(Instructions.DUP2);
      this.assembly.appendInstruction(Instructions.EQ);
      this.assembly.appendJumpToIf(label);
    } else {
      this.visitBlock(c.body);
    }
  }
  this.assembly.setSourceLocation(statement.location);
  this.assembly.appendJumpTo(end);

  caseBodies.forEach((c, index) => {
    this.assembly.setSourceLocation(c.location);
    this.assembly.appendLabel(c.label);
    this.visitBlock(c.body);
    if (index < caseBodies.length - 1) {
      this.assembly.setSourceLocation(c.location);
      this.assembly.appendJumpTo(end);
    }
  });

  this.assembly.setSourceLocation(statement.location);
  this.assembly.appendLabel(end);
  assertInvariant(
    this.assembly.getStackHeight() === expressionHeight,
    "Switch branches must join at equal stack heights",
  );
  this.assembly.appendInstruction(Instructions.POP);
}

/**
 * The init block stays open for the whole loop. Its variables are pinned
 * so their slots are not released or reused before the loop exits.
 */
export function visitForLoop(this: CodeTransform, loop: ForLoop): void {
  const outerScope = this.scope;
  const preScope = this.info.scopeOf(loop.pre);
  this.scope = preScope;
  const startHeight = this.assembly.getStackHeight();

  this.pinnedScopes.add(preScope);
  this.visitStatements(loop.pre.statements);

  const loopStart = this.assembly.newLabelId();
  const postPart = this.assembly.newLabelId();
  const loopEnd = this.assembly.newLabelId();

  this.assembly.setSourceLocation(loop.location);
  this.assembly.appendLabel(loopStart);

  this.visitExpression(loop.condition);
  this.assembly.setSourceLocation(loop.location);
  this.assembly.appendInstruction(Instructions.ISZERO);
  this.assembly.appendJumpToIf(loopEnd);

  const bodyHeight = this.assembly.getStackHeight();
  this.context.forLoopStack.push({
    post: { label: postPart, targetStackHeight: bodyHeight },
    done: { label: loopEnd, targetStackHeight: bodyHeight },
  });
  this.visitBlock(loop.body);

  this.assembly.setSourceLocation(loop.location);
  this.assembly.appendLabel(postPart);
  this.visitBlock(loop.post);

  this.assembly.setSourceLocation(loop.location);
  this.assembly.appendJumpTo(loopStart);
  this.assembly.appendLabel(loopEnd);

  this.pinnedScopes.delete(preScope);
  this.finalizeBlock(loop.pre, startHeight);
  this.context.forLoopStack.pop();
  this.scope = outerScope;
}

function currentLoop(transform: CodeTransform): ForLoopLabels {
  const loop = transform.context.forLoopStack.at(-1);
  assertInvariant(loop !== undefined, "Jump statement outside of a for-loop");
  return loop;
}

export function visitBreak(this: CodeTransform, statement: Break): void {
  this.assembly.setSourceLocation(statement.location);
  const { done } = currentLoop(this);
  this.assembly.appendJumpTo(done.label, this.appendPopUntil(done.targetStackHeight));
}

export function visitContinue(this: CodeTransform, statement: Continue): void {
  this.assembly.setSourceLocation(statement.location);
  const { post } = currentLoop(this);
  this.assembly.appendJumpTo(post.label, this.appendPopUntil(post.targetStackHeight));
}

export function visitLeave(this: CodeTransform, statement: Leave): void {
  assertInvariant(
    this.functionExitLabel !== null && this.functionExitStackHeight !== null,
    "Leave outside of a function body",
  );
  this.assembly.setSourceLocation(statement.location);
  this.assembly.appendJumpTo(
    this.functionExitLabel,
    this.appendPopUntil(this.functionExitStackHeight),
  );
}
