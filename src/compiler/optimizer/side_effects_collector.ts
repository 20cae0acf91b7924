/**
 * Walkers that summarize what a piece of code reads, writes or assigns
 */

import type { EvmDialect } from "../dialect/evm_dialect.js";
import {
  combineSideEffects,
  NO_SIDE_EFFECTS,
  type SideEffects,
  WORST_SIDE_EFFECTS,
} from "../dialect/side_effects.js";
import { InternalCompilerError } from "../errors/compile_errors.js";
import { AstWalker } from "../frontend/ast_walker.js";
import type {
  Assignment,
  Block,
  Continue,
  Expression,
  ForLoop,
  FunctionCall,
  FunctionDefinition,
  Identifier,
  Statement,
} from "../frontend/ast.js";

export type FunctionSideEffects = ReadonlyMap<string, SideEffects>;

export class SideEffectsCollector extends AstWalker {
  sideEffects: SideEffects = { ...NO_SIDE_EFFECTS };

  constructor(
    protected readonly dialect: EvmDialect,
    protected readonly functionSideEffects: FunctionSideEffects = new Map(),
  ) {
    super();
  }

  static ofExpression(
    dialect: EvmDialect,
    expression: Expression,
    functionSideEffects?: FunctionSideEffects,
  ): SideEffects {
    const collector = new SideEffectsCollector(dialect, functionSideEffects);
    collector.visitExpression(expression);
    return collector.sideEffects;
  }

  static ofBlock(
    dialect: EvmDialect,
    block: Block,
    functionSideEffects?: FunctionSideEffects,
  ): SideEffects {
    const collector = new SideEffectsCollector(dialect, functionSideEffects);
    collector.visitBlock(block);
    return collector.sideEffects;
  }

  override visitFunctionCall(call: FunctionCall): void {
    super.visitFunctionCall(call);
    const name = call.functionName.name;
    const builtin = this.dialect.builtin(name);
    const effects = builtin?.sideEffects ?? this.functionSideEffects.get(name) ?? WORST_SIDE_EFFECTS;
    this.sideEffects = combineSideEffects(this.sideEffects, effects);
  }
}

/** Collects side effects and the variables an expression reads. */
export class MovableChecker extends SideEffectsCollector {
  readonly referencedVariables = new Set<string>();

  get movable(): boolean {
    return this.sideEffects.movable;
  }

  override visitIdentifier(identifier: Identifier): void {
    this.referencedVariables.add(identifier.name);
  }

  override visitStatement(_statement: Statement): void {
    throw new InternalCompilerError("MovableChecker only inspects expressions");
  }
}

export class MSizeFinder extends AstWalker {
  private found = false;

  private constructor(private readonly dialect: EvmDialect) {
    super();
  }

  static containsMSize(dialect: EvmDialect, block: Block): boolean {
    const finder = new MSizeFinder(dialect);
    finder.visitBlock(block);
    return finder.found;
  }

  override visitFunctionCall(call: FunctionCall): void {
    if (this.dialect.builtin(call.functionName.name)?.isMSize) this.found = true;
    super.visitFunctionCall(call);
  }
}

/** Names assigned to (not declared) anywhere in the visited code. */
export class Assignments extends AstWalker {
  readonly names = new Set<string>();

  override visitAssignment(assignment: Assignment): void {
    for (const name of assignment.variableNames) this.names.add(name.name);
  }
}

/**
 * Names assigned after the first `continue` of the visited loop body;
 * `continue` statements of nested loops do not count.
 */
export class AssignmentsSinceContinue extends AstWalker {
  readonly names = new Set<string>();
  private forLoopDepth = 0;
  private continueFound = false;

  override visitForLoop(loop: ForLoop): void {
    this.forLoopDepth += 1;
    super.visitForLoop(loop);
    this.forLoopDepth -= 1;
  }

  override visitContinue(_statement: Continue): void {
    if (this.forLoopDepth === 0) this.continueFound = true;
  }

  override visitAssignment(assignment: Assignment): void {
    if (this.continueFound) {
      for (const name of assignment.variableNames) this.names.add(name.name);
    }
  }

  override visitFunctionDefinition(_fn: FunctionDefinition): void {}
}
