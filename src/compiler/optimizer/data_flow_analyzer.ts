/**
 * Forward dataflow tracker over the AST
 *
 * Tracks the current value of movable variable assignments, which
 * variables those values reference, and which storage and memory slots are
 * known to hold which variable. Subclasses may rewrite expressions while
 * the walk is in progress.
 */

import type { EvmDialect } from "../dialect/evm_dialect.js";
import { assertInvariant } from "../errors/compile_errors.js";
import {
  type Assignment,
  AstNodeKind,
  type Block,
  createNumberLiteral,
  type Expression,
  type ExpressionStatement,
  type ForLoop,
  type FunctionDefinition,
  type If,
  type Switch,
  type VariableDeclaration,
} from "../frontend/ast.js";
import { AstModifier } from "../frontend/ast_walker.js";
import { KnowledgeBase } from "./knowledge_base.js";
import {
  Assignments,
  AssignmentsSinceContinue,
  type FunctionSideEffects,
  MovableChecker,
  SideEffectsCollector,
} from "./side_effects_collector.js";

export enum StoreLoadLocation {
  Memory = "Memory",
  Storage = "Storage",
}

interface VariableScope {
  variables: Set<string>;
  isFunction: boolean;
}

export class DataFlowAnalyzer extends AstModifier {
  protected value = new Map<string, Expression>();
  /** Variables referenced by the current value of each variable. */
  protected references = new Map<string, Set<string>>();
  protected storage = new Map<string, string>();
  protected memory = new Map<string, string>();
  protected variableScopes: VariableScope[] = [];
  protected readonly knowledgeBase: KnowledgeBase;
  private readonly zero = createNumberLiteral("0");

  constructor(
    protected readonly dialect: EvmDialect,
    protected readonly functionSideEffects: FunctionSideEffects = new Map(),
  ) {
    super();
    this.knowledgeBase = new KnowledgeBase((name) => this.value.get(name));
  }

  override visitExpressionStatement(statement: ExpressionStatement): void {
    const storageStore = this.isSimpleStore(StoreLoadLocation.Storage, statement);
    if (storageStore) {
      super.visitExpressionStatement(statement);
      const [key, value] = storageStore;
      for (const [otherKey, otherValue] of this.storage) {
        if (
          !this.knowledgeBase.knownToBeDifferent(key, otherKey) &&
          !this.knowledgeBase.knownToBeEqual(value, otherValue)
        ) {
          this.storage.delete(otherKey);
        }
      }
      this.storage.set(key, value);
      return;
    }

    const memoryStore = this.isSimpleStore(StoreLoadLocation.Memory, statement);
    if (memoryStore) {
      super.visitExpressionStatement(statement);
      const [key, value] = memoryStore;
      for (const otherKey of [...this.memory.keys()]) {
        if (!this.knowledgeBase.knownToBeDifferentByAtLeast32(key, otherKey)) {
          this.memory.delete(otherKey);
        }
      }
      this.memory.set(key, value);
      return;
    }

    this.clearKnowledgeIfInvalidated(statement.expression);
    super.visitExpressionStatement(statement);
  }

  override visitAssignment(assignment: Assignment): void {
    const names = new Set(assignment.variableNames.map((name) => name.name));
    this.clearKnowledgeIfInvalidated(assignment.value);
    assignment.value = this.visitExpression(assignment.value);
    this.handleAssignment(names, assignment.value, false);
  }

  override visitVariableDeclaration(declaration: VariableDeclaration): void {
    const names = new Set(declaration.variables.map((variable) => variable.name));
    const scope = this.currentScope();
    for (const name of names) scope.variables.add(name);

    if (declaration.value) {
      this.clearKnowledgeIfInvalidated(declaration.value);
      declaration.value = this.visitExpression(declaration.value);
    }
    this.handleAssignment(names, declaration.value, true);
  }

  override visitIf(statement: If): void {
    this.clearKnowledgeIfInvalidated(statement.condition);
    const storage = new Map(this.storage);
    const memory = new Map(this.memory);

    super.visitIf(statement);

    this.joinKnowledge(storage, memory);
    const assignments = new Assignments();
    assignments.visitBlock(statement.body);
    this.clearValues(assignments.names);
  }

  override visitSwitch(statement: Switch): void {
    this.clearKnowledgeIfInvalidated(statement.expression);
    statement.expression = this.visitExpression(statement.expression);
    const assignedVariables = new Set<string>();
    for (const c of statement.cases) {
      const storage = new Map(this.storage);
      const memory = new Map(this.memory);
      this.visitBlock(c.body);
      this.joinKnowledge(storage, memory);

      const assignments = new Assignments();
      assignments.visitBlock(c.body);
      for (const name of assignments.names) assignedVariables.add(name);
      this.clearValues(assignments.names);
      this.clearKnowledgeIfInvalidated(c.body);
    }
    for (const c of statement.cases) this.clearKnowledgeIfInvalidated(c.body);
    this.clearValues(assignedVariables);
  }

  override visitFunctionDefinition(fn: FunctionDefinition): void {
    const saved = {
      value: this.value,
      references: this.references,
      storage: this.storage,
      memory: this.memory,
    };
    this.value = new Map();
    this.references = new Map();
    this.storage = new Map();
    this.memory = new Map();
    this.pushScope(true);

    for (const parameter of fn.parameters) this.currentScope().variables.add(parameter.name);
    for (const returnVariable of fn.returnVariables) {
      this.currentScope().variables.add(returnVariable.name);
      this.handleAssignment(new Set([returnVariable.name]), undefined, true);
    }
    super.visitFunctionDefinition(fn);

    // Return variables, storage and memory may be stale here since `leave` is not tracked.
    this.popScope();
    this.value = saved.value;
    this.references = saved.references;
    this.storage = saved.storage;
    this.memory = saved.memory;
  }

  /**
   * The init block opens a scope around the whole loop and runs once before
   * it; everything the loop may change is forgotten at entry and exit.
   */
  override visitForLoop(loop: ForLoop): void {
    this.pushScope(false);
    for (const statement of loop.pre.statements) this.visitStatement(statement);

    const assignmentsSinceContinue = new AssignmentsSinceContinue();
    assignmentsSinceContinue.visitBlock(loop.body);

    const assignments = new Assignments();
    assignments.visitBlock(loop.body);
    assignments.visitBlock(loop.post);
    this.clearValues(assignments.names);

    this.clearKnowledgeIfInvalidated(loop.condition);
    this.clearKnowledgeIfInvalidated(loop.post);
    this.clearKnowledgeIfInvalidated(loop.body);

    loop.condition = this.visitExpression(loop.condition);
    this.visitBlock(loop.body);
    this.clearValues(assignmentsSinceContinue.names);
    this.clearKnowledgeIfInvalidated(loop.body);
    this.visitBlock(loop.post);
    this.clearValues(assignments.names);
    this.clearKnowledgeIfInvalidated(loop.condition);
    this.clearKnowledgeIfInvalidated(loop.post);
    this.clearKnowledgeIfInvalidated(loop.body);

    this.popScope();
  }

  override visitBlock(block: Block): void {
    const depth = this.variableScopes.length;
    this.pushScope(false);
    super.visitBlock(block);
    this.popScope();
    assertInvariant(this.variableScopes.length === depth, "Unbalanced variable scopes after block");
  }

  protected handleAssignment(
    variables: Set<string>,
    value: Expression | undefined,
    isDeclaration: boolean,
  ): void {
    if (!isDeclaration) this.clearValues(variables);

    const movableChecker = new MovableChecker(this.dialect, this.functionSideEffects);
    if (value) {
      movableChecker.visitExpression(value);
    } else {
      for (const name of variables) this.assignValue(name, this.zero);
    }

    const [single] = variables;
    if (
      value &&
      variables.size === 1 &&
      single !== undefined &&
      movableChecker.movable &&
      !movableChecker.referencedVariables.has(single)
    ) {
      this.assignValue(single, value);
    }

    for (const name of variables) {
      this.references.set(name, new Set(movableChecker.referencedVariables));
      if (isDeclaration) continue;
      // The slot denoted by the variable, and slots holding its old value.
      this.storage.delete(name);
      for (const [key, stored] of this.storage) {
        if (stored === name) this.storage.delete(key);
      }
      this.memory.delete(name);
      for (const [key, stored] of this.memory) {
        if (stored === name) this.memory.delete(key);
      }
    }
  }

  protected pushScope(isFunction: boolean): void {
    this.variableScopes.push({ variables: new Set(), isFunction });
  }

  /** Storage and memory entries naming a leaving variable go with it. */
  protected popScope(): void {
    const scope = this.variableScopes.pop();
    if (!scope) return;
    this.clearValues(scope.variables);
  }

  /**
   * Forget the values of the given variables and of every variable whose
   * value references one of them (not transitively).
   */
  protected clearValues(variables: ReadonlySet<string>): void {
    for (const map of [this.storage, this.memory]) {
      for (const [key, stored] of map) {
        if (variables.has(key) || variables.has(stored)) map.delete(key);
      }
    }

    const toClear = new Set(variables);
    for (const name of variables) {
      for (const [referrer, referenced] of this.references) {
        if (referenced.has(name)) toClear.add(referrer);
      }
    }
    for (const name of toClear) {
      this.value.delete(name);
      this.references.delete(name);
    }
  }

  protected assignValue(variable: string, value: Expression): void {
    this.value.set(variable, value);
  }

  protected clearKnowledgeIfInvalidated(node: Expression | Block): void {
    const effects =
      node.kind === AstNodeKind.Block
        ? SideEffectsCollector.ofBlock(this.dialect, node, this.functionSideEffects)
        : SideEffectsCollector.ofExpression(this.dialect, node, this.functionSideEffects);
    if (effects.invalidatesStorage) this.storage.clear();
    if (effects.invalidatesMemory) this.memory.clear();
  }

  /** Keep only the entries present and unchanged since the older state. */
  protected joinKnowledge(
    olderStorage: ReadonlyMap<string, string>,
    olderMemory: ReadonlyMap<string, string>,
  ): void {
    for (const [current, older] of [
      [this.storage, olderStorage],
      [this.memory, olderMemory],
    ] as const) {
      for (const [key, value] of current) {
        if (older.get(key) !== value) current.delete(key);
      }
    }
  }

  /** True if the variable is declared in an enclosing scope of the current function. */
  protected inScope(variableName: string): boolean {
    for (let i = this.variableScopes.length - 1; i >= 0; i -= 1) {
      const scope = this.variableScopes[i];
      if (scope.variables.has(variableName)) return true;
      if (scope.isFunction) return false;
    }
    return false;
  }

  protected isSimpleStore(
    location: StoreLoadLocation,
    statement: ExpressionStatement,
  ): [string, string] | null {
    const expression = statement.expression;
    if (expression.kind !== AstNodeKind.FunctionCall) return null;
    const storeName =
      location === StoreLoadLocation.Storage
        ? this.dialect.storageStoreFunctionName
        : this.dialect.memoryStoreFunctionName;
    if (expression.functionName.name !== storeName) return null;
    const key = expression.arguments[0];
    const value = expression.arguments[expression.arguments.length - 1];
    if (key?.kind !== AstNodeKind.Identifier || value?.kind !== AstNodeKind.Identifier) {
      return null;
    }
    return [key.name, value.name];
  }

  private currentScope(): VariableScope {
    const scope = this.variableScopes.at(-1);
    assertInvariant(scope !== undefined, "Declaration outside of any scope");
    return scope;
  }
}
