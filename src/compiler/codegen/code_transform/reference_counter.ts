import { AstWalker } from "../../frontend/ast_walker.js";
import type {
  Block,
  ForLoop,
  FunctionDefinition,
  Identifier,
} from "../../frontend/ast.js";
import type { AnalysisInfo, ScopeId, VariableSymbol } from "../../frontend/scope.js";

/**
 * Counts reads and assignments of every variable. Return variables get one
 * extra reference so they are never freed before the function exit.
 */
export class VariableReferenceCounter extends AstWalker {
  private scope: ScopeId | null = null;
  private readonly references = new Map<VariableSymbol, number>();

  private constructor(private readonly info: AnalysisInfo) {
    super();
  }

  static run(info: AnalysisInfo, block: Block): Map<VariableSymbol, number> {
    const counter = new VariableReferenceCounter(info);
    counter.visitBlock(block);
    return counter.references;
  }

  override visitBlock(block: Block): void {
    const outer = this.scope;
    this.scope = this.info.scopeOf(block);
    super.visitBlock(block);
    this.scope = outer;
  }

  override visitFunctionDefinition(fn: FunctionDefinition): void {
    const outer = this.scope;
    this.scope = this.info.functionScopeOf(fn);
    for (const returnVariable of fn.returnVariables) {
      this.increaseReference(returnVariable.name);
    }
    super.visitFunctionDefinition(fn);
    this.scope = outer;
  }

  // Condition, body and post resolve in the init-clause scope.
  override visitForLoop(loop: ForLoop): void {
    const outer = this.scope;
    this.scope = this.info.scopeOf(loop.pre);
    for (const statement of loop.pre.statements) this.visitStatement(statement);
    this.visitExpression(loop.condition);
    this.visitBlock(loop.body);
    this.visitBlock(loop.post);
    this.scope = outer;
  }

  override visitIdentifier(identifier: Identifier): void {
    this.increaseReference(identifier.name);
  }

  private increaseReference(name: string): void {
    if (this.scope === null) return;
    const symbol = this.info.scopes.lookup(this.scope, name);
    if (symbol?.kind !== "variable") return;
    this.references.set(symbol, (this.references.get(symbol) ?? 0) + 1);
  }
}
