/**
 * Scope arena and analysis-info sidecar
 */

import { InternalCompilerError } from "../errors/compile_errors.js";
import type { Block, FunctionDefinition } from "./ast.js";

export type ScopeId = number;

export interface VariableSymbol {
  kind: "variable";
  id: number;
  name: string;
  scope: ScopeId;
}

export interface FunctionSymbol {
  kind: "function";
  id: number;
  name: string;
  scope: ScopeId;
  parameters: number;
  returns: number;
}

export type ScopeSymbol = VariableSymbol | FunctionSymbol;

export interface Scope {
  id: ScopeId;
  parent: ScopeId | null;
  /** Virtual scope holding a function's parameters and return variables. */
  isFunctionScope: boolean;
  identifiers: Map<string, ScopeSymbol>;
}

/**
 * Scopes chained by index. A variable of an outer scope is not visible
 * from inside a function defined below it; functions are.
 */
export class ScopeArena {
  private readonly scopes: Scope[] = [];
  private nextSymbolId = 0;

  create(parent: ScopeId | null, isFunctionScope = false): ScopeId {
    const id = this.scopes.length;
    this.scopes.push({ id, parent, isFunctionScope, identifiers: new Map() });
    return id;
  }

  get(id: ScopeId): Scope {
    const scope = this.scopes[id];
    if (!scope) throw new InternalCompilerError(`Unknown scope ${id}`);
    return scope;
  }

  get size(): number {
    return this.scopes.length;
  }

  registerVariable(scope: ScopeId, name: string): VariableSymbol {
    const symbol: VariableSymbol = {
      kind: "variable",
      id: this.nextSymbolId++,
      name,
      scope,
    };
    this.get(scope).identifiers.set(name, symbol);
    return symbol;
  }

  registerFunction(
    scope: ScopeId,
    name: string,
    parameters: number,
    returns: number,
  ): FunctionSymbol {
    const symbol: FunctionSymbol = {
      kind: "function",
      id: this.nextSymbolId++,
      name,
      scope,
      parameters,
      returns,
    };
    this.get(scope).identifiers.set(name, symbol);
    return symbol;
  }

  lookup(scope: ScopeId, name: string): ScopeSymbol | undefined {
    let crossedFunctionBoundary = false;
    for (let id: ScopeId | null = scope; id !== null; id = this.get(id).parent) {
      const current = this.get(id);
      const symbol = current.identifiers.get(name);
      if (symbol) {
        if (crossedFunctionBoundary && symbol.kind === "variable") return undefined;
        return symbol;
      }
      if (current.isFunctionScope) crossedFunctionBoundary = true;
    }
    return undefined;
  }

  /** True if the name is declared in this scope or any enclosing one. */
  exists(scope: ScopeId, name: string): boolean {
    for (let id: ScopeId | null = scope; id !== null; id = this.get(id).parent) {
      if (this.get(id).identifiers.has(name)) return true;
    }
    return false;
  }

  variables(scope: ScopeId): VariableSymbol[] {
    const result: VariableSymbol[] = [];
    for (const symbol of this.get(scope).identifiers.values()) {
      if (symbol.kind === "variable") result.push(symbol);
    }
    return result;
  }

  /** True if the scope is nested inside a function (or is one). */
  insideFunction(scope: ScopeId): boolean {
    for (let id: ScopeId | null = scope; id !== null; id = this.get(id).parent) {
      if (this.get(id).isFunctionScope) return true;
    }
    return false;
  }
}

export class AnalysisInfo {
  readonly scopes = new ScopeArena();
  readonly blockScopes = new Map<Block, ScopeId>();
  readonly functionScopes = new Map<FunctionDefinition, ScopeId>();

  scopeOf(block: Block): ScopeId {
    const scope = this.blockScopes.get(block);
    if (scope === undefined) {
      throw new InternalCompilerError("Scope requested for unanalyzed block");
    }
    return scope;
  }

  functionScopeOf(fn: FunctionDefinition): ScopeId {
    const scope = this.functionScopes.get(fn);
    if (scope === undefined) {
      throw new InternalCompilerError(`Function scope missing for ${fn.name}`);
    }
    return scope;
  }
}
