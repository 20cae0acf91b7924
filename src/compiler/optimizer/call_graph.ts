/**
 * Direct call graph of a block and the side effects it implies for every
 * user-defined function.
 */

import type { EvmDialect } from "../dialect/evm_dialect.js";
import { combineSideEffects, NO_SIDE_EFFECTS, type SideEffects } from "../dialect/side_effects.js";
import { AstWalker } from "../frontend/ast_walker.js";
import type { Block, ForLoop, FunctionCall, FunctionDefinition } from "../frontend/ast.js";

/** Name under which calls made outside of any function are recorded. */
export const TOP_LEVEL = "";

export interface CallGraph {
  /** Callees (builtins included) of each function. */
  functionCalls: Map<string, Set<string>>;
  functionsWithLoops: Set<string>;
}

export class CallGraphGenerator extends AstWalker {
  private readonly graph: CallGraph = {
    functionCalls: new Map([[TOP_LEVEL, new Set()]]),
    functionsWithLoops: new Set(),
  };
  private currentFunction = TOP_LEVEL;

  static callGraph(block: Block): CallGraph {
    const generator = new CallGraphGenerator();
    generator.visitBlock(block);
    return generator.graph;
  }

  override visitFunctionCall(call: FunctionCall): void {
    this.callees(this.currentFunction).add(call.functionName.name);
    super.visitFunctionCall(call);
  }

  override visitForLoop(loop: ForLoop): void {
    this.graph.functionsWithLoops.add(this.currentFunction);
    super.visitForLoop(loop);
  }

  override visitFunctionDefinition(fn: FunctionDefinition): void {
    const outer = this.currentFunction;
    this.currentFunction = fn.name;
    this.callees(fn.name);
    super.visitFunctionDefinition(fn);
    this.currentFunction = outer;
  }

  private callees(name: string): Set<string> {
    let callees = this.graph.functionCalls.get(name);
    if (!callees) {
      callees = new Set();
      this.graph.functionCalls.set(name, callees);
    }
    return callees;
  }
}

export class SideEffectsPropagator {
  /**
   * A function containing a loop, or taking part in a call cycle, might not
   * terminate and is therefore neither movable nor removable.
   */
  static sideEffects(dialect: EvmDialect, graph: CallGraph): Map<string, SideEffects> {
    const result = new Map<string, SideEffects>();
    for (const name of graph.functionsWithLoops) {
      result.set(name, {
        ...NO_SIDE_EFFECTS,
        movable: false,
        sideEffectFree: false,
        sideEffectFreeIfNoMSize: false,
      });
    }

    for (const [name, directCallees] of graph.functionCalls) {
      let effects: SideEffects = { ...NO_SIDE_EFFECTS };
      const visited = new Set<string>();
      const queue = [...directCallees];
      while (queue.length > 0) {
        const callee = queue.shift();
        if (callee === undefined || visited.has(callee)) continue;
        visited.add(callee);

        if (callee === name) {
          effects = { ...effects, movable: false, sideEffectFree: false, sideEffectFreeIfNoMSize: false };
        }
        const builtin = dialect.builtin(callee);
        if (builtin) {
          effects = combineSideEffects(effects, builtin.sideEffects);
          continue;
        }
        const known = result.get(callee);
        if (known) effects = combineSideEffects(effects, known);
        queue.push(...(graph.functionCalls.get(callee) ?? []));
      }
      result.set(name, combineSideEffects(result.get(name) ?? { ...NO_SIDE_EFFECTS }, effects));
    }
    return result;
  }
}
