/**
 * Answers questions about variable values using the dataflow value map.
 * Values are resolved to `base + offset` where `base` is a variable of
 * unknown value (or nothing, for constants).
 */

import { AstNodeKind, type Expression } from "../frontend/ast.js";
import { valueOfLiteral } from "../frontend/literals.js";

const WORD = 1n << 256n;
const MAX_RESOLVE_DEPTH = 32;

interface SymbolicValue {
  base: string | null;
  offset: bigint;
}

const wrap = (value: bigint): bigint => ((value % WORD) + WORD) % WORD;

export type ValueLookup = (name: string) => Expression | undefined;

export class KnowledgeBase {
  constructor(private readonly valueOf: ValueLookup) {}

  knownToBeDifferent(a: string, b: string): boolean {
    const difference = this.difference(a, b);
    return difference !== null && difference !== 0n;
  }

  /** True if the two values are at least 32 apart, in either direction. */
  knownToBeDifferentByAtLeast32(a: string, b: string): boolean {
    const difference = this.difference(a, b);
    return difference !== null && difference >= 32n && difference <= WORD - 32n;
  }

  knownToBeEqual(a: string, b: string): boolean {
    return a === b;
  }

  private difference(a: string, b: string): bigint | null {
    const left = this.resolve(a, 0);
    const right = this.resolve(b, 0);
    if (left.base !== right.base) return null;
    return wrap(left.offset - right.offset);
  }

  private resolve(name: string, depth: number): SymbolicValue {
    const value = depth < MAX_RESOLVE_DEPTH ? this.valueOf(name) : undefined;
    const resolved = value ? this.resolveExpression(value, depth + 1) : null;
    return resolved ?? { base: name, offset: 0n };
  }

  private resolveExpression(expression: Expression, depth: number): SymbolicValue | null {
    switch (expression.kind) {
      case AstNodeKind.Literal:
        return { base: null, offset: valueOfLiteral(expression) };
      case AstNodeKind.Identifier:
        return this.resolve(expression.name, depth);
      case AstNodeKind.FunctionCall: {
        const name = expression.functionName.name;
        if ((name !== "add" && name !== "sub") || expression.arguments.length !== 2) return null;
        const left = this.resolveExpression(expression.arguments[0], depth + 1);
        const right = this.resolveExpression(expression.arguments[1], depth + 1);
        if (!left || !right) return null;
        if (name === "add") {
          if (left.base !== null && right.base !== null) return null;
          return { base: left.base ?? right.base, offset: wrap(left.offset + right.offset) };
        }
        if (right.base === null) return { base: left.base, offset: wrap(left.offset - right.offset) };
        if (left.base === right.base) return { base: null, offset: wrap(left.offset - right.offset) };
        return null;
      }
    }
  }
}
