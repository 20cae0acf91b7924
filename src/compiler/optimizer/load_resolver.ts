/**
 * Replaces `sload(x)` and `mload(x)` by the variable known to hold the
 * stored value, and folds `keccak256(p, 32)` when the hashed word is a
 * known constant.
 */

import { keccak_256 } from "@noble/hashes/sha3";
import { bytesToHex } from "@noble/hashes/utils";
import type { EvmDialect } from "../dialect/evm_dialect.js";
import { MalformedInputError } from "../errors/compile_errors.js";
import {
  AstNodeKind,
  type Block,
  createIdentifier,
  createNumberLiteral,
  type Expression,
  type FunctionCall,
} from "../frontend/ast.js";
import { valueOfLiteral } from "../frontend/literals.js";
import { CallGraphGenerator, SideEffectsPropagator } from "./call_graph.js";
import { DataFlowAnalyzer, StoreLoadLocation } from "./data_flow_analyzer.js";
import { type FunctionSideEffects, MSizeFinder } from "./side_effects_collector.js";

const WORD_BYTES = 32;

function toBigEndianWord(value: bigint): Uint8Array {
  const out = new Uint8Array(WORD_BYTES);
  let v = value;
  for (let i = WORD_BYTES - 1; i >= 0; i -= 1) {
    out[i] = Number(v & 0xffn);
    v >>= 8n;
  }
  return out;
}

export function keccakOfWord(value: bigint): bigint {
  return BigInt(`0x${bytesToHex(keccak_256(toBigEndianWord(value)))}`);
}

export class LoadResolver extends DataFlowAnalyzer {
  /** Number of expressions replaced so far. */
  rewrites = 0;

  constructor(
    dialect: EvmDialect,
    functionSideEffects: FunctionSideEffects,
    private readonly optimizeMLoad: boolean,
  ) {
    super(dialect, functionSideEffects);
  }

  /** Rewrites the block in place and returns the number of replacements. */
  static run(dialect: EvmDialect, block: Block): number {
    const containsMSize = MSizeFinder.containsMSize(dialect, block);
    const resolver = new LoadResolver(
      dialect,
      SideEffectsPropagator.sideEffects(dialect, CallGraphGenerator.callGraph(block)),
      !containsMSize,
    );
    resolver.visitBlock(block);
    return resolver.rewrites;
  }

  override visitExpression(expression: Expression): Expression {
    const visited = super.visitExpression(expression);
    if (visited.kind !== AstNodeKind.FunctionCall) return visited;

    switch (visited.functionName.name) {
      case this.dialect.memoryLoadFunctionName:
        return this.tryResolve(visited, StoreLoadLocation.Memory);
      case this.dialect.storageLoadFunctionName:
        return this.tryResolve(visited, StoreLoadLocation.Storage);
      case this.dialect.hashFunctionName:
        return this.tryEvaluateKeccak(visited);
      default:
        return visited;
    }
  }

  private tryResolve(call: FunctionCall, location: StoreLoadLocation): Expression {
    this.expectArguments(call, 1);
    const [key] = call.arguments;
    if (key.kind !== AstNodeKind.Identifier) return call;
    if (location === StoreLoadLocation.Memory && !this.optimizeMLoad) return call;

    const known =
      location === StoreLoadLocation.Storage
        ? this.storage.get(key.name)
        : this.memory.get(key.name);
    if (known === undefined || !this.inScope(known)) return call;
    this.rewrites += 1;
    return createIdentifier(known, call.location);
  }

  private tryEvaluateKeccak(call: FunctionCall): Expression {
    this.expectArguments(call, 2);
    const [memoryKey, length] = call.arguments;
    if (memoryKey.kind !== AstNodeKind.Identifier || length.kind !== AstNodeKind.Identifier) {
      return call;
    }

    const memoryValue = this.memory.get(memoryKey.name);
    if (memoryValue === undefined || !this.inScope(memoryValue)) return call;
    const content = this.literalValueOf(memoryValue);
    if (content === null || this.literalValueOf(length.name) !== 32n) return call;

    this.rewrites += 1;
    return createNumberLiteral(keccakOfWord(content).toString(), call.location);
  }

  private literalValueOf(name: string): bigint | null {
    const assigned = this.value.get(name);
    if (assigned?.kind !== AstNodeKind.Literal) return null;
    return valueOfLiteral(assigned);
  }

  private expectArguments(call: FunctionCall, count: number): void {
    if (call.arguments.length !== count) {
      throw new MalformedInputError(
        `${call.functionName.name} expects ${count} argument(s), got ${call.arguments.length}`,
      );
    }
  }
}
