/**
 * Binds the target emitter interface to an EvmAssembly
 */

import { bytesToHex } from "@noble/hashes/utils";
import {
  MalformedInputError,
  UnsupportedOperationError,
  assertInvariant,
} from "../errors/compile_errors.js";
import type { SourceLocation } from "../frontend/ast.js";
import { type Instruction, Instructions } from "../dialect/instructions.js";
import {
  type AbstractAssembly,
  JumpType,
  type LabelId,
  type SubId,
} from "./abstract_assembly.js";
import { EvmAssembly } from "./evm_assembly.js";

/** Data SubIds live above this value so they never collide with sub-assembly indices. */
const DATA_SUB_ID_BASE = 2 ** 30;

export class EvmAssemblyAdapter implements AbstractAssembly {
  private readonly dataHashBySubId = new Map<SubId, string>();
  private readonly subIdByContent = new Map<string, SubId>();
  private readonly dataSizeBySubId = new Map<SubId, number>();
  private nextDataSubId = DATA_SUB_ID_BASE;

  constructor(readonly assembly: EvmAssembly = new EvmAssembly()) {}

  setSourceLocation(location: SourceLocation): void {
    this.assembly.setSourceLocation(location);
  }

  getStackHeight(): number {
    return this.assembly.getDeposit();
  }

  setStackHeight(height: number): void {
    this.assembly.setDeposit(height);
  }

  appendInstruction(instruction: Instruction): void {
    this.assembly.appendOperation(instruction);
  }

  appendConstant(value: bigint): void {
    this.assembly.appendPush(value);
  }

  appendLabel(label: LabelId): void {
    this.assembly.appendTag(label);
  }

  appendLabelReference(label: LabelId): void {
    this.assembly.appendPushTag(label);
  }

  newLabelId(): LabelId {
    return this.assembly.newTag();
  }

  namedLabel(name: string): LabelId {
    return this.assembly.namedTag(name);
  }

  appendLinkerSymbol(name: string): void {
    this.assembly.appendLibraryAddress(name);
  }

  appendJump(stackDiffAfter: number, jumpType = JumpType.Ordinary): void {
    this.assembly.appendOperation(Instructions.JUMP, jumpType);
    this.assembly.adjustDeposit(stackDiffAfter);
  }

  appendJumpTo(label: LabelId, stackDiffAfter = 0, jumpType = JumpType.Ordinary): void {
    this.appendLabelReference(label);
    this.appendJump(stackDiffAfter, jumpType);
  }

  appendJumpToIf(label: LabelId, jumpType = JumpType.Ordinary): void {
    this.appendLabelReference(label);
    this.assembly.appendOperation(Instructions.JUMPI, jumpType);
  }

  appendBeginsub(_label: LabelId, _args: number): void {
    throw new UnsupportedOperationError("Subroutines are not supported by the EVM backend");
  }

  appendJumpsub(_label: LabelId, _args: number, _returns: number): void {
    throw new UnsupportedOperationError("Subroutines are not supported by the EVM backend");
  }

  appendReturnsub(_returns: number, _stackDiffAfter: number): void {
    throw new UnsupportedOperationError("Subroutines are not supported by the EVM backend");
  }

  appendAssemblySize(): void {
    this.assembly.appendProgramSize();
  }

  createSubAssembly(): [AbstractAssembly, SubId] {
    const sub = new EvmAssembly();
    const subId = this.assembly.newSub(sub);
    assertInvariant(subId < DATA_SUB_ID_BASE, "Too many sub-assemblies");
    return [new EvmAssemblyAdapter(sub), subId];
  }

  appendDataOffset(sub: SubId): void {
    const hash = this.dataHashBySubId.get(sub);
    if (hash !== undefined) {
      this.assembly.appendPushData(hash);
      return;
    }
    this.assertOwnSub(sub);
    this.assembly.appendPushSub(sub);
  }

  appendDataSize(sub: SubId): void {
    const size = this.dataSizeBySubId.get(sub);
    if (size !== undefined) {
      this.assembly.appendPush(BigInt(size));
      return;
    }
    this.assertOwnSub(sub);
    this.assembly.appendPushSubSize(sub);
  }

  /** Identical contents share one SubId. */
  appendData(data: Uint8Array): SubId {
    const key = bytesToHex(data);
    const existing = this.subIdByContent.get(key);
    if (existing !== undefined) return existing;
    const subId = this.nextDataSubId;
    this.nextDataSubId += 1;
    this.dataHashBySubId.set(subId, this.assembly.newData(data));
    this.dataSizeBySubId.set(subId, data.length);
    this.subIdByContent.set(key, subId);
    return subId;
  }

  appendImmutable(identifier: string): void {
    this.assembly.appendImmutable(identifier);
  }

  appendImmutableAssignment(identifier: string): void {
    this.assembly.appendImmutableAssignment(identifier);
  }

  markAsInvalid(): void {
    this.assembly.markAsInvalid();
  }

  private assertOwnSub(sub: SubId): void {
    if (!Number.isInteger(sub) || sub < 0 || this.assembly.getSub(sub) === undefined) {
      throw new MalformedInputError(`Unknown SubId ${sub} for this assembly`);
    }
  }
}
