/**
 * Target emitter interface used by the stack-machine code generator
 */

import type { Instruction } from "../dialect/instructions.js";
import type { SourceLocation } from "../frontend/ast.js";

export type LabelId = number;
/** Handle to a sub-assembly or data blob; only meaningful to its issuer. */
export type SubId = number;

export enum JumpType {
  Ordinary = "Ordinary",
  IntoFunction = "IntoFunction",
  OutOfFunction = "OutOfFunction",
}

export interface AbstractAssembly {
  setSourceLocation(location: SourceLocation): void;
  /** Net number of stack slots produced so far. */
  getStackHeight(): number;
  setStackHeight(height: number): void;

  appendInstruction(instruction: Instruction): void;
  appendConstant(value: bigint): void;
  appendLabel(label: LabelId): void;
  appendLabelReference(label: LabelId): void;
  newLabelId(): LabelId;
  namedLabel(name: string): LabelId;
  appendLinkerSymbol(name: string): void;

  /** Append JUMP; the stack height afterwards is adjusted by `stackDiffAfter`. */
  appendJump(stackDiffAfter: number, jumpType?: JumpType): void;
  appendJumpTo(label: LabelId, stackDiffAfter?: number, jumpType?: JumpType): void;
  appendJumpToIf(label: LabelId, jumpType?: JumpType): void;

  appendBeginsub(label: LabelId, args: number): void;
  appendJumpsub(label: LabelId, args: number, returns: number): void;
  appendReturnsub(returns: number, stackDiffAfter: number): void;

  appendAssemblySize(): void;
  createSubAssembly(): [AbstractAssembly, SubId];
  appendDataOffset(sub: SubId): void;
  appendDataSize(sub: SubId): void;
  appendData(data: Uint8Array): SubId;

  appendImmutable(identifier: string): void;
  appendImmutableAssignment(identifier: string): void;

  markAsInvalid(): void;
}
