/**
 * In-memory EVM assembly: items, tags, sub-assemblies and data, assembled
 * to bytecode with tag resolution.
 */

import { keccak_256 } from "@noble/hashes/sha3";
import { bytesToHex } from "@noble/hashes/utils";
import { InternalCompilerError, assertInvariant } from "../errors/compile_errors.js";
import { NO_LOCATION, type SourceLocation } from "../frontend/ast.js";
import {
  Instructions,
  type Instruction,
  pushInstruction,
  stackDelta,
} from "../dialect/instructions.js";
import { JumpType } from "./abstract_assembly.js";

export enum AssemblyItemType {
  Operation = "Operation",
  Push = "Push",
  PushTag = "PushTag",
  Tag = "Tag",
  PushSub = "PushSub",
  PushSubSize = "PushSubSize",
  PushData = "PushData",
  PushProgramSize = "PushProgramSize",
  PushLibraryAddress = "PushLibraryAddress",
  PushImmutable = "PushImmutable",
  AssignImmutable = "AssignImmutable",
}

export type AssemblyItem = { location: SourceLocation } & (
  | { type: AssemblyItemType.Operation; instruction: Instruction; jumpType: JumpType }
  | { type: AssemblyItemType.Push; value: bigint }
  | { type: AssemblyItemType.PushTag; tag: number }
  | { type: AssemblyItemType.Tag; tag: number }
  | { type: AssemblyItemType.PushSub; sub: number }
  | { type: AssemblyItemType.PushSubSize; sub: number }
  | { type: AssemblyItemType.PushData; hash: string }
  | { type: AssemblyItemType.PushProgramSize }
  | { type: AssemblyItemType.PushLibraryAddress; name: string }
  | { type: AssemblyItemType.PushImmutable; name: string }
  | { type: AssemblyItemType.AssignImmutable; name: string }
);

/** Assembled output of one assembly, sub-assemblies included. */
export interface LinkerObject {
  bytecode: Uint8Array;
  /** Byte offset of each 20-byte library address placeholder. */
  linkReferences: Map<number, string>;
  /** Byte offsets of each 32-byte immutable placeholder in this code. */
  immutableReferences: Map<string, number[]>;
}

const LIBRARY_ADDRESS_BYTES = 20;
const IMMUTABLE_BYTES = 32;
const MAX_ADDRESS_WIDTH = 4;

export function bytesRequired(value: bigint): number {
  let bytes = 1;
  for (let v = value >> 8n; v > 0n; v >>= 8n) bytes += 1;
  return bytes;
}

function toBigEndian(value: bigint, width: number): number[] {
  const out = new Array<number>(width).fill(0);
  let v = value;
  for (let i = width - 1; i >= 0; i -= 1) {
    out[i] = Number(v & 0xffn);
    v >>= 8n;
  }
  assertInvariant(v === 0n, `Value ${value} does not fit into ${width} bytes`);
  return out;
}

export class EvmAssembly {
  private items: AssemblyItem[] = [];
  private deposit = 0;
  private nextTag = 1;
  private readonly tagNames = new Map<number, string>();
  private readonly subs: EvmAssembly[] = [];
  private readonly data = new Map<string, Uint8Array>();
  private location: SourceLocation = NO_LOCATION;
  private invalid = false;

  getItems(): readonly AssemblyItem[] {
    return this.items;
  }

  getDeposit(): number {
    return this.deposit;
  }

  setDeposit(deposit: number): void {
    this.deposit = deposit;
  }

  adjustDeposit(diff: number): void {
    this.deposit += diff;
  }

  setSourceLocation(location: SourceLocation): void {
    this.location = location;
  }

  markAsInvalid(): void {
    this.invalid = true;
  }

  isInvalid(): boolean {
    return this.invalid;
  }

  newTag(): number {
    const tag = this.nextTag;
    this.nextTag += 1;
    return tag;
  }

  namedTag(name: string): number {
    const tag = this.newTag();
    this.tagNames.set(tag, name);
    return tag;
  }

  appendOperation(instruction: Instruction, jumpType = JumpType.Ordinary): void {
    this.push({ type: AssemblyItemType.Operation, instruction, jumpType, location: this.location });
    this.deposit += stackDelta(instruction);
  }

  appendPush(value: bigint): void {
    this.pushValueItem({ type: AssemblyItemType.Push, value, location: this.location });
  }

  appendTag(tag: number): void {
    this.push({ type: AssemblyItemType.Tag, tag, location: this.location });
  }

  appendPushTag(tag: number): void {
    this.pushValueItem({ type: AssemblyItemType.PushTag, tag, location: this.location });
  }

  newSub(assembly: EvmAssembly): number {
    this.subs.push(assembly);
    return this.subs.length - 1;
  }

  getSub(index: number): EvmAssembly | undefined {
    return this.subs[index];
  }

  appendPushSub(sub: number): void {
    this.pushValueItem({ type: AssemblyItemType.PushSub, sub, location: this.location });
  }

  appendPushSubSize(sub: number): void {
    this.pushValueItem({ type: AssemblyItemType.PushSubSize, sub, location: this.location });
  }

  /** Registers a data blob and returns its content hash. */
  newData(bytes: Uint8Array): string {
    const hash = bytesToHex(keccak_256(bytes));
    this.data.set(hash, bytes);
    return hash;
  }

  appendPushData(hash: string): void {
    this.pushValueItem({ type: AssemblyItemType.PushData, hash, location: this.location });
  }

  appendProgramSize(): void {
    this.pushValueItem({ type: AssemblyItemType.PushProgramSize, location: this.location });
  }

  appendLibraryAddress(name: string): void {
    this.pushValueItem({ type: AssemblyItemType.PushLibraryAddress, name, location: this.location });
  }

  appendImmutable(name: string): void {
    this.pushValueItem({ type: AssemblyItemType.PushImmutable, name, location: this.location });
  }

  appendImmutableAssignment(name: string): void {
    this.push({ type: AssemblyItemType.AssignImmutable, name, location: this.location });
    this.deposit -= 1;
  }

  private push(item: AssemblyItem): void {
    this.items.push(item);
  }

  private pushValueItem(item: AssemblyItem): void {
    this.items.push(item);
    this.deposit += 1;
  }

  assemble(): LinkerObject {
    if (this.invalid) {
      throw new InternalCompilerError("Attempted to assemble invalid code");
    }

    const subObjects = this.subs.map((sub) => sub.assemble());
    const subImmutables = new Map<string, number[]>();
    for (const sub of subObjects) {
      for (const [name, offsets] of sub.immutableReferences) {
        subImmutables.set(name, [...(subImmutables.get(name) ?? []), ...offsets]);
      }
    }
    const subsSize = subObjects.reduce((sum, sub) => sum + sub.bytecode.length, 0);
    const dataSize = [...this.data.values()].reduce((sum, d) => sum + d.length, 0);

    let width = 1;
    let layout = this.layout(width, subObjects, subImmutables);
    while (layout.codeSize + subsSize + dataSize >= 256 ** width) {
      width += 1;
      assertInvariant(width <= MAX_ADDRESS_WIDTH, "Assembly too large");
      layout = this.layout(width, subObjects, subImmutables);
    }

    const programSize = BigInt(layout.codeSize + subsSize + dataSize);
    const subOffsets: number[] = [];
    let offset = layout.codeSize;
    for (const sub of subObjects) {
      subOffsets.push(offset);
      offset += sub.bytecode.length;
    }
    const dataOffsets = new Map<string, number>();
    for (const [hash, bytes] of this.data) {
      dataOffsets.set(hash, offset);
      offset += bytes.length;
    }

    const code: number[] = [];
    const linkReferences = new Map<number, string>();
    const immutableReferences = new Map<string, number[]>();
    const pushWide = (value: bigint | number) => {
      code.push(pushInstruction(width).opcode, ...toBigEndian(BigInt(value), width));
    };
    const pushMinimal = (value: bigint | number) => {
      const bytes = bytesRequired(BigInt(value));
      code.push(pushInstruction(bytes).opcode, ...toBigEndian(BigInt(value), bytes));
    };

    for (const item of this.items) {
      switch (item.type) {
        case AssemblyItemType.Operation:
          code.push(item.instruction.opcode);
          break;
        case AssemblyItemType.Push:
          pushMinimal(item.value);
          break;
        case AssemblyItemType.Tag:
          code.push(Instructions.JUMPDEST.opcode);
          break;
        case AssemblyItemType.PushTag: {
          const position = layout.tagPositions.get(item.tag);
          if (position === undefined) {
            throw new InternalCompilerError(`Reference to undefined tag ${item.tag}`);
          }
          pushWide(position);
          break;
        }
        case AssemblyItemType.PushSub:
          pushWide(this.subOffset(subOffsets, item.sub));
          break;
        case AssemblyItemType.PushSubSize:
          pushMinimal(this.subObject(subObjects, item.sub).bytecode.length);
          break;
        case AssemblyItemType.PushData: {
          const dataOffset = dataOffsets.get(item.hash);
          if (dataOffset === undefined) {
            throw new InternalCompilerError(`Reference to unknown data ${item.hash}`);
          }
          pushWide(dataOffset);
          break;
        }
        case AssemblyItemType.PushProgramSize:
          pushWide(programSize);
          break;
        case AssemblyItemType.PushLibraryAddress:
          code.push(Instructions.PUSH20.opcode);
          linkReferences.set(code.length, item.name);
          code.push(...new Array<number>(LIBRARY_ADDRESS_BYTES).fill(0));
          break;
        case AssemblyItemType.PushImmutable:
          code.push(Instructions.PUSH32.opcode);
          immutableReferences.set(item.name, [
            ...(immutableReferences.get(item.name) ?? []),
            code.length,
          ]);
          code.push(...new Array<number>(IMMUTABLE_BYTES).fill(0));
          break;
        case AssemblyItemType.AssignImmutable:
          for (const target of subImmutables.get(item.name) ?? []) {
            code.push(Instructions.DUP1.opcode);
            pushMinimal(target);
            code.push(Instructions.MSTORE.opcode);
          }
          code.push(Instructions.POP.opcode);
          break;
      }
    }
    assertInvariant(code.length === layout.codeSize, "Assembled code size mismatch");

    subObjects.forEach((sub, index) => {
      for (const [position, name] of sub.linkReferences) {
        linkReferences.set(subOffsets[index] + position, name);
      }
      code.push(...sub.bytecode);
    });
    for (const bytes of this.data.values()) code.push(...bytes);

    return {
      bytecode: Uint8Array.from(code),
      linkReferences,
      immutableReferences,
    };
  }

  private layout(
    width: number,
    subObjects: LinkerObject[],
    subImmutables: Map<string, number[]>,
  ): { codeSize: number; tagPositions: Map<number, number> } {
    const tagPositions = new Map<number, number>();
    let size = 0;
    for (const item of this.items) {
      switch (item.type) {
        case AssemblyItemType.Operation:
          size += 1;
          break;
        case AssemblyItemType.Tag:
          tagPositions.set(item.tag, size);
          size += 1;
          break;
        case AssemblyItemType.Push:
          size += 1 + bytesRequired(item.value);
          break;
        case AssemblyItemType.PushTag:
        case AssemblyItemType.PushSub:
        case AssemblyItemType.PushData:
        case AssemblyItemType.PushProgramSize:
          size += 1 + width;
          break;
        case AssemblyItemType.PushSubSize:
          size += 1 + bytesRequired(BigInt(this.subObject(subObjects, item.sub).bytecode.length));
          break;
        case AssemblyItemType.PushLibraryAddress:
          size += 1 + LIBRARY_ADDRESS_BYTES;
          break;
        case AssemblyItemType.PushImmutable:
          size += 1 + IMMUTABLE_BYTES;
          break;
        case AssemblyItemType.AssignImmutable:
          for (const target of subImmutables.get(item.name) ?? []) {
            size += 3 + bytesRequired(BigInt(target));
          }
          size += 1;
          break;
      }
    }
    return { codeSize: size, tagPositions };
  }

  private subObject(subObjects: LinkerObject[], index: number): LinkerObject {
    const sub = subObjects[index];
    if (sub === undefined) {
      throw new InternalCompilerError(`Reference to unknown sub-assembly ${index}`);
    }
    return sub;
  }

  private subOffset(offsets: number[], index: number): number {
    const offset = offsets[index];
    if (offset === undefined) {
      throw new InternalCompilerError(`Reference to unknown sub-assembly ${index}`);
    }
    return offset;
  }

  private tagLabel(tag: number): string {
    const name = this.tagNames.get(tag);
    return name === undefined ? `tag_${tag}` : `${name}_${tag}`;
  }

  toString(indent = ""): string {
    const lines: string[] = [];
    for (const item of this.items) {
      lines.push(indent + this.formatItem(item));
    }
    this.subs.forEach((sub, index) => {
      lines.push(`${indent}sub_${index}: assembly {`);
      lines.push(sub.toString(`${indent}    `));
      lines.push(`${indent}}`);
    });
    for (const [hash, bytes] of this.data) {
      lines.push(`${indent}data_${hash.slice(0, 8)}: ${bytesToHex(bytes)}`);
    }
    return lines.join("\n");
  }

  private formatItem(item: AssemblyItem): string {
    switch (item.type) {
      case AssemblyItemType.Operation: {
        const name = item.instruction.name.toLowerCase();
        if (item.jumpType === JumpType.IntoFunction) return `  ${name}\t// in`;
        if (item.jumpType === JumpType.OutOfFunction) return `  ${name}\t// out`;
        return `  ${name}`;
      }
      case AssemblyItemType.Push:
        return `  0x${item.value.toString(16)}`;
      case AssemblyItemType.Tag:
        return `${this.tagLabel(item.tag)}:`;
      case AssemblyItemType.PushTag:
        return `  ${this.tagLabel(item.tag)}`;
      case AssemblyItemType.PushSub:
        return `  dataOffset(sub_${item.sub})`;
      case AssemblyItemType.PushSubSize:
        return `  dataSize(sub_${item.sub})`;
      case AssemblyItemType.PushData:
        return `  data_${item.hash.slice(0, 8)}`;
      case AssemblyItemType.PushProgramSize:
        return "  bytecodeSize";
      case AssemblyItemType.PushLibraryAddress:
        return `  linkerSymbol("${item.name}")`;
      case AssemblyItemType.PushImmutable:
        return `  immutable("${item.name}")`;
      case AssemblyItemType.AssignImmutable:
        return `  assignImmutable("${item.name}")`;
    }
  }
}
