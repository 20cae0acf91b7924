import { bytesToHex } from "@noble/hashes/utils";
import { describe, expect, it } from "vitest";
import {
  disassemble,
  EvmAssembly,
  EvmAssemblyAdapter,
  InternalCompilerError,
  JumpType,
  MalformedInputError,
  UnsupportedOperationError,
} from "../../../src/compiler/index.js";
import { instruction, Instructions } from "../../../src/compiler/dialect/instructions.js";

describe("EvmAssembly", () => {
  it("pushes constants with the minimal width", () => {
    const assembly = new EvmAssembly();
    assembly.appendPush(0n);
    assembly.appendPush(0x1234n);
    expect(bytesToHex(assembly.assemble().bytecode)).toBe("6000611234");
  });

  it("tracks the stack deposit", () => {
    const assembly = new EvmAssembly();
    assembly.appendPush(1n);
    assembly.appendPush(2n);
    assembly.appendOperation(instruction("ADD"));
    expect(assembly.getDeposit()).toBe(1);
    assembly.appendOperation(Instructions.POP);
    expect(assembly.getDeposit()).toBe(0);
  });

  it("resolves tags and places sub-assemblies after the code", () => {
    const assembly = new EvmAssembly();
    const tag = assembly.newTag();
    assembly.appendPushTag(tag);
    assembly.appendOperation(Instructions.JUMP);
    assembly.appendTag(tag);
    assembly.appendPush(255n);
    const sub = new EvmAssembly();
    sub.appendOperation(Instructions.INVALID);
    assembly.appendPushSub(assembly.newSub(sub));

    expect(bytesToHex(assembly.assemble().bytecode)).toBe("6003565b60ff6008fe");
    expect(assembly.toString()).toBe(
      "  tag_1\n  jump\ntag_1:\n  0xff\n  dataOffset(sub_0)\nsub_0: assembly {\n      invalid\n}",
    );
  });

  it("widens tag pushes once the code outgrows one byte", () => {
    const assembly = new EvmAssembly();
    const tag = assembly.newTag();
    assembly.appendPushTag(tag);
    for (let i = 0; i < 300; i += 1) assembly.appendOperation(Instructions.POP);
    assembly.appendTag(tag);

    const { bytecode } = assembly.assemble();
    expect(bytecode.length).toBe(304);
    expect(Array.from(bytecode.slice(0, 3))).toEqual([0x61, 0x01, 0x2f]);
  });

  it("pushes the total program size", () => {
    const assembly = new EvmAssembly();
    assembly.appendProgramSize();
    assembly.appendOperation(Instructions.POP);
    expect(bytesToHex(assembly.assemble().bytecode)).toBe("600350");
  });

  it("records library address placeholders", () => {
    const assembly = new EvmAssembly();
    assembly.appendLibraryAddress("lib.sol:Math");
    const linked = assembly.assemble();
    expect(linked.bytecode.length).toBe(21);
    expect(linked.bytecode[0]).toBe(Instructions.PUSH20.opcode);
    expect([...linked.linkReferences]).toEqual([[1, "lib.sol:Math"]]);
  });

  it("writes immutables into the sub-assembly placeholders", () => {
    const assembly = new EvmAssembly();
    const sub = new EvmAssembly();
    sub.appendImmutable("owner");
    assembly.newSub(sub);
    assembly.appendPush(5n);
    assembly.appendImmutableAssignment("owner");

    expect(bytesToHex(assembly.assemble().bytecode)).toBe(
      `600580600152507f${"00".repeat(32)}`,
    );
    expect([...sub.assemble().immutableReferences]).toEqual([["owner", [1]]]);
  });

  it("refuses to assemble invalid code", () => {
    const assembly = new EvmAssembly();
    assembly.markAsInvalid();
    expect(() => assembly.assemble()).toThrow(InternalCompilerError);
  });
});

describe("EvmAssemblyAdapter", () => {
  it("adjusts the stack height after jumps", () => {
    const adapter = new EvmAssemblyAdapter();
    adapter.appendConstant(1n);
    adapter.appendConstant(2n);
    const label = adapter.newLabelId();
    adapter.appendJumpTo(label, -1, JumpType.IntoFunction);
    adapter.appendLabel(label);

    expect(adapter.getStackHeight()).toBe(1);
    expect(adapter.assembly.toString()).toBe("  0x1\n  0x2\n  tag_1\n  jump\t// in\ntag_1:");
  });

  it("does not support subroutine instructions", () => {
    const adapter = new EvmAssemblyAdapter();
    expect(() => adapter.appendBeginsub(1, 0)).toThrow(UnsupportedOperationError);
    expect(() => adapter.appendJumpsub(1, 0, 0)).toThrow(UnsupportedOperationError);
    expect(() => adapter.appendReturnsub(0, 0)).toThrow(UnsupportedOperationError);
  });

  it("rejects SubIds it did not issue", () => {
    const adapter = new EvmAssemblyAdapter();
    expect(() => adapter.appendDataOffset(99)).toThrow(MalformedInputError);
    expect(() => adapter.appendDataSize(99)).toThrow("Unknown SubId 99 for this assembly");
  });

  it("shares one SubId between identical data", () => {
    const adapter = new EvmAssemblyAdapter();
    const first = adapter.appendData(Uint8Array.of(1, 2, 3));
    const second = adapter.appendData(Uint8Array.of(1, 2, 3));
    const third = adapter.appendData(Uint8Array.of(4));
    expect(second).toBe(first);
    expect(third).not.toBe(first);

    adapter.appendDataSize(first);
    expect(bytesToHex(adapter.assembly.assemble().bytecode)).toBe("600301020304");
  });

  it("addresses sub-assemblies by offset and size", () => {
    const adapter = new EvmAssemblyAdapter();
    const [sub, subId] = adapter.createSubAssembly();
    sub.appendInstruction(instruction("STOP"));
    adapter.appendDataOffset(subId);
    adapter.appendDataSize(subId);

    const { bytecode } = adapter.assembly.assemble();
    expect(bytesToHex(bytecode)).toBe("6004600100");
    expect(disassemble(bytecode)).toBe("PUSH1 0x4 PUSH1 0x1 STOP ");
  });
});

describe("disassemble", () => {
  it("prints unknown opcodes as INVALID", () => {
    expect(disassemble(Uint8Array.of(0x0c, 0x61, 0x00, 0x2a))).toBe("INVALID PUSH2 0x2A ");
  });
});
