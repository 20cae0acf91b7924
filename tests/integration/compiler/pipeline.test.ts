/**
 * End-to-end tests for the Yul to bytecode pipeline
 */

import fs from "node:fs";
import { describe, expect, it, vi } from "vitest";
import {
  AggregateCompileError,
  compile,
  compileOrThrow,
  YulCompiler,
} from "../../../src/compiler/index.js";

const fixture = (name: string): string =>
  fs.readFileSync(new URL(`../../fixtures/yul/${name}`, import.meta.url), "utf8");

describe("YulCompiler", () => {
  it("compiles an object with a sub-object", () => {
    const output = compileOrThrow(fixture("deploy.yul"));
    expect(output.opcodes).toBe(
      "PUSH1 0x1 PUSH1 0xC PUSH1 0x0 CODECOPY PUSH1 0x1 PUSH1 0x0 RETURN STOP ",
    );
    expect(output.bytecodeHex).toBe("6001600c60003960016000f300");
    expect(output.assembly).toContain("sub_0: assembly {\n      stop\n}");
    expect(output.source.startsWith('object "Counter" {')).toBe(true);
  });

  it("appends data blobs after the code", () => {
    const output = compileOrThrow(
      'object "a" { code { pop(dataoffset("d")) pop(datasize("d")) } data "d" hex"aabb" }',
    );
    expect(output.bytecodeHex).toBe("600650600250aabb");
  });

  it("resolves size and offset of the current object", () => {
    const output = compileOrThrow('object "a" { code { pop(datasize("a")) pop(dataoffset("a")) } }');
    expect(output.bytecodeHex).toBe("600650600050");
  });

  it("prints a bare block back as a block", () => {
    expect(compileOrThrow("{ let x := 1 }").source).toBe("{\n    let x := 1\n}");
  });

  it("returns analysis diagnostics with locations", () => {
    const result = compile("{ pop(y) }", { sourceName: "main.yul" });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.diagnostics.map((d) => d.format())).toEqual([
      '[DeclarationError] main.yul:1:7 Identifier "y" not found.',
    ]);
  });

  it("returns parse errors as diagnostics", () => {
    const result = compile("{ let }");
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.diagnostics.map((d) => d.format())).toEqual([
      "[ParserError] <stdin>:1:7 Expected Identifier but got '}'",
    ]);
  });

  it("throws an aggregate error from compileOrThrow", () => {
    expect(() => compileOrThrow("{ pop(y) }")).toThrow(AggregateCompileError);
    expect(() => compileOrThrow("{ pop(y) }")).toThrow(
      'Compilation failed with 1 error(s):\n- [DeclarationError] <stdin>:1:7 Identifier "y" not found.',
    );
  });

  it("forwards stored values when optimizing", () => {
    const source =
      "{ let k := 7 let v := calldataload(0) sstore(k, v) let w := sload(k) sstore(1, w) }";
    const output = new YulCompiler().compile(source, { optimize: true });
    expect(output.success).toBe(true);
    if (!output.success) return;
    expect(output.output.optimizerRewrites).toBe(1);
    expect(output.output.source).toContain("let w := v");
    expect(output.output.opcodes).toBe(
      "PUSH1 0x7 PUSH1 0x0 CALLDATALOAD DUP1 DUP3 SSTORE DUP1 SWAP2 POP POP DUP1 PUSH1 0x1 SSTORE POP ",
    );
  });

  it("warns when msize blocks memory forwarding", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    try {
      const output = compileOrThrow(
        "{ let p := 0 let x := calldataload(0) mstore(p, x) let r := mload(p) pop(add(r, msize())) }",
        { optimize: true },
      );
      expect(output.optimizerRewrites).toBe(0);
      expect(warn).toHaveBeenCalledWith('Object "object" reads msize; memory loads are not forwarded');
    } finally {
      warn.mockRestore();
    }
  });

  it("leaves code unchanged without the optimize flag", () => {
    const output = compileOrThrow(
      "{ let k := 7 let v := calldataload(0) sstore(k, v) let w := sload(k) sstore(1, w) }",
    );
    expect(output.optimizerRewrites).toBe(0);
    expect(output.source).toContain("let w := sload(k)");
  });
});
