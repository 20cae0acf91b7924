import { describe, expect, it } from "vitest";
import {
  EvmDialect,
  keccakOfWord,
  LoadResolver,
  MalformedInputError,
  parseBlock,
  printBlock,
} from "../../../src/compiler/index.js";

const dialect = new EvmDialect();

function resolve(source: string): { rewrites: number; code: string } {
  const block = parseBlock(source);
  const rewrites = LoadResolver.run(dialect, block);
  return { rewrites, code: printBlock(block) };
}

const lines = (...statements: string[]): string =>
  `{\n${statements.map((s) => `    ${s}`).join("\n")}\n}`;

describe("LoadResolver", () => {
  it("replaces sload by the stored variable", () => {
    expect(
      resolve("{ let k := 7 let v := calldataload(0) sstore(k, v) let w := sload(k) sstore(1, w) }"),
    ).toEqual({
      rewrites: 1,
      code: lines(
        "let k := 7",
        "let v := calldataload(0)",
        "sstore(k, v)",
        "let w := v",
        "sstore(1, w)",
      ),
    });
  });

  it("keeps entries for keys known to be different", () => {
    const { rewrites, code } = resolve(
      "{ let a := 1 let b := 2 let x := calldataload(0) let y := calldataload(32) sstore(a, x) sstore(b, y) let r := sload(a) let s := sload(b) }",
    );
    expect(rewrites).toBe(2);
    expect(code).toContain("\n    let r := x\n    let s := y\n");
  });

  it("drops entries whose key may alias the stored one", () => {
    const { rewrites, code } = resolve(
      "{ let a := calldataload(64) let b := 2 let x := calldataload(0) let y := calldataload(32) sstore(a, x) sstore(b, y) let r := sload(a) let s := sload(b) }",
    );
    expect(rewrites).toBe(1);
    expect(code).toContain("\n    let r := sload(a)\n    let s := y\n");
  });

  it("forgets storage across calls that may write it", () => {
    expect(
      resolve(
        "{ let k := 7 let v := calldataload(0) sstore(k, v) pop(call(gas(), 0, 0, 0, 0, 0, 0)) let w := sload(k) }",
      ).rewrites,
    ).toBe(0);
  });

  it("forgets storage written inside a loop body", () => {
    expect(
      resolve(
        "{ let k := 7 let v := calldataload(0) sstore(k, v) for { } lt(sload(k), 10) { } { sstore(k, calldataload(1)) } }",
      ).rewrites,
    ).toBe(0);
  });

  it("resolves loads inside function bodies", () => {
    const { rewrites, code } = resolve("{ function f(k, v) -> r { sstore(k, v) r := sload(k) } }");
    expect(rewrites).toBe(1);
    expect(code).toContain("r := v");
  });

  it("replaces mload when memory slots do not overlap", () => {
    const { rewrites, code } = resolve(
      "{ let p := 0 let q := 32 let x := calldataload(0) let y := calldataload(32) mstore(p, x) mstore(q, y) let r := mload(p) }",
    );
    expect(rewrites).toBe(1);
    expect(code).toContain("let r := x");
  });

  it("keeps mload when a later store overlaps", () => {
    expect(
      resolve(
        "{ let p := 0 let q := 16 let x := calldataload(0) let y := calldataload(32) mstore(p, x) mstore(q, y) let r := mload(p) }",
      ).rewrites,
    ).toBe(0);
  });

  it("does not touch memory loads when msize is used", () => {
    const { rewrites, code } = resolve(
      "{ let p := 0 let x := calldataload(0) mstore(p, x) sstore(p, x) let r := mload(p) let s := sload(p) pop(msize()) }",
    );
    expect(rewrites).toBe(1);
    expect(code).toContain("\n    let r := mload(p)\n    let s := x\n");
  });

  it("ignores stored variables that went out of scope", () => {
    expect(
      resolve("{ let p := 0 { let x := calldataload(0) mstore(p, x) } let r := mload(p) }").rewrites,
    ).toBe(0);
  });

  it("forgets a storage key when its variable leaves scope", () => {
    const { rewrites, code } = resolve(
      "{ let v := calldataload(0) { let k := 1 sstore(k, v) } { let k := 2 let w := sload(k) sstore(3, w) } }",
    );
    expect(rewrites).toBe(0);
    expect(code).toContain("let w := sload(k)");
  });

  it("does not resolve to a redeclared stored variable", () => {
    const { rewrites, code } = resolve(
      "{ let k := 1 { let v := calldataload(0) sstore(k, v) } let v := 7 let w := sload(k) sstore(2, w) }",
    );
    expect(rewrites).toBe(0);
    expect(code).toContain("let w := sload(k)");
  });

  it("forgets a memory key when its variable leaves scope", () => {
    expect(
      resolve(
        "{ let v := calldataload(0) { let p := 0 mstore(p, v) } { let p := 0 let w := mload(p) sstore(3, w) } }",
      ).rewrites,
    ).toBe(0);
  });

  it("does not resolve memory to a redeclared stored variable", () => {
    expect(
      resolve(
        "{ let p := 0 { let v := calldataload(0) mstore(p, v) } let v := 7 let w := mload(p) sstore(2, w) }",
      ).rewrites,
    ).toBe(0);
  });

  it("folds keccak256 of a known 32-byte word", () => {
    const { rewrites, code } = resolve(
      "{ let p := 0 let v := 5 mstore(p, v) let n := 32 let h := keccak256(p, n) }",
    );
    expect(rewrites).toBe(1);
    expect(code).toContain(`let h := ${keccakOfWord(5n).toString()}`);
  });

  it("leaves keccak256 of other lengths alone", () => {
    expect(
      resolve("{ let p := 0 let v := 5 mstore(p, v) let n := 31 let h := keccak256(p, n) }")
        .rewrites,
    ).toBe(0);
  });

  it("hashes words big-endian", () => {
    expect(keccakOfWord(0n)).toBe(
      0x290decd9548b62a8d60345a988386fc84ba6bc95484008f6362f93160ef3e563n,
    );
  });

  it("rejects loads with the wrong number of arguments", () => {
    const block = parseBlock("{ let k := 1 let x := sload(k, k) }");
    expect(() => LoadResolver.run(dialect, block)).toThrow(MalformedInputError);
    expect(() => LoadResolver.run(dialect, block)).toThrow("sload expects 1 argument(s), got 2");
  });

  it("finds nothing more on a second run", () => {
    const block = parseBlock(
      "{ let k := 7 let v := calldataload(0) sstore(k, v) let w := sload(k) sstore(1, w) }",
    );
    expect(LoadResolver.run(dialect, block)).toBe(1);
    expect(LoadResolver.run(dialect, block)).toBe(0);
  });
});
