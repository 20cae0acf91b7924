import { describe, expect, it } from "vitest";
import { compileOrThrow } from "../../../src/compiler/index.js";

const opcodes = (source: string, optimizeStackAllocation = true): string =>
  compileOrThrow(source, { optimizeStackAllocation }).opcodes;

describe("stack slot reuse", () => {
  it("pops a variable right after its last use", () => {
    expect(opcodes("{ let x := 1 x := 6 let y := 2 y := 4 }")).toBe(
      "PUSH1 0x1 PUSH1 0x6 SWAP1 POP POP PUSH1 0x2 PUSH1 0x4 SWAP1 POP POP ",
    );
  });

  it("keeps a variable alive until the statement after its last read", () => {
    expect(opcodes("{ let a := 7 { pop(a) } let b := 9 }")).toBe(
      "PUSH1 0x7 DUP1 POP POP PUSH1 0x9 POP ",
    );
  });

  it("places new variables into freed slots below the top", () => {
    expect(
      opcodes("{ let p, q, r, t let m := 3 let n := 4 mstore(m, p) mstore(n, r) }"),
    ).toBe(
      "PUSH1 0x0 PUSH1 0x0 PUSH1 0x0 PUSH1 0x0 POP PUSH1 0x3 SWAP2 POP PUSH1 0x4 DUP4 DUP4 MSTORE DUP2 DUP2 MSTORE POP POP POP POP ",
    );
  });

  it("frees variables of an if body at the end of the body", () => {
    expect(opcodes("{ let c := calldataload(0) if c { let d := c } let e := 5 }")).toBe(
      "PUSH1 0x0 CALLDATALOAD DUP1 ISZERO PUSH1 0xA JUMPI DUP1 POP JUMPDEST POP PUSH1 0x5 POP ",
    );
  });

  it("joins switch cases at the same stack height", () => {
    expect(
      opcodes("{ let s := 0 switch s case 1 { let k := 4 } default { s := 6 } let w := 8 }"),
    ).toBe(
      "PUSH1 0x0 DUP1 PUSH1 0x1 DUP2 EQ PUSH1 0x11 JUMPI PUSH1 0x6 SWAP2 POP PUSH1 0x15 JUMP JUMPDEST PUSH1 0x4 POP JUMPDEST POP POP PUSH1 0x8 POP ",
    );
  });
});

describe("for loops", () => {
  it("keeps unused init variables until the loop ends", () => {
    expect(opcodes("{ for { let z := 0 } 1 { } { let x := 3 } let t := 2 }")).toBe(
      "PUSH1 0x0 JUMPDEST PUSH1 0x1 ISZERO PUSH1 0x10 JUMPI PUSH1 0x3 POP JUMPDEST PUSH1 0x2 JUMP JUMPDEST POP PUSH1 0x2 POP ",
    );
  });

  it("assigns to an init variable from the body", () => {
    expect(opcodes("{ for { let i := 0 } 1 { } { i := 9 let x := 4 } let t := 5 }")).toBe(
      "PUSH1 0x0 JUMPDEST PUSH1 0x1 ISZERO PUSH1 0x14 JUMPI PUSH1 0x9 SWAP1 POP PUSH1 0x4 POP JUMPDEST PUSH1 0x2 JUMP JUMPDEST POP PUSH1 0x5 POP ",
    );
  });

  it("pops body variables before break", () => {
    expect(
      opcodes("{ for { } 1 { } { let v := calldataload(0) if v { break } sstore(0, v) } }"),
    ).toBe(
      "JUMPDEST PUSH1 0x1 ISZERO PUSH1 0x1D JUMPI PUSH1 0x0 CALLDATALOAD DUP1 ISZERO PUSH1 0x13 JUMPI POP PUSH1 0x1D JUMP JUMPDEST DUP1 PUSH1 0x0 SSTORE POP JUMPDEST PUSH1 0x0 JUMP JUMPDEST ",
    );
  });

  it("jumps to the post block on continue", () => {
    expect(
      opcodes("{ for { } 1 { } { let v := calldataload(0) if v { continue } sstore(0, v) } }"),
    ).toBe(
      "JUMPDEST PUSH1 0x1 ISZERO PUSH1 0x1D JUMPI PUSH1 0x0 CALLDATALOAD DUP1 ISZERO PUSH1 0x13 JUMPI POP PUSH1 0x19 JUMP JUMPDEST DUP1 PUSH1 0x0 SSTORE POP JUMPDEST PUSH1 0x0 JUMP JUMPDEST ",
    );
  });
});

describe("functions", () => {
  it("compiles an empty function", () => {
    expect(opcodes("{ function g() { } }")).toBe("PUSH1 0x6 JUMP JUMPDEST JUMPDEST JUMP JUMPDEST ");
  });

  it("skips consecutive definitions with a single jump", () => {
    expect(opcodes("{ function a() { } function b() { } }")).toBe(
      "PUSH1 0x9 JUMP JUMPDEST JUMPDEST JUMP JUMPDEST JUMPDEST JUMP JUMPDEST ",
    );
  });

  it("pops unused parameters at entry", () => {
    expect(opcodes("{ function g(a, b) { } }")).toBe(
      "PUSH1 0x8 JUMP JUMPDEST POP POP JUMPDEST JUMP JUMPDEST ",
    );
  });

  it("moves the return label below the return values", () => {
    expect(opcodes("{ function g() -> u, v { } }")).toBe(
      "PUSH1 0xC JUMP JUMPDEST PUSH1 0x0 PUSH1 0x0 JUMPDEST SWAP1 SWAP2 JUMP JUMPDEST ",
    );
  });

  it("declares return variables lazily before leave", () => {
    expect(opcodes("{ function g() -> u { pop(caller()) leave pop(gas()) } }")).toBe(
      "PUSH1 0x10 JUMP JUMPDEST CALLER POP PUSH1 0x0 PUSH1 0xD JUMP GAS POP JUMPDEST SWAP1 JUMP JUMPDEST ",
    );
  });

  it("reuses parameter slots for return variables", () => {
    expect(
      opcodes("{ function h(a, b, c) -> x { pop(origin()) sstore(a, c) pop(gasprice()) x := b } }"),
    ).toBe(
      "PUSH1 0x17 JUMP JUMPDEST ORIGIN POP DUP3 DUP2 SSTORE POP GASPRICE POP PUSH1 0x0 SWAP2 POP DUP1 SWAP2 POP POP JUMPDEST SWAP1 JUMP JUMPDEST ",
    );
  });

  it("compiles a function embedded between statements", () => {
    expect(
      opcodes("{ let k := 5 function h(a, r) -> t { let x := a a := 2 t := a } k := 9 }"),
    ).toBe(
      "PUSH1 0x5 PUSH1 0x17 JUMP JUMPDEST PUSH1 0x0 SWAP2 POP DUP1 POP PUSH1 0x2 SWAP1 POP DUP1 SWAP2 POP POP JUMPDEST SWAP1 JUMP JUMPDEST PUSH1 0x9 SWAP1 POP POP ",
    );
  });

  it("pushes the return label and arguments for a call", () => {
    expect(
      opcodes("{ function inc(a) -> b { b := add(a, 1) } let y := inc(4) sstore(0, y) }"),
    ).toBe(
      "PUSH1 0x11 JUMP JUMPDEST PUSH1 0x0 PUSH1 0x1 DUP3 ADD SWAP1 POP JUMPDEST SWAP2 SWAP1 POP JUMP JUMPDEST PUSH1 0x19 PUSH1 0x4 PUSH1 0x3 JUMP JUMPDEST DUP1 PUSH1 0x0 SSTORE POP ",
    );
  });
});

describe("without stack allocation optimization", () => {
  it("keeps variables until the end of their block", () => {
    expect(opcodes("{ let x := 1 x := 6 let y := 2 y := 4 }", false)).toBe(
      "PUSH1 0x1 PUSH1 0x6 SWAP1 POP PUSH1 0x2 PUSH1 0x4 SWAP1 POP POP POP ",
    );
  });

  it("sets up return variables at function entry", () => {
    expect(opcodes("{ function g(a) -> r { r := a } }", false)).toBe(
      "PUSH1 0xE JUMP JUMPDEST PUSH1 0x0 DUP2 SWAP1 POP JUMPDEST SWAP2 SWAP1 POP JUMP JUMPDEST ",
    );
  });
});
