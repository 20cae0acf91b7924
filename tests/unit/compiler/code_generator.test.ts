import { describe, expect, it } from "vitest";
import {
  type AbstractAssembly,
  analyzeBlock,
  CodeGenerator,
  CodeTransform,
  compile,
  compileOrThrow,
  EvmAssembly,
  EvmDialect,
  JumpType,
  type LabelId,
  parseBlock,
  type SubId,
} from "../../../src/compiler/index.js";
import { type Instruction, stackDelta } from "../../../src/compiler/dialect/instructions.js";

/** Tracks stack height and jumps without producing any code. */
class RecordingAssembly implements AbstractAssembly {
  readonly jumps: Array<{ stackDiffAfter: number; jumpType: JumpType }> = [];
  readonly labels: LabelId[] = [];
  private height = 0;
  private nextLabel = 1;

  setSourceLocation(): void {}

  getStackHeight(): number {
    return this.height;
  }

  setStackHeight(height: number): void {
    this.height = height;
  }

  appendInstruction(instruction: Instruction): void {
    this.height += stackDelta(instruction);
  }

  appendConstant(_value: bigint): void {
    this.height += 1;
  }

  appendLabel(label: LabelId): void {
    this.labels.push(label);
  }

  appendLabelReference(_label: LabelId): void {
    this.height += 1;
  }

  newLabelId(): LabelId {
    return this.nextLabel++;
  }

  namedLabel(_name: string): LabelId {
    return this.newLabelId();
  }

  appendLinkerSymbol(_name: string): void {
    this.height += 1;
  }

  appendJump(stackDiffAfter: number, jumpType = JumpType.Ordinary): void {
    this.jumps.push({ stackDiffAfter, jumpType });
    this.height += stackDiffAfter - 1;
  }

  appendJumpTo(label: LabelId, stackDiffAfter = 0, jumpType = JumpType.Ordinary): void {
    this.appendLabelReference(label);
    this.appendJump(stackDiffAfter, jumpType);
  }

  appendJumpToIf(label: LabelId): void {
    this.appendLabelReference(label);
    this.height -= 2;
  }

  appendBeginsub(): void {}

  appendJumpsub(): void {}

  appendReturnsub(): void {}

  appendAssemblySize(): void {
    this.height += 1;
  }

  createSubAssembly(): [AbstractAssembly, SubId] {
    return [new RecordingAssembly(), 0];
  }

  appendDataOffset(_sub: SubId): void {
    this.height += 1;
  }

  appendDataSize(_sub: SubId): void {
    this.height += 1;
  }

  appendData(_data: Uint8Array): SubId {
    return 0;
  }

  appendImmutable(_identifier: string): void {
    this.height += 1;
  }

  appendImmutableAssignment(_identifier: string): void {
    this.height -= 1;
  }

  markAsInvalid(): void {}
}

const dialect = new EvmDialect({ objectAccess: false });

function transform(source: string, assembly: AbstractAssembly, allowStackOpt = true) {
  const block = parseBlock(source);
  const info = analyzeBlock(block, dialect);
  return CodeTransform.run(
    {
      assembly,
      info,
      dialect,
      builtinContext: { subIds: new Map() },
      allowStackOpt,
      useNamedLabelsForFunctions: false,
    },
    block,
  );
}

describe("CodeTransform", () => {
  it("marks jumps into and out of functions", () => {
    const assembly = new RecordingAssembly();
    const errors = transform(
      "{ function f(a) -> b { b := a } let x := f(1) pop(x) }",
      assembly,
    );
    expect(errors).toEqual([]);
    expect(assembly.jumps).toEqual([
      { stackDiffAfter: 0, jumpType: JumpType.Ordinary },
      { stackDiffAfter: -1, jumpType: JumpType.OutOfFunction },
      { stackDiffAfter: -1, jumpType: JumpType.IntoFunction },
    ]);
    expect(assembly.getStackHeight()).toBe(0);
  });

  it("leaves the stack balanced with and without stack optimization", () => {
    const source =
      "{ let a := calldataload(0) for { let i := 0 } lt(i, a) { i := add(i, 1) } { if eq(i, 3) { continue } sstore(i, a) } }";
    for (const allowStackOpt of [true, false]) {
      const assembly = new RecordingAssembly();
      expect(transform(source, assembly, allowStackOpt)).toEqual([]);
      expect(assembly.getStackHeight()).toBe(0);
    }
  });
});

describe("stack too deep", () => {
  const names = Array.from({ length: 18 }, (_, i) => `v${i}`);
  const declarations = names.map((name, i) => `let ${name} := calldataload(${i})`).join(" ");
  const reads = names.map((name) => `pop(${name})`).join(" ");

  it("reports variables out of DUP reach", () => {
    const result = compile(`{ ${declarations} ${reads} }`);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.diagnostics.map((d) => d.code)).toEqual(["StackTooDeep", "StackTooDeep"]);
    expect(result.diagnostics[0].message).toBe(
      "Stack too deep when compiling inline assembly: Variable v0 is 2 slot(s) too deep inside the stack.",
    );
    expect(result.diagnostics[1].message).toBe(
      "Stack too deep when compiling inline assembly: Variable v1 is 1 slot(s) too deep inside the stack.",
    );
    expect(result.diagnostics[0].suggestion).toBe("reduce the number of live variables");
  });

  it("names the enclosing function", () => {
    const block = parseBlock(`{ function f() { ${declarations} ${reads} } }`);
    const info = analyzeBlock(block, dialect);
    const assembly = new EvmAssembly();
    const result = CodeGenerator.assemble(block, info, assembly);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.stackErrors.map((e) => [e.functionName, e.variableName, e.depth])).toEqual([
      ["f", "v0", 2],
      ["f", "v1", 1],
    ]);
    expect(result.error.suggestion).toBe("reduce the number of live variables in function f");
    expect(assembly.isInvalid()).toBe(true);
    expect(() => assembly.assemble()).toThrow("Attempted to assemble invalid code");
  });

  it("reports function frames that do not fit the stack", () => {
    const parameters = Array.from({ length: 16 }, (_, i) => `p${i}`).join(", ");
    const block = parseBlock(`{ function f(${parameters}) -> r, s { } }`);
    const info = analyzeBlock(block, dialect);
    const result = CodeGenerator.assemble(block, info, new EvmAssembly(), {
      optimizeStackAllocation: false,
    });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.stackErrors).toHaveLength(1);
    expect(result.stackErrors[0].depth).toBe(2);
    expect(result.stackErrors[0].functionName).toBe("f");
    expect(result.stackErrors[0].comment).toBe(
      "The function f has 2 parameters or return variables too many to fit the stack size.",
    );
  });

  it("accepts sixteen live variables", () => {
    const live = names.slice(0, 16);
    const source = `{ ${live.map((name, i) => `let ${name} := calldataload(${i})`).join(" ")} ${live
      .map((name) => `pop(${name})`)
      .join(" ")} }`;
    expect(compile(source).success).toBe(true);
  });
});

describe("labels", () => {
  it("names function entry labels on request", () => {
    const output = compileOrThrow("{ function f() { } }", { useNamedLabelsForFunctions: true });
    expect(output.assembly).toBe("  tag_1\n  jump\nf_2:\ntag_3:\n  jump\t// out\ntag_1:");
  });
});
