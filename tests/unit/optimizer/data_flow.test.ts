import { describe, expect, it } from "vitest";
import {
  AstNodeKind,
  DataFlowAnalyzer,
  EvmDialect,
  type Expression,
  type ExpressionStatement,
  KnowledgeBase,
  parseBlock,
} from "../../../src/compiler/index.js";
import { printExpression } from "../../../src/compiler/frontend/printer.js";

const dialect = new EvmDialect();

interface Snapshot {
  values: Record<string, string>;
  storage: Record<string, string>;
  memory: Record<string, string>;
}

/** Records the analyzer state whenever it reaches a `stop()` statement. */
class Probe extends DataFlowAnalyzer {
  readonly snapshots: Snapshot[] = [];

  override visitExpressionStatement(statement: ExpressionStatement): void {
    const expression = statement.expression;
    if (expression.kind === AstNodeKind.FunctionCall && expression.functionName.name === "stop") {
      this.snapshots.push({
        values: Object.fromEntries(
          [...this.value].map(([name, assigned]) => [name, printExpression(assigned)]),
        ),
        storage: Object.fromEntries(this.storage),
        memory: Object.fromEntries(this.memory),
      });
    }
    super.visitExpressionStatement(statement);
  }
}

function snapshots(source: string): Snapshot[] {
  const probe = new Probe(dialect);
  probe.visitBlock(parseBlock(source));
  return probe.snapshots;
}

describe("DataFlowAnalyzer", () => {
  it("tracks movable values and zero-initialized declarations", () => {
    const [state] = snapshots("{ let a := 1 let b := add(a, 2) let c let d := sload(0) stop() }");
    expect(state.values).toEqual({ a: "1", b: "add(a, 2)", c: "0" });
  });

  it("clears values that reference a reassigned variable", () => {
    const [state] = snapshots(
      "{ let a := 1 let b := add(a, 2) a := calldataload(0) stop() }",
    );
    expect(state.values).toEqual({ a: "calldataload(0)" });
  });

  it("forgets variables assigned inside an if body", () => {
    const [state] = snapshots("{ let a := 1 if calldataload(0) { a := 2 } stop() }");
    expect(state.values).toEqual({});
  });

  it("keeps storage across branches that do not write it", () => {
    const [state] = snapshots(
      "{ let k := 1 let v := 2 sstore(k, v) if calldataload(0) { mstore(0, v) } stop() }",
    );
    expect(state.storage).toEqual({ k: "v" });
    expect(state.memory).toEqual({});
  });

  it("joins switch branches", () => {
    const [state] = snapshots(
      "{ let k := 1 let v := 2 let w := 3 sstore(k, v) switch calldataload(0) case 0 { sstore(k, w) } default { } stop() }",
    );
    expect(state.storage).toEqual({});
  });

  it("forgets loop variables at the loop head", () => {
    const [state] = snapshots(
      "{ let i := 0 let n := 10 for { } lt(i, n) { i := add(i, 1) } { stop() } }",
    );
    expect(state.values).toEqual({ n: "10" });
  });

  it("starts function bodies from an empty state", () => {
    const [state] = snapshots(
      "{ let a := 1 let k := 2 sstore(k, a) function f() -> r { stop() } }",
    );
    expect(state).toEqual({ values: { r: "0" }, storage: {}, memory: {} });
  });

  it("forgets values referencing variables of a closed block", () => {
    const [state] = snapshots(
      "{ let x := 1 { let y := calldataload(0) x := add(y, 1) } stop() }",
    );
    expect(state.values).toEqual({});
  });

  it("drops stored entries whose key or value leaves scope", () => {
    const [state] = snapshots(
      "{ let k := 1 let v := 2 { let j := 3 let u := 4 sstore(j, v) mstore(k, u) } stop() }",
    );
    expect(state.storage).toEqual({});
    expect(state.memory).toEqual({});
  });

  it("drops a stored entry when its value variable is reassigned", () => {
    const [state] = snapshots(
      "{ let k := 1 let v := calldataload(0) sstore(k, v) v := 3 stop() }",
    );
    expect(state.storage).toEqual({});
  });
});

describe("KnowledgeBase", () => {
  function knowledgeOf(source: string): KnowledgeBase {
    const values = new Map<string, Expression>();
    for (const statement of parseBlock(source).statements) {
      if (statement.kind !== AstNodeKind.VariableDeclaration || !statement.value) continue;
      values.set(statement.variables[0].name, statement.value);
    }
    return new KnowledgeBase((name) => values.get(name));
  }

  const kb = knowledgeOf(
    "{ let a := 0x20 let b := 0 let y := add(x, 32) let z := add(x, 16) let w := sub(y, 32) let c := add(3, 4) let m := sub(0, 1) let q := mload(x) }",
  );

  it("compares constants", () => {
    expect(kb.knownToBeDifferent("a", "b")).toBe(true);
    expect(kb.knownToBeDifferentByAtLeast32("a", "b")).toBe(true);
  });

  it("compares offsets from the same unknown base", () => {
    expect(kb.knownToBeDifferentByAtLeast32("x", "y")).toBe(true);
    expect(kb.knownToBeDifferent("x", "z")).toBe(true);
    expect(kb.knownToBeDifferentByAtLeast32("x", "z")).toBe(false);
    expect(kb.knownToBeDifferent("w", "x")).toBe(false);
  });

  it("knows nothing about unrelated values", () => {
    expect(kb.knownToBeDifferent("q", "x")).toBe(false);
    expect(kb.knownToBeEqual("q", "q")).toBe(true);
    expect(kb.knownToBeEqual("w", "x")).toBe(false);
  });

  it("folds constants and measures distance with wrap-around", () => {
    expect(kb.knownToBeDifferent("c", "b")).toBe(true);
    expect(kb.knownToBeDifferentByAtLeast32("c", "b")).toBe(false);
    expect(kb.knownToBeDifferent("m", "b")).toBe(true);
    expect(kb.knownToBeDifferentByAtLeast32("m", "b")).toBe(false);
  });
});
