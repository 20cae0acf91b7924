import { describe, expect, it } from "vitest";
import {
  AssignmentsSinceContinue,
  AstNodeKind,
  CallGraphGenerator,
  EvmDialect,
  MSizeFinder,
  parseBlock,
  SideEffectsCollector,
  SideEffectsPropagator,
  TOP_LEVEL,
} from "../../../src/compiler/index.js";

const dialect = new EvmDialect();

describe("CallGraphGenerator", () => {
  it("records callees per function and functions containing loops", () => {
    const graph = CallGraphGenerator.callGraph(
      parseBlock("{ function f() { g() } function g() { for { } 1 { } { } } f() }"),
    );
    expect(graph.functionCalls.get(TOP_LEVEL)).toEqual(new Set(["f"]));
    expect(graph.functionCalls.get("f")).toEqual(new Set(["g"]));
    expect(graph.functionCalls.get("g")).toEqual(new Set());
    expect(graph.functionsWithLoops).toEqual(new Set(["g"]));
  });
});

describe("SideEffectsPropagator", () => {
  const effectsOf = (source: string) =>
    SideEffectsPropagator.sideEffects(dialect, CallGraphGenerator.callGraph(parseBlock(source)));

  it("keeps pure functions movable", () => {
    const effects = effectsOf("{ function h() -> r { r := add(1, 2) } }");
    expect(effects.get("h")).toEqual({
      movable: true,
      sideEffectFree: true,
      sideEffectFreeIfNoMSize: true,
      invalidatesStorage: false,
      invalidatesMemory: false,
    });
  });

  it("propagates effects through calls", () => {
    const effects = effectsOf("{ function w() { sstore(0, 1) } function outer() { w() } }");
    expect(effects.get("outer")?.invalidatesStorage).toBe(true);
    expect(effects.get("outer")?.invalidatesMemory).toBe(false);
    expect(effects.get("outer")?.sideEffectFree).toBe(false);
  });

  it("treats loops and recursion as possibly non-terminating", () => {
    const effects = effectsOf(
      "{ function spin() { for { } 1 { } { } } function caller() { spin() } function again() { again() } }",
    );
    for (const name of ["spin", "caller", "again"]) {
      expect(effects.get(name)?.movable).toBe(false);
      expect(effects.get(name)?.sideEffectFree).toBe(false);
    }
    expect(effects.get("again")?.invalidatesStorage).toBe(false);
  });
});

describe("collectors", () => {
  it("assumes the worst for unknown functions", () => {
    const [statement] = parseBlock("{ mystery() }").statements;
    if (statement.kind !== AstNodeKind.ExpressionStatement) throw new Error("expected a call");
    const effects = SideEffectsCollector.ofExpression(dialect, statement.expression);
    expect(effects.invalidatesStorage).toBe(true);
    expect(effects.invalidatesMemory).toBe(true);
    expect(effects.movable).toBe(false);
  });

  it("finds msize anywhere in the code", () => {
    expect(MSizeFinder.containsMSize(dialect, parseBlock("{ function f() { pop(msize()) } }"))).toBe(true);
    expect(MSizeFinder.containsMSize(dialect, parseBlock("{ pop(mload(0)) }"))).toBe(false);
  });

  it("collects assignments after the first continue only", () => {
    const [loop] = parseBlock(
      "{ for { } 1 { } { a := 1 continue b := 2 for { } 1 { } { continue } } }",
    ).statements;
    if (loop.kind !== AstNodeKind.ForLoop) throw new Error("expected a loop");
    const collector = new AssignmentsSinceContinue();
    collector.visitBlock(loop.body);
    expect(collector.names).toEqual(new Set(["b"]));
  });
});
