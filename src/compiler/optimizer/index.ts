export { CallGraphGenerator, type CallGraph, SideEffectsPropagator, TOP_LEVEL } from "./call_graph.js";
export { DataFlowAnalyzer, StoreLoadLocation } from "./data_flow_analyzer.js";
export { KnowledgeBase } from "./knowledge_base.js";
export { keccakOfWord, LoadResolver } from "./load_resolver.js";
export {
  Assignments,
  AssignmentsSinceContinue,
  MovableChecker,
  MSizeFinder,
  SideEffectsCollector,
} from "./side_effects_collector.js";
