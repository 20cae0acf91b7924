import type { FunctionSymbol, VariableSymbol } from "../../frontend/scope.js";
import type { LabelId } from "../abstract_assembly.js";

export interface JumpInfo {
  label: LabelId;
  /** Stack height the jump target expects. */
  targetStackHeight: number;
}

export interface ForLoopLabels {
  post: JumpInfo;
  done: JumpInfo;
}

/**
 * State shared between the transform of a block and the transforms of the
 * functions defined inside it.
 */
export interface CodeTransformContext {
  functionEntryIds: Map<FunctionSymbol, LabelId>;
  /** Slot of each live variable, counted from the bottom of the frame. */
  variableStackHeights: Map<VariableSymbol, number>;
  /** Remaining references; a variable at zero may be freed. */
  variableReferences: Map<VariableSymbol, number>;
  forLoopStack: ForLoopLabels[];
}

export function createCodeTransformContext(
  variableReferences = new Map<VariableSymbol, number>(),
): CodeTransformContext {
  return {
    functionEntryIds: new Map(),
    variableStackHeights: new Map(),
    variableReferences,
    forLoopStack: [],
  };
}
