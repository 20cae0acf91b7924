/**
 * Yul to stack-machine code transform
 *
 * Every variable occupies one stack slot. With stack optimization enabled a
 * variable is freed after its last reference and its slot can be handed to
 * a later declaration.
 */

import type { BuiltinContext, EvmDialect } from "../../dialect/evm_dialect.js";
import type { StackTooDeepError } from "../../errors/compile_errors.js";
import type { Block, FunctionDefinition } from "../../frontend/ast.js";
import type { AnalysisInfo, ScopeId, VariableSymbol } from "../../frontend/scope.js";
import type { AbstractAssembly, LabelId } from "../abstract_assembly.js";
import { type CodeTransformContext, createCodeTransformContext } from "./context.js";
import {
  visitExpression,
  visitExpressionUnchecked,
  visitFunctionCall,
  visitIdentifier,
  visitLiteral,
} from "./expressions.js";
import {
  appendFunctionExit,
  functionEntryId,
  setupReturnVariablesAndFunctionExit,
  visitFunctionDefinition,
} from "./functions.js";
import { VariableReferenceCounter } from "./reference_counter.js";
import {
  appendPopUntil,
  decreaseReference,
  deleteVariable,
  expectDeposit,
  freeUnusedVariables,
  lookupVariable,
  stackError,
  variableHeightDiff,
  variableIn,
} from "./stack.js";
import {
  finalizeBlock,
  generateAssignment,
  visitAssignment,
  visitBlock,
  visitBreak,
  visitContinue,
  visitExpressionStatement,
  visitForLoop,
  visitIf,
  visitLeave,
  visitStatement,
  visitStatements,
  visitSwitch,
  visitVariableDeclaration,
} from "./statements.js";

export interface CodeTransformOptions {
  assembly: AbstractAssembly;
  info: AnalysisInfo;
  dialect: EvmDialect;
  builtinContext: BuiltinContext;
  /** Free variables after their last use and reuse their slots. */
  allowStackOpt: boolean;
  useNamedLabelsForFunctions: boolean;
}

interface FunctionFrame {
  definition: FunctionDefinition;
  scope: ScopeId;
}

export class CodeTransform {
  readonly assembly: AbstractAssembly;
  readonly info: AnalysisInfo;
  readonly dialect: EvmDialect;
  readonly builtinContext: BuiltinContext;
  readonly allowStackOpt: boolean;
  readonly useNamedLabelsForFunctions: boolean;
  readonly context: CodeTransformContext;
  /** Set when this transform generates the body of a function. */
  readonly frame: FunctionFrame | null;

  scope: ScopeId | null = null;
  unusedStackSlots = new Set<number>();
  variablesScheduledForDeletion = new Set<VariableSymbol>();
  /** Scopes whose variables must stay allocated, e.g. a for-loop init block. */
  pinnedScopes = new Set<ScopeId>();
  returnSetupPending = false;
  functionExitLabel: LabelId | null = null;
  functionExitStackHeight: number | null = null;
  stackErrors: StackTooDeepError[] = [];

  constructor(
    options: CodeTransformOptions,
    root: Block,
    context?: CodeTransformContext,
    frame?: FunctionFrame,
  ) {
    this.assembly = options.assembly;
    this.info = options.info;
    this.dialect = options.dialect;
    this.builtinContext = options.builtinContext;
    this.allowStackOpt = options.allowStackOpt;
    this.useNamedLabelsForFunctions = options.useNamedLabelsForFunctions;
    this.context =
      context ??
      createCodeTransformContext(
        options.allowStackOpt ? VariableReferenceCounter.run(options.info, root) : undefined,
      );
    this.frame = frame ?? null;
    this.returnSetupPending = frame !== undefined;
  }

  get options(): CodeTransformOptions {
    return {
      assembly: this.assembly,
      info: this.info,
      dialect: this.dialect,
      builtinContext: this.builtinContext,
      allowStackOpt: this.allowStackOpt,
      useNamedLabelsForFunctions: this.useNamedLabelsForFunctions,
    };
  }

  /**
   * Generate code for a top-level block. Returns the stack errors found;
   * the assembly is marked invalid when there are any.
   */
  static run(options: CodeTransformOptions, block: Block): StackTooDeepError[] {
    const transform = new CodeTransform(options, block);
    transform.visitBlock(block);
    return transform.stackErrors;
  }

  visitBlock = visitBlock;
  visitStatements = visitStatements;
  visitStatement = visitStatement;
  finalizeBlock = finalizeBlock;
  visitExpressionStatement = visitExpressionStatement;
  visitVariableDeclaration = visitVariableDeclaration;
  visitAssignment = visitAssignment;
  generateAssignment = generateAssignment;
  visitIf = visitIf;
  visitSwitch = visitSwitch;
  visitForLoop = visitForLoop;
  visitBreak = visitBreak;
  visitContinue = visitContinue;
  visitLeave = visitLeave;

  visitFunctionDefinition = visitFunctionDefinition;
  setupReturnVariablesAndFunctionExit = setupReturnVariablesAndFunctionExit;
  appendFunctionExit = appendFunctionExit;
  functionEntryId = functionEntryId;

  visitExpression = visitExpression;
  visitExpressionUnchecked = visitExpressionUnchecked;
  visitFunctionCall = visitFunctionCall;
  visitIdentifier = visitIdentifier;
  visitLiteral = visitLiteral;

  lookupVariable = lookupVariable;
  variableIn = variableIn;
  variableHeightDiff = variableHeightDiff;
  decreaseReference = decreaseReference;
  deleteVariable = deleteVariable;
  freeUnusedVariables = freeUnusedVariables;
  appendPopUntil = appendPopUntil;
  expectDeposit = expectDeposit;
  stackError = stackError;
}
