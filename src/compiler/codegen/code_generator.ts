/**
 * Entry point for compiling a single analyzed block into an EvmAssembly
 */

import { type BuiltinContext, EvmDialect } from "../dialect/evm_dialect.js";
import { CompileError, type StackTooDeepError } from "../errors/compile_errors.js";
import type { Block, SourceLocation } from "../frontend/ast.js";
import type { AnalysisInfo } from "../frontend/scope.js";
import { CodeTransform } from "./code_transform/transform.js";
import type { EvmAssembly } from "./evm_assembly.js";
import { EvmAssemblyAdapter } from "./evm_assembly_adapter.js";

export interface CodeGeneratorOptions {
  dialect?: EvmDialect;
  builtinContext?: BuiltinContext;
  optimizeStackAllocation?: boolean;
  useNamedLabelsForFunctions?: boolean;
}

export type AssembleResult =
  | { success: true }
  | { success: false; error: CompileError; stackErrors: StackTooDeepError[] };

export function stackTooDeepDiagnostic(
  error: StackTooDeepError,
  location: SourceLocation,
): CompileError {
  const comment = error.comment ? `: ${error.comment}` : ".";
  return new CompileError(
    "StackTooDeep",
    `Stack too deep when compiling inline assembly${comment}`,
    { sourceName: location.sourceName, line: location.line, column: location.column },
    error.functionName
      ? `reduce the number of live variables in function ${error.functionName}`
      : "reduce the number of live variables",
  );
}

export class CodeGenerator {
  static assemble(
    block: Block,
    info: AnalysisInfo,
    assembly: EvmAssembly,
    options: CodeGeneratorOptions = {},
  ): AssembleResult {
    const stackErrors = CodeTransform.run(
      {
        assembly: new EvmAssemblyAdapter(assembly),
        info,
        dialect: options.dialect ?? new EvmDialect({ objectAccess: false }),
        builtinContext: options.builtinContext ?? { subIds: new Map() },
        allowStackOpt: options.optimizeStackAllocation ?? true,
        useNamedLabelsForFunctions: options.useNamedLabelsForFunctions ?? false,
      },
      block,
    );
    const [first] = stackErrors;
    if (first === undefined) return { success: true };
    return {
      success: false,
      error: stackTooDeepDiagnostic(first, block.location),
      stackErrors,
    };
  }
}
