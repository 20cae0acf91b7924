/**
 * Compiles a Yul object and its sub-objects into nested assemblies
 */

import type { BuiltinContext, EvmDialect } from "../dialect/evm_dialect.js";
import type { StackTooDeepError } from "../errors/compile_errors.js";
import { isYulObject, type YulObject } from "../frontend/ast.js";
import type { AnalysisInfo } from "../frontend/scope.js";
import type { AbstractAssembly } from "./abstract_assembly.js";
import { CodeTransform } from "./code_transform/transform.js";

export interface ObjectCompilerOptions {
  dialect: EvmDialect;
  optimizeStackAllocation: boolean;
  useNamedLabelsForFunctions: boolean;
}

export type AnalysisLookup = (object: YulObject) => AnalysisInfo;

export class EvmObjectCompiler {
  constructor(
    private readonly assembly: AbstractAssembly,
    private readonly options: ObjectCompilerOptions,
    private readonly analysisOf: AnalysisLookup,
  ) {}

  static compile(
    object: YulObject,
    assembly: AbstractAssembly,
    options: ObjectCompilerOptions,
    analysisOf: AnalysisLookup,
  ): StackTooDeepError[] {
    return new EvmObjectCompiler(assembly, options, analysisOf).run(object);
  }

  /** Returns the stack errors of this object and all of its sub-objects. */
  run(object: YulObject): StackTooDeepError[] {
    const stackErrors: StackTooDeepError[] = [];
    const builtinContext: BuiltinContext = {
      currentObjectName: object.name,
      subIds: new Map(),
    };

    for (const sub of object.subObjects) {
      if (isYulObject(sub)) {
        const [subAssembly, subId] = this.assembly.createSubAssembly();
        builtinContext.subIds.set(sub.name, subId);
        stackErrors.push(
          ...EvmObjectCompiler.compile(sub, subAssembly, this.options, this.analysisOf),
        );
      } else {
        builtinContext.subIds.set(sub.name, this.assembly.appendData(sub.data));
      }
    }

    stackErrors.push(
      ...CodeTransform.run(
        {
          assembly: this.assembly,
          info: this.analysisOf(object),
          dialect: this.options.dialect,
          builtinContext,
          allowStackOpt: this.options.optimizeStackAllocation,
          useNamedLabelsForFunctions: this.options.useNamedLabelsForFunctions,
        },
        object.code,
      ),
    );
    return stackErrors;
  }
}
