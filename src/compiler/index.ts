/**
 * Main compiler pipeline: Yul source -> (optimized) AST -> EVM assembly -> bytecode
 */

import { bytesToHex } from "@noble/hashes/utils";
import { stackTooDeepDiagnostic } from "./codegen/code_generator.js";
import { disassemble } from "./codegen/disassembler.js";
import { EvmAssemblyAdapter } from "./codegen/evm_assembly_adapter.js";
import { EvmObjectCompiler } from "./codegen/evm_object_compiler.js";
import { EvmDialect } from "./dialect/evm_dialect.js";
import {
  AggregateCompileError,
  CompileError,
  InternalCompilerError,
} from "./errors/compile_errors.js";
import { ErrorCollector } from "./errors/error_collector.js";
import { Analyzer } from "./frontend/analyzer.js";
import { isYulObject, type YulObject } from "./frontend/ast.js";
import { Parser } from "./frontend/parser.js";
import { printBlock, printObject } from "./frontend/printer.js";
import type { AnalysisInfo } from "./frontend/scope.js";
import { LoadResolver } from "./optimizer/load_resolver.js";
import { MSizeFinder } from "./optimizer/side_effects_collector.js";

/**
 * Compiler options
 */
export interface CompilerOptions {
  /** Run the load resolver before code generation. */
  optimize?: boolean;
  /** Free variables after their last use and reuse their slots (default true). */
  optimizeStackAllocation?: boolean;
  useNamedLabelsForFunctions?: boolean;
  sourceName?: string;
  verbose?: boolean;
}

/**
 * Compiler output
 */
export interface CompilerOutput {
  bytecode: Uint8Array;
  /** Bytecode as lower-case hex without prefix. */
  bytecodeHex: string;
  /** Space-terminated opcode listing, e.g. `PUSH1 0x1 POP `. */
  opcodes: string;
  /** Assembly listing with tags and sub-assemblies. */
  assembly: string;
  /** The source that was compiled, after optimization. */
  source: string;
  linkReferences: Map<number, string>;
  immutableReferences: Map<string, number[]>;
  /** Replacements made by the optimizer. */
  optimizerRewrites: number;
}

export type CompileResult =
  | { success: true; output: CompilerOutput }
  | { success: false; diagnostics: CompileError[] };

/**
 * Main compiler class
 */
export class YulCompiler {
  private readonly dialect = new EvmDialect();

  compile(source: string, options: CompilerOptions = {}): CompileResult {
    const sourceName = options.sourceName ?? "<stdin>";
    const log = (message: string): void => {
      if (options.verbose) console.log(message);
    };

    let object: YulObject;
    try {
      object = new Parser(sourceName).parseObject(source);
    } catch (err) {
      if (err instanceof CompileError) return { success: false, diagnostics: [err] };
      throw err;
    }
    log(`Parsed object "${object.name}"`);

    const errors = new ErrorCollector();
    let analysis = this.analyzeObjects(object, errors);
    if (errors.hasErrors()) {
      return { success: false, diagnostics: errors.getErrors() };
    }

    let optimizerRewrites = 0;
    if (options.optimize) {
      for (const current of this.objectsOf(object)) {
        if (MSizeFinder.containsMSize(this.dialect, current.code)) {
          console.warn(`Object "${current.name}" reads msize; memory loads are not forwarded`);
        }
        optimizerRewrites += LoadResolver.run(this.dialect, current.code);
      }
      log(`Load resolver replaced ${optimizerRewrites} expression(s)`);

      const reanalysis = new ErrorCollector();
      analysis = this.analyzeObjects(object, reanalysis);
      if (reanalysis.hasErrors()) {
        throw new InternalCompilerError(
          `Optimized code failed analysis:\n${reanalysis
            .getErrors()
            .map((err) => err.format())
            .join("\n")}`,
        );
      }
    }

    const adapter = new EvmAssemblyAdapter();
    const stackErrors = EvmObjectCompiler.compile(
      object,
      adapter,
      {
        dialect: this.dialect,
        optimizeStackAllocation: options.optimizeStackAllocation ?? true,
        useNamedLabelsForFunctions: options.useNamedLabelsForFunctions ?? false,
      },
      (current) => {
        const info = analysis.get(current);
        if (!info) throw new InternalCompilerError(`No analysis for object "${current.name}"`);
        return info;
      },
    );
    if (stackErrors.length > 0) {
      return {
        success: false,
        diagnostics: stackErrors.map((err) => stackTooDeepDiagnostic(err, object.code.location)),
      };
    }

    const linked = adapter.assembly.assemble();
    log(`Assembled ${linked.bytecode.length} byte(s)`);
    return {
      success: true,
      output: {
        bytecode: linked.bytecode,
        bytecodeHex: bytesToHex(linked.bytecode),
        opcodes: disassemble(linked.bytecode),
        assembly: adapter.assembly.toString(),
        // A bare block parses into an object sharing the block's location.
        source: object.location === object.code.location ? printBlock(object.code) : printObject(object),
        linkReferences: linked.linkReferences,
        immutableReferences: linked.immutableReferences,
        optimizerRewrites,
      },
    };
  }

  private analyzeObjects(object: YulObject, errors: ErrorCollector): Map<YulObject, AnalysisInfo> {
    const result = new Map<YulObject, AnalysisInfo>();
    for (const current of this.objectsOf(object)) {
      const analyzer = new Analyzer(this.dialect, errors, {
        objectName: current.name,
        dataNames: new Set(current.subObjects.map((sub) => sub.name)),
      });
      result.set(current, analyzer.analyze(current.code));
    }
    return result;
  }

  private objectsOf(object: YulObject): YulObject[] {
    return [object, ...object.subObjects.filter(isYulObject).flatMap((sub) => this.objectsOf(sub))];
  }
}

export function compile(source: string, options: CompilerOptions = {}): CompileResult {
  return new YulCompiler().compile(source, options);
}

export function compileOrThrow(source: string, options: CompilerOptions = {}): CompilerOutput {
  const result = compile(source, options);
  if (!result.success) throw new AggregateCompileError(result.diagnostics);
  return result.output;
}

export { CodeGenerator, type AssembleResult } from "./codegen/code_generator.js";
export { CodeTransform, type CodeTransformOptions } from "./codegen/code_transform/transform.js";
export { disassemble } from "./codegen/disassembler.js";
export { EvmAssembly, type LinkerObject } from "./codegen/evm_assembly.js";
export { EvmAssemblyAdapter } from "./codegen/evm_assembly_adapter.js";
export { EvmObjectCompiler } from "./codegen/evm_object_compiler.js";
export { type AbstractAssembly, JumpType, type LabelId, type SubId } from "./codegen/abstract_assembly.js";
export { type BuiltinFunction, EvmDialect } from "./dialect/evm_dialect.js";
export * from "./errors/compile_errors.js";
export { ErrorCollector } from "./errors/error_collector.js";
export { analyzeBlock, Analyzer } from "./frontend/analyzer.js";
export * from "./frontend/ast.js";
export { parseBlock, parseObject, Parser } from "./frontend/parser.js";
export { printBlock, printObject } from "./frontend/printer.js";
export { AnalysisInfo } from "./frontend/scope.js";
export * from "./optimizer/index.js";
