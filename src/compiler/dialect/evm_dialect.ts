/**
 * EVM dialect: the builtin functions available to Yul code
 */

import type { AbstractAssembly, SubId } from "../codegen/abstract_assembly.js";
import { InternalCompilerError, MalformedInputError } from "../errors/compile_errors.js";
import {
  AstNodeKind,
  type Expression,
  type FunctionCall,
  LiteralKind,
} from "../frontend/ast.js";
import { fixedInstructions, type Instruction, Instructions } from "./instructions.js";
import {
  NO_SIDE_EFFECTS,
  type SideEffects,
  sideEffectsOfCategory,
} from "./side_effects.js";

export interface BuiltinContext {
  /** Name of the object whose code is being compiled. */
  currentObjectName?: string;
  /** Sub-objects and data blobs visible from the current object. */
  subIds: Map<string, SubId>;
}

export type ExpressionVisitor = (expression: Expression) => void;

export interface BuiltinFunction {
  name: string;
  parameters: number;
  returns: number;
  sideEffects: SideEffects;
  isMSize: boolean;
  /** Per-argument flag: the argument must be a string literal. */
  literalArguments: readonly boolean[] | null;
  instruction?: Instruction;
  generateCode(
    call: FunctionCall,
    assembly: AbstractAssembly,
    context: BuiltinContext,
    visitExpression: ExpressionVisitor,
  ): void;
}

export interface EvmDialectOptions {
  /** Expose datasize, dataoffset, datacopy and the immutable builtins. */
  objectAccess?: boolean;
}

const visitArgumentsReversed = (
  call: FunctionCall,
  visitExpression: ExpressionVisitor,
): void => {
  for (let i = call.arguments.length - 1; i >= 0; i -= 1) {
    visitExpression(call.arguments[i]);
  }
};

export function literalArgument(call: FunctionCall, index: number): string {
  const arg = call.arguments[index];
  if (
    arg === undefined ||
    arg.kind !== AstNodeKind.Literal ||
    arg.literalKind !== LiteralKind.String
  ) {
    throw new MalformedInputError(
      `Argument ${index + 1} of ${call.functionName.name} must be a string literal`,
    );
  }
  return arg.value;
}

function instructionBuiltin(instr: Instruction): BuiltinFunction {
  return {
    name: instr.name.toLowerCase(),
    parameters: instr.args,
    returns: instr.returns,
    sideEffects: sideEffectsOfCategory(instr.effects),
    isMSize: instr.effects === "msize",
    literalArguments: null,
    instruction: instr,
    generateCode(call, assembly, _context, visitExpression) {
      visitArgumentsReversed(call, visitExpression);
      assembly.appendInstruction(instr);
    },
  };
}

function lookupSubId(context: BuiltinContext, name: string): SubId {
  const subId = context.subIds.get(name);
  if (subId === undefined) {
    throw new InternalCompilerError(`Could not find assembly object <${name}>`);
  }
  return subId;
}

function objectAccessBuiltins(): BuiltinFunction[] {
  return [
    {
      name: "datasize",
      parameters: 1,
      returns: 1,
      sideEffects: { ...NO_SIDE_EFFECTS },
      isMSize: false,
      literalArguments: [true],
      generateCode(call, assembly, context) {
        const name = literalArgument(call, 0);
        if (name === context.currentObjectName) {
          assembly.appendAssemblySize();
        } else {
          assembly.appendDataSize(lookupSubId(context, name));
        }
      },
    },
    {
      name: "dataoffset",
      parameters: 1,
      returns: 1,
      sideEffects: { ...NO_SIDE_EFFECTS },
      isMSize: false,
      literalArguments: [true],
      generateCode(call, assembly, context) {
        const name = literalArgument(call, 0);
        if (name === context.currentObjectName) {
          assembly.appendConstant(0n);
        } else {
          assembly.appendDataOffset(lookupSubId(context, name));
        }
      },
    },
    {
      ...instructionBuiltin(Instructions.CODECOPY),
      name: "datacopy",
    },
    {
      name: "setimmutable",
      parameters: 2,
      returns: 0,
      sideEffects: {
        movable: false,
        sideEffectFree: false,
        sideEffectFreeIfNoMSize: false,
        invalidatesStorage: false,
        invalidatesMemory: true,
      },
      isMSize: false,
      literalArguments: [true, false],
      generateCode(call, assembly, _context, visitExpression) {
        const name = literalArgument(call, 0);
        visitExpression(call.arguments[1]);
        assembly.appendImmutableAssignment(name);
      },
    },
    {
      name: "loadimmutable",
      parameters: 1,
      returns: 1,
      sideEffects: { ...NO_SIDE_EFFECTS },
      isMSize: false,
      literalArguments: [true],
      generateCode(call, assembly) {
        assembly.appendImmutable(literalArgument(call, 0));
      },
    },
  ];
}

export class EvmDialect {
  readonly storageLoadFunctionName = "sload";
  readonly storageStoreFunctionName = "sstore";
  readonly memoryLoadFunctionName = "mload";
  readonly memoryStoreFunctionName = "mstore";
  readonly hashFunctionName = "keccak256";

  private readonly builtins = new Map<string, BuiltinFunction>();

  constructor(readonly options: EvmDialectOptions = {}) {
    for (const instr of fixedInstructions()) {
      if (instr.effects === "control") continue;
      const builtin = instructionBuiltin(instr);
      this.builtins.set(builtin.name, builtin);
    }
    this.builtins.set("linkersymbol", {
      name: "linkersymbol",
      parameters: 1,
      returns: 1,
      sideEffects: { ...NO_SIDE_EFFECTS },
      isMSize: false,
      literalArguments: [true],
      generateCode(call, assembly) {
        assembly.appendLinkerSymbol(literalArgument(call, 0));
      },
    });
    if (options.objectAccess ?? true) {
      for (const builtin of objectAccessBuiltins()) {
        this.builtins.set(builtin.name, builtin);
      }
    }
  }

  builtin(name: string): BuiltinFunction | undefined {
    return this.builtins.get(name);
  }

  isBuiltin(name: string): boolean {
    return this.builtins.has(name);
  }

  builtinNames(): string[] {
    return [...this.builtins.keys()];
  }
}
