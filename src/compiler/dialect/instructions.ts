/**
 * EVM instruction table
 *
 * Fixed instructions come from data/evm_instructions.json; PUSHn, DUPn and
 * SWAPn are derived here.
 */

import { readFileSync } from "node:fs";
import { InternalCompilerError } from "../errors/compile_errors.js";

export type EffectCategory =
  | "pure"
  | "state"
  | "memoryRead"
  | "msize"
  | "memoryWrite"
  | "storageWrite"
  | "log"
  | "call"
  | "staticcall"
  | "create"
  | "terminate"
  | "control"
  | "stack";

const EFFECT_CATEGORIES: readonly EffectCategory[] = [
  "pure",
  "state",
  "memoryRead",
  "msize",
  "memoryWrite",
  "storageWrite",
  "log",
  "call",
  "staticcall",
  "create",
  "terminate",
  "control",
  "stack",
];

export interface Instruction {
  name: string;
  opcode: number;
  args: number;
  returns: number;
  effects: EffectCategory;
  /** Number of immediate bytes (PUSHn only). */
  immediateBytes: number;
}

interface InstructionRecord {
  name: string;
  opcode: number;
  args: number;
  returns: number;
  effects: string;
}

const isEffectCategory = (value: string): value is EffectCategory =>
  EFFECT_CATEGORIES.some((category) => category === value);

function isInstructionRecord(value: unknown): value is InstructionRecord {
  if (typeof value !== "object" || value === null) return false;
  return (
    "name" in value &&
    typeof value.name === "string" &&
    "opcode" in value &&
    typeof value.opcode === "number" &&
    "args" in value &&
    typeof value.args === "number" &&
    "returns" in value &&
    typeof value.returns === "number" &&
    "effects" in value &&
    typeof value.effects === "string"
  );
}

function loadInstructionTable(): Instruction[] {
  const url = new URL("../../../data/evm_instructions.json", import.meta.url);
  const parsed: unknown = JSON.parse(readFileSync(url, "utf8"));
  if (!Array.isArray(parsed)) {
    throw new InternalCompilerError("Instruction table must be an array");
  }
  return parsed.map((entry: unknown): Instruction => {
    if (!isInstructionRecord(entry) || !isEffectCategory(entry.effects)) {
      throw new InternalCompilerError(
        `Malformed instruction table entry: ${JSON.stringify(entry)}`,
      );
    }
    return {
      name: entry.name,
      opcode: entry.opcode,
      args: entry.args,
      returns: entry.returns,
      effects: entry.effects,
      immediateBytes: 0,
    };
  });
}

const PUSH1_OPCODE = 0x60;
const DUP1_OPCODE = 0x80;
const SWAP1_OPCODE = 0x90;

export const MAX_DUP = 16;
export const MAX_SWAP = 16;

const pushInstructions: Instruction[] = Array.from({ length: 32 }, (_, i): Instruction => ({
  name: `PUSH${i + 1}`,
  opcode: PUSH1_OPCODE + i,
  args: 0,
  returns: 1,
  effects: "stack",
  immediateBytes: i + 1,
}));

const dupInstructions: Instruction[] = Array.from({ length: MAX_DUP }, (_, i): Instruction => ({
  name: `DUP${i + 1}`,
  opcode: DUP1_OPCODE + i,
  args: i + 1,
  returns: i + 2,
  effects: "stack",
  immediateBytes: 0,
}));

const swapInstructions: Instruction[] = Array.from({ length: MAX_SWAP }, (_, i): Instruction => ({
  name: `SWAP${i + 1}`,
  opcode: SWAP1_OPCODE + i,
  args: i + 2,
  returns: i + 2,
  effects: "stack",
  immediateBytes: 0,
}));

const allInstructions = [
  ...loadInstructionTable(),
  ...pushInstructions,
  ...dupInstructions,
  ...swapInstructions,
];

const byName = new Map(allInstructions.map((i) => [i.name, i]));
const byOpcode = new Map(allInstructions.map((i) => [i.opcode, i]));

export function instruction(name: string): Instruction {
  const found = byName.get(name.toUpperCase());
  if (!found) throw new InternalCompilerError(`Unknown instruction ${name}`);
  return found;
}

export function instructionByOpcode(opcode: number): Instruction | undefined {
  return byOpcode.get(opcode);
}

export function fixedInstructions(): Instruction[] {
  return allInstructions.filter((i) => i.effects !== "stack");
}

export function pushInstruction(bytes: number): Instruction {
  if (bytes < 1 || bytes > 32) {
    throw new InternalCompilerError(`Invalid push width ${bytes}`);
  }
  return pushInstructions[bytes - 1];
}

export function dupInstruction(depth: number): Instruction {
  if (depth < 1 || depth > MAX_DUP) {
    throw new InternalCompilerError(`Invalid DUP depth ${depth}`);
  }
  return dupInstructions[depth - 1];
}

export function swapInstruction(depth: number): Instruction {
  if (depth < 1 || depth > MAX_SWAP) {
    throw new InternalCompilerError(`Invalid SWAP depth ${depth}`);
  }
  return swapInstructions[depth - 1];
}

/** Net stack effect of executing the instruction. */
export function stackDelta(instr: Instruction): number {
  return instr.returns - instr.args;
}

export const Instructions = {
  POP: instruction("POP"),
  JUMP: instruction("JUMP"),
  JUMPI: instruction("JUMPI"),
  JUMPDEST: instruction("JUMPDEST"),
  ISZERO: instruction("ISZERO"),
  EQ: instruction("EQ"),
  DUP1: dupInstruction(1),
  DUP2: dupInstruction(2),
  MSTORE: instruction("MSTORE"),
  CODECOPY: instruction("CODECOPY"),
  INVALID: instruction("INVALID"),
  PUSH20: pushInstruction(20),
  PUSH32: pushInstruction(32),
} as const;
