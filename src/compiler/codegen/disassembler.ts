import { instructionByOpcode } from "../dialect/instructions.js";

/**
 * Render bytecode as space-terminated opcode names, e.g.
 * `PUSH1 0x1 PUSH1 0x2 ADD `. Push immediates are upper-case hex without
 * leading zeros.
 */
export function disassemble(bytecode: Uint8Array): string {
  let out = "";
  let pc = 0;
  while (pc < bytecode.length) {
    const instr = instructionByOpcode(bytecode[pc]);
    pc += 1;
    if (!instr) {
      out += "INVALID ";
      continue;
    }
    out += instr.name;
    if (instr.immediateBytes > 0) {
      let value = 0n;
      for (let i = 0; i < instr.immediateBytes; i += 1) {
        value = (value << 8n) | BigInt(bytecode[pc + i] ?? 0);
      }
      pc += instr.immediateBytes;
      out += ` 0x${value.toString(16).toUpperCase()}`;
    }
    out += " ";
  }
  return out;
}
