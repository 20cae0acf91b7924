import { CompileError } from "../errors/compile_errors.js";
import { type Literal, LiteralKind } from "./ast.js";

export const U256_MAX = (1n << 256n) - 1n;

export function valueOfNumberLiteral(text: string): bigint {
  return BigInt(text);
}

/**
 * Strings are left-aligned in the 32-byte word.
 */
export function valueOfStringLiteral(text: string): bigint {
  let value = 0n;
  for (let i = 0; i < 32; i += 1) {
    const byte = i < text.length ? BigInt(text.charCodeAt(i)) : 0n;
    value = (value << 8n) | byte;
  }
  return value;
}

export function valueOfLiteral(literal: Literal): bigint {
  switch (literal.literalKind) {
    case LiteralKind.Number:
      return valueOfNumberLiteral(literal.value);
    case LiteralKind.Boolean:
      return literal.value === "true" ? 1n : 0n;
    case LiteralKind.String:
      return valueOfStringLiteral(literal.value);
  }
}

export function validateLiteral(literal: Literal): CompileError | null {
  const location = {
    sourceName: literal.location.sourceName,
    line: literal.location.line,
    column: literal.location.column,
  };
  if (literal.literalKind === LiteralKind.Number) {
    if (valueOfNumberLiteral(literal.value) > U256_MAX) {
      return new CompileError("TypeError", "Number literal too large (> 256 bits)", location);
    }
  } else if (literal.literalKind === LiteralKind.String) {
    if (literal.value.length > 32) {
      return new CompileError(
        "TypeError",
        `String literal too long (${literal.value.length} > 32)`,
        location,
      );
    }
  }
  if (literal.type !== undefined && literal.type !== "u256" && literal.type !== "bool") {
    return new CompileError("TypeError", `Invalid type "${literal.type}" for literal`, location);
  }
  return null;
}
