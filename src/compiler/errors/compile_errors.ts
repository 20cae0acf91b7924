/**
 * Compiler error types and helpers
 */

export type CompileErrorCode =
  | "ParserError"
  | "SyntaxError"
  | "DeclarationError"
  | "TypeError"
  | "StackTooDeep";

export interface CompileErrorLocation {
  sourceName: string;
  line: number;
  column: number;
}

/**
 * User-facing diagnostic.
 */
export class CompileError extends Error {
  readonly code: CompileErrorCode;
  readonly location: CompileErrorLocation;
  readonly suggestion?: string;

  constructor(
    code: CompileErrorCode,
    message: string,
    location: CompileErrorLocation,
    suggestion?: string,
  ) {
    super(message);
    this.name = "CompileError";
    this.code = code;
    this.location = location;
    this.suggestion = suggestion;
  }

  format(): string {
    const loc = `${this.location.sourceName}:${this.location.line}:${this.location.column}`;
    const suggestion = this.suggestion ? ` (hint: ${this.suggestion})` : "";
    return `[${this.code}] ${loc} ${this.message}${suggestion}`;
  }
}

/**
 * A variable or return slot that cannot be reached with DUP/SWAP.
 * Returned by the code generator as a value, never thrown past it.
 */
export class StackTooDeepError extends Error {
  readonly functionName?: string;
  readonly variableName?: string;
  readonly depth: number;
  readonly comment: string;

  constructor(
    depth: number,
    comment: string,
    variableName?: string,
    functionName?: string,
  ) {
    super(comment);
    this.name = "StackTooDeepError";
    this.depth = depth;
    this.comment = comment;
    this.variableName = variableName;
    this.functionName = functionName;
  }

  withFunctionName(functionName: string): StackTooDeepError {
    return new StackTooDeepError(
      this.depth,
      this.comment,
      this.variableName,
      this.functionName ?? functionName,
    );
  }
}

export class InternalCompilerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InternalCompilerError";
  }
}

export class UnsupportedOperationError extends InternalCompilerError {
  constructor(message: string) {
    super(message);
    this.name = "UnsupportedOperationError";
  }
}

export class MalformedInputError extends InternalCompilerError {
  constructor(message: string) {
    super(message);
    this.name = "MalformedInputError";
  }
}

export function assertInvariant(
  condition: unknown,
  message: string,
): asserts condition {
  if (!condition) {
    throw new InternalCompilerError(message);
  }
}

export class AggregateCompileError extends Error {
  readonly errors: CompileError[];

  constructor(errors: CompileError[]) {
    super(AggregateCompileError.formatMessage(errors));
    this.name = "AggregateCompileError";
    this.errors = errors;
  }

  private static formatMessage(errors: CompileError[]): string {
    const header = `Compilation failed with ${errors.length} error(s):`;
    const lines = errors.map((err) => `- ${err.format()}`);
    return [header, ...lines].join("\n");
  }
}
