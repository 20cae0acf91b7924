/**
 * Diagnostic collector shared by the front end and the pipeline
 *
 * Diagnostics come back ordered by source position; a diagnostic repeated at
 * the same position with the same code and message is kept once.
 */

import {
  AggregateCompileError,
  type CompileError,
  type CompileErrorCode,
} from "./compile_errors.js";

const keyOf = (error: CompileError): string =>
  `${error.code}@${error.location.sourceName}:${error.location.line}:${error.location.column}:${error.message}`;

function compareLocation(a: CompileError, b: CompileError): number {
  if (a.location.sourceName !== b.location.sourceName) {
    return a.location.sourceName < b.location.sourceName ? -1 : 1;
  }
  return a.location.line - b.location.line || a.location.column - b.location.column;
}

export class ErrorCollector {
  private errors: CompileError[] = [];
  private readonly seen = new Set<string>();

  add(error: CompileError): void {
    const key = keyOf(error);
    if (this.seen.has(key)) return;
    this.seen.add(key);
    this.errors.push(error);
  }

  hasErrors(): boolean {
    return this.errors.length > 0;
  }

  getErrors(): CompileError[] {
    return [...this.errors].sort(compareLocation);
  }

  withCode(code: CompileErrorCode): CompileError[] {
    return this.getErrors().filter((error) => error.code === code);
  }

  throwIfErrors(): void {
    if (this.errors.length > 0) {
      throw new AggregateCompileError(this.getErrors());
    }
  }
}
