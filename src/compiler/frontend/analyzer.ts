/**
 * Scope filling and semantic checks
 */

import type { EvmDialect } from "../dialect/evm_dialect.js";
import {
  CompileError,
  type CompileErrorCode,
} from "../errors/compile_errors.js";
import { ErrorCollector } from "../errors/error_collector.js";
import {
  AstNodeKind,
  assertNever,
  type Block,
  type Expression,
  type FunctionCall,
  type FunctionDefinition,
  type Literal,
  LiteralKind,
  type SourceLocation,
  type Statement,
  type TypedName,
} from "./ast.js";
import { valueOfLiteral, validateLiteral } from "./literals.js";
import { AnalysisInfo, type ScopeId } from "./scope.js";

export interface ObjectContext {
  objectName: string;
  /** Names of sub-objects and data blobs reachable from this code. */
  dataNames: ReadonlySet<string>;
}

interface Context {
  scope: ScopeId;
  inLoopBody: boolean;
  inFunction: boolean;
  inLoopInit: boolean;
}

export class Analyzer {
  private readonly info = new AnalysisInfo();

  constructor(
    private readonly dialect: EvmDialect,
    private readonly errors: ErrorCollector,
    private readonly objectContext?: ObjectContext,
  ) {}

  analyze(block: Block): AnalysisInfo {
    this.visitBlock(block, {
      scope: -1,
      inLoopBody: false,
      inFunction: false,
      inLoopInit: false,
    });
    return this.info;
  }

  private visitBlock(block: Block, outer: Context): ScopeId {
    const scope = this.info.scopes.create(outer.scope >= 0 ? outer.scope : null);
    this.info.blockScopes.set(block, scope);
    const context: Context = { ...outer, scope };

    for (const statement of block.statements) {
      if (statement.kind !== AstNodeKind.FunctionDefinition) continue;
      if (outer.inLoopInit) {
        this.error(
          "SyntaxError",
          "Functions cannot be defined inside a for-loop init block.",
          statement.location,
        );
      }
      if (this.checkDeclarable(scope, statement.name, statement.location)) {
        this.info.scopes.registerFunction(
          scope,
          statement.name,
          statement.parameters.length,
          statement.returnVariables.length,
        );
      }
    }

    for (const statement of block.statements) {
      this.visitStatement(statement, context);
    }
    return scope;
  }

  private visitStatement(statement: Statement, context: Context): void {
    switch (statement.kind) {
      case AstNodeKind.Block:
        this.visitBlock(statement, { ...context, inLoopInit: false });
        return;
      case AstNodeKind.ExpressionStatement: {
        const values = this.visitExpression(statement.expression, context);
        if (values !== 0) {
          this.error(
            "TypeError",
            `Top-level expressions are not supposed to return values (this expression returns ${values} value${values === 1 ? "" : "s"}). Use \`\`pop()\`\` or assign them.`,
            statement.location,
          );
        }
        return;
      }
      case AstNodeKind.VariableDeclaration: {
        if (statement.value) {
          const values = this.visitExpression(statement.value, context);
          if (values !== statement.variables.length) {
            this.error(
              "DeclarationError",
              `Variable count mismatch for declaration of "${statement.variables.map((v) => v.name).join(", ")}": ${statement.variables.length} variables and ${values} values.`,
              statement.location,
            );
          }
        }
        this.declareVariables(statement.variables, context.scope);
        return;
      }
      case AstNodeKind.Assignment: {
        const values = this.visitExpression(statement.value, context);
        if (values !== statement.variableNames.length) {
          this.error(
            "DeclarationError",
            `Variable count does not match number of values (${statement.variableNames.length} vs. ${values})`,
            statement.location,
          );
        }
        const seen = new Set<string>();
        for (const target of statement.variableNames) {
          if (seen.has(target.name)) {
            this.error(
              "DeclarationError",
              `Variable ${target.name} occurs multiple times on the left-hand side of the assignment.`,
              target.location,
            );
          }
          seen.add(target.name);
          const symbol = this.info.scopes.lookup(context.scope, target.name);
          if (!symbol) {
            this.error("DeclarationError", `Variable not found or variable not lvalue.`, target.location);
          } else if (symbol.kind !== "variable") {
            this.error("TypeError", `Assignment requires variable.`, target.location);
          }
        }
        return;
      }
      case AstNodeKind.If:
        this.expectSingleValue(statement.condition, context);
        this.visitBlock(statement.body, { ...context, inLoopInit: false });
        return;
      case AstNodeKind.Switch: {
        this.expectSingleValue(statement.expression, context);
        const seen = new Set<bigint>();
        for (const c of statement.cases) {
          if (c.value) {
            this.checkLiteral(c.value);
            const value = valueOfLiteral(c.value);
            if (seen.has(value)) {
              this.error("DeclarationError", "Duplicate case defined.", c.location);
            }
            seen.add(value);
          }
          this.visitBlock(c.body, { ...context, inLoopInit: false });
        }
        return;
      }
      case AstNodeKind.ForLoop: {
        const preScope = this.visitBlock(statement.pre, {
          ...context,
          inLoopBody: false,
          inLoopInit: true,
        });
        const loopContext: Context = { ...context, scope: preScope, inLoopInit: false };
        this.expectSingleValue(statement.condition, loopContext);
        this.visitBlock(statement.post, { ...loopContext, inLoopBody: false });
        this.visitBlock(statement.body, { ...loopContext, inLoopBody: true });
        return;
      }
      case AstNodeKind.Break:
      case AstNodeKind.Continue:
        if (!context.inLoopBody) {
          this.error(
            "SyntaxError",
            `Keyword "${statement.kind === AstNodeKind.Break ? "break" : "continue"}" needs to be inside a for-loop body.`,
            statement.location,
          );
        }
        return;
      case AstNodeKind.Leave:
        if (!context.inFunction) {
          this.error(
            "SyntaxError",
            'Keyword "leave" can only be used inside a function.',
            statement.location,
          );
        }
        return;
      case AstNodeKind.FunctionDefinition:
        this.visitFunctionDefinition(statement, context);
        return;
      default:
        assertNever(statement, "statement");
    }
  }

  private visitFunctionDefinition(fn: FunctionDefinition, context: Context): void {
    const functionScope = this.info.scopes.create(context.scope, true);
    this.info.functionScopes.set(fn, functionScope);
    this.declareVariables([...fn.parameters, ...fn.returnVariables], functionScope);
    this.visitBlock(fn.body, {
      scope: functionScope,
      inLoopBody: false,
      inFunction: true,
      inLoopInit: false,
    });
  }

  private declareVariables(variables: TypedName[], scope: ScopeId): void {
    for (const variable of variables) {
      if (variable.type !== undefined && variable.type !== "u256" && variable.type !== "bool") {
        this.error("TypeError", `"${variable.type}" is not a valid type.`, variable.location);
      }
      if (this.checkDeclarable(scope, variable.name, variable.location)) {
        this.info.scopes.registerVariable(scope, variable.name);
      }
    }
  }

  private checkDeclarable(scope: ScopeId, name: string, location: SourceLocation): boolean {
    if (this.dialect.isBuiltin(name)) {
      this.error("ParserError", `Cannot use builtin function name "${name}" as identifier name.`, location);
      return false;
    }
    if (this.info.scopes.exists(scope, name)) {
      this.error(
        "DeclarationError",
        `Variable name ${name} already taken in this scope.`,
        location,
        "Identifiers cannot be shadowed; choose a different name",
      );
      return false;
    }
    return true;
  }

  private expectSingleValue(expression: Expression, context: Context): void {
    const values = this.visitExpression(expression, context);
    if (values !== 1) {
      this.error(
        "TypeError",
        `Expected expression to evaluate to one value, but got ${values} values instead.`,
        expression.location,
      );
    }
  }

  /** Returns the number of values the expression leaves on the stack. */
  private visitExpression(expression: Expression, context: Context): number {
    switch (expression.kind) {
      case AstNodeKind.Literal:
        this.checkLiteral(expression);
        return 1;
      case AstNodeKind.Identifier: {
        const symbol = this.info.scopes.lookup(context.scope, expression.name);
        if (!symbol) {
          if (this.dialect.isBuiltin(expression.name)) {
            this.error("TypeError", `Builtin function "${expression.name}" must be called.`, expression.location);
          } else {
            this.error("DeclarationError", `Identifier "${expression.name}" not found.`, expression.location);
          }
          return 1;
        }
        if (symbol.kind === "function") {
          this.error("TypeError", `Function ${expression.name} used without being called.`, expression.location);
        }
        return 1;
      }
      case AstNodeKind.FunctionCall:
        return this.visitFunctionCall(expression, context);
      default:
        return assertNever(expression, "expression");
    }
  }

  private visitFunctionCall(call: FunctionCall, context: Context): number {
    const name = call.functionName.name;
    const builtin = this.dialect.builtin(name);
    let parameters: number;
    let returns: number;
    let literalArguments: readonly boolean[] | null = null;

    if (builtin) {
      parameters = builtin.parameters;
      returns = builtin.returns;
      literalArguments = builtin.literalArguments;
    } else {
      const symbol = this.info.scopes.lookup(context.scope, name);
      if (!symbol) {
        this.error("DeclarationError", `Function "${name}" not found.`, call.functionName.location);
        for (const arg of call.arguments) this.visitExpression(arg, context);
        return 0;
      }
      if (symbol.kind !== "function") {
        this.error("TypeError", `Attempt to call variable instead of function.`, call.functionName.location);
        for (const arg of call.arguments) this.visitExpression(arg, context);
        return 0;
      }
      parameters = symbol.parameters;
      returns = symbol.returns;
    }

    if (call.arguments.length !== parameters) {
      this.error(
        "TypeError",
        `Function "${name}" expects ${parameters} arguments but got ${call.arguments.length}.`,
        call.functionName.location,
      );
    }

    for (let i = call.arguments.length - 1; i >= 0; i -= 1) {
      const arg = call.arguments[i];
      if (literalArguments?.[i]) {
        if (arg.kind !== AstNodeKind.Literal || arg.literalKind !== LiteralKind.String) {
          this.error("TypeError", `Function "${name}" expects a string literal as argument ${i + 1}.`, arg.location);
        } else if (name === "datasize" || name === "dataoffset") {
          this.checkDataName(arg.value, arg.location);
        } else {
          this.checkLiteral(arg);
        }
        continue;
      }
      if (this.visitExpression(arg, context) !== 1) {
        this.error(
          "TypeError",
          `Function arguments must evaluate to one value each.`,
          arg.location,
        );
      }
    }
    return returns;
  }

  private checkDataName(name: string, location: SourceLocation): void {
    if (!this.objectContext) {
      this.error("TypeError", `Data access "${name}" outside of an object.`, location);
      return;
    }
    if (name !== this.objectContext.objectName && !this.objectContext.dataNames.has(name)) {
      this.error("TypeError", `Unknown data object "${name}".`, location);
    }
  }

  private checkLiteral(literal: Literal): void {
    const error = validateLiteral(literal);
    if (error) this.errors.add(error);
  }

  private error(
    code: CompileErrorCode,
    message: string,
    location: SourceLocation,
    suggestion?: string,
  ): void {
    this.errors.add(
      new CompileError(
        code,
        message,
        {
          sourceName: location.sourceName,
          line: location.line,
          column: location.column,
        },
        suggestion,
      ),
    );
  }
}

/**
 * Analyze a block and throw an aggregate error if it is invalid.
 */
export function analyzeBlock(
  block: Block,
  dialect: EvmDialect,
  objectContext?: ObjectContext,
): AnalysisInfo {
  const errors = new ErrorCollector();
  const info = new Analyzer(dialect, errors, objectContext).analyze(block);
  errors.throwIfErrors();
  return info;
}
