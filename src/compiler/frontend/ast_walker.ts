/**
 * Generic AST traversal. Subclasses override the hooks they need and call
 * `super` to keep descending.
 */

import {
  type Assignment,
  AstNodeKind,
  assertNever,
  type Block,
  type Break,
  type Continue,
  type Expression,
  type ExpressionStatement,
  type ForLoop,
  type FunctionCall,
  type FunctionDefinition,
  type Identifier,
  type If,
  type Leave,
  type Literal,
  type Statement,
  type Switch,
  type VariableDeclaration,
} from "./ast.js";

/** Read-only walker. Call arguments are visited last to first. */
export class AstWalker {
  visitBlock(block: Block): void {
    for (const statement of block.statements) this.visitStatement(statement);
  }

  visitStatement(statement: Statement): void {
    switch (statement.kind) {
      case AstNodeKind.Block:
        return this.visitBlock(statement);
      case AstNodeKind.ExpressionStatement:
        return this.visitExpressionStatement(statement);
      case AstNodeKind.VariableDeclaration:
        return this.visitVariableDeclaration(statement);
      case AstNodeKind.Assignment:
        return this.visitAssignment(statement);
      case AstNodeKind.If:
        return this.visitIf(statement);
      case AstNodeKind.Switch:
        return this.visitSwitch(statement);
      case AstNodeKind.ForLoop:
        return this.visitForLoop(statement);
      case AstNodeKind.Break:
        return this.visitBreak(statement);
      case AstNodeKind.Continue:
        return this.visitContinue(statement);
      case AstNodeKind.Leave:
        return this.visitLeave(statement);
      case AstNodeKind.FunctionDefinition:
        return this.visitFunctionDefinition(statement);
      default:
        return assertNever(statement, "statement");
    }
  }

  visitExpressionStatement(statement: ExpressionStatement): void {
    this.visitExpression(statement.expression);
  }

  visitVariableDeclaration(statement: VariableDeclaration): void {
    if (statement.value) this.visitExpression(statement.value);
  }

  visitAssignment(statement: Assignment): void {
    for (const name of statement.variableNames) this.visitIdentifier(name);
    this.visitExpression(statement.value);
  }

  visitIf(statement: If): void {
    this.visitExpression(statement.condition);
    this.visitBlock(statement.body);
  }

  visitSwitch(statement: Switch): void {
    this.visitExpression(statement.expression);
    for (const c of statement.cases) {
      if (c.value) this.visitLiteral(c.value);
      this.visitBlock(c.body);
    }
  }

  visitForLoop(statement: ForLoop): void {
    this.visitBlock(statement.pre);
    this.visitExpression(statement.condition);
    this.visitBlock(statement.post);
    this.visitBlock(statement.body);
  }

  visitBreak(_statement: Break): void {}

  visitContinue(_statement: Continue): void {}

  visitLeave(_statement: Leave): void {}

  visitFunctionDefinition(fn: FunctionDefinition): void {
    this.visitBlock(fn.body);
  }

  visitExpression(expression: Expression): void {
    switch (expression.kind) {
      case AstNodeKind.FunctionCall:
        return this.visitFunctionCall(expression);
      case AstNodeKind.Identifier:
        return this.visitIdentifier(expression);
      case AstNodeKind.Literal:
        return this.visitLiteral(expression);
      default:
        return assertNever(expression, "expression");
    }
  }

  visitFunctionCall(call: FunctionCall): void {
    for (let i = call.arguments.length - 1; i >= 0; i -= 1) {
      this.visitExpression(call.arguments[i]);
    }
  }

  visitIdentifier(_identifier: Identifier): void {}

  visitLiteral(_literal: Literal): void {}
}

/**
 * Walker that may replace expressions: `visitExpression` returns the node to
 * store in place of the one visited.
 */
export class AstModifier {
  visitBlock(block: Block): void {
    for (const statement of block.statements) this.visitStatement(statement);
  }

  visitStatement(statement: Statement): void {
    switch (statement.kind) {
      case AstNodeKind.Block:
        return this.visitBlock(statement);
      case AstNodeKind.ExpressionStatement:
        return this.visitExpressionStatement(statement);
      case AstNodeKind.VariableDeclaration:
        return this.visitVariableDeclaration(statement);
      case AstNodeKind.Assignment:
        return this.visitAssignment(statement);
      case AstNodeKind.If:
        return this.visitIf(statement);
      case AstNodeKind.Switch:
        return this.visitSwitch(statement);
      case AstNodeKind.ForLoop:
        return this.visitForLoop(statement);
      case AstNodeKind.FunctionDefinition:
        return this.visitFunctionDefinition(statement);
      case AstNodeKind.Break:
      case AstNodeKind.Continue:
      case AstNodeKind.Leave:
        return;
      default:
        return assertNever(statement, "statement");
    }
  }

  visitExpressionStatement(statement: ExpressionStatement): void {
    statement.expression = this.visitExpression(statement.expression);
  }

  visitVariableDeclaration(statement: VariableDeclaration): void {
    if (statement.value) statement.value = this.visitExpression(statement.value);
  }

  visitAssignment(statement: Assignment): void {
    statement.value = this.visitExpression(statement.value);
  }

  visitIf(statement: If): void {
    statement.condition = this.visitExpression(statement.condition);
    this.visitBlock(statement.body);
  }

  visitSwitch(statement: Switch): void {
    statement.expression = this.visitExpression(statement.expression);
    for (const c of statement.cases) this.visitBlock(c.body);
  }

  visitForLoop(statement: ForLoop): void {
    this.visitBlock(statement.pre);
    statement.condition = this.visitExpression(statement.condition);
    this.visitBlock(statement.post);
    this.visitBlock(statement.body);
  }

  visitFunctionDefinition(fn: FunctionDefinition): void {
    this.visitBlock(fn.body);
  }

  visitExpression(expression: Expression): Expression {
    if (expression.kind === AstNodeKind.FunctionCall) {
      this.visitFunctionCall(expression);
    }
    return expression;
  }

  visitFunctionCall(call: FunctionCall): void {
    for (let i = call.arguments.length - 1; i >= 0; i -= 1) {
      call.arguments[i] = this.visitExpression(call.arguments[i]);
    }
  }
}
