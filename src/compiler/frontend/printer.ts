/**
 * Renders an AST back to Yul source
 */

import {
  AstNodeKind,
  assertNever,
  type Block,
  type Expression,
  type Literal,
  LiteralKind,
  type Statement,
  type TypedName,
  type YulObject,
  isYulObject,
} from "./ast.js";

const INDENT = "    ";

export function printBlock(block: Block, indent = ""): string {
  if (block.statements.length === 0) return "{ }";
  const inner = indent + INDENT;
  const lines = block.statements.map(
    (statement) => inner + printStatement(statement, inner),
  );
  return `{\n${lines.join("\n")}\n${indent}}`;
}

export function printStatement(statement: Statement, indent = ""): string {
  switch (statement.kind) {
    case AstNodeKind.Block:
      return printBlock(statement, indent);
    case AstNodeKind.ExpressionStatement:
      return printExpression(statement.expression);
    case AstNodeKind.VariableDeclaration: {
      const names = `let ${printTypedNames(statement.variables)}`;
      return statement.value
        ? `${names} := ${printExpression(statement.value)}`
        : names;
    }
    case AstNodeKind.Assignment:
      return `${statement.variableNames.map((id) => id.name).join(", ")} := ${printExpression(statement.value)}`;
    case AstNodeKind.If:
      return `if ${printExpression(statement.condition)} ${printBlock(statement.body, indent)}`;
    case AstNodeKind.Switch: {
      const cases = statement.cases.map((c) => {
        const label = c.value ? `case ${printLiteral(c.value)}` : "default";
        return `${indent}${label} ${printBlock(c.body, indent)}`;
      });
      return [`switch ${printExpression(statement.expression)}`, ...cases].join("\n");
    }
    case AstNodeKind.ForLoop:
      return `for ${printBlock(statement.pre, indent)} ${printExpression(statement.condition)} ${printBlock(statement.post, indent)}\n${indent}${printBlock(statement.body, indent)}`;
    case AstNodeKind.Break:
      return "break";
    case AstNodeKind.Continue:
      return "continue";
    case AstNodeKind.Leave:
      return "leave";
    case AstNodeKind.FunctionDefinition: {
      const returns =
        statement.returnVariables.length > 0
          ? ` -> ${printTypedNames(statement.returnVariables)}`
          : "";
      return `function ${statement.name}(${printTypedNames(statement.parameters)})${returns}\n${indent}${printBlock(statement.body, indent)}`;
    }
    default:
      return assertNever(statement, "statement");
  }
}

export function printExpression(expression: Expression): string {
  switch (expression.kind) {
    case AstNodeKind.Identifier:
      return expression.name;
    case AstNodeKind.Literal:
      return printLiteral(expression);
    case AstNodeKind.FunctionCall:
      return `${expression.functionName.name}(${expression.arguments.map(printExpression).join(", ")})`;
    default:
      return assertNever(expression, "expression");
  }
}

export function printLiteral(literal: Literal): string {
  const suffix = literal.type ? `:${literal.type}` : "";
  if (literal.literalKind !== LiteralKind.String) return literal.value + suffix;
  let escaped = "";
  for (const ch of literal.value) {
    const code = ch.charCodeAt(0);
    if (ch === '"' || ch === "\\") escaped += `\\${ch}`;
    else if (code < 0x20 || code > 0x7e) {
      escaped += `\\x${code.toString(16).padStart(2, "0")}`;
    } else escaped += ch;
  }
  return `"${escaped}"${suffix}`;
}

export function printObject(object: YulObject, indent = ""): string {
  const inner = indent + INDENT;
  const parts = [`${inner}code ${printBlock(object.code, inner)}`];
  for (const sub of object.subObjects) {
    if (isYulObject(sub)) {
      parts.push(inner + printObject(sub, inner));
    } else {
      const hex = Array.from(sub.data, (b) => b.toString(16).padStart(2, "0")).join("");
      parts.push(`${inner}data "${sub.name}" hex"${hex}"`);
    }
  }
  return `object "${object.name}" {\n${parts.join("\n")}\n${indent}}`;
}

function printTypedNames(names: TypedName[]): string {
  return names.map((n) => (n.type ? `${n.name}:${n.type}` : n.name)).join(", ");
}
