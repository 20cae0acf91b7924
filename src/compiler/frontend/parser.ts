/**
 * Recursive-descent parser for Yul code blocks and the object notation
 */

import { CompileError } from "../errors/compile_errors.js";
import {
  type Assignment,
  AstNodeKind,
  type Block,
  type Case,
  type DataBlob,
  type Expression,
  type FunctionCall,
  type FunctionDefinition,
  type Identifier,
  type Literal,
  LiteralKind,
  type SourceLocation,
  type Statement,
  type TypedName,
  type YulObject,
} from "./ast.js";
import { Lexer, type Token, TokenKind } from "./lexer.js";

const RESERVED_WORDS = new Set([
  "let",
  "function",
  "if",
  "switch",
  "case",
  "default",
  "for",
  "break",
  "continue",
  "leave",
  "true",
  "false",
]);

export const DEFAULT_OBJECT_NAME = "object";

export class Parser {
  private tokens: Token[] = [];
  private index = 0;

  constructor(private readonly sourceName = "<stdin>") {}

  /**
   * Parse either a bare code block or an object definition.
   */
  parseObject(source: string): YulObject {
    this.reset(source);
    if (this.peekIdentifier("object")) {
      const object = this.parseObjectDefinition();
      this.expect(TokenKind.EOF);
      return object;
    }
    const code = this.parseBlock();
    this.expect(TokenKind.EOF);
    return {
      name: DEFAULT_OBJECT_NAME,
      location: code.location,
      code,
      subObjects: [],
    };
  }

  parseBlockSource(source: string): Block {
    this.reset(source);
    const block = this.parseBlock();
    this.expect(TokenKind.EOF);
    return block;
  }

  private reset(source: string): void {
    this.tokens = new Lexer(source, this.sourceName).tokenize();
    this.index = 0;
  }

  private parseObjectDefinition(): YulObject {
    const start = this.expectKeyword("object");
    const name = this.expect(TokenKind.String).text;
    this.expect(TokenKind.LBrace);
    this.expectKeyword("code");
    const code = this.parseBlock();
    const subObjects: Array<YulObject | DataBlob> = [];
    while (!this.check(TokenKind.RBrace)) {
      if (this.peekIdentifier("object")) {
        subObjects.push(this.parseObjectDefinition());
      } else if (this.peekIdentifier("data")) {
        subObjects.push(this.parseData());
      } else {
        throw this.errorAt(this.peek(), "Expected 'object' or 'data'");
      }
    }
    this.expect(TokenKind.RBrace);
    return { name, location: start.location, code, subObjects };
  }

  private parseData(): DataBlob {
    const start = this.expectKeyword("data");
    const name = this.expect(TokenKind.String).text;
    const token = this.advance();
    if (token.kind === TokenKind.HexString) {
      return { name, location: start.location, data: hexToBytes(token.text) };
    }
    if (token.kind === TokenKind.String) {
      return { name, location: start.location, data: stringToBytes(token.text) };
    }
    throw this.errorAt(token, "Expected a string or hex literal for data");
  }

  private parseBlock(): Block {
    const open = this.expect(TokenKind.LBrace);
    const statements: Statement[] = [];
    while (!this.check(TokenKind.RBrace)) {
      statements.push(this.parseStatement());
    }
    const close = this.expect(TokenKind.RBrace);
    return {
      kind: AstNodeKind.Block,
      statements,
      location: this.span(open.location, close.location),
    };
  }

  private parseStatement(): Statement {
    const token = this.peek();
    if (token.kind === TokenKind.LBrace) return this.parseBlock();
    if (token.kind !== TokenKind.Identifier) {
      throw this.errorAt(token, "Literal or identifier cannot be used as statement");
    }

    switch (token.text) {
      case "function":
        return this.parseFunctionDefinition();
      case "let":
        return this.parseVariableDeclaration();
      case "if": {
        this.advance();
        const condition = this.parseExpression();
        const body = this.parseBlock();
        return {
          kind: AstNodeKind.If,
          condition,
          body,
          location: this.span(token.location, body.location),
        };
      }
      case "switch":
        return this.parseSwitch();
      case "for": {
        this.advance();
        const pre = this.parseBlock();
        const condition = this.parseExpression();
        const post = this.parseBlock();
        const body = this.parseBlock();
        return {
          kind: AstNodeKind.ForLoop,
          pre,
          condition,
          post,
          body,
          location: this.span(token.location, body.location),
        };
      }
      case "break":
        this.advance();
        return { kind: AstNodeKind.Break, location: token.location };
      case "continue":
        this.advance();
        return { kind: AstNodeKind.Continue, location: token.location };
      case "leave":
        this.advance();
        return { kind: AstNodeKind.Leave, location: token.location };
      default:
        break;
    }

    const next = this.peek(1);
    if (next.kind === TokenKind.Comma || next.kind === TokenKind.Assign) {
      return this.parseAssignment();
    }

    const expression = this.parseExpression();
    if (expression.kind !== AstNodeKind.FunctionCall) {
      throw this.errorAt(token, "Literal or identifier cannot be used as statement");
    }
    return {
      kind: AstNodeKind.ExpressionStatement,
      expression,
      location: expression.location,
    };
  }

  private parseAssignment(): Assignment {
    const variableNames: Identifier[] = [this.parseIdentifier()];
    while (this.check(TokenKind.Comma)) {
      this.advance();
      variableNames.push(this.parseIdentifier());
    }
    this.expect(TokenKind.Assign);
    const value = this.parseExpression();
    return {
      kind: AstNodeKind.Assignment,
      variableNames,
      value,
      location: this.span(variableNames[0].location, value.location),
    };
  }

  private parseVariableDeclaration(): Statement {
    const start = this.expectKeyword("let");
    const variables = [this.parseTypedName()];
    while (this.check(TokenKind.Comma)) {
      this.advance();
      variables.push(this.parseTypedName());
    }
    if (!this.check(TokenKind.Assign)) {
      return {
        kind: AstNodeKind.VariableDeclaration,
        variables,
        location: this.span(
          start.location,
          variables[variables.length - 1].location,
        ),
      };
    }
    this.advance();
    const value = this.parseExpression();
    return {
      kind: AstNodeKind.VariableDeclaration,
      variables,
      value,
      location: this.span(start.location, value.location),
    };
  }

  private parseSwitch(): Statement {
    const start = this.expectKeyword("switch");
    const expression = this.parseExpression();
    const cases: Case[] = [];
    let end = expression.location;
    while (this.peekIdentifier("case")) {
      const caseToken = this.advance();
      const value = this.parseLiteral();
      const body = this.parseBlock();
      cases.push({
        value,
        body,
        location: this.span(caseToken.location, body.location),
      });
      end = body.location;
    }
    if (this.peekIdentifier("default")) {
      const defaultToken = this.advance();
      const body = this.parseBlock();
      cases.push({
        body,
        location: this.span(defaultToken.location, body.location),
      });
      end = body.location;
    }
    if (cases.length === 0) {
      throw this.errorAt(this.peek(), "Switch statement without any cases");
    }
    if (this.peekIdentifier("case")) {
      throw this.errorAt(this.peek(), "Case not allowed after default case");
    }
    return {
      kind: AstNodeKind.Switch,
      expression,
      cases,
      location: this.span(start.location, end),
    };
  }

  private parseFunctionDefinition(): FunctionDefinition {
    const start = this.expectKeyword("function");
    const name = this.parseIdentifier().name;
    this.expect(TokenKind.LParen);
    const parameters: TypedName[] = [];
    if (!this.check(TokenKind.RParen)) {
      parameters.push(this.parseTypedName());
      while (this.check(TokenKind.Comma)) {
        this.advance();
        parameters.push(this.parseTypedName());
      }
    }
    this.expect(TokenKind.RParen);
    const returnVariables: TypedName[] = [];
    if (this.check(TokenKind.Arrow)) {
      this.advance();
      returnVariables.push(this.parseTypedName());
      while (this.check(TokenKind.Comma)) {
        this.advance();
        returnVariables.push(this.parseTypedName());
      }
    }
    const body = this.parseBlock();
    return {
      kind: AstNodeKind.FunctionDefinition,
      name,
      parameters,
      returnVariables,
      body,
      location: this.span(start.location, body.location),
    };
  }

  private parseExpression(): Expression {
    const token = this.peek();
    if (
      token.kind === TokenKind.Identifier &&
      token.text !== "true" &&
      token.text !== "false"
    ) {
      const identifier = this.parseIdentifier();
      if (!this.check(TokenKind.LParen)) return identifier;
      return this.parseCall(identifier);
    }
    return this.parseLiteral();
  }

  private parseCall(functionName: Identifier): FunctionCall {
    this.expect(TokenKind.LParen);
    const args: Expression[] = [];
    if (!this.check(TokenKind.RParen)) {
      args.push(this.parseExpression());
      while (this.check(TokenKind.Comma)) {
        this.advance();
        args.push(this.parseExpression());
      }
    }
    const close = this.expect(TokenKind.RParen);
    return {
      kind: AstNodeKind.FunctionCall,
      functionName,
      arguments: args,
      location: this.span(functionName.location, close.location),
    };
  }

  private parseLiteral(): Literal {
    const token = this.advance();
    let literalKind: LiteralKind;
    let value: string;
    switch (token.kind) {
      case TokenKind.Number:
        literalKind = LiteralKind.Number;
        value = token.text;
        break;
      case TokenKind.String:
        literalKind = LiteralKind.String;
        value = token.text;
        break;
      case TokenKind.HexString:
        literalKind = LiteralKind.String;
        value = String.fromCharCode(...hexToBytes(token.text));
        break;
      case TokenKind.Identifier:
        if (token.text !== "true" && token.text !== "false") {
          throw this.errorAt(token, "Literal expected");
        }
        literalKind = LiteralKind.Boolean;
        value = token.text;
        break;
      default:
        throw this.errorAt(token, "Literal expected");
    }
    const literal: Literal = {
      kind: AstNodeKind.Literal,
      literalKind,
      value,
      location: token.location,
    };
    if (this.check(TokenKind.Colon)) {
      this.advance();
      literal.type = this.parseIdentifier().name;
    }
    return literal;
  }

  private parseTypedName(): TypedName {
    const identifier = this.parseIdentifier();
    if (!this.check(TokenKind.Colon)) {
      return { name: identifier.name, location: identifier.location };
    }
    this.advance();
    const type = this.parseIdentifier().name;
    return { name: identifier.name, type, location: identifier.location };
  }

  private parseIdentifier(): Identifier {
    const token = this.expect(TokenKind.Identifier);
    if (RESERVED_WORDS.has(token.text)) {
      throw this.errorAt(token, `Expected identifier but got reserved word '${token.text}'`);
    }
    return {
      kind: AstNodeKind.Identifier,
      name: token.text,
      location: token.location,
    };
  }

  private peek(offset = 0): Token {
    const index = Math.min(this.index + offset, this.tokens.length - 1);
    return this.tokens[index];
  }

  private peekIdentifier(word: string): boolean {
    const token = this.peek();
    return token.kind === TokenKind.Identifier && token.text === word;
  }

  private check(kind: TokenKind): boolean {
    return this.peek().kind === kind;
  }

  private advance(): Token {
    const token = this.peek();
    if (this.index < this.tokens.length - 1) this.index += 1;
    return token;
  }

  private expect(kind: TokenKind): Token {
    const token = this.peek();
    if (token.kind !== kind) {
      const found = token.kind === TokenKind.EOF ? "end of input" : `'${token.text}'`;
      throw this.errorAt(token, `Expected ${kind} but got ${found}`);
    }
    return this.advance();
  }

  private expectKeyword(word: string): Token {
    if (!this.peekIdentifier(word)) {
      throw this.errorAt(this.peek(), `Expected '${word}'`);
    }
    return this.advance();
  }

  private span(from: SourceLocation, to: SourceLocation): SourceLocation {
    return { ...from, end: to.end };
  }

  private errorAt(token: Token, message: string): CompileError {
    return new CompileError("ParserError", message, {
      sourceName: token.location.sourceName,
      line: token.location.line,
      column: token.location.column,
    });
  }
}

export function hexToBytes(hex: string): Uint8Array {
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < bytes.length; i += 1) {
    bytes[i] = Number.parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

export function stringToBytes(text: string): Uint8Array {
  return Uint8Array.from(text, (ch) => ch.charCodeAt(0));
}

export function parseObject(source: string, sourceName?: string): YulObject {
  return new Parser(sourceName).parseObject(source);
}

export function parseBlock(source: string, sourceName?: string): Block {
  return new Parser(sourceName).parseBlockSource(source);
}
