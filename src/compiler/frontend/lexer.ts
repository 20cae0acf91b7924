/**
 * Tokenizer for Yul source text
 */

import { CompileError } from "../errors/compile_errors.js";
import type { SourceLocation } from "./ast.js";

export enum TokenKind {
  Identifier = "Identifier",
  Number = "Number",
  String = "String",
  HexString = "HexString",
  LBrace = "LBrace",
  RBrace = "RBrace",
  LParen = "LParen",
  RParen = "RParen",
  Comma = "Comma",
  Colon = "Colon",
  Assign = "Assign",
  Arrow = "Arrow",
  EOF = "EOF",
}

export interface Token {
  kind: TokenKind;
  /** Identifier or number spelling, or the decoded string contents. */
  text: string;
  location: SourceLocation;
}

const isIdentifierStart = (ch: string): boolean => /[a-zA-Z_$]/.test(ch);
const isIdentifierPart = (ch: string): boolean => /[a-zA-Z0-9_$.]/.test(ch);
const isDigit = (ch: string): boolean => ch >= "0" && ch <= "9";
const isHexDigit = (ch: string): boolean => /[0-9a-fA-F]/.test(ch);

export class Lexer {
  private pos = 0;
  private line = 1;
  private lineStart = 0;

  constructor(
    private readonly source: string,
    private readonly sourceName: string,
  ) {}

  tokenize(): Token[] {
    const tokens: Token[] = [];
    for (;;) {
      const token = this.next();
      tokens.push(token);
      if (token.kind === TokenKind.EOF) return tokens;
    }
  }

  private next(): Token {
    this.skipTrivia();
    const start = this.pos;
    const line = this.line;
    const column = start - this.lineStart + 1;
    const make = (kind: TokenKind, text: string): Token => ({
      kind,
      text,
      location: {
        sourceName: this.sourceName,
        start,
        end: this.pos,
        line,
        column,
      },
    });

    if (this.pos >= this.source.length) return make(TokenKind.EOF, "");
    const ch = this.source[this.pos];

    switch (ch) {
      case "{":
        this.pos += 1;
        return make(TokenKind.LBrace, ch);
      case "}":
        this.pos += 1;
        return make(TokenKind.RBrace, ch);
      case "(":
        this.pos += 1;
        return make(TokenKind.LParen, ch);
      case ")":
        this.pos += 1;
        return make(TokenKind.RParen, ch);
      case ",":
        this.pos += 1;
        return make(TokenKind.Comma, ch);
      case ":":
        if (this.source[this.pos + 1] === "=") {
          this.pos += 2;
          return make(TokenKind.Assign, ":=");
        }
        this.pos += 1;
        return make(TokenKind.Colon, ch);
      case "-":
        if (this.source[this.pos + 1] === ">") {
          this.pos += 2;
          return make(TokenKind.Arrow, "->");
        }
        break;
      case '"':
      case "'": {
        const text = this.readString(ch);
        return make(TokenKind.String, text);
      }
      default:
        break;
    }

    if (isDigit(ch)) {
      return make(TokenKind.Number, this.readNumber());
    }

    if (isIdentifierStart(ch)) {
      let end = this.pos + 1;
      while (end < this.source.length && isIdentifierPart(this.source[end])) {
        end += 1;
      }
      const word = this.source.slice(this.pos, end);
      const quote = this.source[end];
      if (word === "hex" && (quote === '"' || quote === "'")) {
        this.pos = end;
        return make(TokenKind.HexString, this.readHexString(quote));
      }
      this.pos = end;
      return make(TokenKind.Identifier, word);
    }

    throw this.error(`Unexpected character '${ch}'`);
  }

  private skipTrivia(): void {
    while (this.pos < this.source.length) {
      const ch = this.source[this.pos];
      if (ch === "\n") {
        this.pos += 1;
        this.line += 1;
        this.lineStart = this.pos;
      } else if (ch === " " || ch === "\t" || ch === "\r") {
        this.pos += 1;
      } else if (ch === "/" && this.source[this.pos + 1] === "/") {
        while (this.pos < this.source.length && this.source[this.pos] !== "\n") {
          this.pos += 1;
        }
      } else if (ch === "/" && this.source[this.pos + 1] === "*") {
        const close = this.source.indexOf("*/", this.pos + 2);
        if (close < 0) throw this.error("Unterminated comment");
        for (let i = this.pos; i < close; i += 1) {
          if (this.source[i] === "\n") {
            this.line += 1;
            this.lineStart = i + 1;
          }
        }
        this.pos = close + 2;
      } else {
        return;
      }
    }
  }

  private readNumber(): string {
    const start = this.pos;
    if (
      this.source[this.pos] === "0" &&
      this.source[this.pos + 1] === "x"
    ) {
      this.pos += 2;
      while (this.pos < this.source.length && isHexDigit(this.source[this.pos])) {
        this.pos += 1;
      }
      if (this.pos === start + 2) throw this.error("Expected hex digits after 0x");
    } else {
      while (this.pos < this.source.length && isDigit(this.source[this.pos])) {
        this.pos += 1;
      }
    }
    if (
      this.pos < this.source.length &&
      isIdentifierPart(this.source[this.pos])
    ) {
      throw this.error("Invalid number literal");
    }
    return this.source.slice(start, this.pos);
  }

  private readString(quote: string): string {
    this.pos += 1;
    let result = "";
    for (;;) {
      if (this.pos >= this.source.length || this.source[this.pos] === "\n") {
        throw this.error("Unterminated string literal");
      }
      const ch = this.source[this.pos];
      if (ch === quote) {
        this.pos += 1;
        return result;
      }
      if (ch !== "\\") {
        if (ch.charCodeAt(0) > 0xff) {
          throw this.error("Non-ASCII characters must be escaped");
        }
        result += ch;
        this.pos += 1;
        continue;
      }
      const escape = this.source[this.pos + 1];
      this.pos += 2;
      switch (escape) {
        case "n":
          result += "\n";
          break;
        case "r":
          result += "\r";
          break;
        case "t":
          result += "\t";
          break;
        case "\\":
        case '"':
        case "'":
          result += escape;
          break;
        case "x": {
          const hex = this.source.slice(this.pos, this.pos + 2);
          if (!/^[0-9a-fA-F]{2}$/.test(hex)) {
            throw this.error("Invalid \\x escape");
          }
          result += String.fromCharCode(Number.parseInt(hex, 16));
          this.pos += 2;
          break;
        }
        default:
          throw this.error(`Invalid escape sequence '\\${escape ?? ""}'`);
      }
    }
  }

  private readHexString(quote: string): string {
    this.pos += 1;
    const start = this.pos;
    while (this.pos < this.source.length && this.source[this.pos] !== quote) {
      this.pos += 1;
    }
    if (this.pos >= this.source.length) {
      throw this.error("Unterminated hex string");
    }
    const digits = this.source.slice(start, this.pos).replace(/_/g, "");
    this.pos += 1;
    if (!/^([0-9a-fA-F]{2})*$/.test(digits)) {
      throw this.error("Hex string must contain an even number of hex digits");
    }
    return digits.toLowerCase();
  }

  private error(message: string): CompileError {
    return new CompileError("ParserError", message, {
      sourceName: this.sourceName,
      line: this.line,
      column: this.pos - this.lineStart + 1,
    });
  }
}
