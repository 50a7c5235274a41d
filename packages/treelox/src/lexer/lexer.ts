import { TokenType, lookupIdent, type Token, type LiteralValue } from "../token";
import type { Diagnostic } from "../errors";

export class Lexer {
  private input: string;
  private position: number = 0; // current position in input (points to current char)
  private readPosition: number = 0; // current reading position in input (after current char)
  private ch: string | null = null; // current char under examination
  private line: number = 1;
  private column: number = 0;
  private errors: Diagnostic[] = [];

  constructor(input: string) {
    this.input = input;
    this.readChar();
  }

  /** Scans the rest of the input, ending with a single EOF token. */
  public scanTokens(): Token[] {
    const tokens: Token[] = [];
    for (;;) {
      const tok = this.nextToken();
      tokens.push(tok);
      if (tok.type === TokenType.EOF) {
        return tokens;
      }
    }
  }

  public getErrors(): Diagnostic[] {
    return this.errors;
  }

  public nextToken(): Token {
    this.skipWhitespace();

    const line = this.line;
    const col = this.column;

    if (this.ch === null) {
      return this.token(TokenType.EOF, "", line, col);
    }

    let tok: Token;

    switch (this.ch) {
      case "(":
        tok = this.token(TokenType.LParen, this.ch, line, col);
        break;
      case ")":
        tok = this.token(TokenType.RParen, this.ch, line, col);
        break;
      case "{":
        tok = this.token(TokenType.LBrace, this.ch, line, col);
        break;
      case "}":
        tok = this.token(TokenType.RBrace, this.ch, line, col);
        break;
      case ",":
        tok = this.token(TokenType.Comma, this.ch, line, col);
        break;
      case ".":
        tok = this.token(TokenType.Dot, this.ch, line, col);
        break;
      case ";":
        tok = this.token(TokenType.Semi, this.ch, line, col);
        break;
      case "+":
        tok = this.token(TokenType.Plus, this.ch, line, col);
        break;
      case "-":
        tok = this.token(TokenType.Minus, this.ch, line, col);
        break;
      case "*":
        tok = this.token(TokenType.Star, this.ch, line, col);
        break;
      case "!":
        tok = this.twoCharToken("=", TokenType.BangEq, TokenType.Bang, line, col);
        break;
      case "=":
        tok = this.twoCharToken("=", TokenType.EqEq, TokenType.Equals, line, col);
        break;
      case "<":
        tok = this.twoCharToken("=", TokenType.LtEq, TokenType.LT, line, col);
        break;
      case ">":
        tok = this.twoCharToken("=", TokenType.GtEq, TokenType.GT, line, col);
        break;
      case "/":
        if (this.peekChar() === "/") {
          this.skipLineComment();
          return this.nextToken();
        } else if (this.peekChar() === "*") {
          this.skipBlockComment(line, col);
          return this.nextToken();
        }
        tok = this.token(TokenType.Slash, this.ch, line, col);
        break;
      case '"': {
        const str = this.readString(line, col);
        // An unterminated string produces a diagnostic and no token
        if (str === null) return this.nextToken();
        return this.token(TokenType.String, `"${str}"`, line, col, str);
      }
      default:
        if (this.isLetter(this.ch)) {
          const literal = this.readIdentifier();
          return this.token(lookupIdent(literal), literal, line, col);
        } else if (this.isDigit(this.ch)) {
          const numStr = this.readNumber();
          return this.token(TokenType.Number, numStr, line, col, parseFloat(numStr));
        }
        this.skipUnexpected(line, col);
        return this.nextToken();
    }

    this.readChar();
    return tok;
  }

  private token(type: TokenType, lexeme: string, line: number, column: number, value: LiteralValue = null): Token {
    return { type, lexeme, value, line, column };
  }

  private twoCharToken(second: string, matched: TokenType, single: TokenType, line: number, col: number): Token {
    const first = this.ch ?? "";
    if (this.peekChar() === second) {
      this.readChar();
      return this.token(matched, first + second, line, col);
    }
    return this.token(single, first, line, col);
  }

  private error(msg: string, lexeme: string, line: number, col: number) {
    this.errors.push({ kind: "lexical", msg, line, col, lexeme });
  }

  // Reports the whole code point, so a surrogate pair is one diagnostic
  private skipUnexpected(line: number, col: number) {
    const codePoint = this.input.codePointAt(this.position);
    const char = codePoint === undefined ? "" : String.fromCodePoint(codePoint);
    this.error(`unexpected character '${char}'`, char, line, col);
    for (let i = 0; i < char.length; i++) {
      this.readChar();
    }
  }

  private readChar() {
    if (this.ch === "\n") {
      this.line += 1;
      this.column = 0;
    }
    if (this.readPosition >= this.input.length) {
      this.ch = null;
    } else {
      this.ch = this.input[this.readPosition];
    }
    this.position = this.readPosition;
    this.readPosition += 1;
    this.column += 1;
  }

  private peekChar(): string | null {
    if (this.readPosition >= this.input.length) {
      return null;
    }
    return this.input[this.readPosition];
  }

  private readIdentifier(): string {
    const position = this.position;
    while (this.ch !== null && (this.isLetter(this.ch) || this.isDigit(this.ch))) {
      this.readChar();
    }
    return this.input.slice(position, this.position);
  }

  private readNumber(): string {
    const position = this.position;
    while (this.ch !== null && this.isDigit(this.ch)) {
      this.readChar();
    }
    // A '.' only belongs to the number when a digit follows it
    const next = this.peekChar();
    if (this.ch === "." && next !== null && this.isDigit(next)) {
      this.readChar(); // consume '.'
      while (this.ch !== null && this.isDigit(this.ch)) {
        this.readChar();
      }
    }
    return this.input.slice(position, this.position);
  }

  private readString(line: number, col: number): string | null {
    const position = this.position + 1;
    for (;;) {
      this.readChar();
      if (this.ch === '"' || this.ch === null) {
        break;
      }
    }
    if (this.ch === null) {
      this.error("unterminated string", this.input.slice(position - 1), line, col);
      return null;
    }
    const str = this.input.slice(position, this.position);
    this.readChar(); // Consume the closing quote
    return str;
  }

  private skipLineComment() {
    while (this.ch !== null && this.ch !== "\n") {
      this.readChar();
    }
  }

  private skipBlockComment(line: number, col: number) {
    this.readChar(); // '/'
    this.readChar(); // '*'
    while (this.ch !== null) {
      if (this.ch === "*" && this.peekChar() === "/") {
        this.readChar();
        this.readChar();
        return;
      }
      this.readChar();
    }
    this.error("unterminated block comment", "/*", line, col);
  }

  private skipWhitespace() {
    while (this.ch === " " || this.ch === "\t" || this.ch === "\n" || this.ch === "\r") {
      this.readChar();
    }
  }

  private isLetter(ch: string): boolean {
    return ("a" <= ch && ch <= "z") || ("A" <= ch && ch <= "Z") || ch === "_";
  }

  private isDigit(ch: string): boolean {
    return "0" <= ch && ch <= "9";
  }
}
