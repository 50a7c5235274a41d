import { Lexer } from "../lexer/lexer";
import { TokenType, type Token } from "../token";
import type { Diagnostic } from "../errors";
import * as AST from "../ast/ast";

enum Precedence {
  LOWEST = 1,
  ASSIGN,      // =
  LOGICAL_OR,  // or
  LOGICAL_AND, // and
  EQUALS,      // == !=
  LESSGREATER, // > >= < <=
  SUM,         // + -
  PRODUCT,     // * /
  PREFIX,      // -X or !X
  CALL,        // myFunction(X)
}

const PRECEDENCES: Partial<Record<TokenType, Precedence>> = {
  [TokenType.Equals]: Precedence.ASSIGN,
  [TokenType.Or]: Precedence.LOGICAL_OR,
  [TokenType.And]: Precedence.LOGICAL_AND,
  [TokenType.EqEq]: Precedence.EQUALS,
  [TokenType.BangEq]: Precedence.EQUALS,
  [TokenType.LT]: Precedence.LESSGREATER,
  [TokenType.GT]: Precedence.LESSGREATER,
  [TokenType.LtEq]: Precedence.LESSGREATER,
  [TokenType.GtEq]: Precedence.LESSGREATER,
  [TokenType.Plus]: Precedence.SUM,
  [TokenType.Minus]: Precedence.SUM,
  [TokenType.Slash]: Precedence.PRODUCT,
  [TokenType.Star]: Precedence.PRODUCT,
  [TokenType.LParen]: Precedence.CALL,
};

// Tokens that can begin a declaration or statement; recovery stops before them.
const STATEMENT_STARTS: ReadonlySet<TokenType> = new Set([
  TokenType.Class,
  TokenType.Fun,
  TokenType.Var,
  TokenType.For,
  TokenType.If,
  TokenType.While,
  TokenType.Print,
  TokenType.Return,
]);

export const MAX_ARGUMENTS = 255;

type PrefixParseFn = () => AST.Expression | null;
type InfixParseFn = (left: AST.Expression) => AST.Expression | null;

/**
 * Pratt parser over the lexer's token stream.
 *
 * Every parse function starts with `curToken` on the first token of its
 * construct and leaves it on the construct's last token. A failed parse
 * records a diagnostic and returns null; the enclosing declaration then
 * skips ahead to the next statement boundary.
 */
export class Parser {
  private lexer: Lexer;
  private curToken: Token;
  private peekToken: Token;
  private errors: Diagnostic[] = [];

  private prefixParseFns: Partial<Record<TokenType, PrefixParseFn>> = {};
  private infixParseFns: Partial<Record<TokenType, InfixParseFn>> = {};

  constructor(lexer: Lexer) {
    this.lexer = lexer;
    this.curToken = lexer.nextToken();
    this.peekToken = lexer.nextToken();

    this.registerPrefix(TokenType.Identifier, this.parseVariable.bind(this));
    this.registerPrefix(TokenType.Number, this.parseLiteral.bind(this));
    this.registerPrefix(TokenType.String, this.parseLiteral.bind(this));
    this.registerPrefix(TokenType.True, this.parseBoolean.bind(this));
    this.registerPrefix(TokenType.False, this.parseBoolean.bind(this));
    this.registerPrefix(TokenType.Nil, this.parseNil.bind(this));
    this.registerPrefix(TokenType.Bang, this.parseUnaryExpression.bind(this));
    this.registerPrefix(TokenType.Minus, this.parseUnaryExpression.bind(this));
    this.registerPrefix(TokenType.LParen, this.parseGroupedExpression.bind(this));

    this.registerInfix(TokenType.Plus, this.parseBinaryExpression.bind(this));
    this.registerInfix(TokenType.Minus, this.parseBinaryExpression.bind(this));
    this.registerInfix(TokenType.Slash, this.parseBinaryExpression.bind(this));
    this.registerInfix(TokenType.Star, this.parseBinaryExpression.bind(this));
    this.registerInfix(TokenType.EqEq, this.parseBinaryExpression.bind(this));
    this.registerInfix(TokenType.BangEq, this.parseBinaryExpression.bind(this));
    this.registerInfix(TokenType.LT, this.parseBinaryExpression.bind(this));
    this.registerInfix(TokenType.GT, this.parseBinaryExpression.bind(this));
    this.registerInfix(TokenType.LtEq, this.parseBinaryExpression.bind(this));
    this.registerInfix(TokenType.GtEq, this.parseBinaryExpression.bind(this));
    this.registerInfix(TokenType.And, this.parseLogicalExpression.bind(this));
    this.registerInfix(TokenType.Or, this.parseLogicalExpression.bind(this));
    this.registerInfix(TokenType.Equals, this.parseAssignExpression.bind(this));
    this.registerInfix(TokenType.LParen, this.parseCallExpression.bind(this));
  }

  public nextToken() {
    this.curToken = this.peekToken;
    this.peekToken = this.lexer.nextToken();
  }

  public ParseProgram(): AST.Program {
    const program = new AST.Program();

    while (!this.curTokenIs(TokenType.EOF)) {
      const stmt = this.parseDeclaration();
      if (stmt !== null) {
        program.statements.push(stmt);
        this.nextToken();
      }
    }
    return program;
  }

  public getErrors(): Diagnostic[] {
    return this.errors;
  }

  /**
   * Parses one declaration. On success curToken is left on its last token;
   * on failure it is left on the first token of the next declaration.
   */
  private parseDeclaration(): AST.Statement | null {
    const start = this.curToken;
    let stmt: AST.Statement | null;
    switch (this.curToken.type) {
      case TokenType.Var:
        stmt = this.parseVarDeclaration();
        break;
      case TokenType.Fun:
        stmt = this.parseFunctionDeclaration();
        break;
      default:
        stmt = this.parseStatement();
    }

    if (stmt === null) {
      this.synchronize(start);
    }
    return stmt;
  }

  private parseStatement(): AST.Statement | null {
    switch (this.curToken.type) {
      case TokenType.Print:
        return this.parsePrintStatement();
      case TokenType.LBrace: {
        const token = this.curToken;
        const statements = this.parseBlock();
        return statements === null ? null : new AST.BlockStatement(token, statements);
      }
      case TokenType.If:
        return this.parseIfStatement();
      case TokenType.While:
        return this.parseWhileStatement();
      case TokenType.For:
        return this.parseForStatement();
      case TokenType.Return:
        return this.parseReturnStatement();
      default:
        return this.parseExpressionStatement();
    }
  }

  private parseVarDeclaration(): AST.VarStatement | null {
    const token = this.curToken;
    if (!this.expectPeek(TokenType.Identifier, "expected variable name")) return null;
    const name = this.curToken;

    let initializer: AST.Expression | null = null;
    if (this.peekTokenIs(TokenType.Equals)) {
      this.nextToken(); // consume identifier, curToken becomes =
      this.nextToken(); // consume =, curToken starts the initializer
      initializer = this.parseExpression(Precedence.LOWEST);
      if (!initializer) return null;
    }

    if (!this.expectPeek(TokenType.Semi, "expected ';' after variable declaration")) return null;
    return new AST.VarStatement(token, name, initializer);
  }

  private parseFunctionDeclaration(): AST.FunctionStatement | null {
    const token = this.curToken;
    if (!this.expectPeek(TokenType.Identifier, "expected function name")) return null;
    const name = this.curToken;
    if (!this.expectPeek(TokenType.LParen, "expected '(' after function name")) return null;

    const params: Token[] = [];
    if (!this.peekTokenIs(TokenType.RParen)) {
      for (;;) {
        if (params.length >= MAX_ARGUMENTS) {
          this.errorAt(this.peekToken, `can't have more than ${MAX_ARGUMENTS} parameters`);
        }
        if (!this.expectPeek(TokenType.Identifier, "expected parameter name")) return null;
        params.push(this.curToken);
        if (!this.peekTokenIs(TokenType.Comma)) break;
        this.nextToken();
      }
    }

    if (!this.expectPeek(TokenType.RParen, "expected ')' after parameters")) return null;
    if (!this.expectPeek(TokenType.LBrace, "expected '{' before function body")) return null;
    const body = this.parseBlock();
    if (body === null) return null;
    return new AST.FunctionStatement(token, name, params, body);
  }

  /** Parses `{ declaration* }` with curToken on the opening brace. */
  private parseBlock(): AST.Statement[] | null {
    const statements: AST.Statement[] = [];
    this.nextToken();

    while (!this.curTokenIs(TokenType.RBrace) && !this.curTokenIs(TokenType.EOF)) {
      const stmt = this.parseDeclaration();
      if (stmt !== null) {
        statements.push(stmt);
        this.nextToken();
      }
    }

    if (!this.curTokenIs(TokenType.RBrace)) {
      this.errorAt(this.curToken, "expected '}' after block");
      return null;
    }
    return statements;
  }

  private parsePrintStatement(): AST.PrintStatement | null {
    const token = this.curToken;
    this.nextToken();
    const value = this.parseExpression(Precedence.LOWEST);
    if (!value) return null;
    if (!this.expectPeek(TokenType.Semi, "expected ';' after value")) return null;
    return new AST.PrintStatement(token, value);
  }

  private parseIfStatement(): AST.IfStatement | null {
    const token = this.curToken;
    if (!this.expectPeek(TokenType.LParen, "expected '(' after 'if'")) return null;
    this.nextToken();
    const condition = this.parseExpression(Precedence.LOWEST);
    if (!condition) return null;
    if (!this.expectPeek(TokenType.RParen, "expected ')' after if condition")) return null;

    this.nextToken();
    const thenBranch = this.parseStatement();
    if (!thenBranch) return null;

    let elseBranch: AST.Statement | null = null;
    // A dangling else binds to the nearest if
    if (this.peekTokenIs(TokenType.Else)) {
      this.nextToken();
      this.nextToken();
      elseBranch = this.parseStatement();
      if (!elseBranch) return null;
    }
    return new AST.IfStatement(token, condition, thenBranch, elseBranch);
  }

  private parseWhileStatement(): AST.WhileStatement | null {
    const token = this.curToken;
    if (!this.expectPeek(TokenType.LParen, "expected '(' after 'while'")) return null;
    this.nextToken();
    const condition = this.parseExpression(Precedence.LOWEST);
    if (!condition) return null;
    if (!this.expectPeek(TokenType.RParen, "expected ')' after condition")) return null;
    this.nextToken();
    const body = this.parseStatement();
    if (!body) return null;
    return new AST.WhileStatement(token, condition, body);
  }

  /**
   * `for (init; cond; incr) body` becomes
   * `{ init; while (cond) { body; incr; } }`, with a missing condition
   * standing for `true`.
   */
  private parseForStatement(): AST.Statement | null {
    const token = this.curToken; // 'for'
    if (!this.expectPeek(TokenType.LParen, "expected '(' after 'for'")) return null;
    this.nextToken();

    let initializer: AST.Statement | null = null;
    if (this.curTokenIs(TokenType.Var)) {
      initializer = this.parseVarDeclaration();
      if (!initializer) return null;
    } else if (!this.curTokenIs(TokenType.Semi)) {
      initializer = this.parseExpressionStatement();
      if (!initializer) return null;
    }
    this.nextToken();

    let condition: AST.Expression | null = null;
    if (!this.curTokenIs(TokenType.Semi)) {
      condition = this.parseExpression(Precedence.LOWEST);
      if (!condition) return null;
      if (!this.expectPeek(TokenType.Semi, "expected ';' after loop condition")) return null;
    }
    this.nextToken();

    let increment: AST.Expression | null = null;
    if (!this.curTokenIs(TokenType.RParen)) {
      increment = this.parseExpression(Precedence.LOWEST);
      if (!increment) return null;
      if (!this.expectPeek(TokenType.RParen, "expected ')' after for clauses")) return null;
    }
    this.nextToken();

    let body = this.parseStatement();
    if (!body) return null;

    if (increment) {
      body = new AST.BlockStatement(token, [body, new AST.ExpressionStatement(token, increment)]);
    }
    body = new AST.WhileStatement(token, condition ?? new AST.LiteralExpression(token, true), body);
    if (initializer) {
      body = new AST.BlockStatement(token, [initializer, body]);
    }
    return body;
  }

  private parseReturnStatement(): AST.ReturnStatement | null {
    const token = this.curToken;
    let value: AST.Expression | null = null;

    if (!this.peekTokenIs(TokenType.Semi)) {
      this.nextToken();
      value = this.parseExpression(Precedence.LOWEST);
      if (!value) return null;
    }

    if (!this.expectPeek(TokenType.Semi, "expected ';' after return value")) return null;
    return new AST.ReturnStatement(token, value);
  }

  private parseExpressionStatement(): AST.ExpressionStatement | null {
    const token = this.curToken;
    const expression = this.parseExpression(Precedence.LOWEST);
    if (!expression) return null;
    if (!this.expectPeek(TokenType.Semi, "expected ';' after expression")) return null;
    return new AST.ExpressionStatement(token, expression);
  }

  private parseExpression(precedence: number): AST.Expression | null {
    const prefix = this.prefixParseFns[this.curToken.type];
    if (!prefix) {
      this.errorAt(this.curToken, "expected expression");
      return null;
    }

    let leftExp = prefix();

    while (leftExp !== null && !this.peekTokenIs(TokenType.Semi) && precedence < this.peekPrecedence()) {
      const infix = this.infixParseFns[this.peekToken.type];
      if (!infix) {
        return leftExp;
      }
      this.nextToken();
      leftExp = infix(leftExp);
    }

    return leftExp;
  }

  private parseVariable(): AST.Expression {
    return new AST.VariableExpression(this.curToken);
  }

  private parseLiteral(): AST.Expression {
    return new AST.LiteralExpression(this.curToken, this.curToken.value);
  }

  private parseBoolean(): AST.Expression {
    return new AST.LiteralExpression(this.curToken, this.curTokenIs(TokenType.True));
  }

  private parseNil(): AST.Expression {
    return new AST.LiteralExpression(this.curToken, null);
  }

  private parseUnaryExpression(): AST.Expression | null {
    const operator = this.curToken;
    this.nextToken();
    const right = this.parseExpression(Precedence.PREFIX);
    if (!right) return null;
    return new AST.UnaryExpression(operator, right);
  }

  private parseGroupedExpression(): AST.Expression | null {
    const token = this.curToken; // (
    this.nextToken();
    const inner = this.parseExpression(Precedence.LOWEST);
    if (!inner) return null;
    if (!this.expectPeek(TokenType.RParen, "expected ')' after expression")) return null;
    return new AST.GroupingExpression(token, inner);
  }

  private parseBinaryExpression(left: AST.Expression): AST.Expression | null {
    const operator = this.curToken;
    const precedence = this.curPrecedence();
    this.nextToken();
    const right = this.parseExpression(precedence);
    if (!right) return null;
    return new AST.BinaryExpression(left, operator, right);
  }

  private parseLogicalExpression(left: AST.Expression): AST.Expression | null {
    const operator = this.curToken;
    const precedence = this.curPrecedence();
    this.nextToken();
    const right = this.parseExpression(precedence);
    if (!right) return null;
    return new AST.LogicalExpression(left, operator, right);
  }

  private parseAssignExpression(left: AST.Expression): AST.Expression | null {
    const equals = this.curToken;
    this.nextToken();
    // One level below ASSIGN so that a = b = c groups to the right
    const value = this.parseExpression(Precedence.ASSIGN - 1);
    if (!value) return null;

    if (left.kind === "Variable") {
      return new AST.AssignExpression(left.name, value);
    }
    // Reported without unwinding: the parser is not in a confused state
    this.errorAt(equals, "invalid assignment target");
    return left;
  }

  private parseCallExpression(callee: AST.Expression): AST.Expression | null {
    const args: AST.Expression[] = [];
    if (this.peekTokenIs(TokenType.RParen)) {
      this.nextToken();
      return new AST.CallExpression(callee, this.curToken, args);
    }

    this.nextToken();
    const first = this.parseExpression(Precedence.LOWEST);
    if (!first) return null;
    args.push(first);

    while (this.peekTokenIs(TokenType.Comma)) {
      this.nextToken();
      this.nextToken();
      if (args.length >= MAX_ARGUMENTS) {
        this.errorAt(this.curToken, `can't have more than ${MAX_ARGUMENTS} arguments`);
      }
      const arg = this.parseExpression(Precedence.LOWEST);
      if (!arg) return null;
      args.push(arg);
    }

    if (!this.expectPeek(TokenType.RParen, "expected ')' after arguments")) return null;
    return new AST.CallExpression(callee, this.curToken, args);
  }

  /**
   * Skips tokens until curToken is just after a `;` or on a token that
   * starts a statement. A failed declaration that stopped on another
   * statement keyword resumes right there.
   */
  private synchronize(start: Token) {
    if (this.curToken !== start && STATEMENT_STARTS.has(this.curToken.type)) return;
    while (!this.curTokenIs(TokenType.EOF)) {
      const wasSemi = this.curTokenIs(TokenType.Semi);
      this.nextToken();
      if (wasSemi || STATEMENT_STARTS.has(this.curToken.type)) return;
    }
  }

  private registerPrefix(tokenType: TokenType, fn: PrefixParseFn) {
    this.prefixParseFns[tokenType] = fn;
  }

  private registerInfix(tokenType: TokenType, fn: InfixParseFn) {
    this.infixParseFns[tokenType] = fn;
  }

  private curTokenIs(t: TokenType): boolean {
    return this.curToken.type === t;
  }

  private peekTokenIs(t: TokenType): boolean {
    return this.peekToken.type === t;
  }

  private expectPeek(t: TokenType, msg: string): boolean {
    if (this.peekTokenIs(t)) {
      this.nextToken();
      return true;
    }
    this.errorAt(this.peekToken, msg);
    return false;
  }

  private peekPrecedence(): number {
    return PRECEDENCES[this.peekToken.type] ?? Precedence.LOWEST;
  }

  private curPrecedence(): number {
    return PRECEDENCES[this.curToken.type] ?? Precedence.LOWEST;
  }

  private errorAt(token: Token, msg: string) {
    this.errors.push({ kind: "parse", msg, line: token.line, col: token.column, lexeme: token.lexeme });
  }
}
