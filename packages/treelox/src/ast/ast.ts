import type { Token, LiteralValue } from "../token";

export interface Node {
  tokenLiteral(): string;
  toString(): string;
}

export type Expression =
  | LiteralExpression
  | GroupingExpression
  | UnaryExpression
  | BinaryExpression
  | LogicalExpression
  | VariableExpression
  | AssignExpression
  | CallExpression;

export type Statement =
  | ExpressionStatement
  | PrintStatement
  | VarStatement
  | BlockStatement
  | IfStatement
  | WhileStatement
  | FunctionStatement
  | ReturnStatement;

export class Program implements Node {
  statements: Statement[] = [];

  tokenLiteral(): string {
    if (this.statements.length > 0) {
      return this.statements[0].tokenLiteral();
    } else {
      return "";
    }
  }

  toString(): string {
    return this.statements.map((s) => s.toString()).join("\n");
  }
}

function literalToString(value: LiteralValue | boolean): string {
  if (value === null) return "nil";
  if (typeof value === "string") return `"${value}"`;
  return String(value);
}

// ------------------------------------------------------------
// Expressions
// ------------------------------------------------------------

export class LiteralExpression implements Node {
  readonly kind = "Literal";
  token: Token;
  value: LiteralValue | boolean;

  constructor(token: Token, value: LiteralValue | boolean) {
    this.token = token;
    this.value = value;
  }

  tokenLiteral(): string {
    return this.token.lexeme;
  }
  toString(): string {
    return literalToString(this.value);
  }
}

export class GroupingExpression implements Node {
  readonly kind = "Grouping";
  token: Token; // (
  expression: Expression;

  constructor(token: Token, expression: Expression) {
    this.token = token;
    this.expression = expression;
  }

  tokenLiteral(): string {
    return this.token.lexeme;
  }
  toString(): string {
    return `(group ${this.expression.toString()})`;
  }
}

export class UnaryExpression implements Node {
  readonly kind = "Unary";
  operator: Token; // ! or -
  right: Expression;

  constructor(operator: Token, right: Expression) {
    this.operator = operator;
    this.right = right;
  }

  tokenLiteral(): string {
    return this.operator.lexeme;
  }
  toString(): string {
    return `(${this.operator.lexeme}${this.right.toString()})`;
  }
}

export class BinaryExpression implements Node {
  readonly kind = "Binary";
  left: Expression;
  operator: Token;
  right: Expression;

  constructor(left: Expression, operator: Token, right: Expression) {
    this.left = left;
    this.operator = operator;
    this.right = right;
  }

  tokenLiteral(): string {
    return this.operator.lexeme;
  }
  toString(): string {
    return `(${this.left.toString()} ${this.operator.lexeme} ${this.right.toString()})`;
  }
}

export class LogicalExpression implements Node {
  readonly kind = "Logical";
  left: Expression;
  operator: Token; // and / or
  right: Expression;

  constructor(left: Expression, operator: Token, right: Expression) {
    this.left = left;
    this.operator = operator;
    this.right = right;
  }

  tokenLiteral(): string {
    return this.operator.lexeme;
  }
  toString(): string {
    return `(${this.left.toString()} ${this.operator.lexeme} ${this.right.toString()})`;
  }
}

export class VariableExpression implements Node {
  readonly kind = "Variable";
  name: Token;

  constructor(name: Token) {
    this.name = name;
  }

  tokenLiteral(): string {
    return this.name.lexeme;
  }
  toString(): string {
    return this.name.lexeme;
  }
}

export class AssignExpression implements Node {
  readonly kind = "Assign";
  name: Token;
  value: Expression;

  constructor(name: Token, value: Expression) {
    this.name = name;
    this.value = value;
  }

  tokenLiteral(): string {
    return this.name.lexeme;
  }
  toString(): string {
    return `(${this.name.lexeme} = ${this.value.toString()})`;
  }
}

export class CallExpression implements Node {
  readonly kind = "Call";
  callee: Expression;
  paren: Token; // closing ), used to locate runtime errors
  arguments: Expression[];

  constructor(callee: Expression, paren: Token, args: Expression[]) {
    this.callee = callee;
    this.paren = paren;
    this.arguments = args;
  }

  tokenLiteral(): string {
    return this.paren.lexeme;
  }
  toString(): string {
    return `${this.callee.toString()}(${this.arguments.map((a) => a.toString()).join(", ")})`;
  }
}

// ------------------------------------------------------------
// Statements
// ------------------------------------------------------------

export class ExpressionStatement implements Node {
  readonly kind = "Expression";
  token: Token;
  expression: Expression;

  constructor(token: Token, expression: Expression) {
    this.token = token;
    this.expression = expression;
  }

  tokenLiteral(): string {
    return this.token.lexeme;
  }
  toString(): string {
    return `${this.expression.toString()};`;
  }
}

export class PrintStatement implements Node {
  readonly kind = "Print";
  token: Token;
  expression: Expression;

  constructor(token: Token, expression: Expression) {
    this.token = token;
    this.expression = expression;
  }

  tokenLiteral(): string {
    return this.token.lexeme;
  }
  toString(): string {
    return `print ${this.expression.toString()};`;
  }
}

export class VarStatement implements Node {
  readonly kind = "Var";
  token: Token;
  name: Token;
  initializer: Expression | null;

  constructor(token: Token, name: Token, initializer: Expression | null) {
    this.token = token;
    this.name = name;
    this.initializer = initializer;
  }

  tokenLiteral(): string {
    return this.token.lexeme;
  }
  toString(): string {
    let out = `var ${this.name.lexeme}`;
    if (this.initializer) {
      out += ` = ${this.initializer.toString()}`;
    }
    return out + ";";
  }
}

export class BlockStatement implements Node {
  readonly kind = "Block";
  token: Token; // {
  statements: Statement[];

  constructor(token: Token, statements: Statement[] = []) {
    this.token = token;
    this.statements = statements;
  }

  tokenLiteral(): string {
    return this.token.lexeme;
  }
  toString(): string {
    if (this.statements.length === 0) return "{ }";
    return `{ ${this.statements.map((s) => s.toString()).join(" ")} }`;
  }
}

export class IfStatement implements Node {
  readonly kind = "If";
  token: Token;
  condition: Expression;
  thenBranch: Statement;
  elseBranch: Statement | null;

  constructor(token: Token, condition: Expression, thenBranch: Statement, elseBranch: Statement | null = null) {
    this.token = token;
    this.condition = condition;
    this.thenBranch = thenBranch;
    this.elseBranch = elseBranch;
  }

  tokenLiteral(): string {
    return this.token.lexeme;
  }
  toString(): string {
    let out = `if (${this.condition.toString()}) ${this.thenBranch.toString()}`;
    if (this.elseBranch) {
      out += ` else ${this.elseBranch.toString()}`;
    }
    return out;
  }
}

export class WhileStatement implements Node {
  readonly kind = "While";
  token: Token; // while, or the for it was desugared from
  condition: Expression;
  body: Statement;

  constructor(token: Token, condition: Expression, body: Statement) {
    this.token = token;
    this.condition = condition;
    this.body = body;
  }

  tokenLiteral(): string {
    return this.token.lexeme;
  }
  toString(): string {
    return `while (${this.condition.toString()}) ${this.body.toString()}`;
  }
}

export class FunctionStatement implements Node {
  readonly kind = "Function";
  token: Token;
  name: Token;
  params: Token[];
  body: Statement[];

  constructor(token: Token, name: Token, params: Token[], body: Statement[]) {
    this.token = token;
    this.name = name;
    this.params = params;
    this.body = body;
  }

  tokenLiteral(): string {
    return this.token.lexeme;
  }
  toString(): string {
    const params = this.params.map((p) => p.lexeme).join(", ");
    const body = new BlockStatement(this.token, this.body);
    return `fun ${this.name.lexeme}(${params}) ${body.toString()}`;
  }
}

export class ReturnStatement implements Node {
  readonly kind = "Return";
  token: Token; // return
  value: Expression | null;

  constructor(token: Token, value: Expression | null) {
    this.token = token;
    this.value = value;
  }

  tokenLiteral(): string {
    return this.token.lexeme;
  }
  toString(): string {
    if (this.value) {
      return `return ${this.value.toString()};`;
    }
    return "return;";
  }
}
