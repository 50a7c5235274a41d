import type * as AST from "../ast/ast";
import type { Token } from "../token";
import { TokenType } from "../token";
import { Environment } from "./environment";
import { LoxFunction } from "./function";
import { defineNatives, type Clock } from "./natives";
import { RuntimeError } from "./runtime_error";
import { LoxCallable, isEqual, isTruthy, stringify, type LoxValue } from "./values";

/**
 * Outcome of executing a statement. A `return` travels up as a value
 * through blocks and loops until the enclosing call absorbs it; it never
 * goes through the error channel.
 */
export type Completion = { type: "normal" } | { type: "return"; value: LoxValue };

const NORMAL: Completion = { type: "normal" };

export interface InterpreterOptions {
  /** Receives each line produced by `print`. Defaults to console.log. */
  write?: (text: string) => void;
  clock?: Clock;
}

function assertNever(node: never): never {
  throw new Error(`Unhandled node: ${JSON.stringify(node)}`);
}

export class Interpreter {
  public readonly globals: Environment;
  private environment: Environment;
  private write: (text: string) => void;

  constructor(options: InterpreterOptions = {}) {
    this.globals = new Environment();
    this.environment = this.globals;
    this.write = options.write ?? ((text) => console.log(text));
    defineNatives(this.globals, options.clock);
  }

  /**
   * Runs a program against the global scope. Throws RuntimeError on the
   * first runtime fault; the global scope keeps every binding made before it.
   */
  public interpret(program: AST.Program) {
    for (const stmt of program.statements) {
      // A return outside any function ends only the statement it unwinds
      this.execute(stmt);
    }
  }

  public execute(stmt: AST.Statement): Completion {
    switch (stmt.kind) {
      case "Expression":
        this.evaluate(stmt.expression);
        return NORMAL;
      case "Print":
        this.write(stringify(this.evaluate(stmt.expression)));
        return NORMAL;
      case "Var": {
        const value = stmt.initializer ? this.evaluate(stmt.initializer) : null;
        this.environment.define(stmt.name.lexeme, value);
        return NORMAL;
      }
      case "Block":
        return this.executeBlock(stmt.statements, this.environment.createChild());
      case "If":
        if (isTruthy(this.evaluate(stmt.condition))) {
          return this.execute(stmt.thenBranch);
        } else if (stmt.elseBranch) {
          return this.execute(stmt.elseBranch);
        }
        return NORMAL;
      case "While":
        while (isTruthy(this.evaluate(stmt.condition))) {
          const completion = this.execute(stmt.body);
          if (completion.type === "return") return completion;
        }
        return NORMAL;
      case "Function":
        this.environment.define(stmt.name.lexeme, new LoxFunction(stmt, this.environment));
        return NORMAL;
      case "Return":
        return { type: "return", value: stmt.value ? this.evaluate(stmt.value) : null };
      default:
        return assertNever(stmt);
    }
  }

  /** Executes statements in `environment`, restoring the current scope on every exit path. */
  public executeBlock(statements: AST.Statement[], environment: Environment): Completion {
    const previous = this.environment;
    try {
      this.environment = environment;
      for (const stmt of statements) {
        const completion = this.execute(stmt);
        if (completion.type === "return") return completion;
      }
      return NORMAL;
    } finally {
      this.environment = previous;
    }
  }

  public evaluate(expr: AST.Expression): LoxValue {
    switch (expr.kind) {
      case "Literal":
        return expr.value;
      case "Grouping":
        return this.evaluate(expr.expression);
      case "Unary":
        return this.evaluateUnary(expr);
      case "Binary":
        return this.evaluateBinary(expr);
      case "Logical": {
        const left = this.evaluate(expr.left);
        if (expr.operator.type === TokenType.Or) {
          if (isTruthy(left)) return left;
        } else if (!isTruthy(left)) {
          return left;
        }
        return this.evaluate(expr.right);
      }
      case "Variable":
        return this.environment.get(expr.name);
      case "Assign": {
        const value = this.evaluate(expr.value);
        this.environment.assign(expr.name, value);
        return value;
      }
      case "Call":
        return this.evaluateCall(expr);
      default:
        return assertNever(expr);
    }
  }

  private evaluateUnary(expr: AST.UnaryExpression): LoxValue {
    const right = this.evaluate(expr.right);
    switch (expr.operator.type) {
      case TokenType.Minus:
        if (typeof right !== "number") {
          throw new RuntimeError(expr.operator, "operand must be a number");
        }
        return -right;
      case TokenType.Bang:
        return !isTruthy(right);
      default:
        throw new RuntimeError(expr.operator, `unknown unary operator '${expr.operator.lexeme}'`);
    }
  }

  private evaluateBinary(expr: AST.BinaryExpression): LoxValue {
    const left = this.evaluate(expr.left);
    const right = this.evaluate(expr.right);
    const op = expr.operator;

    switch (op.type) {
      case TokenType.Plus:
        if (typeof left === "number" && typeof right === "number") return left + right;
        if (typeof left === "string" && typeof right === "string") return left + right;
        throw new RuntimeError(op, "operands must be two numbers or two strings");
      case TokenType.Minus: {
        const [a, b] = this.numberOperands(op, left, right);
        return a - b;
      }
      case TokenType.Star: {
        const [a, b] = this.numberOperands(op, left, right);
        return a * b;
      }
      case TokenType.Slash: {
        const [a, b] = this.numberOperands(op, left, right);
        return a / b;
      }
      case TokenType.GT: {
        const [a, b] = this.numberOperands(op, left, right);
        return a > b;
      }
      case TokenType.GtEq: {
        const [a, b] = this.numberOperands(op, left, right);
        return a >= b;
      }
      case TokenType.LT: {
        const [a, b] = this.numberOperands(op, left, right);
        return a < b;
      }
      case TokenType.LtEq: {
        const [a, b] = this.numberOperands(op, left, right);
        return a <= b;
      }
      case TokenType.EqEq:
        return isEqual(left, right);
      case TokenType.BangEq:
        return !isEqual(left, right);
      default:
        throw new RuntimeError(op, `unknown binary operator '${op.lexeme}'`);
    }
  }

  private evaluateCall(expr: AST.CallExpression): LoxValue {
    const callee = this.evaluate(expr.callee);
    const args = expr.arguments.map((arg) => this.evaluate(arg));

    if (!(callee instanceof LoxCallable)) {
      throw new RuntimeError(expr.paren, "can only call functions");
    }
    if (args.length !== callee.arity()) {
      throw new RuntimeError(expr.paren, `expected ${callee.arity()} arguments but got ${args.length}`);
    }
    return callee.call(this, args);
  }

  private numberOperands(op: Token, left: LoxValue, right: LoxValue): [number, number] {
    if (typeof left === "number" && typeof right === "number") {
      return [left, right];
    }
    throw new RuntimeError(op, "operands must be numbers");
  }
}
