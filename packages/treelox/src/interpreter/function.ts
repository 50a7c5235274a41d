import type * as AST from "../ast/ast";
import type { Interpreter } from "./interpreter";
import type { Environment } from "./environment";
import { LoxCallable, type LoxValue } from "./values";

/** A user-declared function together with the scope it was declared in. */
export class LoxFunction extends LoxCallable {
  readonly declaration: AST.FunctionStatement;
  readonly closure: Environment;

  constructor(declaration: AST.FunctionStatement, closure: Environment) {
    super();
    this.declaration = declaration;
    this.closure = closure;
  }

  arity(): number {
    return this.declaration.params.length;
  }

  call(interpreter: Interpreter, args: LoxValue[]): LoxValue {
    // The caller's scope plays no part: parameters live in a child of the closure
    const environment = this.closure.createChild();
    this.declaration.params.forEach((param, i) => {
      environment.define(param.lexeme, args[i]);
    });

    const completion = interpreter.executeBlock(this.declaration.body, environment);
    return completion.type === "return" ? completion.value : null;
  }

  toString(): string {
    return `<fn ${this.declaration.name.lexeme}>`;
  }
}
