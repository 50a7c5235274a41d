import type { Token } from "../token";
import type { LoxValue } from "./values";
import { RuntimeError } from "./runtime_error";

/**
 * One lexical scope. Scopes chain outward through `enclosing`; closures keep
 * a reference to the scope they were declared in, so a scope lives as long
 * as any frame or function value still points at it.
 */
export class Environment {
    private values: Map<string, LoxValue> = new Map();
    public readonly enclosing: Environment | null;

    constructor(enclosing: Environment | null = null) {
        this.enclosing = enclosing;
    }

    /** Binds `name` in this scope, replacing any binding it already has here. */
    public define(name: string, value: LoxValue) {
        this.values.set(name, value);
    }

    public get(name: Token): LoxValue {
        let env: Environment | null = this;
        while (env !== null) {
            const value = env.values.get(name.lexeme);
            if (value !== undefined) return value;
            env = env.enclosing;
        }
        throw new RuntimeError(name, `undefined variable '${name.lexeme}'`);
    }

    /** Overwrites the nearest existing binding; never declares. */
    public assign(name: Token, value: LoxValue) {
        let env: Environment | null = this;
        while (env !== null) {
            if (env.values.has(name.lexeme)) {
                env.values.set(name.lexeme, value);
                return;
            }
            env = env.enclosing;
        }
        throw new RuntimeError(name, `undefined variable '${name.lexeme}'`);
    }

    public has(name: string): boolean {
        return this.values.has(name);
    }

    public createChild(): Environment {
        return new Environment(this);
    }
}
