import { describe, it, expect } from "vitest";
import { Environment } from "./environment";
import { RuntimeError } from "./runtime_error";
import { TokenType, type Token } from "../token";

function ident(name: string): Token {
  return { type: TokenType.Identifier, lexeme: name, value: null, line: 1, column: 1 };
}

describe("Environment", () => {
  it("should define and read a binding", () => {
    const env = new Environment();
    env.define("a", 1);
    expect(env.get(ident("a"))).toBe(1);
    expect(env.has("a")).toBe(true);
  });

  it("should keep a binding whose value is nil", () => {
    const env = new Environment();
    env.define("a", null);
    expect(env.get(ident("a"))).toBeNull();
  });

  it("should read through enclosing scopes", () => {
    const global = new Environment();
    global.define("a", "outer");
    const inner = global.createChild().createChild();
    expect(inner.get(ident("a"))).toBe("outer");
    expect(inner.has("a")).toBe(false);
  });

  it("should shadow without touching the outer binding", () => {
    const global = new Environment();
    global.define("a", 1);
    const inner = global.createChild();
    inner.define("a", 2);
    expect(inner.get(ident("a"))).toBe(2);
    expect(global.get(ident("a"))).toBe(1);
  });

  it("should assign to the nearest binding", () => {
    const global = new Environment();
    global.define("a", 1);
    const inner = global.createChild();
    inner.assign(ident("a"), 5);
    expect(global.get(ident("a"))).toBe(5);
    expect(inner.has("a")).toBe(false);
  });

  it("should throw for an unknown name", () => {
    const env = new Environment().createChild();
    expect(() => env.get(ident("nope"))).toThrow(RuntimeError);
    expect(() => env.assign(ident("nope"), 1)).toThrow("undefined variable 'nope'");
  });
});
