import { describe, it, expect } from "vitest";
import { Lexer } from "../lexer/lexer";
import { Parser } from "./parser";
import * as AST from "../ast/ast";

function parse(input: string) {
  const lexer = new Lexer(input);
  const parser = new Parser(lexer);
  const program = parser.ParseProgram();
  return { program, errors: parser.getErrors() };
}

function parseClean(input: string): AST.Program {
  const { program, errors } = parse(input);
  expect(errors).toEqual([]);
  return program;
}

describe("Parser", () => {
  it("should parse var declarations", () => {
    const program = parseClean(`
      var x;
      var y = "hi";
      var z = 838383;
    `);

    expect(program.statements).toHaveLength(3);
    program.statements.forEach((stmt) => expect(stmt).toBeInstanceOf(AST.VarStatement));
    expect(program.toString()).toBe('var x;\nvar y = "hi";\nvar z = 838383;');
  });

  it("should parse operator precedence", () => {
    const tests = [
      { input: "1 + 2 * 3;", expected: "(1 + (2 * 3));" },
      { input: "1 - 2 - 3;", expected: "((1 - 2) - 3);" },
      { input: "-a * b;", expected: "((-a) * b);" },
      { input: "!true == false;", expected: "((!true) == false);" },
      { input: "1 < 2 == true;", expected: "((1 < 2) == true);" },
      { input: "a or b and c;", expected: "(a or (b and c));" },
      { input: "a == b or c;", expected: "((a == b) or c);" },
      { input: "(1 + 2) * 3;", expected: "((group (1 + 2)) * 3);" },
      { input: "a = b = c;", expected: "(a = (b = c));" },
      { input: "a = 1 + 2;", expected: "(a = (1 + 2));" },
      { input: "f(1, 2)(3);", expected: "f(1, 2)(3);" },
      { input: "-f();", expected: "(-f());" },
      { input: "nil;", expected: "nil;" },
    ];

    tests.forEach((tt) => {
      expect(parseClean(tt.input).toString()).toBe(tt.expected);
    });
  });

  it("should keep the closing paren of a call", () => {
    const program = parseClean("add(1,\n  2);");
    expect(program.statements[0]).toMatchObject({
      kind: "Expression",
      expression: { kind: "Call", paren: { lexeme: ")", line: 2, column: 4 } },
    });
  });

  it("should parse if statements with a dangling else", () => {
    const program = parseClean("if (a) if (b) print 1; else print 2;");

    expect(program.statements[0]).toMatchObject({
      kind: "If",
      elseBranch: null,
      thenBranch: { kind: "If", elseBranch: { kind: "Print" } },
    });
  });

  it("should parse while loops and blocks", () => {
    const program = parseClean("while (i < 3) { print i; i = i + 1; }");
    expect(program.toString()).toBe("while ((i < 3)) { print i; (i = (i + 1)); }");
  });

  it("should desugar a for loop into a while loop", () => {
    const program = parseClean("for (var i = 0; i < 3; i = i + 1) print i;");

    expect(program.statements).toHaveLength(1);
    expect(program.statements[0]).toBeInstanceOf(AST.BlockStatement);
    expect(program.toString()).toBe("{ var i = 0; while ((i < 3)) { print i; (i = (i + 1)); } }");
  });

  it("should desugar an empty for header into an endless loop", () => {
    expect(parseClean("for (;;) print 1;").toString()).toBe("while (true) print 1;");
  });

  it("should parse function declarations and returns", () => {
    const program = parseClean(`
      fun add(a, b) { return a + b; }
      fun nothing() { return; }
    `);

    expect(program.statements[0]).toMatchObject({ kind: "Function", name: { lexeme: "add" } });
    expect(program.toString()).toBe("fun add(a, b) { return (a + b); }\nfun nothing() { return; }");
  });

  it("should report an invalid assignment target and keep parsing", () => {
    const { program, errors } = parse("a + b = c;\nprint 1;");

    expect(errors).toEqual([
      { kind: "parse", msg: "invalid assignment target", line: 1, col: 7, lexeme: "=" },
    ]);
    expect(program.toString()).toBe("(a + b);\nprint 1;");
  });

  it("should report a missing semicolon at the end of input", () => {
    const { errors } = parse("print 1");
    expect(errors).toEqual([
      { kind: "parse", msg: "expected ';' after value", line: 1, col: 8, lexeme: "" },
    ]);
  });

  it("should report errors on different lines in one run", () => {
    const { program, errors } = parse("print ;\nvar = 1;\nprint 3;");

    expect(errors.map((e) => [e.msg, e.line, e.col])).toEqual([
      ["expected expression", 1, 7],
      ["expected variable name", 2, 5],
    ]);
    expect(program.toString()).toBe("print 3;");
  });

  it("should synchronize before the next statement keyword", () => {
    const { program, errors } = parse("var 1 print 2;");

    expect(errors.map((e) => e.msg)).toEqual(["expected variable name"]);
    expect(program.toString()).toBe("print 2;");
  });

  it("should resume at a declaration that interrupted an expression", () => {
    const { program, errors } = parse("print (var x = 1;");

    expect(errors.map((e) => [e.msg, e.col])).toEqual([["expected expression", 8]]);
    expect(program.toString()).toBe("var x = 1;");
  });

  it("should report an error inside the declaration it resumed at", () => {
    const { errors } = parse("print (var = 1;");

    expect(errors.map((e) => [e.msg, e.col])).toEqual([
      ["expected expression", 8],
      ["expected variable name", 12],
    ]);
  });

  it("should recover inside a block", () => {
    const { program, errors } = parse("{ var = 1; print 2; }");

    expect(errors.map((e) => e.msg)).toEqual(["expected variable name"]);
    expect(program.toString()).toBe("{ print 2; }");
  });

  it("should report an unclosed block", () => {
    const { errors } = parse("{ print 1;");
    expect(errors.map((e) => e.msg)).toEqual(["expected '}' after block"]);
  });

  it("should report the construct that is missing its punctuation", () => {
    const tests = [
      { input: "if 1) print 1;", msg: "expected '(' after 'if'" },
      { input: "if (1 print 1;", msg: "expected ')' after if condition" },
      { input: "while 1) print 1;", msg: "expected '(' after 'while'" },
      { input: "for (var i = 0; i < 1 i) print i;", msg: "expected ';' after loop condition" },
      { input: "fun (a) {}", msg: "expected function name" },
      { input: "fun f(a, 1) {}", msg: "expected parameter name" },
      { input: "fun f(a) print a;", msg: "expected '{' before function body" },
      { input: "f(1, 2;", msg: "expected ')' after arguments" },
      { input: "(1 + 2;", msg: "expected ')' after expression" },
      { input: "var a = 1", msg: "expected ';' after variable declaration" },
    ];

    tests.forEach((tt) => {
      const { errors } = parse(tt.input);
      expect(errors[0]?.msg).toBe(tt.msg);
    });
  });

  it("should limit a call to 255 arguments", () => {
    const args = Array.from({ length: 256 }, () => "0").join(", ");
    const { program, errors } = parse(`f(${args});`);

    expect(errors.map((e) => e.msg)).toEqual(["can't have more than 255 arguments"]);
    expect(program.statements).toHaveLength(1);
  });

  it("should limit a function to 255 parameters", () => {
    const params = Array.from({ length: 256 }, (_, i) => `p${i}`).join(", ");
    const { errors } = parse(`fun f(${params}) {}`);

    expect(errors.map((e) => e.msg)).toEqual(["can't have more than 255 parameters"]);
  });
});
