import { describe, it, expect } from "vitest";
import { StaticError, formatDiagnostic, formatError } from "./errors";
import { compileSource } from "./session";

// Strip ANSI escape codes for assertion readability
function strip(s: string): string {
    return s.replace(/\x1b\[[0-9;]*m/g, "");
}

describe("formatError", () => {
    it("should render the message, location and a caret under the column", () => {
        const source = "var x = 10;\nprint y;";
        const output = strip(formatError("undefined variable 'y'", "<repl>", 2, 7, source));

        expect(output.split("\n")).toEqual([
            "error: undefined variable 'y'",
            " --> <repl>:2:7",
            "   |",
            " 2 | print y;",
            "   | " + " ".repeat(6) + "^",
        ]);
    });

    it("should show a path relative to the working directory", () => {
        const output = strip(formatError("oops", "/tmp/test.lox", 1, 1, "bad;"));
        expect(output).toContain("test.lox:1:1");
        expect(output).toContain(" 1 | bad;");
    });

    it("should widen the gutter for multi-digit line numbers", () => {
        const lines = Array.from({ length: 10 }, () => "nil;");
        lines[9] = "print oops;";
        const output = strip(formatError("error here", "<repl>", 10, 7, lines.join("\n")));

        expect(output).toContain(" 10 | print oops;");
        expect(output).toContain("    |");
    });

    it("should drop the source excerpt when the line is out of range", () => {
        const output = strip(formatError("phantom error", "<repl>", 99, 1, "only one line"));
        expect(output.split("\n")).toEqual(["error: phantom error", " --> <repl>:99:1"]);
    });

    it("should strip a carriage return from the excerpt", () => {
        const output = strip(formatError("bad", "<repl>", 1, 1, "nil;\r\nnil;"));
        expect(output).toContain(" 1 | nil;\n");
    });

    it("should label a runtime error severity", () => {
        const output = strip(formatError("operands must be numbers", "<repl>", 1, 3, "1 - nil;", "runtime error"));
        expect(output.split("\n")[0]).toBe("runtime error: operands must be numbers");
    });
});

describe("formatDiagnostic", () => {
    it("should label runtime diagnostics", () => {
        const output = strip(
            formatDiagnostic({ kind: "runtime", msg: "operand must be a number", line: 1, col: 1, lexeme: "-" }, "<repl>", '-"a";'),
        );
        expect(output.split("\n")[0]).toBe("runtime error: operand must be a number");
    });

    it("should render parser diagnostics with their position", () => {
        const source = "var = 1;";
        const { diagnostics } = compileSource(source);
        expect(diagnostics).toHaveLength(1);

        const output = strip(formatDiagnostic(diagnostics[0], "<repl>", source));
        expect(output.split("\n")).toEqual([
            "error: expected variable name",
            " --> <repl>:1:5",
            "   |",
            " 1 | var = 1;",
            "   |     ^",
        ]);
    });
});

describe("StaticError", () => {
    it("should carry structured error data", () => {
        const diagnostics = compileSource('print ;\n"open').diagnostics;
        const err = new StaticError(diagnostics, "/tmp/test.lox", 'print ;\n"open');

        expect(err).toBeInstanceOf(Error);
        expect(err.diagnostics).toHaveLength(2);
        expect(err.file).toBe("/tmp/test.lox");
        expect(err.message).toBe("2 error(s) in /tmp/test.lox");
    });
});
