import { describe, it, expect } from "vitest";
import { PassThrough } from "stream";
import { evaluateUnit, nestingDepth, startRepl } from "./repl";
import type { Output } from "./commands";
import { Session } from "../session";

function strip(s: string): string {
    return s.replace(/\x1b\[[0-9;]*m/g, "");
}

function capture() {
    const out: string[] = [];
    const err: string[] = [];
    const output: Output = {
        out: (text) => out.push(text),
        err: (text) => err.push(strip(text)),
    };
    return { out, err, output };
}

describe("nestingDepth", () => {
    it("should count open brackets", () => {
        expect(nestingDepth("fun f() {")).toBe(1);
        expect(nestingDepth("if (a) { print (1")).toBe(2);
        expect(nestingDepth("fun f() { return 1; }")).toBe(0);
        expect(nestingDepth("}")).toBe(-1);
    });

    it("should ignore brackets in strings and comments", () => {
        expect(nestingDepth('print "{(";')).toBe(0);
        expect(nestingDepth("print 1; // {")).toBe(0);
        expect(nestingDepth("/* ( */ {")).toBe(1);
    });
});

describe("evaluateUnit", () => {
    it("should print diagnostics against the repl input", () => {
        const { out, err, output } = capture();
        evaluateUnit(new Session({ write: output.out }), "print ;", output);

        expect(out).toEqual([]);
        expect(err).toHaveLength(1);
        expect(err[0].split("\n").slice(0, 2)).toEqual(["error: expected expression", " --> <repl>:1:7"]);
    });

    it("should report a runtime error and keep the session", () => {
        const { out, err, output } = capture();
        const session = new Session({ write: output.out });

        evaluateUnit(session, "var a = 1;", output);
        evaluateUnit(session, "a = b;", output);
        evaluateUnit(session, "print a;", output);

        expect(err.map((e) => e.split("\n")[0])).toEqual(["runtime error: undefined variable 'b'"]);
        expect(out).toEqual(["1"]);
    });
});

describe("startRepl", () => {
    it("should run each complete input in one session", async () => {
        const { out, err, output } = capture();
        const input = new PassThrough();
        const terminal = new PassThrough();

        const done = startRepl(input, terminal, output);
        input.write("var a = 1;\n");
        input.write("\n");
        input.write("fun f() {\n");
        input.write("  return a + 1;\n");
        input.write("}\n");
        input.write("print f();\n");
        input.end("print nope;\n");
        await done;

        expect(out).toEqual(["2"]);
        expect(err.map((e) => e.split("\n")[0])).toEqual(["runtime error: undefined variable 'nope'"]);
    });

    it("should report a unit left open when input ends", async () => {
        const { out, err, output } = capture();
        const input = new PassThrough();

        const done = startRepl(input, new PassThrough(), output);
        input.end("fun f() {\n");
        await done;

        expect(out).toEqual([]);
        expect(err.map((e) => e.split("\n").slice(0, 2))).toEqual([
            ["error: expected '}' after block", " --> <repl>:1:10"],
        ]);
    });
});
