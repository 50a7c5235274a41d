import { Lexer } from "./lexer/lexer";
import { Parser } from "./parser/parser";
import type * as AST from "./ast/ast";
import type { Diagnostic } from "./errors";
import { Interpreter, type InterpreterOptions } from "./interpreter/interpreter";
import type { Environment } from "./interpreter/environment";
import { RuntimeError } from "./interpreter/runtime_error";

export interface CompileResult {
    program: AST.Program;
    /** Lexical and parse diagnostics, ordered by position. */
    diagnostics: Diagnostic[];
}

export type RunResult =
    | { status: "ok" }
    | { status: "static-error"; diagnostics: Diagnostic[] }
    | { status: "runtime-error"; diagnostic: Diagnostic };

/** Scans and parses a whole source text, collecting every diagnostic. */
export function compileSource(source: string): CompileResult {
    const lexer = new Lexer(source);
    const parser = new Parser(lexer);
    const program = parser.ParseProgram();
    // The parser has pulled every token by now, so the lexer's list is complete
    const diagnostics = [...lexer.getErrors(), ...parser.getErrors()].sort(
        (a, b) => a.line - b.line || a.col - b.col,
    );
    return { program, diagnostics };
}

/**
 * One interpreter session: a single global scope that lives as long as the
 * session and is shared by every program run through it.
 */
export class Session {
    private interpreter: Interpreter;

    constructor(options: InterpreterOptions = {}) {
        this.interpreter = new Interpreter(options);
    }

    public get globals(): Environment {
        return this.interpreter.globals;
    }

    /** Compiles and runs `source`; nothing runs if it has any static diagnostic. */
    public run(source: string): RunResult {
        const { program, diagnostics } = compileSource(source);
        if (diagnostics.length > 0) {
            return { status: "static-error", diagnostics };
        }
        return this.execute(program);
    }

    public execute(program: AST.Program): RunResult {
        try {
            this.interpreter.interpret(program);
        } catch (e) {
            if (e instanceof RuntimeError) {
                return { status: "runtime-error", diagnostic: e.toDiagnostic() };
            }
            throw e;
        }
        return { status: "ok" };
    }
}
