import * as fs from "fs";
import * as path from "path";
import type * as AST from "./ast/ast";
import { StaticError } from "./errors";
import { compileSource } from "./session";

export interface LoadedProgram {
    path: string;
    source: string;
    program: AST.Program;
}

/**
 * Reads and parses a script file. Throws StaticError carrying every lexical
 * and parse diagnostic when the file does not compile; filesystem errors
 * propagate unchanged.
 */
export function loadProgram(file: string): LoadedProgram {
    const absolutePath = path.resolve(file);
    const source = fs.readFileSync(absolutePath, "utf-8");
    const { program, diagnostics } = compileSource(source);

    if (diagnostics.length > 0) {
        throw new StaticError(diagnostics, absolutePath, source);
    }
    return { path: absolutePath, source, program };
}
