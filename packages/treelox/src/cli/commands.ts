import { StaticError, formatDiagnostic } from "../errors";
import { loadProgram, type LoadedProgram } from "../loader";
import { Session } from "../session";

export const EXIT_OK = 0;
export const EXIT_USAGE = 64;
export const EXIT_STATIC_ERROR = 65;
export const EXIT_NO_INPUT = 66;
export const EXIT_RUNTIME_ERROR = 70;

export interface Output {
    out(text: string): void;
    err(text: string): void;
}

export const consoleOutput: Output = {
    out: (text) => console.log(text),
    err: (text) => console.error(text),
};

function load(file: string, output: Output): LoadedProgram | number {
    try {
        return loadProgram(file);
    } catch (e) {
        if (e instanceof StaticError) {
            e.diagnostics.forEach((d) => {
                output.err(formatDiagnostic(d, e.file, e.source));
                output.err("");
            });
            return EXIT_STATIC_ERROR;
        }
        const reason = e instanceof Error ? e.message : String(e);
        output.err(`error: could not read '${file}': ${reason}`);
        return EXIT_NO_INPUT;
    }
}

/** Batch mode: parse the whole file first, run it only if it is clean. */
export function runFile(file: string, output: Output = consoleOutput): number {
    const loaded = load(file, output);
    if (typeof loaded === "number") return loaded;

    const session = new Session({ write: (text) => output.out(text) });
    const result = session.execute(loaded.program);
    if (result.status === "runtime-error") {
        output.err(formatDiagnostic(result.diagnostic, loaded.path, loaded.source));
        return EXIT_RUNTIME_ERROR;
    }
    return EXIT_OK;
}

/** Prints the parsed program, one top-level statement per line. */
export function printAst(file: string, output: Output = consoleOutput): number {
    const loaded = load(file, output);
    if (typeof loaded === "number") return loaded;

    loaded.program.statements.forEach((stmt) => output.out(stmt.toString()));
    return EXIT_OK;
}
