import * as path from "path";

// ANSI color codes
const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const RED = "\x1b[31m";
const BLUE = "\x1b[34m";

const useColor = process.stderr.isTTY === true;

function c(code: string, text: string): string {
    return useColor ? `${code}${text}${RESET}` : text;
}

export type DiagnosticKind = "lexical" | "parse" | "runtime";

export interface Diagnostic {
    kind: DiagnosticKind;
    msg: string;
    line: number;
    col: number;
    /** Source text the diagnostic points at; empty at end of input. */
    lexeme: string;
}

/**
 * Thrown by the CLI loader when a file has lexical or parse errors.
 * Carries everything needed to render every diagnostic with source context.
 */
export class StaticError extends Error {
    public diagnostics: Diagnostic[];
    public file: string;
    public source: string;

    constructor(diagnostics: Diagnostic[], file: string, source: string) {
        super(`${diagnostics.length} error(s) in ${file}`);
        this.diagnostics = diagnostics;
        this.file = file;
        this.source = source;
    }
}

export type Severity = "error" | "runtime error";

/**
 * Format a diagnostic with source context.
 *
 * Example output:
 *   error: undefined variable 'x'
 *    --> scripts/main.lox:12:5
 *      |
 *   12 |     print x + 1;
 *      |           ^
 */
export function formatError(
    message: string,
    file: string,
    line: number,
    col: number,
    source: string,
    severity: Severity = "error",
): string {
    const lines = source.split("\n");
    const lineIdx = line - 1;
    const sourceLine = lineIdx >= 0 && lineIdx < lines.length ? lines[lineIdx].replace(/\r$/, "") : null;

    const gutterWidth = String(line).length;
    const emptyGutter = " ".repeat(gutterWidth);

    const relFile = file === "<repl>" ? file : path.relative(process.cwd(), file) || file;

    const sevLabel = c(BOLD + RED, severity);

    const parts: string[] = [
        `${sevLabel}${c(BOLD, ": " + message)}`,
        ` ${c(BLUE, "-->")} ${relFile}:${line}:${col}`,
    ];

    if (sourceLine !== null) {
        // col is 1-indexed from the lexer
        const caretOffset = Math.max(0, col - 1);
        parts.push(
            ` ${emptyGutter} ${c(BLUE, "|")}`,
            ` ${c(BLUE, String(line).padStart(gutterWidth))} ${c(BLUE, "|")} ${sourceLine}`,
            ` ${emptyGutter} ${c(BLUE, "|")} ${" ".repeat(caretOffset)}${c(RED, "^")}`,
        );
    }

    return parts.join("\n");
}

export function formatDiagnostic(d: Diagnostic, file: string, source: string): string {
    const severity: Severity = d.kind === "runtime" ? "runtime error" : "error";
    return formatError(d.msg, file, d.line, d.col, source, severity);
}
