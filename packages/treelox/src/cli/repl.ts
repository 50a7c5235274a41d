import * as readline from "readline";
import { Lexer } from "../lexer/lexer";
import { TokenType } from "../token";
import { formatDiagnostic } from "../errors";
import { Session } from "../session";
import { consoleOutput, type Output } from "./commands";

const PROMPT = "> ";
const CONTINUATION_PROMPT = ".. ";
const REPL_FILE = "<repl>";

/**
 * Net count of open parentheses and braces. Strings and comments are
 * skipped by the lexer, so brackets inside them do not count.
 */
export function nestingDepth(source: string): number {
    let depth = 0;
    for (const tok of new Lexer(source).scanTokens()) {
        if (tok.type === TokenType.LParen || tok.type === TokenType.LBrace) depth++;
        if (tok.type === TokenType.RParen || tok.type === TokenType.RBrace) depth--;
    }
    return depth;
}

/** Runs one complete input against the session and reports any failure. */
export function evaluateUnit(session: Session, source: string, output: Output) {
    const result = session.run(source);
    switch (result.status) {
        case "ok":
            return;
        case "static-error":
            result.diagnostics.forEach((d) => output.err(formatDiagnostic(d, REPL_FILE, source)));
            return;
        case "runtime-error":
            output.err(formatDiagnostic(result.diagnostic, REPL_FILE, source));
            return;
    }
}

/** Interactive loop; resolves when the input stream closes. */
export function startRepl(
    input: NodeJS.ReadableStream = process.stdin,
    terminal: NodeJS.WritableStream = process.stdout,
    output: Output = consoleOutput,
): Promise<void> {
    const session = new Session({ write: (text) => output.out(text) });
    const rl = readline.createInterface({ input, output: terminal, prompt: PROMPT });

    let buffer = "";

    rl.on("line", (line) => {
        if (buffer === "" && line.trim() === "") {
            rl.prompt();
            return;
        }

        // Accumulate multi-line input until brackets balance
        buffer += (buffer ? "\n" : "") + line;
        if (nestingDepth(buffer) > 0) {
            rl.setPrompt(CONTINUATION_PROMPT);
            rl.prompt();
            return;
        }

        const source = buffer;
        buffer = "";
        evaluateUnit(session, source, output);

        rl.setPrompt(PROMPT);
        rl.prompt();
    });

    rl.prompt();

    return new Promise((resolve) => {
        rl.on("close", () => {
            // Input ended inside an open unit; run it so its errors are shown
            if (buffer.trim() !== "") {
                evaluateUnit(session, buffer, output);
            }
            resolve();
        });
    });
}
