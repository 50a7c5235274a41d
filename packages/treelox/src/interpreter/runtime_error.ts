import type { Token } from "../token";
import type { Diagnostic } from "../errors";

/**
 * A runtime fault in a Lox program. Aborts the current top-level execution;
 * the session itself stays usable.
 */
export class RuntimeError extends Error {
    public readonly token: Token;

    constructor(token: Token, message: string) {
        super(message);
        this.name = "RuntimeError";
        this.token = token;
    }

    public toDiagnostic(): Diagnostic {
        return {
            kind: "runtime",
            msg: this.message,
            line: this.token.line,
            col: this.token.column,
            lexeme: this.token.lexeme,
        };
    }
}
