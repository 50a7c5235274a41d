export { TokenType, Keywords, lookupIdent } from "./token";
export type { Token, LiteralValue } from "./token";
export { Lexer } from "./lexer/lexer";
export { Parser, MAX_ARGUMENTS } from "./parser/parser";
export * as AST from "./ast/ast";
export { Environment } from "./interpreter/environment";
export { Interpreter } from "./interpreter/interpreter";
export type { Completion, InterpreterOptions } from "./interpreter/interpreter";
export { LoxFunction } from "./interpreter/function";
export { LoxCallable, NativeFunction, isTruthy, isEqual, stringify, formatNumber } from "./interpreter/values";
export type { LoxValue, NativeImpl } from "./interpreter/values";
export { RuntimeError } from "./interpreter/runtime_error";
export { StaticError, formatError, formatDiagnostic } from "./errors";
export type { Diagnostic, DiagnosticKind, Severity } from "./errors";
export { Session, compileSource } from "./session";
export type { CompileResult, RunResult } from "./session";
export { loadProgram } from "./loader";
export type { LoadedProgram } from "./loader";
