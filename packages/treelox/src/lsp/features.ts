import {
  type CompletionItem,
  CompletionItemKind,
  type Diagnostic as LspDiagnostic,
  DiagnosticSeverity,
  type Hover,
  MarkupKind,
} from 'vscode-languageserver';
import { Lexer } from '../lexer/lexer';
import { Keywords, TokenType } from '../token';
import type { Diagnostic } from '../errors';
import { compileSource } from '../session';

const KEYWORD_DETAILS: Record<string, string> = {
  fun: 'Function declaration',
  var: 'Variable declaration',
  print: 'Print statement',
  return: 'Return from the enclosing function',
  if: 'Conditional statement',
  else: 'Alternative branch of an if',
  while: 'Loop while a condition is truthy',
  for: 'C-style loop',
  and: 'Short-circuit logical and',
  or: 'Short-circuit logical or',
  nil: 'The absent value',
  true: 'Boolean true',
  false: 'Boolean false',
};

/** Converts a 1-based diagnostic into an LSP one spanning the offending lexeme. */
export function toLspDiagnostic(d: Diagnostic): LspDiagnostic {
  const width = Math.max(1, d.lexeme.split('\n')[0].length);
  const start = { line: d.line - 1, character: Math.max(0, d.col - 1) };
  return {
    severity: DiagnosticSeverity.Error,
    range: { start, end: { line: start.line, character: start.character + width } },
    message: d.msg,
    source: d.kind === 'lexical' ? 'treelox-lexer' : 'treelox-parser',
  };
}

export function collectDiagnostics(text: string): LspDiagnostic[] {
  return compileSource(text).diagnostics.map(toLspDiagnostic);
}

export function keywordCompletions(): CompletionItem[] {
  return Object.keys(Keywords)
    .filter((label) => label in KEYWORD_DETAILS)
    .map((label, i) => ({
      label,
      kind: CompletionItemKind.Keyword,
      detail: KEYWORD_DETAILS[label],
      data: i + 1,
    }));
}

/** Hover text for the token under a 0-based position, if any. */
export function hoverAt(text: string, line: number, character: number): Hover | null {
  const tokens = new Lexer(text).scanTokens();
  const tok = tokens.find(
    (t) =>
      t.type !== TokenType.EOF &&
      t.line - 1 === line &&
      character >= t.column - 1 &&
      character < t.column - 1 + t.lexeme.length,
  );
  if (!tok) return null;

  if (tok.type === TokenType.Identifier) {
    return { contents: { kind: MarkupKind.Markdown, value: `**Identifier** \`${tok.lexeme}\`` } };
  }
  const detail = KEYWORD_DETAILS[tok.lexeme];
  if (detail !== undefined && tok.type !== TokenType.String) {
    return { contents: { kind: MarkupKind.Markdown, value: `**Keyword** \`${tok.lexeme}\`: ${detail}` } };
  }
  return null;
}
