export enum TokenType {
  // Keywords
  And = "AND",
  Class = "CLASS",
  Else = "ELSE",
  False = "FALSE",
  For = "FOR",
  Fun = "FUN",
  If = "IF",
  Nil = "NIL",
  Or = "OR",
  Print = "PRINT",
  Return = "RETURN",
  Super = "SUPER",
  This = "THIS",
  True = "TRUE",
  Var = "VAR",
  While = "WHILE",

  // Literals
  Identifier = "IDENTIFIER",
  Number = "NUMBER",
  String = "STRING",

  // Symbols
  LParen = "LPAREN",   // (
  RParen = "RPAREN",   // )
  LBrace = "LBRACE",   // {
  RBrace = "RBRACE",   // }
  Comma = "COMMA",     // ,
  Dot = "DOT",         // .
  Semi = "SEMI",       // ;
  Plus = "PLUS",       // +
  Minus = "MINUS",     // -
  Star = "STAR",       // *
  Slash = "SLASH",     // /
  Bang = "BANG",       // !
  BangEq = "BANGEQ",   // !=
  Equals = "EQUALS",   // =
  EqEq = "EQEQ",       // ==
  LT = "LT",           // <
  LtEq = "LTEQ",       // <=
  GT = "GT",           // >
  GtEq = "GTEQ",       // >=

  EOF = "EOF",
}

export type LiteralValue = number | string | null;

export interface Token {
  type: TokenType;
  lexeme: string;
  value: LiteralValue;
  line: number;
  column: number;
}

export const Keywords: Record<string, TokenType> = {
  and: TokenType.And,
  class: TokenType.Class,
  else: TokenType.Else,
  false: TokenType.False,
  for: TokenType.For,
  fun: TokenType.Fun,
  if: TokenType.If,
  nil: TokenType.Nil,
  or: TokenType.Or,
  print: TokenType.Print,
  return: TokenType.Return,
  super: TokenType.Super,
  this: TokenType.This,
  true: TokenType.True,
  var: TokenType.Var,
  while: TokenType.While,
};

export function lookupIdent(ident: string): TokenType {
  return Object.prototype.hasOwnProperty.call(Keywords, ident) ? Keywords[ident] : TokenType.Identifier;
}
