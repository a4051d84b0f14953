import type { Position } from "../common/span.js";

export enum TokenType {
  // Keywords
  Let,
  Const,
  Fn,
  If,
  Then,
  Else,
  Match,
  With,
  Type,
  Module,
  Import,
  Export,

  // Literals
  Identifier,
  String,
  Number,
  True,
  False,
  Null,

  // Pieces of a string literal that contains `{{ ... }}`
  TemplateHead,
  TemplateMiddle,
  TemplateTail,

  // Operators & Punctuation
  Plus, // +
  Minus, // -
  Star, // *
  Slash, // /
  Percent, // %
  Equal, // =
  EqualEqual, // ==
  Bang, // !
  BangEqual, // !=
  Less, // <
  LessEqual, // <=
  Greater, // >
  GreaterEqual, // >=
  AmpersandAmpersand, // &&
  PipePipe, // ||
  PipeGreater, // |>
  ThinArrow, // ->
  Arrow, // =>
  Dot, // .
  Colon, // :
  Comma, // ,
  Semicolon, // ;
  OpenParen, // (
  CloseParen, // )
  OpenBrace, // {
  CloseBrace, // }
  OpenBracket, // [
  CloseBracket, // ]
  TemplateOpen, // {{
  TemplateClose, // }}

  Newline,
  Error,
  EOF,
}

export type LiteralValue = number | string | boolean | null;

export interface Token {
  type: TokenType;
  lexeme: string;
  start: Position;
  end: Position;
  /** Decoded value of literal and template tokens. */
  value?: LiteralValue;
  /** Diagnostic carried by `TokenType.Error` tokens. */
  message?: string;
}

export const KEYWORDS: ReadonlyMap<string, TokenType> = new Map([
  ["let", TokenType.Let],
  ["const", TokenType.Const],
  ["fn", TokenType.Fn],
  ["if", TokenType.If],
  ["then", TokenType.Then],
  ["else", TokenType.Else],
  ["match", TokenType.Match],
  ["with", TokenType.With],
  ["type", TokenType.Type],
  ["module", TokenType.Module],
  ["import", TokenType.Import],
  ["export", TokenType.Export],
  ["true", TokenType.True],
  ["false", TokenType.False],
  ["null", TokenType.Null],
]);

/** Human-readable token description used in parser messages. */
export function describeToken(token: Token): string {
  switch (token.type) {
    case TokenType.EOF:
      return "end of input";
    case TokenType.Newline:
      return "newline";
    case TokenType.String:
    case TokenType.TemplateHead:
      return "string";
    case TokenType.Number:
      return `number '${token.lexeme}'`;
    case TokenType.Identifier:
      return `identifier '${token.lexeme}'`;
    default:
      return `'${token.lexeme}'`;
  }
}
