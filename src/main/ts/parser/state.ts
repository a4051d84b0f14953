import {
  type DiagnosticReporter,
  DiagnosticSeverity,
} from "../common/diagnostics.js";
import type { Position, Span } from "../common/span.js";
import { describeToken, type Token, TokenType } from "../lexer/token.js";

/** A parse error: always positioned at the token that caused it. */
export class ParseError extends Error {
  constructor(
    message: string,
    readonly position: Position
  ) {
    super(message);
    this.name = "ParseError";
  }
}

/** Deepest nesting of expressions, blocks, types and patterns the parser accepts. */
export const MAX_NESTING = 128;

export class ParserState {
  readonly tokens: Token[];
  current = 0;
  readonly reporter: DiagnosticReporter;
  private depth = 0;

  constructor(tokens: Token[], reporter: DiagnosticReporter) {
    this.tokens = tokens;
    this.reporter = reporter;
  }

  match(...types: TokenType[]): boolean {
    for (const type of types) {
      if (this.check(type)) {
        this.advance();
        return true;
      }
    }
    return false;
  }

  consume(type: TokenType, message: string): Token {
    if (this.check(type)) return this.advance();
    throw this.unexpected(message);
  }

  check(type: TokenType): boolean {
    if (this.isAtEnd()) return type === TokenType.EOF;
    return this.peek().type === type;
  }

  /** Like `check`, but looks past any newline tokens without consuming them. */
  checkAcrossNewlines(type: TokenType): boolean {
    let i = this.current;
    while (this.tokens[i].type === TokenType.Newline) i++;
    return this.tokens[i].type === type;
  }

  /** Peeks `distance` significant (non-newline) tokens ahead. */
  peekSignificant(distance: number): Token {
    let i = this.current;
    let seen = 0;
    while (i < this.tokens.length - 1) {
      if (this.tokens[i].type !== TokenType.Newline) {
        if (seen === distance) break;
        seen++;
      }
      i++;
    }
    return this.tokens[i];
  }

  /** Runs `parse` one nesting level deeper, failing past `MAX_NESTING`. */
  nested<T>(parse: () => T): T {
    if (this.depth >= MAX_NESTING) {
      throw this.error(this.peek(), "Expression nested too deeply.");
    }
    this.depth++;
    try {
      return parse();
    } finally {
      this.depth--;
    }
  }

  skipNewlines() {
    while (this.peek().type === TokenType.Newline) this.advance();
  }

  advance(): Token {
    if (!this.isAtEnd()) this.current++;
    return this.previous();
  }

  isAtEnd(): boolean {
    return this.peek().type === TokenType.EOF;
  }

  peek(): Token {
    return this.tokens[this.current];
  }

  previous(): Token {
    return this.tokens[Math.max(0, this.current - 1)];
  }

  /** Builds the error for the current token, using a lexer message when there is one. */
  unexpected(message: string): ParseError {
    const token = this.peek();
    if (token.type === TokenType.Error && token.message) {
      return this.error(token, token.message);
    }
    return this.error(token, `${message} Found ${describeToken(token)}.`);
  }

  error(token: Token, message: string): ParseError {
    this.reporter.report({
      severity: DiagnosticSeverity.Error,
      message,
      span: this.tokenSpan(token),
    });
    return new ParseError(message, token.start);
  }

  tokenSpan(token: Token): Span {
    return { start: token.start, end: token.end };
  }

  span(start: Token, end: Token): Span {
    return { start: start.start, end: end.end };
  }
}
