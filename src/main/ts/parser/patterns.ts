import type { Pattern } from "../ast/ast.js";
import { TokenType } from "../lexer/token.js";
import type { ParserState } from "./state.js";

/** Parses the patterns of `match` arms. */
export class PatternParser {
  constructor(private readonly state: ParserState) {}

  parsePattern(): Pattern {
    return this.state.nested(() => this.pattern());
  }

  private pattern(): Pattern {
    const token = this.state.peek();

    switch (token.type) {
      case TokenType.Identifier:
        this.state.advance();
        if (token.lexeme === "_") {
          return { kind: "WildcardPattern", span: this.state.tokenSpan(token) };
        }
        return {
          kind: "BindPattern",
          name: token.lexeme,
          span: this.state.tokenSpan(token),
        };
      case TokenType.Number:
      case TokenType.String:
      case TokenType.True:
      case TokenType.False:
      case TokenType.Null:
        this.state.advance();
        return {
          kind: "LiteralPattern",
          value: token.value ?? null,
          span: this.state.tokenSpan(token),
        };
      case TokenType.Minus: {
        this.state.advance();
        const number = this.state.consume(
          TokenType.Number,
          "Expect number after '-' in pattern."
        );
        return {
          kind: "LiteralPattern",
          value: -Number(number.value),
          span: this.state.span(token, number),
        };
      }
      case TokenType.OpenBracket:
        this.state.advance();
        return this.arrayPattern();
      case TokenType.OpenBrace:
        this.state.advance();
        return this.recordPattern();
      default:
        throw this.state.unexpected("Expect pattern.");
    }
  }

  private arrayPattern(): Pattern {
    const open = this.state.previous();
    const elements: Pattern[] = [];
    this.state.skipNewlines();
    while (!this.state.check(TokenType.CloseBracket)) {
      elements.push(this.parsePattern());
      this.state.skipNewlines();
      if (!this.state.match(TokenType.Comma)) break;
      this.state.skipNewlines();
    }
    const close = this.state.consume(
      TokenType.CloseBracket,
      "Expect ']' after array pattern."
    );
    return { kind: "ArrayPattern", elements, span: this.state.span(open, close) };
  }

  private recordPattern(): Pattern {
    const open = this.state.previous();
    const fields: { name: string; pattern: Pattern }[] = [];
    this.state.skipNewlines();
    while (!this.state.check(TokenType.CloseBrace)) {
      const name = this.state.consume(
        TokenType.Identifier,
        "Expect field name in record pattern."
      );
      // `{ title }` is shorthand for `{ title: title }`
      const pattern: Pattern = this.state.match(TokenType.Colon)
        ? this.parsePattern()
        : { kind: "BindPattern", name: name.lexeme, span: this.state.tokenSpan(name) };
      fields.push({ name: name.lexeme, pattern });
      this.state.skipNewlines();
      if (!this.state.match(TokenType.Comma)) break;
      this.state.skipNewlines();
    }
    const close = this.state.consume(
      TokenType.CloseBrace,
      "Expect '}' after record pattern."
    );
    return { kind: "RecordPattern", fields, span: this.state.span(open, close) };
  }
}
