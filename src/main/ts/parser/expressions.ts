import type {
  BinaryOperator,
  BlockExpr,
  Expression,
  MatchArm,
  RecordField,
  Statement,
  TemplatePart,
} from "../ast/ast.js";
import { type Token, TokenType } from "../lexer/token.js";
import { PatternParser } from "./patterns.js";
import type { ParserState } from "./state.js";

/** Binding power, lowest first. Every binary level is right-associative. */
enum Precedence {
  Pipe, // |>
  Or, // ||
  And, // &&
  Equality, // == !=
  Comparison, // < > <= >=
  Term, // + -
  Factor, // * / %
  Unary, // ! -
}

type InfixEntry = [Precedence, BinaryOperator | "|>"];

const INFIX: Partial<Record<TokenType, InfixEntry>> = {
  [TokenType.PipeGreater]: [Precedence.Pipe, "|>"],
  [TokenType.PipePipe]: [Precedence.Or, "||"],
  [TokenType.AmpersandAmpersand]: [Precedence.And, "&&"],
  [TokenType.EqualEqual]: [Precedence.Equality, "=="],
  [TokenType.BangEqual]: [Precedence.Equality, "!="],
  [TokenType.Less]: [Precedence.Comparison, "<"],
  [TokenType.LessEqual]: [Precedence.Comparison, "<="],
  [TokenType.Greater]: [Precedence.Comparison, ">"],
  [TokenType.GreaterEqual]: [Precedence.Comparison, ">="],
  [TokenType.Plus]: [Precedence.Term, "+"],
  [TokenType.Minus]: [Precedence.Term, "-"],
  [TokenType.Star]: [Precedence.Factor, "*"],
  [TokenType.Slash]: [Precedence.Factor, "/"],
  [TokenType.Percent]: [Precedence.Factor, "%"],
};

export class ExpressionParser {
  private readonly patterns: PatternParser;

  constructor(
    private readonly state: ParserState,
    private readonly parseStatement: () => Statement
  ) {
    this.patterns = new PatternParser(state);
  }

  parseExpression(): Expression {
    return this.state.nested(() => this.binary(Precedence.Pipe));
  }

  /** Parses `{ stmt* }` after the opening brace has been consumed. */
  parseBlockExpr(openBrace: Token): BlockExpr {
    const statements: Statement[] = [];

    this.state.nested(() => {
      while (true) {
        this.skipSeparators();
        if (this.state.check(TokenType.CloseBrace) || this.state.isAtEnd()) {
          break;
        }
        statements.push(this.parseStatement());
      }
    });

    const endToken = this.state.consume(
      TokenType.CloseBrace,
      "Expect '}' after block."
    );

    return {
      kind: "BlockExpr",
      statements,
      span: this.state.span(openBrace, endToken),
    };
  }

  /** Parses `fn (params) body` after `fn` (and an optional name) were consumed. */
  parseLambda(start: Token, name?: string): Expression {
    this.state.consume(TokenType.OpenParen, "Expect '(' before parameters.");
    const params: string[] = [];
    this.state.skipNewlines();
    if (!this.state.check(TokenType.CloseParen)) {
      do {
        this.state.skipNewlines();
        const param = this.state.consume(
          TokenType.Identifier,
          "Expect parameter name."
        );
        if (params.includes(param.lexeme)) {
          throw this.state.error(
            param,
            `Duplicate parameter name '${param.lexeme}'.`
          );
        }
        params.push(param.lexeme);
        this.state.skipNewlines();
      } while (this.state.match(TokenType.Comma));
    }
    this.state.consume(TokenType.CloseParen, "Expect ')' after parameters.");

    let body: Expression;
    if (this.state.match(TokenType.ThinArrow, TokenType.Arrow)) {
      this.state.skipNewlines();
      body = this.parseExpression();
    } else if (this.state.match(TokenType.OpenBrace)) {
      body = this.parseBlockExpr(this.state.previous());
    } else {
      throw this.state.unexpected("Expect '->' or '{' before function body.");
    }

    return {
      kind: "LambdaExpr",
      params,
      body,
      name,
      span: { start: start.start, end: body.span.end },
    };
  }

  private binary(precedence: Precedence): Expression {
    if (precedence === Precedence.Unary) return this.unary();

    const left = this.binary(precedence + 1);

    if (
      precedence === Precedence.Pipe &&
      this.state.checkAcrossNewlines(TokenType.PipeGreater)
    ) {
      this.state.skipNewlines();
    }

    const entry = INFIX[this.state.peek().type];
    if (!entry || entry[0] !== precedence) return left;

    this.state.advance();
    this.state.skipNewlines();
    // Recursing at the same level makes the operator right-associative.
    const right = this.binary(precedence);
    const span = { start: left.span.start, end: right.span.end };

    const operator = entry[1];
    if (operator === "|>") {
      return { kind: "PipeExpr", left, right, span };
    }
    return { kind: "BinaryExpr", left, operator, right, span };
  }

  private unary(): Expression {
    if (this.state.match(TokenType.Minus, TokenType.Bang)) {
      const operator = this.state.previous();
      const operand = this.state.nested(() => this.unary());
      return {
        kind: "UnaryExpr",
        operator: operator.type === TokenType.Minus ? "-" : "!",
        operand,
        span: { start: operator.start, end: operand.span.end },
      };
    }
    return this.postfix();
  }

  private postfix(): Expression {
    let expr = this.primary();

    while (true) {
      if (this.state.match(TokenType.OpenParen)) {
        expr = this.call(expr);
      } else if (this.state.match(TokenType.Dot)) {
        const field = this.state.consume(
          TokenType.Identifier,
          "Expect field name after '.'."
        );
        expr = {
          kind: "FieldExpr",
          object: expr,
          field: field.lexeme,
          span: { start: expr.span.start, end: field.end },
        };
      } else if (this.state.match(TokenType.OpenBracket)) {
        this.state.skipNewlines();
        const index = this.parseExpression();
        this.state.skipNewlines();
        const endToken = this.state.consume(
          TokenType.CloseBracket,
          "Expect ']' after index."
        );
        expr = {
          kind: "IndexExpr",
          object: expr,
          index,
          span: { start: expr.span.start, end: endToken.end },
        };
      } else {
        return expr;
      }
    }
  }

  private call(callee: Expression): Expression {
    const args = this.delimitedList(TokenType.CloseParen, () =>
      this.parseExpression()
    );
    const endToken = this.state.consume(
      TokenType.CloseParen,
      "Expect ')' after arguments."
    );
    return {
      kind: "CallExpr",
      callee,
      args,
      span: { start: callee.span.start, end: endToken.end },
    };
  }

  private primary(): Expression {
    const token = this.state.peek();

    switch (token.type) {
      case TokenType.Number:
      case TokenType.String:
      case TokenType.True:
      case TokenType.False:
      case TokenType.Null:
        this.state.advance();
        return {
          kind: "LiteralExpr",
          value: token.value ?? null,
          span: this.state.tokenSpan(token),
        };
      case TokenType.TemplateHead:
        this.state.advance();
        return this.template(token);
      case TokenType.TemplateOpen:
        this.state.advance();
        return this.interpolation(token);
      case TokenType.Identifier:
      // `type` doubles as the name of the type-of builtin in expressions.
      case TokenType.Type:
        this.state.advance();
        return {
          kind: "IdentifierExpr",
          name: token.lexeme,
          span: this.state.tokenSpan(token),
        };
      case TokenType.OpenParen:
        this.state.advance();
        return this.grouping();
      case TokenType.OpenBracket:
        this.state.advance();
        return this.arrayLiteral(token);
      case TokenType.OpenBrace:
        this.state.advance();
        return this.isRecordAhead()
          ? this.recordLiteral(token)
          : this.parseBlockExpr(token);
      case TokenType.Fn:
        this.state.advance();
        return this.parseLambda(token);
      case TokenType.If:
        this.state.advance();
        return this.ifExpression(token);
      case TokenType.Match:
        this.state.advance();
        return this.matchExpression(token);
      default:
        throw this.state.unexpected("Expect expression.");
    }
  }

  private grouping(): Expression {
    this.state.skipNewlines();
    const expr = this.parseExpression();
    this.state.skipNewlines();
    this.state.consume(TokenType.CloseParen, "Expect ')' after expression.");
    return expr;
  }

  private arrayLiteral(openBracket: Token): Expression {
    const elements = this.delimitedList(TokenType.CloseBracket, () =>
      this.parseExpression()
    );
    const endToken = this.state.consume(
      TokenType.CloseBracket,
      "Expect ']' after array elements."
    );
    return {
      kind: "ArrayLiteralExpr",
      elements,
      span: this.state.span(openBracket, endToken),
    };
  }

  private isRecordAhead(): boolean {
    const key = this.state.peekSignificant(0).type;
    return (
      (key === TokenType.Identifier || key === TokenType.String) &&
      this.state.peekSignificant(1).type === TokenType.Colon
    );
  }

  private recordLiteral(openBrace: Token): Expression {
    const fields = this.delimitedList(
      TokenType.CloseBrace,
      (): RecordField => {
        const key = this.state.peek();
        if (!this.state.match(TokenType.Identifier, TokenType.String)) {
          throw this.state.unexpected("Expect field name.");
        }
        this.state.consume(TokenType.Colon, "Expect ':' after field name.");
        this.state.skipNewlines();
        const name =
          key.type === TokenType.String ? String(key.value) : key.lexeme;
        return { name, value: this.parseExpression() };
      }
    );
    const endToken = this.state.consume(
      TokenType.CloseBrace,
      "Expect '}' after record fields."
    );
    return {
      kind: "RecordLiteralExpr",
      fields,
      span: this.state.span(openBrace, endToken),
    };
  }

  /** Parses a string literal with `{{ ... }}` regions, starting at its head. */
  private template(head: Token): Expression {
    const parts: TemplatePart[] = [];
    let segment = head;

    while (true) {
      const text = String(segment.value ?? "");
      if (text.length > 0) parts.push({ kind: "text", value: text });
      if (segment.type === TokenType.TemplateTail) break;

      this.state.consume(TokenType.TemplateOpen, "Expect '{{' in template.");
      parts.push({ kind: "expr", expression: this.interpolated() });

      if (!this.state.match(TokenType.TemplateMiddle, TokenType.TemplateTail)) {
        throw this.state.unexpected("Expect continuation of string template.");
      }
      segment = this.state.previous();
    }

    return {
      kind: "TemplateExpr",
      parts,
      span: this.state.span(head, segment),
    };
  }

  /** Parses `{{ expr }}` outside a string literal. */
  private interpolation(open: Token): Expression {
    const expression = this.interpolated();
    return {
      kind: "TemplateExpr",
      parts: [{ kind: "expr", expression }],
      span: this.state.span(open, this.state.previous()),
    };
  }

  private interpolated(): Expression {
    this.state.skipNewlines();
    const expression = this.parseExpression();
    this.state.skipNewlines();
    this.state.consume(
      TokenType.TemplateClose,
      "Expect '}}' after interpolated expression."
    );
    return expression;
  }

  private ifExpression(ifToken: Token): Expression {
    const condition = this.parseExpression();
    this.state.skipNewlines();
    this.state.consume(TokenType.Then, "Expect 'then' after condition.");
    this.state.skipNewlines();
    const thenBranch = this.parseExpression();

    let elseBranch: Expression | undefined;
    if (this.state.checkAcrossNewlines(TokenType.Else)) {
      this.state.skipNewlines();
      this.state.advance();
      this.state.skipNewlines();
      elseBranch = this.parseExpression();
    }

    return {
      kind: "IfExpr",
      condition,
      thenBranch,
      elseBranch,
      span: {
        start: ifToken.start,
        end: (elseBranch ?? thenBranch).span.end,
      },
    };
  }

  private matchExpression(matchToken: Token): Expression {
    const subject = this.parseExpression();
    this.state.skipNewlines();
    this.state.consume(TokenType.With, "Expect 'with' after match subject.");
    this.state.skipNewlines();
    this.state.consume(TokenType.OpenBrace, "Expect '{' before match arms.");

    const arms: MatchArm[] = [];
    while (true) {
      while (this.state.match(TokenType.Newline, TokenType.Comma));
      if (this.state.check(TokenType.CloseBrace) || this.state.isAtEnd()) break;

      const pattern = this.patterns.parsePattern();
      this.state.skipNewlines();
      this.state.consume(TokenType.Arrow, "Expect '=>' after pattern.");
      this.state.skipNewlines();
      const body = this.parseExpression();
      arms.push({ pattern, body, span: { start: pattern.span.start, end: body.span.end } });
    }

    const endToken = this.state.consume(
      TokenType.CloseBrace,
      "Expect '}' after match arms."
    );

    return {
      kind: "MatchExpr",
      subject,
      arms,
      span: this.state.span(matchToken, endToken),
    };
  }

  /** Comma-separated items up to (not including) `close`; newlines and a trailing comma are allowed. */
  private delimitedList<T>(close: TokenType, item: () => T): T[] {
    const items: T[] = [];
    this.state.skipNewlines();
    while (!this.state.check(close)) {
      items.push(item());
      this.state.skipNewlines();
      if (!this.state.match(TokenType.Comma)) break;
      this.state.skipNewlines();
    }
    return items;
  }

  private skipSeparators() {
    while (this.state.match(TokenType.Newline, TokenType.Semicolon));
  }
}
