import type {
  CoreProgram,
  Declaration,
  ImportDecl,
  LetDecl,
  ModuleDecl,
  Program,
  Statement,
  TypeDecl,
} from "../ast/ast.js";
import { DiagnosticReporter } from "../common/diagnostics.js";
import { err, ok, type Result } from "../common/result.js";
import { tokenize } from "../lexer/lexer.js";
import { type Token, TokenType } from "../lexer/token.js";
import { desugar } from "./desugar.js";
import { ExpressionParser } from "./expressions.js";
import { ParseError, ParserState } from "./state.js";
import { TypeParser } from "./types.js";

export type ParseResult = Result<CoreProgram, ParseError[]>;

export class Parser {
  private readonly state: ParserState;
  private readonly typeParser: TypeParser;
  private readonly expressionParser: ExpressionParser;

  constructor(tokens: Token[], reporter: DiagnosticReporter) {
    this.state = new ParserState(tokens, reporter);
    this.typeParser = new TypeParser(this.state);
    this.expressionParser = new ExpressionParser(this.state, () =>
      this.statement()
    );
  }

  /**
   * Parses every statement it can. A failing statement is reported, its
   * offending token skipped, and parsing resumes from the next token.
   */
  parse(): Program {
    const statements: Statement[] = [];
    const startToken = this.state.peek();

    while (true) {
      this.skipSeparators();
      if (this.state.isAtEnd()) break;
      try {
        statements.push(this.statement());
      } catch (e) {
        if (!(e instanceof ParseError)) throw e;
        this.state.advance();
      }
    }

    return {
      kind: "Program",
      statements,
      span: this.state.span(startToken, this.state.peek()),
    };
  }

  private statement(): Statement {
    const token = this.state.peek();
    const next = this.state.tokens[this.state.current + 1];

    switch (token.type) {
      case TokenType.Let:
      case TokenType.Const:
        this.state.advance();
        return this.binding(token);
      case TokenType.Fn:
        if (next?.type === TokenType.Identifier) {
          this.state.advance();
          return this.functionDeclaration(token);
        }
        break;
      case TokenType.Type:
        if (next?.type === TokenType.Identifier) {
          this.state.advance();
          return this.typeDeclaration(token);
        }
        break;
      case TokenType.Module:
        this.state.advance();
        return this.moduleDeclaration(token);
      case TokenType.Import:
        this.state.advance();
        return this.importDeclaration(token);
      case TokenType.Export:
        this.state.advance();
        return this.exportDeclaration(token);
    }

    return this.expressionStatement();
  }

  private binding(keyword: Token): LetDecl {
    const name = this.state.consume(
      TokenType.Identifier,
      `Expect identifier after '${keyword.lexeme}'.`
    );
    this.state.consume(TokenType.Equal, "Expect '=' after binding name.");
    this.state.skipNewlines();
    const initializer = this.expressionParser.parseExpression();

    return {
      kind: "LetDecl",
      constant: keyword.type === TokenType.Const,
      name: name.lexeme,
      initializer,
      span: { start: keyword.start, end: initializer.span.end },
    };
  }

  /** `fn name(params) body` binds a lambda to `name`. */
  private functionDeclaration(keyword: Token): LetDecl {
    const name = this.state.consume(
      TokenType.Identifier,
      "Expect function name."
    ).lexeme;
    const initializer = this.expressionParser.parseLambda(keyword, name);

    return {
      kind: "LetDecl",
      constant: false,
      name,
      initializer,
      span: initializer.span,
    };
  }

  private typeDeclaration(keyword: Token): TypeDecl {
    const name = this.state.consume(
      TokenType.Identifier,
      "Expect type name."
    ).lexeme;
    this.state.consume(TokenType.Equal, "Expect '=' after type name.");
    this.state.skipNewlines();
    const type = this.typeParser.parseType();

    return {
      kind: "TypeDecl",
      name,
      type,
      span: { start: keyword.start, end: type.span.end },
    };
  }

  private moduleDeclaration(keyword: Token): ModuleDecl {
    const name = this.state.consume(
      TokenType.Identifier,
      "Expect module name."
    ).lexeme;
    this.state.skipNewlines();
    const open = this.state.consume(
      TokenType.OpenBrace,
      "Expect '{' before module body."
    );
    const block = this.expressionParser.parseBlockExpr(open);

    return {
      kind: "ModuleDecl",
      name,
      body: block.statements,
      span: { start: keyword.start, end: block.span.end },
    };
  }

  private importDeclaration(keyword: Token): ImportDecl {
    if (this.state.match(TokenType.String)) {
      const path = this.state.previous();
      return {
        kind: "ImportDecl",
        path: String(path.value),
        span: this.state.span(keyword, path),
      };
    }

    const segments = [
      this.state.consume(TokenType.Identifier, "Expect import path.").lexeme,
    ];
    while (this.state.match(TokenType.Dot)) {
      segments.push(
        this.state.consume(TokenType.Identifier, "Expect import path segment.")
          .lexeme
      );
    }

    return {
      kind: "ImportDecl",
      path: segments.join("."),
      span: this.state.span(keyword, this.state.previous()),
    };
  }

  private exportDeclaration(keyword: Token): Statement {
    const inner = this.state.peek();
    let declaration: Declaration;

    switch (inner.type) {
      case TokenType.Let:
      case TokenType.Const:
        this.state.advance();
        declaration = this.binding(inner);
        break;
      case TokenType.Fn:
        this.state.advance();
        declaration = this.functionDeclaration(inner);
        break;
      case TokenType.Type:
        this.state.advance();
        declaration = this.typeDeclaration(inner);
        break;
      case TokenType.Module:
        this.state.advance();
        declaration = this.moduleDeclaration(inner);
        break;
      default:
        throw this.state.unexpected("Expect declaration after 'export'.");
    }

    return {
      kind: "ExportDecl",
      declaration,
      span: { start: keyword.start, end: declaration.span.end },
    };
  }

  private expressionStatement(): Statement {
    const expression = this.expressionParser.parseExpression();
    return {
      kind: "ExpressionStmt",
      expression,
      span: expression.span,
    };
  }

  private skipSeparators() {
    while (this.state.match(TokenType.Newline, TokenType.Semicolon));
  }
}

/** Parses a token stream without desugaring; errors go to `reporter`. */
export function parseTokens(
  tokens: Token[],
  reporter: DiagnosticReporter
): Program {
  return new Parser(tokens, reporter).parse();
}

/**
 * Parses `source` into a desugared program, or every parse error found in
 * one pass.
 */
export function parse(source: string): ParseResult {
  const reporter = new DiagnosticReporter();
  const program = parseTokens(tokenize(source), reporter);

  if (reporter.hasErrors()) {
    return err(
      reporter
        .getDiagnostics()
        .map(
          (d) =>
            new ParseError(
              d.message,
              d.span?.start ?? program.span.start
            )
        )
    );
  }

  return ok(desugar(program));
}
