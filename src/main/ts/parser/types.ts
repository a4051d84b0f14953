import type { TypeNode } from "../ast/ast.js";
import { TokenType } from "../lexer/token.js";
import type { ParserState } from "./state.js";

export class TypeParser {
  constructor(private readonly state: ParserState) {}

  parseType(): TypeNode {
    return this.state.nested(() => this.type());
  }

  private type(): TypeNode {
    const start = this.state.peek();

    if (this.state.match(TokenType.OpenBracket)) {
      const elementType = this.parseType();
      const endToken = this.state.consume(
        TokenType.CloseBracket,
        "Expect ']' after array element type."
      );
      return {
        kind: "ArrayType",
        elementType,
        span: this.state.span(start, endToken),
      };
    }

    if (this.state.match(TokenType.OpenBrace)) {
      const fields: { name: string; type: TypeNode }[] = [];
      this.state.skipNewlines();
      while (!this.state.check(TokenType.CloseBrace)) {
        const name = this.state.consume(
          TokenType.Identifier,
          "Expect field name."
        ).lexeme;
        this.state.consume(TokenType.Colon, "Expect ':' after field name.");
        fields.push({ name, type: this.parseType() });
        this.state.skipNewlines();
        if (!this.state.match(TokenType.Comma)) break;
        this.state.skipNewlines();
      }
      const endToken = this.state.consume(
        TokenType.CloseBrace,
        "Expect '}' after record type."
      );
      return {
        kind: "RecordType",
        fields,
        span: this.state.span(start, endToken),
      };
    }

    if (this.state.match(TokenType.Fn)) {
      this.state.consume(TokenType.OpenParen, "Expect '(' after 'fn'.");
      const params: TypeNode[] = [];
      if (!this.state.check(TokenType.CloseParen)) {
        do {
          params.push(this.parseType());
        } while (this.state.match(TokenType.Comma));
      }
      this.state.consume(
        TokenType.CloseParen,
        "Expect ')' after parameter types."
      );
      this.state.consume(TokenType.ThinArrow, "Expect '->' before result type.");
      const result = this.parseType();
      return {
        kind: "FunctionType",
        params,
        result,
        span: { start: start.start, end: result.span.end },
      };
    }

    const name = this.state.consume(TokenType.Identifier, "Expect type name.");
    const args: TypeNode[] = [];
    if (this.state.match(TokenType.Less)) {
      do {
        args.push(this.parseType());
      } while (this.state.match(TokenType.Comma));
      this.state.consume(TokenType.Greater, "Expect '>' after type arguments.");
    }

    return {
      kind: "NamedType",
      name: name.lexeme,
      args,
      span: this.state.span(name, this.state.previous()),
    };
  }
}

/** Renders a type expression back to source form. */
export function typeToString(type: TypeNode): string {
  switch (type.kind) {
    case "NamedType":
      return type.args.length > 0
        ? `${type.name}<${type.args.map(typeToString).join(", ")}>`
        : type.name;
    case "ArrayType":
      return `[${typeToString(type.elementType)}]`;
    case "RecordType":
      return `{ ${type.fields
        .map((f) => `${f.name}: ${typeToString(f.type)}`)
        .join(", ")} }`;
    case "FunctionType":
      return `fn(${type.params.map(typeToString).join(", ")}) -> ${typeToString(
        type.result
      )}`;
  }
}
