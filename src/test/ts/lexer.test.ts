import { describe, expect, it } from "vitest";
import { tokenize } from "../../main/ts/lexer/lexer.js";
import { TokenType } from "../../main/ts/lexer/token.js";

const types = (source: string) => tokenize(source).map((t) => t.type);

describe("Lexer", () => {
  it("should scan a binding with positions", () => {
    const tokens = tokenize("let x = 1");

    expect(tokens.map((t) => t.type)).toEqual([
      TokenType.Let,
      TokenType.Identifier,
      TokenType.Equal,
      TokenType.Number,
      TokenType.EOF,
    ]);
    expect(tokens[1].start).toEqual({ line: 1, column: 5, offset: 4 });
    expect(tokens[1].end).toEqual({ line: 1, column: 6, offset: 5 });
    expect(tokens[3].value).toBe(1);
    expect(tokens[4].start).toEqual({ line: 1, column: 10, offset: 9 });
  });

  it("should emit newline tokens and track lines", () => {
    const tokens = tokenize("a\n  b");

    expect(tokens.map((t) => t.type)).toEqual([
      TokenType.Identifier,
      TokenType.Newline,
      TokenType.Identifier,
      TokenType.EOF,
    ]);
    expect(tokens[2].start).toEqual({ line: 2, column: 3, offset: 4 });
  });

  it("should skip line comments", () => {
    expect(types("1 // one\n2")).toEqual([
      TokenType.Number,
      TokenType.Newline,
      TokenType.Number,
      TokenType.EOF,
    ]);
  });

  it("should scan two-character operators with one character of lookahead", () => {
    expect(types("== != <= >= && || -> => |>")).toEqual([
      TokenType.EqualEqual,
      TokenType.BangEqual,
      TokenType.LessEqual,
      TokenType.GreaterEqual,
      TokenType.AmpersandAmpersand,
      TokenType.PipePipe,
      TokenType.ThinArrow,
      TokenType.Arrow,
      TokenType.PipeGreater,
      TokenType.EOF,
    ]);
  });

  it("should scan decimals and leave a trailing dot alone", () => {
    const decimal = tokenize("3.14");
    expect(decimal[0].value).toBe(3.14);

    const field = tokenize("1.a");
    expect(field.map((t) => t.type)).toEqual([
      TokenType.Number,
      TokenType.Dot,
      TokenType.Identifier,
      TokenType.EOF,
    ]);
    expect(field[0].value).toBe(1);
  });

  it("should recognize keywords and literal words", () => {
    const tokens = tokenize("fn type match with true null value");

    expect(tokens.map((t) => t.type)).toEqual([
      TokenType.Fn,
      TokenType.Type,
      TokenType.Match,
      TokenType.With,
      TokenType.True,
      TokenType.Null,
      TokenType.Identifier,
      TokenType.EOF,
    ]);
    expect(tokens[4].value).toBe(true);
    expect(tokens[5].value).toBe(null);
  });

  it("should substitute escapes in strings", () => {
    const [token] = tokenize('"ab\\ncd\\t\\"q\\"\\\\"');

    expect(token.type).toBe(TokenType.String);
    expect(token.value).toBe('ab\ncd\t"q"\\');
  });

  it("should turn a string with an unknown escape into one error token", () => {
    const tokens = tokenize('"a\\qb" 1');

    expect(tokens[0]).toMatchObject({
      type: TokenType.Error,
      lexeme: '"a\\qb"',
      message: "Invalid escape sequence: \\q",
    });
    expect(tokens[1].type).toBe(TokenType.Number);
  });

  it("should report an unterminated string and resume at the newline", () => {
    const tokens = tokenize('"abc\nx');

    expect(tokens.map((t) => t.type)).toEqual([
      TokenType.Error,
      TokenType.Newline,
      TokenType.Identifier,
      TokenType.EOF,
    ]);
    expect(tokens[0].lexeme).toBe('"abc');
    expect(tokens[0].message).toBe("Unterminated string.");
  });

  it("should report lone ampersands and bars", () => {
    const tokens = tokenize("a & b | c");

    expect(tokens.map((t) => t.type)).toEqual([
      TokenType.Identifier,
      TokenType.Error,
      TokenType.Identifier,
      TokenType.Error,
      TokenType.Identifier,
      TokenType.EOF,
    ]);
    expect(tokens[1].message).toBe("Unexpected character: &");
    expect(tokens[3].message).toBe("Unexpected character: |");
  });

  it("should split an interpolated string into template parts", () => {
    const tokens = tokenize('"Hi {{ name }}!"');

    expect(tokens.map((t) => t.type)).toEqual([
      TokenType.TemplateHead,
      TokenType.TemplateOpen,
      TokenType.Identifier,
      TokenType.TemplateClose,
      TokenType.TemplateTail,
      TokenType.EOF,
    ]);
    expect(tokens[0]).toMatchObject({ lexeme: '"Hi ', value: "Hi " });
    expect(tokens[4]).toMatchObject({ lexeme: '!"', value: "!" });
  });

  it("should keep record braces inside an interpolation distinct from its delimiters", () => {
    expect(types('"{{ { a: 1 }.a }} and {{ b }}"')).toEqual([
      TokenType.TemplateHead,
      TokenType.TemplateOpen,
      TokenType.OpenBrace,
      TokenType.Identifier,
      TokenType.Colon,
      TokenType.Number,
      TokenType.CloseBrace,
      TokenType.Dot,
      TokenType.Identifier,
      TokenType.TemplateClose,
      TokenType.TemplateMiddle,
      TokenType.TemplateOpen,
      TokenType.Identifier,
      TokenType.TemplateClose,
      TokenType.TemplateTail,
      TokenType.EOF,
    ]);
  });

  it("should scan interpolation delimiters outside strings", () => {
    expect(types("{{ 2 + 2 }}")).toEqual([
      TokenType.TemplateOpen,
      TokenType.Number,
      TokenType.Plus,
      TokenType.Number,
      TokenType.TemplateClose,
      TokenType.EOF,
    ]);
  });

  it("should treat a closing pair outside any interpolation as two braces", () => {
    expect(types("{ { 1 } }}")).toEqual([
      TokenType.OpenBrace,
      TokenType.OpenBrace,
      TokenType.Number,
      TokenType.CloseBrace,
      TokenType.CloseBrace,
      TokenType.CloseBrace,
      TokenType.EOF,
    ]);
  });

  it("should keep offsets increasing and every token well formed", () => {
    const source =
      'let t = "x {{ a & b }} y"\n"open\nfn f(a) -> a |> g() // done\n@';
    const tokens = tokenize(source);

    for (let i = 0; i < tokens.length; i++) {
      const token = tokens[i];
      expect(token.end.offset).toBeGreaterThanOrEqual(token.start.offset);
      expect(token.lexeme).toBe(
        source.slice(token.start.offset, token.end.offset)
      );
      if (i > 0) {
        expect(token.start.offset).toBeGreaterThanOrEqual(
          tokens[i - 1].end.offset
        );
      }
    }
    expect(tokens.filter((t) => t.type === TokenType.EOF)).toHaveLength(1);
    expect(tokens[tokens.length - 1].type).toBe(TokenType.EOF);
  });
});
