import type { Position } from "../common/span.js";
import { KEYWORDS, type LiteralValue, type Token, TokenType } from "./token.js";

/** An open `{{ ... }}` region; `inString` marks interpolation inside a literal. */
interface TemplateFrame {
  inString: boolean;
  braces: number;
}

const ESCAPES: Readonly<Record<string, string>> = {
  n: "\n",
  t: "\t",
  "\\": "\\",
  '"': '"',
};

export class Lexer {
  private readonly source: string;
  private tokens: Token[] = [];
  private frames: TemplateFrame[] = [];
  private start: Position = { line: 1, column: 1, offset: 0 };
  private current = 0;
  private line = 1;
  private column = 1;

  constructor(source: string) {
    this.source = source;
  }

  scanTokens(): Token[] {
    while (!this.isAtEnd()) {
      this.start = this.position();
      this.scanToken();
    }

    const end = this.position();
    this.tokens.push({ type: TokenType.EOF, lexeme: "", start: end, end });
    return this.tokens;
  }

  private scanToken() {
    const c = this.advance();
    switch (c) {
      case "(":
        this.addToken(TokenType.OpenParen);
        break;
      case ")":
        this.addToken(TokenType.CloseParen);
        break;
      case "[":
        this.addToken(TokenType.OpenBracket);
        break;
      case "]":
        this.addToken(TokenType.CloseBracket);
        break;
      case "{":
        this.openBrace();
        break;
      case "}":
        this.closeBrace();
        break;
      case ",":
        this.addToken(TokenType.Comma);
        break;
      case ".":
        this.addToken(TokenType.Dot);
        break;
      case ":":
        this.addToken(TokenType.Colon);
        break;
      case ";":
        this.addToken(TokenType.Semicolon);
        break;
      case "+":
        this.addToken(TokenType.Plus);
        break;
      case "-":
        this.addToken(this.match(">") ? TokenType.ThinArrow : TokenType.Minus);
        break;
      case "*":
        this.addToken(TokenType.Star);
        break;
      case "%":
        this.addToken(TokenType.Percent);
        break;
      case "/":
        if (this.match("/")) {
          while (this.peek() !== "\n" && !this.isAtEnd()) this.advance();
        } else {
          this.addToken(TokenType.Slash);
        }
        break;
      case "!":
        this.addToken(this.match("=") ? TokenType.BangEqual : TokenType.Bang);
        break;
      case "=":
        if (this.match("=")) {
          this.addToken(TokenType.EqualEqual);
        } else if (this.match(">")) {
          this.addToken(TokenType.Arrow);
        } else {
          this.addToken(TokenType.Equal);
        }
        break;
      case "<":
        this.addToken(this.match("=") ? TokenType.LessEqual : TokenType.Less);
        break;
      case ">":
        this.addToken(
          this.match("=") ? TokenType.GreaterEqual : TokenType.Greater
        );
        break;
      case "&":
        if (this.match("&")) {
          this.addToken(TokenType.AmpersandAmpersand);
        } else {
          this.error(`Unexpected character: ${c}`);
        }
        break;
      case "|":
        if (this.match("|")) {
          this.addToken(TokenType.PipePipe);
        } else if (this.match(">")) {
          this.addToken(TokenType.PipeGreater);
        } else {
          this.error(`Unexpected character: ${c}`);
        }
        break;
      case " ":
      case "\r":
      case "\t":
        break;
      case "\n":
        this.addToken(TokenType.Newline);
        break;
      case '"':
        this.string(false);
        break;
      default:
        if (this.isDigit(c)) {
          this.number();
        } else if (this.isAlpha(c)) {
          this.identifier();
        } else {
          this.error(`Unexpected character: ${c}`);
        }
        break;
    }
  }

  private openBrace() {
    if (this.match("{")) {
      this.addToken(TokenType.TemplateOpen);
      this.frames.push({ inString: false, braces: 0 });
      return;
    }
    const frame = this.currentFrame();
    if (frame) frame.braces++;
    this.addToken(TokenType.OpenBrace);
  }

  private closeBrace() {
    const frame = this.currentFrame();
    if (frame && frame.braces === 0 && this.match("}")) {
      this.addToken(TokenType.TemplateClose);
      this.frames.pop();
      if (frame.inString) {
        this.start = this.position();
        this.string(true);
      }
      return;
    }
    if (frame && frame.braces > 0) frame.braces--;
    this.addToken(TokenType.CloseBrace);
  }

  /**
   * Scans string text up to the closing quote or the next `{{`.
   * `continuation` is set when resuming after an interpolation's `}}`.
   */
  private string(continuation: boolean) {
    let value = "";
    let invalidEscape: string | undefined;

    while (true) {
      if (this.isAtEnd() || this.peek() === "\n") {
        this.error("Unterminated string.");
        return;
      }

      const c = this.peek();
      if (c === '"') {
        this.advance();
        this.finishString(
          continuation ? TokenType.TemplateTail : TokenType.String,
          value,
          invalidEscape
        );
        return;
      }

      if (c === "{" && this.peekNext() === "{") {
        this.finishString(
          continuation ? TokenType.TemplateMiddle : TokenType.TemplateHead,
          value,
          invalidEscape
        );
        this.start = this.position();
        this.advance();
        this.advance();
        this.addToken(TokenType.TemplateOpen);
        this.frames.push({ inString: true, braces: 0 });
        return;
      }

      this.advance();
      if (c !== "\\") {
        value += c;
        continue;
      }

      const escaped = this.peek();
      if (this.isAtEnd() || escaped === "\n") continue;
      this.advance();
      const replacement = ESCAPES[escaped];
      if (replacement === undefined) {
        invalidEscape ??= `\\${escaped}`;
      } else {
        value += replacement;
      }
    }
  }

  private finishString(
    type: TokenType,
    value: string,
    invalidEscape: string | undefined
  ) {
    if (invalidEscape !== undefined) {
      this.error(`Invalid escape sequence: ${invalidEscape}`);
      return;
    }
    this.addToken(type, value);
  }

  private number() {
    while (this.isDigit(this.peek())) this.advance();

    // Look for a fractional part.
    if (this.peek() === "." && this.isDigit(this.peekNext())) {
      // Consume the "."
      this.advance();

      while (this.isDigit(this.peek())) this.advance();
    }

    this.addToken(
      TokenType.Number,
      Number(this.source.substring(this.start.offset, this.current))
    );
  }

  private identifier() {
    while (this.isAlphaNumeric(this.peek())) this.advance();

    const text = this.source.substring(this.start.offset, this.current);
    const type = KEYWORDS.get(text) ?? TokenType.Identifier;
    switch (type) {
      case TokenType.True:
        this.addToken(type, true);
        break;
      case TokenType.False:
        this.addToken(type, false);
        break;
      case TokenType.Null:
        this.addToken(type, null);
        break;
      default:
        this.addToken(type);
    }
  }

  private currentFrame(): TemplateFrame | undefined {
    return this.frames[this.frames.length - 1];
  }

  private match(expected: string): boolean {
    if (this.isAtEnd()) return false;
    if (this.source.charAt(this.current) !== expected) return false;

    this.advance();
    return true;
  }

  private peek(): string {
    if (this.isAtEnd()) return "\0";
    return this.source.charAt(this.current);
  }

  private peekNext(): string {
    if (this.current + 1 >= this.source.length) return "\0";
    return this.source.charAt(this.current + 1);
  }

  private isAlpha(c: string): boolean {
    return (c >= "a" && c <= "z") || (c >= "A" && c <= "Z") || c === "_";
  }

  private isAlphaNumeric(c: string): boolean {
    return this.isAlpha(c) || this.isDigit(c);
  }

  private isDigit(c: string): boolean {
    return c >= "0" && c <= "9";
  }

  private isAtEnd(): boolean {
    return this.current >= this.source.length;
  }

  private position(): Position {
    return { line: this.line, column: this.column, offset: this.current };
  }

  private advance(): string {
    const c = this.source.charAt(this.current++);
    if (c === "\n") {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return c;
  }

  private addToken(type: TokenType, value?: LiteralValue) {
    const token: Token = {
      type,
      lexeme: this.source.substring(this.start.offset, this.current),
      start: this.start,
      end: this.position(),
    };
    if (value !== undefined) token.value = value;
    this.tokens.push(token);
  }

  private error(message: string) {
    this.tokens.push({
      type: TokenType.Error,
      lexeme: this.source.substring(this.start.offset, this.current),
      start: this.start,
      end: this.position(),
      message,
    });
  }
}

/** Scans `source` into tokens; never throws, always ends with one EOF token. */
export function tokenize(source: string): Token[] {
  return new Lexer(source).scanTokens();
}
