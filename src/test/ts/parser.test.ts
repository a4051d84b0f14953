import { describe, expect, it } from "vitest";
import type {
  CoreExpression,
  CoreProgram,
  CoreStatement,
} from "../../main/ts/ast/ast.js";
import { DiagnosticReporter } from "../../main/ts/common/diagnostics.js";
import { tokenize } from "../../main/ts/lexer/lexer.js";
import { parse, parseTokens } from "../../main/ts/parser/parser.js";
import { typeToString } from "../../main/ts/parser/types.js";

function parseOk(source: string): CoreProgram {
  const result = parse(source);
  if (!result.ok) {
    throw new Error(result.error.map((e) => e.message).join("\n"));
  }
  return result.value;
}

function firstStatement(source: string): CoreStatement {
  return parseOk(source).statements[0];
}

function firstExpression(source: string): CoreExpression {
  const stmt = firstStatement(source);
  if (stmt.kind !== "ExpressionStmt") {
    throw new Error(`expected an expression statement, got ${stmt.kind}`);
  }
  return stmt.expression;
}

describe("Parser", () => {
  it("should parse let and const bindings", () => {
    const program = parseOk("let x = 1\nconst y = x");

    expect(program.statements).toHaveLength(2);
    expect(program.statements[0]).toMatchObject({
      kind: "LetDecl",
      constant: false,
      name: "x",
      initializer: { kind: "LiteralExpr", value: 1 },
    });
    expect(program.statements[1]).toMatchObject({
      kind: "LetDecl",
      constant: true,
      name: "y",
      initializer: { kind: "IdentifierExpr", name: "x" },
    });
  });

  it("should give multiplication precedence over addition", () => {
    expect(firstExpression("1 + 2 * 3")).toMatchObject({
      kind: "BinaryExpr",
      operator: "+",
      left: { kind: "LiteralExpr", value: 1 },
      right: {
        kind: "BinaryExpr",
        operator: "*",
        left: { value: 2 },
        right: { value: 3 },
      },
    });
  });

  it("should parse every binary level right-associatively", () => {
    expect(firstExpression("a - b - c")).toMatchObject({
      kind: "BinaryExpr",
      operator: "-",
      left: { kind: "IdentifierExpr", name: "a" },
      right: {
        kind: "BinaryExpr",
        operator: "-",
        left: { name: "b" },
        right: { name: "c" },
      },
    });
  });

  it("should bind comparison tighter than logical operators", () => {
    expect(firstExpression("a < b && c == d || e")).toMatchObject({
      operator: "||",
      left: {
        operator: "&&",
        left: { operator: "<" },
        right: { operator: "==" },
      },
      right: { name: "e" },
    });
  });

  it("should parse unary operators and postfix chains", () => {
    expect(firstExpression("-f(1).items[0]")).toMatchObject({
      kind: "UnaryExpr",
      operator: "-",
      operand: {
        kind: "IndexExpr",
        index: { value: 0 },
        object: {
          kind: "FieldExpr",
          field: "items",
          object: {
            kind: "CallExpr",
            callee: { name: "f" },
            args: [{ value: 1 }],
          },
        },
      },
    });
  });

  it("should parse a function declaration as a binding of a named lambda", () => {
    expect(firstStatement("fn add(a, b) -> a + b")).toMatchObject({
      kind: "LetDecl",
      name: "add",
      initializer: {
        kind: "LambdaExpr",
        name: "add",
        params: ["a", "b"],
        body: { kind: "BinaryExpr", operator: "+" },
      },
    });
  });

  it("should accept arrow and block lambda bodies", () => {
    expect(firstExpression("fn(x) => x")).toMatchObject({
      kind: "LambdaExpr",
      params: ["x"],
      body: { kind: "IdentifierExpr", name: "x" },
    });
    expect(firstExpression("fn() {\n  let y = 1\n  y\n}")).toMatchObject({
      kind: "LambdaExpr",
      params: [],
      body: {
        kind: "BlockExpr",
        statements: [{ kind: "LetDecl" }, { kind: "ExpressionStmt" }],
      },
    });
  });

  it("should tell records from blocks", () => {
    expect(firstExpression('{ title: "Home", "two words": 2 }')).toMatchObject({
      kind: "RecordLiteralExpr",
      fields: [{ name: "title" }, { name: "two words" }],
    });
    expect(firstExpression("{ 1 }")).toMatchObject({
      kind: "BlockExpr",
      statements: [{ kind: "ExpressionStmt" }],
    });
    expect(firstExpression("{}")).toMatchObject({
      kind: "BlockExpr",
      statements: [],
    });
  });

  it("should allow newlines inside delimiters and around branches", () => {
    const expr = firstExpression(
      "if ready\nthen [\n  1,\n  2,\n]\nelse {\n  a: 1\n}"
    );

    expect(expr).toMatchObject({
      kind: "IfExpr",
      condition: { name: "ready" },
      thenBranch: { kind: "ArrayLiteralExpr", elements: [{ value: 1 }, { value: 2 }] },
      elseBranch: { kind: "RecordLiteralExpr", fields: [{ name: "a" }] },
    });
  });

  it("should leave out the else branch when there is none", () => {
    const expr = firstExpression("if ok then 1");
    expect(expr.kind).toBe("IfExpr");
    if (expr.kind === "IfExpr") expect(expr.elseBranch).toBeUndefined();
  });

  it("should parse string templates into text and expression parts", () => {
    expect(firstExpression('"Hello, {{ name }}!"')).toMatchObject({
      kind: "TemplateExpr",
      parts: [
        { kind: "text", value: "Hello, " },
        { kind: "expr", expression: { name: "name" } },
        { kind: "text", value: "!" },
      ],
    });
    expect(firstExpression("{{ 2 + 2 }}")).toMatchObject({
      kind: "TemplateExpr",
      parts: [{ kind: "expr", expression: { operator: "+" } }],
    });
  });

  it("should parse match arms with patterns", () => {
    expect(
      firstExpression('match x with {\n  0 => "zero",\n  [a, _] => a\n  { id } => id\n}')
    ).toMatchObject({
      kind: "MatchExpr",
      subject: { name: "x" },
      arms: [
        { pattern: { kind: "LiteralPattern", value: 0 } },
        {
          pattern: {
            kind: "ArrayPattern",
            elements: [{ kind: "BindPattern", name: "a" }, { kind: "WildcardPattern" }],
          },
        },
        {
          pattern: {
            kind: "RecordPattern",
            fields: [{ name: "id", pattern: { kind: "BindPattern", name: "id" } }],
          },
        },
      ],
    });
  });

  it("should parse type, module, import and export declarations", () => {
    const program = parseOk(
      [
        "type Page = { title: string, tags: [string] }",
        "module site {",
        "  export fn slug(s) -> s",
        "  let hidden = 1",
        "}",
        "import site.layout",
        'import "./partials.noteg"',
        "export const answer = 42",
      ].join("\n")
    );
    const [typeDecl, moduleDecl, dotted, quoted, exported] = program.statements;

    expect(typeDecl.kind).toBe("TypeDecl");
    if (typeDecl.kind === "TypeDecl") {
      expect(typeToString(typeDecl.type)).toBe(
        "{ title: string, tags: [string] }"
      );
    }
    expect(moduleDecl).toMatchObject({
      kind: "ModuleDecl",
      name: "site",
      body: [
        { kind: "ExportDecl", declaration: { kind: "LetDecl", name: "slug" } },
        { kind: "LetDecl", name: "hidden" },
      ],
    });
    expect(dotted).toMatchObject({ kind: "ImportDecl", path: "site.layout" });
    expect(quoted).toMatchObject({ kind: "ImportDecl", path: "./partials.noteg" });
    expect(exported).toMatchObject({
      kind: "ExportDecl",
      declaration: { kind: "LetDecl", constant: true, name: "answer" },
    });
  });

  it("should render function and generic types", () => {
    const stmt = firstStatement("type F = fn(number, List<string>) -> bool");
    expect(stmt.kind).toBe("TypeDecl");
    if (stmt.kind === "TypeDecl") {
      expect(typeToString(stmt.type)).toBe(
        "fn(number, List<string>) -> bool"
      );
    }
  });

  it("should read the keyword type as the builtin in expressions", () => {
    expect(firstExpression("type(1)")).toMatchObject({
      kind: "CallExpr",
      callee: { kind: "IdentifierExpr", name: "type" },
    });
  });

  it("should accept semicolons between statements", () => {
    expect(parseOk("let a = 1; let b = 2; a").statements).toHaveLength(3);
  });

  it("should report the position of a parse error", () => {
    const result = parse("let = 5");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toHaveLength(1);
      expect(result.error[0].message).toBe(
        "Expect identifier after 'let'. Found '='."
      );
      expect(result.error[0].position).toEqual({
        line: 1,
        column: 5,
        offset: 4,
      });
    }
  });

  it("should recover and collect independent errors in one pass", () => {
    const result = parse("let = 1\nlet = 2\nlet ok = 3");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.map((e) => e.position.line)).toEqual([1, 2]);
    }
  });

  it("should report lexer errors with their own message", () => {
    const result = parse("let x = 1 & 2");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.map((e) => e.message)).toEqual([
        "Unexpected character: &",
      ]);
      expect(result.error[0].position.column).toBe(11);
    }
  });

  it("should report a missing operand at the end of input", () => {
    const result = parse("1 +");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error[0].message).toBe(
        "Expect expression. Found end of input."
      );
    }
  });

  it("should reject nesting past the depth limit", () => {
    const deep = "(".repeat(20000) + "1" + ")".repeat(20000);
    const result = parse(deep);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error[0].message).toBe("Expression nested too deeply.");
      expect(result.error[0].position).toEqual({
        line: 1,
        column: 129,
        offset: 128,
      });
    }
  });

  it("should accept nesting within the depth limit", () => {
    const source = "(".repeat(100) + "1" + ")".repeat(100);
    expect(firstExpression(source)).toMatchObject({
      kind: "LiteralExpr",
      value: 1,
    });
  });

  it("should limit nesting of types too", () => {
    const typeResult = parse("type T = " + "[".repeat(200) + "number" + "]".repeat(200));
    expect(typeResult.ok).toBe(false);
    if (!typeResult.ok) {
      expect(typeResult.error[0].message).toBe("Expression nested too deeply.");
    }
  });

  it("should reject duplicate parameter names", () => {
    const result = parse("fn f(a, a) -> a");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error[0].message).toBe("Duplicate parameter name 'a'.");
    }
  });

  it("should return the surface tree and report through the given reporter", () => {
    const reporter = new DiagnosticReporter();
    const program = parseTokens(tokenize("x |> f()"), reporter);

    expect(reporter.hasErrors()).toBe(false);
    expect(program.statements[0]).toMatchObject({
      kind: "ExpressionStmt",
      expression: { kind: "PipeExpr" },
    });
  });
});
