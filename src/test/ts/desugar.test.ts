import { describe, expect, it } from "vitest";
import type { CoreExpression } from "../../main/ts/ast/ast.js";
import { parse } from "../../main/ts/parser/parser.js";

function expressionOf(source: string): CoreExpression {
  const result = parse(source);
  if (!result.ok) throw new Error(result.error[0].message);
  const stmt = result.value.statements[0];
  if (stmt.kind !== "ExpressionStmt") throw new Error("not an expression");
  return stmt.expression;
}

function containsPipe(value: unknown): boolean {
  if (Array.isArray(value)) return value.some(containsPipe);
  if (typeof value !== "object" || value === null) return false;
  if ("kind" in value && value.kind === "PipeExpr") return true;
  return Object.values(value).some(containsPipe);
}

describe("Pipe desugaring", () => {
  it("should prepend the piped value to a call's arguments", () => {
    expect(expressionOf("x |> f(1, 2)")).toMatchObject({
      kind: "CallExpr",
      callee: { name: "f" },
      args: [{ name: "x" }, { value: 1 }, { value: 2 }],
    });
  });

  it("should call any other right-hand side with the piped value", () => {
    expect(expressionOf("x |> g")).toMatchObject({
      kind: "CallExpr",
      callee: { kind: "IdentifierExpr", name: "g" },
      args: [{ name: "x" }],
    });
  });

  it("should resolve chained pipes from the right", () => {
    // a |> (f() |> g())  ==>  a |> g(f())  ==>  g(a, f())
    expect(expressionOf("a |> f() |> g()")).toMatchObject({
      kind: "CallExpr",
      callee: { name: "g" },
      args: [
        { kind: "IdentifierExpr", name: "a" },
        { kind: "CallExpr", callee: { name: "f" }, args: [] },
      ],
    });
  });

  it("should leave no pipe anywhere in the core program", () => {
    const result = parse(
      [
        "let up = fn(s) -> s |> trim()",
        "module m { export let v = [1 |> inc(), { k: 2 |> inc }] }",
        'if a |> ok() then "{{ b |> show() }}" else { c |> done() }',
      ].join("\n")
    );

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.desugared).toBe(true);
      expect(containsPipe(result.value.statements)).toBe(false);
    }
  });
});
