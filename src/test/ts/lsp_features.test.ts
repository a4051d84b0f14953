import { TextDocument } from "vscode-languageserver-textdocument";
import { describe, expect, it } from "vitest";
import {
  computeDiagnostics,
  DIAGNOSTIC_SOURCE,
  documentSymbols,
  hover,
} from "../../main/ts/lsp/features.js";

function doc(text: string): TextDocument {
  return TextDocument.create("file:///main.noteg", "noteg", 1, text);
}

// LSP protocol constants.
const ERROR_SEVERITY = 1;
const SYMBOL_KIND = {
  Module: 2,
  Interface: 11,
  Function: 12,
  Variable: 13,
  Constant: 14,
};

describe("computeDiagnostics", () => {
  it("should report parse errors with 0-based ranges", () => {
    expect(computeDiagnostics(doc("let = 1"))).toEqual([
      {
        severity: ERROR_SEVERITY,
        range: {
          start: { line: 0, character: 4 },
          end: { line: 0, character: 5 },
        },
        message: "Expect identifier after 'let'. Found '='.",
        source: DIAGNOSTIC_SOURCE,
      },
    ]);
  });

  it("should report nothing for a valid document", () => {
    expect(computeDiagnostics(doc("let x = 1\nx + 1"))).toEqual([]);
  });
});

describe("documentSymbols", () => {
  it("should list top-level declarations and module members", () => {
    const text = [
      "let count = 1",
      "const limit = 2",
      "fn add(a, b) -> a + b",
      "type Point = { x: number }",
      "export module geo {",
      "  export let unit = 1",
      "}",
      "print(count)",
    ].join("\n");

    const symbols = documentSymbols(doc(text));
    expect(symbols.map((s) => [s.name, s.kind])).toEqual([
      ["count", SYMBOL_KIND.Variable],
      ["limit", SYMBOL_KIND.Constant],
      ["add", SYMBOL_KIND.Function],
      ["Point", SYMBOL_KIND.Interface],
      ["geo", SYMBOL_KIND.Module],
    ]);
    expect(symbols[3].detail).toBe("{ x: number }");
    expect(symbols[4].children?.map((s) => s.name)).toEqual(["unit"]);
    expect(symbols[0].range).toEqual({
      start: { line: 0, character: 0 },
      end: { line: 0, character: 13 },
    });
  });
});

describe("hover", () => {
  it("should describe builtins", () => {
    expect(hover(doc("len([1])"), { line: 0, character: 1 })).toEqual({
      contents: {
        kind: "markdown",
        value:
          "```noteg\nlen(value: string | array | record) -> number\n```\n\nNumber of characters, elements or fields.",
      },
      range: {
        start: { line: 0, character: 0 },
        end: { line: 0, character: 3 },
      },
    });
  });

  it("should describe top-level bindings", () => {
    const text = "fn add(a, b) -> a + b\nlet total = add(1, 2)\ntotal";
    expect(hover(doc(text), { line: 1, character: 12 })?.contents).toEqual({
      kind: "markdown",
      value: "```noteg\nfn add(a, b)\n```",
    });
    expect(hover(doc(text), { line: 2, character: 0 })?.contents).toEqual({
      kind: "markdown",
      value: "```noteg\nlet total\n```",
    });
  });

  it("should prefer a binding over a builtin of the same name", () => {
    const text = "const len = 3\nlen";
    expect(hover(doc(text), { line: 1, character: 0 })?.contents).toEqual({
      kind: "markdown",
      value: "```noteg\nconst len\n```",
    });
  });

  it("should return null away from known names", () => {
    expect(hover(doc("let x = 1"), { line: 0, character: 8 })).toBeNull();
    expect(hover(doc("foo"), { line: 0, character: 1 })).toBeNull();
  });
});
