import {
  type Diagnostic,
  DiagnosticSeverity,
  type DocumentSymbol,
  type Hover,
  MarkupKind,
  type Position,
  type Range,
  SymbolKind,
} from "vscode-languageserver/node.js";
import type { TextDocument } from "vscode-languageserver-textdocument";
import type { Program, Statement } from "../ast/ast.js";
import { BUILTIN_DOCS, isBuiltinName } from "../common/builtins.js";
import {
  DiagnosticReporter,
  DiagnosticSeverity as Severity,
} from "../common/diagnostics.js";
import type { Span } from "../common/span.js";
import { tokenize } from "../lexer/lexer.js";
import { TokenType } from "../lexer/token.js";
import { parseTokens } from "../parser/parser.js";
import { typeToString } from "../parser/types.js";

export const DIAGNOSTIC_SOURCE = "noteg";

const SEVERITIES: Record<Severity, DiagnosticSeverity> = {
  [Severity.Error]: DiagnosticSeverity.Error,
  [Severity.Warning]: DiagnosticSeverity.Warning,
  [Severity.Info]: DiagnosticSeverity.Information,
  [Severity.Hint]: DiagnosticSeverity.Hint,
};

// Positions here are 1-based, LSP positions are 0-based.
export function toRange(span: Span): Range {
  return {
    start: { line: span.start.line - 1, character: span.start.column - 1 },
    end: { line: span.end.line - 1, character: span.end.column - 1 },
  };
}

function parseDocument(text: string) {
  const reporter = new DiagnosticReporter();
  const program = parseTokens(tokenize(text), reporter);
  return { program, reporter };
}

export function computeDiagnostics(document: TextDocument): Diagnostic[] {
  const { reporter } = parseDocument(document.getText());

  return reporter.getDiagnostics().map((d) => ({
    severity: SEVERITIES[d.severity],
    range: d.span
      ? toRange(d.span)
      : { start: { line: 0, character: 0 }, end: { line: 0, character: 1 } },
    message: d.message,
    source: DIAGNOSTIC_SOURCE,
  }));
}

function unwrapExport(stmt: Statement): Statement {
  return stmt.kind === "ExportDecl" ? stmt.declaration : stmt;
}

function symbolFor(stmt: Statement): DocumentSymbol | undefined {
  const decl = unwrapExport(stmt);
  const range = toRange(stmt.span);

  switch (decl.kind) {
    case "LetDecl": {
      const isFunction = decl.initializer.kind === "LambdaExpr";
      return {
        name: decl.name,
        kind: isFunction
          ? SymbolKind.Function
          : decl.constant
            ? SymbolKind.Constant
            : SymbolKind.Variable,
        range,
        selectionRange: range,
      };
    }
    case "TypeDecl":
      return {
        name: decl.name,
        detail: typeToString(decl.type),
        kind: SymbolKind.Interface,
        range,
        selectionRange: range,
      };
    case "ModuleDecl":
      return {
        name: decl.name,
        kind: SymbolKind.Module,
        range,
        selectionRange: range,
        children: symbolsOf(decl.body),
      };
    default:
      return undefined;
  }
}

function symbolsOf(statements: Statement[]): DocumentSymbol[] {
  const symbols: DocumentSymbol[] = [];
  for (const stmt of statements) {
    const symbol = symbolFor(stmt);
    if (symbol) symbols.push(symbol);
  }
  return symbols;
}

/** Top-level bindings, functions, types and modules; a file with errors still yields what parsed. */
export function documentSymbols(document: TextDocument): DocumentSymbol[] {
  return symbolsOf(parseDocument(document.getText()).program.statements);
}

function describeBinding(program: Program, name: string): string | undefined {
  let found: string | undefined;
  for (const stmt of program.statements) {
    const decl = unwrapExport(stmt);
    if (decl.kind === "LetDecl" && decl.name === name) {
      const init = decl.initializer;
      found =
        init.kind === "LambdaExpr"
          ? `fn ${name}(${init.params.join(", ")})`
          : `${decl.constant ? "const" : "let"} ${name}`;
    } else if (decl.kind === "TypeDecl" && decl.name === name) {
      found = `type ${name} = ${typeToString(decl.type)}`;
    } else if (decl.kind === "ModuleDecl" && decl.name === name) {
      found = `module ${name}`;
    }
  }
  return found;
}

function codeBlock(code: string): string {
  return ["```noteg", code, "```"].join("\n");
}

/** Hover for the identifier under the cursor: top-level bindings first, then builtins. */
export function hover(document: TextDocument, position: Position): Hover | null {
  const text = document.getText();
  const offset = document.offsetAt(position);
  const token = tokenize(text).find(
    (t) =>
      (t.type === TokenType.Identifier || t.type === TokenType.Type) &&
      t.start.offset <= offset &&
      offset < t.end.offset
  );
  if (!token) return null;

  const range = toRange(token);
  const binding = describeBinding(parseDocument(text).program, token.lexeme);
  if (binding) {
    return {
      contents: { kind: MarkupKind.Markdown, value: codeBlock(binding) },
      range,
    };
  }

  if (isBuiltinName(token.lexeme)) {
    const { signature, doc } = BUILTIN_DOCS[token.lexeme];
    return {
      contents: {
        kind: MarkupKind.Markdown,
        value: `${codeBlock(signature)}\n\n${doc}`,
      },
      range,
    };
  }

  return null;
}
