import { type Diagnostic, DiagnosticSeverity } from "./diagnostics.js";
import type { Span } from "./span.js";

export type FormatDiagnosticOptions = {
  contextLines?: number;
};

function computeLineStarts(src: string): number[] {
  const starts = [0];
  for (let i = 0; i < src.length; i++) {
    if (src.charCodeAt(i) === 10 /* \n */) starts.push(i + 1);
  }
  return starts;
}

function getLineText(src: string, lineStarts: number[], line: number): string {
  const idx = Math.max(1, line) - 1;
  const start = lineStarts[idx] ?? 0;
  const end = lineStarts[idx + 1] ?? src.length;
  // drop trailing newline
  const raw = src.slice(start, end);
  return raw.endsWith("\n") ? raw.slice(0, -1) : raw;
}

function padLeft(s: string, width: number): string {
  if (s.length >= width) return s;
  return " ".repeat(width - s.length) + s;
}

function caretLine(col: number, width: number, lineNoWidth: number): string {
  const safeCol = Math.max(1, col);
  const carets = "^".repeat(Math.max(1, width));
  return `${" ".repeat(lineNoWidth)} | ${" ".repeat(safeCol - 1)}${carets}`;
}

function header(
  filePath: string,
  span: Span | undefined,
  severity: string,
  message: string
) {
  if (!span) return `${filePath} ${severity}: ${message}`;
  return `${filePath}:${span.start.line}:${span.start.column} ${severity}: ${message}`;
}

/**
 * Formats a single diagnostic into a human-friendly message with a code frame.
 *
 * The caret underlines the diagnostic's span when it stays on one line.
 */
export function formatDiagnostic(
  diag: Diagnostic,
  filePath: string,
  source?: string,
  opts: FormatDiagnosticOptions = {}
): string {
  const severity = DiagnosticSeverity[diag.severity].toLowerCase();
  const h = header(filePath, diag.span, severity, diag.message);
  if (!diag.span || source === undefined) return h;

  const span = diag.span;
  const contextLines = opts.contextLines ?? 0;
  const lineStarts = computeLineStarts(source);
  const lineNo = Math.max(1, span.start.line);
  const startLine = Math.max(1, lineNo - contextLines);
  const endLine = Math.min(lineStarts.length, lineNo + contextLines);
  const lineNoWidth = String(endLine).length;
  const width =
    span.end.line === span.start.line ? span.end.column - span.start.column : 1;

  const lines: string[] = [h];
  for (let ln = startLine; ln <= endLine; ln++) {
    const txt = getLineText(source, lineStarts, ln);
    lines.push(`${padLeft(String(ln), lineNoWidth)} | ${txt}`);
    if (ln === lineNo) {
      lines.push(caretLine(span.start.column, width, lineNoWidth));
    }
  }
  return lines.join("\n");
}

export function formatDiagnostics(
  diags: readonly Diagnostic[],
  filePath: string,
  source: string,
  opts: FormatDiagnosticOptions = {}
): string {
  return diags.map((d) => formatDiagnostic(d, filePath, source, opts)).join("\n\n");
}
