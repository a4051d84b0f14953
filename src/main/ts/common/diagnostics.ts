import type { Position, Span } from "./span.js";

export enum DiagnosticSeverity {
  Error,
  Warning,
  Info,
  Hint,
}

export interface Diagnostic {
  severity: DiagnosticSeverity;
  message: string;
  span?: Span;
}

/** Error record surfaced by every stage of the toolchain. */
export interface ErrorRecord {
  message: string;
  position?: Position;
}

export class DiagnosticReporter {
  private diagnostics: Diagnostic[] = [];

  report(diagnostic: Diagnostic) {
    this.diagnostics.push(diagnostic);
  }

  hasErrors(): boolean {
    return this.diagnostics.some((d) => d.severity === DiagnosticSeverity.Error);
  }

  getDiagnostics(): Diagnostic[] {
    return this.diagnostics;
  }
}
