export type * from "./ast/ast.js";
export type { Position, Span } from "./common/span.js";
export {
  type Diagnostic,
  DiagnosticReporter,
  DiagnosticSeverity,
  type ErrorRecord,
} from "./common/diagnostics.js";
export { formatDiagnostic, formatDiagnostics } from "./common/pretty.js";
export { err, ok, type Result } from "./common/result.js";
export { BUILTIN_DOCS, BUILTIN_NAMES } from "./common/builtins.js";
export { tokenize } from "./lexer/lexer.js";
export { type Token, TokenType } from "./lexer/token.js";
export { parse, parseTokens, type ParseResult } from "./parser/parser.js";
export { ParseError } from "./parser/state.js";
export { desugar } from "./parser/desugar.js";
export { interpret, type InterpretOptions } from "./interpreter/interpreter.js";
export { createGlobals } from "./interpreter/builtins.js";
export { Environment } from "./interpreter/environment.js";
export { RuntimeError } from "./interpreter/errors.js";
export { show, type Value } from "./interpreter/values.js";
export { compile } from "./compiler/compile.js";
export {
  type CompileOptions,
  type EmissionProfile,
  resolveCompileOptions,
} from "./compiler/options.js";
export { NAME, VERSION } from "./version.js";
