import { err, ok, type Result } from "../common/result.js";
import { parse } from "../parser/parser.js";
import { emitJavaScript } from "./emit_js.js";
import { type CompileOptions, resolveCompileOptions } from "./options.js";

/**
 * Lowers `source` to JavaScript. A program with parse errors is never
 * partially emitted: the error lists every message as `line:column: message`.
 */
export function compile(
  source: string,
  options: CompileOptions = {}
): Result<string, string> {
  const resolved = resolveCompileOptions(options);
  if (!resolved.ok) return resolved;

  const parsed = parse(source);
  if (!parsed.ok) {
    return err(
      parsed.error
        .map((e) => `${e.position.line}:${e.position.column}: ${e.message}`)
        .join("\n")
    );
  }

  return ok(emitJavaScript(parsed.value, resolved.value));
}
