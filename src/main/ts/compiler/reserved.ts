const PREFIX = "$";

// ECMAScript reserved words (strict mode and modules included) that are not
// already keywords here, globals that cannot be redeclared, and the globals
// the runtime preamble reads.
const JS_RESERVED = new Set<string>([
  "await",
  "break",
  "case",
  "catch",
  "class",
  "continue",
  "debugger",
  "default",
  "delete",
  "do",
  "enum",
  "extends",
  "finally",
  "for",
  "function",
  "implements",
  "in",
  "instanceof",
  "interface",
  "new",
  "package",
  "private",
  "protected",
  "public",
  "return",
  "static",
  "super",
  "switch",
  "this",
  "throw",
  "try",
  "typeof",
  "var",
  "void",
  "while",
  "yield",
  "arguments",
  "eval",
  "undefined",
  "NaN",
  "Infinity",
  "globalThis",
  "console",
  "Array",
  "Error",
  "JSON",
  "Number",
  "Object",
  "String",
]);

export function isReserved(name: string): boolean {
  return JS_RESERVED.has(name);
}

export function isSafeIdentifier(name: string): boolean {
  return /^[A-Za-z_$][A-Za-z0-9_$]*$/.test(name);
}

export function escapeIdentifier(name: string): string {
  return isReserved(name) ? `${PREFIX}${name}` : name;
}

// A literal `__proto__` key sets the prototype instead of adding a field.
const PROTO = "__proto__";

/**
 * Record keys keep their source spelling, reserved words included, so the
 * compiled record has the same field names as the interpreted one.
 */
export function emitPropertyName(name: string): string {
  if (name === PROTO) return `[${JSON.stringify(name)}]`;
  return isSafeIdentifier(name) ? name : JSON.stringify(name);
}

export function emitMemberAccess(name: string): string {
  return isSafeIdentifier(name) ? `.${name}` : `[${JSON.stringify(name)}]`;
}
