/** Names every global scope starts with, in install order. */
export const BUILTIN_NAMES = ["print", "len", "str", "num", "type"] as const;

export type BuiltinName = (typeof BUILTIN_NAMES)[number];

export interface BuiltinDoc {
  signature: string;
  doc: string;
}

export const BUILTIN_DOCS: Record<BuiltinName, BuiltinDoc> = {
  print: {
    signature: "print(...values) -> null",
    doc: "Writes the display form of each value, separated by spaces.",
  },
  len: {
    signature: "len(value: string | array | record) -> number",
    doc: "Number of characters, elements or fields.",
  },
  str: {
    signature: "str(value) -> string",
    doc: "Display form of any value.",
  },
  num: {
    signature: "num(value: string | number) -> number",
    doc: "Parses a numeric string. Fails on anything that is not a number.",
  },
  type: {
    signature: "type(value) -> string",
    doc: 'One of "null", "bool", "number", "string", "array", "record" or "function".',
  },
};

export function isBuiltinName(name: string): name is BuiltinName {
  return BUILTIN_NAMES.some((builtin) => builtin === name);
}
