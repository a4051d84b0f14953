import type { CoreExpression } from "../ast/ast.js";
import type { Environment } from "./environment.js";

export type Value =
  | NullValue
  | BoolValue
  | NumberValue
  | StringValue
  | ArrayValue
  | RecordValue
  | FunctionValue
  | BuiltinValue;

export interface NullValue {
  kind: "null";
}

export interface BoolValue {
  kind: "bool";
  value: boolean;
}

export interface NumberValue {
  kind: "number";
  value: number;
}

export interface StringValue {
  kind: "string";
  value: string;
}

export interface ArrayValue {
  kind: "array";
  elements: Value[];
}

/** Field order is insertion order; lookup is by name. */
export interface RecordValue {
  kind: "record";
  fields: Map<string, Value>;
}

/** A closure: shares (does not copy) the environment it was created in. */
export interface FunctionValue {
  kind: "function";
  name?: string;
  params: string[];
  body: CoreExpression;
  closure: Environment;
}

export interface BuiltinValue {
  kind: "builtin";
  name: string;
  call: (args: Value[]) => Value;
}

export type ValueKind = Value["kind"];

export const NULL: NullValue = { kind: "null" };

export const bool = (value: boolean): BoolValue => ({ kind: "bool", value });
export const num = (value: number): NumberValue => ({ kind: "number", value });
export const str = (value: string): StringValue => ({ kind: "string", value });
export const array = (elements: Value[]): ArrayValue => ({
  kind: "array",
  elements,
});
export const record = (fields: Map<string, Value>): RecordValue => ({
  kind: "record",
  fields,
});

/** Name used by `type()` and in error messages. */
export function typeName(value: Value): string {
  return value.kind === "builtin" ? "function" : value.kind;
}

export function isPrimitive(value: Value): boolean {
  return (
    value.kind === "null" ||
    value.kind === "bool" ||
    value.kind === "number" ||
    value.kind === "string"
  );
}

/**
 * Primitives compare by value, everything else by identity; values of
 * different kinds are never equal.
 */
export function valuesEqual(a: Value, b: Value): boolean {
  switch (a.kind) {
    case "null":
      return b.kind === "null";
    case "bool":
    case "number":
    case "string":
      return b.kind === a.kind && b.value === a.value;
    default:
      return a === b;
  }
}

/** Display form used by `str`, `print` and the CLI. */
export function show(value: Value): string {
  switch (value.kind) {
    case "null":
      return "null";
    case "bool":
    case "number":
      return String(value.value);
    case "string":
      return value.value;
    case "array":
      return `[${value.elements.map(showNested).join(", ")}]`;
    case "record":
      return `{${[...value.fields]
        .map(([name, field]) => `${name}: ${showNested(field)}`)
        .join(", ")}}`;
    case "function":
      return value.name ? `<fn ${value.name}>` : "<fn>";
    case "builtin":
      return `<builtin ${value.name}>`;
  }
}

function showNested(value: Value): string {
  return value.kind === "string" ? JSON.stringify(value.value) : show(value);
}

/** Converts a runtime value to a plain JavaScript value (functions become their display form). */
export function toJS(value: Value): unknown {
  switch (value.kind) {
    case "null":
      return null;
    case "bool":
    case "number":
    case "string":
      return value.value;
    case "array":
      return value.elements.map(toJS);
    case "record":
      return Object.fromEntries(
        [...value.fields].map(([name, field]) => [name, toJS(field)])
      );
    case "function":
    case "builtin":
      return show(value);
  }
}
