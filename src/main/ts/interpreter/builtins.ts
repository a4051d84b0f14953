import type { BuiltinName } from "../common/builtins.js";
import { Environment } from "./environment.js";
import { RuntimeError } from "./errors.js";
import {
  type BuiltinValue,
  NULL,
  num,
  show,
  str,
  typeName,
  type Value,
} from "./values.js";

export type PrintSink = (text: string) => void;

function expectArity(name: string, args: Value[], count: number) {
  if (args.length !== count) {
    throw new RuntimeError(
      `${name} expects ${count} argument${count === 1 ? "" : "s"} but got ${args.length}`
    );
  }
}

function builtin(name: BuiltinName, call: (args: Value[]) => Value): BuiltinValue {
  return { kind: "builtin", name, call };
}

function length(args: Value[]): Value {
  expectArity("len", args, 1);
  const [value] = args;
  switch (value.kind) {
    case "string":
      return num(value.value.length);
    case "array":
      return num(value.elements.length);
    case "record":
      return num(value.fields.size);
    default:
      throw new RuntimeError(`len: cannot take length of ${typeName(value)}`);
  }
}

function toNumber(args: Value[]): Value {
  expectArity("num", args, 1);
  const [value] = args;
  if (value.kind === "number") return value;
  if (value.kind === "string") {
    const text = value.value.trim();
    const parsed = Number(text);
    if (text === "" || Number.isNaN(parsed)) {
      throw new RuntimeError(
        `num: cannot convert ${JSON.stringify(value.value)} to number`
      );
    }
    return num(parsed);
  }
  throw new RuntimeError(`num: cannot convert ${typeName(value)} to number`);
}

/**
 * Builds a fresh global scope. Nothing is shared between calls, so two
 * interpreters never observe each other's globals.
 */
export function createGlobals(print: PrintSink = console.log): Environment {
  const globals = new Environment();
  const builtins = [
    builtin("print", (args) => {
      print(args.map(show).join(" "));
      return NULL;
    }),
    builtin("len", length),
    builtin("str", (args) => {
      expectArity("str", args, 1);
      return str(show(args[0]));
    }),
    builtin("num", toNumber),
    builtin("type", (args) => {
      expectArity("type", args, 1);
      return str(typeName(args[0]));
    }),
  ];
  for (const b of builtins) globals.define(b.name, b);
  return globals;
}
