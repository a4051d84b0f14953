import { describe, expect, it } from "vitest";
import { Environment } from "../../main/ts/interpreter/environment.js";
import {
  array,
  bool,
  NULL,
  num,
  record,
  show,
  str,
  valuesEqual,
} from "../../main/ts/interpreter/values.js";

describe("Environment", () => {
  it("should read through to parent scopes", () => {
    const globals = new Environment();
    globals.define("x", num(1));
    const inner = globals.child();

    expect(inner.lookup("x")).toEqual(num(1));
    expect(inner.has("x")).toBe(true);
    expect(inner.hasOwn("x")).toBe(false);
    expect(inner.lookup("y")).toBeUndefined();
  });

  it("should shadow without touching the parent", () => {
    const globals = new Environment();
    globals.define("x", num(1));
    const inner = globals.child();
    inner.define("x", num(2));

    expect(inner.lookup("x")).toEqual(num(2));
    expect(globals.lookup("x")).toEqual(num(1));
    expect(inner.names()).toEqual(["x"]);
  });

  it("should overwrite a name defined twice in one scope", () => {
    const env = new Environment();
    env.define("x", num(1));
    env.define("x", str("one"));

    expect(env.lookup("x")).toEqual(str("one"));
    expect(env.names()).toEqual(["x"]);
  });
});

describe("values", () => {
  it("should compare primitives by value", () => {
    expect(valuesEqual(num(1), num(1))).toBe(true);
    expect(valuesEqual(str("1"), num(1))).toBe(false);
    expect(valuesEqual(NULL, NULL)).toBe(true);
    expect(valuesEqual(bool(false), NULL)).toBe(false);
  });

  it("should compare structured values by identity", () => {
    const list = array([num(1)]);
    expect(valuesEqual(list, list)).toBe(true);
    expect(valuesEqual(list, array([num(1)]))).toBe(false);
  });

  it("should quote strings only inside collections", () => {
    expect(show(str("a"))).toBe("a");
    expect(show(array([str("a"), num(2), NULL]))).toBe('["a", 2, null]');
    expect(
      show(record(new Map([["k", array([bool(true)])]])))
    ).toBe("{k: [true]}");
    expect(show(record(new Map()))).toBe("{}");
  });
});
