import type { Value } from "./values.js";

/**
 * One scope of bindings. Each call and block gets its own child; the parent
 * link is only read through.
 */
export class Environment {
  private readonly bindings = new Map<string, Value>();

  constructor(readonly parent?: Environment) {}

  /** Introduces or overwrites `name` in this scope only. */
  define(name: string, value: Value) {
    this.bindings.set(name, value);
  }

  lookup(name: string): Value | undefined {
    let env: Environment | undefined = this;
    while (env) {
      const value = env.bindings.get(name);
      if (value !== undefined) return value;
      env = env.parent;
    }
    return undefined;
  }

  has(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  hasOwn(name: string): boolean {
    return this.bindings.has(name);
  }

  child(): Environment {
    return new Environment(this);
  }

  names(): string[] {
    return [...this.bindings.keys()];
  }
}
