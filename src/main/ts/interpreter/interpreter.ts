import type {
  BinaryExpr,
  CoreExpression,
  CoreProgram,
  CoreStatement,
  IndexExpr,
  LiteralValue,
  ModuleDecl,
} from "../ast/ast.js";
import { err, ok, type Result } from "../common/result.js";
import type { Position } from "../common/span.js";
import { parse } from "../parser/parser.js";
import { createGlobals, type PrintSink } from "./builtins.js";
import type { Environment } from "./environment.js";
import { RuntimeError } from "./errors.js";
import {
  array,
  bool,
  isPrimitive,
  NULL,
  num,
  record,
  show,
  str,
  typeName,
  type Value,
  valuesEqual,
} from "./values.js";

export interface InterpretOptions {
  /** Receives the output of `print`. Defaults to `console.log`. */
  print?: PrintSink;
}

const MAX_CALL_DEPTH = 400;

function literal(value: LiteralValue): Value {
  if (value === null) return NULL;
  switch (typeof value) {
    case "boolean":
      return bool(value);
    case "number":
      return num(value);
    case "string":
      return str(value);
  }
}

export class Interpreter {
  private depth = 0;

  constructor(readonly globals: Environment) {}

  run(program: CoreProgram): Value {
    return this.executeAll(program.statements, this.globals);
  }

  /** Runs statements in `env`; the value is the last statement's (null if none). */
  executeAll(statements: CoreStatement[], env: Environment): Value {
    let last: Value = NULL;
    for (const stmt of statements) {
      last = this.execute(stmt, env);
    }
    return last;
  }

  execute(stmt: CoreStatement, env: Environment): Value {
    switch (stmt.kind) {
      case "LetDecl": {
        let value = this.evaluate(stmt.initializer, env);
        if (value.kind === "function" && value.name === undefined) {
          value = { ...value, name: stmt.name };
        }
        env.define(stmt.name, value);
        return value;
      }
      case "ExpressionStmt":
        return this.evaluate(stmt.expression, env);
      case "TypeDecl":
      case "ImportDecl":
        return NULL;
      case "ModuleDecl":
        return this.module(stmt, env);
      case "ExportDecl":
        return this.execute(stmt.declaration, env);
    }
  }

  /** Runs the body in its own scope and binds the exported names as a record. */
  private module(decl: ModuleDecl<"core">, env: Environment): Value {
    const scope = env.child();
    this.executeAll(decl.body, scope);

    const fields = new Map<string, Value>();
    for (const stmt of decl.body) {
      if (stmt.kind !== "ExportDecl" || stmt.declaration.kind === "TypeDecl") {
        continue;
      }
      const value = scope.lookup(stmt.declaration.name);
      if (value) fields.set(stmt.declaration.name, value);
    }

    const value = record(fields);
    env.define(decl.name, value);
    return value;
  }

  evaluate(expr: CoreExpression, env: Environment): Value {
    switch (expr.kind) {
      case "LiteralExpr":
        return literal(expr.value);
      case "IdentifierExpr": {
        const value = env.lookup(expr.name);
        if (!value) {
          throw new RuntimeError(
            `undefined variable: ${expr.name}`,
            expr.span.start
          );
        }
        return value;
      }
      case "BinaryExpr":
        return this.binary(expr, env);
      case "UnaryExpr": {
        const operand = this.evaluate(expr.operand, env);
        if (expr.operator === "-") {
          if (operand.kind !== "number") {
            throw new RuntimeError(
              `cannot negate ${typeName(operand)}`,
              expr.span.start
            );
          }
          return num(-operand.value);
        }
        if (operand.kind !== "bool") {
          throw new RuntimeError(
            `'!' expects a bool, got ${typeName(operand)}`,
            expr.span.start
          );
        }
        return bool(!operand.value);
      }
      case "CallExpr": {
        const callee = this.evaluate(expr.callee, env);
        const args = expr.args.map((arg) => this.evaluate(arg, env));
        return this.call(callee, args, expr.span.start);
      }
      case "LambdaExpr":
        return {
          kind: "function",
          name: expr.name,
          params: expr.params,
          body: expr.body,
          closure: env,
        };
      case "IfExpr": {
        const condition = this.evaluate(expr.condition, env);
        if (condition.kind !== "bool") {
          throw new RuntimeError(
            `if condition must be a bool, got ${typeName(condition)}`,
            expr.condition.span.start
          );
        }
        if (condition.value) return this.evaluate(expr.thenBranch, env);
        return expr.elseBranch ? this.evaluate(expr.elseBranch, env) : NULL;
      }
      case "MatchExpr":
        throw new RuntimeError(
          "match expressions are not yet implemented",
          expr.span.start
        );
      case "BlockExpr":
        return this.executeAll(expr.statements, env.child());
      case "ArrayLiteralExpr":
        return array(expr.elements.map((e) => this.evaluate(e, env)));
      case "RecordLiteralExpr": {
        const fields = new Map<string, Value>();
        for (const field of expr.fields) {
          fields.set(field.name, this.evaluate(field.value, env));
        }
        return record(fields);
      }
      case "FieldExpr": {
        const object = this.evaluate(expr.object, env);
        if (object.kind !== "record") {
          throw new RuntimeError(
            `cannot access field '${expr.field}' on ${typeName(object)}`,
            expr.span.start
          );
        }
        const value = object.fields.get(expr.field);
        if (!value) {
          throw new RuntimeError(
            `record has no field '${expr.field}'`,
            expr.span.start
          );
        }
        return value;
      }
      case "IndexExpr":
        return this.index(expr, env);
      case "TemplateExpr": {
        let text = "";
        for (const part of expr.parts) {
          if (part.kind === "text") {
            text += part.value;
            continue;
          }
          const value = this.evaluate(part.expression, env);
          if (!isPrimitive(value)) {
            throw new RuntimeError(
              `cannot interpolate ${typeName(value)} into a string`,
              part.expression.span.start
            );
          }
          text += show(value);
        }
        return str(text);
      }
    }
  }

  call(callee: Value, args: Value[], position?: Position): Value {
    if (callee.kind === "builtin") {
      try {
        return callee.call(args);
      } catch (e) {
        if (e instanceof RuntimeError && !e.position && position) {
          throw new RuntimeError(e.message, position);
        }
        throw e;
      }
    }

    if (callee.kind !== "function") {
      throw new RuntimeError(`cannot call ${typeName(callee)}`, position);
    }

    if (args.length !== callee.params.length) {
      const count = callee.params.length;
      throw new RuntimeError(
        `${callee.name ?? "function"} expects ${count} argument${count === 1 ? "" : "s"} but got ${args.length}`,
        position
      );
    }

    if (this.depth >= MAX_CALL_DEPTH) {
      throw new RuntimeError("maximum call depth exceeded", position);
    }

    const scope = callee.closure.child();
    callee.params.forEach((param, i) => scope.define(param, args[i]));

    this.depth++;
    try {
      return this.evaluate(callee.body, scope);
    } finally {
      this.depth--;
    }
  }

  private binary(expr: BinaryExpr<"core">, env: Environment): Value {
    const { operator } = expr;
    const position = expr.span.start;
    const left = this.evaluate(expr.left, env);

    if (operator === "&&" || operator === "||") {
      if (left.kind !== "bool") {
        throw new RuntimeError(
          `'${operator}' expects bool operands, got ${typeName(left)}`,
          expr.left.span.start
        );
      }
      if (operator === "&&" ? !left.value : left.value) return left;
      const right = this.evaluate(expr.right, env);
      if (right.kind !== "bool") {
        throw new RuntimeError(
          `'${operator}' expects bool operands, got ${typeName(right)}`,
          expr.right.span.start
        );
      }
      return right;
    }

    const right = this.evaluate(expr.right, env);
    const mismatch = () =>
      new RuntimeError(
        `cannot apply '${operator}' to ${typeName(left)} and ${typeName(right)}`,
        position
      );

    switch (operator) {
      case "==":
        return bool(valuesEqual(left, right));
      case "!=":
        return bool(!valuesEqual(left, right));
      case "+":
        if (left.kind === "number" && right.kind === "number") {
          return num(left.value + right.value);
        }
        if (left.kind === "string" && right.kind === "string") {
          return str(left.value + right.value);
        }
        throw mismatch();
      case "<":
      case "<=":
      case ">":
      case ">=": {
        if (left.kind === "number" && right.kind === "number") {
          return bool(compare(operator, ordering(left.value, right.value)));
        }
        if (left.kind === "string" && right.kind === "string") {
          return bool(compare(operator, ordering(left.value, right.value)));
        }
        throw mismatch();
      }
      case "-":
      case "*":
      case "/":
      case "%": {
        if (left.kind !== "number" || right.kind !== "number") throw mismatch();
        if ((operator === "/" || operator === "%") && right.value === 0) {
          throw new RuntimeError("division by zero", position);
        }
        return num(arithmetic(operator, left.value, right.value));
      }
    }
  }

  private index(expr: IndexExpr<"core">, env: Environment): Value {
    const object = this.evaluate(expr.object, env);
    const index = this.evaluate(expr.index, env);

    if (object.kind !== "array" && object.kind !== "string") {
      throw new RuntimeError(`cannot index ${typeName(object)}`, expr.span.start);
    }
    if (index.kind !== "number" || !Number.isInteger(index.value)) {
      throw new RuntimeError(
        "index must be an integer",
        expr.index.span.start
      );
    }

    const length =
      object.kind === "array" ? object.elements.length : object.value.length;
    if (index.value < 0 || index.value >= length) {
      throw new RuntimeError(
        `index ${index.value} out of bounds for length ${length}`,
        expr.index.span.start
      );
    }

    return object.kind === "array"
      ? object.elements[index.value]
      : str(object.value[index.value]);
  }
}

/** -1, 0 or 1; NaN when the operands are unordered. */
function ordering(a: number, b: number): number;
function ordering(a: string, b: string): number;
function ordering(a: number | string, b: number | string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return a === b ? 0 : NaN;
}

function compare(operator: "<" | "<=" | ">" | ">=", order: number): boolean {
  switch (operator) {
    case "<":
      return order < 0;
    case "<=":
      return order <= 0;
    case ">":
      return order > 0;
    case ">=":
      return order >= 0;
  }
}

function arithmetic(operator: "-" | "*" | "/" | "%", a: number, b: number) {
  switch (operator) {
    case "-":
      return a - b;
    case "*":
      return a * b;
    case "/":
      return a / b;
    case "%":
      return a % b;
  }
}

/**
 * Parses and runs `source` against fresh globals. Parse failures and runtime
 * failures both come back as a `RuntimeError`; nothing is thrown.
 */
export function interpret(
  source: string,
  options: InterpretOptions = {}
): Result<Value, RuntimeError> {
  const parsed = parse(source);
  if (!parsed.ok) {
    const [first] = parsed.error;
    return err(
      new RuntimeError(
        parsed.error.map((e) => e.message).join("\n"),
        first?.position
      )
    );
  }

  const interpreter = new Interpreter(createGlobals(options.print));
  try {
    return ok(interpreter.run(parsed.value));
  } catch (e) {
    if (e instanceof RuntimeError) return err(e);
    // The host stack can run out before MAX_CALL_DEPTH on deeply nested data.
    if (e instanceof RangeError) {
      return err(new RuntimeError("maximum call depth exceeded"));
    }
    throw e;
  }
}
