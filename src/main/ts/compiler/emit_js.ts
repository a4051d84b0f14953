import type {
  BinaryOperator,
  CoreExpression,
  CoreProgram,
  CoreStatement,
  Declaration,
  LetDecl,
  LiteralExpr,
  ModuleDecl,
  TemplatePart,
} from "../ast/ast.js";
import { typeToString } from "../parser/types.js";
import { NAME, VERSION } from "../version.js";
import type { ResolvedCompileOptions } from "./options.js";
import {
  emitMemberAccess,
  emitPropertyName,
  escapeIdentifier,
} from "./reserved.js";
import { PREAMBLE_BINDINGS, RUNTIME_PREAMBLE } from "./runtime.js";

/** Maps source names to the identifiers emitted for them, one table per scope. */
class Names {
  private readonly local = new Map<string, string>();

  constructor(readonly parent?: Names) {}

  bind(name: string, id: string) {
    this.local.set(name, id);
  }

  lookup(name: string): string | undefined {
    return this.local.get(name) ?? this.parent?.lookup(name);
  }

  /** Unknown names are emitted as is and fail at run time like they would when interpreted. */
  resolve(name: string): string {
    return this.lookup(name) ?? escapeIdentifier(name);
  }
}

/**
 * One statement list. A name bound more than once is declared by its first
 * binding and assigned by the rest.
 */
interface Scope {
  names: Names;
  declared: Set<string>;
  bindingCounts: Map<string, number>;
  topLevel: boolean;
  /** Exported top-level declarations keep `export` (the `esm` profile). */
  exportDeclarations: boolean;
  /** Declarations that open a nested statement list. */
  prologue: string[];
}

export function emitJavaScript(
  program: CoreProgram,
  options: ResolvedCompileOptions
): string {
  return new JavaScriptEmitter(options).emitProgram(program);
}

class JavaScriptEmitter {
  private shadowCount = 0;

  constructor(private readonly options: ResolvedCompileOptions) {}

  emitProgram(program: CoreProgram): string {
    const out: string[] = [
      `// Generated by ${NAME} ${VERSION} (profile ${this.options.profile})`,
    ];
    if (this.options.strict) out.push('"use strict";');
    out.push(...RUNTIME_PREAMBLE);

    const names = new Names();
    for (const builtin of PREAMBLE_BINDINGS) names.bind(builtin, builtin);
    const scope = this.planScope(program.statements, names, true);
    scope.exportDeclarations = this.options.profile === "esm";
    for (const name of PREAMBLE_BINDINGS) scope.declared.add(name);

    for (const stmt of program.statements) {
      out.push(this.emitStatement(stmt, scope));
    }

    return out.join("\n") + "\n";
  }

  private emitStatement(stmt: CoreStatement, scope: Scope): string {
    switch (stmt.kind) {
      case "ExpressionStmt":
        return `${this.emitExpression(stmt.expression, scope.names)};`;
      case "ImportDecl":
        return comment(`import ${JSON.stringify(stmt.path)}`, scope);
      case "ExportDecl":
        return this.emitDeclaration(stmt.declaration, scope, true);
      case "LetDecl":
      case "TypeDecl":
      case "ModuleDecl":
        return this.emitDeclaration(stmt, scope, false);
    }
  }

  private emitDeclaration(
    decl: Declaration<"core">,
    scope: Scope,
    exported: boolean
  ): string {
    if (decl.kind === "TypeDecl") {
      return comment(`type ${decl.name} = ${typeToString(decl.type)}`, scope);
    }

    const target = this.bindingTarget(decl.name, scope);
    // A lambda sees its own binding when called; any other initializer sees
    // what the name meant before this statement.
    const seesItself = decl.kind === "LetDecl" && isLambda(decl);
    if (seesItself) scope.names.bind(decl.name, target.id);
    const initializer =
      decl.kind === "LetDecl"
        ? this.emitExpression(decl.initializer, scope.names)
        : this.emitModule(decl, scope.names);
    scope.names.bind(decl.name, target.id);

    if (!target.declare) return `${target.id} = ${initializer};`;

    const constant = decl.kind === "ModuleDecl" || decl.constant;
    const keyword =
      constant && scope.bindingCounts.get(decl.name) === 1 ? "const" : "let";
    const exportPrefix = exported && scope.exportDeclarations ? "export " : "";
    return `${exportPrefix}${keyword} ${target.id} = ${initializer};`;
  }

  /** The identifier a binding writes to, and whether this binding declares it. */
  private bindingTarget(
    name: string,
    scope: Scope
  ): { id: string; declare: boolean } {
    if (scope.declared.has(name)) {
      return { id: scope.names.resolve(name), declare: false };
    }
    scope.declared.add(name);
    return { id: escapeIdentifier(name), declare: true };
  }

  /**
   * In a nested list, a name that is also visible from outside gets its own
   * identifier for the whole list, starting out with the outer value. Code
   * that runs before the binding reads the outer value; closures read the
   * inner one once it is bound.
   */
  private planScope(
    statements: CoreStatement[],
    names: Names,
    topLevel: boolean
  ): Scope {
    const bindingCounts = new Map<string, number>();
    for (const stmt of statements) {
      const name = boundName(stmt);
      if (name) bindingCounts.set(name, (bindingCounts.get(name) ?? 0) + 1);
    }
    const scope: Scope = {
      names,
      declared: new Set(),
      bindingCounts,
      topLevel,
      exportDeclarations: false,
      prologue: [],
    };
    if (topLevel) return scope;

    for (const name of bindingCounts.keys()) {
      const outer = names.lookup(name);
      if (outer === undefined) continue;
      const id = `${escapeIdentifier(name)}$${++this.shadowCount}`;
      scope.prologue.push(`let ${id} = ${outer};`);
      names.bind(name, id);
      scope.declared.add(name);
    }
    return scope;
  }

  /** A block's value is its last statement's, or the name that statement binds. */
  private emitBlock(statements: CoreStatement[], outer: Names): string {
    const scope = this.planScope(statements, new Names(outer), false);
    const last = statements[statements.length - 1];

    const lines = [
      ...scope.prologue,
      ...statements.map((stmt) =>
        stmt === last && stmt.kind === "ExpressionStmt"
          ? `return ${this.emitExpression(stmt.expression, scope.names)};`
          : this.emitStatement(stmt, scope)
      ),
    ];
    if (!last || last.kind !== "ExpressionStmt") {
      const name = last && boundName(last);
      lines.push(`return ${name ? scope.names.resolve(name) : "null"};`);
    }

    return iife(lines);
  }

  /** A module evaluates to a record of its exported bindings. */
  private emitModule(decl: ModuleDecl<"core">, outer: Names): string {
    const scope = this.planScope(decl.body, new Names(outer), false);
    const lines = [
      ...scope.prologue,
      ...decl.body.map((stmt) => this.emitStatement(stmt, scope)),
    ];

    const fields = new Map<string, string>();
    for (const stmt of decl.body) {
      const name = stmt.kind === "ExportDecl" ? boundName(stmt) : undefined;
      if (!name) continue;
      const key = emitPropertyName(name);
      const id = scope.names.resolve(name);
      fields.set(key, key === id ? key : `${key}: ${id}`);
    }
    lines.push(
      fields.size > 0
        ? `return { ${[...fields.values()].join(", ")} };`
        : "return {};"
    );

    return iife(lines);
  }

  private emitExpression(expr: CoreExpression, names: Names): string {
    const emit = (e: CoreExpression) => this.emitExpression(e, names);

    switch (expr.kind) {
      case "LiteralExpr":
        return emitLiteral(expr);
      case "IdentifierExpr":
        return names.resolve(expr.name);
      case "BinaryExpr":
        return `(${emit(expr.left)} ${jsOperator(expr.operator)} ${emit(
          expr.right
        )})`;
      case "UnaryExpr":
        return `(${expr.operator}${emit(expr.operand)})`;
      case "CallExpr":
        return `${emit(expr.callee)}(${expr.args.map(emit).join(", ")})`;
      case "LambdaExpr": {
        const inner = new Names(names);
        const params = expr.params.map((param) => {
          const id = escapeIdentifier(param);
          inner.bind(param, id);
          return id;
        });
        return `((${params.join(", ")}) => ${this.emitExpression(
          expr.body,
          inner
        )})`;
      }
      case "IfExpr": {
        const elseExpr = expr.elseBranch ? emit(expr.elseBranch) : "null";
        return `(${emit(expr.condition)} ? ${emit(
          expr.thenBranch
        )} : ${elseExpr})`;
      }
      case "MatchExpr":
        return '$$unimplemented("match")';
      case "BlockExpr":
        return this.emitBlock(expr.statements, names);
      case "ArrayLiteralExpr":
        return `[${expr.elements.map(emit).join(", ")}]`;
      case "RecordLiteralExpr": {
        if (expr.fields.length === 0) return "({})";
        const fields = expr.fields
          .map((f) => `${emitPropertyName(f.name)}: ${emit(f.value)}`)
          .join(", ");
        return `({ ${fields} })`;
      }
      case "FieldExpr":
        return `${emitObject(expr.object, emit)}${emitMemberAccess(
          expr.field
        )}`;
      case "IndexExpr":
        return `${emitObject(expr.object, emit)}[${emit(expr.index)}]`;
      case "TemplateExpr":
        return `\`${expr.parts
          .map((part) => emitTemplatePart(part, emit))
          .join("")}\``;
    }
  }
}

function boundName(stmt: CoreStatement): string | undefined {
  const decl = stmt.kind === "ExportDecl" ? stmt.declaration : stmt;
  return decl.kind === "LetDecl" || decl.kind === "ModuleDecl"
    ? decl.name
    : undefined;
}

function isLambda(decl: LetDecl<"core">): boolean {
  return decl.initializer.kind === "LambdaExpr";
}

// Nested statement lists share one output line, so only the top level can
// use line comments.
function comment(text: string, scope: Scope): string {
  return scope.topLevel
    ? `// ${text}`
    : `/* ${text.replace(/\*\//g, "*\\/")} */`;
}

function iife(lines: string[]): string {
  return `(() => { ${lines.join(" ")} })()`;
}

function emitLiteral(expr: LiteralExpr): string {
  if (typeof expr.value === "string") return JSON.stringify(expr.value);
  return String(expr.value);
}

const STRICT_EQUALITY: Partial<Record<BinaryOperator, string>> = {
  "==": "===",
  "!=": "!==",
};

function jsOperator(operator: BinaryOperator): string {
  return STRICT_EQUALITY[operator] ?? operator;
}

// `1.x` would read as a malformed number.
function emitObject(
  expr: CoreExpression,
  emit: (e: CoreExpression) => string
): string {
  const object = emit(expr);
  return expr.kind === "LiteralExpr" && typeof expr.value === "number"
    ? `(${object})`
    : object;
}

function emitTemplatePart(
  part: TemplatePart<"core">,
  emit: (e: CoreExpression) => string
): string {
  if (part.kind === "expr") return `\${${emit(part.expression)}}`;
  return part.value
    .replace(/\\/g, "\\\\")
    .replace(/`/g, "\\`")
    .replace(/\$\{/g, "\\${")
    .replace(/\r/g, "\\r")
    .replace(/\n/g, "\\n");
}
