import type { Span } from "../common/span.js";
import type { LiteralValue } from "../lexer/token.js";

export type { LiteralValue };

export interface Node {
  span: Span;
}

/**
 * `surface` trees come from the parser and may contain pipes; `core` trees
 * have been through `desugar` and contain none.
 */
export type Phase = "surface" | "core";

export type Stmt<P extends Phase> =
  | LetDecl<P>
  | ExpressionStmt<P>
  | TypeDecl
  | ModuleDecl<P>
  | ImportDecl
  | ExportDecl<P>;

export type Statement = Stmt<"surface">;
export type CoreStatement = Stmt<"core">;

/** Statements that `export` may wrap. */
export type Declaration<P extends Phase = "surface"> =
  | LetDecl<P>
  | TypeDecl
  | ModuleDecl<P>;

export type Expr<P extends Phase> =
  | LiteralExpr
  | IdentifierExpr
  | BinaryExpr<P>
  | UnaryExpr<P>
  | CallExpr<P>
  | LambdaExpr<P>
  | IfExpr<P>
  | MatchExpr<P>
  | BlockExpr<P>
  | ArrayLiteralExpr<P>
  | RecordLiteralExpr<P>
  | FieldExpr<P>
  | IndexExpr<P>
  | TemplateExpr<P>
  | (P extends "surface" ? PipeExpr : never);

export type Expression = Expr<"surface">;
export type CoreExpression = Expr<"core">;

export type Pattern =
  | WildcardPattern
  | BindPattern
  | LiteralPattern
  | ArrayPattern
  | RecordPattern;

export type TypeNode = NamedType | ArrayType | RecordType | FunctionType;

export type BinaryOperator =
  | "+"
  | "-"
  | "*"
  | "/"
  | "%"
  | "=="
  | "!="
  | "<"
  | "<="
  | ">"
  | ">="
  | "&&"
  | "||";

export type UnaryOperator = "-" | "!";

// --- Statements ---

/**
 * Example: `let x = 10`, `const name = "Ada"`
 *
 * `fn add(a, b) -> a + b` is also parsed into a `LetDecl` whose initializer is
 * a `LambdaExpr`.
 */
export interface LetDecl<P extends Phase = "surface"> extends Node {
  kind: "LetDecl";
  constant: boolean;
  name: string;
  initializer: Expr<P>;
}

export interface ExpressionStmt<P extends Phase = "surface"> extends Node {
  kind: "ExpressionStmt";
  expression: Expr<P>;
}

/**
 * Example: `type Point = { x: number, y: number }`
 */
export interface TypeDecl extends Node {
  kind: "TypeDecl";
  name: string;
  type: TypeNode;
}

/**
 * Example: `module geometry { export fn area(w, h) -> w * h }`
 */
export interface ModuleDecl<P extends Phase = "surface"> extends Node {
  kind: "ModuleDecl";
  name: string;
  body: Stmt<P>[];
}

/**
 * Example: `import site.layout`, `import "./partials.noteg"`
 */
export interface ImportDecl extends Node {
  kind: "ImportDecl";
  path: string;
}

/**
 * Example: `export let title = "Home"`
 */
export interface ExportDecl<P extends Phase = "surface"> extends Node {
  kind: "ExportDecl";
  declaration: Declaration<P>;
}

// --- Expressions ---

export interface LiteralExpr extends Node {
  kind: "LiteralExpr";
  value: LiteralValue;
}

export interface IdentifierExpr extends Node {
  kind: "IdentifierExpr";
  name: string;
}

export interface BinaryExpr<P extends Phase = "surface"> extends Node {
  kind: "BinaryExpr";
  left: Expr<P>;
  operator: BinaryOperator;
  right: Expr<P>;
}

export interface UnaryExpr<P extends Phase = "surface"> extends Node {
  kind: "UnaryExpr";
  operator: UnaryOperator;
  operand: Expr<P>;
}

export interface CallExpr<P extends Phase = "surface"> extends Node {
  kind: "CallExpr";
  callee: Expr<P>;
  args: Expr<P>[];
}

/**
 * Example: `fn(x, y) -> x + y`
 */
export interface LambdaExpr<P extends Phase = "surface"> extends Node {
  kind: "LambdaExpr";
  params: string[];
  body: Expr<P>;
  /** Set when the lambda came from a named `fn` declaration. */
  name?: string;
}

/**
 * Example: `if ready then "go" else "wait"`
 */
export interface IfExpr<P extends Phase = "surface"> extends Node {
  kind: "IfExpr";
  condition: Expr<P>;
  thenBranch: Expr<P>;
  elseBranch?: Expr<P>;
}

/**
 * Example: `match value with { 0 => "zero", _ => "other" }`
 *
 * Parsed for tooling; neither the interpreter nor the compiler executes it.
 */
export interface MatchExpr<P extends Phase = "surface"> extends Node {
  kind: "MatchExpr";
  subject: Expr<P>;
  arms: MatchArm<P>[];
}

export interface MatchArm<P extends Phase = "surface"> extends Node {
  pattern: Pattern;
  body: Expr<P>;
}

export interface BlockExpr<P extends Phase = "surface"> extends Node {
  kind: "BlockExpr";
  statements: Stmt<P>[];
}

export interface ArrayLiteralExpr<P extends Phase = "surface"> extends Node {
  kind: "ArrayLiteralExpr";
  elements: Expr<P>[];
}

export interface RecordField<P extends Phase = "surface"> {
  name: string;
  value: Expr<P>;
}

/**
 * Example: `{ title: "Home", draft: false }`
 */
export interface RecordLiteralExpr<P extends Phase = "surface"> extends Node {
  kind: "RecordLiteralExpr";
  fields: RecordField<P>[];
}

export interface FieldExpr<P extends Phase = "surface"> extends Node {
  kind: "FieldExpr";
  object: Expr<P>;
  field: string;
}

export interface IndexExpr<P extends Phase = "surface"> extends Node {
  kind: "IndexExpr";
  object: Expr<P>;
  index: Expr<P>;
}

/**
 * Example: `title |> upper()`
 *
 * Only produced by the parser; `desugar` rewrites every pipe into a call.
 */
export interface PipeExpr extends Node {
  kind: "PipeExpr";
  left: Expression;
  right: Expression;
}

export type TemplatePart<P extends Phase = "surface"> =
  | { kind: "text"; value: string }
  | { kind: "expr"; expression: Expr<P> };

/**
 * Example: `"Hello {{ name }}!"`
 */
export interface TemplateExpr<P extends Phase = "surface"> extends Node {
  kind: "TemplateExpr";
  parts: TemplatePart<P>[];
}

// --- Patterns ---

export interface WildcardPattern extends Node {
  kind: "WildcardPattern";
}

export interface BindPattern extends Node {
  kind: "BindPattern";
  name: string;
}

export interface LiteralPattern extends Node {
  kind: "LiteralPattern";
  value: LiteralValue;
}

export interface ArrayPattern extends Node {
  kind: "ArrayPattern";
  elements: Pattern[];
}

export interface RecordPattern extends Node {
  kind: "RecordPattern";
  fields: { name: string; pattern: Pattern }[];
}

// --- Types ---

/**
 * Example: `number`, `List<string>`
 */
export interface NamedType extends Node {
  kind: "NamedType";
  name: string;
  args: TypeNode[];
}

/**
 * Example: `[string]`
 */
export interface ArrayType extends Node {
  kind: "ArrayType";
  elementType: TypeNode;
}

/**
 * Example: `{ title: string, tags: [string] }`
 */
export interface RecordType extends Node {
  kind: "RecordType";
  fields: { name: string; type: TypeNode }[];
}

/**
 * Example: `fn(number, number) -> number`
 */
export interface FunctionType extends Node {
  kind: "FunctionType";
  params: TypeNode[];
  result: TypeNode;
}

export interface Program<P extends Phase = "surface"> extends Node {
  kind: "Program";
  statements: Stmt<P>[];
}

/** A program that has been through `desugar`: it contains no `PipeExpr`. */
export interface CoreProgram extends Program<"core"> {
  desugared: true;
}
