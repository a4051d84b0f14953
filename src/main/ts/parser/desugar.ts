import type {
  CoreExpression,
  CoreProgram,
  CoreStatement,
  Declaration,
  Expression,
  MatchArm,
  Program,
  Statement,
  TemplatePart,
} from "../ast/ast.js";

/**
 * Rewrites every pipe into a call, innermost first:
 * `a |> f(b)` becomes `f(a, b)` and `a |> g` becomes `g(a)`.
 */
export function desugar(program: Program): CoreProgram {
  return {
    ...program,
    statements: program.statements.map(desugarStatement),
    desugared: true,
  };
}

function desugarStatement(stmt: Statement): CoreStatement {
  switch (stmt.kind) {
    case "ExpressionStmt":
      return { ...stmt, expression: desugarExpression(stmt.expression) };
    case "ExportDecl":
      return { ...stmt, declaration: desugarDeclaration(stmt.declaration) };
    case "LetDecl":
    case "TypeDecl":
    case "ModuleDecl":
      return desugarDeclaration(stmt);
    case "ImportDecl":
      return stmt;
  }
}

function desugarDeclaration(decl: Declaration): Declaration<"core"> {
  switch (decl.kind) {
    case "LetDecl":
      return { ...decl, initializer: desugarExpression(decl.initializer) };
    case "ModuleDecl":
      return { ...decl, body: decl.body.map(desugarStatement) };
    case "TypeDecl":
      return decl;
  }
}

export function desugarExpression(expr: Expression): CoreExpression {
  switch (expr.kind) {
    case "LiteralExpr":
    case "IdentifierExpr":
      return expr;
    case "PipeExpr": {
      const left = desugarExpression(expr.left);
      const right = desugarExpression(expr.right);
      if (right.kind === "CallExpr") {
        return { ...right, args: [left, ...right.args], span: expr.span };
      }
      return { kind: "CallExpr", callee: right, args: [left], span: expr.span };
    }
    case "BinaryExpr":
      return {
        ...expr,
        left: desugarExpression(expr.left),
        right: desugarExpression(expr.right),
      };
    case "UnaryExpr":
      return { ...expr, operand: desugarExpression(expr.operand) };
    case "CallExpr":
      return {
        ...expr,
        callee: desugarExpression(expr.callee),
        args: expr.args.map(desugarExpression),
      };
    case "LambdaExpr":
      return { ...expr, body: desugarExpression(expr.body) };
    case "IfExpr":
      return {
        ...expr,
        condition: desugarExpression(expr.condition),
        thenBranch: desugarExpression(expr.thenBranch),
        elseBranch: expr.elseBranch && desugarExpression(expr.elseBranch),
      };
    case "MatchExpr":
      return {
        ...expr,
        subject: desugarExpression(expr.subject),
        arms: expr.arms.map(
          (arm): MatchArm<"core"> => ({ ...arm, body: desugarExpression(arm.body) })
        ),
      };
    case "BlockExpr":
      return { ...expr, statements: expr.statements.map(desugarStatement) };
    case "ArrayLiteralExpr":
      return { ...expr, elements: expr.elements.map(desugarExpression) };
    case "RecordLiteralExpr":
      return {
        ...expr,
        fields: expr.fields.map((f) => ({
          name: f.name,
          value: desugarExpression(f.value),
        })),
      };
    case "FieldExpr":
      return { ...expr, object: desugarExpression(expr.object) };
    case "IndexExpr":
      return {
        ...expr,
        object: desugarExpression(expr.object),
        index: desugarExpression(expr.index),
      };
    case "TemplateExpr":
      return {
        ...expr,
        parts: expr.parts.map(
          (part): TemplatePart<"core"> =>
            part.kind === "expr"
              ? { kind: "expr", expression: desugarExpression(part.expression) }
              : part
        ),
      };
  }
}
