import * as fs from "fs";
import * as path from "path";
import { DiagnosticReporter, DiagnosticSeverity } from "./common/diagnostics.js";
import { formatDiagnostic, formatDiagnostics } from "./common/pretty.js";
import { compile } from "./compiler/compile.js";
import { resolveCompileOptions } from "./compiler/options.js";
import { interpret } from "./interpreter/interpreter.js";
import { show } from "./interpreter/values.js";
import { tokenize } from "./lexer/lexer.js";
import { TokenType } from "./lexer/token.js";
import { desugar } from "./parser/desugar.js";
import { parseTokens } from "./parser/parser.js";
import { NAME, VERSION } from "./version.js";

/** Everything the CLI touches outside the process, so tests can stand in for it. */
export interface CliIO {
  exists(filePath: string): boolean;
  readFile(filePath: string): string;
  writeFile(filePath: string, content: string): void;
  stdout(text: string): void;
  stderr(text: string): void;
}

export const nodeIO: CliIO = {
  exists: (filePath) => fs.existsSync(filePath),
  readFile: (filePath) => fs.readFileSync(filePath, "utf8"),
  writeFile: (filePath, content) => fs.writeFileSync(filePath, content, "utf8"),
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
};

export const USAGE = [
  `${NAME} ${VERSION}`,
  "Usage: noteg <command> <file> [options]",
  "",
  "Commands:",
  "  tokens <file>      print the token stream",
  "  parse <file>       print the syntax tree as JSON",
  "  interpret <file>   run the program and print its value",
  "  compile <file>     write the program as JavaScript",
  "",
  "Compile options:",
  "  --out <path>       output file (default: input with a .js extension)",
  "  --profile <name>   es2020 (default) or esm",
  "  --no-strict        omit the \"use strict\" directive",
].join("\n");

interface CompileFlags {
  out?: string;
  profile?: string;
  strict: boolean;
}

function parseCompileFlags(args: string[]): CompileFlags | undefined {
  const flags: CompileFlags = { strict: true };
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--no-strict") {
      flags.strict = false;
    } else if ((arg === "--out" || arg === "--profile") && i + 1 < args.length) {
      flags[arg === "--out" ? "out" : "profile"] = args[++i];
    } else {
      return undefined;
    }
  }
  return flags;
}

export function outputPathFor(inputPath: string): string {
  const parsed = path.parse(inputPath);
  return path.join(parsed.dir, `${parsed.name}.js`);
}

/** Runs one CLI invocation and returns its exit code. */
export function runCli(argv: string[], io: CliIO = nodeIO): number {
  const [command, filePath, ...rest] = argv;

  const known = ["tokens", "parse", "interpret", "compile"];
  if (!command || !known.includes(command) || !filePath) {
    io.stderr(USAGE);
    return 2;
  }

  const flags = command === "compile" ? parseCompileFlags(rest) : undefined;
  const badFlags = command === "compile" ? !flags : rest.length > 0;
  if (badFlags) {
    io.stderr(USAGE);
    return 2;
  }

  if (!io.exists(filePath)) {
    io.stderr(`Error: File not found: ${filePath}`);
    return 1;
  }
  const source = io.readFile(filePath);

  switch (command) {
    case "tokens":
      return printTokens(source, io);
    case "parse":
      return printTree(source, filePath, io);
    case "interpret":
      return run(source, filePath, io);
    default:
      return writeJavaScript(source, filePath, flags ?? { strict: true }, io);
  }
}

function printTokens(source: string, io: CliIO): number {
  for (const token of tokenize(source)) {
    const { line, column } = token.start;
    const message = token.message ? ` ${token.message}` : "";
    io.stdout(
      `${TokenType[token.type]} ${JSON.stringify(token.lexeme)} ${line}:${column}${message}`
    );
  }
  return 0;
}

function printTree(source: string, filePath: string, io: CliIO): number {
  const reporter = new DiagnosticReporter();
  const program = parseTokens(tokenize(source), reporter);
  if (reporter.hasErrors()) {
    io.stderr(formatDiagnostics(reporter.getDiagnostics(), filePath, source));
    return 1;
  }
  io.stdout(JSON.stringify(desugar(program), null, 2));
  return 0;
}

function run(source: string, filePath: string, io: CliIO): number {
  const result = interpret(source, { print: io.stdout });
  if (!result.ok) {
    const { message, position } = result.error;
    io.stderr(
      formatDiagnostic(
        {
          severity: DiagnosticSeverity.Error,
          message,
          span: position && { start: position, end: position },
        },
        filePath,
        source
      )
    );
    return 1;
  }
  if (result.value.kind !== "null") io.stdout(show(result.value));
  return 0;
}

function writeJavaScript(
  source: string,
  filePath: string,
  flags: CompileFlags,
  io: CliIO
): number {
  const options = resolveCompileOptions({
    profile: flags.profile,
    strict: flags.strict,
  });
  if (!options.ok) {
    io.stderr(`Error: ${options.error}`);
    return 2;
  }

  const result = compile(source, options.value);
  if (!result.ok) {
    for (const line of result.error.split("\n")) {
      io.stderr(`${filePath}:${line}`);
    }
    return 1;
  }

  const outPath = flags.out ?? outputPathFor(filePath);
  io.writeFile(outPath, result.value);
  io.stdout(`Wrote ${outPath}`);
  return 0;
}
