/**
 * Command-line driver: argument handling, file I/O and error reporting.
 *
 * Usage:
 *   tinyc <input-file>
 *   tinyc --help
 *
 * The translation is always written to out.c in the working directory,
 * and only when every check passed.
 */

import * as fs from "fs";
import * as path from "path";
import { LexerError } from "./lexer";
import { compile, ParseError, SemanticError } from "./parser";

export const OUTPUT_FILE = "out.c";

export interface CliOptions {
  inputFile: string;
}

export type ParsedArgs = { kind: "run"; options: CliOptions } | { kind: "help" } | { kind: "error"; message: string };

function printHelp(): void {
  console.log(`
tinyc - Tiny to C translator

Usage:
  tinyc <input-file>

The generated program is written to ${OUTPUT_FILE}.

Options:
  -h, --help    Show this help
`);
}

export function parseArgs(args: string[]): ParsedArgs {
  let inputFile = "";

  for (const arg of args) {
    if (arg === "-h" || arg === "--help") {
      return { kind: "help" };
    } else if (arg.startsWith("-")) {
      return { kind: "error", message: `Unknown option: ${arg}` };
    } else if (inputFile) {
      return { kind: "error", message: "Multiple input files not supported" };
    } else {
      inputFile = arg;
    }
  }

  if (!inputFile) {
    return { kind: "error", message: "Compiler needs source file as argument" };
  }

  return { kind: "run", options: { inputFile } };
}

export function formatError(error: unknown, filePath: string): string {
  if (error instanceof LexerError) {
    return `${filePath}: Lexer error: ${error.message}`;
  }

  if (error instanceof ParseError) {
    return `${filePath}: Parse error: ${error.message}`;
  }

  if (error instanceof SemanticError) {
    return `${filePath}: Semantic error: ${error.message}`;
  }

  if (error instanceof Error) {
    return `${filePath}: ${error.message}`;
  }

  return `${filePath}: Unknown error: ${String(error)}`;
}

/**
 * Run the translator for the given arguments and return the process
 * exit code. Relative paths resolve against `cwd`.
 */
export function run(args: string[], cwd: string = process.cwd()): number {
  const parsed = parseArgs(args);
  if (parsed.kind === "help") {
    printHelp();
    return 0;
  }
  if (parsed.kind === "error") {
    console.error(`Error: ${parsed.message}`);
    return 1;
  }
  const { options } = parsed;

  // Read input file
  const inputPath = path.resolve(cwd, options.inputFile);
  let source: string;
  try {
    source = fs.readFileSync(inputPath, "utf-8");
  } catch (err) {
    console.error(`Error reading file: ${inputPath}`);
    if (err instanceof Error) {
      console.error(err.message);
    }
    return 1;
  }

  // Translate
  let output: string;
  try {
    output = compile(source);
  } catch (err) {
    console.error(formatError(err, options.inputFile));
    return 1;
  }

  // Write output
  const outputPath = path.resolve(cwd, OUTPUT_FILE);
  try {
    fs.writeFileSync(outputPath, output);
  } catch (err) {
    console.error(`Error writing file: ${outputPath}`);
    if (err instanceof Error) {
      console.error(err.message);
    }
    return 1;
  }

  console.error(`Compiled ${options.inputFile} -> ${OUTPUT_FILE}`);
  return 0;
}
