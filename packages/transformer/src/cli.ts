#!/usr/bin/env node

/**
 * untagged CLI -- Compile TypeScript with tuple macro expansion
 *
 * Usage:
 *   untagged build [--project tsconfig.json] [--verbose]
 *   untagged check [--project tsconfig.json] [--verbose]
 *   untagged expand <file> [--project tsconfig.json] [--diff]
 *   untagged explain <code>
 */

import * as ts from "typescript";
import * as path from "path";
import {
  config,
  getDiagnosticDescriptor,
  printDiagnostics,
  type RichDiagnostic,
} from "@untagged/core";
import { createTupleTransformer } from "./index.js";
import { TransformationPipeline, createPipeline } from "./pipeline.js";

type Command = "build" | "check" | "expand" | "explain";

const COMMANDS: readonly Command[] = ["build", "check", "expand", "explain"];

interface CliOptions {
  command: Command;
  project: string;
  verbose: boolean;
  explain: boolean;
  file?: string;
  diff?: boolean;
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

function parseArgs(args: string[]): CliOptions {
  const first = args[0] ?? "build";
  if (!isCommand(first)) {
    console.error(`Unknown command: ${first}\nUsage: untagged <build|check|expand|explain> [options]`);
    process.exit(1);
  }

  let project = "tsconfig.json";
  let verbose = false;
  let explain = false;
  let file: string | undefined;
  let diff = false;

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (arg === "--project" || arg === "-p") {
      project = args[++i] ?? "tsconfig.json";
    } else if (arg === "--verbose" || arg === "-v") {
      verbose = true;
    } else if (arg === "--diff") {
      diff = true;
    } else if (arg === "--explain") {
      explain = true;
    } else if (arg === "--help" || arg === "-h") {
      printHelp();
      process.exit(0);
    } else if (!arg.startsWith("-") && !file) {
      file = arg;
    }
  }

  return { command: first, project, verbose, explain, file, diff };
}

function printHelp(): void {
  console.log(`
untagged -- compile-time named tuples for TypeScript

USAGE:
  untagged <command> [options]

COMMANDS:
  build              Compile TypeScript with macro expansion (default)
  check              Expand macros and report diagnostics, but don't emit files
  expand <file>      Show macro-expanded output for a file
  explain <code>     Describe a diagnostic code, e.g. TS9403

OPTIONS:
  -p, --project <path>   Path to tsconfig.json (default: tsconfig.json)
  -v, --verbose          Enable verbose logging
  --explain              Print the long explanation under each diagnostic
  -h, --help             Show this help message

EXPAND OPTIONS:
  --diff                 Show changed lines between original and expanded

EXAMPLES:
  untagged build
  untagged check --project tsconfig.build.json
  untagged expand src/shapes.ts --diff
  untagged explain TS9403
`);
}

function readTsConfig(configPath: string): ts.ParsedCommandLine {
  const absolutePath = path.resolve(configPath);
  const configFile = ts.readConfigFile(absolutePath, ts.sys.readFile);

  if (configFile.error) {
    const message = ts.flattenDiagnosticMessageText(configFile.error.messageText, "\n");
    console.error(`Error reading ${configPath}: ${message}`);
    process.exit(1);
  }

  const parsed = ts.parseJsonConfigFileContent(
    configFile.config,
    ts.sys,
    path.dirname(absolutePath)
  );

  if (parsed.errors.length > 0) {
    const messages = parsed.errors.map((d) => ts.flattenDiagnosticMessageText(d.messageText, "\n"));
    console.error(`Config errors:\n${messages.join("\n")}`);
    process.exit(1);
  }

  return parsed;
}

function reportDiagnostics(diagnostics: readonly ts.Diagnostic[]): number {
  let errorCount = 0;
  for (const diagnostic of diagnostics) {
    const message = ts.flattenDiagnosticMessageText(diagnostic.messageText, "\n");

    if (diagnostic.file && diagnostic.start !== undefined) {
      const { line, character } = diagnostic.file.getLineAndCharacterOfPosition(diagnostic.start);
      const prefix = diagnostic.category === ts.DiagnosticCategory.Error ? "error" : "warning";
      console.error(
        `${diagnostic.file.fileName}(${line + 1},${character + 1}): ${prefix} TS${diagnostic.code}: ${message}`
      );
    } else {
      console.error(message);
    }

    if (diagnostic.category === ts.DiagnosticCategory.Error) {
      errorCount++;
    }
  }
  return errorCount;
}

function reportMacroDiagnostics(
  diagnostics: readonly RichDiagnostic[],
  options: CliOptions
): number {
  printDiagnostics(diagnostics, { showExplanation: options.explain });
  return diagnostics.filter((d) => d.severity === "error").length;
}

function logConfigSources(options: CliOptions): void {
  if (!options.verbose) return;
  console.log(`[untagged] Using config: ${path.resolve(options.project)}`);
  const configFile = config.getConfigFilePath();
  if (configFile) {
    console.log(`[untagged] Using settings from ${configFile}`);
  }
}

function build(options: CliOptions): void {
  const parsed = readTsConfig(options.project);
  logConfigSources(options);

  if (options.verbose) {
    console.log(`[untagged] Compiling ${parsed.fileNames.length} files...`);
  }

  const program = ts.createProgram(parsed.fileNames, parsed.options);
  const macroDiagnostics: RichDiagnostic[] = [];
  const transformer = createTupleTransformer({
    program,
    verbose: options.verbose,
    onDiagnostic: (d) => macroDiagnostics.push(d),
  });

  const emitResult = program.emit(undefined, undefined, undefined, false, {
    before: [transformer],
  });

  const tsErrors = reportDiagnostics([
    ...ts.getPreEmitDiagnostics(program),
    ...emitResult.diagnostics,
  ]);
  const macroErrors = reportMacroDiagnostics(macroDiagnostics, options);

  if (tsErrors + macroErrors > 0) {
    process.exit(1);
  }
  if (options.verbose) {
    console.log("[untagged] Build complete");
  }
}

function check(options: CliOptions): void {
  logConfigSources(options);
  const pipeline = createPipeline(path.resolve(options.project), { verbose: options.verbose });
  const results = pipeline.transformAll();

  let errors = reportDiagnostics(ts.getPreEmitDiagnostics(pipeline.getProgram()));
  for (const result of results.values()) {
    errors += reportMacroDiagnostics(result.diagnostics, options);
  }

  if (errors > 0) {
    process.exit(1);
  }
  console.log(`[untagged] Checked ${results.size} files, no errors`);
}

function expand(options: CliOptions): void {
  if (!options.file) {
    console.error("Error: expand command requires a file argument");
    console.error("Usage: untagged expand <file> [--diff]");
    process.exit(1);
  }

  const filePath = path.resolve(options.file);
  if (!ts.sys.fileExists(filePath)) {
    console.error(`File not found: ${filePath}`);
    process.exit(1);
  }

  const parsed = readTsConfig(options.project);
  const fileNames = parsed.fileNames.includes(filePath)
    ? parsed.fileNames
    : [...parsed.fileNames, filePath];
  const pipeline = new TransformationPipeline(parsed.options, fileNames, {
    verbose: options.verbose,
  });
  const result = pipeline.transform(filePath);

  const errors = reportMacroDiagnostics(result.diagnostics, options);

  if (options.diff) {
    const originalLines = result.original.split("\n");
    const expandedLines = result.code.split("\n");

    console.log(`--- ${options.file} (original)`);
    console.log(`+++ ${options.file} (expanded)`);

    let inDiff = false;
    const maxLines = Math.max(originalLines.length, expandedLines.length);

    for (let i = 0; i < maxLines; i++) {
      const orig = originalLines[i];
      const exp = expandedLines[i];

      if (orig !== exp) {
        if (!inDiff) {
          console.log(`@@ -${i + 1} +${i + 1} @@`);
          inDiff = true;
        }
        if (orig !== undefined) console.log(`-${orig}`);
        if (exp !== undefined) console.log(`+${exp}`);
      } else {
        inDiff = false;
      }
    }
  } else {
    console.log(result.code);
  }

  if (errors > 0) {
    process.exit(1);
  }
}

function explainCode(options: CliOptions): void {
  const match = /^(?:TS)?(\d+)$/i.exec(options.file ?? "");
  const descriptor = match?.[1] ? getDiagnosticDescriptor(Number(match[1])) : undefined;
  if (!descriptor) {
    console.error(`Unknown diagnostic code: ${options.file ?? "(none)"}`);
    console.error("Usage: untagged explain <code>");
    process.exit(1);
  }

  console.log(`TS${descriptor.code} (${descriptor.category}): ${descriptor.messageTemplate}\n`);
  console.log(descriptor.explanation);
}

function main(): void {
  const args = process.argv.slice(2);

  if (args[0] === "--help" || args[0] === "-h") {
    printHelp();
    process.exit(0);
  }

  const options = parseArgs(args);

  switch (options.command) {
    case "build":
      build(options);
      break;
    case "check":
      check(options);
      break;
    case "expand":
      expand(options);
      break;
    case "explain":
      explainCode(options);
      break;
  }
}

main();
