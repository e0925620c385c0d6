/**
 * TransformationPipeline - Project-level transformation orchestration
 *
 * Builds one ts.Program for a set of files so shapes resolve across modules,
 * then expands each requested file and prints the result as TypeScript.
 * Used by the CLI and by tests.
 */

import * as ts from "typescript";
import * as path from "path";
import { plainToRichDiagnostic, type RichDiagnostic } from "@untagged/core";
import { createTupleTransformer, type MacroTransformerConfig } from "./index.js";

/**
 * Result of transforming a single file
 */
export interface TransformResult {
  /** Original source content */
  original: string;
  /** Transformed code (valid TypeScript) */
  code: string;
  /** Whether the file was modified */
  changed: boolean;
  /** Macro expansion diagnostics */
  diagnostics: RichDiagnostic[];
}

/**
 * Options for the transformation pipeline
 */
export interface PipelineOptions {
  /** Enable verbose logging */
  verbose?: boolean;
  /** Macro transformer config */
  transformerConfig?: MacroTransformerConfig;
  /** Custom file reader (defaults to ts.sys.readFile) */
  readFile?: (fileName: string) => string | undefined;
  /** Custom file existence checker (defaults to ts.sys.fileExists) */
  fileExists?: (fileName: string) => boolean;
  /**
   * Custom directory existence checker (defaults to ts.sys.directoryExists).
   * Module resolution skips directories this rejects, so in-memory files
   * need one.
   */
  directoryExists?: (directoryName: string) => boolean;
}

/**
 * Usage:
 * ```typescript
 * const pipeline = createPipeline("./tsconfig.json");
 * const result = pipeline.transform("src/app.ts");
 * console.log(result.code);
 * ```
 */
export class TransformationPipeline {
  private program: ts.Program | undefined;
  private results = new Map<string, TransformResult>();
  private transformerFactory: ts.TransformerFactory<ts.SourceFile> | undefined;
  private diagnosticSink: RichDiagnostic[] = [];
  private readonly verbose: boolean;
  private readonly readFile: (fileName: string) => string | undefined;
  private readonly fileExists: (fileName: string) => boolean;

  constructor(
    private compilerOptions: ts.CompilerOptions,
    private fileNames: string[],
    private options: PipelineOptions = {}
  ) {
    this.verbose = options.verbose ?? false;
    this.readFile = options.readFile ?? ts.sys.readFile;
    this.fileExists = options.fileExists ?? ts.sys.fileExists;
  }

  /**
   * Transform a single file
   */
  transform(fileName: string): TransformResult {
    const normalizedFileName = path.resolve(fileName);

    const cached = this.results.get(normalizedFileName);
    if (cached) {
      if (this.verbose) {
        console.log(`[untagged] Cache hit for ${normalizedFileName}`);
      }
      return cached;
    }

    const program = this.getProgram();
    const sourceFile = program.getSourceFile(normalizedFileName);
    if (!sourceFile) {
      return {
        original: "",
        code: "",
        changed: false,
        diagnostics: [plainToRichDiagnostic(`File not found: ${normalizedFileName}`, "error")],
      };
    }

    const result = this.runMacroTransformer(sourceFile);
    this.results.set(normalizedFileName, result);

    if (this.verbose) {
      console.log(`[untagged] Transformed ${normalizedFileName} (changed: ${result.changed})`);
      console.log(`[untagged]   Diagnostics: ${result.diagnostics.length}`);
    }

    return result;
  }

  /**
   * Transform all files in the project
   */
  transformAll(): Map<string, TransformResult> {
    const results = new Map<string, TransformResult>();
    for (const fileName of this.fileNames) {
      if (this.shouldTransform(fileName)) {
        results.set(fileName, this.transform(fileName));
      }
    }
    return results;
  }

  /**
   * Drop the program and every result, e.g. after a file changed on disk.
   */
  invalidateAll(): void {
    this.program = undefined;
    this.transformerFactory = undefined;
    this.results.clear();
  }

  /**
   * Get the current ts.Program (creates if needed)
   */
  getProgram(): ts.Program {
    if (!this.program) {
      if (this.verbose) {
        console.log(`[untagged] Creating TypeScript program with ${this.fileNames.length} files`);
      }
      const host = ts.createCompilerHost(this.compilerOptions, true);
      host.readFile = this.readFile;
      host.fileExists = this.fileExists;
      const directoryExists = this.options.directoryExists;
      if (directoryExists) {
        host.directoryExists = directoryExists;
      }
      host.getSourceFile = (name, languageVersion) => {
        const text = this.readFile(name);
        return text === undefined ? undefined : ts.createSourceFile(name, text, languageVersion, true);
      };
      this.program = ts.createProgram(this.fileNames, this.compilerOptions, host);
    }
    return this.program;
  }

  getFileNames(): string[] {
    return this.fileNames;
  }

  /**
   * Check if a file should be transformed (based on extensions)
   */
  shouldTransform(fileName: string): boolean {
    if (fileName.includes("node_modules")) return false;
    if (fileName.endsWith(".d.ts")) return false;
    return /\.[cm]?tsx?$/.test(fileName);
  }

  // ---------------------------------------------------------------------------
  // Private methods
  // ---------------------------------------------------------------------------

  private getTransformerFactory(program: ts.Program): ts.TransformerFactory<ts.SourceFile> {
    if (!this.transformerFactory) {
      this.transformerFactory = createTupleTransformer({
        verbose: this.verbose,
        ...this.options.transformerConfig,
        program,
        onDiagnostic: (d) => this.diagnosticSink.push(d),
      });
    }
    return this.transformerFactory;
  }

  private runMacroTransformer(sourceFile: ts.SourceFile): TransformResult {
    const original = sourceFile.text;
    const factory = this.getTransformerFactory(this.getProgram());
    this.diagnosticSink = [];

    const result = ts.transform(sourceFile, [factory], this.compilerOptions);
    try {
      const [transformed] = result.transformed;
      if (!transformed) {
        return { original, code: original, changed: false, diagnostics: [] };
      }

      const printer = ts.createPrinter({ newLine: ts.NewLineKind.LineFeed });
      const code = printer.printFile(transformed);
      return {
        original,
        code,
        changed: transformed !== sourceFile,
        diagnostics: this.diagnosticSink,
      };
    } finally {
      result.dispose();
    }
  }
}

/**
 * Create a pipeline from a tsconfig.json path
 */
export function createPipeline(
  tsconfigPath: string,
  options?: PipelineOptions
): TransformationPipeline {
  const configFile = ts.readConfigFile(tsconfigPath, ts.sys.readFile);
  if (configFile.error) {
    throw new Error(
      `Error reading ${tsconfigPath}: ${ts.flattenDiagnosticMessageText(configFile.error.messageText, "\n")}`
    );
  }

  const parsed = ts.parseJsonConfigFileContent(
    configFile.config,
    ts.sys,
    path.dirname(tsconfigPath)
  );

  return new TransformationPipeline(parsed.options, parsed.fileNames, options);
}

/**
 * Transform source text held in memory.
 *
 * `files` supplies further in-memory modules the code imports, keyed by path
 * relative to the working directory. Everything else (lib files, packages)
 * is read from disk.
 */
export function transformCode(
  code: string,
  options?: { fileName?: string; files?: Record<string, string> } & PipelineOptions
): TransformResult {
  const fileName = path.resolve(options?.fileName ?? "input.ts");
  const memory = new Map<string, string>([[fileName, code]]);
  for (const [name, text] of Object.entries(options?.files ?? {})) {
    memory.set(path.resolve(name), text);
  }

  const pipeline = new TransformationPipeline(
    {
      target: ts.ScriptTarget.ES2022,
      module: ts.ModuleKind.ESNext,
      moduleResolution: ts.ModuleResolutionKind.Bundler,
    },
    [...memory.keys()],
    {
      ...options,
      readFile: (f) => memory.get(path.resolve(f)) ?? ts.sys.readFile(f),
      fileExists: (f) => memory.has(path.resolve(f)) || ts.sys.fileExists(f),
    }
  );
  return pipeline.transform(fileName);
}
