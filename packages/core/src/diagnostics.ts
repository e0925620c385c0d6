/**
 * Diagnostics System for untagged
 *
 * Provides:
 * - Structured error codes in the TS custom range (9401-9499)
 * - Rich diagnostics with labeled spans and help text
 * - Builder API for macro authors
 * - A Rust-style CLI renderer
 *
 * @example
 * ```typescript
 * ctx.diagnostic(TS9403)
 *   .at(argNode)
 *   .withArgs({ shape: "point", field: "w" })
 *   .label(definitionNode, "shape defined here")
 *   .help("Known fields: x, y, z")
 *   .emit();
 * ```
 */

import type * as ts from "typescript";
import { config } from "./config.js";

// ============================================================================
// Diagnostic Categories
// ============================================================================

export enum DiagnosticCategory {
  ShapeDefinition = "definition",
  CallSite = "call-site",
  Pattern = "pattern",
  MacroExpansion = "expansion",
  Internal = "internal",
}

export type DiagnosticSeverity = "error" | "warning" | "info";

// ============================================================================
// Diagnostic Descriptor (Error Catalog Entry)
// ============================================================================

export interface DiagnosticDescriptor {
  /** Unique error code in range 9401-9499 */
  readonly code: number;

  /** Default severity */
  readonly severity: DiagnosticSeverity;

  /** Category for filtering and grouping */
  readonly category: DiagnosticCategory;

  /** Message template with {placeholders} for interpolation */
  readonly messageTemplate: string;

  /** Long-form explanation for docs and --explain */
  readonly explanation: string;
}

// ============================================================================
// Rich Diagnostic Types
// ============================================================================

/**
 * A labeled span pointing at specific code with a message.
 */
export interface LabeledSpan {
  node: ts.Node;
  message: string;
}

/**
 * Rich diagnostic with spans and help.
 * This is the structured form that renders to CLI output or TS diagnostics.
 */
export interface RichDiagnostic {
  code: number;
  severity: DiagnosticSeverity;
  category: DiagnosticCategory;

  /** Primary message (with placeholders interpolated) */
  message: string;

  /** The primary span (main error location) */
  primarySpan?: {
    node: ts.Node;
    sourceFile: ts.SourceFile;
  };

  labels: LabeledSpan[];
  help?: string;
  explanation?: string;
}

/**
 * Interpolate a descriptor's message template.
 * Placeholders without a matching argument are left in place.
 */
export function formatDiagnosticMessage(
  descriptor: DiagnosticDescriptor,
  args: Readonly<Record<string, string | number | undefined>>
): string {
  return descriptor.messageTemplate.replace(/\{(\w+)\}/g, (whole, key: string) => {
    const value = args[key];
    return value === undefined ? whole : String(value);
  });
}

// ============================================================================
// Diagnostic Builder
// ============================================================================

/**
 * Fluent builder for constructing rich diagnostics.
 */
export class DiagnosticBuilder {
  private diagnostic: RichDiagnostic;
  private args: Record<string, string | number | undefined> = {};

  constructor(
    private readonly descriptor: DiagnosticDescriptor,
    private readonly sourceFile: ts.SourceFile,
    private readonly emitter: (diagnostic: RichDiagnostic) => void
  ) {
    this.diagnostic = {
      code: descriptor.code,
      severity: descriptor.severity,
      category: descriptor.category,
      message: descriptor.messageTemplate,
      labels: [],
      explanation: descriptor.explanation,
    };
  }

  /**
   * Set the primary span for this diagnostic.
   */
  at(node: ts.Node): this {
    this.diagnostic.primarySpan = { node, sourceFile: this.sourceFile };
    return this;
  }

  /**
   * Provide arguments for message template interpolation.
   */
  withArgs(args: Readonly<Record<string, string | number | undefined>>): this {
    this.args = { ...this.args, ...args };
    return this;
  }

  /**
   * Add a secondary labeled span.
   */
  label(node: ts.Node, message: string): this {
    this.diagnostic.labels.push({ node, message });
    return this;
  }

  help(message: string): this {
    this.diagnostic.help = message;
    return this;
  }

  /**
   * Emit the diagnostic via the registered emitter.
   */
  emit(): RichDiagnostic {
    this.diagnostic.message = formatDiagnosticMessage(this.descriptor, this.args);
    this.emitter(this.diagnostic);
    return this.diagnostic;
  }
}

// ============================================================================
// Error Catalog: Shape Definitions (9401-9419)
// ============================================================================

export const TS9401: DiagnosticDescriptor = {
  code: 9401,
  severity: "error",
  category: DiagnosticCategory.ShapeDefinition,
  messageTemplate: "{type} fields must be string literals, got: {given}",
  explanation: `Every field of a tuple shape is named by a string literal.

Correct:
  const point = deftuple({ x: 0, y: 0 });
  const timestamp = deftuplep(["date", ["time", 0]]);

Incorrect:
  deftuple([1, 2])            // numbers are not field names
  deftuple({ [key]: 0 })      // computed keys are not static`,
};

export const TS9402: DiagnosticDescriptor = {
  code: 9402,
  severity: "error",
  category: DiagnosticCategory.ShapeDefinition,
  messageTemplate: "invalid value for tuple field {field}, {cause}",
  explanation: `Field defaults are copied into every construction site, so they must be
expressions that mean the same thing anywhere: literals, array and object
literals, and calls or \`new\` on globally reachable names.

Functions, classes, \`this\` and references to local variables cannot be
copied out of the definition.`,
};

export const TS9403: DiagnosticDescriptor = {
  code: 9403,
  severity: "error",
  category: DiagnosticCategory.CallSite,
  messageTemplate: 'tuple {shape} does not have the key: "{field}"',
  explanation: `The field name used at the call site is not part of the shape.
Field names are resolved at compile time against the shape definition.`,
};

export const TS9404: DiagnosticDescriptor = {
  code: 9404,
  severity: "error",
  category: DiagnosticCategory.CallSite,
  messageTemplate:
    "expected arguments to be a compile time field name or association list, got: {given}",
  explanation: `The two-argument form reads or updates fields of an existing tuple:

  point(tuple, "x")        // read
  point(tuple, { x: 1 })   // update

The second argument must be visible to the compiler as a string literal or
an object literal; it cannot be computed at run time.`,
};

export const TS9405: DiagnosticDescriptor = {
  code: 9405,
  severity: "error",
  category: DiagnosticCategory.Pattern,
  messageTemplate: "cannot invoke update style macro inside match",
  explanation: `Inside matches(value, pattern) the pattern describes the shape of a value;
an update builds a new value and has no meaning there.`,
};

export const TS9406: DiagnosticDescriptor = {
  code: 9406,
  severity: "error",
  category: DiagnosticCategory.ShapeDefinition,
  messageTemplate: '{type} field "{field}" is defined more than once',
  explanation: `Each field name may appear once in a shape. A repeated name would make
every later occurrence unreachable by name.`,
};

export const TS9407: DiagnosticDescriptor = {
  code: 9407,
  severity: "error",
  category: DiagnosticCategory.MacroExpansion,
  messageTemplate: "{message}",
  explanation: `A macro call could not be expanded. The message names the construct that
failed.`,
};

export const DIAGNOSTIC_CATALOG: ReadonlyMap<number, DiagnosticDescriptor> = new Map(
  [TS9401, TS9402, TS9403, TS9404, TS9405, TS9406, TS9407].map((d) => [d.code, d])
);

export function getDiagnosticDescriptor(code: number): DiagnosticDescriptor | undefined {
  return DIAGNOSTIC_CATALOG.get(code);
}

/**
 * Create a RichDiagnostic from a plain string message.
 */
export function plainToRichDiagnostic(
  message: string,
  severity: DiagnosticSeverity,
  node?: ts.Node,
  sourceFile?: ts.SourceFile
): RichDiagnostic {
  return {
    code: TS9407.code,
    severity,
    category: DiagnosticCategory.MacroExpansion,
    message,
    primarySpan: node && sourceFile ? { node, sourceFile } : undefined,
    labels: [],
  };
}

// ============================================================================
// CLI Renderer: Rust-Style Error Output
// ============================================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
} as const;

type ColorName = keyof typeof COLORS;

export interface CLIRenderOptions {
  /** Whether to use colors (default: the `color` config key) */
  colors?: boolean;
  /** Context lines before/after the error (default: 1) */
  contextLines?: number;
  /** Whether to show the explanation (default: false) */
  showExplanation?: boolean;
}

function severityColor(severity: DiagnosticSeverity): ColorName {
  switch (severity) {
    case "error":
      return "red";
    case "warning":
      return "yellow";
    case "info":
      return "cyan";
  }
}

function lineAndColumn(sourceFile: ts.SourceFile, pos: number): { line: number; column: number } {
  const { line, character } = sourceFile.getLineAndCharacterOfPosition(pos);
  return { line: line + 1, column: character + 1 };
}

/**
 * Render a RichDiagnostic in Rust-style format.
 *
 * @example Output:
 * ```
 * error[TS9403]: tuple point does not have the key: "w"
 *   --> src/space.ts:4:19
 *    |
 *  4 | const w = point(t, "w");
 *    |                    ^^^
 *    |
 *    = help: known fields: x, y, z
 * ```
 */
export function renderDiagnosticCLI(
  diagnostic: RichDiagnostic,
  options: CLIRenderOptions = {}
): string {
  const useColors = options.colors ?? config.get<boolean>("color") ?? false;
  const contextLines = options.contextLines ?? 1;
  const paint = (text: string, ...styles: ColorName[]): string =>
    useColors ? `${styles.map((s) => COLORS[s]).join("")}${text}${COLORS.reset}` : text;

  const clr = severityColor(diagnostic.severity);
  const lines: string[] = [
    `${paint(`${diagnostic.severity}[TS${diagnostic.code}]`, "bold", clr)}: ${paint(diagnostic.message, "bold")}`,
  ];

  if (diagnostic.primarySpan) {
    const { node, sourceFile } = diagnostic.primarySpan;
    const start = lineAndColumn(sourceFile, node.getStart(sourceFile));
    const end = lineAndColumn(sourceFile, node.getEnd());
    const sourceLines = sourceFile.text.split("\n");
    const firstLine = Math.max(1, start.line - contextLines);
    const lastLine = Math.min(sourceLines.length, end.line + contextLines);
    const width = Math.max(2, String(lastLine).length);
    const gutter = " ".repeat(width);

    lines.push(`  ${paint("-->", "blue")} ${sourceFile.fileName}:${start.line}:${start.column}`);
    lines.push(` ${gutter} ${paint("|", "blue")}`);

    for (let lineNum = firstLine; lineNum <= lastLine; lineNum++) {
      const text = sourceLines[lineNum - 1] ?? "";
      lines.push(` ${paint(String(lineNum).padStart(width), "blue")} ${paint("|", "blue")} ${text}`);
      if (lineNum >= start.line && lineNum <= end.line) {
        const from = lineNum === start.line ? start.column : 1;
        const to = lineNum === end.line ? end.column : text.length + 1;
        const underline = " ".repeat(from - 1) + "^".repeat(Math.max(1, to - from));
        lines.push(` ${gutter} ${paint("|", "blue")} ${paint(underline, clr)}`);
      }
    }

    for (const label of diagnostic.labels) {
      const labelStart = lineAndColumn(sourceFile, label.node.getStart(sourceFile));
      lines.push(
        ` ${gutter} ${paint("|", "blue")} ${paint(`${labelStart.line}:${labelStart.column}: ${label.message}`, "blue")}`
      );
    }

    lines.push(` ${gutter} ${paint("|", "blue")}`);
  }

  if (diagnostic.help) {
    lines.push(`   ${paint("= help:", "bold", "green")} ${diagnostic.help}`);
  }

  if (options.showExplanation && diagnostic.explanation) {
    lines.push("");
    lines.push(paint("Explanation:", "bold"));
    for (const line of diagnostic.explanation.split("\n")) {
      lines.push(`  ${line}`);
    }
  }

  return lines.join("\n");
}

/**
 * Render multiple diagnostics followed by a summary line.
 */
export function renderDiagnosticsCLI(
  diagnostics: readonly RichDiagnostic[],
  options: CLIRenderOptions = {}
): string {
  if (diagnostics.length === 0) {
    return "";
  }

  const blocks = diagnostics.map((d) => renderDiagnosticCLI(d, options));

  const errorCount = diagnostics.filter((d) => d.severity === "error").length;
  const warnCount = diagnostics.filter((d) => d.severity === "warning").length;
  const parts: string[] = [];
  if (errorCount > 0) parts.push(`${errorCount} error${errorCount > 1 ? "s" : ""}`);
  if (warnCount > 0) parts.push(`${warnCount} warning${warnCount > 1 ? "s" : ""}`);
  if (parts.length > 0) {
    blocks.push(`${parts.join(", ")} generated`);
  }

  return blocks.join("\n\n");
}

/**
 * Print multiple diagnostics with a summary to stderr.
 */
export function printDiagnostics(
  diagnostics: readonly RichDiagnostic[],
  options: CLIRenderOptions = {}
): void {
  if (diagnostics.length > 0) {
    console.error(renderDiagnosticsCLI(diagnostics, options));
  }
}
