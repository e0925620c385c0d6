/**
 * Core types for the untagged macro system
 */

import * as ts from "typescript";
import type { DiagnosticBuilder, DiagnosticDescriptor, RichDiagnostic } from "./diagnostics.js";

// ============================================================================
// Macro Context - Available to all macros during expansion
// ============================================================================

export interface MacroContext {
  /**
   * The TypeScript Program instance.
   * Absent when the transformer runs in transpile-only mode.
   */
  program: ts.Program | undefined;

  /** Type checker for semantic analysis (absent in transpile-only mode) */
  typeChecker: ts.TypeChecker | undefined;

  /** Current source file being processed */
  sourceFile: ts.SourceFile;

  /** TypeScript factory for creating nodes */
  factory: ts.NodeFactory;

  // -------------------------------------------------------------------------
  // Syntax Utilities
  // -------------------------------------------------------------------------

  /** Parse a code string into an expression */
  parseExpression(code: string): ts.Expression;

  /** Print a node, using the current source file for original text */
  printNode(node: ts.Node): string;

  /**
   * Expand macro calls nested inside `node`.
   * Returns `node` unchanged when no transformer is driving the expansion.
   */
  expandMacros(node: ts.Expression): ts.Expression;

  // -------------------------------------------------------------------------
  // Diagnostics
  // -------------------------------------------------------------------------

  /** Start a structured diagnostic from a catalog entry */
  diagnostic(descriptor: DiagnosticDescriptor): DiagnosticBuilder;

  /** Report a compile-time error */
  reportError(node: ts.Node, message: string): void;

  /** Report a compile-time warning */
  reportWarning(node: ts.Node, message: string): void;

  /** Diagnostics collected so far */
  getDiagnostics(): RichDiagnostic[];

  // -------------------------------------------------------------------------
  // Unique Name Generation
  // -------------------------------------------------------------------------

  /** Generate a unique identifier to avoid name collisions */
  generateUniqueName(prefix: string): ts.Identifier;
}

// ============================================================================
// Macro Definitions
// ============================================================================

/** Base interface for all macro definitions */
export interface MacroDefinitionBase {
  /** Unique name of the macro */
  name: string;

  /** Optional description for documentation */
  description?: string;

  /**
   * The module specifier that exports this macro's placeholder function.
   * When set, the macro is only activated when the user imports the
   * placeholder from this module.
   *
   * When undefined, the macro is activated by name alone.
   */
  module?: string;

  /**
   * The exported name of the placeholder in the source module.
   * Defaults to `name` if not specified.
   */
  exportName?: string;
}

/** Expression macro - transforms call expressions */
export interface ExpressionMacro extends MacroDefinitionBase {
  kind: "expression";

  /**
   * Expand the macro call into new AST nodes
   * @param ctx - The macro context
   * @param callExpr - The macro call expression
   * @param args - The arguments passed to the macro
   */
  expand(
    ctx: MacroContext,
    callExpr: ts.CallExpression,
    args: readonly ts.Expression[]
  ): ts.Expression;
}

/** Union of all macro types */
export type MacroDefinition = ExpressionMacro;

// ============================================================================
// Macro Registry
// ============================================================================

export interface MacroRegistry {
  /** Register a new macro */
  register(macro: MacroDefinition): void;

  /** Look up a macro by its source module and export name */
  getByModuleExport(mod: string, exportName: string): MacroDefinition | undefined;

  /** Get all registered macros */
  getAll(): MacroDefinition[];
}
