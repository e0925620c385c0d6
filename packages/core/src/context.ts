/**
 * MacroContext Implementation - Provides utilities for macro expansion
 */

import * as ts from "typescript";
import type { MacroContext } from "./types.js";
import {
  DiagnosticBuilder,
  plainToRichDiagnostic,
  type DiagnosticDescriptor,
  type DiagnosticSeverity,
  type RichDiagnostic,
} from "./diagnostics.js";
import { parseExpression, printNode } from "./ast-utils.js";

export class MacroContextImpl implements MacroContext {
  private diagnostics: RichDiagnostic[] = [];
  private uniqueNameCounter = 0;
  private expander: ((node: ts.Expression) => ts.Expression) | undefined;

  public readonly typeChecker: ts.TypeChecker | undefined;

  constructor(
    public readonly program: ts.Program | undefined,
    public readonly sourceFile: ts.SourceFile,
    public readonly factory: ts.NodeFactory
  ) {
    this.typeChecker = program?.getTypeChecker();
  }

  // -------------------------------------------------------------------------
  // Syntax Utilities
  // -------------------------------------------------------------------------

  parseExpression(code: string): ts.Expression {
    return parseExpression(code);
  }

  printNode(node: ts.Node): string {
    return printNode(node, this.sourceFile);
  }

  // -------------------------------------------------------------------------
  // Nested Expansion
  // -------------------------------------------------------------------------

  /** Install the visitor that expands nested macro calls. */
  setExpander(expander: (node: ts.Expression) => ts.Expression): void {
    this.expander = expander;
  }

  expandMacros(node: ts.Expression): ts.Expression {
    return this.expander ? this.expander(node) : node;
  }

  // -------------------------------------------------------------------------
  // Diagnostics
  // -------------------------------------------------------------------------

  diagnostic(descriptor: DiagnosticDescriptor): DiagnosticBuilder {
    return new DiagnosticBuilder(descriptor, this.sourceFile, (d) => this.diagnostics.push(d));
  }

  reportError(node: ts.Node, message: string): void {
    this.report("error", node, message);
  }

  reportWarning(node: ts.Node, message: string): void {
    this.report("warning", node, message);
  }

  private report(severity: DiagnosticSeverity, node: ts.Node, message: string): void {
    // Synthetic nodes have no position to point at.
    const span = node.pos >= 0 ? node : undefined;
    this.diagnostics.push(plainToRichDiagnostic(message, severity, span, this.sourceFile));
  }

  getDiagnostics(): RichDiagnostic[] {
    return [...this.diagnostics];
  }

  // -------------------------------------------------------------------------
  // Unique Name Generation
  // -------------------------------------------------------------------------

  generateUniqueName(prefix: string): ts.Identifier {
    const name = `__untagged_${prefix}_${this.uniqueNameCounter++}__`;
    return this.factory.createIdentifier(name);
  }
}

/**
 * Create a macro context for a source file.
 *
 * @param program - Omit for transpile-only expansion; `typeChecker` is then
 *   undefined.
 */
export function createMacroContext(
  sourceFile: ts.SourceFile,
  transformContext: ts.TransformationContext | undefined,
  program?: ts.Program
): MacroContextImpl {
  return new MacroContextImpl(program, sourceFile, transformContext?.factory ?? ts.factory);
}
