/**
 * Per-file macro bindings and the shape table.
 *
 * Macro placeholders are recognized by their import: a named import of
 * `deftuple`, `deftuplep` or `matches` from the runtime module binds the
 * local name (following `as` renames) to the macro. Shape definitions are
 * found by scanning for const declarations initialized by a definition
 * macro call.
 */

import * as ts from "typescript";
import { DEFAULT_RUNTIME_MODULE, type ExpressionMacro, type MacroRegistry } from "@untagged/core";
import { tryReadDefinition, type DefinitionKind, type DefinitionResult } from "@untagged/tuple";

/** A local name bound to a macro by an import specifier. */
export interface MacroBinding {
  readonly macro: ExpressionMacro;
  readonly specifier: ts.ImportSpecifier;
  readonly declaration: ts.ImportDeclaration;
}

/** A `const name = deftuple(...)` declaration and what it defines. */
export interface DefinitionSite {
  readonly kind: DefinitionKind;
  readonly statement: ts.VariableStatement;
  readonly declaration: ts.VariableDeclaration;
  readonly call: ts.CallExpression;
  readonly result: DefinitionResult;
}

function isDefinitionKind(name: string): name is DefinitionKind {
  return name === "deftuple" || name === "deftuplep";
}

/**
 * Map local names to the macros they import from one of `runtimeModules`.
 */
export function scanMacroImports(
  sourceFile: ts.SourceFile,
  registry: MacroRegistry,
  runtimeModules: ReadonlySet<string>
): Map<string, MacroBinding> {
  const bindings = new Map<string, MacroBinding>();

  for (const stmt of sourceFile.statements) {
    if (!ts.isImportDeclaration(stmt) || !ts.isStringLiteral(stmt.moduleSpecifier)) continue;
    if (!runtimeModules.has(stmt.moduleSpecifier.text)) continue;

    const clause = stmt.importClause;
    if (!clause || clause.isTypeOnly) continue;
    const named = clause.namedBindings;
    if (!named || !ts.isNamedImports(named)) continue;

    for (const specifier of named.elements) {
      if (specifier.isTypeOnly) continue;
      const exportName = (specifier.propertyName ?? specifier.name).text;
      const macro = registry.getByModuleExport(DEFAULT_RUNTIME_MODULE, exportName);
      if (macro) {
        bindings.set(specifier.name.text, { macro, specifier, declaration: stmt });
      }
    }
  }

  return bindings;
}

/**
 * Find every definition in a file, at any depth.
 */
export function collectDefinitions(
  sourceFile: ts.SourceFile,
  bindings: ReadonlyMap<string, MacroBinding>
): DefinitionSite[] {
  const sites: DefinitionSite[] = [];

  const visit = (node: ts.Node): void => {
    if (ts.isVariableStatement(node)) {
      for (const declaration of node.declarationList.declarations) {
        const call = declaration.initializer;
        if (!call || !ts.isCallExpression(call) || !ts.isIdentifier(call.expression)) continue;
        const kind = bindings.get(call.expression.text)?.macro.name;
        if (kind === undefined || !isDefinitionKind(kind)) continue;
        sites.push({
          kind,
          statement: node,
          declaration,
          call,
          result: tryReadDefinition(kind, node.declarationList, declaration, call, sourceFile),
        });
      }
    }
    ts.forEachChild(node, visit);
  };

  visit(sourceFile);
  return sites;
}

/**
 * Shape lookup across the files of one compilation.
 *
 * With a type checker a callee resolves through its symbol (aliases
 * followed) to a definition in any file; a callee bound to anything else is
 * not a shape. Without a checker, or for synthesized callees and names the
 * checker cannot bind, a bare identifier matches a definition of that name in
 * the current file.
 */
export class ShapeTable {
  private bindingsByFile = new Map<ts.SourceFile, Map<string, MacroBinding>>();
  private sitesByFile = new Map<ts.SourceFile, DefinitionSite[]>();

  constructor(
    private readonly registry: MacroRegistry,
    private readonly runtimeModules: ReadonlySet<string>,
    private readonly checker: ts.TypeChecker | undefined
  ) {}

  bindingsFor(sourceFile: ts.SourceFile): Map<string, MacroBinding> {
    let bindings = this.bindingsByFile.get(sourceFile);
    if (!bindings) {
      bindings = scanMacroImports(sourceFile, this.registry, this.runtimeModules);
      this.bindingsByFile.set(sourceFile, bindings);
    }
    return bindings;
  }

  sitesFor(sourceFile: ts.SourceFile): DefinitionSite[] {
    let sites = this.sitesByFile.get(sourceFile);
    if (!sites) {
      sites = collectDefinitions(sourceFile, this.bindingsFor(sourceFile));
      this.sitesByFile.set(sourceFile, sites);
    }
    return sites;
  }

  /** The definition a callee refers to, if any. */
  resolve(callee: ts.Expression, currentFile: ts.SourceFile): DefinitionSite | undefined {
    const symbol = this.symbolOf(callee);
    if (symbol) return this.siteOfSymbol(symbol);

    if (!ts.isIdentifier(callee)) return undefined;
    return this.sitesFor(currentFile).find((site) => {
      const name = site.declaration.name;
      return ts.isIdentifier(name) && name.text === callee.text;
    });
  }

  /** The callee's symbol with aliases followed; undefined when the checker cannot say. */
  private symbolOf(callee: ts.Expression): ts.Symbol | undefined {
    if (!this.checker || callee.pos < 0) return undefined;

    const location = ts.isPropertyAccessExpression(callee) ? callee.name : callee;
    const symbol = this.checker.getSymbolAtLocation(location);
    if (symbol && symbol.flags & ts.SymbolFlags.Alias) {
      return this.checker.getAliasedSymbol(symbol);
    }
    return symbol;
  }

  private siteOfSymbol(symbol: ts.Symbol): DefinitionSite | undefined {
    const declaration = symbol.valueDeclaration;
    if (!declaration || !ts.isVariableDeclaration(declaration)) return undefined;

    return this.sitesFor(declaration.getSourceFile()).find(
      (site) => site.declaration === declaration
    );
  }
}
