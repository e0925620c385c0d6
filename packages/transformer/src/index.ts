/**
 * @untagged/transformer - TypeScript transformer that expands tuple macros
 *
 * Runs as a `before` transformer (ts.transform, program.emit, transpileModule
 * or ts-patch) and rewrites:
 *
 * - `const point = deftuple({ x: 0, y: 0 })` into a frozen shape info object
 * - shape calls such as `point()`, `point(t, "x")`, `point(t, { y: 1 })`
 * - `matches(value, point({ x: 1, y }))` into an inline tuple test
 */

import * as ts from "typescript";
import {
  DEFAULT_RUNTIME_MODULE,
  config,
  createMacroContext,
  createRegistry,
  createThrowingExpression,
  registerMacros,
  type ExpressionMacro,
  type MacroContextImpl,
  type RichDiagnostic,
} from "@untagged/core";
import {
  MacroUsageError,
  TupleMacroError,
  createMatchesMacro,
  createShapeMacro,
  deftupleMacro,
  deftuplepMacro,
  emitShapeInfo,
  fieldNames,
  type ShapeDescriptor,
  type ShapeServices,
} from "@untagged/tuple";
import { ShapeTable, type DefinitionSite, type MacroBinding } from "./definitions.js";

/** Local name of the injected run-time namespace import. */
export const RUNTIME_NAMESPACE = "__untagged_runtime";

/**
 * Configuration for the transformer
 */
export interface TupleTransformerOptions {
  /** Enables resolution of shapes defined in other files */
  program?: ts.Program;

  /** Enable verbose logging (default: the `verbose` config key) */
  verbose?: boolean;

  /** Module the macros are imported from and run-time helpers are loaded from */
  runtimeModule?: string;

  /** Receives every diagnostic produced while expanding */
  onDiagnostic?: (diagnostic: RichDiagnostic) => void;
}

/** ts-patch style configuration (the program is passed separately) */
export type MacroTransformerConfig = Omit<TupleTransformerOptions, "program">;

function configuredRuntimeModule(): string {
  const value = config.get("runtimeModule");
  return typeof value === "string" ? value : DEFAULT_RUNTIME_MODULE;
}

/**
 * Create the transformer factory.
 */
export function createTupleTransformer(
  options: TupleTransformerOptions = {}
): ts.TransformerFactory<ts.SourceFile> {
  const verbose = options.verbose ?? config.get("verbose") === true;
  const runtimeModule = options.runtimeModule ?? configuredRuntimeModule();
  const runtimeModules = new Set([DEFAULT_RUNTIME_MODULE, runtimeModule]);

  // `matches` is registered once; it reaches the file being transformed
  // through these forwarding services.
  let active: MacroTransformer | undefined;
  const services: ShapeServices = {
    resolveShape: (callee) => active?.resolveShape(callee),
    runtimeNamespace: () => {
      if (!active) throw new Error("matches() expanded outside a transformation");
      return active.runtimeNamespace();
    },
  };

  const registry = createRegistry();
  registerMacros(registry, deftupleMacro, deftuplepMacro, createMatchesMacro(services));

  const shapes = new ShapeTable(registry, runtimeModules, options.program?.getTypeChecker());

  if (verbose) {
    console.log("[untagged] Initializing transformer");
    console.log(
      `[untagged] Registered macros: ${registry
        .getAll()
        .map((m) => m.name)
        .join(", ")}`
    );
  }

  return (context: ts.TransformationContext) => {
    return (sourceFile: ts.SourceFile) => {
      if (verbose) {
        console.log(`[untagged] Processing: ${sourceFile.fileName}`);
      }

      const ctx = createMacroContext(sourceFile, context, options.program);
      const transformer = new MacroTransformer(ctx, context, shapes, runtimeModule, verbose);

      const previous = active;
      active = transformer;
      let result: ts.SourceFile;
      try {
        result = transformer.transformSourceFile(sourceFile);
      } finally {
        active = previous;
      }

      for (const diag of ctx.getDiagnostics()) {
        options.onDiagnostic?.(diag);

        // Also log for build tools that don't surface diagnostics
        if (verbose) {
          const prefix = diag.severity === "error" ? "ERROR" : "WARNING";
          const span = diag.primarySpan;
          const loc = span
            ? ` at ${sourceFile.fileName}:${sourceFile.getLineAndCharacterOfPosition(span.node.getStart(sourceFile)).line + 1}`
            : "";
          console.log(`[untagged ${prefix}]${loc} ${diag.message}`);
        }
      }

      return result;
    };
  };
}

/**
 * Create the TypeScript transformer factory.
 * This is the entry point called by ts-patch.
 */
export default function macroTransformerFactory(
  program: ts.Program,
  transformerConfig?: MacroTransformerConfig
): ts.TransformerFactory<ts.SourceFile> {
  return createTupleTransformer({ ...transformerConfig, program });
}

/** Modifiers for a rewritten definition and the names to export after it. */
/** A macro a call expands through, with the definition it came from for shape calls. */
interface ResolvedMacro {
  macro: ExpressionMacro;
  site?: DefinitionSite;
}

interface DefinitionVisibility {
  modifiers: readonly ts.ModifierLike[] | undefined;
  exportNames: readonly string[];
}

/**
 * The per-file transformer that handles macro expansion
 */
class MacroTransformer {
  /**
   * Import specifiers that resolved to macros during expansion. After the
   * visitor pass they are removed from their import declarations, and a
   * declaration left with nothing is removed entirely.
   */
  private macroImportSpecifiers = new Map<ts.ImportDeclaration, Set<ts.ImportSpecifier>>();

  private shapeMacros = new Map<DefinitionSite, ExpressionMacro>();
  private sitesByStatement = new Map<ts.VariableStatement, DefinitionSite[]>();
  private bindings: ReadonlyMap<string, MacroBinding>;
  private needsRuntimeImport = false;

  private readonly visitor = (node: ts.Node): ts.Node => this.visit(node);

  constructor(
    private ctx: MacroContextImpl,
    private transformContext: ts.TransformationContext,
    private shapes: ShapeTable,
    private runtimeModule: string,
    private verbose: boolean
  ) {
    this.bindings = shapes.bindingsFor(ctx.sourceFile);
    for (const site of shapes.sitesFor(ctx.sourceFile)) {
      const group = this.sitesByStatement.get(site.statement) ?? [];
      group.push(site);
      this.sitesByStatement.set(site.statement, group);
    }
    ctx.setExpander((node) => ts.visitNode(node, this.visitor, ts.isExpression));
  }

  // ---------------------------------------------------------------------------
  // Services for shape and matches macros
  // ---------------------------------------------------------------------------

  resolveShape(callee: ts.Expression): ShapeDescriptor | undefined {
    const site = this.shapes.resolve(callee, this.ctx.sourceFile);
    return site?.result.ok ? site.result.shape : undefined;
  }

  runtimeNamespace(): ts.Identifier {
    this.needsRuntimeImport = true;
    return this.ctx.factory.createIdentifier(RUNTIME_NAMESPACE);
  }

  // ---------------------------------------------------------------------------
  // Visiting
  // ---------------------------------------------------------------------------

  transformSourceFile(sourceFile: ts.SourceFile): ts.SourceFile {
    const statements = this.visitStatements(sourceFile.statements, true);
    const cleaned = this.cleanupMacroImports(statements);
    const withRuntime = this.needsRuntimeImport ? this.addRuntimeImport(cleaned) : cleaned;
    return this.ctx.factory.updateSourceFile(sourceFile, withRuntime);
  }

  /**
   * Visit a node and potentially transform it
   */
  visit(node: ts.Node): ts.Node {
    const factory = this.ctx.factory;

    if (ts.isBlock(node)) {
      return factory.updateBlock(node, this.visitStatements(node.statements, false));
    }
    if (ts.isModuleBlock(node)) {
      return factory.updateModuleBlock(node, this.visitStatements(node.statements, false));
    }
    if (ts.isCaseClause(node)) {
      const expression = ts.visitNode(node.expression, this.visitor, ts.isExpression);
      return factory.updateCaseClause(node, expression, this.visitStatements(node.statements, false));
    }
    if (ts.isDefaultClause(node)) {
      return factory.updateDefaultClause(node, this.visitStatements(node.statements, false));
    }

    if (ts.isCallExpression(node)) {
      const result = this.tryExpandCall(node);
      if (result !== undefined) {
        return result;
      }
    }

    return ts.visitEachChild(node, this.visitor, this.transformContext);
  }

  /**
   * Visit a statement list, expanding definition statements in place.
   */
  private visitStatements(
    statements: readonly ts.Statement[],
    topLevel: boolean
  ): ts.Statement[] {
    return statements.flatMap((stmt) => {
      const sites = ts.isVariableStatement(stmt) ? this.sitesByStatement.get(stmt) : undefined;
      if (sites && ts.isVariableStatement(stmt)) {
        return this.expandDefinitionStatement(stmt, sites, topLevel);
      }
      return [ts.visitNode(stmt, this.visitor, ts.isStatement)];
    });
  }

  // ---------------------------------------------------------------------------
  // Definitions
  // ---------------------------------------------------------------------------

  private expandDefinitionStatement(
    stmt: ts.VariableStatement,
    sites: readonly DefinitionSite[],
    topLevel: boolean
  ): ts.Statement[] {
    const factory = this.ctx.factory;
    const kinds = new Set(sites.map((s) => s.kind));
    const mixed = kinds.size > 1;
    if (mixed) {
      this.reportMacroError(
        new MacroUsageError("deftuple() and deftuplep() cannot share a declaration", stmt),
        stmt
      );
    }

    const declarations = stmt.declarationList.declarations.map((decl) => {
      const site = sites.find((s) => s.declaration === decl);
      if (!site) {
        return ts.visitNode(decl, this.visitor, ts.isVariableDeclaration);
      }
      this.recordMacroImport(site.call.expression);
      const initializer = mixed
        ? createThrowingExpression(factory, "deftuple() and deftuplep() cannot share a declaration")
        : this.expandDefinition(site);
      return factory.updateVariableDeclaration(
        decl,
        decl.name,
        decl.exclamationToken,
        decl.type,
        initializer
      );
    });

    const { modifiers, exportNames }: DefinitionVisibility = mixed
      ? { modifiers: stmt.modifiers, exportNames: [] }
      : this.definitionVisibility(stmt, sites, topLevel);
    const updated = factory.updateVariableStatement(
      stmt,
      modifiers,
      factory.updateVariableDeclarationList(stmt.declarationList, declarations)
    );
    if (exportNames.length === 0) return [updated];

    // A separate export clause, so module transforms see a plain local binding.
    return [
      updated,
      factory.createExportDeclaration(
        undefined,
        false,
        factory.createNamedExports(
          exportNames.map((name) => factory.createExportSpecifier(false, undefined, name))
        )
      ),
    ];
  }

  private expandDefinition(site: DefinitionSite): ts.Expression {
    if (!site.result.ok) {
      return this.reportMacroError(site.result.error, site.call);
    }
    const shape = site.result.shape;
    if (this.verbose) {
      console.log(`[untagged] Registered shape ${shape.name}(${fieldNames(shape).join(", ")})`);
    }
    return emitShapeInfo(this.ctx.factory, shape);
  }

  /**
   * `deftuple` shapes are exported from the module; `deftuplep` shapes never
   * are.
   */
  private definitionVisibility(
    stmt: ts.VariableStatement,
    sites: readonly DefinitionSite[],
    topLevel: boolean
  ): DefinitionVisibility {
    const kind = sites[0]?.kind;
    const names = sites.flatMap((s) =>
      ts.isIdentifier(s.declaration.name) ? [s.declaration.name.text] : []
    );
    const modifiers = stmt.modifiers ?? [];
    const exported = modifiers.some((m) => m.kind === ts.SyntaxKind.ExportKeyword);

    if (kind === "deftuple" && !exported) {
      if (topLevel) {
        const definedNames = sites.flatMap((s) =>
          s.result.ok && ts.isIdentifier(s.declaration.name) ? [s.declaration.name.text] : []
        );
        return { modifiers: stmt.modifiers, exportNames: definedNames };
      }
      this.ctx.reportWarning(
        stmt,
        `deftuple() shape ${names.join(", ")} is not at module level and cannot be exported`
      );
    }

    if (kind === "deftuplep" && exported) {
      this.ctx.reportWarning(stmt, `deftuplep() shape ${names.join(", ")} is private; export removed`);
      return {
        modifiers: modifiers.filter((m) => m.kind !== ts.SyntaxKind.ExportKeyword),
        exportNames: [],
      };
    }

    return { modifiers: stmt.modifiers, exportNames: [] };
  }

  // ---------------------------------------------------------------------------
  // Macro expansion
  // ---------------------------------------------------------------------------

  private macroFor(node: ts.CallExpression): ResolvedMacro | undefined {
    const callee = node.expression;
    if (ts.isIdentifier(callee)) {
      const binding = this.bindings.get(callee.text);
      if (binding && this.isBoundTo(callee, binding)) {
        this.recordMacroImport(callee);
        return { macro: binding.macro };
      }
    }

    const site = this.shapes.resolve(callee, this.ctx.sourceFile);
    if (!site?.result.ok) return undefined;

    let macro = this.shapeMacros.get(site);
    if (!macro) {
      macro = createShapeMacro(site.result.shape, this);
      this.shapeMacros.set(site, macro);
    }
    return { macro, site };
  }

  /** Whether an identifier refers to the import, rather than a local that shadows it. */
  private isBoundTo(id: ts.Identifier, binding: MacroBinding): boolean {
    const checker = this.ctx.typeChecker;
    if (!checker || id.pos < 0) return true;
    const declarations = checker.getSymbolAtLocation(id)?.declarations;
    return declarations ? declarations.includes(binding.specifier) : true;
  }

  private tryExpandCall(node: ts.CallExpression): ts.Expression | undefined {
    const resolved = this.macroFor(node);
    if (!resolved) return undefined;
    const { macro, site } = resolved;

    if (this.verbose) {
      console.log(`[untagged] Expanding ${macro.name}()`);
    }

    try {
      const result = macro.expand(this.ctx, node, node.arguments);
      const visited = ts.visitNode(result, this.visitor, ts.isExpression);
      return ts.setSourceMapRange(visited, node);
    } catch (error) {
      if (error instanceof TupleMacroError) {
        return this.reportMacroError(error, node, site);
      }
      const message = error instanceof Error ? error.message : String(error);
      this.ctx.reportError(node, `Macro expansion failed: ${message}`);
      return createThrowingExpression(
        this.ctx.factory,
        `untagged: expansion of '${macro.name}' failed: ${message}`
      );
    }
  }

  /**
   * Report a generation error and return the expression that replaces the
   * failed call.
   */
  private reportMacroError(
    error: TupleMacroError,
    fallback: ts.Node,
    site?: DefinitionSite
  ): ts.Expression {
    const at = error.node && error.node.pos >= 0 ? error.node : fallback;
    const builder = this.ctx.diagnostic(error.descriptor).at(at).withArgs(error.args);
    if (error.help) {
      builder.help(error.help);
    }
    // Label positions are read from the reporting file.
    if (site && site.declaration.getSourceFile() === this.ctx.sourceFile) {
      builder.label(site.declaration.name, `${site.kind}() shape defined here`);
    }
    builder.emit();
    return createThrowingExpression(this.ctx.factory, error.message);
  }

  // ---------------------------------------------------------------------------
  // Imports
  // ---------------------------------------------------------------------------

  private recordMacroImport(callee: ts.Expression): void {
    if (!ts.isIdentifier(callee)) return;
    const binding = this.bindings.get(callee.text);
    if (!binding) return;

    let set = this.macroImportSpecifiers.get(binding.declaration);
    if (!set) {
      set = new Set();
      this.macroImportSpecifiers.set(binding.declaration, set);
    }
    set.add(binding.specifier);
  }

  /**
   * Remove or trim import declarations whose specifiers resolved to macros.
   */
  private cleanupMacroImports(statements: ts.Statement[]): ts.Statement[] {
    if (this.macroImportSpecifiers.size === 0) return statements;

    const factory = this.ctx.factory;
    const result: ts.Statement[] = [];

    for (const stmt of statements) {
      const tracked = ts.isImportDeclaration(stmt) ? this.macroImportSpecifiers.get(stmt) : undefined;
      const importClause = ts.isImportDeclaration(stmt) ? stmt.importClause : undefined;
      const namedBindings = importClause?.namedBindings;
      if (
        !tracked ||
        !ts.isImportDeclaration(stmt) ||
        !importClause ||
        !namedBindings ||
        !ts.isNamedImports(namedBindings)
      ) {
        result.push(stmt);
        continue;
      }

      const moduleSpec = ts.isStringLiteral(stmt.moduleSpecifier)
        ? stmt.moduleSpecifier.text
        : "<unknown>";
      const remaining = namedBindings.elements.filter((spec) => !tracked.has(spec));

      if (remaining.length === 0 && !importClause.name) {
        if (this.verbose) {
          console.log(`[untagged] Removing macro-only import: import ... from "${moduleSpec}"`);
        }
        continue;
      }

      const newImportClause = factory.updateImportClause(
        importClause,
        importClause.isTypeOnly,
        importClause.name,
        remaining.length > 0 ? factory.updateNamedImports(namedBindings, remaining) : undefined
      );

      if (this.verbose) {
        console.log(`[untagged] Trimmed macro specifiers from import: "${moduleSpec}"`);
      }

      result.push(
        factory.updateImportDeclaration(
          stmt,
          stmt.modifiers,
          newImportClause,
          stmt.moduleSpecifier,
          stmt.attributes
        )
      );
    }

    return result;
  }

  /**
   * `import * as __untagged_runtime from "<runtime module>"`, placed after
   * any prologue directives.
   */
  private addRuntimeImport(statements: ts.Statement[]): ts.Statement[] {
    const factory = this.ctx.factory;
    const runtimeImport = factory.createImportDeclaration(
      undefined,
      factory.createImportClause(
        false,
        undefined,
        factory.createNamespaceImport(factory.createIdentifier(RUNTIME_NAMESPACE))
      ),
      factory.createStringLiteral(this.runtimeModule)
    );

    const prologue = statements.findIndex(
      (s) => !ts.isExpressionStatement(s) || !ts.isStringLiteral(s.expression)
    );
    const at = prologue === -1 ? statements.length : prologue;
    return [...statements.slice(0, at), runtimeImport, ...statements.slice(at)];
  }
}

// Also export for programmatic use
export { MacroTransformer };

export {
  ShapeTable,
  collectDefinitions,
  scanMacroImports,
  type DefinitionSite,
  type MacroBinding,
} from "./definitions.js";

export {
  TransformationPipeline,
  createPipeline,
  transformCode,
  type TransformResult,
  type PipelineOptions,
} from "./pipeline.js";
