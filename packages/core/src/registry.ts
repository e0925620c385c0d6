/**
 * Macro Registry - Stores and retrieves macro definitions
 */

import type { ExpressionMacro, MacroDefinition, MacroRegistry } from "./types.js";

// ============================================================================
// Macro Registry Implementation
// ============================================================================

/**
 * Key for module-scoped macro lookup: "module::exportName"
 */
function moduleKey(mod: string, exportName: string): string {
  return `${mod}::${exportName}`;
}

class MacroRegistryImpl implements MacroRegistry {
  private expressionMacros = new Map<string, ExpressionMacro>();

  /**
   * Secondary index: module-scoped lookup for macros that declare a `module`.
   */
  private moduleScopedMacros = new Map<string, MacroDefinition>();

  /**
   * Two macros are the same when they share name and module. Module re-imports
   * can create new object instances for the same definition.
   */
  private isSameMacro(existing: MacroDefinition, incoming: MacroDefinition): boolean {
    if (existing === incoming) return true;
    return existing.name === incoming.name && existing.module === incoming.module;
  }

  register(macro: MacroDefinition): void {
    const existing = this.expressionMacros.get(macro.name);
    if (existing) {
      if (this.isSameMacro(existing, macro)) return;
      throw new Error(`Expression macro '${macro.name}' is already registered`);
    }
    this.expressionMacros.set(macro.name, macro);

    if (macro.module) {
      const exportName = macro.exportName ?? macro.name;
      this.moduleScopedMacros.set(moduleKey(macro.module, exportName), macro);
    }
  }

  getByModuleExport(mod: string, exportName: string): MacroDefinition | undefined {
    return this.moduleScopedMacros.get(moduleKey(mod, exportName));
  }

  getAll(): MacroDefinition[] {
    return [...this.expressionMacros.values()];
  }
}

/** Create a new isolated registry (one per transformer instance) */
export function createRegistry(): MacroRegistry {
  return new MacroRegistryImpl();
}

// ============================================================================
// Macro Definition Helpers
// ============================================================================

/**
 * Define an expression macro with type inference
 */
export function defineExpressionMacro(definition: Omit<ExpressionMacro, "kind">): ExpressionMacro {
  return {
    ...definition,
    kind: "expression",
  };
}

/**
 * Register multiple macros at once
 */
export function registerMacros(registry: MacroRegistry, ...macros: MacroDefinition[]): void {
  for (const macro of macros) {
    registry.register(macro);
  }
}
