/**
 * Core module exports for @untagged/core
 *
 * This package provides the macro system infrastructure (types, registry,
 * context), the diagnostics catalog and the configuration system.
 */

export * from "./types.js";
export * from "./registry.js";
export * from "./context.js";

// AST helpers shared by macro implementations
export {
  parseExpression,
  unwrapExpression,
  getStaticString,
  getPropertyNameText,
  printNode,
  createThrowingExpression,
} from "./ast-utils.js";

// Configuration System
export {
  config,
  defineConfig,
  DEFAULT_RUNTIME_MODULE,
  MODULE_NAME,
  type UntaggedConfig,
} from "./config.js";

// Diagnostics System
export * from "./diagnostics.js";
