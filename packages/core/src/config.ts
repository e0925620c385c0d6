/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: UNTAGGED_* (for CI overrides)
 * 3. Config files: untagged.config.js, .untaggedrc, package.json#untagged
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@untagged/core";
 *
 * config.get<boolean>("verbose")          // → boolean
 * config.get<string>("runtimeModule")     // → "@untagged/runtime"
 *
 * config.set({ verbose: true });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/**
 * Full untagged configuration schema.
 */
export interface UntaggedConfig {
  /** Log transformer activity to stdout */
  verbose?: boolean;
  /** Module imported by generated code that needs run-time helpers */
  runtimeModule?: string;
  /** Colorize CLI diagnostics */
  color?: boolean;
  /** Custom user configuration */
  [key: string]: unknown;
}

export const MODULE_NAME = "untagged";

export const DEFAULT_RUNTIME_MODULE = "@untagged/runtime";

// ============================================================================
// Global State
// ============================================================================

let configStore: UntaggedConfig = {};
let configLoaded = false;
let configFilePath: string | undefined;
let overrides: UntaggedConfig = {};

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   UNTAGGED_VERBOSE=1                       → { verbose: true }
 *   UNTAGGED_RUNTIME_MODULE=./rt.js          → { runtimeModule: "./rt.js" }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv): UntaggedConfig {
  const envConfig: UntaggedConfig = {};
  const PREFIX = `${MODULE_NAME.toUpperCase()}_`;

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    // UNTAGGED_RUNTIME_MODULE → runtimeModule
    const configKey = key
      .slice(PREFIX.length)
      .toLowerCase()
      .replace(/_([a-z])/g, (_m, c: string) => c.toUpperCase());

    let parsedValue: unknown;
    if (value === "1" || value === "true") {
      parsedValue = true;
    } else if (value === "0" || value === "false" || value === "") {
      parsedValue = false;
    } else if (/^\d+$/.test(value)) {
      parsedValue = parseInt(value, 10);
    } else {
      parsedValue = value;
    }

    envConfig[configKey] = parsedValue;
  }

  return envConfig;
}

// ============================================================================
// Config File Loading
// ============================================================================

function isConfigObject(value: unknown): value is UntaggedConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

interface ConfigFile {
  filepath: string;
  config: UntaggedConfig;
}

/**
 * Find the config file for `searchFrom` (default: the working directory).
 * The synchronous explorer has no loader for ES module files, so `.mjs`
 * places are not searched.
 */
function findConfigFile(searchFrom?: string): ConfigFile | undefined {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `.${MODULE_NAME}rc.js`,
      `.${MODULE_NAME}rc.cjs`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });
  const result = explorer.search(searchFrom);
  if (!result || result.isEmpty) {
    return undefined;
  }
  if (!isConfigObject(result.config)) {
    throw new Error(`${result.filepath}: ${MODULE_NAME} configuration must be an object`);
  }
  return { filepath: result.filepath, config: result.config };
}

/**
 * Load configuration from the config file found from `searchFrom`.
 */
function loadConfigFromFiles(searchFrom?: string): UntaggedConfig {
  return findConfigFile(searchFrom)?.config ?? {};
}

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;

  const defaults: UntaggedConfig = {
    verbose: false,
    runtimeModule: DEFAULT_RUNTIME_MODULE,
    color: false,
  };

  const file = findConfigFile();
  configFilePath = file?.filepath;

  configStore = {
    ...defaults,
    ...file?.config,
    ...loadConfigFromEnv(process.env),
    ...overrides,
  };
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

function get<T = unknown>(key: string): T | undefined;
function get(key: string): unknown {
  initializeConfig();
  return configStore[key];
}

/**
 * Set configuration values programmatically.
 */
function set(values: Partial<UntaggedConfig>): void {
  overrides = { ...overrides, ...values };
  configStore = { ...configStore, ...values };
}

function has(key: string): boolean {
  return !!get(key);
}

function getAll(): Readonly<UntaggedConfig> {
  initializeConfig();
  return configStore;
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration so the next read reloads every source (mainly for testing).
 */
function reset(): void {
  configStore = {};
  overrides = {};
  configLoaded = false;
  configFilePath = undefined;
}

// ============================================================================
// Export: config object
// ============================================================================

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
  loadConfigFromEnv,
  loadConfigFromFiles,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: UntaggedConfig): UntaggedConfig {
  return cfg;
}
