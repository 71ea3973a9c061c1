/**
 * Unified Configuration System
 *
 * Configuration is loaded lazily on first read, from (in priority order):
 *
 * 1. Environment variables: POLYLOOP_* (highest priority, for CI overrides)
 * 2. Config files: `package.json#polyloop`, `.polylooprc`, `polyloop.config.cjs`, ...
 * 3. Defaults (lowest priority)
 *
 * `config.set()` merges on top of whatever has been loaded.
 *
 * @example
 * ```typescript
 * import { config } from "@polyloop/core";
 *
 * config.get("debug");           // → false
 * config.get("contracts.mode");  // → "full"
 *
 * config.set({ contracts: { mode: "none" } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/** "full" = runtime contract checks on, "none" = checks skipped. */
export type ContractsMode = "full" | "none";

/**
 * Contract configuration options.
 */
export interface ContractsConfig {
  mode?: ContractsMode;
}

/**
 * Full polyloop configuration schema.
 */
export interface PolyloopConfig {
  /** Log every traversal through `debugLog` */
  debug?: boolean;
  contracts?: ContractsConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;
let searchFrom: string | undefined;

const MODULE_NAME = "polyloop";
const ENV_PREFIX = "POLYLOOP_";

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Get a nested value using dot notation.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current = obj;

  for (const part of path.split(".")) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence). Arrays are replaced, not merged.
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];
    result[key] =
      isRecord(sourceValue) && isRecord(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue;
  }

  return result;
}

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

/**
 * A JS config file may load as a module namespace (`export default ...` or
 * transpiled ESM); the settings are its default export.
 */
function unwrapDefaultExport(loaded: unknown): unknown {
  if (!isRecord(loaded) || !isRecord(loaded.default)) return loaded;
  const onlyDefault = Object.keys(loaded).every((key) => key === "default" || key === "__esModule");
  return loaded.__esModule === true || onlyDefault ? loaded.default : loaded;
}

function loadConfigFromFiles(): Record<string, unknown> {
  try {
    const explorer = cosmiconfigSync(MODULE_NAME, {
      searchPlaces: [
        "package.json",
        `.${MODULE_NAME}rc`,
        `.${MODULE_NAME}rc.json`,
        `.${MODULE_NAME}rc.yaml`,
        `.${MODULE_NAME}rc.yml`,
        `${MODULE_NAME}.config.js`,
        `${MODULE_NAME}.config.cjs`,
      ],
    });

    const result = explorer.search(searchFrom);
    if (result && !result.isEmpty) {
      const loaded = unwrapDefaultExport(result.config);
      if (isRecord(loaded)) {
        configFilePath = result.filepath;
        return loaded;
      }
    }
  } catch (error) {
    // A broken config file falls back to defaults
    if (process.env.NODE_ENV === "development") {
      console.warn(`[${MODULE_NAME}] Failed to load config file:`, error);
    }
  }

  return {};
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   POLYLOOP_DEBUG=1              → { debug: true }
 *   POLYLOOP_CONTRACTS_MODE=none  → { contracts: { mode: "none" } }
 */
function loadConfigFromEnv(): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    // POLYLOOP_CONTRACTS_MODE → contracts.mode
    const configPath = key.slice(ENV_PREFIX.length).toLowerCase().replace(/_+/g, ".");

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

    setNestedValue(envConfig, configPath, parsedValue);
  }

  return envConfig;
}

// ============================================================================
// Config Initialization
// ============================================================================

/**
 * Initialize configuration from all sources.
 * Priority: env vars > config files > defaults
 */
function initializeConfig(): void {
  if (configLoaded) return;

  const defaults: PolyloopConfig = {
    debug: false,
    contracts: {
      mode: "full",
    },
  };

  configStore = deepMerge(deepMerge(defaults, loadConfigFromFiles()), loadConfigFromEnv());
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by dot-notation path.
 *
 * @example
 * config.get("debug")           // → false
 * config.get("contracts.mode")  // → "full"
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically.
 * Merges with existing configuration.
 */
function set(values: PolyloopConfig): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

/**
 * Get all configuration values.
 */
function getAll(): Readonly<Record<string, unknown>> {
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
 * Drop everything loaded or set; the next read reloads from files and env.
 * Config files are searched for from `directory` (default: the working
 * directory).
 */
function reset(directory?: string): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
  searchFrom = directory;
}

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
} as const;

/**
 * Type a configuration object.
 *
 * Config files are loaded synchronously, so a JS config file must be
 * loadable by `require`: CommonJS (`polyloop.config.cjs`), or an ESM default
 * export on runtimes that can `require` ESM. JSON and YAML rc files always work.
 *
 * @example
 * // polyloop.config.cjs
 * module.exports = { debug: true, contracts: { mode: "none" } };
 *
 * // or, in code
 * config.set(defineConfig({ debug: true }));
 */
export function defineConfig(values: PolyloopConfig): PolyloopConfig {
  return values;
}
