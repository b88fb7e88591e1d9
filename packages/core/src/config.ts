/**
 * Unified Configuration System
 *
 * Provides a centralized configuration API for the smartnumber packages.
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: SMARTNUMBER_* (highest priority, for CI overrides)
 * 2. Config files: .smartnumberrc, smartnumber.config.js, etc.
 * 3. package.json: "smartnumber" key
 * 4. Defaults (lowest priority)
 *
 * Programmatic `config.set()` calls are merged on top of whatever was loaded.
 *
 * @example
 * ```typescript
 * import { config } from "@smartnumber/core";
 *
 * config.get("accuracy")                    // → 100
 * config.get("approximation.tolerance")     // → 1e-8
 * config.set({ logLevel: "debug" });
 * ```
 *
 * @example Config file (.smartnumberrc.json)
 * ```json
 * {
 *   "accuracy": 40,
 *   "approximation": { "maxIterations": 64 }
 * }
 * ```
 *
 * Files are searched synchronously, so only loaders cosmiconfig can run
 * synchronously are listed: JSON, YAML and CommonJS (`.cjs`, or `.js` in a
 * CommonJS package).
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/** Severity threshold for the scoped loggers. */
export type LogLevel = "debug" | "info" | "warn" | "error" | "off";

/**
 * Continued-fraction approximation settings.
 */
export interface ApproximationConfig {
  /** Relative tolerance a convergent must reach */
  tolerance?: number;
  /** Hard cap on continued-fraction steps */
  maxIterations?: number;
  /** Leading fractional zeros from which a decimal is reduced exactly instead */
  smallMagnitudeZeros?: number;
}

/**
 * Exact fraction reduction settings.
 */
export interface ReductionConfig {
  /** Largest prime kept in the prime table */
  primeLimit?: number;
  /** Largest odd divisor tried after the prime table is exhausted */
  trialDivisionLimit?: number;
}

/**
 * Scientific notation settings.
 */
export interface ScientificConfig {
  /** Largest accepted exponent magnitude */
  maxExponent?: number;
}

/**
 * Full smartnumber configuration schema.
 */
export interface SmartNumberConfig {
  /** Default number of fractional digits for decimal expansions */
  accuracy?: number;
  /** Minimum level written by the loggers */
  logLevel?: LogLevel;
  approximation?: ApproximationConfig;
  reduction?: ReductionConfig;
  scientific?: ScientificConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "smartnumber";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Load configuration synchronously from files.
 * Uses cosmiconfig to search for config in standard locations.
 */
function loadConfigFromFiles(): Record<string, unknown> {
  try {
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

    const result = explorer.search();
    if (result && !result.isEmpty && isRecord(result.config)) {
      configFilePath = result.filepath;
      return result.config;
    }
  } catch (error) {
    // Config file errors fall back to defaults
    console.warn(`[smartnumber/config] WARN: Failed to load config file:`, error);
  }

  return {};
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Turn an env var suffix into a config path.
 * Double underscore nests, single underscore joins camel-cased words.
 *
 *   APPROXIMATION__MAX_ITERATIONS → approximation.maxIterations
 */
function envKeyToPath(key: string): string {
  return key
    .toLowerCase()
    .split("__")
    .map((segment) => segment.replace(/_([a-z0-9])/g, (_, c: string) => c.toUpperCase()))
    .join(".");
}

function parseEnvValue(value: string): unknown {
  if (value === "true") return true;
  if (value === "false") return false;
  if (/^-?\d+(\.\d+)?([eE][-+]?\d+)?$/.test(value)) return Number(value);
  return value;
}

/**
 * Load configuration from environment variables.
 * Variables prefixed with SMARTNUMBER_ are parsed into the config object.
 *
 * Examples:
 *   SMARTNUMBER_ACCURACY=40                          → { accuracy: 40 }
 *   SMARTNUMBER_LOG_LEVEL=debug                      → { logLevel: "debug" }
 *   SMARTNUMBER_APPROXIMATION__TOLERANCE=1e-12       → { approximation: { tolerance: 1e-12 } }
 */
function loadConfigFromEnv(): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};
  const PREFIX = "SMARTNUMBER_";

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;
    setNestedValue(envConfig, envKeyToPath(key.slice(PREFIX.length)), parseEnvValue(value));
  }

  return envConfig;
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current: Record<string, unknown> = obj;

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
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

// ============================================================================
// Config Initialization
// ============================================================================

/** Built-in defaults, lowest priority. */
export const DEFAULT_CONFIG = {
  accuracy: 100,
  logLevel: "warn",
  approximation: {
    tolerance: 1e-8,
    maxIterations: 100,
    smallMagnitudeZeros: 3,
  },
  reduction: {
    primeLimit: 10_000,
    trialDivisionLimit: 1_000_000,
  },
  scientific: {
    maxExponent: 100_000,
  },
} as const satisfies SmartNumberConfig;

/**
 * Initialize configuration from all sources.
 * Priority: env vars > config files > defaults
 */
function initializeConfig(): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv();

  // Merge: defaults < fileConfig < envConfig
  configStore = deepMerge(deepMerge(structuredClone(DEFAULT_CONFIG), fileConfig), envConfig);

  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 *
 * The value is returned as `unknown`; callers validate its shape.
 *
 * @param path - Dot-notation path (e.g., "accuracy", "approximation.tolerance")
 * @returns The configuration value, or undefined if not set
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically.
 * Merges with existing configuration.
 *
 * @example
 * config.set({ accuracy: 20 });
 * config.set({ approximation: { tolerance: 1e-12 } });
 */
function set(values: SmartNumberConfig): void {
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
 * Reset configuration to defaults (mainly for testing).
 * Sources are read again on the next access.
 */
function reset(): void {
  configStore = {};
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
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(config: SmartNumberConfig): SmartNumberConfig {
  return config;
}
