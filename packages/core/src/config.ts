/**
 * Unified Configuration System
 *
 * Provides a centralized configuration API for setkit.
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: SETKIT_*
 * 3. Config files: package.json#setkit, .setkitrc, setkit.config.cjs, etc.
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@setkit/core";
 *
 * config.get("defaultCapacity")   // → 10
 * config.set({ debug: true });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { ConfigError } from "./errors.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Full setkit configuration schema.
 */
export interface SetkitConfig {
  /** Log growth and rebuild events through debugLog() */
  debug: boolean;
  /** Bucket count a new set starts with, and the size an empty (capacity 0) set grows back to */
  defaultCapacity: number;
}

export type SetkitConfigKey = keyof SetkitConfig;

const DEFAULTS: Readonly<SetkitConfig> = {
  debug: false,
  defaultCapacity: 10,
};

// ============================================================================
// Global State
// ============================================================================

let configStore: SetkitConfig | undefined;
let configFilePath: string | undefined;

// ============================================================================
// Validation
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Pick the known keys out of a raw object, checking their types.
 * Unknown keys are ignored so other tools can share the same config file.
 */
function validate(raw: Record<string, unknown>, source: string): Partial<SetkitConfig> {
  const result: Partial<SetkitConfig> = {};

  if (raw.debug !== undefined) {
    if (typeof raw.debug !== "boolean") {
      throw new ConfigError("debug", `${source}: debug must be a boolean, got ${String(raw.debug)}`);
    }
    result.debug = raw.debug;
  }

  if (raw.defaultCapacity !== undefined) {
    const capacity = raw.defaultCapacity;
    if (typeof capacity !== "number" || !Number.isInteger(capacity) || capacity < 1) {
      throw new ConfigError(
        "defaultCapacity",
        `${source}: defaultCapacity must be a positive integer, got ${String(capacity)}`
      );
    }
    result.defaultCapacity = capacity;
  }

  return result;
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 * Variables prefixed with SETKIT_ are parsed into the config object.
 *
 * Examples:
 *   SETKIT_DEBUG=1                 → { debug: true }
 *   SETKIT_DEFAULT_CAPACITY=32     → { defaultCapacity: 32 }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};
  const PREFIX = "SETKIT_";

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    // SETKIT_DEFAULT_CAPACITY → defaultCapacity
    const configKey = key
      .slice(PREFIX.length)
      .toLowerCase()
      .replace(/_([a-z0-9])/g, (_, c: string) => c.toUpperCase());

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

const MODULE_NAME = "setkit";

/** Files searched for configuration; every extension has a sync loader. */
export const CONFIG_SEARCH_PLACES: readonly string[] = [
  "package.json",
  `.${MODULE_NAME}rc`,
  `.${MODULE_NAME}rc.json`,
  `.${MODULE_NAME}rc.yaml`,
  `.${MODULE_NAME}rc.yml`,
  `.${MODULE_NAME}rc.js`,
  `.${MODULE_NAME}rc.cjs`,
  `${MODULE_NAME}.config.js`,
  `${MODULE_NAME}.config.cjs`,
];

function loadConfigFromFiles(): Record<string, unknown> {
  const explorer = cosmiconfigSync(MODULE_NAME, { searchPlaces: [...CONFIG_SEARCH_PLACES] });

  let result: ReturnType<typeof explorer.search>;
  try {
    result = explorer.search();
  } catch (err) {
    throw new ConfigError("file", `failed to load ${MODULE_NAME} configuration file`, { cause: err });
  }
  if (!result || result.isEmpty) return {};

  const loaded: unknown = result.config;
  if (!isRecord(loaded)) {
    throw new ConfigError("file", `${result.filepath}: configuration must be an object`);
  }
  configFilePath = result.filepath;
  return loaded;
}

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(): SetkitConfig {
  if (configStore) return configStore;

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv(process.env);

  configStore = {
    ...DEFAULTS,
    ...validate(fileConfig, configFilePath ?? "config file"),
    ...validate(envConfig, "environment"),
  };
  return configStore;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value.
 */
function get<K extends SetkitConfigKey>(key: K): SetkitConfig[K] {
  return initializeConfig()[key];
}

/**
 * Set configuration values programmatically.
 */
function set(values: Partial<SetkitConfig>): void {
  const current = initializeConfig();
  configStore = { ...current, ...validate({ ...values }, "config.set") };
}

/**
 * Get all configuration values.
 */
function getAll(): Readonly<SetkitConfig> {
  return { ...initializeConfig() };
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
  configStore = undefined;
  configFilePath = undefined;
}

export const config = {
  get,
  set,
  getAll,
  getConfigFilePath,
  reset,
};
