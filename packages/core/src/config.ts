/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: DECIDABLE_* (for CI overrides)
 * 3. Config files: package.json#decidable, .decidablerc, decidable.config.js, ...
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@decidable/core";
 *
 * config.get().laws.runs              // → 100
 * config.set({ contracts: { checkCancellation: true } });
 * ```
 *
 * Environment variable names use `__` between sections and `_` between the
 * words of a camelCase key:
 *
 *   DECIDABLE_DEBUG=1                              → { debug: true }
 *   DECIDABLE_LAWS__RUNS=500                       → { laws: { runs: 500 } }
 *   DECIDABLE_CONTRACTS__CHECK_CANCELLATION=true   → { contracts: { checkCancellation: true } }
 */

import { cosmiconfigSync } from "cosmiconfig";
import { ConfigError } from "./errors.js";

// ============================================================================
// Types
// ============================================================================

/**
 * What happens when a second canonical instance is registered for a type
 * that already has one.
 */
export type OnDuplicate = "error" | "skip" | "replace";

export interface InstancesConfig {
  onDuplicate?: OnDuplicate;
}

export interface ContractsConfig {
  /** Check cancellation laws on every comparison made by pcanEq / canEq */
  checkCancellation?: boolean;
}

export interface LawsConfig {
  /** Property runs per law */
  runs?: number;
  /** Fixed seed for reproducible runs */
  seed?: number;
}

/**
 * Full configuration schema, as written in config files.
 */
export interface DecidableConfig {
  debug?: boolean;
  instances?: InstancesConfig;
  contracts?: ContractsConfig;
  laws?: LawsConfig;
}

/**
 * Configuration with every default applied.
 */
export interface ResolvedConfig {
  readonly debug: boolean;
  readonly instances: { readonly onDuplicate: OnDuplicate };
  readonly contracts: { readonly checkCancellation: boolean };
  readonly laws: { readonly runs: number; readonly seed: number | undefined };
}

const DEFAULTS: ResolvedConfig = {
  debug: false,
  instances: { onDuplicate: "error" },
  contracts: { checkCancellation: false },
  laws: { runs: 100, seed: undefined },
};

// ============================================================================
// Global State
// ============================================================================

let resolved: ResolvedConfig | undefined;
let overrides: DecidableConfig = {};
let configFilePath: string | undefined;

// ============================================================================
// Validation
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string, source: string) {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    throw new ConfigError(`'${key}' must be an object`, source);
  }
  return value;
}

function optionalBoolean(value: unknown, path: string, source: string): boolean | undefined {
  if (value === undefined || typeof value === "boolean") return value;
  throw new ConfigError(`'${path}' must be a boolean, got ${JSON.stringify(value)}`, source);
}

function optionalCount(value: unknown, path: string, source: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value === "number" && Number.isInteger(value) && value >= 0) return value;
  throw new ConfigError(
    `'${path}' must be a non-negative integer, got ${JSON.stringify(value)}`,
    source,
  );
}

function optionalOnDuplicate(value: unknown, source: string): OnDuplicate | undefined {
  if (value === undefined) return undefined;
  if (value === "error" || value === "skip" || value === "replace") return value;
  throw new ConfigError(
    `'instances.onDuplicate' must be one of error, skip, replace, got ${JSON.stringify(value)}`,
    source,
  );
}

/**
 * Check an untrusted object against the configuration schema.
 * Unknown keys are ignored; keys that are not set are left out of the result.
 */
export function parseConfig(raw: unknown, source: string): DecidableConfig {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) {
    throw new ConfigError("configuration must be an object", source);
  }

  const parsed: DecidableConfig = {};
  const debug = optionalBoolean(raw.debug, "debug", source);
  if (debug !== undefined) parsed.debug = debug;

  const instances = section(raw, "instances", source);
  if (instances) {
    parsed.instances = {};
    const onDuplicate = optionalOnDuplicate(instances.onDuplicate, source);
    if (onDuplicate !== undefined) parsed.instances.onDuplicate = onDuplicate;
  }

  const contracts = section(raw, "contracts", source);
  if (contracts) {
    parsed.contracts = {};
    const checkCancellation = optionalBoolean(
      contracts.checkCancellation,
      "contracts.checkCancellation",
      source,
    );
    if (checkCancellation !== undefined) parsed.contracts.checkCancellation = checkCancellation;
  }

  const laws = section(raw, "laws", source);
  if (laws) {
    parsed.laws = {};
    const runs = optionalCount(laws.runs, "laws.runs", source);
    if (runs !== undefined) parsed.laws.runs = runs;
    const seed = optionalCount(laws.seed, "laws.seed", source);
    if (seed !== undefined) parsed.laws.seed = seed;
  }

  return parsed;
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "DECIDABLE_";

function camelCase(word: string): string {
  return word
    .toLowerCase()
    .split("_")
    .filter((part) => part.length > 0)
    .map((part, i) => (i === 0 ? part : part[0].toUpperCase() + part.slice(1)))
    .join("");
}

function parseEnvValue(value: string): unknown {
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false" || value === "") return false;
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  return value;
}

/**
 * Set a nested value using a list of path segments.
 */
function setNestedValue(obj: Record<string, unknown>, path: string[], value: unknown): void {
  let current = obj;
  for (const part of path.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[path[path.length - 1]] = value;
}

/**
 * Load configuration from DECIDABLE_* environment variables.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): DecidableConfig {
  const raw: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const path = key.slice(ENV_PREFIX.length).split("__").map(camelCase);
    setNestedValue(raw, path, parseEnvValue(value));
  }

  return parseConfig(raw, "environment");
}

// ============================================================================
// Config File Loading
// ============================================================================

const MODULE_NAME = "decidable";

function loadConfigFromFiles(): DecidableConfig {
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
  if (!result || result.isEmpty) return {};
  configFilePath = result.filepath;
  return parseConfig(result.config, result.filepath);
}

// ============================================================================
// Merging
// ============================================================================

function mergeConfig(base: ResolvedConfig, layer: DecidableConfig): ResolvedConfig {
  return {
    debug: layer.debug ?? base.debug,
    instances: {
      onDuplicate: layer.instances?.onDuplicate ?? base.instances.onDuplicate,
    },
    contracts: {
      checkCancellation: layer.contracts?.checkCancellation ?? base.contracts.checkCancellation,
    },
    laws: {
      runs: layer.laws?.runs ?? base.laws.runs,
      seed: layer.laws?.seed ?? base.laws.seed,
    },
  };
}

function mergeLayers(base: DecidableConfig, layer: DecidableConfig): DecidableConfig {
  return {
    debug: layer.debug ?? base.debug,
    instances: {
      onDuplicate: layer.instances?.onDuplicate ?? base.instances?.onDuplicate,
    },
    contracts: {
      checkCancellation: layer.contracts?.checkCancellation ?? base.contracts?.checkCancellation,
    },
    laws: {
      runs: layer.laws?.runs ?? base.laws?.runs,
      seed: layer.laws?.seed ?? base.laws?.seed,
    },
  };
}

function initializeConfig(): ResolvedConfig {
  if (resolved) return resolved;
  const fromFiles = loadConfigFromFiles();
  const fromEnv = loadConfigFromEnv();
  resolved = [fromFiles, fromEnv, overrides].reduce(mergeConfig, DEFAULTS);
  return resolved;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get the resolved configuration.
 */
function get(): ResolvedConfig {
  return initializeConfig();
}

/**
 * Set configuration values programmatically. Later calls win.
 */
function set(values: DecidableConfig): void {
  overrides = mergeLayers(overrides, parseConfig(values, "config.set"));
  resolved = undefined;
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
 */
function reset(): void {
  resolved = undefined;
  overrides = {};
  configFilePath = undefined;
}

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  getConfigFilePath,
  reset,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: DecidableConfig): DecidableConfig {
  return cfg;
}
