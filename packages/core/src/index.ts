/**
 * @decidable/core — shared infrastructure
 *
 * - Generic keyed registry with duplicate strategies
 * - Canonical instance tables keyed by typed type keys
 * - Unified configuration (env, config files, programmatic)
 * - Error classes and debug output
 */

export {
  createGenericRegistry,
  type GenericRegistry,
  type RegistryOptions,
  type DuplicateStrategy,
  type SetOutcome,
} from "./registry.js";

export {
  createInstanceTable,
  typeKey,
  type TypeKey,
  type InstanceF,
  type InstanceOf,
  type InstanceTable,
  type InstanceMeta,
  type InstanceSource,
  type RegisterOptions,
} from "./instances.js";

export {
  config,
  defineConfig,
  parseConfig,
  loadConfigFromEnv,
  type DecidableConfig,
  type ResolvedConfig,
  type OnDuplicate,
  type InstancesConfig,
  type ContractsConfig,
  type LawsConfig,
} from "./config.js";

export {
  DecidableError,
  PreconditionError,
  CoherenceError,
  RegistryError,
  ConfigError,
} from "./errors.js";

export { debugLog, describeValue } from "./debug.js";

export {
  defineLaw,
  combineLaws,
  type Law,
  type LawSet,
  type ProofHint,
} from "./laws.js";
