/**
 * Error Types
 *
 * Comparisons and combinators never throw. The classes below cover the
 * remaining failure modes: a refined value built from a base value that does
 * not satisfy its predicate, conflicting canonical instances, and registry
 * misuse.
 */

/**
 * Base class for every error raised by the library.
 */
export class DecidableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DecidableError";
  }
}

/**
 * Thrown when a constructor is called on a value outside its domain,
 * e.g. `Sub(ST, x)` where `ST.predicate(x)` is false.
 */
export class PreconditionError extends DecidableError {
  constructor(
    message: string,
    public readonly subject: string,
  ) {
    super(message);
    this.name = "PreconditionError";
  }
}

/**
 * Thrown when two different instances compete for the canonical slot of one
 * (typeclass, type) pair, or when a canonical instance is missing.
 */
export class CoherenceError extends DecidableError {
  constructor(
    message: string,
    public readonly typeclass: string,
    public readonly forType: string,
  ) {
    super(message);
    this.name = "CoherenceError";
  }
}

/**
 * Thrown on invalid registry configuration or duplicate keys.
 */
export class RegistryError extends DecidableError {
  constructor(message: string) {
    super(message);
    this.name = "RegistryError";
  }
}

/**
 * Thrown when a configuration source holds a value of the wrong shape.
 */
export class ConfigError extends DecidableError {
  constructor(
    message: string,
    public readonly source: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}
