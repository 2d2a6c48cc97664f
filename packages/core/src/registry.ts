/**
 * Registry - a keyed store that owns its policy for repeated keys.
 *
 * Setting a key that is already taken is resolved in this order:
 *
 * 1. a value equal to the stored one (`valueEquals`) leaves the entry as is;
 * 2. otherwise the duplicate strategy decides: `error` throws, `skip` keeps
 *    the stored value, `replace` overwrites it.
 *
 * The strategy may be a function; it is then read at each conflict, so a
 * registry can follow configuration that changes after it was created. The
 * instance tables (./instances.ts) use this to apply `instances.onDuplicate`.
 */

import { RegistryError } from "./errors.js";

export type DuplicateStrategy = "error" | "skip" | "replace";

/**
 * What `set` did with the incoming value.
 */
export type SetOutcome = "added" | "unchanged" | "skipped" | "replaced";

export interface RegistryOptions<K, V> {
  /** Name for error messages */
  name?: string;

  /** How to handle a different value under a taken key (default: "error") */
  duplicateStrategy?: DuplicateStrategy | (() => DuplicateStrategy);

  /** When the stored and incoming values count as the same (default: `===`) */
  valueEquals?: (a: V, b: V) => boolean;

  /** Error thrown under "error" (default: RegistryError) */
  conflictError?: (key: K, existing: V, incoming: V) => Error;
}

export interface GenericRegistry<K, V> {
  readonly name: string;

  set(key: K, value: V): SetOutcome;
  get(key: K): V | undefined;
  has(key: K): boolean;
  delete(key: K): boolean;
  keys(): K[];
}

class GenericRegistryImpl<K, V> implements GenericRegistry<K, V> {
  private readonly store = new Map<K, V>();
  readonly name: string;

  constructor(private readonly options: RegistryOptions<K, V>) {
    this.name = options.name ?? "Registry";
  }

  private strategy(): DuplicateStrategy {
    const { duplicateStrategy } = this.options;
    if (typeof duplicateStrategy === "function") return duplicateStrategy();
    return duplicateStrategy ?? "error";
  }

  set(key: K, value: V): SetOutcome {
    const existing = this.store.get(key);
    if (existing === undefined) {
      this.store.set(key, value);
      return "added";
    }

    const same = this.options.valueEquals ?? ((a: V, b: V) => a === b);
    if (same(existing, value)) return "unchanged";

    switch (this.strategy()) {
      case "error":
        throw (
          this.options.conflictError?.(key, existing, value) ??
          new RegistryError(`${this.name}: a different value for '${String(key)}' already exists`)
        );
      case "skip":
        return "skipped";
      case "replace":
        this.store.set(key, value);
        return "replaced";
    }
  }

  get(key: K): V | undefined {
    return this.store.get(key);
  }

  has(key: K): boolean {
    return this.store.has(key);
  }

  delete(key: K): boolean {
    return this.store.delete(key);
  }

  keys(): K[] {
    return [...this.store.keys()];
  }
}

export function createGenericRegistry<K, V>(
  options: RegistryOptions<K, V> = {},
): GenericRegistry<K, V> {
  return new GenericRegistryImpl(options);
}
