/**
 * Canonical Instance Tables
 *
 * Each typeclass keeps one table mapping a type key to the instance that is
 * "the" instance for that type. Tables are filled when modules load and only
 * read afterwards.
 *
 * Keys are typed: `typeKey<number>("number")` can only be paired with an
 * instance for `number`, so `summon` hands back an instance of the type the
 * key was created for.
 *
 * @example
 * ```typescript
 * const Eqs = createInstanceTable<EqF>("Eq");
 * const NumberKey = typeKey<number>("number");
 *
 * Eqs.register(NumberKey, eqNumber, { source: "prelude" });
 * Eqs.summon(NumberKey).eqv(1, 1); // true
 * ```
 */

import { config } from "./config.js";
import { debugLog } from "./debug.js";
import { CoherenceError } from "./errors.js";
import { createGenericRegistry, type GenericRegistry } from "./registry.js";

// ============================================================================
// Type Keys
// ============================================================================

declare const __keyOf: unique symbol;

/**
 * A type name that carries the type it names.
 */
export interface TypeKey<A> {
  readonly name: string;
  readonly [__keyOf]?: (a: A) => A;
}

export function typeKey<A>(name: string): TypeKey<A> {
  return { name };
}

// ============================================================================
// Instance Tables
// ============================================================================

/**
 * Type-level function from a type to the instance type of a typeclass,
 * e.g. `interface EqF extends InstanceF { readonly instance: Eq<this["__kind__"]> }`.
 */
export interface InstanceF {
  readonly __kind__: unknown;
  readonly instance: unknown;
}

export type InstanceOf<F extends InstanceF, A> = (F & { readonly __kind__: A })["instance"];

/**
 * How an instance came to be registered.
 */
export type InstanceSource =
  | "prelude" // shipped with the library for a built-in type
  | "explicit" // written out for a user type
  | "derived"; // built by a derivation (injEq, eqSub, ...) and opted in

export interface InstanceMeta {
  readonly typeclass: string;
  readonly forType: string;
  readonly source: InstanceSource;
}

interface Entry {
  readonly meta: InstanceMeta;
  readonly instance: unknown;
}

export interface RegisterOptions {
  readonly source?: InstanceSource;
}

export interface InstanceTable<F extends InstanceF> {
  readonly typeclass: string;

  /** Register the canonical instance for a type. */
  register<A>(key: TypeKey<A>, instance: InstanceOf<F, A>, options?: RegisterOptions): void;

  /** The canonical instance; throws CoherenceError if none is registered. */
  summon<A>(key: TypeKey<A>): InstanceOf<F, A>;

  /** The canonical instance, or undefined. */
  lookup<A>(key: TypeKey<A>): InstanceOf<F, A> | undefined;

  has<A>(key: TypeKey<A>): boolean;

  meta<A>(key: TypeKey<A>): InstanceMeta | undefined;

  /** Names of all registered types. */
  types(): string[];

  /** Drop a registration (tests only). */
  unregister<A>(key: TypeKey<A>): boolean;
}

class InstanceTableImpl<F extends InstanceF> implements InstanceTable<F> {
  private readonly store: GenericRegistry<string, Entry>;

  constructor(readonly typeclass: string) {
    this.store = createGenericRegistry<string, Entry>({
      name: `${typeclass}Instances`,
      duplicateStrategy: () => config.get().instances.onDuplicate,
      valueEquals: (a, b) => a.instance === b.instance,
      conflictError: (forType, existing) =>
        new CoherenceError(
          `${typeclass}: a different instance for '${forType}' is already registered ` +
            `(${existing.meta.source})`,
          typeclass,
          forType,
        ),
    });
  }

  register<A>(key: TypeKey<A>, instance: InstanceOf<F, A>, options: RegisterOptions = {}): void {
    const meta: InstanceMeta = {
      typeclass: this.typeclass,
      forType: key.name,
      source: options.source ?? "explicit",
    };
    const label = `${this.typeclass}<${key.name}>`;

    switch (this.store.set(key.name, { meta, instance })) {
      case "added":
        debugLog("instances", `${label} registered (${meta.source})`);
        break;
      case "skipped":
        debugLog("instances", `${label}: kept existing instance`);
        break;
      case "replaced":
        debugLog("instances", `${label}: replaced existing instance (${meta.source})`);
        break;
      case "unchanged":
        break;
    }
  }

  summon<A>(key: TypeKey<A>): InstanceOf<F, A> {
    const found = this.lookup(key);
    if (found === undefined) {
      throw new CoherenceError(
        `${this.typeclass}: no instance registered for '${key.name}'`,
        this.typeclass,
        key.name,
      );
    }
    return found;
  }

  lookup<A>(key: TypeKey<A>): InstanceOf<F, A> | undefined {
    const entry = this.store.get(key.name);
    // entries under key.name are only written by register<A> with the same key
    return entry?.instance as InstanceOf<F, A> | undefined;
  }

  has<A>(key: TypeKey<A>): boolean {
    return this.store.has(key.name);
  }

  meta<A>(key: TypeKey<A>): InstanceMeta | undefined {
    return this.store.get(key.name)?.meta;
  }

  types(): string[] {
    return this.store.keys();
  }

  unregister<A>(key: TypeKey<A>): boolean {
    return this.store.delete(key.name);
  }
}

export function createInstanceTable<F extends InstanceF>(typeclass: string): InstanceTable<F> {
  return new InstanceTableImpl<F>(typeclass);
}
