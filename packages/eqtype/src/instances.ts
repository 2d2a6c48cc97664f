/**
 * Eq Instances
 *
 * Base instances for built-in types, and instances for composite types
 * built from the instances of their components:
 *
 * | Type | Equal when |
 * | --- | --- |
 * | unit | always |
 * | boolean | not (x xor y) |
 * | `[A, B]` | both components are equal |
 * | `Sum<A, B>` | same side, equal contents |
 * | `Option<A>` | both None, or both Some with equal contents |
 * | tagged values | equal tags, then equal payloads at that tag |
 *
 * The base instances are registered as the canonical Eq for their types
 * when this module loads; composite instances are built on demand.
 */

import { createInstanceTable, typeKey, type InstanceF, type TypeKey } from "@decidable/core";
import type { Option } from "./data/option.js";
import type { Sum } from "./data/sum.js";
import { taggedAs, type TaggedUnion, type TaggedValue } from "./data/tagged.js";
import { eqStrict, type Eq } from "./typeclasses/eq.js";

// ============================================================================
// Base instances
// ============================================================================

/** The unit type has one inhabitant. */
export const eqUnit: Eq<void> = { eqv: () => true };

function xorb(x: boolean, y: boolean): boolean {
  return x !== y;
}

export const eqBoolean: Eq<boolean> = { eqv: (x, y) => !xorb(x, y) };

/**
 * Numeric equality: `0` and `-0` are equal, and `NaN` equals itself so the
 * instance stays reflexive on every number.
 */
export const eqNumber: Eq<number> = {
  eqv: (x, y) => x === y || (Number.isNaN(x) && Number.isNaN(y)),
};

export const eqString: Eq<string> = eqStrict();

export const eqBigint: Eq<bigint> = eqStrict();

// ============================================================================
// Products
// ============================================================================

export function eqPair<A, B>(EA: Eq<A>, EB: Eq<B>): Eq<readonly [A, B]> {
  return {
    eqv: ([a1, b1], [a2, b2]) => EA.eqv(a1, a2) && EB.eqv(b1, b2),
  };
}

export function eqTriple<A, B, C>(
  EA: Eq<A>,
  EB: Eq<B>,
  EC: Eq<C>,
): Eq<readonly [A, B, C]> {
  return {
    eqv: ([a1, b1, c1], [a2, b2, c2]) => EA.eqv(a1, a2) && EB.eqv(b1, b2) && EC.eqv(c1, c2),
  };
}

/**
 * Eq for arrays (element-wise)
 */
export function eqArray<A>(E: Eq<A>): Eq<readonly A[]> {
  return {
    eqv: (xs, ys) => {
      if (xs.length !== ys.length) return false;
      return xs.every((x, i) => E.eqv(x, ys[i]));
    },
  };
}

// ============================================================================
// Sums and options
// ============================================================================

export function eqSum<A, B>(EA: Eq<A>, EB: Eq<B>): Eq<Sum<A, B>> {
  return {
    eqv: (x, y) => {
      if (x._tag === "Inl") return y._tag === "Inl" && EA.eqv(x.left, y.left);
      return y._tag === "Inr" && EB.eqv(x.right, y.right);
    },
  };
}

export function eqOption<A>(EA: Eq<A>): Eq<Option<A>> {
  return {
    eqv: (x, y) => {
      if (x === null) return y === null;
      return y !== null && EA.eqv(x, y);
    },
  };
}

// ============================================================================
// Tagged values
// ============================================================================

/**
 * One Eq per tag of a closed family.
 */
export type EqFamily<M> = { readonly [K in keyof M]: Eq<M[K]> };

function eqAtTag<M, K extends keyof M>(
  family: EqFamily<M>,
  u: TaggedValue<K, M[K]>,
  payload: M[K],
): boolean {
  return family[u.tag].eqv(u.tagged, payload);
}

/**
 * Eq for the tagged values of a closed family `M`. Tags are compared with
 * `EI`; payloads are compared only when the tags are equal, at the tag of
 * the left operand.
 *
 * @example
 * ```typescript
 * type Shape = { circle: number; rect: readonly [number, number] };
 * const eqShape = eqTagged<Shape>(eqString, {
 *   circle: eqNumber,
 *   rect: eqPair(eqNumber, eqNumber),
 * });
 * ```
 */
export function eqTagged<M>(EI: Eq<keyof M>, family: EqFamily<M>): Eq<TaggedUnion<M>> {
  return {
    eqv: (u, v) => EI.eqv(u.tag, v.tag) && eqAtTag(family, u, taggedAs(u, v)),
  };
}

/**
 * Eq for tagged values over an open tag type: payloads share one box type
 * `T`, and `eqAt(i)` compares the payloads that belong to tag `i`.
 */
export function eqSigma<I, T>(EI: Eq<I>, eqAt: (i: I) => Eq<T>): Eq<TaggedValue<I, T>> {
  return {
    eqv: (u, v) => EI.eqv(u.tag, v.tag) && eqAt(u.tag).eqv(u.tagged, v.tagged),
  };
}

// ============================================================================
// Canonical instances
// ============================================================================

export interface EqF extends InstanceF {
  readonly instance: Eq<this["__kind__"]>;
}

/**
 * The table of canonical Eq instances, one per type key.
 */
export const eqInstances = createInstanceTable<EqF>("Eq");

export const UnitKey: TypeKey<void> = typeKey("unit");
export const BooleanKey: TypeKey<boolean> = typeKey("boolean");
export const NumberKey: TypeKey<number> = typeKey("number");
export const StringKey: TypeKey<string> = typeKey("string");
export const BigintKey: TypeKey<bigint> = typeKey("bigint");

eqInstances.register(UnitKey, eqUnit, { source: "prelude" });
eqInstances.register(BooleanKey, eqBoolean, { source: "prelude" });
eqInstances.register(NumberKey, eqNumber, { source: "prelude" });
eqInstances.register(StringKey, eqString, { source: "prelude" });
eqInstances.register(BigintKey, eqBigint, { source: "prelude" });

/**
 * Make `E` the canonical Eq for the type named by `key`.
 * Derivations (injEq, pcanEq, eqSub, ...) are never registered implicitly.
 */
export function registerEq<A>(key: TypeKey<A>, E: Eq<A>, derived = false): void {
  eqInstances.register(key, E, { source: derived ? "derived" : "explicit" });
}

/**
 * The canonical Eq for the type named by `key`.
 */
export function summonEq<A>(key: TypeKey<A>): Eq<A> {
  return eqInstances.summon(key);
}
