/**
 * SubType - values of a base type that satisfy a predicate
 *
 * A `SubType<Base, S>` describes a representation `S` of the values
 * `{ x : Base | predicate(x) }`. `val` projects back to the base type and is
 * injective; `build` is the raw half of the isomorphism and is only ever
 * applied to values that satisfy the predicate.
 *
 * The only ways to obtain an `S` are the checked entry points below
 * (`Sub`, `insub`, `insubd`, `insubEq`, `innew`), so every `S` in a program
 * carries a base value that satisfies the predicate. The evidence itself is
 * erased: at run time an `S` holds the base value and nothing else.
 *
 * Three representations are provided:
 *
 * | Constructor | `S` at run time |
 * | --- | --- |
 * | `sigSubType` | frozen `{ val: x }` |
 * | `refinement` (./refined.ts) | `x` itself, branded |
 * | `newType` (./newtype.ts) | `x` itself, branded, predicate always true |
 *
 * `subTypeOf` accepts any other representation.
 *
 * `S` excludes `null` and `undefined`: `insub` returns `null` for None, so
 * a nullable representation would make a valid value look absent. Base
 * types that include `null` go through `sigSubType`, or a `Defined` box
 * (`subTypeOf` with `build: defined`).
 *
 * @example
 * ```typescript
 * const EvenNat = sigSubType<number, "EvenNat">(
 *   "EvenNat",
 *   (n) => Number.isInteger(n) && n >= 0 && n % 2 === 0,
 * );
 *
 * insub(EvenNat, 4); // { val: 4 }
 * insub(EvenNat, 5); // null
 * Sub(EvenNat, 5);   // throws PreconditionError
 * ```
 */

import { debugLog, describeValue, PreconditionError } from "@decidable/core";
import { None, type Option } from "@decidable/eqtype";

// ============================================================================
// Capability
// ============================================================================

export interface SubType<Base, S extends {}> {
  /** Name used in error messages and instance tables. */
  readonly name: string;

  readonly predicate: (x: Base) => boolean;

  /** Projection to the base type. Injective. */
  readonly val: (u: S) => Base;

  /** Raw constructor; callers guarantee `predicate(x)`. */
  readonly build: (x: Base) => S;

  /** True when the predicate holds for every base value. */
  readonly trivial: boolean;
}

/**
 * A subtype whose predicate is constantly true: a plain wrapper.
 */
export interface TrivialSubType<Base, S extends {}> extends SubType<Base, S> {
  readonly trivial: true;
}

export interface SubTypeDef<Base, S extends {}> {
  readonly name: string;
  readonly predicate: (x: Base) => boolean;
  readonly val: (u: S) => Base;
  readonly build: (x: Base) => S;
}

// ============================================================================
// Operations
// ============================================================================

export function val<Base, S extends {}>(ST: SubType<Base, S>, u: S): Base {
  return ST.val(u);
}

/**
 * The subtype value for `x`. Throws PreconditionError when `x` does not
 * satisfy the predicate.
 */
export function Sub<Base, S extends {}>(ST: SubType<Base, S>, x: Base): S {
  if (!ST.predicate(x)) {
    const message = `${ST.name}: ${describeValue(x)} does not satisfy the predicate`;
    debugLog("subtype", message);
    throw new PreconditionError(message, ST.name);
  }
  return ST.build(x);
}

/**
 * `Some(u)` with `val(u) = x` when `x` satisfies the predicate, `None`
 * otherwise.
 */
export function insub<Base, S extends {}>(ST: SubType<Base, S>, x: Base): Option<S> {
  return ST.predicate(x) ? ST.build(x) : None;
}

/**
 * `insub(ST, x)`, or `u0` when `x` does not satisfy the predicate.
 */
export function insubd<Base, S extends {}>(ST: SubType<Base, S>, u0: S, x: Base): S {
  const u = insub(ST, x);
  return u === null ? u0 : u;
}

/**
 * Same result as `insub`, computed by deciding the predicate first and then
 * going through the checked constructor.
 */
export function insubEq<Base, S extends {}>(ST: SubType<Base, S>, x: Base): Option<S> {
  if (ST.predicate(x)) return Sub(ST, x);
  return None;
}

/**
 * Wrap a base value in a trivial subtype. Never fails.
 */
export function innew<Base, S extends {}>(NT: TrivialSubType<Base, S>, x: Base): S {
  return NT.build(x);
}

/**
 * Case analysis on a subtype value: `k` receives the base value and the
 * subtype value rebuilt from it.
 */
export function subElim<Base, S extends {}, R>(
  ST: SubType<Base, S>,
  u: S,
  k: (x: Base, rebuilt: S) => R,
): R {
  const x = ST.val(u);
  return k(x, Sub(ST, x));
}

export function isSub<Base, S extends {}>(ST: SubType<Base, S>, x: Base): boolean {
  return ST.predicate(x);
}

export function valOption<Base extends {}, S extends {}>(
  ST: SubType<Base, S>,
  o: Option<S>,
): Option<Base> {
  return o === null ? None : ST.val(o);
}

// ============================================================================
// Constructors
// ============================================================================

/**
 * A subtype over any user representation.
 */
export function subTypeOf<Base, S extends {}>(def: SubTypeDef<Base, S>): SubType<Base, S> {
  return {
    name: def.name,
    predicate: def.predicate,
    val: def.val,
    build: def.build,
    trivial: false,
  };
}

declare const __sig: unique symbol;

/**
 * `{ x | P x }` as a record holding the base value. The name keeps
 * subtypes over the same base type apart.
 */
export interface Sig<Base, Name extends string> {
  readonly val: Base;
  readonly [__sig]?: Name;
}

export function sigSubType<Base, Name extends string>(
  name: Name,
  predicate: (x: Base) => boolean,
): SubType<Base, Sig<Base, Name>> {
  return subTypeOf<Base, Sig<Base, Name>>({
    name,
    predicate,
    val: (u) => u.val,
    build: (x) => Object.freeze({ val: x }),
  });
}
