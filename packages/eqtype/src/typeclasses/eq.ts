/**
 * Eq Typeclass - decidable equality
 *
 * An `Eq<A>` packages a boolean comparison that decides equality on A:
 * `eqv(x, y)` is true exactly when x and y denote the same value. Everything
 * else in this package (predicates, relations, composite instances) is
 * written against this interface only.
 *
 * Laws (see ../laws/eq.ts):
 *   - Reflexivity: eqv(x, x) === true
 *   - Symmetry: eqv(x, y) === eqv(y, x)
 *   - Transitivity: eqv(x, y) && eqv(y, z) => eqv(x, z)
 *   - Reflection: eqP(x, y) is Equal iff eqv(x, y)
 *
 * Instances can be given directly (`makeEq`, `comparableEq`) or derived
 * from an existing instance through an injective map (`injEq`), a partial
 * left inverse (`pcanEq`) or a total left inverse (`canEq`). Derived
 * instances are plain values; they become canonical for a type only when
 * registered with `registerEq`.
 */

import { config, debugLog, describeValue, PreconditionError } from "@decidable/core";
import type { Option } from "../data/option.js";

// ============================================================================
// Eq
// ============================================================================

export interface Eq<A> {
  readonly eqv: (x: A, y: A) => boolean;
}

/**
 * Create an Eq instance from a custom equality function.
 * The function must decide equality; `eqLaws` checks that it does.
 */
export function makeEq<A>(eqv: (x: A, y: A) => boolean): Eq<A> {
  return { eqv };
}

/**
 * Eq that uses strict equality
 */
export function eqStrict<A>(): Eq<A> {
  return { eqv: (x, y) => x === y };
}

// ============================================================================
// Derived Operations
// ============================================================================

/**
 * `x == y`
 */
export function eqOp<A>(E: Eq<A>): (x: A, y: A) => boolean {
  return E.eqv;
}

/**
 * `x != y`
 */
export function neqv<A>(E: Eq<A>): (x: A, y: A) => boolean {
  return (x, y) => !E.eqv(x, y);
}

// ============================================================================
// Reflection views
// ============================================================================

/**
 * Outcome of comparing two values. `Equal` carries a single witness that
 * stands for both operands.
 */
export type EqReflect<A> =
  | { readonly _tag: "Equal"; readonly value: A }
  | { readonly _tag: "NotEqual"; readonly left: A; readonly right: A };

/**
 * Compare x and y, keeping the operands in the result.
 *
 * @example
 * ```typescript
 * const r = eqP(eqNumber)(n, 3);
 * if (r._tag === "Equal") use(r.value);
 * ```
 */
export function eqP<A>(E: Eq<A>): (x: A, y: A) => EqReflect<A> {
  return (x, y) =>
    E.eqv(x, y) ? { _tag: "Equal", value: x } : { _tag: "NotEqual", left: x, right: y };
}

/**
 * Case split on `x == y` that also exposes the booleans `x == y` and
 * `y == x`, for code that needs both the decision and its witness.
 */
export type EqXorNeq<A> =
  | { readonly _tag: "Equal"; readonly value: A; readonly xy: true; readonly yx: true }
  | {
      readonly _tag: "NotEqual";
      readonly left: A;
      readonly right: A;
      readonly xy: false;
      readonly yx: false;
    };

export function eqVneq<A>(E: Eq<A>): (x: A, y: A) => EqXorNeq<A> {
  return (x, y) =>
    E.eqv(x, y)
      ? { _tag: "Equal", value: x, xy: true, yx: true }
      : { _tag: "NotEqual", left: x, right: y, xy: false, yx: false };
}

// ============================================================================
// Construction from a decision procedure
// ============================================================================

export type Decision = { readonly equal: true } | { readonly equal: false };

export const Equal: Decision = { equal: true };
export const Distinct: Decision = { equal: false };

/**
 * Build an Eq from a procedure that decides, for every pair, whether the
 * two values are equal.
 *
 * @example
 * ```typescript
 * const eqColor = comparableEq<Color>((x, y) => (x.hex === y.hex ? Equal : Distinct));
 * ```
 */
export function comparableEq<A>(decide: (x: A, y: A) => Decision): Eq<A> {
  return { eqv: (x, y) => decide(x, y).equal };
}

// ============================================================================
// Transport along maps
// ============================================================================

/**
 * Eq by an injective map: `x == y` iff `f(x) == f(y)`.
 *
 * `f` must be injective on A, otherwise distinct values compare equal.
 */
export function injEq<A, B>(EB: Eq<B>, f: (a: A) => B): Eq<A> {
  return { eqv: (x, y) => EB.eqv(f(x), f(y)) };
}

/**
 * Eq by mapping to a comparable value. Alias of `injEq` for projections
 * that are injective on the values in use (record ids, normalized keys).
 */
export const eqBy: <A, B>(EB: Eq<B>, f: (a: A) => B) => Eq<A> = injEq;

function checkCancel<A, B>(
  what: string,
  EB: Eq<B>,
  f: (a: A) => B,
  back: (b: B) => Option<A>,
  x: A,
): void {
  const fx = f(x);
  const gfx = back(fx);
  if (gfx === null || !EB.eqv(f(gfx), fx)) {
    const message = `${what}: left inverse does not cancel f at ${describeValue(x)}`;
    debugLog("eq", message);
    throw new PreconditionError(message, what);
  }
}

/**
 * Eq from a partial left inverse: given `g(f(x)) = Some(x)` for every x,
 * `f` is injective and `x == y` iff `f(x) == f(y)`.
 *
 * With `contracts.checkCancellation` on, each comparison also checks, at
 * both operands, that `g(f(x))` is defined and that `f(g(f(x))) == f(x)`,
 * and throws PreconditionError if not.
 */
export function pcanEq<A, B>(EB: Eq<B>, f: (a: A) => B, g: (b: B) => Option<A>): Eq<A> {
  return {
    eqv: (x, y) => {
      if (config.get().contracts.checkCancellation) {
        checkCancel("pcanEq", EB, f, g, x);
        checkCancel("pcanEq", EB, f, g, y);
      }
      return EB.eqv(f(x), f(y));
    },
  };
}

/**
 * Eq from a total left inverse: given `g(f(x)) = x` for every x.
 *
 * With `contracts.checkCancellation` on, each comparison also checks, at
 * both operands, that `g(f(x))` is defined and that `f(g(f(x))) == f(x)`,
 * and throws PreconditionError if not.
 */
export function canEq<A, B>(EB: Eq<B>, f: (a: A) => B, g: (b: B) => A): Eq<A> {
  const back = (b: B): Option<A> => g(b);
  return {
    eqv: (x, y) => {
      if (config.get().contracts.checkCancellation) {
        checkCancel("canEq", EB, f, back, x);
        checkCancel("canEq", EB, f, back, y);
      }
      return EB.eqv(f(x), f(y));
    },
  };
}
