/**
 * Predicate Combinators
 *
 * Boolean predicates built from an Eq instance. Read `pred2(E, a, b)` as the
 * set `{a, b}`: `pred2(E, a, b)(x)` is membership of x.
 *
 * Each combinator agrees with the boolean formula it is named after; the
 * agreement is stated as `predicateLaws` in ./laws/predicates.ts.
 */

import type { Eq } from "./typeclasses/eq.js";

export type Pred<A> = (x: A) => boolean;

// ============================================================================
// Membership in small sets
// ============================================================================

/** `x == a` */
export function pred1<A>(E: Eq<A>, a: A): Pred<A> {
  return (x) => E.eqv(x, a);
}

/** `x == a1 || x == a2` */
export function pred2<A>(E: Eq<A>, a1: A, a2: A): Pred<A> {
  return (x) => E.eqv(x, a1) || E.eqv(x, a2);
}

/** `x == a1 || x == a2 || x == a3` */
export function pred3<A>(E: Eq<A>, a1: A, a2: A, a3: A): Pred<A> {
  return (x) => E.eqv(x, a1) || E.eqv(x, a2) || E.eqv(x, a3);
}

/** `x == a1 || x == a2 || x == a3 || x == a4` */
export function pred4<A>(E: Eq<A>, a1: A, a2: A, a3: A, a4: A): Pred<A> {
  return (x) => E.eqv(x, a1) || E.eqv(x, a2) || E.eqv(x, a3) || E.eqv(x, a4);
}

// ============================================================================
// Adding and removing one point
// ============================================================================

/** `x == a || P(x)`: P with a added */
export function predU1<A>(E: Eq<A>, a: A, P: Pred<A>): Pred<A> {
  return (x) => E.eqv(x, a) || P(x);
}

/** `x != a`: everything but a */
export function predC1<A>(E: Eq<A>, a: A): Pred<A> {
  return (x) => !E.eqv(x, a);
}

/** `x != a && P(x)`: P with a removed */
export function predD1<A>(E: Eq<A>, P: Pred<A>, a: A): Pred<A> {
  return (x) => !E.eqv(x, a) && P(x);
}

// ============================================================================
// General set operations
// ============================================================================

export function predT<A>(): Pred<A> {
  return () => true;
}

export function predC<A>(P: Pred<A>): Pred<A> {
  return (x) => !P(x);
}

export function predU<A>(P: Pred<A>, Q: Pred<A>): Pred<A> {
  return (x) => P(x) || Q(x);
}

export function predI<A>(P: Pred<A>, Q: Pred<A>): Pred<A> {
  return (x) => P(x) && Q(x);
}

/** `!Q(x) && P(x)`: P minus Q */
export function predD<A>(P: Pred<A>, Q: Pred<A>): Pred<A> {
  return (x) => !Q(x) && P(x);
}
