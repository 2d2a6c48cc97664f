/**
 * Relations derived from functions
 *
 * `frel(E, f)` reads an endofunction as the relation "y is the image of x".
 * `invariant(EK, f, k)` is the set of points whose k-projection does not
 * change when f is applied.
 *
 * Post-composing k with any h only grows the invariant set; with an
 * injective h it stays the same (`invariantLaws`).
 */

import type { Eq } from "./typeclasses/eq.js";
import type { Pred } from "./predicates.js";

export type Rel<A> = (x: A, y: A) => boolean;

/** `f(x) == y` */
export function frel<A>(E: Eq<A>, f: (x: A) => A): Rel<A> {
  return (x, y) => E.eqv(f(x), y);
}

/** `k(f(x)) == k(x)` */
export function invariant<A, K>(EK: Eq<K>, f: (x: A) => A, k: (x: A) => K): Pred<A> {
  return (x) => EK.eqv(k(f(x)), k(x));
}

/** `h ∘ k` */
export function compose<A, B, C>(h: (b: B) => C, k: (a: A) => B): (a: A) => C {
  return (a) => h(k(a));
}

/** The relation with its arguments swapped. */
export function relFlip<A>(R: Rel<A>): Rel<A> {
  return (x, y) => R(y, x);
}

/**
 * The points of `xs` that are invariant, in order.
 */
export function invariantFor<A, K>(
  EK: Eq<K>,
  f: (x: A) => A,
  k: (x: A) => K,
  xs: readonly A[],
): A[] {
  return xs.filter(invariant(EK, f, k));
}
