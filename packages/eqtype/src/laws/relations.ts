/**
 * Relation Laws
 *
 *   - frel: frel(f)(x, y) === (f(x) == y), and frel(f)(x, f(x)) always
 *   - Monotonicity: invariant(f, k)(x) => invariant(f, h ∘ k)(x)
 *   - Injective post-composition: invariant(f, h ∘ k)(x) === invariant(f, k)(x)
 *     when h is injective
 *
 * @module
 */

import { combineLaws, defineLaw, type LawSet } from "@decidable/core";
import type { Eq } from "../typeclasses/eq.js";
import { compose, frel, invariant } from "../relations.js";

export function frelLaws<A>(E: Eq<A>, f: (x: A) => A): LawSet<A> {
  return [
    {
      name: "frel",
      arity: 2,
      proofHint: "reflection",
      check: (x, y) => frel(E, f)(x, y) === E.eqv(f(x), y),
    },
    {
      name: "frel image",
      arity: 1,
      check: (x) => frel(E, f)(x, f(x)),
    },
  ];
}

/**
 * @param EK - Eq on the range of k
 * @param EH - Eq on the range of h
 */
export function invariantLaws<A, K, H>(
  EK: Eq<K>,
  EH: Eq<H>,
  f: (x: A) => A,
  k: (x: A) => K,
  h: (y: K) => H,
): LawSet<A> {
  const inv = invariant(EK, f, k);
  const invH = invariant(EH, f, compose(h, k));
  return [
    {
      name: "invariant monotone",
      arity: 1,
      proofHint: "monotonicity",
      description: "invariant(f, k)(x) implies invariant(f, h . k)(x)",
      check: (x) => !inv(x) || invH(x),
    },
  ];
}

/**
 * Additional law for an injective `h`: the invariant set is unchanged.
 */
export function invariantInjLaws<A, K, H>(
  EK: Eq<K>,
  EH: Eq<H>,
  f: (x: A) => A,
  k: (x: A) => K,
  h: (y: K) => H,
): LawSet<A> {
  const inv = invariant(EK, f, k);
  const invH = invariant(EH, f, compose(h, k));
  const unchanged = defineLaw<A>({
    name: "invariant injective",
    arity: 1,
    proofHint: "injectivity",
    description: "invariant(f, h . k)(x) === invariant(f, k)(x) for injective h",
    check: (x) => invH(x) === inv(x),
  });
  return combineLaws(invariantLaws(EK, EH, f, k, h), [unchanged]);
}
