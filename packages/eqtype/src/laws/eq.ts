/**
 * Eq Laws
 *
 *   - Reflexivity: eqv(x, x) === true
 *   - Symmetry: eqv(x, y) === eqv(y, x)
 *   - Transitivity: eqv(x, y) && eqv(y, z) => eqv(x, z)
 *   - Reflection: eqP and eqVneq agree with eqv
 *   - Negation: neqv(x, y) === !eqv(x, y)
 *
 * For derived instances:
 *   - Injectivity: (f(x) == f(y)) === (x == y)
 *   - Cancellation: g(f(x)) == Some(x)
 *
 * @module
 */

import type { LawSet } from "@decidable/core";
import { eqOption } from "../instances.js";
import type { Option } from "../data/option.js";
import { eqP, eqVneq, neqv, type Eq } from "../typeclasses/eq.js";

/**
 * Generate laws for an Eq instance.
 */
export function eqLaws<A>(E: Eq<A>): LawSet<A> {
  return [
    {
      name: "reflexivity",
      arity: 1,
      proofHint: "reflexivity",
      description: "Every value is equal to itself: eqv(x, x) === true",
      check: (x) => E.eqv(x, x),
    },
    {
      name: "symmetry",
      arity: 2,
      proofHint: "symmetry",
      description: "Equality is symmetric: eqv(x, y) === eqv(y, x)",
      check: (x, y) => E.eqv(x, y) === E.eqv(y, x),
    },
    {
      name: "transitivity",
      arity: 3,
      proofHint: "transitivity",
      description: "Equality is transitive: eqv(x, y) && eqv(y, z) implies eqv(x, z)",
      check: (x, y, z) => !(E.eqv(x, y) && E.eqv(y, z)) || E.eqv(x, z),
    },
    {
      name: "reflection",
      arity: 2,
      proofHint: "reflection",
      description: "eqP(x, y) is Equal exactly when eqv(x, y)",
      check: (x, y) => (eqP(E)(x, y)._tag === "Equal") === E.eqv(x, y),
    },
    {
      name: "case split",
      arity: 2,
      proofHint: "reflection",
      description: "eqVneq(x, y) carries eqv(x, y) and eqv(y, x)",
      check: (x, y) => {
        const split = eqVneq(E)(x, y);
        return split.xy === E.eqv(x, y) && split.yx === E.eqv(y, x);
      },
    },
    {
      name: "negation",
      arity: 2,
      description: "neqv(x, y) === !eqv(x, y)",
      check: (x, y) => neqv(E)(x, y) === !E.eqv(x, y),
    },
  ];
}

/**
 * Laws tying an Eq on A to an Eq on B through an injective `f`.
 * Holds for `injEq(EB, f)` whenever f is injective w.r.t. `EA`.
 */
export function injEqLaws<A, B>(EA: Eq<A>, EB: Eq<B>, f: (a: A) => B): LawSet<A> {
  return [
    {
      name: "injectivity",
      arity: 2,
      proofHint: "injectivity",
      description: "(f(x) == f(y)) === (x == y)",
      check: (x, y) => EB.eqv(f(x), f(y)) === EA.eqv(x, y),
    },
  ];
}

/**
 * Laws for a partial left inverse `g` of `f`: `g(f(x)) == Some(x)`.
 */
export function pcancelLaws<A, B>(
  EA: Eq<A>,
  f: (a: A) => B,
  g: (b: B) => Option<A>,
): LawSet<A> {
  const EO = eqOption(EA);
  return [
    {
      name: "partial cancellation",
      arity: 1,
      proofHint: "cancellation",
      description: "g(f(x)) == Some(x)",
      check: (x) => EO.eqv(g(f(x)), x),
    },
  ];
}
