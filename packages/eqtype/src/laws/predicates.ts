/**
 * Predicate Laws
 *
 * Each combinator agrees with the boolean formula it stands for. The
 * points a1..a4 are drawn from the same arbitrary as x, so collisions
 * between x and the points are exercised.
 *
 * @module
 */

import type { LawSet } from "@decidable/core";
import type { Eq } from "../typeclasses/eq.js";
import {
  pred1,
  pred2,
  pred3,
  pred4,
  predC1,
  predD1,
  predU1,
  type Pred,
} from "../predicates.js";

/**
 * @param P - a fixed predicate used by predU1 / predD1
 */
export function predicateLaws<A>(E: Eq<A>, P: Pred<A>): LawSet<A> {
  const eq = E.eqv;
  return [
    {
      name: "pred1",
      arity: 2,
      proofHint: "reflection",
      check: (x, a) => pred1(E, a)(x) === eq(x, a),
    },
    {
      name: "pred2",
      arity: 3,
      proofHint: "reflection",
      check: (x, a1, a2) => pred2(E, a1, a2)(x) === (eq(x, a1) || eq(x, a2)),
    },
    {
      name: "pred3",
      arity: 4,
      proofHint: "reflection",
      check: (x, a1, a2, a3) =>
        pred3(E, a1, a2, a3)(x) === (eq(x, a1) || eq(x, a2) || eq(x, a3)),
    },
    {
      name: "pred4",
      arity: 5,
      proofHint: "reflection",
      check: (x, a1, a2, a3, a4) =>
        pred4(E, a1, a2, a3, a4)(x) === (eq(x, a1) || eq(x, a2) || eq(x, a3) || eq(x, a4)),
    },
    {
      name: "predU1",
      arity: 2,
      proofHint: "reflection",
      check: (x, a) => predU1(E, a, P)(x) === (eq(x, a) || P(x)),
    },
    {
      name: "predC1",
      arity: 2,
      proofHint: "reflection",
      check: (x, a) => predC1(E, a)(x) === !eq(x, a),
    },
    {
      name: "predD1",
      arity: 2,
      proofHint: "reflection",
      check: (x, a) => predD1(E, P, a)(x) === (!eq(x, a) && P(x)),
    },
    {
      name: "pred1 member",
      arity: 1,
      description: "a belongs to pred1(a)",
      check: (a) => pred1(E, a)(a),
    },
    {
      name: "predD1 removes",
      arity: 1,
      description: "a never belongs to predD1(P, a)",
      check: (a) => !predD1(E, P, a)(a),
    },
  ];
}
