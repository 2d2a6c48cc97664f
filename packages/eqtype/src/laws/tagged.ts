/**
 * Tagged Equality Laws
 *
 * An Eq on tagged values must agree with the rule: two values are equal iff
 * their tags are equal and, read at the first tag, their payloads are equal.
 * The rule is stated here from `EI` and `eqAt` alone, so it checks
 * `eqTagged` and `eqSigma` (or any hand-written instance) from outside.
 *
 * @module
 */

import type { LawSet } from "@decidable/core";
import type { Eq } from "../typeclasses/eq.js";
import type { TaggedValue } from "../data/tagged.js";

/**
 * @param E - the instance under test
 * @param EI - Eq on tags
 * @param eqAt - Eq on the payloads of each tag
 */
export function taggedLaws<I, T, U extends TaggedValue<I, T>>(
  E: Eq<U>,
  EI: Eq<I>,
  eqAt: (i: I) => Eq<T>,
): LawSet<U> {
  return [
    {
      name: "tagged equality",
      arity: 2,
      proofHint: "reflection",
      description: "u == v iff tag(u) == tag(v) and tagged(u) == tagged(v) at tag(u)",
      check: (u, v) => {
        const sameTag = EI.eqv(u.tag, v.tag);
        const expected = sameTag && eqAt(u.tag).eqv(u.tagged, v.tagged);
        return E.eqv(u, v) === expected;
      },
    },
    {
      name: "cross-tag",
      arity: 2,
      description: "values with different tags are never equal",
      check: (u, v) => EI.eqv(u.tag, v.tag) || !E.eqv(u, v),
    },
  ];
}
