/**
 * SubType Laws
 *
 * Laws range over base values: subtype values are obtained from them with
 * `insub`, so every law also sees the values the predicate rejects.
 *
 *   - val of Sub: P(x) => val(Sub(x)) == x
 *   - Partiality: insub(x) is Some iff P(x)
 *   - insub value: insub(x) = Some(u) => val(u) == x
 *   - Round trip: insub(val(u)) == Some(u)
 *   - Injectivity: (val(u) == val(v)) === (u == v)
 *   - val reflection: eqSub(u, v) === (val(u) == val(v))
 *   - insubd default: insubd(u0, x) is insub(x), or u0 when P(x) fails
 *   - insubEq agrees with insub
 *
 * @module
 */

import type { LawSet } from "@decidable/core";
import { eqOption, type Eq } from "@decidable/eqtype";
import { eqSub } from "./eq.js";
import { insub, insubd, insubEq, Sub, type SubType } from "./subtype.js";

/**
 * @param EB - Eq on the base type
 * @param ES - Eq on the subtype representation
 */
export function subTypeLaws<Base, S extends {}>(
  ST: SubType<Base, S>,
  EB: Eq<Base>,
  ES: Eq<S>,
): LawSet<Base> {
  const EOS = eqOption(ES);
  const bridge = eqSub(ST, EB);
  const P = ST.predicate;

  return [
    {
      name: "val of Sub",
      arity: 1,
      proofHint: "cancellation",
      description: "P(x) implies val(Sub(x)) == x",
      check: (x) => !P(x) || EB.eqv(ST.val(Sub(ST, x)), x),
    },
    {
      name: "partiality",
      arity: 1,
      proofHint: "reflection",
      description: "insub(x) is Some exactly when P(x)",
      check: (x) => (insub(ST, x) !== null) === P(x),
    },
    {
      name: "insub value",
      arity: 1,
      description: "insub(x) = Some(u) implies val(u) == x",
      check: (x) => {
        const u = insub(ST, x);
        return u === null || EB.eqv(ST.val(u), x);
      },
    },
    {
      name: "round trip",
      arity: 1,
      proofHint: "cancellation",
      description: "insub(val(u)) == Some(u)",
      check: (x) => {
        const u = insub(ST, x);
        return u === null || EOS.eqv(insub(ST, ST.val(u)), u);
      },
    },
    {
      name: "val injective",
      arity: 2,
      proofHint: "injectivity",
      description: "(val(u) == val(v)) === (u == v)",
      check: (x, y) => {
        const u = insub(ST, x);
        const v = insub(ST, y);
        if (u === null || v === null) return true;
        return EB.eqv(ST.val(u), ST.val(v)) === ES.eqv(u, v);
      },
    },
    {
      name: "val reflection",
      arity: 2,
      proofHint: "reflection",
      description: "eqSub(u, v) === (val(u) == val(v))",
      check: (x, y) => {
        const u = insub(ST, x);
        const v = insub(ST, y);
        if (u === null || v === null) return true;
        return bridge.eqv(u, v) === EB.eqv(ST.val(u), ST.val(v));
      },
    },
    {
      name: "insubd default",
      arity: 2,
      description: "insubd(u0, x) is insub(x) when P(x), otherwise u0",
      check: (d, x) => {
        const u0 = insub(ST, d);
        if (u0 === null) return true;
        const expected = P(x) ? Sub(ST, x) : u0;
        return ES.eqv(insubd(ST, u0, x), expected);
      },
    },
    {
      name: "insubEq",
      arity: 1,
      description: "insubEq(x) == insub(x)",
      check: (x) => EOS.eqv(insubEq(ST, x), insub(ST, x)),
    },
  ];
}
