/**
 * @decidable/eqtype — decidable equality
 *
 * - `Eq<A>` and its derived operations (`eqOp`, `neqv`, `eqP`, `eqVneq`)
 * - Constructors: `makeEq`, `comparableEq`, `injEq`, `pcanEq`, `canEq`
 * - Predicate combinators (`pred1`..`pred4`, `predU1`, `predC1`, `predD1`)
 * - Function relations (`frel`, `invariant`)
 * - Instances for unit, boolean, number, string, bigint, pairs, triples,
 *   arrays, sums, options and tagged values
 * - The canonical instance table and law sets
 *
 * @example
 * ```typescript
 * import { eqOption, eqNumber, Some, None } from "@decidable/eqtype";
 *
 * const eq = eqOption(eqNumber);
 * eq.eqv(Some(3), Some(3)); // true
 * eq.eqv(Some(3), None);    // false
 * ```
 */

export * from "./typeclasses/index.js";
export * from "./data/index.js";

export {
  pred1,
  pred2,
  pred3,
  pred4,
  predU1,
  predC1,
  predD1,
  predT,
  predC,
  predU,
  predI,
  predD,
  type Pred,
} from "./predicates.js";

export { frel, invariant, invariantFor, compose, relFlip, type Rel } from "./relations.js";

export {
  eqUnit,
  eqBoolean,
  eqNumber,
  eqString,
  eqBigint,
  eqPair,
  eqTriple,
  eqArray,
  eqSum,
  eqOption,
  eqTagged,
  eqSigma,
  eqInstances,
  registerEq,
  summonEq,
  UnitKey,
  BooleanKey,
  NumberKey,
  StringKey,
  BigintKey,
  type EqFamily,
  type EqF,
} from "./instances.js";

export * from "./laws/index.js";
