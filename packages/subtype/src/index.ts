/**
 * @decidable/subtype — values of a type restricted by a predicate
 *
 * - `SubType<Base, S>` and its operations (`val`, `Sub`, `insub`, `insubd`,
 *   `insubEq`, `innew`, `subElim`)
 * - Representations: `sigSubType` (frozen record), `refinement` (branded
 *   base value), `newType` (branded, no predicate), `subTypeOf` (any)
 * - `eqSub`: equality inherited from the base type
 * - The subtype table and `subTypeLaws`
 *
 * @example
 * ```typescript
 * import { refinement, insub, eqSub } from "@decidable/subtype";
 * import { eqNumber } from "@decidable/eqtype";
 *
 * const Even = refinement<number, "Even">((n) => n % 2 === 0, "Even");
 * insub(Even, 4); // 4
 * insub(Even, 5); // null
 * eqSub(Even, eqNumber).eqv(Even.refine(2), Even.refine(2)); // true
 * ```
 */

export {
  val,
  Sub,
  insub,
  insubd,
  insubEq,
  innew,
  subElim,
  isSub,
  valOption,
  subTypeOf,
  sigSubType,
  type SubType,
  type TrivialSubType,
  type SubTypeDef,
  type Sig,
} from "./subtype.js";

export {
  refinement,
  composeRefinements,
  Positive,
  NonNegative,
  Int,
  Nat,
  NonEmpty,
  type Refined,
  type Refinement,
  type SafeRefine,
} from "./refined.js";

export { newType, type Newtype, type NewtypeDef } from "./newtype.js";

export { eqSub, registerSubEq } from "./eq.js";

export {
  subTypeInstances,
  registerSubType,
  summonSubType,
  type SubTypeF,
  type SubTypeKey,
} from "./instances.js";

export { subTypeLaws } from "./laws.js";
