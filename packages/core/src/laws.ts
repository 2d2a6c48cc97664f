/**
 * Law Definition Types
 *
 * A law is a predicate every valid instance must satisfy. Laws here range
 * over a single value type: a law of arity 3 over `A` is checked against
 * three arbitrary values of `A`. Laws that need values of a second type
 * (a subtype built from a base value, a function image) derive them from
 * the `A` inputs inside `check`.
 *
 * @example
 * ```typescript
 * const reflexivity: Law<number> = {
 *   name: "reflexivity",
 *   arity: 1,
 *   proofHint: "reflexivity",
 *   check: (x) => eqNumber.eqv(x, x),
 * };
 * ```
 *
 * @module
 */

/**
 * The algebraic shape a law expresses, kept for reporting and filtering.
 */
export type ProofHint =
  | "reflexivity"
  | "symmetry"
  | "transitivity"
  | "reflection"
  | "injectivity"
  | "cancellation"
  | "monotonicity"
  | "identity";

export interface Law<A> {
  /** Short name, used as the test description. */
  readonly name: string;

  /** Number of arbitrary values passed to `check`. */
  readonly arity: number;

  /** True when the law holds for the given inputs. */
  readonly check: (...args: A[]) => boolean;

  readonly proofHint?: ProofHint;

  /** Plain statement of the law, shown when it fails. */
  readonly description?: string;
}

export type LawSet<A> = readonly Law<A>[];

export function defineLaw<A>(law: Law<A>): Law<A> {
  return law;
}

/**
 * Combine multiple law sets into one.
 */
export function combineLaws<A>(...lawSets: LawSet<A>[]): LawSet<A> {
  return lawSets.flat();
}
