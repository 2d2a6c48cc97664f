/**
 * Refinement Types
 *
 * TypeScript cannot express "an even natural number" or "a non-empty string"
 * at the type level. A refinement attaches a predicate to a base type and
 * brands the values that passed it. At run time a refined value is just the
 * base value; the brand exists only in the type system.
 *
 * - `Refined<number, "Port">` is assignable to `number` (widening)
 * - `number` is NOT assignable to `Refined<number, "Port">` (narrowing
 *   requires validation)
 *
 * A `Refinement` is a `SubType` whose `val` is the identity, so every
 * subtype operation applies to it.
 *
 * @example
 * ```typescript
 * type Port = Refined<number, "Port">;
 * const Port = refinement<number, "Port">(
 *   (n) => Number.isInteger(n) && n >= 1 && n <= 65535,
 *   "Port",
 * );
 *
 * const port = Port.refine(8080); // Port
 * Port.refine(0);                 // throws PreconditionError
 * Port.from(0);                   // null
 *
 * function listen(port: Port): void { ... }
 * listen(8080);         // Error: number is not Port
 * listen(port);         // OK
 * ```
 */

import { describeValue } from "@decidable/core";
import { Sub, insub, type SubType } from "./subtype.js";
import type { Option } from "@decidable/eqtype";

// ============================================================================
// Type-Level API
// ============================================================================

/** Brand symbol for refinement types */
declare const __refined__: unique symbol;

/**
 * A refined type: Base with a brand that encodes the refinement. Base
 * excludes `null` and `undefined`, which stand for "no value" in `from`.
 */
export type Refined<Base extends {}, Brand extends string> = Base & {
  readonly [__refined__]: Brand;
};

export type SafeRefine<T> = { ok: true; value: T } | { ok: false; error: string };

/**
 * A refinement: a predicate paired with a brand.
 */
export interface Refinement<Base extends {}, Brand extends string>
  extends SubType<Base, Refined<Base, Brand>> {
  readonly brand: Brand;

  /** Validate and refine a value. Throws PreconditionError if the predicate fails. */
  readonly refine: (value: Base) => Refined<Base, Brand>;

  /** Check if a value satisfies the refinement without throwing. */
  readonly is: (value: Base) => value is Refined<Base, Brand>;

  /** Refine a value, or None if validation fails. */
  readonly from: (value: Base) => Option<Refined<Base, Brand>>;

  /** Refine a value, returning a Result-like object. */
  readonly safe: (value: Base) => SafeRefine<Refined<Base, Brand>>;
}

function brandAs<Base extends {}, Brand extends string>(value: Base): Refined<Base, Brand> {
  // the brand is phantom; callers have checked the predicate
  return value as Refined<Base, Brand>;
}

/**
 * Create a refinement from a predicate.
 *
 * @example
 * ```typescript
 * const Positive = refinement<number, "Positive">((n) => n > 0, "Positive");
 *
 * const x = Positive.refine(42); // Refined<number, "Positive">
 * const y = Positive.refine(-1); // throws
 * ```
 */
export function refinement<Base extends {}, Brand extends string>(
  predicate: (value: Base) => boolean,
  brand: Brand,
): Refinement<Base, Brand> {
  const self: Refinement<Base, Brand> = {
    name: brand,
    brand,
    predicate,
    trivial: false,
    val: (u) => u,
    build: (x) => brandAs<Base, Brand>(x),

    refine: (value) => Sub(self, value),

    is: (value): value is Refined<Base, Brand> => predicate(value),

    from: (value) => insub(self, value),

    safe: (value) => {
      if (predicate(value)) {
        return { ok: true, value: brandAs<Base, Brand>(value) };
      }
      return { ok: false, error: `${describeValue(value)} is not a valid ${brand}` };
    },
  };
  return self;
}

/**
 * Compose two refinements: the value must satisfy both predicates.
 *
 * @example
 * ```typescript
 * const PositiveInt = composeRefinements(Positive, Int, "PositiveInt");
 * ```
 */
export function composeRefinements<
  Base extends {},
  B1 extends string,
  B2 extends string,
  Brand extends string,
>(
  r1: Refinement<Base, B1>,
  r2: Refinement<Base, B2>,
  brand: Brand,
): Refinement<Base, Brand> {
  return refinement<Base, Brand>((value) => r1.is(value) && r2.is(value), brand);
}

// ============================================================================
// Built-in Refinements
// ============================================================================

export type Positive = Refined<number, "Positive">;
export const Positive = refinement<number, "Positive">((n) => n > 0, "Positive");

export type NonNegative = Refined<number, "NonNegative">;
export const NonNegative = refinement<number, "NonNegative">((n) => n >= 0, "NonNegative");

export type Int = Refined<number, "Int">;
export const Int = refinement<number, "Int">((n) => Number.isInteger(n), "Int");

export type Nat = Refined<number, "Nat">;
export const Nat = composeRefinements(Int, NonNegative, "Nat");

export type NonEmpty = Refined<string, "NonEmpty">;
export const NonEmpty = refinement<string, "NonEmpty">((s) => s.length > 0, "NonEmpty");
