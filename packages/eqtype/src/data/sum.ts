/**
 * Sum Data Type
 *
 * Sum<A, B> is the disjoint union of A and B: a value is either injected on
 * the left (`Inl`) or on the right (`Inr`). Two values on different sides
 * are never equal, even when their payloads coincide.
 */

export type Sum<A, B> = Inl<A> | Inr<B>;

export interface Inl<A> {
  readonly _tag: "Inl";
  readonly left: A;
}

export interface Inr<B> {
  readonly _tag: "Inr";
  readonly right: B;
}

// ============================================================================
// Constructors
// ============================================================================

export function Inl<A, B = never>(left: A): Sum<A, B> {
  return { _tag: "Inl", left };
}

export function Inr<A = never, B = unknown>(right: B): Sum<A, B> {
  return { _tag: "Inr", right };
}

// ============================================================================
// Type Guards
// ============================================================================

export function isInl<A, B>(sum: Sum<A, B>): sum is Inl<A> {
  return sum._tag === "Inl";
}

export function isInr<A, B>(sum: Sum<A, B>): sum is Inr<B> {
  return sum._tag === "Inr";
}

// ============================================================================
// Operations
// ============================================================================

export function fold<A, B, C>(sum: Sum<A, B>, onLeft: (a: A) => C, onRight: (b: B) => C): C {
  return sum._tag === "Inl" ? onLeft(sum.left) : onRight(sum.right);
}

export function swap<A, B>(sum: Sum<A, B>): Sum<B, A> {
  return sum._tag === "Inl" ? Inr(sum.left) : Inl(sum.right);
}

// ============================================================================
// Namespace object: `Sum.fold(...)`, `Sum.swap(...)`
// ============================================================================

export const Sum = {
  Inl,
  Inr,
  isInl,
  isInr,
  fold,
  swap,
} as const;
