/**
 * Data Types Index
 *
 * - Type: `Option<A>`, `Sum<A, B>`, `TaggedValue<I, T>`
 * - Operations: `Option.map(...)`, `Sum.fold(...)`
 * - Constructors: `Some(...)`, `None`, `Inl(...)`, `Inr(...)`, `Tagged(...)`
 */

// Option is both a type (Option<A> = A | null) and a namespace object
export {
  Option,
  Some,
  None,
  isSome,
  isNone,
  fromNullable,
  fromPredicate,
  defined,
  unwrapDefined,
} from "./option.js";
export type { Defined } from "./option.js";

export { Sum, Inl, Inr, isInl, isInr } from "./sum.js";

export {
  Tagged,
  tagger,
  tag,
  tagged,
  taggedAs,
  type TaggedValue,
  type TaggedUnion,
} from "./tagged.js";
