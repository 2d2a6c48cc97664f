/**
 * Option Data Type (Zero-Cost Implementation)
 *
 * Option represents an optional value: every Option<A> is either a value A or null.
 * `insub` returns an Option, so partiality is visible in the type and every
 * caller branches on it.
 *
 * ## Runtime Representation
 *
 * ```typescript
 * Option<number>  // At runtime: number | null
 * Some(42)        // At runtime: 42
 * None            // At runtime: null
 * ```
 */

// ============================================================================
// Option Type Definition (Zero-Cost)
// ============================================================================

/**
 * Defined<T> - Wrapper for values that may legitimately include null.
 *
 * Use it for `Option<null>`, `Option<string | null>` or nested options,
 * which would otherwise collapse into `T | null`.
 *
 * @example
 * ```ts
 * const present = defined(null);                  // { value: null } - Some(null)
 * const absent: Option<Defined<null>> = None;     // null - None
 * ```
 */
export type Defined<T> = { readonly value: T };

export function defined<T>(value: T): Defined<T> {
  return { value };
}

export function unwrapDefined<T>(d: Defined<T>): T {
  return d.value;
}

/**
 * Option data type - either a value A or null.
 *
 * **Important**: A must not include null. Use `Option<Defined<T>>` for
 * payloads that can be null.
 */
export type Option<A> = A | null;

/**
 * Some type - at runtime it's just A
 */
export type Some<A> = A;

/**
 * None type - at runtime it's null
 */
export type None = null;

// ============================================================================
// Constructors
// ============================================================================

/**
 * Create a Some value (just returns the value as-is)
 */
export function Some<A>(value: A): Option<A> {
  return value;
}

/**
 * The None value (null)
 */
export const None: Option<never> = null;

/**
 * Create an Option from a nullable value
 */
export function fromNullable<A>(value: A | null | undefined): Option<A> {
  return value === undefined ? null : value;
}

/**
 * Create an Option from a predicate
 */
export function fromPredicate<A>(value: A, predicate: (a: A) => boolean): Option<A> {
  return predicate(value) ? value : null;
}

// ============================================================================
// Type Guards
// ============================================================================

export function isSome<A>(opt: Option<A>): opt is A {
  return opt !== null;
}

export function isNone<A>(opt: Option<A>): opt is null {
  return opt === null;
}

// ============================================================================
// Operations
// ============================================================================

export function map<A, B>(opt: Option<A>, f: (a: A) => B): Option<B> {
  return opt === null ? null : f(opt);
}

export function flatMap<A, B>(opt: Option<A>, f: (a: A) => Option<B>): Option<B> {
  return opt === null ? null : f(opt);
}

export function fold<A, B>(opt: Option<A>, onNone: () => B, onSome: (a: A) => B): B {
  return opt === null ? onNone() : onSome(opt);
}

export function getOrElse<A>(opt: Option<A>, defaultValue: () => A): A {
  return opt === null ? defaultValue() : opt;
}

export function getOrElseStrict<A>(opt: Option<A>, defaultValue: A): A {
  return opt === null ? defaultValue : opt;
}

export function toArray<A>(opt: Option<A>): A[] {
  return opt === null ? [] : [opt];
}

// ============================================================================
// Namespace object: `Option.map(...)`, `Option.fold(...)`
// ============================================================================

export const Option = {
  Some,
  None,
  fromNullable,
  fromPredicate,
  isSome,
  isNone,
  map,
  flatMap,
  fold,
  getOrElse,
  getOrElseStrict,
  toArray,
} as const;
