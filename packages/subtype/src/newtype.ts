/**
 * Zero-Cost Newtype - branded wrappers with no validation
 *
 * A newtype is the trivial subtype: its predicate accepts every base value,
 * so wrapping never fails. The brand exists only in the type system; at run
 * time the value is the underlying base value.
 *
 * @example
 * ```typescript
 * type UserId = Newtype<number, "UserId">;
 * const UserId = newType<number, "UserId">("UserId");
 *
 * const id = UserId.wrap(42);  // UserId
 * const raw = UserId.unwrap(id); // 42
 *
 * function getUser(id: UserId): User { ... }
 * getUser(42);  // Error: number is not UserId
 * getUser(id);  // OK
 * ```
 */

import { innew, val, type TrivialSubType } from "./subtype.js";

/** Brand symbol for newtype discrimination */
declare const __brand: unique symbol;

/**
 * A branded type that wraps Base with a phantom Brand tag.
 */
export type Newtype<Base extends {}, Brand extends string> = Base & {
  readonly [__brand]: Brand;
};

export interface NewtypeDef<Base extends {}, Brand extends string>
  extends TrivialSubType<Base, Newtype<Base, Brand>> {
  readonly brand: Brand;
  readonly wrap: (value: Base) => Newtype<Base, Brand>;
  readonly unwrap: (value: Newtype<Base, Brand>) => Base;
}

export function newType<Base extends {}, Brand extends string>(brand: Brand): NewtypeDef<Base, Brand> {
  const self: NewtypeDef<Base, Brand> = {
    name: brand,
    brand,
    trivial: true,
    predicate: () => true,
    val: (u) => u,
    // the brand is phantom
    build: (x) => x as Newtype<Base, Brand>,
    wrap: (value) => innew(self, value),
    unwrap: (value) => val(self, value),
  };
  return self;
}
