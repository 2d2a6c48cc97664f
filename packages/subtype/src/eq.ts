/**
 * Equality on subtypes
 *
 * A subtype inherits decidable equality from its base type through `val`:
 * since `val` is injective, `u == v` iff `val(u) == val(v)`. The
 * reflection `(val u == val v) <=> (u == v)` is the "val reflection" law of
 * `subTypeLaws`.
 */

import type { TypeKey } from "@decidable/core";
import { injEq, registerEq, type Eq } from "@decidable/eqtype";
import type { SubType } from "./subtype.js";

export function eqSub<Base, S extends {}>(ST: SubType<Base, S>, EB: Eq<Base>): Eq<S> {
  return injEq(EB, ST.val);
}

/**
 * Build `eqSub(ST, EB)` and register it as the canonical Eq for `key`.
 */
export function registerSubEq<Base, S extends {}>(
  key: TypeKey<S>,
  ST: SubType<Base, S>,
  EB: Eq<Base>,
): Eq<S> {
  const E = eqSub(ST, EB);
  registerEq(key, E, true);
  return E;
}
