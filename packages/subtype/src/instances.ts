/**
 * The table of registered subtypes, keyed by the subtype's own type, so
 * `summonSubType(EvenNatKey)` hands back the `SubType<number, EvenNat>`
 * registered for it.
 */

import { createInstanceTable, type InstanceF, type TypeKey } from "@decidable/core";
import type { SubType } from "./subtype.js";

export interface SubTypeF extends InstanceF {
  readonly instance: this["__kind__"];
}

export type SubTypeKey<Base, S extends {}> = TypeKey<SubType<Base, S>>;

export const subTypeInstances = createInstanceTable<SubTypeF>("SubType");

export function registerSubType<Base, S extends {}>(
  key: SubTypeKey<Base, S>,
  ST: SubType<Base, S>,
): void {
  subTypeInstances.register(key, ST);
}

export function summonSubType<Base, S extends {}>(key: SubTypeKey<Base, S>): SubType<Base, S> {
  return subTypeInstances.summon(key);
}
