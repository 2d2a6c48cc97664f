export { eqLaws, injEqLaws, pcancelLaws } from "./eq.js";
export { predicateLaws } from "./predicates.js";
export { frelLaws, invariantLaws, invariantInjLaws } from "./relations.js";
export { taggedLaws } from "./tagged.js";
