export {
  makeEq,
  eqStrict,
  eqOp,
  neqv,
  eqP,
  eqVneq,
  comparableEq,
  injEq,
  eqBy,
  pcanEq,
  canEq,
  Equal,
  Distinct,
  type Eq,
  type EqReflect,
  type EqXorNeq,
  type Decision,
} from "./eq.js";
