/**
 * SubType operations over the three representations: a frozen record, a
 * branded refinement and a user-defined class.
 */

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { PreconditionError } from "@decidable/core";
import {
  defined,
  eqNumber,
  eqOption,
  makeEq,
  None,
  unwrapDefined,
  type Defined,
  type Eq,
} from "@decidable/eqtype";
import { checkLaws, lawResults } from "@decidable/testing";
import {
  val,
  Sub,
  insub,
  insubd,
  insubEq,
  subElim,
  isSub,
  valOption,
  subTypeOf,
  sigSubType,
  refinement,
  eqSub,
  subTypeLaws,
  type Refined,
  type Sig,
} from "../index.js";

const isEvenNat = (n: number): boolean => Number.isInteger(n) && n >= 0 && n % 2 === 0;

const EvenNat = sigSubType<number, "EvenNat">("EvenNat", isEvenNat);
const eqEvenNat = eqSub(EvenNat, eqNumber);
const sameVal = makeEq<Sig<number, "EvenNat">>((u, v) => u.val === v.val);

const small = fc.integer({ min: -6, max: 6 });

describe("sigSubType (even naturals)", () => {
  it("insub accepts values that satisfy the predicate", () => {
    const u = insub(EvenNat, 4);
    expect(u).not.toBeNull();
    expect(valOption(EvenNat, u)).toBe(4);
  });

  it("insub rejects values that do not", () => {
    expect(insub(EvenNat, 5)).toBeNull();
    expect(insub(EvenNat, -2)).toBeNull();
  });

  it("stores the base value in a frozen record", () => {
    const u = Sub(EvenNat, 6);
    expect(u).toEqual({ val: 6 });
    expect(Object.isFrozen(u)).toBe(true);
    expect(val(EvenNat, u)).toBe(6);
  });

  it("Sub throws PreconditionError naming the subtype and value", () => {
    expect(() => Sub(EvenNat, 5)).toThrow(PreconditionError);
    expect(() => Sub(EvenNat, 5)).toThrow("EvenNat: 5 does not satisfy the predicate");
  });

  it("insubd falls back to the default", () => {
    const zero = Sub(EvenNat, 0);
    expect(val(EvenNat, insubd(EvenNat, zero, 8))).toBe(8);
    expect(insubd(EvenNat, zero, 7)).toBe(zero);
  });

  it("insubEq agrees with insub", () => {
    expect(insubEq(EvenNat, 5)).toBeNull();
    expect(insubEq(EvenNat, 2)).toEqual({ val: 2 });
  });

  it("subElim hands over the base value and the rebuilt value", () => {
    const u = Sub(EvenNat, 10);
    const seen = subElim(EvenNat, u, (x, rebuilt) => [x, eqEvenNat.eqv(rebuilt, u)]);
    expect(seen).toEqual([10, true]);
  });

  it("isSub decides the predicate", () => {
    expect(isSub(EvenNat, 2)).toBe(true);
    expect(isSub(EvenNat, 3)).toBe(false);
  });

  it("valOption keeps None", () => {
    expect(valOption(EvenNat, None)).toBeNull();
  });

  it("compares by base value", () => {
    expect(eqEvenNat.eqv(Sub(EvenNat, 2), Sub(EvenNat, 2))).toBe(true);
    expect(eqEvenNat.eqv(Sub(EvenNat, 2), Sub(EvenNat, 4))).toBe(false);
  });

  it("satisfies the subtype laws", () => {
    checkLaws(subTypeLaws(EvenNat, eqNumber, sameVal), small);
  });

  it("reports a subtype Eq that identifies distinct values", () => {
    const everything = makeEq<Sig<number, "EvenNat">>(() => true);
    const failed = lawResults(
      subTypeLaws(EvenNat, eqNumber, everything),
      fc.constantFrom(0, 2, 4),
    )
      .filter((r) => !r.passed)
      .map((r) => r.law);
    expect(failed).toEqual(["val injective"]);
  });
});

describe("refinement as a subtype", () => {
  const Even = refinement<number, "Even">(isEvenNat, "Even");
  const eqEven: Eq<Refined<number, "Even">> = eqNumber;

  it("uses the base value as its representation", () => {
    expect(insub(Even, 4)).toBe(4);
    expect(insub(Even, 5)).toBeNull();
  });

  it("satisfies the subtype laws", () => {
    checkLaws(subTypeLaws(Even, eqNumber, eqEven), small);
  });
});

describe("subTypeOf", () => {
  class Percent {
    constructor(readonly value: number) {}
  }

  const PercentT = subTypeOf<number, Percent>({
    name: "Percent",
    predicate: (n) => n >= 0 && n <= 100,
    val: (p) => p.value,
    build: (n) => new Percent(n),
  });
  const eqPercent = makeEq<Percent>((p, q) => p.value === q.value);

  it("is never trivial", () => {
    expect(PercentT.trivial).toBe(false);
  });

  it("builds instances of the user representation", () => {
    const p = insub(PercentT, 40);
    expect(p).toBeInstanceOf(Percent);
    expect(insub(PercentT, 140)).toBeNull();
  });

  it("satisfies the subtype laws", () => {
    checkLaws(
      subTypeLaws(PercentT, eqNumber, eqPercent),
      fc.integer({ min: -10, max: 110 }),
    );
  });
});

describe("nullable base values", () => {
  const MaybeSmall = sigSubType<number | null, "MaybeSmall">(
    "MaybeSmall",
    (n) => n === null || n < 10,
  );
  const sameSmall = makeEq<Sig<number | null, "MaybeSmall">>((u, v) => u.val === v.val);

  it("keeps a valid null apart from None", () => {
    expect(isSub(MaybeSmall, null)).toBe(true);
    expect(insub(MaybeSmall, null)).toEqual({ val: null });
    expect(insub(MaybeSmall, 12)).toBeNull();
  });

  it("returns a null base value from insubd instead of the default", () => {
    expect(insubd(MaybeSmall, Sub(MaybeSmall, 1), null)).toEqual({ val: null });
  });

  it("satisfies the subtype laws", () => {
    checkLaws(
      subTypeLaws(MaybeSmall, eqOption(eqNumber), sameSmall),
      fc.option(fc.integer({ min: 0, max: 20 }), { nil: null }),
    );
  });

  it("boxes a nullable base with Defined", () => {
    const OptionalName = subTypeOf<string | null, Defined<string | null>>({
      name: "OptionalName",
      predicate: () => true,
      val: unwrapDefined,
      build: defined,
    });
    expect(insub(OptionalName, null)).toEqual({ value: null });
    expect(insubd(OptionalName, defined("dflt"), null)).toEqual({ value: null });
  });
});
