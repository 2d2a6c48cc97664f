import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { checkLaws, lawResults } from "@decidable/testing";
import {
  Tagged,
  tagger,
  tag,
  tagged,
  eqTagged,
  eqSigma,
  eqArray,
  eqNumber,
  eqPair,
  eqString,
  makeEq,
  taggedLaws,
  type Eq,
  type TaggedUnion,
  type TaggedValue,
} from "../index.js";

type Shape = {
  circle: number;
  rect: readonly [number, number];
};

const shape = tagger<Shape>();

const eqShape = eqTagged<Shape>(eqString, {
  circle: eqNumber,
  rect: eqPair(eqNumber, eqNumber),
});

describe("tagged values", () => {
  it("exposes tag and payload", () => {
    const u = Tagged("n", 3);
    expect(tag(u)).toBe("n");
    expect(tagged(u)).toBe(3);
  });
});

describe("eqTagged", () => {
  it("compares payloads at equal tags", () => {
    expect(eqShape.eqv(shape("circle", 2), shape("circle", 2))).toBe(true);
    expect(eqShape.eqv(shape("circle", 2), shape("circle", 3))).toBe(false);
    expect(eqShape.eqv(shape("rect", [1, 2]), shape("rect", [1, 2]))).toBe(true);
  });

  it("never equates values with different tags", () => {
    const c: TaggedUnion<Shape> = shape("circle", 2);
    const r: TaggedUnion<Shape> = shape("rect", [2, 2]);
    expect(eqShape.eqv(c, r)).toBe(false);
    expect(eqShape.eqv(r, c)).toBe(false);
  });
});

describe("eqSigma", () => {
  // a length tag paired with a vector of that length
  type Vec = TaggedValue<number, readonly number[]>;
  const eqAt = (_n: number): Eq<readonly number[]> => eqArray(eqNumber);
  const eqVec = eqSigma(eqNumber, eqAt);

  const vec: fc.Arbitrary<Vec> = fc
    .array(fc.integer({ min: 0, max: 1 }), { maxLength: 2 })
    .map((xs) => Tagged(xs.length, xs));

  it("compares tag then payload", () => {
    expect(eqVec.eqv(Tagged(2, [1, 2]), Tagged(2, [1, 2]))).toBe(true);
    expect(eqVec.eqv(Tagged(2, [1, 2]), Tagged(2, [2, 1]))).toBe(false);
    expect(eqVec.eqv(Tagged(1, [1]), Tagged(2, [1, 1]))).toBe(false);
  });

  it("satisfies the tagged equality laws", () => {
    const sameEntries = makeEq<readonly number[]>((xs, ys) => xs.join(",") === ys.join(","));
    checkLaws(
      taggedLaws<number, readonly number[], Vec>(eqVec, eqNumber, () => sameEntries),
      vec,
    );
  });
});

describe("taggedLaws", () => {
  type Reading = { celsius: number; kelvin: number };
  const reading = tagger<Reading>();
  const eqReading = eqTagged<Reading>(eqString, { celsius: eqNumber, kelvin: eqNumber });

  const readings: fc.Arbitrary<TaggedUnion<Reading>> = fc
    .tuple(fc.boolean(), fc.integer({ min: 0, max: 2 }))
    .map(([c, n]) => (c ? reading("celsius", n) : reading("kelvin", n)));

  it("holds for eqTagged over a closed family", () => {
    checkLaws(
      taggedLaws<keyof Reading, number, TaggedUnion<Reading>>(eqReading, eqString, () => eqNumber),
      readings,
    );
  });

  it("fails for an instance that ignores the tag", () => {
    const payloadOnly = makeEq<TaggedValue<number, number>>((u, v) => u.tagged === v.tagged);
    const values = fc
      .tuple(fc.integer({ min: 0, max: 1 }), fc.integer({ min: 0, max: 1 }))
      .map(([i, x]) => Tagged(i, x));

    const results = lawResults(taggedLaws(payloadOnly, eqNumber, () => eqNumber), values);
    expect(results.map((r) => [r.law, r.passed])).toEqual([
      ["tagged equality", false],
      ["cross-tag", false],
    ]);
  });
});
