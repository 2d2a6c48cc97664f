/**
 * Tests for the generic registry and the canonical instance tables
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  createGenericRegistry,
  createInstanceTable,
  typeKey,
  config,
  CoherenceError,
  RegistryError,
  type DuplicateStrategy,
  type InstanceF,
} from "../index.js";

interface Show<A> {
  readonly show: (a: A) => string;
}

interface ShowF extends InstanceF {
  readonly instance: Show<this["__kind__"]>;
}

describe("createGenericRegistry", () => {
  it("stores and retrieves entries", () => {
    const registry = createGenericRegistry<string, number>();
    expect(registry.set("a", 1)).toBe("added");
    expect(registry.get("a")).toBe(1);
    expect(registry.has("a")).toBe(true);
    expect(registry.keys()).toEqual(["a"]);
  });

  it("leaves an equal value in place under every strategy", () => {
    const registry = createGenericRegistry<string, { id: number }>({
      valueEquals: (a, b) => a.id === b.id,
    });
    const first = { id: 1 };
    registry.set("a", first);
    expect(registry.set("a", { id: 1 })).toBe("unchanged");
    expect(registry.get("a")).toBe(first);
  });

  it("rejects a different value under the default strategy", () => {
    const registry = createGenericRegistry<string, number>({ name: "Numbers" });
    registry.set("a", 1);
    expect(() => registry.set("a", 2)).toThrow(RegistryError);
    expect(() => registry.set("a", 2)).toThrow(
      "Numbers: a different value for 'a' already exists",
    );
  });

  it("throws the configured conflict error", () => {
    const registry = createGenericRegistry<string, number>({
      conflictError: (key, existing, incoming) =>
        new RangeError(`${key}: ${existing} vs ${incoming}`),
    });
    registry.set("a", 1);
    expect(() => registry.set("a", 2)).toThrow(new RangeError("a: 1 vs 2"));
  });

  it("keeps the stored value when skipping", () => {
    const registry = createGenericRegistry<string, number>({ duplicateStrategy: "skip" });
    registry.set("a", 1);
    expect(registry.set("a", 2)).toBe("skipped");
    expect(registry.get("a")).toBe(1);
  });

  it("overwrites the stored value when replacing", () => {
    const registry = createGenericRegistry<string, number>({ duplicateStrategy: "replace" });
    registry.set("a", 1);
    expect(registry.set("a", 2)).toBe("replaced");
    expect(registry.get("a")).toBe(2);
  });

  it("reads a strategy function at each conflict", () => {
    let strategy: DuplicateStrategy = "skip";
    const registry = createGenericRegistry<string, number>({ duplicateStrategy: () => strategy });
    registry.set("a", 1);
    expect(registry.set("a", 2)).toBe("skipped");
    strategy = "replace";
    expect(registry.set("a", 3)).toBe("replaced");
    expect(registry.get("a")).toBe(3);
  });

  it("deletes entries", () => {
    const registry = createGenericRegistry<string, number>();
    registry.set("b", 2);
    registry.set("a", 1);
    expect(registry.delete("b")).toBe(true);
    expect(registry.delete("b")).toBe(false);
    expect(registry.keys()).toEqual(["a"]);
  });
});

describe("createInstanceTable", () => {
  const NumberKey = typeKey<number>("number");
  const showNumber: Show<number> = { show: (n) => `#${n}` };
  const showNumberAlt: Show<number> = { show: (n) => `n=${n}` };

  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    config.reset();
  });

  it("summons the registered instance", () => {
    const Shows = createInstanceTable<ShowF>("Show");
    Shows.register(NumberKey, showNumber, { source: "prelude" });
    expect(Shows.summon(NumberKey).show(3)).toBe("#3");
    expect(Shows.meta(NumberKey)).toEqual({
      typeclass: "Show",
      forType: "number",
      source: "prelude",
    });
    expect(Shows.types()).toEqual(["number"]);
  });

  it("throws CoherenceError when summoning a missing instance", () => {
    const Shows = createInstanceTable<ShowF>("Show");
    expect(Shows.lookup(NumberKey)).toBeUndefined();
    expect(() => Shows.summon(NumberKey)).toThrow("Show: no instance registered for 'number'");
  });

  it("treats re-registration of the same instance as a no-op", () => {
    const Shows = createInstanceTable<ShowF>("Show");
    Shows.register(NumberKey, showNumber);
    Shows.register(NumberKey, showNumber);
    expect(Shows.summon(NumberKey)).toBe(showNumber);
  });

  it("rejects a second canonical instance by default", () => {
    const Shows = createInstanceTable<ShowF>("Show");
    Shows.register(NumberKey, showNumber);
    expect(() => Shows.register(NumberKey, showNumberAlt)).toThrow(CoherenceError);
    expect(Shows.summon(NumberKey)).toBe(showNumber);
  });

  it("keeps the first instance when onDuplicate is skip", () => {
    config.set({ instances: { onDuplicate: "skip" } });
    const Shows = createInstanceTable<ShowF>("Show");
    Shows.register(NumberKey, showNumber);
    Shows.register(NumberKey, showNumberAlt);
    expect(Shows.summon(NumberKey)).toBe(showNumber);
  });

  it("follows onDuplicate changes made after the table was created", () => {
    const Shows = createInstanceTable<ShowF>("Show");
    Shows.register(NumberKey, showNumber);
    expect(() => Shows.register(NumberKey, showNumberAlt)).toThrow(
      "Show: a different instance for 'number' is already registered (explicit)",
    );

    config.set({ instances: { onDuplicate: "replace" } });
    Shows.register(NumberKey, showNumberAlt);
    expect(Shows.summon(NumberKey)).toBe(showNumberAlt);
  });

  it("takes the latest instance when onDuplicate is replace", () => {
    config.set({ instances: { onDuplicate: "replace" } });
    const Shows = createInstanceTable<ShowF>("Show");
    Shows.register(NumberKey, showNumber);
    Shows.register(NumberKey, showNumberAlt, { source: "derived" });
    expect(Shows.summon(NumberKey).show(1)).toBe("n=1");
    expect(Shows.meta(NumberKey)?.source).toBe("derived");
  });

  it("unregisters instances", () => {
    const Shows = createInstanceTable<ShowF>("Show");
    Shows.register(NumberKey, showNumber);
    expect(Shows.unregister(NumberKey)).toBe(true);
    expect(Shows.has(NumberKey)).toBe(false);
  });
});
