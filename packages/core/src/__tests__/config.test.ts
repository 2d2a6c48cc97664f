/**
 * Tests for the unified configuration system
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  config,
  defineConfig,
  parseConfig,
  loadConfigFromEnv,
  debugLog,
  describeValue,
  ConfigError,
} from "../index.js";

describe("config.get and config.set", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    config.reset();
  });

  it("starts from the defaults", () => {
    const cfg = config.get();
    expect(cfg.debug).toBe(false);
    expect(cfg.instances.onDuplicate).toBe("error");
    expect(cfg.contracts.checkCancellation).toBe(false);
    expect(cfg.laws.runs).toBe(100);
    expect(cfg.laws.seed).toBeUndefined();
  });

  it("applies programmatic overrides section by section", () => {
    config.set({ laws: { runs: 25 } });
    config.set({ laws: { seed: 7 }, contracts: { checkCancellation: true } });
    const cfg = config.get();
    expect(cfg.laws).toEqual({ runs: 25, seed: 7 });
    expect(cfg.contracts.checkCancellation).toBe(true);
    expect(cfg.instances.onDuplicate).toBe("error");
  });

  it("keeps earlier overrides of a section when a later call sets another key", () => {
    config.set({ laws: { runs: 25 } });
    config.set({ laws: { seed: 7 } });
    expect(config.get().laws).toEqual({ runs: 25, seed: 7 });

    config.set({ instances: { onDuplicate: "skip" } });
    config.set({ instances: {} });
    expect(config.get().instances.onDuplicate).toBe("skip");
  });

  it("reset drops overrides", () => {
    config.set({ debug: true });
    config.reset();
    expect(config.get().debug).toBe(false);
  });

  it("rejects overrides of the wrong shape", () => {
    const bad: unknown = { laws: { runs: -1 } };
    expect(() => parseConfig(bad, "test")).toThrow(ConfigError);
    expect(() => parseConfig(bad, "test")).toThrow(
      "'laws.runs' must be a non-negative integer, got -1",
    );
  });

  it("defineConfig returns its argument", () => {
    const cfg = defineConfig({ debug: true });
    expect(cfg).toEqual({ debug: true });
  });
});

describe("parseConfig", () => {
  it("treats null and undefined as empty", () => {
    expect(parseConfig(undefined, "test")).toEqual({});
    expect(parseConfig(null, "test")).toEqual({});
  });

  it("leaves out keys that are not set", () => {
    expect(parseConfig({ laws: { seed: 7 } }, "test")).toStrictEqual({ laws: { seed: 7 } });
    expect(parseConfig({ instances: {} }, "test")).toStrictEqual({ instances: {} });
  });

  it("rejects non-object configuration", () => {
    expect(() => parseConfig("yes", "file.json")).toThrow("configuration must be an object");
  });

  it("rejects unknown duplicate policies", () => {
    expect(() => parseConfig({ instances: { onDuplicate: "merge" } }, "test")).toThrow(
      "'instances.onDuplicate' must be one of error, skip, replace, got \"merge\"",
    );
  });

  it("rejects a section that is not an object", () => {
    expect(() => parseConfig({ laws: 3 }, "test")).toThrow("'laws' must be an object");
  });

  it("records the source on errors", () => {
    try {
      parseConfig({ debug: "on" }, ".decidablerc");
      expect.fail("expected a ConfigError");
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.source).toBe(".decidablerc");
      }
    }
  });
});

describe("loadConfigFromEnv", () => {
  it("maps DECIDABLE_* variables onto nested keys", () => {
    const cfg = loadConfigFromEnv({
      DECIDABLE_DEBUG: "1",
      DECIDABLE_LAWS__RUNS: "250",
      DECIDABLE_CONTRACTS__CHECK_CANCELLATION: "true",
      DECIDABLE_INSTANCES__ON_DUPLICATE: "skip",
      UNRELATED: "1",
    });
    expect(cfg).toEqual({
      debug: true,
      laws: { runs: 250 },
      contracts: { checkCancellation: true },
      instances: { onDuplicate: "skip" },
    });
  });

  it("parses 0 and false as false", () => {
    expect(loadConfigFromEnv({ DECIDABLE_DEBUG: "0" }).debug).toBe(false);
    expect(loadConfigFromEnv({ DECIDABLE_DEBUG: "false" }).debug).toBe(false);
  });
});

describe("debugLog", () => {
  afterEach(() => {
    config.reset();
    vi.restoreAllMocks();
  });

  it("is silent unless debug is on", () => {
    const spy = vi.spyOn(console, "debug").mockImplementation(() => {});
    debugLog("test", "hidden");
    expect(spy).not.toHaveBeenCalled();

    config.set({ debug: true });
    debugLog("test", "shown");
    expect(spy).toHaveBeenCalledWith("[decidable:test] shown");
  });

  it("describes values for messages", () => {
    expect(describeValue(5)).toBe("5");
    expect(describeValue("x")).toBe('"x"');
    expect(describeValue(10n)).toBe("10n");
    expect(describeValue(undefined)).toBe("undefined");
    expect(describeValue({ val: 2 })).toBe('{"val":2}');
  });
});
