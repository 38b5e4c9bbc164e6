import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  DEFAULT_CONFIG,
  EngineConfigSchema,
  MAX_TIMER_SECONDS,
  loadConfig,
  mergeWithDefaults,
  parseConfig,
  validateConfig,
} from "../config.js";
import { ConfigValidationError } from "../errors.js";

describe("EngineConfigSchema", () => {
  it("should fill every default from an empty object", () => {
    const config = EngineConfigSchema.parse({});

    expect(config).toMatchObject({
      enabled: true,
      optimizeIntervalSeconds: 10,
      cacheMaxEntries: 500,
      cacheDefaultTtlSeconds: 30,
      hotSetCapacity: 20,
      middlewareReorderEnabled: true,
      predictorEnabled: true,
      autoMemoizeEnabled: true,
      watchMinSamples: 10,
      slowRouteThresholdMs: 200,
    });
    expect(config.autoMemoize).toEqual({ minRps: 5, maxErrorRate: 0.02, minSamples: 50 });
    expect(config.heatWeights).toEqual({ rps: 0.5, latency: 0.3, errorRate: 0.2 });
    expect(config.recorder).toEqual({ latencyWindowSize: 1000, rpsWindowSeconds: 10 });
    expect(config.predictor.alpha).toBe(0.3);
  });

  it("should keep nested defaults next to partial overrides", () => {
    const config = EngineConfigSchema.parse({ autoMemoize: { minRps: 50 } });
    expect(config.autoMemoize).toEqual({ minRps: 50, maxErrorRate: 0.02, minSamples: 50 });
  });
});

describe("parseConfig", () => {
  it("should treat undefined as an empty configuration", () => {
    expect(parseConfig(undefined)).toEqual(DEFAULT_CONFIG);
  });

  it("should reject out-of-range values instead of clamping them", () => {
    expect(() => parseConfig({ hotSetCapacity: 0 })).toThrow(ConfigValidationError);
    expect(() => parseConfig({ hotSetCapacity: 0 }))
      .toThrow("Invalid engine configuration: hotSetCapacity: hotSetCapacity must be greater than 0");
  });

  it("should reject intervals longer than a timer can wait", () => {
    expect(parseConfig({ optimizeIntervalSeconds: MAX_TIMER_SECONDS }).optimizeIntervalSeconds).toBe(2_147_483);
    expect(() => parseConfig({ optimizeIntervalSeconds: 3_000_000 }))
      .toThrow("Invalid engine configuration: optimizeIntervalSeconds: optimizeIntervalSeconds must be at most 2147483");
    expect(() => parseConfig({ cacheDefaultTtlSeconds: 3_000_000 }))
      .toThrow("cacheDefaultTtlSeconds must be at most 2147483");
  });

  it("should report every failing field at once", () => {
    try {
      parseConfig({ cacheMaxEntries: 1.5, predictor: { alpha: 0 } }, "inline");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.issues).toEqual([
          { path: "cacheMaxEntries", message: "cacheMaxEntries must be an integer" },
          { path: "predictor.alpha", message: "predictor.alpha must be greater than 0" },
        ]);
        expect(error.message.startsWith("Invalid engine configuration in inline: ")).toBe(true);
      }
    }
  });

  it("should reject all-zero heat weights", () => {
    expect(() => parseConfig({ heatWeights: { rps: 0, latency: 0, errorRate: 0 } }))
      .toThrow("heatWeights: at least one heat weight must be greater than 0");
  });

  it("should reject values of the wrong type", () => {
    const result = validateConfig({ optimizeIntervalSeconds: "often" });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe("optimizeIntervalSeconds must be a number");
    }
  });
});

describe("mergeWithDefaults", () => {
  it("should override only what is given", () => {
    const config = mergeWithDefaults({ enabled: false, hotSetCapacity: 3 });
    expect(config.enabled).toBe(false);
    expect(config.hotSetCapacity).toBe(3);
    expect(config.cacheMaxEntries).toBe(500);
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "hotpath-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should return defaults when the file is missing", () => {
    expect(loadConfig(join(dir, "absent.json"))).toEqual(DEFAULT_CONFIG);
  });

  it("should read settings at the root of the file", () => {
    const path = join(dir, "hotpath.config.json");
    writeFileSync(path, JSON.stringify({ hotSetCapacity: 7 }));
    expect(loadConfig(path).hotSetCapacity).toBe(7);
  });

  it("should read settings under a hotpath key", () => {
    const path = join(dir, "app.json");
    writeFileSync(path, JSON.stringify({ hotpath: { cacheMaxEntries: 64 }, other: true }));
    expect(loadConfig(path).cacheMaxEntries).toBe(64);
  });

  it("should reject malformed JSON", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ not json");
    expect(() => loadConfig(path)).toThrow(ConfigValidationError);
  });

  it("should name the file in validation errors", () => {
    const path = join(dir, "bad.json");
    writeFileSync(path, JSON.stringify({ evolutionLogSize: -1 }));
    expect(() => loadConfig(path)).toThrow(`Invalid engine configuration in ${path}: evolutionLogSize`);
  });
});
