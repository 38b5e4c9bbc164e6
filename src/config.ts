import { z } from "zod";
import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { ConfigValidationError } from "./errors.js";

// ============================================================
// Zod Schema for Engine Configuration
// ============================================================

const positive = (label: string) => z.number({ invalid_type_error: `${label} must be a number` }).positive(`${label} must be greater than 0`);
const positiveInt = (label: string) => positive(label).int(`${label} must be an integer`);

/** Longest delay a Node timer honours, in whole seconds */
export const MAX_TIMER_SECONDS = 2_147_483;
const seconds = (label: string) =>
  positive(label).max(MAX_TIMER_SECONDS, `${label} must be at most ${MAX_TIMER_SECONDS}`);

export const HeatWeightsSchema = z.object({
  /** Weight of the (log-normalized) requests-per-second term */
  rps: z.number().min(0, "heat weight rps must be >= 0").default(0.5),
  /** Weight of the (log-normalized) p95 latency term */
  latency: z.number().min(0, "heat weight latency must be >= 0").default(0.3),
  /** Weight of the error-rate term */
  errorRate: z.number().min(0, "heat weight errorRate must be >= 0").default(0.2),
}).refine(
  w => w.rps + w.latency + w.errorRate > 0,
  { message: "at least one heat weight must be greater than 0" }
);

export const EngineConfigSchema = z.object({
  enabled: z.boolean().default(true),

  /** Seconds between optimize cycles */
  optimizeIntervalSeconds: seconds("optimizeIntervalSeconds").default(10),
  /** Response cache capacity (entries) */
  cacheMaxEntries: positiveInt("cacheMaxEntries").default(500),
  /** TTL applied to memoized responses */
  cacheDefaultTtlSeconds: seconds("cacheDefaultTtlSeconds").default(30),
  /** Fast-path slots */
  hotSetCapacity: positiveInt("hotSetCapacity").default(20),

  middlewareReorderEnabled: z.boolean().default(true),
  predictorEnabled: z.boolean().default(true),
  autoMemoizeEnabled: z.boolean().default(true),

  autoMemoize: z.object({
    minRps: z.number().min(0, "autoMemoize.minRps must be >= 0").default(5),
    maxErrorRate: z.number()
      .min(0, "autoMemoize.maxErrorRate must be >= 0")
      .max(1, "autoMemoize.maxErrorRate must be <= 1")
      .default(0.02),
    minSamples: positiveInt("autoMemoize.minSamples").default(50),
  }).default({}),

  heatWeights: HeatWeightsSchema.default({}),

  /** Values at which the rps and latency terms of the heat score reach 1 */
  heatScale: z.object({
    rpsReference: positive("heatScale.rpsReference").default(100),
    latencyReferenceMs: positive("heatScale.latencyReferenceMs").default(1000),
  }).default({}),

  /** Requests a route needs before it leaves the cold state */
  watchMinSamples: positiveInt("watchMinSamples").default(10),

  recorder: z.object({
    /** Latency samples kept per route for percentiles */
    latencyWindowSize: positiveInt("recorder.latencyWindowSize").default(1000),
    /** Trailing window for the requests-per-second estimate */
    rpsWindowSeconds: positiveInt("recorder.rpsWindowSeconds").default(10),
  }).default({}),

  predictor: z.object({
    /** EWMA smoothing factor; higher favours recent samples */
    alpha: z.number()
      .gt(0, "predictor.alpha must be greater than 0")
      .max(1, "predictor.alpha must be <= 1")
      .default(0.3),
    trendWindowSize: z.number().int().min(3, "predictor.trendWindowSize must be >= 3").default(30),
    /** Samples behind the rolling mean/stddev used for z-scores */
    anomalyWindowSize: z.number().int().min(2, "predictor.anomalyWindowSize must be >= 2").default(100),
    zScoreThreshold: positive("predictor.zScoreThreshold").default(2.5),
    minSamples: z.number().int().min(2, "predictor.minSamples must be >= 2").default(10),
    /** Samples ahead used by the forecast */
    horizon: z.number().min(0, "predictor.horizon must be >= 0").default(1),
  }).default({}),

  /** Optimize cycles kept in the evolution log */
  evolutionLogSize: positiveInt("evolutionLogSize").default(100),
  /** p95 above which a route is reported as slow */
  slowRouteThresholdMs: positive("slowRouteThresholdMs").default(200),

  logging: z.object({
    level: z.enum(["debug", "info", "warn", "error"]).default("info"),
    format: z.enum(["json", "human"]).default("human"),
    fileOutput: z.boolean().default(false),
    logDir: z.string().min(1).default("logs"),
    consoleOutput: z.boolean().default(true),
    includeStackTrace: z.boolean().default(true),
    colors: z.boolean().default(true),
  }).default({}),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

export const DEFAULT_CONFIG: EngineConfig = EngineConfigSchema.parse({});

export const DEFAULT_CONFIG_FILE = "hotpath.config.json";

// ============================================================
// Configuration Loading Functions
// ============================================================

/**
 * Validates raw configuration and applies defaults.
 *
 * @throws ConfigValidationError listing every rejected field
 */
export function parseConfig(raw: unknown, source?: string): EngineConfig {
  const result = EngineConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw ConfigValidationError.fromZod(result.error, source);
  }
  return result.data;
}

export function validateConfig(config: unknown): {
  success: true;
  data: EngineConfig;
} | {
  success: false;
  error: ConfigValidationError;
} {
  const result = EngineConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: ConfigValidationError.fromZod(result.error) };
}

/**
 * Merges partial user configuration with defaults.
 */
export function mergeWithDefaults(userConfig: EngineConfigInput = {}): EngineConfig {
  return parseConfig(userConfig);
}

/**
 * Loads configuration from a JSON file. The engine settings may sit at the
 * root of the file or under a `hotpath` key. A missing file yields defaults;
 * a malformed or invalid one throws.
 */
export function loadConfig(configPath?: string): EngineConfig {
  const path = resolve(configPath ?? DEFAULT_CONFIG_FILE);

  let content: string;
  try {
    content = readFileSync(path, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return DEFAULT_CONFIG;
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError([{ path: "", message: `not valid JSON (${reason})` }], path);
  }

  const section = isRecord(parsed) && isRecord(parsed.hotpath) ? parsed.hotpath : parsed;
  return parseConfig(section, path);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
