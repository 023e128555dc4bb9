/**
 * Engine config: env-based getters with safe parsing and clamped defaults.
 * Pure engine functions take an EngineConfig; only the service and scripts read the environment.
 */

import type { EngineConfig } from "../types.js";

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  lowerBoundSeconds: 3000,
  upperBoundSeconds: 9000,
  fullSampleThreshold: Number.POSITIVE_INFINITY,
  topFraction: 0.8,
  lowConfidenceThreshold: 50,
  histogramBinSeconds: 300,
});

function parseIntEnv(key: string, defaultVal: number, min: number, max: number): number {
  const raw = process.env[key];
  if (raw == null || raw === "") return defaultVal;
  const n = parseInt(raw, 10);
  if (Number.isNaN(n)) return defaultVal;
  return Math.max(min, Math.min(max, n));
}

function parseFloatEnv(key: string, defaultVal: number, min: number, max: number): number {
  const raw = process.env[key];
  if (raw == null || raw === "") return defaultVal;
  const n = Number(raw);
  if (!Number.isFinite(n)) return defaultVal;
  return Math.max(min, Math.min(max, n));
}

/** Finishes faster than this are timing errors. Default 3000 (50 min). */
export function getLowerBoundSeconds(): number {
  return parseIntEnv("LOWER_BOUND_SECONDS", DEFAULT_ENGINE_CONFIG.lowerBoundSeconds, 0, 86_400);
}

/** Finishes slower than this are non-competitive. Default 9000 (2h30). */
export function getUpperBoundSeconds(): number {
  return parseIntEnv("UPPER_BOUND_SECONDS", DEFAULT_ENGINE_CONFIG.upperBoundSeconds, 1, 86_400);
}

/**
 * Sample size from which a venue/gender group is used whole.
 * Unset means every group gets top-fraction trimming.
 */
export function getFullSampleThreshold(): number {
  return parseIntEnv("FULL_SAMPLE_THRESHOLD", DEFAULT_ENGINE_CONFIG.fullSampleThreshold, 0, 10_000_000);
}

export function getTopFraction(): number {
  return parseFloatEnv("TOP_FRACTION", DEFAULT_ENGINE_CONFIG.topFraction, 0.05, 1);
}

export function getLowConfidenceThreshold(): number {
  return parseIntEnv("LOW_CONFIDENCE_THRESHOLD", DEFAULT_ENGINE_CONFIG.lowConfidenceThreshold, 1, 100_000);
}

export function getHistogramBinSeconds(): number {
  return parseIntEnv("HISTOGRAM_BIN_SECONDS", DEFAULT_ENGINE_CONFIG.histogramBinSeconds, 10, 3600);
}

export function getBaselineOverride(): string | undefined {
  const v = process.env.BASELINE_VENUE?.trim();
  return v ? v : undefined;
}

export function getEngineConfig(): EngineConfig {
  let lowerBoundSeconds = getLowerBoundSeconds();
  let upperBoundSeconds = getUpperBoundSeconds();
  if (lowerBoundSeconds >= upperBoundSeconds) {
    console.warn(
      `[Config] LOWER_BOUND_SECONDS (${lowerBoundSeconds}) must be below UPPER_BOUND_SECONDS (${upperBoundSeconds}); using defaults`
    );
    lowerBoundSeconds = DEFAULT_ENGINE_CONFIG.lowerBoundSeconds;
    upperBoundSeconds = DEFAULT_ENGINE_CONFIG.upperBoundSeconds;
  }
  const config: EngineConfig = {
    lowerBoundSeconds,
    upperBoundSeconds,
    fullSampleThreshold: getFullSampleThreshold(),
    topFraction: getTopFraction(),
    lowConfidenceThreshold: getLowConfidenceThreshold(),
    histogramBinSeconds: getHistogramBinSeconds(),
  };
  const baselineOverride = getBaselineOverride();
  if (baselineOverride) config.baselineOverride = baselineOverride;
  return config;
}
