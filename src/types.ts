/**
 * Core types for the venue correction engine.
 */

export type Gender = "M" | "W";

/** One cleaned finish from the acquisition layer. */
export interface ResultRecord {
  readonly venue: string;
  readonly gender: Gender;
  readonly finishSeconds: number;
}

export interface PercentileLadder {
  readonly p10: number;
  readonly p25: number;
  readonly p50: number;
  readonly p75: number;
  readonly p90: number;
}

/** Summary of the filtered finishes for one venue and gender. */
export interface VenueStat {
  readonly venue: string;
  readonly gender: Gender;
  readonly sampleCount: number;
  readonly medianSeconds: number;
  readonly meanSeconds: number;
  readonly percentileLadder: PercentileLadder;
}

export type Confidence = "normal" | "low";

export interface CorrectionEntry {
  readonly venue: string;
  readonly gender: Gender;
  /** Seconds slower (positive) or faster (negative) than the baseline median. */
  readonly offsetSeconds: number;
  /** Sign-inverted percentage of the baseline median, one decimal. */
  readonly offsetPct: number;
  readonly sampleCount: number;
  readonly confidence: Confidence;
}

export type EngineErrorCode =
  | "INVALID_TIME"
  | "UNKNOWN_VENUE"
  | "INSUFFICIENT_DATA"
  | "NO_ELIGIBLE_BASELINE";

export interface EngineError {
  code: EngineErrorCode;
  message: string;
  venue?: string;
  gender?: Gender;
}

export type EngineResult<T> = { success: true; value: T } | { success: false; error: EngineError };

/** Venue/gender pair left out of a table because filtering emptied it. */
export interface SkippedPair {
  readonly venue: string;
  readonly gender: Gender;
  readonly reason: string;
}

/** Output of one recomputation run. Replaced whole, never patched. */
export interface CorrectionTable {
  readonly version: number;
  readonly generatedAtISO: string;
  readonly baselineVenue: string;
  readonly baselineMedians: Readonly<Record<Gender, number>>;
  readonly entries: readonly CorrectionEntry[];
  readonly stats: readonly VenueStat[];
  readonly skipped: readonly SkippedPair[];
}

/** What request handlers read: the dataset and the table derived from it. */
export interface EngineSnapshot {
  readonly records: readonly ResultRecord[];
  readonly table: CorrectionTable | null;
}

export interface EngineConfig {
  lowerBoundSeconds: number;
  upperBoundSeconds: number;
  /** Groups smaller than this keep only their fastest `topFraction`. */
  fullSampleThreshold: number;
  topFraction: number;
  lowConfidenceThreshold: number;
  histogramBinSeconds: number;
  baselineOverride?: string;
}
