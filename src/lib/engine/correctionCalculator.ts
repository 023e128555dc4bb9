/**
 * Correction offsets relative to the baseline venue.
 *
 * offsetSeconds keeps the physical sign (slower venue = positive). offsetPct
 * inverts it for display: a faster venue shows a positive percentage, the share
 * an athlete adds to land on the baseline course.
 */

import type { Confidence, CorrectionEntry, EngineConfig, Gender, VenueStat } from "../../types.js";
import { DEFAULT_ENGINE_CONFIG } from "../config.js";

/** Below this magnitude a percentage is shown as exactly 0.0. */
export const PCT_ZERO_EPSILON = 0.05;

/** Raw sign-inverted percentage, unrounded. */
export function percentageCorrection(offsetSeconds: number, baselineMedianSeconds: number): number {
  if (baselineMedianSeconds === 0) return 0;
  return -(offsetSeconds / baselineMedianSeconds) * 100;
}

/** One decimal, ties away from zero, with near-zero values (and -0) collapsed to 0. */
export function roundPct(pct: number): number {
  if (Math.abs(pct) < PCT_ZERO_EPSILON) return 0;
  const rounded = (Math.sign(pct) * Math.round(Math.abs(pct) * 10)) / 10;
  return rounded === 0 ? 0 : rounded;
}

export function formatCorrection(pct: number): string {
  if (Math.abs(pct) < PCT_ZERO_EPSILON) return "0.0%";
  const sign = pct > 0 ? "+" : "";
  return `${sign}${pct.toFixed(1)}%`;
}

export function confidenceFor(sampleCount: number, lowConfidenceThreshold: number): Confidence {
  return sampleCount < lowConfidenceThreshold ? "low" : "normal";
}

export function baselineMedians(stats: readonly VenueStat[], baselineVenue: string): Partial<Record<Gender, number>> {
  const out: Partial<Record<Gender, number>> = {};
  for (const s of stats) {
    if (s.venue === baselineVenue) out[s.gender] = s.medianSeconds;
  }
  return out;
}

/**
 * One entry per stat. Stats for a gender the baseline has no median for are
 * skipped; the baseline selector never produces that case.
 */
export function calculateCorrections(
  stats: readonly VenueStat[],
  baselineVenue: string,
  config: Pick<EngineConfig, "lowConfidenceThreshold"> = DEFAULT_ENGINE_CONFIG
): CorrectionEntry[] {
  const medians = baselineMedians(stats, baselineVenue);
  const entries: CorrectionEntry[] = [];
  for (const s of stats) {
    const base = medians[s.gender];
    if (base === undefined) continue;
    const offsetSeconds = s.venue === baselineVenue ? 0 : s.medianSeconds - base;
    entries.push({
      venue: s.venue,
      gender: s.gender,
      offsetSeconds,
      offsetPct: roundPct(percentageCorrection(offsetSeconds, base)),
      sampleCount: s.sampleCount,
      confidence: confidenceFor(s.sampleCount, config.lowConfidenceThreshold),
    });
  }
  return entries;
}
