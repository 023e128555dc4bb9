/**
 * Per-venue, per-gender summary statistics over filtered records.
 */

import type { EngineError, EngineResult, Gender, PercentileLadder, ResultRecord, VenueStat } from "../../types.js";
import { groupKey } from "./qualityFilter.js";

/** Standard median; averages the two middle values for even counts. Input must be sorted ascending. */
export function medianOfSorted(sorted: readonly number[]): number {
  const n = sorted.length;
  if (n === 0) return Number.NaN;
  const mid = Math.floor(n / 2);
  return n % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

/** Linear interpolation between closest ranks. Input must be sorted ascending. */
export function percentileOfSorted(sorted: readonly number[], pct: number): number {
  const n = sorted.length;
  if (n === 0) return Number.NaN;
  if (n === 1) return sorted[0];
  const pos = ((n - 1) * pct) / 100;
  const lo = Math.floor(pos);
  const hi = Math.min(n - 1, lo + 1);
  const frac = pos - lo;
  return sorted[lo] + (sorted[hi] - sorted[lo]) * frac;
}

function buildStat(venue: string, gender: Gender, times: number[]): VenueStat {
  const sorted = [...times].sort((a, b) => a - b);
  const sum = sorted.reduce((acc, t) => acc + t, 0);
  const percentileLadder: PercentileLadder = {
    p10: percentileOfSorted(sorted, 10),
    p25: percentileOfSorted(sorted, 25),
    p50: percentileOfSorted(sorted, 50),
    p75: percentileOfSorted(sorted, 75),
    p90: percentileOfSorted(sorted, 90),
  };
  return {
    venue,
    gender,
    sampleCount: sorted.length,
    medianSeconds: medianOfSorted(sorted),
    meanSeconds: sum / sorted.length,
    percentileLadder,
  };
}

export function aggregateVenue(
  records: readonly ResultRecord[],
  venue: string,
  gender: Gender
): EngineResult<VenueStat> {
  const times = records.filter((r) => r.venue === venue && r.gender === gender).map((r) => r.finishSeconds);
  if (times.length === 0) {
    return {
      success: false,
      error: {
        code: "INSUFFICIENT_DATA",
        message: `No records for ${venue} (${gender}) after filtering`,
        venue,
        gender,
      },
    };
  }
  return { success: true, value: buildStat(venue, gender, times) };
}

export interface AggregateResult {
  stats: VenueStat[];
  /** One INSUFFICIENT_DATA error per expected pair with no records. */
  missing: Array<{ venue: string; gender: Gender; error: EngineError }>;
}

function compareStats(a: VenueStat, b: VenueStat): number {
  if (a.venue !== b.venue) return a.venue < b.venue ? -1 : 1;
  return a.gender < b.gender ? -1 : a.gender > b.gender ? 1 : 0;
}

/**
 * Builds a stat for every (venue, gender) present in `records`. Pairs listed in
 * `expected` but absent from `records` are reported, not fatal.
 */
export function aggregateVenues(
  records: readonly ResultRecord[],
  expected: ReadonlyArray<{ venue: string; gender: Gender }> = []
): AggregateResult {
  const groups = new Map<string, { venue: string; gender: Gender; times: number[] }>();
  for (const r of records) {
    const key = groupKey(r.venue, r.gender);
    const g = groups.get(key);
    if (g) {
      g.times.push(r.finishSeconds);
    } else {
      groups.set(key, { venue: r.venue, gender: r.gender, times: [r.finishSeconds] });
    }
  }

  const stats = [...groups.values()].map((g) => buildStat(g.venue, g.gender, g.times)).sort(compareStats);

  const missing: AggregateResult["missing"] = [];
  const seen = new Set<string>();
  for (const pair of expected) {
    const key = groupKey(pair.venue, pair.gender);
    if (groups.has(key) || seen.has(key)) continue;
    seen.add(key);
    const result = aggregateVenue(records, pair.venue, pair.gender);
    if (!result.success) missing.push({ venue: pair.venue, gender: pair.gender, error: result.error });
  }
  return { stats, missing };
}
