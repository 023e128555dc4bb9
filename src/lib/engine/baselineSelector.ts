/**
 * Baseline venue selection.
 *
 * Venues are ranked by median (fastest first) and the venue at index floor(N/2)
 * becomes the zero point. Ranking ignores sample size except as the first
 * tie-break, so one venue joining or leaving moves the baseline at most one rank.
 * Both genders share one baseline, and only venues with data for both genders
 * can hold it.
 */

import type { EngineResult, Gender, VenueStat } from "../../types.js";

export interface BaselineSelection {
  venue: string;
  /** Per-gender picks before reconciliation; equal unless the genders disagreed. */
  perGender: Record<Gender, string>;
  /** Gender whose pick was used when the picks differed. */
  decidedBy: Gender | "agreement" | "override";
}

/** Ascending median; ties go to the larger sample, then the lexicographically first name. */
export function compareByDifficulty(a: VenueStat, b: VenueStat): number {
  if (a.medianSeconds !== b.medianSeconds) return a.medianSeconds - b.medianSeconds;
  if (a.sampleCount !== b.sampleCount) return b.sampleCount - a.sampleCount;
  return a.venue < b.venue ? -1 : a.venue > b.venue ? 1 : 0;
}

export function rankVenues(stats: readonly VenueStat[]): VenueStat[] {
  return [...stats].sort(compareByDifficulty);
}

/** Median-difficulty venue of one gender's stats, or null when there are none. */
export function selectGenderBaseline(stats: readonly VenueStat[]): string | null {
  if (stats.length === 0) return null;
  const ranked = rankVenues(stats);
  return ranked[Math.floor(ranked.length / 2)].venue;
}

function totalSamples(stats: readonly VenueStat[]): number {
  return stats.reduce((acc, s) => acc + s.sampleCount, 0);
}

/** Venues that have a stat for both genders. */
export function eligibleVenues(stats: readonly VenueStat[]): Set<string> {
  const men = new Set(stats.filter((s) => s.gender === "M").map((s) => s.venue));
  return new Set(stats.filter((s) => s.gender === "W" && men.has(s.venue)).map((s) => s.venue));
}

export function selectSharedBaseline(
  stats: readonly VenueStat[],
  override?: string
): EngineResult<BaselineSelection> {
  const eligible = eligibleVenues(stats);
  const men = stats.filter((s) => s.gender === "M" && eligible.has(s.venue));
  const women = stats.filter((s) => s.gender === "W" && eligible.has(s.venue));
  const menPick = selectGenderBaseline(men);
  const womenPick = selectGenderBaseline(women);
  if (menPick === null || womenPick === null) {
    return {
      success: false,
      error: {
        code: "NO_ELIGIBLE_BASELINE",
        message: "No venue has data for both genders; cannot choose a baseline",
      },
    };
  }

  const perGender: Record<Gender, string> = { M: menPick, W: womenPick };

  if (override !== undefined) {
    if (!eligible.has(override)) {
      return {
        success: false,
        error: {
          code: "NO_ELIGIBLE_BASELINE",
          message: `Requested baseline venue "${override}" lacks data for one or both genders`,
          venue: override,
        },
      };
    }
    return { success: true, value: { venue: override, perGender, decidedBy: "override" } };
  }

  if (menPick === womenPick) {
    return { success: true, value: { venue: menPick, perGender, decidedBy: "agreement" } };
  }

  // TODO: confirm with product whether independent per-gender baselines are preferred here.
  const decidedBy: Gender = totalSamples(women) > totalSamples(men) ? "W" : "M";
  return { success: true, value: { venue: perGender[decidedBy], perGender, decidedBy } };
}
