/**
 * Full recomputation: raw records → filter → stats → baseline → corrections.
 * Produces a frozen CorrectionTable, or fails whole with NO_ELIGIBLE_BASELINE.
 */

import type { CorrectionTable, EngineConfig, EngineResult, Gender, ResultRecord, SkippedPair } from "../../types.js";
import { DEFAULT_ENGINE_CONFIG } from "../config.js";
import { debugLog } from "../../utils/debug.js";
import { applyQualityFilter, groupKey } from "./qualityFilter.js";
import { aggregateVenues } from "./venueAggregator.js";
import { selectSharedBaseline } from "./baselineSelector.js";
import { baselineMedians, calculateCorrections } from "./correctionCalculator.js";
import { freezeTable } from "../snapshot/snapshotStore.js";

export interface RecomputeOptions {
  version?: number;
  now?: Date;
}

function distinctPairs(records: readonly ResultRecord[]): Array<{ venue: string; gender: Gender }> {
  const seen = new Map<string, { venue: string; gender: Gender }>();
  for (const r of records) {
    const key = groupKey(r.venue, r.gender);
    if (!seen.has(key)) seen.set(key, { venue: r.venue, gender: r.gender });
  }
  return [...seen.values()];
}

export function recomputeCorrections(
  records: readonly ResultRecord[],
  config: EngineConfig = DEFAULT_ENGINE_CONFIG,
  options: RecomputeOptions = {}
): EngineResult<CorrectionTable> {
  const filtered = applyQualityFilter(records, config);
  debugLog(`[Corrections] quality filter kept ${filtered.length} of ${records.length} records`);

  const { stats, missing } = aggregateVenues(filtered, distinctPairs(records));
  const skipped: SkippedPair[] = missing.map((m) => ({ venue: m.venue, gender: m.gender, reason: m.error.message }));
  for (const s of skipped) {
    console.warn(`[Corrections] skipping ${s.venue} (${s.gender}): ${s.reason}`);
  }

  const selection = selectSharedBaseline(stats, config.baselineOverride);
  if (!selection.success) return selection;

  const baselineVenue = selection.value.venue;
  if (selection.value.decidedBy === "M" || selection.value.decidedBy === "W") {
    debugLog(
      `[Corrections] per-gender baselines differ (M=${selection.value.perGender.M}, W=${selection.value.perGender.W}); using ${baselineVenue}`
    );
  }

  const medians = baselineMedians(stats, baselineVenue);
  if (medians.M === undefined || medians.W === undefined) {
    return {
      success: false,
      error: { code: "NO_ELIGIBLE_BASELINE", message: `Baseline ${baselineVenue} lacks a median for one gender`, venue: baselineVenue },
    };
  }
  const entries = calculateCorrections(stats, baselineVenue, config);

  return {
    success: true,
    value: freezeTable({
      version: options.version ?? 1,
      generatedAtISO: (options.now ?? new Date()).toISOString(),
      baselineVenue,
      baselineMedians: { M: medians.M, W: medians.W },
      entries,
      stats,
      skipped,
    }),
  };
}
