/**
 * Histogram of quality-filtered finish times, optionally narrowed to some venues
 * and genders. Bins span the filter bounds; the last bin is closed on the right.
 */

import type { EngineConfig, Gender, ResultRecord } from "../../types.js";
import { DEFAULT_ENGINE_CONFIG } from "../config.js";
import { applyQualityFilter } from "./qualityFilter.js";

export interface DistributionFilter {
  genders?: readonly Gender[];
  venues?: readonly string[];
}

export interface HistogramBin {
  binStart: number;
  binEnd: number;
  count: number;
}

export interface Distribution {
  bins: HistogramBin[];
  totalCount: number;
}

export function emptyBins(lower: number, upper: number, width: number): HistogramBin[] {
  const bins: HistogramBin[] = [];
  for (let start = lower; start < upper; start += width) {
    bins.push({ binStart: start, binEnd: Math.min(start + width, upper), count: 0 });
  }
  return bins;
}

export function buildDistribution(
  records: readonly ResultRecord[],
  filter: DistributionFilter = {},
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): Distribution {
  const genders = filter.genders && filter.genders.length > 0 ? new Set(filter.genders) : null;
  const venues = filter.venues && filter.venues.length > 0 ? new Set(filter.venues) : null;

  const selected = applyQualityFilter(records, config).filter(
    (r) => (genders === null || genders.has(r.gender)) && (venues === null || venues.has(r.venue))
  );

  const lower = config.lowerBoundSeconds;
  const width = config.histogramBinSeconds;
  const bins = emptyBins(lower, config.upperBoundSeconds, width);
  for (const r of selected) {
    const idx = Math.min(bins.length - 1, Math.floor((r.finishSeconds - lower) / width));
    bins[idx].count += 1;
  }
  return { bins, totalCount: selected.length };
}
