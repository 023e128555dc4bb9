/**
 * Quality filter: bound check, then top-fraction trimming for small venue/gender groups.
 * No other rule ever drops a record.
 */

import type { EngineConfig, Gender, ResultRecord } from "../../types.js";
import { DEFAULT_ENGINE_CONFIG } from "../config.js";

export type QualityFilterConfig = Pick<
  EngineConfig,
  "lowerBoundSeconds" | "upperBoundSeconds" | "fullSampleThreshold" | "topFraction"
>;

export function groupKey(venue: string, gender: Gender): string {
  return `${venue}\u0000${gender}`;
}

export function withinBounds(record: ResultRecord, config: QualityFilterConfig): boolean {
  return record.finishSeconds >= config.lowerBoundSeconds && record.finishSeconds <= config.upperBoundSeconds;
}

/** How many of `n` bound-checked records a group keeps. */
export function keptCount(n: number, config: QualityFilterConfig): number {
  if (n === 0) return 0;
  if (n >= config.fullSampleThreshold) return n;
  return Math.max(1, Math.floor(n * config.topFraction));
}

/**
 * Returns the surviving records, grouped by (venue, gender) in first-seen order,
 * each group sorted fastest first.
 */
export function applyQualityFilter(
  records: readonly ResultRecord[],
  config: QualityFilterConfig = DEFAULT_ENGINE_CONFIG
): ResultRecord[] {
  const groups = new Map<string, ResultRecord[]>();
  for (const r of records) {
    if (!withinBounds(r, config)) continue;
    const key = groupKey(r.venue, r.gender);
    const group = groups.get(key);
    if (group) {
      group.push(r);
    } else {
      groups.set(key, [r]);
    }
  }

  const out: ResultRecord[] = [];
  for (const group of groups.values()) {
    const sorted = [...group].sort((a, b) => a.finishSeconds - b.finishSeconds);
    out.push(...sorted.slice(0, keptCount(sorted.length, config)));
  }
  return out;
}
