/**
 * Venue rows for the athlete-facing table: both genders side by side.
 */

import type { Confidence, CorrectionTable } from "../../types.js";

export interface VenueListing {
  venue: string;
  menCorrectionPct: number | null;
  womenCorrectionPct: number | null;
  menOffsetSeconds: number | null;
  womenOffsetSeconds: number | null;
  sampleCount: number;
  confidence: Confidence;
  isBaseline: boolean;
}

function rowFor(
  rows: Map<string, VenueListing>,
  venue: string,
  baselineVenue: string
): VenueListing {
  const existing = rows.get(venue);
  if (existing) return existing;
  const row: VenueListing = {
    venue,
    menCorrectionPct: null,
    womenCorrectionPct: null,
    menOffsetSeconds: null,
    womenOffsetSeconds: null,
    sampleCount: 0,
    confidence: "normal",
    isBaseline: venue === baselineVenue,
  };
  rows.set(venue, row);
  return row;
}

function sortKey(row: VenueListing): number {
  return row.menOffsetSeconds ?? Number.POSITIVE_INFINITY;
}

/** Ordered by men's offset (fastest first, venues without men's data last), then name. */
export function listVenues(table: CorrectionTable): VenueListing[] {
  const rows = new Map<string, VenueListing>();
  for (const e of table.entries) {
    const row = rowFor(rows, e.venue, table.baselineVenue);
    if (e.gender === "M") {
      row.menCorrectionPct = e.offsetPct;
      row.menOffsetSeconds = e.offsetSeconds;
    } else {
      row.womenCorrectionPct = e.offsetPct;
      row.womenOffsetSeconds = e.offsetSeconds;
    }
    row.sampleCount += e.sampleCount;
    if (e.confidence === "low") row.confidence = "low";
  }
  return [...rows.values()].sort((a, b) => {
    const ka = sortKey(a);
    const kb = sortKey(b);
    if (ka !== kb) return ka < kb ? -1 : 1;
    return a.venue < b.venue ? -1 : a.venue > b.venue ? 1 : 0;
  });
}
