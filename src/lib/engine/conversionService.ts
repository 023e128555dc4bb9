/**
 * Converts a finish time between venues using a published correction table.
 *
 *   converted = time - offset(from) + offset(to)
 *
 * evaluated as time + (offset(to) - offset(from)) so a venue converted to
 * itself returns the input unchanged.
 */

import type { CorrectionEntry, CorrectionTable, EngineResult, Gender } from "../../types.js";
import { formatTime, isPositiveFinite, parseTime } from "../time/timeFormat.js";

/** Targets that stand for the baseline venue. */
export const BASELINE_ALIASES: ReadonlySet<string> = new Set(["normalized", "baseline"]);

export interface Conversion {
  originalSeconds: number;
  convertedSeconds: number;
  fromVenue: string;
  toVenue: string;
  faster: boolean;
  differenceSeconds: number;
}

export interface ConversionView {
  originalTime: string;
  originalSeconds: number;
  convertedTime: string;
  convertedSeconds: number;
  fromVenue: string;
  toVenue: string;
  timeDifference: string;
  faster: boolean;
}

export function resolveVenue(table: CorrectionTable, venue: string): string {
  return BASELINE_ALIASES.has(venue.trim().toLowerCase()) ? table.baselineVenue : venue;
}

export function findEntry(table: CorrectionTable, venue: string, gender: Gender): CorrectionEntry | undefined {
  return table.entries.find((e) => e.venue === venue && e.gender === gender);
}

function lookupOffset(table: CorrectionTable, venue: string, gender: Gender): EngineResult<number> {
  const entry = findEntry(table, venue, gender);
  if (!entry) {
    return {
      success: false,
      error: { code: "UNKNOWN_VENUE", message: `Unknown venue for gender ${gender}: ${venue}`, venue, gender },
    };
  }
  return { success: true, value: entry.offsetSeconds };
}

export function convertSeconds(
  table: CorrectionTable,
  seconds: number,
  gender: Gender,
  fromVenue: string,
  toVenue: string
): EngineResult<Conversion> {
  if (!isPositiveFinite(seconds)) {
    return {
      success: false,
      error: { code: "INVALID_TIME", message: `Finish time must be a positive number of seconds, got ${seconds}` },
    };
  }
  const from = resolveVenue(table, fromVenue);
  const to = resolveVenue(table, toVenue);
  const fromOffset = lookupOffset(table, from, gender);
  if (!fromOffset.success) return fromOffset;
  const toOffset = lookupOffset(table, to, gender);
  if (!toOffset.success) return toOffset;

  const convertedSeconds = seconds + (toOffset.value - fromOffset.value);
  return {
    success: true,
    value: {
      originalSeconds: seconds,
      convertedSeconds,
      fromVenue: from,
      toVenue: to,
      faster: convertedSeconds < seconds,
      differenceSeconds: Math.abs(convertedSeconds - seconds),
    },
  };
}

/** Parses the time string, converts, and formats the result for display. */
export function convertTime(
  table: CorrectionTable,
  timeText: string,
  gender: Gender,
  fromVenue: string,
  toVenue: string
): EngineResult<ConversionView> {
  const parsed = parseTime(timeText);
  if (!parsed.success) return parsed;
  const result = convertSeconds(table, parsed.seconds, gender, fromVenue, toVenue);
  if (!result.success) return result;
  const c = result.value;
  return {
    success: true,
    value: {
      originalTime: timeText.trim(),
      originalSeconds: c.originalSeconds,
      convertedTime: formatTime(c.convertedSeconds),
      convertedSeconds: c.convertedSeconds,
      fromVenue: c.fromVenue,
      toVenue: c.toVenue,
      timeDifference: formatTime(c.differenceSeconds),
      faster: c.faster,
    },
  };
}
