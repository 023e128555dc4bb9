/**
 * Maps cleaned CSV exports onto ResultRecords.
 * Expected columns: venue, gender, and finish_seconds or finish_time (H:MM:SS).
 */

import type { ResultRecord } from "../../types.js";
import type { CorrectedResult } from "../engine/applyCorrections.js";
import { ResultRecordSchema, firstIssue } from "../schemas.js";
import { formatTime, parseTime } from "../time/timeFormat.js";
import { parseCsv, toCsv, type CsvRow } from "./csvParser.js";

export const RESULTS_COLUMNS = ["venue", "gender", "finish_seconds"] as const;

export const CORRECTED_COLUMNS = [
  "venue",
  "gender",
  "finish_seconds",
  "finish_time",
  "corrected_seconds",
  "corrected_time",
  "adjustment_seconds",
  "rank",
  "corrected",
] as const;

export interface RejectedRow {
  line: number;
  reason: string;
}

export interface LoadedResults {
  records: ResultRecord[];
  rejected: RejectedRow[];
}

function finishSecondsOf(row: CsvRow): number | string {
  const rawSeconds = row.fields["finish_seconds"] ?? "";
  if (rawSeconds !== "") {
    const n = Number(rawSeconds);
    return Number.isFinite(n) ? n : `finish_seconds is not numeric: "${rawSeconds}"`;
  }
  const rawTime = row.fields["finish_time"] ?? "";
  if (rawTime === "") return "missing finish_seconds and finish_time";
  const parsed = parseTime(rawTime);
  return parsed.success ? parsed.seconds : parsed.error.message;
}

export function loadResultsCsv(content: string): LoadedResults {
  const parsed = parseCsv(content);
  const rejected: RejectedRow[] = parsed.errors.map((e) => ({ line: e.line, reason: e.reason }));
  const records: ResultRecord[] = [];

  if (parsed.columns.length > 0 && !parsed.columns.includes("venue")) {
    rejected.push({ line: 1, reason: "missing venue column" });
    return { records, rejected };
  }

  for (const row of parsed.rows) {
    const seconds = finishSecondsOf(row);
    if (typeof seconds === "string") {
      rejected.push({ line: row.line, reason: seconds });
      continue;
    }
    const result = ResultRecordSchema.safeParse({
      venue: row.fields["venue"],
      gender: row.fields["gender"],
      finishSeconds: seconds,
    });
    if (result.success) {
      records.push(result.data);
    } else {
      rejected.push({ line: row.line, reason: firstIssue(result.error) });
    }
  }
  return { records, rejected };
}

export function resultsToCsv(records: readonly ResultRecord[]): string {
  return toCsv(
    RESULTS_COLUMNS,
    records.map((r) => [r.venue, r.gender, String(r.finishSeconds)])
  );
}

export function correctedResultsToCsv(rows: readonly CorrectedResult[]): string {
  return toCsv(
    CORRECTED_COLUMNS,
    rows.map((r) => [
      r.venue,
      r.gender,
      String(r.finishSeconds),
      formatTime(r.finishSeconds),
      String(r.correctedSeconds),
      formatTime(r.correctedSeconds),
      String(r.adjustmentSeconds),
      String(r.rank),
      r.corrected ? "yes" : "no",
    ])
  );
}
