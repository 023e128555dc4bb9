/**
 * Batch normalization: every record converted onto the baseline course and
 * re-ranked within its gender. Records whose venue has no entry for their gender
 * keep the raw time and are counted as uncorrected.
 */

import type { CorrectionTable, EngineErrorCode, Gender, ResultRecord } from "../../types.js";
import { convertSeconds } from "./conversionService.js";

export interface CorrectedResult {
  venue: string;
  gender: Gender;
  finishSeconds: number;
  correctedSeconds: number;
  /** correctedSeconds - finishSeconds */
  adjustmentSeconds: number;
  corrected: boolean;
  /** Competition ranking on correctedSeconds within the gender; ties share the lowest rank. */
  rank: number;
  errorCode?: EngineErrorCode;
}

export interface ApplySummary {
  count: number;
  uncorrectedCount: number;
  meanRawSeconds: number;
  meanCorrectedSeconds: number;
  meanAdjustmentSeconds: number;
  maxAdjustmentSeconds: number;
}

export interface AppliedCorrections {
  rows: CorrectedResult[];
  summary: ApplySummary;
}

function assignRanks(rows: CorrectedResult[]): void {
  const byGender = new Map<Gender, CorrectedResult[]>();
  for (const row of rows) {
    const group = byGender.get(row.gender);
    if (group) group.push(row);
    else byGender.set(row.gender, [row]);
  }
  for (const group of byGender.values()) {
    const sorted = [...group].sort((a, b) => a.correctedSeconds - b.correctedSeconds);
    sorted.forEach((row, i) => {
      const prev = sorted[i - 1];
      row.rank = prev && prev.correctedSeconds === row.correctedSeconds ? prev.rank : i + 1;
    });
  }
}

function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((acc, v) => acc + v, 0) / values.length;
}

export function applyCorrections(table: CorrectionTable, records: readonly ResultRecord[]): AppliedCorrections {
  const rows: CorrectedResult[] = records.map((r) => {
    const result = convertSeconds(table, r.finishSeconds, r.gender, r.venue, "baseline");
    if (!result.success) {
      return {
        venue: r.venue,
        gender: r.gender,
        finishSeconds: r.finishSeconds,
        correctedSeconds: r.finishSeconds,
        adjustmentSeconds: 0,
        corrected: false,
        rank: 0,
        errorCode: result.error.code,
      };
    }
    return {
      venue: r.venue,
      gender: r.gender,
      finishSeconds: r.finishSeconds,
      correctedSeconds: result.value.convertedSeconds,
      adjustmentSeconds: result.value.convertedSeconds - r.finishSeconds,
      corrected: true,
      rank: 0,
    };
  });
  assignRanks(rows);

  const adjustments = rows.map((r) => r.adjustmentSeconds);
  return {
    rows,
    summary: {
      count: rows.length,
      uncorrectedCount: rows.filter((r) => !r.corrected).length,
      meanRawSeconds: mean(rows.map((r) => r.finishSeconds)),
      meanCorrectedSeconds: mean(rows.map((r) => r.correctedSeconds)),
      meanAdjustmentSeconds: mean(adjustments),
      maxAdjustmentSeconds: adjustments.reduce((acc, a) => Math.max(acc, Math.abs(a)), 0),
    },
  };
}
