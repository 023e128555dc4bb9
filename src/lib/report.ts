/**
 * Plain-text correction summary for scripts and logs.
 */

import type { CorrectionTable } from "../types.js";
import type { ApplySummary } from "./engine/applyCorrections.js";
import { listVenues, type VenueListing } from "./engine/venueListing.js";
import { formatCorrection } from "./engine/correctionCalculator.js";
import { formatTime } from "./time/timeFormat.js";

/** Unsigned "m:ss", rounded to whole seconds. */
export function formatDuration(seconds: number): string {
  const whole = Math.round(Math.abs(seconds));
  const m = Math.floor(whole / 60);
  const s = whole % 60;
  return `${m}:${String(s).padStart(2, "0")}`;
}

/** "+12:34" / "-0:05" style offset. */
export function formatOffset(seconds: number): string {
  return `${seconds < 0 ? "-" : "+"}${formatDuration(seconds)}`;
}

/** Men's and women's offsets apart, in seconds; null unless the venue has both. */
export function genderDifference(v: VenueListing): number | null {
  if (v.menOffsetSeconds === null || v.womenOffsetSeconds === null) return null;
  return Math.abs(v.menOffsetSeconds - v.womenOffsetSeconds);
}

function cell(value: number | null, render: (n: number) => string): string {
  return value === null ? "n/a" : render(value);
}

export function formatCorrectionSummary(table: CorrectionTable): string[] {
  const lines = [
    `Correction table v${table.version} (${table.generatedAtISO})`,
    `Baseline: ${table.baselineVenue} (men ${formatTime(table.baselineMedians.M)}, women ${formatTime(table.baselineMedians.W)})`,
    "",
    `${"Venue".padEnd(28)}${"Men".padEnd(18)}${"Women".padEnd(18)}${"Diff".padEnd(8)}${"n".padStart(6)}  Confidence`,
  ];
  const differences: number[] = [];
  for (const v of listVenues(table)) {
    const men = `${cell(v.menOffsetSeconds, formatOffset)} ${cell(v.menCorrectionPct, formatCorrection)}`;
    const women = `${cell(v.womenOffsetSeconds, formatOffset)} ${cell(v.womenCorrectionPct, formatCorrection)}`;
    const diff = genderDifference(v);
    if (diff !== null) differences.push(diff);
    const name = v.isBaseline ? `${v.venue} *` : v.venue;
    lines.push(
      `${name.padEnd(28)}${men.padEnd(18)}${women.padEnd(18)}${cell(diff, formatDuration).padEnd(8)}${String(v.sampleCount).padStart(6)}  ${v.confidence}`
    );
  }
  if (differences.length > 0) {
    const avg = differences.reduce((acc, d) => acc + d, 0) / differences.length;
    const maxDiff = Math.max(...differences);
    lines.push(
      "",
      `Men/women difference: average ${formatDuration(avg)} (${avg.toFixed(1)} s), maximum ${formatDuration(maxDiff)} (${maxDiff.toFixed(1)} s)`
    );
  }
  for (const s of table.skipped) {
    lines.push(`skipped ${s.venue} (${s.gender}): ${s.reason}`);
  }
  return lines;
}

export function formatApplySummary(summary: ApplySummary): string[] {
  const lines = [
    `Corrected ${summary.count - summary.uncorrectedCount} of ${summary.count} results`,
    `Mean raw time: ${formatTime(summary.meanRawSeconds)}`,
    `Mean corrected time: ${formatTime(summary.meanCorrectedSeconds)}`,
    `Mean adjustment: ${summary.meanAdjustmentSeconds.toFixed(1)} s`,
    `Largest adjustment: ${summary.maxAdjustmentSeconds.toFixed(1)} s`,
  ];
  if (summary.uncorrectedCount > 0) {
    lines.push(`${summary.uncorrectedCount} result(s) kept their raw time: no correction for their venue and gender`);
  }
  return lines;
}
