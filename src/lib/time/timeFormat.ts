/**
 * Finish-time parsing and formatting.
 * Accepts "H:MM:SS" or "MM:SS"; output is always "H:MM:SS".
 */

import type { EngineError } from "../../types.js";

export type ParsedTime = { success: true; seconds: number } | { success: false; error: EngineError };

const DIGITS = /^\d+$/;

function invalid(text: string, reason: string): ParsedTime {
  return {
    success: false,
    error: { code: "INVALID_TIME", message: `Invalid time "${text}": ${reason}. Use HH:MM:SS or MM:SS` },
  };
}

export function parseTime(text: string): ParsedTime {
  const trimmed = text.trim();
  if (trimmed === "") return invalid(text, "empty");
  const parts = trimmed.split(":");
  if (parts.length !== 2 && parts.length !== 3) return invalid(text, "expected 2 or 3 components");
  if (!parts.every((p) => DIGITS.test(p))) return invalid(text, "components must be whole numbers");

  const nums = parts.map((p) => parseInt(p, 10));
  let seconds: number;
  if (nums.length === 3) {
    const [h, m, s] = nums;
    if (m >= 60 || s >= 60) return invalid(text, "minutes and seconds must be below 60");
    seconds = h * 3600 + m * 60 + s;
  } else {
    const [m, s] = nums;
    if (s >= 60) return invalid(text, "seconds must be below 60");
    seconds = m * 60 + s;
  }
  if (!Number.isSafeInteger(seconds)) return invalid(text, "time is out of range");
  if (seconds <= 0) return invalid(text, "time must be positive");
  return { success: true, seconds };
}

/** Whole seconds, truncated. 5675.5 → "1:34:35". */
export function formatTime(seconds: number): string {
  const whole = Math.max(0, Math.trunc(seconds));
  const h = Math.floor(whole / 3600);
  const m = Math.floor((whole % 3600) / 60);
  const s = whole % 60;
  return `${h}:${String(m).padStart(2, "0")}:${String(s).padStart(2, "0")}`;
}

export function isPositiveFinite(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}
