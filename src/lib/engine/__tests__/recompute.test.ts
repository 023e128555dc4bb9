import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { recomputeCorrections } from "../recompute.js";
import { DEFAULT_ENGINE_CONFIG } from "../../config.js";
import { FIVE_VENUES, NO_TRIM, SOLO_MEN, rec } from "../../__tests__/fixtures.js";

describe("recomputeCorrections", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("builds a table around the middle venue", () => {
    const result = recomputeCorrections(FIVE_VENUES, NO_TRIM, { version: 4, now: new Date("2026-03-01T12:00:00Z") });
    expect(result.success).toBe(true);
    if (!result.success) return;
    const table = result.value;
    expect(table.version).toBe(4);
    expect(table.generatedAtISO).toBe("2026-03-01T12:00:00.000Z");
    expect(table.baselineVenue).toBe("Maastricht");
    expect(table.baselineMedians).toEqual({ M: 4800, W: 5526 });
    expect(table.entries).toHaveLength(10);
    expect(table.stats).toHaveLength(10);
    expect(table.skipped).toEqual([]);
  });

  it("defaults to version 1", () => {
    const result = recomputeCorrections(FIVE_VENUES, NO_TRIM);
    expect(result.success && result.value.version).toBe(1);
  });

  it("returns a frozen table", () => {
    const result = recomputeCorrections(FIVE_VENUES, NO_TRIM);
    if (!result.success) throw new Error(result.error.message);
    expect(Object.isFrozen(result.value)).toBe(true);
    expect(Object.isFrozen(result.value.entries)).toBe(true);
    expect(Object.isFrozen(result.value.entries[0])).toBe(true);
  });

  it("skips a pair whose records all fall outside the bounds", () => {
    const result = recomputeCorrections([...FIVE_VENUES, ...rec("Oslo", "W", 12000, 15000)], NO_TRIM);
    if (!result.success) throw new Error(result.error.message);
    expect(result.value.skipped).toEqual([
      { venue: "Oslo", gender: "W", reason: "No records for Oslo (W) after filtering" },
    ]);
    expect(result.value.entries.some((e) => e.venue === "Oslo")).toBe(false);
    expect(console.warn).toHaveBeenCalledWith("[Corrections] skipping Oslo (W): No records for Oslo (W) after filtering");
  });

  it("keeps entries for single-gender venues without letting them hold the baseline", () => {
    const result = recomputeCorrections([...FIVE_VENUES, ...SOLO_MEN], NO_TRIM);
    if (!result.success) throw new Error(result.error.message);
    expect(result.value.baselineVenue).toBe("Maastricht");
    const solo = result.value.entries.find((e) => e.venue === "Solo");
    expect(solo?.offsetSeconds).toBe(-200);
    expect(solo?.offsetPct).toBe(4.2);
  });

  it("fails when no venue has both genders", () => {
    const result = recomputeCorrections(SOLO_MEN, NO_TRIM);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe("NO_ELIGIBLE_BASELINE");
  });

  it("fails on an empty dataset", () => {
    const result = recomputeCorrections([], NO_TRIM);
    expect(result.success).toBe(false);
  });

  it("honours a baseline override", () => {
    const result = recomputeCorrections(FIVE_VENUES, { ...NO_TRIM, baselineOverride: "London" });
    if (!result.success) throw new Error(result.error.message);
    expect(result.value.baselineVenue).toBe("London");
    expect(result.value.baselineMedians).toEqual({ M: 4046, W: 4739 });
  });

  it("trims small groups to the fastest 80% by default", () => {
    const times = [4000, 4100, 4200, 4300, 4400, 4500, 4600, 4700, 4800, 4900];
    const result = recomputeCorrections([...rec("Lyon", "M", ...times), ...rec("Lyon", "W", ...times)], DEFAULT_ENGINE_CONFIG);
    if (!result.success) throw new Error(result.error.message);
    const stat = result.value.stats.find((s) => s.venue === "Lyon" && s.gender === "M");
    expect(stat?.sampleCount).toBe(8);
    expect(stat?.medianSeconds).toBe(4350);
  });
});
