import { describe, it, expect } from "vitest";
import { aggregateVenue, aggregateVenues, medianOfSorted, percentileOfSorted } from "../venueAggregator.js";
import { rec } from "../../__tests__/fixtures.js";

describe("medianOfSorted", () => {
  it("takes the middle value for odd counts", () => {
    expect(medianOfSorted([1, 2, 9])).toBe(2);
  });

  it("averages the two middle values for even counts", () => {
    expect(medianOfSorted([1, 2, 3, 4])).toBe(2.5);
  });
});

describe("percentileOfSorted", () => {
  const sorted = [10, 20, 30, 40, 50];

  it("interpolates between closest ranks", () => {
    expect(percentileOfSorted(sorted, 10)).toBeCloseTo(14, 9);
    expect(percentileOfSorted(sorted, 25)).toBeCloseTo(20, 9);
    expect(percentileOfSorted(sorted, 50)).toBeCloseTo(30, 9);
    expect(percentileOfSorted(sorted, 75)).toBeCloseTo(40, 9);
    expect(percentileOfSorted(sorted, 90)).toBeCloseTo(46, 9);
  });

  it("returns the only value of a one-element sample", () => {
    expect(percentileOfSorted([4321], 90)).toBe(4321);
  });
});

describe("aggregateVenue", () => {
  it("summarizes one venue and gender", () => {
    const records = [...rec("Dublin", "M", 5000, 3000, 4000, 6000), ...rec("Dublin", "W", 9000)];
    const result = aggregateVenue(records, "Dublin", "M");
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.value.sampleCount).toBe(4);
    expect(result.value.medianSeconds).toBe(4500);
    expect(result.value.meanSeconds).toBe(4500);
    expect(result.value.percentileLadder.p50).toBe(4500);
  });

  it("fails with INSUFFICIENT_DATA when the pair has no records", () => {
    const result = aggregateVenue(rec("Dublin", "M", 5000), "Dublin", "W");
    expect(result).toEqual({
      success: false,
      error: {
        code: "INSUFFICIENT_DATA",
        message: "No records for Dublin (W) after filtering",
        venue: "Dublin",
        gender: "W",
      },
    });
  });
});

describe("aggregateVenues", () => {
  it("builds sorted stats for every pair present", () => {
    const { stats, missing } = aggregateVenues([
      ...rec("Valencia", "W", 5000),
      ...rec("Bordeaux", "M", 4000, 4200),
      ...rec("Valencia", "M", 4400),
    ]);
    expect(stats.map((s) => `${s.venue}/${s.gender}`)).toEqual(["Bordeaux/M", "Valencia/M", "Valencia/W"]);
    expect(stats[0].medianSeconds).toBe(4100);
    expect(missing).toEqual([]);
  });

  it("reports expected pairs without records instead of failing", () => {
    const { stats, missing } = aggregateVenues(rec("Bordeaux", "M", 4000), [
      { venue: "Bordeaux", gender: "M" },
      { venue: "Bordeaux", gender: "W" },
    ]);
    expect(stats).toHaveLength(1);
    expect(missing).toHaveLength(1);
    expect(missing[0].venue).toBe("Bordeaux");
    expect(missing[0].gender).toBe("W");
    expect(missing[0].error.code).toBe("INSUFFICIENT_DATA");
  });
});
