import { describe, it, expect } from "vitest";
import { buildDistribution, emptyBins } from "../distribution.js";
import { NO_TRIM, rec } from "../../__tests__/fixtures.js";

describe("emptyBins", () => {
  it("spans the bounds in fixed-width bins", () => {
    const bins = emptyBins(3000, 9000, 300);
    expect(bins).toHaveLength(20);
    expect(bins[0]).toEqual({ binStart: 3000, binEnd: 3300, count: 0 });
    expect(bins[19]).toEqual({ binStart: 8700, binEnd: 9000, count: 0 });
  });

  it("shortens the last bin to the upper bound", () => {
    const bins = emptyBins(0, 1000, 300);
    expect(bins.map((b) => [b.binStart, b.binEnd])).toEqual([
      [0, 300],
      [300, 600],
      [600, 900],
      [900, 1000],
    ]);
  });
});

describe("buildDistribution", () => {
  const records = [
    ...rec("London", "M", 2999, 3000, 3299, 3300, 9000),
    ...rec("London", "W", 4500),
    ...rec("Dublin", "M", 4510),
  ];

  it("counts filtered finishes per bin and closes the last bin", () => {
    const { bins, totalCount } = buildDistribution(records, { genders: ["M"], venues: ["London"] }, NO_TRIM);
    expect(totalCount).toBe(4);
    expect(bins[0].count).toBe(2);
    expect(bins[1].count).toBe(1);
    expect(bins[19].count).toBe(1);
    expect(bins.reduce((acc, b) => acc + b.count, 0)).toBe(4);
  });

  it("filters by gender", () => {
    const { bins, totalCount } = buildDistribution(records, { genders: ["W"] }, NO_TRIM);
    expect(totalCount).toBe(1);
    expect(bins[5].count).toBe(1);
  });

  it("filters by venue", () => {
    const { totalCount } = buildDistribution(records, { venues: ["Dublin"] }, NO_TRIM);
    expect(totalCount).toBe(1);
  });

  it("treats empty filter lists as no filter", () => {
    const { totalCount } = buildDistribution(records, { genders: [], venues: [] }, NO_TRIM);
    expect(totalCount).toBe(6);
  });

  it("applies the default trimming", () => {
    const { totalCount } = buildDistribution(rec("Lyon", "M", 4000, 4100, 4200, 4300, 4400));
    expect(totalCount).toBe(4);
  });
});
