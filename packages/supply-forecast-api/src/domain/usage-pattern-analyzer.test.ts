import { describe, expect, it } from "vitest";
import { makeUsage } from "../test-support/fixtures.js";
import { analyzeUsagePatterns, trendFactor } from "./usage-pattern-analyzer.js";

const NOW = new Date("2026-03-10T08:00:00.000Z");

describe("usage pattern analyzer", () => {
  it("averages by weekday and backfills missing weekdays with the overall mean", () => {
    const patterns = analyzeUsagePatterns(
      [
        makeUsage("2026-03-09", 6),
        makeUsage("2026-03-02", 4),
        makeUsage("2026-03-03", 6),
        makeUsage("2026-03-04", 8),
      ],
      { now: NOW },
    );

    expect(patterns.beans).toEqual({
      itemId: "beans",
      dailyAverages: {
        Monday: 5,
        Tuesday: 6,
        Wednesday: 8,
        Thursday: 6,
        Friday: 6,
        Saturday: 6,
        Sunday: 6,
      },
      trendFactor: 1.4,
      seasonalMultiplier: 1,
      volatility: expect.closeTo(Math.sqrt(8 / 3) / 6, 9),
      dataPoints: 4,
      lastUpdated: "2026-03-10T08:00:00.000Z",
    });
  });

  it("skips items with fewer than three records", () => {
    const patterns = analyzeUsagePatterns([
      makeUsage("2026-03-02", 4),
      makeUsage("2026-03-03", 6),
      makeUsage("2026-03-02", 1, { itemId: "milk" }),
      makeUsage("2026-03-03", 1, { itemId: "milk" }),
      makeUsage("2026-03-04", 1, { itemId: "milk" }),
    ]);

    expect(Object.keys(patterns)).toEqual(["milk"]);
  });

  it("handles an all-zero history", () => {
    const patterns = analyzeUsagePatterns([
      makeUsage("2026-03-02", 0),
      makeUsage("2026-03-03", 0),
      makeUsage("2026-03-04", 0),
    ]);
    const pattern = patterns.beans;

    expect(pattern?.trendFactor).toBe(1);
    expect(pattern?.volatility).toBe(0);
    expect(Object.keys(pattern?.dailyAverages ?? {})).toHaveLength(7);
    expect(Object.values(pattern?.dailyAverages ?? {}).every((value) => value === 0)).toBe(true);
  });

  it("clamps the trend factor", () => {
    expect(trendFactor([1, 1, 10, 10])).toBe(2);
    expect(trendFactor([10, 10, 1, 1])).toBe(0.5);
    expect(trendFactor([4, 5, 6])).toBe(1.375);
    expect(trendFactor([0, 0, 3, 3])).toBe(1);
  });
});
