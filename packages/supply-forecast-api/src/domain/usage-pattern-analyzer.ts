import type { UsageHistoryRecord, UsagePattern, Weekday } from "@supply-forecast/contracts";
import { WEEKDAYS, weekdayOf } from "./calendar.js";
import { clamp, mean, sampleStdev } from "./numbers.js";

export const MIN_PATTERN_POINTS = 3;
export const TREND_BOUNDS = { min: 0.5, max: 2 } as const;

export type UsagePatternMap = Record<string, UsagePattern>;

/**
 * Builds a weekday profile per item from its usage history. Items with fewer
 * than three records get no pattern; the forecaster falls back to the plain
 * mean for them.
 */
export function analyzeUsagePatterns(
  history: UsageHistoryRecord[],
  options: { now?: Date } = {},
): UsagePatternMap {
  const now = options.now ?? new Date();
  const byItem = new Map<string, UsageHistoryRecord[]>();
  for (const record of history) {
    const existing = byItem.get(record.itemId);
    if (existing) {
      existing.push(record);
    } else {
      byItem.set(record.itemId, [record]);
    }
  }

  const patterns: UsagePatternMap = {};
  for (const itemId of [...byItem.keys()].toSorted()) {
    const pattern = analyzeItemUsage(itemId, byItem.get(itemId) ?? [], now);
    if (pattern) {
      patterns[itemId] = pattern;
    }
  }
  return patterns;
}

export function analyzeItemUsage(
  itemId: string,
  records: UsageHistoryRecord[],
  now: Date,
): UsagePattern | null {
  if (records.length < MIN_PATTERN_POINTS) {
    return null;
  }

  const ordered = records.toSorted((a, b) => a.date.localeCompare(b.date));
  const usage = ordered.map((record) => record.quantityUsed);
  const overall = mean(usage);

  const byWeekday = new Map<Weekday, number[]>();
  for (const record of ordered) {
    const weekday = weekdayOf(record.date);
    byWeekday.set(weekday, [...(byWeekday.get(weekday) ?? []), record.quantityUsed]);
  }

  const dailyAverages: Record<Weekday, number> = {
    Monday: overall,
    Tuesday: overall,
    Wednesday: overall,
    Thursday: overall,
    Friday: overall,
    Saturday: overall,
    Sunday: overall,
  };
  for (const weekday of WEEKDAYS) {
    const values = byWeekday.get(weekday);
    if (values && values.length > 0) {
      dailyAverages[weekday] = mean(values);
    }
  }

  return {
    itemId,
    dailyAverages,
    trendFactor: trendFactor(usage),
    seasonalMultiplier: 1,
    volatility: overall > 0 ? sampleStdev(usage) / overall : 0,
    dataPoints: ordered.length,
    lastUpdated: now.toISOString(),
  };
}

/** Second-half mean over first-half mean, split at floor(n / 2). */
export function trendFactor(usage: number[]): number {
  const half = Math.floor(usage.length / 2);
  const firstMean = mean(usage.slice(0, half));
  if (firstMean === 0) {
    return 1;
  }
  return clamp(mean(usage.slice(half)) / firstMean, TREND_BOUNDS.min, TREND_BOUNDS.max);
}
