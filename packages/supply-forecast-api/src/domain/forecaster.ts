import type {
  ForecastConfidence,
  InventoryItem,
  ItemForecast,
  UsageHistoryRecord,
} from "@supply-forecast/contracts";
import { addDays, toIsoDate, weekdayOf } from "./calendar.js";
import { ItemNotFoundError } from "./errors.js";
import { mean, round } from "./numbers.js";
import { analyzeUsagePatterns, type UsagePatternMap } from "./usage-pattern-analyzer.js";

export const MAX_DAYS_UNTIL_EMPTY = 999;
// Runout dates further out than this are reported as null.
const RUNOUT_DATE_HORIZON_DAYS = 365;

export type ForecasterOptions = {
  items: InventoryItem[];
  history: UsageHistoryRecord[];
  patterns?: UsagePatternMap;
  asOf?: Date;
};

export function confidenceFromDataPoints(points: number): ForecastConfidence {
  if (points >= 7) {
    return "High";
  }
  if (points >= 3) {
    return "Medium";
  }
  return "Low";
}

export class Forecaster {
  private readonly items: Map<string, InventoryItem>;
  private readonly usageByItem = new Map<string, number[]>();
  private readonly patterns: UsagePatternMap;
  private readonly startDate: string;

  constructor(options: ForecasterOptions) {
    const asOf = options.asOf ?? new Date();
    this.items = new Map(options.items.map((item) => [item.itemId, item]));
    for (const record of options.history) {
      const values = this.usageByItem.get(record.itemId);
      if (values) {
        values.push(record.quantityUsed);
      } else {
        this.usageByItem.set(record.itemId, [record.quantityUsed]);
      }
    }
    this.patterns = options.patterns ?? analyzeUsagePatterns(options.history, { now: asOf });
    this.startDate = toIsoDate(asOf);
  }

  /** Cumulative usage over `days` calendar days starting at the as-of date. */
  predictUsage(itemId: string, days: number): number {
    this.requireItem(itemId);
    const pattern = this.patterns[itemId];
    if (!pattern) {
      return mean(this.usageByItem.get(itemId) ?? []) * days;
    }

    let total = 0;
    for (let offset = 0; offset < days; offset += 1) {
      const weekday = weekdayOf(addDays(this.startDate, offset));
      total += pattern.dailyAverages[weekday] * pattern.trendFactor * pattern.seasonalMultiplier;
    }
    return total;
  }

  forecastItem(itemId: string, horizonDays: number): ItemForecast {
    const item = this.requireItem(itemId);
    const predictedUsage = this.predictUsage(itemId, horizonDays);
    const predictedWeeklyUsage = this.predictUsage(itemId, 7);
    const avgDailyUsage = predictedWeeklyUsage / 7;
    const daysUntilEmpty =
      avgDailyUsage > 0
        ? Math.min(MAX_DAYS_UNTIL_EMPTY, item.currentStock / avgDailyUsage)
        : MAX_DAYS_UNTIL_EMPTY;
    const dataPointsUsed = this.usageByItem.get(itemId)?.length ?? 0;

    return {
      itemId,
      horizonDays,
      predictedUsage: round(predictedUsage),
      predictedWeeklyUsage: round(predictedWeeklyUsage),
      avgDailyUsage: round(avgDailyUsage),
      daysUntilEmpty: round(daysUntilEmpty, 1),
      runoutDate:
        daysUntilEmpty < RUNOUT_DATE_HORIZON_DAYS
          ? addDays(this.startDate, Math.floor(daysUntilEmpty))
          : null,
      dataPointsUsed,
      confidence: confidenceFromDataPoints(dataPointsUsed),
      usedPattern: this.patterns[itemId] !== undefined,
    };
  }

  private requireItem(itemId: string): InventoryItem {
    const item = this.items.get(itemId);
    if (!item) {
      throw new ItemNotFoundError(itemId);
    }
    return item;
  }
}
