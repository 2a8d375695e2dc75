import type { CalculatedUsage, UsageHistoryRecord } from "@supply-forecast/contracts";

export function toUsageHistoryRecords(calculated: CalculatedUsage[]): UsageHistoryRecord[] {
  return calculated.map((usage) => ({
    date: usage.date,
    itemId: usage.itemId,
    quantityUsed: usage.calculatedUsage,
    wasteAmount: usage.wasteAmount,
    notes: `Auto-calculated (${usage.confidenceLevel} confidence): ${usage.notes}`,
    calculationMethod: "inventory_difference",
    confidenceLevel: usage.confidenceLevel,
  }));
}

/**
 * Replaces previously calculated rows with `calculated`; hand-entered rows are
 * carried over unchanged.
 */
export function mergeUsageHistory(
  existing: UsageHistoryRecord[],
  calculated: CalculatedUsage[],
): UsageHistoryRecord[] {
  const kept = existing.filter((record) => record.calculationMethod !== "inventory_difference");
  return [...kept, ...toUsageHistoryRecords(calculated)].toSorted(
    (a, b) => a.date.localeCompare(b.date) || a.itemId.localeCompare(b.itemId),
  );
}
