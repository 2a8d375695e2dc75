import type {
  CalculatedUsage,
  ConsumptionRecord,
  InventoryItem,
  InventorySnapshot,
  UsageConfidence,
} from "@supply-forecast/contracts";
import type { DeliveryLedger } from "./delivery-ledger.js";
import { round } from "./numbers.js";

export const DEFAULT_HIGH_USAGE_RATIO = 0.8;

export type ReconcileOptions = {
  highUsageRatio?: number;
};

/** Backward solve: what was used between two counts. */
export function solveConsumption(params: {
  previousStock: number;
  delivered: number;
  currentStock: number;
  waste?: number;
}): number {
  return params.previousStock + params.delivered - params.currentStock - (params.waste ?? 0);
}

/** Forward projection: what the next count should read. */
export function projectStock(params: {
  previousStock: number;
  consumption: number;
  delivered: number;
}): number {
  return params.previousStock - params.consumption + params.delivered;
}

export function reconcilePair(params: {
  previous: InventorySnapshot;
  current: InventorySnapshot;
  ledger: DeliveryLedger;
  item?: InventoryItem;
  highUsageRatio?: number;
}): CalculatedUsage {
  const { previous, current, ledger, item } = params;
  const highUsageRatio = params.highUsageRatio ?? DEFAULT_HIGH_USAGE_RATIO;
  const deliveries = round(
    ledger.totalBetween(current.itemId, previous.date, current.date),
    6,
  );
  const raw = round(
    solveConsumption({
      previousStock: previous.stockLevel,
      delivered: deliveries,
      currentStock: current.stockLevel,
      waste: current.wasteAmount,
    }),
    6,
  );

  let confidence: UsageConfidence = "high";
  let impliedDelivery = 0;
  const notes: string[] = [];
  const downgrades: string[] = [];

  if (deliveries > 0) {
    notes.push(`Includes ${formatQuantity(deliveries)} units delivered`);
  }
  if (current.wasteAmount > 0) {
    notes.push(`Excludes ${formatQuantity(current.wasteAmount)} units waste/spoilage`);
  }

  if (raw < 0) {
    confidence = "low";
    const stockIncrease = round(current.stockLevel - previous.stockLevel, 6);
    if (deliveries === 0 && stockIncrease > 0) {
      impliedDelivery = stockIncrease;
      downgrades.push(
        `Negative usage clamped to 0: stock rose by ${formatQuantity(stockIncrease)} with no recorded delivery (implied delivery of ${formatQuantity(stockIncrease)})`,
      );
    } else {
      downgrades.push(
        `Negative usage of ${formatQuantity(raw)} clamped to 0, check inventory counts and deliveries`,
      );
    }
  }

  const calculatedUsage = raw > 0 ? raw : 0;

  if (item && calculatedUsage > item.maxCapacity * highUsageRatio) {
    confidence = "medium";
    downgrades.push(
      `High usage of ${formatQuantity(calculatedUsage)} exceeds ${Math.round(highUsageRatio * 100)}% of capacity ${formatQuantity(item.maxCapacity)}, please verify`,
    );
  }

  const allNotes = [...notes, ...downgrades];

  return {
    date: current.date,
    itemId: current.itemId,
    calculatedUsage,
    wasteAmount: current.wasteAmount,
    deliveriesApplied: deliveries,
    impliedDelivery,
    salesInferred: true,
    confidenceLevel: confidence,
    notes: allNotes.length > 0 ? allNotes.join("; ") : "Calculated from inventory difference",
  };
}

/**
 * Derives one usage record per consecutive snapshot pair of a single item.
 * The first snapshot has no baseline and yields nothing.
 */
export function reconcileItem(params: {
  snapshots: InventorySnapshot[];
  ledger: DeliveryLedger;
  item?: InventoryItem;
  options?: ReconcileOptions;
}): CalculatedUsage[] {
  const ordered = params.snapshots.toSorted((a, b) => a.date.localeCompare(b.date));
  const usages: CalculatedUsage[] = [];

  for (let index = 1; index < ordered.length; index += 1) {
    const previous = ordered[index - 1];
    const current = ordered[index];
    if (!previous || !current) {
      continue;
    }
    usages.push(
      reconcilePair({
        previous,
        current,
        ledger: params.ledger,
        item: params.item,
        highUsageRatio: params.options?.highUsageRatio,
      }),
    );
  }

  return usages;
}

export function reconcileSnapshots(params: {
  snapshots: InventorySnapshot[];
  ledger: DeliveryLedger;
  items: InventoryItem[];
  options?: ReconcileOptions;
}): CalculatedUsage[] {
  const itemsById = new Map(params.items.map((item) => [item.itemId, item]));
  const usages: CalculatedUsage[] = [];

  for (const [itemId, snapshots] of groupByItem(params.snapshots)) {
    usages.push(
      ...reconcileItem({
        snapshots,
        ledger: params.ledger,
        item: itemsById.get(itemId),
        options: params.options,
      }),
    );
  }

  return usages.toSorted((a, b) => a.date.localeCompare(b.date) || a.itemId.localeCompare(b.itemId));
}

/**
 * Restates reconciled usage in the forward form used by upload-driven
 * ingestion: previousStock - consumption + deliveryAmount = current stock.
 * Waste counts as consumption here. Clamped pairs keep their recorded
 * deliveries, so the auditor reports them as calculation errors.
 */
export function toConsumptionLedger(
  snapshots: InventorySnapshot[],
  usages: CalculatedUsage[],
): ConsumptionRecord[] {
  const usageByKey = new Map(usages.map((usage) => [`${usage.date}|${usage.itemId}`, usage]));
  const rows: ConsumptionRecord[] = [];

  for (const [itemId, itemSnapshots] of groupByItem(snapshots)) {
    const ordered = itemSnapshots.toSorted((a, b) => a.date.localeCompare(b.date));
    for (let index = 1; index < ordered.length; index += 1) {
      const previous = ordered[index - 1];
      const current = ordered[index];
      const usage = current ? usageByKey.get(`${current.date}|${itemId}`) : undefined;
      if (!previous || !current || !usage) {
        continue;
      }

      const deliveryAmount = usage.deliveriesApplied;
      const reasoning =
        deliveryAmount > 0
          ? `Started with ${formatQuantity(previous.stockLevel)}, received ${formatQuantity(deliveryAmount)} delivery, ended with ${formatQuantity(current.stockLevel)}`
          : `Started with ${formatQuantity(previous.stockLevel)}, no deliveries, ended with ${formatQuantity(current.stockLevel)}`;

      rows.push({
        date: current.date,
        itemId,
        previousStock: previous.stockLevel,
        consumption: round(usage.calculatedUsage + usage.wasteAmount, 6),
        deliveryAmount,
        stockBeforeDelivery: Math.max(0, round(current.stockLevel - deliveryAmount, 6)),
        reasoning:
          usage.impliedDelivery > 0
            ? `${reasoning} (implied unrecorded delivery of ${formatQuantity(usage.impliedDelivery)})`
            : reasoning,
      });
    }
  }

  return rows.toSorted((a, b) => a.date.localeCompare(b.date) || a.itemId.localeCompare(b.itemId));
}

export function formatQuantity(value: number): string {
  return String(round(value));
}

function groupByItem(snapshots: InventorySnapshot[]): Map<string, InventorySnapshot[]> {
  const grouped = new Map<string, InventorySnapshot[]>();
  for (const snapshot of snapshots) {
    const existing = grouped.get(snapshot.itemId);
    if (existing) {
      existing.push(snapshot);
    } else {
      grouped.set(snapshot.itemId, [snapshot]);
    }
  }
  return grouped;
}
