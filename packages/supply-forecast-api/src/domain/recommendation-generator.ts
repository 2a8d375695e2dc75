import type {
  InventoryItem,
  OrderRecommendation,
  PurchaseOrder,
  Supplier,
  UrgencyLevel,
} from "@supply-forecast/contracts";
import { daysBetween } from "./calendar.js";
import type { Forecaster } from "./forecaster.js";
import { clamp, mean, round } from "./numbers.js";
import type { TabularRow } from "./tabular-export.js";

export const DEFAULT_CADENCE_DAYS = 14;
export const MAX_DAYS_UNTIL_REORDER = 999;
const CRITICAL_CAPACITY_SHARE = 0.8;
const NORMAL_CADENCE_SLACK = 1.2;
const STOCK_UP_SHARE = 0.7;
export const UNKNOWN_SUPPLIER = "Unknown";

const URGENCY_RANK: Record<UrgencyLevel, number> = {
  critical: 0,
  warning: 1,
  normal: 2,
  stock_up: 3,
};

export const RECOMMENDATION_EXPORT_COLUMNS = [
  "Item Name",
  "Current Stock",
  "Recommended Quantity",
  "Urgency",
  "Days Until Reorder",
  "Estimated Cost",
  "Supplier",
  "Reasoning",
];

export type ReorderCadence = {
  cadenceDays: number;
  avgQuantity: number;
  ordersConsidered: number;
};

/** Average gap and quantity across delivered orders that carry the item. */
export function reorderCadence(itemId: string, orders: PurchaseOrder[]): ReorderCadence {
  const relevant = orders
    .filter((order) => order.status === "delivered")
    .flatMap((order) => {
      const quantity = order.lineItems
        .filter((line) => line.itemId === itemId)
        .reduce((sum, line) => sum + line.quantityOrdered, 0);
      return order.lineItems.some((line) => line.itemId === itemId)
        ? [{ date: order.orderDate, quantity }]
        : [];
    })
    .toSorted((a, b) => a.date.localeCompare(b.date));

  if (relevant.length < 2) {
    return { cadenceDays: DEFAULT_CADENCE_DAYS, avgQuantity: 0, ordersConsidered: relevant.length };
  }

  const intervals: number[] = [];
  for (let index = 1; index < relevant.length; index += 1) {
    const previous = relevant[index - 1];
    const current = relevant[index];
    if (previous && current) {
      intervals.push(daysBetween(previous.date, current.date));
    }
  }

  return {
    cadenceDays: Math.max(1, Math.trunc(mean(intervals))),
    avgQuantity: mean(relevant.map((entry) => entry.quantity)),
    ordersConsidered: relevant.length,
  };
}

export function recommendForItem(params: {
  item: InventoryItem;
  orders: PurchaseOrder[];
  forecaster: Forecaster;
  supplierName?: string;
}): OrderRecommendation {
  const { item, forecaster } = params;
  const cadence = reorderCadence(item.itemId, params.orders);
  const predicted = forecaster.predictUsage(item.itemId, cadence.cadenceDays);

  // Urgency is decided on the fractional value; only the reported field is truncated.
  let days: number = MAX_DAYS_UNTIL_REORDER;
  if (predicted > 0) {
    const dailyRate = predicted / cadence.cadenceDays;
    days = Math.max(0, (item.currentStock - item.minThreshold) / dailyRate);
  }
  const daysUntilReorder = Math.trunc(Math.min(MAX_DAYS_UNTIL_REORDER, days));

  let urgencyLevel: UrgencyLevel;
  let quantity: number;
  let reasoning: string;
  if (item.currentStock <= item.minThreshold) {
    urgencyLevel = "critical";
    quantity = Math.max(cadence.avgQuantity, item.maxCapacity * CRITICAL_CAPACITY_SHARE);
    reasoning = `Below minimum threshold (${item.minThreshold})`;
  } else if (days <= item.leadTimeDays) {
    urgencyLevel = "warning";
    quantity = cadence.avgQuantity;
    reasoning = `Will hit minimum in ${days.toFixed(1)} days (lead time: ${item.leadTimeDays})`;
  } else if (days <= cadence.cadenceDays * NORMAL_CADENCE_SLACK) {
    urgencyLevel = "normal";
    quantity = cadence.avgQuantity;
    reasoning = `Typically reorder every ${cadence.cadenceDays} days`;
  } else {
    urgencyLevel = "stock_up";
    quantity = cadence.avgQuantity * STOCK_UP_SHARE;
    reasoning = `Good time to stock up - ${days.toFixed(1)} days of stock remaining`;
  }

  const headroom = Math.max(0, item.maxCapacity - item.currentStock);
  const recommendedQuantity = Math.min(headroom, round(clamp(quantity, 0, headroom)));
  if (recommendedQuantity === 0) {
    reasoning = `${reasoning} (stock sufficient, no order needed)`;
  }

  return {
    itemId: item.itemId,
    itemName: item.name,
    currentStock: item.currentStock,
    projectedUsage: round(predicted),
    daysUntilReorder,
    recommendedQuantity,
    urgencyLevel,
    reasoning,
    supplier: params.supplierName ?? UNKNOWN_SUPPLIER,
    estimatedCost: round(recommendedQuantity * item.costPerUnit, 2),
    reorderCadenceDays: cadence.cadenceDays,
    historicalAvgQuantity: round(cadence.avgQuantity),
  };
}

/**
 * One recommendation per item, most urgent first and most expensive first
 * within an urgency level. Items whose quantity clamps to 0 stay in the list.
 */
export function generateRecommendations(params: {
  items: InventoryItem[];
  suppliers: Supplier[];
  orders: PurchaseOrder[];
  forecaster: Forecaster;
}): OrderRecommendation[] {
  const supplierNames = new Map(params.suppliers.map((supplier) => [supplier.supplierId, supplier.name]));

  return params.items
    .map((item) =>
      recommendForItem({
        item,
        orders: params.orders,
        forecaster: params.forecaster,
        supplierName: supplierNames.get(item.supplierId),
      }),
    )
    .toSorted(
      (a, b) =>
        URGENCY_RANK[a.urgencyLevel] - URGENCY_RANK[b.urgencyLevel] ||
        b.estimatedCost - a.estimatedCost ||
        a.itemId.localeCompare(b.itemId),
    );
}

export function recommendationsToRows(recommendations: OrderRecommendation[]): TabularRow[] {
  return recommendations.map((recommendation) => ({
    "Item Name": recommendation.itemName,
    "Current Stock": recommendation.currentStock,
    "Recommended Quantity": recommendation.recommendedQuantity,
    Urgency: recommendation.urgencyLevel,
    "Days Until Reorder": recommendation.daysUntilReorder,
    "Estimated Cost": `$${recommendation.estimatedCost.toFixed(2)}`,
    Supplier: recommendation.supplier,
    Reasoning: recommendation.reasoning,
  }));
}
