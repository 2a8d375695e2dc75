import type {
  InventoryAlert,
  InventoryItem,
  InventoryOverviewEntry,
  InventoryStatusSummary,
  OrderRecommendation,
  PurchaseOrder,
  Supplier,
  UrgencyLevel,
} from "@supply-forecast/contracts";
import type { Forecaster } from "./forecaster.js";
import { round } from "./numbers.js";
import { UNKNOWN_SUPPLIER } from "./recommendation-generator.js";

const RECENT_ORDER_LIMIT = 5;

export function buildInventoryAlerts(items: InventoryItem[]): InventoryAlert[] {
  const alerts: InventoryAlert[] = [];
  for (const item of items) {
    if (item.currentStock > item.minThreshold) {
      continue;
    }

    const outOfStock = item.currentStock === 0;
    alerts.push({
      type: "low_stock",
      severity: outOfStock ? "critical" : "warning",
      itemId: item.itemId,
      itemName: item.name,
      currentStock: item.currentStock,
      minThreshold: item.minThreshold,
      message: outOfStock
        ? `${item.name} is out of stock`
        : `${item.name} is low: ${item.currentStock} ${item.unit} left (minimum ${item.minThreshold})`,
    });
  }

  return alerts.toSorted(
    (a, b) =>
      Number(b.severity === "critical") - Number(a.severity === "critical") ||
      a.itemId.localeCompare(b.itemId),
  );
}

export function summarizeInventoryStatus(
  items: InventoryItem[],
  recommendations: OrderRecommendation[],
  orders: PurchaseOrder[],
  now: Date,
): InventoryStatusSummary {
  const urgencyCounts: Record<UrgencyLevel, number> = {
    critical: 0,
    warning: 0,
    normal: 0,
    stock_up: 0,
  };
  for (const entry of recommendations) {
    urgencyCounts[entry.urgencyLevel] += 1;
  }

  return {
    totalItems: items.length,
    itemsBelowThreshold: items.filter((item) => item.currentStock <= item.minThreshold).length,
    criticalItems: urgencyCounts.critical,
    recommendationsCount: recommendations.length,
    itemsNeedingOrder: recommendations.filter((entry) => entry.recommendedQuantity > 0).length,
    totalEstimatedCost: round(
      recommendations.reduce((sum, entry) => sum + entry.estimatedCost, 0),
      2,
    ),
    urgencyCounts,
    recentOrders: orders
      .toSorted((a, b) => b.orderDate.localeCompare(a.orderDate) || a.orderId.localeCompare(b.orderId))
      .slice(0, RECENT_ORDER_LIMIT),
    lastUpdated: now.toISOString(),
  };
}

/** Items with one- and two-week usage, days of stock left and the supplier's name. */
export function buildInventoryOverview(
  items: InventoryItem[],
  suppliers: Supplier[],
  forecaster: Forecaster,
): InventoryOverviewEntry[] {
  const supplierNames = new Map(suppliers.map((supplier) => [supplier.supplierId, supplier.name]));
  return items.map((item) => {
    const forecast = forecaster.forecastItem(item.itemId, 14);
    return {
      item,
      predicted7DayUsage: forecast.predictedWeeklyUsage,
      predicted14DayUsage: forecast.predictedUsage,
      daysUntilEmpty: forecast.daysUntilEmpty,
      supplierName: supplierNames.get(item.supplierId) ?? UNKNOWN_SUPPLIER,
    };
  });
}
