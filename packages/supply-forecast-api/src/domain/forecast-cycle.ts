import type {
  AuditIssue,
  AuditSummary,
  CalculatedUsage,
  ConsumptionRecord,
  DeliveryRecord,
  InventoryAlert,
  InventoryItem,
  InventoryOverviewEntry,
  InventorySnapshot,
  InventoryStatusSummary,
  ItemForecast,
  OrderRecommendation,
  PurchaseOrder,
  StockLevelRecord,
  Supplier,
  UsageHistoryRecord,
} from "@supply-forecast/contracts";
import { auditStockConsistency } from "./consistency-auditor.js";
import { reconcileSnapshots, toConsumptionLedger, type ReconcileOptions } from "./consumption-reconciler.js";
import { DeliveryLedger } from "./delivery-ledger.js";
import { Forecaster } from "./forecaster.js";
import { buildInventoryAlerts, buildInventoryOverview, summarizeInventoryStatus } from "./inventory-alerts.js";
import { generateRecommendations } from "./recommendation-generator.js";
import { SnapshotStore, syncCurrentStock } from "./snapshot-store.js";
import { mergeUsageHistory } from "./usage-history.js";
import { analyzeUsagePatterns, type UsagePatternMap } from "./usage-pattern-analyzer.js";

export type Dataset = {
  items: InventoryItem[];
  suppliers: Supplier[];
  snapshots: InventorySnapshot[];
  deliveries: DeliveryRecord[];
  orders: PurchaseOrder[];
  usageHistory: UsageHistoryRecord[];
  // Rows computed directly from uploads, in forward form.
  consumptionLedger: ConsumptionRecord[];
  stockLevels: StockLevelRecord[];
};

export function emptyDataset(): Dataset {
  return {
    items: [],
    suppliers: [],
    snapshots: [],
    deliveries: [],
    orders: [],
    usageHistory: [],
    consumptionLedger: [],
    stockLevels: [],
  };
}

export type ForecastCycleOptions = ReconcileOptions & {
  asOf?: Date;
  auditTolerance?: number;
  horizonDays?: number;
};

export type ReconciledState = {
  generatedAt: string;
  items: InventoryItem[];
  suppliers: Supplier[];
  snapshots: InventorySnapshot[];
  deliveries: DeliveryRecord[];
  calculatedUsage: CalculatedUsage[];
  usageHistory: UsageHistoryRecord[];
  consumption: ConsumptionRecord[];
  stockLevels: StockLevelRecord[];
  audit: { issues: AuditIssue[]; summary: AuditSummary };
  patterns: UsagePatternMap;
  forecaster: Forecaster;
  forecasts: ItemForecast[];
  recommendations: OrderRecommendation[];
  alerts: InventoryAlert[];
  inventory: InventoryOverviewEntry[];
  status: InventoryStatusSummary;
};

export const DEFAULT_HORIZON_DAYS = 30;

/**
 * Runs reconcile, audit, analysis, forecast and recommendation over one
 * consistent dataset. The dataset is not modified.
 */
export function runForecastCycle(dataset: Dataset, options: ForecastCycleOptions = {}): ReconciledState {
  const asOf = options.asOf ?? new Date();
  const snapshots = new SnapshotStore(dataset.snapshots);
  const items = syncCurrentStock(dataset.items, snapshots);
  const ledger = DeliveryLedger.fromSources({ deliveries: dataset.deliveries, orders: dataset.orders });

  const calculatedUsage = reconcileSnapshots({
    snapshots: snapshots.list(),
    ledger,
    items,
    options: { highUsageRatio: options.highUsageRatio },
  });
  const usageHistory = mergeUsageHistory(dataset.usageHistory, calculatedUsage);

  const consumption = preferUploaded(
    dataset.consumptionLedger,
    toConsumptionLedger(snapshots.list(), calculatedUsage),
  );
  const stockLevels = preferUploaded(
    dataset.stockLevels,
    snapshots.list().map((snapshot) => ({
      date: snapshot.date,
      itemId: snapshot.itemId,
      currentStock: snapshot.stockLevel,
    })),
  );
  const audit = auditStockConsistency(
    { consumption, stockLevels, deliveries: ledger.records() },
    { tolerance: options.auditTolerance, now: asOf },
  );

  const patterns = analyzeUsagePatterns(usageHistory, { now: asOf });
  const forecaster = new Forecaster({ items, history: usageHistory, patterns, asOf });
  const horizonDays = options.horizonDays ?? DEFAULT_HORIZON_DAYS;
  const forecasts = items.map((item) => forecaster.forecastItem(item.itemId, horizonDays));
  const recommendations = generateRecommendations({
    items,
    suppliers: dataset.suppliers,
    orders: dataset.orders,
    forecaster,
  });

  return {
    generatedAt: asOf.toISOString(),
    items,
    suppliers: dataset.suppliers,
    snapshots: snapshots.list(),
    deliveries: ledger.records(),
    calculatedUsage,
    usageHistory,
    consumption,
    stockLevels,
    audit,
    patterns,
    forecaster,
    forecasts,
    recommendations,
    alerts: buildInventoryAlerts(items),
    inventory: buildInventoryOverview(items, dataset.suppliers, forecaster),
    status: summarizeInventoryStatus(items, recommendations, dataset.orders, asOf),
  };
}

// Uploaded rows win over derived rows for the same (date, item).
function preferUploaded<T extends { date: string; itemId: string }>(uploaded: T[], derived: T[]): T[] {
  const byKey = new Map<string, T>();
  for (const record of derived) {
    byKey.set(`${record.date}|${record.itemId}`, record);
  }
  for (const record of uploaded) {
    byKey.set(`${record.date}|${record.itemId}`, record);
  }
  return [...byKey.values()].toSorted(
    (a, b) => a.date.localeCompare(b.date) || a.itemId.localeCompare(b.itemId),
  );
}
