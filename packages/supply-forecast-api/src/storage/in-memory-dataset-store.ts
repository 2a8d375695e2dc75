import type {
  DatasetLoadRequest,
  DatasetLoadResponse,
  PurchaseOrder,
  SnapshotDayRequest,
  SnapshotDayResponse,
  SnapshotDeliveryEntry,
} from "@supply-forecast/contracts";
import {
  emptyDataset,
  runForecastCycle,
  type Dataset,
  type ForecastCycleOptions,
  type ReconciledState,
} from "../domain/forecast-cycle.js";
import { parseDataset } from "../domain/ingestion.js";
import { SnapshotStore, syncCurrentStock } from "../domain/snapshot-store.js";
import { consoleLogger, type EngineLogger } from "../logger.js";
import type { DatasetStore } from "../types/dataset-store.js";

const SNAPSHOT_ORDER_PREFIX = "snapshot-";

type InMemoryDatasetStoreOptions = {
  cycle?: Omit<ForecastCycleOptions, "asOf">;
  aliases?: Record<string, string>;
  now?: () => Date;
  logger?: EngineLogger;
};

function clone<T>(value: T): T {
  return structuredClone(value);
}

/**
 * Holds one dataset and the state derived from it. Every write builds the
 * next dataset and state off to the side and only then replaces both.
 */
export class InMemoryDatasetStore implements DatasetStore {
  private dataset: Dataset;
  private state: ReconciledState;
  private readonly cycle: Omit<ForecastCycleOptions, "asOf">;
  private readonly aliases: Record<string, string>;
  private readonly now: () => Date;
  private readonly logger: EngineLogger;

  constructor(options: InMemoryDatasetStoreOptions = {}) {
    this.cycle = options.cycle ?? {};
    this.aliases = options.aliases ?? {};
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? consoleLogger;
    this.dataset = emptyDataset();
    this.state = runForecastCycle(this.dataset, { ...this.cycle, asOf: this.now() });
  }

  loadDataset(request: DatasetLoadRequest): DatasetLoadResponse {
    const parsed = parseDataset(request, { aliases: this.aliases });
    for (const warning of parsed.warnings) {
      this.logger.warn(`[supply-forecast-api] ${warning}`);
    }

    const now = this.now();
    this.swap(parsed.dataset, now);
    this.logger.info(
      `[supply-forecast-api] dataset loaded: ${parsed.counts.items} items, ${parsed.counts.snapshots} snapshots, ${this.state.audit.summary.totalIssues} audit issues`,
    );

    return {
      counts: parsed.counts,
      warnings: parsed.warnings,
      generatedAt: now.toISOString(),
    };
  }

  recordSnapshotDay(date: string, request: SnapshotDayRequest): SnapshotDayResponse {
    const snapshots = new SnapshotStore(this.dataset.snapshots);
    const recorded = snapshots.recordDay(date, request.entries);

    const dayOrders = ordersFromSnapshotDeliveries(date, request.deliveries);
    // Re-recording a day replaces every order booked from that day's form.
    const dayPrefix = `${SNAPSHOT_ORDER_PREFIX}${date}-`;
    const orders = [
      ...this.dataset.orders.filter((order) => !order.orderId.startsWith(dayPrefix)),
      ...dayOrders,
    ];

    this.swap(
      {
        ...this.dataset,
        items: syncCurrentStock(this.dataset.items, snapshots),
        snapshots: snapshots.list(),
        orders,
      },
      this.now(),
    );

    const usageRecordsUpdated = this.state.calculatedUsage.filter((usage) => usage.date === date).length;
    this.logger.info(
      `[supply-forecast-api] snapshot day ${date} recorded: ${recorded.length} snapshots, ${request.deliveries.length} deliveries`,
    );

    return {
      date,
      snapshotsRecorded: recorded.length,
      usageRecordsUpdated,
      deliveriesProcessed: request.deliveries.length,
    };
  }

  getDataset(): Dataset {
    return clone(this.dataset);
  }

  getState(): ReconciledState {
    return this.state;
  }

  private swap(next: Dataset, now: Date): void {
    const nextState = runForecastCycle(next, { ...this.cycle, asOf: now });
    this.dataset = next;
    this.state = nextState;
  }
}

// Deliveries received with a count are booked as one delivered order per supplier.
function ordersFromSnapshotDeliveries(date: string, deliveries: SnapshotDeliveryEntry[]): PurchaseOrder[] {
  const bySupplier = new Map<string, SnapshotDeliveryEntry[]>();
  for (const delivery of deliveries) {
    bySupplier.set(delivery.supplierId, [...(bySupplier.get(delivery.supplierId) ?? []), delivery]);
  }

  return [...bySupplier.entries()].map(([supplierId, entries]): PurchaseOrder => ({
    orderId: `${SNAPSHOT_ORDER_PREFIX}${date}-${supplierId}`,
    orderDate: date,
    supplierId,
    deliveryDate: date,
    status: "delivered",
    lineItems: entries.map((entry) => ({
      itemId: entry.itemId,
      quantityOrdered: entry.quantity,
      quantityReceived: entry.quantity,
      unitCost: entry.unitCost,
    })),
  }));
}
