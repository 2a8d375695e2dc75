import { DatasetLoadRequestSchema, SnapshotDayRequestSchema } from "@supply-forecast/contracts";
import { describe, expect, it, vi } from "vitest";
import type { EngineLogger } from "../logger.js";
import { InMemoryDatasetStore } from "./in-memory-dataset-store.js";

const ITEM = {
  itemId: "beans",
  name: "Coffee Beans",
  unit: "kg",
  currentStock: 10,
  minThreshold: 5,
  maxCapacity: 50,
  costPerUnit: 12,
  supplierId: "sup_roaster",
  leadTimeDays: 3,
};

function createStore() {
  const logger: EngineLogger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const store = new InMemoryDatasetStore({
    now: () => new Date("2026-03-10T08:00:00.000Z"),
    logger,
  });
  return { store, logger };
}

describe("InMemoryDatasetStore", () => {
  it("loads a dataset and logs skipped records", () => {
    const { store, logger } = createStore();

    const response = store.loadDataset(
      DatasetLoadRequestSchema.parse({
        items: [ITEM],
        snapshots: [{ date: "2026-03-02", itemId: "beans", stockLevel: -4 }],
      }),
    );

    expect(response.counts.items).toBe(1);
    expect(response.counts.snapshots).toBe(0);
    expect(response.generatedAt).toBe("2026-03-10T08:00:00.000Z");
    expect(response.warnings).toHaveLength(1);
    expect(logger.warn).toHaveBeenCalledWith(`[supply-forecast-api] ${response.warnings[0]}`);
  });

  it("records a snapshot day with its deliveries as a delivered order", () => {
    const { store } = createStore();
    store.loadDataset(
      DatasetLoadRequestSchema.parse({
        items: [ITEM],
        snapshots: [{ date: "2026-03-02", itemId: "beans", stockLevel: 10 }],
      }),
    );
    const request = SnapshotDayRequestSchema.parse({
      entries: [{ itemId: "beans", stockLevel: 18 }],
      deliveries: [{ itemId: "beans", supplierId: "sup_roaster", quantity: 10, unitCost: 11 }],
    });

    const response = store.recordSnapshotDay("2026-03-03", request);
    store.recordSnapshotDay("2026-03-03", request);

    expect(response).toEqual({
      date: "2026-03-03",
      snapshotsRecorded: 1,
      usageRecordsUpdated: 1,
      deliveriesProcessed: 1,
    });
    const dataset = store.getDataset();
    expect(dataset.orders.map((order) => order.orderId)).toEqual(["snapshot-2026-03-03-sup_roaster"]);
    expect(dataset.items[0]?.currentStock).toBe(18);
    expect(store.getState().calculatedUsage.map((usage) => usage.calculatedUsage)).toEqual([2]);
    expect(store.getState().audit.issues).toEqual([]);
  });

  it("drops the earlier suppliers' orders when a day is recorded again", () => {
    const { store } = createStore();
    store.loadDataset(
      DatasetLoadRequestSchema.parse({
        items: [ITEM],
        snapshots: [{ date: "2026-03-02", itemId: "beans", stockLevel: 10 }],
      }),
    );

    store.recordSnapshotDay(
      "2026-03-03",
      SnapshotDayRequestSchema.parse({
        entries: [{ itemId: "beans", stockLevel: 18 }],
        deliveries: [{ itemId: "beans", supplierId: "sup_roaster", quantity: 10 }],
      }),
    );
    store.recordSnapshotDay(
      "2026-03-03",
      SnapshotDayRequestSchema.parse({
        entries: [{ itemId: "beans", stockLevel: 20 }],
        deliveries: [{ itemId: "beans", supplierId: "sup_backup", quantity: 12 }],
      }),
    );

    expect(store.getDataset().orders.map((order) => order.orderId)).toEqual(["snapshot-2026-03-03-sup_backup"]);
    const delivered = store
      .getState()
      .deliveries.filter((delivery) => delivery.date === "2026-03-03")
      .reduce((total, delivery) => total + delivery.quantity, 0);
    expect(delivered).toBe(12);
    expect(store.getState().calculatedUsage.map((usage) => usage.calculatedUsage)).toEqual([2]);
  });

  it("publishes a new state without touching the one readers already hold", () => {
    const { store } = createStore();
    const before = store.getState();

    store.loadDataset(
      DatasetLoadRequestSchema.parse({
        items: [ITEM],
        snapshots: [
          { date: "2026-03-02", itemId: "beans", stockLevel: 10 },
          { date: "2026-03-03", itemId: "beans", stockLevel: 8 },
        ],
      }),
    );

    expect(before.calculatedUsage).toEqual([]);
    expect(before.items).toEqual([]);
    expect(store.getState()).not.toBe(before);
    expect(store.getState().calculatedUsage).toHaveLength(1);
  });

  it("hands out copies of the dataset", () => {
    const { store } = createStore();
    store.loadDataset(DatasetLoadRequestSchema.parse({ items: [ITEM] }));

    store.getDataset().items.pop();

    expect(store.getDataset().items).toHaveLength(1);
  });
});
