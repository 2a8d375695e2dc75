import { describe, expect, it } from "vitest";
import {
  AuditSummarySchema,
  ConsumptionRecordSchema,
  DatasetLoadRequestSchema,
  InventoryItemSchema,
  InventorySnapshotSchema,
  OrderRecommendationSchema,
  PurchaseOrderSchema,
  SnapshotDayRequestSchema,
  UsageHistoryRecordSchema,
  UsagePatternSchema,
} from "./schemas.js";

const BASE_ITEM = {
  itemId: "ITEM001",
  name: "Coffee Beans",
  category: "coffee",
  unit: "kg",
  currentStock: 12,
  minThreshold: 5,
  maxCapacity: 40,
  costPerUnit: 18.5,
  supplierId: "SUP001",
  leadTimeDays: 3,
};

describe("supply forecast contract schemas", () => {
  it("applies defaults to inventory items", () => {
    const parsed = InventoryItemSchema.parse(BASE_ITEM);

    expect(parsed.shelfLifeDays).toBe(0);
    expect(parsed.storageRequirements).toBe("");
  });

  it("rejects items whose minimum threshold reaches capacity", () => {
    const result = InventoryItemSchema.safeParse({ ...BASE_ITEM, minThreshold: 40 });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(["minThreshold"]);
    }
  });

  it("defaults snapshot waste, deliveries and notes", () => {
    const parsed = InventorySnapshotSchema.parse({
      date: "2026-03-02",
      itemId: "ITEM001",
      stockLevel: 8.5,
    });

    expect(parsed).toEqual({
      date: "2026-03-02",
      itemId: "ITEM001",
      stockLevel: 8.5,
      wasteAmount: 0,
      deliveriesReceived: 0,
      notes: "",
    });
  });

  it("rejects negative snapshot stock and non-calendar dates", () => {
    expect(
      InventorySnapshotSchema.safeParse({ date: "2026-03-02", itemId: "ITEM001", stockLevel: -1 })
        .success,
    ).toBe(false);
    expect(
      InventorySnapshotSchema.safeParse({
        date: "2026-03-02T08:00:00.000Z",
        itemId: "ITEM001",
        stockLevel: 1,
      }).success,
    ).toBe(false);
  });

  it("keeps negative consumption ledger values for the auditor", () => {
    const parsed = ConsumptionRecordSchema.parse({
      date: "2026-03-02",
      itemId: "ITEM001",
      previousStock: 10,
      consumption: -2,
      deliveryAmount: 0,
      stockBeforeDelivery: 12,
    });

    expect(parsed.consumption).toBe(-2);
    expect(parsed.reasoning).toBe("");
  });

  it("validates purchase orders with nested line items", () => {
    const parsed = PurchaseOrderSchema.parse({
      orderId: "ORD-1",
      orderDate: "2026-03-01",
      supplierId: "SUP001",
      deliveryDate: "2026-03-03",
      status: "delivered",
      lineItems: [{ itemId: "ITEM001", quantityOrdered: 20, quantityReceived: 18 }],
    });

    expect(parsed.lineItems[0]?.unitCost).toBe(0);
    expect(PurchaseOrderSchema.safeParse({ ...parsed, status: "lost" }).success).toBe(false);
  });

  it("marks usage history rows as manual unless tagged otherwise", () => {
    const parsed = UsageHistoryRecordSchema.parse({
      date: "2026-03-02",
      itemId: "ITEM001",
      quantityUsed: 1.2,
    });

    expect(parsed.calculationMethod).toBe("manual");
  });

  it("requires every weekday in usage patterns", () => {
    const result = UsagePatternSchema.safeParse({
      itemId: "ITEM001",
      dailyAverages: { Monday: 1 },
      trendFactor: 1,
      seasonalMultiplier: 1,
      volatility: 0,
      dataPoints: 3,
      lastUpdated: "2026-03-02T08:00:00.000Z",
    });

    expect(result.success).toBe(false);
  });

  it("bounds recommendation days until reorder", () => {
    const result = OrderRecommendationSchema.safeParse({
      itemId: "ITEM001",
      itemName: "Coffee Beans",
      currentStock: 12,
      projectedUsage: 0,
      daysUntilReorder: 1000,
      recommendedQuantity: 0,
      urgencyLevel: "stock_up",
      reasoning: "Good time to stock up",
      supplier: "Roastery",
      estimatedCost: 0,
      reorderCadenceDays: 14,
      historicalAvgQuantity: 0,
    });

    expect(result.success).toBe(false);
  });

  it("requires counts for every audit issue type", () => {
    const result = AuditSummarySchema.safeParse({
      totalIssues: 0,
      recordsChecked: 0,
      byType: { calculation_error: 0 },
      bySeverity: { Critical: 0, High: 0, Medium: 0, Low: 0, Success: 1 },
      auditedAt: "2026-03-02T08:00:00.000Z",
    });

    expect(result.success).toBe(false);
  });

  it("defaults missing dataset collections to empty arrays", () => {
    const parsed = DatasetLoadRequestSchema.parse({ items: [BASE_ITEM] });

    expect(parsed.items).toHaveLength(1);
    expect(parsed.snapshots).toEqual([]);
    expect(parsed.aliases).toEqual({});
  });

  it("requires at least one snapshot entry per day", () => {
    expect(SnapshotDayRequestSchema.safeParse({ entries: [] }).success).toBe(false);
    expect(
      SnapshotDayRequestSchema.parse({ entries: [{ itemId: "ITEM001", stockLevel: 4 }] })
        .deliveries,
    ).toEqual([]);
  });
});
