import type {
  InventoryItem,
  InventorySnapshot,
  PurchaseOrder,
  UsageHistoryRecord,
} from "@supply-forecast/contracts";

export function makeItem(overrides: Partial<InventoryItem> = {}): InventoryItem {
  return {
    itemId: "beans",
    name: "Coffee Beans",
    category: "coffee",
    unit: "kg",
    currentStock: 20,
    minThreshold: 5,
    maxCapacity: 50,
    costPerUnit: 12,
    supplierId: "sup_roaster",
    leadTimeDays: 3,
    shelfLifeDays: 0,
    storageRequirements: "",
    ...overrides,
  };
}

export function makeSnapshot(
  date: string,
  stockLevel: number,
  overrides: Partial<InventorySnapshot> = {},
): InventorySnapshot {
  return {
    date,
    itemId: "beans",
    stockLevel,
    wasteAmount: 0,
    deliveriesReceived: 0,
    notes: "",
    ...overrides,
  };
}

export function makeUsage(
  date: string,
  quantityUsed: number,
  overrides: Partial<UsageHistoryRecord> = {},
): UsageHistoryRecord {
  return {
    date,
    itemId: "beans",
    quantityUsed,
    wasteAmount: 0,
    notes: "",
    calculationMethod: "manual",
    ...overrides,
  };
}

export function makeDeliveredOrder(
  orderId: string,
  date: string,
  lines: Array<{ itemId: string; quantity: number; unitCost?: number }>,
): PurchaseOrder {
  return {
    orderId,
    orderDate: date,
    supplierId: "sup_roaster",
    deliveryDate: date,
    status: "delivered",
    lineItems: lines.map((line) => ({
      itemId: line.itemId,
      quantityOrdered: line.quantity,
      quantityReceived: line.quantity,
      unitCost: line.unitCost ?? 0,
    })),
  };
}
