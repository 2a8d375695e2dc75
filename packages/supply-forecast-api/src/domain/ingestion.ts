import {
  ConsumptionRecordSchema,
  DeliveryRecordSchema,
  InventoryItemSchema,
  InventorySnapshotSchema,
  PurchaseOrderSchema,
  StockLevelRecordSchema,
  SupplierSchema,
  UsageHistoryRecordSchema,
  type DatasetCounts,
  type DatasetLoadRequest,
} from "@supply-forecast/contracts";
import type { ZodType } from "zod";
import type { Dataset } from "./forecast-cycle.js";

type RawRecord = Record<string, unknown>;

type CollectionRule = {
  numericFields: string[];
  dateFields: string[];
};

const RULES: Record<keyof DatasetCounts, CollectionRule> = {
  items: {
    numericFields: ["currentStock", "minThreshold", "maxCapacity", "costPerUnit", "leadTimeDays", "shelfLifeDays"],
    dateFields: [],
  },
  suppliers: {
    numericFields: ["leadTimeDays", "minimumOrderValue", "reliabilityRating"],
    dateFields: [],
  },
  snapshots: {
    numericFields: ["stockLevel", "wasteAmount", "deliveriesReceived"],
    dateFields: ["date"],
  },
  deliveries: { numericFields: ["quantity", "unitCost"], dateFields: ["date"] },
  orders: { numericFields: [], dateFields: ["orderDate", "deliveryDate"] },
  usageHistory: { numericFields: ["quantityUsed", "wasteAmount"], dateFields: ["date"] },
  consumptionLedger: {
    numericFields: ["previousStock", "consumption", "deliveryAmount", "stockBeforeDelivery"],
    dateFields: ["date"],
  },
  stockLevels: { numericFields: ["currentStock"], dateFields: ["date"] },
};

const LINE_ITEM_NUMERIC_FIELDS = ["quantityOrdered", "quantityReceived", "unitCost"];

export type ParsedDataset = {
  dataset: Dataset;
  counts: DatasetCounts;
  warnings: string[];
};

/**
 * Validates a raw upload record by record. Numeric strings become numbers,
 * date-times are cut to calendar dates and item ids are mapped through
 * `aliases`. Records that still fail validation are dropped with a warning.
 */
export function parseDataset(
  raw: DatasetLoadRequest,
  options: { aliases?: Record<string, string> } = {},
): ParsedDataset {
  const aliases = { ...raw.aliases, ...options.aliases };
  const warnings: string[] = [];

  const collect = <T>(name: keyof DatasetCounts, schema: ZodType<T>): T[] => {
    const parsed: T[] = [];
    raw[name].forEach((value, index) => {
      if (!isRecord(value)) {
        warnings.push(`${name}[${index}] skipped: expected an object`);
        return;
      }

      const result = schema.safeParse(normalizeRecord(name, value, aliases));
      if (!result.success) {
        const reasons = result.error.issues
          .map((issue) => `${issue.path.join(".") || "record"}: ${issue.message}`)
          .join("; ");
        warnings.push(`${name}[${index}] skipped: ${reasons}`);
        return;
      }
      parsed.push(result.data);
    });
    return parsed;
  };

  const items = dedupeBy(collect("items", InventoryItemSchema), (item) => item.itemId, "items", warnings);
  const suppliers = dedupeBy(
    collect("suppliers", SupplierSchema),
    (supplier) => supplier.supplierId,
    "suppliers",
    warnings,
  );
  const orders = dedupeBy(collect("orders", PurchaseOrderSchema), (order) => order.orderId, "orders", warnings);

  const dataset: Dataset = {
    items,
    suppliers,
    snapshots: collect("snapshots", InventorySnapshotSchema),
    deliveries: collect("deliveries", DeliveryRecordSchema),
    orders,
    usageHistory: collect("usageHistory", UsageHistoryRecordSchema),
    consumptionLedger: collect("consumptionLedger", ConsumptionRecordSchema),
    stockLevels: collect("stockLevels", StockLevelRecordSchema),
  };

  return {
    dataset,
    counts: {
      items: dataset.items.length,
      suppliers: dataset.suppliers.length,
      snapshots: dataset.snapshots.length,
      deliveries: dataset.deliveries.length,
      orders: dataset.orders.length,
      usageHistory: dataset.usageHistory.length,
      consumptionLedger: dataset.consumptionLedger.length,
      stockLevels: dataset.stockLevels.length,
    },
    warnings,
  };
}

function normalizeRecord(
  name: keyof DatasetCounts,
  value: RawRecord,
  aliases: Record<string, string>,
): RawRecord {
  const rule = RULES[name];
  const record = coerceNumbers({ ...value }, rule.numericFields);
  for (const field of rule.dateFields) {
    record[field] = trimDate(record[field]);
  }
  if ("itemId" in record) {
    record.itemId = resolveAlias(record.itemId, aliases);
  }

  if (Array.isArray(record.lineItems)) {
    record.lineItems = record.lineItems.map((line: unknown) => {
      if (!isRecord(line)) {
        return line;
      }
      const normalized = coerceNumbers({ ...line }, LINE_ITEM_NUMERIC_FIELDS);
      normalized.itemId = resolveAlias(normalized.itemId, aliases);
      return normalized;
    });
  }
  return record;
}

function coerceNumbers(record: RawRecord, fields: string[]): RawRecord {
  for (const field of fields) {
    const value = record[field];
    if (typeof value === "string" && value.trim().length > 0) {
      const parsed = Number(value.trim());
      if (Number.isFinite(parsed)) {
        record[field] = parsed;
      }
    }
  }
  return record;
}

function trimDate(value: unknown): unknown {
  if (typeof value === "string" && /^\d{4}-\d{2}-\d{2}[T ]/.test(value.trim())) {
    return value.trim().slice(0, 10);
  }
  return value;
}

function resolveAlias(value: unknown, aliases: Record<string, string>): unknown {
  if (typeof value !== "string") {
    return value;
  }
  return Object.hasOwn(aliases, value) ? aliases[value] : value;
}

function dedupeBy<T>(
  records: T[],
  keyOf: (record: T) => string,
  name: string,
  warnings: string[],
): T[] {
  const seen = new Set<string>();
  return records.filter((record) => {
    const key = keyOf(record);
    if (seen.has(key)) {
      warnings.push(`${name} duplicate skipped: ${key}`);
      return false;
    }
    seen.add(key);
    return true;
  });
}

function isRecord(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
