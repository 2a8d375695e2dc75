import { z } from "zod";

export const WeekdaySchema = z.enum([
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
  "Sunday",
]);

export const UsageConfidenceSchema = z.enum(["high", "medium", "low"]);
export const ForecastConfidenceSchema = z.enum(["High", "Medium", "Low"]);
export const UrgencyLevelSchema = z.enum(["critical", "warning", "normal", "stock_up"]);
export const OrderStatusSchema = z.enum(["pending", "ordered", "delivered", "cancelled"]);
export const CalculationMethodSchema = z.enum(["inventory_difference", "manual"]);
export const AuditIssueTypeSchema = z.enum([
  "data_validation_error",
  "missing_delivery",
  "calculation_error",
  "missing_stock_record",
  "negative_value",
]);
export const AuditSeveritySchema = z.enum(["Critical", "High", "Medium", "Low", "Success"]);
export const AlertSeveritySchema = z.enum(["critical", "warning"]);

export const IdSchema = z.string().min(1).max(128);
export const IsoDateSchema = z.iso.date();

export const InventoryItemSchema = z
  .object({
    itemId: IdSchema,
    name: z.string().min(1).max(200),
    category: z.string().max(120).default("other"),
    unit: z.string().min(1).max(40),
    currentStock: z.number().nonnegative(),
    minThreshold: z.number().nonnegative(),
    maxCapacity: z.number().positive(),
    costPerUnit: z.number().nonnegative(),
    supplierId: IdSchema,
    leadTimeDays: z.number().int().nonnegative(),
    shelfLifeDays: z.number().int().nonnegative().default(0),
    storageRequirements: z.string().max(200).default(""),
  })
  .refine((item) => item.minThreshold < item.maxCapacity, {
    message: "minThreshold must be below maxCapacity",
    path: ["minThreshold"],
  });

export const SupplierSchema = z.object({
  supplierId: IdSchema,
  name: z.string().min(1).max(200),
  contactPerson: z.string().max(200).default(""),
  phone: z.string().max(60).default(""),
  email: z.string().max(200).default(""),
  leadTimeDays: z.number().int().nonnegative(),
  minimumOrderValue: z.number().nonnegative().default(0),
  paymentTerms: z.string().max(120).default(""),
  reliabilityRating: z.number().min(1).max(5),
  specialty: z.string().max(200).default(""),
});

export const InventorySnapshotSchema = z.object({
  date: IsoDateSchema,
  itemId: IdSchema,
  stockLevel: z.number().nonnegative(),
  wasteAmount: z.number().nonnegative().default(0),
  deliveriesReceived: z.number().nonnegative().default(0),
  notes: z.string().max(500).default(""),
});

export const DeliveryRecordSchema = z.object({
  date: IsoDateSchema,
  itemId: IdSchema,
  quantity: z.number().nonnegative(),
  unitCost: z.number().nonnegative().default(0),
  notes: z.string().max(500).default(""),
  sourceOrderId: IdSchema.optional(),
});

export const OrderLineItemSchema = z.object({
  itemId: IdSchema,
  quantityOrdered: z.number().nonnegative(),
  quantityReceived: z.number().nonnegative().default(0),
  unitCost: z.number().nonnegative().default(0),
});

export const PurchaseOrderSchema = z.object({
  orderId: IdSchema,
  orderDate: IsoDateSchema,
  supplierId: IdSchema,
  deliveryDate: IsoDateSchema.nullable().optional(),
  status: OrderStatusSchema,
  lineItems: z.array(OrderLineItemSchema),
});

export const CalculatedUsageSchema = z.object({
  date: IsoDateSchema,
  itemId: IdSchema,
  calculatedUsage: z.number().nonnegative(),
  wasteAmount: z.number().nonnegative(),
  deliveriesApplied: z.number().nonnegative(),
  impliedDelivery: z.number().nonnegative(),
  salesInferred: z.boolean(),
  confidenceLevel: UsageConfidenceSchema,
  notes: z.string(),
});

export const UsageHistoryRecordSchema = z.object({
  date: IsoDateSchema,
  itemId: IdSchema,
  quantityUsed: z.number().nonnegative(),
  wasteAmount: z.number().nonnegative().default(0),
  notes: z.string().max(500).default(""),
  calculationMethod: CalculationMethodSchema.default("manual"),
  confidenceLevel: UsageConfidenceSchema.optional(),
});

// Upload-driven rows are validated by the auditor, so negatives are allowed here.
export const ConsumptionRecordSchema = z.object({
  date: IsoDateSchema,
  itemId: IdSchema,
  previousStock: z.number(),
  consumption: z.number(),
  deliveryAmount: z.number(),
  stockBeforeDelivery: z.number(),
  reasoning: z.string().default(""),
});

export const StockLevelRecordSchema = z.object({
  date: IsoDateSchema,
  itemId: IdSchema,
  currentStock: z.number(),
});

export const UsagePatternSchema = z.object({
  itemId: IdSchema,
  dailyAverages: z.record(WeekdaySchema, z.number().nonnegative()),
  trendFactor: z.number().min(0.5).max(2),
  seasonalMultiplier: z.number().positive(),
  volatility: z.number().nonnegative(),
  dataPoints: z.number().int().min(3),
  lastUpdated: z.iso.datetime(),
});

export const ItemForecastSchema = z.object({
  itemId: IdSchema,
  horizonDays: z.number().int().positive(),
  predictedUsage: z.number().nonnegative(),
  predictedWeeklyUsage: z.number().nonnegative(),
  avgDailyUsage: z.number().nonnegative(),
  daysUntilEmpty: z.number().nonnegative().max(999),
  runoutDate: IsoDateSchema.nullable(),
  dataPointsUsed: z.number().int().nonnegative(),
  confidence: ForecastConfidenceSchema,
  usedPattern: z.boolean(),
});

export const OrderRecommendationSchema = z.object({
  itemId: IdSchema,
  itemName: z.string().min(1),
  currentStock: z.number().nonnegative(),
  projectedUsage: z.number().nonnegative(),
  daysUntilReorder: z.number().int().nonnegative().max(999),
  recommendedQuantity: z.number().nonnegative(),
  urgencyLevel: UrgencyLevelSchema,
  reasoning: z.string().min(1),
  supplier: z.string().min(1),
  estimatedCost: z.number().nonnegative(),
  reorderCadenceDays: z.number().int().positive(),
  historicalAvgQuantity: z.number().nonnegative(),
});

export const AuditIssueSchema = z.object({
  issueType: AuditIssueTypeSchema,
  severity: AuditSeveritySchema,
  date: IsoDateSchema,
  itemId: IdSchema,
  description: z.string().min(1),
  field: z.string().optional(),
  value: z.number().optional(),
  expectedValue: z.number().nullable(),
  actualValue: z.number().nullable(),
  difference: z.number().nullable(),
  note: z.string(),
});

export const AuditSummarySchema = z.object({
  totalIssues: z.number().int().nonnegative(),
  recordsChecked: z.number().int().nonnegative(),
  byType: z.record(AuditIssueTypeSchema, z.number().int().nonnegative()),
  bySeverity: z.record(AuditSeveritySchema, z.number().int().nonnegative()),
  auditedAt: z.iso.datetime(),
});

export const InventoryAlertSchema = z.object({
  type: z.literal("low_stock"),
  severity: AlertSeveritySchema,
  itemId: IdSchema,
  itemName: z.string().min(1),
  currentStock: z.number().nonnegative(),
  minThreshold: z.number().nonnegative(),
  message: z.string().min(1),
});

export const InventoryStatusSummarySchema = z.object({
  totalItems: z.number().int().nonnegative(),
  itemsBelowThreshold: z.number().int().nonnegative(),
  criticalItems: z.number().int().nonnegative(),
  recommendationsCount: z.number().int().nonnegative(),
  itemsNeedingOrder: z.number().int().nonnegative(),
  totalEstimatedCost: z.number().nonnegative(),
  urgencyCounts: z.record(UrgencyLevelSchema, z.number().int().nonnegative()),
  // Newest first, at most five.
  recentOrders: z.array(PurchaseOrderSchema),
  lastUpdated: z.iso.datetime(),
});

export const InventoryOverviewEntrySchema = z.object({
  item: InventoryItemSchema,
  predicted7DayUsage: z.number().nonnegative(),
  predicted14DayUsage: z.number().nonnegative(),
  daysUntilEmpty: z.number().nonnegative(),
  supplierName: z.string(),
});

// Raw collections are validated record by record during ingestion.
export const DatasetLoadRequestSchema = z.object({
  items: z.array(z.unknown()).default([]),
  suppliers: z.array(z.unknown()).default([]),
  snapshots: z.array(z.unknown()).default([]),
  deliveries: z.array(z.unknown()).default([]),
  orders: z.array(z.unknown()).default([]),
  usageHistory: z.array(z.unknown()).default([]),
  consumptionLedger: z.array(z.unknown()).default([]),
  stockLevels: z.array(z.unknown()).default([]),
  aliases: z.record(z.string().min(1), IdSchema).default({}),
});

export const DatasetCountsSchema = z.object({
  items: z.number().int().nonnegative(),
  suppliers: z.number().int().nonnegative(),
  snapshots: z.number().int().nonnegative(),
  deliveries: z.number().int().nonnegative(),
  orders: z.number().int().nonnegative(),
  usageHistory: z.number().int().nonnegative(),
  consumptionLedger: z.number().int().nonnegative(),
  stockLevels: z.number().int().nonnegative(),
});

export const DatasetLoadResponseSchema = z.object({
  counts: DatasetCountsSchema,
  warnings: z.array(z.string()),
  generatedAt: z.iso.datetime(),
});

export const SnapshotEntrySchema = z.object({
  itemId: IdSchema,
  stockLevel: z.number().nonnegative(),
  wasteAmount: z.number().nonnegative().default(0),
  deliveriesReceived: z.number().nonnegative().default(0),
  notes: z.string().max(500).default(""),
});

export const SnapshotDeliveryEntrySchema = z.object({
  itemId: IdSchema,
  supplierId: IdSchema,
  quantity: z.number().positive(),
  unitCost: z.number().nonnegative().default(0),
});

export const SnapshotDayRequestSchema = z.object({
  entries: z.array(SnapshotEntrySchema).min(1),
  deliveries: z.array(SnapshotDeliveryEntrySchema).default([]),
});

export const SnapshotDayResponseSchema = z.object({
  date: IsoDateSchema,
  snapshotsRecorded: z.number().int().nonnegative(),
  usageRecordsUpdated: z.number().int().nonnegative(),
  deliveriesProcessed: z.number().int().nonnegative(),
});

export const UsageHistoryResponseSchema = z.object({
  records: z.array(UsageHistoryRecordSchema),
  calculated: z.array(CalculatedUsageSchema),
});

export const UsagePatternsResponseSchema = z.object({
  patterns: z.record(IdSchema, UsagePatternSchema),
});

export const ItemForecastResponseSchema = z.object({
  forecast: ItemForecastSchema,
});

export const RecommendationsResponseSchema = z.object({
  generatedAt: z.iso.datetime(),
  recommendations: z.array(OrderRecommendationSchema),
});

export const AuditResponseSchema = z.object({
  issues: z.array(AuditIssueSchema),
  summary: AuditSummarySchema,
  report: z.string(),
});

export const InventoryAlertsResponseSchema = z.object({
  alerts: z.array(InventoryAlertSchema),
});

export const InventoryStatusResponseSchema = z.object({
  status: InventoryStatusSummarySchema,
});

export const InventoryOverviewResponseSchema = z.object({
  generatedAt: z.iso.datetime(),
  inventory: z.array(InventoryOverviewEntrySchema),
});

export const SnapshotDayListResponseSchema = z.object({
  date: IsoDateSchema,
  snapshots: z.array(InventorySnapshotSchema),
});

export const SuppliersResponseSchema = z.object({
  suppliers: z.array(SupplierSchema),
});

export const HealthResponseSchema = z.object({
  ok: z.literal(true),
  service: z.literal("supply-forecast-api"),
  now: z.iso.datetime(),
});

export type Weekday = z.infer<typeof WeekdaySchema>;
export type UsageConfidence = z.infer<typeof UsageConfidenceSchema>;
export type ForecastConfidence = z.infer<typeof ForecastConfidenceSchema>;
export type UrgencyLevel = z.infer<typeof UrgencyLevelSchema>;
export type OrderStatus = z.infer<typeof OrderStatusSchema>;
export type CalculationMethod = z.infer<typeof CalculationMethodSchema>;
export type AuditIssueType = z.infer<typeof AuditIssueTypeSchema>;
export type AuditSeverity = z.infer<typeof AuditSeveritySchema>;
export type AlertSeverity = z.infer<typeof AlertSeveritySchema>;
export type InventoryItem = z.infer<typeof InventoryItemSchema>;
export type Supplier = z.infer<typeof SupplierSchema>;
export type InventorySnapshot = z.infer<typeof InventorySnapshotSchema>;
export type DeliveryRecord = z.infer<typeof DeliveryRecordSchema>;
export type OrderLineItem = z.infer<typeof OrderLineItemSchema>;
export type PurchaseOrder = z.infer<typeof PurchaseOrderSchema>;
export type CalculatedUsage = z.infer<typeof CalculatedUsageSchema>;
export type UsageHistoryRecord = z.infer<typeof UsageHistoryRecordSchema>;
export type ConsumptionRecord = z.infer<typeof ConsumptionRecordSchema>;
export type StockLevelRecord = z.infer<typeof StockLevelRecordSchema>;
export type UsagePattern = z.infer<typeof UsagePatternSchema>;
export type ItemForecast = z.infer<typeof ItemForecastSchema>;
export type OrderRecommendation = z.infer<typeof OrderRecommendationSchema>;
export type AuditIssue = z.infer<typeof AuditIssueSchema>;
export type AuditSummary = z.infer<typeof AuditSummarySchema>;
export type InventoryAlert = z.infer<typeof InventoryAlertSchema>;
export type InventoryStatusSummary = z.infer<typeof InventoryStatusSummarySchema>;
export type InventoryOverviewEntry = z.infer<typeof InventoryOverviewEntrySchema>;
export type DatasetLoadRequest = z.infer<typeof DatasetLoadRequestSchema>;
export type DatasetCounts = z.infer<typeof DatasetCountsSchema>;
export type DatasetLoadResponse = z.infer<typeof DatasetLoadResponseSchema>;
export type SnapshotEntry = z.infer<typeof SnapshotEntrySchema>;
export type SnapshotDeliveryEntry = z.infer<typeof SnapshotDeliveryEntrySchema>;
export type SnapshotDayRequest = z.infer<typeof SnapshotDayRequestSchema>;
export type SnapshotDayResponse = z.infer<typeof SnapshotDayResponseSchema>;
export type UsageHistoryResponse = z.infer<typeof UsageHistoryResponseSchema>;
export type UsagePatternsResponse = z.infer<typeof UsagePatternsResponseSchema>;
export type ItemForecastResponse = z.infer<typeof ItemForecastResponseSchema>;
export type RecommendationsResponse = z.infer<typeof RecommendationsResponseSchema>;
export type AuditResponse = z.infer<typeof AuditResponseSchema>;
export type InventoryAlertsResponse = z.infer<typeof InventoryAlertsResponseSchema>;
export type InventoryStatusResponse = z.infer<typeof InventoryStatusResponseSchema>;
export type InventoryOverviewResponse = z.infer<typeof InventoryOverviewResponseSchema>;
export type SnapshotDayListResponse = z.infer<typeof SnapshotDayListResponseSchema>;
export type SuppliersResponse = z.infer<typeof SuppliersResponseSchema>;
export type HealthResponse = z.infer<typeof HealthResponseSchema>;
