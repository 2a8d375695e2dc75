import type {
  AuditIssue,
  AuditIssueType,
  AuditSeverity,
  AuditSummary,
  ConsumptionRecord,
  DeliveryRecord,
  StockLevelRecord,
} from "@supply-forecast/contracts";
import { DeliveryLedger } from "./delivery-ledger.js";
import { round } from "./numbers.js";
import { projectStock } from "./consumption-reconciler.js";
import { formatTimestamp, type TabularRow } from "./tabular-export.js";

export const DEFAULT_AUDIT_TOLERANCE = 0.01;

// Reporting order: validation first, then cross-record checks.
export const AUDIT_ISSUE_ORDER: AuditIssueType[] = [
  "data_validation_error",
  "missing_delivery",
  "calculation_error",
  "missing_stock_record",
  "negative_value",
];

const SEVERITY_BY_TYPE: Record<AuditIssueType, AuditSeverity> = {
  data_validation_error: "Critical",
  missing_delivery: "High",
  calculation_error: "Medium",
  missing_stock_record: "High",
  negative_value: "Critical",
};

const REPORT_HEADINGS: Record<AuditIssueType, string> = {
  data_validation_error: "DATA VALIDATION ERRORS",
  missing_delivery: "MISSING DELIVERIES IN CONSUMPTION DATA",
  calculation_error: "CALCULATION ERRORS",
  missing_stock_record: "MISSING STOCK RECORDS",
  negative_value: "NEGATIVE STOCK VALUES",
};

const VALIDATED_FIELDS: Array<{
  field: "consumption" | "deliveryAmount" | "stockBeforeDelivery" | "previousStock";
  label: string;
}> = [
  { field: "consumption", label: "Consumption" },
  { field: "deliveryAmount", label: "Delivery amount" },
  { field: "stockBeforeDelivery", label: "Stock before delivery" },
  { field: "previousStock", label: "Previous stock" },
];

const LEDGER_DELIVERY_NOTE = "Used delivery from delivery ledger";

export const AUDIT_EXPORT_COLUMNS = [
  "Issue Type",
  "Date",
  "Item",
  "Severity",
  "Description",
  "Expected Value",
  "Actual Value",
  "Difference",
  "Field",
  "Value",
  "Note",
  "Audit Date",
];

export type AuditInput = {
  consumption: ConsumptionRecord[];
  stockLevels: StockLevelRecord[];
  deliveries: DeliveryRecord[];
};

export type AuditOptions = {
  tolerance?: number;
  now?: Date;
};

export type AuditResult = {
  issues: AuditIssue[];
  summary: AuditSummary;
};

/**
 * Cross-checks a forward-form consumption ledger against recorded stock levels
 * and the delivery ledger. Data problems become issues; nothing is thrown.
 */
export function auditStockConsistency(input: AuditInput, options: AuditOptions = {}): AuditResult {
  const tolerance = options.tolerance ?? DEFAULT_AUDIT_TOLERANCE;
  const now = options.now ?? new Date();
  const ledger = new DeliveryLedger(input.deliveries);
  const rows = input.consumption.toSorted(
    (a, b) => a.itemId.localeCompare(b.itemId) || a.date.localeCompare(b.date),
  );

  const stockByKey = new Map<string, number>();
  for (const record of input.stockLevels) {
    stockByKey.set(`${record.date}|${record.itemId}`, record.currentStock);
  }

  const buckets: Record<AuditIssueType, AuditIssue[]> = {
    data_validation_error: [],
    missing_delivery: [],
    calculation_error: [],
    missing_stock_record: [],
    negative_value: [],
  };

  for (const row of rows) {
    for (const { field, label } of VALIDATED_FIELDS) {
      const value = row[field];
      if (value < 0) {
        buckets.data_validation_error.push(
          issue("data_validation_error", row, {
            field,
            value,
            description: `${field} has invalid value ${value} for ${row.itemId} on ${row.date}: ${label} cannot be negative`,
          }),
        );
      }
    }
  }

  for (const row of rows) {
    const currentStock = stockByKey.get(`${row.date}|${row.itemId}`);
    if (currentStock === undefined) {
      buckets.missing_stock_record.push(
        issue("missing_stock_record", row, {
          description: `No stock record found for ${row.itemId} on ${row.date} to match the consumption entry`,
        }),
      );
      continue;
    }

    const ledgerDelivery = ledger.totalOn(row.itemId, row.date);
    const usedLedger = ledgerDelivery > 0 && row.deliveryAmount === 0;
    if (usedLedger) {
      buckets.missing_delivery.push(
        issue("missing_delivery", row, {
          expectedValue: ledgerDelivery,
          actualValue: row.deliveryAmount,
          note: LEDGER_DELIVERY_NOTE,
          description: `Delivery of ${ledgerDelivery} for ${row.itemId} on ${row.date} is recorded in the delivery ledger but missing from consumption data`,
        }),
      );
    }

    const delivery = usedLedger ? ledgerDelivery : row.deliveryAmount;
    const expectedStock = projectStock({
      previousStock: row.previousStock,
      consumption: row.consumption,
      delivered: delivery,
    });

    if (Math.abs(expectedStock - currentStock) > tolerance) {
      const expected = round(expectedStock, 2);
      buckets.calculation_error.push(
        issue("calculation_error", row, {
          expectedValue: expected,
          actualValue: currentStock,
          difference: round(currentStock - expectedStock, 2),
          note: usedLedger ? LEDGER_DELIVERY_NOTE : "",
          description: `Stock calculation mismatch for ${row.itemId} on ${row.date}: expected ${expected} (${row.previousStock} - ${row.consumption} + ${delivery}) but found ${currentStock}`,
        }),
      );
    }

    if (currentStock < 0) {
      buckets.negative_value.push(
        issue("negative_value", row, {
          actualValue: currentStock,
          description: `Negative stock value ${currentStock} recorded for ${row.itemId} on ${row.date}`,
        }),
      );
    }
  }

  const issues = AUDIT_ISSUE_ORDER.flatMap((type) => buckets[type]);
  return {
    issues,
    summary: summarizeAudit(issues, rows.length, now),
  };
}

export function summarizeAudit(issues: AuditIssue[], recordsChecked: number, now: Date): AuditSummary {
  const byType: Record<AuditIssueType, number> = {
    data_validation_error: 0,
    missing_delivery: 0,
    calculation_error: 0,
    missing_stock_record: 0,
    negative_value: 0,
  };
  const bySeverity: Record<AuditSeverity, number> = {
    Critical: 0,
    High: 0,
    Medium: 0,
    Low: 0,
    Success: 0,
  };

  for (const entry of issues) {
    byType[entry.issueType] += 1;
    bySeverity[entry.severity] += 1;
  }
  if (issues.length === 0) {
    bySeverity.Success = 1;
  }

  return {
    totalIssues: issues.length,
    recordsChecked,
    byType,
    bySeverity,
    auditedAt: now.toISOString(),
  };
}

/** One export row per issue, or a single Success row for a clean audit. */
export function toAuditRows(issues: AuditIssue[], now: Date): TabularRow[] {
  const auditDate = formatTimestamp(now);
  if (issues.length === 0) {
    return [
      {
        "Issue Type": "No Issues",
        Date: "",
        Item: "All Items",
        Severity: "Success",
        Description: "All inventory data is consistent and passes validation",
        "Expected Value": "",
        "Actual Value": "",
        Difference: "",
        Field: "",
        Value: "",
        Note: "",
        "Audit Date": auditDate,
      },
    ];
  }

  return issues.map((entry) => ({
    "Issue Type": titleCase(entry.issueType),
    Date: entry.date,
    Item: entry.itemId,
    Severity: entry.severity,
    Description: entry.description,
    "Expected Value": entry.expectedValue ?? "",
    "Actual Value": entry.actualValue ?? "",
    Difference: entry.difference ?? "",
    Field: entry.field ?? "",
    Value: entry.value ?? "",
    Note: entry.note,
    "Audit Date": auditDate,
  }));
}

export function formatAuditReport(issues: AuditIssue[], now: Date): string {
  const rule = "=".repeat(60);
  const lines = [rule, "INVENTORY AUDIT REPORT", `Generated: ${formatTimestamp(now)}`, rule];

  if (issues.length === 0) {
    lines.push("", "NO ISSUES FOUND - All inventory data is consistent");
    lines.push(rule);
    return lines.join("\n");
  }

  lines.push("", `FOUND ${issues.length} ISSUE(S):`, "");
  for (const type of AUDIT_ISSUE_ORDER) {
    const group = issues.filter((entry) => entry.issueType === type);
    if (group.length === 0) {
      continue;
    }

    lines.push(`${REPORT_HEADINGS[type]} (${group.length}):`, "-".repeat(40));
    for (const entry of group) {
      lines.push(`Date: ${entry.date}`, `Item: ${entry.itemId}`);
      if (entry.field !== undefined) {
        lines.push(`Field: ${entry.field}`, `Value: ${entry.value ?? ""}`);
      }
      if (entry.expectedValue !== null) {
        lines.push(`Expected: ${entry.expectedValue}`);
      }
      if (entry.actualValue !== null) {
        lines.push(`Actual: ${entry.actualValue}`);
      }
      if (entry.difference !== null) {
        lines.push(`Difference: ${entry.difference}`);
      }
      lines.push(`Issue: ${entry.description}`);
      if (entry.note) {
        lines.push(`Note: ${entry.note}`);
      }
      lines.push("");
    }
  }

  lines.push(rule);
  return lines.join("\n");
}

function issue(
  type: AuditIssueType,
  row: ConsumptionRecord,
  details: {
    description: string;
    field?: string;
    value?: number;
    expectedValue?: number;
    actualValue?: number;
    difference?: number;
    note?: string;
  },
): AuditIssue {
  return {
    issueType: type,
    severity: SEVERITY_BY_TYPE[type],
    date: row.date,
    itemId: row.itemId,
    description: details.description,
    field: details.field,
    value: details.value,
    expectedValue: details.expectedValue ?? null,
    actualValue: details.actualValue ?? null,
    difference: details.difference ?? null,
    note: details.note ?? "",
  };
}

function titleCase(value: string): string {
  return value
    .split("_")
    .map((word) => (word.length > 0 ? `${word[0]?.toUpperCase() ?? ""}${word.slice(1)}` : word))
    .join(" ");
}
