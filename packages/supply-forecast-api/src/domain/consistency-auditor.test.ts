import type { ConsumptionRecord, StockLevelRecord } from "@supply-forecast/contracts";
import { describe, expect, it } from "vitest";
import {
  AUDIT_EXPORT_COLUMNS,
  auditStockConsistency,
  formatAuditReport,
  toAuditRows,
} from "./consistency-auditor.js";
import { toCsv } from "./tabular-export.js";

const NOW = new Date("2026-03-10T08:00:00.000Z");

function row(overrides: Partial<ConsumptionRecord> = {}): ConsumptionRecord {
  return {
    date: "2026-03-03",
    itemId: "beans",
    previousStock: 10,
    consumption: 2,
    deliveryAmount: 0,
    stockBeforeDelivery: 8,
    reasoning: "",
    ...overrides,
  };
}

function stock(currentStock: number, date = "2026-03-03", itemId = "beans"): StockLevelRecord {
  return { date, itemId, currentStock };
}

describe("consistency auditor", () => {
  it("reports nothing for a consistent depletion", () => {
    const result = auditStockConsistency(
      { consumption: [row()], stockLevels: [stock(8)], deliveries: [] },
      { now: NOW },
    );

    expect(result.issues).toEqual([]);
    expect(result.summary).toEqual({
      totalIssues: 0,
      recordsChecked: 1,
      byType: {
        data_validation_error: 0,
        missing_delivery: 0,
        calculation_error: 0,
        missing_stock_record: 0,
        negative_value: 0,
      },
      bySeverity: { Critical: 0, High: 0, Medium: 0, Low: 0, Success: 1 },
      auditedAt: "2026-03-10T08:00:00.000Z",
    });
  });

  it("flags exactly one calculation error when the count drifts past the tolerance", () => {
    const result = auditStockConsistency(
      { consumption: [row()], stockLevels: [stock(8.5)], deliveries: [] },
      { now: NOW },
    );

    expect(result.issues).toEqual([
      {
        issueType: "calculation_error",
        severity: "Medium",
        date: "2026-03-03",
        itemId: "beans",
        description:
          "Stock calculation mismatch for beans on 2026-03-03: expected 8 (10 - 2 + 0) but found 8.5",
        field: undefined,
        value: undefined,
        expectedValue: 8,
        actualValue: 8.5,
        difference: 0.5,
        note: "",
      },
    ]);
  });

  it("treats drift within the tolerance as rounding noise", () => {
    const result = auditStockConsistency({
      consumption: [row()],
      stockLevels: [stock(8.005)],
      deliveries: [],
    });

    expect(result.issues).toEqual([]);
  });

  it("honours a configured tolerance", () => {
    const result = auditStockConsistency(
      { consumption: [row()], stockLevels: [stock(8.5)], deliveries: [] },
      { tolerance: 1 },
    );

    expect(result.issues).toEqual([]);
  });

  it("uses the ledger delivery when the consumption row omits it", () => {
    const result = auditStockConsistency({
      consumption: [row({ stockBeforeDelivery: 8 })],
      stockLevels: [stock(18)],
      deliveries: [{ date: "2026-03-03", itemId: "beans", quantity: 10, unitCost: 0, notes: "" }],
    });

    expect(result.issues).toHaveLength(1);
    expect(result.issues[0]).toMatchObject({
      issueType: "missing_delivery",
      severity: "High",
      expectedValue: 10,
      actualValue: 0,
      note: "Used delivery from delivery ledger",
      description:
        "Delivery of 10 for beans on 2026-03-03 is recorded in the delivery ledger but missing from consumption data",
    });
  });

  it("skips the remaining checks when no stock record matches", () => {
    const result = auditStockConsistency({
      consumption: [row()],
      stockLevels: [stock(-3, "2026-03-04")],
      deliveries: [{ date: "2026-03-03", itemId: "beans", quantity: 10, unitCost: 0, notes: "" }],
    });

    expect(result.issues.map((entry) => entry.issueType)).toEqual(["missing_stock_record"]);
    expect(result.issues[0]?.description).toBe(
      "No stock record found for beans on 2026-03-03 to match the consumption entry",
    );
  });

  it("reports negative stock as critical", () => {
    const result = auditStockConsistency({
      consumption: [row({ previousStock: 0, consumption: 2, stockBeforeDelivery: 0 })],
      stockLevels: [stock(-2)],
      deliveries: [],
    });

    expect(result.issues).toHaveLength(1);
    expect(result.issues[0]).toMatchObject({
      issueType: "negative_value",
      severity: "Critical",
      actualValue: -2,
      description: "Negative stock value -2 recorded for beans on 2026-03-03",
    });
  });

  it("reports validation errors before cross-record checks", () => {
    const result = auditStockConsistency({
      consumption: [
        row({ itemId: "almond-milk" }),
        row({ itemId: "beans", consumption: -1, stockBeforeDelivery: 11 }),
      ],
      stockLevels: [stock(11)],
      deliveries: [],
    });

    expect(result.issues.map((entry) => entry.issueType)).toEqual([
      "data_validation_error",
      "missing_stock_record",
    ]);
    expect(result.issues[0]).toMatchObject({
      severity: "Critical",
      field: "consumption",
      value: -1,
      description: "consumption has invalid value -1 for beans on 2026-03-03: Consumption cannot be negative",
    });
    expect(result.summary.bySeverity).toEqual({ Critical: 1, High: 1, Medium: 0, Low: 0, Success: 0 });
  });

  it("exports a single success row for a clean audit", () => {
    const csv = toCsv(AUDIT_EXPORT_COLUMNS, toAuditRows([], NOW));

    expect(csv.split("\n")).toEqual([
      "Issue Type,Date,Item,Severity,Description,Expected Value,Actual Value,Difference,Field,Value,Note,Audit Date",
      "No Issues,,All Items,Success,All inventory data is consistent and passes validation,,,,,,,2026-03-10 08:00:00",
      "",
    ]);
  });

  it("exports one row per issue", () => {
    const { issues } = auditStockConsistency({
      consumption: [row()],
      stockLevels: [stock(8.5)],
      deliveries: [],
    });

    expect(toAuditRows(issues, NOW)).toEqual([
      {
        "Issue Type": "Calculation Error",
        Date: "2026-03-03",
        Item: "beans",
        Severity: "Medium",
        Description:
          "Stock calculation mismatch for beans on 2026-03-03: expected 8 (10 - 2 + 0) but found 8.5",
        "Expected Value": 8,
        "Actual Value": 8.5,
        Difference: 0.5,
        Field: "",
        Value: "",
        Note: "",
        "Audit Date": "2026-03-10 08:00:00",
      },
    ]);
  });

  it("formats a clean report", () => {
    expect(formatAuditReport([], NOW)).toBe(
      [
        "=".repeat(60),
        "INVENTORY AUDIT REPORT",
        "Generated: 2026-03-10 08:00:00",
        "=".repeat(60),
        "",
        "NO ISSUES FOUND - All inventory data is consistent",
        "=".repeat(60),
      ].join("\n"),
    );
  });

  it("groups the report by category with counts", () => {
    const { issues } = auditStockConsistency({
      consumption: [row(), row({ date: "2026-03-04", previousStock: 8, stockBeforeDelivery: 6 })],
      stockLevels: [stock(8.5)],
      deliveries: [],
    });

    const lines = formatAuditReport(issues, NOW).split("\n");

    expect(lines).toContain("FOUND 2 ISSUE(S):");
    expect(lines).toContain("CALCULATION ERRORS (1):");
    expect(lines).toContain("MISSING STOCK RECORDS (1):");
    expect(lines.indexOf("CALCULATION ERRORS (1):")).toBeLessThan(
      lines.indexOf("MISSING STOCK RECORDS (1):"),
    );
  });
});
