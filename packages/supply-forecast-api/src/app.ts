import type { Express } from "express";
import {
  AuditResponseSchema,
  DatasetLoadRequestSchema,
  DatasetLoadResponseSchema,
  HealthResponseSchema,
  IdSchema,
  InventoryAlertsResponseSchema,
  InventoryOverviewResponseSchema,
  InventoryStatusResponseSchema,
  IsoDateSchema,
  ItemForecastResponseSchema,
  RecommendationsResponseSchema,
  SnapshotDayListResponseSchema,
  SnapshotDayRequestSchema,
  SnapshotDayResponseSchema,
  SuppliersResponseSchema,
  UsageHistoryResponseSchema,
  UsagePatternsResponseSchema,
  type HealthResponse,
} from "@supply-forecast/contracts";
import express from "express";
import { z } from "zod";
import type { ApiConfig } from "./config/env.js";
import {
  AUDIT_EXPORT_COLUMNS,
  formatAuditReport,
  toAuditRows,
} from "./domain/consistency-auditor.js";
import { ItemNotFoundError } from "./domain/errors.js";
import {
  RECOMMENDATION_EXPORT_COLUMNS,
  recommendationsToRows,
} from "./domain/recommendation-generator.js";
import { toCsv } from "./domain/tabular-export.js";
import { parseBody, parseParam, sendCsv } from "./routes/http-utils.js";
import type { DatasetStore } from "./types/dataset-store.js";

type CreateAppParams = {
  config: ApiConfig;
  store: DatasetStore;
};

const ForecastQuerySchema = z.object({
  horizonDays: z.coerce.number().int().positive().max(365).optional(),
});

export function createApp(params: CreateAppParams): Express {
  const app = express();
  // Full dataset uploads carry months of daily rows.
  app.use(express.json({ limit: "10mb" }));

  app.get("/health", (_req, res) => {
    const payload: HealthResponse = {
      ok: true,
      service: "supply-forecast-api",
      now: new Date().toISOString(),
    };
    HealthResponseSchema.parse(payload);
    res.json(payload);
  });

  app.put("/v1/dataset", (req, res) => {
    const body = parseBody(DatasetLoadRequestSchema, req, res);
    if (!body) {
      return;
    }
    res.json(DatasetLoadResponseSchema.parse(params.store.loadDataset(body)));
  });

  app.get("/v1/inventory", (_req, res) => {
    const state = params.store.getState();
    res.json(
      InventoryOverviewResponseSchema.parse({
        generatedAt: state.generatedAt,
        inventory: state.inventory,
      }),
    );
  });

  app.get("/v1/suppliers", (_req, res) => {
    res.json(SuppliersResponseSchema.parse({ suppliers: params.store.getState().suppliers }));
  });

  app.get("/v1/snapshots/:date", (req, res) => {
    const date = parseParam(IsoDateSchema, req.params.date, "date", res);
    if (!date) {
      return;
    }
    const snapshots = params.store.getState().snapshots.filter((snapshot) => snapshot.date === date);
    res.json(SnapshotDayListResponseSchema.parse({ date, snapshots }));
  });

  app.post("/v1/snapshots/:date", (req, res) => {
    const date = parseParam(IsoDateSchema, req.params.date, "date", res);
    if (!date) {
      return;
    }
    const body = parseBody(SnapshotDayRequestSchema, req, res);
    if (!body) {
      return;
    }

    const response = params.store.recordSnapshotDay(date, body);
    res.status(201).json(SnapshotDayResponseSchema.parse(response));
  });

  app.get("/v1/usage", (_req, res) => {
    const state = params.store.getState();
    res.json(
      UsageHistoryResponseSchema.parse({
        records: state.usageHistory,
        calculated: state.calculatedUsage,
      }),
    );
  });

  app.get("/v1/usage-patterns", (_req, res) => {
    res.json(UsagePatternsResponseSchema.parse({ patterns: params.store.getState().patterns }));
  });

  app.get("/v1/forecasts/:itemId", (req, res) => {
    const itemId = parseParam(IdSchema, req.params.itemId, "itemId", res);
    if (!itemId) {
      return;
    }
    const query = ForecastQuerySchema.safeParse(req.query);
    if (!query.success) {
      res.status(400).json({
        error: "invalid_request",
        issues: query.error.issues.map((issue) => ({ path: issue.path, message: issue.message })),
      });
      return;
    }

    try {
      const forecast = params.store
        .getState()
        .forecaster.forecastItem(itemId, query.data.horizonDays ?? params.config.horizonDays);
      res.json(ItemForecastResponseSchema.parse({ forecast }));
    } catch (error) {
      if (error instanceof ItemNotFoundError) {
        res.status(404).json({ error: "not_found", message: error.message });
        return;
      }
      throw error;
    }
  });

  app.get("/v1/recommendations", (_req, res) => {
    const state = params.store.getState();
    res.json(
      RecommendationsResponseSchema.parse({
        generatedAt: state.generatedAt,
        recommendations: state.recommendations,
      }),
    );
  });

  app.get("/v1/recommendations/export", (_req, res) => {
    const rows = recommendationsToRows(params.store.getState().recommendations);
    sendCsv(res, "order-recommendations.csv", toCsv(RECOMMENDATION_EXPORT_COLUMNS, rows));
  });

  app.get("/v1/audit", (_req, res) => {
    const state = params.store.getState();
    res.json(
      AuditResponseSchema.parse({
        issues: state.audit.issues,
        summary: state.audit.summary,
        report: formatAuditReport(state.audit.issues, new Date(state.generatedAt)),
      }),
    );
  });

  app.get("/v1/audit/export", (_req, res) => {
    const state = params.store.getState();
    const rows = toAuditRows(state.audit.issues, new Date(state.generatedAt));
    sendCsv(res, "inventory-audit.csv", toCsv(AUDIT_EXPORT_COLUMNS, rows));
  });

  app.get("/v1/alerts", (_req, res) => {
    res.json(InventoryAlertsResponseSchema.parse({ alerts: params.store.getState().alerts }));
  });

  app.get("/v1/status", (_req, res) => {
    res.json(InventoryStatusResponseSchema.parse({ status: params.store.getState().status }));
  });

  return app;
}
