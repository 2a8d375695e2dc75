export type ApiConfig = {
  port: number;
  auditTolerance: number;
  horizonDays: number;
  highUsageRatio: number;
};

export function readApiConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const portRaw = env.SUPPLY_FORECAST_API_PORT ?? "8790";
  const port = Number.parseInt(portRaw, 10);
  if (!Number.isFinite(port) || port <= 0) {
    throw new Error(`invalid SUPPLY_FORECAST_API_PORT: ${portRaw}`);
  }

  const toleranceRaw = env.SUPPLY_FORECAST_AUDIT_TOLERANCE ?? "0.01";
  const auditTolerance = Number(toleranceRaw);
  if (toleranceRaw.trim() === "" || !Number.isFinite(auditTolerance) || auditTolerance < 0) {
    throw new Error(`invalid SUPPLY_FORECAST_AUDIT_TOLERANCE: ${toleranceRaw}`);
  }

  const horizonRaw = env.SUPPLY_FORECAST_HORIZON_DAYS ?? "30";
  const horizonDays = Number(horizonRaw);
  if (!Number.isInteger(horizonDays) || horizonDays < 1) {
    throw new Error(`invalid SUPPLY_FORECAST_HORIZON_DAYS: ${horizonRaw}`);
  }

  const ratioRaw = env.SUPPLY_FORECAST_HIGH_USAGE_RATIO ?? "0.8";
  const highUsageRatio = Number(ratioRaw);
  if (!Number.isFinite(highUsageRatio) || highUsageRatio <= 0 || highUsageRatio > 1) {
    throw new Error(`invalid SUPPLY_FORECAST_HIGH_USAGE_RATIO: ${ratioRaw}`);
  }

  return { port, auditTolerance, horizonDays, highUsageRatio };
}
