import { createApp } from "./app.js";
import { readApiConfigFromEnv } from "./config/env.js";
import { consoleLogger } from "./logger.js";
import { InMemoryDatasetStore } from "./storage/in-memory-dataset-store.js";

async function main() {
  const config = readApiConfigFromEnv();
  const store = new InMemoryDatasetStore({
    cycle: {
      auditTolerance: config.auditTolerance,
      horizonDays: config.horizonDays,
      highUsageRatio: config.highUsageRatio,
    },
    logger: consoleLogger,
  });
  const app = createApp({ config, store });

  app.listen(config.port, () => {
    consoleLogger.info(`[supply-forecast-api] listening on :${config.port}`);
  });
}

main().catch((error: unknown) => {
  consoleLogger.error(`[supply-forecast-api] failed to start: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});
