import type { Pool } from "pg";

import { createLogsApiClient } from "./api/logsApiClient";
import { loadConfig } from "./config";
import { createUpdatesController } from "./controller/updatesController";
import { runMigrations } from "./db/migrations";
import { createPgDestination } from "./db/pgDestination";
import { createPool } from "./db/pool";
import { createAdaptiveLoader } from "./loader/adaptiveLoader";
import { createLogger } from "./logger";
import { createScheduler } from "./scheduler/scheduler";
import {
  createSourcesCollection,
  loadSourcesCatalog
} from "./sources/sourcesCollection";
import { createFileStateStore } from "./state/fileStateStore";
import { createPgStateStore } from "./state/pgStateStore";
import type { StateStore } from "./state/stateStore";
import type { UpdaterConfig } from "./types";

function createStateStore(config: UpdaterConfig, pool: Pool): StateStore {
  if (config.stateStore === "postgres") {
    return createPgStateStore(pool);
  }

  return createFileStateStore(config.stateFilePath);
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const pool = createPool(config.databaseUrl);

  try {
    const applied = await runMigrations(pool);
    const sources = createSourcesCollection(
      await loadSourcesCatalog(),
      config.sources
    );
    const dateRequiredSources = sources.dateRequiredSources();
    const dateIgnoredSources = sources.dateIgnoredSources();

    logger.info(
      `updater started (apps=${config.appIds.join(",")}, events=${config.eventNames.length}, dateSources=${dateRequiredSources.join(",") || "none"}, latestSources=${dateIgnoredSources.join(",") || "none"}, stateStore=${config.stateStore}, migrationsApplied=${applied})`
    );

    const scheduler = createScheduler(
      {
        appIds: config.appIds,
        eventNames: config.eventNames,
        dateRequiredSources,
        dateIgnoredSources,
        updateLimitDays: config.updateLimitDays,
        updateIntervalMs: config.updateIntervalMs,
        freshLimitMs: config.freshLimitMs
      },
      {
        stateStore: createStateStore(config, pool),
        logger
      }
    );
    const loader = createAdaptiveLoader(createLogsApiClient(config), {
      maxDivisionCount: config.maxDivisionCount,
      logger
    });
    const destination = createPgDestination(pool);
    const controller = createUpdatesController({
      scheduler,
      loader,
      sources,
      destinationFor: () => destination,
      logger,
      progressLogIntervalMs: config.progressLogIntervalMs
    });

    do {
      await controller.runCycle();
    } while (!config.runOnce);
  } finally {
    await pool.end();
  }

  console.log("updater stopped");
}

main().catch((error: unknown) => {
  console.error("updater failed", error);
  process.exit(1);
});
