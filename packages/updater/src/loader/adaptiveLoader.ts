import { LogsApiPartsCountError, type LogsApiClient } from "../api/logsApiClient";
import { endOfDay, startOfDay } from "../dates";
import { silentLogger, type Logger } from "../logger";
import type {
  LoadingDefinition,
  ProcessingDefinition
} from "../sources/sourcesCollection";
import type { LoadWorkItem } from "../types";
import { locationForItem, locationKey, type Destination } from "./destination";
import { processRows } from "./processing";

export interface AdaptiveLoaderOptions {
  maxDivisionCount?: number;
  now?: () => Date;
  logger?: Logger;
}

export interface LoadResult {
  divisionCount: number;
  attempts: number;
  rowsWritten: number;
}

export interface AdaptiveLoader {
  execute: (
    item: LoadWorkItem,
    loadingDefinition: LoadingDefinition,
    processingDefinition: ProcessingDefinition,
    destination: Destination
  ) => Promise<LoadResult>;
}

export class DivisionLimitExceededError extends Error {
  constructor(location: string, maxDivisionCount: number) {
    super(
      `Logs API still rejects ${location} at the division limit of ${maxDivisionCount}`
    );
    this.name = "DivisionLimitExceededError";
  }
}

export const DEFAULT_MAX_DIVISION_COUNT = 1024;

export function createAdaptiveLoader(
  client: LogsApiClient,
  options: AdaptiveLoaderOptions = {}
): AdaptiveLoader {
  const maxDivisionCount = Math.max(
    1,
    options.maxDivisionCount ?? DEFAULT_MAX_DIVISION_COUNT
  );
  const now = options.now ?? (() => new Date());
  const logger = options.logger ?? silentLogger;

  return {
    async execute(item, loadingDefinition, processingDefinition, destination) {
      const location = locationForItem(item);
      const key = locationKey(location);
      const date = item.kind === "load" ? item.date : null;
      const since = date ? startOfDay(date) : null;
      const until = date ? endOfDay(date) : null;

      let divisionCount = 1;
      let attempts = 0;

      while (true) {
        attempts += 1;
        // every attempt starts from an empty location
        await destination.reset(location);

        try {
          let rowsWritten = 0;
          const batches = client.pull({
            appId: item.appId,
            source: loadingDefinition.sourceName,
            fields: loadingDefinition.fields,
            since,
            until,
            dateDimension: loadingDefinition.dateDimension,
            eventName: item.kind === "load" ? item.eventName : null,
            divisionCount
          });

          for await (const batch of batches) {
            logger.debug(`processing chunk (location=${key}, rows=${batch.length})`);
            const rows = processRows(batch, item.appId, processingDefinition, now());
            if (rows.length > 0) {
              rowsWritten += await destination.append(rows, location);
            }
          }

          return { divisionCount, attempts, rowsWritten };
        } catch (error) {
          if (!(error instanceof LogsApiPartsCountError)) {
            throw error;
          }

          // unbounded exports cannot be split
          if (since === null || divisionCount * 2 > maxDivisionCount) {
            await destination.reset(location);
            throw new DivisionLimitExceededError(
              key,
              since === null ? divisionCount : maxDivisionCount
            );
          }

          divisionCount *= 2;
          logger.info(
            `export too large, retrying (location=${key}, divisionCount=${divisionCount})`
          );
        }
      }
    }
  };
}
