import type { AdaptiveLoader } from "../loader/adaptiveLoader";
import { locationForItem, type Destination } from "../loader/destination";
import { silentLogger, type Logger } from "../logger";
import type { Scheduler } from "../scheduler/scheduler";
import type { SourcesCollection } from "../sources/sourcesCollection";
import { StatePersistenceError } from "../state/stateStore";
import type { WorkItem } from "../types";
import { createCycleProgressLogger } from "./progressLogger";

export interface UpdatesControllerDependencies {
  scheduler: Scheduler;
  loader: AdaptiveLoader;
  sources: SourcesCollection;
  destinationFor: (source: string) => Destination;
  logger?: Logger;
  progressLogIntervalMs?: number;
  now?: () => number;
}

export interface CycleResult {
  completed: boolean;
  itemsExecuted: number;
  rowsWritten: number;
  error: unknown;
}

export interface UpdatesController {
  /** Returns the number of rows written; archive items write none. */
  executeItem: (item: WorkItem) => Promise<number>;
  runCycle: () => Promise<CycleResult>;
}

function describeItem(item: WorkItem): string {
  if (item.kind === "load_date_ignored") {
    return `kind=${item.kind}, source=${item.source}, app=${item.appId}, date=latest`;
  }

  return `kind=${item.kind}, source=${item.source}, app=${item.appId}, event=${item.eventName}, date=${item.date}`;
}

export function createUpdatesController(
  dependencies: UpdatesControllerDependencies
): UpdatesController {
  const { scheduler, loader, sources, destinationFor } = dependencies;
  const logger = dependencies.logger ?? silentLogger;

  const executeItem = async (item: WorkItem): Promise<number> => {
    const destination = destinationFor(item.source);

    if (item.kind === "archive") {
      logger.info(`archiving (${describeItem(item)})`);
      await destination.seal(locationForItem(item));
      return 0;
    }

    const loadingDefinition = sources.loadingDefinition(item.source);
    const processingDefinition = sources.processingDefinition(item.source);

    logger.info(`loading (${describeItem(item)})`);
    const result = await loader.execute(
      item,
      loadingDefinition,
      processingDefinition,
      destination
    );
    logger.debug(
      `loaded (${describeItem(item)}, rows=${result.rowsWritten}, divisionCount=${result.divisionCount}, attempts=${result.attempts})`
    );

    return result.rowsWritten;
  };

  return {
    executeItem,
    async runCycle(): Promise<CycleResult> {
      const progress = createCycleProgressLogger({
        intervalMs: dependencies.progressLogIntervalMs ?? 5000,
        now: dependencies.now,
        log: logger.info
      });
      let itemsExecuted = 0;
      let rowsWritten = 0;

      logger.info("starting update cycle");

      try {
        for await (const item of scheduler.produceCycle()) {
          const itemRows = await executeItem(item);
          itemsExecuted += 1;
          rowsWritten += itemRows;
          progress.onItem(item.kind, itemRows);
        }
      } catch (error) {
        if (error instanceof StatePersistenceError) {
          throw error;
        }

        logger.warn(
          `update cycle aborted (itemsExecuted=${itemsExecuted}, rows=${rowsWritten})`,
          error
        );
        return { completed: false, itemsExecuted, rowsWritten, error };
      } finally {
        progress.flush();
      }

      logger.info(
        `update cycle complete (itemsExecuted=${itemsExecuted}, rows=${rowsWritten})`
      );
      return { completed: true, itemsExecuted, rowsWritten, error: null };
    }
  };
}
