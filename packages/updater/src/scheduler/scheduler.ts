import { silentLogger, type Logger } from "../logger";
import { getOrCreateApplicationState } from "../state/globalState";
import type { StateStore } from "../state/stateStore";
import type { WorkItem } from "../types";
import {
  applyDelta,
  planCycle,
  type SchedulingSettings,
  type StateDelta
} from "./plan";

type SleepLike = (ms: number) => Promise<void>;

export interface SchedulerDependencies {
  stateStore: StateStore;
  now?: () => Date;
  sleep?: SleepLike;
  logger?: Logger;
}

export interface Scheduler {
  produceCycle: () => AsyncGenerator<WorkItem, void, undefined>;
}

async function sleepFor(ms: number): Promise<void> {
  await new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });
}

export function computeCycleWaitMs(
  lastCycleCompletedAt: Date | null,
  updateIntervalMs: number,
  now: Date
): number {
  if (!lastCycleCompletedAt) {
    return 0;
  }

  return Math.max(
    0,
    lastCycleCompletedAt.getTime() + updateIntervalMs - now.getTime()
  );
}

export function createScheduler(
  settings: SchedulingSettings,
  dependencies: SchedulerDependencies
): Scheduler {
  const { stateStore } = dependencies;
  const now = dependencies.now ?? (() => new Date());
  const sleep = dependencies.sleep ?? sleepFor;
  const logger = dependencies.logger ?? silentLogger;

  return {
    async *produceCycle() {
      const state = await stateStore.load();

      const waitMs = computeCycleWaitMs(
        state.lastCycleCompletedAt,
        settings.updateIntervalMs,
        now()
      );
      if (waitMs > 0) {
        logger.info(`waiting for next cycle (sleepMs=${waitMs})`);
        await sleep(waitMs);
      }

      const cycleStart = now();
      for (const appId of settings.appIds) {
        getOrCreateApplicationState(state, appId);
      }

      const steps = planCycle(state, cycleStart, settings);
      logger.debug(
        `cycle planned (start=${cycleStart.toISOString()}, steps=${steps.length})`
      );

      const commit = async (delta: StateDelta): Promise<void> => {
        applyDelta(state, delta);
        await stateStore.save(state);
        logger.debug(
          `date ${delta.type} (app=${delta.appId}, event=${delta.eventName}, date=${delta.date})`
        );
      };

      for (const step of steps) {
        // a touch is durable before its loads run; an archive mark only once
        // every seal of the step has been consumed
        if (step.delta?.type === "touched") {
          await commit(step.delta);
        }

        for (const item of step.items) {
          yield item;
        }

        if (step.delta?.type === "archived") {
          await commit(step.delta);
        }
      }

      state.lastCycleCompletedAt = now();
      await stateStore.save(state);
      logger.debug("cycle finished");
    }
  };
}
