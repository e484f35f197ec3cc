import { addDays, dateRange, endOfDay, toCalendarDate } from "../dates";
import {
  cloneState,
  getOrCreateApplicationState,
  getTouch,
  setTouch
} from "../state/globalState";
import type { ApplicationState, CalendarDate, GlobalState, WorkItem } from "../types";

export interface SchedulingSettings {
  appIds: string[];
  eventNames: string[];
  dateRequiredSources: string[];
  dateIgnoredSources: string[];
  /** Days before the cycle's start date covered by the rolling window. */
  updateLimitDays: number;
  /** Minimum spacing between two loads of one date, and between cycles. */
  updateIntervalMs: number;
  /** Age past a date's end after which it is archived. */
  freshLimitMs: number;
}

export type StateDelta =
  | {
      type: "touched";
      appId: string;
      eventName: string;
      date: CalendarDate;
      at: Date;
    }
  | {
      type: "archived";
      appId: string;
      eventName: string;
      date: CalendarDate;
    };

/**
 * One scheduling decision: a state change and the work items that go with it.
 * A touch is committed before its loads, an archive mark after its seals.
 * Date-ignored loads carry no delta.
 */
export interface PlannedStep {
  delta: StateDelta | null;
  items: WorkItem[];
}

export function applyDelta(state: GlobalState, delta: StateDelta): void {
  const application = getOrCreateApplicationState(state, delta.appId);

  if (delta.type === "touched") {
    setTouch(application, delta.eventName, delta.date, {
      status: "loaded",
      at: delta.at
    });
    return;
  }

  setTouch(application, delta.eventName, delta.date, { status: "archived" });
}

function isStale(touchedAt: Date, date: CalendarDate, freshLimitMs: number): boolean {
  return touchedAt.getTime() - endOfDay(date).getTime() >= freshLimitMs;
}

function archiveStep(
  application: ApplicationState,
  eventName: string,
  date: CalendarDate,
  sources: string[]
): PlannedStep {
  return {
    delta: { type: "archived", appId: application.appId, eventName, date },
    items: sources.map((source): WorkItem => ({
      kind: "archive",
      source,
      appId: application.appId,
      eventName,
      date
    }))
  };
}

function planArchiveSweep(
  application: ApplicationState,
  settings: SchedulingSettings
): PlannedStep[] {
  const steps: PlannedStep[] = [];

  for (const [eventName, dates] of application.dateUpdates) {
    const sortedDates = [...dates.keys()].sort();

    for (const date of sortedDates) {
      const touch = dates.get(date);
      if (touch?.status !== "loaded") {
        continue;
      }

      if (isStale(touch.at, date, settings.freshLimitMs)) {
        steps.push(
          archiveStep(application, eventName, date, settings.dateRequiredSources)
        );
      }
    }
  }

  return steps;
}

function planDate(
  application: ApplicationState,
  eventName: string,
  date: CalendarDate,
  cycleStart: Date,
  settings: SchedulingSettings
): PlannedStep[] {
  const touch = getTouch(application, eventName, date);
  if (touch?.status === "archived") {
    return [];
  }

  const updatedAt = touch?.at;
  if (
    updatedAt &&
    cycleStart.getTime() - updatedAt.getTime() < settings.updateIntervalMs
  ) {
    return [];
  }

  const steps: PlannedStep[] = [
    {
      delta: {
        type: "touched",
        appId: application.appId,
        eventName,
        date,
        at: cycleStart
      },
      items: settings.dateRequiredSources.map((source): WorkItem => ({
        kind: "load",
        source,
        appId: application.appId,
        eventName,
        date
      }))
    }
  ];

  // freshness is judged from the previous touch when there is one
  if (isStale(updatedAt ?? cycleStart, date, settings.freshLimitMs)) {
    steps.push(
      archiveStep(application, eventName, date, settings.dateRequiredSources)
    );
  }

  return steps;
}

/**
 * Decides the whole cycle up front without touching `state`: archive sweep,
 * then the rolling window per event in ascending date order, then date-ignored
 * loads, application by application. Deltas are folded into a private copy as
 * they are planned so later decisions see earlier ones.
 */
export function planCycle(
  state: GlobalState,
  cycleStart: Date,
  settings: SchedulingSettings
): PlannedStep[] {
  const working = cloneState(state);
  const steps: PlannedStep[] = [];

  const record = (planned: PlannedStep[]): void => {
    for (const step of planned) {
      if (step.delta) {
        applyDelta(working, step.delta);
      }
      steps.push(step);
    }
  };

  const dateTo = toCalendarDate(cycleStart);
  const dateFrom = addDays(dateTo, -settings.updateLimitDays);
  const windowDates = dateRange(dateFrom, dateTo);

  for (const appId of settings.appIds) {
    const application = getOrCreateApplicationState(working, appId);

    record(planArchiveSweep(application, settings));

    for (const eventName of settings.eventNames) {
      for (const date of windowDates) {
        record(planDate(application, eventName, date, cycleStart, settings));
      }
    }

    record(
      settings.dateIgnoredSources.map((source): PlannedStep => ({
        delta: null,
        items: [{ kind: "load_date_ignored", source, appId }]
      }))
    );
  }

  return steps;
}
