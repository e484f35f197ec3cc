import type { ApplicationState, CalendarDate, GlobalState, Touch } from "../types";

export function createEmptyState(): GlobalState {
  return {
    lastCycleCompletedAt: null,
    applications: []
  };
}

export function findApplicationState(
  state: GlobalState,
  appId: string
): ApplicationState | undefined {
  return state.applications.find((application) => application.appId === appId);
}

export function getOrCreateApplicationState(
  state: GlobalState,
  appId: string
): ApplicationState {
  const existing = findApplicationState(state, appId);
  if (existing) {
    return existing;
  }

  const created: ApplicationState = {
    appId,
    dateUpdates: new Map()
  };
  state.applications.push(created);

  return created;
}

export function getTouch(
  application: ApplicationState,
  eventName: string,
  date: CalendarDate
): Touch | undefined {
  return application.dateUpdates.get(eventName)?.get(date);
}

export function isArchived(touch: Touch | undefined): boolean {
  return touch?.status === "archived";
}

/**
 * Records a touch for (event, date). An archived entry is final: later touches
 * are refused with an error rather than silently dropped.
 */
export function setTouch(
  application: ApplicationState,
  eventName: string,
  date: CalendarDate,
  touch: Touch
): void {
  let dates = application.dateUpdates.get(eventName);
  if (!dates) {
    dates = new Map();
    application.dateUpdates.set(eventName, dates);
  }

  if (isArchived(dates.get(date))) {
    throw new Error(
      `Date ${date} of event "${eventName}" for app ${application.appId} is archived and cannot be touched again`
    );
  }

  dates.set(date, touch.status === "loaded" ? { status: "loaded", at: new Date(touch.at) } : touch);
}

export function cloneState(state: GlobalState): GlobalState {
  return {
    lastCycleCompletedAt: state.lastCycleCompletedAt
      ? new Date(state.lastCycleCompletedAt)
      : null,
    applications: state.applications.map((application) => ({
      appId: application.appId,
      dateUpdates: new Map(
        [...application.dateUpdates].map(([eventName, dates]) => [
          eventName,
          new Map(
            [...dates].map(([date, touch]): [CalendarDate, Touch] => [
              date,
              touch.status === "loaded"
                ? { status: "loaded", at: new Date(touch.at) }
                : { status: "archived" }
            ])
          )
        ])
      )
    }))
  };
}
