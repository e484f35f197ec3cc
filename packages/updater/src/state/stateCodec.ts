import { isCalendarDate } from "../dates";
import type { ApplicationState, CalendarDate, GlobalState, Touch } from "../types";

export const STATE_DOCUMENT_VERSION = 1;

const ARCHIVED_MARKER = "archived";

// Older state files marked archived dates with a timestamp in the year 3000,
// written without a zone, so anything from 2999 on is read as that marker.
const LEGACY_ARCHIVED_FROM_MS = Date.UTC(2999, 0, 1);

export interface PersistedApplicationState {
  appId: string;
  dateUpdates: Record<string, Record<CalendarDate, string>>;
}

export interface PersistedState {
  version: number;
  lastCycleCompletedAt: string | null;
  applications: PersistedApplicationState[];
}

interface RecordLike {
  [key: string]: unknown;
}

function isRecordLike(value: unknown): value is RecordLike {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseTimestamp(raw: unknown, context: string): Date {
  if (typeof raw !== "string") {
    throw new Error(`Invalid state document: ${context} must be a timestamp string`);
  }

  const timestampMs = Date.parse(raw);
  if (Number.isNaN(timestampMs)) {
    throw new Error(`Invalid state document: ${context} is not a timestamp: ${raw}`);
  }

  return new Date(timestampMs);
}

function parseTouch(raw: unknown, context: string): Touch {
  if (raw === ARCHIVED_MARKER) {
    return { status: "archived" };
  }

  const at = parseTimestamp(raw, context);
  if (at.getTime() >= LEGACY_ARCHIVED_FROM_MS) {
    return { status: "archived" };
  }

  return { status: "loaded", at };
}

function parseApplication(raw: unknown, index: number): ApplicationState {
  if (!isRecordLike(raw) || typeof raw.appId !== "string") {
    throw new Error(`Invalid state document: applications[${index}] must have a string appId`);
  }

  const appId = raw.appId;
  const dateUpdates = new Map<string, Map<CalendarDate, Touch>>();
  const rawUpdates = raw.dateUpdates ?? {};

  if (!isRecordLike(rawUpdates)) {
    throw new Error(`Invalid state document: dateUpdates of app ${appId} must be an object`);
  }

  for (const [eventName, rawDates] of Object.entries(rawUpdates)) {
    if (!isRecordLike(rawDates)) {
      throw new Error(
        `Invalid state document: dates of event "${eventName}" (app ${appId}) must be an object`
      );
    }

    const dates = new Map<CalendarDate, Touch>();
    for (const [date, rawTouch] of Object.entries(rawDates)) {
      if (!isCalendarDate(date)) {
        throw new Error(`Invalid state document: bad date key ${date} (app ${appId})`);
      }

      dates.set(date, parseTouch(rawTouch, `touch of ${date} (app ${appId})`));
    }

    dateUpdates.set(eventName, dates);
  }

  return { appId, dateUpdates };
}

export function deserializeState(payload: unknown): GlobalState {
  if (!isRecordLike(payload)) {
    throw new Error("Invalid state document: expected object");
  }

  const rawApplications = payload.applications ?? [];
  if (!Array.isArray(rawApplications)) {
    throw new Error("Invalid state document: applications must be an array");
  }

  const lastCycle = payload.lastCycleCompletedAt;

  return {
    lastCycleCompletedAt:
      lastCycle === null || lastCycle === undefined
        ? null
        : parseTimestamp(lastCycle, "lastCycleCompletedAt"),
    applications: rawApplications.map((application, index) =>
      parseApplication(application, index)
    )
  };
}

export function serializeState(state: GlobalState): PersistedState {
  return {
    version: STATE_DOCUMENT_VERSION,
    lastCycleCompletedAt: state.lastCycleCompletedAt?.toISOString() ?? null,
    applications: state.applications.map((application) => {
      const dateUpdates: Record<string, Record<CalendarDate, string>> = {};

      for (const [eventName, dates] of application.dateUpdates) {
        const serializedDates: Record<CalendarDate, string> = {};
        for (const [date, touch] of dates) {
          serializedDates[date] =
            touch.status === "archived" ? ARCHIVED_MARKER : touch.at.toISOString();
        }
        dateUpdates[eventName] = serializedDates;
      }

      return { appId: application.appId, dateUpdates };
    })
  };
}
