import { compactDate } from "../dates";
import type { CalendarDate, LogsRow, WorkItem } from "../types";

export interface DestinationLocation {
  source: string;
  appId: string;
  eventName: string | null;
  date: CalendarDate | null;
}

export interface Destination {
  /** Drops whatever staging rows the location holds. */
  reset: (location: DestinationLocation) => Promise<void>;
  /** Returns the number of rows written. */
  append: (rows: LogsRow[], location: DestinationLocation) => Promise<number>;
  /** Promotes the location's staging rows to their archived, immutable form. */
  seal: (location: DestinationLocation) => Promise<void>;
}

export const LATEST_SUFFIX = "latest";

export function locationForItem(item: WorkItem): DestinationLocation {
  if (item.kind === "load_date_ignored") {
    return {
      source: item.source,
      appId: item.appId,
      eventName: null,
      date: null
    };
  }

  return {
    source: item.source,
    appId: item.appId,
    eventName: item.eventName,
    date: item.date
  };
}

export function locationKey(location: DestinationLocation): string {
  const dateSuffix = location.date ? compactDate(location.date) : LATEST_SUFFIX;
  return `${location.source}_${location.appId}_${location.eventName ?? "all"}_${dateSuffix}`;
}
