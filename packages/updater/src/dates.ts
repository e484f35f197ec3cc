import type { CalendarDate } from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;
const CALENDAR_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad(value: number, width = 2): string {
  return value.toString().padStart(width, "0");
}

export function isCalendarDate(value: string): boolean {
  const match = CALENDAR_DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }

  const timestampMs = Date.UTC(
    Number(match[1]),
    Number(match[2]) - 1,
    Number(match[3])
  );

  return toCalendarDate(new Date(timestampMs)) === value;
}

export function toCalendarDate(instant: Date): CalendarDate {
  return instant.toISOString().slice(0, 10);
}

export function startOfDay(date: CalendarDate): Date {
  return new Date(`${date}T00:00:00.000Z`);
}

export function endOfDay(date: CalendarDate): Date {
  return new Date(`${date}T23:59:59.999Z`);
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return toCalendarDate(new Date(startOfDay(date).getTime() + days * DAY_MS));
}

/** Inclusive on both ends, ascending. Empty when `from` is after `to`. */
export function dateRange(from: CalendarDate, to: CalendarDate): CalendarDate[] {
  const dates: CalendarDate[] = [];

  for (let current = from; current <= to; current = addDays(current, 1)) {
    dates.push(current);
  }

  return dates;
}

export function compactDate(date: CalendarDate): string {
  return date.replace(/-/g, "");
}

/** `YYYY-MM-DD HH:mm:ss` in UTC, as the logs API expects. */
export function formatApiDateTime(instant: Date): string {
  return (
    `${toCalendarDate(instant)} ` +
    `${pad(instant.getUTCHours())}:${pad(instant.getUTCMinutes())}:${pad(instant.getUTCSeconds())}`
  );
}
