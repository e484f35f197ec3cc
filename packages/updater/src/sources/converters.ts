import type { LogsRow } from "../types";

export type Converter = (row: LogsRow) => unknown;

export type ConverterName = "dateOf" | "unixSeconds";

const API_DATETIME_PATTERN = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/;

// the logs API reports datetimes as "YYYY-MM-DD HH:mm:ss" in UTC
export function parseApiDateTime(value: unknown): Date | null {
  if (typeof value !== "string" || value.length === 0) {
    return null;
  }

  const normalized = API_DATETIME_PATTERN.test(value)
    ? `${value.replace(" ", "T")}Z`
    : value;
  const timestampMs = Date.parse(normalized);

  return Number.isNaN(timestampMs) ? null : new Date(timestampMs);
}

const CONVERTER_FACTORIES: Record<ConverterName, (from: string) => Converter> = {
  dateOf: (from) => (row) => {
    const parsed = parseApiDateTime(row[from]);
    return parsed ? parsed.toISOString().slice(0, 10) : null;
  },
  unixSeconds: (from) => (row) => {
    const parsed = parseApiDateTime(row[from]);
    return parsed ? Math.floor(parsed.getTime() / 1000) : 0;
  }
};

export function isConverterName(value: unknown): value is ConverterName {
  return typeof value === "string" && Object.hasOwn(CONVERTER_FACTORIES, value);
}

export function createConverter(name: ConverterName, from: string): Converter {
  return CONVERTER_FACTORIES[name](from);
}
