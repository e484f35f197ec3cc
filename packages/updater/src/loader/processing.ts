import {
  isIntegerFieldType,
  isWideIntegerFieldType,
  type FieldConverter,
  type FieldType,
  type ProcessingDefinition
} from "../sources/sourcesCollection";
import type { LogsRow } from "../types";

function toInteger(value: unknown, column: string): number {
  if (value === null || value === undefined || value === "") {
    return 0;
  }

  const numeric = typeof value === "number" ? value : Number(value);
  if (!Number.isFinite(numeric)) {
    throw new Error(`Invalid integer value for ${column}: ${JSON.stringify(value)}`);
  }

  return Math.trunc(numeric);
}

const DECIMAL_PATTERN = /^([+-]?\d+)(\.\d*)?$/;

function toWideInteger(value: unknown, column: string): string {
  if (value === null || value === undefined || value === "") {
    return "0";
  }

  if (typeof value === "bigint") {
    return value.toString();
  }

  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new Error(`Invalid integer value for ${column}: ${JSON.stringify(value)}`);
    }
    return BigInt(Math.trunc(value)).toString();
  }

  const match = typeof value === "string" ? DECIMAL_PATTERN.exec(value.trim()) : null;
  if (!match) {
    throw new Error(`Invalid integer value for ${column}: ${JSON.stringify(value)}`);
  }

  return BigInt(match[1]).toString();
}

/**
 * Coerces integer-typed columns present in the batch; a row missing such a
 * column gets 0. Columns absent from every row are left out. 64-bit columns
 * become exact decimal strings.
 */
export function ensureTypes(
  rows: LogsRow[],
  fieldTypes: Record<string, FieldType>
): LogsRow[] {
  const presentColumns = new Set<string>();
  for (const row of rows) {
    for (const column of Object.keys(row)) {
      presentColumns.add(column);
    }
  }

  const integerColumns = Object.entries(fieldTypes).filter(
    ([column, fieldType]) => presentColumns.has(column) && isIntegerFieldType(fieldType)
  );

  return rows.map((row) => {
    const typed = { ...row };
    for (const [column, fieldType] of integerColumns) {
      typed[column] = isWideIntegerFieldType(fieldType)
        ? toWideInteger(row[column], column)
        : toInteger(row[column], column);
    }
    return typed;
  });
}

export function appendSystemFields(
  rows: LogsRow[],
  appId: string,
  loadedAt: Date
): LogsRow[] {
  const loadDatetime = Math.floor(loadedAt.getTime() / 1000);

  return rows.map((row) => ({
    ...row,
    app_id: appId,
    load_datetime: loadDatetime
  }));
}

export function applyConverters(
  rows: LogsRow[],
  converters: FieldConverter[]
): LogsRow[] {
  if (converters.length === 0) {
    return rows;
  }

  return rows.map((row) => {
    const converted = { ...row };
    for (const converter of converters) {
      converted[converter.target] = converter.convert(converted);
    }
    return converted;
  });
}

export function processRows(
  rows: LogsRow[],
  appId: string,
  definition: ProcessingDefinition,
  loadedAt: Date
): LogsRow[] {
  const typed = ensureTypes(rows, definition.fieldTypes);
  const withSystemFields = appendSystemFields(typed, appId, loadedAt);
  return applyConverters(withSystemFields, definition.converters);
}
