import type { LogsRow } from "../types";

interface RecordLike {
  [key: string]: unknown;
}

function isRecordLike(value: unknown): value is RecordLike {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseExportResponse(payload: unknown): LogsRow[] {
  if (!isRecordLike(payload)) {
    throw new Error("Invalid export response: expected object");
  }

  const data = payload.data;
  if (!Array.isArray(data)) {
    throw new Error("Invalid export response: data must be an array");
  }

  return data.map((row: unknown, index) => {
    if (!isRecordLike(row)) {
      throw new Error(`Invalid export response: row ${index} must be an object`);
    }

    return { ...row };
  });
}
