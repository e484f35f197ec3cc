export type MockRow = Record<string, string | number>;

export interface ExportQuery {
  source: string;
  appId: string;
  /** Unix seconds, inclusive; null for an unbounded ("latest") export. */
  since: number | null;
  until: number | null;
  fields: string[];
  eventName: string | null;
}

export interface ExportOptions {
  spacingSeconds: number;
  maxRowsPerPart: number;
  latestRowCount: number;
}

export interface ExportResponse {
  status: number;
  payload: unknown;
}

const EXPORT_PATH_PATTERN = /^\/logs\/v1\/export\/([a-z_]+)\.json$/;
const API_DATETIME_PATTERN = /^(\d{4}-\d{2}-\d{2}) (\d{2}:\d{2}:\d{2})$/;

function pad(value: number): string {
  return value.toString().padStart(2, "0");
}

export function formatApiDateTime(unixSeconds: number): string {
  const date = new Date(unixSeconds * 1000);
  return (
    `${date.toISOString().slice(0, 10)} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}

function parseApiDateTime(raw: string | null): number | null {
  if (!raw) {
    return null;
  }

  const match = API_DATETIME_PATTERN.exec(raw);
  if (!match) {
    throw new Error(`Invalid datetime: ${raw}`);
  }

  return Date.parse(`${match[1]}T${match[2]}Z`) / 1000;
}

export function parseExportQuery(url: URL): ExportQuery {
  const pathMatch = EXPORT_PATH_PATTERN.exec(url.pathname);
  if (!pathMatch) {
    throw new Error(`Unknown export path: ${url.pathname}`);
  }

  const appId = url.searchParams.get("application_id");
  if (!appId) {
    throw new Error("application_id is required");
  }

  const since = parseApiDateTime(url.searchParams.get("date_since"));
  const until = parseApiDateTime(url.searchParams.get("date_until"));
  if ((since === null) !== (until === null)) {
    throw new Error("date_since and date_until must be given together");
  }

  return {
    source: pathMatch[1],
    appId,
    since,
    until,
    fields: (url.searchParams.get("fields") ?? "")
      .split(",")
      .filter((field) => field.length > 0),
    eventName: url.searchParams.get("event_name")
  };
}

function mockValue(
  field: string,
  query: ExportQuery,
  unixSeconds: number,
  index: number
): string | number {
  if (field === "application_id") {
    return Number.parseInt(query.appId, 10) || 0;
  }

  if (field === "event_name") {
    return query.eventName ?? "app_open";
  }

  if (field.endsWith("_datetime")) {
    return formatApiDateTime(unixSeconds);
  }

  if (field.endsWith("_timestamp")) {
    return unixSeconds;
  }

  if (field.endsWith("_id")) {
    return `${field}-${index.toString().padStart(6, "0")}`;
  }

  return `${field}-${index % 7}`;
}

/** One row every `spacingSeconds`, aligned to the epoch, inside the query range. */
export function buildMockRows(query: ExportQuery, options: ExportOptions): MockRow[] {
  const instants: number[] = [];

  if (query.since === null || query.until === null) {
    const base = Date.parse("2024-01-01T00:00:00Z") / 1000;
    for (let index = 0; index < options.latestRowCount; index += 1) {
      instants.push(base + index * options.spacingSeconds);
    }
  } else {
    const spacing = Math.max(1, options.spacingSeconds);
    const first = Math.ceil(query.since / spacing) * spacing;
    for (let instant = first; instant <= query.until; instant += spacing) {
      instants.push(instant);
    }
  }

  return instants.map((unixSeconds, index) => {
    const row: MockRow = {};
    for (const field of query.fields) {
      row[field] = mockValue(field, query, unixSeconds, index);
    }
    return row;
  });
}

export function exportKey(query: ExportQuery): string {
  return [
    query.source,
    query.appId,
    query.since ?? "latest",
    query.until ?? "latest",
    query.eventName ?? "",
    query.fields.join(",")
  ].join("|");
}

/**
 * The first request for an export answers 202 while it is "prepared"; the next
 * one returns the rows, or a 400 when the range holds too many of them, and
 * forgets the export.
 */
export function handleExport(
  query: ExportQuery,
  prepared: Set<string>,
  options: ExportOptions
): ExportResponse {
  const key = exportKey(query);

  if (!prepared.has(key)) {
    prepared.add(key);
    return { status: 202, payload: { message: "Export is being prepared" } };
  }

  prepared.delete(key);

  const rows = buildMockRows(query, options);
  if (rows.length > options.maxRowsPerPart) {
    return {
      status: 400,
      payload: {
        message: `Response is too large (${rows.length} rows), try to use parts_count`
      }
    };
  }

  return { status: 200, payload: { data: rows } };
}
