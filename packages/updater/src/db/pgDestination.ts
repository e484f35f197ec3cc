import type { Destination, DestinationLocation } from "../loader/destination";
import { locationKey } from "../loader/destination";
import type { LogsRow } from "../types";

const DELETE_STAGING_SQL = `
DELETE FROM staging_rows
WHERE location_key = $1;
`;

const INSERT_STAGING_SQL = `
INSERT INTO staging_rows (location_key, source, app_id, event_name, event_date, payload)
SELECT $1, $2, $3, $4, $5::date, payload
FROM UNNEST($6::jsonb[]) AS rows(payload);
`;

const DELETE_ARCHIVED_SQL = `
DELETE FROM archived_rows
WHERE location_key = $1;
`;

const PROMOTE_STAGING_SQL = `
INSERT INTO archived_rows (location_key, source, app_id, event_name, event_date, payload)
SELECT location_key, source, app_id, event_name, event_date, payload
FROM staging_rows
WHERE location_key = $1;
`;

export const MAX_ROWS_PER_STATEMENT = 25000;

interface CommandResult {
  rowCount: number | null;
}

export interface DestinationClient {
  query(text: string, values?: unknown[]): Promise<CommandResult>;
  release(): void;
}

export interface DestinationPool {
  connect(): Promise<DestinationClient>;
}

export function buildInsertStatement(
  rows: LogsRow[],
  location: DestinationLocation
): { sql: string; values: unknown[] } {
  if (rows.length === 0) {
    throw new Error("Cannot build insert statement for empty row batch");
  }

  return {
    sql: INSERT_STAGING_SQL,
    values: [
      locationKey(location),
      location.source,
      location.appId,
      location.eventName,
      location.date,
      rows.map((row) => JSON.stringify(row))
    ]
  };
}

async function inTransaction<T>(
  client: DestinationClient,
  work: () => Promise<T>
): Promise<T> {
  await client.query("BEGIN");

  try {
    const result = await work();
    await client.query("COMMIT");
    return result;
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  }
}

export async function appendWithClient(
  client: DestinationClient,
  rows: LogsRow[],
  location: DestinationLocation
): Promise<number> {
  if (rows.length === 0) {
    return 0;
  }

  return inTransaction(client, async () => {
    let insertedCount = 0;

    for (let index = 0; index < rows.length; index += MAX_ROWS_PER_STATEMENT) {
      const statement = buildInsertStatement(
        rows.slice(index, index + MAX_ROWS_PER_STATEMENT),
        location
      );
      const result = await client.query(statement.sql, statement.values);
      insertedCount += result.rowCount ?? 0;
    }

    return insertedCount;
  });
}

export async function sealWithClient(
  client: DestinationClient,
  location: DestinationLocation
): Promise<void> {
  const key = locationKey(location);

  await inTransaction(client, async () => {
    await client.query(DELETE_ARCHIVED_SQL, [key]);
    await client.query(PROMOTE_STAGING_SQL, [key]);
    await client.query(DELETE_STAGING_SQL, [key]);
  });
}

/** Stores staging and archived rows as JSONB, keyed by location. */
export function createPgDestination(pool: DestinationPool): Destination {
  const withClient = async <T>(
    work: (client: DestinationClient) => Promise<T>
  ): Promise<T> => {
    const client = await pool.connect();

    try {
      return await work(client);
    } finally {
      client.release();
    }
  };

  return {
    async reset(location) {
      await withClient((client) =>
        client.query(DELETE_STAGING_SQL, [locationKey(location)])
      );
    },
    async append(rows, location) {
      return withClient((client) => appendWithClient(client, rows, location));
    },
    async seal(location) {
      await withClient((client) => sealWithClient(client, location));
    }
  };
}
