import { readdir, readFile } from "node:fs/promises";
import path from "node:path";

export interface Migration {
  name: string;
  sql: string;
}

interface AppliedRow {
  name: string;
}

export interface MigrationRunner {
  query(text: string, values?: unknown[]): Promise<{ rows: AppliedRow[] }>;
}

export interface MigrationClient extends MigrationRunner {
  release(): void;
}

export interface MigrationPool {
  connect(): Promise<MigrationClient>;
}

export const DEFAULT_MIGRATIONS_DIR = path.resolve(__dirname, "../../migrations");

const CREATE_MIGRATIONS_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS schema_migrations (
  name TEXT PRIMARY KEY,
  applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
`;

const SELECT_APPLIED_SQL = `
SELECT name
FROM schema_migrations;
`;

const INSERT_APPLIED_SQL = `
INSERT INTO schema_migrations (name)
VALUES ($1);
`;

export async function discoverMigrations(migrationsDir: string): Promise<Migration[]> {
  const files = await readdir(migrationsDir);
  const sqlFiles = files.filter((name) => name.endsWith(".sql")).sort();

  const migrations: Migration[] = [];
  for (const name of sqlFiles) {
    const sql = await readFile(path.join(migrationsDir, name), "utf8");
    migrations.push({ name, sql });
  }

  return migrations;
}

async function getAppliedMigrationNames(runner: MigrationRunner): Promise<Set<string>> {
  await runner.query(CREATE_MIGRATIONS_TABLE_SQL);
  const result = await runner.query(SELECT_APPLIED_SQL);
  return new Set(result.rows.map((row) => row.name));
}

export async function applyMigration(
  runner: MigrationRunner,
  migration: Migration
): Promise<void> {
  await runner.query("BEGIN");

  try {
    await runner.query(migration.sql);
    await runner.query(INSERT_APPLIED_SQL, [migration.name]);
    await runner.query("COMMIT");
  } catch (error) {
    await runner.query("ROLLBACK");
    throw error;
  }
}

/** Applies pending migrations in lexical order; returns how many ran. */
export async function runMigrations(
  pool: MigrationPool,
  migrationsDir: string = DEFAULT_MIGRATIONS_DIR
): Promise<number> {
  const migrations = await discoverMigrations(migrationsDir);
  const client = await pool.connect();

  try {
    const appliedNames = await getAppliedMigrationNames(client);
    let appliedCount = 0;

    for (const migration of migrations) {
      if (appliedNames.has(migration.name)) {
        continue;
      }

      await applyMigration(client, migration);
      appliedNames.add(migration.name);
      appliedCount += 1;
    }

    return appliedCount;
  } finally {
    client.release();
  }
}
