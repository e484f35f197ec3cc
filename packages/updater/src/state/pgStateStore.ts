import { createEmptyState } from "./globalState";
import { deserializeState, serializeState } from "./stateCodec";
import { StatePersistenceError, type StateStore } from "./stateStore";

interface StateRow {
  document: unknown;
  updated_at: Date;
}

interface StateQueryResult {
  rowCount: number | null;
  rows: StateRow[];
}

export interface Queryable {
  query(text: string, values?: unknown[]): Promise<StateQueryResult>;
}

const SELECT_STATE_SQL = `
SELECT document, updated_at
FROM updater_state
WHERE id = 1;
`;

const UPSERT_STATE_SQL = `
INSERT INTO updater_state (id, document, updated_at)
VALUES (1, $1::jsonb, NOW())
ON CONFLICT (id) DO UPDATE
SET
  document = EXCLUDED.document,
  updated_at = NOW();
`;

const LOCATION = "updater_state id=1";

export function createPgStateStore(runner: Queryable): StateStore {
  return {
    async load() {
      let result: StateQueryResult;

      try {
        result = await runner.query(SELECT_STATE_SQL);
      } catch (error) {
        throw new StatePersistenceError("load", LOCATION, error);
      }

      if (result.rowCount !== 1) {
        return createEmptyState();
      }

      try {
        return deserializeState(result.rows[0].document);
      } catch (error) {
        throw new StatePersistenceError("load", LOCATION, error);
      }
    },
    async save(state) {
      try {
        await runner.query(UPSERT_STATE_SQL, [
          JSON.stringify(serializeState(state))
        ]);
      } catch (error) {
        throw new StatePersistenceError("save", LOCATION, error);
      }
    }
  };
}
