import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";

import { createEmptyState } from "./globalState";
import { deserializeState, serializeState } from "./stateCodec";
import { StatePersistenceError, type StateStore } from "./stateStore";

function isMissingFileError(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

/**
 * Keeps the whole state in one JSON file. Writes go to a sibling temp file that
 * is renamed over the target, so a crash never leaves a half-written document.
 */
export function createFileStateStore(filePath: string): StateStore {
  const tempPath = `${filePath}.tmp`;

  return {
    async load() {
      let raw: string;

      try {
        raw = await readFile(filePath, "utf8");
      } catch (error) {
        if (isMissingFileError(error)) {
          return createEmptyState();
        }

        throw new StatePersistenceError("load", filePath, error);
      }

      try {
        return deserializeState(JSON.parse(raw));
      } catch (error) {
        throw new StatePersistenceError("load", filePath, error);
      }
    },
    async save(state) {
      const document = `${JSON.stringify(serializeState(state), null, 2)}\n`;

      try {
        await mkdir(path.dirname(filePath), { recursive: true });
        await writeFile(tempPath, document, "utf8");
        await rename(tempPath, filePath);
      } catch (error) {
        throw new StatePersistenceError("save", filePath, error);
      }
    }
  };
}
