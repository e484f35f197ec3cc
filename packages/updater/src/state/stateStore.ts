import type { GlobalState } from "../types";

export interface StateStore {
  load: () => Promise<GlobalState>;
  save: (state: GlobalState) => Promise<void>;
}

export class StatePersistenceError extends Error {
  constructor(operation: "load" | "save", location: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to ${operation} updater state (${location}): ${detail}`, { cause });
    this.name = "StatePersistenceError";
  }
}
