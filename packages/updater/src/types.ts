/** Calendar date in `YYYY-MM-DD` form, always interpreted in UTC. */
export type CalendarDate = string;

export type Touch =
  | { status: "loaded"; at: Date }
  | { status: "archived" };

export interface ApplicationState {
  appId: string;
  /** event name -> date -> touch. A missing date means the date was never loaded. */
  dateUpdates: Map<string, Map<CalendarDate, Touch>>;
}

export interface GlobalState {
  lastCycleCompletedAt: Date | null;
  applications: ApplicationState[];
}

export type WorkItem =
  | {
      kind: "load";
      source: string;
      appId: string;
      eventName: string;
      date: CalendarDate;
    }
  | {
      kind: "archive";
      source: string;
      appId: string;
      eventName: string;
      date: CalendarDate;
    }
  | {
      kind: "load_date_ignored";
      source: string;
      appId: string;
    };

export type WorkItemKind = WorkItem["kind"];

export type LoadWorkItem = Extract<WorkItem, { kind: "load" | "load_date_ignored" }>;

export type LogsRow = Record<string, unknown>;

export type StateStoreKind = "file" | "postgres";

export interface UpdaterConfig {
  logsApiHost: string;
  logsApiToken: string;
  appIds: string[];
  eventNames: string[];
  sources: string[];
  updateLimitDays: number;
  updateIntervalMs: number;
  freshLimitMs: number;
  maxDivisionCount: number;
  stateStore: StateStoreKind;
  stateFilePath: string;
  databaseUrl: string;
  apiTimeoutMs: number;
  apiMaxRetries: number;
  apiRetryBaseMs: number;
  apiRetryMaxMs: number;
  apiPreparePollMs: number;
  runOnce: boolean;
  progressLogIntervalMs: number;
  logLevel: string;
}
