import type { WorkItemKind } from "../types";

export interface CycleProgressLoggerOptions {
  intervalMs: number;
  now?: () => number;
  log?: (message: string) => void;
}

export interface CycleProgressLogger {
  onItem: (kind: WorkItemKind, rowsWritten: number) => void;
  flush: () => void;
}

export function createCycleProgressLogger(
  options: CycleProgressLoggerOptions
): CycleProgressLogger {
  const now = options.now ?? Date.now;
  const log = options.log ?? console.log;
  const intervalMs = Math.max(1, options.intervalMs);

  const startedAtMs = now();
  let lastLoggedAtMs = startedAtMs;
  let loads = 0;
  let archives = 0;
  let rowsWritten = 0;

  const maybeLog = (force: boolean): void => {
    const currentMs = now();

    if (!force && currentMs - lastLoggedAtMs < intervalMs) {
      return;
    }

    const elapsedSeconds = Math.max(0.001, (currentMs - startedAtMs) / 1000);
    const rowsPerSecond = rowsWritten / elapsedSeconds;

    log(
      `cycle progress (items=${loads + archives}, loads=${loads}, archives=${archives}, rows=${rowsWritten}, rps=${rowsPerSecond.toFixed(1)})`
    );

    lastLoggedAtMs = currentMs;
  };

  return {
    onItem(kind: WorkItemKind, itemRows: number): void {
      if (kind === "archive") {
        archives += 1;
      } else {
        loads += 1;
      }
      rowsWritten += itemRows;
      maybeLog(false);
    },
    flush(): void {
      maybeLog(true);
    }
  };
}
