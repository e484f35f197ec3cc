export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string, error?: unknown) => void;
  error: (message: string, error?: unknown) => void;
}

export interface LogSink {
  log: (...values: unknown[]) => void;
  warn: (...values: unknown[]) => void;
  error: (...values: unknown[]) => void;
}

export function createLogger(logLevel: string, sink: LogSink = console): Logger {
  const debugEnabled = logLevel === "debug";

  const withError = (
    write: (...values: unknown[]) => void,
    message: string,
    error: unknown
  ): void => {
    if (error === undefined) {
      write(message);
      return;
    }

    write(message, error);
  };

  return {
    debug(message: string): void {
      if (debugEnabled) {
        sink.log(message);
      }
    },
    info(message: string): void {
      sink.log(message);
    },
    warn(message: string, error?: unknown): void {
      withError(sink.warn, message, error);
    },
    error(message: string, error?: unknown): void {
      withError(sink.error, message, error);
    }
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {}
};
