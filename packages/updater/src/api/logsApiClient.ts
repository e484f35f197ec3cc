import { formatApiDateTime } from "../dates";
import type { LogsRow } from "../types";
import { parseExportResponse } from "./responseParser";
import {
  computeBackoffMs,
  isPartsCountRejection,
  isRetriableStatus,
  parseRetryAfterMs,
  type RetryPolicy
} from "./retryPolicy";

export interface PullRequest {
  appId: string;
  source: string;
  fields: string[];
  since: Date | null;
  until: Date | null;
  dateDimension: string;
  eventName: string | null;
  divisionCount: number;
}

export interface LogsApiClient {
  pull: (request: PullRequest) => AsyncIterable<LogsRow[]>;
}

export interface LogsApiClientConfig {
  logsApiHost: string;
  logsApiToken: string;
  apiTimeoutMs: number;
  apiMaxRetries: number;
  apiRetryBaseMs: number;
  apiRetryMaxMs: number;
  apiPreparePollMs: number;
}

type FetchLike = typeof fetch;
type SleepLike = (ms: number) => Promise<void>;

export interface LogsApiClientDependencies {
  fetchImpl?: FetchLike;
  sleep?: SleepLike;
  now?: () => number;
  random?: () => number;
}

export interface TimeRange {
  since: Date;
  until: Date;
}

export class LogsApiPartsCountError extends Error {
  constructor(source: string, divisionCount: number, body: string) {
    super(
      `Logs API rejected ${source} export split into ${divisionCount} part(s): ${body}`
    );
    this.name = "LogsApiPartsCountError";
  }
}

export class LogsApiRequestError extends Error {
  readonly status: number;

  constructor(status: number, body: string) {
    super(
      body
        ? `Logs API request failed with status ${status}: ${body}`
        : `Logs API request failed with status ${status}`
    );
    this.name = "LogsApiRequestError";
    this.status = status;
  }
}

class RequestTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Logs API request timed out after ${timeoutMs}ms`);
    this.name = "RequestTimeoutError";
  }
}

function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
}

export function buildExportUrl(
  baseUrl: string,
  request: PullRequest,
  range: TimeRange | null
): URL {
  const url = new URL(
    `logs/v1/export/${encodeURIComponent(request.source)}.json`,
    normalizeBaseUrl(baseUrl)
  );
  url.searchParams.set("application_id", request.appId);

  if (range) {
    url.searchParams.set("date_since", formatApiDateTime(range.since));
    url.searchParams.set("date_until", formatApiDateTime(range.until));
  }

  url.searchParams.set("date_dimension", request.dateDimension);
  url.searchParams.set("fields", request.fields.join(","));

  if (request.eventName) {
    url.searchParams.set("event_name", request.eventName);
  }

  return url;
}

/**
 * Splits [since, until] into `count` consecutive, non-overlapping ranges at
 * whole-second granularity. Ranges that would be empty are dropped.
 */
export function splitTimeRange(
  since: Date,
  until: Date,
  count: number
): TimeRange[] {
  const parts = Math.max(1, Math.floor(count));
  const sinceSeconds = Math.floor(since.getTime() / 1000);
  const untilSeconds = Math.floor(until.getTime() / 1000);
  const totalSeconds = untilSeconds - sinceSeconds + 1;

  if (totalSeconds <= 0) {
    return [];
  }

  const ranges: TimeRange[] = [];

  for (let index = 0; index < parts; index += 1) {
    const start = sinceSeconds + Math.floor((totalSeconds * index) / parts);
    const end = sinceSeconds + Math.floor((totalSeconds * (index + 1)) / parts) - 1;

    if (end < start) {
      continue;
    }

    ranges.push({
      since: new Date(start * 1000),
      until: new Date(end * 1000)
    });
  }

  return ranges;
}

function shouldRetryFetchError(error: unknown): boolean {
  if (error instanceof RequestTimeoutError) {
    return true;
  }

  if (error instanceof Error) {
    return error.name === "AbortError" || error.name === "TypeError";
  }

  return false;
}

async function sleepFor(ms: number): Promise<void> {
  await new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });
}

async function fetchWithTimeout(
  fetchImpl: FetchLike,
  requestUrl: URL,
  requestInit: RequestInit,
  timeoutMs: number
): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => {
    controller.abort();
  }, timeoutMs);

  try {
    return await fetchImpl(requestUrl, {
      ...requestInit,
      signal: controller.signal
    });
  } catch (error) {
    if (controller.signal.aborted) {
      throw new RequestTimeoutError(timeoutMs);
    }

    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

export function createLogsApiClient(
  config: LogsApiClientConfig,
  dependencies: LogsApiClientDependencies = {}
): LogsApiClient {
  const fetchImpl = dependencies.fetchImpl ?? fetch;
  const sleep = dependencies.sleep ?? sleepFor;
  const now = dependencies.now ?? Date.now;
  const random = dependencies.random ?? Math.random;
  const retryPolicy: RetryPolicy = {
    maxRetries: config.apiMaxRetries,
    baseDelayMs: config.apiRetryBaseMs,
    maxDelayMs: config.apiRetryMaxMs
  };
  const maxAttempts = Math.max(1, retryPolicy.maxRetries + 1);

  const fetchExport = async (
    request: PullRequest,
    range: TimeRange | null
  ): Promise<LogsRow[]> => {
    const url = buildExportUrl(config.logsApiHost, request, range);
    const requestInit: RequestInit = {
      method: "GET",
      headers: {
        Accept: "application/json",
        Authorization: `OAuth ${config.logsApiToken}`
      }
    };

    let attempt = 1;

    while (true) {
      let response: Response;

      try {
        response = await fetchWithTimeout(
          fetchImpl,
          url,
          requestInit,
          config.apiTimeoutMs
        );
      } catch (error) {
        if (!shouldRetryFetchError(error) || attempt >= maxAttempts) {
          throw error;
        }

        const retryDelayMs = computeBackoffMs(attempt, retryPolicy, random);
        attempt += 1;
        await sleep(retryDelayMs);
        continue;
      }

      if (response.status === 202) {
        // export is still being prepared upstream; does not count as a retry
        await response.text();
        await sleep(config.apiPreparePollMs);
        continue;
      }

      if (response.ok) {
        const payload: unknown = await response.json();
        return parseExportResponse(payload);
      }

      const body = await response.text();

      if (isPartsCountRejection(response.status, body)) {
        throw new LogsApiPartsCountError(request.source, request.divisionCount, body);
      }

      if (!isRetriableStatus(response.status) || attempt >= maxAttempts) {
        throw new LogsApiRequestError(response.status, body);
      }

      const retryAfterMs = parseRetryAfterMs(
        response.headers.get("Retry-After"),
        now()
      );
      const backoffDelayMs = computeBackoffMs(attempt, retryPolicy, random);
      attempt += 1;

      await sleep(Math.max(retryAfterMs ?? 0, backoffDelayMs));
    }
  };

  return {
    async *pull(request: PullRequest): AsyncGenerator<LogsRow[], void, undefined> {
      if (!request.since || !request.until) {
        yield await fetchExport(request, null);
        return;
      }

      const ranges = splitTimeRange(
        request.since,
        request.until,
        request.divisionCount
      );

      for (const range of ranges) {
        yield await fetchExport(request, range);
      }
    }
  };
}
