import { describe, expect, it, vi } from "vitest";

import {
  buildExportUrl,
  createLogsApiClient,
  LogsApiPartsCountError,
  LogsApiRequestError,
  splitTimeRange,
  type LogsApiClientConfig,
  type PullRequest
} from "../src/api/logsApiClient";
import type { LogsRow } from "../src/types";

const config: LogsApiClientConfig = {
  logsApiHost: "http://localhost:3200",
  logsApiToken: "test-token",
  apiTimeoutMs: 1000,
  apiMaxRetries: 2,
  apiRetryBaseMs: 100,
  apiRetryMaxMs: 1000,
  apiPreparePollMs: 10
};

const request: PullRequest = {
  appId: "app-1",
  source: "events",
  fields: ["a", "b"],
  since: new Date("2024-01-10T00:00:00.000Z"),
  until: new Date("2024-01-10T23:59:59.999Z"),
  dateDimension: "default",
  eventName: "purchase",
  divisionCount: 1
};

function jsonResponse(rows: LogsRow[]): Response {
  return new Response(JSON.stringify({ data: rows }), {
    status: 200,
    headers: { "Content-Type": "application/json" }
  });
}

async function drain(batches: AsyncIterable<LogsRow[]>): Promise<LogsRow[][]> {
  const collected: LogsRow[][] = [];
  for await (const batch of batches) {
    collected.push(batch);
  }
  return collected;
}

function requestedUrl(fetchImpl: { mock: { calls: Parameters<typeof fetch>[] } }, call: number): URL {
  return new URL(String(fetchImpl.mock.calls[call][0]));
}

describe("splitTimeRange", () => {
  it("splits a day into halves at whole seconds", () => {
    const ranges = splitTimeRange(request.since ?? new Date(0), request.until ?? new Date(0), 2);

    expect(ranges.map((range) => [range.since.toISOString(), range.until.toISOString()])).toEqual([
      ["2024-01-10T00:00:00.000Z", "2024-01-10T11:59:59.000Z"],
      ["2024-01-10T12:00:00.000Z", "2024-01-10T23:59:59.000Z"]
    ]);
  });

  it("keeps ranges contiguous when the period does not divide evenly", () => {
    const since = new Date("2024-01-10T00:00:00.000Z");
    const ranges = splitTimeRange(since, new Date("2024-01-10T00:00:04.000Z"), 3);

    expect(ranges.map((range) => range.since.getUTCSeconds())).toEqual([0, 1, 3]);
    expect(ranges.map((range) => range.until.getUTCSeconds())).toEqual([0, 2, 4]);
  });

  it("drops parts that would be empty", () => {
    const ranges = splitTimeRange(
      new Date("2024-01-10T00:00:00.000Z"),
      new Date("2024-01-10T00:00:01.000Z"),
      4
    );

    expect(ranges.map((range) => range.since.getUTCSeconds())).toEqual([0, 1]);
  });
});

describe("buildExportUrl", () => {
  it("encodes the export parameters", () => {
    const url = buildExportUrl(config.logsApiHost, request, {
      since: new Date("2024-01-10T00:00:00.000Z"),
      until: new Date("2024-01-10T23:59:59.999Z")
    });

    expect(url.toString()).toBe(
      "http://localhost:3200/logs/v1/export/events.json?application_id=app-1&date_since=2024-01-10+00%3A00%3A00&date_until=2024-01-10+23%3A59%3A59&date_dimension=default&fields=a%2Cb&event_name=purchase"
    );
  });

  it("omits the period and event for date-ignored exports", () => {
    const url = buildExportUrl(`${config.logsApiHost}/`, { ...request, source: "push_tokens", eventName: null }, null);

    expect(url.toString()).toBe(
      "http://localhost:3200/logs/v1/export/push_tokens.json?application_id=app-1&date_dimension=default&fields=a%2Cb"
    );
  });
});

describe("createLogsApiClient", () => {
  it("polls while the export is being prepared", async () => {
    const fetchImpl = vi.fn<typeof fetch>();
    fetchImpl
      .mockResolvedValueOnce(new Response(null, { status: 202 }))
      .mockResolvedValueOnce(jsonResponse([{ a: "1", b: "2" }]));
    const sleep = vi.fn(async (_ms: number) => undefined);

    const client = createLogsApiClient(config, { fetchImpl, sleep });
    const batches = await drain(client.pull(request));

    expect(batches).toEqual([[{ a: "1", b: "2" }]]);
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(10);
    expect(fetchImpl.mock.calls[0][1]).toMatchObject({
      method: "GET",
      headers: { Authorization: "OAuth test-token" }
    });
  });

  it("issues one request per part of the split period", async () => {
    const fetchImpl = vi.fn<typeof fetch>();
    fetchImpl.mockImplementation(async () => jsonResponse([{ a: "1" }]));

    const client = createLogsApiClient(config, { fetchImpl, sleep: async () => undefined });
    const batches = await drain(client.pull({ ...request, divisionCount: 2 }));

    expect(batches).toHaveLength(2);
    expect(requestedUrl(fetchImpl, 0).searchParams.get("date_until")).toBe("2024-01-10 11:59:59");
    expect(requestedUrl(fetchImpl, 1).searchParams.get("date_since")).toBe("2024-01-10 12:00:00");
  });

  it("makes a single unbounded request when no period is given", async () => {
    const fetchImpl = vi.fn<typeof fetch>();
    fetchImpl.mockImplementation(async () => jsonResponse([]));

    const client = createLogsApiClient(config, { fetchImpl, sleep: async () => undefined });
    await drain(client.pull({ ...request, since: null, until: null, eventName: null, divisionCount: 8 }));

    expect(fetchImpl).toHaveBeenCalledOnce();
    expect(requestedUrl(fetchImpl, 0).searchParams.has("date_since")).toBe(false);
  });

  it("reports exports that must be split further", async () => {
    const fetchImpl = vi.fn<typeof fetch>();
    fetchImpl.mockResolvedValueOnce(
      new Response("Response is too large, try to use parts_count", { status: 400 })
    );

    const client = createLogsApiClient(config, { fetchImpl, sleep: async () => undefined });

    await expect(drain(client.pull(request))).rejects.toBeInstanceOf(LogsApiPartsCountError);
  });

  it("retries retriable statuses with backoff", async () => {
    const fetchImpl = vi.fn<typeof fetch>();
    fetchImpl
      .mockResolvedValueOnce(new Response("busy", { status: 503 }))
      .mockResolvedValueOnce(jsonResponse([{ a: "1" }]));
    const sleep = vi.fn(async (_ms: number) => undefined);

    const client = createLogsApiClient(config, { fetchImpl, sleep, random: () => 0 });
    const batches = await drain(client.pull(request));

    expect(batches).toEqual([[{ a: "1" }]]);
    expect(sleep).toHaveBeenCalledOnce();
    expect(sleep).toHaveBeenCalledWith(100);
  });

  it("honors Retry-After when it exceeds the backoff", async () => {
    const fetchImpl = vi.fn<typeof fetch>();
    fetchImpl
      .mockResolvedValueOnce(new Response("slow down", { status: 429, headers: { "Retry-After": "2" } }))
      .mockResolvedValueOnce(jsonResponse([]));
    const sleep = vi.fn(async (_ms: number) => undefined);

    const client = createLogsApiClient(config, { fetchImpl, sleep, random: () => 0 });
    await drain(client.pull(request));

    expect(sleep).toHaveBeenCalledWith(2000);
  });

  it("retries network failures", async () => {
    const fetchImpl = vi.fn<typeof fetch>();
    fetchImpl
      .mockRejectedValueOnce(new TypeError("fetch failed"))
      .mockResolvedValueOnce(jsonResponse([{ a: "1" }]));

    const client = createLogsApiClient(config, { fetchImpl, sleep: async () => undefined, random: () => 0 });

    await expect(drain(client.pull(request))).resolves.toEqual([[{ a: "1" }]]);
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it("fails fast on non-retriable statuses", async () => {
    const fetchImpl = vi.fn<typeof fetch>();
    fetchImpl.mockResolvedValueOnce(new Response("missing", { status: 404 }));

    const client = createLogsApiClient(config, { fetchImpl, sleep: async () => undefined });

    await expect(drain(client.pull(request))).rejects.toThrow(
      new LogsApiRequestError(404, "missing").message
    );
    expect(fetchImpl).toHaveBeenCalledOnce();
  });

  it("stops after the configured number of retries", async () => {
    const fetchImpl = vi.fn<typeof fetch>();
    fetchImpl.mockImplementation(async () => new Response("busy", { status: 503 }));

    const client = createLogsApiClient(config, { fetchImpl, sleep: async () => undefined, random: () => 0 });

    await expect(drain(client.pull(request))).rejects.toBeInstanceOf(LogsApiRequestError);
    expect(fetchImpl).toHaveBeenCalledTimes(3);
  });
});
