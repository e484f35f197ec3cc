import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { loadConfig, loadDatabaseUrl } from "../src/config";

const MANAGED_KEYS = [
  "APP_IDS",
  "LOGS_API_TOKEN",
  "EVENT_NAMES",
  "SOURCES",
  "UPDATE_LIMIT_DAYS",
  "UPDATE_INTERVAL_HOURS",
  "FRESH_LIMIT_DAYS",
  "MAX_DIVISION_COUNT",
  "STATE_STORE",
  "STATE_FILE_PATH",
  "DATABASE_URL",
  "RUN_ONCE"
];

const originalEnv = new Map(MANAGED_KEYS.map((key) => [key, process.env[key]]));

beforeEach(() => {
  for (const key of MANAGED_KEYS) {
    delete process.env[key];
  }
  process.env.APP_IDS = '["app-1", 42]';
  process.env.LOGS_API_TOKEN = "test-token";
});

afterEach(() => {
  for (const [key, value] of originalEnv) {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
});

describe("loadConfig", () => {
  it("uses scheduling defaults", () => {
    const config = loadConfig();

    expect(config.appIds).toEqual(["app-1", "42"]);
    expect(config.eventNames).toEqual([]);
    expect(config.sources).toEqual([]);
    expect(config.updateLimitDays).toBe(30);
    expect(config.updateIntervalMs).toBe(12 * 60 * 60 * 1000);
    expect(config.freshLimitMs).toBe(7 * 24 * 60 * 60 * 1000);
    expect(config.maxDivisionCount).toBe(1024);
    expect(config.stateStore).toBe("file");
    expect(config.runOnce).toBe(false);
    expect(config.databaseUrl).toContain("postgresql://postgres:postgres");
  });

  it("parses overrides", () => {
    process.env.EVENT_NAMES = '["purchase","level_up"]';
    process.env.UPDATE_INTERVAL_HOURS = "1";
    process.env.STATE_STORE = "postgres";
    process.env.RUN_ONCE = "true";

    const config = loadConfig();

    expect(config.eventNames).toEqual(["purchase", "level_up"]);
    expect(config.updateIntervalMs).toBe(60 * 60 * 1000);
    expect(config.stateStore).toBe("postgres");
    expect(config.runOnce).toBe(true);
  });

  it("requires applications and a token", () => {
    process.env.APP_IDS = "[]";
    expect(() => loadConfig()).toThrow("APP_IDS must list at least one application id");

    process.env.APP_IDS = '["app-1"]';
    delete process.env.LOGS_API_TOKEN;
    expect(() => loadConfig()).toThrow("Missing required environment variable LOGS_API_TOKEN");
  });

  it("rejects malformed values", () => {
    process.env.EVENT_NAMES = "purchase";
    expect(() => loadConfig()).toThrow("Invalid JSON for EVENT_NAMES: purchase");

    process.env.EVENT_NAMES = '{"name":"purchase"}';
    expect(() => loadConfig()).toThrow('Expected a JSON array for EVENT_NAMES: {"name":"purchase"}');

    delete process.env.EVENT_NAMES;
    process.env.UPDATE_LIMIT_DAYS = "soon";
    expect(() => loadConfig()).toThrow("Invalid integer for UPDATE_LIMIT_DAYS: soon");

    delete process.env.UPDATE_LIMIT_DAYS;
    process.env.STATE_STORE = "redis";
    expect(() => loadConfig()).toThrow("Invalid STATE_STORE: redis");
  });
});

describe("loadDatabaseUrl", () => {
  it("prefers DATABASE_URL", () => {
    process.env.DATABASE_URL = "postgresql://localhost/test";

    expect(loadDatabaseUrl()).toBe("postgresql://localhost/test");
  });
});
