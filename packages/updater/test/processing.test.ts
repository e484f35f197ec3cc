import { describe, expect, it } from "vitest";

import { ensureTypes, processRows } from "../src/loader/processing";
import { createConverter } from "../src/sources/converters";

describe("ensureTypes", () => {
  it("coerces integer columns and fills gaps with zero", () => {
    const rows = ensureTypes(
      [
        { session_id: "42", device_id: "d-1" },
        { device_id: "d-2" },
        { session_id: "", device_id: "d-3" }
      ],
      { session_id: "UInt32", device_id: "String", event_timestamp: "UInt64" }
    );

    expect(rows).toEqual([
      { session_id: 42, device_id: "d-1" },
      { session_id: 0, device_id: "d-2" },
      { session_id: 0, device_id: "d-3" }
    ]);
  });

  it("keeps 64-bit values exact as decimal strings", () => {
    const rows = ensureTypes(
      [
        { crash_group_id: "10925834727538934393", session_id: "9007199254740993" },
        { crash_group_id: 17, session_id: "-5.9" },
        { crash_group_id: null }
      ],
      { crash_group_id: "UInt64", session_id: "Int64" }
    );

    expect(rows).toEqual([
      { crash_group_id: "10925834727538934393", session_id: "9007199254740993" },
      { crash_group_id: "17", session_id: "-5" },
      { crash_group_id: "0", session_id: "0" }
    ]);
  });

  it("rejects values that are not numbers", () => {
    expect(() => ensureTypes([{ session_id: "abc" }], { session_id: "UInt32" })).toThrow(
      'Invalid integer value for session_id: "abc"'
    );
    expect(() => ensureTypes([{ session_id: "1e3" }], { session_id: "UInt64" })).toThrow(
      'Invalid integer value for session_id: "1e3"'
    );
  });
});

describe("processRows", () => {
  it("adds the application id, load time and derived columns", () => {
    const rows = processRows(
      [{ event_datetime: "2024-01-10 08:00:00", event_timestamp: "1704873600" }],
      "app-1",
      {
        fieldTypes: { event_datetime: "DateTime", event_timestamp: "UInt64" },
        converters: [{ target: "event_date", convert: createConverter("dateOf", "event_datetime") }]
      },
      new Date("2024-01-11T00:00:00.000Z")
    );

    expect(rows).toEqual([
      {
        event_datetime: "2024-01-10 08:00:00",
        event_timestamp: "1704873600",
        app_id: "app-1",
        load_datetime: 1704931200,
        event_date: "2024-01-10"
      }
    ]);
  });
});
