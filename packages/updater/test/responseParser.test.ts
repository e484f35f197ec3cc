import { describe, expect, it } from "vitest";

import { parseExportResponse } from "../src/api/responseParser";

describe("parseExportResponse", () => {
  it("returns the exported rows", () => {
    expect(
      parseExportResponse({
        data: [
          { event_name: "purchase", event_datetime: "2024-01-10 00:00:00" },
          { event_name: "level_up", event_datetime: "2024-01-10 00:00:30" }
        ]
      })
    ).toEqual([
      { event_name: "purchase", event_datetime: "2024-01-10 00:00:00" },
      { event_name: "level_up", event_datetime: "2024-01-10 00:00:30" }
    ]);
  });

  it("throws for invalid response shape", () => {
    expect(() => parseExportResponse("[]")).toThrow("Invalid export response: expected object");
    expect(() => parseExportResponse({ data: {} })).toThrow("data must be an array");
    expect(() => parseExportResponse({ data: [1] })).toThrow("row 0 must be an object");
  });
});
