import { createServer, type ServerResponse } from "node:http";

import { handleExport, parseExportQuery, type ExportOptions } from "./mockData";

function readInt(name: string, fallback: number): number {
  const parsed = Number.parseInt(process.env[name] ?? "", 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

const port = readInt("PORT", 3200);
const options: ExportOptions = {
  spacingSeconds: readInt("MOCK_ROW_SPACING_SECONDS", 30),
  maxRowsPerPart: readInt("MOCK_MAX_ROWS_PER_PART", 1000),
  latestRowCount: readInt("MOCK_LATEST_ROWS", 50)
};
const prepared = new Set<string>();

function writeJson(
  response: ServerResponse,
  statusCode: number,
  payload: unknown
): void {
  response.statusCode = statusCode;
  response.setHeader("Content-Type", "application/json");
  response.end(JSON.stringify(payload));
}

const server = createServer((request, response) => {
  if (!request.url) {
    writeJson(response, 400, { message: "Missing URL" });
    return;
  }

  const url = new URL(request.url, `http://localhost:${port}`);

  if (url.pathname === "/health") {
    writeJson(response, 200, { status: "ok" });
    return;
  }

  if (!url.pathname.startsWith("/logs/v1/export/")) {
    writeJson(response, 404, { message: "Not Found" });
    return;
  }

  if (!request.headers.authorization?.startsWith("OAuth ")) {
    writeJson(response, 403, { message: "Missing OAuth token" });
    return;
  }

  try {
    const query = parseExportQuery(url);
    const result = handleExport(query, prepared, options);
    writeJson(response, result.status, result.payload);
  } catch (error) {
    writeJson(response, 400, {
      message: error instanceof Error ? error.message : "Invalid request"
    });
  }
});

server.listen(port, "0.0.0.0", () => {
  console.log(
    `mock logs api listening on port ${port} (spacing=${options.spacingSeconds}s, maxRowsPerPart=${options.maxRowsPerPart})`
  );
});
