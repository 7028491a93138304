import test from "node:test";
import assert from "node:assert/strict";
import { z } from "zod";
import { parsePagerConfig } from "../src/config.js";
import { createPagerState } from "../src/mcp.js";
import { resetMetrics } from "../src/metrics.js";
import { createHttpApp } from "../src/web.js";

const { config } = parsePagerConfig({
  operations: {
    ListObjects: {
      path: "/objects",
      pagination: { inputToken: "marker", outputToken: "next_marker", resultKey: "contents" }
    }
  }
});

const app = createHttpApp(createPagerState(config), { baseUrl: "http://127.0.0.1:9", timeoutMs: 1000, maxItems: 10 });

const toolsListResponse = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.number(),
  result: z.object({ tools: z.array(z.object({ name: z.string() })) })
});

test("/health reports the transport", async () => {
  const res = await app.request("/health");

  assert.equal(res.status, 200);
  assert.deepEqual(await res.json(), { ok: true, transport: "streamable-http" });
});

test("/metrics serves Prometheus text", async () => {
  resetMetrics();
  const res = await app.request("/metrics");

  assert.equal(res.status, 200);
  assert.match(res.headers.get("content-type") ?? "", /^text\/plain/);
  const lines = (await res.text()).split("\n");
  assert.equal(lines[0], "# TYPE resource_pager_iterations_total counter");
  assert.equal(lines[1], "resource_pager_iterations_total 0");
});

test("/mcp answers tools/list without a session", async () => {
  const res = await app.request("/mcp", {
    method: "POST",
    headers: { "content-type": "application/json", accept: "application/json, text/event-stream" },
    body: JSON.stringify({ jsonrpc: "2.0", id: 1, method: "tools/list", params: {} })
  });

  assert.equal(res.status, 200);
  const dataLine = (await res.text()).split("\n").find((line) => line.startsWith("data: "));
  assert.ok(dataLine);
  const message = toolsListResponse.parse(JSON.parse(dataLine.slice("data: ".length)));
  assert.equal(message.id, 1);
  assert.deepEqual(
    message.result.tools.map((tool) => tool.name),
    ["ListObjects", "pager_metrics"]
  );
});

test("/mcp rejects a body that is not JSON", async () => {
  const res = await app.request("/mcp", {
    method: "POST",
    headers: { "content-type": "application/json", accept: "application/json, text/event-stream" },
    body: "{not json"
  });

  assert.equal(res.status, 400);
});

test("CORS headers expose the MCP session headers", async () => {
  const res = await app.request("/health", { headers: { origin: "http://localhost:5173" } });

  assert.equal(res.headers.get("access-control-allow-origin"), "*");
  assert.equal(res.headers.get("access-control-expose-headers"), "mcp-session-id,mcp-protocol-version");
});
