import { Hono } from "hono";
import { cors } from "hono/cors";
import { WebStandardStreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/webStandardStreamableHttp.js";
import { createMcpServer, type PagerState } from "./mcp.js";
import { renderPrometheus } from "./metrics.js";
import type { RuntimeOptions } from "./types.js";

/** Routes for the streamable HTTP transport. Each `/mcp` request gets its own stateless transport and server. */
export function createHttpApp(state: PagerState, runtime: RuntimeOptions) {
  const app = new Hono();
  app.use(
    "*",
    cors({
      origin: "*",
      allowMethods: ["GET", "POST", "DELETE", "OPTIONS"],
      allowHeaders: ["Content-Type", "mcp-session-id", "Last-Event-ID", "mcp-protocol-version"],
      exposeHeaders: ["mcp-session-id", "mcp-protocol-version"]
    })
  );

  app.get("/health", (c) => c.json({ ok: true, transport: "streamable-http" }));
  app.get("/metrics", (c) => c.text(renderPrometheus()));

  app.all("/mcp", async (c) => {
    const transport = new WebStandardStreamableHTTPServerTransport();
    const server = createMcpServer(state, runtime);
    await server.connect(transport);
    return transport.handleRequest(c.req.raw);
  });

  return app;
}
