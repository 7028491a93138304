import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  type LoggingLevel
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { paginationKeysByOperation } from "./config.js";
import { paginateWithCursor } from "./cursor.js";
import { PaginationIteratorFactory } from "./factory.js";
import { HttpOperation } from "./http.js";
import { combineHooks, isTokenPresent } from "./iterator.js";
import { metrics, metricsHooks, observeLatency, renderPrometheus } from "./metrics.js";
import type { ContinuationToken, IteratorFactory, PagerConfig, RuntimeOptions } from "./types.js";

export const METRICS_TOOL = "pager_metrics";
const TOOLS_PAGE_SIZE = 50;

const toolInputSchema = z
  .object({
    params: z.record(z.unknown()).optional(),
    limit: z.number().int().positive().optional(),
    pageSize: z.number().int().positive().optional()
  })
  .strict();

const TOOL_INPUT_JSON_SCHEMA = {
  type: "object",
  properties: {
    params: {
      type: "object",
      description: "Request parameters; merged over the operation's configured defaults.",
      additionalProperties: true
    },
    limit: { type: "integer", minimum: 1, description: "Maximum number of items to collect." },
    pageSize: { type: "integer", minimum: 1, description: "Preferred number of items per request." }
  },
  additionalProperties: false
} as const;

export interface PagerState {
  config: PagerConfig;
  factory: IteratorFactory;
}

export function createPagerState(config: PagerConfig, primary?: IteratorFactory): PagerState {
  return { config, factory: new PaginationIteratorFactory(paginationKeysByOperation(config), primary) };
}

export function createMcpServer(state: PagerState, runtime: RuntimeOptions): Server {
  const mcpServer = new Server(
    { name: "resource-pager", version: "0.1.0" },
    { capabilities: { tools: { listChanged: true }, logging: {} } }
  );

  mcpServer.setRequestHandler(ListToolsRequestSchema, async (request) => {
    const operationTools = Object.entries(state.config.operations)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([name, operation]) => ({
        name,
        description: operation.description ?? `Collect items from ${operation.method} ${operation.path}, following continuation tokens.`,
        inputSchema: TOOL_INPUT_JSON_SCHEMA,
        annotations: { readOnlyHint: true, openWorldHint: true }
      }));

    const tools = [
      ...operationTools,
      {
        name: METRICS_TOOL,
        description: "Pagination metrics in Prometheus text format.",
        inputSchema: { type: "object", properties: {} } as const,
        annotations: { readOnlyHint: true }
      }
    ];

    const { items, nextCursor } = paginateWithCursor(tools, request.params?.cursor, TOOLS_PAGE_SIZE);
    return { tools: items, ...(nextCursor ? { nextCursor } : {}) };
  });

  mcpServer.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const name = request.params.name;

    if (name === METRICS_TOOL) {
      return { content: [{ type: "text", text: renderPrometheus() }] };
    }

    const definition = state.config.operations[name];
    if (!definition) {
      throw new McpError(ErrorCode.InvalidParams, `Unknown tool: ${name}`);
    }

    const parsed = toolInputSchema.safeParse(request.params.arguments ?? {});
    if (!parsed.success) {
      return {
        content: [{ type: "text", text: JSON.stringify({ error: "Input validation failed", issues: parsed.error.issues }, null, 2) }],
        isError: true
      };
    }

    const args = parsed.data;
    const operation = new HttpOperation(name, definition, {
      baseUrl: runtime.baseUrl,
      timeoutMs: runtime.timeoutMs,
      signal: extra.signal
    });
    for (const [param, value] of Object.entries(args.params ?? {})) {
      operation.set(param, value);
    }

    const requestId = String(extra.requestId);
    const start = Date.now();
    let requests = 0;
    let lastToken: ContinuationToken | undefined;
    metrics.iterationsTotal += 1;

    try {
      await sendLog(mcpServer, "info", { event: "tool_call_start", tool: name, requestId }, extra.sessionId);

      const iterator = state.factory.build(operation, {
        limit: Math.min(args.limit ?? runtime.maxItems, runtime.maxItems),
        pageSize: args.pageSize,
        hooks: combineHooks(metricsHooks(), {
          onAfterSend: ({ token }) => {
            requests += 1;
            lastToken = token;
          },
          onLog: async (entry) => {
            await sendLog(mcpServer, entry.level, { tool: name, ...asRecord(entry.data), requestId }, extra.sessionId);
          }
        })
      });

      const items = await iterator.toArray();
      observeLatency(Date.now() - start);

      const summary = { items, count: items.length, requests, hasMore: isTokenPresent(lastToken) };
      await sendLog(
        mcpServer,
        "info",
        { event: "tool_call_complete", tool: name, count: items.length, requests, requestId },
        extra.sessionId
      );

      return {
        content: [{ type: "text", text: JSON.stringify({ ...summary, lastResult: iterator.getLastResult() ?? null }, null, 2) }],
        structuredContent: summary
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      metrics.iterationsFailed += 1;

      await sendLog(mcpServer, "error", { event: "tool_call_failed", tool: name, detail: message, requestId }, extra.sessionId);

      return {
        content: [{ type: "text", text: JSON.stringify({ error: "Pagination failed", detail: message, requests }, null, 2) }],
        isError: true
      };
    }
  });

  return mcpServer;
}

async function sendLog(server: Server, level: LoggingLevel, data: unknown, sessionId?: string): Promise<void> {
  await server.sendLoggingMessage({ level, logger: "resource-pager", data: redactSecrets(data) }, sessionId);
}

export function redactSecrets(data: unknown): unknown {
  if (!isObject(data)) return data;
  if (Array.isArray(data)) return data.map((item) => redactSecrets(item));
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    const lower = key.toLowerCase();
    if (lower.includes("authorization") || lower.includes("token") || lower.includes("password") || lower.includes("secret")) {
      out[key] = "[REDACTED]";
    } else {
      out[key] = redactSecrets(value);
    }
  }
  return out;
}

function asRecord(value: unknown): Record<string, unknown> {
  return isObject(value) && !Array.isArray(value) ? { ...value } : { data: value };
}

function isObject(value: unknown): value is object {
  return value !== null && typeof value === "object";
}
