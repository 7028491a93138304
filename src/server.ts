#!/usr/bin/env node
import { resolve } from "node:path";
import { serve } from "@hono/node-server";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { formatDiagnostic, loadPagerConfig } from "./config.js";
import { createMcpServer, createPagerState, type PagerState } from "./mcp.js";
import type { RuntimeOptions } from "./types.js";
import { createHttpApp } from "./web.js";

interface CliOptions {
  configPath: string;
  baseUrl?: string;
  validateConfig: boolean;
  printTools: boolean;
  transport: "stdio" | "streamable-http";
  port: number;
  timeoutMs: number;
  maxItems: number;
}

async function main(): Promise<void> {
  const cli = parseArgs(process.argv.slice(2));
  const configPath = resolve(cli.configPath);
  const { config, warnings } = await loadPagerConfig(configPath);

  if (warnings.length > 0) {
    process.stderr.write(`${warnings.map((d) => `Warning ${formatDiagnostic(d).slice(2)}`).join("\n")}\n`);
  }

  if (cli.validateConfig) {
    process.stdout.write(`Config valid. ${Object.keys(config.operations).length} paginated operation(s).\n`);
    return;
  }

  if (cli.printTools) {
    for (const [name, operation] of Object.entries(config.operations).sort(([a], [b]) => a.localeCompare(b))) {
      process.stdout.write(`${name}\t${operation.method} ${operation.path}\n`);
    }
    return;
  }

  const baseUrl = cli.baseUrl ?? config.baseUrl;
  if (!baseUrl) {
    throw new Error("No base URL: set baseUrl in the config or pass --base-url <url>");
  }

  const runtime: RuntimeOptions = { baseUrl, timeoutMs: cli.timeoutMs, maxItems: cli.maxItems };
  const state = createPagerState(config);

  if (cli.transport === "stdio") {
    const mcpServer = createMcpServer(state, runtime);
    await mcpServer.connect(new StdioServerTransport());
    return;
  }

  await startHttpServer(state, runtime, cli.port);
}

async function startHttpServer(state: PagerState, runtime: RuntimeOptions, port: number): Promise<void> {
  const app = createHttpApp(state, runtime);
  const server = serve({ fetch: app.fetch, port });
  process.stderr.write(
    `Listening on http://localhost:${port}/mcp (streamable-http)\n` +
      `Health: http://localhost:${port}/health\n` +
      `Metrics: http://localhost:${port}/metrics\n`
  );

  wireGracefulShutdown(() => {
    server.close();
  });

  await new Promise(() => undefined);
}

function wireGracefulShutdown(cleanup: () => Promise<void> | void): void {
  const handler = async () => {
    await cleanup();
    process.exit(0);
  };
  process.once("SIGINT", handler);
  process.once("SIGTERM", handler);
}

function parseArgs(argv: string[]): CliOptions {
  let configPath = "";
  let baseUrl: string | undefined;
  let validateConfig = false;
  let printTools = false;
  let transport: CliOptions["transport"] = "stdio";
  let port = 3000;
  let timeoutMs = 30000;
  let maxItems = 1000;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];

    if (arg === "--config") {
      configPath = argv[++i] ?? "";
      continue;
    }
    if (arg === "--base-url") {
      baseUrl = argv[++i];
      continue;
    }
    if (arg === "--validate-config") {
      validateConfig = true;
      continue;
    }
    if (arg === "--print-tools") {
      printTools = true;
      continue;
    }
    if (arg === "--transport") {
      const value = argv[++i];
      if (value !== "stdio" && value !== "streamable-http") {
        throw new Error("Invalid --transport value; use stdio|streamable-http");
      }
      transport = value;
      continue;
    }
    if (arg === "--port") {
      port = parsePositiveInt(argv[++i], "--port");
      continue;
    }
    if (arg === "--timeout-ms") {
      timeoutMs = parsePositiveInt(argv[++i], "--timeout-ms");
      continue;
    }
    if (arg === "--max-items") {
      maxItems = parsePositiveInt(argv[++i], "--max-items");
      continue;
    }
    if (arg === "--help" || arg === "-h") {
      printHelp();
      process.exit(0);
    }

    throw new Error(`Unknown argument: ${arg}`);
  }

  if (!configPath) {
    printHelp();
    throw new Error("Missing required argument: --config <path-to-pager-config>");
  }

  return { configPath, baseUrl, validateConfig, printTools, transport, port, timeoutMs, maxItems };
}

function parsePositiveInt(value: string | undefined, flag: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid value for ${flag}: expected positive integer`);
  }
  return parsed;
}

function printHelp(): void {
  process.stderr.write(
    [
      "Usage:",
      "  resource-pager --config <pager-config.yaml> [options]",
      "",
      "Options:",
      "  --base-url <url>",
      "  --validate-config",
      "  --print-tools",
      "  --transport stdio|streamable-http",
      "  --port <n>",
      "  --timeout-ms <ms>",
      "  --max-items <n>",
      "",
      "Auth env vars:",
      "  RESOURCE_PAGER_BEARER_TOKEN"
    ].join("\n") + "\n"
  );
}

main().catch((error) => {
  process.stderr.write(`Fatal: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
