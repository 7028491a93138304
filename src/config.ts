import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { lintPagerConfig } from "./lint.js";
import type { LintDiagnostic, PagerConfig, PaginationKeys } from "./types.js";

const keySpecSchema = z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]);

const paginationSchema = z
  .object({
    inputToken: keySpecSchema.optional(),
    outputToken: keySpecSchema.optional(),
    limitKey: z.string().min(1).optional(),
    resultKey: z.string().min(1).optional(),
    moreResults: z.string().min(1).optional()
  })
  .strict();

const operationSchema = z
  .object({
    method: z.string().regex(/^[A-Za-z]+$/).default("GET"),
    path: z.string().startsWith("/"),
    description: z.string().optional(),
    params: z.record(z.unknown()).default({}),
    headers: z.record(z.string()).default({}),
    pagination: paginationSchema
  })
  .strict();

export const pagerConfigSchema = z
  .object({
    baseUrl: z.string().url().optional(),
    operations: z.record(operationSchema)
  })
  .strict();

export interface LoadedConfig {
  config: PagerConfig;
  warnings: LintDiagnostic[];
}

export async function loadPagerConfig(configPath: string): Promise<LoadedConfig> {
  const absPath = resolve(configPath);
  const raw = await readFile(absPath, "utf8");
  return parsePagerConfig(parseByExtension(absPath, raw), absPath);
}

/**
 * Validates a decoded configuration document, then lints it. Lint errors are
 * fatal; warnings are handed back to the caller.
 */
export function parsePagerConfig(doc: unknown, source = "<inline>"): LoadedConfig {
  const parsed = pagerConfigSchema.safeParse(doc);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `- ${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new ConfigurationError(`Invalid pager config in ${source}:\n${issues.join("\n")}`);
  }

  const config: PagerConfig = parsed.data;
  const diagnostics = lintPagerConfig(config);
  const errors = diagnostics.filter((d) => d.level === "error");
  if (errors.length > 0) {
    throw new ConfigurationError(`Pager config lint failed in ${source}:\n${errors.map(formatDiagnostic).join("\n")}`);
  }

  return { config, warnings: diagnostics.filter((d) => d.level === "warning") };
}

export function paginationKeysByOperation(config: PagerConfig): Record<string, PaginationKeys> {
  return Object.fromEntries(
    Object.entries(config.operations).map(([name, operation]): [string, PaginationKeys] => [name, operation.pagination])
  );
}

export function formatDiagnostic(d: LintDiagnostic): string {
  return `- [${d.code}] ${d.message}${d.location ? ` (${d.location})` : ""}`;
}

function parseByExtension(path: string, raw: string): unknown {
  if (path.endsWith(".yaml") || path.endsWith(".yml")) {
    return yaml.load(raw);
  }

  if (path.endsWith(".json")) {
    return JSON.parse(raw);
  }

  try {
    return JSON.parse(raw);
  } catch {
    return yaml.load(raw);
  }
}
