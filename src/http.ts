import { HttpStatusError } from "./errors.js";
import { USER_AGENT_OPTION } from "./iterator.js";
import { JsonDocument, isRecord } from "./path.js";
import type { Operation, OperationDefinition, ResponseDocument } from "./types.js";

const BODYLESS_METHODS = new Set(["GET", "HEAD", "DELETE"]);
const BASE_USER_AGENT = "resource-pager/0.1.0";

export interface HttpOperationOptions {
  baseUrl: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface InvocationPlan {
  url: string;
  method: string;
  headers: Record<string, string>;
  body?: string;
}

/**
 * One request of a configured operation, sent with `fetch`. Parameters named in
 * the path template fill it; the rest go to the query string for GET, HEAD and
 * DELETE and to a JSON body otherwise.
 */
export class HttpOperation implements Operation {
  private readonly params: Map<string, unknown>;
  private readonly options: Map<string, unknown[]>;

  constructor(
    private readonly name: string,
    private readonly definition: OperationDefinition,
    private readonly runtime: HttpOperationOptions,
    params?: Map<string, unknown>,
    options?: Map<string, unknown[]>
  ) {
    this.params = new Map<string, unknown>(params ?? Object.entries(definition.params));
    this.options = new Map<string, unknown[]>();
    for (const [key, values] of options ?? []) {
      this.options.set(key, [...values]);
    }
  }

  getName(): string {
    return this.name;
  }

  get(param: string): unknown {
    return this.params.get(param);
  }

  set(param: string, value: unknown): void {
    this.params.set(param, value);
  }

  add(param: string, value: unknown): void {
    const existing = this.options.get(param);
    if (existing) {
      existing.push(value);
    } else {
      this.options.set(param, [value]);
    }
  }

  clone(): HttpOperation {
    return new HttpOperation(this.name, this.definition, this.runtime, this.params, this.options);
  }

  buildInvocationPlan(): InvocationPlan {
    const method = this.definition.method.toUpperCase();
    const remaining = new Map(this.params);
    const url = new URL(buildPath(this.runtime.baseUrl, this.definition.path, remaining));

    const headers: Record<string, string> = {
      accept: "application/json",
      "user-agent": this.userAgent()
    };
    for (const [key, value] of Object.entries(this.definition.headers)) {
      headers[key.toLowerCase()] = value;
    }
    applyAuth(headers);

    if (BODYLESS_METHODS.has(method)) {
      for (const [name, value] of remaining) {
        appendQueryParam(url.searchParams, name, value);
      }
      return { url: url.toString(), method, headers };
    }

    headers["content-type"] = "application/json";
    const body: Record<string, unknown> = {};
    for (const [name, value] of remaining) {
      if (value !== undefined) {
        body[name] = value;
      }
    }
    return { url: url.toString(), method, headers, body: JSON.stringify(body) };
  }

  async execute(): Promise<ResponseDocument> {
    const plan = this.buildInvocationPlan();
    throwIfAborted(this.runtime.signal);

    const timeoutController = new AbortController();
    const { signal, release } = mergeAbortSignals(this.runtime.signal, timeoutController.signal);
    const timer = setTimeout(() => timeoutController.abort(), this.runtime.timeoutMs);

    try {
      const response = await fetch(plan.url, {
        method: plan.method,
        headers: plan.headers,
        body: plan.body,
        signal
      });
      const body = await parseResponseBody(response);

      if (response.status >= 400) {
        throw new HttpStatusError(this.name, response.status, response.statusText, body);
      }

      return new JsonDocument(body);
    } catch (error) {
      if (isAbortError(error)) {
        throw new Error(
          this.runtime.signal?.aborted ? "Request cancelled by client" : `Request timed out after ${this.runtime.timeoutMs}ms`
        );
      }
      throw error;
    } finally {
      clearTimeout(timer);
      release();
    }
  }

  private userAgent(): string {
    const suffixes = new Set((this.options.get(USER_AGENT_OPTION) ?? []).map((value) => String(value)));
    return [BASE_USER_AGENT, ...suffixes].join(" ");
  }
}

function buildPath(baseUrl: string, pathTemplate: string, params: Map<string, unknown>): string {
  const renderedPath = pathTemplate.replaceAll(/\{([^}]+)\}/g, (_full, name: string) => {
    const value = params.get(name);
    if (value === undefined || value === null) {
      throw new Error(`Missing required path parameter: ${name}`);
    }

    params.delete(name);
    return encodeURIComponent(String(value));
  });

  return baseUrl.endsWith("/") ? `${baseUrl.slice(0, -1)}${renderedPath}` : `${baseUrl}${renderedPath}`;
}

function appendQueryParam(searchParams: URLSearchParams, name: string, value: unknown): void {
  if (value === undefined || value === null) {
    return;
  }

  if (Array.isArray(value)) {
    for (const item of value) {
      appendQueryParam(searchParams, name, item);
    }
    return;
  }

  if (isRecord(value)) {
    for (const [key, item] of Object.entries(value)) {
      searchParams.append(`${name}[${key}]`, String(item));
    }
    return;
  }

  searchParams.append(name, String(value));
}

function applyAuth(headers: Record<string, string>): void {
  const token = process.env.RESOURCE_PAGER_BEARER_TOKEN;
  if (token && !headers.authorization) {
    headers.authorization = `Bearer ${token}`;
  }
}

async function parseResponseBody(response: Response): Promise<unknown> {
  const contentType = response.headers.get("content-type") ?? "";

  if (contentType.includes("application/json") || contentType.includes("+json")) {
    return response.json();
  }

  return { body: await response.text() };
}

/** `release` detaches both listeners once the request settles. */
function mergeAbortSignals(a?: AbortSignal, b?: AbortSignal): { signal?: AbortSignal; release: () => void } {
  if (!a || !b) {
    return { signal: a ?? b, release: () => undefined };
  }

  const controller = new AbortController();
  const onAbort = () => controller.abort();

  a.addEventListener("abort", onAbort, { once: true });
  b.addEventListener("abort", onAbort, { once: true });

  if (a.aborted || b.aborted) {
    controller.abort();
  }

  return {
    signal: controller.signal,
    release: () => {
      a.removeEventListener("abort", onAbort);
      b.removeEventListener("abort", onAbort);
    }
  };
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new Error("Request cancelled by client");
  }
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}
