export type KeySpec = string | readonly string[];

export interface ResponseDocument {
  /** Value at a dotted path, or `undefined` when nothing is there. */
  getPath(path: string): unknown;
}

export interface Operation {
  getName(): string;
  get(param: string): unknown;
  set(param: string, value: unknown): void;
  /** Appends to a multi-valued option instead of replacing it. */
  add(param: string, value: unknown): void;
  execute(): Promise<ResponseDocument>;
  clone(): Operation;
}

export interface PaginationKeys {
  inputToken?: KeySpec;
  outputToken?: KeySpec;
  limitKey?: string;
  resultKey?: string;
  moreResults?: string;
}

export type ContinuationToken =
  | { kind: "scalar"; value: unknown }
  | { kind: "composite"; parts: unknown[] };

export type LogLevel = "debug" | "info" | "notice" | "warning" | "error";

export interface IteratorHooks {
  onBeforeSend?: (event: { operation: string; request: Operation; token?: ContinuationToken }) => Promise<void> | void;
  onAfterSend?: (event: {
    operation: string;
    result: ResponseDocument;
    items: unknown[];
    token?: ContinuationToken;
  }) => Promise<void> | void;
  onLog?: (entry: { level: LogLevel; data: unknown }) => Promise<void> | void;
}

export interface IteratorOptions extends PaginationKeys {
  /** Total number of items to yield before stopping. */
  limit?: number;
  /** Preferred items per request, reconciled with the request's own limit parameter. */
  pageSize?: number;
  /** Stop after this many consecutive empty pages that still carried a token. Unbounded when unset. */
  maxEmptyPages?: number;
  hooks?: IteratorHooks;
}

export interface PaginatedSequence<T> extends AsyncIterable<T> {
  getLastResult(): ResponseDocument | undefined;
  map<U>(transform: (item: T) => U | Promise<U>): PaginatedSequence<U>;
  filter(predicate: (item: T) => boolean | Promise<boolean>): PaginatedSequence<T>;
  toArray(): Promise<T[]>;
}

export interface IteratorFactory {
  canBuild(operationName: string): boolean;
  build(operation: Operation, options?: IteratorOptions): PaginatedSequence<unknown>;
}

export interface OperationDefinition {
  method: string;
  path: string;
  description?: string;
  params: Record<string, unknown>;
  headers: Record<string, string>;
  pagination: PaginationKeys;
}

export interface PagerConfig {
  baseUrl?: string;
  operations: Record<string, OperationDefinition>;
}

export interface LintDiagnostic {
  level: "error" | "warning";
  code: string;
  message: string;
  location?: string;
}

export interface RuntimeOptions {
  baseUrl: string;
  timeoutMs: number;
  maxItems: number;
}
