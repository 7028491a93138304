import type { ZodType, ZodTypeDef } from "zod";
import { TokenShapeError } from "./errors.js";
import type {
  ContinuationToken,
  IteratorHooks,
  IteratorOptions,
  LogLevel,
  Operation,
  PaginatedSequence,
  ResponseDocument
} from "./types.js";

export const USER_AGENT_OPTION = "ua.append";
export const ITERATOR_USER_AGENT = "paging-iterator";

export function isTokenPresent(token: ContinuationToken | undefined): token is ContinuationToken {
  if (!token) {
    return false;
  }

  return token.kind === "scalar" ? isPresentPart(token.value) : token.parts.some(isPresentPart);
}

/** Runs each hook of every set in order. */
export function combineHooks(...sets: IteratorHooks[]): IteratorHooks {
  return {
    onBeforeSend: async (event) => {
      for (const hooks of sets) await hooks.onBeforeSend?.(event);
    },
    onAfterSend: async (event) => {
      for (const hooks of sets) await hooks.onAfterSend?.(event);
    },
    onLog: async (entry) => {
      for (const hooks of sets) await hooks.onLog?.(entry);
    }
  };
}

function isPresentPart(value: unknown): boolean {
  return value !== undefined && value !== null && value !== false && value !== "";
}

const FALSE_FLAG_STRINGS = new Set(["false", "0"]);

/** Truthiness, except that the strings "false" and "0" also read as false. */
function isTruthyFlag(value: unknown): boolean {
  return typeof value === "string" ? value !== "" && !FALSE_FLAG_STRINGS.has(value.trim().toLowerCase()) : Boolean(value);
}

function toPositiveNumber(value: unknown): number | undefined {
  const parsed = typeof value === "string" && value.trim() ? Number(value) : value;
  return typeof parsed === "number" && Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

abstract class ItemSequence<T> implements PaginatedSequence<T> {
  abstract [Symbol.asyncIterator](): AsyncIterator<T>;

  abstract getLastResult(): ResponseDocument | undefined;

  map<U>(transform: (item: T) => U | Promise<U>): ItemSequence<U> {
    return new DerivedSequence<T, U>(this, async function* (source) {
      for await (const item of source) {
        yield await transform(item);
      }
    });
  }

  filter(predicate: (item: T) => boolean | Promise<boolean>): ItemSequence<T> {
    return new DerivedSequence<T, T>(this, async function* (source) {
      for await (const item of source) {
        if (await predicate(item)) {
          yield item;
        }
      }
    });
  }

  /** Validates every item against a zod schema; the first invalid item rejects the pull. */
  parse<U>(schema: ZodType<U, ZodTypeDef, unknown>): ItemSequence<U> {
    return this.map((item) => schema.parse(item));
  }

  async toArray(): Promise<T[]> {
    const out: T[] = [];
    for await (const item of this) {
      out.push(item);
    }
    return out;
  }
}

class DerivedSequence<S, T> extends ItemSequence<T> {
  constructor(
    private readonly source: ItemSequence<S>,
    private readonly pipe: (source: AsyncIterable<S>) => AsyncGenerator<T>
  ) {
    super();
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return this.pipe(this.source);
  }

  getLastResult(): ResponseDocument | undefined {
    return this.source.getLastResult();
  }
}

/**
 * Walks a paged list operation. Each pull past the end of the current page
 * executes the working request with the continuation token read from the
 * previous response, until a response carries no token.
 *
 * A page that comes back empty while still carrying a token is not surfaced:
 * the working request is recloned from the template and sent again with that
 * token. This repeats for as long as the backend keeps answering that way,
 * unless `maxEmptyPages` is set.
 *
 * The sequence is single pass; build a new iterator to walk the list again.
 */
export class PagingIterator extends ItemSequence<unknown> {
  private readonly template: Operation;
  private request: Operation;
  private readonly options: IteratorOptions;
  private nextToken: ContinuationToken | undefined;
  private lastResult: ResponseDocument | undefined;
  private requestCount = 0;
  private position = 0;
  private limit: number | undefined;
  private pageSize: number | undefined;
  private generator: AsyncGenerator<unknown> | undefined;

  constructor(operation: Operation, options: IteratorOptions = {}) {
    super();
    this.template = operation.clone();
    this.request = this.template.clone();
    this.options = { ...options };
    this.limit = options.limit;
    this.pageSize = options.pageSize;
  }

  [Symbol.asyncIterator](): AsyncIterator<unknown> {
    this.generator ??= this.walk();
    return this.generator;
  }

  getLastResult(): ResponseDocument | undefined {
    return this.lastResult;
  }

  getNextToken(): ContinuationToken | undefined {
    return this.nextToken;
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  /** Number of items yielded so far. */
  getPosition(): number {
    return this.position;
  }

  setLimit(limit: number | undefined): this {
    this.limit = limit;
    return this;
  }

  setPageSize(pageSize: number | undefined): this {
    this.pageSize = pageSize;
    return this;
  }

  private async *walk(): AsyncGenerator<unknown> {
    do {
      if (this.limitReached()) {
        return;
      }

      const items = await this.sendRequest();
      for (const item of items) {
        if (this.limitReached()) {
          return;
        }
        this.position += 1;
        yield item;
      }
    } while (isTokenPresent(this.nextToken));
  }

  private limitReached(): boolean {
    return this.limit !== undefined && this.limit > 0 && this.position >= this.limit;
  }

  private async sendRequest(): Promise<unknown[]> {
    const operation = this.request.getName();
    const hooks = this.options.hooks ?? {};
    let emptyPages = 0;

    for (;;) {
      this.prepareRequest();
      const token = isTokenPresent(this.nextToken) ? this.nextToken : undefined;
      if (token) {
        this.applyNextToken(token);
      }

      this.request.add(USER_AGENT_OPTION, ITERATOR_USER_AGENT);
      await hooks.onBeforeSend?.({ operation, request: this.request, token });

      this.requestCount += 1;
      const result = await this.request.execute();
      this.lastResult = result;
      const items = this.handleResults(result);
      this.determineNextToken(result);

      await hooks.onAfterSend?.({ operation, result, items, token: this.nextToken });
      await this.log("debug", {
        event: "page_fetched",
        operation,
        request: this.requestCount,
        items: items.length,
        hasMore: isTokenPresent(this.nextToken)
      });

      if (items.length > 0 || !isTokenPresent(this.nextToken)) {
        return items;
      }

      emptyPages += 1;
      if (this.options.maxEmptyPages !== undefined && emptyPages >= this.options.maxEmptyPages) {
        await this.log("warning", { event: "empty_page_limit", operation, emptyPages });
        this.nextToken = undefined;
        return [];
      }

      await this.log("notice", { event: "empty_page_retry", operation, emptyPages });
      this.request = this.template.clone();
    }
  }

  private prepareRequest(): void {
    const limitKey = this.options.limitKey;
    if (!limitKey) {
      return;
    }

    const requested = toPositiveNumber(this.request.get(limitKey));
    const pageSize = this.calculatePageSize();
    if (requested !== undefined && pageSize !== undefined && pageSize > 0) {
      this.request.set(limitKey, Math.min(requested, pageSize));
    }
  }

  private calculatePageSize(): number | undefined {
    if (this.pageSize === undefined) {
      return undefined;
    }

    if (this.limit !== undefined && this.limit > 0 && this.position + this.pageSize > this.limit) {
      return this.limit - this.position;
    }

    return this.pageSize;
  }

  private handleResults(result: ResponseDocument): unknown[] {
    const resultKey = this.options.resultKey;
    if (!resultKey) {
      return [];
    }

    const value = result.getPath(resultKey);
    if (value === undefined || value === null) {
      return [];
    }

    return Array.isArray(value) ? value : [value];
  }

  private applyNextToken(token: ContinuationToken): void {
    const tokenParam = this.options.inputToken;
    if (tokenParam === undefined) {
      return;
    }

    if (typeof tokenParam === "string") {
      this.request.set(tokenParam, token.kind === "scalar" ? token.value : token.parts);
      return;
    }

    if (token.kind !== "composite" || token.parts.length !== tokenParam.length) {
      throw new TokenShapeError();
    }

    const parts = token.parts;
    tokenParam.forEach((param, index) => {
      this.request.set(param, parts[index]);
    });
  }

  private determineNextToken(result: ResponseDocument): void {
    this.nextToken = undefined;

    const { moreResults, outputToken } = this.options;
    if (moreResults !== undefined && !isTruthyFlag(result.getPath(moreResults))) {
      return;
    }

    if (outputToken === undefined) {
      return;
    }

    this.nextToken =
      typeof outputToken === "string"
        ? { kind: "scalar", value: result.getPath(outputToken) ?? null }
        : { kind: "composite", parts: outputToken.map((key) => result.getPath(key) ?? null) };
  }

  private async log(level: LogLevel, data: Record<string, unknown>): Promise<void> {
    if (this.options.hooks?.onLog) {
      await this.options.hooks.onLog({ level, data });
    }
  }
}
