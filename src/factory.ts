import { ConfigurationError } from "./errors.js";
import { PagingIterator } from "./iterator.js";
import type { IteratorFactory, IteratorOptions, Operation, PaginatedSequence, PaginationKeys } from "./types.js";

const DEFAULT_KEYS: PaginationKeys = {
  inputToken: undefined,
  outputToken: undefined,
  limitKey: undefined,
  resultKey: undefined,
  moreResults: undefined
};

/**
 * Builds the generic {@link PagingIterator} for every operation registered in
 * `config`. A primary factory, when given, is asked first and wins for every
 * operation it can build, whatever is registered here.
 */
export class PaginationIteratorFactory implements IteratorFactory {
  private readonly config: Map<string, PaginationKeys>;

  constructor(
    config: Record<string, PaginationKeys>,
    private readonly primary?: IteratorFactory
  ) {
    this.config = new Map(Object.entries(config).map(([name, keys]): [string, PaginationKeys] => [name, mergeKeys(keys)]));
  }

  canBuild(operationName: string): boolean {
    return Boolean(this.primary?.canBuild(operationName)) || this.config.has(operationName);
  }

  build(operation: Operation, options: IteratorOptions = {}): PaginatedSequence<unknown> {
    const name = operation.getName();
    const keys = this.config.get(name);
    const merged = mergeOptions(keys, options);

    if (this.primary?.canBuild(name)) {
      return this.primary.build(operation, merged);
    }

    if (!keys) {
      throw new ConfigurationError(`No iterator available for operation ${name}`);
    }

    return new PagingIterator(operation, merged);
  }

  getConfig(operationName: string): PaginationKeys | undefined {
    const keys = this.config.get(operationName);
    return keys ? { ...keys } : undefined;
  }

  operationNames(): string[] {
    return [...this.config.keys()];
  }
}

function mergeKeys(keys: PaginationKeys): PaginationKeys {
  return {
    inputToken: keys.inputToken ?? DEFAULT_KEYS.inputToken,
    outputToken: keys.outputToken ?? DEFAULT_KEYS.outputToken,
    limitKey: keys.limitKey ?? DEFAULT_KEYS.limitKey,
    resultKey: keys.resultKey ?? DEFAULT_KEYS.resultKey,
    moreResults: keys.moreResults ?? DEFAULT_KEYS.moreResults
  };
}

// A key the caller passes wins, even when its value is undefined; omitted keys keep the configured value.
function mergeOptions(keys: PaginationKeys | undefined, options: IteratorOptions): IteratorOptions {
  return {
    ...options,
    inputToken: "inputToken" in options ? options.inputToken : keys?.inputToken,
    outputToken: "outputToken" in options ? options.outputToken : keys?.outputToken,
    limitKey: "limitKey" in options ? options.limitKey : keys?.limitKey,
    resultKey: "resultKey" in options ? options.resultKey : keys?.resultKey,
    moreResults: "moreResults" in options ? options.moreResults : keys?.moreResults
  };
}
