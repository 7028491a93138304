export { PagingIterator, combineHooks, isTokenPresent, ITERATOR_USER_AGENT, USER_AGENT_OPTION } from "./iterator.js";
export { PaginationIteratorFactory } from "./factory.js";
export { ConfigurationError, HttpStatusError, PaginationError, TokenShapeError } from "./errors.js";
export type { PaginationErrorCode } from "./errors.js";
export { JsonDocument, readPath } from "./path.js";
export { HttpOperation } from "./http.js";
export type { HttpOperationOptions, InvocationPlan } from "./http.js";
export { loadPagerConfig, parsePagerConfig, paginationKeysByOperation, pagerConfigSchema } from "./config.js";
export type { LoadedConfig } from "./config.js";
export { lintPagerConfig } from "./lint.js";
export { createMcpServer, createPagerState } from "./mcp.js";
export type { PagerState } from "./mcp.js";
export { createHttpApp } from "./web.js";
export { metrics, metricsHooks, renderPrometheus, resetMetrics } from "./metrics.js";
export type * from "./types.js";
