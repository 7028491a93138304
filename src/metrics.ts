import { isTokenPresent } from "./iterator.js";
import type { IteratorHooks } from "./types.js";

export interface MetricsState {
  iterationsTotal: number;
  iterationsFailed: number;
  pagesFetchedTotal: number;
  itemsFetchedTotal: number;
  emptyPageRetriesTotal: number;
  iterationLatencyMsTotal: number;
  pagesByOperation: Record<string, number>;
  latencyBuckets: Record<string, number>;
}

export const metrics: MetricsState = createMetricsState();

function createMetricsState(): MetricsState {
  return {
    iterationsTotal: 0,
    iterationsFailed: 0,
    pagesFetchedTotal: 0,
    itemsFetchedTotal: 0,
    emptyPageRetriesTotal: 0,
    iterationLatencyMsTotal: 0,
    pagesByOperation: {},
    latencyBuckets: {
      le_100: 0,
      le_500: 0,
      le_1000: 0,
      le_5000: 0,
      le_inf: 0
    }
  };
}

export function resetMetrics(): void {
  Object.assign(metrics, createMetricsState());
}

/** Iterator hooks that count pages, items and empty-page retries. */
export function metricsHooks(): IteratorHooks {
  return {
    onAfterSend: ({ operation, items, token }) => {
      metrics.pagesFetchedTotal += 1;
      metrics.itemsFetchedTotal += items.length;
      metrics.pagesByOperation[operation] = (metrics.pagesByOperation[operation] ?? 0) + 1;
      if (items.length === 0 && isTokenPresent(token)) {
        metrics.emptyPageRetriesTotal += 1;
      }
    }
  };
}

export function observeLatency(ms: number): void {
  metrics.iterationLatencyMsTotal += ms;
  if (ms <= 100) metrics.latencyBuckets.le_100 += 1;
  if (ms <= 500) metrics.latencyBuckets.le_500 += 1;
  if (ms <= 1000) metrics.latencyBuckets.le_1000 += 1;
  if (ms <= 5000) metrics.latencyBuckets.le_5000 += 1;
  metrics.latencyBuckets.le_inf += 1;
}

export function renderPrometheus(): string {
  return [
    "# TYPE resource_pager_iterations_total counter",
    `resource_pager_iterations_total ${metrics.iterationsTotal}`,
    "# TYPE resource_pager_iterations_failed_total counter",
    `resource_pager_iterations_failed_total ${metrics.iterationsFailed}`,
    "# TYPE resource_pager_pages_fetched_total counter",
    `resource_pager_pages_fetched_total ${metrics.pagesFetchedTotal}`,
    "# TYPE resource_pager_items_fetched_total counter",
    `resource_pager_items_fetched_total ${metrics.itemsFetchedTotal}`,
    "# TYPE resource_pager_empty_page_retries_total counter",
    `resource_pager_empty_page_retries_total ${metrics.emptyPageRetriesTotal}`,
    "# TYPE resource_pager_iteration_latency_ms histogram",
    `resource_pager_iteration_latency_ms_bucket{le="100"} ${metrics.latencyBuckets.le_100}`,
    `resource_pager_iteration_latency_ms_bucket{le="500"} ${metrics.latencyBuckets.le_500}`,
    `resource_pager_iteration_latency_ms_bucket{le="1000"} ${metrics.latencyBuckets.le_1000}`,
    `resource_pager_iteration_latency_ms_bucket{le="5000"} ${metrics.latencyBuckets.le_5000}`,
    `resource_pager_iteration_latency_ms_bucket{le="+Inf"} ${metrics.latencyBuckets.le_inf}`,
    `resource_pager_iteration_latency_ms_sum ${metrics.iterationLatencyMsTotal}`,
    `resource_pager_iteration_latency_ms_count ${metrics.latencyBuckets.le_inf}`,
    "# TYPE resource_pager_pages_by_operation_total counter",
    ...Object.entries(metrics.pagesByOperation).map(
      ([operation, count]) => `resource_pager_pages_by_operation_total{operation="${operation}"} ${count}`
    )
  ].join("\n") + "\n";
}
