import { Counter, Gauge, Histogram, collectDefaultMetrics, register } from 'prom-client';

export const METRIC_PREFIX = 'counter_';

/**
 * Owns the process-wide default metrics collection. `collectDefaultMetrics`
 * registers its gauges on the global registry, so it may run only once per
 * process no matter how many servers are built.
 */
export class DefaultMetricsLifecycle {
  private initialized = false;

  init(): boolean {
    if (this.initialized) {
      return false;
    }

    collectDefaultMetrics({ prefix: METRIC_PREFIX });
    this.initialized = true;
    return true;
  }

  isInitialized(): boolean {
    return this.initialized;
  }
}

export const defaultMetrics = new DefaultMetricsLifecycle();

export const httpRequestsTotal = new Counter({
  name: 'counter_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'endpoint', 'status_code'],
});

export const httpRequestDuration = new Histogram({
  name: 'counter_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'endpoint'],
  buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2],
});

export const cacheOperationsTotal = new Counter({
  name: 'counter_cache_operations_total',
  help: 'Total number of cache operations',
  labelNames: ['operation'],
});

export const cacheSize = new Gauge({
  name: 'counter_cache_size',
  help: 'Current number of items in cache',
});

export const extractionsTotal = new Counter({
  name: 'counter_extractions_total',
  help: 'Total number of stats extractions by deciding strategy',
  labelNames: ['strategy', 'success'],
});

export const cacheInvalidationsTotal = new Counter({
  name: 'counter_cache_invalidations_total',
  help: 'Total number of bulk cache invalidations',
  labelNames: ['reason'],
});

export type CacheOperation = 'hit' | 'miss' | 'set' | 'set_failure' | 'evict_corrupt' | 'clear';

export function trackHttpRequest(
  method: string,
  endpoint: string,
  statusCode: number,
  durationMs: number
): void {
  httpRequestsTotal.inc({ method, endpoint, status_code: statusCode.toString() });
  httpRequestDuration.observe({ method, endpoint }, durationMs / 1000);
}

export function trackCacheOperation(operation: CacheOperation): void {
  cacheOperationsTotal.inc({ operation });
}

export function updateCacheSize(size: number): void {
  cacheSize.set(size);
}

export function trackExtraction(strategy: string, success: boolean): void {
  extractionsTotal.inc({ strategy, success: success.toString() });
}

export function trackCacheInvalidation(reason: string): void {
  cacheInvalidationsTotal.inc({ reason });
}

export { register };
