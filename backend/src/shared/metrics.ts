/**
 * shared/metrics.ts — Prometheus metrics via prom-client
 *
 * Exposes: /api/metrics
 *
 * Metrics:
 *   http_requests_total            — Counter by method/route/status
 *   http_request_duration_seconds  — Histogram by method/route/status
 *   dataset_listings               — Gauge: listings in the working dataset
 *   dataset_rejected_total         — Counter: raw rows dropped by cleaning
 *   pipeline_runs_total            — Counter by stage (filter/aggregate/compare)
 *   comparison_rejections_total    — Counter: comparisons with ≠ 2 cities
 *   cache_operations_total         — Counter by operation (hit/miss/set)
 */
import { Registry, Counter, Histogram, Gauge, collectDefaultMetrics } from 'prom-client';
import type { Request, Response, NextFunction } from 'express';

export const registry = new Registry();

collectDefaultMetrics({ register: registry, prefix: 'housing_' });

// ── HTTP Metrics ──

export const httpRequestsTotal = new Counter({
  name: 'housing_http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'route', 'status_code'] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: 'housing_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5],
  registers: [registry],
});

// ── Dataset / pipeline ──

export const datasetListings = new Gauge({
  name: 'housing_dataset_listings',
  help: 'Listings in the working dataset',
  registers: [registry],
});

export const datasetRejected = new Counter({
  name: 'housing_dataset_rejected_total',
  help: 'Raw rows dropped during cleaning',
  registers: [registry],
});

export const pipelineRuns = new Counter({
  name: 'housing_pipeline_runs_total',
  help: 'Pipeline recomputations by stage',
  labelNames: ['stage'] as const, // filter, aggregate, compare
  registers: [registry],
});

export const comparisonRejections = new Counter({
  name: 'housing_comparison_rejections_total',
  help: 'Comparison requests without exactly two cities',
  registers: [registry],
});

export const cacheOperations = new Counter({
  name: 'housing_cache_operations_total',
  help: 'Cache operations by type',
  labelNames: ['operation'] as const, // hit, miss, set
  registers: [registry],
});

// ── Express Middleware ──

function routeLabel(req: Request): string {
  const url = req.originalUrl || req.url;
  return url.split('?')[0] ?? url;
}

/**
 * Metrics collection middleware. Place early in the middleware chain.
 */
export function metricsMiddleware() {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (req.path.endsWith('/metrics')) return next();

    const end = httpRequestDuration.startTimer();
    res.on('finish', () => {
      const labels = { method: req.method, route: routeLabel(req), status_code: String(res.statusCode) };
      end(labels);
      httpRequestsTotal.inc(labels);
    });

    next();
  };
}

/**
 * Metrics endpoint handler. Returns Prometheus text format.
 */
export async function metricsEndpoint(_req: Request, res: Response): Promise<void> {
  try {
    res.set('Content-Type', registry.contentType);
    res.end(await registry.metrics());
  } catch {
    res.status(500).end('Error collecting metrics');
  }
}
