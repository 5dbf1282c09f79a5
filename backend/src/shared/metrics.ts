/**
 * shared/metrics.ts — Prometheus metrics via prom-client
 *
 * Exposes: /api/metrics
 *
 * Metrics:
 *   territory_http_requests_total           — Counter by method/route/status
 *   territory_http_request_duration_seconds — Histogram by method/route/status
 *   territory_cache_operations_total        — Counter by operation (hit/miss/coalesced)
 *   territory_load_duration_seconds         — Histogram for store loads
 *   territory_loads_total                   — Counter by outcome
 *   territory_loaded_properties             — Gauge for the cached table size
 */
import {
  Registry, Counter, Histogram, Gauge,
  collectDefaultMetrics,
} from 'prom-client';
import type { Request, Response, NextFunction } from 'express';

export const registry = new Registry();

collectDefaultMetrics({ register: registry, prefix: 'territory_' });

// ── HTTP Metrics ──

export const httpRequestsTotal = new Counter({
  name: 'territory_http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'route', 'status_code'] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: 'territory_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [registry],
});

// ── Cache Metrics ──

export const cacheOperations = new Counter({
  name: 'territory_cache_operations_total',
  help: 'Property cache operations by type',
  labelNames: ['operation'] as const, // hit, miss, coalesced, invalidate
  registers: [registry],
});

// ── Loader Metrics ──

export const loadDuration = new Histogram({
  name: 'territory_load_duration_seconds',
  help: 'Property table load duration in seconds',
  labelNames: ['status'] as const,
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
  registers: [registry],
});

export const loadsTotal = new Counter({
  name: 'territory_loads_total',
  help: 'Property table loads by outcome',
  labelNames: ['status'] as const, // success, no_data, error
  registers: [registry],
});

export const loadedProperties = new Gauge({
  name: 'territory_loaded_properties',
  help: 'Number of records in the cached property table',
  registers: [registry],
});

// ── Express Middleware ──

/**
 * Route label for metrics: the matched route pattern when there is one,
 * otherwise the path without its query string.
 */
function normalizeRoute(req: Request): string {
  const routePath: unknown = req.route?.path;
  if (typeof routePath === 'string') return `${req.baseUrl}${routePath}`;
  return (req.originalUrl || req.url).split('?')[0] ?? '';
}

/**
 * Metrics collection middleware. Place early in the middleware chain.
 */
export function metricsMiddleware() {
  return (req: Request, res: Response, next: NextFunction) => {
    if (req.url.endsWith('/metrics')) return next();

    const end = httpRequestDuration.startTimer();
    res.on('finish', () => {
      const labels = { method: req.method, route: normalizeRoute(req), status_code: String(res.statusCode) };
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
