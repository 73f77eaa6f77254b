/**
 * HTTP Metrics Middleware
 *
 * Records request count and latency for every HTTP request.
 * Data is exposed via the `/metrics` Prometheus endpoint.
 */

import type { Request, Response, NextFunction } from 'express';
import { httpRequestsTotal, httpRequestDurationMs } from '../infrastructure/metrics';

export function httpMetricsMiddleware(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();

  res.on('finish', () => {
    const latencyMs = Date.now() - start;
    const labels = {
      method: req.method,
      path: resolveRoutePath(req),
      status: String(res.statusCode),
    };
    httpRequestsTotal.inc(labels);
    httpRequestDurationMs.observe(labels, latencyMs);
  });

  next();
}

/**
 * Route template (`/api/players/:playerId/stats`) rather than the concrete
 * path, to keep label cardinality bounded. Unmatched requests share one label.
 */
function resolveRoutePath(req: Request): string {
  const route: unknown = req.route;
  if (typeof route === 'object' && route !== null && 'path' in route && typeof route.path === 'string') {
    return `${req.baseUrl}${route.path}`;
  }
  return 'unmatched';
}
