/**
 * Express application factory. Collaborators are passed in so the server
 * entry point and the tests wire the same app over different backends.
 */

import express from 'express';
import cors, { type CorsOptions } from 'cors';
import { createApiRouter, type ApiDependencies } from './routes/api';
import { errorHandler, notFoundHandler, requestIdMiddleware } from './middleware/errorHandler';
import { httpMetricsMiddleware } from './middleware/httpMetrics';
import { renderMetrics } from './infrastructure/metrics';

export interface AppOptions extends ApiDependencies {
  corsAllowedOrigins?: string;
}

export function createApp(options: AppOptions): express.Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(requestIdMiddleware);
  app.use(httpMetricsMiddleware);
  app.use(cors(buildCorsOptions(options.corsAllowedOrigins)));
  app.use(express.json({ limit: '16kb' }));

  app.get('/metrics', (_req, res) => {
    res.type('text/plain; version=0.0.4').send(renderMetrics());
  });

  app.use('/api', createApiRouter(options));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

export function buildCorsOptions(raw: string | undefined): CorsOptions {
  const allowedOrigins = resolveAllowedOrigins(raw);
  const allowAll = allowedOrigins.has('*');

  return {
    origin(origin, callback) {
      if (!origin) {
        callback(null, true);
        return;
      }
      if (allowAll || allowedOrigins.has(origin)) {
        callback(null, true);
        return;
      }
      callback(null, false);
    },
    credentials: true,
  };
}

function resolveAllowedOrigins(raw: string | undefined): Set<string> {
  if (raw && raw.trim().length) {
    return new Set(
      raw
        .split(',')
        .map((value) => value.trim())
        .filter((value) => value.length > 0),
    );
  }
  return new Set(['http://localhost:5173', 'http://127.0.0.1:5173']);
}
