/**
 * Global Error Handler Middleware
 *
 * Provides centralized error handling for all Express routes.
 * AppError subclasses carry their own status and code; anything else is a 500.
 */

import type { Request, Response, NextFunction } from 'express';
import { env } from '../config/env';
import { createLogger } from '../utils/logger';
import { generateRequestId, runWithContext } from '../utils/requestContext';
import { AppError } from '../errors';

const logger = createLogger('errorHandler');

export const REQUEST_ID_HEADER = 'X-Request-ID';

// ─────────────────────────────────────────────────────────────────────────────
// Request ID Middleware
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Attach a request ID to each request and run the rest of the chain inside
 * its request context, so log lines carry it.
 * Uses an incoming X-Request-ID header when present.
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const existingId = req.headers['x-request-id'];
  const requestId = typeof existingId === 'string' && existingId.trim()
    ? existingId.trim()
    : generateRequestId();

  req.requestId = requestId;
  res.setHeader(REQUEST_ID_HEADER, requestId);
  runWithContext({ requestId }, () => next());
}

/**
 * Helper to get request ID from request object.
 */
export function getRequestId(req: Request): string {
  return req.requestId ?? 'unknown';
}

// ─────────────────────────────────────────────────────────────────────────────
// Async Handler Wrapper
// ─────────────────────────────────────────────────────────────────────────────

type AsyncRequestHandler = (
  req: Request,
  res: Response,
  next: NextFunction,
) => Promise<void> | void;

/**
 * Wraps async route handlers to automatically catch errors
 * and forward them to the error handler middleware.
 *
 * @example
 * router.get('/players/:playerId/stats', asyncHandler(async (req, res) => {
 *   const stats = await store.getAggregate('passing', req.params.playerId);
 *   if (!stats) throw AppError.notFound('Player not found');
 *   res.json(stats);
 * }));
 */
export function asyncHandler(fn: AsyncRequestHandler): (req: Request, res: Response, next: NextFunction) => void {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Response Format
// ─────────────────────────────────────────────────────────────────────────────

export interface ErrorResponse {
  error: string;
  code?: string;
  requestId: string;
  details?: unknown;
}

function buildErrorResponse(
  err: Error,
  requestId: string,
  isProduction: boolean,
): { statusCode: number; body: ErrorResponse } {
  if (err instanceof AppError) {
    // Client errors always explain themselves; server error details stay out of production
    const includeDetails = err.statusCode < 500 || !isProduction;
    return {
      statusCode: err.statusCode,
      body: {
        error: err.message,
        code: err.code,
        requestId,
        ...(includeDetails && err.details !== undefined ? { details: err.details } : {}),
      },
    };
  }

  // Schema failures that escaped a route's own validation
  if (err.name === 'ZodError') {
    return {
      statusCode: 400,
      body: {
        error: 'Validation failed',
        code: 'VALIDATION_ERROR',
        requestId,
        ...(!isProduction ? { details: err.message } : {}),
      },
    };
  }

  // express.json() rejects malformed bodies with a status-carrying error
  if (err.name === 'SyntaxError' && 'status' in err && err.status === 400) {
    return {
      statusCode: 400,
      body: { error: 'Malformed JSON body', code: 'BAD_REQUEST', requestId },
    };
  }

  return {
    statusCode: 500,
    body: {
      error: 'Internal server error',
      code: 'INTERNAL_ERROR',
      requestId,
    },
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Handler Middleware
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Global error handler middleware.
 * Must be registered after all routes.
 *
 * @example
 * app.use('/api', apiRouter);
 * app.use(errorHandler); // Must be last
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  const requestId = getRequestId(req);
  const isProduction = env.NODE_ENV === 'production';

  const { statusCode, body } = buildErrorResponse(err, requestId, isProduction);

  const logPayload = {
    requestId,
    method: req.method,
    path: req.path,
    statusCode,
    error: err.message,
    ...(err instanceof AppError ? { code: err.code } : {}),
    ...(!isProduction ? { stack: err.stack } : {}),
  };

  if (statusCode >= 500) {
    logger.error(logPayload, 'Request failed with server error');
  } else {
    logger.warn(logPayload, 'Request failed with client error');
  }

  res.setHeader(REQUEST_ID_HEADER, requestId);
  res.status(statusCode).json(body);
}

// ─────────────────────────────────────────────────────────────────────────────
// 404 Handler
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Handler for routes that don't match any defined endpoints.
 * Should be registered after all routes but before errorHandler.
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(AppError.notFound(`Cannot ${req.method} ${req.path}`));
}
