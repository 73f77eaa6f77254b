/**
 * Request Validation Middleware
 *
 * Express middleware that validates `req.params` or `req.query` against
 * Zod schemas and answers 400 on failure. Handlers read typed values with
 * `parseRequest`, which cannot fail once the guard has passed.
 *
 * @example
 * router.get('/leaderboards/:category', validateParams(categoryParams), validateQuery(limitQuery), handler);
 */

import type { Request, Response, NextFunction } from 'express';
import type { ZodType, ZodError } from 'zod';
import { ValidationError } from '../errors';

type RequestPart = 'params' | 'query';

const FAILURE_MESSAGES: Record<RequestPart, string> = {
  params: 'Invalid path parameters',
  query: 'Invalid query parameters',
};

/**
 * Format Zod issues into a flat, human-readable array.
 */
export function formatZodErrors(error: ZodError): { field: string; message: string }[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.') || '(root)',
    message: issue.message,
  }));
}

function validate<T>(part: RequestPart, schema: ZodType<T>) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req[part]);
    if (!result.success) {
      res.status(400).json({
        error: FAILURE_MESSAGES[part],
        code: 'VALIDATION_ERROR',
        requestId: req.requestId,
        details: formatZodErrors(result.error),
      });
      return;
    }
    next();
  };
}

/** Validate `req.params`. */
export function validateParams<T>(schema: ZodType<T>) {
  return validate('params', schema);
}

/** Validate `req.query`. */
export function validateQuery<T>(schema: ZodType<T>) {
  return validate('query', schema);
}

/**
 * Typed read of a request part inside a handler.
 *
 * @throws ValidationError when the value does not match
 */
export function parseRequest<T>(schema: ZodType<T>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const details = formatZodErrors(result.error);
    throw new ValidationError(details[0]?.message ?? 'Validation failed', details);
  }
  return result.data;
}
