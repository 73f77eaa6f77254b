/**
 * Season stats error taxonomy.
 *
 * Each class pins a status code and machine code on top of AppError so the
 * HTTP layer can render them without knowing about compilation internals.
 */

import { AppError } from './AppError';
import type { StatCategory } from '../types/stats';
import type { CompilationSummary } from '../types/compilation';

/**
 * Invalid compilation parameters. Raised before any I/O.
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

/**
 * Game discovery or payload retrieval failed for one week or game.
 */
export class SourceFetchError extends AppError {
  constructor(
    message: string,
    public readonly url?: string,
    public readonly status?: number,
  ) {
    super(message, 502, 'SOURCE_FETCH_FAILED', { url, status });
    this.name = 'SourceFetchError';
  }
}

/**
 * A single stat token could not be read as a number.
 */
export class MalformedStatError extends AppError {
  constructor(public readonly token: unknown) {
    super(`Malformed stat token: ${String(token)}`, 422, 'MALFORMED_STAT');
    this.name = 'MalformedStatError';
  }
}

export interface PersistenceErrorContext {
  category?: StatCategory;
  operation: string;
  cause?: unknown;
}

/**
 * The stats store failed. The failing batch was not committed; earlier
 * batches stay. `progress` is attached when a compilation run aborts on it.
 */
export class PersistenceError extends AppError {
  public readonly category?: StatCategory;
  public readonly operation: string;
  public readonly progress?: CompilationSummary;

  constructor(message: string, context: PersistenceErrorContext, progress?: CompilationSummary) {
    super(message, 500, 'PERSISTENCE_ERROR', { category: context.category, operation: context.operation });
    this.name = 'PersistenceError';
    this.category = context.category;
    this.operation = context.operation;
    this.progress = progress;
    if (context.cause !== undefined) {
      this.cause = context.cause;
    }
  }

  /**
   * Copy of this error carrying the partial summary of the aborted run.
   */
  withProgress(progress: CompilationSummary): PersistenceError {
    return new PersistenceError(
      this.message,
      { category: this.category, operation: this.operation, cause: this.cause },
      progress,
    );
  }
}

/**
 * Another compilation run currently holds the lock.
 */
export class CompilationInProgressError extends AppError {
  constructor(public readonly lockKey: string) {
    super('A season compilation is already running', 409, 'COMPILATION_IN_PROGRESS', { lockKey });
    this.name = 'CompilationInProgressError';
  }
}
