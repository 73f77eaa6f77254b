/**
 * Base Repository
 *
 * Abstract base class for Supabase-backed repositories.
 * Provides common utilities for Supabase data access.
 */

import type { SupabaseClient, PostgrestError } from '@supabase/supabase-js';
import { PersistenceError, type PersistenceErrorContext } from '../errors';
import { createLogger, type Logger } from '../utils/logger';

// ─────────────────────────────────────────────────────────────────────────────
// Base Repository
// ─────────────────────────────────────────────────────────────────────────────

export abstract class BaseRepository {
  protected readonly logger: Logger;

  constructor(
    protected readonly supabase: SupabaseClient,
    loggerName: string,
  ) {
    this.logger = createLogger(loggerName);
  }

  /**
   * Wrap a Supabase error with context for logging.
   */
  protected wrapError(
    message: string,
    error: Pick<PostgrestError, 'message'> & Partial<Pick<PostgrestError, 'code'>>,
    context: Omit<PersistenceErrorContext, 'cause'>,
  ): PersistenceError {
    this.logger.error({ ...context, code: error.code, error: error.message }, message);
    return new PersistenceError(`${message}: ${error.message}`, { ...context, cause: error });
  }

  /**
   * Parse a page size with bounds.
   */
  protected parseLimit(limit: unknown, defaultLimit = 20, maxLimit = 100): number {
    const parsed = typeof limit === 'number' ? limit : parseInt(String(limit), 10);
    if (!Number.isFinite(parsed) || parsed < 1) return defaultLimit;
    return Math.min(Math.floor(parsed), maxLimit);
  }
}
