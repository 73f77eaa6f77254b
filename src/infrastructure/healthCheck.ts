/**
 * Health Check Utilities
 *
 * Provides health check functions for application dependencies.
 * Used by the /health endpoint to report detailed status.
 */

import { getRedisClient, isRedisConfigured } from '../utils/redisClient';
import { getSupabaseAdmin } from '../supabaseClient';
import { createLogger } from '../utils/logger';
import { CATEGORY_TABLES } from '../services/seasonStats/statSchema';

const logger = createLogger('healthCheck');

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface HealthCheckResult {
  ok: boolean;
  latencyMs?: number;
  error?: string;
  /** The dependency is not configured, so it was not checked. */
  skipped?: boolean;
}

export interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  uptime: number;
  checks: {
    redis: HealthCheckResult;
    supabase: HealthCheckResult;
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ─────────────────────────────────────────────────────────────────────────────
// Individual Health Checks
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Check Redis connectivity by sending a PING command.
 */
export async function checkRedisHealth(): Promise<HealthCheckResult> {
  if (!isRedisConfigured()) {
    return { ok: true, skipped: true };
  }

  const start = Date.now();
  try {
    const result = await getRedisClient().ping();
    const latencyMs = Date.now() - start;

    if (result === 'PONG') {
      return { ok: true, latencyMs };
    }

    return { ok: false, latencyMs, error: `Unexpected PING response: ${result}` };
  } catch (error) {
    const latencyMs = Date.now() - start;
    const message = errorMessage(error);
    logger.warn({ error: message }, 'Redis health check failed');
    return { ok: false, latencyMs, error: message };
  }
}

/**
 * Check Supabase connectivity with a one-row read of an aggregate table.
 */
export async function checkSupabaseHealth(): Promise<HealthCheckResult> {
  const start = Date.now();
  try {
    const { error } = await getSupabaseAdmin()
      .from(CATEGORY_TABLES.passing)
      .select('player_id')
      .limit(1);

    const latencyMs = Date.now() - start;

    if (error) {
      return { ok: false, latencyMs, error: error.message };
    }

    return { ok: true, latencyMs };
  } catch (error) {
    const latencyMs = Date.now() - start;
    const message = errorMessage(error);
    logger.warn({ error: message }, 'Supabase health check failed');
    return { ok: false, latencyMs, error: message };
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Aggregated Health Check
// ─────────────────────────────────────────────────────────────────────────────

const startTime = Date.now();

/**
 * Combine individual results. Storage down is unhealthy; only the lock
 * backend down is degraded.
 */
export function summarizeHealth(redis: HealthCheckResult, supabase: HealthCheckResult): HealthStatus['status'] {
  if (!supabase.ok) return 'unhealthy';
  if (!redis.ok) return 'degraded';
  return 'healthy';
}

/**
 * Run all health checks and return aggregated status.
 */
export async function getHealthStatus(): Promise<HealthStatus> {
  const [redis, supabase] = await Promise.all([
    checkRedisHealth(),
    checkSupabaseHealth(),
  ]);

  return {
    status: summarizeHealth(redis, supabase),
    timestamp: new Date().toISOString(),
    uptime: Math.floor((Date.now() - startTime) / 1000),
    checks: {
      redis,
      supabase,
    },
  };
}
