/**
 * Shared Redis Client
 *
 * One lazily created connection used by the compilation lock and the
 * health check. Redis is optional: callers check `isRedisConfigured()`.
 */

import Redis from 'ioredis';
import { env } from '../config/env';
import { createLogger } from './logger';

const logger = createLogger('redis');

/** Maximum reconnect attempts before giving up. */
const MAX_RECONNECT_RETRIES = 20;

/** Base delay for exponential backoff (ms). */
const BASE_RECONNECT_DELAY_MS = 500;

/** Hard cap on reconnect delay (ms). */
const MAX_RECONNECT_DELAY_MS = 30_000;

let sharedRedis: Redis | null = null;

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function buildRedis(url: string): Redis {
  const client = new Redis(url, {
    retryStrategy(times: number): number | null {
      if (times > MAX_RECONNECT_RETRIES) {
        logger.error({ attempts: times }, 'max reconnect retries exceeded, giving up');
        return null;
      }
      const delay = Math.min(BASE_RECONNECT_DELAY_MS * Math.pow(2, times - 1), MAX_RECONNECT_DELAY_MS);
      logger.warn({ attempt: times, delayMs: delay }, 'reconnecting…');
      return delay;
    },
    // Lock commands should fail fast rather than queue behind a dead connection
    maxRetriesPerRequest: 3,
  });
  client.on('error', (err: unknown) => {
    logger.error({ error: describe(err) }, 'connection error');
  });
  logger.info({}, 'client initialized');
  return client;
}

export function isRedisConfigured(): boolean {
  return Boolean(env.REDIS_URL);
}

/**
 * Get the shared Redis client instance.
 * Creates the connection on first call.
 */
export function getRedisClient(): Redis {
  if (sharedRedis) {
    return sharedRedis;
  }
  const url = env.REDIS_URL;
  if (!url) {
    throw new Error('REDIS_URL is not configured');
  }
  sharedRedis = buildRedis(url);
  return sharedRedis;
}

/**
 * Close the shared Redis connection.
 */
export async function closeRedisClient(): Promise<void> {
  if (!sharedRedis) return;
  const client = sharedRedis;
  sharedRedis = null;
  await client.quit().catch((err: unknown) => {
    logger.error({ error: describe(err) }, 'quit error');
  });
}
