/**
 * Compilation Lock
 *
 * Keeps two compilation runs from rebuilding the aggregate tables at the
 * same time. With Redis configured the lock is shared across processes
 * (`SET NX EX` with a random token, renewed by compare-and-expire, released
 * by compare-and-delete). Without it, a per-process lock is used.
 */

import { randomUUID } from 'crypto';
import { env } from '../../config/env';
import { getRedisClient } from '../../utils/redisClient';
import { createLogger } from '../../utils/logger';
import type { CompilationLock, LockLease } from './types';

const logger = createLogger('compilationLock');

/** Delete the key only if it still holds our token. */
const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
else
  return 0
end
`;

/** Reset the expiry only if the key still holds our token. */
const RENEW_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("expire", KEYS[1], ARGV[2])
else
  return 0
end
`;

/**
 * The subset of the ioredis client the lock relies on.
 */
export interface LockRedisClient {
  set(key: string, value: string, secondsToken: 'EX', seconds: number, nx: 'NX'): Promise<'OK' | null>;
  eval(script: string, numKeys: number, ...args: string[]): Promise<unknown>;
}

export class RedisCompilationLock implements CompilationLock {
  constructor(
    private readonly redis: LockRedisClient,
    private readonly ttlSeconds: number,
  ) {}

  async acquire(key: string): Promise<LockLease | null> {
    const token = randomUUID();
    const result = await this.redis.set(key, token, 'EX', this.ttlSeconds, 'NX');
    if (result !== 'OK') {
      logger.warn({ key }, 'Lock held by another run');
      return null;
    }
    logger.debug({ key, ttlSeconds: this.ttlSeconds }, 'Lock acquired');

    let released = false;
    return {
      renew: async () => {
        if (released) return false;
        const renewed = await this.redis.eval(RENEW_SCRIPT, 1, key, token, String(this.ttlSeconds));
        if (renewed !== 1) {
          logger.warn({ key }, 'Lock lost before renewal');
          return false;
        }
        return true;
      },
      release: async () => {
        if (released) return;
        released = true;
        const deleted = await this.redis.eval(RELEASE_SCRIPT, 1, key, token);
        if (deleted !== 1) {
          logger.warn({ key }, 'Lock expired before release');
        }
      },
    };
  }
}

export class InProcessCompilationLock implements CompilationLock {
  private readonly held = new Set<string>();

  async acquire(key: string): Promise<LockLease | null> {
    if (this.held.has(key)) return null;
    this.held.add(key);

    let released = false;
    return {
      renew: async () => !released,
      release: async () => {
        if (released) return;
        released = true;
        this.held.delete(key);
      },
    };
  }
}

let processLock: InProcessCompilationLock | null = null;

/**
 * Redis-backed lock when `REDIS_URL` is set, otherwise the shared
 * per-process lock.
 */
export function createCompilationLock(): CompilationLock {
  if (env.REDIS_URL) {
    return new RedisCompilationLock(getRedisClient(), env.COMPILE_LOCK_TTL_SECONDS);
  }
  processLock ??= new InProcessCompilationLock();
  return processLock;
}
