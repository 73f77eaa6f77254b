/**
 * Mock Redis Client for Testing
 *
 * In-memory stand-in for the commands the compilation lock and health
 * check use. `eval` understands only the lock's compare-and-expire and
 * compare-and-delete scripts.
 */

import type Redis from 'ioredis';
import type { LockRedisClient } from '../../src/services/seasonStats/compilationLock';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface RecordedCall {
  method: string;
  args: Array<string | number>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Mock Redis Client
// ─────────────────────────────────────────────────────────────────────────────

export class MockRedisClient implements LockRedisClient {
  private store: Map<string, string> = new Map();
  private expirations: Map<string, number> = new Map();
  private readonly _calls: RecordedCall[] = [];

  /**
   * Get all recorded method calls
   */
  get calls(): RecordedCall[] {
    return [...this._calls];
  }

  private track(method: string, ...args: Array<string | number>): void {
    this._calls.push({ method, args });
  }

  private purgeExpired(key: string): void {
    const expiry = this.expirations.get(key);
    if (expiry !== undefined && expiry <= Date.now()) {
      this.store.delete(key);
      this.expirations.delete(key);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Commands
  // ─────────────────────────────────────────────────────────────────────────────

  async ping(): Promise<string> {
    this.track('ping');
    return 'PONG';
  }

  async get(key: string): Promise<string | null> {
    this.track('get', key);
    this.purgeExpired(key);
    return this.store.get(key) ?? null;
  }

  async set(key: string, value: string, secondsToken: 'EX', seconds: number, nx: 'NX'): Promise<'OK' | null> {
    this.track('set', key, value, secondsToken, seconds, nx);
    this.purgeExpired(key);
    if (this.store.has(key)) return null;
    this.store.set(key, value);
    this.expirations.set(key, Date.now() + seconds * 1000);
    return 'OK';
  }

  async del(...keys: string[]): Promise<number> {
    this.track('del', ...keys);
    let deleted = 0;
    for (const key of keys) {
      if (this.store.delete(key)) deleted++;
      this.expirations.delete(key);
    }
    return deleted;
  }

  async eval(script: string, numKeys: number, ...args: string[]): Promise<unknown> {
    this.track('eval', numKeys, ...args);
    const [key, token, seconds] = args;
    if (numKeys !== 1 || key === undefined) {
      throw new Error('MockRedisClient.eval expects a single key');
    }
    this.purgeExpired(key);
    if (this.store.get(key) !== token) return 0;

    if (script.includes('"expire"')) {
      this.expirations.set(key, Date.now() + Number(seconds) * 1000);
      return 1;
    }
    if (script.includes('"del"')) {
      this.store.delete(key);
      this.expirations.delete(key);
      return 1;
    }
    throw new Error('MockRedisClient.eval only supports compare-and-expire and compare-and-delete');
  }
}

/**
 * Create a mock Redis client for testing
 */
export function createMockRedis(): MockRedisClient {
  return new MockRedisClient();
}

/**
 * Type assertion helper to use MockRedisClient where an ioredis client is expected
 */
export function asMockRedis(mock: MockRedisClient): Redis {
  return mock as unknown as Redis;
}
