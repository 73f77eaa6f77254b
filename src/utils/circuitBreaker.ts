/**
 * Circuit Breaker
 *
 * A small state machine guarding calls to the ESPN feed.
 *
 *   CLOSED  ──(N consecutive failures)──▶  OPEN
 *   OPEN    ──(cooldown elapsed)────────▶  HALF_OPEN
 *   HALF_OPEN ──(call succeeds)─────────▶  CLOSED
 *   HALF_OPEN ──(call fails)────────────▶  OPEN
 *
 * Usage:
 *   const breaker = new CircuitBreaker({ name: 'espn', failureThreshold: 5 });
 *   const body = await breaker.call(() => fetchJson(url));
 */

import { AppError } from '../errors/AppError';
import { circuitBreakerState } from '../infrastructure/metrics';
import { createLogger, type Logger } from './logger';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

const STATE_GAUGE_VALUE: Record<CircuitState, number> = {
  CLOSED: 0,
  OPEN: 1,
  HALF_OPEN: 2,
};

export interface CircuitBreakerOptions {
  /** Name for logging and the state gauge label. */
  name: string;
  /** Number of consecutive failures before the circuit opens. Default 5. */
  failureThreshold?: number;
  /** Time in ms the circuit stays open before allowing a probe. Default 30 000 (30s). */
  cooldownMs?: number;
}

const DEFAULT_FAILURE_THRESHOLD = 5;
const DEFAULT_COOLDOWN_MS = 30_000;

/**
 * Raised instead of running the call while the circuit is open.
 */
export class CircuitOpenError extends AppError {
  constructor(
    public readonly breakerName: string,
    public readonly retryInMs: number,
  ) {
    super(`Circuit ${breakerName} is open`, 503, 'CIRCUIT_OPEN', { retryInMs });
    this.name = 'CircuitOpenError';
  }
}

export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private consecutiveFailures = 0;
  private openedAt = 0;

  private readonly name: string;
  private readonly failureThreshold: number;
  private readonly cooldownMs: number;
  private readonly logger: Logger;

  constructor(opts: CircuitBreakerOptions) {
    this.name = opts.name;
    this.failureThreshold = opts.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD;
    this.cooldownMs = opts.cooldownMs ?? DEFAULT_COOLDOWN_MS;
    this.logger = createLogger(`circuitBreaker:${this.name}`);
    this.publishState();
  }

  /** Current state of the breaker. */
  getState(): CircuitState {
    return this.state;
  }

  /**
   * Execute `fn` through the circuit breaker.
   *
   * - **CLOSED**: calls pass through normally.
   * - **OPEN**: calls fail fast with `CircuitOpenError`. Once the cooldown
   *   has elapsed the state moves to HALF_OPEN and the call runs as a probe.
   * - **HALF_OPEN**: a probe success closes the circuit, a failure reopens it.
   */
  async call<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === 'OPEN') {
      const elapsed = Date.now() - this.openedAt;
      if (elapsed < this.cooldownMs) {
        throw new CircuitOpenError(this.name, this.cooldownMs - elapsed);
      }
      this.transition('HALF_OPEN');
      this.logger.info({}, 'transitioning to HALF_OPEN (probe allowed)');
    }

    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (err) {
      this.onFailure();
      throw err;
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Internal
  // ─────────────────────────────────────────────────────────────────────────

  private onSuccess(): void {
    if (this.state === 'HALF_OPEN') {
      this.logger.info({}, 'probe succeeded, circuit CLOSED');
    }
    this.consecutiveFailures = 0;
    this.transition('CLOSED');
  }

  private onFailure(): void {
    this.consecutiveFailures++;

    if (this.state === 'HALF_OPEN' || this.consecutiveFailures >= this.failureThreshold) {
      this.trip();
    }
  }

  private trip(): void {
    this.openedAt = Date.now();
    this.transition('OPEN');
    this.logger.warn(
      { failures: this.consecutiveFailures, cooldownMs: this.cooldownMs },
      'circuit OPENED',
    );
  }

  private transition(next: CircuitState): void {
    this.state = next;
    this.publishState();
  }

  private publishState(): void {
    circuitBreakerState.set({ breaker: this.name }, STATE_GAUGE_VALUE[this.state]);
  }
}
