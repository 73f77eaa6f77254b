/**
 * ESPN NFL API client.
 * Game discovery via the scoreboard and per-game summaries, behind a
 * circuit breaker. While the circuit is open a request waits out the
 * cooldown and goes through as the probe, so every game is asked for.
 * Every failure surfaces as a SourceFetchError.
 */

import { z } from 'zod';
import { env } from '../../config/env';
import { SourceFetchError } from '../../errors';
import { externalApiDurationMs } from '../../infrastructure/metrics';
import type { SeasonType } from '../../types/compilation';
import type { SourceFeed } from '../../services/seasonStats/types';
import { CircuitBreaker, CircuitOpenError } from '../circuitBreaker';
import { createLogger } from '../logger';

const logger = createLogger('espnClient');

const USER_AGENT = 'gridiron-season-stats/1.0';

type EspnEndpoint = 'scoreboard' | 'summary';

const scoreboardSchema = z.object({
  events: z.array(z.unknown()).catch([]),
});

const scoreboardEventSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform((value) => String(value)),
});

export interface EspnSourceFeedOptions {
  /** Site API root, e.g. `https://site.api.espn.com/apis/site/v2/sports/football/nfl`. */
  baseUrl?: string;
  timeoutMs?: number;
  breaker?: CircuitBreaker;
}

/**
 * Event ids from a scoreboard document, in listing order, without repeats.
 */
export function parseScoreboardEventIds(body: unknown): string[] {
  const parsed = scoreboardSchema.safeParse(body);
  if (!parsed.success) return [];

  const ids: string[] = [];
  for (const event of parsed.data.events) {
    const result = scoreboardEventSchema.safeParse(event);
    if (result.success && !ids.includes(result.data.id)) {
      ids.push(result.data.id);
    }
  }
  return ids;
}

export class EspnSourceFeed implements SourceFeed {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly breaker: CircuitBreaker;

  constructor(options: EspnSourceFeedOptions = {}) {
    this.baseUrl = (options.baseUrl ?? env.ESPN_SITE_API_BASE).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? env.ESPN_REQUEST_TIMEOUT_MS;
    this.breaker = options.breaker ?? new CircuitBreaker({ name: 'espn' });
  }

  async discoverGames(season: number, week: number, seasonType: SeasonType): Promise<string[]> {
    const url = new URL(`${this.baseUrl}/scoreboard`);
    url.searchParams.set('dates', String(season));
    url.searchParams.set('seasontype', String(seasonType));
    url.searchParams.set('week', String(week));

    const body = await this.fetchJson(url.toString(), 'scoreboard');
    const ids = parseScoreboardEventIds(body);
    logger.debug({ season, week, seasonType, games: ids.length }, 'Scoreboard fetched');
    return ids;
  }

  async fetchGamePayload(gameId: string): Promise<unknown> {
    const url = new URL(`${this.baseUrl}/summary`);
    url.searchParams.set('event', gameId);
    return this.fetchJson(url.toString(), 'summary');
  }

  /**
   * Fetch JSON from a URL with standard headers and a timeout.
   */
  private async fetchJson(url: string, endpoint: EspnEndpoint): Promise<unknown> {
    const startedAt = Date.now();
    try {
      const body = await this.callThroughBreaker(url, endpoint);
      externalApiDurationMs.observe({ provider: 'espn', endpoint, status: 'ok' }, Date.now() - startedAt);
      return body;
    } catch (err) {
      externalApiDurationMs.observe({ provider: 'espn', endpoint, status: 'error' }, Date.now() - startedAt);
      if (err instanceof SourceFetchError) throw err;
      throw new SourceFetchError(
        `ESPN ${endpoint} request failed: ${err instanceof Error ? err.message : String(err)}`,
        url,
      );
    }
  }

  private async callThroughBreaker(url: string, endpoint: EspnEndpoint): Promise<unknown> {
    for (;;) {
      try {
        return await this.breaker.call(() => this.request(url));
      } catch (err) {
        if (!(err instanceof CircuitOpenError)) throw err;
        const { retryInMs } = err;
        logger.warn({ endpoint, url, retryInMs }, 'ESPN circuit open, waiting to retry');
        await new Promise<void>((resolve) => setTimeout(resolve, retryInMs));
      }
    }
  }

  private async request(url: string): Promise<unknown> {
    let res: Response;
    try {
      res = await fetch(url, {
        headers: { 'User-Agent': USER_AGENT, Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      logger.debug({ url, err }, 'HTTP error');
      const reason = err instanceof Error && err.name === 'TimeoutError'
        ? `timed out after ${this.timeoutMs}ms`
        : err instanceof Error ? err.message : String(err);
      throw new SourceFetchError(`ESPN request failed: ${reason}`, url);
    }

    if (!res.ok) {
      logger.debug({ url, status: res.status }, 'Fetch failed');
      throw new SourceFetchError(`ESPN responded with HTTP ${res.status}`, url, res.status);
    }

    try {
      const body: unknown = await res.json();
      return body;
    } catch (err) {
      throw new SourceFetchError(
        `ESPN returned invalid JSON: ${err instanceof Error ? err.message : String(err)}`,
        url,
        res.status,
      );
    }
  }
}
