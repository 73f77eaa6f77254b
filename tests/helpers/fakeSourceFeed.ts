/**
 * Fake Source Feed
 *
 * Serves scripted schedules and game payloads. An `Error` in either map is
 * thrown instead of returned. Payload fetches can be held open with
 * `hold()` to observe prefetching.
 */

import type { SourceFeed } from '../../src/services/seasonStats/types';
import type { SeasonType } from '../../src/types/compilation';

export interface FakeSourceFeedOptions {
  /** Game ids per week number. Weeks not listed have no games. */
  weeks?: Record<number, string[] | Error>;
  payloads?: Record<string, unknown>;
}

export class FakeSourceFeed implements SourceFeed {
  readonly discoverCalls: Array<{ season: number; week: number; seasonType: SeasonType }> = [];
  readonly fetchCalls: string[] = [];

  private readonly weeks: Record<number, string[] | Error>;
  private readonly payloads: Record<string, unknown>;
  private readonly gates = new Map<string, Promise<void>>();
  private readonly openers = new Map<string, () => void>();

  constructor(options: FakeSourceFeedOptions = {}) {
    this.weeks = options.weeks ?? {};
    this.payloads = options.payloads ?? {};
  }

  /** Keep the payload fetch for `gameId` pending until `release(gameId)`. */
  hold(gameId: string): void {
    this.gates.set(
      gameId,
      new Promise<void>((resolve) => {
        this.openers.set(gameId, resolve);
      }),
    );
  }

  release(gameId: string): void {
    this.openers.get(gameId)?.();
  }

  get totalCalls(): number {
    return this.discoverCalls.length + this.fetchCalls.length;
  }

  async discoverGames(season: number, week: number, seasonType: SeasonType): Promise<string[]> {
    this.discoverCalls.push({ season, week, seasonType });
    const entry = this.weeks[week];
    if (entry instanceof Error) throw entry;
    return [...(entry ?? [])];
  }

  async fetchGamePayload(gameId: string): Promise<unknown> {
    this.fetchCalls.push(gameId);
    await this.gates.get(gameId);
    const payload = this.payloads[gameId];
    if (payload instanceof Error) throw payload;
    return payload ?? { boxscore: { players: [] } };
  }
}
