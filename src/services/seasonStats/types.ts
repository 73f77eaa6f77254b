/**
 * Season Stats Collaborator Types
 *
 * Seams between the compilation pipeline and the outside world. The
 * pipeline only ever sees these interfaces; ESPN, Supabase and Redis
 * implementations are wired in at the entry points.
 */

import type { PlayerSeasonAggregate, StatCategory } from '../../types/stats';
import type { SeasonType } from '../../types/compilation';

// ─────────────────────────────────────────────────────────────────────────────
// Source Feed
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Game discovery and payload retrieval. Both operations throw
 * `SourceFetchError` when the source cannot be read.
 */
export interface SourceFeed {
  /** Game ids for one week, in schedule order. */
  discoverGames(season: number, week: number, seasonType: SeasonType): Promise<string[]>;
  /** The raw summary document for one game. */
  fetchGamePayload(gameId: string): Promise<unknown>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Persistence Gateway
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Keyed access to per-category season aggregates. Failures throw
 * `PersistenceError`.
 */
export interface SeasonStatsStore {
  getAggregate<C extends StatCategory>(category: C, playerId: string): Promise<PlayerSeasonAggregate<C> | null>;
  getAggregates<C extends StatCategory>(
    category: C,
    playerIds: readonly string[],
  ): Promise<PlayerSeasonAggregate<C>[]>;
  upsertAggregate<C extends StatCategory>(category: C, row: PlayerSeasonAggregate<C>): Promise<void>;
  /** Either every row is stored or none is. */
  upsertAggregates<C extends StatCategory>(
    category: C,
    rows: readonly PlayerSeasonAggregate<C>[],
  ): Promise<void>;
  resetCategory(category: StatCategory): Promise<void>;
  topN<C extends StatCategory>(category: C, n: number): Promise<PlayerSeasonAggregate<C>[]>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Compilation Lock
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A held lock. `renew` pushes the expiry out again and resolves to `false`
 * once the lock has been lost; `release` is safe to call more than once.
 */
export interface LockLease {
  renew(): Promise<boolean>;
  release(): Promise<void>;
}

/**
 * Mutual exclusion between compilation runs. `acquire` resolves to `null`
 * when another holder owns the key.
 */
export interface CompilationLock {
  acquire(key: string): Promise<LockLease | null>;
}
