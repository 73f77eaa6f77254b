/**
 * Category Merge Engine
 *
 * Folds one game's records into the stored season aggregates.
 *
 *   counting fields     → integer sum (null counts as 0)
 *   longest_* fields    → running maximum (null does not participate)
 *   completions_attempts → mergeFraction
 *   identity fields     → taken from the incoming record
 */

import {
  STAT_CATEGORIES,
  emptyCategoryCounts,
  type CategoryCounts,
  type CategoryRecords,
  type PlayerGameRecord,
  type PlayerIdentity,
  type PlayerSeasonAggregate,
  type StatCategory,
} from '../../types/stats';
import { PersistenceError } from '../../errors';
import { mergeFraction } from './statNormalizer';
import type { SeasonStatsStore } from './types';

type KeyedRecord<C extends StatCategory> = PlayerGameRecord<C> & { player_id: string };

type CategoryMerger<C extends StatCategory> = (
  stored: PlayerSeasonAggregate<C> | null,
  incoming: KeyedRecord<C>,
) => PlayerSeasonAggregate<C>;

// ─────────────────────────────────────────────────────────────────────────────
// Field rules
// ─────────────────────────────────────────────────────────────────────────────

function sum(stored: number | null | undefined, incoming: number | null): number {
  return (stored ?? 0) + (incoming ?? 0);
}

function longest(stored: number | null | undefined, incoming: number | null): number | null {
  if (stored === null || stored === undefined) return incoming;
  if (incoming === null) return stored;
  return Math.max(stored, incoming);
}

function identityOf(incoming: PlayerIdentity & { player_id: string }): PlayerIdentity & { player_id: string } {
  return {
    team_id: incoming.team_id,
    team_name: incoming.team_name,
    player_id: incoming.player_id,
    player_name: incoming.player_name,
    player_headshot_url: incoming.player_headshot_url,
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Per-category mergers
// ─────────────────────────────────────────────────────────────────────────────

const CATEGORY_MERGERS: { [C in StatCategory]: CategoryMerger<C> } = {
  passing: (stored, incoming) => ({
    ...identityOf(incoming),
    completions_attempts: mergeFraction(stored?.completions_attempts, incoming.completions_attempts),
    passing_yards: sum(stored?.passing_yards, incoming.passing_yards),
    passing_touchdowns: sum(stored?.passing_touchdowns, incoming.passing_touchdowns),
    interceptions: sum(stored?.interceptions, incoming.interceptions),
    sacks: sum(stored?.sacks, incoming.sacks),
  }),
  rushing: (stored, incoming) => ({
    ...identityOf(incoming),
    rushing_attempts: sum(stored?.rushing_attempts, incoming.rushing_attempts),
    rushing_yards: sum(stored?.rushing_yards, incoming.rushing_yards),
    rushing_touchdowns: sum(stored?.rushing_touchdowns, incoming.rushing_touchdowns),
    longest_run: longest(stored?.longest_run, incoming.longest_run),
  }),
  receiving: (stored, incoming) => ({
    ...identityOf(incoming),
    receptions: sum(stored?.receptions, incoming.receptions),
    receiving_yards: sum(stored?.receiving_yards, incoming.receiving_yards),
    receiving_touchdowns: sum(stored?.receiving_touchdowns, incoming.receiving_touchdowns),
    longest_reception: longest(stored?.longest_reception, incoming.longest_reception),
    targets: sum(stored?.targets, incoming.targets),
  }),
  fumbles: (stored, incoming) => ({
    ...identityOf(incoming),
    fumbles: sum(stored?.fumbles, incoming.fumbles),
    fumbles_lost: sum(stored?.fumbles_lost, incoming.fumbles_lost),
    fumbles_recovered: sum(stored?.fumbles_recovered, incoming.fumbles_recovered),
  }),
  defensive: (stored, incoming) => ({
    ...identityOf(incoming),
    total_tackles: sum(stored?.total_tackles, incoming.total_tackles),
    solo_tackles: sum(stored?.solo_tackles, incoming.solo_tackles),
    sacks: sum(stored?.sacks, incoming.sacks),
    tackles_for_loss: sum(stored?.tackles_for_loss, incoming.tackles_for_loss),
    passes_defended: sum(stored?.passes_defended, incoming.passes_defended),
    qb_hits: sum(stored?.qb_hits, incoming.qb_hits),
    defensive_touchdowns: sum(stored?.defensive_touchdowns, incoming.defensive_touchdowns),
  }),
  interceptions: (stored, incoming) => ({
    ...identityOf(incoming),
    interceptions: sum(stored?.interceptions, incoming.interceptions),
    interception_yards: sum(stored?.interception_yards, incoming.interception_yards),
    interception_touchdowns: sum(stored?.interception_touchdowns, incoming.interception_touchdowns),
  }),
};

function hasPlayerId<C extends StatCategory>(record: PlayerGameRecord<C>): record is KeyedRecord<C> {
  return typeof record.player_id === 'string' && record.player_id.length > 0;
}

// ─────────────────────────────────────────────────────────────────────────────
// Public API
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Combine one incoming record with the stored aggregate (or none).
 */
export function mergeRecord<C extends StatCategory>(
  category: C,
  stored: PlayerSeasonAggregate<C> | null,
  incoming: KeyedRecord<C>,
): PlayerSeasonAggregate<C> {
  const merge: CategoryMerger<C> = CATEGORY_MERGERS[category];
  return merge(stored, incoming);
}

/**
 * Merge one category's records for a game into the store.
 *
 * Records are folded in order against the stored rows and the result is
 * written with a single `upsertAggregates`, so the batch commits as a unit.
 * Records without a player id are skipped.
 *
 * @returns rows touched (created + updated)
 */
export async function mergeCategoryBatch<C extends StatCategory>(
  store: SeasonStatsStore,
  category: C,
  records: readonly PlayerGameRecord<C>[],
): Promise<number> {
  const keyed = records.filter((record): record is KeyedRecord<C> => hasPlayerId(record));
  if (!keyed.length) return 0;

  const playerIds = [...new Set(keyed.map((record) => record.player_id))];

  try {
    const stored = await store.getAggregates(category, playerIds);
    const working = new Map<string, PlayerSeasonAggregate<C>>();
    for (const row of stored) {
      working.set(row.player_id, row);
    }

    for (const record of keyed) {
      working.set(record.player_id, mergeRecord(category, working.get(record.player_id) ?? null, record));
    }

    const rows = playerIds.flatMap((playerId) => {
      const row = working.get(playerId);
      return row ? [row] : [];
    });
    await store.upsertAggregates(category, rows);
  } catch (err) {
    if (err instanceof PersistenceError) throw err;
    throw new PersistenceError(`Failed to merge ${category} batch`, {
      category,
      operation: 'mergeCategoryBatch',
      cause: err,
    });
  }

  return keyed.length;
}

/**
 * Merge every category of one game, in category order. `onBatchMerged`
 * hears about each batch as soon as it is stored, so a failure in a later
 * category still leaves the earlier counts reported.
 */
export async function mergeGameRecords(
  store: SeasonStatsStore,
  records: CategoryRecords,
  onBatchMerged?: (category: StatCategory, merged: number) => void,
): Promise<CategoryCounts> {
  const counts = emptyCategoryCounts();
  for (const category of STAT_CATEGORIES) {
    counts[category] = await mergeCategoryBatch(store, category, records[category]);
    onBatchMerged?.(category, counts[category]);
  }
  return counts;
}
