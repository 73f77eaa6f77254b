/**
 * Season Stats Repository
 *
 * Supabase implementation of the SeasonStatsStore. One table per category,
 * keyed by `player_id`. Rows coming back from Postgres are checked against
 * the category schema before they reach the merge engine.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { BaseRepository } from './BaseRepository';
import { PersistenceError } from '../errors';
import type { PlayerSeasonAggregate, StatCategory } from '../types/stats';
import {
  CATEGORY_TABLES,
  DEFAULT_LEADERBOARD_LIMITS,
  LEADERBOARD_ORDER,
  MAX_LEADERBOARD_LIMIT,
} from '../services/seasonStats/statSchema';
import type { SeasonStatsStore } from '../services/seasonStats/types';

// ─────────────────────────────────────────────────────────────────────────────
// Row schemas
// ─────────────────────────────────────────────────────────────────────────────

const count = z.number().int().nullable();
const text = z.string().nullable();

const identityShape = {
  team_id: text,
  team_name: text,
  player_id: z.string().min(1),
  player_name: text,
  player_headshot_url: text,
  created_at: z.string().optional(),
  updated_at: z.string().optional(),
};

const ROW_SCHEMAS: { [C in StatCategory]: z.ZodType<PlayerSeasonAggregate<C>> } = {
  passing: z.object({
    ...identityShape,
    completions_attempts: text,
    passing_yards: count,
    passing_touchdowns: count,
    interceptions: count,
    sacks: count,
  }),
  rushing: z.object({
    ...identityShape,
    rushing_attempts: count,
    rushing_yards: count,
    rushing_touchdowns: count,
    longest_run: count,
  }),
  receiving: z.object({
    ...identityShape,
    receptions: count,
    receiving_yards: count,
    receiving_touchdowns: count,
    longest_reception: count,
    targets: count,
  }),
  fumbles: z.object({
    ...identityShape,
    fumbles: count,
    fumbles_lost: count,
    fumbles_recovered: count,
  }),
  defensive: z.object({
    ...identityShape,
    total_tackles: count,
    solo_tackles: count,
    sacks: count,
    tackles_for_loss: count,
    passes_defended: count,
    qb_hits: count,
    defensive_touchdowns: count,
  }),
  interceptions: z.object({
    ...identityShape,
    interceptions: count,
    interception_yards: count,
    interception_touchdowns: count,
  }),
};

// ─────────────────────────────────────────────────────────────────────────────
// Repository
// ─────────────────────────────────────────────────────────────────────────────

export class SeasonStatsRepository extends BaseRepository implements SeasonStatsStore {
  constructor(supabase: SupabaseClient) {
    super(supabase, 'seasonStatsRepository');
  }

  async getAggregate<C extends StatCategory>(
    category: C,
    playerId: string,
  ): Promise<PlayerSeasonAggregate<C> | null> {
    const { data, error } = await this.supabase
      .from(CATEGORY_TABLES[category])
      .select('*')
      .eq('player_id', playerId)
      .maybeSingle();

    if (error) {
      throw this.wrapError('Failed to load aggregate', error, { category, operation: 'getAggregate' });
    }
    if (!data) return null;
    return this.parseRow(category, data, 'getAggregate');
  }

  async getAggregates<C extends StatCategory>(
    category: C,
    playerIds: readonly string[],
  ): Promise<PlayerSeasonAggregate<C>[]> {
    if (!playerIds.length) return [];

    const { data, error } = await this.supabase
      .from(CATEGORY_TABLES[category])
      .select('*')
      .in('player_id', [...playerIds]);

    if (error) {
      throw this.wrapError('Failed to load aggregates', error, { category, operation: 'getAggregates' });
    }
    return this.parseRows(category, data ?? [], 'getAggregates');
  }

  async upsertAggregate<C extends StatCategory>(category: C, row: PlayerSeasonAggregate<C>): Promise<void> {
    await this.writeRows(category, [row], 'upsertAggregate');
  }

  /**
   * One upsert statement for the whole batch, so Postgres commits it or
   * rejects it as a unit.
   */
  async upsertAggregates<C extends StatCategory>(
    category: C,
    rows: readonly PlayerSeasonAggregate<C>[],
  ): Promise<void> {
    if (!rows.length) return;
    await this.writeRows(category, rows, 'upsertAggregates');
  }

  async resetCategory(category: StatCategory): Promise<void> {
    const { error } = await this.supabase
      .from(CATEGORY_TABLES[category])
      .delete()
      .not('player_id', 'is', null);

    if (error) {
      throw this.wrapError('Failed to reset category', error, { category, operation: 'resetCategory' });
    }
    this.logger.debug({ category }, 'Category reset');
  }

  /**
   * Leaderboard rows: ranking column descending (nulls last), ties by
   * `player_id` ascending.
   */
  async topN<C extends StatCategory>(category: C, n: number): Promise<PlayerSeasonAggregate<C>[]> {
    const limit = this.parseLimit(n, DEFAULT_LEADERBOARD_LIMITS[category], MAX_LEADERBOARD_LIMIT);

    const { data, error } = await this.supabase
      .from(CATEGORY_TABLES[category])
      .select('*')
      .order(LEADERBOARD_ORDER[category], { ascending: false, nullsFirst: false })
      .order('player_id', { ascending: true })
      .limit(limit);

    if (error) {
      throw this.wrapError('Failed to load leaderboard', error, { category, operation: 'topN' });
    }
    return this.parseRows(category, data ?? [], 'topN');
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Helpers
  // ─────────────────────────────────────────────────────────────────────────

  private async writeRows<C extends StatCategory>(
    category: C,
    rows: readonly PlayerSeasonAggregate<C>[],
    operation: string,
  ): Promise<void> {
    const updatedAt = new Date().toISOString();
    // created_at is left to the column default on insert and untouched on update
    const payload = rows.map(({ created_at: _createdAt, ...row }) => ({ ...row, updated_at: updatedAt }));

    const { error } = await this.supabase
      .from(CATEGORY_TABLES[category])
      .upsert(payload, { onConflict: 'player_id' });

    if (error) {
      throw this.wrapError('Failed to upsert aggregates', error, { category, operation });
    }
  }

  private parseRows<C extends StatCategory>(
    category: C,
    rows: readonly unknown[],
    operation: string,
  ): PlayerSeasonAggregate<C>[] {
    return rows.map((row) => this.parseRow(category, row, operation));
  }

  private parseRow<C extends StatCategory>(category: C, row: unknown, operation: string): PlayerSeasonAggregate<C> {
    const schema: z.ZodType<PlayerSeasonAggregate<C>> = ROW_SCHEMAS[category];
    const result = schema.safeParse(row);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown issue';
      this.logger.error({ category, operation, issue: where }, 'Stored row failed validation');
      throw new PersistenceError(`Invalid ${category} row in storage (${where})`, { category, operation });
    }
    return result.data;
  }
}
