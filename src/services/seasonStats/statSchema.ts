/**
 * Stat Schema
 *
 * ESPN box scores ship each athlete's line as a positional array whose
 * meaning depends on the statistic group. This table is the only place that
 * knows those positions; when ESPN reorders a group, change it here.
 *
 * Indices that are absent on purpose are the per-game rate columns
 * (yards per attempt / carry / reception and the passer rating), which are
 * not accumulated.
 */

import type { CategoryLines, StatCategory } from '../../types/stats';

type IndexMap<C extends StatCategory> = Record<keyof CategoryLines[C], number>;

export const STAT_INDEX = {
  passing: {
    completions_attempts: 0,
    passing_yards: 1,
    passing_touchdowns: 3,
    interceptions: 4,
    sacks: 5,
  },
  rushing: {
    rushing_attempts: 0,
    rushing_yards: 1,
    rushing_touchdowns: 3,
    longest_run: 4,
  },
  receiving: {
    receptions: 0,
    receiving_yards: 1,
    receiving_touchdowns: 3,
    longest_reception: 4,
    targets: 5,
  },
  fumbles: {
    fumbles: 0,
    fumbles_lost: 1,
    fumbles_recovered: 2,
  },
  defensive: {
    total_tackles: 0,
    solo_tackles: 1,
    sacks: 2,
    tackles_for_loss: 3,
    passes_defended: 4,
    qb_hits: 5,
    defensive_touchdowns: 6,
  },
  interceptions: {
    interceptions: 0,
    interception_yards: 1,
    interception_touchdowns: 2,
  },
} as const satisfies { [C in StatCategory]: IndexMap<C> };

/** Postgres table holding each category's season aggregates. */
export const CATEGORY_TABLES: Record<StatCategory, string> = {
  passing: 'passing_stats',
  rushing: 'rushing_stats',
  receiving: 'receiving_stats',
  fumbles: 'fumbles_stats',
  defensive: 'defensive_stats',
  interceptions: 'interceptions_stats',
};

/** Column each leaderboard is ranked by (descending). */
export const LEADERBOARD_ORDER: { [C in StatCategory]: keyof CategoryLines[C] & string } = {
  passing: 'passing_yards',
  rushing: 'rushing_yards',
  receiving: 'receiving_yards',
  fumbles: 'fumbles',
  defensive: 'total_tackles',
  interceptions: 'interceptions',
};

/** Page sizes of the combined leaderboard view. */
export const DEFAULT_LEADERBOARD_LIMITS: Record<StatCategory, number> = {
  passing: 100,
  rushing: 300,
  receiving: 400,
  fumbles: 300,
  defensive: 1200,
  interceptions: 150,
};

export const MAX_LEADERBOARD_LIMIT = 2000;
