import type { Request, Response } from 'express';
import { AppError } from '../errors';
import { parseRequest } from '../middleware/validateRequest';
import { STAT_CATEGORIES, type PlayerSeasonAggregate, type StatCategory } from '../types/stats';
import { DEFAULT_LEADERBOARD_LIMITS } from '../services/seasonStats/statSchema';
import type { SeasonStatsStore } from '../services/seasonStats/types';
import { categoryParams, leaderboardQuery, playerIdParams } from './schemas';

type Leaderboards = { [C in StatCategory]: PlayerSeasonAggregate<C>[] };

export interface StatsController {
  listLeaderboards(req: Request, res: Response): Promise<void>;
  getLeaderboard(req: Request, res: Response): Promise<void>;
  getPlayerStats(req: Request, res: Response): Promise<void>;
}

/**
 * Read-only handlers over the season aggregates.
 */
export function createStatsController(store: SeasonStatsStore): StatsController {
  return {
    /** Every category with its default page size. */
    async listLeaderboards(_req, res) {
      const [passing, rushing, receiving, fumbles, defensive, interceptions] = await Promise.all([
        store.topN('passing', DEFAULT_LEADERBOARD_LIMITS.passing),
        store.topN('rushing', DEFAULT_LEADERBOARD_LIMITS.rushing),
        store.topN('receiving', DEFAULT_LEADERBOARD_LIMITS.receiving),
        store.topN('fumbles', DEFAULT_LEADERBOARD_LIMITS.fumbles),
        store.topN('defensive', DEFAULT_LEADERBOARD_LIMITS.defensive),
        store.topN('interceptions', DEFAULT_LEADERBOARD_LIMITS.interceptions),
      ]);
      const leaderboards: Leaderboards = { passing, rushing, receiving, fumbles, defensive, interceptions };
      res.json(leaderboards);
    },

    async getLeaderboard(req, res) {
      const { category } = parseRequest(categoryParams, req.params);
      const { limit } = parseRequest(leaderboardQuery, req.query);
      const effectiveLimit = limit ?? DEFAULT_LEADERBOARD_LIMITS[category];
      const rows = await store.topN(category, effectiveLimit);
      res.json({ category, limit: effectiveLimit, rows });
    },

    /** Categories without a row for the player are left out; no rows at all is a 404. */
    async getPlayerStats(req, res) {
      const { playerId } = parseRequest(playerIdParams, req.params);
      const rows = await Promise.all(
        STAT_CATEGORIES.map(async (category) => [category, await store.getAggregate(category, playerId)] as const),
      );

      const stats: Partial<Record<StatCategory, PlayerSeasonAggregate>> = {};
      for (const [category, row] of rows) {
        if (row) stats[category] = row;
      }
      if (!Object.keys(stats).length) {
        throw AppError.notFound(`No season stats for player ${playerId}`);
      }
      res.json({ playerId, stats });
    },
  };
}
