import express, { Request, Response } from 'express';
import { createStatsController } from '../controllers/statsController';
import { createCompilationController } from '../controllers/compilationController';
import { categoryParams, leaderboardQuery, playerIdParams, runIdParams } from '../controllers/schemas';
import { asyncHandler } from '../middleware/errorHandler';
import { requireAdminToken } from '../middleware/adminAuth';
import { validateParams, validateQuery } from '../middleware/validateRequest';
import type { HealthStatus } from '../infrastructure/healthCheck';
import type { CompilationRunner } from '../services/seasonStats/compilationRuns';
import type { SeasonStatsStore } from '../services/seasonStats/types';

export interface ApiDependencies {
  store: SeasonStatsStore;
  runner: CompilationRunner;
  healthCheck: () => Promise<HealthStatus>;
}

export function createApiRouter(deps: ApiDependencies): express.Router {
  const router = express.Router();
  const stats = createStatsController(deps.store);
  const compilations = createCompilationController(deps.runner);

  router.get('/health', asyncHandler(async (_req: Request, res: Response) => {
    const health = await deps.healthCheck();
    res.status(health.status === 'unhealthy' ? 503 : 200).json(health);
  }));

  // Leaderboards
  router.get('/leaderboards', asyncHandler(stats.listLeaderboards));
  router.get(
    '/leaderboards/:category',
    validateParams(categoryParams),
    validateQuery(leaderboardQuery),
    asyncHandler(stats.getLeaderboard),
  );

  // Players
  router.get('/players/:playerId/stats', validateParams(playerIdParams), asyncHandler(stats.getPlayerStats));

  // Compilations (operator only)
  router.post('/compilations', requireAdminToken, asyncHandler(compilations.startCompilation));
  router.get(
    '/compilations/:runId',
    requireAdminToken,
    validateParams(runIdParams),
    asyncHandler(compilations.getCompilation),
  );

  return router;
}
