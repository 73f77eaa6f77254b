import type { Request, Response } from 'express';
import { AppError } from '../errors';
import { getRequestId } from '../middleware/errorHandler';
import { parseRequest } from '../middleware/validateRequest';
import type { CompilationRunner } from '../services/seasonStats/compilationRuns';
import { runIdParams } from './schemas';

export interface CompilationController {
  startCompilation(req: Request, res: Response): Promise<void>;
  getCompilation(req: Request, res: Response): Promise<void>;
}

export function createCompilationController(runner: CompilationRunner): CompilationController {
  return {
    /**
     * Body `{ season, endWeek, seasonType }`. Invalid parameters are a 400
     * before anything runs; an accepted run answers 202 with its id.
     */
    async startCompilation(req, res) {
      const run = runner.start(req.body, getRequestId(req));
      res
        .status(202)
        .location(`${req.baseUrl}/compilations/${run.runId}`)
        .json({ runId: run.runId, status: run.status, params: run.params });
    },

    async getCompilation(req, res) {
      const { runId } = parseRequest(runIdParams, req.params);
      const run = runner.get(runId);
      if (!run) {
        throw AppError.notFound(`Compilation run ${runId} not found`);
      }
      res.json(run);
    },
  };
}
