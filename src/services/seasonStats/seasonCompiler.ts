/**
 * Season Compiler
 *
 * Rebuilds every season aggregate from scratch for weeks 1..endWeek:
 *
 *   validate ─▶ lock ─▶ reset all categories ─▶ for each week:
 *     discover games ─▶ for each game (in order):
 *       fetch payload ─▶ extract ─▶ merge per category
 *
 * Fetch and discovery failures are recorded as warnings and the run moves
 * on. A PersistenceError aborts the run and is rethrown with the partial
 * summary attached. The reset is what makes a rerun safe: without it every
 * game already ingested would be counted twice.
 */

import { z } from 'zod';
import { createLogger, type Logger } from '../../utils/logger';
import {
  AppError,
  CompilationInProgressError,
  PersistenceError,
  ValidationError,
} from '../../errors';
import { STAT_CATEGORIES, emptyCategoryCounts, type CategoryCounts } from '../../types/stats';
import {
  MAX_WEEKS,
  SEASON_TYPE_LABELS,
  type CompilationParams,
  type CompilationProgressEvent,
  type CompilationStatus,
  type CompilationSummary,
  type GameWarning,
} from '../../types/compilation';
import { gamesProcessedTotal, rowsTouchedTotal } from '../../infrastructure/metrics';
import { extractPlayerStats } from './boxscoreExtractor';
import { mergeGameRecords } from './categoryMerge';
import type { CompilationLock, LockLease, SeasonStatsStore, SourceFeed } from './types';

// ─────────────────────────────────────────────────────────────────────────────
// Parameter validation
// ─────────────────────────────────────────────────────────────────────────────

const compilationParamsSchema = z
  .object({
    season: z.number().int().min(1920).max(2100),
    endWeek: z.number().int().min(1, 'endWeek must be an integer >= 1'),
    seasonType: z.union([z.literal(1), z.literal(2), z.literal(3)], {
      message: 'seasonType must be 1 (preseason), 2 (regular season), or 3 (playoffs)',
    }),
  })
  .superRefine((params, ctx) => {
    const maxWeeks = MAX_WEEKS[params.seasonType];
    if (params.endWeek > maxWeeks) {
      ctx.addIssue({
        code: 'custom',
        path: ['endWeek'],
        message: `${SEASON_TYPE_LABELS[params.seasonType]} only has weeks 1-${maxWeeks}`,
      });
    }
  });

/**
 * Check compilation parameters before anything touches the network or store.
 *
 * @throws ValidationError listing every violated rule
 */
export function validateCompilationParams(input: unknown): CompilationParams {
  const result = compilationParamsSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues.map((issue) => ({
      field: issue.path.join('.') || '(root)',
      message: issue.message,
    }));
    throw new ValidationError(details[0]?.message ?? 'Invalid compilation parameters', details);
  }
  return result.data;
}

// ─────────────────────────────────────────────────────────────────────────────
// Compiler
// ─────────────────────────────────────────────────────────────────────────────

export const COMPILATION_LOCK_KEY = 'season-stats:compilation';

export interface SeasonCompilerOptions {
  feed: SourceFeed;
  store: SeasonStatsStore;
  lock: CompilationLock;
  /** How many game payloads may be in flight at once. Merges stay sequential. */
  fetchConcurrency?: number;
  onProgress?: (event: CompilationProgressEvent) => void;
}

interface RunProgress {
  gamesDiscovered: number;
  gamesProcessed: number;
  rowsTouched: CategoryCounts;
  warnings: GameWarning[];
}

type FetchOutcome = { ok: true; payload: unknown } | { ok: false; error: unknown };

function settle(promise: Promise<unknown>): Promise<FetchOutcome> {
  return promise.then(
    (payload): FetchOutcome => ({ ok: true, payload }),
    (error: unknown): FetchOutcome => ({ ok: false, error }),
  );
}

function describeError(err: unknown): { message: string; code?: string } {
  if (AppError.isAppError(err)) return { message: err.message, code: err.code };
  return { message: err instanceof Error ? err.message : String(err) };
}

export class SeasonCompiler {
  private readonly logger: Logger = createLogger('seasonCompiler');
  private readonly feed: SourceFeed;
  private readonly store: SeasonStatsStore;
  private readonly lock: CompilationLock;
  private readonly fetchConcurrency: number;
  private readonly onProgress?: (event: CompilationProgressEvent) => void;

  constructor(options: SeasonCompilerOptions) {
    this.feed = options.feed;
    this.store = options.store;
    this.lock = options.lock;
    this.fetchConcurrency = Math.max(1, Math.floor(options.fetchConcurrency ?? 1));
    this.onProgress = options.onProgress;
  }

  /**
   * Run one full compilation.
   *
   * @throws ValidationError before any I/O when the parameters are invalid
   * @throws CompilationInProgressError when another run holds the lock, or
   *   the lock is lost between weeks
   * @throws PersistenceError (with `progress`) when the store fails
   */
  async run(input: CompilationParams): Promise<CompilationSummary> {
    const params = validateCompilationParams(input);

    const lease = await this.lock.acquire(COMPILATION_LOCK_KEY);
    if (!lease) {
      throw new CompilationInProgressError(COMPILATION_LOCK_KEY);
    }

    const startedAt = new Date().toISOString();
    const progress: RunProgress = {
      gamesDiscovered: 0,
      gamesProcessed: 0,
      rowsTouched: emptyCategoryCounts(),
      warnings: [],
    };

    this.logger.info(
      { ...params, seasonTypeLabel: SEASON_TYPE_LABELS[params.seasonType] },
      'Season compilation started',
    );

    try {
      await this.resetAll();

      for (let week = 1; week <= params.endWeek; week++) {
        await this.renewLease(lease, week);
        await this.compileWeek(params, week, progress);
      }

      const summary = this.buildSummary(params, progress, 'completed', startedAt);
      this.logger.info(
        {
          gamesProcessed: summary.gamesProcessed,
          rowsTouched: summary.rowsTouched,
          warnings: summary.warnings.length,
        },
        'Season compilation completed',
      );
      return summary;
    } catch (err) {
      if (err instanceof PersistenceError) {
        const partial = this.buildSummary(params, progress, 'aborted', startedAt);
        this.logger.error(
          { category: err.category, operation: err.operation, gamesProcessed: partial.gamesProcessed },
          'Season compilation aborted by storage failure',
        );
        throw err.withProgress(partial);
      }
      throw err;
    } finally {
      await lease.release().catch((releaseErr: unknown) => {
        this.logger.error({ err: releaseErr }, 'Failed to release compilation lock');
      });
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Steps
  // ─────────────────────────────────────────────────────────────────────────

  private async resetAll(): Promise<void> {
    for (const category of STAT_CATEGORIES) {
      await this.store.resetCategory(category);
    }
    this.logger.info({ categories: STAT_CATEGORIES.length }, 'Aggregates reset');
    this.emit({ type: 'reset' });
  }

  /**
   * Push the lock expiry out before each week. A lease that can no longer
   * be renewed may already belong to another run, so this run stops.
   */
  private async renewLease(lease: LockLease, week: number): Promise<void> {
    let renewed: boolean;
    try {
      renewed = await lease.renew();
    } catch (err) {
      this.logger.warn({ err, week }, 'Could not renew compilation lock, keeping current expiry');
      return;
    }
    if (!renewed) {
      this.logger.error({ week }, 'Compilation lock lost');
      throw new CompilationInProgressError(COMPILATION_LOCK_KEY);
    }
  }

  private async compileWeek(params: CompilationParams, week: number, progress: RunProgress): Promise<void> {
    let gameIds: string[];
    try {
      gameIds = await this.feed.discoverGames(params.season, week, params.seasonType);
    } catch (err) {
      this.recordWarning(progress, week, null, err);
      return;
    }

    progress.gamesDiscovered += gameIds.length;
    this.logger.info({ week, endWeek: params.endWeek, games: gameIds.length }, 'Processing week');
    this.emit({ type: 'week_started', week, gameIds });

    const fetches: Promise<FetchOutcome>[] = [];
    const fetchAt = (index: number): Promise<FetchOutcome> => {
      const existing = fetches[index];
      if (existing) return existing;
      const started = settle(this.feed.fetchGamePayload(gameIds[index]));
      fetches[index] = started;
      return started;
    };

    for (let index = 0; index < gameIds.length; index++) {
      const gameId = gameIds[index];
      const current = fetchAt(index);
      const lookahead = Math.min(index + this.fetchConcurrency, gameIds.length);
      for (let ahead = index + 1; ahead < lookahead; ahead++) {
        void fetchAt(ahead);
      }

      const outcome = await current;
      if (!outcome.ok) {
        this.recordWarning(progress, week, gameId, outcome.error);
        continue;
      }

      const records = extractPlayerStats(outcome.payload);
      const counts = await mergeGameRecords(this.store, records, (category, merged) => {
        progress.rowsTouched[category] += merged;
        if (merged > 0) {
          rowsTouchedTotal.inc({ category }, merged);
        }
      });

      progress.gamesProcessed++;
      gamesProcessedTotal.inc({ outcome: 'merged' });
      this.logger.info({ week, gameId, rowsTouched: counts }, 'Game merged');
      this.emit({ type: 'game_merged', week, gameId, rowsTouched: counts });
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Helpers
  // ─────────────────────────────────────────────────────────────────────────

  private recordWarning(progress: RunProgress, week: number, gameId: string | null, err: unknown): void {
    const { message, code } = describeError(err);
    const warning: GameWarning = code ? { week, gameId, message, code } : { week, gameId, message };
    progress.warnings.push(warning);
    gamesProcessedTotal.inc({ outcome: 'skipped' });
    this.logger.warn({ week, gameId, code, error: message }, 'Skipping game after source failure');
    this.emit({ type: 'game_skipped', warning });
  }

  private emit(event: CompilationProgressEvent): void {
    if (!this.onProgress) return;
    try {
      this.onProgress(event);
    } catch (err) {
      this.logger.warn({ err, event: event.type }, 'Progress listener threw');
    }
  }

  private buildSummary(
    params: CompilationParams,
    progress: RunProgress,
    status: CompilationStatus,
    startedAt: string,
  ): CompilationSummary {
    return {
      ...params,
      status,
      gamesDiscovered: progress.gamesDiscovered,
      gamesProcessed: progress.gamesProcessed,
      rowsTouched: { ...progress.rowsTouched },
      warnings: [...progress.warnings],
      startedAt,
      finishedAt: new Date().toISOString(),
    };
  }
}
