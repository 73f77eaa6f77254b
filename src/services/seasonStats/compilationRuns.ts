/**
 * Compilation Runs
 *
 * Starts season compilations in the background for the HTTP API and keeps a
 * short history of their outcome. Parameters are validated before a run is
 * accepted; everything after that is reported through the run record.
 */

import { randomUUID } from 'crypto';
import { AppError, CompilationInProgressError, PersistenceError } from '../../errors';
import type { CompilationParams, CompilationSummary } from '../../types/compilation';
import { createLogger } from '../../utils/logger';
import { runWithContext } from '../../utils/requestContext';
import { SeasonCompiler, validateCompilationParams } from './seasonCompiler';
import type { CompilationLock, SeasonStatsStore, SourceFeed } from './types';

const logger = createLogger('compilationRuns');

const DEFAULT_HISTORY_SIZE = 20;

export type CompilationRunStatus = 'running' | 'completed' | 'aborted';

export interface CompilationRunError {
  message: string;
  code?: string;
}

export interface CompilationRun {
  runId: string;
  status: CompilationRunStatus;
  params: CompilationParams;
  startedAt: string;
  finishedAt: string | null;
  currentWeek: number | null;
  gamesProcessed: number;
  summary: CompilationSummary | null;
  error: CompilationRunError | null;
}

export interface CompilationRunnerOptions {
  feed: SourceFeed;
  store: SeasonStatsStore;
  lock: CompilationLock;
  fetchConcurrency?: number;
  /** Finished runs kept for status queries. */
  historySize?: number;
}

export class CompilationRunner {
  private readonly runs = new Map<string, CompilationRun>();
  private readonly pending = new Map<string, Promise<void>>();
  private readonly historySize: number;

  constructor(private readonly options: CompilationRunnerOptions) {
    this.historySize = options.historySize ?? DEFAULT_HISTORY_SIZE;
  }

  /**
   * Validate and start a run. Returns once the run is registered; the
   * compilation itself continues in the background.
   *
   * @throws ValidationError for invalid parameters
   * @throws CompilationInProgressError when this process already has a run going
   */
  start(input: unknown, requestId: string): CompilationRun {
    const params = validateCompilationParams(input);

    for (const run of this.runs.values()) {
      if (run.status === 'running') {
        throw new CompilationInProgressError(`run:${run.runId}`);
      }
    }

    const run: CompilationRun = {
      runId: randomUUID(),
      status: 'running',
      params,
      startedAt: new Date().toISOString(),
      finishedAt: null,
      currentWeek: null,
      gamesProcessed: 0,
      summary: null,
      error: null,
    };
    this.runs.set(run.runId, run);
    this.evictHistory();

    const done = runWithContext({ requestId, runId: run.runId }, () => this.execute(run));
    this.pending.set(run.runId, done);
    logger.info({ runId: run.runId, ...params }, 'Compilation run accepted');
    return { ...run };
  }

  get(runId: string): CompilationRun | null {
    const run = this.runs.get(runId);
    return run ? { ...run } : null;
  }

  /** Resolves when the run has finished, whatever its outcome. */
  async waitFor(runId: string): Promise<CompilationRun | null> {
    await this.pending.get(runId);
    return this.get(runId);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Internal
  // ─────────────────────────────────────────────────────────────────────────

  private async execute(run: CompilationRun): Promise<void> {
    const compiler = new SeasonCompiler({
      feed: this.options.feed,
      store: this.options.store,
      lock: this.options.lock,
      fetchConcurrency: this.options.fetchConcurrency,
      onProgress: (event) => {
        if (event.type === 'week_started') run.currentWeek = event.week;
        if (event.type === 'game_merged') run.gamesProcessed++;
      },
    });

    try {
      run.summary = await compiler.run(run.params);
      run.status = 'completed';
    } catch (err) {
      run.status = 'aborted';
      run.error = AppError.isAppError(err)
        ? { message: err.message, code: err.code }
        : { message: err instanceof Error ? err.message : String(err) };
      if (err instanceof PersistenceError && err.progress) {
        run.summary = err.progress;
      }
      logger.error({ runId: run.runId, err }, 'Compilation run aborted');
    } finally {
      run.finishedAt = new Date().toISOString();
      this.pending.delete(run.runId);
    }
  }

  private evictHistory(): void {
    if (this.runs.size <= this.historySize) return;
    for (const [runId, run] of this.runs) {
      if (this.runs.size <= this.historySize) break;
      if (run.status !== 'running') this.runs.delete(runId);
    }
  }
}
