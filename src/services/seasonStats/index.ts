/**
 * Season stats barrel export
 */
export { STAT_INDEX, CATEGORY_TABLES, LEADERBOARD_ORDER, DEFAULT_LEADERBOARD_LIMITS, MAX_LEADERBOARD_LIMIT } from './statSchema';
export { parseStatToken, toInt, toFraction, mergeFraction, type FractionPair } from './statNormalizer';
export { extractPlayerStats } from './boxscoreExtractor';
export { mergeRecord, mergeCategoryBatch, mergeGameRecords } from './categoryMerge';
export {
  SeasonCompiler,
  validateCompilationParams,
  COMPILATION_LOCK_KEY,
  type SeasonCompilerOptions,
} from './seasonCompiler';
export {
  RedisCompilationLock,
  InProcessCompilationLock,
  createCompilationLock,
  type LockRedisClient,
} from './compilationLock';
export {
  CompilationRunner,
  type CompilationRun,
  type CompilationRunStatus,
  type CompilationRunnerOptions,
} from './compilationRuns';
export type { SourceFeed, SeasonStatsStore, CompilationLock, LockLease } from './types';
