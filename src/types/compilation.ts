import type { CategoryCounts } from './stats';

export const SEASON_TYPES = {
  preseason: 1,
  regular: 2,
  playoffs: 3,
} as const;

export type SeasonType = (typeof SEASON_TYPES)[keyof typeof SEASON_TYPES];

export const SEASON_TYPE_LABELS: Record<SeasonType, string> = {
  1: 'Preseason',
  2: 'Regular Season',
  3: 'Playoffs',
};

/** Last week number each season type can have. */
export const MAX_WEEKS: Record<SeasonType, number> = {
  1: 4,
  2: 18,
  3: 4,
};

export interface CompilationParams {
  season: number;
  endWeek: number;
  seasonType: SeasonType;
}

export interface GameWarning {
  week: number;
  /** `null` when game discovery for the whole week failed. */
  gameId: string | null;
  message: string;
  code?: string;
}

export type CompilationStatus = 'completed' | 'aborted';

export interface CompilationSummary extends CompilationParams {
  status: CompilationStatus;
  gamesDiscovered: number;
  gamesProcessed: number;
  rowsTouched: CategoryCounts;
  warnings: GameWarning[];
  startedAt: string;
  finishedAt: string | null;
}

export type CompilationProgressEvent =
  | { type: 'reset' }
  | { type: 'week_started'; week: number; gameIds: string[] }
  | { type: 'game_merged'; week: number; gameId: string; rowsTouched: CategoryCounts }
  | { type: 'game_skipped'; warning: GameWarning };
