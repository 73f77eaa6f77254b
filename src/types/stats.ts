export const STAT_CATEGORIES = [
  'passing',
  'rushing',
  'receiving',
  'fumbles',
  'defensive',
  'interceptions',
] as const;

export type StatCategory = (typeof STAT_CATEGORIES)[number];

export function isStatCategory(value: unknown): value is StatCategory {
  return typeof value === 'string' && STAT_CATEGORIES.some((category) => category === value);
}

// ─────────────────────────────────────────────────────────────────────────────
// Identity
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Display metadata copied from the latest game processed for a player.
 */
export interface PlayerIdentity {
  team_id: string | null;
  team_name: string | null;
  player_id: string | null;
  player_name: string | null;
  player_headshot_url: string | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Category lines
// ─────────────────────────────────────────────────────────────────────────────

export interface PassingLine {
  /** Composite "completions/attempts"; see `mergeFraction`. */
  completions_attempts: string | null;
  passing_yards: number | null;
  passing_touchdowns: number | null;
  interceptions: number | null;
  sacks: number | null;
}

export interface RushingLine {
  rushing_attempts: number | null;
  rushing_yards: number | null;
  rushing_touchdowns: number | null;
  longest_run: number | null;
}

export interface ReceivingLine {
  receptions: number | null;
  receiving_yards: number | null;
  receiving_touchdowns: number | null;
  longest_reception: number | null;
  targets: number | null;
}

export interface FumblesLine {
  fumbles: number | null;
  fumbles_lost: number | null;
  fumbles_recovered: number | null;
}

export interface DefensiveLine {
  total_tackles: number | null;
  solo_tackles: number | null;
  sacks: number | null;
  tackles_for_loss: number | null;
  passes_defended: number | null;
  qb_hits: number | null;
  defensive_touchdowns: number | null;
}

export interface InterceptionsLine {
  interceptions: number | null;
  interception_yards: number | null;
  interception_touchdowns: number | null;
}

export interface CategoryLines {
  passing: PassingLine;
  rushing: RushingLine;
  receiving: ReceivingLine;
  fumbles: FumblesLine;
  defensive: DefensiveLine;
  interceptions: InterceptionsLine;
}

// ─────────────────────────────────────────────────────────────────────────────
// Records and aggregates
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One athlete's line in one category for a single game.
 */
export type PlayerGameRecord<C extends StatCategory = StatCategory> = PlayerIdentity & CategoryLines[C];

/**
 * Persisted season totals for one player in one category.
 */
export type PlayerSeasonAggregate<C extends StatCategory = StatCategory> = PlayerGameRecord<C> & {
  player_id: string;
  created_at?: string;
  updated_at?: string;
};

/**
 * Extractor output: one list of records per category.
 */
export type CategoryRecords = { [C in StatCategory]: PlayerGameRecord<C>[] };

export type CategoryCounts = Record<StatCategory, number>;

export function emptyCategoryRecords(): CategoryRecords {
  return {
    passing: [],
    rushing: [],
    receiving: [],
    fumbles: [],
    defensive: [],
    interceptions: [],
  };
}

export function emptyCategoryCounts(): CategoryCounts {
  return {
    passing: 0,
    rushing: 0,
    receiving: 0,
    fumbles: 0,
    defensive: 0,
    interceptions: 0,
  };
}
