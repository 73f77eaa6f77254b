/**
 * Test Fixtures - Factory Functions
 *
 * Builders for ESPN-shaped game summaries and stored aggregates. Stat lines
 * are positional arrays in the order ESPN uses for each group.
 */

import type { PlayerSeasonAggregate, StatCategory } from '../../src/types/stats';

// ─────────────────────────────────────────────────────────────────────────────
// Game summary payloads
// ─────────────────────────────────────────────────────────────────────────────

export interface AthleteLine {
  id: string | number | null;
  name?: string;
  headshot?: string;
  stats: unknown[];
}

export interface TeamBox {
  id: string;
  name: string;
  groups: Partial<Record<StatCategory | string, AthleteLine[]>>;
}

export function athlete(id: string | number | null, stats: unknown[], name?: string): AthleteLine {
  return { id, stats, name: name ?? `Player ${String(id)}` };
}

/**
 * One entry of `boxscore.players`.
 */
export function teamBlock(team: TeamBox): Record<string, unknown> {
  return {
    team: { id: team.id, displayName: team.name },
    statistics: Object.entries(team.groups).map(([name, athletes]) => ({
      name,
      athletes: (athletes ?? []).map((line) => ({
        athlete: {
          id: line.id,
          displayName: line.name,
          headshot: { href: line.headshot ?? `https://img.test/${String(line.id)}.png` },
        },
        stats: line.stats,
      })),
    })),
  };
}

export function gameSummary(...teams: TeamBox[]): Record<string, unknown> {
  return { boxscore: { players: teams.map(teamBlock) } };
}

// ESPN column order per group

/** C/ATT, YDS, AVG, TD, INT, SACKS, QBR, RTG */
export function passingLine(ca: string, yards: string, td: string, ints: string, sacks = '0'): unknown[] {
  return [ca, yards, '7.5', td, ints, sacks, '60.1', '98.2'];
}

/** CAR, YDS, AVG, TD, LONG */
export function rushingLine(carries: string, yards: string, td: string, long: string): unknown[] {
  return [carries, yards, '4.0', td, long];
}

/** REC, YDS, AVG, TD, LONG, TGTS */
export function receivingLine(rec: string, yards: string, td: string, long: string, targets: string): unknown[] {
  return [rec, yards, '10.0', td, long, targets];
}

/** FUM, LOST, REC */
export function fumblesLine(fum: string, lost: string, rec: string): unknown[] {
  return [fum, lost, rec];
}

/** TOT, SOLO, SACKS, TFL, PD, QB HTS, TD */
export function defensiveLine(tot: string, solo: string, sacks: string, tfl: string, pd: string, hits: string, td: string): unknown[] {
  return [tot, solo, sacks, tfl, pd, hits, td];
}

/** INT, YDS, TD */
export function interceptionsLine(ints: string, yards: string, td: string): unknown[] {
  return [ints, yards, td];
}

// ─────────────────────────────────────────────────────────────────────────────
// Stored aggregates
// ─────────────────────────────────────────────────────────────────────────────

export function rushingAggregate(
  playerId: string,
  overrides: Partial<PlayerSeasonAggregate<'rushing'>> = {},
): PlayerSeasonAggregate<'rushing'> {
  return {
    team_id: '1',
    team_name: 'Test Team',
    player_id: playerId,
    player_name: `Player ${playerId}`,
    player_headshot_url: null,
    rushing_attempts: 10,
    rushing_yards: 50,
    rushing_touchdowns: 0,
    longest_run: 12,
    ...overrides,
  };
}

export function passingAggregate(
  playerId: string,
  overrides: Partial<PlayerSeasonAggregate<'passing'>> = {},
): PlayerSeasonAggregate<'passing'> {
  return {
    team_id: '1',
    team_name: 'Test Team',
    player_id: playerId,
    player_name: `Player ${playerId}`,
    player_headshot_url: null,
    completions_attempts: '20/30',
    passing_yards: 200,
    passing_touchdowns: 1,
    interceptions: 0,
    sacks: 1,
    ...overrides,
  };
}
