/**
 * Box Score Extractor
 *
 * Turns one ESPN game summary into per-category player records. The payload
 * shape is validated leniently: a block that does not match is skipped, and a
 * stat token that does not parse becomes `null`. Nothing here performs I/O.
 */

import { z } from 'zod';
import {
  emptyCategoryRecords,
  isStatCategory,
  type CategoryRecords,
  type PlayerGameRecord,
  type PlayerIdentity,
  type StatCategory,
} from '../../types/stats';
import { STAT_INDEX } from './statSchema';
import { toInt } from './statNormalizer';

// ─────────────────────────────────────────────────────────────────────────────
// Payload schemas
// ─────────────────────────────────────────────────────────────────────────────

const idSchema = z.union([z.string(), z.number()]).transform((value) => String(value));

const nullableId = idSchema.nullish().transform((value) => value ?? null);
const nullableText = z
  .string()
  .nullish()
  .catch(null)
  .transform((value) => value ?? null);

const teamSchema = z.object({
  id: nullableId.catch(null),
  displayName: nullableText,
});

const athleteEntrySchema = z.object({
  athlete: z
    .object({
      id: nullableId.catch(null),
      displayName: nullableText,
      headshot: z
        .object({ href: nullableText })
        .nullish()
        .catch(null),
    })
    .nullish()
    .catch(null),
  stats: z.array(z.unknown()).catch([]),
});

const statGroupSchema = z.object({
  name: z.string(),
  athletes: z.array(z.unknown()).catch([]),
});

const teamBlockSchema = z.object({
  team: teamSchema.nullish().catch(null),
  statistics: z.array(z.unknown()).catch([]),
});

const boxscoreSchema = z.object({
  players: z.array(z.unknown()),
});

const summarySchema = z.object({
  boxscore: boxscoreSchema,
});

type TeamIdentity = Pick<PlayerIdentity, 'team_id' | 'team_name'>;

// ─────────────────────────────────────────────────────────────────────────────
// Token readers
// ─────────────────────────────────────────────────────────────────────────────

function statAt(stats: readonly unknown[], index: number): number | null {
  return index < stats.length ? toInt(stats[index]) : null;
}

/**
 * Completions/attempts keeps its composite form ("22/31") untouched; a lone
 * number is kept as its plain string.
 */
function compositeAt(stats: readonly unknown[], index: number): string | null {
  const raw = index < stats.length ? stats[index] : null;
  if (typeof raw === 'string' && (raw.includes('/') || raw.includes('-'))) {
    return raw;
  }
  const value = toInt(raw);
  return value === null ? null : String(value);
}

// ─────────────────────────────────────────────────────────────────────────────
// Record builders
// ─────────────────────────────────────────────────────────────────────────────

type RecordBuilder<C extends StatCategory> = (
  identity: PlayerIdentity,
  stats: readonly unknown[],
) => PlayerGameRecord<C>;

const RECORD_BUILDERS: { [C in StatCategory]: RecordBuilder<C> } = {
  passing: (identity, stats) => ({
    ...identity,
    completions_attempts: compositeAt(stats, STAT_INDEX.passing.completions_attempts),
    passing_yards: statAt(stats, STAT_INDEX.passing.passing_yards),
    passing_touchdowns: statAt(stats, STAT_INDEX.passing.passing_touchdowns),
    interceptions: statAt(stats, STAT_INDEX.passing.interceptions),
    sacks: statAt(stats, STAT_INDEX.passing.sacks),
  }),
  rushing: (identity, stats) => ({
    ...identity,
    rushing_attempts: statAt(stats, STAT_INDEX.rushing.rushing_attempts),
    rushing_yards: statAt(stats, STAT_INDEX.rushing.rushing_yards),
    rushing_touchdowns: statAt(stats, STAT_INDEX.rushing.rushing_touchdowns),
    longest_run: statAt(stats, STAT_INDEX.rushing.longest_run),
  }),
  receiving: (identity, stats) => ({
    ...identity,
    receptions: statAt(stats, STAT_INDEX.receiving.receptions),
    receiving_yards: statAt(stats, STAT_INDEX.receiving.receiving_yards),
    receiving_touchdowns: statAt(stats, STAT_INDEX.receiving.receiving_touchdowns),
    longest_reception: statAt(stats, STAT_INDEX.receiving.longest_reception),
    targets: statAt(stats, STAT_INDEX.receiving.targets),
  }),
  fumbles: (identity, stats) => ({
    ...identity,
    fumbles: statAt(stats, STAT_INDEX.fumbles.fumbles),
    fumbles_lost: statAt(stats, STAT_INDEX.fumbles.fumbles_lost),
    fumbles_recovered: statAt(stats, STAT_INDEX.fumbles.fumbles_recovered),
  }),
  defensive: (identity, stats) => ({
    ...identity,
    total_tackles: statAt(stats, STAT_INDEX.defensive.total_tackles),
    solo_tackles: statAt(stats, STAT_INDEX.defensive.solo_tackles),
    sacks: statAt(stats, STAT_INDEX.defensive.sacks),
    tackles_for_loss: statAt(stats, STAT_INDEX.defensive.tackles_for_loss),
    passes_defended: statAt(stats, STAT_INDEX.defensive.passes_defended),
    qb_hits: statAt(stats, STAT_INDEX.defensive.qb_hits),
    defensive_touchdowns: statAt(stats, STAT_INDEX.defensive.defensive_touchdowns),
  }),
  interceptions: (identity, stats) => ({
    ...identity,
    interceptions: statAt(stats, STAT_INDEX.interceptions.interceptions),
    interception_yards: statAt(stats, STAT_INDEX.interceptions.interception_yards),
    interception_touchdowns: statAt(stats, STAT_INDEX.interceptions.interception_touchdowns),
  }),
};

function appendRecord<C extends StatCategory>(
  records: CategoryRecords,
  category: C,
  identity: PlayerIdentity,
  stats: readonly unknown[],
): void {
  const build: RecordBuilder<C> = RECORD_BUILDERS[category];
  const bucket: PlayerGameRecord<C>[] = records[category];
  bucket.push(build(identity, stats));
}

// ─────────────────────────────────────────────────────────────────────────────
// Public API
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Locate `boxscore.players` in a summary document (or accept a bare box score).
 */
function getTeamBlocks(payload: unknown): unknown[] {
  const summary = summarySchema.safeParse(payload);
  if (summary.success) return summary.data.boxscore.players;
  const bare = boxscoreSchema.safeParse(payload);
  return bare.success ? bare.data.players : [];
}

/**
 * Extract every athlete's line from a game summary, grouped by category.
 */
export function extractPlayerStats(payload: unknown): CategoryRecords {
  const records = emptyCategoryRecords();

  for (const block of getTeamBlocks(payload)) {
    const parsedBlock = teamBlockSchema.safeParse(block);
    if (!parsedBlock.success) continue;

    const team: TeamIdentity = {
      team_id: parsedBlock.data.team?.id ?? null,
      team_name: parsedBlock.data.team?.displayName ?? null,
    };

    for (const group of parsedBlock.data.statistics) {
      const parsedGroup = statGroupSchema.safeParse(group);
      if (!parsedGroup.success) continue;
      const category = parsedGroup.data.name;
      if (!isStatCategory(category)) continue;

      for (const entry of parsedGroup.data.athletes) {
        const parsedEntry = athleteEntrySchema.safeParse(entry);
        if (!parsedEntry.success) continue;
        const athlete = parsedEntry.data.athlete;

        const identity: PlayerIdentity = {
          ...team,
          player_id: athlete?.id ?? null,
          player_name: athlete?.displayName ?? null,
          player_headshot_url: athlete?.headshot?.href ?? null,
        };
        appendRecord(records, category, identity, parsedEntry.data.stats);
      }
    }
  }

  return records;
}
