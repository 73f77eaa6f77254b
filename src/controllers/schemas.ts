/**
 * Request Validation Schemas
 *
 * Zod schemas for path parameters and query strings of the read API.
 * The compilation body is checked by `validateCompilationParams`, which
 * the CLI shares.
 */

import { z } from 'zod';
import { STAT_CATEGORIES } from '../types/stats';
import { MAX_LEADERBOARD_LIMIT } from '../services/seasonStats/statSchema';

// ─────────────────────────────────────────────────────────────────────────────
// Shared primitives
// ─────────────────────────────────────────────────────────────────────────────

/** Non-empty trimmed string. */
const nonEmptyString = z.string().trim().min(1);

/** ESPN athlete ids are numeric strings. */
export const playerIdString = z.string().regex(/^\d{1,20}$/, 'playerId must be a numeric ESPN athlete id');

// ─────────────────────────────────────────────────────────────────────────────
// Path parameter schemas
// ─────────────────────────────────────────────────────────────────────────────

export const categoryParams = z.object({
  category: z.enum(STAT_CATEGORIES, {
    message: `category must be one of: ${STAT_CATEGORIES.join(', ')}`,
  }),
});

export const playerIdParams = z.object({
  playerId: playerIdString,
});

export const runIdParams = z.object({
  runId: nonEmptyString,
});

// ─────────────────────────────────────────────────────────────────────────────
// Query schemas
// ─────────────────────────────────────────────────────────────────────────────

export const leaderboardQuery = z.object({
  limit: z.coerce
    .number()
    .int('limit must be an integer')
    .min(1, 'limit must be at least 1')
    .max(MAX_LEADERBOARD_LIMIT, `limit must be at most ${MAX_LEADERBOARD_LIMIT}`)
    .optional(),
});

export type CategoryParams = z.infer<typeof categoryParams>;
export type LeaderboardQuery = z.infer<typeof leaderboardQuery>;
