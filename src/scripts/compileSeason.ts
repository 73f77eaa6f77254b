#!/usr/bin/env node
/**
 * Rebuild every season aggregate from ESPN box scores.
 *
 * Usage:
 *   npm run compile -- --season 2025 --end-week 7 --season-type 2
 *
 * Prints the run summary as JSON. Exit codes: 0 completed, 1 aborted or
 * failed, 2 invalid arguments.
 */

import 'dotenv/config';
import { randomUUID } from 'crypto';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { env } from '../config/env';
import { AppError, PersistenceError, ValidationError } from '../errors';
import { SeasonStatsRepository } from '../repositories/SeasonStatsRepository';
import { SeasonCompiler, createCompilationLock, validateCompilationParams } from '../services/seasonStats';
import { getSupabaseAdmin } from '../supabaseClient';
import type { CompilationParams } from '../types/compilation';
import { createLogger } from '../utils/logger';
import { EspnSourceFeed } from '../utils/nfl/espnClient';
import { closeRedisClient } from '../utils/redisClient';
import { generateRequestId, runWithContext } from '../utils/requestContext';

const logger = createLogger('compileSeason');

export const EXIT_OK = 0;
export const EXIT_ABORTED = 1;
export const EXIT_USAGE = 2;

/**
 * Parse and validate command-line arguments (without the node/script prefix).
 *
 * @throws ValidationError for missing, unknown or out-of-range arguments
 */
export function parseCliArgs(args: string[]): CompilationParams {
  const argv = yargs(args)
    .scriptName('compile-season')
    .option('season', {
      type: 'number',
      describe: 'Season year, e.g. 2025',
      demandOption: true,
    })
    .option('end-week', {
      type: 'number',
      describe: 'Last week to include (weeks 1..end-week are compiled)',
      demandOption: true,
    })
    .option('season-type', {
      type: 'number',
      describe: '1 = preseason, 2 = regular season, 3 = playoffs',
      default: 2,
    })
    .strict()
    .exitProcess(false)
    .fail((message: string | undefined, err: Error | undefined) => {
      throw new ValidationError(message ?? err?.message ?? 'Invalid arguments');
    })
    .help(false)
    .version(false)
    .parseSync();

  return validateCompilationParams({
    season: argv.season,
    endWeek: argv['end-week'],
    seasonType: argv['season-type'],
  });
}

export async function main(args: string[]): Promise<number> {
  let params: CompilationParams;
  try {
    params = parseCliArgs(args);
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    return EXIT_USAGE;
  }

  const compiler = new SeasonCompiler({
    feed: new EspnSourceFeed(),
    store: new SeasonStatsRepository(getSupabaseAdmin()),
    lock: createCompilationLock(),
    fetchConcurrency: env.COMPILE_FETCH_CONCURRENCY,
  });

  const context = { requestId: generateRequestId(), runId: randomUUID() };
  try {
    const summary = await runWithContext(context, () => compiler.run(params));
    console.log(JSON.stringify(summary, null, 2));
    return EXIT_OK;
  } catch (err) {
    if (err instanceof PersistenceError && err.progress) {
      console.log(JSON.stringify(err.progress, null, 2));
    }
    const code = AppError.isAppError(err) ? err.code : undefined;
    logger.error({ err, code }, 'Season compilation failed');
    console.error(err instanceof Error ? err.message : String(err));
    return EXIT_ABORTED;
  } finally {
    await closeRedisClient();
  }
}

if (require.main === module) {
  main(hideBin(process.argv)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = EXIT_ABORTED;
    },
  );
}
