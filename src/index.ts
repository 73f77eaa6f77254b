import 'dotenv/config';
import { env } from './config/env';
import { createApp } from './app';
import { getHealthStatus } from './infrastructure/healthCheck';
import { SeasonStatsRepository } from './repositories/SeasonStatsRepository';
import { CompilationRunner, createCompilationLock } from './services/seasonStats';
import { getSupabaseAdmin } from './supabaseClient';
import { createLogger } from './utils/logger';
import { EspnSourceFeed } from './utils/nfl/espnClient';
import { closeRedisClient } from './utils/redisClient';

const logger = createLogger('server');

const store = new SeasonStatsRepository(getSupabaseAdmin());
const runner = new CompilationRunner({
  feed: new EspnSourceFeed(),
  store,
  lock: createCompilationLock(),
  fetchConcurrency: env.COMPILE_FETCH_CONCURRENCY,
});

const app = createApp({
  store,
  runner,
  healthCheck: getHealthStatus,
  corsAllowedOrigins: env.CORS_ALLOWED_ORIGINS,
});

const server = app.listen(env.PORT, () => {
  logger.info({ port: env.PORT, redisLock: Boolean(env.REDIS_URL) }, 'Server listening');
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, 'Shutting down');
  server.close();
  await closeRedisClient();
  process.exit(0);
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});
