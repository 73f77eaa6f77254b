/**
 * Environment Configuration
 *
 * Validates and exports typed environment variables using Zod.
 * Fails fast on startup if required variables are missing or invalid.
 *
 * Usage:
 *   import { env } from '../config/env';
 *   console.log(env.PORT); // number, guaranteed to be valid
 */

import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────
// Schema Definition
// ─────────────────────────────────────────────────────────────────────────────

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((val) => (val && val.length > 0 ? val : undefined));

const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(5001),
  CORS_ALLOWED_ORIGINS: z.string().default('http://localhost:5173'),

  // Supabase (required)
  SUPABASE_URL: z.url().min(1, 'SUPABASE_URL is required'),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1, 'SUPABASE_SERVICE_ROLE_KEY is required'),

  // Redis (optional: enables the cross-process compilation lock)
  REDIS_URL: optionalString,

  // Admin surface
  ADMIN_API_TOKEN: optionalString,

  // ESPN source feed
  ESPN_SITE_API_BASE: z
    .url()
    .default('https://site.api.espn.com/apis/site/v2/sports/football/nfl'),
  ESPN_REQUEST_TIMEOUT_MS: z.coerce.number().int().min(1000).default(15_000),

  // Season compilation
  COMPILE_FETCH_CONCURRENCY: z.coerce.number().int().min(1).max(8).default(1),
  COMPILE_LOCK_TTL_SECONDS: z.coerce.number().int().min(60).default(60 * 60),
});

// ─────────────────────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────────────────────

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

/**
 * Get the validated environment configuration.
 * Parses on first call and caches the result.
 * Throws if validation fails.
 */
export function getEnv(): Env {
  if (_env) {
    return _env;
  }

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.issues
      .map((err) => `  - ${err.path.join('.')}: ${err.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }

  _env = result.data;
  return _env;
}

/**
 * Drop the cached configuration so the next `getEnv()` re-reads `process.env`.
 * Tests use this after changing variables.
 */
export function resetEnvCache(): void {
  _env = null;
}

/**
 * Validate environment on import for fail-fast behavior.
 */
function validateOnStartup(): void {
  try {
    getEnv();
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

// Only validate on startup in non-test environments
if (process.env.NODE_ENV !== 'test') {
  validateOnStartup();
}

// Export a lazy-evaluated env object for convenience
export const env: Readonly<Env> = new Proxy({} as Env, {
  get(_target, prop: string) {
    const current = getEnv();
    return prop in current ? current[prop as keyof Env] : undefined;
  },
});
