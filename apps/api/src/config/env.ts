import { z } from 'zod';

import { createLogger } from '@tracklift/providers-core';

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined || value === '' ? fallback : ['1', 'true', 'yes', 'on'].includes(value.toLowerCase())));

/**
 * Environment configuration schema with validation
 * The app refuses to boot when this does not parse.
 */
const EnvSchema = z.object({
  // ========== Core Application ==========
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3101),
  HOST: z.string().default('0.0.0.0'),

  // ========== Platforms - Spotify ==========
  SPOTIFY_ACCESS_TOKEN: z.string().optional(),
  SPOTIFY_CLIENT_ID: z.string().optional(),
  SPOTIFY_CLIENT_SECRET: z.string().optional(),
  SPOTIFY_REFRESH_TOKEN: z.string().optional(),

  // ========== Platforms - YouTube ==========
  YOUTUBE_API_KEY: z.string().optional(),
  YOUTUBE_ACCESS_TOKEN: z.string().optional(),

  // ========== Match oracle ==========
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().default('gemini-2.0-flash'),

  // ========== Transfers ==========
  PLAYLIST_NAMING_MODE: z.enum(['source', 'fixed']).default('source'),
  FIXED_PLAYLIST_NAME: z.string().min(1).default('Imported Playlist'),

  // ========== Redis & rate limiting ==========
  REDIS_URL: z.string().url().optional(),
  RATE_LIMIT_REQUESTS: z.coerce.number().int().positive().default(3),
  RATE_LIMIT_WINDOW_MINUTES: z.coerce.number().positive().default(60),

  // ========== Observability ==========
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  ENABLE_METRICS: flag(true),
})
.refine(
  (data) => {
    // A refresh token is useless without the client credentials that redeem it
    if (data.SPOTIFY_REFRESH_TOKEN) {
      return !!(data.SPOTIFY_CLIENT_ID && data.SPOTIFY_CLIENT_SECRET);
    }
    return true;
  },
  {
    message: 'SPOTIFY_CLIENT_ID and SPOTIFY_CLIENT_SECRET are required when SPOTIFY_REFRESH_TOKEN is set',
  }
);

export type Env = z.infer<typeof EnvSchema>;
let envCache: Env | null = null;

/**
 * Parses an environment map. Throws ZodError with one issue per bad variable.
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return EnvSchema.parse(source);
}

/**
 * Load and validate environment variables
 * Exits the process listing every problem when validation fails
 */
function loadEnv(): Env {
  if (!envCache) {
    try {
      envCache = parseEnv(process.env);
    } catch (error) {
      if (error instanceof z.ZodError) {
        const logger = createLogger('config');
        logger.fatal(
          { problems: error.errors.map((err) => `${err.path.join('.')}: ${err.message}`) },
          'Environment validation failed; check .env.example for the supported variables',
        );
        process.exit(1);
      }
      throw error;
    }
  }
  return envCache;
}

/**
 * Validated environment configuration
 * Access via env.VARIABLE_NAME - will exit on first access if invalid
 */
export const env: Env = new Proxy({} as Env, {
  get(_target, prop) {
    return loadEnv()[prop as keyof Env];
  },
});

