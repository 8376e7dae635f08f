/**
 * Unified Application Configuration
 *
 * This module is the canonical source of truth for all application configuration.
 * It parses environment variables, validates them with Zod, and exports a frozen
 * config object that all server code should use.
 *
 * Architecture:
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { NodeEnvSchema, LogFormatSchema, LogLevelSchema, loadEnvOrExit, getEffectiveNodeEnv } from './env';
import type { RawEnv } from './env';

// Load .env into process.env before we read anything from it.
// Skipped in test mode so a developer's .env cannot override test settings.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

const DEV_JWT_SECRET = 'dev-access-token-secret';
const JWT_SECRET_MIN_LENGTH = 32;

/**
 * Application configuration schema.
 */
const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  isProduction: z.boolean(),
  isDevelopment: z.boolean(),
  isTest: z.boolean(),
  app: z.object({
    version: z.string().min(1),
  }),
  server: z.object({
    port: z.number().int().positive(),
    host: z.string().min(1),
    corsOrigin: z.string().min(1),
    wsPath: z.string().min(1),
  }),
  database: z.object({
    // Optional outside production; required in production via the guard in buildConfig.
    url: z.string().min(1).optional(),
    poolMax: z.number().int().positive(),
  }),
  auth: z.object({
    jwtSecret: z.string().min(1),
  }),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
    file: z.string().optional(),
  }),
  game: z.object({
    initialClockSeconds: z.number().int().positive(),
    completedSessionTtlMs: z.number().int().positive(),
    sweepIntervalMs: z.number().int().positive(),
    outboxMaxQueued: z.number().int().positive(),
  }),
  rating: z.object({
    kFactor: z.number().int().positive(),
  }),
});

/**
 * Application configuration type inferred from the schema.
 */
export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Assemble the application config from an already-validated environment.
 * Throws when production requirements are not met.
 */
export function buildConfig(env: RawEnv): AppConfig {
  const nodeEnv = getEffectiveNodeEnv(env);
  const isProduction = nodeEnv === 'production';

  // Database URL – required in production, optional elsewhere (the server
  // falls back to the in-memory account store).
  const databaseUrl = env.DATABASE_URL?.trim() || undefined;
  if (isProduction && !databaseUrl) {
    throw new Error('DATABASE_URL is required when NODE_ENV=production');
  }

  // Outside production we fall back to a stable development secret so local
  // runs work without JWT env vars.
  let jwtSecret = env.JWT_SECRET?.trim() || undefined;
  if (!jwtSecret && !isProduction) {
    jwtSecret = DEV_JWT_SECRET;
  }
  if (isProduction && (!jwtSecret || jwtSecret.length < JWT_SECRET_MIN_LENGTH)) {
    throw new Error(
      `Invalid JWT configuration for NODE_ENV=production: JWT_SECRET must be at least ${JWT_SECRET_MIN_LENGTH} characters`
    );
  }

  const preliminaryConfig = {
    nodeEnv,
    isProduction,
    isDevelopment: nodeEnv === 'development',
    isTest: nodeEnv === 'test',
    app: {
      version: env.npm_package_version?.trim() || '1.0.0',
    },
    server: {
      port: env.PORT,
      host: env.HOST,
      corsOrigin: env.CORS_ORIGIN,
      wsPath: env.WS_PATH,
    },
    database: {
      url: databaseUrl,
      poolMax: env.DATABASE_POOL_MAX,
    },
    auth: {
      jwtSecret,
    },
    logging: {
      level: env.LOG_LEVEL,
      // JSON in production unless explicitly overridden.
      format: env.LOG_FORMAT ?? (isProduction ? 'json' : 'pretty'),
      file: env.LOG_FILE?.trim() || undefined,
    },
    game: {
      initialClockSeconds: env.GAME_INITIAL_CLOCK_SECONDS,
      completedSessionTtlMs: env.COMPLETED_SESSION_TTL_MS,
      sweepIntervalMs: env.SESSION_SWEEP_INTERVAL_MS,
      outboxMaxQueued: env.OUTBOX_MAX_QUEUED,
    },
    rating: {
      kFactor: env.RATING_K_FACTOR,
    },
  };

  // Parse and freeze so downstream code gets a fully validated, immutable view.
  return Object.freeze(ConfigSchema.parse(preliminaryConfig));
}

export const config: AppConfig = buildConfig(loadEnvOrExit(process.env));
