/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for all environment variables,
 * validates them at startup, and exports typed helpers around the result.
 *
 * All environment variables should be defined here with appropriate
 * validation rules and defaults.
 */

import { z } from 'zod';
import { isJestRuntime } from '../../shared/utils/envFlags';

/**
 * Node environment schema - supports development, staging, production, and test.
 */
export const NodeEnvSchema = z.enum(['development', 'staging', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

/**
 * Log level schema (winston npm levels).
 */
export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Log format schema.
 */
export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

/**
 * Complete environment variable schema with validation rules and defaults.
 *
 * Variables are organized by category:
 * - Environment & Server
 * - Database
 * - Authentication
 * - Logging
 * - Game Configuration
 */
export const EnvSchema = z.object({
  // ===================================================================
  // ENVIRONMENT & SERVER
  // ===================================================================

  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  /** HTTP server port */
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),

  /** Server bind address */
  HOST: z.string().default('0.0.0.0'),

  /** Path the Socket.IO endpoint is mounted on */
  WS_PATH: z.string().startsWith('/').default('/ws'),

  /** Allowed CORS origin for HTTP and WebSocket handshakes */
  CORS_ORIGIN: z.string().default('*'),

  /** Application version (injected by npm) */
  npm_package_version: z.string().optional(),

  // ===================================================================
  // DATABASE
  // ===================================================================

  /** PostgreSQL connection URL (required in production) */
  DATABASE_URL: z.string().optional(),

  /** Maximum database pool connections */
  DATABASE_POOL_MAX: z.coerce.number().int().min(1).default(10),

  // ===================================================================
  // AUTHENTICATION
  // ===================================================================

  /** JWT secret used to verify handshake tokens (required in production) */
  JWT_SECRET: z.string().optional(),

  // ===================================================================
  // LOGGING
  // ===================================================================

  LOG_LEVEL: LogLevelSchema.default('info'),

  LOG_FORMAT: LogFormatSchema.optional(),

  /** Optional path of a JSON log file written alongside the console */
  LOG_FILE: z.string().optional(),

  // ===================================================================
  // GAME CONFIGURATION
  // ===================================================================

  /** Starting clock for each color (seconds) */
  GAME_INITIAL_CLOCK_SECONDS: z.coerce.number().int().positive().default(600),

  /** Elo K-factor applied to both players */
  RATING_K_FACTOR: z.coerce.number().int().positive().default(32),

  /** How long a completed session stays readable before it is swept */
  COMPLETED_SESSION_TTL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),

  /** Interval of the completed-session sweeper */
  SESSION_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(60 * 1000),

  /** Pending outbound messages per connection before it is dropped */
  OUTBOX_MAX_QUEUED: z.coerce.number().int().positive().default(256),
});

/**
 * Inferred type for raw environment variables.
 */
export type RawEnv = z.infer<typeof EnvSchema>;

/**
 * Result of environment validation.
 */
export interface EnvValidationResult {
  success: boolean;
  data?: RawEnv;
  errors?: Array<{ path: string; message: string }>;
}

/**
 * Parse and validate environment variables.
 *
 * @param env - Environment object to parse (defaults to process.env)
 */
export function parseEnv(env: NodeJS.ProcessEnv = process.env): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const errors =
      result.error.issues.length > 0
        ? result.error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          }))
        : [{ path: '', message: result.error.message }];

    return {
      success: false,
      errors,
    };
  }

  return {
    success: true,
    data: result.data,
  };
}

/**
 * Load and validate environment variables, exiting on failure.
 *
 * This function should be called once at startup. If validation fails,
 * it prints the problems and exits the process.
 */
export function loadEnvOrExit(env: NodeJS.ProcessEnv = process.env): RawEnv {
  const result = parseEnv(env);

  if (!result.success || !result.data) {
    console.error('❌ Invalid environment configuration:');
    for (const error of result.errors ?? []) {
      console.error(`  - ${error.path || 'root'}: ${error.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

/**
 * Determine effective node environment.
 *
 * When running under Jest, always treats the environment as 'test'
 * regardless of NODE_ENV.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}

export function isProduction(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'production';
}

export function isTest(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'test';
}

/**
 * Check if running in a production-like environment (production or staging).
 */
export function isProductionLike(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'production' || nodeEnv === 'staging';
}
