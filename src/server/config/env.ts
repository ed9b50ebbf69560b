/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for all environment variables the host
 * layer reads. The engine core never touches the environment; everything it
 * needs is passed in by the host from the config built here.
 */

import { z } from 'zod';
import { isJestRuntime } from '../../shared/utils/envFlags';

/**
 * Node environment schema.
 */
export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

/**
 * Log level schema.
 */
export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Log format schema.
 */
export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

/**
 * Complete environment variable schema with validation rules and defaults.
 */
export const EnvSchema = z.object({
  // ===================================================================
  // ENVIRONMENT
  // ===================================================================

  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  // ===================================================================
  // LOGGING
  // ===================================================================

  /** Minimum level written by the winston logger */
  LOG_LEVEL: LogLevelSchema.default('info'),

  /** Console output format */
  LOG_FORMAT: LogFormatSchema.default('pretty'),

  /** Optional file that receives JSON log lines in addition to the console */
  LOG_FILE: z.string().optional(),

  // ===================================================================
  // GAME
  // ===================================================================

  /** Fixed dice seed for reproducible games; a fresh seed is drawn when unset */
  GAME_SEED: z.coerce.number().int().optional(),

  /** Cap on initial-roll re-rolls after ties */
  MAX_INITIAL_ROLL_ATTEMPTS: z.coerce.number().int().positive().default(1000),

  // ===================================================================
  // PERSISTENCE
  // ===================================================================

  /** Directory the file snapshot store writes game records to */
  SNAPSHOT_DIR: z.string().min(1).default('./saves'),
});

/**
 * Inferred type for raw environment variables.
 */
export type RawEnv = z.infer<typeof EnvSchema>;

/**
 * Result of environment validation.
 */
export type EnvValidationResult =
  | { success: true; data: RawEnv }
  | { success: false; errors: Array<{ path: string; message: string }> };

/**
 * Parse and validate environment variables.
 *
 * @param env - Environment object to parse (defaults to process.env)
 */
export function parseEnv(
  env: Record<string, string | undefined> = process.env
): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const errors =
      result.error.issues.length > 0
        ? result.error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          }))
        : [{ path: '', message: result.error.message }];

    return { success: false, errors };
  }

  return { success: true, data: result.data };
}

/**
 * Load and validate environment variables, exiting on failure.
 *
 * Called once at startup. On failure it prints every problem and exits.
 */
export function loadEnvOrExit(env: Record<string, string | undefined> = process.env): RawEnv {
  const result = parseEnv(env);

  if (!result.success) {
    console.error('Invalid environment configuration:');
    for (const error of result.errors) {
      console.error(`  - ${error.path || 'root'}: ${error.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

/**
 * Determine effective node environment.
 *
 * Under Jest the environment is always treated as 'test', whatever NODE_ENV
 * says.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}

export function isProduction(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'production';
}

export function isDevelopment(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'development';
}

export function isTest(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'test';
}
