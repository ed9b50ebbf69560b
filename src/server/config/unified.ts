/**
 * Unified Application Configuration
 *
 * Parses environment variables, validates them with Zod, and exports a
 * frozen config object that all host code should use.
 *
 * Architecture:
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 */

import dotenv from 'dotenv';
import { isEngineTraceEnabled } from '../../shared/utils/envFlags';
import {
  getEffectiveNodeEnv,
  loadEnvOrExit,
  type LogFormat,
  type LogLevel,
  type NodeEnv,
  type RawEnv,
} from './env';

export interface AppConfig {
  nodeEnv: NodeEnv;
  isProduction: boolean;
  isDevelopment: boolean;
  isTest: boolean;
  logging: {
    level: LogLevel;
    format: LogFormat;
    file: string | undefined;
    /** Force debug-level engine traces regardless of `level`. */
    engineTrace: boolean;
  };
  game: {
    seed: number | undefined;
    maxInitialRollAttempts: number;
  };
  snapshots: {
    dir: string;
  };
}

/**
 * Build the typed config from already-validated environment values.
 */
export function buildConfig(env: RawEnv): AppConfig {
  const nodeEnv = getEffectiveNodeEnv(env);
  return {
    nodeEnv,
    isProduction: nodeEnv === 'production',
    isDevelopment: nodeEnv === 'development',
    isTest: nodeEnv === 'test',
    logging: {
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT,
      file: env.LOG_FILE?.trim() || undefined,
      engineTrace: isEngineTraceEnabled(),
    },
    game: {
      seed: env.GAME_SEED,
      maxInitialRollAttempts: env.MAX_INITIAL_ROLL_ATTEMPTS,
    },
    snapshots: {
      dir: env.SNAPSHOT_DIR,
    },
  };
}

// Load .env into process.env before we read anything from it. Skipped under
// tests so a developer's .env cannot leak into test runs.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

export const config: Readonly<AppConfig> = Object.freeze(buildConfig(loadEnvOrExit()));
