/**
 * Configuration Module - Canonical Entry Point
 *
 * All host code should import configuration from here:
 *
 *   import { config } from './config';
 */

export { config, buildConfig } from './unified';
export type { AppConfig } from './unified';

export {
  EnvSchema,
  NodeEnvSchema,
  LogLevelSchema,
  LogFormatSchema,
  parseEnv,
  loadEnvOrExit,
  getEffectiveNodeEnv,
  isProduction,
  isDevelopment,
  isTest,
} from './env';

export type { RawEnv, EnvValidationResult, NodeEnv, LogLevel, LogFormat } from './env';
