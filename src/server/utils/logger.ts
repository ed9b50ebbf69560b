import winston from 'winston';
import fs from 'fs';
import path from 'path';
import { config, type AppConfig } from '../config';
import type { EngineLogger, LogMeta } from '../../shared/engine/types';

export type { LogMeta };

const SERVICE_NAME = 'backgammon-engine';

// ============================================================================
// Formats
// ============================================================================

/**
 * Custom format to structure log metadata consistently.
 */
const structuredFormat = winston.format((info) => {
  if (!info.service) {
    info.service = SERVICE_NAME;
  }

  // Error objects do not serialize their own fields
  if (info.error instanceof Error) {
    info.error = {
      message: info.error.message,
      name: info.error.name,
      stack: info.error.stack,
    };
  }

  return info;
});

/**
 * Format for structured JSON logging (file transport and LOG_FORMAT=json).
 */
export const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  structuredFormat(),
  winston.format.json()
);

/**
 * Format for human-readable console output.
 */
export const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, gameId, ...meta }) => {
    const gameStr = typeof gameId === 'string' ? ` [${gameId}]` : '';
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}${gameStr}: ${String(message)}${metaStr}`;
  })
);

// ============================================================================
// Logger Construction
// ============================================================================

/**
 * Create a winston logger for the given logging config. Exported so tests
 * and tools can build one without touching the module-level instance.
 */
export function createAppLogger(
  logging: AppConfig['logging'],
  nodeEnv: AppConfig['nodeEnv'] = config.nodeEnv
): winston.Logger {
  const instance = winston.createLogger({
    level: logging.engineTrace ? 'debug' : logging.level,
    defaultMeta: {
      service: SERVICE_NAME,
      environment: nodeEnv,
    },
    transports: [
      new winston.transports.Console({
        format: logging.format === 'json' ? jsonFormat : consoleFormat,
      }),
    ],
  });

  if (logging.file) {
    const filename = path.resolve(logging.file);
    const dir = path.dirname(filename);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    instance.add(
      new winston.transports.File({
        filename,
        format: jsonFormat,
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      })
    );
  }

  return instance;
}

const logger = createAppLogger(config.logging);

// ============================================================================
// Engine Adapter
// ============================================================================

/**
 * Adapt a winston logger to the engine's EngineLogger interface, attaching
 * `meta` (typically `{ gameId }`) to every entry.
 */
export function createEngineLogger(
  meta: LogMeta = {},
  base: winston.Logger = logger
): EngineLogger {
  const child = base.child(meta);
  return {
    debug: (message, extra) => {
      child.debug(message, extra);
    },
    info: (message, extra) => {
      child.info(message, extra);
    },
    warn: (message, extra) => {
      child.warn(message, extra);
    },
    error: (message, extra) => {
      child.error(message, extra);
    },
  };
}

// ============================================================================
// Exports
// ============================================================================

export { logger };
