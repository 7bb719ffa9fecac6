import winston from 'winston';
import type { LoggingConfig } from '../types/plays';

export interface AppLogger {
  event(event: string, meta?: Record<string, unknown>): void;
  warning(message: string, meta?: Record<string, unknown>): void;
  error(message: string, error?: unknown, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

const ALL_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

export function createLogger(config: LoggingConfig): AppLogger {
  const transports: winston.transport[] = [
    // stdout carries the rewritten list, so every level goes to stderr
    new winston.transports.Console({
      stderrLevels: ALL_LEVELS,
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.simple()
      )
    })
  ];

  if (config.file) {
    transports.push(new winston.transports.File({ filename: config.file }));
  }

  const logger = winston.createLogger({
    level: config.level.toLowerCase(),
    silent: config.silent ?? false,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaString = Object.keys(meta).length ? JSON.stringify(meta, null, 2) : '';
        return `${timestamp} [${level.toUpperCase()}]: ${message} ${metaString}`;
      })
    ),
    transports
  });

  return {
    event(event, meta) {
      logger.info(`🎧 ${event}`, meta ?? {});
    },
    warning(message, meta) {
      logger.warn(`🎧⚠️ ${message}`, meta ?? {});
    },
    error(message, error, meta) {
      const errorMeta = {
        ...meta,
        ...(error instanceof Error
          ? { error: error.message, stack: error.stack }
          : error !== undefined
            ? { error: String(error) }
            : {})
      };
      logger.error(`🎧💥 ${message}`, errorMeta);
    },
    debug(message, meta) {
      logger.debug(`🎧🔍 ${message}`, meta ?? {});
    }
  };
}
