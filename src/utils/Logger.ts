/**
 * Logger utility
 */

import path from 'path';
import winston from 'winston';

export interface LoggerOptions {
  level?: string;
  logDir?: string;
}

// pino level names that winston's npm levels lack
const WINSTON_LEVELS: Record<string, string> = {
  fatal: 'error',
  trace: 'debug',
  silent: 'error'
};

export class Logger {
  private winston: winston.Logger;

  constructor(service: string = 'MessageStore', options: LoggerOptions = {}) {
    const level = options.level ?? 'info';

    this.winston = winston.createLogger({
      level: WINSTON_LEVELS[level] ?? level,
      silent: level === 'silent',
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      defaultMeta: { service },
      transports: [
        new winston.transports.Console({
          format: winston.format.combine(
            winston.format.colorize(),
            winston.format.simple()
          )
        })
      ]
    });

    if (options.logDir) {
      this.winston.add(new winston.transports.File({
        filename: path.join(options.logDir, 'error.log'),
        level: 'error'
      }));
      this.winston.add(new winston.transports.File({
        filename: path.join(options.logDir, 'combined.log')
      }));
    }
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.winston.info(message, meta);
  }

  error(message: string, error?: unknown): void {
    this.winston.error(message, error);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.winston.warn(message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.winston.debug(message, meta);
  }
}
