/**
 * Logger Configuration
 */

import winston from 'winston';
import path from 'path';
import fs from 'fs';
import { PATHS } from './constants';

const LOG_DIR = path.resolve(PATHS.LOG_DIR);

// Ensure log directory exists
if (!fs.existsSync(LOG_DIR)) {
  fs.mkdirSync(LOG_DIR, { recursive: true });
}

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ level, message, timestamp, stack }) => {
    if (stack) {
      return `${timestamp} [${level.toUpperCase()}]: ${message}\n${stack}`;
    }
    return `${timestamp} [${level.toUpperCase()}]: ${message}`;
  })
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ level, message, timestamp }) => {
    return `${timestamp} ${level}: ${message}`;
  })
);

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: logFormat,
  transports: [
    // Write all logs to combined.log
    new winston.transports.File({
      filename: path.join(LOG_DIR, 'combined.log'),
      maxsize: 10 * 1024 * 1024, // 10MB
      maxFiles: 5,
    }),
    // Write errors to error.log
    new winston.transports.File({
      filename: path.join(LOG_DIR, 'error.log'),
      level: 'error',
      maxsize: 10 * 1024 * 1024,
      maxFiles: 5,
    }),
  ],
});

// Console output is for interactive runs only
if (process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test') {
  logger.add(
    new winston.transports.Console({
      format: consoleFormat,
      level: 'warn',
    })
  );
}

export function setLogLevel(level: string): void {
  logger.level = level;
}

export function enableConsoleLogging(verbose: boolean = false): void {
  if (verbose) {
    setLogLevel('debug');
  }
  const existing = logger.transports.find(
    (t) => t instanceof winston.transports.Console
  );
  if (existing) {
    existing.level = verbose ? 'debug' : 'info';
    return;
  }
  logger.add(
    new winston.transports.Console({
      format: consoleFormat,
      level: verbose ? 'debug' : 'info',
    })
  );
}
