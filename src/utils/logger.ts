import winston from 'winston';
import { config } from '../config/config';
import * as fs from 'fs';
import * as path from 'path';

/**
 * Custom log format
 */
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let log = `${timestamp} [${level.toUpperCase()}]: ${message}`;

    // Add metadata if present
    if (Object.keys(meta).length > 0) {
      log += ` ${JSON.stringify(meta)}`;
    }

    return log;
  })
);

function createTransports(): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        logFormat
      ),
    }),
  ];

  if (!config.logging.file) {
    return transports;
  }

  // Ensure logs directory exists
  const logDir = path.dirname(config.logging.file);
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  transports.push(
    new winston.transports.File({
      filename: config.logging.file,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    }),
    new winston.transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error',
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );

  return transports;
}

/**
 * Winston logger instance
 */
export const logger = winston.createLogger({
  level: config.logging.level,
  format: logFormat,
  silent: config.logging.silent,
  transports: createTransports(),
});

/**
 * Log database query
 */
export function logQuery(query: string, duration: number, rowCount: number | null): void {
  logger.debug('Database Query', {
    query: query.substring(0, 100),
    duration: `${duration}ms`,
    rowCount,
  });
}

/**
 * Log the outcome of a transaction scope
 */
export function logTransaction(
  outcome: 'commit' | 'rollback' | 'retry',
  attempt: number,
  duration: number
): void {
  const level = outcome === 'commit' ? 'debug' : 'warn';

  logger.log(level, 'Transaction finished', {
    outcome,
    attempt,
    duration: `${duration}ms`,
  });
}

// Export default logger
export default logger;
