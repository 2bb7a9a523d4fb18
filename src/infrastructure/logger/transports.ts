/**
 * Logger Transports
 *
 * Winston transports for the setup tool.
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import fs from 'fs';

// =============================================================================
// FORMATS
// =============================================================================

/**
 * JSON format for structured logging
 */
export const jsonFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

/**
 * Console format with colors and readable output
 */
export const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
  winston.format.colorize({ all: true }),
  winston.format.printf(({ level, message, timestamp, component, ...meta }) => {
    const componentStr = component ? `[${String(component)}]` : '';
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level} ${componentStr} ${String(message)}${metaStr}`;
  })
);

// =============================================================================
// TRANSPORT FACTORY
// =============================================================================

export interface TransportOptions {
  logDir: string;
  level: string;
  retentionDays: number;
  logToConsole: boolean;
  logToFile: boolean;
}

/**
 * Creates all transports based on configuration
 */
export function createTransports(options: TransportOptions): winston.transport[] {
  const transports: winston.transport[] = [];

  if (options.logToConsole) {
    transports.push(
      new winston.transports.Console({
        level: options.level,
        format: consoleFormat,
      })
    );
  }

  if (options.logToFile) {
    ensureDirectory(options.logDir);

    // One file per run day, every stage of every run
    transports.push(
      new DailyRotateFile({
        dirname: options.logDir,
        filename: 'setup-%DATE%.log',
        datePattern: 'YYYY-MM-DD',
        level: options.level,
        format: jsonFormat,
        maxFiles: `${options.retentionDays}d`,
        maxSize: '20m',
      })
    );

    transports.push(
      new DailyRotateFile({
        dirname: options.logDir,
        filename: 'error-%DATE%.log',
        datePattern: 'YYYY-MM-DD',
        level: 'error',
        format: jsonFormat,
        maxFiles: `${options.retentionDays}d`,
        maxSize: '20m',
      })
    );
  }

  // winston complains when a logger has no transports at all
  if (transports.length === 0) {
    transports.push(new winston.transports.Console({ silent: true }));
  }

  return transports;
}

// =============================================================================
// HELPERS
// =============================================================================

function ensureDirectory(dir: string): void {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}
