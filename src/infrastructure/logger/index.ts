/**
 * Structured Logger
 *
 * Logging infrastructure with:
 * - Structured JSON file logs with daily rotation
 * - Component-specific loggers
 * - Sensitive data sanitization (secrets read from the environment file)
 */

import winston from 'winston';
import { getEnvConfig } from '../../config/env.js';
import { sanitizeObject } from '../../utils/formatting.js';
import { createTransports, type TransportOptions } from './transports.js';

// =============================================================================
// TYPES
// =============================================================================

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LogMeta {
  component?: string;
  [key: string]: unknown;
}

// =============================================================================
// SENSITIVE KEYS (for sanitization)
// =============================================================================

const SENSITIVE_KEYS = ['password', 'apiKey', 'api_key', 'token', 'secret', 'privateKey', 'authorization'];

// =============================================================================
// LOGGER CLASS
// =============================================================================

class Logger {
  private mainLogger: winston.Logger;
  private componentLoggers: Map<string, winston.Logger> = new Map();
  private options: TransportOptions;
  private initialized = false;

  constructor() {
    this.options = {
      logDir: './logs/setup',
      level: 'info',
      retentionDays: 14,
      logToConsole: false,
      logToFile: false,
    };

    // Silent until initialize() has read the configuration
    this.mainLogger = winston.createLogger({
      level: this.options.level,
      transports: createTransports(this.options),
    });
  }

  /**
   * Initializes the logger with configuration.
   * Should be called after environment validation.
   */
  initialize(overrides: Partial<TransportOptions> = {}): void {
    if (this.initialized) {
      return;
    }

    const env = getEnvConfig();

    this.options = {
      logDir: env.TRADEDECK_LOG_DIR,
      level: env.TRADEDECK_LOG_LEVEL,
      retentionDays: env.TRADEDECK_LOG_RETENTION_DAYS,
      logToConsole: env.TRADEDECK_LOG_TO_CONSOLE,
      logToFile: env.TRADEDECK_LOG_TO_FILE,
      ...overrides,
    };

    this.mainLogger = winston.createLogger({
      level: this.options.level,
      transports: createTransports(this.options),
      exitOnError: false,
    });

    // Component loggers created before initialization wrote nowhere
    this.componentLoggers.clear();
    this.initialized = true;
    this.info('Logger initialized', { options: this.options });
  }

  /**
   * Gets a component-specific logger. The underlying winston logger is
   * resolved on every call so that loggers created at module load pick up the
   * configuration applied later by initialize().
   */
  getComponentLogger(componentName: string): ComponentLogger {
    return new ComponentLogger(componentName, () => this.resolveComponentLogger(componentName));
  }

  info(message: string, meta?: LogMeta): void {
    this.log('info', message, meta);
  }

  /**
   * Flushes file transports. Resolves once every transport has finished.
   */
  async close(): Promise<void> {
    // Component loggers are children sharing these transports
    const main = this.mainLogger;
    await new Promise<void>((resolve) => {
      main.on('finish', () => resolve());
      main.end();
    });
  }

  private resolveComponentLogger(componentName: string): winston.Logger {
    let componentLogger = this.componentLoggers.get(componentName);
    if (!componentLogger) {
      componentLogger = this.mainLogger.child({ component: componentName });
      this.componentLoggers.set(componentName, componentLogger);
    }
    return componentLogger;
  }

  private log(level: LogLevel, message: string, meta?: LogMeta): void {
    const sanitizedMeta = meta ? sanitizeObject(meta, SENSITIVE_KEYS) : {};
    this.mainLogger.log(level, message, sanitizedMeta);
  }
}

// =============================================================================
// COMPONENT LOGGER CLASS
// =============================================================================

/**
 * Logger instance for a specific component.
 * Automatically adds component name to all log entries.
 */
export class ComponentLogger {
  constructor(
    private readonly componentName: string,
    private readonly resolve: () => winston.Logger
  ) {}

  get component(): string {
    return this.componentName;
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    const sanitizedMeta = meta ? sanitizeObject(meta, SENSITIVE_KEYS) : {};
    this.resolve().log(level, message, sanitizedMeta);
  }
}

// =============================================================================
// SINGLETON EXPORT
// =============================================================================

export const logger = new Logger();

export const getComponentLogger = (name: string) => logger.getComponentLogger(name);
export const initializeLogger = (overrides?: Partial<TransportOptions>) => logger.initialize(overrides);
export const closeLogger = () => logger.close();
