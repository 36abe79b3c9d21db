/**
 * Winston-based logging for treekit
 * Provides configurable diagnostic logging with levels, context and optional file output.
 *
 * Report output and per-file warnings shown to the user go through
 * src/cli/output.ts; this logger carries diagnostics and always writes the
 * console stream to stderr.
 */

import winston from 'winston';
import {
  DEFAULT_LOGGER_CONFIG,
  LogContext,
  LogLevel,
  LoggerConfig,
  buildTransports,
  parseLogLevel
} from './logging/LogTransport';

export { LogLevel, parseLogLevel, isLogLevel } from './logging/LogTransport';
export type { LogContext, LoggerConfig } from './logging/LogTransport';

export type LogMeta = Record<string, unknown>;

/**
 * Winston logger with structured context
 */
export class ToolkitLogger {
  private logger: winston.Logger;
  private config: LoggerConfig;
  private context: LogContext = {};

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_LOGGER_CONFIG, ...config };
    this.logger = this.createLogger();
  }

  /**
   * Create the Winston logger instance with configured transports
   */
  private createLogger(): winston.Logger {
    return winston.createLogger({
      level: this.config.level,
      defaultMeta: { service: 'treekit' },
      transports: buildTransports(this.config, () => this.context),
      // winston complains about writes to a logger with no transports
      silent: !this.config.enableConsole && !this.config.enableFile
    });
  }

  /**
   * Replace the configuration and rebuild transports
   */
  configure(config: Partial<LoggerConfig>): void {
    this.logger.close();
    this.config = { ...this.config, ...config };
    this.logger = this.createLogger();
  }

  getConfig(): LoggerConfig {
    return { ...this.config };
  }

  /**
   * Set the logging context for structured logging
   */
  setContext(context: LogContext): void {
    this.context = { ...this.context, ...context };
  }

  getContext(): LogContext {
    return { ...this.context };
  }

  error(message: string, meta?: LogMeta): void {
    this.logger.error(message, { ...meta });
  }

  warn(message: string, meta?: LogMeta): void {
    this.logger.warn(message, { ...meta });
  }

  info(message: string, meta?: LogMeta): void {
    this.logger.info(message, { ...meta });
  }

  debug(message: string, meta?: LogMeta): void {
    this.logger.debug(message, { ...meta });
  }

  /**
   * Log how long an operation took
   */
  performance(operation: string, duration: number, metadata?: LogMeta): void {
    this.debug(`Performance: ${operation} took ${duration}ms`, {
      event: 'performance',
      operation,
      duration,
      ...metadata
    });
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): ToolkitLogger {
    const childLogger = new ToolkitLogger(this.config);
    childLogger.setContext({ ...this.context, ...context });
    return childLogger;
  }

  /**
   * Change the log level at runtime
   */
  setLevel(level: LogLevel): void {
    this.config.level = level;
    this.logger.level = level;
    this.logger.transports.forEach(transport => {
      if (transport.level !== LogLevel.ERROR) {
        transport.level = level;
      }
    });
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  /**
   * Close the logger and release file handles
   */
  close(): void {
    this.logger.close();
  }
}

/**
 * Create a logger instance with the specified configuration
 */
export function createLogger(config?: Partial<LoggerConfig>): ToolkitLogger {
  return new ToolkitLogger(config);
}

/**
 * Default logger instance for the application. Level comes from
 * TREEKIT_LOG_LEVEL (or LOG_LEVEL) until the CLI applies its configuration.
 */
export const defaultLogger = new ToolkitLogger({
  level: parseLogLevel(process.env.TREEKIT_LOG_LEVEL ?? process.env.LOG_LEVEL) ?? DEFAULT_LOGGER_CONFIG.level
});

/**
 * Convenience methods using the default logger
 */
export const logger = {
  error: (message: string, meta?: LogMeta) => defaultLogger.error(message, meta),
  warn: (message: string, meta?: LogMeta) => defaultLogger.warn(message, meta),
  info: (message: string, meta?: LogMeta) => defaultLogger.info(message, meta),
  debug: (message: string, meta?: LogMeta) => defaultLogger.debug(message, meta)
};
