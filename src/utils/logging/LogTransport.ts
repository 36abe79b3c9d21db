/**
 * Transport configuration (console, file) and core logger types
 */

import winston from 'winston';
import path from 'path';
import fs from 'fs';
import { buildConsoleFormat, buildFileFormat, buildErrorFileFormat } from './LogFormatter';

/**
 * Log levels enumeration
 */
export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug'
}

const LEVELS: readonly string[] = Object.values(LogLevel);

/**
 * Narrow a string to a LogLevel, case-insensitively.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.trim().toLowerCase();
  return Object.values(LogLevel).find(level => level === normalized);
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LEVELS.includes(value);
}

/**
 * Log context interface for structured logging
 */
export interface LogContext {
  /** CLI command being run */
  command?: string;
  /** Component or module name */
  component?: string;
  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /** Log level threshold */
  level: LogLevel;
  /** Output directory for log files */
  logDir: string;
  /** Whether to log to the console (always stderr) */
  enableConsole: boolean;
  /** Whether to log to file */
  enableFile: boolean;
  /** Maximum size of each log file in bytes */
  maxFileSize: number;
  /** Maximum number of log files to keep */
  maxFiles: number;
  /** Whether to include timestamps on console lines */
  includeTimestamp: boolean;
  /** Whether to include stack traces for errors in file logs */
  includeStackTrace: boolean;
}

/**
 * Default logger configuration
 */
export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: LogLevel.WARN,
  logDir: './logs',
  enableConsole: true,
  enableFile: false,
  maxFileSize: 10 * 1024 * 1024, // 10MB
  maxFiles: 5,
  includeTimestamp: false,
  includeStackTrace: true
};

/**
 * Build Winston transports from configuration.
 *
 * Console output goes to stderr for every level so that stdout carries only
 * report output.
 *
 * @param getContext Callback returning the current log context (for console format)
 */
export function buildTransports(
  config: LoggerConfig,
  getContext: () => LogContext
): winston.transport[] {
  const transports: winston.transport[] = [];

  if (config.enableFile && !fs.existsSync(config.logDir)) {
    fs.mkdirSync(config.logDir, { recursive: true });
  }

  if (config.enableConsole) {
    transports.push(
      new winston.transports.Console({
        level: config.level,
        stderrLevels: [...LEVELS],
        format: buildConsoleFormat(config, getContext)
      })
    );
  }

  if (config.enableFile) {
    transports.push(
      new winston.transports.File({
        filename: path.join(config.logDir, 'combined.log'),
        level: config.level,
        maxsize: config.maxFileSize,
        maxFiles: config.maxFiles,
        format: buildFileFormat(config)
      })
    );

    transports.push(
      new winston.transports.File({
        filename: path.join(config.logDir, 'error.log'),
        level: LogLevel.ERROR,
        maxsize: config.maxFileSize,
        maxFiles: config.maxFiles,
        format: buildErrorFileFormat()
      })
    );
  }

  return transports;
}
