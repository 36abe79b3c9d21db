/**
 * Log formatting and colorization utilities
 */

import winston from 'winston';
import { LogContext, LoggerConfig } from './LogTransport';

/**
 * Render one console line: optional timestamp, level, context, message and
 * any remaining metadata as JSON.
 */
export function formatConsoleLine(
  info: { level: string; message: unknown; timestamp?: unknown; [key: string]: unknown },
  context: LogContext
): string {
  // `service` is for the JSON files only
  const { level, message, timestamp, service: _service, ...meta } = info;
  let output = typeof timestamp === 'string' ? `${timestamp} [${level}]` : `[${level}]`;

  if (context.command) {
    output += ` [${context.command}]`;
  }
  if (context.component) {
    output += ` [${context.component}]`;
  }

  output += `: ${String(message)}`;

  if (Object.keys(meta).length > 0) {
    output += ` ${JSON.stringify(meta)}`;
  }

  return output;
}

/**
 * Build the console format for Winston, including colorization, timestamps, and context fields.
 */
export function buildConsoleFormat(
  config: LoggerConfig,
  getContext: () => LogContext
): winston.Logform.Format {
  const parts: winston.Logform.Format[] = [winston.format.colorize({ level: true })];
  if (config.includeTimestamp) {
    parts.push(winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }));
  }
  parts.push(winston.format.printf((info) => formatConsoleLine(info, getContext())));
  return winston.format.combine(...parts);
}

/**
 * Build the JSON format for file transports, including stack trace support.
 */
export function buildFileFormat(config: LoggerConfig): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: config.includeStackTrace }),
    winston.format.json()
  );
}

/**
 * Build the error-file format (always includes full stack traces).
 */
export function buildErrorFileFormat(): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  );
}
