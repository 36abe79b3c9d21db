/**
 * Shared output helpers for CLI commands.
 * Reports go to stdout; warnings and errors go to stderr.
 */

import chalk from 'chalk';
import { SingleBar, Presets } from 'cli-progress';
import { ToolkitError, errorMessage } from '../core/errors';
import { FileOperationError } from '../utils/files/types';
import { FileWarning } from '../core/types';
import { logger } from '../utils/logger';

export function logSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function logError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function logWarning(message: string): void {
  console.error(chalk.yellow('⚠'), message);
}

export function logInfo(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

/**
 * Print report lines to stdout, one per call
 */
export function printLines(lines: readonly string[]): void {
  lines.forEach(line => console.log(line));
}

/**
 * One stderr line per per-file warning
 */
export function reportWarnings(warnings: readonly FileWarning[]): void {
  warnings.forEach(warning => logWarning(`${warning.path}: ${warning.message}`));
}

export function createProgressBar(description: string): SingleBar {
  return new SingleBar({
    format: `${chalk.blue(description)} |{bar}| {percentage}% | {value}/{total}`,
    barCompleteChar: '█',
    barIncompleteChar: '░',
    hideCursor: true,
    stream: process.stderr
  }, Presets.rect);
}

/**
 * Print `✗ Error: <message>` to stderr and exit 1. Stack traces only reach
 * the debug log.
 */
export function handleCommandError(error: unknown): never {
  if (error instanceof ToolkitError) {
    logError(`Error: ${error.message}`);
    logger.debug('Command failed', { kind: error.kind, path: error.filePath });
  } else if (error instanceof FileOperationError) {
    logError(`Error: ${error.message}`);
    logger.debug('File operation failed', { operation: error.operation, path: error.filePath, code: error.code });
  } else {
    logError(`Error: ${errorMessage(error)}`);
    logger.debug('Unexpected failure', { stack: error instanceof Error ? error.stack : undefined });
  }
  process.exit(1);
}
