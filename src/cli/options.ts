/**
 * Per-command option structs, built once from parsed arguments plus config
 * and frozen before any work starts.
 */

import { InvalidArgumentError, UsageError } from '../core/errors';
import { PatternMode } from '../core/ContentFilter';
import { SelectionCriteria } from '../core/types';
import { ToolkitConfig } from '../utils/config';

export interface InspectOptions {
  readonly criteria: Readonly<SelectionCriteria>;
  readonly patternMode: PatternMode;
  readonly listingLimit: number;
  readonly topFiles: number;
}

export interface BackupOptions {
  readonly criteria: Readonly<SelectionCriteria>;
  readonly output: string;
  readonly compressionLevel: number;
}

export interface CleanupCommandOptions {
  readonly root: string;
  readonly dryRun: boolean;
}

export interface ProcessOptions {
  readonly file: string;
  readonly top: number;
}

export interface MonitorOptions {
  readonly directory: string;
  readonly rows: number;
}

/** Raw commander values for `inspect` */
export interface RawInspectOptions {
  pattern?: string;
  ext?: string;
  fixedStrings?: boolean;
}

export interface RawBackupOptions {
  output: string;
  ext?: string;
  level?: string;
}

export interface RawCleanupOptions {
  dryRun?: boolean;
}

export interface RawProcessOptions {
  top?: string;
}

/**
 * Parse `--top`: digits only, greater than zero.
 */
export function parseTopN(value: string): number {
  const trimmed = value.trim();
  const parsed = /^\d+$/.test(trimmed) ? Number(trimmed) : NaN;
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`--top must be a positive integer, got '${value}'`);
  }
  return parsed;
}

/**
 * Parse `--level`: an integer from 0 to 9.
 */
export function parseCompressionLevel(value: string): number {
  const trimmed = value.trim();
  if (!/^\d$/.test(trimmed)) {
    throw new UsageError(`--level must be an integer from 0 to 9, got '${value}'`);
  }
  return Number(trimmed);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

export function buildInspectOptions(dir: string, raw: RawInspectOptions, config: ToolkitConfig): InspectOptions {
  return Object.freeze({
    criteria: Object.freeze({ root: dir, extension: nonEmpty(raw.ext), pattern: raw.pattern }),
    patternMode: raw.fixedStrings ? 'fixed' : 'regex',
    listingLimit: config.inspect.listingLimit,
    topFiles: config.inspect.topFiles
  });
}

export function buildBackupOptions(dir: string, raw: RawBackupOptions, config: ToolkitConfig): BackupOptions {
  if (raw.output.trim() === '') {
    throw new UsageError('--output must not be empty');
  }
  return Object.freeze({
    criteria: Object.freeze({ root: dir, extension: nonEmpty(raw.ext) }),
    output: raw.output,
    compressionLevel: raw.level !== undefined
      ? parseCompressionLevel(raw.level)
      : config.backup.compressionLevel
  });
}

export function buildCleanupOptions(dir: string, raw: RawCleanupOptions): CleanupCommandOptions {
  return Object.freeze({ root: dir, dryRun: raw.dryRun === true });
}

export function buildProcessOptions(file: string, raw: RawProcessOptions, config: ToolkitConfig): ProcessOptions {
  return Object.freeze({
    file,
    top: raw.top !== undefined ? parseTopN(raw.top) : config.process.defaultTop
  });
}

export function buildMonitorOptions(config: ToolkitConfig, directory: string = process.cwd()): MonitorOptions {
  return Object.freeze({ directory, rows: config.monitor.rows });
}
