/**
 * Cleaner - finds junk files by name suffix and deletes them.
 *
 * Planning and deletion are separate steps. A dry run returns the plan from a
 * branch that never touches the remover, so a preview cannot delete anything.
 * A live run is a best-effort sweep over the already-enumerated plan: each
 * failed deletion is recorded and the sweep moves on.
 */

import * as path from 'path';
import { removeFile } from '../utils/files/FileWriter';
import { FileOperationError } from '../utils/files/types';
import { logger } from '../utils/logger';
import { errorMessage, throwIfCancelled } from './errors';
import { buildPathSet } from './PathSetBuilder';
import { CleanupRule, FileEntry, FileWarning, OperationOptions } from './types';

/**
 * Temporary, log, editor-backup and backup files
 */
export const DEFAULT_CLEANUP_RULES: readonly CleanupRule[] = Object.freeze([
  { name: 'temporary', suffix: '.tmp' },
  { name: 'log', suffix: '.log' },
  { name: 'editor backup', suffix: '~' },
  { name: 'backup', suffix: '.bak' }
]);

export type FileRemover = (filePath: string) => Promise<void>;

export interface CleanupOptions extends OperationOptions {
  /** Deletes one file; defaults to a plain unlink */
  removeFile?: FileRemover;
}

export interface CleanupPlan {
  root: string;
  matched: FileEntry[];
  warnings: FileWarning[];
}

export type CleanupReport =
  | { mode: 'dry-run'; matched: FileEntry[]; warnings: FileWarning[] }
  | {
      mode: 'live';
      matched: FileEntry[];
      deleted: FileEntry[];
      failures: FileWarning[];
      warnings: FileWarning[];
    };

/**
 * True when the file name ends with any rule's suffix.
 */
export function matchesCleanupRule(fileName: string, rules: readonly CleanupRule[]): boolean {
  return rules.some(rule => rule.suffix !== '' && fileName.endsWith(rule.suffix));
}

/**
 * Enumerate the files a cleanup of `root` would delete. Never mutates.
 */
export async function planCleanup(
  root: string,
  rules: readonly CleanupRule[],
  options: OperationOptions = {}
): Promise<CleanupPlan> {
  const pathSet = await buildPathSet(root, { signal: options.signal });
  const matched = pathSet.entries.filter(entry =>
    matchesCleanupRule(path.posix.basename(entry.relativePath), rules)
  );
  return { root, matched, warnings: pathSet.warnings };
}

/**
 * Delete every file in the plan, continuing past individual failures.
 */
export async function executeCleanupPlan(
  plan: CleanupPlan,
  remover: FileRemover,
  options: OperationOptions = {}
): Promise<{ deleted: FileEntry[]; failures: FileWarning[] }> {
  const deleted: FileEntry[] = [];
  const failures: FileWarning[] = [];

  for (const entry of plan.matched) {
    throwIfCancelled(options.signal, 'cleanup');
    try {
      await remover(entry.path);
      deleted.push(entry);
      logger.debug(`Deleted ${entry.path}`);
    } catch (error: unknown) {
      const failure: FileWarning = {
        path: entry.path,
        message: errorMessage(error),
        code: error instanceof FileOperationError ? error.code : undefined
      };
      failures.push(failure);
      logger.debug(`Could not delete ${entry.path}`, { ...failure });
    }
  }

  return { deleted, failures };
}

/**
 * Find files under `root` matching `rules`; delete them unless `dryRun`.
 */
export async function clean(
  root: string,
  rules: readonly CleanupRule[],
  dryRun: boolean,
  options: CleanupOptions = {}
): Promise<CleanupReport> {
  const plan = await planCleanup(root, rules, options);

  if (dryRun) {
    return { mode: 'dry-run', matched: plan.matched, warnings: plan.warnings };
  }

  const { deleted, failures } = await executeCleanupPlan(plan, options.removeFile ?? removeFile, options);
  logger.info(`Cleanup of ${root} finished`, { deleted: deleted.length, failed: failures.length });
  return { mode: 'live', matched: plan.matched, deleted, failures, warnings: plan.warnings };
}
