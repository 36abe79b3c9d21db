/**
 * PathSet Builder - walks a directory tree once and returns its regular files
 * as sorted FileEntry values, optionally restricted to one file-name suffix.
 */

import fs from 'fs/promises';
import * as path from 'path';
import { findRegularFiles } from '../utils/files/FileSearch';
import { FileOperationError } from '../utils/files/types';
import { logger } from '../utils/logger';
import {
  NotADirectoryError,
  NotFoundError,
  errorCode,
  errorMessage,
  throwIfCancelled
} from './errors';
import { comparePaths } from './paths';
import { FileEntry, FileWarning, OperationOptions, PathSet } from './types';

export interface BuildPathSetOptions extends OperationOptions {
  /** Literal suffix the file name must end with */
  extension?: string;
}

/**
 * A typed predicate over file entries
 */
export type EntryPredicate = (entry: FileEntry) => boolean;

/**
 * Predicate for a literal file-name suffix. With no extension every entry
 * matches. Only the last path segment is tested, never the directories.
 */
export function createExtensionPredicate(extension?: string): EntryPredicate {
  if (extension === undefined || extension === '') {
    return () => true;
  }
  return (entry) => path.posix.basename(entry.relativePath).endsWith(extension);
}

/**
 * Fail unless `root` exists and is a directory. Any other stat failure
 * (EACCES, ELOOP) is a FileOperationError carrying the errno code.
 */
export async function assertDirectory(root: string): Promise<void> {
  let stats;
  try {
    stats = await fs.stat(root);
  } catch (error: unknown) {
    const code = errorCode(error);
    if (code === 'ENOENT') {
      throw new NotFoundError(root, 'directory');
    }
    throw new FileOperationError(`cannot access directory '${root}': ${errorMessage(error)}`, 'stat', root, code);
  }
  if (!stats.isDirectory()) {
    throw new NotADirectoryError(root);
  }
}

/**
 * Sort entries by their path string, in place, and return them.
 */
export function sortEntries(entries: FileEntry[]): FileEntry[] {
  return entries.sort((a, b) => comparePaths(a.path, b.path));
}

/**
 * Walk `root` and return every regular file (optionally filtered by extension),
 * sorted by path. Files that disappear or cannot be stat'ed between listing
 * and stat are reported as warnings.
 */
export async function buildPathSet(root: string, options: BuildPathSetOptions = {}): Promise<PathSet> {
  await assertDirectory(root);
  throwIfCancelled(options.signal, 'traversal');

  const matches = createExtensionPredicate(options.extension);
  const relativePaths = await findRegularFiles(root, { signal: options.signal });
  throwIfCancelled(options.signal, 'traversal');

  const entries: FileEntry[] = [];
  const warnings: FileWarning[] = [];

  for (const relativePath of relativePaths) {
    throwIfCancelled(options.signal, 'traversal');

    const candidate: FileEntry = {
      path: path.join(root, relativePath),
      relativePath,
      sizeBytes: 0
    };
    if (!matches(candidate)) {
      continue;
    }

    try {
      const stats = await fs.lstat(candidate.path);
      if (!stats.isFile()) {
        continue;
      }
      candidate.sizeBytes = stats.size;
      entries.push(candidate);
    } catch (error: unknown) {
      warnings.push({ path: candidate.path, message: errorMessage(error), code: errorCode(error) });
    }
  }

  logger.debug(`Traversed ${root}`, { files: entries.length, warnings: warnings.length });
  return { entries: sortEntries(entries), warnings };
}
