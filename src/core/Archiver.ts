/**
 * Archiver - packs a PathSet into one gzip-compressed tar archive.
 *
 * Entries are stored under paths relative to the job's base directory. The
 * archive is streamed to a hidden sibling of the destination and renamed onto
 * it only once the stream has closed, so the destination is either absent
 * (or left as it was) or a complete archive.
 */

import { createWriteStream } from 'fs';
import fs from 'fs/promises';
import * as path from 'path';
import { Pack } from 'tar';
import {
  assertWritableDirectory,
  createTempSiblingPath,
  move,
  removeFileIfExists
} from '../utils/files/FileWriter';
import { logger } from '../utils/logger';
import {
  ArchiveError,
  CancelledError,
  ToolkitError,
  errorMessage,
  throwIfCancelled
} from './errors';
import { assertDirectory, buildPathSet } from './PathSetBuilder';
import { toRootRelative } from './paths';
import { ArchiveJob, FileWarning, OperationOptions, SelectionCriteria } from './types';

export const DEFAULT_COMPRESSION_LEVEL = 6;

export interface ArchiveOptions extends OperationOptions {
  /** gzip level, 0-9 */
  compressionLevel?: number;
  /** Called once per entry as it is queued, with its root-relative path */
  onEntry?: (relativePath: string, index: number, total: number) => void;
}

export interface ArchiveResult {
  destination: string;
  entryCount: number;
  bytesWritten: number;
  /** Root-relative entry paths, in archive order */
  entries: string[];
}

export interface BackupResult extends ArchiveResult {
  warnings: FileWarning[];
}

/**
 * Step (a): base directory must be a directory, destination must not be one,
 * and its parent must be a writable directory.
 */
async function validateJob(job: ArchiveJob): Promise<void> {
  try {
    await assertDirectory(job.baseDir);
  } catch (error: unknown) {
    throw new ArchiveError(`cannot archive '${job.baseDir}': ${errorMessage(error)}`, job.baseDir, error);
  }

  const destinationStats = await fs.stat(job.destination).catch(() => undefined);
  if (destinationStats?.isDirectory()) {
    throw new ArchiveError(`destination '${job.destination}' is a directory`, job.destination);
  }

  const parent = path.dirname(path.resolve(job.destination));
  try {
    await assertWritableDirectory(parent);
  } catch (error: unknown) {
    throw new ArchiveError(`cannot write archive to '${job.destination}': ${errorMessage(error)}`, job.destination, error);
  }
}

/**
 * Step (c): every entry becomes a root-relative path, or the job fails.
 */
export function relativizeEntries(job: ArchiveJob): string[] {
  return job.entries.map(entry => toRootRelative(job.baseDir, entry.path));
}

function validateLevel(level: number): number {
  if (!Number.isInteger(level) || level < 0 || level > 9) {
    throw new ArchiveError(`compression level must be an integer from 0 to 9, got ${level}`);
  }
  return level;
}

/**
 * Step (d): stream the entries into `tempPath`. Resolves once the file is
 * closed; rejects on any pack, read or write failure, or on abort.
 */
function writeArchive(
  tempPath: string,
  baseDir: string,
  relativePaths: readonly string[],
  options: ArchiveOptions,
  level: number
): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const pack = new Pack({
      cwd: baseDir,
      gzip: { level },
      portable: true,
      strict: true,
      noDirRecurse: true
    });
    const out = createWriteStream(tempPath);
    let settled = false;

    const fail = (error: unknown) => {
      if (settled) return;
      settled = true;
      options.signal?.removeEventListener('abort', onAbort);
      // Reject only once the file is closed, so the caller's unlink cannot
      // run ahead of a still-pending open
      if (out.closed) {
        reject(error);
      } else {
        out.once('close', () => reject(error));
        out.destroy();
      }
    };
    const onAbort = () => fail(new CancelledError('archive'));

    options.signal?.addEventListener('abort', onAbort, { once: true });
    pack.on('error', fail);
    out.on('error', fail);
    out.on('close', () => {
      if (settled) return;
      settled = true;
      options.signal?.removeEventListener('abort', onAbort);
      resolve();
    });

    pack.pipe(out);
    relativePaths.forEach((relativePath, index) => {
      options.onEntry?.(relativePath, index, relativePaths.length);
      pack.add(relativePath);
    });
    pack.end();
  });
}

/**
 * Write `job.entries` into a gzip tar archive at `job.destination`.
 *
 * @throws ArchiveError when validation or writing fails
 * @throws PathEscapesRootError when an entry lies outside `job.baseDir`
 * @throws CancelledError when `options.signal` aborts
 */
export async function createArchive(job: ArchiveJob, options: ArchiveOptions = {}): Promise<ArchiveResult> {
  const level = validateLevel(options.compressionLevel ?? DEFAULT_COMPRESSION_LEVEL);
  await validateJob(job);
  const relativePaths = relativizeEntries(job);
  throwIfCancelled(options.signal, 'archive');

  const tempPath = createTempSiblingPath(path.resolve(job.destination));
  logger.debug(`Writing archive to ${tempPath}`, { entries: relativePaths.length });

  try {
    await writeArchive(tempPath, job.baseDir, relativePaths, options, level);
    throwIfCancelled(options.signal, 'archive');
    const { size } = await fs.stat(tempPath);
    await move(tempPath, job.destination);

    logger.info(`Archive written: ${job.destination}`, { entries: relativePaths.length, bytes: size });
    return {
      destination: job.destination,
      entryCount: relativePaths.length,
      bytesWritten: size,
      entries: relativePaths
    };
  } catch (error: unknown) {
    await removeFileIfExists(tempPath).catch((cleanupError: unknown) => {
      logger.error(`Could not remove partial archive ${tempPath}`, { error: errorMessage(cleanupError) });
    });
    if (error instanceof ToolkitError) {
      throw error;
    }
    throw new ArchiveError(`failed to write archive '${job.destination}': ${errorMessage(error)}`, job.destination, error);
  }
}

/**
 * Select files under `criteria.root` (optionally by extension) and archive
 * them with paths relative to the root. An empty selection still produces a
 * valid, empty archive.
 */
export async function backupDirectory(
  criteria: SelectionCriteria,
  destination: string,
  options: ArchiveOptions = {}
): Promise<BackupResult> {
  await assertDirectory(criteria.root);
  const pathSet = await buildPathSet(criteria.root, {
    extension: criteria.extension,
    signal: options.signal
  });

  const resolvedDestination = path.resolve(destination);
  const entries = pathSet.entries.filter(entry => path.resolve(entry.path) !== resolvedDestination);

  const result = await createArchive({ entries, destination, baseDir: criteria.root }, options);
  return { ...result, warnings: pathSet.warnings };
}
