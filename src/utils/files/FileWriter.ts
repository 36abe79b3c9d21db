/**
 * FileWriter - Write operations for file system utilities
 */

import fs from 'fs/promises';
import path from 'path';
import { FileOperationError } from './types';

function codeOf(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Move/rename a file. Within one filesystem the rename is atomic.
 */
export async function move(source: string, destination: string): Promise<void> {
  try {
    await fs.rename(source, destination);
  } catch (error: unknown) {
    throw new FileOperationError(
      `Failed to move: ${error instanceof Error ? error.message : String(error)}`,
      'move',
      source,
      codeOf(error)
    );
  }
}

/**
 * Delete a single file. A file that is already gone is an error too, so
 * callers can tell a deletion they performed from one that raced them.
 */
export async function removeFile(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (error: unknown) {
    throw new FileOperationError(
      `Failed to delete: ${error instanceof Error ? error.message : String(error)}`,
      'delete',
      filePath,
      codeOf(error)
    );
  }
}

/**
 * Delete a file if it exists; ENOENT is not an error here.
 */
export async function removeFileIfExists(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (error: unknown) {
    if (codeOf(error) !== 'ENOENT') {
      throw new FileOperationError(
        `Failed to delete: ${error instanceof Error ? error.message : String(error)}`,
        'delete',
        filePath,
        codeOf(error)
      );
    }
  }
}

/**
 * Build a hidden sibling path for writing `destination` before it is renamed
 * into place. Same directory means same filesystem, so the rename is atomic.
 */
export function createTempSiblingPath(destination: string, suffix: string = '.partial'): string {
  const dir = path.dirname(destination);
  const random = Math.random().toString(36).substring(2, 8);
  const fileName = `.${path.basename(destination)}.${process.pid}.${random}${suffix}`;
  return path.join(dir, fileName);
}

/**
 * Fail unless `dirPath` is an existing directory this process can write to.
 */
export async function assertWritableDirectory(dirPath: string): Promise<void> {
  let stats;
  try {
    stats = await fs.stat(dirPath);
  } catch (error: unknown) {
    throw new FileOperationError(
      `Directory does not exist: ${dirPath}`,
      'assertWritableDirectory',
      dirPath,
      codeOf(error)
    );
  }
  if (!stats.isDirectory()) {
    throw new FileOperationError(
      `Path exists but is not a directory: ${dirPath}`,
      'assertWritableDirectory',
      dirPath
    );
  }
  try {
    await fs.access(dirPath, fs.constants.W_OK);
  } catch (error: unknown) {
    throw new FileOperationError(
      `Directory is not writable: ${dirPath}`,
      'assertWritableDirectory',
      dirPath,
      codeOf(error)
    );
  }
}
