/**
 * FileReader - Read operations for file system utilities
 */

import fs from 'fs/promises';
import { FileOperationError, TextReadResult } from './types';

/** How many leading bytes are inspected for a NUL byte */
export const BINARY_SNIFF_BYTES = 8000;

/**
 * True when the buffer looks binary: a NUL byte within the sniff window.
 */
export function looksBinary(buffer: Uint8Array): boolean {
  const limit = Math.min(buffer.length, BINARY_SNIFF_BYTES);
  for (let i = 0; i < limit; i++) {
    if (buffer[i] === 0) {
      return true;
    }
  }
  return false;
}

/**
 * Read a file as strict UTF-8 text.
 *
 * Binary content is reported as `{ kind: 'binary' }`. Invalid UTF-8 and read
 * failures throw FileOperationError with the errno code when there is one.
 */
export async function readTextFile(filePath: string): Promise<TextReadResult> {
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(filePath);
  } catch (error: unknown) {
    const code = error && typeof error === 'object' && 'code' in error && typeof error.code === 'string'
      ? error.code
      : undefined;
    throw new FileOperationError(
      `Failed to read file: ${error instanceof Error ? error.message : String(error)}`,
      'readTextFile',
      filePath,
      code
    );
  }

  if (looksBinary(buffer)) {
    return { kind: 'binary' };
  }

  try {
    const decoder = new TextDecoder('utf-8', { fatal: true });
    return { kind: 'text', text: decoder.decode(buffer) };
  } catch (error: unknown) {
    throw new FileOperationError(
      `File is not valid UTF-8: ${error instanceof Error ? error.message : String(error)}`,
      'readTextFile',
      filePath
    );
  }
}
