/**
 * FileSearch - File discovery operations
 */

import { glob } from 'glob';
import { FileOperationError, FindFilesOptions } from './types';

/**
 * Find every regular file below `root`, as `/`-separated paths relative to it.
 *
 * Symbolic links are neither returned nor followed: `**` does not descend into
 * linked directories when it leads the pattern, and a link to a file fails
 * the `isFile()` test. Order is whatever the walk produced.
 */
export async function findRegularFiles(root: string, options: FindFilesOptions = {}): Promise<string[]> {
  try {
    const matches = await glob('**/*', {
      cwd: root,
      dot: options.dot ?? true,
      follow: false,
      withFileTypes: true,
      signal: options.signal
    });

    return matches
      .filter(entry => entry.isFile())
      .map(entry => entry.relativePosix());
  } catch (error: unknown) {
    throw new FileOperationError(
      `Failed to find files: ${error instanceof Error ? error.message : String(error)}`,
      'findRegularFiles',
      root
    );
  }
}
