/**
 * Root-relative path computation.
 *
 * Archive entries and report paths are expressed relative to a base directory.
 * The relative form is computed with path.relative and then checked; a path
 * that would need `..`, an absolute prefix or nothing at all is rejected with
 * PathEscapesRootError instead of being trimmed into something plausible.
 */

import * as path from 'path';
import { PathEscapesRootError } from './errors';

/**
 * Return `target` relative to `baseDir`, `/`-separated.
 *
 * @throws PathEscapesRootError when `target` is not strictly inside `baseDir`.
 */
export function toRootRelative(baseDir: string, target: string): string {
  const resolvedBase = path.resolve(baseDir);
  const resolvedTarget = path.resolve(target);
  const relative = path.relative(resolvedBase, resolvedTarget);

  const segments = relative.split(path.sep);
  if (
    relative === '' ||
    path.isAbsolute(relative) ||
    segments[0] === '..'
  ) {
    throw new PathEscapesRootError(target, baseDir);
  }

  return segments.join('/');
}

/**
 * Code-unit string comparison, independent of locale.
 */
export function comparePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
