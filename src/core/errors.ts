/**
 * Error taxonomy for treekit operations.
 *
 * Every fatal condition is a ToolkitError carrying a `kind` discriminant, so the
 * CLI boundary can map it to a message and exit code without string matching.
 * Per-file problems during batch operations are not thrown at all: they are
 * recorded as FileWarning values (kind PermissionOrIOError).
 */

export type ToolkitErrorKind =
  | 'UsageError'
  | 'NotFound'
  | 'NotADirectory'
  | 'PermissionOrIOError'
  | 'ArchiveError'
  | 'PathEscapesRoot'
  | 'InvalidArgument'
  | 'Cancelled';

export class ToolkitError extends Error {
  constructor(message: string, public readonly kind: ToolkitErrorKind, public readonly filePath?: string) {
    super(message);
    this.name = 'ToolkitError';
  }
}

export class UsageError extends ToolkitError {
  constructor(message: string) {
    super(message, 'UsageError');
    this.name = 'UsageError';
  }
}

export class NotFoundError extends ToolkitError {
  constructor(filePath: string, what: string = 'path') {
    super(`${what} '${filePath}' does not exist`, 'NotFound', filePath);
    this.name = 'NotFoundError';
  }
}

export class NotADirectoryError extends ToolkitError {
  constructor(filePath: string) {
    super(`'${filePath}' is not a directory`, 'NotADirectory', filePath);
    this.name = 'NotADirectoryError';
  }
}

export class ArchiveError extends ToolkitError {
  constructor(message: string, filePath?: string, public readonly cause?: unknown) {
    super(message, 'ArchiveError', filePath);
    this.name = 'ArchiveError';
  }
}

export class PathEscapesRootError extends ToolkitError {
  constructor(filePath: string, public readonly baseDir: string) {
    super(`'${filePath}' is not inside '${baseDir}'`, 'PathEscapesRoot', filePath);
    this.name = 'PathEscapesRootError';
  }
}

export class InvalidArgumentError extends ToolkitError {
  constructor(message: string) {
    super(message, 'InvalidArgument');
    this.name = 'InvalidArgumentError';
  }
}

export class CancelledError extends ToolkitError {
  constructor(operation: string) {
    super(`${operation} was cancelled`, 'Cancelled');
    this.name = 'CancelledError';
  }
}

/**
 * Throw CancelledError if the signal has fired. Called between files.
 */
export function throwIfCancelled(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new CancelledError(operation);
  }
}

/**
 * Extract the errno code (ENOENT, EACCES, ...) from an unknown error value.
 */
export function errorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
