/**
 * Shared types for file utilities
 */

/**
 * File operation error class
 */
export class FileOperationError extends Error {
  constructor(
    message: string,
    public operation: string,
    public filePath?: string,
    /** errno code of the underlying failure, when there was one */
    public code?: string
  ) {
    super(message);
    this.name = 'FileOperationError';
  }
}

/**
 * Outcome of reading a file as text
 */
export type TextReadResult =
  | { kind: 'text'; text: string }
  | { kind: 'binary' };

/**
 * Options for regular-file discovery
 */
export interface FindFilesOptions {
  /** Include dot-files and dot-directories (default true) */
  dot?: boolean;
  signal?: AbortSignal;
}
