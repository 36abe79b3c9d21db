/**
 * Shared data model for the traversal, filtering and action pipeline
 */

/**
 * What to select: a root directory, an optional file-name suffix and an
 * optional content pattern.
 */
export interface SelectionCriteria {
  /** Directory to walk; must exist and be a directory when evaluated */
  root: string;
  /** Literal suffix matched against the file name (not a glob) */
  extension?: string;
  /** Pattern matched against file content, line by line */
  pattern?: string;
}

/**
 * A regular file found by a traversal
 */
export interface FileEntry {
  /** Root joined with the relative path; absolute only when the root was */
  path: string;
  /** Path relative to the traversal root, always `/`-separated */
  relativePath: string;
  sizeBytes: number;
}

/**
 * One matching line of one file
 */
export interface MatchResult {
  path: string;
  /** 1-based */
  lineNumber: number;
  lineText: string;
}

/**
 * A per-file soft failure recorded during a batch operation
 */
export interface FileWarning {
  path: string;
  message: string;
  /** errno code when the failure came from the filesystem */
  code?: string;
}

/**
 * The ordered set of file entries selected by a traversal and predicate
 */
export interface PathSet {
  entries: FileEntry[];
  warnings: FileWarning[];
}

/**
 * Files to archive, where to write the archive and the directory entry paths
 * are made relative to
 */
export interface ArchiveJob {
  entries: readonly FileEntry[];
  destination: string;
  baseDir: string;
}

/**
 * A junk-file rule: any file whose name ends with `suffix`
 */
export interface CleanupRule {
  name: string;
  suffix: string;
}

export interface TokenCount {
  token: string;
  count: number;
}

/**
 * Options shared by every operation that iterates over files
 */
export interface OperationOptions {
  /** Checked between files; an aborted signal stops the operation */
  signal?: AbortSignal;
}
