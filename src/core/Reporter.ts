/**
 * Reporter - directory statistics and content-match summaries as text lines.
 *
 * Nothing here mutates the filesystem; the CLI decides where lines go.
 */

import fs from 'fs/promises';
import * as path from 'path';
import { ContentFilterResult, PatternMode, createPatternMatcher, filterByContent } from './ContentFilter';
import { errorCode, errorMessage } from './errors';
import { buildPathSet, createExtensionPredicate } from './PathSetBuilder';
import { comparePaths } from './paths';
import { FileEntry, FileWarning, OperationOptions, SelectionCriteria } from './types';

export const DEFAULT_LISTING_LIMIT = 20;
export const DEFAULT_TOP_FILES = 5;

/**
 * One row of the `ls -la`-style preview
 */
export interface ListingEntry {
  name: string;
  /** e.g. `drwxr-xr-x` */
  mode: string;
  links: number;
  sizeBytes: number;
  modifiedAt: Date;
  /** Set for symbolic links */
  linkTarget?: string;
}

export interface DirectorySummary {
  root: string;
  extension?: string;
  pattern?: string;
  /** Sum of all regular-file sizes under root, ignoring the extension filter */
  totalSizeBytes: number;
  /** At most `listingLimit` rows */
  listing: ListingEntry[];
  /** Rows the full listing would have had */
  listingTotal: number;
  /** Selected files, or files with a match when a pattern was given */
  matchingFileCount: number;
  /** Largest selected files; empty when a pattern was given */
  largestFiles: FileEntry[];
  /** Present when a pattern was given */
  content?: ContentFilterResult;
  warnings: FileWarning[];
}

export interface SummarizeOptions extends OperationOptions {
  patternMode?: PatternMode;
  listingLimit?: number;
  topFiles?: number;
}

const FILE_TYPE_CHARS: Array<[number, string]> = [
  [0o140000, 's'],
  [0o120000, 'l'],
  [0o100000, '-'],
  [0o060000, 'b'],
  [0o040000, 'd'],
  [0o020000, 'c'],
  [0o010000, 'p']
];

/**
 * Render a numeric st_mode as `ls` does (`-rw-r--r--`).
 */
export function formatMode(mode: number): string {
  const type = FILE_TYPE_CHARS.find(([bits]) => (mode & 0o170000) === bits)?.[1] ?? '?';
  const perms = ['r', 'w', 'x'];
  let out = type;
  for (let shift = 6; shift >= 0; shift -= 3) {
    const triplet = (mode >> shift) & 0o7;
    out += perms.map((flag, i) => (triplet & (4 >> i) ? flag : '-')).join('');
  }
  return out;
}

/**
 * Human-readable size in the style of `du -h`: powers of 1024, rounded up,
 * one decimal below 10.
 */
export function formatSize(bytes: number): string {
  const units = ['B', 'K', 'M', 'G', 'T', 'P'];
  if (bytes < 1024) {
    return `${bytes}B`;
  }
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  if (value < 10) {
    const rounded = Math.ceil(value * 10) / 10;
    return rounded < 10 ? `${rounded.toFixed(1)}${units[unit]}` : `10${units[unit]}`;
  }
  return `${Math.ceil(value)}${units[unit]}`;
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Local time as `YYYY-MM-DD HH:MM`.
 */
export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}`;
}

/**
 * Largest entries first; equal sizes in ascending path order.
 */
export function rankLargestFiles(entries: readonly FileEntry[], limit: number): FileEntry[] {
  return [...entries]
    .sort((a, b) => b.sizeBytes - a.sizeBytes || comparePaths(a.path, b.path))
    .slice(0, Math.max(0, limit));
}

async function describeEntry(fullPath: string, name: string): Promise<ListingEntry> {
  const stats = await fs.lstat(fullPath);
  const entry: ListingEntry = {
    name,
    mode: formatMode(stats.mode),
    links: stats.nlink,
    sizeBytes: stats.size,
    modifiedAt: stats.mtime
  };
  if (stats.isSymbolicLink()) {
    entry.linkTarget = await fs.readlink(fullPath);
  }
  return entry;
}

/**
 * The `ls -la` view of one directory: `.`, `..`, then children by name.
 */
export async function listDirectory(root: string): Promise<{ entries: ListingEntry[]; warnings: FileWarning[] }> {
  const warnings: FileWarning[] = [];
  const names = (await fs.readdir(root)).sort(comparePaths);
  const entries: ListingEntry[] = [];

  const rows: Array<[string, string]> = [
    ['.', root],
    ['..', path.join(root, '..')],
    ...names.map((name): [string, string] => [name, path.join(root, name)])
  ];

  for (const [name, fullPath] of rows) {
    try {
      entries.push(await describeEntry(fullPath, name));
    } catch (error: unknown) {
      warnings.push({ path: fullPath, message: errorMessage(error), code: errorCode(error) });
    }
  }
  return { entries, warnings };
}

/**
 * Gather everything the `inspect` report shows. The tree is walked once; the
 * extension predicate is applied to that single walk.
 */
export async function summarizeDirectory(
  criteria: SelectionCriteria,
  options: SummarizeOptions = {}
): Promise<DirectorySummary> {
  const listingLimit = options.listingLimit ?? DEFAULT_LISTING_LIMIT;
  const topFiles = options.topFiles ?? DEFAULT_TOP_FILES;

  // Compile the pattern first so a bad one fails before any work
  const matcher = criteria.pattern !== undefined
    ? createPatternMatcher(criteria.pattern, options.patternMode)
    : undefined;

  const all = await buildPathSet(criteria.root, { signal: options.signal });
  const selected = all.entries.filter(createExtensionPredicate(criteria.extension));
  const listing = await listDirectory(criteria.root);

  const summary: DirectorySummary = {
    root: criteria.root,
    extension: criteria.extension,
    pattern: criteria.pattern,
    totalSizeBytes: all.entries.reduce((sum, entry) => sum + entry.sizeBytes, 0),
    listing: listing.entries.slice(0, listingLimit),
    listingTotal: listing.entries.length,
    matchingFileCount: selected.length,
    largestFiles: [],
    warnings: [...all.warnings, ...listing.warnings]
  };

  if (matcher) {
    const content = await filterByContent(selected, matcher, { signal: options.signal });
    summary.content = content;
    summary.matchingFileCount = content.filesMatched;
    summary.warnings.push(...content.warnings);
  } else {
    summary.largestFiles = rankLargestFiles(selected, topFiles);
  }

  return summary;
}

export function renderListingEntry(entry: ListingEntry): string {
  const target = entry.linkTarget !== undefined ? ` -> ${entry.linkTarget}` : '';
  return `${entry.mode} ${String(entry.links).padStart(3)} ${String(entry.sizeBytes).padStart(10)} ` +
    `${formatTimestamp(entry.modifiedAt)} ${entry.name}${target}`;
}

/**
 * Text lines for the directory part of the report. Match lines come from
 * renderMatchSummary.
 */
export function renderDirectorySummary(summary: DirectorySummary): string[] {
  const lines: string[] = [];
  lines.push(`Directory: ${summary.root}`);
  lines.push(`Total size: ${formatSize(summary.totalSizeBytes)}`);

  if (summary.listingTotal > summary.listing.length) {
    lines.push(`Listing (first ${summary.listing.length} of ${summary.listingTotal} entries):`);
  } else {
    lines.push(`Listing (${summary.listingTotal} entries):`);
  }
  summary.listing.forEach(entry => lines.push(`  ${renderListingEntry(entry)}`));

  const suffix = summary.extension ? ` (*${summary.extension})` : '';
  if (summary.pattern !== undefined) {
    lines.push(`Files matching '${summary.pattern}'${suffix}: ${summary.matchingFileCount}`);
    return lines;
  }

  lines.push(`Matching files${suffix}: ${summary.matchingFileCount}`);
  lines.push(`Top ${summary.largestFiles.length} files by size:`);
  summary.largestFiles.forEach(entry => lines.push(`  ${formatSize(entry.sizeBytes)}\t${entry.path}`));
  return lines;
}

/**
 * One `path:lineNumber:lineText` line per match, or a single informational
 * line when there were none.
 */
export function renderMatchSummary(result: ContentFilterResult, pattern: string): string[] {
  if (result.matches.length === 0) {
    return [`No matches found for pattern '${pattern}'`];
  }
  return result.matches.map(match => `${match.path}:${match.lineNumber}:${match.lineText}`);
}
