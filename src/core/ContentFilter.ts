/**
 * Content Filter - line-oriented pattern search over a PathSet.
 *
 * A file that cannot be read, is binary, or is not valid UTF-8 is skipped and
 * recorded as a warning; the scan always completes.
 */

import { readTextFile } from '../utils/files/FileReader';
import { FileOperationError } from '../utils/files/types';
import { logger } from '../utils/logger';
import { InvalidArgumentError, errorMessage, throwIfCancelled } from './errors';
import { FileEntry, FileWarning, MatchResult, OperationOptions } from './types';

/**
 * `regex` treats the pattern as a JavaScript regular expression,
 * `fixed` as a literal substring.
 */
export type PatternMode = 'regex' | 'fixed';

export interface PatternMatcher {
  readonly source: string;
  readonly mode: PatternMode;
  test(line: string): boolean;
}

export interface ContentFilterResult {
  matches: MatchResult[];
  warnings: FileWarning[];
  filesScanned: number;
  /** Files with at least one matching line */
  filesMatched: number;
}

/**
 * Build a matcher for `pattern`.
 *
 * @throws InvalidArgumentError for an empty pattern or invalid regex syntax
 */
export function createPatternMatcher(pattern: string, mode: PatternMode = 'regex'): PatternMatcher {
  if (pattern === '') {
    throw new InvalidArgumentError('pattern must not be empty');
  }

  if (mode === 'fixed') {
    return {
      source: pattern,
      mode,
      test: (line) => line.includes(pattern)
    };
  }

  let regex: RegExp;
  try {
    // No `g` flag: test() must not carry lastIndex between lines
    regex = new RegExp(pattern);
  } catch (error: unknown) {
    throw new InvalidArgumentError(`invalid pattern '${pattern}': ${errorMessage(error)}`);
  }

  return {
    source: pattern,
    mode,
    test: (line) => regex.test(line)
  };
}

/**
 * Split text into lines. `\r\n` and `\n` both end a line; a final newline
 * does not start another, empty, line.
 */
export function splitLines(text: string): string[] {
  if (text === '') {
    return [];
  }
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Test every line of every entry against `matcher`.
 */
export async function filterByContent(
  entries: readonly FileEntry[],
  matcher: PatternMatcher,
  options: OperationOptions = {}
): Promise<ContentFilterResult> {
  const result: ContentFilterResult = {
    matches: [],
    warnings: [],
    filesScanned: 0,
    filesMatched: 0
  };

  for (const entry of entries) {
    throwIfCancelled(options.signal, 'content filter');

    let read;
    try {
      read = await readTextFile(entry.path);
    } catch (error: unknown) {
      result.warnings.push({
        path: entry.path,
        message: errorMessage(error),
        code: error instanceof FileOperationError ? error.code : undefined
      });
      continue;
    }

    if (read.kind === 'binary') {
      result.warnings.push({ path: entry.path, message: 'binary file skipped' });
      continue;
    }

    result.filesScanned++;
    let matchedHere = false;
    splitLines(read.text).forEach((lineText, index) => {
      if (matcher.test(lineText)) {
        result.matches.push({ path: entry.path, lineNumber: index + 1, lineText });
        matchedHere = true;
      }
    });
    if (matchedHere) {
      result.filesMatched++;
    }
  }

  logger.debug(`Content filter '${matcher.source}' done`, {
    scanned: result.filesScanned,
    matches: result.matches.length,
    warnings: result.warnings.length
  });
  return result;
}
