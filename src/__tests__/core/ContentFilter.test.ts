/**
 * Tests for src/core/ContentFilter.ts
 */

import path from 'path';
import { CancelledError, InvalidArgumentError } from '../../core/errors';
import { createPatternMatcher, filterByContent, splitLines } from '../../core/ContentFilter';
import { buildPathSet } from '../../core/PathSetBuilder';
import { makeTempDir, removeTempDir, writeTree } from '../../../tests/helpers/tempTree';

describe('createPatternMatcher', () => {
  it('rejects an empty pattern', () => {
    expect(() => createPatternMatcher('')).toThrow(InvalidArgumentError);
  });

  it('rejects invalid regular expression syntax', () => {
    expect(() => createPatternMatcher('(')).toThrow(/^invalid pattern '\('/);
  });

  it('matches regular expressions by default', () => {
    const matcher = createPatternMatcher('fo+ba[rz]');
    expect(matcher.mode).toBe('regex');
    expect(matcher.test('xx foooobaz')).toBe(true);
    expect(matcher.test('fbar')).toBe(false);
  });

  it('gives the same answer on repeated calls', () => {
    const matcher = createPatternMatcher('a');
    expect([matcher.test('a'), matcher.test('a'), matcher.test('a')]).toEqual([true, true, true]);
  });

  it('matches literal substrings in fixed mode', () => {
    const matcher = createPatternMatcher('a.c', 'fixed');
    expect(matcher.test('abc')).toBe(false);
    expect(matcher.test('xa.cx')).toBe(true);
  });

  it('accepts an unbalanced parenthesis in fixed mode', () => {
    expect(createPatternMatcher('(', 'fixed').test('f(x)')).toBe(true);
  });
});

describe('splitLines', () => {
  it('returns no lines for empty text', () => {
    expect(splitLines('')).toEqual([]);
  });

  it('does not add a line after a final newline', () => {
    expect(splitLines('a\nb\n')).toEqual(['a', 'b']);
  });

  it('strips carriage returns before newlines', () => {
    expect(splitLines('a\r\nb')).toEqual(['a', 'b']);
  });

  it('keeps blank lines in the middle', () => {
    expect(splitLines('a\n\nb')).toEqual(['a', '', 'b']);
  });

  it('treats a lone newline as one empty line', () => {
    expect(splitLines('\n')).toEqual(['']);
  });
});

describe('filterByContent', () => {
  let root: string;

  beforeAll(async () => {
    root = await makeTempDir('filter-');
    await writeTree(root, {
      'one.txt': 'alpha\nbeta\ngamma alpha\n',
      'two.txt': 'nothing here\n',
      'bin.dat': Buffer.from([0x61, 0x00, 0x62]),
      'bad.txt': Buffer.from([0xff, 0xfe, 0x41])
    });
  });

  afterAll(async () => {
    await removeTempDir(root);
  });

  it('reports each matching line in entry then line order', async () => {
    const { entries } = await buildPathSet(root);
    const result = await filterByContent(entries, createPatternMatcher('alpha'));

    expect(result.matches).toEqual([
      { path: path.join(root, 'one.txt'), lineNumber: 1, lineText: 'alpha' },
      { path: path.join(root, 'one.txt'), lineNumber: 3, lineText: 'gamma alpha' }
    ]);
    expect(result.filesScanned).toBe(2);
    expect(result.filesMatched).toBe(1);
  });

  it('skips binary and undecodable files with warnings', async () => {
    const { entries } = await buildPathSet(root);
    const result = await filterByContent(entries, createPatternMatcher('alpha'));

    expect(result.warnings.map(w => w.path)).toEqual([
      path.join(root, 'bad.txt'),
      path.join(root, 'bin.dat')
    ]);
    expect(result.warnings[0].message).toMatch(/^File is not valid UTF-8/);
    expect(result.warnings[1].message).toBe('binary file skipped');
  });

  it('treats zero matches as a normal result', async () => {
    const { entries } = await buildPathSet(root, { extension: '.txt' });
    const result = await filterByContent(entries, createPatternMatcher('omega'));
    expect(result.matches).toEqual([]);
    expect(result.filesMatched).toBe(0);
  });

  it('records a vanished file as a warning with its errno code', async () => {
    const gone = path.join(root, 'gone.txt');
    const result = await filterByContent(
      [{ path: gone, relativePath: 'gone.txt', sizeBytes: 0 }],
      createPatternMatcher('x')
    );
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0].path).toBe(gone);
    expect(result.warnings[0].code).toBe('ENOENT');
  });

  it('stops with CancelledError when aborted', async () => {
    const { entries } = await buildPathSet(root);
    const controller = new AbortController();
    controller.abort();
    await expect(
      filterByContent(entries, createPatternMatcher('a'), { signal: controller.signal })
    ).rejects.toBeInstanceOf(CancelledError);
  });
});
