/**
 * Token Frequency Counter - tokenize, count, rank.
 *
 * A token is a maximal run of Unicode letters, combining marks or digits
 * after lower-casing.
 * Ranking is by count descending; equal counts keep first-seen order.
 */

import { StringDecoder } from 'string_decoder';
import { InvalidArgumentError } from './errors';
import { TokenCount } from './types';

const SEPARATOR = /[^\p{L}\p{M}\p{N}]+/u;
const TOKEN_CHAR = /^[\p{L}\p{M}\p{N}]$/u;

export const DEFAULT_TOP_TOKENS = 10;

/**
 * Anything `countTop` and `analyzeText` can read from
 */
export type TextSource =
  | string
  | Buffer
  | AsyncIterable<string | Buffer>;

/**
 * Line, word and byte counts with `wc` semantics
 */
export interface TextStatistics {
  /** Newline characters */
  lines: number;
  /** Maximal runs of non-whitespace */
  words: number;
  bytes: number;
}

export interface TextAnalysis {
  statistics: TextStatistics;
  topTokens: TokenCount[];
  /** Distinct tokens seen */
  distinctTokens: number;
}

/**
 * Split text into case-folded tokens.
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().split(SEPARATOR).filter(token => token !== '');
}

/**
 * Index where the run of token characters at the end of `text` begins
 * (`text.length` when the text ends in a separator). Scans backwards by code
 * point so a surrogate pair is tested as one character.
 */
function trailingTokenStart(text: string): number {
  let end = text.length;
  while (end > 0) {
    let start = end - 1;
    const unit = text.charCodeAt(start);
    if (unit >= 0xdc00 && unit <= 0xdfff && start > 0) {
      const high = text.charCodeAt(start - 1);
      if (high >= 0xd800 && high <= 0xdbff) {
        start--;
      }
    }
    if (!TOKEN_CHAR.test(text.slice(start, end))) {
      break;
    }
    end = start;
  }
  return end;
}

/**
 * Incremental counter. Chunks may end mid-token; the tail is held back until
 * the next chunk or `end()`.
 */
export class TokenFrequencyCounter {
  private counts = new Map<string, number>();
  private pending = '';

  push(chunk: string): void {
    const text = this.pending + chunk.toLowerCase();
    const cut = trailingTokenStart(text);
    this.pending = text.slice(cut);
    this.add(text.slice(0, cut));
  }

  end(): void {
    this.add(this.pending);
    this.pending = '';
  }

  /** Distinct tokens counted so far */
  get size(): number {
    return this.counts.size;
  }

  /**
   * The `topN` most frequent tokens. Array.prototype.sort is stable, so
   * equal counts stay in insertion (first-seen) order.
   */
  top(topN: number): TokenCount[] {
    assertTopN(topN);
    return Array.from(this.counts, ([token, count]) => ({ token, count }))
      .sort((a, b) => b.count - a.count)
      .slice(0, topN);
  }

  private add(text: string): void {
    for (const token of text.split(SEPARATOR)) {
      if (token !== '') {
        this.counts.set(token, (this.counts.get(token) ?? 0) + 1);
      }
    }
  }
}

/**
 * Running `wc`-style counts over chunks.
 */
export class TextStatisticsAccumulator {
  private lines = 0;
  private words = 0;
  private bytes = 0;
  private inWord = false;

  push(chunk: string, byteLength: number): void {
    this.bytes += byteLength;
    for (const char of chunk) {
      if (char === '\n') {
        this.lines++;
      }
      const isSpace = /\s/.test(char);
      if (!isSpace && !this.inWord) {
        this.words++;
      }
      this.inWord = !isSpace;
    }
  }

  result(): TextStatistics {
    return { lines: this.lines, words: this.words, bytes: this.bytes };
  }
}

function assertTopN(topN: number): void {
  if (!Number.isInteger(topN) || topN <= 0) {
    throw new InvalidArgumentError(`top N must be a positive integer, got ${topN}`);
  }
}

async function* chunksOf(source: TextSource): AsyncIterable<{ text: string; bytes: number }> {
  if (typeof source === 'string') {
    yield { text: source, bytes: Buffer.byteLength(source) };
    return;
  }
  if (Buffer.isBuffer(source)) {
    yield { text: new StringDecoder('utf8').end(source), bytes: source.length };
    return;
  }

  const decoder = new StringDecoder('utf8');
  for await (const chunk of source) {
    if (typeof chunk === 'string') {
      yield { text: chunk, bytes: Buffer.byteLength(chunk) };
    } else {
      yield { text: decoder.write(chunk), bytes: chunk.length };
    }
  }
  const rest = decoder.end();
  if (rest !== '') {
    yield { text: rest, bytes: 0 };
  }
}

/**
 * Count tokens and text statistics in a single pass over `source`.
 *
 * @throws InvalidArgumentError when `topN` is not a positive integer
 */
export async function analyzeText(source: TextSource, topN: number = DEFAULT_TOP_TOKENS): Promise<TextAnalysis> {
  assertTopN(topN);
  const counter = new TokenFrequencyCounter();
  const stats = new TextStatisticsAccumulator();

  for await (const { text, bytes } of chunksOf(source)) {
    counter.push(text);
    stats.push(text, bytes);
  }
  counter.end();

  return {
    statistics: stats.result(),
    topTokens: counter.top(topN),
    distinctTokens: counter.size
  };
}

/**
 * The `topN` most frequent tokens of `source`, count descending, ties in
 * first-seen order. Empty input gives an empty array.
 *
 * @throws InvalidArgumentError when `topN` is not a positive integer
 */
export async function countTop(source: TextSource, topN: number): Promise<TokenCount[]> {
  return (await analyzeText(source, topN)).topTokens;
}
