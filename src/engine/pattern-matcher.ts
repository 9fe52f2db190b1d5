/**
 * Risk Engine — Pattern Matcher
 *
 * Fuzzy matching of change descriptions against user-supplied noise
 * phrases. A record whose description is similar enough to any phrase is
 * downgraded to `noise` confidence so the splitter drops it from risk
 * evaluation.
 *
 * Similarity is the Ratcliff/Obershelp ratio `2 * M / (|a| + |b|)`, where M
 * counts characters in the recursively found longest common blocks.
 * Comparison is case-insensitive.
 */

import { readFile } from 'node:fs/promises';
import pMap from 'p-map';

import { NoisePatternError } from '../errors/errors.ts';
import type { ChangeRecord } from './types.ts';

export const DEFAULT_NOISE_THRESHOLD = 0.8;

/** Concurrency used when reading several pattern files. */
const PATTERN_FILE_CONCURRENCY = 4;

/**
 * Supplies the noise phrases for one evaluation. Rejects when a named
 * source cannot be read.
 */
export type NoisePatternSource = () => Promise<readonly string[]>;

export type ReadTextFile = (filePath: string, encoding: 'utf8') => Promise<string>;

export interface NoisePatternMatch {
  readonly pattern: string;
  readonly ratio: number;
}

/* -------------------------------------------------------------------------- */
/* Similarity                                                                 */
/* -------------------------------------------------------------------------- */

interface Block {
  readonly a: number;
  readonly b: number;
  readonly size: number;
}

function indexPositions(b: string): Map<string, number[]> {
  const b2j = new Map<string, number[]>();
  for (let j = 0; j < b.length; j++) {
    const ch = b.charAt(j);
    const positions = b2j.get(ch);
    if (positions) {
      positions.push(j);
    } else {
      b2j.set(ch, [j]);
    }
  }
  return b2j;
}

/**
 * Longest common block of `a[alo:ahi]` and `b[blo:bhi]`. Ties resolve to the
 * block starting earliest in `a`, then earliest in `b`.
 */
function findLongestMatch(
  a: string,
  b2j: ReadonlyMap<string, readonly number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number,
): Block {
  let best: Block = { a: alo, b: blo, size: 0 };
  let runLengths = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    for (const j of b2j.get(a.charAt(i)) ?? []) {
      if (j < blo) {
        continue;
      }
      if (j >= bhi) {
        break;
      }
      const k = (runLengths.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > best.size) {
        best = { a: i - k + 1, b: j - k + 1, size: k };
      }
    }
    runLengths = next;
  }

  return best;
}

function countMatchingCharacters(a: string, b: string): number {
  const b2j = indexPositions(b);
  const pending: Array<readonly [number, number, number, number]> = [[0, a.length, 0, b.length]];
  let matched = 0;

  for (let range = pending.pop(); range !== undefined; range = pending.pop()) {
    const [alo, ahi, blo, bhi] = range;
    const block = findLongestMatch(a, b2j, alo, ahi, blo, bhi);
    if (block.size === 0) {
      continue;
    }
    matched += block.size;
    if (alo < block.a && blo < block.b) {
      pending.push([alo, block.a, blo, block.b]);
    }
    if (block.a + block.size < ahi && block.b + block.size < bhi) {
      pending.push([block.a + block.size, ahi, block.b + block.size, bhi]);
    }
  }

  return matched;
}

/**
 * Case-insensitive similarity of two strings in the range 0.0–1.0.
 * Two empty strings are identical (1.0).
 */
export function similarityRatio(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  const total = left.length + right.length;
  if (total === 0) {
    return 1;
  }
  return (2 * countMatchingCharacters(left, right)) / total;
}

/* -------------------------------------------------------------------------- */
/* Matching                                                                   */
/* -------------------------------------------------------------------------- */

/**
 * First pattern whose similarity to `text` reaches `threshold`.
 */
export function findNoisePatternMatch(
  text: string,
  patterns: readonly string[],
  threshold: number = DEFAULT_NOISE_THRESHOLD,
): NoisePatternMatch | undefined {
  if (text.length === 0 || patterns.length === 0) {
    return undefined;
  }

  for (const pattern of patterns) {
    const ratio = similarityRatio(text, pattern);
    if (ratio >= threshold) {
      return { pattern, ratio };
    }
  }

  return undefined;
}

export function matchesNoisePattern(
  text: string,
  patterns: readonly string[],
  threshold: number = DEFAULT_NOISE_THRESHOLD,
): boolean {
  return findNoisePatternMatch(text, patterns, threshold) !== undefined;
}

/**
 * Mark every record whose description matches a noise phrase as `noise`.
 * Records are never removed. With no patterns the input array is returned.
 */
export function applyNoisePatterns(
  records: readonly ChangeRecord[],
  patterns: readonly string[],
  threshold: number = DEFAULT_NOISE_THRESHOLD,
): readonly ChangeRecord[] {
  if (patterns.length === 0) {
    return records;
  }

  return records.map((record): ChangeRecord => {
    const match = findNoisePatternMatch(record.description, patterns, threshold);
    if (match === undefined) {
      return record;
    }
    return {
      ...record,
      confidence: 'noise',
      confidenceReason: `Matched noise pattern "${match.pattern}" (similarity ${match.ratio.toFixed(2)})`,
    };
  });
}

/* -------------------------------------------------------------------------- */
/* Pattern sources                                                            */
/* -------------------------------------------------------------------------- */

/**
 * Parse newline-delimited phrases. Blank lines and `#` comments are skipped.
 */
export function parseNoisePatterns(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

/**
 * Read and concatenate the phrases of several pattern files, in argument
 * order.
 *
 * @throws {NoisePatternError} when any file cannot be read.
 */
export async function loadNoisePatterns(
  filePaths: readonly string[],
  readFileFn: ReadTextFile = readFile,
): Promise<string[]> {
  const perFile = await pMap(
    filePaths,
    async (filePath) => {
      try {
        const content = await readFileFn(filePath, 'utf8');
        return parseNoisePatterns(content);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new NoisePatternError(
          'NOISE_PATTERNS_UNREADABLE',
          `Cannot read noise pattern file ${filePath}: ${reason}`,
          { cause: error, details: { filePath } },
        );
      }
    },
    { concurrency: PATTERN_FILE_CONCURRENCY },
  );

  return perFile.flat();
}

export function fileNoisePatternSource(
  filePaths: readonly string[],
  readFileFn: ReadTextFile = readFile,
): NoisePatternSource {
  return () => loadNoisePatterns(filePaths, readFileFn);
}

export function staticNoisePatternSource(patterns: readonly string[]): NoisePatternSource {
  return () => Promise.resolve(patterns);
}
