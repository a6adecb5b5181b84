import { MATCH_RATIOS } from '../constants/index.js';

export interface FuzzyMatch {
  /** Candidate as supplied by the caller, original casing preserved */
  readonly candidate: string;
  readonly score: number;
}

function longestCommonSubsequence(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) {
    return 0;
  }
  let previous = new Array<number>(b.length + 1).fill(0);
  let current = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      current[j] = a[i - 1] === b[j - 1]
        ? previous[j - 1] + 1
        : Math.max(previous[j], current[j - 1]);
    }
    [previous, current] = [current, previous];
  }
  return previous[b.length];
}

/**
 * Normalized indel similarity between two strings, 0-100, case-insensitive.
 * `2 * LCS / (len(a) + len(b)) * 100`; two empty strings score 100.
 */
export function similarity(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  const total = left.length + right.length;
  if (total === 0) {
    return 100;
  }
  return (2 * longestCommonSubsequence(left, right) / total) * 100;
}

/**
 * Highest-scoring candidate regardless of threshold. Ties keep the earliest
 * candidate in iteration order.
 */
export function closestMatch(query: string, candidates: Iterable<string>): FuzzyMatch | null {
  let best: FuzzyMatch | null = null;
  for (const candidate of candidates) {
    const score = similarity(query, candidate);
    if (best === null || score > best.score) {
      best = { candidate, score };
    }
  }
  return best;
}

/**
 * Best candidate for `query` when its score reaches `minRatio`, otherwise null.
 */
export function bestMatch(
  query: string,
  candidates: Iterable<string>,
  minRatio: number = MATCH_RATIOS.STRICT
): string | null {
  const match = closestMatch(query, candidates);
  return match !== null && match.score >= minRatio ? match.candidate : null;
}

