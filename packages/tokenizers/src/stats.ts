/**
 * Pair statistics and the merge primitive shared by training and encoding.
 *
 * Pairs are packed into one number (`left * MAX_VOCAB_SIZE + right`) so they
 * can key a plain Map. Numeric order of keys is lexicographic pair order.
 */
import { MAX_VOCAB_SIZE, type Pair } from "@bytepair/core";

/** pair key -> occurrence count */
export type PairCounts = Map<number, number>;

export const pairKey = (left: number, right: number): number =>
  left * MAX_VOCAB_SIZE + right;

export function unpackPair(key: number): Pair {
  return [Math.floor(key / MAX_VOCAB_SIZE), key % MAX_VOCAB_SIZE];
}

/**
 * Count adjacent pairs of one sequence, accumulating into `counts` when
 * given. Sequences shorter than 2 add nothing.
 */
export function countPairs(
  ids: ArrayLike<number>,
  counts: PairCounts = new Map(),
): PairCounts {
  for (let i = 0; i + 1 < ids.length; i++) {
    const key = pairKey(ids[i], ids[i + 1]);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
}

/** Combined counts over independent sequences; no pair spans two of them. */
export function countPairsAcross(
  sequences: ReadonlyArray<ArrayLike<number>>,
): PairCounts {
  const counts: PairCounts = new Map();
  for (const seq of sequences) countPairs(seq, counts);
  return counts;
}

/**
 * The most frequent pair. Ties go to the lexicographically smallest pair
 * (smaller left id, then smaller right id), independent of Map order.
 */
export function mostFrequentPair(
  counts: PairCounts,
): { readonly pair: Pair; readonly count: number } | undefined {
  let bestKey = -1;
  let bestCount = 0;
  for (const [key, count] of counts) {
    if (count > bestCount || (count === bestCount && key < bestKey)) {
      bestKey = key;
      bestCount = count;
    }
  }
  if (bestKey < 0) return undefined;
  return { pair: unpackPair(bestKey), count: bestCount };
}

/**
 * Replace every non-overlapping (left, right) with `newId`, scanning left
 * to right. Returns a new array; `ids` is never touched.
 */
export function mergePair(
  ids: ArrayLike<number>,
  pair: Pair,
  newId: number,
): number[] {
  const [left, right] = pair;
  const out: number[] = [];
  let i = 0;
  while (i < ids.length) {
    if (i < ids.length - 1 && ids[i] === left && ids[i + 1] === right) {
      out.push(newId);
      i += 2;
    } else {
      out.push(ids[i]);
      i += 1;
    }
  }
  return out;
}
