/**
 * Ratcliff/Obershelp block matching.
 *
 * Find the longest common contiguous run, then repeat on the unmatched
 * prefix pair and suffix pair. Ranges still to search are kept on an
 * explicit stack, so input size never turns into call depth.
 */
import type { BlockAlignment, MatchBlock, MatchOptions } from './types.js';

/** B must be at least this long before popular elements are dropped. */
const AUTOJUNK_MIN_LENGTH = 200;

type Range = readonly [aLow: number, aHigh: number, bLow: number, bHigh: number];

/**
 * Longest matching block within a[aLow, aHigh) and b[bLow, bHigh).
 * Ties go to the earliest start in A, then the earliest start in B.
 * Elements missing from the index (popular ones) only extend a block found
 * through indexed elements.
 */
function findLongestMatch<T>(
  a: readonly T[],
  b: readonly T[],
  bIndex: ReadonlyMap<T, readonly number[]>,
  [aLow, aHigh, bLow, bHigh]: Range
): MatchBlock {
  let bestA = aLow;
  let bestB = bLow;
  let bestSize = 0;

  // runLengths.get(j) = length of the match ending at a[i - 1] and b[j]
  let runLengths = new Map<number, number>();

  for (let i = aLow; i < aHigh; i++) {
    const next = new Map<number, number>();
    for (const j of bIndex.get(a[i]) ?? []) {
      if (j < bLow) continue;
      if (j >= bHigh) break;
      const size = (runLengths.get(j - 1) ?? 0) + 1;
      next.set(j, size);
      if (size > bestSize) {
        bestA = i - size + 1;
        bestB = j - size + 1;
        bestSize = size;
      }
    }
    runLengths = next;
  }

  if (bestSize === 0) {
    return { a: bestA, b: bestB, size: 0 };
  }
  while (bestA > aLow && bestB > bLow && a[bestA - 1] === b[bestB - 1]) {
    bestA--;
    bestB--;
    bestSize++;
  }
  while (bestA + bestSize < aHigh && bestB + bestSize < bHigh && a[bestA + bestSize] === b[bestB + bestSize]) {
    bestSize++;
  }
  return { a: bestA, b: bestB, size: bestSize };
}

/**
 * Positions of each element of b. With `autojunk`, elements making up more
 * than 1% of a long b are left out.
 */
function indexSequence<T>(b: readonly T[], autojunk: boolean): Map<T, number[]> {
  const bIndex = new Map<T, number[]>();
  b.forEach((element, j) => {
    const positions = bIndex.get(element);
    if (positions) {
      positions.push(j);
    } else {
      bIndex.set(element, [j]);
    }
  });

  if (autojunk && b.length >= AUTOJUNK_MIN_LENGTH) {
    const popular = Math.floor(b.length / 100) + 1;
    for (const [element, positions] of bIndex) {
      if (positions.length > popular) bIndex.delete(element);
    }
  }
  return bIndex;
}

/**
 * All matching blocks between two sequences, ordered by position in A.
 * Adjacent blocks are merged, so no two returned blocks touch or overlap.
 *
 * `autojunk` trades exactness for speed on long, repetitive input: popular
 * elements of b never seed a block, so fewer elements may be matched.
 */
export function matchBlocks<T>(a: readonly T[], b: readonly T[], options: MatchOptions = {}): MatchBlock[] {
  const bIndex = indexSequence(b, options.autojunk ?? false);

  const found: MatchBlock[] = [];
  const stack: Range[] = [[0, a.length, 0, b.length]];

  while (stack.length > 0) {
    const range = stack.pop();
    if (!range) break;
    const [aLow, aHigh, bLow, bHigh] = range;

    const block = findLongestMatch(a, b, bIndex, range);
    if (block.size === 0) continue;

    found.push(block);
    if (aLow < block.a && bLow < block.b) {
      stack.push([aLow, block.a, bLow, block.b]);
    }
    if (block.a + block.size < aHigh && block.b + block.size < bHigh) {
      stack.push([block.a + block.size, aHigh, block.b + block.size, bHigh]);
    }
  }

  found.sort((x, y) => x.a - y.a || x.b - y.b);

  const merged: MatchBlock[] = [];
  for (const block of found) {
    const last = merged[merged.length - 1];
    if (last && last.a + last.size === block.a && last.b + last.size === block.b) {
      merged[merged.length - 1] = { a: last.a, b: last.b, size: last.size + block.size };
    } else {
      merged.push(block);
    }
  }
  return merged;
}

/**
 * Similarity ratio for `matched` elements shared by sequences of the given lengths.
 */
export function blockRatio(matched: number, lengthA: number, lengthB: number): number {
  const total = lengthA + lengthB;
  return total === 0 ? 1 : (2 * matched) / total;
}

/**
 * Match blocks and score them.
 */
export function alignSequences<T>(a: readonly T[], b: readonly T[]): BlockAlignment {
  const blocks = matchBlocks(a, b);
  const matched = blocks.reduce((sum, block) => sum + block.size, 0);
  return { blocks, matched, ratio: blockRatio(matched, a.length, b.length) };
}

/**
 * Align two line sequences independently of argument order.
 *
 * Longest-block search breaks ties by position in its first argument, so
 * swapping the inputs can pick different blocks. The pair is put in a fixed
 * order (lexicographically smaller sequence first) before matching and the
 * blocks are mirrored back, which makes alignLines(a, b) and alignLines(b, a)
 * agree exactly. The earliest-start tie rule therefore applies to whichever
 * input sorts first, which is not always `a`.
 */
export function alignLines(a: readonly string[], b: readonly string[]): BlockAlignment {
  if (compareSequences(a, b) <= 0) {
    return alignSequences(a, b);
  }

  const swapped = alignSequences(b, a);
  const blocks = swapped.blocks
    .map((block) => ({ a: block.b, b: block.a, size: block.size }))
    .sort((x, y) => x.a - y.a || x.b - y.b);
  return { blocks, matched: swapped.matched, ratio: swapped.ratio };
}

function compareSequences(a: readonly string[], b: readonly string[]): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) return a[i] < b[i] ? -1 : 1;
  }
  return a.length - b.length;
}
