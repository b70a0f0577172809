/**
 * @module search/similarity
 * @fileoverview Case-insensitive string similarity in the range [0, 1].
 *
 * Ratcliff/Obershelp "gestalt pattern matching": find the longest common
 * substring, then recurse into the unmatched text on each side of it. With
 * `M` matched characters the score is
 *
 * ```
 *   2 * M / (|a| + |b|)
 * ```
 *
 * which is 1 for identical strings and 0 when no character is shared. A
 * short query that is a prefix of a long title still scores well
 * ("all your base" against "All Your Base Are Belong To Us" is 26/43).
 *
 * Both inputs are lowercased first, so
 * `similarity(a, b) === similarity(a.toLowerCase(), b.toLowerCase())`.
 *
 * @example
 * ```ts
 * similarity("Doge", "doge");      // 1
 * similarity("ab", "abcdef");      // 0.5
 * similarity("abc", "xyz");        // 0
 * ```
 */

/** A matching block: start in `a`, start in `b`, length. */
type Block = readonly [number, number, number];

/**
 * Longest common substring of `a[aLo:aHi]` and `b[bLo:bHi]`.
 *
 * Ties go to the block starting earliest in `a`, then earliest in `b`.
 */
function longestMatch(
  a: string,
  aLo: number,
  aHi: number,
  b: string,
  bLo: number,
  bHi: number,
): Block {
  let bestI = aLo;
  let bestJ = bLo;
  let bestSize = 0;

  // runs[j + 1] = length of the common run ending at a[i - 1], b[j]
  let previous = new Array<number>(bHi - bLo + 1).fill(0);

  for (let i = aLo; i < aHi; i++) {
    const current = new Array<number>(bHi - bLo + 1).fill(0);
    for (let j = bLo; j < bHi; j++) {
      if (a[i] !== b[j]) {
        continue;
      }
      const size = previous[j - bLo] + 1;
      current[j - bLo + 1] = size;
      if (size > bestSize) {
        bestI = i - size + 1;
        bestJ = j - size + 1;
        bestSize = size;
      }
    }
    previous = current;
  }

  return [bestI, bestJ, bestSize];
}

/** Total characters covered by recursively found matching blocks. */
function countMatches(a: string, b: string): number {
  let matched = 0;
  const pending: Array<[number, number, number, number]> = [
    [0, a.length, 0, b.length],
  ];

  while (pending.length > 0) {
    const range = pending.pop();
    if (range === undefined) {
      break;
    }
    const [aLo, aHi, bLo, bHi] = range;
    const [i, j, size] = longestMatch(a, aLo, aHi, b, bLo, bHi);
    if (size === 0) {
      continue;
    }

    matched += size;
    if (aLo < i && bLo < j) {
      pending.push([aLo, i, bLo, j]);
    }
    if (i + size < aHi && j + size < bHi) {
      pending.push([i + size, aHi, j + size, bHi]);
    }
  }

  return matched;
}

/**
 * Score how alike two strings are, ignoring case.
 *
 * Two empty strings are identical and score 1.
 */
export function similarity(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  const total = left.length + right.length;
  if (total === 0) {
    return 1;
  }
  return (2 * countMatches(left, right)) / total;
}
