/**
 * Text Similarity
 *
 * Normalization and the Ratcliff/Obershelp similarity ratio used for
 * duplicate detection. The ratio is 2*M/T where M is the total length of
 * the matching blocks and T the combined length of both strings.
 */

import { createHash } from 'crypto';

/**
 * Collapse whitespace, unify quotes and dashes, lower-case.
 */
export function normalizeForComparison(text: string): string {
  return text
    .trim()
    .replace(/\s+/g, ' ')
    .replace(/[‘’‚‛′"“”„‟″]/g, "'")
    .replace(/[–—―−]/g, '-')
    .toLowerCase();
}

export function hashText(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

// ==========================================
// MATCHING BLOCKS
// ==========================================

type CharIndex = Map<string, number[]>;

/**
 * Positions of each character in b. For strings of 200 characters or
 * more, characters making up over 1% of b are left out of the index.
 */
function indexCharacters(b: string): CharIndex {
  const index: CharIndex = new Map();
  for (let j = 0; j < b.length; j++) {
    const positions = index.get(b[j]);
    if (positions) {
      positions.push(j);
    } else {
      index.set(b[j], [j]);
    }
  }

  if (b.length >= 200) {
    const limit = Math.floor(b.length / 100) + 1;
    for (const [char, positions] of [...index]) {
      if (positions.length > limit) index.delete(char);
    }
  }
  return index;
}

interface Match {
  i: number;
  j: number;
  size: number;
}

function findLongestMatch(
  a: string,
  b: string,
  index: CharIndex,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number
): Match {
  let besti = alo;
  let bestj = blo;
  let bestsize = 0;
  let lengths = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    const positions = index.get(a[i]);
    if (positions) {
      for (const j of positions) {
        if (j < blo) continue;
        if (j >= bhi) break;
        const k = (lengths.get(j - 1) ?? 0) + 1;
        next.set(j, k);
        if (k > bestsize) {
          besti = i - k + 1;
          bestj = j - k + 1;
          bestsize = k;
        }
      }
    }
    lengths = next;
  }

  // Grow the block over characters the index skipped
  while (besti > alo && bestj > blo && a[besti - 1] === b[bestj - 1]) {
    besti--;
    bestj--;
    bestsize++;
  }
  while (besti + bestsize < ahi && bestj + bestsize < bhi && a[besti + bestsize] === b[bestj + bestsize]) {
    bestsize++;
  }

  return { i: besti, j: bestj, size: bestsize };
}

/**
 * Total length of the matching blocks between a and b.
 */
export function matchingCharacters(a: string, b: string): number {
  const index = indexCharacters(b);
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  let total = 0;

  while (queue.length > 0) {
    const next = queue.pop();
    if (!next) break;
    const [alo, ahi, blo, bhi] = next;
    const match = findLongestMatch(a, b, index, alo, ahi, blo, bhi);
    if (match.size === 0) continue;

    total += match.size;
    if (alo < match.i && blo < match.j) {
      queue.push([alo, match.i, blo, match.j]);
    }
    if (match.i + match.size < ahi && match.j + match.size < bhi) {
      queue.push([match.i + match.size, ahi, match.j + match.size, bhi]);
    }
  }
  return total;
}

export function similarityRatio(a: string, b: string): number {
  const length = a.length + b.length;
  if (length === 0) return 1;
  return (2 * matchingCharacters(a, b)) / length;
}

// ==========================================
// UPPER BOUNDS
// ==========================================

export type CharCounts = Map<string, number>;

export function countCharacters(text: string): CharCounts {
  const counts: CharCounts = new Map();
  for (let i = 0; i < text.length; i++) {
    counts.set(text[i], (counts.get(text[i]) ?? 0) + 1);
  }
  return counts;
}

/**
 * Upper bound on similarityRatio from lengths alone.
 */
export function lengthBound(a: string, b: string): number {
  const length = a.length + b.length;
  if (length === 0) return 1;
  return (2 * Math.min(a.length, b.length)) / length;
}

/**
 * Upper bound on similarityRatio from shared character counts.
 */
export function characterBound(aCounts: CharCounts, bCounts: CharCounts, length: number): number {
  if (length === 0) return 1;
  let shared = 0;
  for (const [char, count] of aCounts) {
    const other = bCounts.get(char);
    if (other) shared += Math.min(count, other);
  }
  return (2 * shared) / length;
}
