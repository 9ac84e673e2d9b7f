export interface MatchingBlock {
  a: number;
  b: number;
  size: number;
}

/** Sequences at least this long drop their most frequent elements from the index. */
export const POPULAR_MIN_LENGTH = 200;

/**
 * Positions of each element of `b`. For long sequences, elements occurring
 * more than 1% of the time are left out: they only seed a match through
 * extension, which keeps each search close to linear.
 */
function indexPositions(b: readonly string[]): Map<string, number[]> {
  const positions = new Map<string, number[]>();
  b.forEach((item, j) => {
    const list = positions.get(item);
    if (list) list.push(j);
    else positions.set(item, [j]);
  });

  if (b.length >= POPULAR_MIN_LENGTH) {
    const limit = 1 + Math.floor(b.length / 100);
    for (const [item, list] of positions) {
      if (list.length > limit) positions.delete(item);
    }
  }
  return positions;
}

function findLongestMatch(
  a: readonly string[],
  b: readonly string[],
  positions: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number,
): MatchingBlock {
  let best: MatchingBlock = { a: alo, b: blo, size: 0 };
  let runLengths = new Map<number, number>();

  for (let i = alo; i < ahi; i += 1) {
    const next = new Map<number, number>();
    for (const j of positions.get(a[i]) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (runLengths.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > best.size) {
        best = { a: i - k + 1, b: j - k + 1, size: k };
      }
    }
    runLengths = next;
  }

  let { a: besti, b: bestj, size } = best;
  while (besti > alo && bestj > blo && a[besti - 1] === b[bestj - 1]) {
    besti -= 1;
    bestj -= 1;
    size += 1;
  }
  while (besti + size < ahi && bestj + size < bhi && a[besti + size] === b[bestj + size]) {
    size += 1;
  }
  return { a: besti, b: bestj, size };
}

/**
 * Longest-matching-blocks alignment (Ratcliff/Obershelp): find the longest
 * common run, then recurse on the pieces left and right of it. Adjacent
 * blocks are merged; the result is ordered by position.
 */
export function matchingBlocks(a: readonly string[], b: readonly string[]): MatchingBlock[] {
  if (a.length === b.length && a.every((item, i) => item === b[i])) {
    return a.length > 0 ? [{ a: 0, b: 0, size: a.length }] : [];
  }

  const positions = indexPositions(b);
  const found: MatchingBlock[] = [];
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (queue.length > 0) {
    const range = queue.pop();
    if (!range) break;
    const [alo, ahi, blo, bhi] = range;
    const match = findLongestMatch(a, b, positions, alo, ahi, blo, bhi);
    if (match.size === 0) continue;

    found.push(match);
    if (alo < match.a && blo < match.b) {
      queue.push([alo, match.a, blo, match.b]);
    }
    if (match.a + match.size < ahi && match.b + match.size < bhi) {
      queue.push([match.a + match.size, ahi, match.b + match.size, bhi]);
    }
  }

  found.sort((x, y) => x.a - y.a || x.b - y.b);

  const merged: MatchingBlock[] = [];
  for (const block of found) {
    const last = merged[merged.length - 1];
    if (last && last.a + last.size === block.a && last.b + last.size === block.b) {
      last.size += block.size;
    } else {
      merged.push({ ...block });
    }
  }
  return merged;
}

export function similarityRatio(blocks: MatchingBlock[], lengthA: number, lengthB: number): number {
  const total = lengthA + lengthB;
  if (total === 0) return 1;
  const matched = blocks.reduce((sum, block) => sum + block.size, 0);
  return (2 * matched) / total;
}

/** Orders two sequences canonically so that alignment results do not depend on argument order. */
export function shouldSwap(a: readonly string[], b: readonly string[]): boolean {
  if (a.length !== b.length) return a.length > b.length;
  for (let i = 0; i < a.length; i += 1) {
    if (a[i] !== b[i]) return a[i] > b[i];
  }
  return false;
}
