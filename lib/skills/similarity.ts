/**
 * Gestalt pattern matching (Ratcliff/Obershelp): find the longest common
 * block, recurse on both sides of it, and score 2·M / (|a| + |b|).
 */

type Block = { i: number; j: number; size: number };

function longestMatch(a: string, b: string, alo: number, ahi: number, blo: number, bhi: number): Block {
  let best: Block = { i: alo, j: blo, size: 0 };
  // j2len[j] = length of the common run ending at a[i-1], b[j]
  let j2len = new Map<number, number>();
  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    for (let j = blo; j < bhi; j++) {
      if (a[i] !== b[j]) continue;
      const k = (j2len.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > best.size) best = { i: i - k + 1, j: j - k + 1, size: k };
    }
    j2len = next;
  }
  return best;
}

/** Total size of all matching blocks. */
export function matchingCharacters(a: string, b: string): number {
  let total = 0;
  const queue: [number, number, number, number][] = [[0, a.length, 0, b.length]];
  while (queue.length > 0) {
    const [alo, ahi, blo, bhi] = queue.pop() ?? [0, 0, 0, 0];
    const { i, j, size } = longestMatch(a, b, alo, ahi, blo, bhi);
    if (size === 0) continue;
    total += size;
    if (alo < i && blo < j) queue.push([alo, i, blo, j]);
    if (i + size < ahi && j + size < bhi) queue.push([i + size, ahi, j + size, bhi]);
  }
  return total;
}

/** 0..1; identical strings (including two empty ones) score 1. */
export function similarityRatio(a: string, b: string): number {
  const length = a.length + b.length;
  if (length === 0) return 1;
  return (2 * matchingCharacters(a, b)) / length;
}
