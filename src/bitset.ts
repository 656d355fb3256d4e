/**
 * table-data — bitset primitives
 *
 * Uint32Array bitsets over field ordinals. A record keeps two of them: the
 * fields it was allocated for, and the subset of those currently active.
 *
 * Bit layout:
 *   word  = j >>> 5        (Math.floor(j / 32))
 *   shift = j  &  31       (j % 32)
 *   set:   bs[word] |= (1 << shift)
 *   test:  bs[word] &  (1 << shift)
 */

// ── Construction ──────────────────────────────────────────────────────────────

/**
 * Allocate a zeroed bitset large enough to hold `bitCount` bits.
 * Bit j is at word (j >>> 5), shift (j & 31).
 */
export function createBitset(bitCount: number): Uint32Array {
  return new Uint32Array(Math.ceil(bitCount / 32));
}

// ── Single-bit access ─────────────────────────────────────────────────────────

export function setBit(bs: Uint32Array, j: number): void {
  bs[j >>> 5] = bs[j >>> 5]! | (1 << (j & 31));
}

export function clearBit(bs: Uint32Array, j: number): void {
  bs[j >>> 5] = bs[j >>> 5]! & ~(1 << (j & 31));
}

/** False for bits past the end of the array. */
export function testBit(bs: Uint32Array, j: number): boolean {
  const word = bs[j >>> 5];
  return word !== undefined && (word & (1 << (j & 31))) !== 0;
}

// ── Iteration ────────────────────────────────────────────────────────────────

/**
 * Invoke `fn` for each set bit j in `bs`, where j < limit, in ascending order.
 *
 * Zero words are skipped in O(1). Within a word, `word & -word` isolates the
 * lowest set bit and `Math.clz32` turns it into a bit position.
 */
export function forEachSet(
  bs:    Uint32Array,
  limit: number,
  fn:    (j: number) => void,
): void {
  const wordCount = Math.ceil(limit / 32);
  const lastWord  = wordCount - 1;

  for (let w = 0; w < wordCount && w < bs.length; w++) {
    let word: number = bs[w]!;

    if (w === lastWord) {
      const tail = limit & 31;
      if (tail !== 0) word &= (1 << tail) - 1;
    }

    if (word === 0) continue;

    const base = w << 5;

    while (word !== 0) {
      const lsb = word & -word;
      const pos = 31 - Math.clz32(lsb);
      fn(base + pos);
      word &= word - 1;
    }
  }
}
