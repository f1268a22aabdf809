export interface EntropyEstimate {
  /** Shannon entropy of the observed character distribution. */
  bitsPerCharacter: number;
  /** bitsPerCharacter scaled by length. */
  bits: number;
}

/**
 * Empirical Shannon entropy over code points. Repeated characters lower the
 * estimate, unlike an alphabet-size bound.
 */
export function shannonEntropy(chars: readonly string[]): EntropyEstimate {
  if (chars.length === 0) return { bitsPerCharacter: 0, bits: 0 };

  const freq = new Map<string, number>();
  for (const ch of chars) {
    freq.set(ch, (freq.get(ch) ?? 0) + 1);
  }

  let bitsPerCharacter = 0;
  for (const count of freq.values()) {
    const p = count / chars.length;
    bitsPerCharacter -= p * Math.log2(p);
  }

  return { bitsPerCharacter, bits: bitsPerCharacter * chars.length };
}
