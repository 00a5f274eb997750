export function tokenizeWords(text: string): string[] {
  const matches = text.toLowerCase().match(/[a-z0-9']+/g);
  return matches ? matches.filter(Boolean) : [];
}

/**
 * Bag-of-words overlap: shared distinct tokens over the smaller token set.
 * Returns 0 when either side has no tokens.
 */
export function overlapRatio(a: string, b: string): number {
  const setA = new Set(tokenizeWords(a));
  const setB = new Set(tokenizeWords(b));
  if (setA.size === 0 || setB.size === 0) {
    return 0;
  }
  let intersection = 0;
  for (const token of setA) {
    if (setB.has(token)) {
      intersection += 1;
    }
  }
  return intersection / Math.min(setA.size, setB.size);
}

export function isNearDuplicateOf(text: string, others: Iterable<string>, threshold: number): boolean {
  for (const other of others) {
    if (overlapRatio(text, other) > threshold) {
      return true;
    }
  }
  return false;
}
