/**
 * @fileoverview Text normalization and lexical similarity helpers
 *
 * Used by the local remediation stores to match questions and by the
 * heuristic oracle to estimate grounding.
 */

/**
 * NFKC, lowercase, and every run of characters other than letters, marks and
 * digits (in any script) collapsed to one space.
 */
export function normalizeText(value: string): string {
  return value
    .normalize('NFKC')
    .toLowerCase()
    .replace(/[^\p{L}\p{M}\p{N}]+/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function tokenize(value: string): string[] {
  const normalized = normalizeText(value);
  if (!normalized) return [];
  return normalized.split(' ');
}

function toBigrams(value: string): Set<string> {
  if (value.length < 2) {
    return new Set(value ? [value] : []);
  }
  const bag = new Set<string>();
  for (let index = 0; index < value.length - 1; index += 1) {
    bag.add(value.slice(index, index + 2));
  }
  return bag;
}

/**
 * Dice coefficient over character bigrams of the normalized strings.
 * Identical normalized strings score 1; empty input scores 0.
 */
export function questionSimilarity(left: string, right: string): number {
  const normalizedLeft = normalizeText(left);
  const normalizedRight = normalizeText(right);
  if (!normalizedLeft || !normalizedRight) {
    return 0;
  }
  if (normalizedLeft === normalizedRight) {
    return 1;
  }

  const leftBigrams = toBigrams(normalizedLeft);
  const rightBigrams = toBigrams(normalizedRight);

  let overlap = 0;
  for (const gram of leftBigrams) {
    if (rightBigrams.has(gram)) {
      overlap += 1;
    }
  }

  return (2 * overlap) / (leftBigrams.size + rightBigrams.size);
}

/**
 * Fraction of `aTokens` that also appear in `bTokens`.
 */
export function tokenOverlap(aTokens: readonly string[], bTokens: readonly string[]): number {
  if (aTokens.length === 0) return 0;
  const bSet = new Set(bTokens);
  let overlapCount = 0;
  for (const token of aTokens) {
    if (bSet.has(token)) overlapCount += 1;
  }
  return overlapCount / aTokens.length;
}
