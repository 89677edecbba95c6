import { normalizeText, questionSimilarity } from '../utils/text.js';
import type { RemediationEntry } from './types.js';

export interface ScoredEntry {
  entry: RemediationEntry;
  similarity: number;
}

/**
 * Most similar entry at or above `threshold`. Ties go to the most recently
 * updated entry. A query with nothing left after normalization matches nothing.
 */
export function findBestMatch(
  entries: Iterable<RemediationEntry>,
  query: string,
  threshold: number
): ScoredEntry | null {
  if (!normalizeText(query)) return null;
  let best: ScoredEntry | null = null;
  for (const entry of entries) {
    const similarity = questionSimilarity(query, entry.question);
    if (similarity < threshold) continue;
    if (
      !best ||
      similarity > best.similarity ||
      (similarity === best.similarity && entry.updatedAt.getTime() > best.entry.updatedAt.getTime())
    ) {
      best = { entry, similarity };
    }
  }
  return best;
}
