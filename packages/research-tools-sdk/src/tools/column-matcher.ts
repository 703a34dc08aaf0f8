import { distance } from 'fastest-levenshtein';
import { classifyName, keywordsFor } from './utils/column-categories';

export const DEFAULT_MATCH_THRESHOLD = 0.6;

/** Normalized Levenshtein similarity in [0, 1], case-insensitive. */
export function similarityRatio(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  const longest = Math.max(left.length, right.length);
  if (longest === 0) {
    return 1;
  }
  return 1 - distance(left, right) / longest;
}

/**
 * Resolves `target` to one of `columns`: exact (case-insensitive), then the
 * closest fuzzy candidate at or above `threshold`, then the first column
 * sharing the target's keyword category. `null` means it cannot be resolved.
 */
export function findBestColumnMatch(
  target: string,
  columns: readonly string[],
  threshold: number = DEFAULT_MATCH_THRESHOLD,
): string | null {
  const targetLower = target.toLowerCase();

  const exact = columns.find((col) => col.toLowerCase() === targetLower);
  if (exact !== undefined) {
    return exact;
  }

  let best: string | null = null;
  let bestScore = -1;
  for (const col of columns) {
    const score = similarityRatio(target, col);
    if (score >= threshold && score > bestScore) {
      best = col;
      bestScore = score;
    }
  }
  if (best !== null) {
    return best;
  }

  const category = classifyName(target);
  if (category === null) {
    return null;
  }
  const keywords = keywordsFor(category);
  return (
    columns.find((col) => {
      const lower = col.toLowerCase();
      return keywords.some((keyword) => lower.includes(keyword));
    }) ?? null
  );
}
