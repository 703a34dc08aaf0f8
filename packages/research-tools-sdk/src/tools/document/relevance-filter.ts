import type { ITokenCounter } from '@deep-research/domain/ports';
import { REGULATORY_KEYWORDS } from '../utils/regulatory-keywords';
import { splitSections } from './section-splitter';

export type ExtractRelevantSectionsOptions = {
  maxTokens?: number;
  tokenCounter: ITokenCounter;
  domainKeywords?: readonly string[];
};

export const SECTION_SEPARATOR = '\n\n---\n\n';

const MIN_SECTION_LENGTH = 50;

type ScoredSection = {
  text: string;
  score: number;
};

/** Lower-cased query words longer than three characters, deduplicated. */
export const queryKeywords = (query: string): string[] => [
  ...new Set(
    (query.toLowerCase().match(/\b\w+\b/g) ?? []).filter(
      (word) => word.length > 3,
    ),
  ),
];

export function scoreSection(
  section: string,
  query: string,
  keywords: readonly string[],
  domainKeywords: readonly string[] = REGULATORY_KEYWORDS,
): number {
  const lower = section.toLowerCase();
  let score = keywords.filter((keyword) => lower.includes(keyword)).length;
  if (lower.includes(query.toLowerCase())) {
    score += 5;
  }
  score += domainKeywords.filter((keyword) => lower.includes(keyword)).length;
  return score;
}

/**
 * Keeps the sections that best match `query` within `maxTokens`. Without a
 * query the text is returned untouched; when nothing scores, the text is
 * truncated to the budget instead.
 */
export function extractRelevantSections(
  text: string,
  query: string | undefined,
  {
    maxTokens = 8000,
    tokenCounter,
    domainKeywords = REGULATORY_KEYWORDS,
  }: ExtractRelevantSectionsOptions,
): string {
  if (!query) {
    return text;
  }

  const keywords = queryKeywords(query);
  const scored: ScoredSection[] = [];
  for (const section of splitSections(text)) {
    const trimmed = section.trim();
    if (trimmed.length < MIN_SECTION_LENGTH) {
      continue;
    }
    const score = scoreSection(trimmed, query, keywords, domainKeywords);
    if (score > 0) {
      scored.push({ text: trimmed, score });
    }
  }

  // Array#sort is stable, so equal scores keep document order.
  scored.sort((a, b) => b.score - a.score);

  const selected: string[] = [];
  let totalTokens = 0;
  for (const section of scored) {
    const tokens = tokenCounter.count(section.text);
    if (totalTokens + tokens > maxTokens) {
      break;
    }
    selected.push(section.text);
    totalTokens += tokens;
  }

  return selected.length > 0
    ? selected.join(SECTION_SEPARATOR)
    : tokenCounter.truncate(text, maxTokens);
}
