/**
 * Deterministic token estimator. Identical input must always yield the same
 * count, otherwise chunking stops being restartable.
 */
export interface ITokenCounter {
  count(text: string): number;
  /** Longest prefix of `text` that fits in `maxTokens`. */
  truncate(text: string, maxTokens: number): string;
}
