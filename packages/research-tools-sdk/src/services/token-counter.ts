import { getEncoding, type Tiktoken, type TiktokenEncoding } from 'js-tiktoken';
import type { ITokenCounter } from '@deep-research/domain/ports';

const WORD_TOKEN_RATIO = 1.3;

const words = (text: string) => text.split(/\s+/).filter(Boolean);

/** `ceil(words × 1.3)`: the estimate used when no tokenizer is available. */
export class WordCountTokenCounter implements ITokenCounter {
  count(text: string): number {
    return Math.ceil(words(text).length * WORD_TOKEN_RATIO);
  }

  truncate(text: string, maxTokens: number): string {
    if (this.count(text) <= maxTokens) {
      return text;
    }
    const keep = Math.floor(maxTokens / WORD_TOKEN_RATIO);
    return words(text).slice(0, keep).join(' ');
  }
}

/**
 * Counts with a tiktoken encoding. Falls back to the word estimate when the
 * encoding cannot be loaded.
 */
export class TiktokenTokenCounter implements ITokenCounter {
  private readonly encoding: Tiktoken | null;
  private readonly fallback = new WordCountTokenCounter();

  constructor(encodingName: TiktokenEncoding = 'cl100k_base') {
    let encoding: Tiktoken | null = null;
    try {
      encoding = getEncoding(encodingName);
    } catch (error) {
      console.warn(
        `[TokenCounter] Encoding '${encodingName}' unavailable, using word estimate:`,
        error,
      );
    }
    this.encoding = encoding;
  }

  // Special-token markers such as <|endoftext|> are counted as plain text.
  private encode(encoding: Tiktoken, text: string): number[] {
    return encoding.encode(text, [], []);
  }

  count(text: string): number {
    return this.encoding
      ? this.encode(this.encoding, text).length
      : this.fallback.count(text);
  }

  truncate(text: string, maxTokens: number): string {
    if (!this.encoding) {
      return this.fallback.truncate(text, maxTokens);
    }
    const tokens = this.encode(this.encoding, text);
    return tokens.length <= maxTokens
      ? text
      : this.encoding.decode(tokens.slice(0, maxTokens));
  }
}
