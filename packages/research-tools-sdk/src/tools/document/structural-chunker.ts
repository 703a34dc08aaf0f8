import type { TextChunk } from '@deep-research/domain/entities';
import type { ITokenCounter } from '@deep-research/domain/ports';
import {
  splitParagraphs,
  splitSections,
  splitSentences,
} from './section-splitter';

export type ChunkTextOptions = {
  maxChunkTokens?: number;
  tokenCounter: ITokenCounter;
};

type Level = {
  split: (text: string) => string[];
  joiner: string;
};

// Sections, then paragraphs, then sentences.
const LEVELS: readonly Level[] = [
  { split: splitSections, joiner: '\n\n' },
  { split: splitParagraphs, joiner: '\n\n' },
  { split: splitSentences, joiner: ' ' },
];

// Keeps a running token count so each candidate is sized by itself, not by
// re-counting the whole chunk.
class ChunkAccumulator {
  private text = '';
  private tokens = 0;
  readonly chunks: TextChunk[] = [];

  constructor(
    private readonly maxTokens: number,
    private readonly counter: ITokenCounter,
  ) {}

  /** Appends `unit` when it fits the remaining budget. */
  tryAppend(unit: string, joiner: string): boolean {
    const piece = this.text ? `${joiner}${unit}` : unit;
    const cost = this.counter.count(piece);
    if (this.tokens + cost > this.maxTokens) {
      return false;
    }
    this.text += piece;
    this.tokens += cost;
    return true;
  }

  /** Starts a chunk with `unit`, whatever its size. Call after `seal`. */
  start(unit: string, tokens: number): void {
    this.text = unit;
    this.tokens = tokens;
  }

  seal(): void {
    const text = this.text.trim();
    if (text) {
      this.chunks.push({
        index: this.chunks.length,
        text,
        tokenCount: this.counter.count(text),
      });
    }
    this.text = '';
    this.tokens = 0;
  }
}

const place = (
  unit: string,
  depth: number,
  acc: ChunkAccumulator,
  maxTokens: number,
  counter: ITokenCounter,
): void => {
  const level = LEVELS[depth];
  const trimmed = unit.trim();
  if (level === undefined || !trimmed) {
    return;
  }
  if (acc.tryAppend(trimmed, level.joiner)) {
    return;
  }

  acc.seal();
  const tokens = counter.count(trimmed);
  const next = LEVELS[depth + 1];
  if (next !== undefined && tokens > maxTokens) {
    for (const child of next.split(trimmed)) {
      place(child, depth + 1, acc, maxTokens, counter);
    }
    return;
  }
  // Fits alone, or is a single sentence that cannot be split further.
  acc.start(trimmed, tokens);
};

/**
 * Splits `text` into token-bounded chunks along structural boundaries.
 * A pure function of its input: the same text always yields the same
 * chunks. Only a single oversized sentence may exceed `maxChunkTokens`.
 */
export function chunkText(
  text: string,
  { maxChunkTokens = 3000, tokenCounter }: ChunkTextOptions,
): TextChunk[] {
  const acc = new ChunkAccumulator(maxChunkTokens, tokenCounter);
  for (const section of splitSections(text)) {
    place(section, 0, acc, maxChunkTokens, tokenCounter);
  }
  acc.seal();
  return acc.chunks;
}
