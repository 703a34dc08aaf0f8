import type {
  ILanguageModelClient,
  ITokenCounter,
} from '@deep-research/domain/ports';
import { processWithConcurrency } from '../utils/process-with-concurrency';
import { extractRelevantSections } from './relevance-filter';
import { chunkText } from './structural-chunker';
import { summarizeChunk } from './summarize-chunk';

export type ReduceDocumentOptions = {
  tokenLimit?: number;
  maxChunkTokens?: number;
  maxOutputTokens?: number;
  temperature?: number;
  summaryConcurrency?: number;
};

export type ReduceDocumentInput = {
  text: string;
  query?: string;
  documentName: string;
  tokenCounter: ITokenCounter;
  client?: ILanguageModelClient | null;
  options?: ReduceDocumentOptions;
};

const SUMMARY_RULE = '='.repeat(50);

/**
 * Brings a document under the token limit in escalating steps: return it
 * as-is, keep only the sections relevant to the query, or chunk and
 * summarize every chunk. Always resolves to text.
 */
export async function reduceDocument({
  text,
  query,
  documentName,
  tokenCounter,
  client,
  options = {},
}: ReduceDocumentInput): Promise<string> {
  const {
    tokenLimit = 8000,
    maxChunkTokens = 3000,
    maxOutputTokens = 800,
    temperature = 0.1,
    summaryConcurrency = 1,
  } = options;

  if (!text.trim()) {
    return `Warning: No text could be extracted from document '${documentName}'. It might be an image-based PDF or empty.`;
  }

  const totalTokens = tokenCounter.count(text);
  console.log(
    `[DocumentReduction] Extracted ${totalTokens} tokens from '${documentName}'`,
  );
  if (totalTokens <= tokenLimit) {
    return text;
  }

  let working = text;
  if (query) {
    const filtered = extractRelevantSections(text, query, {
      maxTokens: tokenLimit,
      tokenCounter,
    });
    const filteredTokens = tokenCounter.count(filtered);
    console.log(
      `[DocumentReduction] Filtered to ${filteredTokens} tokens for: ${query}`,
    );
    if (filteredTokens <= tokenLimit) {
      return `[FILTERED CONTENT - ${filteredTokens} tokens from ${totalTokens} total]\n\n${filtered}`;
    }
    working = filtered;
  }

  const startTime = performance.now();
  const chunks = chunkText(working, { maxChunkTokens, tokenCounter });
  console.log(`[DocumentReduction] Created ${chunks.length} chunks`);

  const summaries = await processWithConcurrency(
    chunks,
    async (chunk) => {
      console.log(
        `[DocumentReduction] Summarizing chunk ${chunk.index + 1}/${chunks.length}`,
      );
      const summary = await summarizeChunk(chunk.text, {
        query,
        client,
        maxOutputTokens,
        temperature,
      });
      return `[SECTION ${chunk.index + 1}]\n${summary}`;
    },
    summaryConcurrency,
  );

  const body = summaries.join(`\n\n${SUMMARY_RULE}\n\n`);
  const finalTokens = tokenCounter.count(body);
  console.log(
    `[DocumentReduction] [PERF] Reduced ${totalTokens} to ${finalTokens} tokens in ${(performance.now() - startTime).toFixed(2)}ms`,
  );

  return `[PROCESSED LARGE DOCUMENT - Original: ${totalTokens} tokens, Processed: ${finalTokens} tokens from ${chunks.length} sections of '${documentName}']\n\n${body}`;
}
