import type { ILanguageModelClient } from '@deep-research/domain/ports';

export type SummarizeChunkOptions = {
  query?: string;
  client?: ILanguageModelClient | null;
  maxOutputTokens?: number;
  temperature?: number;
};

const FALLBACK_LENGTH = 2000;

const SYSTEM_PROMPT =
  'You are an expert at summarizing regulatory and legal documents. ' +
  'Create a concise but comprehensive summary that preserves key information, requirements, ' +
  'timelines, processes, and specific details. Maintain the structure and important terminology.';

export const buildSummarySystemPrompt = (query?: string): string =>
  query
    ? `${SYSTEM_PROMPT}\n\nPay special attention to information related to: ${query}`
    : SYSTEM_PROMPT;

export const truncateForFallback = (text: string): string =>
  text.length > FALLBACK_LENGTH ? `${text.slice(0, FALLBACK_LENGTH)}...` : text;

/**
 * Summarizes one chunk through the model client. Never rejects: a missing
 * client, a failed call or an empty completion all fall back to truncation.
 */
export async function summarizeChunk(
  text: string,
  {
    query,
    client,
    maxOutputTokens = 800,
    temperature = 0.1,
  }: SummarizeChunkOptions = {},
): Promise<string> {
  if (!client) {
    console.warn(
      '[ChunkSummarizer] No language model configured, truncating chunk',
    );
    return truncateForFallback(text);
  }

  try {
    const summary = await client.generate({
      system: buildSummarySystemPrompt(query),
      prompt: `Summarize this regulatory document section:\n\n${text}`,
      temperature,
      maxOutputTokens,
    });
    if (summary.trim()) {
      return summary.trim();
    }
    console.warn('[ChunkSummarizer] Empty summary returned, truncating chunk');
  } catch (error) {
    console.warn('[ChunkSummarizer] Failed to summarize chunk:', error);
  }
  return truncateForFallback(text);
}
