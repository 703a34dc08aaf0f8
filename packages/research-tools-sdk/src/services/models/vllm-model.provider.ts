import { createOpenAI } from '@ai-sdk/openai';
import type { LanguageModel } from 'ai';

export type VllmModelProviderOptions = {
  baseURL?: string;
  apiKey?: string;
};

/** vLLM exposes the OpenAI chat-completions API. */
export function createVllmModel(
  modelName: string,
  {
    baseURL = 'http://localhost:8000/v1',
    apiKey = 'EMPTY',
  }: VllmModelProviderOptions = {},
): LanguageModel {
  const vllmProvider = createOpenAI({ baseURL, apiKey });
  return vllmProvider.chat(modelName);
}
