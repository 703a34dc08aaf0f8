import { createAzure } from '@ai-sdk/azure';
import { createOpenAI } from '@ai-sdk/openai';
import type { LanguageModel } from 'ai';
import type { ResearchConfig } from '../config/research.config';
import { createVllmModel } from './models/vllm-model.provider';

export type ModelSettings = Pick<
  ResearchConfig,
  | 'model'
  | 'openaiApiKey'
  | 'azureApiKey'
  | 'azureResourceName'
  | 'vllmBaseUrl'
  | 'vllmApiKey'
>;

/**
 * Resolves `provider/model` to an AI SDK model. Returns `null` when the
 * provider's credentials are missing, in which case callers run without a
 * model.
 */
export function resolveModel(settings: ModelSettings): LanguageModel | null {
  const separator = settings.model.indexOf('/');
  if (separator <= 0) {
    throw new Error(
      `[ModelResolver] Invalid model '${settings.model}'. Expected '<provider>/<model>'.`,
    );
  }
  const provider = settings.model.slice(0, separator);
  const modelName = settings.model.slice(separator + 1);

  switch (provider) {
    case 'openai':
      if (!settings.openaiApiKey) {
        return null;
      }
      return createOpenAI({ apiKey: settings.openaiApiKey })(modelName);
    case 'azure':
      if (!settings.azureApiKey || !settings.azureResourceName) {
        return null;
      }
      return createAzure({
        apiKey: settings.azureApiKey,
        resourceName: settings.azureResourceName,
      })(modelName);
    case 'vllm':
      if (!settings.vllmBaseUrl) {
        return null;
      }
      return createVllmModel(modelName, {
        baseURL: settings.vllmBaseUrl,
        apiKey: settings.vllmApiKey,
      });
    default:
      throw new Error(
        `[ModelResolver] Unsupported provider '${provider}'. Use openai, azure or vllm.`,
      );
  }
}
