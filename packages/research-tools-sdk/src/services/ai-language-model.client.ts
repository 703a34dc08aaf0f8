import { generateText, type LanguageModel } from 'ai';
import type {
  GenerationRequest,
  ILanguageModelClient,
} from '@deep-research/domain/ports';

/** Language-model port backed by the AI SDK's `generateText`. */
export class AiLanguageModelClient implements ILanguageModelClient {
  constructor(private readonly model: LanguageModel) {}

  async generate(request: GenerationRequest): Promise<string> {
    const result = await generateText({
      model: this.model,
      system: request.system,
      prompt: request.prompt,
      temperature: request.temperature,
      maxOutputTokens: request.maxOutputTokens,
    });
    return result.text.trim();
  }
}
