export type GenerationRequest = {
  system: string;
  prompt: string;
  temperature: number;
  maxOutputTokens: number;
};

/**
 * Text generation collaborator. Rejects when the model call fails.
 */
export interface ILanguageModelClient {
  generate(request: GenerationRequest): Promise<string>;
}
