import { MockLanguageModelV2 } from 'ai/test';
import { describe, expect, it } from 'vitest';
import { AiLanguageModelClient } from '../../src/services/ai-language-model.client';

describe('AiLanguageModelClient', () => {
  it('should pass sampling settings through and trim the completion', async () => {
    const model = new MockLanguageModelV2({
      doGenerate: async () => ({
        content: [{ type: 'text', text: '  Key requirement: GMP.  ' }],
        finishReason: 'stop',
        usage: { inputTokens: 12, outputTokens: 5, totalTokens: 17 },
        warnings: [],
      }),
    });
    const client = new AiLanguageModelClient(model);

    const text = await client.generate({
      system: 'Summarize.',
      prompt: 'Section text',
      temperature: 0.1,
      maxOutputTokens: 800,
    });

    expect(text).toBe('Key requirement: GMP.');
    expect(model.doGenerateCalls).toHaveLength(1);
    expect(model.doGenerateCalls[0]).toMatchObject({
      temperature: 0.1,
      maxOutputTokens: 800,
    });
  });

  it('should propagate provider failures', async () => {
    const model = new MockLanguageModelV2({
      doGenerate: async () => {
        throw new Error('rate limited');
      },
    });
    const client = new AiLanguageModelClient(model);

    await expect(
      client.generate({
        system: 'Summarize.',
        prompt: 'Section text',
        temperature: 0.1,
        maxOutputTokens: 800,
      }),
    ).rejects.toThrow('rate limited');
  });
});
