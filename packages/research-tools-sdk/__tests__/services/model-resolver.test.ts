import { describe, expect, it } from 'vitest';
import { resolveModel } from '../../src/services/model-resolver';

describe('resolveModel', () => {
  it('should return null when the provider has no credentials', () => {
    expect(resolveModel({ model: 'openai/gpt-4o-mini' })).toBeNull();
    expect(
      resolveModel({ model: 'azure/gpt-4o', azureApiKey: 'test-secret' }),
    ).toBeNull();
    expect(resolveModel({ model: 'vllm/qwen2.5-7b' })).toBeNull();
  });

  it('should build an OpenAI model from its key', () => {
    const model = resolveModel({
      model: 'openai/gpt-4o-mini',
      openaiApiKey: 'test-secret',
    });
    expect(model).toMatchObject({ modelId: 'gpt-4o-mini' });
  });

  it('should build an Azure deployment from key and resource name', () => {
    const model = resolveModel({
      model: 'azure/research-deployment',
      azureApiKey: 'test-secret',
      azureResourceName: 'test-resource',
    });
    expect(model).toMatchObject({ modelId: 'research-deployment' });
  });

  it('should talk to vLLM through the chat-completions API', () => {
    const model = resolveModel({
      model: 'vllm/qwen2.5-7b',
      vllmBaseUrl: 'http://localhost:8000/v1',
    });
    expect(model).toMatchObject({
      modelId: 'qwen2.5-7b',
      provider: 'openai.chat',
    });
  });

  it('should reject unknown providers and malformed names', () => {
    expect(() => resolveModel({ model: 'mistral/large' })).toThrow(
      "[ModelResolver] Unsupported provider 'mistral'. Use openai, azure or vllm.",
    );
    expect(() => resolveModel({ model: 'gpt-4o' })).toThrow(
      "[ModelResolver] Invalid model 'gpt-4o'. Expected '<provider>/<model>'.",
    );
  });
});
