import { afterEach, describe, expect, it, vi } from 'vitest';
import { loadResearchConfig } from '../../src/config/research.config';
import { createResearchServices } from '../../src/services/create-research-services';
import { InMemoryBlobStorage } from '../helpers/fixtures';

describe('createResearchServices', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should wire both entry points against the configured bucket', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const storage = new InMemoryBlobStorage().put(
      'trial-docs',
      'notes.txt',
      'Storage below 25 degrees.',
    );

    const services = createResearchServices(
      storage,
      loadResearchConfig({ RESEARCH_BUCKET: 'trial-docs' }),
    );

    expect(warn).toHaveBeenCalledWith(
      "[ResearchServices] No credentials for 'openai/gpt-3.5-turbo', summaries fall back to truncation",
    );
    expect(await services.document.execute({ documentId: 'notes.txt' })).toBe(
      'Storage below 25 degrees.',
    );
    expect(
      await services.tabular.execute({ fileId: 'x.csv', objective: 'How many?' }),
    ).toBe(
      "Error: Could not download file 'x.csv' from bucket 'trial-docs'. File not found or empty.",
    );
  });
});
