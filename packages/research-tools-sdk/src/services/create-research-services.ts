import type { IBlobStorage } from '@deep-research/domain/ports';
import type { ResearchConfig } from '../config/research.config';
import { AiLanguageModelClient } from './ai-language-model.client';
import { resolveModel } from './model-resolver';
import { QueryTabularFileService } from './query-tabular-file.service';
import { ReadDocumentService } from './read-document.service';
import { TiktokenTokenCounter } from './token-counter';

export type ResearchServices = {
  tabular: QueryTabularFileService;
  document: ReadDocumentService;
};

/** Wires both entry points from configuration. */
export function createResearchServices(
  blobStorage: IBlobStorage,
  config: ResearchConfig,
): ResearchServices {
  const model = resolveModel(config);
  if (!model) {
    console.warn(
      `[ResearchServices] No credentials for '${config.model}', summaries fall back to truncation`,
    );
  }

  return {
    tabular: new QueryTabularFileService(blobStorage, { bucket: config.bucket }),
    document: new ReadDocumentService(blobStorage, {
      bucket: config.bucket,
      tokenCounter: new TiktokenTokenCounter(config.tokenizerEncoding),
      client: model ? new AiLanguageModelClient(model) : null,
      reduction: {
        tokenLimit: config.documentTokenLimit,
        maxChunkTokens: config.chunkMaxTokens,
        maxOutputTokens: config.summaryMaxOutputTokens,
        temperature: config.summaryTemperature,
        summaryConcurrency: config.summaryConcurrency,
      },
    }),
  };
}
