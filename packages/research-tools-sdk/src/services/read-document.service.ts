import { nanoid } from 'nanoid';
import type {
  IBlobStorage,
  IDocumentTextExtractor,
  ILanguageModelClient,
  ITokenCounter,
} from '@deep-research/domain/ports';
import {
  type ReadDocumentInput,
  ReadDocumentInputSchema,
  type ReadDocumentUseCase,
} from '@deep-research/domain/usecases';
import {
  reduceDocument,
  type ReduceDocumentOptions,
} from '../tools/document/reduce-document';
import { SECTION_SEPARATOR } from '../tools/document/relevance-filter';
import { extractorFor } from './extractors';

export type ReadDocumentServiceOptions = {
  bucket: string;
  tokenCounter: ITokenCounter;
  client?: ILanguageModelClient | null;
  reduction?: ReduceDocumentOptions;
  /** Overrides the extension-based extractor choice. */
  extractor?: IDocumentTextExtractor;
};

const errorMessage = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

/**
 * Entry point for long documents: fetch, extract page text, then reduce it
 * below the token limit. Always resolves to text.
 */
export class ReadDocumentService implements ReadDocumentUseCase {
  constructor(
    private readonly blobStorage: IBlobStorage,
    private readonly options: ReadDocumentServiceOptions,
  ) {}

  public async execute(input: ReadDocumentInput): Promise<string> {
    const parsed = ReadDocumentInputSchema.safeParse(input);
    if (!parsed.success) {
      return `Error: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`;
    }
    const { documentId, query } = parsed.data;
    const { bucket, tokenCounter, client, reduction } = this.options;
    const requestId = nanoid(8);
    console.log(
      `[ReadDocument] [${requestId}] document '${documentId}' in bucket '${bucket}'`,
    );

    let content: Uint8Array | null;
    try {
      content = await this.blobStorage.fetch(bucket, documentId);
    } catch (error) {
      console.error(`[ReadDocument] [${requestId}] Download failed:`, error);
      return `Error: Could not download document '${documentId}' from bucket '${bucket}': ${errorMessage(error)}`;
    }
    if (!content || content.byteLength === 0) {
      return `Error: Could not download document '${documentId}' from bucket '${bucket}'. File not found or empty.`;
    }

    let pages: string[];
    try {
      const extractor = this.options.extractor ?? extractorFor(documentId);
      pages = await extractor.extractPages(content);
    } catch (error) {
      return `Error: Could not process document '${documentId}': ${errorMessage(error)}`;
    }

    const text = pages.filter((page) => page.trim()).join(SECTION_SEPARATOR);
    return reduceDocument({
      text,
      query,
      documentName: documentId,
      tokenCounter,
      client,
      options: reduction,
    });
  }
}
