import type { TabularDataset } from '@deep-research/domain/entities';
import type {
  GenerationRequest,
  IBlobStorage,
  ILanguageModelClient,
  ITokenCounter,
} from '@deep-research/domain/ports';

export const PRODUCTS_CSV = [
  'Company,BrandName,GenericName,Country,ApprovalDate',
  'Alpha Pharma,TIAROTEC,tiotropium,India,2021-03-01',
  'Beta Labs,Spiriva,tiarotec bromide,Brazil,2020-07-15',
  'Gamma Health,Ventolin,salbutamol,India,2019-01-20',
].join('\n');

export const csvDataset = (
  content: string,
  name = 'products.csv',
): TabularDataset => ({
  name,
  content: new TextEncoder().encode(content),
});

const words = (text: string) => text.split(/\s+/).filter(Boolean);

/** One token per whitespace-separated word. */
export const wordTokenCounter: ITokenCounter = {
  count: (text) => words(text).length,
  truncate: (text, maxTokens) => words(text).slice(0, maxTokens).join(' '),
};

/** `paragraphs` paragraphs of `wordsPerParagraph` lowercase filler words. */
export const fillerText = (paragraphs: number, wordsPerParagraph = 100) =>
  Array.from({ length: paragraphs }, (_, p) =>
    Array.from({ length: wordsPerParagraph }, (_, w) => `term${p}x${w}`).join(
      ' ',
    ),
  ).join('\n\n');

export class FakeLanguageModelClient implements ILanguageModelClient {
  readonly requests: GenerationRequest[] = [];

  constructor(
    private readonly respond: (
      request: GenerationRequest,
    ) => Promise<string> = async () => 'Condensed section.',
  ) {}

  async generate(request: GenerationRequest): Promise<string> {
    this.requests.push(request);
    return this.respond(request);
  }
}

export class InMemoryBlobStorage implements IBlobStorage {
  private readonly blobs = new Map<string, Uint8Array>();

  put(bucket: string, path: string, content: string | Uint8Array) {
    this.blobs.set(
      `${bucket}/${path}`,
      typeof content === 'string' ? new TextEncoder().encode(content) : content,
    );
    return this;
  }

  async fetch(bucket: string, path: string): Promise<Uint8Array | null> {
    return this.blobs.get(`${bucket}/${path}`) ?? null;
  }
}
