import type { IDocumentTextExtractor } from '@deep-research/domain/ports';

/** UTF-8 text and markdown files: the whole file is one page. */
export class PlainTextExtractor implements IDocumentTextExtractor {
  private readonly decoder = new TextDecoder('utf-8');

  async extractPages(content: Uint8Array): Promise<string[]> {
    return [this.decoder.decode(content)];
  }
}
