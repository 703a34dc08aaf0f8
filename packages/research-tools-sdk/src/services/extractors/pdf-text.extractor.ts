import { extractText, getDocumentProxy } from 'unpdf';
import type { IDocumentTextExtractor } from '@deep-research/domain/ports';
import { Code, DomainException } from '@deep-research/domain/exceptions';

export class PdfTextExtractor implements IDocumentTextExtractor {
  async extractPages(content: Uint8Array): Promise<string[]> {
    let pages: string[];
    try {
      // pdf.js may detach the buffer it is given
      const pdf = await getDocumentProxy(new Uint8Array(content));
      if (pdf.numPages === 0) {
        throw DomainException.new({
          code: Code.DOCUMENT_UNREADABLE_ERROR,
          overrideMessage: 'PDF contains no pages.',
        });
      }
      const { totalPages, text } = await extractText(pdf, {
        mergePages: false,
      });
      console.log(`[PdfTextExtractor] Processed ${totalPages} pages`);
      pages = text;
    } catch (error) {
      if (error instanceof DomainException) {
        throw error;
      }
      throw DomainException.new({
        code: Code.DOCUMENT_UNREADABLE_ERROR,
        overrideMessage: `Could not parse PDF: ${
          error instanceof Error ? error.message : String(error)
        }`,
      });
    }
    return pages.map((page) => page.trim());
  }
}
