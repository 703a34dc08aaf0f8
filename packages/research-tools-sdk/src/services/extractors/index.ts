import { extname } from 'node:path';
import type { IDocumentTextExtractor } from '@deep-research/domain/ports';
import { PdfTextExtractor } from './pdf-text.extractor';
import { PlainTextExtractor } from './plain-text.extractor';

export { PdfTextExtractor, PlainTextExtractor };

const PLAIN_TEXT_EXTENSIONS = new Set(['.txt', '.md', '.markdown']);

/** Picks an extractor by file extension; anything else is read as PDF. */
export function extractorFor(documentName: string): IDocumentTextExtractor {
  return PLAIN_TEXT_EXTENSIONS.has(extname(documentName).toLowerCase())
    ? new PlainTextExtractor()
    : new PdfTextExtractor();
}
