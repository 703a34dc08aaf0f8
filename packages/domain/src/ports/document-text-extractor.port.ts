export interface IDocumentTextExtractor {
  /** Text per page, in page order. Pages without text are empty strings. */
  extractPages(content: Uint8Array): Promise<string[]>;
}
