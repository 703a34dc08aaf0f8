export * from './blob-storage.port';
export * from './language-model.port';
export * from './token-counter.port';
export * from './document-text-extractor.port';
