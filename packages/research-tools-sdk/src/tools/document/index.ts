export * from './section-splitter';
export * from './structural-chunker';
export * from './relevance-filter';
export * from './summarize-chunk';
export * from './reduce-document';
