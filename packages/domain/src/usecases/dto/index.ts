export * from './query-tabular-file-usecase-dto';
export * from './read-document-usecase-dto';
