export * from './dto/index';
export * from './usecase';
export * from './query-tabular-file.usecase';
export * from './read-document.usecase';
