export * from './token-counter';
export * from './model-resolver';
export * from './models/vllm-model.provider';
export * from './ai-language-model.client';
export * from './extractors';
export * from './query-tabular-file.service';
export * from './read-document.service';
export * from './create-research-services';
