export * from './entity-extractor';
export * from './plan-rules';
export * from './create-query-plan';
