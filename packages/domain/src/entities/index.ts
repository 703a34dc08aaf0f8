export * from './column-category.type';
export * from './schema-info.type';
export * from './query-plan.type';
export * from './execution-report.type';
export * from './text-chunk.type';
export * from './tabular-dataset.type';
