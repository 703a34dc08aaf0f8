export * from './column-matcher';
export * from './tabular-session';
export * from './analyze-schema';
export * from './query-planner';
export * from './validate-step-result';
export * from './execute-query-plan';
export * from './run-direct-query';
export * from './document';
export * from './utils/column-categories';
export * from './utils/regulatory-keywords';
export * from './utils/sql-guard';
