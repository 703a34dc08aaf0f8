export * from './config/research.config';
export * from './tools';
export * from './services';
export * from './agents/tools/research-tools';
