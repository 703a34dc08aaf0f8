export * from './domain.exception';
export * from '../common/code';
