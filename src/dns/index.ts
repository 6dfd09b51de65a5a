export * from './utils';
export * from './types';
export * as errors from './errors';
