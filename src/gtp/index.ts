export * from './utils';
export * from './fteid';
export * from './values';
export * from './names';
export * from './types';
export * as errors from './errors';
