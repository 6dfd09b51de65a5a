export { default as DNSCodec } from './DNSCodec';
export { default as GTPCodec } from './GTPCodec';
export * from './types';
export * as utils from './utils';
export * as errors from './errors';
export * as fields from './fields';
export * as dns from './dns';
export * as gtp from './gtp';
