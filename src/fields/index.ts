export { default as BitFlags } from './BitFlags';
export * from './utils';
export * from './types';
