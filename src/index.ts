export * from './api';
export * from './lib';
export type * from './types';
