export * from './types';
export * from './builder';
