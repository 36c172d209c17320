export * from './types';
export * from './errors';
export * from './registry';
export * from './grammar';
export * from './lexer';
export * from './compound';
export * from './operators';
export * from './format';
export { DEFAULT_MAX_NESTING_DEPTH, QueryParser } from './parser';
