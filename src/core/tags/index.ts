export * from './types.js';
export * from './parser.js';
