export * from './path.js';
export * from './walker.js';
