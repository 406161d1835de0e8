export * from './types.js';
export * from './registry.js';
export { registerBuiltins } from './builtins.js';
export * from './resolvable.js';
