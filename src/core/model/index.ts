export * from './types.js';
export * from './define.js';
export * from './access.js';
export * from './descriptor.js';
export * from './zero.js';
export * from './revive.js';
