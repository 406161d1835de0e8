/**
 * doctag - tag-driven validation and transformation of document records.
 * Main library exports barrel file.
 */

// Tags
export * from './core/tags/index.js';

// Models and descriptors
export * from './core/model/index.js';

// Rules
export * from './core/rules/index.js';

// Execution context
export * from './core/context/index.js';

// Walker
export * from './core/walker/index.js';

// Errors
export * from './core/errors/index.js';

// Engine
export * from './core/engine/index.js';

// Operations
export * from './core/operations/index.js';

// Configuration
export * from './core/config/index.js';

// Model files
export * from './core/model-file/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
