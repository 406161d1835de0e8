/**
 * Engine type definitions.
 */
import type { RuleRegistry } from '../rules/registry.js';
import type { RecordValidationError } from '../errors/aggregator.js';
import type { Document } from '../model/types.js';

export interface EngineOptions {
  /** Rule registry to resolve names against (default: the global registry) */
  registry?: RuleRegistry;
}

/**
 * Normalized, store-ready representation of a record.
 */
export interface NormalizedRecord {
  /** Nested document keyed by store names */
  document: Document;
  /** Flattened values keyed by store path; collections stay whole */
  fields: Map<string, unknown>;
}

/**
 * Result of one engine call.
 */
export interface EngineOutcome extends NormalizedRecord {
  passed: boolean;
  /** Aggregated field errors, null when every field passed */
  errors: RecordValidationError | null;
}
