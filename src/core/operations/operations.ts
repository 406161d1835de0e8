/**
 * Entry points for the storage collaborators: records are prepared for
 * creation, update or plain validation.
 */
import type { ExecutionOptions } from '../context/context.js';
import { defaultEngine } from '../engine/engine.js';
import type { RuleEngine } from '../engine/engine.js';
import type { EngineOutcome, NormalizedRecord } from '../engine/types.js';
import type { Document, FieldSpecs, ModelDefinition, RecordOf } from '../model/types.js';

export interface OperationOptions extends Omit<ExecutionOptions, 'method'> {
  /** Engine to run (default: engine bound to the global registry) */
  engine?: RuleEngine;
}

export interface PreparedUpdate extends NormalizedRecord {
  /** Update operator built from the flattened fields */
  $set: Document;
}

/**
 * Validate and transform a record for insertion.
 * Rejects with RecordValidationError when a field fails.
 */
export function prepareCreate<F extends FieldSpecs>(
  model: ModelDefinition<F>,
  record: RecordOf<F>,
  options: OperationOptions = {}
): Promise<NormalizedRecord> {
  const { engine = defaultEngine, ...execution } = options;
  return engine.validate(model, record, { ...execution, method: 'create' });
}

/**
 * Validate and transform a record for an update. Embedded records are set
 * field by field; collections are replaced whole.
 */
export async function prepareUpdate<F extends FieldSpecs>(
  model: ModelDefinition<F>,
  record: RecordOf<F>,
  options: OperationOptions = {}
): Promise<PreparedUpdate> {
  const { engine = defaultEngine, ...execution } = options;
  const normalized = await engine.validate(model, record, { ...execution, method: 'update' });
  return { ...normalized, $set: Object.fromEntries(normalized.fields) };
}

/**
 * Run validation without persisting intent. Field errors are returned
 * in the outcome instead of rejecting.
 */
export function validateRecord<F extends FieldSpecs>(
  model: ModelDefinition<F>,
  record: RecordOf<F>,
  options: OperationOptions = {}
): Promise<EngineOutcome> {
  const { engine = defaultEngine, ...execution } = options;
  return engine.run(model, record, { ...execution, method: 'validate' });
}
