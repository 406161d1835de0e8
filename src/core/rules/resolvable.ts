/**
 * Eager check that every rule a model names is registered.
 *
 * The engine resolves names lazily, so this is optional: call it once
 * registration is complete to surface typos before the first record.
 */
import { describeModel } from '../model/descriptor.js';
import type { RecordDescriptor } from '../model/descriptor.js';
import type { ModelDefinition } from '../model/types.js';
import { RuleError, ErrorCodes } from '../../utils/errors.js';
import { ruleRegistry } from './registry.js';
import type { RuleRegistry } from './registry.js';

export interface UnresolvedRule {
  model: string;
  field: string;
  token: string;
  kind: 'validation' | 'transformation';
}

/**
 * List rule tokens of a model and its nested models that the registry
 * cannot resolve.
 */
export function findUnresolvedRules(
  model: ModelDefinition,
  registry: RuleRegistry = ruleRegistry
): UnresolvedRule[] {
  const missing: UnresolvedRule[] = [];
  const seen = new Set<RecordDescriptor>();

  const visit = (descriptor: RecordDescriptor): void => {
    if (seen.has(descriptor)) return;
    seen.add(descriptor);

    for (const field of descriptor.fields) {
      for (const rule of field.rules) {
        const known =
          rule.kind === 'validation'
            ? registry.hasValidation(rule.name)
            : registry.hasTransformation(rule.name);
        if (!known) {
          missing.push({ model: descriptor.model, field: field.source, token: rule.token, kind: rule.kind });
        }
      }
      const nested = field.nested;
      if (nested) visit(nested);
    }
  };

  visit(describeModel(model));
  return missing;
}

/**
 * Throw for the first unresolvable rule of a model.
 */
export function assertRulesResolvable(model: ModelDefinition, registry: RuleRegistry = ruleRegistry): void {
  const [first] = findUnresolvedRules(model, registry);
  if (first) {
    throw new RuleError(
      first.kind === 'validation' ? ErrorCodes.UNKNOWN_VALIDATION : ErrorCodes.UNKNOWN_TRANSFORMATION,
      `${first.model}.${first.field}: unknown ${first.kind} rule "${first.token}"`,
      { ...first }
    );
  }
}
