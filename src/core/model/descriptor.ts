/**
 * Record type descriptors.
 *
 * A descriptor is built once per model on first use, frozen and cached for
 * the life of the process. Builds are synchronous, so concurrent first uses
 * of a model share one descriptor.
 */
import { parseTag } from '../tags/parser.js';
import type { OmitScope, ParsedTag, RuleDirective } from '../tags/types.js';
import { ModelError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { FieldKind, FieldSpec, ModelDefinition, ModelRef, NameConvention } from './types.js';

const log = logger.child('descriptor');

export interface FieldDescriptor {
  /** Identifier of the field on the record */
  readonly source: string;
  /** Name under which the field is stored */
  readonly name: string;
  readonly kind: FieldKind;
  readonly tag: ParsedTag;
  readonly omitEmpty: readonly OmitScope[];
  readonly rules: readonly RuleDirective[];
  /** Descriptor of the element model for nested kinds, resolved on access */
  readonly nested: RecordDescriptor | undefined;
}

export interface RecordDescriptor {
  readonly model: string;
  /** Non-ignored fields in declaration order */
  readonly fields: readonly FieldDescriptor[];
  /** Source identifiers of fields tagged `-` */
  readonly ignored: readonly string[];
}

const NESTED_KINDS: ReadonlySet<FieldKind> = new Set<FieldKind>(['record', 'ref', 'array', 'map']);

const descriptors = new WeakMap<ModelDefinition, RecordDescriptor>();

/**
 * Get the descriptor for a model, building it on first use.
 */
export function describeModel(model: ModelDefinition): RecordDescriptor {
  const cached = descriptors.get(model);
  if (cached) {
    return cached;
  }
  const built = buildDescriptor(model);
  descriptors.set(model, built);
  log.debug(`Built descriptor for ${model.name}`, {
    fields: built.fields.map((f) => f.name),
    ignored: [...built.ignored],
  });
  return built;
}

/**
 * Resolve a model reference, calling it if it is a thunk.
 */
export function resolveModel(ref: ModelRef, context: string): ModelDefinition {
  const model: unknown = typeof ref === 'function' ? ref() : ref;
  if (!isModelDefinition(model)) {
    throw new ModelError(ErrorCodes.UNKNOWN_MODEL, `${context} does not reference a model`, { context });
  }
  return model;
}

/**
 * Store name used when a tag has no name override.
 */
export function defaultStoreName(source: string, convention: NameConvention): string {
  return convention === 'lowercase' ? source.toLowerCase() : source;
}

function buildDescriptor(model: ModelDefinition): RecordDescriptor {
  const fields: FieldDescriptor[] = [];
  const ignored: string[] = [];
  const seen = new Map<string, string>();

  for (const [source, spec] of Object.entries(model.fields)) {
    const tag = parseTag(spec.tag);
    if (tag.ignore) {
      ignored.push(source);
      continue;
    }

    const name = tag.name ?? defaultStoreName(source, model.nameConvention);
    if (name === '__proto__') {
      throw new ModelError(ErrorCodes.INVALID_TAG, `${model.name}.${source}: "__proto__" cannot be a store name`, {
        model: model.name,
        field: source,
      });
    }
    const clash = seen.get(name);
    if (clash !== undefined) {
      throw new ModelError(
        ErrorCodes.DUPLICATE_FIELD,
        `${model.name}: fields "${clash}" and "${source}" share the store name "${name}"`,
        { model: model.name, name, fields: [clash, source] }
      );
    }
    seen.set(name, source);

    fields.push(createFieldDescriptor(model, source, name, spec, tag));
  }

  return Object.freeze({
    model: model.name,
    fields: Object.freeze(fields),
    ignored: Object.freeze(ignored),
  });
}

function createFieldDescriptor(
  model: ModelDefinition,
  source: string,
  name: string,
  spec: FieldSpec,
  tag: ParsedTag
): FieldDescriptor {
  const base = {
    source,
    name,
    kind: spec.kind,
    tag,
    omitEmpty: tag.omitEmpty,
    rules: tag.rules,
  };

  if (!NESTED_KINDS.has(spec.kind)) {
    return Object.freeze({ ...base, nested: undefined });
  }

  const ref = spec.model;
  if (ref === undefined) {
    throw new ModelError(
      ErrorCodes.UNKNOWN_MODEL,
      `${model.name}.${source}: ${spec.kind} fields need a model`,
      { model: model.name, field: source }
    );
  }

  // Nested descriptors resolve lazily so models may reference themselves
  return Object.freeze({
    ...base,
    get nested(): RecordDescriptor {
      return describeModel(resolveModel(ref, `${model.name}.${source}`));
    },
  });
}

function isModelDefinition(value: unknown): value is ModelDefinition {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    'fields' in value &&
    typeof value.name === 'string' &&
    typeof value.fields === 'object' &&
    value.fields !== null
  );
}
