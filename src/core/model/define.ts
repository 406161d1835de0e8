/**
 * Model declaration helpers.
 *
 * @example
 * const Address = defineModel('Address', {
 *   City: field.string('city,required'),
 * });
 * const User = defineModel('User', {
 *   Email: field.string('email,required,email,transform=to_lower'),
 *   Address: field.ref(Address, 'address'),
 *   Password: field.string('-'),
 * });
 */
import type {
  FieldSpec,
  FieldSpecs,
  ModelDefinition,
  ModelRef,
  NameConvention,
  NestedFieldSpec,
} from './types.js';

export interface ModelOptions {
  /** Default: 'lowercase' */
  nameConvention?: NameConvention;
}

export function defineModel<F extends FieldSpecs>(
  name: string,
  fields: F,
  options: ModelOptions = {}
): ModelDefinition<F> {
  const copy: F = { ...fields };
  Object.freeze(copy);
  const model: ModelDefinition<F> = {
    name,
    fields: copy,
    nameConvention: options.nameConvention ?? 'lowercase',
  };
  return Object.freeze(model);
}

export const field = {
  string: (tag = ''): FieldSpec<'string'> => ({ kind: 'string', tag }),
  number: (tag = ''): FieldSpec<'number'> => ({ kind: 'number', tag }),
  boolean: (tag = ''): FieldSpec<'boolean'> => ({ kind: 'boolean', tag }),
  date: (tag = ''): FieldSpec<'date'> => ({ kind: 'date', tag }),
  any: (tag = ''): FieldSpec<'any'> => ({ kind: 'any', tag }),
  list: (tag = ''): FieldSpec<'list'> => ({ kind: 'list', tag }),

  record: <F extends FieldSpecs>(model: ModelRef<F>, tag = ''): NestedFieldSpec<'record', F> => ({
    kind: 'record',
    tag,
    model,
  }),
  ref: <F extends FieldSpecs>(model: ModelRef<F>, tag = ''): NestedFieldSpec<'ref', F> => ({
    kind: 'ref',
    tag,
    model,
  }),
  array: <F extends FieldSpecs>(model: ModelRef<F>, tag = ''): NestedFieldSpec<'array', F> => ({
    kind: 'array',
    tag,
    model,
  }),
  map: <F extends FieldSpecs>(model: ModelRef<F>, tag = ''): NestedFieldSpec<'map', F> => ({
    kind: 'map',
    tag,
    model,
  }),
};
