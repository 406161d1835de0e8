/**
 * Model definition types.
 *
 * A model maps source identifiers to field specs. Each spec carries a kind,
 * a tag string and, for nested kinds, the model of its elements.
 */

/** Kinds visited without recursion. `list` is a sequence of leaves. */
export type LeafKind = 'string' | 'number' | 'boolean' | 'date' | 'any' | 'list';

/**
 * Kinds holding records: an embedded `record`, an optional `ref`,
 * an `array` of records and a `map` of records keyed by string.
 */
export type NestedKind = 'record' | 'ref' | 'array' | 'map';

export type FieldKind = LeafKind | NestedKind;

/** How a store name is derived when a tag has no name override. */
export type NameConvention = 'lowercase' | 'preserve';

export interface FieldSpec<K extends FieldKind = FieldKind> {
  readonly kind: K;
  readonly tag: string;
  readonly model?: ModelRef;
}

export interface NestedFieldSpec<K extends NestedKind, F extends FieldSpecs>
  extends FieldSpec<K> {
  readonly model: ModelRef<F>;
}

export type FieldSpecs = { readonly [source: string]: FieldSpec };

export interface ModelDefinition<F extends FieldSpecs = FieldSpecs> {
  readonly name: string;
  readonly fields: F;
  readonly nameConvention: NameConvention;
}

/**
 * A model, or a thunk returning one for self and forward references.
 */
export type ModelRef<F extends FieldSpecs = FieldSpecs> =
  | ModelDefinition<F>
  | (() => ModelDefinition<F>);

type NestedRecord<S> = S extends { readonly model: ModelRef<infer F extends FieldSpecs> }
  ? RecordOf<F>
  : never;

/**
 * TypeScript type of a field's value.
 */
export type FieldValue<S extends FieldSpec> = S['kind'] extends 'string'
  ? string
  : S['kind'] extends 'number'
    ? number
    : S['kind'] extends 'boolean'
      ? boolean
      : S['kind'] extends 'date'
        ? Date
        : S['kind'] extends 'list'
          ? readonly unknown[]
          : S['kind'] extends 'record' | 'ref'
            ? NestedRecord<S>
            : S['kind'] extends 'array'
              ? ReadonlyArray<NestedRecord<S> | null>
              : S['kind'] extends 'map'
                ? Readonly<Record<string, NestedRecord<S>>> | ReadonlyMap<string, NestedRecord<S>>
                : unknown;

/**
 * Shape of a record for a model's fields. Every field is optional;
 * missing values are zero values.
 */
export type RecordOf<F extends FieldSpecs> = {
  [K in keyof F]?: FieldValue<F[K]> | null;
};

/**
 * Store-ready document produced by the engine.
 */
export type Document = { [name: string]: unknown };
