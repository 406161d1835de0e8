/**
 * Tag directive type definitions.
 */

/**
 * Operation a record is being prepared for.
 */
export type Method = 'create' | 'update' | 'validate';

/**
 * Scope of an omission directive: `omitempty` is `always`,
 * `omitempty_create` is `create`, and so on.
 */
export type OmitScope = 'always' | Method;

/** Store name override, always the first token of a tag. */
export interface NameDirective {
  kind: 'name';
  name: string;
}

/** `-` in the first slot: the field is never visited. */
export interface IgnoreDirective {
  kind: 'ignore';
}

export interface OmitEmptyDirective {
  kind: 'omitempty';
  scope: OmitScope;
}

/** A named validation, e.g. `required` or `min=6`. */
export interface ValidationDirective {
  kind: 'validation';
  name: string;
  param?: string;
  /** The token exactly as written in the tag */
  token: string;
}

/** A named transformation, e.g. `transform=to_lower`. */
export interface TransformationDirective {
  kind: 'transformation';
  name: string;
  token: string;
}

export type RuleDirective = ValidationDirective | TransformationDirective;

export type TagDirective =
  | NameDirective
  | IgnoreDirective
  | OmitEmptyDirective
  | RuleDirective;

/**
 * Result of parsing one field tag.
 */
export interface ParsedTag {
  /** Every directive, in the order written */
  readonly directives: readonly TagDirective[];
  /** Store name override, if any */
  readonly name?: string;
  readonly ignore: boolean;
  /** Omission scopes; position in the tag is irrelevant */
  readonly omitEmpty: readonly OmitScope[];
  /** Validation and transformation directives in execution order */
  readonly rules: readonly RuleDirective[];
}
