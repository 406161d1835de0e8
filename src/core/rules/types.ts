/**
 * Rule function type definitions.
 */
import type { Method } from '../tags/types.js';
import type { FieldDescriptor } from '../model/descriptor.js';

/**
 * Arguments passed to every rule invocation.
 */
export interface RuleContext {
  /** Abort signal of the engine call; rules doing I/O should honor it */
  readonly signal: AbortSignal;
  readonly method: Method;
  /** Dot path used for error attribution (includes collection positions) */
  readonly path: string;
  /** Dot path of store names, without collection positions */
  readonly storePath: string;
  readonly field: FieldDescriptor;
  /** Current in-flight value, after any earlier transformations */
  readonly value: unknown;
}

export interface ValidationContext extends RuleContext {
  /** Text after `=` in the tag token, if any */
  readonly param?: string;
  /** The token as written, e.g. `min=6` */
  readonly token: string;
}

/**
 * Returns whether the value passes. Throwing aborts the whole engine call.
 */
export type ValidationFn = (ctx: ValidationContext) => boolean | Promise<boolean>;

/**
 * Returns the replacement value (or a promise of it).
 * Throwing aborts the whole engine call.
 */
export type TransformationFn = (ctx: RuleContext) => unknown;

export type MessageFn = (ctx: ValidationContext) => string;

export interface ValidationRuleOptions {
  /** Builds the field error message; defaults to "<path> failed <token> validation" */
  message?: MessageFn;
}

export interface ValidationRule {
  readonly name: string;
  readonly validate: ValidationFn;
  readonly message: MessageFn;
}

export interface TransformationRule {
  readonly name: string;
  readonly transform: TransformationFn;
}
