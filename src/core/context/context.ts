/**
 * Execution context for one engine call.
 */
import type { Method, OmitScope } from '../tags/types.js';

/**
 * Caller-supplied options for an engine call.
 */
export interface ExecutionOptions {
  /** Operation being prepared (default: 'validate') */
  method?: Method;
  /** Store paths that keep their value even when zero and tagged omitempty */
  allowEmptyFields?: readonly string[];
  /** Store paths merged on update; exempt from omission like allowEmptyFields */
  mergeFields?: readonly string[];
  /** Honor names, ignore and omission only; run no rules */
  skipValidation?: boolean;
  /** Passed to every rule; the engine stops between fields once aborted */
  signal?: AbortSignal;
}

export interface ExecutionContext {
  readonly method: Method;
  readonly exemptions: ReadonlySet<string>;
  readonly skipValidation: boolean;
  readonly signal: AbortSignal;
}

/**
 * Build a frozen context from caller options.
 */
export function createExecutionContext(options: ExecutionOptions = {}): ExecutionContext {
  const exemptions = new Set<string>([
    ...(options.allowEmptyFields ?? []),
    ...(options.mergeFields ?? []),
  ]);

  return Object.freeze({
    method: options.method ?? 'validate',
    exemptions,
    skipValidation: options.skipValidation ?? false,
    signal: options.signal ?? new AbortController().signal,
  });
}

/**
 * Whether a method-scoped directive applies to the current call.
 * Shared by omission and the required_* rules.
 */
export function appliesTo(scope: OmitScope, method: Method): boolean {
  return scope === 'always' || scope === method;
}

/**
 * Whether a store path is exempt from omission.
 */
export function isExempt(context: ExecutionContext, storePath: string): boolean {
  return context.exemptions.has(storePath);
}
