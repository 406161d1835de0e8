/**
 * Rule engine: omission, ordered directive execution and error aggregation
 * over a record walk.
 */
import { createExecutionContext, appliesTo, isExempt } from '../context/context.js';
import type { ExecutionContext, ExecutionOptions } from '../context/context.js';
import { ErrorAggregator } from '../errors/aggregator.js';
import { isRecordValue } from '../model/access.js';
import { describeModel } from '../model/descriptor.js';
import type { FieldDescriptor } from '../model/descriptor.js';
import type { FieldSpecs, ModelDefinition, RecordOf } from '../model/types.js';
import { isZeroValue } from '../model/zero.js';
import { ruleRegistry } from '../rules/registry.js';
import type { RuleRegistry } from '../rules/registry.js';
import type { RuleContext } from '../rules/types.js';
import type { TransformationDirective, ValidationDirective } from '../tags/types.js';
import { walk } from '../walker/walker.js';
import type { FieldVisit, VisitDecision } from '../walker/walker.js';
import type { FieldPath } from '../walker/path.js';
import {
  CancelledError,
  DocTagError,
  ErrorCodes,
  ModelError,
  RuleError,
} from '../../utils/errors.js';
import type { ErrorCode } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { EngineOptions, EngineOutcome, NormalizedRecord } from './types.js';

const log = logger.child('engine');

/**
 * State of one `run` call.
 */
interface CallState {
  readonly model: string;
  readonly context: ExecutionContext;
  readonly aggregator: ErrorAggregator;
}

export class RuleEngine {
  private readonly registry: RuleRegistry;

  constructor(options: EngineOptions = {}) {
    this.registry = options.registry ?? ruleRegistry;
  }

  /**
   * Walk a record, apply omission and run its rules.
   *
   * Field errors are collected into `errors`. Unknown rules, bad rule
   * parameters, throwing rules, cancellation and records that do not match
   * their model reject the promise instead.
   */
  async run<F extends FieldSpecs>(
    model: ModelDefinition<F>,
    record: RecordOf<F>,
    options: ExecutionOptions = {}
  ): Promise<EngineOutcome> {
    if (!isRecordValue(record)) {
      throw new ModelError(ErrorCodes.RECORD_SHAPE_MISMATCH, `${model.name}: record must be an object`, {
        model: model.name,
      });
    }

    const descriptor = describeModel(model);
    const state: CallState = {
      model: model.name,
      context: createExecutionContext(options),
      aggregator: new ErrorAggregator(model.name),
    };

    const { document, fields } = await walk(descriptor, record, {
      visit: (visit) => this.visitField(visit, state),
    });

    const errors = state.aggregator.toError();
    log.debug(`Processed ${model.name}`, {
      method: state.context.method,
      skipValidation: state.context.skipValidation,
      errors: errors?.count ?? 0,
    });

    return { passed: errors === null, document, fields, errors };
  }

  /**
   * Like `run`, but rejects with the aggregated RecordValidationError
   * when any field fails.
   */
  async validate<F extends FieldSpecs>(
    model: ModelDefinition<F>,
    record: RecordOf<F>,
    options: ExecutionOptions = {}
  ): Promise<NormalizedRecord> {
    const outcome = await this.run(model, record, options);
    if (outcome.errors) {
      throw outcome.errors;
    }
    return { document: outcome.document, fields: outcome.fields };
  }

  private async visitField(visit: FieldVisit, state: CallState): Promise<VisitDecision> {
    const { field, path } = visit;
    const { context } = state;

    if (context.signal.aborted) {
      throw cancelled(state, path);
    }

    if (this.isOmitted(field, visit.value, path, context)) {
      return { action: 'omit' };
    }

    if (context.skipValidation) {
      return { action: 'emit', value: visit.value };
    }

    let value = visit.value;
    for (const directive of field.rules) {
      const ruleContext: RuleContext = {
        signal: context.signal,
        method: context.method,
        path: path.display,
        storePath: path.store,
        field,
        value,
      };

      if (directive.kind === 'transformation') {
        value = await this.transform(directive, ruleContext, state);
        continue;
      }

      if (!(await this.check(directive, ruleContext, state))) {
        // First failure ends this field: no further rules, no output, no recursion
        return { action: 'omit' };
      }
    }

    return { action: 'emit', value };
  }

  private isOmitted(
    field: FieldDescriptor,
    value: unknown,
    path: FieldPath,
    context: ExecutionContext
  ): boolean {
    return (
      field.omitEmpty.some((scope) => appliesTo(scope, context.method)) &&
      !isExempt(context, path.store) &&
      isZeroValue(field, value)
    );
  }

  private async check(
    directive: ValidationDirective,
    base: RuleContext,
    state: CallState
  ): Promise<boolean> {
    const rule = this.registry.resolveValidation(directive.name);
    if (!rule) {
      throw new RuleError(
        ErrorCodes.UNKNOWN_VALIDATION,
        `Unknown validation rule "${directive.name}" on ${base.path}`,
        { model: state.model, path: base.path, rule: directive.name }
      );
    }

    const ctx = { ...base, param: directive.param, token: directive.token };
    let passed: boolean;
    try {
      passed = await rule.validate(ctx);
    } catch (error) {
      throw ruleFailure(error, state, base.path, ErrorCodes.VALIDATION_RULE_FAILED, directive.token);
    }

    if (!passed) {
      state.aggregator.add({
        field: base.field.name,
        source: base.field.source,
        path: base.path,
        directive: directive.token,
        rule: directive.name,
        message: rule.message(ctx),
      });
    }
    return passed;
  }

  private async transform(
    directive: TransformationDirective,
    ctx: RuleContext,
    state: CallState
  ): Promise<unknown> {
    const rule = this.registry.resolveTransformation(directive.name);
    if (!rule) {
      throw new RuleError(
        ErrorCodes.UNKNOWN_TRANSFORMATION,
        `Unknown transformation "${directive.name}" on ${ctx.path}`,
        { model: state.model, path: ctx.path, rule: directive.name }
      );
    }

    try {
      return await rule.transform(ctx);
    } catch (error) {
      throw ruleFailure(error, state, ctx.path, ErrorCodes.TRANSFORMATION_FAILED, directive.token);
    }
  }
}

function cancelled(state: CallState, path: FieldPath): CancelledError {
  const reason: unknown = state.context.signal.reason;
  return new CancelledError(`${state.model}: processing cancelled at ${path.display}`, {
    model: state.model,
    path: path.display,
    reason: reason instanceof Error ? reason.message : reason,
  });
}

function ruleFailure(
  error: unknown,
  state: CallState,
  path: string,
  code: ErrorCode,
  token: string
): DocTagError {
  if (error instanceof DocTagError) {
    return error;
  }
  if (state.context.signal.aborted) {
    return new CancelledError(`${state.model}: processing cancelled at ${path}`, {
      model: state.model,
      path,
      token,
    });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new RuleError(code, `Rule "${token}" on ${path} threw: ${message}`, {
    model: state.model,
    path,
    token,
    cause: error,
  });
}

/**
 * Engine bound to the global rule registry.
 */
export const defaultEngine = new RuleEngine();

export function validate<F extends FieldSpecs>(
  model: ModelDefinition<F>,
  record: RecordOf<F>,
  options?: ExecutionOptions
): Promise<NormalizedRecord> {
  return defaultEngine.validate(model, record, options);
}
