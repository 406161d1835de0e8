/**
 * Collects field errors during one engine call.
 */
import { ValidationError, ErrorCodes } from '../../utils/errors.js';
import type { FieldError } from './types.js';

/**
 * Aggregated field errors of one record, in traversal order.
 */
export class RecordValidationError extends ValidationError {
  readonly errors: readonly FieldError[];

  constructor(model: string, errors: readonly FieldError[]) {
    super(
      ErrorCodes.VALIDATION_FAILED,
      `${model} failed validation: ${errors.map((e) => e.message).join('; ')}`,
      { model, count: errors.length }
    );
    this.name = 'RecordValidationError';
    this.errors = Object.freeze([...errors]);
  }

  get count(): number {
    return this.errors.length;
  }

  /**
   * First error for a store name or source identifier.
   */
  get(nameOrSource: string): FieldError | undefined {
    return this.errors.find((e) => e.field === nameOrSource || e.source === nameOrSource);
  }

  /**
   * Every error for a store name or source identifier, e.g. the same
   * field in several collection elements.
   */
  getAll(nameOrSource: string): FieldError[] {
    return this.errors.filter((e) => e.field === nameOrSource || e.source === nameOrSource);
  }

  /**
   * Error at an exact path.
   */
  at(path: string): FieldError | undefined {
    return this.errors.find((e) => e.path === path);
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), errors: this.errors };
  }
}

export class ErrorAggregator {
  private readonly errors: FieldError[] = [];

  constructor(private readonly model: string) {}

  add(error: FieldError): void {
    this.errors.push(error);
  }

  get count(): number {
    return this.errors.length;
  }

  /**
   * The aggregated error, or null when nothing failed.
   */
  toError(): RecordValidationError | null {
    return this.errors.length === 0 ? null : new RecordValidationError(this.model, this.errors);
  }
}
