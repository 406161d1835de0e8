/**
 * Rule registry - maps rule names to validation and transformation functions.
 */
import { logger } from '../../utils/logger.js';
import { registerBuiltins } from './builtins.js';
import type {
  TransformationFn,
  TransformationRule,
  ValidationContext,
  ValidationFn,
  ValidationRule,
  ValidationRuleOptions,
} from './types.js';

const log = logger.child('rules');

export function defaultMessage(ctx: ValidationContext): string {
  return `${ctx.path} failed ${ctx.token} validation`;
}

/**
 * Registry of named rules. Validations and transformations live in separate
 * namespaces. Re-registering a name replaces the previous entry.
 *
 * Registration is setup work: finish it before engine calls that use the
 * new names start. Registering while calls are in flight is the caller's
 * responsibility, since a call resolves each name when its directive runs.
 */
export class RuleRegistry {
  private validations = new Map<string, ValidationRule>();
  private transformations = new Map<string, TransformationRule>();

  constructor(options: { builtins?: boolean } = {}) {
    if (options.builtins ?? true) {
      registerBuiltins(this);
    }
  }

  registerValidation(name: string, validate: ValidationFn, options: ValidationRuleOptions = {}): void {
    if (this.validations.has(name)) {
      log.debug(`Replacing validation rule "${name}"`);
    }
    this.validations.set(name, Object.freeze({ name, validate, message: options.message ?? defaultMessage }));
  }

  registerTransformation(name: string, transform: TransformationFn): void {
    if (this.transformations.has(name)) {
      log.debug(`Replacing transformation rule "${name}"`);
    }
    this.transformations.set(name, Object.freeze({ name, transform }));
  }

  resolveValidation(name: string): ValidationRule | undefined {
    return this.validations.get(name);
  }

  resolveTransformation(name: string): TransformationRule | undefined {
    return this.transformations.get(name);
  }

  hasValidation(name: string): boolean {
    return this.validations.has(name);
  }

  hasTransformation(name: string): boolean {
    return this.transformations.has(name);
  }

  listValidations(): string[] {
    return Array.from(this.validations.keys());
  }

  listTransformations(): string[] {
    return Array.from(this.transformations.keys());
  }

  /**
   * Drop every user registration and restore the built-ins.
   * Mainly for testing.
   */
  reset(): void {
    this.validations.clear();
    this.transformations.clear();
    registerBuiltins(this);
  }
}

/**
 * Process-wide registry used when an engine is not given its own.
 */
export const ruleRegistry = new RuleRegistry();

export function registerValidation(name: string, validate: ValidationFn, options?: ValidationRuleOptions): void {
  ruleRegistry.registerValidation(name, validate, options);
}

export function registerTransformation(name: string, transform: TransformationFn): void {
  ruleRegistry.registerTransformation(name, transform);
}
