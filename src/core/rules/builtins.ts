/**
 * Built-in validation rules: required (and per-method variants), min, max, email.
 * There are no built-in transformations.
 */
import { z } from 'zod';
import { appliesTo } from '../context/context.js';
import { isRecordValue } from '../model/access.js';
import { isZeroValue } from '../model/zero.js';
import type { OmitScope } from '../tags/types.js';
import { RuleError, ErrorCodes } from '../../utils/errors.js';
import type { RuleRegistry } from './registry.js';
import type { ValidationContext } from './types.js';

const REQUIRED_RULES: ReadonlyArray<[string, OmitScope]> = [
  ['required', 'always'],
  ['required_create', 'create'],
  ['required_update', 'update'],
  ['required_validate', 'validate'],
];

const emailSchema = z.email();

type Measure = { unit: 'value' | 'characters' | 'items'; size: number };

export function registerBuiltins(registry: RuleRegistry): void {
  for (const [name, scope] of REQUIRED_RULES) {
    registry.registerValidation(
      name,
      (ctx) => !appliesTo(scope, ctx.method) || !isZeroValue(ctx.field, ctx.value),
      { message: (ctx) => `${ctx.path} is required` }
    );
  }

  registry.registerValidation(
    'min',
    (ctx) => {
      const bound = parseBound(ctx);
      const measured = measure(ctx);
      return measured !== undefined && measured.size >= bound;
    },
    { message: (ctx) => boundMessage(ctx, 'at least') }
  );

  registry.registerValidation(
    'max',
    (ctx) => {
      const bound = parseBound(ctx);
      const measured = measure(ctx);
      return measured !== undefined && measured.size <= bound;
    },
    { message: (ctx) => boundMessage(ctx, 'at most') }
  );

  registry.registerValidation(
    'email',
    (ctx) => typeof ctx.value === 'string' && emailSchema.safeParse(ctx.value).success,
    { message: (ctx) => `${ctx.path} must be a valid email address` }
  );
}

function parseBound(ctx: ValidationContext): number {
  const param = ctx.param ?? '';
  const bound = Number(param);
  if (param === '' || Number.isNaN(bound)) {
    throw new RuleError(
      ErrorCodes.INVALID_RULE_PARAM,
      `Rule "${ctx.token}" on ${ctx.path} needs a numeric parameter`,
      { path: ctx.path, token: ctx.token }
    );
  }
  return bound;
}

/**
 * Numbers measure as themselves; strings by code points; lists, arrays
 * and maps by item count. Zero values of measurable kinds measure 0.
 */
function measure(ctx: ValidationContext): Measure | undefined {
  const { value, field } = ctx;

  if (value === null || value === undefined) {
    switch (field.kind) {
      case 'number':
        return { unit: 'value', size: 0 };
      case 'string':
        return { unit: 'characters', size: 0 };
      case 'list':
      case 'array':
      case 'map':
        return { unit: 'items', size: 0 };
      default:
        return undefined;
    }
  }

  if (typeof value === 'number') return { unit: 'value', size: value };
  if (typeof value === 'string') return { unit: 'characters', size: Array.from(value).length };
  if (Array.isArray(value)) return { unit: 'items', size: value.length };
  if (value instanceof Map) return { unit: 'items', size: value.size };
  if (field.kind === 'map' && isRecordValue(value)) {
    return { unit: 'items', size: Object.keys(value).length };
  }
  return undefined;
}

function boundMessage(ctx: ValidationContext, relation: 'at least' | 'at most'): string {
  const measured = measure(ctx);
  const bound = ctx.param ?? '';
  switch (measured?.unit) {
    case 'value':
      return `${ctx.path} must be ${relation} ${bound}`;
    case 'characters':
      return `${ctx.path} must be ${relation} ${bound} characters long`;
    case 'items':
      return `${ctx.path} must contain ${relation} ${bound} items`;
    default:
      return `${ctx.path} cannot be checked against ${ctx.token}`;
  }
}
