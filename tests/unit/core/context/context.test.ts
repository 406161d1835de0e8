/**
 * Tests for execution contexts.
 */
import { describe, it, expect } from 'vitest';
import { appliesTo, createExecutionContext, isExempt } from '../../../../src/core/context/context.js';

describe('createExecutionContext', () => {
  it('should apply defaults', () => {
    const context = createExecutionContext();
    expect(context.method).toBe('validate');
    expect(context.skipValidation).toBe(false);
    expect(context.signal.aborted).toBe(false);
    expect(context.exemptions.size).toBe(0);
  });

  it('should combine allowed-empty and merge fields into one exemption set', () => {
    const context = createExecutionContext({
      method: 'update',
      allowEmptyFields: ['age'],
      mergeFields: ['address.city', 'age'],
    });
    expect(Array.from(context.exemptions)).toEqual(['age', 'address.city']);
    expect(isExempt(context, 'address.city')).toBe(true);
    expect(isExempt(context, 'address')).toBe(false);
  });

  it('should keep the caller signal', () => {
    const controller = new AbortController();
    const context = createExecutionContext({ signal: controller.signal });
    controller.abort();
    expect(context.signal.aborted).toBe(true);
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(createExecutionContext())).toBe(true);
  });
});

describe('appliesTo', () => {
  it('should apply "always" to every method', () => {
    expect(appliesTo('always', 'create')).toBe(true);
    expect(appliesTo('always', 'update')).toBe(true);
    expect(appliesTo('always', 'validate')).toBe(true);
  });

  it('should apply method scopes only to their method', () => {
    expect(appliesTo('create', 'create')).toBe(true);
    expect(appliesTo('create', 'update')).toBe(false);
  });
});
