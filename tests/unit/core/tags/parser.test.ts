/**
 * Tests for the field tag parser.
 */
import { describe, it, expect } from 'vitest';
import { parseTag } from '../../../../src/core/tags/parser.js';
import { ModelError, ErrorCodes } from '../../../../src/utils/errors.js';

function parseError(tag: string): ModelError {
  try {
    parseTag(tag);
  } catch (error) {
    if (error instanceof ModelError) return error;
    throw error;
  }
  throw new Error(`expected "${tag}" to be rejected`);
}

describe('parseTag', () => {
  describe('name slot', () => {
    it('should treat an empty tag as default name with no directives', () => {
      const tag = parseTag('');
      expect(tag.name).toBeUndefined();
      expect(tag.ignore).toBe(false);
      expect(tag.directives).toEqual([]);
      expect(tag.rules).toEqual([]);
      expect(tag.omitEmpty).toEqual([]);
    });

    it('should read the first token as the store name', () => {
      const tag = parseTag('email,required');
      expect(tag.name).toBe('email');
      expect(tag.directives[0]).toEqual({ kind: 'name', name: 'email' });
    });

    it('should keep the default name when the first token is empty', () => {
      const tag = parseTag(',required');
      expect(tag.name).toBeUndefined();
      expect(tag.rules).toEqual([{ kind: 'validation', name: 'required', token: 'required' }]);
    });

    it('should trim whitespace around tokens', () => {
      const tag = parseTag(' email , required ');
      expect(tag.name).toBe('email');
      expect(tag.rules.map((r) => r.token)).toEqual(['required']);
    });

    it('should reject names with a dot', () => {
      const error = parseError('a.b');
      expect(error.code).toBe(ErrorCodes.INVALID_TAG);
      expect(error.message).toBe('Invalid tag "a.b": invalid store name "a.b"');
    });

    it('should reject names starting with $', () => {
      expect(parseError('$set').message).toBe('Invalid tag "$set": invalid store name "$set"');
    });

    it('should reject "__proto__" as a name', () => {
      expect(parseError('__proto__').message).toBe('Invalid tag "__proto__": invalid store name "__proto__"');
    });

    it('should reject a rule written in the name slot', () => {
      expect(parseError('min=6').message).toBe('Invalid tag "min=6": invalid store name "min=6"');
    });
  });

  describe('ignore', () => {
    it('should mark a "-" tag as ignored', () => {
      const tag = parseTag('-');
      expect(tag.ignore).toBe(true);
      expect(tag.directives).toEqual([{ kind: 'ignore' }]);
    });

    it('should ignore any tokens after a leading "-"', () => {
      const tag = parseTag('-,required');
      expect(tag.ignore).toBe(true);
      expect(tag.rules).toEqual([]);
    });

    it('should reject "-" after the first token', () => {
      expect(parseError('name,-').message).toBe(
        'Invalid tag "name,-": "-" is only allowed as the first token'
      );
    });
  });

  describe('omission directives', () => {
    it('should collect omission scopes in order', () => {
      const tag = parseTag('name,omitempty_create,omitempty');
      expect(tag.omitEmpty).toEqual(['create', 'always']);
    });

    it('should record each scope once', () => {
      const tag = parseTag('name,omitempty,omitempty');
      expect(tag.omitEmpty).toEqual(['always']);
      expect(tag.directives.filter((d) => d.kind === 'omitempty')).toHaveLength(2);
    });

    it('should accept every method variant', () => {
      const tag = parseTag(',omitempty_create,omitempty_update,omitempty_validate');
      expect(tag.omitEmpty).toEqual(['create', 'update', 'validate']);
    });

    it('should reject unknown omitempty variants', () => {
      expect(parseError('name,omitempty_delete').message).toBe(
        'Invalid tag "name,omitempty_delete": unknown omission directive "omitempty_delete"'
      );
    });

    it('should not count omission directives as rules', () => {
      expect(parseTag('name,omitempty,required').rules).toHaveLength(1);
    });
  });

  describe('rules', () => {
    it('should keep rules in tag order with their tokens', () => {
      const tag = parseTag('password,required,min=6,transform=hash_pass');
      expect(tag.rules).toEqual([
        { kind: 'validation', name: 'required', token: 'required' },
        { kind: 'validation', name: 'min', param: '6', token: 'min=6' },
        { kind: 'transformation', name: 'hash_pass', token: 'transform=hash_pass' },
      ]);
    });

    it('should keep the raw parameter text after "="', () => {
      const tag = parseTag('code,pattern=a=b');
      expect(tag.rules[0]).toEqual({ kind: 'validation', name: 'pattern', param: 'a=b', token: 'pattern=a=b' });
    });

    it('should skip empty tokens', () => {
      expect(parseTag('name,,required,').rules.map((r) => r.name)).toEqual(['required']);
    });

    it('should not resolve rule names while parsing', () => {
      expect(parseTag('name,no_such_rule').rules[0]?.name).toBe('no_such_rule');
    });

    it('should reject a transformation without a name', () => {
      expect(parseError('name,transform=').message).toBe(
        'Invalid tag "name,transform=": missing transformation name in "transform="'
      );
    });

    it('should reject a parameter without a rule name', () => {
      expect(parseError('name,=5').message).toBe('Invalid tag "name,=5": missing rule name in "=5"');
    });
  });

  describe('caching', () => {
    it('should return the same frozen result for the same tag', () => {
      const first = parseTag('cached,required');
      const second = parseTag('cached,required');
      expect(second).toBe(first);
      expect(Object.isFrozen(first)).toBe(true);
      expect(Object.isFrozen(first.rules)).toBe(true);
      expect(Object.isFrozen(first.rules[0])).toBe(true);
    });
  });
});
