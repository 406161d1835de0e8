/**
 * Tests for model definitions and record descriptors.
 */
import { describe, it, expect } from 'vitest';
import { defineModel, field } from '../../../../src/core/model/define.js';
import { defaultStoreName, describeModel } from '../../../../src/core/model/descriptor.js';
import type { ModelDefinition } from '../../../../src/core/model/types.js';
import { ModelError, ErrorCodes } from '../../../../src/utils/errors.js';

const Address = defineModel('Address', {
  City: field.string('city,required'),
});

const User = defineModel('User', {
  Email: field.string('email,required,email'),
  FirstName: field.string(),
  Password: field.string('-'),
  Address: field.ref(Address, 'addr,omitempty'),
});

describe('defineModel', () => {
  it('should default to the lowercase naming convention', () => {
    expect(User.nameConvention).toBe('lowercase');
    expect(defineModel('Raw', {}, { nameConvention: 'preserve' }).nameConvention).toBe('preserve');
  });

  it('should freeze the model and its fields', () => {
    expect(Object.isFrozen(User)).toBe(true);
    expect(Object.isFrozen(User.fields)).toBe(true);
  });

  it('should default tags to empty', () => {
    expect(field.number()).toEqual({ kind: 'number', tag: '' });
  });
});

describe('describeModel', () => {
  it('should list non-ignored fields in declaration order', () => {
    const descriptor = describeModel(User);
    expect(descriptor.model).toBe('User');
    expect(descriptor.fields.map((f) => [f.source, f.name])).toEqual([
      ['Email', 'email'],
      ['FirstName', 'firstname'],
      ['Address', 'addr'],
    ]);
    expect(descriptor.ignored).toEqual(['Password']);
  });

  it('should expose rules and omission scopes of each field', () => {
    const [email, , address] = describeModel(User).fields;
    expect(email?.rules.map((r) => r.token)).toEqual(['required', 'email']);
    expect(address?.omitEmpty).toEqual(['always']);
    expect(address?.kind).toBe('ref');
  });

  it('should keep source identifiers under the preserve convention', () => {
    const Raw = defineModel('Raw', { FirstName: field.string() }, { nameConvention: 'preserve' });
    expect(describeModel(Raw).fields[0]?.name).toBe('FirstName');
  });

  it('should build each descriptor once', () => {
    expect(describeModel(User)).toBe(describeModel(User));
    expect(Object.isFrozen(describeModel(User).fields)).toBe(true);
  });

  it('should resolve nested descriptors', () => {
    const address = describeModel(User).fields[2];
    expect(address?.nested).toBe(describeModel(Address));
    expect(describeModel(User).fields[0]?.nested).toBeUndefined();
  });

  it('should support self references through thunks', () => {
    const Node: ModelDefinition = defineModel('Node', {
      Value: field.number(),
      Children: field.array((): ModelDefinition => Node),
    });
    const descriptor = describeModel(Node);
    expect(descriptor.fields[1]?.nested).toBe(descriptor);
  });

  it('should reject two fields sharing a store name', () => {
    const Clash = defineModel('Clash', {
      Name: field.string(),
      Title: field.string('name'),
    });
    try {
      describeModel(Clash);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ModelError);
      expect(error).toMatchObject({
        code: ErrorCodes.DUPLICATE_FIELD,
        message: 'Clash: fields "Name" and "Title" share the store name "name"',
      });
    }
  });

  it('should reject nested kinds without a model', () => {
    const Bad = defineModel('Bad', { Owner: { kind: 'ref', tag: '' } });
    expect(() => describeModel(Bad)).toThrow('Bad.Owner: ref fields need a model');
  });

  it('should reject a default store name of "__proto__"', () => {
    const Odd = defineModel('Odd', { ['__proto__']: field.string() }, { nameConvention: 'preserve' });
    expect(() => describeModel(Odd)).toThrow('Odd.__proto__: "__proto__" cannot be a store name');
  });

  it('should surface tag errors', () => {
    const Bad = defineModel('BadTag', { Name: field.string('name,omitempty_never') });
    expect(() => describeModel(Bad)).toThrow(ModelError);
  });
});

describe('defaultStoreName', () => {
  it('should apply the naming convention', () => {
    expect(defaultStoreName('CreatedAt', 'lowercase')).toBe('createdat');
    expect(defaultStoreName('CreatedAt', 'preserve')).toBe('CreatedAt');
  });
});
