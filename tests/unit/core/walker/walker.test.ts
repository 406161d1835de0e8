/**
 * Tests for the record walker and field paths.
 */
import { describe, it, expect } from 'vitest';
import { walk } from '../../../../src/core/walker/walker.js';
import type { FieldVisit, FieldVisitor, VisitDecision } from '../../../../src/core/walker/walker.js';
import { FieldPath } from '../../../../src/core/walker/path.js';
import { defineModel, field } from '../../../../src/core/model/define.js';
import { describeModel } from '../../../../src/core/model/descriptor.js';
import { ModelError, ErrorCodes } from '../../../../src/utils/errors.js';

const Address = defineModel('Address', { City: field.string('city') });
const Friend = defineModel('Friend', { Name: field.string('name') });

const Person = defineModel('Person', {
  Name: field.string('name'),
  Address: field.record(Address, 'address'),
  Boss: field.ref(Friend, 'boss'),
  Friends: field.array(Friend, 'friends'),
  Pets: field.map(Friend, 'pets'),
  Tags: field.list('tags'),
  Secret: field.string('-'),
});

/**
 * Emits every value unchanged and records the visits.
 */
function recorder(decide?: (visit: FieldVisit) => VisitDecision | undefined): FieldVisitor & { visits: FieldVisit[] } {
  const visits: FieldVisit[] = [];
  return {
    visits,
    async visit(visit) {
      visits.push(visit);
      return decide?.(visit) ?? { action: 'emit', value: visit.value };
    },
  };
}

describe('FieldPath', () => {
  it('should keep positions out of the store path', () => {
    const path = FieldPath.root.child('friends').element(0).child('name');
    expect(path.store).toBe('friends.name');
    expect(path.display).toBe('friends.0.name');
    expect(String(path)).toBe('friends.0.name');
  });

  it('should render the root as an empty path', () => {
    expect(FieldPath.root.store).toBe('');
    expect(FieldPath.root.child('a').display).toBe('a');
  });
});

describe('walk', () => {
  const record = {
    Name: 'Ann',
    Address: { City: 'Oslo' },
    Friends: [{ Name: 'Bo' }, null],
    Pets: new Map([['rex', { Name: 'Rex' }]]),
    Tags: ['a'],
    Secret: 'hidden',
  };

  it('should visit fields depth-first in declaration order', async () => {
    const visitor = recorder();
    await walk(describeModel(Person), record, visitor);

    expect(visitor.visits.map((v) => v.path.display)).toEqual([
      'name',
      'address',
      'address.city',
      'boss',
      'friends',
      'friends.0.name',
      'pets',
      'pets.rex.name',
      'tags',
    ]);
    expect(visitor.visits[5]?.path.store).toBe('friends.name');
  });

  it('should assemble the document under store names', async () => {
    const { document } = await walk(describeModel(Person), record, recorder());

    expect(document).toEqual({
      name: 'Ann',
      address: { city: 'Oslo' },
      friends: [{ name: 'Bo' }, null],
      pets: { rex: { name: 'Rex' } },
      tags: ['a'],
    });
  });

  it('should flatten embedded records and keep collections whole', async () => {
    const { fields } = await walk(describeModel(Person), record, recorder());

    expect(Array.from(fields.keys())).toEqual(['name', 'address.city', 'friends', 'pets', 'tags']);
    expect(fields.get('friends')).toEqual([{ name: 'Bo' }, null]);
  });

  it('should not mutate the input record', async () => {
    const input = { Name: 'Ann', Tags: ['a'] };
    const { document } = await walk(describeModel(Person), input, recorder());

    expect(input).toEqual({ Name: 'Ann', Tags: ['a'] });
    expect(document.tags).not.toBe(input.Tags);
  });

  it('should skip omitted fields and their children', async () => {
    const visitor = recorder((v) => (v.field.name === 'address' ? { action: 'omit' } : undefined));
    const { document, fields } = await walk(describeModel(Person), record, visitor);

    expect(document).not.toHaveProperty('address');
    expect(fields.has('address.city')).toBe(false);
    expect(visitor.visits.some((v) => v.path.display === 'address.city')).toBe(false);
  });

  it('should emit the value chosen by the visitor', async () => {
    const visitor = recorder((v) =>
      v.field.name === 'name' && typeof v.value === 'string' ? { action: 'emit', value: v.value.toUpperCase() } : undefined
    );
    const { document } = await walk(describeModel(Person), { Name: 'Ann' }, visitor);
    expect(document.name).toBe('ANN');
  });

  it('should write missing leaves as null and walk a missing embedded record', async () => {
    const { document, fields } = await walk(describeModel(Person), {}, recorder());

    expect(document).toEqual({
      name: null,
      address: { city: null },
      friends: null,
      pets: null,
      tags: null,
    });
    expect(fields.get('address.city')).toBeNull();
  });

  it('should accept plain objects as maps', async () => {
    const { document } = await walk(describeModel(Person), { Pets: { tom: { Name: 'Tom' } } }, recorder());
    expect(document.pets).toEqual({ tom: { name: 'Tom' } });
  });

  it('should keep a "__proto__" map key as an entry', async () => {
    const input: object = JSON.parse('{"Pets":{"__proto__":{"Name":"x"},"rex":{"Name":"y"}}}');
    const { document } = await walk(describeModel(Person), input, recorder());

    const pets = document.pets;
    expect(Object.getPrototypeOf(pets)).toBe(Object.prototype);
    expect(Object.keys(pets ?? {})).toEqual(['__proto__', 'rex']);
    expect(Object.getOwnPropertyDescriptor(pets, '__proto__')?.value).toEqual({ name: 'x' });
  });

  it.each([
    [{ Address: 'Oslo' }, 'Value at address is not a record'],
    [{ Boss: ['x'] }, 'Value at boss is not a record'],
    [{ Friends: 'Bo' }, 'Value at friends is not an array of records'],
    [{ Friends: [5] }, 'Value at friends.0 is not a record'],
    [{ Pets: 5 }, 'Value at pets is not a map of records'],
  ])('should reject values that do not match the model: %j', async (input, message) => {
    const promise = walk(describeModel(Person), input, recorder());
    await expect(promise).rejects.toThrow(ModelError);
    await expect(walk(describeModel(Person), input, recorder())).rejects.toMatchObject({
      code: ErrorCodes.RECORD_SHAPE_MISMATCH,
      message,
    });
  });
});
