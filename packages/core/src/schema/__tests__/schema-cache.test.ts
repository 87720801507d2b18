import { describe, expect, it } from 'vitest';

import { schema } from '../builders.js';
import { SchemaCache } from '../schema-cache.js';

const Account = schema.record('Account', {
  login: schema.field(schema.string(), 'user'),
  Age: schema.field(schema.int(), 'age,omitempty'),
  password: schema.field(schema.string(), '-'),
  Nick: schema.string(),
  alias: schema.field(schema.string(), 'user'),
});

describe('SchemaCache', () => {
  it('resolves wire names in declaration order', () => {
    const cache = new SchemaCache();
    const fields = cache.fieldsOf(Account);

    expect(fields.map((field) => [field.key, field.name, field.ignore])).toEqual([
      ['login', 'user', false],
      ['Age', 'age', false],
      ['password', '', true],
      ['Nick', 'Nick', false],
      ['alias', 'user', false],
    ]);
    expect(fields[1]?.omitIfEmpty).toBe(true);
  });

  it('looks fields up by exact wire name', () => {
    const cache = new SchemaCache();

    expect(cache.lookup(Account, 'age')?.key).toBe('Age');
    expect(cache.lookup(Account, 'Age')).toBeUndefined();
    expect(cache.lookup(Account, 'AGE')).toBeUndefined();
  });

  it('never finds an ignored field', () => {
    const cache = new SchemaCache();

    expect(cache.lookup(Account, 'password')).toBeUndefined();
    expect(cache.lookup(Account, '')).toBeUndefined();
    expect(cache.lookup(Account, '-')).toBeUndefined();
  });

  it('gives a shared name to the first declared field', () => {
    const cache = new SchemaCache();
    expect(cache.lookup(Account, 'user')?.key).toBe('login');
  });

  it('lists the names of non-ignored fields', () => {
    const cache = new SchemaCache();
    expect(cache.namesOf(Account)).toEqual(['user', 'age', 'Nick', 'user']);
  });

  it('computes an entry once per record identity', () => {
    const cache = new SchemaCache();
    expect(cache.has(Account)).toBe(false);

    const first = cache.fieldsOf(Account);
    const second = cache.fieldsOf(Account);

    expect(second).toBe(first);
    expect(cache.has(Account)).toBe(true);
    expect(cache.getStats()).toEqual({ hits: 1, misses: 1 });
  });

  it('keeps structurally equal records apart', () => {
    const cache = new SchemaCache();
    const left = schema.record('Twin', { a: schema.field(schema.string(), 'x') });
    const right = schema.record('Twin', { a: schema.field(schema.string(), 'y') });

    expect(cache.lookup(left, 'x')?.key).toBe('a');
    expect(cache.lookup(right, 'x')).toBeUndefined();
    expect(cache.getStats().misses).toBe(2);
  });

  it('freezes resolved fields', () => {
    const cache = new SchemaCache();
    expect(Object.isFrozen(cache.fieldsOf(Account))).toBe(true);
    expect(Object.isFrozen(cache.lookup(Account, 'age'))).toBe(true);
  });
});
