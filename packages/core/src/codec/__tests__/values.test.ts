import { describe, expect, it } from 'vitest';

import { schema } from '../../schema/builders.js';
import { SchemaCache } from '../../schema/schema-cache.js';
import { isEmptyValue, zeroRecord, zeroValue } from '../values.js';

const Level = schema.custom<'low' | 'high'>('Level', {
  toString: (value) => value,
  fromString: (text) => (text === 'high' ? 'high' : 'low'),
  zero: () => 'low',
});

describe('zeroValue', () => {
  const cache = new SchemaCache();

  it('gives each scalar kind its zero', () => {
    expect(zeroValue(schema.string(), cache)).toBe('');
    expect(zeroValue(schema.int(), cache)).toBe(0);
    expect(zeroValue(schema.float64(), cache)).toBe(0);
    expect(zeroValue(schema.int64(), cache)).toBe(0n);
    expect(zeroValue(schema.bool(), cache)).toBe(false);
  });

  it('leaves optional and dynamic slots absent', () => {
    expect(zeroValue(schema.optional(schema.int()), cache)).toBeUndefined();
    expect(zeroValue(schema.any(), cache)).toBeUndefined();
  });

  it('asks a custom codec for its zero', () => {
    expect(zeroValue(Level, cache)).toBe('low');
  });

  it('fills every declared field of a record', () => {
    const Inner = schema.record('Inner', { n: schema.int() });
    const Outer = schema.record('Outer', {
      name: schema.string(),
      hidden: schema.field(schema.bool(), '-'),
      inner: Inner,
      list: schema.array(schema.string()),
      extra: schema.map(schema.string()),
    });

    expect(zeroRecord(Outer, cache)).toEqual({
      name: '',
      hidden: false,
      inner: { n: 0 },
      list: [],
      extra: {},
    });
  });
});

describe('isEmptyValue', () => {
  it('treats scalar zeros and nil as empty', () => {
    expect(isEmptyValue(schema.string(), '')).toBe(true);
    expect(isEmptyValue(schema.int(), 0)).toBe(true);
    expect(isEmptyValue(schema.int64(), 0n)).toBe(true);
    expect(isEmptyValue(schema.bool(), false)).toBe(true);
    expect(isEmptyValue(schema.optional(schema.string()), undefined)).toBe(true);
    expect(isEmptyValue(schema.any(), null)).toBe(true);
  });

  it('treats non-zero scalars as present', () => {
    expect(isEmptyValue(schema.string(), ' ')).toBe(false);
    expect(isEmptyValue(schema.float64(), -1)).toBe(false);
    expect(isEmptyValue(schema.optional(schema.int()), 0)).toBe(false);
  });

  it('checks the length of containers', () => {
    expect(isEmptyValue(schema.array(schema.int()), [])).toBe(true);
    expect(isEmptyValue(schema.array(schema.int()), [0])).toBe(false);
    expect(isEmptyValue(schema.map(schema.int()), {})).toBe(true);
    expect(isEmptyValue(schema.map(schema.int()), new Map())).toBe(true);
    expect(isEmptyValue(schema.map(schema.int()), { a: 0 })).toBe(false);
  });

  it('never treats a record as empty', () => {
    const Empty = schema.record('Empty', {});
    expect(isEmptyValue(Empty, {})).toBe(false);
  });

  it('compares a custom value with its zero', () => {
    expect(isEmptyValue(Level, 'low')).toBe(true);
    expect(isEmptyValue(Level, 'high')).toBe(false);
  });
});
