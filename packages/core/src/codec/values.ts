/**
 * Zero values and emptiness per descriptor kind.
 */

import type { Descriptor, RecordDescriptor } from '../types/descriptor.js';
import { setOwn } from '../types/dynamic.js';
import type { SchemaCache } from '../schema/schema-cache.js';

export function zeroValue(descriptor: Descriptor, cache: SchemaCache): unknown {
  switch (descriptor.kind) {
    case 'string':
      return '';
    case 'integer':
    case 'float':
      return 0;
    case 'bigint':
      return 0n;
    case 'boolean':
      return false;
    case 'any':
    case 'optional':
      return undefined;
    case 'array':
      return [];
    case 'map':
      return {};
    case 'record':
      return zeroRecord(descriptor, cache);
    case 'custom':
      return descriptor.codec.zero();
  }
}

export function zeroRecord(
  descriptor: RecordDescriptor,
  cache: SchemaCache
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const field of cache.fieldsOf(descriptor)) {
    setOwn(out, field.key, zeroValue(field.descriptor, cache));
  }
  return out;
}

/**
 * The `omitempty` test. Records are never empty; a custom type is empty only
 * when it is identical to its codec's zero.
 */
export function isEmptyValue(descriptor: Descriptor, value: unknown): boolean {
  if (value === undefined || value === null) return true;

  switch (descriptor.kind) {
    case 'string':
      return value === '';
    case 'integer':
    case 'float':
      return value === 0;
    case 'bigint':
      return value === 0n;
    case 'boolean':
      return value === false;
    case 'any':
    case 'optional':
      return false;
    case 'array':
      return Array.isArray(value) && value.length === 0;
    case 'map':
      return mapSize(value) === 0;
    case 'record':
      return false;
    case 'custom':
      return Object.is(value, descriptor.codec.zero());
  }
}

function mapSize(value: unknown): number {
  if (value instanceof Map) return value.size;
  if (typeof value === 'object' && value !== null) {
    return Object.keys(value).length;
  }
  return 0;
}

export function isObjectRecord(
  value: unknown
): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
