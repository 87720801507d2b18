/**
 * JSON ↔ typed values for descriptors that JSON cannot carry directly:
 * 64-bit integers travel as strings (or safe numbers), `null` stands for an
 * absent optional.
 */

import { defaultSchemaCache, type SchemaCache } from '../schema/schema-cache.js';
import { describe, type Descriptor } from '../types/descriptor.js';
import { getOwn, setOwn } from '../types/dynamic.js';
import { CoercionError, type FormCodecError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import { runFromString } from '../codec/hooks.js';
import { parseScalar } from '../codec/scalars.js';
import { isObjectRecord } from '../codec/values.js';

export function valueFromJson(
  descriptor: Descriptor,
  json: unknown,
  cache: SchemaCache = defaultSchemaCache
): Result<unknown, FormCodecError> {
  if (json === null || json === undefined) return ok(undefined);
  // A value with a codec arrives in its wire form.
  if (descriptor.codec && typeof json === 'string') {
    return runFromString(descriptor.codec, describe(descriptor), json);
  }

  switch (descriptor.kind) {
    case 'bigint':
      if (typeof json === 'string') return parseScalar(descriptor, json);
      if (typeof json === 'number' && Number.isSafeInteger(json)) {
        return ok(BigInt(json));
      }
      return mismatch(descriptor, json);
    case 'optional':
      return valueFromJson(descriptor.inner, json, cache);
    case 'array': {
      if (!Array.isArray(json)) return mismatch(descriptor, json);
      const out: unknown[] = [];
      for (const element of json) {
        const converted = valueFromJson(descriptor.element, element, cache);
        if (converted.isErr()) return converted;
        out.push(converted.value);
      }
      return ok(out);
    }
    case 'map': {
      if (!isObjectRecord(json)) return mismatch(descriptor, json);
      const out: Record<string, unknown> = {};
      for (const [key, element] of Object.entries(json)) {
        const converted = valueFromJson(descriptor.element, element, cache);
        if (converted.isErr()) return converted;
        setOwn(out, key, converted.value);
      }
      return ok(out);
    }
    case 'record': {
      if (!isObjectRecord(json)) return mismatch(descriptor, json);
      const out: Record<string, unknown> = {};
      for (const field of cache.fieldsOf(descriptor)) {
        const converted = valueFromJson(
          field.descriptor,
          getOwn(json, field.key),
          cache
        );
        if (converted.isErr()) return converted;
        setOwn(out, field.key, converted.value);
      }
      return ok(out);
    }
    default:
      return ok(json);
  }
}

function mismatch(
  descriptor: Descriptor,
  json: unknown
): Result<never, CoercionError> {
  const label = describe(descriptor);
  return err(
    new CoercionError({
      message: `cannot read ${Array.isArray(json) ? 'array' : typeof json} from JSON as ${label}`,
      targetType: label,
      value: JSON.stringify(json) ?? String(json),
    })
  );
}

/**
 * JSON.stringify replacer that writes bigints as decimal strings.
 */
export function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}
