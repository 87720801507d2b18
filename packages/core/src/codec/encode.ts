/**
 * Encode engine: one pre-order walk from a typed root to flat pairs.
 *
 * The pairs come out in traversal order; sorting and escaping belong to the
 * serializer (see serializeFlat).
 */

import type { FlatPair } from '../flat/flat-multimap.js';
import {
  INDEX_SEGMENT,
  namedSegment,
  type PathSegment,
} from '../path/path-parser.js';
import { renderPath } from '../path/render.js';
import { defaultSchemaCache, type SchemaCache } from '../schema/schema-cache.js';
import {
  describe,
  type Descriptor,
  type MapDescriptor,
  type RecordDescriptor,
  type StringCodec,
} from '../types/descriptor.js';
import {
  UnsupportedKindError,
  UnsupportedMapKeyError,
  type FormCodecError,
} from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import { checkMapKey, resolveRoot } from './decode.js';
import { runToString } from './hooks.js';
import { formatScalar } from './scalars.js';
import { isEmptyValue, isObjectRecord, zeroValue } from './values.js';

export interface EncodeContext {
  cache?: SchemaCache;
}

type Emit = (pair: FlatPair) => void;

export function encodeValue(
  descriptor: Descriptor,
  value: unknown,
  context: EncodeContext = {}
): Result<FlatPair[], FormCodecError> {
  const root = resolveRoot(descriptor);
  if (root.isErr()) return root;
  if (value === undefined || value === null) return ok([]);

  const pairs: FlatPair[] = [];
  const cache = context.cache ?? defaultSchemaCache;
  const walked = encodeAt(root.value, value, [], cache, (pair) =>
    pairs.push(pair)
  );
  if (walked.isErr()) return walked;
  return ok(pairs);
}

function encodeAt(
  descriptor: Descriptor,
  value: unknown,
  path: readonly PathSegment[],
  cache: SchemaCache,
  emit: Emit
): Result<void, FormCodecError> {
  if (value === undefined || value === null) {
    if (descriptor.kind === 'optional' || descriptor.kind === 'any') {
      return ok(undefined);
    }
    const zero = zeroValue(descriptor, cache);
    if (zero === undefined || zero === null) return ok(undefined);
    return encodeAt(descriptor, zero, path, cache, emit);
  }

  if (descriptor.codec) {
    return encodeWithCodec(
      descriptor.codec,
      describe(descriptor),
      value,
      path,
      emit
    );
  }

  switch (descriptor.kind) {
    case 'optional':
      return encodeAt(descriptor.inner, value, path, cache, emit);
    case 'any':
      return encodeDynamic(value, path, new Set(), emit);
    case 'record':
      return encodeRecord(descriptor, value, path, cache, emit);
    case 'map':
      return encodeMap(descriptor, value, path, cache, emit);
    case 'array': {
      if (!Array.isArray(value)) return shapeMismatch(descriptor, value, path);
      for (const element of value) {
        if (
          descriptor.element.kind === 'any' &&
          (element === undefined || element === null)
        ) {
          continue;
        }
        const result = encodeAt(
          descriptor.element,
          element,
          [...path, INDEX_SEGMENT],
          cache,
          emit
        );
        if (result.isErr()) return result;
      }
      return ok(undefined);
    }
    case 'custom':
      return encodeWithCodec(
        descriptor.codec,
        descriptor.name,
        value,
        path,
        emit
      );
    default: {
      const text = formatScalar(descriptor, value);
      if (text.isErr()) {
        text.error.annotate({ path: renderPath(path) });
        return text;
      }
      emit({ key: renderPath(path), value: text.value });
      return ok(undefined);
    }
  }
}

function encodeWithCodec(
  codec: StringCodec<unknown>,
  targetType: string,
  value: unknown,
  path: readonly PathSegment[],
  emit: Emit
): Result<void, FormCodecError> {
  const text = runToString(codec, targetType, value);
  if (text.isErr()) {
    text.error.annotate({ path: renderPath(path) });
    return text;
  }
  emit({ key: renderPath(path), value: text.value });
  return ok(undefined);
}

function encodeRecord(
  descriptor: RecordDescriptor,
  value: unknown,
  path: readonly PathSegment[],
  cache: SchemaCache,
  emit: Emit
): Result<void, FormCodecError> {
  if (!isObjectRecord(value)) return shapeMismatch(descriptor, value, path);

  for (const field of cache.fieldsOf(descriptor)) {
    if (field.ignore) continue;
    const fieldValue = Object.prototype.hasOwnProperty.call(value, field.key)
      ? value[field.key]
      : undefined;
    if (field.omitIfEmpty && isEmptyValue(field.descriptor, fieldValue)) {
      continue;
    }
    const result = encodeAt(
      field.descriptor,
      fieldValue,
      [...path, namedSegment(field.name)],
      cache,
      emit
    );
    if (result.isErr()) return result;
  }
  return ok(undefined);
}

function encodeMap(
  descriptor: MapDescriptor,
  value: unknown,
  path: readonly PathSegment[],
  cache: SchemaCache,
  emit: Emit
): Result<void, FormCodecError> {
  const keyCheck = checkMapKey(descriptor, renderPath(path));
  if (keyCheck.isErr()) return keyCheck;

  const entries = mapEntries(value);
  if (entries.isErr()) {
    entries.error.annotate({ path: renderPath(path) });
    return entries;
  }

  for (const [key, element] of entries.value) {
    if (
      descriptor.element.kind === 'any' &&
      (element === undefined || element === null)
    ) {
      continue;
    }
    const result = encodeAt(
      descriptor.element,
      element,
      [...path, namedSegment(key)],
      cache,
      emit
    );
    if (result.isErr()) return result;
  }
  return ok(undefined);
}

/**
 * Plain objects and string-keyed Map instances both count as mappings.
 */
function mapEntries(
  value: unknown
): Result<Array<[string, unknown]>, FormCodecError> {
  if (value instanceof Map) {
    const entries: Array<[string, unknown]> = [];
    for (const [key, element] of value) {
      if (typeof key !== 'string') {
        return err(new UnsupportedMapKeyError({ keyType: typeof key }));
      }
      entries.push([key, element]);
    }
    return ok(entries);
  }
  if (isObjectRecord(value)) return ok(Object.entries(value));
  return err(
    new UnsupportedKindError({
      message: `cannot encode ${typeof value} as a mapping`,
      targetType: 'map',
    })
  );
}

/**
 * Encode a runtime value of unknown shape. Leaves are stringified, arrays
 * become sequences and objects become mappings; nil members are skipped.
 */
function encodeDynamic(
  value: unknown,
  path: readonly PathSegment[],
  ancestors: Set<object>,
  emit: Emit
): Result<void, FormCodecError> {
  switch (typeof value) {
    case 'undefined':
      return ok(undefined);
    case 'string':
      emit({ key: renderPath(path), value });
      return ok(undefined);
    case 'number': {
      const text = formatScalar({ kind: 'float', bits: 64 }, value);
      if (text.isErr()) return text;
      emit({ key: renderPath(path), value: text.value });
      return ok(undefined);
    }
    case 'bigint':
      emit({ key: renderPath(path), value: value.toString() });
      return ok(undefined);
    case 'boolean':
      emit({ key: renderPath(path), value: value ? 'true' : 'false' });
      return ok(undefined);
    case 'function':
    case 'symbol':
      return err(
        new UnsupportedKindError({
          message: `cannot encode a ${typeof value} at "${renderPath(path)}"`,
          targetType: typeof value,
          path: renderPath(path),
        })
      );
    case 'object':
      break;
  }

  if (value === null) return ok(undefined);
  if (ancestors.has(value)) {
    return err(
      new UnsupportedKindError({
        message: `cannot encode a cyclic value at "${renderPath(path)}"`,
        targetType: 'any',
        path: renderPath(path),
      })
    );
  }

  ancestors.add(value);
  const result = Array.isArray(value)
    ? encodeDynamicSequence(value, path, ancestors, emit)
    : encodeDynamicMapping(value, path, ancestors, emit);
  ancestors.delete(value);
  return result;
}

function encodeDynamicSequence(
  value: readonly unknown[],
  path: readonly PathSegment[],
  ancestors: Set<object>,
  emit: Emit
): Result<void, FormCodecError> {
  for (const element of value) {
    if (element === undefined || element === null) continue;
    const result = encodeDynamic(
      element,
      [...path, INDEX_SEGMENT],
      ancestors,
      emit
    );
    if (result.isErr()) return result;
  }
  return ok(undefined);
}

function encodeDynamicMapping(
  value: object,
  path: readonly PathSegment[],
  ancestors: Set<object>,
  emit: Emit
): Result<void, FormCodecError> {
  const entries = mapEntries(value);
  if (entries.isErr()) {
    entries.error.annotate({ path: renderPath(path) });
    return entries;
  }
  for (const [key, element] of entries.value) {
    if (element === undefined || element === null) continue;
    const result = encodeDynamic(
      element,
      [...path, namedSegment(key)],
      ancestors,
      emit
    );
    if (result.isErr()) return result;
  }
  return ok(undefined);
}

function shapeMismatch(
  descriptor: Descriptor,
  value: unknown,
  path: readonly PathSegment[]
): Result<never, FormCodecError> {
  const label = describe(descriptor);
  return err(
    new UnsupportedKindError({
      message: `cannot encode ${Array.isArray(value) ? 'array' : typeof value} as ${label}`,
      targetType: label,
      path: renderPath(path),
    })
  );
}
