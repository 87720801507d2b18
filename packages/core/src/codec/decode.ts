/**
 * Decode engine: writes one (path, leaf) pair into a typed root.
 *
 * Records and mappings are filled in place; every other slot is rebuilt and
 * stored back by its parent. Within one decode the pairs are applied in
 * payload order, so a repeated scalar keeps the last value and a repeated
 * sequence key appends.
 */

import { renderPath } from '../path/render.js';
import type { PathSegment } from '../path/path-parser.js';
import { defaultSchemaCache, type SchemaCache } from '../schema/schema-cache.js';
import {
  describe,
  type ArrayDescriptor,
  type Descriptor,
  type MapDescriptor,
  type RecordDescriptor,
} from '../types/descriptor.js';
import { getOwn, isDynamicValue, setOwn } from '../types/dynamic.js';
import {
  InvalidRootError,
  InvalidTargetError,
  SequenceSegmentError,
  UnknownFieldError,
  UnsupportedKindError,
  UnsupportedMapKeyError,
  type FormCodecError,
} from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import { didYouMean } from '../errors/suggestions.js';
import { runFromString } from './hooks.js';
import { infer } from './infer.js';
import { parseScalar } from './scalars.js';
import { isObjectRecord, zeroRecord, zeroValue } from './values.js';

export interface AssignContext {
  cache?: SchemaCache;
}

export type RootDescriptor = RecordDescriptor | MapDescriptor;

/**
 * Unwrap an optional root and check that it is a record or a string-keyed
 * mapping.
 */
export function resolveRoot(
  descriptor: Descriptor
): Result<RootDescriptor, FormCodecError> {
  const target =
    descriptor.kind === 'optional' ? descriptor.inner : descriptor;

  if (target.kind === 'record') return ok(target);
  if (target.kind === 'map') {
    const keyCheck = checkMapKey(target, '');
    if (keyCheck.isErr()) return keyCheck;
    return ok(target);
  }
  return err(new InvalidRootError({ targetType: describe(target) }));
}

export function zeroRoot(
  descriptor: RootDescriptor,
  cache: SchemaCache
): Record<string, unknown> {
  return descriptor.kind === 'record' ? zeroRecord(descriptor, cache) : {};
}

/**
 * Assign one leaf into `root` (a record or mapping object) at `path`.
 */
export function assign(
  descriptor: Descriptor,
  root: unknown,
  path: readonly PathSegment[],
  leaf: string,
  context: AssignContext = {}
): Result<void, FormCodecError> {
  const resolved = resolveRoot(descriptor);
  if (resolved.isErr()) return resolved;
  if (!isObjectRecord(root)) {
    return err(
      new InvalidTargetError({
        received: root === null ? 'null' : typeof root,
      })
    );
  }

  const cache = context.cache ?? defaultSchemaCache;
  const result = assignAt(resolved.value, root, path, 0, leaf, cache);
  if (result.isErr()) return result;
  return ok(undefined);
}

function assignAt(
  descriptor: Descriptor,
  current: unknown,
  path: readonly PathSegment[],
  at: number,
  leaf: string,
  cache: SchemaCache
): Result<unknown, FormCodecError> {
  const segment = path[at];

  if (segment === undefined && descriptor.codec) {
    const decoded = runFromString(descriptor.codec, describe(descriptor), leaf);
    if (decoded.isErr()) decoded.error.annotate({ path: renderPath(path) });
    return decoded;
  }

  switch (descriptor.kind) {
    case 'optional': {
      const inner =
        current === undefined || current === null
          ? zeroValue(descriptor.inner, cache)
          : current;
      return assignAt(descriptor.inner, inner, path, at, leaf, cache);
    }
    case 'any':
      return ok(
        infer(isDynamicValue(current) ? current : undefined, path.slice(at), leaf)
      );
    case 'array':
      return assignSequence(descriptor, current, path, at, leaf, cache);
    case 'record':
      if (segment === undefined) return leafIntoComposite(descriptor, path);
      return assignField(descriptor, current, segment, path, at, leaf, cache);
    case 'map':
      if (segment === undefined) return leafIntoComposite(descriptor, path);
      return assignEntry(descriptor, current, segment, path, at, leaf, cache);
    case 'custom':
      return err(
        new UnsupportedKindError({
          message: `cannot descend into ${descriptor.name} with "${renderPath(path)}"`,
          targetType: descriptor.name,
          path: renderPath(path.slice(0, at)),
        })
      );
    default: {
      if (segment !== undefined) {
        return err(
          new UnsupportedKindError({
            message: `cannot descend into ${describe(descriptor)} with "${renderPath(path)}"`,
            targetType: describe(descriptor),
            path: renderPath(path.slice(0, at)),
          })
        );
      }
      const parsed = parseScalar(descriptor, leaf);
      if (parsed.isErr()) parsed.error.annotate({ path: renderPath(path) });
      return parsed;
    }
  }
}

function leafIntoComposite(
  descriptor: RecordDescriptor | MapDescriptor,
  path: readonly PathSegment[]
): Result<never, FormCodecError> {
  const label = describe(descriptor);
  return err(
    new UnsupportedKindError({
      message: `cannot assign a leaf to ${label}`,
      targetType: label,
      path: renderPath(path),
    })
  );
}

/**
 * Each index marker appends one new element. A sequence reached with the
 * path already exhausted also appends, which is how `tags=a&tags=b` fills a
 * mapping of sequences.
 */
function assignSequence(
  descriptor: ArrayDescriptor,
  current: unknown,
  path: readonly PathSegment[],
  at: number,
  leaf: string,
  cache: SchemaCache
): Result<unknown, FormCodecError> {
  const segment = path[at];
  if (segment !== undefined && !segment.isIndex) {
    return err(
      new SequenceSegmentError({
        segment: segment.key,
        targetType: describe(descriptor),
      }).annotate({ path: renderPath(path.slice(0, at + 1)) })
    );
  }

  const sequence: unknown[] = Array.isArray(current) ? current : [];
  const next = segment === undefined ? at : at + 1;
  const element = assignAt(
    descriptor.element,
    undefined,
    path,
    next,
    leaf,
    cache
  );
  if (element.isErr()) return element;
  sequence.push(element.value);
  return ok(sequence);
}

function assignField(
  descriptor: RecordDescriptor,
  current: unknown,
  segment: PathSegment,
  path: readonly PathSegment[],
  at: number,
  leaf: string,
  cache: SchemaCache
): Result<unknown, FormCodecError> {
  const field = cache.lookup(descriptor, segment.key);
  if (!field) {
    const knownFields = cache.namesOf(descriptor);
    return err(
      new UnknownFieldError({
        field: segment.key,
        targetType: descriptor.name,
        knownFields,
        suggestions: didYouMean(segment.key, knownFields),
      }).annotate({ path: renderPath(path.slice(0, at + 1)) })
    );
  }

  const target = isObjectRecord(current)
    ? current
    : zeroRecord(descriptor, cache);
  const value = assignAt(
    field.descriptor,
    getOwn(target, field.key),
    path,
    at + 1,
    leaf,
    cache
  );
  if (value.isErr()) return value;
  setOwn(target, field.key, value.value);
  return ok(target);
}

function assignEntry(
  descriptor: MapDescriptor,
  current: unknown,
  segment: PathSegment,
  path: readonly PathSegment[],
  at: number,
  leaf: string,
  cache: SchemaCache
): Result<unknown, FormCodecError> {
  const keyCheck = checkMapKey(descriptor, renderPath(path.slice(0, at)));
  if (keyCheck.isErr()) return keyCheck;

  const target = isObjectRecord(current) ? current : {};
  const value = assignAt(
    descriptor.element,
    getOwn(target, segment.key),
    path,
    at + 1,
    leaf,
    cache
  );
  if (value.isErr()) return value;
  setOwn(target, segment.key, value.value);
  return ok(target);
}

export function checkMapKey(
  descriptor: MapDescriptor,
  path: string
): Result<void, UnsupportedMapKeyError> {
  if (descriptor.key.kind === 'string') return ok(undefined);
  return err(
    new UnsupportedMapKeyError({
      keyType: describe(descriptor.key),
      path: path === '' ? undefined : path,
    })
  );
}
