/**
 * Shape inference for `any` slots.
 *
 * The path alone decides the shape: a named segment makes a mapping, an index
 * marker appends to a sequence, an exhausted path stores the raw leaf string.
 * A slot holding the wrong shape is replaced, so inference never fails.
 */

import type { PathSegment } from '../path/path-parser.js';
import {
  getOwn,
  isDynamicMap,
  setOwn,
  type DynamicMap,
  type DynamicValue,
} from '../types/dynamic.js';

export function infer(
  existing: DynamicValue | undefined,
  path: readonly PathSegment[],
  leaf: string
): DynamicValue {
  return inferAt(existing, path, 0, leaf);
}

function inferAt(
  existing: DynamicValue | undefined,
  path: readonly PathSegment[],
  at: number,
  leaf: string
): DynamicValue {
  const segment = path[at];
  if (segment === undefined) return leaf;

  if (segment.isIndex) {
    const sequence = Array.isArray(existing) ? existing : [];
    sequence.push(inferAt(undefined, path, at + 1, leaf));
    return sequence;
  }

  const mapping: DynamicMap = isDynamicMap(existing) ? existing : {};
  setOwn(
    mapping,
    segment.key,
    inferAt(getOwn(mapping, segment.key), path, at + 1, leaf)
  );
  return mapping;
}
