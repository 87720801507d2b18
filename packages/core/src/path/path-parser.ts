/**
 * Flat key → path segments
 *
 *   "a[b][]" → [name a, name b, index]
 *
 * Text outside brackets becomes a named segment; an empty bracket pair is an
 * index marker. A `[` without a closing `]` is the only syntax error. Segment
 * contents are taken verbatim: no escaping, no nesting, no `[` inside a name.
 */

import { PathSyntaxError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';

export interface PathSegment {
  /** Field or mapping key; empty for the index marker */
  readonly key: string;
  readonly isIndex: boolean;
}

export const INDEX_SEGMENT: PathSegment = Object.freeze({
  key: '',
  isIndex: true,
});

export function namedSegment(key: string): PathSegment {
  return { key, isIndex: false };
}

export function parseKey(
  rawKey: string
): Result<PathSegment[], PathSyntaxError> {
  const segments: PathSegment[] = [];
  let cursor = 0;

  while (cursor < rawKey.length) {
    const open = rawKey.indexOf('[', cursor);
    if (open === -1) {
      segments.push(namedSegment(rawKey.slice(cursor)));
      break;
    }
    if (open > cursor) {
      segments.push(namedSegment(rawKey.slice(cursor, open)));
    }

    const close = rawKey.indexOf(']', open + 1);
    if (close === -1) {
      return err(
        new PathSyntaxError({
          message: `invalid key syntax: unterminated "[" at offset ${open} in "${rawKey}"`,
          context: { key: rawKey, position: open },
        })
      );
    }

    segments.push(
      close === open + 1
        ? INDEX_SEGMENT
        : namedSegment(rawKey.slice(open + 1, close))
    );
    cursor = close + 1;
  }

  return ok(segments);
}
