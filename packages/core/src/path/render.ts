import type { PathSegment } from './path-parser.js';

/**
 * Path segments → flat key. The first segment is written bare, the rest in
 * brackets, index markers as `[]`.
 */
export function renderPath(segments: readonly PathSegment[]): string {
  let out = '';
  segments.forEach((segment, position) => {
    if (position === 0) {
      out += segment.isIndex ? '' : segment.key;
    } else {
      out += segment.isIndex ? '[]' : `[${segment.key}]`;
    }
  });
  return out;
}
