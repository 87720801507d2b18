/**
 * Flat multimap: the ordered (key, value) pairs of a form-urlencoded payload.
 *
 * parseFlat splits on `&`, then on the first `=`, reads `+` as a space and
 * percent-decodes both sides. serializeFlat is its inverse and uses
 * URLSearchParams for escaping.
 */

import { Buffer } from 'node:buffer';

import { DEFAULT_OPTIONS, type ResolvedOptions } from '../types/options.js';
import { ErrorCode } from '../errors/codes.js';
import {
  FormDataError,
  InputLimitError,
  type FormCodecError,
} from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';

export interface FlatPair {
  readonly key: string;
  readonly value: string;
}

export type FlatMultimap = FlatPair[];

export type ParseFlatOptions = Partial<
  Pick<ResolvedOptions, 'trimInput' | 'guards'>
>;

export type SerializeFlatOptions = Partial<Pick<ResolvedOptions, 'sortKeys'>>;

export function parseFlat(
  text: string,
  options: ParseFlatOptions = {}
): Result<FlatMultimap, FormCodecError> {
  const trimInput = options.trimInput ?? DEFAULT_OPTIONS.trimInput;
  const guards = options.guards ?? DEFAULT_OPTIONS.guards;

  const bytes = Buffer.byteLength(text, 'utf8');
  if (bytes > guards.maxInputBytes) {
    return err(
      new InputLimitError({
        guard: 'maxInputBytes',
        limit: guards.maxInputBytes,
        actual: bytes,
      })
    );
  }

  if (text.trim() === '') {
    return err(
      new FormDataError({
        message: 'empty input',
        errorCode: ErrorCode.EMPTY_INPUT,
      })
    );
  }

  const input = trimInput ? text.trim() : text;
  const pairs: FlatMultimap = [];
  let offset = 0;

  for (const chunk of input.split('&')) {
    const position = offset;
    offset += chunk.length + 1;
    if (chunk === '') continue;

    if (pairs.length === guards.maxPairs) {
      return err(
        new InputLimitError({
          guard: 'maxPairs',
          limit: guards.maxPairs,
          actual: countPairs(input),
        })
      );
    }

    const separator = chunk.indexOf('=');
    const rawKey = separator === -1 ? chunk : chunk.slice(0, separator);
    const rawValue = separator === -1 ? '' : chunk.slice(separator + 1);

    const key = unescapeComponent(rawKey, position);
    if (key.isErr()) return key;
    const value = unescapeComponent(
      rawValue,
      position + (separator === -1 ? chunk.length : separator + 1)
    );
    if (value.isErr()) return value;

    pairs.push({ key: key.value, value: value.value });
  }

  return ok(pairs);
}

function countPairs(input: string): number {
  return input.split('&').filter((chunk) => chunk !== '').length;
}

function unescapeComponent(
  raw: string,
  position: number
): Result<string, FormDataError> {
  try {
    return ok(decodeURIComponent(raw.replace(/\+/g, ' ')));
  } catch (error) {
    return err(
      new FormDataError({
        message: `invalid percent-escape in "${raw}"`,
        context: { position, value: raw },
        cause: error instanceof Error ? error : undefined,
      })
    );
  }
}

/**
 * Pairs → payload. With `sortKeys` (the default) pairs are stably sorted by
 * key, so values under one key keep their relative order.
 */
export function serializeFlat(
  pairs: readonly FlatPair[],
  options: SerializeFlatOptions = {}
): string {
  const sortKeys = options.sortKeys ?? DEFAULT_OPTIONS.sortKeys;
  const ordered = sortKeys ? sortPairs(pairs) : pairs;
  const params = new URLSearchParams();
  for (const pair of ordered) {
    params.append(pair.key, pair.value);
  }
  // Query escaping keeps `~` literal and escapes `*`
  return params.toString().replace(/\*|%7E/g, (match) =>
    match === '*' ? '%2A' : '~'
  );
}

export function sortPairs(pairs: readonly FlatPair[]): FlatPair[] {
  return [...pairs].sort((left, right) =>
    left.key < right.key ? -1 : left.key > right.key ? 1 : 0
  );
}
