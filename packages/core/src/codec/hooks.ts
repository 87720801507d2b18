/**
 * Custom codec invocation. A FormCodecError thrown by a hook propagates as-is
 * and is never annotated; anything else is wrapped so callers always receive a
 * FormCodecError.
 */

import type { StringCodec } from '../types/descriptor.js';
import {
  CodecHookError,
  isFormCodecError,
  markCallerOwned,
  type FormCodecError,
} from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';

function toError(thrown: unknown): Error {
  return thrown instanceof Error ? thrown : new Error(String(thrown));
}

export function runFromString(
  codec: StringCodec<unknown>,
  targetType: string,
  text: string
): Result<unknown, FormCodecError> {
  try {
    return ok(codec.fromString(text));
  } catch (thrown) {
    if (isFormCodecError(thrown)) return err(markCallerOwned(thrown));
    return err(
      new CodecHookError({
        hook: 'fromString',
        targetType,
        cause: toError(thrown),
        value: text,
      })
    );
  }
}

export function runToString(
  codec: StringCodec<unknown>,
  targetType: string,
  value: unknown
): Result<string, FormCodecError> {
  try {
    return ok(codec.toString(value));
  } catch (thrown) {
    if (isFormCodecError(thrown)) return err(markCallerOwned(thrown));
    return err(
      new CodecHookError({
        hook: 'toString',
        targetType,
        cause: toError(thrown),
      })
    );
  }
}
