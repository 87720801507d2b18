/**
 * Scalar coercion between leaf strings and typed values.
 *
 * Parsing is strict decimal: no hex, no digit separators, no surrounding
 * whitespace. An empty leaf is the zero value of the target. Integer ranges
 * are checked exactly through bigint.
 */

import type {
  BigIntDescriptor,
  FloatDescriptor,
  IntegerDescriptor,
  ScalarDescriptor,
} from '../types/descriptor.js';
import { describe } from '../types/descriptor.js';
import { CoercionError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';

const SIGNED_DIGITS = /^[+-]?\d+$/;
const UNSIGNED_DIGITS = /^\d+$/;
const DECIMAL_FLOAT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const INFINITY_LITERAL = /^([+-]?)(?:inf|infinity)$/i;
const NAN_LITERAL = /^nan$/i;

const TRUE_LITERALS = new Set(['1', 't', 'T', 'TRUE', 'true', 'True']);
const FALSE_LITERALS = new Set(['0', 'f', 'F', 'FALSE', 'false', 'False']);

export function parseScalar(
  descriptor: ScalarDescriptor,
  text: string
): Result<string | number | bigint | boolean, CoercionError> {
  switch (descriptor.kind) {
    case 'string':
      return ok(text);
    case 'integer':
      return parseInteger(descriptor, text);
    case 'bigint':
      return parseBigInt(descriptor, text);
    case 'float':
      return parseFloatValue(descriptor, text);
    case 'boolean':
      return parseBoolean(text);
  }
}

function integerBounds(
  bits: 8 | 16 | 32 | 53 | 64,
  signed: boolean
): [bigint, bigint] {
  if (bits === 53) {
    const max = BigInt(Number.MAX_SAFE_INTEGER);
    return [signed ? -max : 0n, max];
  }
  const width = BigInt(bits);
  return signed
    ? [-(1n << (width - 1n)), (1n << (width - 1n)) - 1n]
    : [0n, (1n << width) - 1n];
}

function parseBoundedInteger(
  label: string,
  bits: 8 | 16 | 32 | 53 | 64,
  signed: boolean,
  text: string
): Result<bigint, CoercionError> {
  if (text === '') return ok(0n);

  const pattern = signed ? SIGNED_DIGITS : UNSIGNED_DIGITS;
  if (!pattern.test(text)) {
    return err(
      new CoercionError({
        message: `cannot parse "${text}" as ${label}: invalid syntax`,
        targetType: label,
        value: text,
      })
    );
  }

  const parsed = BigInt(text);
  const [min, max] = integerBounds(bits, signed);
  if (parsed < min || parsed > max) {
    return err(
      new CoercionError({
        message: `cannot parse "${text}" as ${label}: value out of range`,
        targetType: label,
        value: text,
      })
    );
  }
  return ok(parsed);
}

function parseInteger(
  descriptor: IntegerDescriptor,
  text: string
): Result<number, CoercionError> {
  const parsed = parseBoundedInteger(
    describe(descriptor),
    descriptor.bits,
    descriptor.signed,
    text
  );
  if (parsed.isErr()) return parsed;
  return ok(Number(parsed.value));
}

function parseBigInt(
  descriptor: BigIntDescriptor,
  text: string
): Result<bigint, CoercionError> {
  return parseBoundedInteger(
    describe(descriptor),
    64,
    descriptor.signed,
    text
  );
}

function parseFloatValue(
  descriptor: FloatDescriptor,
  text: string
): Result<number, CoercionError> {
  const label = describe(descriptor);
  if (text === '') return ok(0);

  const infinity = INFINITY_LITERAL.exec(text);
  if (infinity) {
    return ok(infinity[1] === '-' ? -Infinity : Infinity);
  }
  if (NAN_LITERAL.test(text)) return ok(NaN);

  if (!DECIMAL_FLOAT.test(text)) {
    return err(
      new CoercionError({
        message: `cannot parse "${text}" as ${label}: invalid syntax`,
        targetType: label,
        value: text,
      })
    );
  }

  const wide = Number(text);
  const value = descriptor.bits === 32 ? Math.fround(wide) : wide;
  if (!Number.isFinite(value)) {
    return err(
      new CoercionError({
        message: `cannot parse "${text}" as ${label}: value out of range`,
        targetType: label,
        value: text,
      })
    );
  }
  return ok(value);
}

function parseBoolean(text: string): Result<boolean, CoercionError> {
  if (text === '' || FALSE_LITERALS.has(text)) return ok(false);
  if (TRUE_LITERALS.has(text)) return ok(true);
  return err(
    new CoercionError({
      message: `cannot parse "${text}" as bool: invalid syntax`,
      targetType: 'bool',
      value: text,
    })
  );
}

/**
 * Typed value → leaf string. Fails when the runtime value does not fit the
 * descriptor (e.g. a fraction in an integer slot).
 */
export function formatScalar(
  descriptor: ScalarDescriptor,
  value: unknown
): Result<string, CoercionError> {
  const label = describe(descriptor);
  const mismatch = (expected: string): Result<string, CoercionError> =>
    err(
      new CoercionError({
        message: `cannot format ${typeof value} as ${label}: expected ${expected}`,
        targetType: label,
        value: String(value),
      })
    );

  switch (descriptor.kind) {
    case 'string':
      return typeof value === 'string' ? ok(value) : mismatch('string');
    case 'integer': {
      if (typeof value !== 'number' || !Number.isInteger(value)) {
        return mismatch('integer');
      }
      const range = checkRange(
        label,
        integerBounds(descriptor.bits, descriptor.signed),
        BigInt(value)
      );
      return range.isErr() ? range : ok(formatInteger(value));
    }
    case 'bigint': {
      if (typeof value !== 'bigint') return mismatch('bigint');
      const range = checkRange(
        label,
        integerBounds(64, descriptor.signed),
        value
      );
      return range.isErr() ? range : ok(value.toString());
    }
    case 'float':
      if (typeof value !== 'number') return mismatch('number');
      return ok(
        descriptor.bits === 32 ? formatFloat32(value) : formatFloat64(value)
      );
    case 'boolean':
      return typeof value === 'boolean'
        ? ok(value ? 'true' : 'false')
        : mismatch('boolean');
  }
}

// Encoded integers must decode back into the same width
function checkRange(
  label: string,
  [min, max]: [bigint, bigint],
  value: bigint
): Result<void, CoercionError> {
  if (value >= min && value <= max) return ok(undefined);
  return err(
    new CoercionError({
      message: `cannot format ${value.toString()} as ${label}: value out of range`,
      targetType: label,
      value: value.toString(),
    })
  );
}

function formatInteger(value: number): string {
  return Object.is(value, -0) ? '0' : toPlainDecimal(String(value));
}

/**
 * Shortest decimal that reads back to the same double, never in exponent
 * notation.
 */
export function formatFloat64(value: number): string {
  const special = formatSpecial(value);
  if (special !== undefined) return special;
  if (Object.is(value, -0)) return '-0';
  return toPlainDecimal(String(value));
}

/**
 * Shortest decimal that reads back to the same single-precision value.
 */
export function formatFloat32(value: number): string {
  const special = formatSpecial(value);
  if (special !== undefined) return special;
  if (Object.is(value, -0)) return '-0';

  const target = Math.fround(value);
  for (let precision = 1; precision <= 9; precision++) {
    const candidate = target.toPrecision(precision);
    if (Math.fround(Number(candidate)) === target) {
      return toPlainDecimal(String(Number(candidate)));
    }
  }
  return toPlainDecimal(String(target));
}

function formatSpecial(value: number): string | undefined {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return '+Inf';
  if (value === -Infinity) return '-Inf';
  return undefined;
}

/**
 * Expand `1.5e+21` / `1e-7` into positional notation.
 */
export function toPlainDecimal(text: string): string {
  const match = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) return text;

  const [, sign = '', whole = '', fraction = '', exponentText = '0'] = match;
  const digits = whole + fraction;
  const point = whole.length + Number(exponentText);

  let body: string;
  if (point <= 0) {
    body = `0.${'0'.repeat(-point)}${digits}`;
  } else if (point >= digits.length) {
    body = digits + '0'.repeat(point - digits.length);
  } else {
    body = `${digits.slice(0, point)}.${digits.slice(point)}`;
  }
  return sign + body;
}
