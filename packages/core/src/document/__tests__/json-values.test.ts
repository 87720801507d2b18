import { describe, expect, it } from 'vitest';

import { schema } from '../../schema/builders.js';
import { CodecHookError, CoercionError } from '../../types/errors.js';
import { jsonReplacer, valueFromJson } from '../json-values.js';
import { expectErr, expectOk } from '../../../../../test/helpers/result-assertions.js';

const Invoice = schema.record('Invoice', {
  id: schema.field(schema.uint64(), 'id'),
  note: schema.optional(schema.string()),
  lines: schema.array(schema.record('Line', { qty: schema.int() })),
  totals: schema.map(schema.int64()),
});

describe('valueFromJson', () => {
  it('reads 64-bit integers from strings and safe numbers', () => {
    expect(
      expectOk(
        valueFromJson(Invoice, {
          id: '18446744073709551615',
          note: null,
          lines: [{ qty: 2 }],
          totals: { net: 5 },
        })
      )
    ).toEqual({
      id: 18446744073709551615n,
      note: undefined,
      lines: [{ qty: 2 }],
      totals: { net: 5n },
    });
  });

  it('rejects an unsafe number for a 64-bit slot', () => {
    const error = expectErr(valueFromJson(schema.int64(), 2 ** 60));

    expect(error).toBeInstanceOf(CoercionError);
    expect(error.message).toBe('cannot read number from JSON as int64');
  });

  it('rejects a container of the wrong shape', () => {
    expect(expectErr(valueFromJson(Invoice, [])).message).toBe(
      'cannot read array from JSON as Invoice'
    );
    expect(
      expectErr(valueFromJson(schema.array(schema.string()), 'x')).message
    ).toBe('cannot read string from JSON as array<string>');
  });

  it('runs a codec on wire-form strings', () => {
    const Flag = schema.custom<boolean>('Flag', {
      toString: (value) => (value ? 'on' : 'off'),
      fromString: (text) => {
        if (text !== 'on' && text !== 'off') throw new Error(`bad flag "${text}"`);
        return text === 'on';
      },
      zero: () => false,
    });

    expect(expectOk(valueFromJson(Flag, 'on'))).toBe(true);
    expect(expectErr(valueFromJson(Flag, 'maybe'))).toBeInstanceOf(CodecHookError);
  });
});

describe('jsonReplacer', () => {
  it('writes bigints as decimal strings', () => {
    expect(JSON.stringify({ id: 12n, n: 1 }, jsonReplacer)).toBe(
      '{"id":"12","n":1}'
    );
  });
});
