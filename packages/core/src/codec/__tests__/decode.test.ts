import { describe, expect, it } from 'vitest';

import { schema } from '../../schema/builders.js';
import { ErrorCode } from '../../errors/codes.js';
import {
  CodecHookError,
  CoercionError,
  FormDataError,
  InputLimitError,
  InvalidRootError,
  InvalidTargetError,
  PathSyntaxError,
  SequenceSegmentError,
  UnknownFieldError,
  UnsupportedKindError,
  UnsupportedMapKeyError,
} from '../../types/errors.js';
import { FormCodec, decode, decodeInto } from '../form-codec.js';
import { expectErr, expectOk } from '../../../../../test/helpers/result-assertions.js';

const Address = schema.record('Address', {
  city: schema.string(),
  zip: schema.field(schema.string(), 'postal_code'),
});

const Person = schema.record('Person', {
  Name: schema.field(schema.string(), 'name'),
  Age: schema.field(schema.int32(), 'age'),
  Email: schema.field(schema.optional(schema.string()), 'email'),
  Address: schema.field(Address, 'address'),
  Tags: schema.field(schema.array(schema.string()), 'tags'),
  Secret: schema.field(schema.string(), '-'),
});

type Animal = 'unknown' | 'gopher' | 'zebra';

const AnimalType = schema.custom<Animal>('Animal', {
  toString: (value) => value,
  fromString: (text) => {
    if (text === 'gopher' || text === 'zebra') return text;
    throw new Error(`unknown animal "${text}"`);
  },
  zero: () => 'unknown',
});

const Pet = schema.record('Pet', {
  ownerName: schema.field(schema.string(), 'owner_name'),
  petType: schema.field(AnimalType, 'pet_type,omitempty'),
});

describe('decode', () => {
  it('fills a record from named and nested keys', () => {
    const person = expectOk(
      decode(
        'name=Alice&age=30&address[city]=Paris&address[postal_code]=75001&tags[]=a&tags[]=b',
        Person
      )
    );

    expect(person).toEqual({
      Name: 'Alice',
      Age: 30,
      Email: undefined,
      Address: { city: 'Paris', zip: '75001' },
      Tags: ['a', 'b'],
      Secret: '',
    });
  });

  it('starts from the zero value of every field', () => {
    expect(expectOk(decode('name=Bob', Person))).toEqual({
      Name: 'Bob',
      Age: 0,
      Email: undefined,
      Address: { city: '', zip: '' },
      Tags: [],
      Secret: '',
    });
  });

  it('keeps the last value of a repeated scalar key', () => {
    expect(expectOk(decode('name=A&name=B', Person)).Name).toBe('B');
  });

  it('reads an empty leaf as the zero value', () => {
    expect(expectOk(decode('age=', Person)).Age).toBe(0);
  });

  it('allocates an optional on first assignment', () => {
    expect(expectOk(decode('email=a%40b.test', Person)).Email).toBe('a@b.test');
  });

  it('appends to a sequence addressed without a marker', () => {
    expect(expectOk(decode('tags=red&tags=web', Person)).Tags).toEqual([
      'red',
      'web',
    ]);
  });

  it('uses a custom codec for its field', () => {
    expect(
      expectOk(decode('owner_name=Alice&pet_type=gopher', Pet))
    ).toEqual({ ownerName: 'Alice', petType: 'gopher' });
  });

  it('builds records inside sequences one element per marker', () => {
    const Item = schema.record('Item', { id: schema.int() });
    const Order = schema.record('Order', { items: schema.array(Item) });

    expect(
      expectOk(decode('items[][id]=1&items[][id]=2', Order))
    ).toEqual({ items: [{ id: 1 }, { id: 2 }] });
  });

  it('infers the shape of dynamic fields from the path', () => {
    const Envelope = schema.record('Envelope', {
      kind: schema.string(),
      extra: schema.any(),
    });

    expect(
      expectOk(
        decode('kind=x&extra[a][]=1&extra[a][]=2&extra[b][c]=3', Envelope)
      )
    ).toEqual({ kind: 'x', extra: { a: ['1', '2'], b: { c: '3' } } });
  });

  describe('mapping roots', () => {
    it('decodes any shape into a dynamic map', () => {
      expect(
        expectOk(decode('a=1&b[c]=2&d[]=x', schema.map(schema.any())))
      ).toEqual({ a: '1', b: { c: '2' }, d: ['x'] });
    });

    it('groups repeated keys into a map of sequences', () => {
      expect(
        expectOk(
          decode(
            'tags=red&tags=blue&more[]=x',
            schema.map(schema.array(schema.string()))
          )
        )
      ).toEqual({ tags: ['red', 'blue'], more: ['x'] });
    });

    it('coerces typed map elements', () => {
      expect(
        expectOk(decode('a=1&b=-2', schema.map(schema.int())))
      ).toEqual({ a: 1, b: -2 });
    });

    it('accepts an optional root', () => {
      expect(
        expectOk(decode('a=1', schema.optional(schema.map(schema.string()))))
      ).toEqual({ a: '1' });
    });
  });

  describe('errors', () => {
    it('names an unknown field and suggests close matches', () => {
      const error = expectErr(decode('nmae=x', Person));

      expect(error).toBeInstanceOf(UnknownFieldError);
      expect(error.errorCode).toBe(ErrorCode.UNKNOWN_FIELD);
      expect(error.message).toBe('unknown field "nmae" in record Person');
      expect(error.suggestions).toEqual(['name', 'email']);
      expect(error.context).toEqual({
        field: 'nmae',
        targetType: 'Person',
        suggestion: 'Did you mean "name"?',
        path: 'nmae',
        key: 'nmae',
      });
    });

    it('does not match the declared identifier or an ignored field', () => {
      expect(expectErr(decode('Name=x', Person))).toBeInstanceOf(
        UnknownFieldError
      );
      expect(expectErr(decode('Secret=x', Person))).toBeInstanceOf(
        UnknownFieldError
      );
    });

    it('reports the nested field path of an unknown field', () => {
      const error = expectErr(decode('address[town]=x', Person));

      expect(error.message).toBe('unknown field "town" in record Address');
      expect(error.context.path).toBe('address[town]');
      expect(error.context.key).toBe('address[town]');
    });

    it('reports coercion failures with the key', () => {
      const error = expectErr(decode('name=A&age=abc', Person));

      expect(error).toBeInstanceOf(CoercionError);
      expect(error.message).toBe('cannot parse "abc" as int32: invalid syntax');
      expect(error.context.key).toBe('age');
      expect(error.context.path).toBe('age');
    });

    it('rejects a named segment on a sequence', () => {
      const error = expectErr(decode('tags[x]=1', Person));

      expect(error).toBeInstanceOf(SequenceSegmentError);
      expect(error.errorCode).toBe(ErrorCode.SEQUENCE_EXPECTS_INDEX);
      expect(error.message).toBe('expected sequence index "[]", got "[x]"');
      expect(error.context.path).toBe('tags[x]');
    });

    it('rejects an unterminated bracket', () => {
      const error = expectErr(decode('address[city=x', Person));

      expect(error).toBeInstanceOf(PathSyntaxError);
      expect(error.context).toEqual({ key: 'address[city', position: 7 });
    });

    it('rejects a leading bracket under a record root', () => {
      const error = expectErr(decode('[name]=x', Person));

      expect(error).toBeInstanceOf(PathSyntaxError);
      expect(error.message).toBe(
        'invalid key syntax: "[name]" must start with a field name'
      );
    });

    it('rejects a leaf written into a record', () => {
      const error = expectErr(decode('address=x', Person));

      expect(error).toBeInstanceOf(UnsupportedKindError);
      expect(error.message).toBe('cannot assign a leaf to Address');
    });

    it('rejects a path that descends into a scalar', () => {
      const error = expectErr(decode('age[x]=1', Person));

      expect(error).toBeInstanceOf(UnsupportedKindError);
      expect(error.message).toBe('cannot descend into int32 with "age[x]"');
    });

    it('rejects a root that is not a record or mapping', () => {
      const error = expectErr(decode('a=1', schema.array(schema.string())));

      expect(error).toBeInstanceOf(InvalidRootError);
      expect(error.message).toBe(
        'top-level value must be a record or map, got array<string>'
      );
    });

    it('rejects non-string map keys', () => {
      const error = expectErr(
        decode('a=1', schema.map(schema.string(), schema.int()))
      );

      expect(error).toBeInstanceOf(UnsupportedMapKeyError);
      expect(error.message).toBe('map keys must be strings, got int');
    });

    it('rejects empty input', () => {
      for (const input of ['', '   ']) {
        const error = expectErr(decode(input, Person));
        expect(error).toBeInstanceOf(FormDataError);
        expect(error.errorCode).toBe(ErrorCode.EMPTY_INPUT);
      }
    });

    it('wraps a failing custom codec', () => {
      const error = expectErr(decode('pet_type=cat', Pet));

      expect(error).toBeInstanceOf(CodecHookError);
      expect(error.errorCode).toBe(ErrorCode.CODEC_HOOK_FAILED);
      expect(error.message).toBe('unknown animal "cat"');
      expect(error.cause).toBeInstanceOf(Error);
      expect(error.context.key).toBe('pet_type');
      if (error instanceof CodecHookError) {
        expect(error.hook).toBe('fromString');
      }
    });

    it('passes through a formcodec error thrown by a codec', () => {
      const thrown = new CoercionError({
        message: 'bad level',
        targetType: 'Level',
        value: 'x',
      });
      const Level = schema.custom<number>('Level', {
        toString: String,
        fromString: () => {
          throw thrown;
        },
        zero: () => 0,
      });
      const Task = schema.record('Task', { level: Level });

      expect(expectErr(decode('level=x', Task))).toBe(thrown);
    });

    it('does not write keys into an error a codec throws repeatedly', () => {
      const thrown = new CoercionError({
        message: 'bad level',
        targetType: 'Level',
        value: 'x',
      });
      const Level = schema.custom<number>('Level', {
        toString: String,
        fromString: () => {
          throw thrown;
        },
        zero: () => 0,
      });
      const Pair = schema.record('Pair', { a: Level, b: Level });

      expect(expectErr(decode('a=x', Pair))).toBe(thrown);
      expect(expectErr(decode('b=x', Pair))).toBe(thrown);
      expect(thrown.context.key).toBeUndefined();
      expect(thrown.context.path).toBeUndefined();
    });

    it('stops at the first failing pair', () => {
      const error = expectErr(decode('age=x&nope=1', Person));
      expect(error).toBeInstanceOf(CoercionError);
    });
  });

  describe('guards', () => {
    it('limits path depth', () => {
      const codec = new FormCodec({ guards: { maxPathDepth: 2 } });
      const error = expectErr(codec.decode('a[b][c]=1', schema.map(schema.any())));

      expect(error).toBeInstanceOf(InputLimitError);
      expect(error.message).toBe('input exceeds guards.maxPathDepth (3 > 2)');
      expect(error.context.key).toBe('a[b][c]');
    });

    it('limits the number of pairs', () => {
      const codec = new FormCodec({ guards: { maxPairs: 2 } });
      const error = expectErr(codec.decode('a=1&b=2&c=3', schema.map(schema.any())));

      expect(error.message).toBe('input exceeds guards.maxPairs (3 > 2)');
    });
  });
});

describe('decodeInto', () => {
  it('keeps fields the payload does not mention', () => {
    const target = {
      Name: 'Keep',
      Age: 1,
      Email: undefined,
      Address: { city: 'Oslo', zip: '0150' },
      Tags: ['x'],
      Secret: 's',
    };
    const result = expectOk(
      decodeInto(target, 'age=2&address[city]=Bergen&tags[]=y', Person)
    );

    expect(result).toBe(target);
    expect(target).toEqual({
      Name: 'Keep',
      Age: 2,
      Email: undefined,
      Address: { city: 'Bergen', zip: '0150' },
      Tags: ['x', 'y'],
      Secret: 's',
    });
  });

  it('applies no pair after the first failure', () => {
    const target = {
      Name: 'orig',
      Age: 7,
      Email: undefined,
      Address: { city: '', zip: '' },
      Tags: [],
      Secret: '',
    };

    const error = expectErr(decodeInto(target, 'bogus=1&name=x&age=9', Person));

    expect(error).toBeInstanceOf(UnknownFieldError);
    expect(error.context.key).toBe('bogus');
    expect(target.Name).toBe('orig');
    expect(target.Age).toBe(7);
  });

  it('rejects a target that is not an object', () => {
    const fromNull = expectErr(decodeInto(null, 'name=x', Person));
    expect(fromNull).toBeInstanceOf(InvalidTargetError);
    expect(fromNull.message).toBe('decode target must be an object, got null');

    const fromArray = expectErr(decodeInto([], 'name=x', Person));
    expect(fromArray.message).toBe(
      'decode target must be a non-null object, got array'
    );
  });
});

describe('decodePairs', () => {
  it('decodes pairs that were never escaped', () => {
    const codec = new FormCodec();
    expect(
      expectOk(
        codec.decodePairs(
          [
            { key: 'a&b', value: 'x=y' },
            { key: 'c', value: '+' },
          ],
          schema.map(schema.string())
        )
      )
    ).toEqual({ 'a&b': 'x=y', c: '+' });
  });
});
