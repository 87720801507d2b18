/**
 * Descriptor builders
 *
 * `schema.*` is the usual way to declare a target shape:
 *
 *   const Person = schema.record('Person', {
 *     name: schema.string(),
 *     age: schema.field(schema.int(), 'age,omitempty'),
 *     tags: schema.map(schema.array(schema.string())),
 *   });
 *
 * Builders return frozen descriptors. Record identity is object
 * identity, so build a record once and reuse it.
 */

import type {
  ArrayDescriptor,
  BigIntDescriptor,
  BooleanDescriptor,
  CustomCodec,
  CustomDescriptor,
  Descriptor,
  DynamicDescriptor,
  FieldDescriptor,
  FieldMap,
  FloatDescriptor,
  Infer,
  IntegerBits,
  IntegerDescriptor,
  MapDescriptor,
  OptionalDescriptor,
  RecordDescriptor,
  StringCodec,
  StringDescriptor,
} from '../types/descriptor.js';

function string(): StringDescriptor {
  return Object.freeze({ kind: 'string' });
}

function int(bits: IntegerBits = 53): IntegerDescriptor {
  return Object.freeze({ kind: 'integer', bits, signed: true });
}

function uint(bits: IntegerBits = 53): IntegerDescriptor {
  return Object.freeze({ kind: 'integer', bits, signed: false });
}

function int64(): BigIntDescriptor {
  return Object.freeze({ kind: 'bigint', signed: true });
}

function uint64(): BigIntDescriptor {
  return Object.freeze({ kind: 'bigint', signed: false });
}

function float32(): FloatDescriptor {
  return Object.freeze({ kind: 'float', bits: 32 });
}

function float64(): FloatDescriptor {
  return Object.freeze({ kind: 'float', bits: 64 });
}

function bool(): BooleanDescriptor {
  return Object.freeze({ kind: 'boolean' });
}

function any(): DynamicDescriptor {
  return Object.freeze({ kind: 'any' });
}

function optional<D extends Descriptor>(inner: D): OptionalDescriptor<D> {
  return Object.freeze({ kind: 'optional', inner });
}

function array<D extends Descriptor>(element: D): ArrayDescriptor<D> {
  return Object.freeze({ kind: 'array', element });
}

function map<D extends Descriptor>(
  element: D
): MapDescriptor<D, StringDescriptor>;
function map<D extends Descriptor, K extends Descriptor>(
  element: D,
  key: K
): MapDescriptor<D, K>;
function map(element: Descriptor, key: Descriptor = string()): MapDescriptor {
  return Object.freeze({ kind: 'map', element, key });
}

function record<F extends FieldMap>(
  name: string,
  fields: F
): RecordDescriptor<F> {
  return Object.freeze({ kind: 'record', name, fields });
}

/**
 * Attach a declaration tag to a record field, e.g. `'name,omitempty'` or `'-'`.
 */
function field<D extends Descriptor>(
  descriptor: D,
  tag: string
): FieldDescriptor<D> {
  return Object.freeze({ kind: 'field', descriptor, tag });
}

/**
 * A named type that exists only through its string codec.
 */
function custom<T>(name: string, codec: CustomCodec<T>): CustomDescriptor<T> {
  return Object.freeze({ kind: 'custom', name, codec });
}

/**
 * Give an existing descriptor a string codec. The result is a new descriptor;
 * the input is left untouched.
 */
function withCodec<D extends Descriptor>(
  descriptor: D,
  codec: StringCodec<Infer<D>>
): D {
  return { ...descriptor, codec };
}

export const schema = {
  string,
  int,
  int8: (): IntegerDescriptor => int(8),
  int16: (): IntegerDescriptor => int(16),
  int32: (): IntegerDescriptor => int(32),
  int64,
  uint,
  uint8: (): IntegerDescriptor => uint(8),
  uint16: (): IntegerDescriptor => uint(16),
  uint32: (): IntegerDescriptor => uint(32),
  uint64,
  float32,
  float64,
  bool,
  any,
  optional,
  array,
  map,
  record,
  field,
  custom,
  withCodec,
} as const;
