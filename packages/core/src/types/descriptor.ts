/**
 * Type descriptors
 *
 * A descriptor is the runtime description of a target shape. Both engines
 * dispatch on `kind`; records additionally go through the SchemaCache for
 * their field tags. Descriptors are immutable and their object identity is
 * the record type identity.
 */

import type { DynamicValue } from './dynamic.js';

/**
 * Custom string codec attached to a descriptor. Checked before any structural
 * or built-in scalar dispatch on both decode and encode.
 */
export interface StringCodec<T> {
  toString(value: T): string;
  fromString(text: string): T;
  zero?(): T;
}

export interface CustomCodec<T> extends StringCodec<T> {
  zero(): T;
}

/** 53 stands for the safe-integer range of a JS number */
export type IntegerBits = 8 | 16 | 32 | 53;
export type FloatBits = 32 | 64;

interface DescriptorBase {
  readonly codec?: StringCodec<unknown>;
}

export interface StringDescriptor extends DescriptorBase {
  readonly kind: 'string';
}

export interface IntegerDescriptor extends DescriptorBase {
  readonly kind: 'integer';
  readonly bits: IntegerBits;
  readonly signed: boolean;
}

/** 64-bit integers, carried as bigint */
export interface BigIntDescriptor extends DescriptorBase {
  readonly kind: 'bigint';
  readonly signed: boolean;
}

export interface FloatDescriptor extends DescriptorBase {
  readonly kind: 'float';
  readonly bits: FloatBits;
}

export interface BooleanDescriptor extends DescriptorBase {
  readonly kind: 'boolean';
}

/** A slot whose shape is only known once the path reaches it */
export interface DynamicDescriptor extends DescriptorBase {
  readonly kind: 'any';
}

export interface OptionalDescriptor<D extends Descriptor = Descriptor>
  extends DescriptorBase {
  readonly kind: 'optional';
  readonly inner: D;
}

export interface ArrayDescriptor<D extends Descriptor = Descriptor>
  extends DescriptorBase {
  readonly kind: 'array';
  readonly element: D;
}

export interface MapDescriptor<
  D extends Descriptor = Descriptor,
  K extends Descriptor = Descriptor,
> extends DescriptorBase {
  readonly kind: 'map';
  readonly element: D;
  readonly key: K;
}

/** A record field with its declaration tag (see parseTag) */
export interface FieldDescriptor<D extends Descriptor = Descriptor> {
  readonly kind: 'field';
  readonly descriptor: D;
  readonly tag: string;
}

export type FieldSpec = Descriptor | FieldDescriptor;
export type FieldMap = Readonly<Record<string, FieldSpec>>;

export interface RecordDescriptor<F extends FieldMap = FieldMap>
  extends DescriptorBase {
  readonly kind: 'record';
  readonly name: string;
  readonly fields: F;
}

export interface CustomDescriptor<T = unknown> extends DescriptorBase {
  readonly kind: 'custom';
  readonly name: string;
  readonly codec: CustomCodec<T>;
}

export type Descriptor =
  | StringDescriptor
  | IntegerDescriptor
  | BigIntDescriptor
  | FloatDescriptor
  | BooleanDescriptor
  | DynamicDescriptor
  | OptionalDescriptor
  | ArrayDescriptor
  | MapDescriptor
  | RecordDescriptor
  | CustomDescriptor;

export type ScalarDescriptor =
  | StringDescriptor
  | IntegerDescriptor
  | BigIntDescriptor
  | FloatDescriptor
  | BooleanDescriptor;

export type DescriptorKind = Descriptor['kind'];

/**
 * Static type decoded from (and encoded to) a descriptor.
 */
export type Infer<D> =
  D extends CustomDescriptor<infer T>
    ? T
    : D extends StringDescriptor
      ? string
      : D extends IntegerDescriptor | FloatDescriptor
        ? number
        : D extends BigIntDescriptor
          ? bigint
          : D extends BooleanDescriptor
            ? boolean
            : D extends DynamicDescriptor
              ? DynamicValue | undefined
              : D extends OptionalDescriptor<infer I>
                ? Infer<I> | undefined
                : D extends ArrayDescriptor<infer E>
                  ? Infer<E>[]
                  : D extends MapDescriptor<infer E>
                    ? Record<string, Infer<E>>
                    : D extends RecordDescriptor<infer F>
                      ? InferFields<F>
                      : never;

export type InferFields<F extends FieldMap> = {
  -readonly [K in keyof F]: F[K] extends FieldDescriptor<infer D>
    ? Infer<D>
    : Infer<F[K]>;
};

export function isFieldDescriptor(spec: FieldSpec): spec is FieldDescriptor {
  return spec.kind === 'field';
}

export function isScalarDescriptor(
  descriptor: Descriptor
): descriptor is ScalarDescriptor {
  switch (descriptor.kind) {
    case 'string':
    case 'integer':
    case 'bigint':
    case 'float':
    case 'boolean':
      return true;
    default:
      return false;
  }
}

/**
 * Human-readable label used in error messages, e.g. `map<string, int32>`.
 */
export function describe(descriptor: Descriptor): string {
  switch (descriptor.kind) {
    case 'string':
      return 'string';
    case 'integer': {
      const prefix = descriptor.signed ? 'int' : 'uint';
      return descriptor.bits === 53 ? prefix : `${prefix}${descriptor.bits}`;
    }
    case 'bigint':
      return descriptor.signed ? 'int64' : 'uint64';
    case 'float':
      return `float${descriptor.bits}`;
    case 'boolean':
      return 'bool';
    case 'any':
      return 'any';
    case 'optional':
      return `optional<${describe(descriptor.inner)}>`;
    case 'array':
      return `array<${describe(descriptor.element)}>`;
    case 'map':
      return `map<${describe(descriptor.key)}, ${describe(descriptor.element)}>`;
    case 'record':
    case 'custom':
      return descriptor.name;
  }
}
