/**
 * Descriptor documents: the JSON form of a descriptor, used where shapes are
 * supplied at run time (the CLI's --schema file).
 *
 *   { "type": "record", "name": "Person", "fields": {
 *       "age": { "type": "int", "bits": 32, "tag": "age,omitempty" } } }
 */

import AjvModule, { type ErrorObject, type ValidateFunction } from 'ajv';

import { ErrorCode } from '../errors/codes.js';
import { schema } from '../schema/builders.js';
import type { Descriptor, FieldSpec, IntegerBits } from '../types/descriptor.js';
import { setOwn } from '../types/dynamic.js';
import { ConfigError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import { DESCRIPTOR_DOCUMENT_SCHEMA } from './document-schema.js';

const Ajv = AjvModule.default;

interface TaggedNode {
  tag?: string;
}

export type DescriptorDocument =
  | (TaggedNode & {
      type:
        | 'string'
        | 'int64'
        | 'uint64'
        | 'float32'
        | 'float64'
        | 'bool'
        | 'any';
    })
  | (TaggedNode & { type: 'int' | 'uint'; bits?: IntegerBits })
  | (TaggedNode & { type: 'optional'; of: DescriptorDocument })
  | (TaggedNode & { type: 'array'; items: DescriptorDocument })
  | (TaggedNode & { type: 'map'; values: DescriptorDocument })
  | (TaggedNode & {
      type: 'record';
      name: string;
      fields: Record<string, DescriptorDocument>;
    });

let validator: ValidateFunction<DescriptorDocument> | undefined;

function getValidator(): ValidateFunction<DescriptorDocument> {
  validator ??= new Ajv({ allErrors: true }).compile<DescriptorDocument>(
    DESCRIPTOR_DOCUMENT_SCHEMA
  );
  return validator;
}

function formatAjvError(error: ErrorObject): string {
  const at = error.instancePath === '' ? '/' : error.instancePath;
  return `${at} ${error.message ?? error.keyword}`;
}

export function validateDescriptorDocument(
  document: unknown
): Result<DescriptorDocument, ConfigError> {
  const validate = getValidator();
  if (validate(document)) return ok(document);

  const details = (validate.errors ?? []).map(formatAjvError);
  return err(
    new ConfigError({
      message: 'invalid descriptor document',
      errorCode: ErrorCode.INVALID_DESCRIPTOR_DOCUMENT,
      details,
    })
  );
}

/**
 * Validate `document` and build the descriptor it describes. Each record
 * node yields a fresh record identity.
 */
export function descriptorFromDocument(
  document: unknown
): Result<Descriptor, ConfigError> {
  const validated = validateDescriptorDocument(document);
  if (validated.isErr()) return validated;
  return ok(buildDescriptor(validated.value));
}

function buildDescriptor(node: DescriptorDocument): Descriptor {
  switch (node.type) {
    case 'string':
      return schema.string();
    case 'int':
      return schema.int(node.bits);
    case 'uint':
      return schema.uint(node.bits);
    case 'int64':
      return schema.int64();
    case 'uint64':
      return schema.uint64();
    case 'float32':
      return schema.float32();
    case 'float64':
      return schema.float64();
    case 'bool':
      return schema.bool();
    case 'any':
      return schema.any();
    case 'optional':
      return schema.optional(buildDescriptor(node.of));
    case 'array':
      return schema.array(buildDescriptor(node.items));
    case 'map':
      return schema.map(buildDescriptor(node.values));
    case 'record': {
      const fields: Record<string, FieldSpec> = {};
      for (const [key, child] of Object.entries(node.fields)) {
        const descriptor = buildDescriptor(child);
        setOwn(
          fields,
          key,
          child.tag === undefined ? descriptor : schema.field(descriptor, child.tag)
        );
      }
      return schema.record(node.name, fields);
    }
  }
}
