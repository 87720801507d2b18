/**
 * JSON Schema (draft-07) for descriptor documents.
 */

const scalarTypes = [
  'string',
  'int64',
  'uint64',
  'float32',
  'float64',
  'bool',
  'any',
] as const;

export const DESCRIPTOR_DOCUMENT_SCHEMA = {
  $id: 'formcodec:descriptor-document',
  $ref: '#/definitions/node',
  definitions: {
    tag: { type: 'string' },
    node: {
      oneOf: [
        {
          type: 'object',
          properties: {
            type: { enum: [...scalarTypes] },
            tag: { $ref: '#/definitions/tag' },
          },
          required: ['type'],
          additionalProperties: false,
        },
        {
          type: 'object',
          properties: {
            type: { enum: ['int', 'uint'] },
            bits: { enum: [8, 16, 32, 53] },
            tag: { $ref: '#/definitions/tag' },
          },
          required: ['type'],
          additionalProperties: false,
        },
        {
          type: 'object',
          properties: {
            type: { const: 'optional' },
            of: { $ref: '#/definitions/node' },
            tag: { $ref: '#/definitions/tag' },
          },
          required: ['type', 'of'],
          additionalProperties: false,
        },
        {
          type: 'object',
          properties: {
            type: { const: 'array' },
            items: { $ref: '#/definitions/node' },
            tag: { $ref: '#/definitions/tag' },
          },
          required: ['type', 'items'],
          additionalProperties: false,
        },
        {
          type: 'object',
          properties: {
            type: { const: 'map' },
            values: { $ref: '#/definitions/node' },
            tag: { $ref: '#/definitions/tag' },
          },
          required: ['type', 'values'],
          additionalProperties: false,
        },
        {
          type: 'object',
          properties: {
            type: { const: 'record' },
            name: { type: 'string', minLength: 1 },
            fields: {
              type: 'object',
              additionalProperties: { $ref: '#/definitions/node' },
            },
            tag: { $ref: '#/definitions/tag' },
          },
          required: ['type', 'name', 'fields'],
          additionalProperties: false,
        },
      ],
    },
  },
} as const;
