import { Buffer } from 'node:buffer';
import { readFile } from 'node:fs/promises';
import path from 'node:path';

import {
  ConfigError,
  descriptorFromDocument,
  schema,
  type Descriptor,
} from '@formcodec/core';

/**
 * Read a whole text stream (stdin in practice) into memory.
 */
export async function readText(
  source: AsyncIterable<Uint8Array | string>
): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of source) {
    chunks.push(
      typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk)
    );
  }
  return Buffer.concat(chunks).toString('utf8');
}

export async function readJsonFile(file: string): Promise<unknown> {
  const abs = path.resolve(process.cwd(), file);
  let raw: string;
  try {
    raw = await readFile(abs, 'utf8');
  } catch (error) {
    throw new ConfigError({
      message: `Cannot read file: ${abs}`,
      cause: error instanceof Error ? error : undefined,
    });
  }
  return parseJson(raw, abs);
}

export function parseJson(raw: string, origin: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ConfigError({
      message: `Invalid JSON in ${origin}`,
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/** Mapping of dynamic values, used when no --schema is given */
export const DYNAMIC_ROOT: Descriptor = schema.map(schema.any());

/**
 * Load the descriptor named by --schema, or the dynamic root.
 */
export async function loadDescriptor(file?: string): Promise<Descriptor> {
  if (file === undefined) return DYNAMIC_ROOT;
  const document = await readJsonFile(file);
  const descriptor = descriptorFromDocument(document);
  if (descriptor.isErr()) throw descriptor.error;
  return descriptor.value;
}
