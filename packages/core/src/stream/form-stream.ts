/**
 * Stream wrappers. Decoding reads the whole source into memory first (bounded
 * by guards.maxInputBytes); encoding writes the finished payload once.
 */

import { Buffer } from 'node:buffer';
import type { Readable, Writable } from 'node:stream';

import { defaultCodec, type CallOptions, type FormCodec } from '../codec/form-codec.js';
import type { Descriptor, Infer } from '../types/descriptor.js';
import {
  FormDataError,
  InputLimitError,
  type FormCodecError,
} from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';

export type ByteSource = Readable | AsyncIterable<Uint8Array | string>;

export class FormDecoder {
  constructor(
    private readonly source: ByteSource,
    private readonly codec: FormCodec = defaultCodec
  ) {}

  async decode<D extends Descriptor>(
    descriptor: D,
    call: CallOptions = {}
  ): Promise<Result<Infer<D>, FormCodecError>> {
    const text = await this.readAll();
    if (text.isErr()) return text;
    return this.codec.decode(text.value, descriptor, call);
  }

  private async readAll(): Promise<Result<string, FormCodecError>> {
    const limit = this.codec.options.guards.maxInputBytes;
    const chunks: Buffer[] = [];
    let size = 0;

    try {
      for await (const chunk of this.source) {
        const bytes = toBuffer(chunk);
        size += bytes.length;
        if (size > limit) {
          return err(
            new InputLimitError({
              guard: 'maxInputBytes',
              limit,
              actual: size,
            })
          );
        }
        chunks.push(bytes);
      }
    } catch (error) {
      return err(
        new FormDataError({
          message: 'failed to read form payload',
          cause: error instanceof Error ? error : new Error(String(error)),
        })
      );
    }

    return ok(Buffer.concat(chunks).toString('utf8'));
  }
}

function toBuffer(chunk: unknown): Buffer {
  if (typeof chunk === 'string') return Buffer.from(chunk, 'utf8');
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  return Buffer.from(String(chunk), 'utf8');
}

export class FormEncoder {
  constructor(
    private readonly sink: Writable,
    private readonly codec: FormCodec = defaultCodec
  ) {}

  async encode<D extends Descriptor>(
    value: Infer<D>,
    descriptor: D,
    call: CallOptions = {}
  ): Promise<Result<void, FormCodecError>> {
    const payload = this.codec.encode(value, descriptor, call);
    if (payload.isErr()) return payload;

    try {
      await write(this.sink, payload.value);
    } catch (error) {
      return err(
        new FormDataError({
          message: 'failed to write form payload',
          cause: error instanceof Error ? error : new Error(String(error)),
        })
      );
    }
    return ok(undefined);
  }
}

function write(sink: Writable, data: string): Promise<void> {
  return new Promise((resolve, reject) => {
    sink.write(data, 'utf8', (error) => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}
