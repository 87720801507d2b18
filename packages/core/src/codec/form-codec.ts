/**
 * FormCodec: options + schema cache + the two engines behind one object.
 *
 * Every call is synchronous, returns a Result and stops at the first error.
 * A codec can be shared freely; the only state it mutates is its cache.
 */

import {
  parseFlat,
  serializeFlat,
  sortPairs,
  type FlatMultimap,
  type FlatPair,
} from '../flat/flat-multimap.js';
import { parseKey } from '../path/path-parser.js';
import { defaultSchemaCache, SchemaCache } from '../schema/schema-cache.js';
import type { Descriptor, Infer } from '../types/descriptor.js';
import {
  InputLimitError,
  InvalidTargetError,
  PathSyntaxError,
  type FormCodecError,
} from '../types/errors.js';
import {
  resolveOptions,
  type CodecOptions,
  type ResolvedOptions,
} from '../types/options.js';
import { err, ok, type Result } from '../types/result.js';
import type { MetricPhase, MetricsCollector } from '../util/metrics.js';
import {
  assign,
  resolveRoot,
  zeroRoot,
  type RootDescriptor,
} from './decode.js';
import { encodeValue } from './encode.js';
import { isObjectRecord } from './values.js';

export interface CallOptions {
  metrics?: MetricsCollector;
}

export class FormCodec {
  public readonly options: ResolvedOptions;
  public readonly cache: SchemaCache;

  /**
   * @throws {ConfigError} When `options` does not validate
   */
  constructor(options: CodecOptions = {}, cache: SchemaCache = new SchemaCache()) {
    this.options = resolveOptions(options);
    this.cache = cache;
  }

  /** Payload → flat pairs, with this codec's trimming and guards */
  parse(input: string, call: CallOptions = {}): Result<FlatMultimap, FormCodecError> {
    return this.timed(call, 'PARSE', () =>
      parseFlat(input, {
        trimInput: this.options.trimInput,
        guards: this.options.guards,
      })
    );
  }

  decode<D extends Descriptor>(
    input: string,
    descriptor: D,
    call: CallOptions = {}
  ): Result<Infer<D>, FormCodecError> {
    const root = resolveRoot(descriptor);
    if (root.isErr()) return root;
    const pairs = this.parse(input, call);
    if (pairs.isErr()) return pairs;
    return this.fill(undefined, root.value, pairs.value, call);
  }

  /**
   * Decode into an existing root. Fields the payload does not mention keep
   * their current values.
   */
  decodeInto<D extends Descriptor>(
    target: object | null | undefined,
    input: string,
    descriptor: D,
    call: CallOptions = {}
  ): Result<Infer<D>, FormCodecError> {
    if (!isObjectRecord(target)) {
      return err(
        new InvalidTargetError({
          received:
            target === null
              ? 'null'
              : Array.isArray(target)
                ? 'array'
                : typeof target,
        })
      );
    }
    const root = resolveRoot(descriptor);
    if (root.isErr()) return root;
    const pairs = this.parse(input, call);
    if (pairs.isErr()) return pairs;
    return this.fill(target, root.value, pairs.value, call);
  }

  decodePairs<D extends Descriptor>(
    pairs: readonly FlatPair[],
    descriptor: D,
    call: CallOptions = {}
  ): Result<Infer<D>, FormCodecError> {
    const root = resolveRoot(descriptor);
    if (root.isErr()) return root;
    if (pairs.length > this.options.guards.maxPairs) {
      return err(
        new InputLimitError({
          guard: 'maxPairs',
          limit: this.options.guards.maxPairs,
          actual: pairs.length,
        })
      );
    }
    return this.fill(undefined, root.value, pairs, call);
  }

  /**
   * Flat pairs of `value`, sorted by key unless `sortKeys` is off.
   */
  encodePairs<D extends Descriptor>(
    value: Infer<D>,
    descriptor: D,
    call: CallOptions = {}
  ): Result<FlatMultimap, FormCodecError> {
    return this.timed(call, 'ENCODE', () => {
      const misses = this.cache.getStats().misses;
      const pairs = encodeValue(descriptor, value, { cache: this.cache });
      call.metrics?.addSchemaCacheMisses(this.cache.getStats().misses - misses);
      if (pairs.isErr()) return pairs;
      call.metrics?.addPairsEncoded(pairs.value.length);
      return ok(this.options.sortKeys ? sortPairs(pairs.value) : pairs.value);
    });
  }

  /** Canonical payload string of `value` */
  encode<D extends Descriptor>(
    value: Infer<D>,
    descriptor: D,
    call: CallOptions = {}
  ): Result<string, FormCodecError> {
    const pairs = this.encodePairs(value, descriptor, call);
    if (pairs.isErr()) return pairs;
    return ok(
      this.timed(call, 'SERIALIZE', () =>
        serializeFlat(pairs.value, { sortKeys: false })
      )
    );
  }

  /** Apply `pairs` to `target`, or to a fresh zero root when none is given */
  private fill<D extends Descriptor>(
    target: Record<string, unknown> | undefined,
    descriptor: RootDescriptor,
    pairs: readonly FlatPair[],
    call: CallOptions
  ): Result<Infer<D>, FormCodecError> {
    return this.timed(call, 'DECODE', () => {
      const misses = this.cache.getStats().misses;
      const root = target ?? zeroRoot(descriptor, this.cache);
      const applied = this.applyPairs(root, descriptor, pairs, call);
      call.metrics?.addSchemaCacheMisses(this.cache.getStats().misses - misses);
      if (applied.isErr()) return applied;
      const decoded: unknown = root;
      return ok(decoded as Infer<D>);
    });
  }

  private applyPairs(
    root: Record<string, unknown>,
    descriptor: RootDescriptor,
    pairs: readonly FlatPair[],
    call: CallOptions
  ): Result<void, FormCodecError> {
    const { maxPathDepth } = this.options.guards;

    for (const pair of pairs) {
      const path = parseKey(pair.key);
      if (path.isErr()) return path;

      if (path.value.length > maxPathDepth) {
        return err(
          new InputLimitError({
            guard: 'maxPathDepth',
            limit: maxPathDepth,
            actual: path.value.length,
            key: pair.key,
          })
        );
      }

      // A record root has no anonymous top-level slot.
      if (descriptor.kind === 'record' && pair.key.startsWith('[')) {
        return err(
          new PathSyntaxError({
            message: `invalid key syntax: "${pair.key}" must start with a field name`,
            context: { key: pair.key, position: 0 },
          })
        );
      }

      const assigned = assign(descriptor, root, path.value, pair.value, {
        cache: this.cache,
      });
      if (assigned.isErr()) {
        assigned.error.annotate({ key: pair.key });
        return assigned;
      }
      call.metrics?.addPairsDecoded(1);
    }
    return ok(undefined);
  }

  private timed<T>(
    call: CallOptions,
    phase: MetricPhase,
    fn: () => T
  ): T {
    return call.metrics ? call.metrics.measure(phase, fn) : fn();
  }
}

/** Codec used by the module-level helpers; shares the default cache */
export const defaultCodec = new FormCodec({}, defaultSchemaCache);

export function decode<D extends Descriptor>(
  input: string,
  descriptor: D,
  call?: CallOptions
): Result<Infer<D>, FormCodecError> {
  return defaultCodec.decode(input, descriptor, call);
}

export function decodeInto<D extends Descriptor>(
  target: object | null | undefined,
  input: string,
  descriptor: D,
  call?: CallOptions
): Result<Infer<D>, FormCodecError> {
  return defaultCodec.decodeInto(target, input, descriptor, call);
}

export function encode<D extends Descriptor>(
  value: Infer<D>,
  descriptor: D,
  call?: CallOptions
): Result<string, FormCodecError> {
  return defaultCodec.encode(value, descriptor, call);
}
