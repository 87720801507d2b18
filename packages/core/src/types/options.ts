/**
 * Configuration options for formcodec
 *
 * All options are optional with conservative defaults. Guards bound the work a
 * single call can do; there is no cancellation inside the engines, so callers
 * limit input size up front instead.
 */

import { ConfigError } from './errors.js';

/**
 * Safety guards against oversized or pathological payloads
 */
export interface GuardsOptions {
  /** Maximum payload size in UTF-8 bytes (default: 1_048_576) */
  maxInputBytes?: number;
  /** Maximum number of key/value pairs in one payload (default: 10_000) */
  maxPairs?: number;
  /** Maximum number of path segments in one key (default: 32) */
  maxPathDepth?: number;
}

export interface CodecOptions {
  /** Trim surrounding whitespace before parsing the payload (default: true) */
  trimInput?: boolean;
  /** Sort encoded pairs by rendered key (default: true) */
  sortKeys?: boolean;
  guards?: GuardsOptions;
}

export interface ResolvedOptions {
  trimInput: boolean;
  sortKeys: boolean;
  guards: Required<GuardsOptions>;
}

export const DEFAULT_OPTIONS: ResolvedOptions = {
  trimInput: true,
  sortKeys: true,
  guards: {
    maxInputBytes: 1_048_576,
    maxPairs: 10_000,
    maxPathDepth: 32,
  },
};

/**
 * Resolve user options over the defaults, deep-merging nested groups
 *
 * @throws {ConfigError} When a value is out of range or of the wrong type
 */
export function resolveOptions(userOptions: CodecOptions = {}): ResolvedOptions {
  const resolved: ResolvedOptions = {
    trimInput: userOptions.trimInput ?? DEFAULT_OPTIONS.trimInput,
    sortKeys: userOptions.sortKeys ?? DEFAULT_OPTIONS.sortKeys,
    guards: { ...DEFAULT_OPTIONS.guards, ...dropUndefined(userOptions.guards) },
  };

  validateOptions(resolved);
  return resolved;
}

function dropUndefined(guards: GuardsOptions | undefined): GuardsOptions {
  const out: GuardsOptions = {};
  if (guards?.maxInputBytes !== undefined) {
    out.maxInputBytes = guards.maxInputBytes;
  }
  if (guards?.maxPairs !== undefined) out.maxPairs = guards.maxPairs;
  if (guards?.maxPathDepth !== undefined) {
    out.maxPathDepth = guards.maxPathDepth;
  }
  return out;
}

function validateOptions(options: ResolvedOptions): void {
  if (typeof options.trimInput !== 'boolean') {
    throw new ConfigError({
      message: 'trimInput must be boolean',
      setting: 'trimInput',
    });
  }
  if (typeof options.sortKeys !== 'boolean') {
    throw new ConfigError({
      message: 'sortKeys must be boolean',
      setting: 'sortKeys',
    });
  }

  for (const name of ['maxInputBytes', 'maxPairs', 'maxPathDepth'] as const) {
    const value = options.guards[name];
    if (!Number.isInteger(value) || value <= 0) {
      throw new ConfigError({
        message: `guards.${name} must be a positive integer`,
        setting: `guards.${name}`,
      });
    }
  }
}
