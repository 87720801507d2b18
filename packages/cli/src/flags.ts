import { ConfigError, type CodecOptions } from '@formcodec/core';

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  schema?: string;
  // Commander sets trim=false / sort=false for --no-trim / --no-sort
  trim?: boolean;
  sort?: boolean;
  maxInputBytes?: string | number;
  maxPairs?: string | number;
  maxPathDepth?: string | number;
  debugPaths?: boolean;
  debugConfig?: boolean;
  printMetrics?: boolean;
}

/**
 * Parse CLI options into CodecOptions. Range checks are left to
 * resolveOptions; this only rejects values that are not whole numbers.
 */
export function parseCodecOptions(options: CliOptions): CodecOptions {
  const codecOptions: CodecOptions = {};

  if (typeof options.trim === 'boolean') {
    codecOptions.trimInput = options.trim;
  }
  if (typeof options.sort === 'boolean') {
    codecOptions.sortKeys = options.sort;
  }

  const maxInputBytes = parseIntegerFlag('max-input-bytes', options.maxInputBytes);
  const maxPairs = parseIntegerFlag('max-pairs', options.maxPairs);
  const maxPathDepth = parseIntegerFlag('max-path-depth', options.maxPathDepth);

  if (
    maxInputBytes !== undefined ||
    maxPairs !== undefined ||
    maxPathDepth !== undefined
  ) {
    codecOptions.guards = {};
    if (maxInputBytes !== undefined) {
      codecOptions.guards.maxInputBytes = maxInputBytes;
    }
    if (maxPairs !== undefined) codecOptions.guards.maxPairs = maxPairs;
    if (maxPathDepth !== undefined) {
      codecOptions.guards.maxPathDepth = maxPathDepth;
    }
  }

  return codecOptions;
}

function parseIntegerFlag(
  flag: string,
  raw: string | number | undefined
): number | undefined {
  if (raw === undefined) return undefined;
  const value = typeof raw === 'number' ? raw : Number(raw.trim());
  if (!Number.isInteger(value) || (typeof raw === 'string' && raw.trim() === '')) {
    throw new ConfigError({
      message: `Invalid --${flag}: ${String(raw)}. Expected an integer.`,
      setting: flag,
    });
  }
  return value;
}
