import { parseKey, type FlatPair, type ResolvedOptions } from '@formcodec/core';

/**
 * Print each key with its parsed segments to stderr.
 * Intended to be used behind the --debug-paths flag.
 */
export function printPathDebug(pairs: readonly FlatPair[]): void {
  for (const pair of pairs) {
    const parsed = parseKey(pair.key);
    const rendered = parsed.isOk()
      ? JSON.stringify(
          parsed.value.map((segment) => (segment.isIndex ? '[]' : segment.key))
        )
      : `<invalid: ${parsed.error.message}>`;
    process.stderr.write(`[formcodec] path: ${pair.key} -> ${rendered}\n`);
  }
}

export function printEffectiveConfig(options: ResolvedOptions): void {
  process.stderr.write(
    `[formcodec] effective config: ${JSON.stringify(options, null, 2)}\n`
  );
}
