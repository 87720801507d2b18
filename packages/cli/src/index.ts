#!/usr/bin/env node

// CLI entry point
// - Command name: `formcodec` with subcommands `decode` and `encode`.
// - `decode` reads a form payload (argument or stdin) and prints the decoded
//   value as JSON; `encode` reads JSON (file or stdin) and prints the canonical
//   form payload. Both take an optional --schema descriptor document.

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ErrorPresenter,
  FormCodec,
  InternalError,
  MetricsCollector,
  isFormCodecError,
  jsonReplacer,
  valueFromJson,
  type FormCodecError,
} from '@formcodec/core';
import { renderCLIView } from './render.js';
import { parseCodecOptions, type CliOptions } from './flags.js';
import { printEffectiveConfig, printPathDebug } from './debug.js';
import { loadDescriptor, parseJson, readJsonFile, readText } from './io.js';

/**
 * Build the command tree. Each call returns a fresh program, so options parsed
 * by one run never leak into the next.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('formcodec')
    .description('Convert between bracket-keyed form payloads and JSON')
    .version('0.1.0');

  withCodecFlags(
    program
      .command('decode')
      .description('Decode a form payload into JSON')
      .argument('[payload]', 'Form payload; read from stdin when omitted')
  ).action(async (payload: string | undefined, options: CliOptions) => {
    const codec = createCodec(options);
    const descriptor = await loadDescriptor(options.schema);
    const input = payload ?? (await readText(process.stdin));
    const metrics = new MetricsCollector({ enabled: options.printMetrics === true });

    const pairs = codec.parse(input, { metrics }).unwrap();
    if (options.debugPaths) {
      printPathDebug(pairs);
    }

    const decoded = codec.decodePairs(pairs, descriptor, { metrics }).unwrap();
    process.stdout.write(`${JSON.stringify(decoded, jsonReplacer, 2)}\n`);
    printMetrics(options, metrics);
  });

  withCodecFlags(
    program
      .command('encode')
      .description('Encode JSON into a canonical form payload')
      .argument('[file]', 'JSON input file; read from stdin when omitted')
  ).action(async (file: string | undefined, options: CliOptions) => {
    const codec = createCodec(options);
    const descriptor = await loadDescriptor(options.schema);
    const json =
      file === undefined
        ? parseJson(await readText(process.stdin), 'stdin')
        : await readJsonFile(file);
    const metrics = new MetricsCollector({ enabled: options.printMetrics === true });

    const value = valueFromJson(descriptor, json, codec.cache).unwrap();
    const encoded = codec.encode(value, descriptor, { metrics }).unwrap();
    if (options.debugPaths) {
      printPathDebug(codec.encodePairs(value, descriptor).unwrap());
    }

    process.stdout.write(`${encoded}\n`);
    printMetrics(options, metrics);
  });

  return program;
}

function withCodecFlags(command: Command): Command {
  return command
    .option('-s, --schema <file>', 'Descriptor document (JSON) for the target shape')
    .option('--no-trim', 'Keep surrounding whitespace of the payload')
    .option('--no-sort', 'Keep encoded pairs in traversal order')
    .option('--max-input-bytes <number>', 'Reject payloads larger than this')
    .option('--max-pairs <number>', 'Reject payloads with more pairs than this')
    .option('--max-path-depth <number>', 'Reject keys deeper than this')
    .option('--debug-paths', 'Print each key with its parsed segments to stderr', false)
    .option('--debug-config', 'Print the effective options to stderr', false)
    .option('--print-metrics', 'Print codec metrics as JSON to stderr', false);
}

function createCodec(options: CliOptions): FormCodec {
  const codec = new FormCodec(parseCodecOptions(options));
  if (options.debugConfig) {
    printEffectiveConfig(codec.options);
  }
  return codec;
}

function printMetrics(options: CliOptions, metrics: MetricsCollector): void {
  if (options.printMetrics) {
    process.stderr.write(
      `[formcodec] metrics: ${JSON.stringify(metrics.snapshotMetrics())}\n`
    );
  }
}

function handleCliError(err: unknown): never {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  let error: FormCodecError;
  if (isFormCodecError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new InternalError(
      message || 'Unexpected error',
      err instanceof Error ? err : undefined
    );
  }

  const view = presenter.formatForCLI(error);
  console.error(renderCLIView(view));

  process.exit(error.getExitCode());
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv).catch(handleCliError);
}

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
