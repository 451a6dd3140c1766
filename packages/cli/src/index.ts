#!/usr/bin/env tsx

/**
 * CLI interface for morphseg
 */

import { Command } from 'commander';
import {
  UnknownMorphemizerError,
  getDefaultRegistry,
  loadPreferencesFromEnv,
  resetDefaultRegistry,
  setDebug,
  setPreferences,
  type Morpheme,
  type MorphemizerRegistry
} from '@morphseg/core';
import { config } from 'dotenv';
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';

export const DEFAULT_MORPHEMIZER = 'SpaceMorphemizer';

export type CliOptions = {
  morphemizer?: string;
  json?: boolean;
  list?: boolean;
};

type CliFlags = CliOptions & {
  frequency?: string;
  debug?: boolean;
};

export function formatMorpheme(m: Morpheme): string {
  return [m.inflected, m.base, m.read, m.pos, m.subPos].join('\t');
}

export function listMorphemizers(registry: MorphemizerRegistry): string {
  return registry.all().map((m) => `${m.name}: ${m.describe()}`).join('\n');
}

/**
 * Programmatic interface for CLI operations
 * Returns the output string that would be printed to stdout
 */
export function runCli(
  input: string,
  options: CliOptions = {},
  registry: MorphemizerRegistry = getDefaultRegistry()
): string {
  if (options.list) {
    return listMorphemizers(registry);
  }

  const name = options.morphemizer ?? DEFAULT_MORPHEMIZER;
  const morphemizer = registry.byName(name);
  if (!morphemizer) {
    throw new UnknownMorphemizerError(name);
  }

  const morphemes = morphemizer.segment(input);
  if (options.json) {
    return JSON.stringify(morphemes);
  }
  return morphemes.map(formatMorpheme).join('\n');
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8').trim();
}

async function main(): Promise<void> {
  config();
  loadPreferencesFromEnv(process.env);

  const program = new Command();

  program
    .name('morphseg')
    .description('Split text into morphemes')
    .usage('[options] [input]')
    .version('0.1.0')
    .option('-m, --morphemizer <name>', 'morphemizer to use', DEFAULT_MORPHEMIZER)
    .option('-j, --json', 'print morphemes as JSON')
    .option('-L, --list', 'list available morphemizers')
    .option('--frequency <path>', 'frequency list for Vietnamese compound words')
    .option('--debug', 'print debug output')
    .helpOption('-h, --help', 'print this help text');

  program.parse(process.argv);
  const options = program.opts<CliFlags>();

  if (options.debug || process.env.MORPHSEG_DEBUG === '1') {
    setDebug(true);
  }
  if (options.frequency) {
    setPreferences({ path_frequency: options.frequency });
    resetDefaultRegistry();
  }

  try {
    const input = options.list ? '' : program.args.length > 0 ? program.args.join(' ') : await readStdin();
    const output = runCli(input, options);
    if (output) {
      process.stdout.write(output);
      process.stdout.write('\n');
    }
  } catch (error) {
    console.error(`ERROR: ${error instanceof Error ? error.message : String(error)}`);
    if (!(error instanceof UnknownMorphemizerError) && error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    process.exit(2);
  }
}

// Run main if this is the entry point
if (process.argv[1] && fileURLToPath(import.meta.url) === realpathSync(process.argv[1])) {
  main().catch((error) => {
    console.error(`FATAL: ${error}`);
    process.exit(2);
  });
}
