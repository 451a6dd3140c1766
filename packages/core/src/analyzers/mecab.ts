// morphseg/analyzers/mecab - MeCab subprocess adapter

import { spawnSync } from 'child_process';
import path from 'path';
import { AnalyzerError } from '../errors.js';
import { getPreference } from '../preferences.js';
import { dp } from '../log.js';
import { UNKNOWN, createMorpheme, type Morpheme } from '../types.js';
import type { JapaneseAnalyzer } from './types.js';

// surface, pos, sub-pos, base form, reading
const NODE_FORMAT = '%m\\t%f[0]\\t%f[1]\\t%f[6]\\t%f[7]\\n';
const UNK_FORMAT = `%m\\t${UNKNOWN}\\t${UNKNOWN}\\t%m\\t%m\\n`;
const EOS = 'EOS';
const NODE_FIELDS = 5;

// Symbols and punctuation carry nothing worth learning
const IGNORED_POS = new Set(['記号', '補助記号']);

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

export const MECAB_ARGS = [
  `--node-format=${NODE_FORMAT}`,
  `--unk-format=${UNK_FORMAT}`,
  `--eos-format=${EOS}\\n`
];

function orSurface(value: string | undefined, surface: string): string {
  return !value || value === '*' ? surface : value;
}

function isIgnored(pos: string, subPos: string): boolean {
  return IGNORED_POS.has(pos) || (pos === '名詞' && subPos === '数');
}

/**
 * Parse MeCab output produced with MECAB_ARGS.
 */
export function parseMecabOutput(output: string): Morpheme[] {
  const morphemes: Morpheme[] = [];

  for (const line of output.split(/\r?\n/)) {
    if (line === '' || line === EOS) continue;

    const parts = line.split('\t');
    if (parts.length !== NODE_FIELDS) {
      throw new AnalyzerError('mecab', `unexpected node format: ${JSON.stringify(line)}`);
    }

    const [surface, pos, subPos, base, reading] = parts;
    if (isIgnored(pos, subPos)) continue;

    const baseForm = orSurface(base, surface);
    morphemes.push(createMorpheme(baseForm, baseForm, surface, orSurface(reading, surface), pos, subPos));
  }

  return morphemes;
}

export interface MecabDictionaryInfo {
  filename: string;
  version?: string;
  charset?: string;
}

/**
 * Parse the output of `mecab -D`.
 */
export function parseMecabDictionaryInfo(output: string): MecabDictionaryInfo {
  const fields = new Map<string, string>();
  for (const line of output.split(/\r?\n/)) {
    const match = /^(\w+):\s*(.*)$/.exec(line);
    if (match) fields.set(match[1], match[2].trim());
  }

  const filename = fields.get('filename');
  if (!filename) {
    throw new AnalyzerError('mecab', 'dictionary info has no filename');
  }
  return { filename, version: fields.get('version'), charset: fields.get('charset') };
}

/**
 * Name of the system dictionary, e.g. `ipadic v102`.
 */
export function formatMecabIdentity(info: MecabDictionaryInfo): string {
  const dictionary = path.basename(path.dirname(info.filename)) || info.filename;
  return info.version ? `${dictionary} v${info.version}` : dictionary;
}

export class MecabAnalyzer implements JapaneseAnalyzer {
  constructor(private readonly executable?: string) {}

  private get command(): string {
    return this.executable ?? getPreference('path_mecab');
  }

  private run(args: string[], input?: string): string {
    const result = spawnSync(this.command, args, {
      input,
      encoding: 'utf8',
      maxBuffer: MAX_OUTPUT_BYTES
    });

    if (result.error) {
      throw new AnalyzerError('mecab', `failed to run ${this.command}: ${result.error.message}`, { cause: result.error });
    }
    if (result.status !== 0) {
      const stderr = result.stderr.trim();
      throw new AnalyzerError('mecab', `${this.command} exited with status ${result.status}${stderr ? `: ${stderr}` : ''}`);
    }
    return result.stdout;
  }

  analyze(text: string): Morpheme[] {
    if (text === '') return [];
    dp(`mecab: analyzing ${text.length} chars`);
    return parseMecabOutput(this.run(MECAB_ARGS, `${text}\n`));
  }

  identity(): string {
    return formatMecabIdentity(parseMecabDictionaryInfo(this.run(['-D'])));
  }
}
