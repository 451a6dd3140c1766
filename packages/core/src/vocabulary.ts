/**
 * Compound word vocabulary - frequency list loading
 *
 * The frequency list is a TSV file whose first column holds one word or
 * phrase per row. Only phrases made of several space separated words are
 * kept: single words carry no compound information.
 */

import fs from 'fs';
import { parse } from 'csv-parse/sync';
import { describeError } from './log.js';

/**
 * First cell of a study plan export. Such files are not frequency lists.
 */
export const STUDY_PLAN_SENTINEL = '#study_plan_frequency';

export const JOINER = '_';

export interface CompoundVocabulary {
  /** Phrases as they appear in text, longest first */
  readonly phrases: readonly string[];
  /** `phrases[i]` with spaces replaced by JOINER */
  readonly joined: readonly string[];
}

export const EMPTY_VOCABULARY: CompoundVocabulary = { phrases: [], joined: [] };

export type VocabularyLoadResult =
  | { status: 'loaded'; path: string; vocabulary: CompoundVocabulary }
  | { status: 'sentinel'; path: string }
  | { status: 'failed'; path: string; reason: string };

function codePointLength(text: string): number {
  return [...text].length;
}

/**
 * Build the vocabulary from raw entries. Duplicates keep their first
 * occurrence; entries of equal length keep their input order.
 */
export function buildCompoundVocabulary(entries: Iterable<string>): CompoundVocabulary {
  const phrases = [...new Set(entries)]
    .filter((entry) => entry.trim().includes(' '))
    .map((entry) => ({ entry, length: codePointLength(entry) }))
    .sort((a, b) => b.length - a.length)
    .map(({ entry }) => entry);

  return {
    phrases,
    joined: phrases.map((phrase) => phrase.replaceAll(' ', JOINER))
  };
}

// A blank line comes back from csv-parse as a single empty field
function isBlankRecord(record: unknown[]): boolean {
  return record.length === 0 || (record.length === 1 && record[0] === '');
}

function parseRows(content: string): string[][] {
  const records: unknown = parse(content, {
    delimiter: '\t',
    bom: true,
    relax_quotes: true,
    relax_column_count: true
  });

  if (!Array.isArray(records)) {
    throw new Error('parser returned no rows');
  }

  return records.map((record, index) => {
    if (!Array.isArray(record) || isBlankRecord(record) || typeof record[0] !== 'string') {
      throw new Error(`row ${index + 1} has no first column`);
    }
    return record.map(String);
  });
}

/**
 * Parse frequency list content. Column 0 of every row is an entry.
 */
export function parseFrequencyList(content: string, path: string = '<memory>'): VocabularyLoadResult {
  let rows: string[][];
  try {
    rows = parseRows(content);
  } catch (error) {
    return { status: 'failed', path, reason: describeError(error) };
  }

  if (rows.length === 0) {
    return { status: 'failed', path, reason: 'file is empty' };
  }
  if (rows[0][0] === STUDY_PLAN_SENTINEL) {
    return { status: 'sentinel', path };
  }

  return { status: 'loaded', path, vocabulary: buildCompoundVocabulary(rows.map((row) => row[0])) };
}

export function loadFrequencyList(path: string): VocabularyLoadResult {
  let content: string;
  try {
    content = fs.readFileSync(path, 'utf-8');
  } catch (error) {
    return { status: 'failed', path, reason: describeError(error) };
  }
  return parseFrequencyList(content, path);
}

export function vocabularyOf(result: VocabularyLoadResult): CompoundVocabulary {
  return result.status === 'loaded' ? result.vocabulary : EMPTY_VOCABULARY;
}
