import { Morphemizer } from '../morphemizer.js';
import { createTokenMorpheme, type Morpheme } from '../types.js';

// Letters, marks, numbers and connector punctuation ("_") count as word characters
const WORD_CHAR = '[\\p{L}\\p{M}\\p{N}\\p{Pc}]';
const WORD_BOUNDARY = `(?:(?<=${WORD_CHAR})(?!${WORD_CHAR})|(?<!${WORD_CHAR})(?=${WORD_CHAR}))`;

// Whitespace as Unicode defines it: U+001C..U+001F and U+0085 count, U+FEFF does not
const WHITESPACE = '\\t\\n\\v\\f\\r\\x1c-\\x20\\x85\\xa0\\u1680\\u2000-\\u200a\\u2028\\u2029\\u202f\\u205f\\u3000';

// A run without whitespace or digits, starting and ending on a word boundary.
// A token containing a digit never matches as a whole and is skipped.
const SPACED_WORD_PATTERN = new RegExp(`${WORD_BOUNDARY}[^${WHITESPACE}\\p{Nd}]+${WORD_BOUNDARY}`, 'gu');

/**
 * Lowercased words of a space delimited expression, uncached.
 */
export function splitOnSpaces(expression: string): Morpheme[] {
  const words = expression.match(SPACED_WORD_PATTERN) ?? [];
  return words.map((word) => createTokenMorpheme(word.toLowerCase()));
}

/**
 * Morphemizer for languages that use spaces (English, German, Spanish, ...).
 * Being general purpose, it can't recover the base form of an inflection.
 */
export class SpaceMorphemizer extends Morphemizer {
  readonly name = 'SpaceMorphemizer';

  protected override computeMorphemes(expression: string): Morpheme[] {
    return splitOnSpaces(expression);
  }

  override describe(): string {
    return 'Language w/ Spaces';
  }
}
