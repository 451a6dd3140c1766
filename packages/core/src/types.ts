// Shared type definitions for morphseg
// Morpheme record and the names of the registered morphemizers

// ============================================================================
// TAGS
// ============================================================================

export const UNKNOWN = 'UNKNOWN';
export const CJK_CHAR = 'CJK_CHAR';

// ============================================================================
// MORPHEME
// ============================================================================

/**
 * One unit of segmented text.
 *
 * `inflected` is the form found in the text, `base` the dictionary form and
 * `norm` the normalized form. Strategies that cannot tell these apart set all
 * text fields to the same token.
 */
export interface Morpheme {
  readonly norm: string;
  readonly base: string;
  readonly inflected: string;
  readonly read: string;
  readonly pos: string;
  readonly subPos: string;
}

export function createMorpheme(
  norm: string,
  base: string,
  inflected: string,
  read: string,
  pos: string,
  subPos: string
): Morpheme {
  return { norm, base, inflected, read, pos, subPos };
}

// Same token in every text field
export function createTokenMorpheme(token: string, pos: string = UNKNOWN, subPos: string = UNKNOWN): Morpheme {
  return createMorpheme(token, token, token, token, pos, subPos);
}

/**
 * Identity of a morpheme independent of how it was inflected in the text.
 */
export function morphemeKey(m: Morpheme): string {
  return [m.norm, m.base, m.read, m.pos].join('\t');
}

export function morphemesEqual(a: Morpheme, b: Morpheme): boolean {
  return a.norm === b.norm
    && a.base === b.base
    && a.inflected === b.inflected
    && a.read === b.read
    && a.pos === b.pos
    && a.subPos === b.subPos;
}

// ============================================================================
// MORPHEMIZER NAMES
// ============================================================================

// Registration order of the built-in morphemizers
export const MORPHEMIZER_NAMES = [
  'SpaceMorphemizer',
  'MecabMorphemizer',
  'JiebaMorphemizer',
  'CjkCharMorphemizer',
  'VietnameseMorphemizer'
] as const;

export type MorphemizerName = typeof MORPHEMIZER_NAMES[number];
