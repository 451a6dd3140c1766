import type { Morpheme } from '../types.js';

/**
 * Japanese morphological analyzer. Both calls are blocking.
 */
export interface JapaneseAnalyzer {
  /** Morphemes of unsegmented Japanese text, in order */
  analyze(text: string): Morpheme[];
  /** Version or dictionary string. May throw. */
  identity(): string;
}

export interface TaggedWord {
  word: string;
  flag: string;
}

/**
 * Chinese part-of-speech segmenter.
 */
export interface ChineseSegmenter {
  cut(text: string): TaggedWord[];
}
