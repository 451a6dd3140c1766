import { Morphemizer, type MorphemizerOptions } from '../morphemizer.js';
import { JiebaSegmenter } from '../analyzers/jieba.js';
import type { ChineseSegmenter } from '../analyzers/types.js';
import { filterCjkIdeographs } from '../characters.js';
import { UNKNOWN, createTokenMorpheme, type Morpheme } from '../types.js';

export interface JiebaMorphemizerOptions extends MorphemizerOptions {
  segmenter?: ChineseSegmenter;
}

/**
 * Chinese word segmentation with part-of-speech flags from jieba.
 */
export class JiebaMorphemizer extends Morphemizer {
  readonly name = 'JiebaMorphemizer';
  private readonly segmenter: ChineseSegmenter;

  constructor(options: JiebaMorphemizerOptions = {}) {
    super(options);
    this.segmenter = options.segmenter ?? new JiebaSegmenter();
  }

  protected override computeMorphemes(expression: string): Morpheme[] {
    // Punctuation, latin text and whitespace only confuse the segmenter
    const hanzi = filterCjkIdeographs(expression);
    if (hanzi === '') return [];

    return this.segmenter.cut(hanzi).map(({ word, flag }) => createTokenMorpheme(word, flag, UNKNOWN));
  }

  override describe(): string {
    return 'Chinese';
  }
}
