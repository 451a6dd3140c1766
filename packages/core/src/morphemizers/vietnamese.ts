import { Morphemizer, type MorphemizerOptions } from '../morphemizer.js';
import { getPreference } from '../preferences.js';
import { dp } from '../log.js';
import { JOINER, loadFrequencyList, vocabularyOf, type CompoundVocabulary, type VocabularyLoadResult } from '../vocabulary.js';
import type { Morpheme } from '../types.js';
import { splitOnSpaces } from './space.js';

export interface VietnameseMorphemizerOptions extends MorphemizerOptions {
  /** Overrides the `path_frequency` preference */
  frequencyListPath?: string;
}

/**
 * Vietnamese writes many polysyllabic words with spaces between the
 * syllables. Phrases from the frequency list are glued together before
 * splitting on spaces so that they come out as one morpheme.
 */
export class VietnameseMorphemizer extends Morphemizer {
  readonly name = 'VietnameseMorphemizer';
  readonly loadResult: VocabularyLoadResult;
  private readonly vocabulary: CompoundVocabulary;

  constructor(options: VietnameseMorphemizerOptions = {}) {
    super(options);
    const path = options.frequencyListPath ?? getPreference('path_frequency');
    this.loadResult = loadFrequencyList(path);
    this.vocabulary = vocabularyOf(this.loadResult);

    switch (this.loadResult.status) {
      case 'loaded':
        dp(`vietnamese: ${this.vocabulary.phrases.length} compound words from ${path}`);
        break;
      case 'sentinel':
        dp(`vietnamese: ${path} is a study plan, not a frequency list`);
        break;
      case 'failed':
        dp(`vietnamese: no compound words (${this.loadResult.reason})`);
        break;
    }
  }

  knownCompoundCount(): number {
    return this.vocabulary.phrases.length;
  }

  /**
   * Replace known phrases with their joined form, longest first. Every
   * replacement applies to the output of the previous one. The joined form
   * is inserted literally, `$` included.
   */
  joinCompounds(expression: string): string {
    const { phrases, joined } = this.vocabulary;
    let text = expression.toLowerCase();
    for (let i = 0; i < phrases.length; i++) {
      const replacement = joined[i];
      text = text.replaceAll(phrases[i], () => replacement);
    }
    return text;
  }

  protected override computeMorphemes(expression: string): Morpheme[] {
    const morphemes = splitOnSpaces(this.joinCompounds(expression));
    if (this.vocabulary.phrases.length === 0) return morphemes;

    // Only the base form gets its spaces back
    return morphemes.map((m) => ({
      ...m,
      base: m.base.replaceAll(JOINER, ' ')
    }));
  }

  override describe(): string {
    return 'Vietnamese';
  }
}
