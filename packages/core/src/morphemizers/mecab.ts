import { Morphemizer, type MorphemizerOptions } from '../morphemizer.js';
import { MecabAnalyzer } from '../analyzers/mecab.js';
import type { JapaneseAnalyzer } from '../analyzers/types.js';
import { describeError, dp } from '../log.js';
import type { Morpheme } from '../types.js';

export const UNAVAILABLE = 'UNAVAILABLE';

export interface MecabMorphemizerOptions extends MorphemizerOptions {
  analyzer?: JapaneseAnalyzer;
}

/**
 * Japanese has no spaces between morphemes, so segmentation is left to
 * MeCab.
 */
export class MecabMorphemizer extends Morphemizer {
  readonly name = 'MecabMorphemizer';
  private readonly analyzer: JapaneseAnalyzer;

  constructor(options: MecabMorphemizerOptions = {}) {
    super(options);
    this.analyzer = options.analyzer ?? new MecabAnalyzer();
  }

  protected override computeMorphemes(expression: string): Morpheme[] {
    // Spaces inserted by other tools break the analysis
    return this.analyzer.analyze(expression.replaceAll(' ', ''));
  }

  override describe(): string {
    let identity: string;
    try {
      identity = this.analyzer.identity();
    } catch (error) {
      dp(`mecab identity unavailable: ${describeError(error)}`);
      identity = UNAVAILABLE;
    }
    return `Japanese ${identity}`;
  }
}
