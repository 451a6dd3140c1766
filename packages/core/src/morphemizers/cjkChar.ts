import { Morphemizer } from '../morphemizer.js';
import { matchCjkIdeographs } from '../characters.js';
import { CJK_CHAR, createTokenMorpheme, type Morpheme } from '../types.js';

/**
 * Splits an expression into single Chinese/Japanese/Korean ideographs,
 * dropping every other character.
 */
export class CjkCharMorphemizer extends Morphemizer {
  readonly name = 'CjkCharMorphemizer';

  protected override computeMorphemes(expression: string): Morpheme[] {
    return matchCjkIdeographs(expression).map((char) => createTokenMorpheme(char, CJK_CHAR));
  }

  override describe(): string {
    return 'CJK Characters';
  }
}
