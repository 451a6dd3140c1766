// In-process stand-ins for the external analyzers
import { AnalyzerError, createTokenMorpheme, type ChineseSegmenter, type JapaneseAnalyzer, type Morpheme, type TaggedWord } from '@morphseg/core';

export class FakeJapaneseAnalyzer implements JapaneseAnalyzer {
  readonly inputs: string[] = [];
  available = true;

  constructor(
    private readonly responses: Record<string, Morpheme[]> = {},
    private readonly version: string = 'ipadic v102'
  ) {}

  analyze(text: string): Morpheme[] {
    this.inputs.push(text);
    if (!this.available) {
      throw new AnalyzerError('mecab', 'failed to run mecab: spawn mecab ENOENT');
    }
    return this.responses[text] ?? [...text].map((char) => createTokenMorpheme(char));
  }

  identity(): string {
    if (!this.available) {
      throw new AnalyzerError('mecab', 'failed to run mecab: spawn mecab ENOENT');
    }
    return this.version;
  }
}

export class FakeChineseSegmenter implements ChineseSegmenter {
  readonly inputs: string[] = [];
  available = true;

  constructor(private readonly responses: Record<string, TaggedWord[]> = {}) {}

  cut(text: string): TaggedWord[] {
    this.inputs.push(text);
    if (!this.available) {
      throw new AnalyzerError('jieba', 'dictionary not loaded');
    }
    return this.responses[text] ?? [...text].map((word) => ({ word, flag: 'x' }));
  }
}
