import { describe, test, expect } from 'vitest';
import {
  AnalyzerError,
  MecabMorphemizer,
  UNAVAILABLE,
  createMorpheme,
  formatMecabIdentity,
  parseMecabDictionaryInfo,
  parseMecabOutput
} from '@morphseg/core';
import { FakeJapaneseAnalyzer } from '../../../test-utils/fakes.js';

describe('MecabMorphemizer', () => {
  test('removes spaces before analysis', () => {
    const analyzer = new FakeJapaneseAnalyzer();
    const mecab = new MecabMorphemizer({ analyzer });
    mecab.segment('今日 は 晴れ');

    expect(analyzer.inputs).toEqual(['今日は晴れ']);
  });

  test('passes analyzer morphemes through unchanged', () => {
    const kyou = createMorpheme('今日', '今日', '今日', 'キョウ', '名詞', '副詞可能');
    const wa = createMorpheme('は', 'は', 'は', 'ハ', '助詞', '係助詞');
    const mecab = new MecabMorphemizer({ analyzer: new FakeJapaneseAnalyzer({ '今日は': [kyou, wa] }) });

    expect(mecab.segment('今日は')).toEqual([kyou, wa]);
  });

  test('describes the analyzer', () => {
    const mecab = new MecabMorphemizer({ analyzer: new FakeJapaneseAnalyzer({}, 'ipadic v102') });
    expect(mecab.describe()).toBe('Japanese ipadic v102');
  });

  test('description survives an unavailable analyzer', () => {
    const analyzer = new FakeJapaneseAnalyzer();
    analyzer.available = false;
    const mecab = new MecabMorphemizer({ analyzer });

    expect(mecab.describe()).toBe(`Japanese ${UNAVAILABLE}`);
  });

  test('segmentation surfaces analyzer failures and caches nothing', () => {
    const analyzer = new FakeJapaneseAnalyzer();
    analyzer.available = false;
    const mecab = new MecabMorphemizer({ analyzer });

    expect(() => mecab.segment('猫')).toThrow(AnalyzerError);
    expect(() => mecab.segment('猫')).toThrow(AnalyzerError);
    expect(analyzer.inputs).toEqual(['猫', '猫']);
    expect(mecab.cacheStats().size).toBe(0);
  });
});

describe('parseMecabOutput', () => {
  test('reads one morpheme per node', () => {
    const output = [
      '今日\t名詞\t副詞可能\t今日\tキョウ',
      'は\t助詞\t係助詞\tは\tハ',
      'EOS',
      ''
    ].join('\n');

    expect(parseMecabOutput(output)).toEqual([
      createMorpheme('今日', '今日', '今日', 'キョウ', '名詞', '副詞可能'),
      createMorpheme('は', 'は', 'は', 'ハ', '助詞', '係助詞')
    ]);
  });

  test('uses the base form as normalized form', () => {
    const [m] = parseMecabOutput('食べ\t動詞\t自立\t食べる\tタベ\nEOS\n');
    expect(m).toEqual(createMorpheme('食べる', '食べる', '食べ', 'タベ', '動詞', '自立'));
  });

  test('falls back to the surface form for missing features', () => {
    const [m] = parseMecabOutput('ググる\t動詞\t自立\t*\t*\nEOS\n');
    expect(m.base).toBe('ググる');
    expect(m.read).toBe('ググる');
  });

  test('drops symbols and numbers', () => {
    const output = '猫\t名詞\t一般\t猫\tネコ\n。\t記号\t句点\t。\t。\n3\t名詞\t数\t3\tサン\nEOS\n';
    expect(parseMecabOutput(output).map((m) => m.base)).toEqual(['猫']);
  });

  test('keeps unknown words', () => {
    const [m] = parseMecabOutput('ほげ\tUNKNOWN\tUNKNOWN\tほげ\tほげ\nEOS\n');
    expect(m.pos).toBe('UNKNOWN');
    expect(m.inflected).toBe('ほげ');
  });

  test('rejects lines in another format', () => {
    expect(() => parseMecabOutput('猫,名詞,一般\nEOS\n')).toThrow(AnalyzerError);
  });
});

describe('MeCab dictionary info', () => {
  const output = [
    'filename:\t/var/lib/mecab/dic/ipadic/sys.dic',
    'version:\t102',
    'charset:\tutf8',
    'type:\t0'
  ].join('\n');

  test('parses mecab -D', () => {
    expect(parseMecabDictionaryInfo(output)).toEqual({
      filename: '/var/lib/mecab/dic/ipadic/sys.dic',
      version: '102',
      charset: 'utf8'
    });
  });

  test('names the dictionary directory', () => {
    expect(formatMecabIdentity(parseMecabDictionaryInfo(output))).toBe('ipadic v102');
    expect(formatMecabIdentity({ filename: '/opt/unidic/sys.dic' })).toBe('unidic');
  });

  test('requires a filename', () => {
    expect(() => parseMecabDictionaryInfo('version:\t102\n')).toThrow(AnalyzerError);
  });
});
