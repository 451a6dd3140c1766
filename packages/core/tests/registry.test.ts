import { describe, test, expect } from 'vitest';
import {
  MORPHEMIZER_NAMES,
  MorphemizerRegistry,
  VietnameseMorphemizer,
  getAllMorphemizers,
  getDefaultRegistry,
  getMorphemizerByName,
  resetDefaultRegistry
} from '@morphseg/core';
import { FakeChineseSegmenter, FakeJapaneseAnalyzer } from '../../../test-utils/fakes.js';
import { missingFrequencyListPath, setupTests, writeFrequencyList } from '../../../test-utils/test-setup.js';

setupTests();

function createRegistry(frequencyListPath = missingFrequencyListPath()): MorphemizerRegistry {
  return new MorphemizerRegistry({
    japaneseAnalyzer: new FakeJapaneseAnalyzer(),
    chineseSegmenter: new FakeChineseSegmenter(),
    frequencyListPath
  });
}

describe('MorphemizerRegistry', () => {
  test('builds the five morphemizers in a fixed order', () => {
    const registry = createRegistry();
    expect(registry.names()).toEqual([...MORPHEMIZER_NAMES]);
  });

  test('returns the same instances on every call', () => {
    const registry = createRegistry();
    const first = registry.all();
    const second = registry.all();

    expect(second).toBe(first);
    second.forEach((m, i) => expect(m).toBe(first[i]));
  });

  test('looks morphemizers up by name', () => {
    const registry = createRegistry();
    const all = registry.all();

    for (const m of all) {
      expect(registry.byName(m.name)).toBe(m);
    }
    expect(registry.byName('Klingon')).toBeUndefined();
  });

  test('byName builds the registry on first use', () => {
    const registry = createRegistry();
    const vietnamese = registry.byName('VietnameseMorphemizer');

    expect(vietnamese).toBe(registry.all()[4]);
  });

  test('passes the frequency list to the Vietnamese morphemizer', () => {
    const registry = createRegistry(writeFrequencyList('bánh mì\t1\n'));
    const vietnamese = registry.byName('VietnameseMorphemizer');

    expect(vietnamese).toBeInstanceOf(VietnameseMorphemizer);
    expect(vietnamese?.segment('bánh mì').map((m) => m.base)).toEqual(['bánh mì']);
  });

  test('uses the injected analyzers', () => {
    const analyzer = new FakeJapaneseAnalyzer({}, 'unidic v1');
    const registry = new MorphemizerRegistry({ japaneseAnalyzer: analyzer, frequencyListPath: missingFrequencyListPath() });

    expect(registry.byName('MecabMorphemizer')?.describe()).toBe('Japanese unidic v1');
  });
});

describe('default registry', () => {
  test('is shared until reset', () => {
    const first = getAllMorphemizers();

    expect(getAllMorphemizers()).toBe(first);
    expect(getDefaultRegistry().all()).toBe(first);
    expect(getMorphemizerByName('SpaceMorphemizer')).toBe(first[0]);
    expect(getMorphemizerByName('Klingon')).toBeUndefined();

    resetDefaultRegistry();
    expect(getAllMorphemizers()).not.toBe(first);
  });
});
