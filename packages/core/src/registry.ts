// morphseg/registry - The fixed set of morphemizers, indexed by name

import type { Morphemizer, MorphemizerOptions } from './morphemizer.js';
import type { ChineseSegmenter, JapaneseAnalyzer } from './analyzers/types.js';
import { SpaceMorphemizer } from './morphemizers/space.js';
import { MecabMorphemizer } from './morphemizers/mecab.js';
import { JiebaMorphemizer } from './morphemizers/jieba.js';
import { CjkCharMorphemizer } from './morphemizers/cjkChar.js';
import { VietnameseMorphemizer } from './morphemizers/vietnamese.js';
import type { MorphemizerName } from './types.js';

export interface RegistryOptions extends MorphemizerOptions {
  japaneseAnalyzer?: JapaneseAnalyzer;
  chineseSegmenter?: ChineseSegmenter;
  frequencyListPath?: string;
}

/**
 * Builds every morphemizer on first access and hands out the same
 * instances, in the same order, afterwards.
 */
export class MorphemizerRegistry {
  private morphemizers: readonly Morphemizer[] | null = null;
  private readonly byNameMap = new Map<string, Morphemizer>();

  constructor(private readonly options: RegistryOptions = {}) {}

  all(): readonly Morphemizer[] {
    if (this.morphemizers === null) {
      const { japaneseAnalyzer, chineseSegmenter, frequencyListPath, cacheCapacity } = this.options;
      this.morphemizers = Object.freeze([
        new SpaceMorphemizer({ cacheCapacity }),
        new MecabMorphemizer({ cacheCapacity, analyzer: japaneseAnalyzer }),
        new JiebaMorphemizer({ cacheCapacity, segmenter: chineseSegmenter }),
        new CjkCharMorphemizer({ cacheCapacity }),
        new VietnameseMorphemizer({ cacheCapacity, frequencyListPath })
      ]);

      for (const m of this.morphemizers) {
        this.byNameMap.set(m.name, m);
      }
    }
    return this.morphemizers;
  }

  byName(name: string): Morphemizer | undefined {
    this.all();
    return this.byNameMap.get(name);
  }

  names(): MorphemizerName[] {
    return this.all().map((m) => m.name);
  }
}

let defaultRegistry: MorphemizerRegistry | null = null;

export function getDefaultRegistry(): MorphemizerRegistry {
  if (!defaultRegistry) {
    defaultRegistry = new MorphemizerRegistry();
  }
  return defaultRegistry;
}

/**
 * Drop the process-wide registry so the next access rebuilds it with the
 * current preferences.
 */
export function resetDefaultRegistry(): void {
  defaultRegistry = null;
}

export function getAllMorphemizers(): readonly Morphemizer[] {
  return getDefaultRegistry().all();
}

export function getMorphemizerByName(name: string): Morphemizer | undefined {
  return getDefaultRegistry().byName(name);
}
