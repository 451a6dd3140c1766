// morphseg/morphemizer - Base class shared by every segmentation strategy

import { SegmentCache, type SegmentCacheStats } from './cache.js';
import type { Morpheme, MorphemizerName } from './types.js';

export interface MorphemizerOptions {
  /** Maximum number of memoized expressions */
  cacheCapacity?: number;
}

export abstract class Morphemizer {
  /** Registry key. Constant for the life of the instance. */
  abstract readonly name: MorphemizerName;

  private readonly cache: SegmentCache;

  constructor(options: MorphemizerOptions = {}) {
    this.cache = new SegmentCache(options.cacheCapacity);
  }

  /**
   * Convert an expression to its morphemes, in order of occurrence.
   * Results are memoized per instance on the exact expression.
   */
  segment(expression: string): readonly Morpheme[] {
    return this.cache.getOrCompute(expression, (expr) => this.computeMorphemes(expr));
  }

  /**
   * Single line naming the languages this morphemizer handles. Never throws.
   */
  describe(): string {
    return 'No information available';
  }

  cacheStats(): SegmentCacheStats {
    return this.cache.stats();
  }

  clearCache(): void {
    this.cache.clear();
  }

  /**
   * The segmentation algorithm itself, without memoization.
   */
  protected computeMorphemes(_expression: string): Morpheme[] {
    return [];
  }
}
