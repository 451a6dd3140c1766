import { LRUCache } from 'lru-cache';
import type { Morpheme } from './types.js';

export const SEGMENT_CACHE_CAPACITY = 131072;

export interface SegmentCacheStats {
  hits: number;
  misses: number;
  size: number;
}

/**
 * Memo of segmentation results, keyed by the exact expression. No
 * normalization happens on the key: "Foo" and "foo" are separate entries.
 */
export class SegmentCache {
  private cache: LRUCache<string, readonly Morpheme[]>;
  private hits = 0;
  private misses = 0;

  constructor(capacity: number = SEGMENT_CACHE_CAPACITY) {
    this.cache = new LRUCache({ max: Math.max(1, Math.floor(capacity)) });
  }

  /**
   * Get the cached result for an expression, or compute and store it.
   */
  getOrCompute(expression: string, compute: (expression: string) => readonly Morpheme[]): readonly Morpheme[] {
    let morphemes = this.cache.get(expression);
    if (morphemes === undefined) {
      morphemes = Object.freeze([...compute(expression)]);
      this.cache.set(expression, morphemes);
      this.misses++;
    } else {
      this.hits++;
    }
    return morphemes;
  }

  has(expression: string): boolean {
    return this.cache.has(expression);
  }

  stats(): SegmentCacheStats {
    return { hits: this.hits, misses: this.misses, size: this.cache.size };
  }

  clear(): void {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
  }
}
