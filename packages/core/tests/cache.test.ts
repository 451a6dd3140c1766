import { describe, test, expect } from 'vitest';
import { Morphemizer, SegmentCache, SpaceMorphemizer, createTokenMorpheme, type Morpheme } from '@morphseg/core';

class CountingSpaceMorphemizer extends SpaceMorphemizer {
  calls = 0;

  protected override computeMorphemes(expression: string): Morpheme[] {
    this.calls++;
    return super.computeMorphemes(expression);
  }
}

class BareMorphemizer extends Morphemizer {
  readonly name = 'SpaceMorphemizer';
}

describe('Morphemizer memoization', () => {
  test('computes each expression once', () => {
    const m = new CountingSpaceMorphemizer();
    const first = m.segment('one two');
    const second = m.segment('one two');

    expect(second).toEqual(first);
    expect(second).toBe(first);
    expect(m.calls).toBe(1);
    expect(m.cacheStats()).toEqual({ hits: 1, misses: 1, size: 1 });
  });

  test('keys on the exact expression', () => {
    const m = new CountingSpaceMorphemizer();
    m.segment('Word');
    m.segment('word');
    m.segment('word ');

    expect(m.calls).toBe(3);
    expect(m.cacheStats().size).toBe(3);
  });

  test('instances do not share a cache', () => {
    const a = new CountingSpaceMorphemizer();
    const b = new CountingSpaceMorphemizer();
    a.segment('shared text');
    b.segment('shared text');

    expect(a.calls).toBe(1);
    expect(b.calls).toBe(1);
  });

  test('clearCache forgets results and counters', () => {
    const m = new CountingSpaceMorphemizer();
    m.segment('again');
    m.clearCache();
    m.segment('again');

    expect(m.calls).toBe(2);
    expect(m.cacheStats()).toEqual({ hits: 0, misses: 1, size: 1 });
  });

  test('results cannot be mutated through the cache', () => {
    const m = new SpaceMorphemizer();
    expect(Object.isFrozen(m.segment('frozen list'))).toBe(true);
  });

  test('base behaviour yields no morphemes', () => {
    const bare = new BareMorphemizer();
    expect(bare.segment('anything at all')).toEqual([]);
    expect(bare.describe()).toBe('No information available');
  });
});

describe('SegmentCache', () => {
  const compute = (expression: string) => [createTokenMorpheme(expression)];

  test('evicts the least recently used expression', () => {
    const cache = new SegmentCache(2);
    cache.getOrCompute('a', compute);
    cache.getOrCompute('b', compute);
    cache.getOrCompute('a', compute);
    cache.getOrCompute('c', compute);

    expect(cache.has('a')).toBe(true);
    expect(cache.has('b')).toBe(false);
    expect(cache.has('c')).toBe(true);
    expect(cache.stats()).toEqual({ hits: 1, misses: 3, size: 2 });
  });

  test('does not store a failed computation', () => {
    const cache = new SegmentCache();
    expect(() => cache.getOrCompute('x', () => { throw new Error('boom'); })).toThrow('boom');
    expect(cache.has('x')).toBe(false);
    expect(cache.stats()).toEqual({ hits: 0, misses: 0, size: 0 });
  });
});
