/**
 * @fileoverview Unit tests for CacheManager
 */

import { CacheManager } from '../../../src';

describe('CacheManager', () => {
  let now: number;
  const clock = (): number => now;

  beforeEach(() => {
    now = 1_000;
  });

  it('should evict the least recently used entry at capacity', () => {
    const cache = new CacheManager<string>({ capacity: 2, clock });

    cache.set('a', 'alpha');
    cache.set('b', 'beta');
    cache.get('a');
    cache.set('c', 'gamma');

    expect(cache.keys()).toEqual(['a', 'c']);
    expect(cache.get('b')).toBeUndefined();
  });

  it('should expire entries after their TTL', () => {
    const cache = new CacheManager<number>({ clock, defaultTtl: 50 });

    cache.set('short', 1, 10);
    cache.set('default', 2);
    now += 20;

    expect(cache.has('short')).toBe(false);
    expect(cache.get('default')).toBe(2);

    now += 40;
    expect(cache.prune()).toBe(1);
    expect(cache.size).toBe(0);
  });

  it('should clear only keys with the given prefix', () => {
    const cache = new CacheManager({ clock });

    cache.set('app-YQ==', 1);
    cache.set('app-Yg==', 2);
    cache.set('other-YQ==', 3);
    cache.clear('app-');

    expect(cache.keys()).toEqual(['other-YQ==']);
  });

  it('should count hits and misses until a full clear', () => {
    const cache = new CacheManager({ clock, capacity: 10 });

    cache.set('a', 1);
    cache.get('a');
    cache.get('a');
    cache.get('missing');

    expect(cache.stats()).toEqual({ hits: 2, misses: 1, size: 1, capacity: 10, hitRate: 2 / 3 });

    cache.clear();
    expect(cache.stats()).toEqual({ hits: 0, misses: 0, size: 0, capacity: 10, hitRate: 0 });
  });

  it('should compute a value once with getOrSet', () => {
    const cache = new CacheManager<number>({ clock });
    const factory = jest.fn(() => 42);

    expect(cache.getOrSet('answer', factory)).toBe(42);
    expect(cache.getOrSet('answer', factory)).toBe(42);
    expect(factory).toHaveBeenCalledTimes(1);
  });
});
