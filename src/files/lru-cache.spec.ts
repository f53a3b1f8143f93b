import { LRUCache } from './lru-cache';

describe('LRUCache', () => {
  it('returns stored values', () => {
    const cache = new LRUCache<number>(2);
    cache.set('a', 1);
    expect(cache.get('a')).toBe(1);
    expect(cache.get('b')).toBeUndefined();
  });

  it('evicts the least recently used entry', () => {
    const cache = new LRUCache<number>(2);
    cache.set('a', 1);
    cache.set('b', 2);
    cache.set('c', 3);

    expect(cache.has('a')).toBe(false);
    expect(cache.has('b')).toBe(true);
    expect(cache.has('c')).toBe(true);
    expect(cache.size).toBe(2);
  });

  it('refreshes recency on get', () => {
    const cache = new LRUCache<number>(2);
    cache.set('a', 1);
    cache.set('b', 2);
    cache.get('a');
    cache.set('c', 3);

    expect(cache.has('a')).toBe(true);
    expect(cache.has('b')).toBe(false);
  });

  it('does not refresh recency on has', () => {
    const cache = new LRUCache<number>(2);
    cache.set('a', 1);
    cache.set('b', 2);
    cache.has('a');
    cache.set('c', 3);

    expect(cache.has('a')).toBe(false);
  });

  it('overwrites an existing key without growing', () => {
    const cache = new LRUCache<number>(2);
    cache.set('a', 1);
    cache.set('b', 2);
    cache.set('a', 10);
    cache.set('c', 3);

    expect(cache.get('a')).toBe(10);
    expect(cache.has('b')).toBe(false);
    expect(cache.size).toBe(2);
  });

  it.each([0, -1, 1.5, Number.NaN])('rejects size %p', (size) => {
    expect(() => new LRUCache<number>(size)).toThrow(RangeError);
  });
});
