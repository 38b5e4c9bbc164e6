/**
 * Tests for the response cache and request fingerprints
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ResponseCache } from '../response-cache.js';
import { fingerprint, routeCachePrefix } from '../fingerprint.js';

describe('fingerprint', () => {
  it('should prefix the digest with the route id', () => {
    expect(fingerprint('GET /items')).toMatch(/^GET \/items\|[0-9a-f]{32}$/);
    expect(routeCachePrefix('GET /items')).toBe('GET /items|');
  });

  it('should ignore query parameter order', () => {
    const fromString = fingerprint('GET /items', { query: 'b=2&a=1' });
    const fromRecord = fingerprint('GET /items', { query: { a: '1', b: '2' } });
    const fromParams = fingerprint('GET /items', { query: new URLSearchParams([['a', '1'], ['b', '2']]) });

    expect(fromRecord).toBe(fromString);
    expect(fromParams).toBe(fromString);
  });

  it('should keep the order of repeated values', () => {
    expect(fingerprint('GET /items', { query: 'tag=x&tag=y' }))
      .not.toBe(fingerprint('GET /items', { query: 'tag=y&tag=x' }));
  });

  it('should tell routes, queries and attributes apart', () => {
    const base = fingerprint('GET /items', { query: 'page=1' });
    expect(fingerprint('GET /orders', { query: 'page=1' })).not.toBe(base);
    expect(fingerprint('GET /items', { query: 'page=2' })).not.toBe(base);
    expect(fingerprint('GET /items', { query: 'page=1', attributes: { accept: 'text/csv' } })).not.toBe(base);
  });

  it('should normalize attribute names and skip missing values', () => {
    expect(fingerprint('GET /items', { attributes: { Accept: 'json' } }))
      .toBe(fingerprint('GET /items', { attributes: { accept: 'json' } }));
    expect(fingerprint('GET /items', { attributes: { tenant: undefined } }))
      .toBe(fingerprint('GET /items'));
  });
});

describe('ResponseCache', () => {
  let now: number;
  let cache: ResponseCache<string>;

  beforeEach(() => {
    now = 0;
    cache = new ResponseCache<string>({ maxEntries: 2, defaultTtlMs: 1000 }, () => now);
  });

  it('should expire entries at createdAt + ttl', () => {
    cache.set('a', 'alpha');

    now = 999;
    expect(cache.get('a')).toBe('alpha');

    now = 1000;
    expect(cache.get('a')).toBeUndefined();
    expect(cache.size).toBe(0);
    expect(cache.stats()).toMatchObject({ hits: 1, misses: 1, expirations: 1 });
  });

  it('should honour a per-entry ttl', () => {
    cache.set('a', 'alpha', 50);
    now = 50;
    expect(cache.has('a')).toBe(false);
  });

  it('should evict the least recently used entry when full', () => {
    cache.set('a', 'alpha');
    cache.set('b', 'beta');
    cache.get('a');

    expect(cache.set('c', 'gamma')).toBe('b');
    expect(cache.has('a')).toBe(true);
    expect(cache.has('b')).toBe(false);
    expect(cache.has('c')).toBe(true);
    expect(cache.stats().evictions).toBe(1);
  });

  it('should overwrite an existing key without evicting', () => {
    cache.set('a', 'alpha');
    cache.set('b', 'beta');

    expect(cache.set('a', 'alpha-2')).toBeUndefined();
    expect(cache.get('a')).toBe('alpha-2');
    expect(cache.size).toBe(2);
  });

  it('should not count has() as a use', () => {
    cache.set('a', 'alpha');
    expect(cache.has('a')).toBe(true);
    expect(cache.stats()).toMatchObject({ hits: 0, misses: 0 });
  });

  it('should drop entries by route prefix', () => {
    const big = new ResponseCache<string>({ maxEntries: 10, defaultTtlMs: 1000 }, () => now);
    big.set(fingerprint('GET /items', { query: 'page=1' }), 'p1');
    big.set(fingerprint('GET /items', { query: 'page=2' }), 'p2');
    big.set(fingerprint('GET /items/:id', { query: 'x=1' }), 'one');

    expect(big.invalidatePrefix(routeCachePrefix('GET /items'))).toBe(2);
    expect(big.size).toBe(1);
  });

  it('should sweep expired entries', () => {
    cache.set('a', 'alpha', 10);
    cache.set('b', 'beta', 5000);

    now = 10;
    expect(cache.sweep()).toBe(1);
    expect(cache.size).toBe(1);
    expect(cache.stats().expirations).toBe(1);
  });

  it('should report the hit rate', () => {
    cache.set('a', 'alpha');
    cache.get('a');
    cache.get('a');
    cache.get('a');
    cache.get('missing');
    expect(cache.stats().hitRate).toBe(0.75);
  });

  it('should reject invalid configuration and ttl', () => {
    expect(() => new ResponseCache({ maxEntries: 0, defaultTtlMs: 1000 })).toThrow(RangeError);
    expect(() => new ResponseCache({ maxEntries: 1, defaultTtlMs: 0 })).toThrow(RangeError);
    expect(() => cache.set('a', 'alpha', 0)).toThrow(RangeError);
  });

  it('should empty itself and its counters on clear', () => {
    cache.set('a', 'alpha');
    cache.get('a');
    cache.clear();
    expect(cache.stats()).toMatchObject({ size: 0, hits: 0, misses: 0 });
  });
});
