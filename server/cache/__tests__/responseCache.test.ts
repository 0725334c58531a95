import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ResponseCache } from '../responseCache';

describe('ResponseCache', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-01T00:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('serves entries until the TTL elapses, then drops them', () => {
    const cache = new ResponseCache<string>({ ttlMs: 1_000, maxEntries: 10 });
    cache.put('k', 'v');
    vi.advanceTimersByTime(999);
    expect(cache.get('k')).toBe('v');
    vi.advanceTimersByTime(1);
    expect(cache.get('k')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('honours a per-entry TTL', () => {
    const cache = new ResponseCache<string>({ ttlMs: 1_000, maxEntries: 10 });
    cache.put('short', 'v', 10);
    vi.advanceTimersByTime(10);
    expect(cache.get('short')).toBeUndefined();
  });

  it('evicts the oldest entry at capacity', () => {
    const cache = new ResponseCache<number>({ ttlMs: 1_000, maxEntries: 2 });
    cache.put('a', 1);
    cache.put('b', 2);
    cache.put('a', 3);
    cache.put('c', 4);
    expect(cache.get('b')).toBeUndefined();
    expect(cache.get('a')).toBe(3);
    expect(cache.get('c')).toBe(4);
  });

  it('shares one computation between concurrent callers for the same key', async () => {
    const cache = new ResponseCache<string>({ ttlMs: 1_000, maxEntries: 10 });
    let release: (value: string) => void = () => {};
    const compute = vi.fn(() => new Promise<string>((resolve) => (release = resolve)));

    const first = cache.getOrCompute('k', compute);
    const second = cache.getOrCompute('k', compute);
    release('done');

    await expect(Promise.all([first, second])).resolves.toEqual(['done', 'done']);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('computes different keys independently', async () => {
    const cache = new ResponseCache<string>({ ttlMs: 1_000, maxEntries: 10 });
    const compute = vi.fn(async () => 'x');
    await Promise.all([cache.getOrCompute('a', compute), cache.getOrCompute('b', compute)]);
    expect(compute).toHaveBeenCalledTimes(2);
  });

  it('recomputes after expiry', async () => {
    const cache = new ResponseCache<number>({ ttlMs: 1_000, maxEntries: 10 });
    let calls = 0;
    const compute = async () => {
      calls += 1;
      return calls;
    };
    expect(await cache.getOrCompute('k', compute)).toBe(1);
    expect(await cache.getOrCompute('k', compute)).toBe(1);
    vi.advanceTimersByTime(1_000);
    expect(await cache.getOrCompute('k', compute)).toBe(2);
  });

  it('does not cache a rejected computation', async () => {
    const cache = new ResponseCache<string>({ ttlMs: 1_000, maxEntries: 10 });
    await expect(cache.getOrCompute('k', async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    expect(cache.size).toBe(0);
    await expect(cache.getOrCompute('k', async () => 'ok')).resolves.toBe('ok');
  });

  it('supports delete and clear', () => {
    const cache = new ResponseCache<string>({ ttlMs: 1_000, maxEntries: 10 });
    cache.put('a', '1');
    cache.put('b', '2');
    expect(cache.delete('a')).toBe(true);
    cache.clear();
    expect(cache.size).toBe(0);
  });
});
