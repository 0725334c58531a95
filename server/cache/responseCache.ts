import type { Logger } from '../obs/logger';

interface CacheEntry<T> {
  key: string;
  value: T;
  expiresAt: number;
}

export interface ResponseCacheOptions {
  ttlMs: number;
  maxEntries: number;
  logger?: Logger;
}

/**
 * In-memory TTL cache. Entries are replaced wholesale and never served past expiry; an expired
 * entry is dropped on lookup. `getOrCompute` shares one in-flight computation per key.
 */
export class ResponseCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly pending = new Map<string, Promise<T>>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly logger?: Logger;

  constructor(options: ResponseCacheOptions) {
    this.ttlMs = options.ttlMs;
    this.maxEntries = options.maxEntries;
    this.logger = options.logger;
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (Date.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  put(key: string, value: T, ttlMs: number = this.ttlMs): void {
    if (ttlMs <= 0) {
      return;
    }
    // Re-inserting moves the key to the back of the eviction order.
    this.entries.delete(key);
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.logger?.debug('Cache entry evicted', { key: oldest.value });
    }
    this.entries.set(key, { key, value, expiresAt: Date.now() + ttlMs });
  }

  async getOrCompute(key: string, compute: () => Promise<T>, ttlMs: number = this.ttlMs): Promise<T> {
    const cached = this.get(key);
    if (cached !== undefined) {
      this.logger?.debug('Cache hit', { key });
      return cached;
    }

    const inFlight = this.pending.get(key);
    if (inFlight) {
      return inFlight;
    }

    this.logger?.debug('Cache miss', { key });
    const promise = (async () => {
      try {
        const value = await compute();
        this.put(key, value, ttlMs);
        return value;
      } finally {
        this.pending.delete(key);
      }
    })();
    this.pending.set(key, promise);
    return promise;
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
