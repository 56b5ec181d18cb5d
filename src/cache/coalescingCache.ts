import { systemClock, type Clock } from '../lib/clock';
import { ReportServiceError } from '../lib/errors';

export type CacheEntry<T> = {
  value: T;
  fetchedAt: number;
  expiresAt: number;
  lastAccess: number;
};

export type CacheLookup<T> = {
  value: T;
  fetchedAt: number;
  hit: boolean;
};

export type CacheStats = {
  size: number;
  inFlight: number;
  maxEntries: number | null;
  hits: number;
  misses: number;
  coalesced: number;
  fetches: number;
  evictions: number;
};

export type CoalescingCacheOptions = {
  ttlMs: number;
  maxEntries?: number | null;
  clock?: Clock;
};

export type GetOrFetchOptions = {
  /** Abandons this caller's wait only; the shared fetch keeps running. */
  signal?: AbortSignal;
};

/**
 * TTL cache with in-flight request deduplication.
 *
 * A live entry is returned without calling the fetcher. On a miss the first
 * caller starts the fetch and every concurrent caller for the same key waits on
 * that one promise; success is stored before any waiter resumes, failure is
 * handed to all of them and nothing is stored. Expiry is checked on read.
 */
export class CoalescingCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly inFlight = new Map<string, Promise<CacheEntry<T>>>();
  private readonly ttlMs: number;
  private readonly maxEntries: number | null;
  private readonly clock: Clock;

  private hits = 0;
  private misses = 0;
  private coalesced = 0;
  private fetches = 0;
  private evictions = 0;

  constructor(options: CoalescingCacheOptions) {
    if (!(options.ttlMs > 0)) {
      throw new Error('Cache TTL must be greater than zero');
    }

    this.ttlMs = options.ttlMs;
    this.maxEntries = options.maxEntries ?? null;
    this.clock = options.clock ?? systemClock;
  }

  /** Returns the live entry for a key, dropping it if it has expired. */
  peek(key: string): CacheEntry<T> | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    const now = this.clock();
    if (now - entry.fetchedAt > this.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }

    entry.lastAccess = now;
    return entry;
  }

  isInFlight(key: string): boolean {
    return this.inFlight.has(key);
  }

  async getOrFetch(
    key: string,
    fetchFn: () => Promise<T>,
    options: GetOrFetchOptions = {},
  ): Promise<CacheLookup<T>> {
    const live = this.peek(key);
    if (live) {
      this.hits += 1;
      return { value: live.value, fetchedAt: live.fetchedAt, hit: true };
    }

    this.misses += 1;

    let pending = this.inFlight.get(key);
    if (pending) {
      this.coalesced += 1;
    } else {
      pending = this.startFetch(key, fetchFn);
    }

    const entry = await this.waitFor(pending, options.signal);
    return { value: entry.value, fetchedAt: entry.fetchedAt, hit: false };
  }

  /** Removes expired entries. Reads never depend on this having run. */
  sweep(): number {
    const now = this.clock();
    let removed = 0;

    for (const [key, entry] of this.entries) {
      if (now - entry.fetchedAt > this.ttlMs) {
        this.entries.delete(key);
        removed += 1;
      }
    }

    return removed;
  }

  stats(): CacheStats {
    return {
      size: this.entries.size,
      inFlight: this.inFlight.size,
      maxEntries: this.maxEntries,
      hits: this.hits,
      misses: this.misses,
      coalesced: this.coalesced,
      fetches: this.fetches,
      evictions: this.evictions,
    };
  }

  // Registration happens synchronously, before the fetcher runs, so no other
  // caller can slip in between the miss and the in-flight record.
  private startFetch(key: string, fetchFn: () => Promise<T>): Promise<CacheEntry<T>> {
    this.fetches += 1;

    const fetchPromise: Promise<CacheEntry<T>> = Promise.resolve()
      .then(fetchFn)
      .then((value) => {
        const fetchedAt = this.clock();
        const entry: CacheEntry<T> = {
          value,
          fetchedAt,
          expiresAt: fetchedAt + this.ttlMs,
          lastAccess: fetchedAt,
        };
        this.store(key, entry);
        return entry;
      })
      .finally(() => {
        if (this.inFlight.get(key) === fetchPromise) {
          this.inFlight.delete(key);
        }
      });

    this.inFlight.set(key, fetchPromise);
    return fetchPromise;
  }

  private store(key: string, entry: CacheEntry<T>): void {
    this.entries.delete(key);

    if (this.maxEntries !== null) {
      while (this.entries.size >= this.maxEntries) {
        if (!this.evictLeastRecentlyUsed()) {
          break;
        }
      }
    }

    this.entries.set(key, entry);
  }

  private evictLeastRecentlyUsed(): boolean {
    let oldestKey: string | null = null;
    let oldestAccess = Infinity;

    for (const [key, entry] of this.entries) {
      if (this.inFlight.has(key)) {
        continue;
      }

      if (entry.lastAccess < oldestAccess) {
        oldestAccess = entry.lastAccess;
        oldestKey = key;
      }
    }

    if (oldestKey === null) {
      return false;
    }

    this.entries.delete(oldestKey);
    this.evictions += 1;
    return true;
  }

  private waitFor(
    pending: Promise<CacheEntry<T>>,
    signal: AbortSignal | undefined,
  ): Promise<CacheEntry<T>> {
    if (!signal) {
      return pending;
    }

    return new Promise<CacheEntry<T>>((resolve, reject) => {
      const onAbort = () => {
        reject(
          new ReportServiceError('ServiceUnavailable', 'Request was cancelled before the report was ready'),
        );
      };

      // Subscribe first so the shared promise always has a handler, even for
      // a caller that has already given up.
      pending.then(
        (entry) => {
          signal.removeEventListener('abort', onAbort);
          resolve(entry);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        },
      );

      if (signal.aborted) {
        onAbort();
        return;
      }

      signal.addEventListener('abort', onAbort, { once: true });
    });
  }
}
