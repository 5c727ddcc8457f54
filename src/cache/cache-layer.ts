import { createLogger } from '../utils';

const log = createLogger('cache');

/** `until` is the last bucket a candle series covers; it moves with the clock while `to` is in the future. */
export type CacheKey =
  | { kind: 'candles'; token: string; interval: string; from: number; to: number; until: number }
  | { kind: 'pnl'; wallet: string; token: string | '*'; asOf: number };

export function cacheKeyId(key: CacheKey): string {
  return key.kind === 'candles'
    ? `candles:${key.token}:${key.interval}:${key.from}:${key.to}:${key.until}`
    : `pnl:${key.wallet}:${key.token}:${key.asOf}`;
}

export interface CacheEntry<T> {
  key: CacheKey;
  payload: T;
  lastUpdated: number;
  fingerprint: string;
  expiresAt: number | null;
}

export interface Computed<T> {
  payload: T;
  /** Identifies the source data the payload was derived from. */
  fingerprint: string;
}

export interface CacheOptions {
  capacity: number;
  /** 0 disables expiry; entries then live until invalidated or evicted. */
  ttlMs?: number;
  now?: () => number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
  invalidations: number;
  size: number;
}

/**
 * Memoizes derived payloads by structured key. At most one computation per key is
 * in flight; concurrent callers share it. Entries are dropped, never patched, when
 * their source data changes, and the least recently used entry goes first once
 * capacity is reached.
 */
export class CacheLayer<T> {
  // Map iteration order doubles as recency order: oldest first
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly inFlight = new Map<string, { key: CacheKey; promise: Promise<T>; generation: number }>();
  // Bumped by invalidation; only kept while a computation for the id is running
  private readonly generations = new Map<string, number>();
  private readonly running = new Map<string, number>();
  private readonly capacity: number;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private invalidations = 0;

  constructor(opts: CacheOptions) {
    this.capacity = Math.max(1, opts.capacity);
    this.ttlMs = opts.ttlMs ?? 0;
    this.now = opts.now ?? Date.now;
  }

  async getOrCompute(key: CacheKey, compute: () => Promise<Computed<T>>): Promise<T> {
    const id = cacheKeyId(key);
    const cached = this.lookup(id);
    if (cached) {
      this.hits++;
      return cached.payload;
    }

    const pending = this.inFlight.get(id);
    if (pending) {
      this.hits++;
      return pending.promise;
    }

    this.misses++;
    const generation = this.generations.get(id) ?? 0;
    this.running.set(id, (this.running.get(id) ?? 0) + 1);
    const promise = this.run(id, key, generation, compute);
    this.inFlight.set(id, { key, promise, generation });
    return promise;
  }

  private async run(id: string, key: CacheKey, generation: number, compute: () => Promise<Computed<T>>): Promise<T> {
    try {
      // Deferred a tick so the in-flight slot is registered before compute starts
      const { payload, fingerprint } = await Promise.resolve().then(compute);
      // An invalidation landed while computing: hand the result out but do not keep it
      if ((this.generations.get(id) ?? 0) === generation) {
        this.store(id, key, payload, fingerprint);
      } else {
        log.debug('Discarding result invalidated mid-computation', { key: id });
      }
      return payload;
    } finally {
      if (this.inFlight.get(id)?.generation === generation) {
        this.inFlight.delete(id);
      }
      const left = (this.running.get(id) ?? 1) - 1;
      if (left > 0) {
        this.running.set(id, left);
      } else {
        this.running.delete(id);
        this.generations.delete(id);
      }
    }
  }

  private lookup(id: string): CacheEntry<T> | undefined {
    const entry = this.entries.get(id);
    if (!entry) return undefined;
    if (entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      this.entries.delete(id);
      return undefined;
    }
    // Refresh recency
    this.entries.delete(id);
    this.entries.set(id, entry);
    return entry;
  }

  private store(id: string, key: CacheKey, payload: T, fingerprint: string) {
    const now = this.now();
    this.entries.delete(id);
    this.entries.set(id, {
      key,
      payload,
      lastUpdated: now,
      fingerprint,
      expiresAt: this.ttlMs > 0 ? now + this.ttlMs : null,
    });

    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions++;
      log.debug('Evicted least recently used entry', { key: oldest.value });
    }
  }

  private bump(id: string) {
    if (this.running.has(id)) {
      this.generations.set(id, (this.generations.get(id) ?? 0) + 1);
    }
    // Later callers must recompute rather than join the stale computation
    this.inFlight.delete(id);
  }

  invalidate(keys: CacheKey[]): number {
    let dropped = 0;
    for (const key of keys) {
      const id = cacheKeyId(key);
      if (this.entries.delete(id)) dropped++;
      this.bump(id);
    }
    this.invalidations += dropped;
    if (dropped > 0) log.debug('Invalidated cache entries', { dropped });
    return dropped;
  }

  /** Drops every entry, and every in-flight computation, whose key matches. */
  invalidateWhere(predicate: (key: CacheKey) => boolean): number {
    const matches: CacheKey[] = [];
    for (const entry of this.entries.values()) {
      if (predicate(entry.key)) matches.push(entry.key);
    }
    for (const [id, pending] of Array.from(this.inFlight)) {
      if (!this.entries.has(id) && predicate(pending.key)) this.bump(id);
    }
    return this.invalidate(matches);
  }

  peek(key: CacheKey): CacheEntry<T> | undefined {
    return this.entries.get(cacheKeyId(key));
  }

  keys(): CacheKey[] {
    return Array.from(this.entries.values(), e => e.key);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Invalidation counters currently held for running computations. */
  get trackedGenerations(): number {
    return this.generations.size;
  }

  stats(): CacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      invalidations: this.invalidations,
      size: this.entries.size,
    };
  }

  clear() {
    for (const id of this.entries.keys()) this.bump(id);
    this.entries.clear();
  }
}
