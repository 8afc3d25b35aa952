interface CacheEntry<T> {
  value: T;
  expiresAtMs: number;
  insertedAtMs: number;
}

export interface MemoryTtlCacheOptions {
  maxEntries?: number;
  now?: () => number;
}

/** Bounded, explicitly-expiring cache. Owned by whoever constructs it. */
export class MemoryTtlCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: MemoryTtlCacheOptions = {}) {
    this.maxEntries = Math.max(1, Math.floor(Number(options.maxEntries || 500)));
    this.now = options.now ?? Date.now;
  }

  public get(key: string): T | null {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAtMs <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  public set(key: string, value: T, ttlMs: number): void {
    const safeTtl = Math.max(1, Math.floor(Number(ttlMs) || 0));
    const now = this.now();
    this.entries.delete(key);
    this.entries.set(key, {
      value,
      insertedAtMs: now,
      expiresAtMs: now + safeTtl,
    });
    this.evictIfNeeded();
  }

  public invalidate(key: string): void {
    this.entries.delete(key);
  }

  public clear(): void {
    this.entries.clear();
  }

  public sweepExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries.entries()) {
      if (entry.expiresAtMs <= now) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  public size(): number {
    return this.entries.size;
  }

  // Map iteration order is insertion order, and `set` re-inserts, so the first keys are the oldest.
  private evictIfNeeded(): void {
    for (const key of this.entries.keys()) {
      if (this.entries.size <= this.maxEntries) return;
      this.entries.delete(key);
    }
  }
}
