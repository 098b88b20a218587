/**
 * In-memory read-through cache with a fixed TTL.
 * Entries are never updated in place; they expire and get replaced on the next miss.
 */
type Entry<V> = { value: V; expiresAt: number };

export interface TtlCacheOptions {
  ttlMs: number;
  now?: () => number;
}

export class TtlCache<V> {
  private readonly entries = new Map<string, Entry<V>>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: TtlCacheOptions) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt > this.now()) return entry.value;
    this.entries.delete(key);
    return undefined;
  }

  set(key: string, value: V): void {
    const now = this.now();
    this.sweep(now);
    this.entries.set(key, { value, expiresAt: now + this.ttlMs });
  }

  /** Drops every entry that has expired by `now`. */
  private sweep(now: number): void {
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) this.entries.delete(key);
    }
  }

  /**
   * Returns the cached value or loads, stores and returns a fresh one.
   * Failed loads are not cached.
   */
  async getOrLoad(key: string, load: () => Promise<V>): Promise<V> {
    const hit = this.get(key);
    if (hit !== undefined) return hit;
    const value = await load();
    this.set(key, value);
    return value;
  }

  get size(): number {
    return this.entries.size;
  }
}
