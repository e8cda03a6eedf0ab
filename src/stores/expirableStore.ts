type Entry<V> = {
  value: V;
  expiresAt: number; // timestamp ms
};

export type ExpirableStoreOptions = {
  defaultTtlMs: number;
  // 0 disables the background sweep; expired entries are then dropped on access only
  cleanupIntervalMs?: number;
  slidingExpiration?: boolean;
  now?: () => number;
};

/**
 * In-process map whose entries expire. An entry is visible only while
 * `now < expiresAt`; expired entries are dropped when touched and by the
 * periodic sweep.
 */
export class ExpirableStore<K, V> {
  private readonly items = new Map<K, Entry<V>>();
  private readonly now: () => number;
  private readonly slidingExpiration: boolean;
  private timer: NodeJS.Timeout | undefined;
  private ttlMs: number;

  constructor(options: ExpirableStoreOptions) {
    const { defaultTtlMs, cleanupIntervalMs = 60_000, slidingExpiration = false, now = Date.now } = options;
    this.ttlMs = defaultTtlMs;
    this.now = now;
    this.slidingExpiration = slidingExpiration;
    if (cleanupIntervalMs > 0) {
      this.timer = setInterval(() => this.sweep(), cleanupIntervalMs);
      this.timer.unref();
    }
  }

  get defaultTtlMs(): number {
    return this.ttlMs;
  }

  // Applies to entries written afterwards
  set defaultTtlMs(ttlMs: number) {
    this.ttlMs = ttlMs;
  }

  get(key: K): V | undefined {
    const now = this.now();
    const entry = this.items.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= now) {
      this.items.delete(key);
      return undefined;
    }
    if (this.slidingExpiration) entry.expiresAt = now + this.ttlMs;
    return entry.value;
  }

  has(key: K): boolean {
    return this.get(key) !== undefined;
  }

  set(key: K, value: V, ttlMs: number = this.ttlMs): void {
    this.items.set(key, { value, expiresAt: this.now() + ttlMs });
  }

  /**
   * Returns the live value for `key`, inserting `create()` when there is none.
   * The deadline is pushed to `now + ttl` on every call, so only idle keys
   * ever expire.
   */
  getOrCreate(key: K, create: () => V, ttlMs: number = this.ttlMs): V {
    const now = this.now();
    const entry = this.items.get(key);
    if (entry && entry.expiresAt > now) {
      entry.expiresAt = now + ttlMs;
      return entry.value;
    }
    const value = create();
    this.items.set(key, { value, expiresAt: now + ttlMs });
    return value;
  }

  delete(key: K): boolean {
    return this.items.delete(key);
  }

  clear(): void {
    this.items.clear();
  }

  get size(): number {
    const now = this.now();
    let count = 0;
    for (const entry of this.items.values()) {
      if (entry.expiresAt > now) count += 1;
    }
    return count;
  }

  keys(): K[] {
    return this.entries().map(([key]) => key);
  }

  entries(): Array<[K, V]> {
    const now = this.now();
    const live: Array<[K, V]> = [];
    for (const [key, entry] of this.items) {
      if (entry.expiresAt > now) live.push([key, entry.value]);
    }
    return live;
  }

  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.items) {
      if (entry.expiresAt <= now) {
        this.items.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }
}
