interface CachedResult<T> {
  timestamp: number;
  data: T;
}

/**
 * In-memory memoizer keyed by string. Entries older than `ttlMs` are
 * recomputed; without a TTL they live until evicted or `clear()`. Once
 * `maxEntries` keys are held, storing a new one evicts the oldest.
 */
export class TtlCache<T> {
  private readonly entries = new Map<string, CachedResult<T>>();

  constructor(
    private readonly ttlMs: number | undefined,
    private readonly maxEntries: number,
    private readonly now: () => number = () => Date.now(),
  ) {}

  get size(): number {
    return this.entries.size;
  }

  get(key: string): T | undefined {
    const cached = this.entries.get(key);
    if (!cached) {
      return undefined;
    }

    if (this.ttlMs !== undefined && this.now() - cached.timestamp >= this.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }

    return cached.data;
  }

  set(key: string, data: T): void {
    // Map iteration follows insertion order, so re-inserting makes the key the newest.
    this.entries.delete(key);

    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }

    this.entries.set(key, { timestamp: this.now(), data });
  }

  clear(): void {
    this.entries.clear();
  }
}
