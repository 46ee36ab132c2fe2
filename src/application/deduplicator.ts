export interface DeduplicatorOptions {
  /** Maximum number of remembered keys. The oldest entry is evicted first. */
  capacity: number;
  /** Entries older than this are forgotten. Omit to keep entries until evicted. */
  windowMs?: number | undefined;
  now?: () => number;
}

/**
 * Bounded recency set for the live path.
 *
 * A Map keeps insertion order, so the first key is always the oldest.
 * Gateways redeliver within seconds; the storage upsert is the real
 * idempotency guarantee, this only saves round-trips.
 */
export class Deduplicator {
  private readonly entries = new Map<string, number>();
  private readonly capacity: number;
  private readonly windowMs: number | undefined;
  private readonly now: () => number;

  constructor(opts: DeduplicatorOptions) {
    if (!Number.isInteger(opts.capacity) || opts.capacity < 1) {
      throw new Error(`Deduplicator capacity must be a positive integer, got ${opts.capacity}`);
    }
    this.capacity = opts.capacity;
    this.windowMs = opts.windowMs;
    this.now = opts.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  seen(key: string): boolean {
    const firstSeen = this.entries.get(key);
    if (firstSeen === undefined) return false;

    if (this.windowMs !== undefined && this.now() - firstSeen > this.windowMs) {
      this.entries.delete(key);
      return false;
    }
    return true;
  }

  record(key: string): void {
    const now = this.now();
    // Re-recording refreshes the position so the key is evicted last.
    this.entries.delete(key);
    this.entries.set(key, now);

    this.expire(now);
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  private expire(now: number): void {
    if (this.windowMs === undefined) return;
    for (const [key, firstSeen] of this.entries) {
      if (now - firstSeen <= this.windowMs) break;
      this.entries.delete(key);
    }
  }
}
