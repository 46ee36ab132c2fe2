import type { EventKind, QueueItem } from '../domain/index.js';

export type EnqueueResult =
  | { accepted: true }
  | { accepted: false; reason: 'queue_full' | 'closed' };

export interface EventQueueOptions {
  kind: EventKind;
  /** Capacity of the live lane. */
  capacity: number;
  /** Capacity of the backfill lane, kept separate so history never crowds out live traffic. */
  backfillCapacity: number;
  /** Fraction of each drained batch reserved for backfill items (0..1). */
  backfillShare: number;
}

export interface QueueStats {
  kind: EventKind;
  depth: number;
  live_depth: number;
  backfill_depth: number;
  dropped: number;
  closed: boolean;
}

/**
 * Bounded in-memory buffer for one event kind.
 *
 * `enqueue` is synchronous and never waits: a full lane rejects the item
 * and bumps the dropped counter. FIFO holds within each lane.
 */
export class EventQueue {
  readonly kind: EventKind;
  private readonly live: QueueItem[] = [];
  private readonly backfill: QueueItem[] = [];
  private readonly capacity: number;
  private readonly backfillCapacity: number;
  private readonly backfillShare: number;
  private droppedCount = 0;
  private isClosed = false;

  constructor(opts: EventQueueOptions) {
    this.kind = opts.kind;
    this.capacity = opts.capacity;
    this.backfillCapacity = opts.backfillCapacity;
    this.backfillShare = Math.min(1, Math.max(0, opts.backfillShare));
  }

  enqueue(item: QueueItem): EnqueueResult {
    if (this.isClosed) {
      return { accepted: false, reason: 'closed' };
    }

    if (item.source === 'backfill') {
      if (this.backfill.length >= this.backfillCapacity) {
        this.droppedCount++;
        return { accepted: false, reason: 'queue_full' };
      }
      this.backfill.push(item);
      return { accepted: true };
    }

    if (this.live.length >= this.capacity) {
      this.droppedCount++;
      return { accepted: false, reason: 'queue_full' };
    }
    this.live.push(item);
    return { accepted: true };
  }

  /**
   * Removes up to `maxItems`, oldest first within each lane.
   *
   * Backfill gets at most its reserved share while live items wait; any
   * slots live cannot fill go to backfill, so neither lane starves.
   */
  drain(maxItems: number): QueueItem[] {
    if (maxItems <= 0) return [];

    const backfillQuota = this.backfillShare > 0
      ? Math.max(1, Math.floor(maxItems * this.backfillShare))
      : 0;
    const reserved = Math.min(backfillQuota, this.backfill.length);
    const liveTake = Math.min(this.live.length, maxItems - reserved);
    const backfillTake = Math.min(this.backfill.length, maxItems - liveTake);

    return [...this.live.splice(0, liveTake), ...this.backfill.splice(0, backfillTake)];
  }

  /** Stops accepting items. Already queued items stay drainable. */
  close(): void {
    this.isClosed = true;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  get depth(): number {
    return this.live.length + this.backfill.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  stats(): QueueStats {
    return {
      kind: this.kind,
      depth: this.depth,
      live_depth: this.live.length,
      backfill_depth: this.backfill.length,
      dropped: this.droppedCount,
      closed: this.isClosed,
    };
  }
}
