import type { Logger } from 'pino';
import {
  EVENT_KINDS,
  RetryExhaustedError,
  RowRejectedError,
  comparePositions,
  describeError,
} from '../domain/index.js';
import type { EventKind, QueueItem } from '../domain/index.js';
import type { AlertSink, EventStore } from './ports.js';
import type { RowsByKind } from './event-schema.js';
import { rowValidators } from './event-schema.js';
import type { EventQueue } from './event-queue.js';
import type { CheckpointStore } from './checkpoint-store.js';
import type { RetryPolicy } from './retry-policy.js';

export interface BatchWriterOptions {
  batchSize: number;
  flushIntervalMs: number;
  /** A batch still failing this long after its first failure is dropped. */
  batchHardCeilingMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface BatchWriterDeps {
  queues: Readonly<Record<EventKind, EventQueue>>;
  store: EventStore;
  checkpoints: CheckpointStore;
  retryPolicy: RetryPolicy;
  alerts: AlertSink;
  log: Logger;
}

export interface ComponentError {
  message: string;
  at: string;
}

export interface WriterStats {
  flushes: number;
  committed: Record<EventKind, number>;
  validation_dropped: number;
  rejected_rows: number;
  fatal_dropped: number;
  retained: Record<EventKind, number>;
  last_flush_at: string | null;
  last_error: ComponentError | null;
}

interface RetainedBatch {
  items: QueueItem[];
  firstFailedAt: number;
}

interface Entry<K extends EventKind> {
  item: QueueItem;
  row: RowsByKind[K];
}

/**
 * Drains the event queues and persists them in per-kind batches.
 *
 * Flushes run on a timer and whenever a queue reaches `batchSize`. Only one
 * flush runs at a time; requests made meanwhile schedule a single follow-up.
 * Within a flush the kinds are written one after another, so a failing kind
 * never blocks the others past its own retries.
 */
export class BatchWriter {
  private readonly retained = new Map<EventKind, RetainedBatch>();
  private readonly now: () => number;
  private readonly sleep: ((ms: number) => Promise<void>) | undefined;
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;
  private followUp = false;

  private readonly counters: WriterStats = {
    flushes: 0,
    committed: { message: 0, action: 0 },
    validation_dropped: 0,
    rejected_rows: 0,
    fatal_dropped: 0,
    retained: { message: 0, action: 0 },
    last_flush_at: null,
    last_error: null,
  };

  constructor(
    private readonly deps: BatchWriterDeps,
    private readonly opts: BatchWriterOptions,
  ) {
    this.now = opts.now ?? Date.now;
    this.sleep = opts.sleep;
  }

  start(): void {
    if (this.timer !== null) return;
    this.timer = setInterval(() => this.requestFlush(), this.opts.flushIntervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer === null) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  /** Size trigger: called after an item was accepted into `kind`'s queue. */
  onEnqueued(kind: EventKind): void {
    if (this.deps.queues[kind].depth >= this.opts.batchSize) {
      this.requestFlush();
    }
  }

  requestFlush(): void {
    void this.flush().catch((err: unknown) => {
      this.recordError(err);
      this.deps.log.error({ err }, 'Flush failed');
    });
  }

  /** Resolves once the running flush and any follow-up it picked up are done. */
  flush(): Promise<void> {
    if (this.inFlight !== null) {
      this.followUp = true;
      return this.inFlight;
    }

    this.inFlight = this.runFlushes().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  /**
   * Flushes until nothing is pending or a flush makes no progress
   * (storage unavailable and the batch retained again).
   */
  async drainAll(): Promise<void> {
    let pending = this.pendingCount();
    while (pending > 0) {
      await this.flush();
      const after = this.pendingCount();
      if (after >= pending) {
        this.deps.log.warn({ pending: after }, 'Final drain made no progress');
        return;
      }
      pending = after;
    }
  }

  pendingCount(): number {
    let total = 0;
    for (const kind of EVENT_KINDS) {
      total += this.deps.queues[kind].depth + (this.retained.get(kind)?.items.length ?? 0);
    }
    return total;
  }

  stats(): WriterStats {
    return {
      ...this.counters,
      committed: { ...this.counters.committed },
      retained: {
        message: this.retained.get('message')?.items.length ?? 0,
        action: this.retained.get('action')?.items.length ?? 0,
      },
    };
  }

  private async runFlushes(): Promise<void> {
    do {
      this.followUp = false;
      for (const kind of EVENT_KINDS) {
        await this.flushKind(kind);
      }
      this.counters.flushes++;
      this.counters.last_flush_at = new Date(this.now()).toISOString();
    } while (this.followUp);
  }

  private async flushKind<K extends EventKind>(kind: K): Promise<void> {
    const retained = this.retained.get(kind);
    this.retained.delete(kind);
    const items = retained?.items ?? this.deps.queues[kind].drain(this.opts.batchSize);
    if (items.length === 0) return;

    const entries: Entry<K>[] = [];
    for (const item of items) {
      const result = rowValidators[kind](item.event);
      if (result.ok) {
        entries.push({ item, row: result.row });
        continue;
      }
      this.counters.validation_dropped++;
      this.deps.log.warn(
        { kind, event_id: item.event.id, scope_id: item.event.scope_id, issues: result.error.issues },
        'Dropping invalid event',
      );
      item.ticket?.settle();
    }
    if (entries.length === 0) return;

    const startedAt = this.now();
    try {
      await this.write(kind, entries);
      await this.commit(kind, entries);
    } catch (err: unknown) {
      if (err instanceof RowRejectedError) {
        this.deps.log.warn(
          { kind, size: entries.length, code: err.code },
          'Batch rejected by storage, isolating rows',
        );
        await this.isolateRows(kind, entries, retained?.firstFailedAt ?? startedAt);
        return;
      }
      this.handleFailure(kind, entries, err, retained?.firstFailedAt ?? startedAt);
    }
  }

  private async write<K extends EventKind>(kind: K, entries: readonly Entry<K>[]): Promise<number> {
    const rows = entries.map((entry) => entry.row);
    return this.deps.retryPolicy.execute(
      `upsert ${kind} batch`,
      () => this.deps.store.upsertBatch(kind, rows),
      {
        now: this.now,
        sleep: this.sleep,
        onRetry: ({ attempt, delayMs, error }) => {
          this.deps.log.warn({ kind, attempt, delayMs, err: error }, 'Upsert failed, retrying');
        },
      },
    );
  }

  /** Writes rows one by one; only the rows the storage rejects are dropped. */
  private async isolateRows<K extends EventKind>(
    kind: K,
    entries: readonly Entry<K>[],
    firstFailedAt: number,
  ): Promise<void> {
    const committed: Entry<K>[] = [];

    for (let i = 0; i < entries.length; i++) {
      const entry = entries[i];
      if (entry === undefined) continue;
      try {
        await this.write(kind, [entry]);
        committed.push(entry);
      } catch (err: unknown) {
        if (err instanceof RowRejectedError) {
          this.counters.rejected_rows++;
          this.deps.log.warn(
            { kind, event_id: entry.item.event.id, code: err.code, err },
            'Dropping row rejected by storage',
          );
          entry.item.ticket?.settle();
          continue;
        }
        await this.commit(kind, committed);
        this.handleFailure(kind, entries.slice(i), err, firstFailedAt);
        return;
      }
    }

    await this.commit(kind, committed);
  }

  private async commit<K extends EventKind>(kind: K, entries: readonly Entry<K>[]): Promise<void> {
    if (entries.length === 0) return;
    this.counters.committed[kind] += entries.length;

    const liveByScope = new Map<string, { id: string; at: string; count: number }>();
    for (const { item } of entries) {
      item.ticket?.settle();
      if (item.source !== 'live') continue;

      const { scope_id, id, occurred_at } = item.event;
      const current = liveByScope.get(scope_id);
      if (current === undefined) {
        liveByScope.set(scope_id, { id, at: occurred_at, count: 1 });
        continue;
      }
      current.count++;
      if (comparePositions({ at: occurred_at, id }, current) > 0) {
        current.id = id;
        current.at = occurred_at;
      }
    }

    for (const [scopeId, position] of liveByScope) {
      try {
        await this.deps.checkpoints.advance(scopeId, 'live', {
          last_processed_id: position.id,
          last_processed_at: position.at,
          processed: position.count,
        });
      } catch (err: unknown) {
        // Rows are already durable; the next flush for this scope moves the cursor again.
        this.recordError(err);
        this.deps.log.error({ err, scope_id: scopeId, kind }, 'Failed to advance live checkpoint');
      }
    }

    this.deps.log.debug({ kind, count: entries.length }, 'Batch committed');
  }

  private handleFailure<K extends EventKind>(
    kind: K,
    entries: readonly Entry<K>[],
    err: unknown,
    firstFailedAt: number,
  ): void {
    this.recordError(err);

    if (err instanceof RetryExhaustedError) {
      const failingForMs = this.now() - firstFailedAt;
      if (failingForMs < this.opts.batchHardCeilingMs) {
        this.retained.set(kind, { items: entries.map((entry) => entry.item), firstFailedAt });
        this.deps.log.warn(
          { kind, size: entries.length, attempts: err.attempts, failingForMs, err },
          'Retries exhausted, batch retained for next flush',
        );
        return;
      }
    }

    this.dropBatch(kind, entries, err);
  }

  private dropBatch<K extends EventKind>(kind: K, entries: readonly Entry<K>[], err: unknown): void {
    const scopeIds = [...new Set(entries.map((entry) => entry.item.event.scope_id))];
    this.counters.fatal_dropped += entries.length;

    for (const { item } of entries) {
      item.ticket?.fail(err);
    }

    this.deps.log.error({ err, kind, dropped: entries.length, scope_ids: scopeIds }, 'Dropping batch');
    this.deps.alerts.raise({
      type: 'fatal_batch',
      message: `Dropped ${entries.length} ${kind} row(s): ${describeError(err)}`,
      scope_ids: scopeIds,
      kind,
      dropped: entries.length,
      raised_at: new Date(this.now()).toISOString(),
    });
  }

  private recordError(err: unknown): void {
    this.counters.last_error = {
      message: describeError(err),
      at: new Date(this.now()).toISOString(),
    };
  }
}
