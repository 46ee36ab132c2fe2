import { describe, it, expect, vi } from 'vitest';
import { BatchWriter } from '../../src/application/batch-writer.js';
import { CheckpointStore } from '../../src/application/checkpoint-store.js';
import { EventQueue } from '../../src/application/event-queue.js';
import { RetryPolicy } from '../../src/application/retry-policy.js';
import type { EventStore, RowsByKind } from '../../src/application/index.js';
import {
  FatalStorageError,
  RowRejectedError,
  TransientStorageError,
} from '../../src/domain/index.js';
import type { CommitTicket, EventKind } from '../../src/domain/index.js';
import { InMemoryCheckpointRepository, InMemoryEventStore } from '../../src/infrastructure/memory/index.js';
import {
  FIXED_NOW,
  RecordingAlerts,
  at,
  backfillItem,
  deferred,
  fakeLogger,
  instantSleep,
  liveItem,
  makeAction,
  makeMessage,
} from '../helpers.js';

const CEILING_MS = 60_000;

function setup(opts: { store?: EventStore; batchSize?: number } = {}) {
  const queues = {
    message: new EventQueue({ kind: 'message', capacity: 100, backfillCapacity: 100, backfillShare: 0.25 }),
    action: new EventQueue({ kind: 'action', capacity: 100, backfillCapacity: 100, backfillShare: 0.25 }),
  };
  const memory = new InMemoryEventStore();
  const repo = new InMemoryCheckpointRepository();
  const log = fakeLogger();
  const alerts = new RecordingAlerts();
  const clock = { now: FIXED_NOW };
  const { sleep, delays } = instantSleep();
  const checkpoints = new CheckpointStore(repo, log, { leaseMs: 60_000, now: () => new Date(clock.now) });

  const writer = new BatchWriter(
    {
      queues,
      store: opts.store ?? memory,
      checkpoints,
      retryPolicy: new RetryPolicy({ maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1_000, jitterRatio: 0 }),
      alerts,
      log,
    },
    {
      batchSize: opts.batchSize ?? 50,
      flushIntervalMs: 60_000,
      batchHardCeilingMs: CEILING_MS,
      now: () => clock.now,
      sleep,
    },
  );

  return { writer, queues, memory, repo, log, alerts, clock, delays };
}

/** EventStore that always fails with `error`. */
function failingStore(error: Error) {
  const upsertBatch = vi.fn(async (): Promise<number> => {
    throw error;
  });
  const store: EventStore = { upsertBatch };
  return { store, upsertBatch };
}

function recordingTicket() {
  const ticket = { settle: vi.fn(), fail: vi.fn() };
  const asTicket: CommitTicket = ticket;
  return { ticket, asTicket };
}

describe('BatchWriter', () => {
  it('writes each kind and advances the live checkpoint per scope', async () => {
    const { writer, queues, memory, repo } = setup();
    queues.message.enqueue(liveItem(makeMessage({ id: '101', scope_id: 'c1', occurred_at: at(1) })));
    queues.message.enqueue(liveItem(makeMessage({ id: '102', scope_id: 'c1', occurred_at: at(2) })));
    queues.action.enqueue(liveItem(makeAction({ id: '201', scope_id: 'c2', occurred_at: at(3) })));

    await writer.flush();

    expect(memory.count('message')).toBe(2);
    expect(memory.count('action')).toBe(1);
    expect(repo.peek('c1', 'live')).toMatchObject({ last_processed_id: '102', total_processed: 2 });
    expect(repo.peek('c2', 'live')).toMatchObject({ last_processed_id: '201', total_processed: 1 });
    expect(writer.stats().committed).toEqual({ message: 2, action: 1 });
  });

  it('leaves the live checkpoint alone for backfilled items', async () => {
    const { writer, queues, memory, repo } = setup();
    queues.message.enqueue(backfillItem(makeMessage({ scope_id: 'c1', is_backfilled: true })));

    await writer.flush();

    expect(memory.count('message')).toBe(1);
    expect(repo.peek('c1', 'live')).toBeUndefined();
  });

  it('stores the valid items of a batch and drops the invalid one', async () => {
    const { writer, queues, memory, log } = setup();
    for (let i = 0; i < 9; i++) {
      queues.message.enqueue(liveItem(makeMessage({ id: String(300 + i) })));
    }
    const { ticket, asTicket } = recordingTicket();
    queues.message.enqueue({
      ...liveItem(makeMessage({ id: '399', payload: { author_username: 'no-author', created_at: at(0) } })),
      ticket: asTicket,
    });

    await writer.flush();

    expect(memory.count('message')).toBe(9);
    expect(memory.get('message', '399')).toBeUndefined();
    expect(writer.stats().validation_dropped).toBe(1);
    expect(ticket.settle).toHaveBeenCalledTimes(1);
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ kind: 'message', event_id: '399' }),
      'Dropping invalid event',
    );
  });

  it('retains a batch whose retries ran out, then drops it at the hard ceiling', async () => {
    const { store, upsertBatch } = failingStore(new TransientStorageError('connection refused', 'ECONNREFUSED'));
    const { writer, queues, alerts, clock, delays } = setup({ store });
    const { ticket, asTicket } = recordingTicket();
    queues.message.enqueue({ ...liveItem(makeMessage({ scope_id: 'c1' })), ticket: asTicket });
    queues.message.enqueue(liveItem(makeMessage({ scope_id: 'c1' })));

    await writer.flush();

    expect(upsertBatch).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([100, 200]);
    expect(writer.stats().retained.message).toBe(2);
    expect(writer.pendingCount()).toBe(2);
    expect(alerts.alerts).toHaveLength(0);

    clock.now += CEILING_MS;
    await writer.flush();

    expect(upsertBatch).toHaveBeenCalledTimes(6);
    expect(writer.stats().retained.message).toBe(0);
    expect(writer.stats().fatal_dropped).toBe(2);
    expect(ticket.fail).toHaveBeenCalledTimes(1);
    expect(alerts.alerts).toHaveLength(1);
    expect(alerts.alerts[0]).toMatchObject({
      type: 'fatal_batch',
      scope_ids: ['c1'],
      kind: 'message',
      dropped: 2,
    });
  });

  it('drops a batch immediately on a fatal storage error', async () => {
    const { store, upsertBatch } = failingStore(new FatalStorageError('permission denied', '42501'));
    const { writer, queues, alerts } = setup({ store });
    queues.action.enqueue(liveItem(makeAction({ scope_id: 'c4' })));

    await writer.flush();

    expect(upsertBatch).toHaveBeenCalledTimes(1);
    expect(writer.stats().fatal_dropped).toBe(1);
    expect(writer.stats().last_error?.message).toBe('permission denied');
    expect(alerts.alerts.map((alert) => alert.type)).toEqual(['fatal_batch']);
  });

  it('isolates rows the storage rejects and keeps the rest', async () => {
    const memory = new InMemoryEventStore();
    const store: EventStore = {
      async upsertBatch<K extends EventKind>(kind: K, rows: readonly RowsByKind[K][]): Promise<number> {
        const rejected = rows.some((row) => 'message_id' in row && row.message_id === '13');
        if (rejected) throw new RowRejectedError('value too long', '22001');
        return memory.upsertBatch(kind, rows);
      },
    };
    const { writer, queues } = setup({ store });
    for (const id of ['11', '12', '13']) {
      queues.message.enqueue(liveItem(makeMessage({ id })));
    }

    await writer.flush();

    expect(memory.ids('message').sort()).toEqual(['11', '12']);
    expect(writer.stats().rejected_rows).toBe(1);
    expect(writer.stats().committed.message).toBe(2);
  });

  it('flushes when a queue reaches the batch size', async () => {
    const { writer, queues, memory } = setup({ batchSize: 2 });
    queues.message.enqueue(liveItem(makeMessage()));
    writer.onEnqueued('message');
    expect(memory.count('message')).toBe(0);

    queues.message.enqueue(liveItem(makeMessage()));
    writer.onEnqueued('message');

    await vi.waitFor(() => expect(memory.count('message')).toBe(2));
  });

  it('runs one flush at a time and picks up items queued meanwhile', async () => {
    const memory = new InMemoryEventStore();
    const gate = deferred();
    let active = 0;
    let maxActive = 0;
    const store: EventStore = {
      async upsertBatch<K extends EventKind>(kind: K, rows: readonly RowsByKind[K][]): Promise<number> {
        active++;
        maxActive = Math.max(maxActive, active);
        await gate.promise;
        active--;
        return memory.upsertBatch(kind, rows);
      },
    };
    const { writer, queues } = setup({ store });

    queues.message.enqueue(liveItem(makeMessage({ id: '1' })));
    const first = writer.flush();
    queues.message.enqueue(liveItem(makeMessage({ id: '2' })));
    const second = writer.flush();

    gate.resolve();
    await Promise.all([first, second]);

    expect(maxActive).toBe(1);
    expect(memory.ids('message').sort()).toEqual(['1', '2']);
  });

  it('drainAll flushes until the queues are empty', async () => {
    const { writer, queues, memory } = setup({ batchSize: 2 });
    for (let i = 0; i < 5; i++) queues.message.enqueue(liveItem(makeMessage()));

    await writer.drainAll();

    expect(memory.count('message')).toBe(5);
    expect(writer.pendingCount()).toBe(0);
  });

  it('drainAll stops when storage makes no progress', async () => {
    const { store } = failingStore(new TransientStorageError('timeout'));
    const { writer, queues, log } = setup({ store });
    queues.message.enqueue(liveItem(makeMessage()));

    await writer.drainAll();

    expect(writer.pendingCount()).toBe(1);
    expect(log.warn).toHaveBeenCalledWith({ pending: 1 }, 'Final drain made no progress');
  });
});
