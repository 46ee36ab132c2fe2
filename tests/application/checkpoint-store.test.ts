import { describe, it, expect, beforeEach } from 'vitest';
import { CheckpointStore } from '../../src/application/checkpoint-store.js';
import { InMemoryCheckpointRepository } from '../../src/infrastructure/memory/index.js';
import { CheckpointConflictError } from '../../src/domain/index.js';
import { FIXED_NOW, at, fakeLogger } from '../helpers.js';

const LEASE_MS = 60_000;

describe('CheckpointStore', () => {
  let repo: InMemoryCheckpointRepository;
  let now: number;
  let log: ReturnType<typeof fakeLogger>;
  let store: CheckpointStore;

  beforeEach(() => {
    repo = new InMemoryCheckpointRepository();
    now = FIXED_NOW;
    log = fakeLogger();
    store = new CheckpointStore(repo, log, { leaseMs: LEASE_MS, now: () => new Date(now) });
  });

  describe('advance', () => {
    it('creates the checkpoint on first commit', async () => {
      const next = await store.advance('c1', 'live', { last_processed_id: '101', last_processed_at: at(1), processed: 3 });

      expect(next.last_processed_id).toBe('101');
      expect(next.total_processed).toBe(3);
      expect(await store.load('c1', 'live')).toEqual(next);
    });

    it('keeps the cursor monotonic across out-of-order commits', async () => {
      await store.advance('c1', 'live', { last_processed_id: '105', last_processed_at: at(10), processed: 2 });
      await store.advance('c1', 'live', { last_processed_id: '103', last_processed_at: at(3), processed: 1 });

      const checkpoint = repo.peek('c1', 'live');
      expect(checkpoint?.last_processed_id).toBe('105');
      expect(checkpoint?.total_processed).toBe(3);
    });

    it('serializes concurrent advances for one scope', async () => {
      await Promise.all([
        store.advance('c1', 'live', { last_processed_id: '1', last_processed_at: at(1), processed: 1 }),
        store.advance('c1', 'live', { last_processed_id: '2', last_processed_at: at(2), processed: 1 }),
        store.advance('c1', 'live', { last_processed_id: '3', last_processed_at: at(3), processed: 1 }),
      ]);

      expect(repo.peek('c1', 'live')?.total_processed).toBe(3);
      expect(repo.peek('c1', 'live')?.last_processed_id).toBe('3');
    });

    it('keeps the cursor and total exact across instances sharing a repository', async () => {
      const a = new CheckpointStore(repo, fakeLogger(), { leaseMs: LEASE_MS, now: () => new Date(now) });
      const b = new CheckpointStore(repo, fakeLogger(), { leaseMs: LEASE_MS, now: () => new Date(now) });

      await Promise.all([
        a.advance('c1', 'live', { last_processed_id: '2000', last_processed_at: at(20), processed: 5 }),
        b.advance('c1', 'live', { last_processed_id: '1000', last_processed_at: at(10), processed: 3 }),
      ]);

      expect(repo.peek('c1', 'live')).toMatchObject({
        last_processed_id: '2000',
        last_processed_at: at(20),
        total_processed: 8,
      });
    });

    it('refuses a backfill advance from an instance without the lease', async () => {
      await store.tryBeginBackfill('c1', 'w1');

      await expect(
        store.advance('c1', 'backfill', { last_processed_id: '9', last_processed_at: at(9), processed: 1 }, 'w2'),
      ).rejects.toBeInstanceOf(CheckpointConflictError);
    });

    it('refreshes the heartbeat on an owned advance', async () => {
      await store.tryBeginBackfill('c1', 'w1');
      now += 5_000;
      await store.advance('c1', 'backfill', { last_processed_id: '9', last_processed_at: at(9), processed: 1 }, 'w1');

      expect(repo.peek('c1', 'backfill')?.backfill_heartbeat_at).toBe(new Date(now).toISOString());
    });
  });

  describe('backfill lease', () => {
    it('grants the lease to one instance at a time', async () => {
      const results = await Promise.all([
        store.tryBeginBackfill('c1', 'w1'),
        store.tryBeginBackfill('c1', 'w2'),
      ]);

      expect(results.filter((result) => result !== null)).toHaveLength(1);
      expect(repo.peek('c1', 'backfill')?.backfill_owner).toBe('w1');
    });

    it('lets another instance take over a stale lease', async () => {
      await store.tryBeginBackfill('c1', 'w1');

      now += LEASE_MS - 1;
      expect(await store.tryBeginBackfill('c1', 'w2')).toBeNull();

      now += 2;
      const claimed = await store.tryBeginBackfill('c1', 'w2');
      expect(claimed?.backfill_owner).toBe('w2');
    });

    it('pause keeps the flag but releases ownership', async () => {
      await store.tryBeginBackfill('c1', 'w1');
      expect(await store.pauseBackfill('c1', 'w1')).toBe(true);

      const paused = repo.peek('c1', 'backfill');
      expect(paused?.backfill_in_progress).toBe(true);
      expect(paused?.backfill_owner).toBeNull();

      expect(await store.tryBeginBackfill('c1', 'w2')).not.toBeNull();
    });

    it('completion clears the flag and stamps the completion time', async () => {
      await store.tryBeginBackfill('c1', 'w1');
      now += 1_000;
      expect(await store.endBackfill('c1', 'completed', 'w1')).toBe(true);

      const done = repo.peek('c1', 'backfill');
      expect(done?.backfill_in_progress).toBe(false);
      expect(done?.last_backfill_completed_at).toBe(new Date(now).toISOString());
    });

    it('abort clears the flag without a completion time', async () => {
      await store.tryBeginBackfill('c1', 'w1');
      await store.endBackfill('c1', 'aborted', 'w1');

      const done = repo.peek('c1', 'backfill');
      expect(done?.backfill_in_progress).toBe(false);
      expect(done?.last_backfill_completed_at).toBeNull();
    });

    it('ignores lease updates from a non-owner', async () => {
      await store.tryBeginBackfill('c1', 'w1');
      const before = repo.peek('c1', 'backfill');
      now += 1_000;

      expect(await store.heartbeat('c1', 'w2')).toBe(false);
      expect(await store.pauseBackfill('c1', 'w2')).toBe(false);
      expect(await store.endBackfill('c1', 'completed', 'w2')).toBe(false);
      expect(repo.peek('c1', 'backfill')).toEqual(before);
      expect(log.warn).toHaveBeenCalledWith(
        { scope_id: 'c1', owner: 'w2', update: 'heartbeat' },
        'Backfill lease not held, skipping checkpoint update',
      );
    });

    it('refuses lease updates after another instance took over a stale lease', async () => {
      const other = new CheckpointStore(repo, fakeLogger(), { leaseMs: LEASE_MS, now: () => new Date(now) });
      await store.tryBeginBackfill('c1', 'w1');
      now += LEASE_MS + 1;
      await other.tryBeginBackfill('c1', 'w2');

      expect(await store.heartbeat('c1', 'w1')).toBe(false);
      expect(await store.endBackfill('c1', 'completed', 'w1')).toBe(false);
      await expect(
        store.advance('c1', 'backfill', { last_processed_id: '9', last_processed_at: at(9), processed: 1 }, 'w1'),
      ).rejects.toBeInstanceOf(CheckpointConflictError);
      expect(repo.peek('c1', 'backfill')).toMatchObject({
        backfill_in_progress: true,
        backfill_owner: 'w2',
        last_processed_id: null,
        total_processed: 0,
      });
    });
  });
});
