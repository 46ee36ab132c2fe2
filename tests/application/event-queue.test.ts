import { describe, it, expect } from 'vitest';
import { EventQueue } from '../../src/application/event-queue.js';
import { backfillItem, liveItem, makeMessage } from '../helpers.js';

function queue(overrides: Partial<ConstructorParameters<typeof EventQueue>[0]> = {}): EventQueue {
  return new EventQueue({ kind: 'message', capacity: 10, backfillCapacity: 10, backfillShare: 0.25, ...overrides });
}

describe('EventQueue', () => {
  it('rejects live items beyond capacity and counts them', () => {
    const q = queue({ capacity: 2 });
    expect(q.enqueue(liveItem(makeMessage()))).toEqual({ accepted: true });
    expect(q.enqueue(liveItem(makeMessage()))).toEqual({ accepted: true });
    expect(q.enqueue(liveItem(makeMessage()))).toEqual({ accepted: false, reason: 'queue_full' });
    expect(q.dropped).toBe(1);
    expect(q.depth).toBe(2);
  });

  it('keeps the backfill lane separate from live capacity', () => {
    const q = queue({ capacity: 1, backfillCapacity: 3 });
    q.enqueue(liveItem(makeMessage()));
    expect(q.enqueue(backfillItem(makeMessage()))).toEqual({ accepted: true });
    expect(q.stats()).toMatchObject({ live_depth: 1, backfill_depth: 1, dropped: 0 });
  });

  it('drains FIFO within a lane', () => {
    const q = queue();
    const events = [makeMessage({ id: '1' }), makeMessage({ id: '2' }), makeMessage({ id: '3' })];
    for (const event of events) q.enqueue(liveItem(event));

    expect(q.drain(2).map((item) => item.event.id)).toEqual(['1', '2']);
    expect(q.drain(2).map((item) => item.event.id)).toEqual(['3']);
  });

  it('reserves the backfill share while live items wait', () => {
    const q = queue();
    for (let i = 0; i < 10; i++) q.enqueue(liveItem(makeMessage()));
    for (let i = 0; i < 4; i++) q.enqueue(backfillItem(makeMessage()));

    const batch = q.drain(4);
    expect(batch.map((item) => item.source)).toEqual(['live', 'live', 'live', 'backfill']);
  });

  it('gives slots live cannot fill to backfill', () => {
    const q = queue();
    q.enqueue(liveItem(makeMessage()));
    for (let i = 0; i < 5; i++) q.enqueue(backfillItem(makeMessage()));

    const batch = q.drain(4);
    expect(batch.map((item) => item.source)).toEqual(['live', 'backfill', 'backfill', 'backfill']);
  });

  it('with a zero share, backfill only drains once live is empty', () => {
    const q = queue({ backfillShare: 0 });
    q.enqueue(liveItem(makeMessage()));
    q.enqueue(liveItem(makeMessage()));
    q.enqueue(backfillItem(makeMessage()));

    expect(q.drain(2).map((item) => item.source)).toEqual(['live', 'live']);
    expect(q.drain(2).map((item) => item.source)).toEqual(['backfill']);
  });

  it('refuses items once closed but stays drainable', () => {
    const q = queue();
    q.enqueue(liveItem(makeMessage()));
    q.close();

    expect(q.enqueue(liveItem(makeMessage()))).toEqual({ accepted: false, reason: 'closed' });
    expect(q.dropped).toBe(0);
    expect(q.drain(10)).toHaveLength(1);
  });

  it('reports lane depths', () => {
    const q = queue();
    q.enqueue(liveItem(makeMessage()));
    q.enqueue(backfillItem(makeMessage()));
    q.enqueue(backfillItem(makeMessage()));

    expect(q.stats()).toEqual({
      kind: 'message',
      depth: 3,
      live_depth: 1,
      backfill_depth: 2,
      dropped: 0,
      closed: false,
    });
  });
});
