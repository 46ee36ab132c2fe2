import { vi } from 'vitest';
import { TransientStorageError, compareIds } from '../src/domain/index.js';
import type { ActionEvent, Checkpoint, IngestEvent, MessageEvent, QueueItem } from '../src/domain/index.js';
import { InMemoryCheckpointRepository } from '../src/infrastructure/memory/index.js';
import type {
  Alert,
  AlertSink,
  BackfillClaim,
  HistoryPage,
  HistoryPageRequest,
  HistorySource,
  PipelineConfig,
} from '../src/application/index.js';

/** Fixed "now" for deterministic clocks. */
export const FIXED_NOW = new Date('2026-03-01T12:00:00Z').getTime();

/** ISO timestamp `seconds` away from FIXED_NOW. */
export function at(seconds: number): string {
  return new Date(FIXED_NOW + seconds * 1000).toISOString();
}

let counter = 0;

/**
 * Factory for message events with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeMessage(overrides: Partial<MessageEvent> = {}): MessageEvent {
  counter++;
  const occurredAt = overrides.occurred_at ?? at(counter);
  return {
    kind: 'message',
    id: overrides.id ?? String(900_000 + counter),
    scope_id: overrides.scope_id ?? 'c1',
    guild_id: overrides.guild_id === undefined ? 'g1' : overrides.guild_id,
    occurred_at: occurredAt,
    is_backfilled: overrides.is_backfilled ?? false,
    payload: overrides.payload ?? {
      author_id: '42',
      author_username: 'tester',
      content: 'hello',
      created_at: occurredAt,
    },
  };
}

export function makeAction(overrides: Partial<ActionEvent> = {}): ActionEvent {
  counter++;
  return {
    kind: 'action',
    action_type: overrides.action_type ?? 'member_ban',
    id: overrides.id ?? String(800_000 + counter),
    scope_id: overrides.scope_id ?? 'c1',
    guild_id: overrides.guild_id === undefined ? 'g1' : overrides.guild_id,
    occurred_at: overrides.occurred_at ?? at(counter),
    is_backfilled: overrides.is_backfilled ?? false,
    payload: overrides.payload ?? { user_id: '7', target_id: '8', action_data: { reason: 'spam' } },
  };
}

export function liveItem(event: IngestEvent): QueueItem {
  return { event, source: 'live', enqueued_at: FIXED_NOW };
}

export function backfillItem(event: IngestEvent): QueueItem {
  return { event, source: 'backfill', enqueued_at: FIXED_NOW };
}

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  } as unknown as import('pino').Logger;
}

/** AlertSink that keeps every alert it receives. */
export class RecordingAlerts implements AlertSink {
  readonly alerts: Alert[] = [];

  raise(alert: Alert): void {
    this.alerts.push(alert);
  }
}

/** Resolves immediately; records the requested delays. */
export function instantSleep() {
  const delays: number[] = [];
  const sleep = async (ms: number): Promise<void> => {
    delays.push(ms);
  };
  return { sleep, delays };
}

/**
 * In-process history API over a fixed list of items per scope.
 * `has_more` is true while items remain past the returned page.
 */
export class FakeHistory implements HistorySource {
  /** `after` cursor of every call, in order. */
  readonly calls: Array<string | null> = [];
  /** When set, every fetch waits for it first. */
  gate: Promise<void> | null = null;
  private readonly items = new Map<string, IngestEvent[]>();

  constructor(items: Record<string, IngestEvent[]> = {}) {
    for (const [scopeId, events] of Object.entries(items)) {
      this.items.set(scopeId, [...events].sort((a, b) => compareIds(a.id, b.id)));
    }
  }

  async fetchPage(scopeId: string, request: HistoryPageRequest): Promise<HistoryPage> {
    this.calls.push(request.after);
    if (this.gate !== null) await this.gate;

    const after = request.after;
    const remaining = (this.items.get(scopeId) ?? []).filter(
      (event) => after === null || compareIds(event.id, after) > 0,
    );
    return {
      items: remaining.slice(0, request.limit),
      has_more: remaining.length > request.limit,
    };
  }
}

/** A promise plus the function that resolves it. */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export function makePipelineConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return {
    instanceId: 'test-worker',
    batchSize: 100,
    flushIntervalMs: 60_000,
    batchHardCeilingMs: 60_000,
    shutdownTimeoutMs: 1_000,
    queues: { messageCapacity: 100, actionCapacity: 100, backfillCapacity: 100, backfillShare: 0.25 },
    dedup: { capacity: 1_000 },
    backfill: {
      pageSize: 2,
      pageDelayMs: 0,
      maxAgeDays: null,
      leaseMs: 60_000,
      onStartup: false,
      scopes: [],
    },
    retry: { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1_000, jitterRatio: 0 },
    ...overrides,
  };
}

/** Checkpoint repository whose backfill claim keeps failing for the given scopes. */
export class ClaimFailingRepository extends InMemoryCheckpointRepository {
  claimAttempts = 0;

  constructor(private readonly failing: readonly string[]) {
    super();
  }

  override async claimBackfill(scopeId: string, claim: BackfillClaim): Promise<Checkpoint | null> {
    if (this.failing.includes(scopeId)) {
      this.claimAttempts++;
      throw new TransientStorageError('storage unavailable', 'ECONNRESET');
    }
    return super.claimBackfill(scopeId, claim);
  }
}
