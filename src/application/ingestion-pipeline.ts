import type { Logger } from 'pino';
import { EVENT_KINDS, versionKey } from '../domain/index.js';
import type { ActionEvent, CommitTicket, EventKind, IngestEvent, MessageEvent } from '../domain/index.js';
import type { Alert, AlertSink, CheckpointRepository, EventStore, HistorySource } from './ports.js';
import { BackfillCoordinator } from './backfill-coordinator.js';
import type { BackfillStatus, StartResult } from './backfill-coordinator.js';
import { BatchWriter } from './batch-writer.js';
import type { WriterStats } from './batch-writer.js';
import { CheckpointStore } from './checkpoint-store.js';
import { Deduplicator } from './deduplicator.js';
import { EventFilter } from './event-filter.js';
import { EventQueue } from './event-queue.js';
import type { QueueStats } from './event-queue.js';
import { RetryPolicy } from './retry-policy.js';
import type { RetryPolicyOptions } from './retry-policy.js';

export interface PipelineConfig {
  instanceId: string;
  batchSize: number;
  flushIntervalMs: number;
  batchHardCeilingMs: number;
  shutdownTimeoutMs: number;
  queues: {
    messageCapacity: number;
    actionCapacity: number;
    backfillCapacity: number;
    backfillShare: number;
  };
  dedup: {
    capacity: number;
    windowMs?: number | undefined;
  };
  backfill: {
    pageSize: number;
    pageDelayMs: number;
    maxAgeDays: number | null;
    leaseMs: number;
    onStartup: boolean;
    scopes: readonly string[];
  };
  retry: RetryPolicyOptions;
}

export interface PipelineDeps {
  store: EventStore;
  checkpointRepository: CheckpointRepository;
  history: HistorySource;
  alerts: AlertSink;
  log: Logger;
  filter?: EventFilter | undefined;
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export type IngestResult =
  | { accepted: true }
  | { accepted: false; reason: 'duplicate' | 'filtered' | 'queue_full' | 'closed' };

export type PipelineState = 'idle' | 'running' | 'stopping' | 'stopped';

export interface LiveStats {
  received: number;
  accepted: number;
  duplicates: number;
  filtered: number;
  rejected: number;
}

export interface PipelineStats {
  instance_id: string;
  state: PipelineState;
  started_at: string | null;
  uptime_ms: number;
  queues: Record<EventKind, QueueStats>;
  live: LiveStats;
  writer: WriterStats;
  backfill: BackfillStatus[];
  alerts_raised: number;
}

/**
 * Wires queues, writer, checkpoints and backfill together and owns their
 * lifecycle.
 *
 * The live entry points are synchronous: they filter, deduplicate and
 * enqueue, and report the outcome without ever waiting on storage.
 */
export class IngestionPipeline {
  readonly checkpoints: CheckpointStore;
  readonly backfill: BackfillCoordinator;
  private readonly queues: Record<EventKind, EventQueue>;
  private readonly writer: BatchWriter;
  private readonly dedup: Deduplicator;
  private readonly filter: EventFilter;
  private readonly now: () => number;
  private readonly log: Logger;
  private state: PipelineState = 'idle';
  private startedAt: number | null = null;
  private alertsRaised = 0;
  private readonly live: LiveStats = { received: 0, accepted: 0, duplicates: 0, filtered: 0, rejected: 0 };

  constructor(
    private readonly config: PipelineConfig,
    deps: PipelineDeps,
  ) {
    this.now = deps.now ?? Date.now;
    this.log = deps.log;
    this.filter = deps.filter ?? EventFilter.permissive();

    const alerts: AlertSink = {
      raise: (alert: Alert) => this.raise(deps.alerts, alert),
    };

    this.queues = {
      message: new EventQueue({
        kind: 'message',
        capacity: config.queues.messageCapacity,
        backfillCapacity: config.queues.backfillCapacity,
        backfillShare: config.queues.backfillShare,
      }),
      action: new EventQueue({
        kind: 'action',
        capacity: config.queues.actionCapacity,
        backfillCapacity: config.queues.backfillCapacity,
        backfillShare: config.queues.backfillShare,
      }),
    };

    this.dedup = new Deduplicator({
      capacity: config.dedup.capacity,
      windowMs: config.dedup.windowMs,
      now: this.now,
    });

    const retryPolicy = new RetryPolicy(config.retry);

    this.checkpoints = new CheckpointStore(deps.checkpointRepository, deps.log, {
      leaseMs: config.backfill.leaseMs,
      now: () => new Date(this.now()),
    });

    this.writer = new BatchWriter(
      {
        queues: this.queues,
        store: deps.store,
        checkpoints: this.checkpoints,
        retryPolicy,
        alerts,
        log: deps.log,
      },
      {
        batchSize: config.batchSize,
        flushIntervalMs: config.flushIntervalMs,
        batchHardCeilingMs: config.batchHardCeilingMs,
        now: this.now,
        sleep: deps.sleep,
      },
    );

    this.backfill = new BackfillCoordinator(
      {
        history: deps.history,
        checkpoints: this.checkpoints,
        queues: this.queues,
        writer: this.writer,
        filter: this.filter,
        retryPolicy,
        alerts,
        log: deps.log,
      },
      {
        instanceId: config.instanceId,
        pageSize: config.backfill.pageSize,
        pageDelayMs: config.backfill.pageDelayMs,
        maxAgeDays: config.backfill.maxAgeDays,
        heartbeatMs: Math.max(1_000, Math.floor(config.backfill.leaseMs / 3)),
        now: this.now,
        sleep: deps.sleep,
      },
    );
  }

  /**
   * Live callback. Never blocks.
   *
   * An accepted event's `ticket` settles once the event is stored (or
   * dropped as invalid) and fails if its batch is dropped.
   */
  ingest(event: IngestEvent, ticket?: CommitTicket): IngestResult {
    this.live.received++;

    if (this.state === 'stopping' || this.state === 'stopped') {
      this.live.rejected++;
      return { accepted: false, reason: 'closed' };
    }

    if (!this.filter.accepts(event)) {
      this.live.filtered++;
      return { accepted: false, reason: 'filtered' };
    }

    const key = versionKey(event);
    if (this.dedup.seen(key)) {
      this.live.duplicates++;
      return { accepted: false, reason: 'duplicate' };
    }

    const liveEvent: IngestEvent = event.is_backfilled ? { ...event, is_backfilled: false } : event;
    const result = this.queues[event.kind].enqueue({
      event: liveEvent,
      source: 'live',
      enqueued_at: this.now(),
      ticket,
    });

    if (!result.accepted) {
      this.live.rejected++;
      if (result.reason === 'queue_full') {
        this.log.warn(
          { kind: event.kind, event_id: event.id, dropped: this.queues[event.kind].dropped },
          'Live queue full, event rejected',
        );
      }
      return result;
    }

    // Recorded only once accepted, so a rejected event can be redelivered.
    this.dedup.record(key);
    this.live.accepted++;
    this.writer.onEnqueued(event.kind);
    return result;
  }

  ingestMessage(event: MessageEvent, ticket?: CommitTicket): IngestResult {
    return this.ingest(event, ticket);
  }

  ingestAction(event: ActionEvent, ticket?: CommitTicket): IngestResult {
    return this.ingest(event, ticket);
  }

  async start(): Promise<void> {
    if (this.state !== 'idle') return;
    this.state = 'running';
    this.startedAt = this.now();
    this.writer.start();

    this.log.info(
      {
        instance_id: this.config.instanceId,
        batch_size: this.config.batchSize,
        flush_interval_ms: this.config.flushIntervalMs,
      },
      'Ingestion pipeline started',
    );

    if (this.config.backfill.onStartup && this.config.backfill.scopes.length > 0) {
      const results = await this.backfill.startMany(this.config.backfill.scopes);
      const started = [...results.entries()]
        .filter(([, result]) => result.started)
        .map(([scopeId]) => scopeId);
      const failed = [...results.entries()]
        .filter(([, result]) => !result.started && result.reason === 'error')
        .map(([scopeId]) => scopeId);
      this.log.info(
        { started, failed, requested: this.config.backfill.scopes.length },
        'Startup backfill launched',
      );
    }
  }

  startBackfill(scopeId: string): Promise<StartResult> {
    if (this.state !== 'running') {
      return Promise.resolve({ started: false, reason: 'closed' });
    }
    return this.backfill.start(scopeId);
  }

  /** Forces a flush now. Resolves once it has finished. */
  flush(): Promise<void> {
    return this.writer.flush();
  }

  /**
   * Closes live intake, pauses backfill, drains what is queued within
   * `shutdownTimeoutMs`, then waits for the backfill runs to settle.
   */
  async stop(): Promise<void> {
    if (this.state === 'stopping' || this.state === 'stopped') return;
    this.state = 'stopping';
    this.log.info('Stopping ingestion pipeline');

    for (const kind of EVENT_KINDS) {
      this.queues[kind].close();
    }
    const paused = this.backfill.pauseAll(this.config.shutdownTimeoutMs);

    this.writer.stop();
    const drained = await withTimeout(this.writer.drainAll(), this.config.shutdownTimeoutMs);
    if (!drained) {
      this.log.warn(
        { pending: this.writer.pendingCount(), timeout_ms: this.config.shutdownTimeoutMs },
        'Final flush timed out, pending events discarded',
      );
    }

    await paused;
    this.state = 'stopped';
    this.log.info({ stats: this.stats().writer }, 'Ingestion pipeline stopped');
  }

  stats(): PipelineStats {
    return {
      instance_id: this.config.instanceId,
      state: this.state,
      started_at: this.startedAt === null ? null : new Date(this.startedAt).toISOString(),
      uptime_ms: this.startedAt === null ? 0 : this.now() - this.startedAt,
      queues: {
        message: this.queues.message.stats(),
        action: this.queues.action.stats(),
      },
      live: { ...this.live },
      writer: this.writer.stats(),
      backfill: this.backfill.allStatuses(),
      alerts_raised: this.alertsRaised,
    };
  }

  private raise(sink: AlertSink, alert: Alert): void {
    this.alertsRaised++;
    this.log.error({ alert }, `Alert raised: ${alert.type}`);
    try {
      sink.raise(alert);
    } catch (err: unknown) {
      this.log.warn({ err, type: alert.type }, 'Alert sink failed');
    }
  }
}

/** Resolves true when `work` settles in time, false on timeout. */
async function withTimeout(work: Promise<void>, timeoutMs: number): Promise<boolean> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });
  try {
    return await Promise.race([work.then(() => true), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
