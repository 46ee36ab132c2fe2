import type { Logger } from 'pino';
import {
  CheckpointConflictError,
  describeError,
  markBackfilled,
} from '../domain/index.js';
import type { Checkpoint, CommitTicket, EventKind, IngestEvent } from '../domain/index.js';
import type { AlertSink, HistoryPage, HistorySource } from './ports.js';
import type { CheckpointStore } from './checkpoint-store.js';
import type { EventFilter } from './event-filter.js';
import type { EventQueue } from './event-queue.js';
import type { RetryPolicy } from './retry-policy.js';

export type BackfillState = 'idle' | 'running' | 'completed' | 'paused' | 'aborted';

export type StartResult =
  | { started: true; done: Promise<BackfillState> }
  | { started: false; reason: 'already_running' | 'closed' }
  | { started: false; reason: 'error'; error: string };

export interface BackfillStatus {
  scope_id: string;
  state: BackfillState;
  pages: number;
  items_enqueued: number;
  items_skipped: number;
  cursor: string | null;
  started_at: string;
  finished_at: string | null;
  last_error: string | null;
}

export interface BackfillCoordinatorOptions {
  /** Lease owner written to the checkpoint. Unique per process. */
  instanceId: string;
  pageSize: number;
  pageDelayMs: number;
  /** Items older than this are skipped. Null keeps everything. */
  maxAgeDays: number | null;
  /** How long to wait before retrying an enqueue into a full backfill lane. */
  queuePollMs?: number;
  /** Lease refresh interval while a page waits for its commit. */
  heartbeatMs?: number;
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface BackfillCoordinatorDeps {
  history: HistorySource;
  checkpoints: CheckpointStore;
  queues: Readonly<Record<EventKind, EventQueue>>;
  /** Asked to flush once a page is queued, so pages do not wait for the timer. */
  writer: { requestFlush(): void };
  filter: EventFilter;
  retryPolicy: RetryPolicy;
  alerts: AlertSink;
  log: Logger;
}

interface Run {
  /**
   * Soft stop: a page already queued is committed first; a page fetched
   * after the request is dropped and fetched again on resume.
   */
  readonly pause: AbortController;
  /** Hard stop: stop waiting for the page commit. */
  readonly halt: AbortController;
  readonly done: Promise<BackfillState>;
}

const DAY_MS = 24 * 60 * 60 * 1000;

class RunHalted extends Error {
  constructor() {
    super('Backfill halted before the page committed');
    this.name = 'RunHalted';
  }
}

/** Resolves when every item of a page has been written or dropped as invalid. */
class PageTicket implements CommitTicket {
  readonly committed: Promise<void>;
  private remaining: number;
  private resolve: () => void = () => undefined;
  private reject: (err: unknown) => void = () => undefined;
  private settled = false;

  constructor(size: number) {
    this.remaining = size;
    this.committed = new Promise<void>((resolve, reject) => {
      this.resolve = resolve;
      this.reject = reject;
    });
    if (size === 0) this.finish();
  }

  settle(): void {
    if (this.settled) return;
    this.remaining--;
    if (this.remaining <= 0) this.finish();
  }

  fail(err: unknown): void {
    if (this.settled) return;
    this.settled = true;
    this.reject(err);
  }

  private finish(): void {
    this.settled = true;
    this.resolve();
  }
}

function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Replays a scope's history through the same queue and writer as live
 * traffic, one page at a time.
 *
 * The `backfill` checkpoint cursor only moves after every item of a page is
 * durably written, so a restart re-fetches at most the page that was in
 * flight. A page is committed (or abandoned) before the next is fetched.
 */
export class BackfillCoordinator {
  private readonly runs = new Map<string, Run>();
  private readonly statuses = new Map<string, BackfillStatus>();
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly queuePollMs: number;
  private readonly heartbeatMs: number;
  private closed = false;

  constructor(
    private readonly deps: BackfillCoordinatorDeps,
    private readonly opts: BackfillCoordinatorOptions,
  ) {
    this.now = opts.now ?? Date.now;
    this.sleep = opts.sleep ?? abortableSleep;
    this.queuePollMs = opts.queuePollMs ?? 100;
    this.heartbeatMs = opts.heartbeatMs ?? 30_000;
  }

  /**
   * Claims the scope and starts paginating in the background.
   * Refused when this instance already runs the scope or another run holds
   * the lease. A claim that keeps failing is reported as `error` and leaves
   * other scopes untouched.
   */
  async start(scopeId: string): Promise<StartResult> {
    if (this.closed) return { started: false, reason: 'closed' };
    if (this.runs.has(scopeId)) return { started: false, reason: 'already_running' };

    const claim = this.claim(scopeId);
    const pause = new AbortController();
    const halt = new AbortController();
    const run: Run = { pause, halt, done: this.launch(scopeId, claim, pause.signal, halt.signal) };

    // Registered before the claim resolves so a second start in this process is refused.
    this.runs.set(scopeId, run);
    void run.done.finally(() => {
      if (this.runs.get(scopeId) === run) this.runs.delete(scopeId);
    });

    let checkpoint: Checkpoint | null;
    try {
      checkpoint = await claim;
    } catch (err: unknown) {
      return this.claimFailed(scopeId, err);
    }
    if (checkpoint === null) {
      return { started: false, reason: 'already_running' };
    }
    return { started: true, done: run.done };
  }

  async startMany(scopeIds: readonly string[]): Promise<Map<string, StartResult>> {
    const results = new Map<string, StartResult>();
    for (const scopeId of scopeIds) {
      try {
        results.set(scopeId, await this.start(scopeId));
      } catch (err: unknown) {
        results.set(scopeId, this.claimFailed(scopeId, err));
      }
    }
    return results;
  }

  /** Asks one run to pause after its current page. */
  pause(scopeId: string): void {
    this.runs.get(scopeId)?.pause.abort();
  }

  /**
   * Stops new runs, asks every run to pause, and waits up to `timeoutMs`
   * for them to settle before abandoning pages still awaiting commit.
   */
  async pauseAll(timeoutMs: number): Promise<void> {
    this.closed = true;
    const runs = [...this.runs.values()];
    if (runs.length === 0) return;

    for (const run of runs) run.pause.abort();

    const settled = Promise.allSettled(runs.map((run) => run.done));
    const timer = new AbortController();
    const finishedInTime = await Promise.race([
      settled.then(() => true),
      abortableSleep(timeoutMs, timer.signal).then(() => false),
    ]);
    timer.abort();

    if (!finishedInTime) {
      this.deps.log.warn({ pending: this.runs.size }, 'Backfill runs did not pause in time, halting');
      for (const run of runs) run.halt.abort();
      await settled;
    }
  }

  isRunning(scopeId: string): boolean {
    return this.runs.has(scopeId);
  }

  status(scopeId: string): BackfillStatus | null {
    const status = this.statuses.get(scopeId);
    return status === undefined ? null : { ...status };
  }

  allStatuses(): BackfillStatus[] {
    return [...this.statuses.values()].map((status) => ({ ...status }));
  }

  private async launch(
    scopeId: string,
    claim: Promise<Checkpoint | null>,
    pause: AbortSignal,
    halt: AbortSignal,
  ): Promise<BackfillState> {
    let checkpoint: Checkpoint | null;
    try {
      checkpoint = await claim;
    } catch (err: unknown) {
      // start() reports the failure to its caller.
      this.deps.log.debug({ err, scope_id: scopeId }, 'Backfill claim failed');
      return 'idle';
    }
    if (checkpoint === null) return 'idle';

    return this.execute(scopeId, checkpoint, pause, halt);
  }

  private async execute(
    scopeId: string,
    checkpoint: Checkpoint,
    pause: AbortSignal,
    halt: AbortSignal,
  ): Promise<BackfillState> {
    const owner = this.opts.instanceId;
    const status: BackfillStatus = {
      scope_id: scopeId,
      state: 'running',
      pages: 0,
      items_enqueued: 0,
      items_skipped: 0,
      cursor: checkpoint.last_processed_id,
      started_at: new Date(this.now()).toISOString(),
      finished_at: null,
      last_error: null,
    };
    this.statuses.set(scopeId, status);
    this.deps.log.info({ scope_id: scopeId, after: status.cursor }, 'Backfill started');

    try {
      while (true) {
        if (pause.aborted) {
          return await this.finishPaused(status);
        }

        if (status.pages > 0 && !(await this.deps.checkpoints.heartbeat(scopeId, owner))) {
          this.deps.log.warn({ scope_id: scopeId }, 'Backfill lease lost to another instance');
          return this.finish(status, 'paused');
        }

        const page = await this.fetchPage(scopeId, status.cursor, pause);
        if (pause.aborted) {
          return await this.finishPaused(status);
        }

        const lastItem = page.items[page.items.length - 1];
        if (lastItem !== undefined) {
          await this.commitPage(status, page, lastItem, pause, halt);
        }

        if (!page.has_more || lastItem === undefined) {
          const ended = await this.deps.checkpoints.endBackfill(scopeId, 'completed', owner);
          if (!ended) return this.finish(status, 'paused');
          this.deps.log.info(
            { scope_id: scopeId, pages: status.pages, items: status.items_enqueued },
            'Backfill completed',
          );
          return this.finish(status, 'completed');
        }

        await this.sleep(this.opts.pageDelayMs, pause);
      }
    } catch (err: unknown) {
      if (err instanceof RunHalted) {
        return await this.finishPaused(status);
      }
      if (err instanceof CheckpointConflictError) {
        this.deps.log.warn({ scope_id: scopeId }, 'Backfill lease lost to another instance');
        return this.finish(status, 'paused');
      }
      return await this.abort(status, err);
    }
  }

  private claim(scopeId: string): Promise<Checkpoint | null> {
    return this.deps.retryPolicy.execute(
      `claim backfill ${scopeId}`,
      () => this.deps.checkpoints.tryBeginBackfill(scopeId, this.opts.instanceId),
      {
        now: this.now,
        sleep: (ms) => this.sleep(ms),
        onRetry: ({ attempt, delayMs, error }) => {
          this.deps.log.warn({ scope_id: scopeId, attempt, delayMs, err: error }, 'Backfill claim failed, retrying');
        },
      },
    );
  }

  private claimFailed(scopeId: string, err: unknown): StartResult {
    const error = describeError(err);
    const stamp = new Date(this.now()).toISOString();
    this.deps.log.error({ err, scope_id: scopeId }, 'Backfill claim failed, scope skipped');
    this.statuses.set(scopeId, {
      scope_id: scopeId,
      state: 'idle',
      pages: 0,
      items_enqueued: 0,
      items_skipped: 0,
      cursor: null,
      started_at: stamp,
      finished_at: stamp,
      last_error: error,
    });
    return { started: false, reason: 'error', error };
  }

  private fetchPage(scopeId: string, after: string | null, pause: AbortSignal): Promise<HistoryPage> {
    return this.deps.retryPolicy.execute(
      `fetch history ${scopeId}`,
      async () => {
        // A pause cuts the retry loop short instead of burning the remaining attempts.
        if (pause.aborted) throw new RunHalted();
        return this.deps.history.fetchPage(scopeId, { after, limit: this.opts.pageSize });
      },
      {
        now: this.now,
        sleep: (ms) => this.sleep(ms, pause),
        onRetry: ({ attempt, delayMs, error }) => {
          this.deps.log.warn({ scope_id: scopeId, attempt, delayMs, err: error }, 'History fetch failed, retrying');
        },
      },
    );
  }

  /**
   * Queues the page's kept items on the backfill lane, waits until all of
   * them are written, then moves the cursor past the whole page, skipped
   * items included.
   */
  private async commitPage(
    status: BackfillStatus,
    page: HistoryPage,
    lastItem: IngestEvent,
    pause: AbortSignal,
    halt: AbortSignal,
  ): Promise<void> {
    const kept: IngestEvent[] = [];
    for (const item of page.items) {
      if (this.shouldSkip(item)) {
        status.items_skipped++;
        continue;
      }
      kept.push(markBackfilled(item));
    }

    const ticket = new PageTicket(kept.length);
    await this.withHeartbeat(status.scope_id, async () => {
      for (const event of kept) {
        await this.enqueue(event, ticket, halt);
      }
      if (kept.length > 0) this.deps.writer.requestFlush();

      await this.awaitCommit(ticket, halt);
    });

    await this.deps.checkpoints.advance(
      status.scope_id,
      'backfill',
      {
        last_processed_id: lastItem.id,
        last_processed_at: lastItem.occurred_at,
        processed: kept.length,
      },
      this.opts.instanceId,
    );

    status.pages++;
    status.items_enqueued += kept.length;
    status.cursor = lastItem.id;
    this.deps.log.debug(
      { scope_id: status.scope_id, cursor: status.cursor, kept: kept.length, pause_requested: pause.aborted },
      'Backfill page committed',
    );
  }

  /** Keeps the lease fresh while a page waits on the writer's retries. */
  private async withHeartbeat(scopeId: string, work: () => Promise<void>): Promise<void> {
    const timer = setInterval(() => {
      void this.deps.checkpoints.heartbeat(scopeId, this.opts.instanceId).then(
        (held) => {
          if (!held) this.deps.log.warn({ scope_id: scopeId }, 'Backfill lease lost while a page was committing');
        },
        (err: unknown) => {
          this.deps.log.warn({ err, scope_id: scopeId }, 'Backfill heartbeat failed');
        },
      );
    }, this.heartbeatMs);
    timer.unref();

    try {
      await work();
    } finally {
      clearInterval(timer);
    }
  }

  private shouldSkip(event: IngestEvent): boolean {
    if (!this.deps.filter.accepts(event)) return true;
    if (this.opts.maxAgeDays === null) return false;

    const cutoff = this.now() - this.opts.maxAgeDays * DAY_MS;
    return Date.parse(event.occurred_at) < cutoff;
  }

  /** Backfill may wait for capacity; live enqueue never does. */
  private async enqueue(event: IngestEvent, ticket: PageTicket, halt: AbortSignal): Promise<void> {
    const queue = this.deps.queues[event.kind];

    while (true) {
      if (halt.aborted) throw new RunHalted();

      const result = queue.enqueue({ event, source: 'backfill', enqueued_at: this.now(), ticket });
      if (result.accepted) return;
      if (result.reason === 'closed') throw new RunHalted();

      this.deps.writer.requestFlush();
      await this.sleep(this.queuePollMs, halt);
    }
  }

  private awaitCommit(ticket: PageTicket, halt: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (halt.aborted) {
        reject(new RunHalted());
        return;
      }
      const onHalt = (): void => reject(new RunHalted());
      halt.addEventListener('abort', onHalt, { once: true });
      ticket.committed.then(
        () => {
          halt.removeEventListener('abort', onHalt);
          resolve();
        },
        (err: unknown) => {
          halt.removeEventListener('abort', onHalt);
          reject(err);
        },
      );
    });
  }

  private async finishPaused(status: BackfillStatus): Promise<BackfillState> {
    try {
      await this.deps.checkpoints.pauseBackfill(status.scope_id, this.opts.instanceId);
    } catch (err: unknown) {
      status.last_error = describeError(err);
      this.deps.log.error({ err, scope_id: status.scope_id }, 'Failed to record backfill pause');
    }
    this.deps.log.info({ scope_id: status.scope_id, cursor: status.cursor }, 'Backfill paused');
    return this.finish(status, 'paused');
  }

  private async abort(status: BackfillStatus, err: unknown): Promise<BackfillState> {
    status.last_error = describeError(err);
    this.deps.log.error({ err, scope_id: status.scope_id, cursor: status.cursor }, 'Backfill aborted');

    try {
      await this.deps.checkpoints.endBackfill(status.scope_id, 'aborted', this.opts.instanceId);
    } catch (endErr: unknown) {
      this.deps.log.error({ err: endErr, scope_id: status.scope_id }, 'Failed to clear backfill flag');
    }

    this.deps.alerts.raise({
      type: 'backfill_aborted',
      message: `Backfill of ${status.scope_id} aborted at cursor ${status.cursor ?? 'start'}: ${status.last_error}`,
      scope_ids: [status.scope_id],
      raised_at: new Date(this.now()).toISOString(),
    });
    return this.finish(status, 'aborted');
  }

  private finish(status: BackfillStatus, state: BackfillState): BackfillState {
    status.state = state;
    status.finished_at = new Date(this.now()).toISOString();
    return state;
  }
}
