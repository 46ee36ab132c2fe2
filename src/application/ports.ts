import type {
  Checkpoint,
  CheckpointKind,
  CheckpointProgress,
  ChannelInfo,
  EventKind,
  GuildInfo,
  IngestEvent,
  LeaseUpdate,
} from '../domain/index.js';
import type { RowsByKind } from './event-schema.js';

export type { RowsByKind };

/**
 * Storage capability for events: upsert rows keyed by their id.
 *
 * Implementations must apply last-write-wins by `version_at` (live wins ties)
 * and never overwrite `logged_at`. Returns the number of rows written.
 */
export interface EventStore {
  upsertBatch<K extends EventKind>(kind: K, rows: readonly RowsByKind[K][]): Promise<number>;
}

/** Lease condition for claiming a backfill run. */
export interface BackfillClaim {
  readonly owner: string;
  readonly now: Date;
  /** Heartbeats older than this are treated as crashed runs. */
  readonly staleBefore: Date;
}

export interface AdvanceRequest {
  readonly progress: CheckpointProgress;
  readonly now: Date;
  /** Backfill writes pass the lease owner; the advance applies only while it holds the run. */
  readonly owner?: string | undefined;
}

/**
 * Storage capability for checkpoints.
 *
 * Several workers may share one table, so `advance` and `updateLease` must be
 * single atomic writes in storage, never a read followed by a write.
 */
export interface CheckpointRepository {
  find(scopeId: string, kind: CheckpointKind): Promise<Checkpoint | null>;
  /** Idempotent upsert by (scope_id, kind). */
  upsert(checkpoint: Checkpoint): Promise<void>;
  /**
   * Adds `progress.processed` to `total_processed` and moves the cursor only
   * when the new position is ahead of the stored one. Creates the row if
   * missing, except for owned writes. Returns null when `owner` does not
   * hold the lease.
   */
  advance(scopeId: string, kind: CheckpointKind, request: AdvanceRequest): Promise<Checkpoint | null>;
  /** Applies `update` to the backfill row only while `owner` holds it. */
  updateLease(scopeId: string, owner: string, update: LeaseUpdate, now: Date): Promise<boolean>;
  /**
   * Compare-and-swap: sets `backfill_in_progress = true` and takes ownership
   * only if no live run holds the flag. Creates the row if missing.
   * Returns the claimed checkpoint, or null when the claim lost.
   */
  claimBackfill(scopeId: string, claim: BackfillClaim): Promise<Checkpoint | null>;
}

/** Storage capability for guild and channel metadata: upsert by id, keep `first_seen`. */
export interface DirectoryStore {
  upsertGuild(guild: GuildInfo, now: Date): Promise<void>;
  upsertChannel(channel: ChannelInfo, now: Date): Promise<void>;
}

export interface HistoryPageRequest {
  /** Fetch items strictly after this id; null starts from the oldest item. */
  readonly after: string | null;
  readonly limit: number;
}

export interface HistoryPage {
  /** Oldest to newest. */
  readonly items: readonly IngestEvent[];
  readonly has_more: boolean;
}

/** Pull-style paginated history of one scope. */
export interface HistorySource {
  fetchPage(scopeId: string, request: HistoryPageRequest): Promise<HistoryPage>;
}

export type AlertType = 'fatal_batch' | 'backfill_aborted';

export interface Alert {
  readonly type: AlertType;
  readonly message: string;
  readonly scope_ids: readonly string[];
  readonly kind?: EventKind | undefined;
  readonly dropped?: number | undefined;
  readonly raised_at: string;
}

/** Operator-visible alert channel. Best-effort, never throws. */
export interface AlertSink {
  raise(alert: Alert): void;
}
