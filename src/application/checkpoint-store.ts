import type { Logger } from 'pino';
import { CheckpointConflictError } from '../domain/index.js';
import type {
  BackfillOutcome,
  Checkpoint,
  CheckpointKind,
  CheckpointProgress,
  LeaseUpdate,
} from '../domain/index.js';
import type { CheckpointRepository } from './ports.js';
import { KeyedMutex } from './keyed-mutex.js';

export type { BackfillOutcome };

export interface CheckpointStoreOptions {
  /** A run whose heartbeat is older than this is treated as crashed. */
  leaseMs: number;
  now?: () => Date;
}

/**
 * Durable progress per (scope, kind) on top of a CheckpointRepository.
 *
 * Every write for a scope goes through one keyed mutex, so live-checkpoint
 * advances and backfill state changes for the same scope never interleave in
 * this process. Across processes the repository's atomic writes keep the
 * cursor monotonic and the lease checks exact.
 */
export class CheckpointStore {
  private readonly mutex = new KeyedMutex();
  private readonly leaseMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly repo: CheckpointRepository,
    private readonly log: Logger,
    opts: CheckpointStoreOptions,
  ) {
    this.leaseMs = opts.leaseMs;
    this.now = opts.now ?? (() => new Date());
  }

  load(scopeId: string, kind: CheckpointKind): Promise<Checkpoint | null> {
    return this.repo.find(scopeId, kind);
  }

  save(checkpoint: Checkpoint): Promise<void> {
    return this.mutex.run(checkpoint.scope_id, () => this.repo.upsert(checkpoint));
  }

  /**
   * Moves the cursor forward and adds the committed count.
   *
   * When `owner` is given (backfill), the write is refused with
   * CheckpointConflictError unless that owner still holds the run, and the
   * heartbeat is refreshed.
   */
  advance(
    scopeId: string,
    kind: CheckpointKind,
    progress: CheckpointProgress,
    owner?: string,
  ): Promise<Checkpoint> {
    return this.mutex.run(scopeId, async () => {
      const next = await this.repo.advance(scopeId, kind, { progress, now: this.now(), owner });
      if (next === null) {
        throw new CheckpointConflictError(scopeId);
      }

      this.log.debug(
        {
          scope_id: scopeId,
          kind,
          last_processed_id: next.last_processed_id,
          total_processed: next.total_processed,
        },
        'Checkpoint advanced',
      );
      return next;
    });
  }

  /**
   * Compare-and-swap on `backfill_in_progress`.
   * Returns the claimed checkpoint, or null when another run holds the lease.
   */
  tryBeginBackfill(scopeId: string, owner: string): Promise<Checkpoint | null> {
    return this.mutex.run(scopeId, async () => {
      const now = this.now();
      const claimed = await this.repo.claimBackfill(scopeId, {
        owner,
        now,
        staleBefore: new Date(now.getTime() - this.leaseMs),
      });

      if (claimed === null) {
        this.log.info({ scope_id: scopeId, owner }, 'Backfill claim refused');
      } else {
        this.log.info(
          { scope_id: scopeId, owner, after: claimed.last_processed_id },
          'Backfill claimed',
        );
      }
      return claimed;
    });
  }

  /** Refreshes the lease. Returns false when `owner` no longer holds the run. */
  heartbeat(scopeId: string, owner: string): Promise<boolean> {
    return this.updateLease(scopeId, owner, { type: 'heartbeat' });
  }

  /** Releases ownership but keeps the flag set, so the next start resumes. */
  pauseBackfill(scopeId: string, owner: string): Promise<boolean> {
    return this.updateLease(scopeId, owner, { type: 'pause' });
  }

  /** Clears the flag. `completed` also stamps `last_backfill_completed_at`. */
  endBackfill(scopeId: string, outcome: BackfillOutcome, owner: string): Promise<boolean> {
    return this.updateLease(scopeId, owner, { type: 'end', outcome });
  }

  private updateLease(scopeId: string, owner: string, update: LeaseUpdate): Promise<boolean> {
    return this.mutex.run(scopeId, async () => {
      const held = await this.repo.updateLease(scopeId, owner, update, this.now());
      if (!held) {
        this.log.warn(
          { scope_id: scopeId, owner, update: update.type },
          'Backfill lease not held, skipping checkpoint update',
        );
      }
      return held;
    });
  }
}
