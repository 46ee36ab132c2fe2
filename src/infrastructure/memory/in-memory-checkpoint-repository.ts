import { applyLeaseUpdate, applyProgress, emptyCheckpoint } from '../../domain/index.js';
import type { Checkpoint, CheckpointKind, LeaseUpdate } from '../../domain/index.js';
import type { AdvanceRequest, BackfillClaim, CheckpointRepository } from '../../application/index.js';

function keyOf(scopeId: string, kind: CheckpointKind): string {
  return `${scopeId}:${kind}`;
}

/**
 * CheckpointRepository kept in process memory.
 *
 * Several pipelines may share one instance to stand in for several workers
 * sharing a database. Every write runs to completion before its first
 * await, which gives it the same all-or-nothing outcome as the conditional
 * statements of the Postgres repository.
 */
export class InMemoryCheckpointRepository implements CheckpointRepository {
  private readonly rows = new Map<string, Checkpoint>();

  async find(scopeId: string, kind: CheckpointKind): Promise<Checkpoint | null> {
    return this.rows.get(keyOf(scopeId, kind)) ?? null;
  }

  async upsert(checkpoint: Checkpoint): Promise<void> {
    this.rows.set(keyOf(checkpoint.scope_id, checkpoint.kind), checkpoint);
  }

  async advance(scopeId: string, kind: CheckpointKind, request: AdvanceRequest): Promise<Checkpoint | null> {
    const key = keyOf(scopeId, kind);
    const current = this.rows.get(key);

    if (request.owner !== undefined) {
      if (current === undefined || current.backfill_owner !== request.owner) return null;
      const next: Checkpoint = {
        ...applyProgress(current, request.progress, request.now),
        backfill_heartbeat_at: request.now.toISOString(),
      };
      this.rows.set(key, next);
      return next;
    }

    const next = applyProgress(current ?? emptyCheckpoint(scopeId, kind, request.now), request.progress, request.now);
    this.rows.set(key, next);
    return next;
  }

  async updateLease(scopeId: string, owner: string, update: LeaseUpdate, now: Date): Promise<boolean> {
    const key = keyOf(scopeId, 'backfill');
    const current = this.rows.get(key);
    if (current === undefined || current.backfill_owner !== owner) return false;

    this.rows.set(key, applyLeaseUpdate(current, update, now));
    return true;
  }

  async claimBackfill(scopeId: string, claim: BackfillClaim): Promise<Checkpoint | null> {
    const key = keyOf(scopeId, 'backfill');
    const current = this.rows.get(key) ?? emptyCheckpoint(scopeId, 'backfill', claim.now);

    const heartbeat = current.backfill_heartbeat_at === null ? null : Date.parse(current.backfill_heartbeat_at);
    const claimable = !current.backfill_in_progress
      || current.backfill_owner === null
      || heartbeat === null
      || heartbeat < claim.staleBefore.getTime();

    if (!claimable) {
      this.rows.set(key, current);
      return null;
    }

    const claimed: Checkpoint = {
      ...current,
      backfill_in_progress: true,
      backfill_owner: claim.owner,
      backfill_heartbeat_at: claim.now.toISOString(),
      updated_at: claim.now.toISOString(),
    };
    this.rows.set(key, claimed);
    return claimed;
  }

  /** Test seam: the current row without going through the async API. */
  peek(scopeId: string, kind: CheckpointKind): Checkpoint | undefined {
    return this.rows.get(keyOf(scopeId, kind));
  }
}
