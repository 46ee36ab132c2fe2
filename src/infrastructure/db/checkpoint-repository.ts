import { and, eq, isNull, lt, or, sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import type { Checkpoint, CheckpointKind, CheckpointProgress, LeaseUpdate } from '../../domain/index.js';
import type { AdvanceRequest, BackfillClaim, CheckpointRepository } from '../../application/index.js';
import type { Database } from './client.js';
import { checkpoints } from './schema.js';
import { toStorageError } from './errors.js';

type CheckpointRow = typeof checkpoints.$inferSelect;

function toIso(value: Date | null): string | null {
  return value === null ? null : value.toISOString();
}

function toDate(value: string | null): Date | null {
  return value === null ? null : new Date(value);
}

function toCheckpoint(row: CheckpointRow): Checkpoint {
  return {
    scope_id: row.scope_id,
    kind: row.kind === 'backfill' ? 'backfill' : 'live',
    last_processed_id: row.last_processed_id,
    last_processed_at: toIso(row.last_processed_at),
    total_processed: row.total_processed,
    backfill_in_progress: row.backfill_in_progress,
    backfill_owner: row.backfill_owner,
    backfill_heartbeat_at: toIso(row.backfill_heartbeat_at),
    last_backfill_completed_at: toIso(row.last_backfill_completed_at),
    updated_at: row.updated_at.toISOString(),
  };
}

/**
 * True when `candidate` sorts after the stored cursor id: numerically for
 * snowflakes, by code point otherwise.
 */
function idAfter(candidate: string): SQL {
  const id = sql`${candidate}::text`;
  const stored = checkpoints.last_processed_id;
  return sql`CASE WHEN ${id} ~ '^[0-9]+$' AND ${stored} ~ '^[0-9]+$'
    THEN ${id}::numeric > ${stored}::numeric
    ELSE ${id} COLLATE "C" > ${stored} COLLATE "C" END`;
}

/** Backfill cursors follow the id; live cursors follow (timestamp, id). */
function aheadOfStored(kind: CheckpointKind, progress: CheckpointProgress): SQL {
  const unset = sql`${checkpoints.last_processed_id} IS NULL OR ${checkpoints.last_processed_at} IS NULL`;
  if (kind === 'backfill') {
    return sql`(${unset} OR ${idAfter(progress.last_processed_id)})`;
  }
  const at = sql`${progress.last_processed_at}::timestamptz`;
  return sql`(${unset}
    OR ${at} > ${checkpoints.last_processed_at}
    OR (${at} = ${checkpoints.last_processed_at} AND ${idAfter(progress.last_processed_id)}))`;
}

function leaseChanges(update: LeaseUpdate, now: Date): Partial<typeof checkpoints.$inferInsert> {
  switch (update.type) {
    case 'heartbeat':
      return { backfill_heartbeat_at: now, updated_at: now };
    case 'pause':
      return { backfill_owner: null, backfill_heartbeat_at: null, updated_at: now };
    case 'end':
      return {
        backfill_in_progress: false,
        backfill_owner: null,
        backfill_heartbeat_at: null,
        updated_at: now,
        ...(update.outcome === 'completed' ? { last_backfill_completed_at: now } : {}),
      };
  }
}

/**
 * CheckpointRepository over PostgreSQL.
 *
 * Claims, advances and lease updates are single conditional statements:
 * Postgres re-checks the WHERE clause under the row lock, so of two
 * concurrent claims exactly one returns a row, and concurrent advances add
 * up instead of overwriting each other.
 */
export class PostgresCheckpointRepository implements CheckpointRepository {
  constructor(private readonly db: Database) {}

  async find(scopeId: string, kind: CheckpointKind): Promise<Checkpoint | null> {
    try {
      const [row] = await this.db
        .select()
        .from(checkpoints)
        .where(and(eq(checkpoints.scope_id, scopeId), eq(checkpoints.kind, kind)))
        .limit(1);
      return row === undefined ? null : toCheckpoint(row);
    } catch (err: unknown) {
      throw toStorageError(err);
    }
  }

  async upsert(checkpoint: Checkpoint): Promise<void> {
    const values = {
      last_processed_id: checkpoint.last_processed_id,
      last_processed_at: toDate(checkpoint.last_processed_at),
      total_processed: checkpoint.total_processed,
      backfill_in_progress: checkpoint.backfill_in_progress,
      backfill_owner: checkpoint.backfill_owner,
      backfill_heartbeat_at: toDate(checkpoint.backfill_heartbeat_at),
      last_backfill_completed_at: toDate(checkpoint.last_backfill_completed_at),
      updated_at: new Date(checkpoint.updated_at),
    };

    try {
      await this.db
        .insert(checkpoints)
        .values({ scope_id: checkpoint.scope_id, kind: checkpoint.kind, ...values })
        .onConflictDoUpdate({
          target: [checkpoints.scope_id, checkpoints.kind],
          set: values,
        });
    } catch (err: unknown) {
      throw toStorageError(err);
    }
  }

  async advance(scopeId: string, kind: CheckpointKind, request: AdvanceRequest): Promise<Checkpoint | null> {
    const { progress, now, owner } = request;
    const ahead = aheadOfStored(kind, progress);
    const cursor = {
      last_processed_id: sql`CASE WHEN ${ahead} THEN ${progress.last_processed_id}::text ELSE ${checkpoints.last_processed_id} END`,
      last_processed_at: sql`CASE WHEN ${ahead} THEN ${progress.last_processed_at}::timestamptz ELSE ${checkpoints.last_processed_at} END`,
      total_processed: sql`${checkpoints.total_processed} + ${Math.max(0, progress.processed)}`,
      updated_at: now,
    };

    try {
      if (owner !== undefined) {
        const [row] = await this.db
          .update(checkpoints)
          .set({ ...cursor, backfill_heartbeat_at: now })
          .where(
            and(
              eq(checkpoints.scope_id, scopeId),
              eq(checkpoints.kind, kind),
              eq(checkpoints.backfill_owner, owner),
            ),
          )
          .returning();
        return row === undefined ? null : toCheckpoint(row);
      }

      const [row] = await this.db
        .insert(checkpoints)
        .values({
          scope_id: scopeId,
          kind,
          last_processed_id: progress.last_processed_id,
          last_processed_at: new Date(progress.last_processed_at),
          total_processed: Math.max(0, progress.processed),
          updated_at: now,
        })
        .onConflictDoUpdate({
          target: [checkpoints.scope_id, checkpoints.kind],
          set: cursor,
        })
        .returning();
      return row === undefined ? null : toCheckpoint(row);
    } catch (err: unknown) {
      throw toStorageError(err);
    }
  }

  async updateLease(scopeId: string, owner: string, update: LeaseUpdate, now: Date): Promise<boolean> {
    try {
      const rows = await this.db
        .update(checkpoints)
        .set(leaseChanges(update, now))
        .where(
          and(
            eq(checkpoints.scope_id, scopeId),
            eq(checkpoints.kind, 'backfill'),
            eq(checkpoints.backfill_owner, owner),
          ),
        )
        .returning({ scope_id: checkpoints.scope_id });
      return rows.length > 0;
    } catch (err: unknown) {
      throw toStorageError(err);
    }
  }

  async claimBackfill(scopeId: string, claim: BackfillClaim): Promise<Checkpoint | null> {
    try {
      await this.db
        .insert(checkpoints)
        .values({ scope_id: scopeId, kind: 'backfill', updated_at: claim.now })
        .onConflictDoNothing({ target: [checkpoints.scope_id, checkpoints.kind] });

      const [row] = await this.db
        .update(checkpoints)
        .set({
          backfill_in_progress: true,
          backfill_owner: claim.owner,
          backfill_heartbeat_at: claim.now,
          updated_at: claim.now,
        })
        .where(
          and(
            eq(checkpoints.scope_id, scopeId),
            eq(checkpoints.kind, 'backfill'),
            or(
              eq(checkpoints.backfill_in_progress, false),
              isNull(checkpoints.backfill_owner),
              isNull(checkpoints.backfill_heartbeat_at),
              lt(checkpoints.backfill_heartbeat_at, claim.staleBefore),
            ),
          ),
        )
        .returning();

      return row === undefined ? null : toCheckpoint(row);
    } catch (err: unknown) {
      throw toStorageError(err);
    }
  }
}
