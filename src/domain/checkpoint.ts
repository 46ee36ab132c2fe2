/**
 * Durable progress marker, one per (scope, kind).
 *
 * `live` and `backfill` checkpoints for the same scope are independent rows:
 * the live path advances `live`, the BackfillCoordinator owns `backfill`.
 */
export type CheckpointKind = 'live' | 'backfill';

export interface Checkpoint {
  readonly scope_id: string;
  readonly kind: CheckpointKind;
  readonly last_processed_id: string | null;
  readonly last_processed_at: string | null;
  /** Monotonic counter of committed items. */
  readonly total_processed: number;
  readonly backfill_in_progress: boolean;
  /** Instance currently running the backfill; null while paused or idle. */
  readonly backfill_owner: string | null;
  readonly backfill_heartbeat_at: string | null;
  readonly last_backfill_completed_at: string | null;
  readonly updated_at: string;
}

/** Progress committed by one flush or one backfill page. */
export interface CheckpointProgress {
  readonly last_processed_id: string;
  readonly last_processed_at: string;
  readonly processed: number;
}

export function emptyCheckpoint(scopeId: string, kind: CheckpointKind, now: Date): Checkpoint {
  return {
    scope_id: scopeId,
    kind,
    last_processed_id: null,
    last_processed_at: null,
    total_processed: 0,
    backfill_in_progress: false,
    backfill_owner: null,
    backfill_heartbeat_at: null,
    last_backfill_completed_at: null,
    updated_at: now.toISOString(),
  };
}

/**
 * Orders snowflake-style ids: numeric strings compare by value,
 * anything else lexicographically.
 */
export function compareIds(a: string, b: string): number {
  if (/^\d+$/.test(a) && /^\d+$/.test(b)) {
    const left = BigInt(a);
    const right = BigInt(b);
    if (left === right) return 0;
    return left < right ? -1 : 1;
  }
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Compares two cursor positions by timestamp, then id. */
export function comparePositions(
  a: { at: string; id: string },
  b: { at: string; id: string },
): number {
  const diff = Date.parse(a.at) - Date.parse(b.at);
  if (diff !== 0) return diff < 0 ? -1 : 1;
  return compareIds(a.id, b.id);
}

/**
 * How a checkpoint orders positions. Live checkpoints follow the source
 * timestamp; backfill cursors are "fetch after id" markers and follow the id.
 */
export type CursorOrder = 'time' | 'id';

export function orderFor(kind: CheckpointKind): CursorOrder {
  return kind === 'backfill' ? 'id' : 'time';
}

/**
 * Applies progress without moving the cursor backwards.
 * `total_processed` always grows by the committed count.
 */
export function applyProgress(
  current: Checkpoint,
  progress: CheckpointProgress,
  now: Date,
  order: CursorOrder = orderFor(current.kind),
): Checkpoint {
  let lastId = current.last_processed_id;
  let lastAt = current.last_processed_at;

  let ahead: boolean;
  if (lastId === null || lastAt === null) {
    ahead = true;
  } else if (order === 'id') {
    ahead = compareIds(progress.last_processed_id, lastId) > 0;
  } else {
    ahead = comparePositions(
      { at: progress.last_processed_at, id: progress.last_processed_id },
      { at: lastAt, id: lastId },
    ) > 0;
  }

  if (ahead) {
    lastId = progress.last_processed_id;
    lastAt = progress.last_processed_at;
  }

  return {
    ...current,
    last_processed_id: lastId,
    last_processed_at: lastAt,
    total_processed: current.total_processed + Math.max(0, progress.processed),
    updated_at: now.toISOString(),
  };
}

export type BackfillOutcome = 'completed' | 'aborted';

/** Lease transitions the owner of a backfill run may apply to its checkpoint. */
export type LeaseUpdate =
  | { readonly type: 'heartbeat' }
  | { readonly type: 'pause' }
  | { readonly type: 'end'; readonly outcome: BackfillOutcome };

/**
 * Pause keeps `backfill_in_progress` set and releases the owner, so the next
 * start resumes from the cursor. End clears the flag; `completed` also
 * stamps `last_backfill_completed_at`.
 */
export function applyLeaseUpdate(current: Checkpoint, update: LeaseUpdate, now: Date): Checkpoint {
  const stamp = now.toISOString();
  switch (update.type) {
    case 'heartbeat':
      return { ...current, backfill_heartbeat_at: stamp, updated_at: stamp };
    case 'pause':
      return { ...current, backfill_owner: null, backfill_heartbeat_at: null, updated_at: stamp };
    case 'end':
      return {
        ...current,
        backfill_in_progress: false,
        backfill_owner: null,
        backfill_heartbeat_at: null,
        last_backfill_completed_at:
          update.outcome === 'completed' ? stamp : current.last_backfill_completed_at,
        updated_at: stamp,
      };
  }
}
