import { and, or, eq, gt, not, sql } from 'drizzle-orm';
import { supersedes } from '../../domain/index.js';
import type { EventKind, Versioned } from '../../domain/index.js';
import type { ActionRow, EventStore, MessageRow, RowsByKind } from '../../application/index.js';
import type { Database } from './client.js';
import { actions, messages } from './schema.js';
import { toStorageError } from './errors.js';

/**
 * A single INSERT cannot update the same row twice, so duplicate ids in one
 * batch are collapsed to the version that would win the upsert anyway.
 */
export function collapseVersions<T extends Versioned>(
  rows: readonly T[],
  idOf: (row: T) => string,
): T[] {
  const winners = new Map<string, T>();
  for (const row of rows) {
    const id = idOf(row);
    const current = winners.get(id);
    if (current === undefined || supersedes(row, current)) {
      winners.set(id, row);
    }
  }
  return [...winners.values()];
}

type BatchUpsert = {
  [K in keyof RowsByKind]: (rows: readonly RowsByKind[K][]) => Promise<number>;
};

/**
 * EventStore over PostgreSQL.
 *
 * One `INSERT ... ON CONFLICT DO UPDATE` per batch. The update only applies
 * when the incoming version is newer, or equally new and not a backfilled
 * copy overwriting a live row. `logged_at` is never part of the update set,
 * so the first capture time survives every re-ingestion.
 */
export class PostgresEventStore implements EventStore {
  private readonly upserts: BatchUpsert = {
    message: (rows) => this.upsertMessages(rows),
    action: (rows) => this.upsertActions(rows),
  };

  constructor(private readonly db: Database) {}

  async upsertBatch<K extends EventKind>(kind: K, rows: readonly RowsByKind[K][]): Promise<number> {
    if (rows.length === 0) return 0;
    try {
      return await this.upserts[kind](rows);
    } catch (err: unknown) {
      throw toStorageError(err);
    }
  }

  private async upsertMessages(rows: readonly MessageRow[]): Promise<number> {
    const written = await this.db
      .insert(messages)
      .values(collapseVersions(rows, (row) => row.message_id).map((row) => ({ ...row, updated_at: new Date() })))
      .onConflictDoUpdate({
        target: messages.message_id,
        set: {
          channel_id: sql`excluded.channel_id`,
          guild_id: sql`excluded.guild_id`,
          author_id: sql`excluded.author_id`,
          author_username: sql`excluded.author_username`,
          content: sql`excluded.content`,
          message_type: sql`excluded.message_type`,
          created_at: sql`excluded.created_at`,
          edited_at: sql`excluded.edited_at`,
          version_at: sql`excluded.version_at`,
          payload: sql`excluded.payload`,
          is_backfilled: sql`excluded.is_backfilled`,
          updated_at: sql`excluded.updated_at`,
        },
        setWhere: or(
          gt(sql`excluded.version_at`, messages.version_at),
          and(
            eq(sql`excluded.version_at`, messages.version_at),
            or(not(sql`excluded.is_backfilled`), eq(messages.is_backfilled, true)),
          ),
        ),
      })
      .returning({ id: messages.message_id });

    return written.length;
  }

  private async upsertActions(rows: readonly ActionRow[]): Promise<number> {
    const written = await this.db
      .insert(actions)
      .values(collapseVersions(rows, (row) => row.action_id).map((row) => ({ ...row, updated_at: new Date() })))
      .onConflictDoUpdate({
        target: actions.action_id,
        set: {
          action_type: sql`excluded.action_type`,
          guild_id: sql`excluded.guild_id`,
          channel_id: sql`excluded.channel_id`,
          user_id: sql`excluded.user_id`,
          target_id: sql`excluded.target_id`,
          action_data: sql`excluded.action_data`,
          before_data: sql`excluded.before_data`,
          after_data: sql`excluded.after_data`,
          occurred_at: sql`excluded.occurred_at`,
          version_at: sql`excluded.version_at`,
          is_backfilled: sql`excluded.is_backfilled`,
          updated_at: sql`excluded.updated_at`,
        },
        setWhere: or(
          gt(sql`excluded.version_at`, actions.version_at),
          and(
            eq(sql`excluded.version_at`, actions.version_at),
            or(not(sql`excluded.is_backfilled`), eq(actions.is_backfilled, true)),
          ),
        ),
      })
      .returning({ id: actions.action_id });

    return written.length;
  }
}
