import { supersedes } from '../../domain/index.js';
import type { EventKind } from '../../domain/index.js';
import type { ActionRow, EventStore, MessageRow, RowsByKind } from '../../application/index.js';

/** A stored row plus the columns the database fills in. */
export type StoredRow<T> = T & { logged_at: Date; updated_at: Date };

type Tables = {
  [K in keyof RowsByKind]: Map<string, StoredRow<RowsByKind[K]>>;
};

type IdOf = {
  [K in keyof RowsByKind]: (row: RowsByKind[K]) => string;
};

const ID_OF: IdOf = {
  message: (row: MessageRow) => row.message_id,
  action: (row: ActionRow) => row.action_id,
};

/**
 * EventStore kept in process memory, with the same last-write-wins rules
 * as the Postgres store. Used by tests and local runs without a database.
 */
export class InMemoryEventStore implements EventStore {
  private readonly tables: Tables = { message: new Map(), action: new Map() };
  private readonly now: () => Date;
  /** Number of upsertBatch calls, successful or not. */
  calls = 0;

  constructor(opts: { now?: () => Date } = {}) {
    this.now = opts.now ?? (() => new Date());
  }

  async upsertBatch<K extends EventKind>(kind: K, rows: readonly RowsByKind[K][]): Promise<number> {
    this.calls++;
    const table: Map<string, StoredRow<RowsByKind[K]>> = this.tables[kind];
    const idOf: (row: RowsByKind[K]) => string = ID_OF[kind];
    let written = 0;

    for (const row of rows) {
      const id = idOf(row);
      const existing = table.get(id);
      if (existing !== undefined && !supersedes(row, existing)) continue;

      const now = this.now();
      table.set(id, { ...row, logged_at: existing?.logged_at ?? now, updated_at: now });
      written++;
    }
    return written;
  }

  get<K extends EventKind>(kind: K, id: string): StoredRow<RowsByKind[K]> | undefined {
    const table: Map<string, StoredRow<RowsByKind[K]>> = this.tables[kind];
    return table.get(id);
  }

  count(kind: EventKind): number {
    return this.tables[kind].size;
  }

  ids(kind: EventKind): string[] {
    return [...this.tables[kind].keys()];
  }
}
