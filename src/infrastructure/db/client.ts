import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema.js';

export interface DbClientOptions {
  /** Pool size. The worker is one process sharing one pool. */
  max?: number;
  connectTimeoutSeconds?: number;
}

/**
 * Creates a Drizzle client backed by postgres.js.
 *
 * Returns both the raw `sql` connection (for lifecycle management and the
 * schema bootstrap) and the typed `db` instance (for queries).
 */
export function createDbClient(databaseUrl: string, opts: DbClientOptions = {}) {
  const sql = postgres(databaseUrl, {
    max: opts.max ?? 10,
    idle_timeout: 20,
    connect_timeout: opts.connectTimeoutSeconds ?? 10,
    onnotice: () => undefined,
  });

  const db = drizzle(sql, { schema });

  return { sql, db };
}

export type Database = ReturnType<typeof createDbClient>['db'];
export type Sql = ReturnType<typeof createDbClient>['sql'];
