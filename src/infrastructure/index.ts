export {
  messages,
  actions,
  checkpoints,
  guilds,
  channels,
  createDbClient,
  PostgresEventStore,
  PostgresCheckpointRepository,
  PostgresDirectoryStore,
  collapseVersions,
  toStorageError,
  ensureSchema,
} from './db/index.js';
export type { Database, Sql, DbClientOptions } from './db/index.js';
export { InMemoryEventStore, InMemoryCheckpointRepository, InMemoryDirectoryStore } from './memory/index.js';
export type { StoredRow, DirectoryRow } from './memory/index.js';
export {
  RelayConsumer,
  DEFAULT_STREAM_KEY,
  DEFAULT_GROUP,
  publishAlert,
  createRedisAlertSink,
  DEFAULT_ALERT_CHANNEL,
} from './redis/index.js';
export type { LiveSink, DirectorySink, RelayConsumerOptions, RelayStats } from './redis/index.js';
export { HttpHistoryClient } from './history/index.js';
export type { HttpHistoryClientOptions } from './history/index.js';
