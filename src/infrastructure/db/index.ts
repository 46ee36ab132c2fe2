export { messages, actions, checkpoints, guilds, channels } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, Sql, DbClientOptions } from './client.js';
export { PostgresEventStore, collapseVersions } from './event-repository.js';
export { PostgresCheckpointRepository } from './checkpoint-repository.js';
export { PostgresDirectoryStore } from './directory-repository.js';
export { toStorageError } from './errors.js';
export { ensureSchema } from './bootstrap.js';
