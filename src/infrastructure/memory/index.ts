export { InMemoryEventStore } from './in-memory-event-store.js';
export type { StoredRow } from './in-memory-event-store.js';
export { InMemoryCheckpointRepository } from './in-memory-checkpoint-repository.js';
export { InMemoryDirectoryStore } from './in-memory-directory-store.js';
export type { DirectoryRow } from './in-memory-directory-store.js';
