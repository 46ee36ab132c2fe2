export type {
  EventKind,
  IngestSource,
  EventPayload,
  MessageEvent,
  ActionEvent,
  IngestEvent,
  CommitTicket,
  QueueItem,
} from './event.js';
export { EVENT_KINDS, markBackfilled, versionKey } from './event.js';
export type {
  Checkpoint,
  CheckpointKind,
  CheckpointProgress,
  CursorOrder,
  BackfillOutcome,
  LeaseUpdate,
} from './checkpoint.js';
export {
  emptyCheckpoint,
  compareIds,
  comparePositions,
  applyProgress,
  applyLeaseUpdate,
  orderFor,
} from './checkpoint.js';
export {
  IngestError,
  QueueFullError,
  ValidationError,
  TransientStorageError,
  FatalStorageError,
  RowRejectedError,
  CheckpointConflictError,
  HistoryFetchError,
  RetryExhaustedError,
  describeError,
} from './errors.js';
export type { Versioned } from './version.js';
export { supersedes } from './version.js';
export type { GuildInfo, ChannelInfo, DirectoryKind, DirectoryEntry } from './directory.js';
export { directoryId } from './directory.js';
