export {
  ACTION_TYPES,
  eventEnvelopeSchema,
  messagePayloadSchema,
  actionPayloadSchema,
  rowValidators,
  toMessageRow,
  toActionRow,
  parseEnvelope,
} from './event-schema.js';
export type {
  ActionType,
  EventEnvelope,
  MessageRow,
  ActionRow,
  RowResult,
  RowsByKind,
} from './event-schema.js';
export type {
  EventStore,
  BackfillClaim,
  AdvanceRequest,
  CheckpointRepository,
  DirectoryStore,
  HistoryPageRequest,
  HistoryPage,
  HistorySource,
  AlertType,
  Alert,
  AlertSink,
} from './ports.js';
export { guildInfoSchema, channelInfoSchema, parseDirectoryEntry, DirectoryRecorder } from './directory.js';
export type { DirectoryRecorderDeps, DirectoryStats } from './directory.js';
export { RetryPolicy, computeBackoffMs } from './retry-policy.js';
export type { FailureClass, RetryPolicyOptions, RetryRuntime } from './retry-policy.js';
export { Deduplicator } from './deduplicator.js';
export { EventQueue } from './event-queue.js';
export type { EnqueueResult, QueueStats } from './event-queue.js';
export { KeyedMutex } from './keyed-mutex.js';
export { CheckpointStore } from './checkpoint-store.js';
export type { BackfillOutcome } from './checkpoint-store.js';
export { EventFilter } from './event-filter.js';
export type { EventFilterOptions, FilterVerdict } from './event-filter.js';
export { BatchWriter } from './batch-writer.js';
export type { WriterStats, ComponentError } from './batch-writer.js';
export { BackfillCoordinator } from './backfill-coordinator.js';
export type { BackfillState, BackfillStatus, StartResult } from './backfill-coordinator.js';
export { IngestionPipeline } from './ingestion-pipeline.js';
export type {
  PipelineConfig,
  PipelineDeps,
  IngestResult,
  PipelineState,
  PipelineStats,
} from './ingestion-pipeline.js';
