/**
 * Core domain types for the guildlog ingestion model.
 *
 * These types describe events as they flow from the gateway (live) or the
 * history API (backfill) into storage. They carry no framework dependencies.
 */

/** Variant tag. Each variant is persisted to its own table. */
export type EventKind = 'message' | 'action';

export const EVENT_KINDS: readonly EventKind[] = ['message', 'action'];

/** Which path produced an item. */
export type IngestSource = 'live' | 'backfill';

/** Free-form attributes specific to the variant. */
export type EventPayload = Record<string, unknown>;

interface EventBase {
  /** Stable external identifier (snowflake). Unique per variant table. */
  readonly id: string;
  /** Grouping key the checkpoints are tracked under (a channel id). */
  readonly scope_id: string;
  readonly guild_id: string | null;
  /**
   * Version timestamp assigned by the source (ISO-8601): creation or last
   * edit time for messages, occurrence time for actions.
   */
  readonly occurred_at: string;
  readonly payload: EventPayload;
  /** True only when produced by the BackfillCoordinator. */
  readonly is_backfilled: boolean;
}

export interface MessageEvent extends EventBase {
  readonly kind: 'message';
}

export interface ActionEvent extends EventBase {
  readonly kind: 'action';
  readonly action_type: string;
}

/** Immutable snapshot of one event at ingestion time. */
export type IngestEvent = MessageEvent | ActionEvent;

/**
 * Settles once per item when the BatchWriter is done with it.
 * Used by backfill to learn when a page is durably committed.
 */
export interface CommitTicket {
  settle(): void;
  fail(err: unknown): void;
}

/** An event owned by an EventQueue until the BatchWriter drains it. */
export interface QueueItem {
  readonly event: IngestEvent;
  readonly source: IngestSource;
  /** Epoch ms. */
  readonly enqueued_at: number;
  readonly ticket?: CommitTicket | undefined;
}

/** Returns a copy of the event tagged as backfilled. */
export function markBackfilled<T extends IngestEvent>(event: T): T {
  return { ...event, is_backfilled: true };
}

/** Key used by the live-path deduplicator: kind, id and version. */
export function versionKey(event: IngestEvent): string {
  return `${event.kind}:${event.id}:${event.occurred_at}`;
}
