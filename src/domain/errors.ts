import type { EventKind } from './event.js';

/**
 * Error taxonomy of the ingestion core.
 *
 * Adapters map library errors (postgres.js, fetch) into these classes so the
 * RetryPolicy and the BatchWriter never inspect driver-specific shapes.
 */
export abstract class IngestError extends Error {
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Live enqueue rejected because the queue for `kind` is at capacity. */
export class QueueFullError extends IngestError {
  readonly retryable = false;

  constructor(readonly kind: EventKind, readonly capacity: number) {
    super(`${kind} queue is full (capacity=${capacity})`);
  }
}

/** A single item failed schema validation. Item-scoped: dropped and logged. */
export class ValidationError extends IngestError {
  readonly retryable = false;

  constructor(
    readonly eventId: string,
    readonly issues: readonly string[],
  ) {
    super(`Event ${eventId} failed validation: ${issues.join('; ')}`);
  }
}

/** Connectivity, timeout, serialization or busy-server failure. */
export class TransientStorageError extends IngestError {
  readonly retryable = true;

  constructor(message: string, readonly code?: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Schema, permission or authentication failure. Aborts the current batch. */
export class FatalStorageError extends IngestError {
  readonly retryable = false;

  constructor(message: string, readonly code?: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * The storage rejected a batch because of a row's data (integrity or data
 * exception). The writer isolates the offending rows instead of dropping the batch.
 */
export class RowRejectedError extends FatalStorageError {}

/** CAS on `backfill_in_progress` lost to another run. */
export class CheckpointConflictError extends IngestError {
  readonly retryable = false;

  constructor(readonly scopeId: string) {
    super(`Backfill already in progress for scope ${scopeId}`);
  }
}

/** History API failure. `status` is the HTTP status when there was a response. */
export class HistoryFetchError extends IngestError {
  constructor(
    message: string,
    readonly retryable: boolean,
    readonly status: number | null = null,
    readonly retryAfterMs: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** A retryable operation ran out of attempts or time. */
export class RetryExhaustedError extends IngestError {
  readonly retryable = false;

  constructor(
    readonly operation: string,
    readonly attempts: number,
    readonly elapsedMs: number,
    readonly lastError: unknown,
  ) {
    super(
      `${operation} failed after ${attempts} attempt(s) in ${elapsedMs}ms: ${describeError(lastError)}`,
      { cause: lastError },
    );
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
