import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { CommitTicket, DirectoryEntry, IngestEvent } from '../../domain/index.js';
import { parseDirectoryEntry, parseEnvelope } from '../../application/index.js';
import type { IngestResult } from '../../application/index.js';

export const DEFAULT_STREAM_KEY = 'guildlog:gateway';
export const DEFAULT_GROUP = 'guildlog-ingest';

// How long to block waiting for new entries (ms)
const BLOCK_MS = 5000;
// Max entries to read per iteration
const READ_COUNT = 100;
// Wait before re-reading entries the pipeline turned away
const REJECTED_BACKOFF_MS = 1000;

/** Receives live events; the pipeline's `ingest` fits this shape. */
export interface LiveSink {
  ingest(event: IngestEvent, ticket?: CommitTicket): IngestResult;
}

/** Records guild and channel snapshots; the DirectoryRecorder fits this shape. */
export interface DirectorySink {
  record(entry: DirectoryEntry): Promise<void>;
}

export interface RelayConsumerOptions {
  streamKey: string;
  group: string;
  consumer: string;
  /** Without a directory sink, guild and channel entries are acked unrecorded. */
  directory?: DirectorySink;
  blockMs?: number;
  count?: number;
  sleep?: (ms: number) => Promise<void>;
}

/** XREADGROUP reply: [[stream, [[id, [field, value, ...] | null], ...]], ...] */
const readReplySchema = z.array(
  z.tuple([
    z.string(),
    z.array(z.tuple([z.string(), z.array(z.string()).nullable()])),
  ]),
).nullable();

const relayEntrySchema = z.object({
  kind: z.enum(['message', 'action', 'guild', 'channel']),
  event: z.string().min(2),
});

export interface RelayStats {
  read: number;
  acked: number;
  invalid: number;
  rejected: number;
  directory: number;
  in_flight: number;
}

type ParsedEntry =
  | { type: 'event'; event: IngestEvent }
  | { type: 'directory'; entry: DirectoryEntry };

function toFieldMap(fields: readonly string[]): Record<string, string> {
  const map: Record<string, string> = {};
  for (let i = 0; i < fields.length; i += 2) {
    const key = fields[i];
    const value = fields[i + 1];
    if (key !== undefined && value !== undefined) {
      map[key] = value;
    }
  }
  return map;
}

function sleepFor(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Consumes gateway events a relay process appends to a Redis Stream.
 *
 * Entries carry two fields: `kind` and `event` (the JSON body). Kinds
 * `message` and `action` go to the pipeline; `guild` and `channel` snapshots
 * go to the directory sink and are acked once recorded. An event entry is acknowledged only once the pipeline has stored it, dropped it
 * as invalid, or recognised it as a duplicate or filtered event. Entries the
 * pipeline turns away (queue full) stay in the pending list and are re-read.
 */
export class RelayConsumer {
  private readonly inFlight = new Set<string>();
  private readonly sleep: (ms: number) => Promise<void>;
  private retryPending = true;
  private readonly counters = { read: 0, acked: 0, invalid: 0, rejected: 0, directory: 0 };

  constructor(
    private readonly redis: Redis,
    private readonly sink: LiveSink,
    private readonly log: Logger,
    private readonly opts: RelayConsumerOptions,
  ) {
    this.sleep = opts.sleep ?? sleepFor;
  }

  /**
   * Ensures the consumer group exists on the stream.
   *
   * Start ID "$" = only entries arriving after group creation. Crash recovery
   * re-reads this consumer's own pending entries with cursor "0".
   */
  async ensureGroup(): Promise<void> {
    try {
      await this.redis.xgroup('CREATE', this.opts.streamKey, this.opts.group, '$', 'MKSTREAM');
      this.log.info({ group: this.opts.group, stream: this.opts.streamKey }, 'Consumer group created (from $)');
    } catch (err: unknown) {
      // BUSYGROUP = group already exists
      if (err instanceof Error && err.message.includes('BUSYGROUP')) {
        this.log.debug({ group: this.opts.group }, 'Consumer group already exists');
        return;
      }
      throw err;
    }
  }

  /** Runs until `signal` is aborted. */
  async run(signal: AbortSignal): Promise<void> {
    await this.ensureGroup();
    this.log.info(
      { consumer: this.opts.consumer, group: this.opts.group, stream: this.opts.streamKey },
      'Relay consumer started',
    );

    while (!signal.aborted) {
      try {
        if (this.retryPending) {
          this.retryPending = false;
          await this.readOnce('0');
          continue;
        }
        await this.readOnce('>');
      } catch (err: unknown) {
        if (signal.aborted) break;
        this.log.error({ err }, 'Relay consumer loop error, retrying in 1s');
        await this.sleep(1000);
      }
    }

    this.log.info({ in_flight: this.inFlight.size }, 'Relay consumer stopped');
  }

  /**
   * Reads one batch. Cursor "0" re-reads this consumer's pending entries,
   * ">" reads new ones.
   */
  async readOnce(cursor: '0' | '>'): Promise<number> {
    const raw = cursor === '>'
      ? await this.redis.xreadgroup(
        'GROUP', this.opts.group, this.opts.consumer,
        'COUNT', this.opts.count ?? READ_COUNT,
        'BLOCK', this.opts.blockMs ?? BLOCK_MS,
        'STREAMS', this.opts.streamKey,
        '>',
      )
      : await this.redis.xreadgroup(
        'GROUP', this.opts.group, this.opts.consumer,
        'COUNT', this.opts.count ?? READ_COUNT,
        'STREAMS', this.opts.streamKey,
        '0',
      );

    const reply = readReplySchema.safeParse(raw);
    if (!reply.success) {
      this.log.error({ issues: reply.error.issues }, 'Unexpected XREADGROUP reply');
      return 0;
    }
    if (reply.data === null) return 0;

    let handled = 0;
    let rejected = false;
    for (const [, entries] of reply.data) {
      for (const [streamId, fields] of entries) {
        // nil fields: entry trimmed from the stream while pending
        if (fields === null || fields.length === 0) {
          await this.ack(streamId);
          continue;
        }
        if (this.inFlight.has(streamId)) continue;

        handled++;
        if (!(await this.handleEntry(streamId, fields))) rejected = true;
      }
    }

    if (rejected) {
      this.retryPending = true;
      await this.sleep(REJECTED_BACKOFF_MS);
    }
    return handled;
  }

  stats(): RelayStats {
    return { ...this.counters, in_flight: this.inFlight.size };
  }

  /** Returns false when the entry has to stay pending. */
  private async handleEntry(streamId: string, fields: readonly string[]): Promise<boolean> {
    this.counters.read++;
    const parsed = this.parse(streamId, fields);
    if (parsed === null) {
      this.counters.invalid++;
      await this.ack(streamId);
      return true;
    }
    if (parsed.type === 'directory') {
      return this.handleDirectory(streamId, parsed.entry);
    }

    const event = parsed.event;
    this.inFlight.add(streamId);
    const ticket: CommitTicket = {
      settle: () => this.release(streamId),
      fail: (err: unknown) => {
        this.log.error({ err, streamId, event_id: event.id }, 'Relay entry dropped by writer');
        this.release(streamId);
      },
    };

    const result = this.sink.ingest(event, ticket);
    if (result.accepted) return true;

    this.inFlight.delete(streamId);
    if (result.reason === 'queue_full' || result.reason === 'closed') {
      this.counters.rejected++;
      this.log.debug({ streamId, event_id: event.id, reason: result.reason }, 'Relay entry left pending');
      return false;
    }

    // duplicate or filtered: nothing left to store
    await this.ack(streamId);
    return true;
  }

  private async handleDirectory(streamId: string, entry: DirectoryEntry): Promise<boolean> {
    const sink = this.opts.directory;
    if (sink === undefined) {
      this.log.debug({ streamId, kind: entry.kind }, 'No directory sink, skipping entry');
      await this.ack(streamId);
      return true;
    }

    try {
      await sink.record(entry);
    } catch (err: unknown) {
      this.counters.rejected++;
      this.log.error({ err, streamId, kind: entry.kind }, 'Directory entry not recorded, left pending');
      return false;
    }

    this.counters.directory++;
    await this.ack(streamId);
    return true;
  }

  private parse(streamId: string, fields: readonly string[]): ParsedEntry | null {
    const entry = relayEntrySchema.safeParse(toFieldMap(fields));
    if (!entry.success) {
      this.log.warn({ streamId, issues: entry.error.issues }, 'Malformed relay entry, skipping');
      return null;
    }

    let body: unknown;
    try {
      body = JSON.parse(entry.data.event);
    } catch (err: unknown) {
      this.log.warn({ err, streamId }, 'Relay entry is not valid JSON, skipping');
      return null;
    }

    const kind = entry.data.kind;
    if (kind === 'guild' || kind === 'channel') {
      const directory = parseDirectoryEntry(kind, body);
      if (!directory.ok) {
        this.log.warn({ streamId, kind, issues: directory.issues }, 'Invalid directory entry, skipping');
        return null;
      }
      return { type: 'directory', entry: directory.entry };
    }

    const envelope = parseEnvelope(
      typeof body === 'object' && body !== null ? { ...body, kind } : body,
    );
    if (!envelope.ok) {
      this.log.warn({ streamId, issues: envelope.issues }, 'Invalid relay event, skipping');
      return null;
    }
    return { type: 'event', event: envelope.event };
  }

  private release(streamId: string): void {
    this.inFlight.delete(streamId);
    void this.ack(streamId);
  }

  private async ack(streamId: string): Promise<void> {
    try {
      await this.redis.xack(this.opts.streamKey, this.opts.group, streamId);
      this.counters.acked++;
    } catch (err: unknown) {
      // Unacked entries are re-read from the pending list after a restart.
      this.log.warn({ err, streamId }, 'Failed to acknowledge relay entry');
    }
  }
}
