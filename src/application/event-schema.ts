import { z } from 'zod';
import { ValidationError } from '../domain/index.js';
import type { IngestEvent } from '../domain/index.js';

/** Action types recorded by the gateway relay and the audit log. */
export const ACTION_TYPES = [
  'message_delete',
  'message_edit',
  'message_bulk_delete',
  'member_join',
  'member_leave',
  'member_update',
  'member_ban',
  'member_unban',
  'channel_create',
  'channel_delete',
  'channel_update',
  'role_create',
  'role_delete',
  'role_update',
  'guild_update',
  'voice_state_update',
  'invite_create',
  'invite_delete',
  'thread_create',
  'thread_delete',
  'thread_update',
  'emoji_create',
  'emoji_delete',
  'emoji_update',
  'webhook_create',
  'webhook_update',
  'webhook_delete',
] as const;

export type ActionType = (typeof ACTION_TYPES)[number];

export const isoDatetime = z.string().datetime({ offset: true, message: 'Must be a valid ISO-8601 datetime' });
export const snowflake = z.string().min(1).max(64);
const jsonRecord = z.record(z.string(), z.unknown());

/**
 * Envelope accepted from the relay stream and the history client.
 *
 * Payloads stay open-ended here; the per-variant schemas below are applied by
 * the BatchWriter so a malformed payload drops one item, never a whole read.
 */
const envelopeShape = {
  id: snowflake,
  scope_id: snowflake,
  guild_id: snowflake.nullable().default(null),
  occurred_at: isoDatetime,
  is_backfilled: z.boolean().default(false),
  payload: jsonRecord.default({}),
};

export const eventEnvelopeSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('message'), ...envelopeShape }),
  z.object({ kind: z.literal('action'), action_type: z.string().min(1), ...envelopeShape }),
]);

export type EventEnvelope = z.infer<typeof eventEnvelopeSchema>;

/** Attributes a stored message must carry. Unknown keys are kept in `payload`. */
export const messagePayloadSchema = z
  .object({
    author_id: snowflake,
    author_username: z.string().min(1).max(255),
    content: z.string().max(4000).nullable().default(null),
    message_type: z.string().min(1).max(64).default('default'),
    created_at: isoDatetime,
    edited_at: isoDatetime.nullable().default(null),
    author_is_bot: z.boolean().default(false),
    author_is_system: z.boolean().default(false),
    attachments: z.array(jsonRecord).default([]),
    embeds: z.array(jsonRecord).default([]),
    mentions: z.array(z.string()).default([]),
    reference_message_id: snowflake.nullable().optional(),
    thread_id: snowflake.nullable().optional(),
    webhook_id: snowflake.nullable().optional(),
  })
  .passthrough();

export const actionPayloadSchema = z
  .object({
    user_id: snowflake.nullable().default(null),
    target_id: snowflake.nullable().default(null),
    target_type: z.string().max(64).nullable().default(null),
    action_data: jsonRecord.default({}),
    before_data: jsonRecord.nullable().default(null),
    after_data: jsonRecord.nullable().default(null),
  })
  .passthrough();

const messageEventSchema = z.object({
  kind: z.literal('message'),
  ...envelopeShape,
  payload: messagePayloadSchema,
});

const actionEventSchema = z.object({
  kind: z.literal('action'),
  action_type: z.enum(ACTION_TYPES),
  ...envelopeShape,
  payload: actionPayloadSchema,
});

export interface MessageRow {
  message_id: string;
  channel_id: string;
  guild_id: string | null;
  author_id: string;
  author_username: string;
  content: string | null;
  message_type: string;
  created_at: Date;
  edited_at: Date | null;
  version_at: Date;
  payload: Record<string, unknown>;
  is_backfilled: boolean;
}

export interface ActionRow {
  action_id: string;
  action_type: ActionType;
  guild_id: string | null;
  channel_id: string;
  user_id: string | null;
  target_id: string | null;
  action_data: Record<string, unknown>;
  before_data: Record<string, unknown> | null;
  after_data: Record<string, unknown> | null;
  occurred_at: Date;
  version_at: Date;
  is_backfilled: boolean;
}

/** Discriminated result so the caller decides how to surface failures. */
export type RowResult<T> = { ok: true; row: T } | { ok: false; error: ValidationError };

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export function toMessageRow(event: IngestEvent): RowResult<MessageRow> {
  const parsed = messageEventSchema.safeParse(event);
  if (!parsed.success) {
    return { ok: false, error: new ValidationError(event.id, formatIssues(parsed.error)) };
  }

  const data = parsed.data;
  const payload = data.payload;

  return {
    ok: true,
    row: {
      message_id: data.id,
      channel_id: data.scope_id,
      guild_id: data.guild_id,
      author_id: payload.author_id,
      author_username: payload.author_username,
      content: payload.content,
      message_type: payload.message_type,
      created_at: new Date(payload.created_at),
      edited_at: payload.edited_at === null ? null : new Date(payload.edited_at),
      version_at: new Date(data.occurred_at),
      payload,
      is_backfilled: data.is_backfilled,
    },
  };
}

export function toActionRow(event: IngestEvent): RowResult<ActionRow> {
  const parsed = actionEventSchema.safeParse(event);
  if (!parsed.success) {
    return { ok: false, error: new ValidationError(event.id, formatIssues(parsed.error)) };
  }

  const data = parsed.data;
  const payload = data.payload;
  const occurredAt = new Date(data.occurred_at);

  return {
    ok: true,
    row: {
      action_id: data.id,
      action_type: data.action_type,
      guild_id: data.guild_id,
      channel_id: data.scope_id,
      user_id: payload.user_id,
      target_id: payload.target_id,
      action_data: payload.action_data,
      before_data: payload.before_data,
      after_data: payload.after_data,
      occurred_at: occurredAt,
      version_at: occurredAt,
      is_backfilled: data.is_backfilled,
    },
  };
}

/** Row shape per variant. */
export interface RowsByKind {
  message: MessageRow;
  action: ActionRow;
}

/** Row validators per variant, indexed by kind. */
export const rowValidators: {
  [K in keyof RowsByKind]: (event: IngestEvent) => RowResult<RowsByKind[K]>;
} = {
  message: toMessageRow,
  action: toActionRow,
};

/** Parses a relay or history envelope into a domain event. */
export function parseEnvelope(
  raw: unknown,
): { ok: true; event: IngestEvent } | { ok: false; issues: string[] } {
  const parsed = eventEnvelopeSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, issues: formatIssues(parsed.error) };
  }
  return { ok: true, event: parsed.data };
}
