import { z } from 'zod';
import { HistoryFetchError, compareIds, describeError } from '../../domain/index.js';
import type { MessageEvent } from '../../domain/index.js';
import type { HistoryPage, HistoryPageRequest, HistorySource } from '../../application/index.js';

type FetchLike = typeof fetch;

export interface HttpHistoryClientOptions {
  baseUrl: string;
  token: string;
  timeoutMs: number;
  /** Guild recorded on fetched messages when the API omits it. */
  guildId?: string | null;
  fetchImpl?: FetchLike;
  now?: () => number;
}

const MESSAGE_TYPES: Readonly<Record<number, string>> = {
  0: 'default',
  6: 'channel_pinned_message',
  7: 'user_join',
  18: 'thread_created',
  19: 'reply',
  20: 'chat_input_command',
  21: 'thread_starter_message',
  23: 'context_menu_command',
};

const apiMessageSchema = z.object({
  id: z.string().min(1),
  channel_id: z.string().min(1),
  guild_id: z.string().nullish(),
  author: z.object({
    id: z.string().min(1),
    username: z.string(),
    bot: z.boolean().optional(),
    system: z.boolean().optional(),
  }),
  content: z.string().nullish(),
  type: z.number().int().default(0),
  timestamp: z.string(),
  edited_timestamp: z.string().nullish(),
  attachments: z.array(z.record(z.string(), z.unknown())).default([]),
  embeds: z.array(z.record(z.string(), z.unknown())).default([]),
  mentions: z.array(z.object({ id: z.string() }).passthrough()).default([]),
  message_reference: z.object({ message_id: z.string().optional() }).passthrough().nullish(),
  thread: z.object({ id: z.string() }).passthrough().nullish(),
  webhook_id: z.string().nullish(),
});

const apiPageSchema = z.array(apiMessageSchema);

type ApiMessage = z.infer<typeof apiMessageSchema>;

export function isRetriableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export function parseRetryAfterMs(header: string | null, nowMs: number): number | null {
  if (!header) return null;

  const trimmed = header.trim();
  if (trimmed.length === 0) return null;

  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.max(0, Math.ceil(Number(trimmed) * 1000));
  }

  const retryAt = Date.parse(trimmed);
  if (Number.isNaN(retryAt)) return null;
  return Math.max(0, retryAt - nowMs);
}

export function buildMessagesUrl(baseUrl: string, scopeId: string, request: HistoryPageRequest): URL {
  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  const url = new URL(`channels/${encodeURIComponent(scopeId)}/messages`, base);
  url.searchParams.set('limit', String(request.limit));
  // Without a cursor, "after 0" starts from the oldest message.
  url.searchParams.set('after', request.after ?? '0');
  return url;
}

/** Maps one API message onto a message event. The version is the edit time when edited. */
export function toMessageEvent(message: ApiMessage, fallbackGuildId: string | null): MessageEvent {
  return {
    kind: 'message',
    id: message.id,
    scope_id: message.channel_id,
    guild_id: message.guild_id ?? fallbackGuildId,
    occurred_at: message.edited_timestamp ?? message.timestamp,
    is_backfilled: false,
    payload: {
      author_id: message.author.id,
      author_username: message.author.username,
      author_is_bot: message.author.bot ?? false,
      author_is_system: message.author.system ?? false,
      content: message.content ?? null,
      message_type: MESSAGE_TYPES[message.type] ?? `type_${message.type}`,
      created_at: message.timestamp,
      edited_at: message.edited_timestamp ?? null,
      attachments: message.attachments,
      embeds: message.embeds,
      mentions: message.mentions.map((mention) => mention.id),
      reference_message_id: message.message_reference?.message_id ?? null,
      thread_id: message.thread?.id ?? null,
      webhook_id: message.webhook_id ?? null,
    },
  };
}

/**
 * HistorySource over the chat platform's REST API.
 *
 * Makes one attempt per call; the BackfillCoordinator's RetryPolicy decides
 * whether to try again from the error's `retryable` flag.
 */
export class HttpHistoryClient implements HistorySource {
  private readonly fetchImpl: FetchLike;
  private readonly now: () => number;

  constructor(private readonly opts: HttpHistoryClientOptions) {
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.now = opts.now ?? Date.now;
  }

  async fetchPage(scopeId: string, request: HistoryPageRequest): Promise<HistoryPage> {
    const url = buildMessagesUrl(this.opts.baseUrl, scopeId, request);
    const response = await this.send(url);

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      const message = body
        ? `History request for ${scopeId} failed with status ${response.status}: ${body.slice(0, 200)}`
        : `History request for ${scopeId} failed with status ${response.status}`;
      throw new HistoryFetchError(
        message,
        isRetriableStatus(response.status),
        response.status,
        parseRetryAfterMs(response.headers.get('retry-after'), this.now()),
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err: unknown) {
      throw new HistoryFetchError(
        `History response for ${scopeId} is not JSON`,
        false,
        response.status,
        null,
        { cause: err },
      );
    }

    const parsed = apiPageSchema.safeParse(body);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .slice(0, 5)
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new HistoryFetchError(
        `History response for ${scopeId} has unexpected shape: ${issues}`,
        false,
        response.status,
      );
    }

    const fallbackGuildId = this.opts.guildId ?? null;
    const items = parsed.data
      .map((message) => toMessageEvent(message, fallbackGuildId))
      .sort((a, b) => compareIds(a.id, b.id));

    return { items, has_more: parsed.data.length === request.limit };
  }

  private async send(url: URL): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.opts.timeoutMs);

    try {
      return await this.fetchImpl(url, {
        method: 'GET',
        headers: {
          authorization: `Bearer ${this.opts.token}`,
          accept: 'application/json',
        },
        signal: controller.signal,
      });
    } catch (err: unknown) {
      if (controller.signal.aborted) {
        throw new HistoryFetchError(
          `History request to ${url.pathname} timed out after ${this.opts.timeoutMs}ms`,
          true,
          null,
          null,
          { cause: err },
        );
      }
      throw new HistoryFetchError(
        `History request to ${url.pathname} failed: ${describeError(err)}`,
        true,
        null,
        null,
        { cause: err },
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
