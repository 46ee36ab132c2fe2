import { z } from 'zod';
import type { Logger } from 'pino';
import { directoryId } from '../domain/index.js';
import type { ChannelInfo, DirectoryEntry, DirectoryKind, GuildInfo } from '../domain/index.js';
import { formatIssues, isoDatetime, snowflake } from './event-schema.js';
import type { DirectoryStore } from './ports.js';
import type { RetryPolicy } from './retry-policy.js';

const optionalText = (max: number) => z.string().max(max).nullable().default(null);

export const guildInfoSchema = z.object({
  guild_id: snowflake,
  name: z.string().min(1).max(255),
  description: optionalText(1024),
  owner_id: snowflake.default('0'),
  member_count: z.number().int().nonnegative().default(0),
  created_at: isoDatetime,
  icon_url: z.string().url().nullable().default(null),
  banner_url: z.string().url().nullable().default(null),
});

export const channelInfoSchema = z.object({
  channel_id: snowflake,
  guild_id: snowflake.nullable().default(null),
  name: z.string().min(1).max(255),
  channel_type: z.string().min(1).max(64).default('text'),
  topic: optionalText(1024),
  position: z.number().int().nullable().default(null),
  category_id: snowflake.nullable().default(null),
});

export function parseDirectoryEntry(
  kind: DirectoryKind,
  raw: unknown,
): { ok: true; entry: DirectoryEntry } | { ok: false; issues: string[] } {
  if (kind === 'guild') {
    const parsed = guildInfoSchema.safeParse(raw);
    if (!parsed.success) return { ok: false, issues: formatIssues(parsed.error) };
    const guild: GuildInfo = parsed.data;
    return { ok: true, entry: { kind: 'guild', guild } };
  }

  const parsed = channelInfoSchema.safeParse(raw);
  if (!parsed.success) return { ok: false, issues: formatIssues(parsed.error) };
  const channel: ChannelInfo = parsed.data;
  return { ok: true, entry: { kind: 'channel', channel } };
}

export interface DirectoryRecorderDeps {
  store: DirectoryStore;
  retryPolicy: RetryPolicy;
  log: Logger;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export interface DirectoryStats {
  guilds: number;
  channels: number;
  failed: number;
}

/**
 * Writes guild and channel snapshots through the DirectoryStore under the
 * shared RetryPolicy. A failure after retries is rethrown to the caller,
 * which keeps the source entry for redelivery.
 */
export class DirectoryRecorder {
  private guilds = 0;
  private channels = 0;
  private failed = 0;

  constructor(private readonly deps: DirectoryRecorderDeps) {}

  async record(entry: DirectoryEntry): Promise<void> {
    const id = directoryId(entry);
    const now = (this.deps.now ?? (() => new Date()))();

    try {
      await this.deps.retryPolicy.execute(
        `record ${entry.kind} ${id}`,
        () =>
          entry.kind === 'guild'
            ? this.deps.store.upsertGuild(entry.guild, now)
            : this.deps.store.upsertChannel(entry.channel, now),
        {
          ...(this.deps.sleep ? { sleep: this.deps.sleep } : {}),
          onRetry: ({ attempt, delayMs, error }) => {
            this.deps.log.warn({ kind: entry.kind, id, attempt, delayMs, err: error }, 'Directory upsert failed, retrying');
          },
        },
      );
    } catch (err: unknown) {
      this.failed += 1;
      throw err;
    }

    if (entry.kind === 'guild') this.guilds += 1;
    else this.channels += 1;
    this.deps.log.debug({ kind: entry.kind, id }, 'Directory entry recorded');
  }

  stats(): DirectoryStats {
    return { guilds: this.guilds, channels: this.channels, failed: this.failed };
  }
}
