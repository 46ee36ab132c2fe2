import type { ChannelInfo, GuildInfo } from '../../domain/index.js';
import type { DirectoryStore } from '../../application/index.js';
import type { Database } from './client.js';
import { channels, guilds } from './schema.js';
import { toStorageError } from './errors.js';

/**
 * DirectoryStore over PostgreSQL. Each snapshot replaces the stored one;
 * `first_seen` is only written by the insert.
 */
export class PostgresDirectoryStore implements DirectoryStore {
  constructor(private readonly db: Database) {}

  async upsertGuild(guild: GuildInfo, now: Date): Promise<void> {
    const { guild_id, ...changes } = guild;
    const row = { ...changes, created_at: new Date(guild.created_at), updated_at: now };
    try {
      await this.db
        .insert(guilds)
        .values({ guild_id, ...row, first_seen: now })
        .onConflictDoUpdate({ target: guilds.guild_id, set: row });
    } catch (err: unknown) {
      throw toStorageError(err);
    }
  }

  async upsertChannel(channel: ChannelInfo, now: Date): Promise<void> {
    const { channel_id, ...changes } = channel;
    const row = { ...changes, updated_at: now };
    try {
      await this.db
        .insert(channels)
        .values({ channel_id, ...row, first_seen: now })
        .onConflictDoUpdate({ target: channels.channel_id, set: row });
    } catch (err: unknown) {
      throw toStorageError(err);
    }
  }
}
