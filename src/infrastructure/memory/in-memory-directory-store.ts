import type { ChannelInfo, GuildInfo } from '../../domain/index.js';
import type { DirectoryStore } from '../../application/index.js';

export type DirectoryRow<T> = T & { first_seen: Date; updated_at: Date };

/** In-process DirectoryStore with the same keep-`first_seen` rule as the SQL upsert. */
export class InMemoryDirectoryStore implements DirectoryStore {
  readonly guilds = new Map<string, DirectoryRow<GuildInfo>>();
  readonly channels = new Map<string, DirectoryRow<ChannelInfo>>();

  async upsertGuild(guild: GuildInfo, now: Date): Promise<void> {
    const firstSeen = this.guilds.get(guild.guild_id)?.first_seen ?? now;
    this.guilds.set(guild.guild_id, { ...guild, first_seen: firstSeen, updated_at: now });
  }

  async upsertChannel(channel: ChannelInfo, now: Date): Promise<void> {
    const firstSeen = this.channels.get(channel.channel_id)?.first_seen ?? now;
    this.channels.set(channel.channel_id, { ...channel, first_seen: firstSeen, updated_at: now });
  }
}
