/**
 * Guild and channel metadata recorded alongside the event log, so stored
 * messages and actions can be read with names instead of bare ids.
 * Latest snapshot wins; `first_seen` is kept by the store.
 */
export interface GuildInfo {
  readonly guild_id: string;
  readonly name: string;
  readonly description: string | null;
  readonly owner_id: string;
  readonly member_count: number;
  readonly created_at: string;
  readonly icon_url: string | null;
  readonly banner_url: string | null;
}

export interface ChannelInfo {
  readonly channel_id: string;
  readonly guild_id: string | null;
  readonly name: string;
  readonly channel_type: string;
  readonly topic: string | null;
  readonly position: number | null;
  readonly category_id: string | null;
}

export type DirectoryKind = 'guild' | 'channel';

export type DirectoryEntry =
  | { readonly kind: 'guild'; readonly guild: GuildInfo }
  | { readonly kind: 'channel'; readonly channel: ChannelInfo };

export function directoryId(entry: DirectoryEntry): string {
  return entry.kind === 'guild' ? entry.guild.guild_id : entry.channel.channel_id;
}
