import {
  pgTable,
  varchar,
  text,
  timestamp,
  jsonb,
  boolean,
  bigint,
  integer,
  index,
  primaryKey,
} from 'drizzle-orm/pg-core';

/**
 * Drizzle schema for `guildlog_messages`.
 *
 * `message_id` is the snowflake assigned by the chat platform, so re-ingesting
 * the same message is an upsert on the primary key. `version_at` is the
 * version timestamp used for last-write-wins; `logged_at` records the first
 * capture and is never overwritten.
 */
export const messages = pgTable('guildlog_messages', {
  message_id: varchar('message_id', { length: 64 }).primaryKey(),
  channel_id: varchar('channel_id', { length: 64 }).notNull(),
  guild_id: varchar('guild_id', { length: 64 }),
  author_id: varchar('author_id', { length: 64 }).notNull(),
  author_username: varchar('author_username', { length: 255 }).notNull(),
  content: text('content'),
  message_type: varchar('message_type', { length: 64 }).notNull().default('default'),
  created_at: timestamp('created_at', { withTimezone: true }).notNull(),
  edited_at: timestamp('edited_at', { withTimezone: true }),
  version_at: timestamp('version_at', { withTimezone: true }).notNull(),
  payload: jsonb('payload').$type<Record<string, unknown>>().notNull().default({}),
  is_backfilled: boolean('is_backfilled').notNull().default(false),
  logged_at: timestamp('logged_at', { withTimezone: true }).notNull().defaultNow(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_guildlog_messages_channel_created').on(table.channel_id, table.created_at),
  index('idx_guildlog_messages_guild').on(table.guild_id),
  index('idx_guildlog_messages_author').on(table.author_id),
]);

/** Drizzle schema for `guildlog_actions`: moderation and administrative actions. */
export const actions = pgTable('guildlog_actions', {
  action_id: varchar('action_id', { length: 64 }).primaryKey(),
  action_type: varchar('action_type', { length: 64 }).notNull(),
  guild_id: varchar('guild_id', { length: 64 }),
  channel_id: varchar('channel_id', { length: 64 }).notNull(),
  user_id: varchar('user_id', { length: 64 }),
  target_id: varchar('target_id', { length: 64 }),
  action_data: jsonb('action_data').$type<Record<string, unknown>>().notNull().default({}),
  before_data: jsonb('before_data').$type<Record<string, unknown>>(),
  after_data: jsonb('after_data').$type<Record<string, unknown>>(),
  occurred_at: timestamp('occurred_at', { withTimezone: true }).notNull(),
  version_at: timestamp('version_at', { withTimezone: true }).notNull(),
  is_backfilled: boolean('is_backfilled').notNull().default(false),
  logged_at: timestamp('logged_at', { withTimezone: true }).notNull().defaultNow(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_guildlog_actions_type').on(table.action_type),
  index('idx_guildlog_actions_guild_occurred').on(table.guild_id, table.occurred_at),
  index('idx_guildlog_actions_user').on(table.user_id),
]);

/**
 * Drizzle schema for `guildlog_checkpoints`, one row per (scope, kind).
 *
 * `backfill_owner` and `backfill_heartbeat_at` form the lease that guards
 * `backfill_in_progress`.
 */
export const checkpoints = pgTable('guildlog_checkpoints', {
  scope_id: varchar('scope_id', { length: 64 }).notNull(),
  kind: varchar('kind', { length: 16 }).notNull(),
  last_processed_id: varchar('last_processed_id', { length: 64 }),
  last_processed_at: timestamp('last_processed_at', { withTimezone: true }),
  total_processed: bigint('total_processed', { mode: 'number' }).notNull().default(0),
  backfill_in_progress: boolean('backfill_in_progress').notNull().default(false),
  backfill_owner: varchar('backfill_owner', { length: 255 }),
  backfill_heartbeat_at: timestamp('backfill_heartbeat_at', { withTimezone: true }),
  last_backfill_completed_at: timestamp('last_backfill_completed_at', { withTimezone: true }),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  primaryKey({ columns: [table.scope_id, table.kind] }),
  index('idx_guildlog_checkpoints_backfill').on(table.backfill_in_progress),
]);

/** Drizzle schema for `guildlog_guilds`: latest known guild metadata. */
export const guilds = pgTable('guildlog_guilds', {
  guild_id: varchar('guild_id', { length: 64 }).primaryKey(),
  name: varchar('name', { length: 255 }).notNull(),
  description: text('description'),
  owner_id: varchar('owner_id', { length: 64 }).notNull().default('0'),
  member_count: integer('member_count').notNull().default(0),
  created_at: timestamp('created_at', { withTimezone: true }).notNull(),
  icon_url: text('icon_url'),
  banner_url: text('banner_url'),
  first_seen: timestamp('first_seen', { withTimezone: true }).notNull().defaultNow(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

/** Drizzle schema for `guildlog_channels`. DM channels have no guild. */
export const channels = pgTable('guildlog_channels', {
  channel_id: varchar('channel_id', { length: 64 }).primaryKey(),
  guild_id: varchar('guild_id', { length: 64 }),
  name: varchar('name', { length: 255 }).notNull(),
  channel_type: varchar('channel_type', { length: 64 }).notNull(),
  topic: text('topic'),
  position: integer('position'),
  category_id: varchar('category_id', { length: 64 }),
  first_seen: timestamp('first_seen', { withTimezone: true }).notNull().defaultNow(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_guildlog_channels_guild').on(table.guild_id),
]);
