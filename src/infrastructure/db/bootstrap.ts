import type { Logger } from 'pino';
import type { Sql } from './client.js';

const STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS guildlog_messages (
    message_id       VARCHAR(64)  PRIMARY KEY,
    channel_id       VARCHAR(64)  NOT NULL,
    guild_id         VARCHAR(64),
    author_id        VARCHAR(64)  NOT NULL,
    author_username  VARCHAR(255) NOT NULL,
    content          TEXT,
    message_type     VARCHAR(64)  NOT NULL DEFAULT 'default',
    created_at       TIMESTAMPTZ  NOT NULL,
    edited_at        TIMESTAMPTZ,
    version_at       TIMESTAMPTZ  NOT NULL,
    payload          JSONB        NOT NULL DEFAULT '{}',
    is_backfilled    BOOLEAN      NOT NULL DEFAULT false,
    logged_at        TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
    updated_at       TIMESTAMPTZ  NOT NULL DEFAULT NOW()
  )`,
  `CREATE TABLE IF NOT EXISTS guildlog_actions (
    action_id      VARCHAR(64) PRIMARY KEY,
    action_type    VARCHAR(64) NOT NULL,
    guild_id       VARCHAR(64),
    channel_id     VARCHAR(64) NOT NULL,
    user_id        VARCHAR(64),
    target_id      VARCHAR(64),
    action_data    JSONB       NOT NULL DEFAULT '{}',
    before_data    JSONB,
    after_data     JSONB,
    occurred_at    TIMESTAMPTZ NOT NULL,
    version_at     TIMESTAMPTZ NOT NULL,
    is_backfilled  BOOLEAN     NOT NULL DEFAULT false,
    logged_at      TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at     TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )`,
  `CREATE TABLE IF NOT EXISTS guildlog_checkpoints (
    scope_id                    VARCHAR(64)  NOT NULL,
    kind                        VARCHAR(16)  NOT NULL,
    last_processed_id           VARCHAR(64),
    last_processed_at           TIMESTAMPTZ,
    total_processed             BIGINT       NOT NULL DEFAULT 0,
    backfill_in_progress        BOOLEAN      NOT NULL DEFAULT false,
    backfill_owner              VARCHAR(255),
    backfill_heartbeat_at       TIMESTAMPTZ,
    last_backfill_completed_at  TIMESTAMPTZ,
    updated_at                  TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
    PRIMARY KEY (scope_id, kind)
  )`,
  `CREATE TABLE IF NOT EXISTS guildlog_guilds (
    guild_id      VARCHAR(64)  PRIMARY KEY,
    name          VARCHAR(255) NOT NULL,
    description   TEXT,
    owner_id      VARCHAR(64)  NOT NULL DEFAULT '0',
    member_count  INTEGER      NOT NULL DEFAULT 0,
    created_at    TIMESTAMPTZ  NOT NULL,
    icon_url      TEXT,
    banner_url    TEXT,
    first_seen    TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
    updated_at    TIMESTAMPTZ  NOT NULL DEFAULT NOW()
  )`,
  `CREATE TABLE IF NOT EXISTS guildlog_channels (
    channel_id    VARCHAR(64)  PRIMARY KEY,
    guild_id      VARCHAR(64),
    name          VARCHAR(255) NOT NULL,
    channel_type  VARCHAR(64)  NOT NULL,
    topic         TEXT,
    position      INTEGER,
    category_id   VARCHAR(64),
    first_seen    TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
    updated_at    TIMESTAMPTZ  NOT NULL DEFAULT NOW()
  )`,
  'CREATE INDEX IF NOT EXISTS idx_guildlog_messages_channel_created ON guildlog_messages (channel_id, created_at)',
  'CREATE INDEX IF NOT EXISTS idx_guildlog_messages_guild ON guildlog_messages (guild_id)',
  'CREATE INDEX IF NOT EXISTS idx_guildlog_messages_author ON guildlog_messages (author_id)',
  'CREATE INDEX IF NOT EXISTS idx_guildlog_actions_type ON guildlog_actions (action_type)',
  'CREATE INDEX IF NOT EXISTS idx_guildlog_actions_guild_occurred ON guildlog_actions (guild_id, occurred_at)',
  'CREATE INDEX IF NOT EXISTS idx_guildlog_actions_user ON guildlog_actions (user_id)',
  'CREATE INDEX IF NOT EXISTS idx_guildlog_checkpoints_backfill ON guildlog_checkpoints (backfill_in_progress)',
  'CREATE INDEX IF NOT EXISTS idx_guildlog_channels_guild ON guildlog_channels (guild_id)',
];

/**
 * Ensures the tables exist (lightweight migration via raw SQL).
 *
 * drizzle-kit migrations are the production path; this keeps a fresh
 * database usable on first run. Every statement is idempotent.
 */
export async function ensureSchema(sql: Sql, log: Logger): Promise<void> {
  for (const statement of STATEMENTS) {
    await sql.unsafe(statement);
  }
  log.info('Database ready (messages, actions, checkpoints and directory tables)');
}
