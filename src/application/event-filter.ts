import type { IngestEvent } from '../domain/index.js';

export interface EventFilterOptions {
  allowedGuilds: readonly string[];
  ignoredGuilds: readonly string[];
  allowedChannels: readonly string[];
  ignoredChannels: readonly string[];
  processBotMessages: boolean;
  processSystemMessages: boolean;
  processDmMessages: boolean;
}

export type FilterVerdict =
  | { keep: true }
  | { keep: false; reason: 'guild' | 'channel' | 'bot' | 'system' | 'dm' };

/**
 * Decides which events are worth logging.
 *
 * Ignore lists win over allow lists; an empty allow list admits everything.
 * Events without a guild are direct messages.
 */
export class EventFilter {
  private readonly allowedGuilds: ReadonlySet<string>;
  private readonly ignoredGuilds: ReadonlySet<string>;
  private readonly allowedChannels: ReadonlySet<string>;
  private readonly ignoredChannels: ReadonlySet<string>;

  constructor(private readonly opts: EventFilterOptions) {
    this.allowedGuilds = new Set(opts.allowedGuilds);
    this.ignoredGuilds = new Set(opts.ignoredGuilds);
    this.allowedChannels = new Set(opts.allowedChannels);
    this.ignoredChannels = new Set(opts.ignoredChannels);
  }

  /** Admits everything. */
  static permissive(): EventFilter {
    return new EventFilter({
      allowedGuilds: [],
      ignoredGuilds: [],
      allowedChannels: [],
      ignoredChannels: [],
      processBotMessages: true,
      processSystemMessages: true,
      processDmMessages: true,
    });
  }

  evaluate(event: IngestEvent): FilterVerdict {
    const guildId = event.guild_id;

    if (guildId === null) {
      if (event.kind === 'message' && !this.opts.processDmMessages) {
        return { keep: false, reason: 'dm' };
      }
    } else if (this.ignoredGuilds.has(guildId) || (this.allowedGuilds.size > 0 && !this.allowedGuilds.has(guildId))) {
      return { keep: false, reason: 'guild' };
    }

    if (
      this.ignoredChannels.has(event.scope_id)
      || (this.allowedChannels.size > 0 && !this.allowedChannels.has(event.scope_id))
    ) {
      return { keep: false, reason: 'channel' };
    }

    if (event.kind === 'message') {
      if (!this.opts.processBotMessages && event.payload['author_is_bot'] === true) {
        return { keep: false, reason: 'bot' };
      }
      if (!this.opts.processSystemMessages && event.payload['author_is_system'] === true) {
        return { keep: false, reason: 'system' };
      }
    }

    return { keep: true };
  }

  accepts(event: IngestEvent): boolean {
    return this.evaluate(event).keep;
  }
}
