import { describe, it, expect } from 'vitest';
import { EventFilter } from '../../src/application/event-filter.js';
import type { EventFilterOptions } from '../../src/application/event-filter.js';
import { makeAction, makeMessage } from '../helpers.js';

function filter(overrides: Partial<EventFilterOptions> = {}): EventFilter {
  return new EventFilter({
    allowedGuilds: [],
    ignoredGuilds: [],
    allowedChannels: [],
    ignoredChannels: [],
    processBotMessages: false,
    processSystemMessages: true,
    processDmMessages: false,
    ...overrides,
  });
}

function withAuthor(flags: Record<string, boolean>) {
  return makeMessage({
    payload: { author_id: '1', author_username: 'x', created_at: '2026-01-01T00:00:00Z', ...flags },
  });
}

describe('EventFilter', () => {
  it('keeps ordinary guild messages', () => {
    expect(filter().evaluate(makeMessage())).toEqual({ keep: true });
  });

  it('applies guild allow and ignore lists', () => {
    expect(filter({ allowedGuilds: ['g2'] }).evaluate(makeMessage({ guild_id: 'g1' })))
      .toEqual({ keep: false, reason: 'guild' });
    expect(filter({ allowedGuilds: ['g1'], ignoredGuilds: ['g1'] }).evaluate(makeMessage({ guild_id: 'g1' })))
      .toEqual({ keep: false, reason: 'guild' });
  });

  it('applies channel allow and ignore lists', () => {
    expect(filter({ ignoredChannels: ['c1'] }).evaluate(makeAction({ scope_id: 'c1' })))
      .toEqual({ keep: false, reason: 'channel' });
    expect(filter({ allowedChannels: ['c9'] }).accepts(makeMessage({ scope_id: 'c1' }))).toBe(false);
    expect(filter({ allowedChannels: ['c1'] }).accepts(makeMessage({ scope_id: 'c1' }))).toBe(true);
  });

  it('skips direct messages unless enabled', () => {
    expect(filter().evaluate(makeMessage({ guild_id: null }))).toEqual({ keep: false, reason: 'dm' });
    expect(filter({ processDmMessages: true }).accepts(makeMessage({ guild_id: null }))).toBe(true);
  });

  it('keeps guild-less actions', () => {
    expect(filter().accepts(makeAction({ guild_id: null }))).toBe(true);
  });

  it('skips bot and system authors per the flags', () => {
    expect(filter().evaluate(withAuthor({ author_is_bot: true }))).toEqual({ keep: false, reason: 'bot' });
    expect(filter({ processBotMessages: true }).accepts(withAuthor({ author_is_bot: true }))).toBe(true);
    expect(filter({ processSystemMessages: false }).evaluate(withAuthor({ author_is_system: true })))
      .toEqual({ keep: false, reason: 'system' });
  });

  it('permissive admits everything', () => {
    expect(EventFilter.permissive().accepts(withAuthor({ author_is_bot: true }))).toBe(true);
    expect(EventFilter.permissive().accepts(makeMessage({ guild_id: null }))).toBe(true);
  });
});
