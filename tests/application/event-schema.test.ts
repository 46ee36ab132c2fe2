import { describe, it, expect } from 'vitest';
import {
  parseEnvelope,
  rowValidators,
  toActionRow,
  toMessageRow,
} from '../../src/application/event-schema.js';
import { ValidationError } from '../../src/domain/index.js';
import { at, makeAction, makeMessage } from '../helpers.js';

describe('toMessageRow', () => {
  it('maps a message event onto its row', () => {
    const event = makeMessage({
      id: '555',
      scope_id: 'c7',
      guild_id: 'g3',
      occurred_at: at(60),
      payload: {
        author_id: '42',
        author_username: 'tester',
        content: 'edited text',
        created_at: at(0),
        edited_at: at(60),
        flags: 4,
      },
    });

    const result = toMessageRow(event);
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.row).toMatchObject({
      message_id: '555',
      channel_id: 'c7',
      guild_id: 'g3',
      author_id: '42',
      author_username: 'tester',
      content: 'edited text',
      message_type: 'default',
      created_at: new Date(at(0)),
      edited_at: new Date(at(60)),
      version_at: new Date(at(60)),
      is_backfilled: false,
    });
    expect(result.row.payload['flags']).toBe(4);
  });

  it('reports missing required attributes', () => {
    const event = makeMessage({ id: '9', payload: { author_username: 'tester', created_at: at(0) } });

    const result = toMessageRow(event);
    expect(result.ok).toBe(false);
    if (result.ok) return;

    expect(result.error).toBeInstanceOf(ValidationError);
    expect(result.error.eventId).toBe('9');
    expect(result.error.issues).toEqual(['payload.author_id: Required']);
  });

  it('rejects an action event', () => {
    expect(toMessageRow(makeAction()).ok).toBe(false);
  });
});

describe('toActionRow', () => {
  it('maps an action event onto its row', () => {
    const event = makeAction({ id: '31', scope_id: 'c2', occurred_at: at(5), action_type: 'member_ban' });

    const result = toActionRow(event);
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.row).toEqual({
      action_id: '31',
      action_type: 'member_ban',
      guild_id: 'g1',
      channel_id: 'c2',
      user_id: '7',
      target_id: '8',
      action_data: { reason: 'spam' },
      before_data: null,
      after_data: null,
      occurred_at: new Date(at(5)),
      version_at: new Date(at(5)),
      is_backfilled: false,
    });
  });

  it('rejects an unknown action type', () => {
    const result = toActionRow(makeAction({ action_type: 'teleport' }));
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.issues[0]).toMatch(/^action_type: /);
  });
});

describe('rowValidators', () => {
  it('dispatches by kind', () => {
    expect(rowValidators.message(makeMessage()).ok).toBe(true);
    expect(rowValidators.action(makeAction()).ok).toBe(true);
  });
});

describe('parseEnvelope', () => {
  it('fills defaults for optional envelope fields', () => {
    const result = parseEnvelope({ kind: 'message', id: '1', scope_id: 'c1', occurred_at: at(0) });
    expect(result).toEqual({
      ok: true,
      event: {
        kind: 'message',
        id: '1',
        scope_id: 'c1',
        guild_id: null,
        occurred_at: at(0),
        is_backfilled: false,
        payload: {},
      },
    });
  });

  it('rejects a malformed timestamp', () => {
    const result = parseEnvelope({ kind: 'action', action_type: 'member_ban', id: '1', scope_id: 'c1', occurred_at: 'yesterday' });
    expect(result).toEqual({ ok: false, issues: ['occurred_at: Must be a valid ISO-8601 datetime'] });
  });

  it('rejects an unknown kind', () => {
    expect(parseEnvelope({ kind: 'reaction', id: '1', scope_id: 'c1', occurred_at: at(0) }).ok).toBe(false);
  });
});
