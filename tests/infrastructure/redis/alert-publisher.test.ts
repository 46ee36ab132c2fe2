import { describe, it, expect, vi } from 'vitest';
import type { Redis } from 'ioredis';
import { createRedisAlertSink, publishAlert } from '../../../src/infrastructure/redis/alert-publisher.js';
import type { Alert } from '../../../src/application/index.js';
import { fakeLogger } from '../../helpers.js';

const alert: Alert = {
  type: 'fatal_batch',
  message: 'Dropped 2 message row(s): permission denied',
  scope_ids: ['c1'],
  kind: 'message',
  dropped: 2,
  raised_at: '2026-03-01T12:00:00.000Z',
};

describe('publishAlert', () => {
  it('publishes the alert as JSON on the channel', async () => {
    const publish = vi.fn(async (): Promise<number> => 1);
    const redis = { publish } as unknown as Redis;

    await publishAlert(redis, fakeLogger(), alert, 'test:alerts');

    expect(publish).toHaveBeenCalledWith('test:alerts', JSON.stringify(alert));
  });

  it('logs and swallows publish failures', async () => {
    const error = new Error('Connection is closed.');
    const redis = { publish: vi.fn(async () => Promise.reject(error)) } as unknown as Redis;
    const log = fakeLogger();

    await expect(publishAlert(redis, log, alert)).resolves.toBeUndefined();
    expect(log.warn).toHaveBeenCalledWith({ err: error, type: 'fatal_batch' }, 'Failed to publish alert');
  });
});

describe('createRedisAlertSink', () => {
  it('publishes raised alerts to the default channel', async () => {
    const publish = vi.fn(async (): Promise<number> => 1);
    const sink = createRedisAlertSink({ publish } as unknown as Redis, fakeLogger());

    sink.raise(alert);

    await vi.waitFor(() => expect(publish).toHaveBeenCalledWith('guildlog:alerts', JSON.stringify(alert)));
  });
});
