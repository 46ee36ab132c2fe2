import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { Alert, AlertSink } from '../../application/index.js';

export const DEFAULT_ALERT_CHANNEL = 'guildlog:alerts';

/**
 * Publishes an alert to the alerts Pub/Sub channel.
 *
 * Best-effort: publish failures are logged but never propagated to the caller.
 */
export async function publishAlert(
  redis: Redis,
  log: Logger,
  alert: Alert,
  channel: string = DEFAULT_ALERT_CHANNEL,
): Promise<void> {
  try {
    await redis.publish(channel, JSON.stringify(alert));
    log.debug({ channel, type: alert.type, scope_ids: alert.scope_ids }, 'Published alert');
  } catch (err: unknown) {
    log.warn({ err, type: alert.type }, 'Failed to publish alert');
  }
}

/** AlertSink that fans alerts out over Redis Pub/Sub. */
export function createRedisAlertSink(
  redis: Redis,
  log: Logger,
  channel: string = DEFAULT_ALERT_CHANNEL,
): AlertSink {
  return {
    raise(alert: Alert): void {
      void publishAlert(redis, log, alert, channel);
    },
  };
}
