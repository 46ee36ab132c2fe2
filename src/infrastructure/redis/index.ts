export { RelayConsumer, DEFAULT_STREAM_KEY, DEFAULT_GROUP } from './relay-consumer.js';
export type { LiveSink, DirectorySink, RelayConsumerOptions, RelayStats } from './relay-consumer.js';
export { publishAlert, createRedisAlertSink, DEFAULT_ALERT_CHANNEL } from './alert-publisher.js';
