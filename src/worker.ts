import Fastify from 'fastify';
import { Redis } from 'ioredis';
import pino from 'pino';
import { loadConfig } from './config.js';
import { DirectoryRecorder, EventFilter, IngestionPipeline, RetryPolicy } from './application/index.js';
import {
  createDbClient,
  ensureSchema,
  PostgresEventStore,
  PostgresCheckpointRepository,
  PostgresDirectoryStore,
  RelayConsumer,
  createRedisAlertSink,
  HttpHistoryClient,
} from './infrastructure/index.js';
import { statsRoutes } from './interfaces/http/index.js';

/**
 * Ingestion worker.
 *
 * Consumes live gateway events from the relay stream, persists them in
 * batches, runs history backfills and serves the stats surface. Several
 * workers can share one database; backfill leases keep each scope to a
 * single run at a time.
 */
const config = loadConfig();
const log = pino({ level: config.logLevel });

const redis = new Redis(config.redisUrl, {
  maxRetriesPerRequest: null,
  enableReadyCheck: true,
  lazyConnect: true,
});

const { sql, db } = createDbClient(config.databaseUrl, {
  max: config.db.poolMax,
  connectTimeoutSeconds: config.db.connectTimeoutSeconds,
});

const pipeline = new IngestionPipeline(config.pipeline, {
  store: new PostgresEventStore(db),
  checkpointRepository: new PostgresCheckpointRepository(db),
  history: new HttpHistoryClient({
    baseUrl: config.history.baseUrl,
    token: config.history.token,
    timeoutMs: config.history.timeoutMs,
    guildId: config.history.guildId,
  }),
  alerts: createRedisAlertSink(redis, log, config.alertChannel),
  filter: new EventFilter(config.filter),
  log,
});

const directory = new DirectoryRecorder({
  store: new PostgresDirectoryStore(db),
  retryPolicy: new RetryPolicy(config.pipeline.retry),
  log,
});

const consumer = new RelayConsumer(redis, pipeline, log, {
  streamKey: config.relay.streamKey,
  group: config.relay.group,
  consumer: config.pipeline.instanceId,
  directory,
});

const fastify = Fastify({
  logger: { level: config.logLevel },
});

// Abort controller for graceful shutdown
const ac = new AbortController();
let consuming: Promise<void> = Promise.resolve();

async function main(): Promise<void> {
  await redis.connect();
  log.info('Redis connected');

  await ensureSchema(sql, log);
  await pipeline.start();

  consuming = consumer.run(ac.signal);

  await fastify.register(statsRoutes, { pipeline, relay: consumer });
  await fastify.listen({ host: config.host, port: config.port });

  await consuming;
}

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info({ signal }, 'Shutting down worker...');

  ac.abort();
  await pipeline.stop();
  await consuming;
  await fastify.close();

  await redis.quit().catch((err: unknown) => log.warn({ err }, 'Redis quit failed'));
  await sql.end().catch((err: unknown) => log.warn({ err }, 'Postgres close failed'));
  log.info('Worker stopped');
}

function onSignal(signal: NodeJS.Signals): void {
  shutdown(signal)
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      log.fatal({ err }, 'Shutdown failed');
      process.exit(1);
    });
}

process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);

main().catch((err: unknown) => {
  log.fatal({ err }, 'Worker crashed');
  process.exit(1);
});
