import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { IngestionPipeline } from '../../application/index.js';
import type { RelayStats } from '../../infrastructure/redis/index.js';

const SCOPE_ID_RE = /^[A-Za-z0-9_-]{1,64}$/;

export interface StatsRoutesOptions {
  pipeline: IngestionPipeline;
  relay?: { stats(): RelayStats } | undefined;
}

/**
 * Operational routes.
 *
 * GET  /health                     liveness; 503 once the pipeline stops
 * GET  /api/v1/stats               pipeline statistics snapshot
 * POST /api/v1/backfill/:scopeId   start a backfill run for one scope
 */
async function statsRoutes(fastify: FastifyInstance, opts: StatsRoutesOptions): Promise<void> {
  const { pipeline, relay } = opts;

  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const { state, uptime_ms } = pipeline.stats();
    const status = state === 'running' ? 200 : 503;
    return reply.status(status).send({ status: status === 200 ? 'ok' : 'unavailable', state, uptime_ms });
  });

  fastify.get('/api/v1/stats', async (_request: FastifyRequest, reply: FastifyReply) => {
    const stats = pipeline.stats();
    return reply.status(200).send(relay ? { ...stats, relay: relay.stats() } : stats);
  });

  fastify.post(
    '/api/v1/backfill/:scopeId',
    async (
      request: FastifyRequest<{ Params: { scopeId: string } }>,
      reply: FastifyReply,
    ) => {
      const { scopeId } = request.params;
      if (!SCOPE_ID_RE.test(scopeId)) {
        return reply.status(400).send({ error: 'scopeId must be 1-64 letters, digits, "-" or "_"' });
      }

      const result = await pipeline.startBackfill(scopeId);
      if (!result.started) {
        fastify.log.info({ scope_id: scopeId, reason: result.reason }, 'Backfill not started');
        return reply
          .status(result.reason === 'already_running' ? 409 : 503)
          .send(result.reason === 'error' ? { error: result.reason, detail: result.error } : { error: result.reason });
      }

      fastify.log.info({ scope_id: scopeId }, 'Backfill started via API');
      return reply.status(202).send({ status: 'started', scope_id: scopeId });
    },
  );
}

export default fp(statsRoutes, {
  name: 'stats-routes',
  fastify: '5.x',
});
