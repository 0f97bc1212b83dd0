import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { IngestionState } from '../../infrastructure/worker/ingestion-loop.js';

const STATUS_BY_STATE: Record<IngestionState, 'starting' | 'ok' | 'stopped' | 'degraded'> = {
  connecting: 'starting',
  running: 'ok',
  closed: 'stopped',
  failed: 'degraded',
};

/**
 * GET /api/v1/health: ingestion state and cache size.
 *
 * 200 while ingestion runs (or has stopped cleanly), 503 while it is still
 * connecting or after it failed; queries may still be served from the
 * retained events in that case.
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get(
    '/api/v1/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const ingestion = fastify.ingestion.status();
      const healthy = ingestion.state === 'running' || ingestion.state === 'closed';

      return reply.status(healthy ? 200 : 503).send({
        status: STATUS_BY_STATE[ingestion.state],
        ingestion,
        cache: {
          size: fastify.eventStore.size,
          windowSeconds: fastify.eventStore.windowSeconds,
        },
      });
    },
  );
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['services'],
  fastify: '5.x',
});
