import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { toEventView } from '../../application/event-view.js';
import { DeviceRegistryError, QueryValidationError } from '../../application/errors.js';

/**
 * Parses a querystring value to an integer.
 * Missing or empty values take `fallback`; anything else that is not an
 * integer (whitespace included) becomes NaN and is rejected by the query service.
 */
function safeInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') return fallback;
  if (value.trim() === '') return NaN;
  const n = Number(value);
  if (!Number.isFinite(n) || n !== Math.floor(n)) return NaN;
  return n;
}

/**
 * Read-only query API routes.
 *
 * GET /api/v1/events: cached events, filtered by device and creation time
 * GET /api/v1/devices: devices from the registry
 */
async function queryRoutes(fastify: FastifyInstance): Promise<void> {

  /**
   * GET /api/v1/events
   *
   * Query params: deviceId (omitted: all devices), since (seconds, default 0),
   * max (default 0 = no limit)
   */
  fastify.get(
    '/api/v1/events',
    async (
      request: FastifyRequest<{
        Querystring: {
          deviceId?: string;
          since?: string;
          max?: string;
        };
      }>,
      reply: FastifyReply,
    ) => {
      const q = request.query;

      try {
        const events = await fastify.queries.listEvents(
          q.deviceId ?? '',
          safeInt(q.max, 0),
          safeInt(q.since, 0),
        );

        const data = events.map((event) => ({ ...toEventView(event), data: event.data }));
        return reply.status(200).send({ data, count: data.length });
      } catch (err: unknown) {
        if (err instanceof QueryValidationError) {
          return reply.status(400).send({ error: err.message });
        }
        throw err;
      }
    },
  );

  /**
   * GET /api/v1/devices
   */
  fastify.get(
    '/api/v1/devices',
    async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const devices = await fastify.queries.listDevices();
        return reply.status(200).send({ data: devices, count: devices.length });
      } catch (err: unknown) {
        if (err instanceof DeviceRegistryError) {
          request.log.warn({ err }, 'Device registry request failed');
          return reply.status(502).send({ error: err.message });
        }
        throw err;
      }
    },
  );
}

export default fp(queryRoutes, {
  name: 'query-routes',
  dependencies: ['services'],
  fastify: '5.x',
});
