import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { QueryService } from '../../application/query-events.js';
import type { WindowedEventStore } from '../../application/event-window.js';
import type { IngestionStatusSource } from '../../infrastructure/worker/ingestion-loop.js';

export type ServicesOptions = {
  queries: QueryService;
  store: Pick<WindowedEventStore, 'size' | 'windowSeconds'>;
  ingestion: IngestionStatusSource;
};

/**
 * Decorates the instance with the services built by the composition root,
 * so routes never reach for a global.
 */
async function servicesPlugin(fastify: FastifyInstance, opts: ServicesOptions): Promise<void> {
  fastify.decorate('queries', opts.queries);
  fastify.decorate('eventStore', opts.store);
  fastify.decorate('ingestion', opts.ingestion);
}

export default fp(servicesPlugin, {
  name: 'services',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    queries: QueryService;
    eventStore: Pick<WindowedEventStore, 'size' | 'windowSeconds'>;
    ingestion: IngestionStatusSource;
  }
}
