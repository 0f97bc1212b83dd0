import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import type { BasicAuthCredentials, LogLevel } from './infrastructure/config.js';
import {
  servicesPlugin,
  basicAuthPlugin,
  queryRoutes,
  graphqlRoutes,
  healthRoutes,
} from './interfaces/http/index.js';
import type { ServicesOptions } from './interfaces/http/index.js';

export interface ServerOptions extends ServicesOptions {
  auth: BasicAuthCredentials | null;
  logLevel: LogLevel;
}

/**
 * Builds the Fastify instance without listening, so tests can `inject()`.
 *
 * Order:
 * 1) Services (decorations)
 * 2) Authentication hook
 * 3) HTTP routes
 */
export function buildServer(options: ServerOptions): FastifyInstance {
  const fastify = Fastify({
    logger: {
      level: options.logLevel,
    },
  });

  fastify.register(servicesPlugin, {
    queries: options.queries,
    store: options.store,
    ingestion: options.ingestion,
  });
  fastify.register(basicAuthPlugin, { credentials: options.auth });

  fastify.register(queryRoutes);
  fastify.register(graphqlRoutes);
  fastify.register(healthRoutes);

  return fastify;
}
