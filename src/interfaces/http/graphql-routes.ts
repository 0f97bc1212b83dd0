import fp from 'fastify-plugin';
import { graphql } from 'graphql';
import { z } from 'zod';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { schema } from '../graphql/schema.js';
import type { GraphQLContext } from '../graphql/schema.js';

const graphqlRequestSchema = z.object({
  query: z.string().min(1),
  variables: z.record(z.string(), z.unknown()).nullish(),
  operationName: z.string().nullish(),
});

const CORS_HEADERS = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'Origin, X-Requested-With, Content-Type, Accept, Authorization',
  'Access-Control-Allow-Methods': 'POST, OPTIONS',
};

/**
 * GraphQL endpoint over the query service.
 *
 * POST    /graphql: { query, variables?, operationName? }
 * OPTIONS /graphql: CORS preflight
 */
async function graphqlRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.options('/graphql', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.headers(CORS_HEADERS).status(204).send();
  });

  fastify.post(
    '/graphql',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      reply.headers(CORS_HEADERS);

      const parsed = graphqlRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const contextValue: GraphQLContext = { queries: fastify.queries };
      const result = await graphql({
        schema,
        source: parsed.data.query,
        variableValues: parsed.data.variables ?? undefined,
        operationName: parsed.data.operationName ?? undefined,
        contextValue,
      });

      if (result.errors !== undefined && result.errors.length > 0) {
        request.log.warn(
          { errors: result.errors.map((e) => e.message) },
          'GraphQL query returned errors',
        );
      }

      return reply.status(200).send(result);
    },
  );
}

export default fp(graphqlRoutes, {
  name: 'graphql-routes',
  dependencies: ['services'],
  fastify: '5.x',
});
