import { createHash, timingSafeEqual } from 'node:crypto';
import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { BasicAuthCredentials } from '../../infrastructure/config.js';

export type BasicAuthOptions = {
  /** `null` disables authentication. */
  credentials: BasicAuthCredentials | null;
};

/** Routes served without credentials. */
const OPEN_ROUTES = new Set(['/api/v1/health']);

/** Constant-time string comparison (digests make the lengths equal). */
function safeEqual(a: string, b: string): boolean {
  const da = createHash('sha256').update(a).digest();
  const db = createHash('sha256').update(b).digest();
  return timingSafeEqual(da, db);
}

/**
 * Splits an `Authorization: Basic <base64(user:pass)>` header.
 * Returns null when the header is missing or not Basic.
 */
export function parseBasicAuth(header: string | undefined): { username: string; password: string } | null {
  if (header === undefined) return null;
  const match = /^Basic\s+([A-Za-z0-9+/=]+)$/i.exec(header.trim());
  const encoded = match?.[1];
  if (encoded === undefined) return null;

  const decoded = Buffer.from(encoded, 'base64').toString('utf-8');
  const sep = decoded.indexOf(':');
  if (sep < 0) return null;
  return { username: decoded.slice(0, sep), password: decoded.slice(sep + 1) };
}

/**
 * HTTP basic authentication for the query API.
 *
 * Health and CORS preflight requests stay open.
 */
async function basicAuthPlugin(fastify: FastifyInstance, opts: BasicAuthOptions): Promise<void> {
  const { credentials } = opts;
  if (credentials === null) {
    fastify.log.warn('API basic authentication disabled (API_USERNAME/API_PASSWORD unset)');
    return;
  }

  fastify.addHook('onRequest', async (request: FastifyRequest, reply: FastifyReply) => {
    if (request.method === 'OPTIONS') return;
    if (OPEN_ROUTES.has(request.routeOptions.url ?? '')) return;

    const given = parseBasicAuth(request.headers.authorization);
    const userOk = safeEqual(given?.username ?? '', credentials.username);
    const passOk = safeEqual(given?.password ?? '', credentials.password);

    if (given === null || !userOk || !passOk) {
      return reply
        .header('WWW-Authenticate', `Basic realm="${credentials.realm}"`)
        .status(401)
        .send({ error: 'Unauthorized' });
    }
  });
}

export default fp(basicAuthPlugin, {
  name: 'basic-auth',
  fastify: '5.x',
});
