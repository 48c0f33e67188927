import type { FastifyReply, FastifyRequest } from 'fastify';

export type ApiKeyHook = (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply | undefined>;

/**
 * `x-api-key` check for the status API. With no keys configured every
 * request passes.
 */
export function createApiKeyHook(keys: readonly string[]): ApiKeyHook {
  const apiKeys = new Set(keys);

  return async (request, reply) => {
    if (apiKeys.size === 0) return undefined;

    const apiKey = request.headers['x-api-key'];
    if (!apiKey || typeof apiKey !== 'string') {
      return reply.status(401).send({ ok: false, error: 'Missing API key' });
    }

    if (!apiKeys.has(apiKey)) {
      return reply.status(403).send({ ok: false, error: 'Invalid API key' });
    }
    return undefined;
  };
}
