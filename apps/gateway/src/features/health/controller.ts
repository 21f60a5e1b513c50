import type { FastifyReply, FastifyRequest } from 'fastify';
import type { HealthResponse } from '../../core/types.js';
import { kvStore } from '../../lib/cache.js';

export async function healthHandler(_request: FastifyRequest, reply: FastifyReply): Promise<void> {
  const response: HealthResponse = {
    status: 'healthy',
    timestamp: Date.now(),
    cache: kvStore.getStats(),
  };

  reply.code(200).send(response);
}
