import type { FastifyInstance, FastifyPluginOptions, FastifyReply, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import { defaultMetrics, register, trackHttpRequest } from './metrics.js';

export const metricsPlugin = fp(metricsPluginImplementation, {
  fastify: '5.x',
  name: 'metrics',
});

function getStaticEndpoint(url: string): string {
  const path = url.split('?')[0] || '/';

  for (const endpoint of KNOWN_ENDPOINTS) {
    if (path === endpoint) return endpoint;
  }

  return '/unknown';
}

async function metricsPluginImplementation(
  fastify: FastifyInstance,
  _options: FastifyPluginOptions
): Promise<void> {
  defaultMetrics.init();

  fastify.addHook('preHandler', async (request: FastifyRequest) => {
    request.timing = {
      startTime: Date.now(),
    };
  });

  fastify.addHook('onResponse', async (request: FastifyRequest, reply: FastifyReply) => {
    if (!request.timing) return;

    const endpoint = request.routeOptions?.url || getStaticEndpoint(request.url);

    // /metrics scrapes are not counted
    if (endpoint === '/metrics') return;

    const duration = Date.now() - request.timing.startTime;
    trackHttpRequest(request.method, endpoint, reply.statusCode, duration);
  });

  fastify.get('/metrics', async (_request: FastifyRequest, reply: FastifyReply) => {
    const metrics = await register.metrics();
    reply.header('Content-Type', register.contentType).send(metrics);
  });
}

const KNOWN_ENDPOINTS = [
  '/stats/extract',
  '/stats/intercept',
  '/stats/cache/invalidate',
  '/health',
  '/metrics',
] as const;

interface RequestTiming {
  startTime: number;
}

declare module 'fastify' {
  interface FastifyRequest {
    timing?: RequestTiming;
  }
}
