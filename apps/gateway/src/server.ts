import rateLimit from '@fastify/rate-limit';
import Fastify from 'fastify';
import type { FastifyError } from 'fastify';
import {
  type ZodTypeProvider,
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';

import { healthHandler } from './features/health/controller.js';
import {
  clearEntryHandler,
  extractHandler,
  interceptHandler,
  invalidateHandler,
} from './features/stats/controller.js';
import {
  clearEntryParamsSchema,
  clearEntryResponseSchema,
  errorResponseSchema,
  extractRequestSchema,
  extractResponseSchema,
  interceptResponseSchema,
  invalidateRequestSchema,
  invalidateResponseSchema,
} from './features/stats/schemas.js';
import { config } from './lib/config.js';
import { logger as rootLogger } from './lib/logger.js';
import { metricsPlugin } from './lib/metrics-plugin.js';

export interface ServerOptions {
  logger?: boolean;
  withRateLimit?: boolean;
  rateLimitMax?: number;
  withMetrics?: boolean;
}

const createErrorResponse = (code: string, message: string, statusCode: number) => ({
  error: { code, message, statusCode },
});

// Oversized bodies are rejected before schema validation runs
const isValidationError = (error: FastifyError): boolean =>
  Array.isArray(error.validation) ||
  error.code === 'FST_ERR_VALIDATION' ||
  error.code === 'FST_ERR_CTP_BODY_TOO_LARGE';

export async function createServer(options: ServerOptions = {}) {
  const {
    logger: withLogger = true,
    withRateLimit = true,
    rateLimitMax = config.rateLimitMax,
    withMetrics = true,
  } = options;

  const server = Fastify({
    loggerInstance: withLogger ? rootLogger : rootLogger.child({}, { level: 'silent' }),
    bodyLimit: config.maxFragmentBytes * 2,
  }).withTypeProvider<ZodTypeProvider>();

  server.setValidatorCompiler(validatorCompiler);
  server.setSerializerCompiler(serializerCompiler);

  if (withRateLimit) {
    await server.register(rateLimit, {
      max: rateLimitMax,
      timeWindow: config.rateLimitTimeWindow,
    });
  }

  if (withMetrics) {
    await server.register(metricsPlugin);
  }

  server.get('/health', healthHandler);

  server.post('/stats/extract', {
    schema: {
      body: extractRequestSchema,
      response: {
        200: extractResponseSchema,
        400: errorResponseSchema,
        429: errorResponseSchema,
        500: errorResponseSchema,
      },
    },
    handler: extractHandler,
  });

  server.post('/stats/intercept', {
    schema: {
      body: extractRequestSchema,
      response: {
        200: interceptResponseSchema,
        400: errorResponseSchema,
        429: errorResponseSchema,
        500: errorResponseSchema,
      },
    },
    handler: interceptHandler,
  });

  server.post('/stats/cache/invalidate', {
    schema: {
      body: invalidateRequestSchema,
      response: {
        200: invalidateResponseSchema,
        400: errorResponseSchema,
        503: errorResponseSchema,
      },
    },
    handler: invalidateHandler,
  });

  server.delete('/stats/cache/:key', {
    schema: {
      params: clearEntryParamsSchema,
      response: {
        200: clearEntryResponseSchema,
        503: errorResponseSchema,
      },
    },
    handler: clearEntryHandler,
  });

  server.setErrorHandler((error: FastifyError, request, reply) => {
    if (isValidationError(error)) {
      reply.code(400).send(createErrorResponse('VALIDATION_ERROR', 'Validation error', 400));
      return;
    }

    if (error.statusCode === 429) {
      reply
        .code(429)
        .send(
          createErrorResponse('RATE_LIMIT_EXCEEDED', error.message || 'Rate limit exceeded', 429)
        );
      return;
    }

    request.log.error(error);
    const statusCode = typeof error.statusCode === 'number' ? error.statusCode : 500;
    reply
      .code(statusCode)
      .send(createErrorResponse('INTERNAL_ERROR', 'Internal server error', statusCode));
  });

  return server;
}

export type GatewayServer = Awaited<ReturnType<typeof createServer>>;
