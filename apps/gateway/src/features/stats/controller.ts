import type { FastifyReply, FastifyRequest } from 'fastify';
import type { GatewayError } from '../../core/errors.js';
import type { ExtractRequest, ExtractResponse, InvalidateRequest } from '../../core/types.js';
import { statsExtractor } from './usecase.js';

const sendError = (reply: FastifyReply, error: GatewayError) =>
  reply.code(error.statusCode).send({
    error: {
      code: error.code,
      message: error.message,
      statusCode: error.statusCode,
    },
  });

export async function extractHandler(
  request: FastifyRequest<{ Body: ExtractRequest }>,
  reply: FastifyReply
): Promise<void> {
  const outcome = statsExtractor.extractWithDetails(request.body.html);
  const response: ExtractResponse = { value: outcome.value, cached: outcome.cached };

  if (outcome.strategy) {
    request.log.debug({ strategy: outcome.strategy }, 'Stats value extracted');
  }

  reply.code(200).send(response);
}

export async function interceptHandler(
  request: FastifyRequest<{ Body: ExtractRequest }>,
  reply: FastifyReply
): Promise<void> {
  reply.code(200).send(statsExtractor.intercept(request.body.html));
}

export async function invalidateHandler(
  request: FastifyRequest<{ Body: InvalidateRequest }>,
  reply: FastifyReply
): Promise<void> {
  statsExtractor.invalidate(request.body.reason).match(
    (cleared) => reply.code(200).send({ cleared }),
    (error) => sendError(reply, error)
  );
}

export async function clearEntryHandler(
  request: FastifyRequest<{ Params: { key: string } }>,
  reply: FastifyReply
): Promise<void> {
  statsExtractor.clearEntry(request.params.key).match(
    (cleared) => reply.code(200).send({ cleared }),
    (error) => sendError(reply, error)
  );
}
