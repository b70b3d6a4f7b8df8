import type { FastifyRequest, FastifyReply } from 'fastify';
import { createErrorResponse, ErrorCode } from '../types.js';

export type AuthPreHandler = (
  request: FastifyRequest,
  reply: FastifyReply
) => Promise<FastifyReply | undefined>;

/**
 * API key authentication preHandler.
 * Validates the `Authorization: Bearer <key>` header. With no key
 * configured every request passes.
 */
export function createApiKeyAuth(apiKey: string | undefined): AuthPreHandler {
  return async function apiKeyAuth(
    request: FastifyRequest,
    reply: FastifyReply
  ): Promise<FastifyReply | undefined> {
    if (!apiKey) {
      return;
    }

    const authHeader = request.headers.authorization;

    if (!authHeader) {
      return reply.status(401).send(
        createErrorResponse(
          ErrorCode.UNAUTHORIZED,
          'Authorization header required',
          undefined,
          request.id
        )
      );
    }

    if (!authHeader.startsWith('Bearer ')) {
      return reply.status(401).send(
        createErrorResponse(
          ErrorCode.UNAUTHORIZED,
          'Invalid authorization format. Use: Bearer <api-key>',
          undefined,
          request.id
        )
      );
    }

    const token = authHeader.slice(7);

    if (token !== apiKey) {
      return reply.status(401).send(
        createErrorResponse(
          ErrorCode.UNAUTHORIZED,
          'Invalid API key',
          undefined,
          request.id
        )
      );
    }

    return undefined;
  };
}
