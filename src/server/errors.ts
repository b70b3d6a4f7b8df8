import type { FastifyReply, FastifyRequest } from 'fastify';
import {
  PhaseNotFoundError,
  UnitExecutionError,
  UnitNotFoundError,
  isResolutionError,
} from '../orchestrator/errors.js';
import { createErrorResponse, ErrorCode } from './types.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('server:errors');

/**
 * Send the error response for a failed orchestration call.
 */
export function sendOrchestrationError(
  error: unknown,
  request: FastifyRequest,
  reply: FastifyReply,
  fallbackMessage: string
): FastifyReply {
  if (error instanceof UnitNotFoundError) {
    return reply.status(404).send(
      createErrorResponse(ErrorCode.NOT_FOUND, error.message, { unit: error.unit }, request.id)
    );
  }

  if (error instanceof PhaseNotFoundError) {
    return reply.status(400).send(
      createErrorResponse(
        ErrorCode.BAD_REQUEST,
        error.message,
        { phase: error.phase, validPhases: error.availablePhases },
        request.id
      )
    );
  }

  if (isResolutionError(error)) {
    return reply.status(422).send(
      createErrorResponse(
        ErrorCode.DEPENDENCY_RESOLUTION_FAILED,
        error.message,
        undefined,
        request.id
      )
    );
  }

  if (error instanceof UnitExecutionError) {
    return reply.status(500).send(
      createErrorResponse(
        ErrorCode.UNIT_EXECUTION_FAILED,
        error.message,
        { unit: error.unit, error: error.originalMessage },
        request.id
      )
    );
  }

  logger.error({ err: error, requestId: request.id }, fallbackMessage);
  return reply.status(500).send(
    createErrorResponse(ErrorCode.INTERNAL_ERROR, fallbackMessage, undefined, request.id)
  );
}
