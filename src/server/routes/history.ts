import type { FastifyInstance } from 'fastify';
import { createSuccessResponse, createErrorResponse, ErrorCode } from '../types.js';
import { executionLogQuerySchema, type ExecutionLogQueryParams } from '../types/api.js';
import { sendOrchestrationError } from '../errors.js';
import type { RouteContext } from './context.js';

/**
 * Register execution history and reporting routes
 */
export function registerHistoryRoutes(app: FastifyInstance, ctx: RouteContext): void {
  const { orchestrator, auth } = ctx;

  /**
   * GET /api/v1/execution-log - Paginated execution log, oldest first
   */
  app.get<{
    Querystring: ExecutionLogQueryParams;
  }>('/api/v1/execution-log', async (request, reply) => {
    const queryResult = executionLogQuerySchema.safeParse(request.query);
    if (!queryResult.success) {
      return reply.status(400).send(
        createErrorResponse(
          ErrorCode.BAD_REQUEST,
          'Invalid query parameters',
          { errors: queryResult.error.errors },
          request.id
        )
      );
    }

    const page = orchestrator.executionLog(queryResult.data);
    return reply.send(createSuccessResponse(page, request.id));
  });

  /**
   * GET /api/v1/dashboard - Counts, status details and recent log entries
   */
  app.get('/api/v1/dashboard', async (request, reply) => {
    return reply.send(createSuccessResponse(orchestrator.dashboard(), request.id));
  });

  /**
   * GET /api/v1/status - System health summary
   */
  app.get('/api/v1/status', async (request, reply) => {
    return reply.send(createSuccessResponse(orchestrator.status(), request.id));
  });

  /**
   * POST /api/v1/reset - Clear execution history and statuses
   */
  app.post(
    '/api/v1/reset',
    {
      preHandler: [auth],
    },
    async (request, reply) => {
      try {
        const report = await orchestrator.reset();
        return reply.send(createSuccessResponse(report, request.id));
      } catch (error) {
        return sendOrchestrationError(error, request, reply, 'Failed to reset history');
      }
    }
  );
}
