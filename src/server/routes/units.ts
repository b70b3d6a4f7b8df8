import type { FastifyInstance } from 'fastify';
import { createSuccessResponse, createErrorResponse, ErrorCode } from '../types.js';
import { unitNameParamsSchema, type UnitNameParams } from '../types/api.js';
import { sendOrchestrationError } from '../errors.js';
import type { RouteContext } from './context.js';

/**
 * Register unit and dependency graph routes
 */
export function registerUnitRoutes(app: FastifyInstance, ctx: RouteContext): void {
  const { orchestrator, auth } = ctx;

  /**
   * GET /api/v1/units - Registered units with status and execution order
   */
  app.get('/api/v1/units', async (request, reply) => {
    return reply.send(createSuccessResponse(orchestrator.listUnits(), request.id));
  });

  /**
   * GET /api/v1/units/:name - Status and history of one unit
   */
  app.get<{
    Params: UnitNameParams;
  }>('/api/v1/units/:name', async (request, reply) => {
    const paramsResult = unitNameParamsSchema.safeParse(request.params);
    if (!paramsResult.success) {
      return reply.status(400).send(
        createErrorResponse(
          ErrorCode.BAD_REQUEST,
          'Invalid unit name',
          { errors: paramsResult.error.errors },
          request.id
        )
      );
    }

    try {
      const status = orchestrator.unitStatus(paramsResult.data.name);
      return reply.send(createSuccessResponse(status, request.id));
    } catch (error) {
      return sendOrchestrationError(error, request, reply, 'Failed to get unit status');
    }
  });

  /**
   * GET /api/v1/dependencies - Dependency graph with reverse edges
   */
  app.get('/api/v1/dependencies', async (request, reply) => {
    return reply.send(createSuccessResponse(orchestrator.dependencyGraph(), request.id));
  });

  /**
   * POST /api/v1/dependencies/validate - Report missing dependencies and cycles
   */
  app.post(
    '/api/v1/dependencies/validate',
    {
      preHandler: [auth],
    },
    async (request, reply) => {
      return reply.send(createSuccessResponse(orchestrator.validate(), request.id));
    }
  );
}
