import type { FastifyInstance } from 'fastify';
import { createSuccessResponse, createErrorResponse, ErrorCode } from '../types.js';
import {
  runAllQuerySchema,
  unitNameParamsSchema,
  phaseParamsSchema,
  type RunAllQuery,
  type UnitNameParams,
  type PhaseParams,
} from '../types/api.js';
import { sendOrchestrationError } from '../errors.js';
import type { RouteContext } from './context.js';

/**
 * Register execution routes: full runs, single units and phases.
 * All of them require authentication when an API key is configured.
 */
export function registerRunRoutes(app: FastifyInstance, ctx: RouteContext): void {
  const { orchestrator, auth } = ctx;

  /**
   * POST /api/v1/runs - Run every unit in dependency order
   */
  app.post<{
    Querystring: RunAllQuery;
  }>(
    '/api/v1/runs',
    {
      preHandler: [auth],
    },
    async (request, reply) => {
      const queryResult = runAllQuerySchema.safeParse(request.query);
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

      try {
        const report = await orchestrator.runEverything(queryResult.data);
        return reply.send(createSuccessResponse(report, request.id));
      } catch (error) {
        return sendOrchestrationError(error, request, reply, 'Failed to run units');
      }
    }
  );

  /**
   * POST /api/v1/units/:name/run - Run a single unit once
   */
  app.post<{
    Params: UnitNameParams;
  }>(
    '/api/v1/units/:name/run',
    {
      preHandler: [auth],
    },
    async (request, reply) => {
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
        const result = await orchestrator.runOne(paramsResult.data.name);
        return reply.send(createSuccessResponse(result, request.id));
      } catch (error) {
        return sendOrchestrationError(error, request, reply, 'Failed to run unit');
      }
    }
  );

  /**
   * POST /api/v1/phases/:phase/run - Run the registered members of a phase
   */
  app.post<{
    Params: PhaseParams;
  }>(
    '/api/v1/phases/:phase/run',
    {
      preHandler: [auth],
    },
    async (request, reply) => {
      const paramsResult = phaseParamsSchema.safeParse(request.params);
      if (!paramsResult.success) {
        return reply.status(400).send(
          createErrorResponse(
            ErrorCode.BAD_REQUEST,
            'Invalid phase name',
            { errors: paramsResult.error.errors },
            request.id
          )
        );
      }

      try {
        const report = await orchestrator.runPhase(paramsResult.data.phase);
        return reply.send(createSuccessResponse(report, request.id));
      } catch (error) {
        return sendOrchestrationError(error, request, reply, 'Failed to run phase');
      }
    }
  );

  /**
   * GET /api/v1/phases - Phase catalog
   */
  app.get('/api/v1/phases', async (request, reply) => {
    const phases = orchestrator.phases.toJSON();
    return reply.send(
      createSuccessResponse(
        { phases, totalPhases: Object.keys(phases).length },
        request.id
      )
    );
  });
}
