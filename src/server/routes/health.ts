import type { FastifyInstance } from 'fastify';
import { createSuccessResponse, type LivenessResponse } from '../types.js';
import type { RouteContext } from './context.js';

/**
 * Register health check routes
 */
export function registerHealthRoutes(app: FastifyInstance, ctx: RouteContext): void {
  /**
   * GET /health - Health grade over the latest unit outcomes
   */
  app.get('/health', async (request, reply) => {
    return reply.send(createSuccessResponse(ctx.orchestrator.health(), request.id));
  });

  /**
   * GET /health/live - Liveness check
   */
  app.get('/health/live', async (request, reply) => {
    const response: LivenessResponse = {
      alive: true,
      timestamp: new Date().toISOString(),
    };
    return reply.send(createSuccessResponse(response, request.id));
  });
}
