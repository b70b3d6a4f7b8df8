import { z } from 'zod';

/**
 * Boolean query flag. Query strings arrive as text, and `z.coerce.boolean()`
 * would read "false" as true.
 */
const queryBoolean = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

/**
 * Full-graph run query parameters. `maxRetries` falls back to the server's
 * configured default when omitted.
 */
export const runAllQuerySchema = z.object({
  retryFailed: queryBoolean.default('true'),
  maxRetries: z.coerce.number().int().min(1).max(10).optional(),
});

export type RunAllQuery = z.infer<typeof runAllQuerySchema>;

/**
 * Execution log pagination. `limit` falls back to the configured page size.
 */
export const executionLogQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).optional(),
  offset: z.coerce.number().int().min(0).default(0),
});

export type ExecutionLogQueryParams = z.infer<typeof executionLogQuerySchema>;

/**
 * Unit name parameter
 */
export const unitNameParamsSchema = z.object({
  name: z.string().min(1),
});

export type UnitNameParams = z.infer<typeof unitNameParamsSchema>;

/**
 * Phase name parameter
 */
export const phaseParamsSchema = z.object({
  phase: z.string().min(1),
});

export type PhaseParams = z.infer<typeof phaseParamsSchema>;
