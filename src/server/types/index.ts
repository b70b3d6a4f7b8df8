// API types exports
export {
  // Schemas
  runAllQuerySchema,
  executionLogQuerySchema,
  unitNameParamsSchema,
  phaseParamsSchema,
  // Types
  type RunAllQuery,
  type ExecutionLogQueryParams,
  type UnitNameParams,
  type PhaseParams,
} from './api.js';
