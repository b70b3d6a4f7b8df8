// Core types
export {
  UnitStatus,
  type UnitHandler,
  type WorkUnit,
  type ExecutionRecord,
  type StatusEntry,
  type UnitOutcome,
  type RunAllOptions,
  type RunAllReport,
  type RunNamedReport,
  type ExecutionLogPage,
  type ResetSnapshot,
} from './types.js';

// Errors
export {
  UnitNotFoundError,
  MissingDependencyError,
  CircularDependencyError,
  UnitExecutionError,
  PhaseNotFoundError,
  PhaseCatalogError,
  isResolutionError,
  errorMessage,
  type ResolutionError,
} from './errors.js';

// Registry and resolution
export { UnitRegistry } from './registry.js';
export {
  resolveExecutionOrder,
  resolveOrThrow,
  validateDependencies,
  buildDependencyGraph,
  type ResolveResult,
  type ValidationIssue,
  type ValidationReport,
  type DependencyGraphNode,
  type DependencyGraphView,
} from './resolver.js';

// Execution
export { ExecutionHistory, type StatusCounts } from './history.js';
export { RunLock } from './run-lock.js';
export { OrchestratorState } from './state.js';
export {
  DEFAULT_RETRY_POLICY,
  buildRetryPolicy,
  shouldRetry,
  type RetryPolicy,
} from './retry-policy.js';
export {
  ExecutionEngine,
  type ExecutionEngineEvents,
  type ExecutionEngineOptions,
} from './engine.js';

// Health
export {
  HealthGrade,
  DEFAULT_HEALTH_THRESHOLDS,
  classifyHealth,
  classifySystem,
  successPercentage,
  type SystemHealth,
  type HealthCounts,
  type HealthThresholds,
} from './health.js';

// Phases
export {
  PhaseCatalog,
  DEFAULT_PHASES_PATH,
  phaseCatalogSchema,
  parsePhaseCatalog,
  loadPhaseCatalog,
  type PhaseDefinitions,
} from './phases.js';

// Facade
export {
  Orchestrator,
  createOrchestrator,
  type OrchestratorOptions,
  type UnitRunResult,
  type PhaseRunReport,
  type HealthReport,
  type StatusReport,
  type UnitSummary,
  type UnitListing,
  type UnitStatusReport,
  type DashboardReport,
  type ResetReport,
  type ExecutionLogQuery,
} from './orchestrator.js';
