import type { Orchestrator } from '../orchestrator/orchestrator.js';

/**
 * Builds the orchestrator a command operates on. Each CLI invocation
 * calls it at most once.
 */
export type OrchestratorFactory = () => Promise<Orchestrator>;
