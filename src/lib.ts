/**
 * workgraph Library API
 *
 * Exports all public modules for programmatic usage.
 */

// Orchestration core (main entry point)
export * from './orchestrator/index.js';

// Built-in demonstration units
export { registerBuiltInUnits, type TaskReport } from './units/builtin.js';

// Configuration
export {
  loadConfig,
  getConfig,
  resetConfig,
  getRetryConfig,
  type WorkgraphConfig,
  type RetryConfig,
} from './config/index.js';

// HTTP server
export * as server from './server/index.js';

// Control Plane
export * as controlPlane from './control-plane/index.js';

// Logging
export { logger, createLogger } from './utils/index.js';
