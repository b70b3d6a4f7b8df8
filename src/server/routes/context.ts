import type { Orchestrator } from '../../orchestrator/orchestrator.js';
import type { AuthPreHandler } from '../middleware/auth.js';

/**
 * Dependencies shared by every route module.
 */
export interface RouteContext {
  orchestrator: Orchestrator;
  /** preHandler guarding mutating routes */
  auth: AuthPreHandler;
}
