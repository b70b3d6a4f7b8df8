import { ExecutionHistory } from './history.js';
import { UnitRegistry } from './registry.js';
import { RunLock } from './run-lock.js';

/**
 * Everything an orchestrator instance shares between calls: the registry,
 * the execution history and the lock serializing mutating operations.
 *
 * Construct one per process (or per test) and pass it by reference.
 */
export class OrchestratorState {
  constructor(
    readonly registry: UnitRegistry = new UnitRegistry(),
    readonly history: ExecutionHistory = new ExecutionHistory(),
    readonly lock: RunLock = new RunLock()
  ) {}
}
