/**
 * Core orchestration types: work units, execution records, status entries
 * and the reports produced by the engine and facade.
 */

/**
 * A zero-argument unit of work. The orchestrator never interprets the
 * returned value.
 */
export type UnitHandler = () => unknown;

/**
 * Registry entry.
 */
export interface WorkUnit {
  readonly name: string;
  readonly handler: UnitHandler;
  readonly dependencies: readonly string[];
}

/**
 * Latest known outcome of a unit.
 */
export const UnitStatus = {
  NOT_RUN: 'not_run',
  SUCCESS: 'success',
  FAILED: 'failed',
} as const;

export type UnitStatus = (typeof UnitStatus)[keyof typeof UnitStatus];

/**
 * One execution attempt of one unit. Never mutated after append.
 */
export interface ExecutionRecord {
  readonly unit: string;
  readonly success: boolean;
  readonly message: string;
  readonly timestamp: string;
}

/**
 * Current-state projection for a unit that has run at least once.
 */
export interface StatusEntry {
  readonly status: Exclude<UnitStatus, 'not_run'>;
  /** Last result on success, last error message on failure */
  readonly detail: unknown;
  readonly lastRun: string;
}

/**
 * Per-unit outcome inside a batch.
 */
export type UnitOutcome =
  | { unit: string; success: true; result: unknown; attempts: number }
  | { unit: string; success: false; error: string; attempts: number };

/**
 * Options for a full-graph run.
 */
export interface RunAllOptions {
  retryFailed?: boolean;
  /** Total attempts per unit, including the first one */
  maxRetries?: number;
}

/**
 * Aggregate report for a full-graph run.
 */
export interface RunAllReport {
  runId: string;
  order: string[];
  results: UnitOutcome[];
  totalUnits: number;
  successful: number;
  failed: number;
  /** Percentage of registered units that succeeded */
  successRate: number;
  startedAt: string;
  completedAt: string;
  durationMs: number;
}

/**
 * Report for a named subset of units.
 */
export interface RunNamedReport {
  results: UnitOutcome[];
  executed: number;
  /** Requested names that were not registered */
  skipped: string[];
}

/**
 * A page of the execution log.
 */
export interface ExecutionLogPage {
  totalEntries: number;
  returned: number;
  offset: number;
  limit: number;
  logs: ExecutionRecord[];
}

/**
 * Counts captured immediately before a reset.
 */
export interface ResetSnapshot {
  totalUnits: number;
  successfulUnits: number;
  failedUnits: number;
  logEntriesCleared: number;
}
